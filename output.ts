import { access, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import pc from 'picocolors';
import type { ActivityMetrics, AnalysisResult, Granularity, Issue, OutputFormat, Repository } from './types.ts';
import { describeFilters } from './filter.ts';
import { formatDate } from './utils.ts';

type Colors = ReturnType<typeof pc.createColors>;

export interface TableOptions {
  granularity?: Granularity | 'auto';
  color?: boolean;
}

const RULE = '='.repeat(80);
const MAX_TABLE_ROWS = 100;
const MAX_TITLE_LENGTH = 50;
const COMMENT_PREVIEW_ISSUES = 5;

function truncate(text: string, length: number): string {
  return text.length > length ? text.slice(0, length - 3) + '...' : text;
}

function chunk<T>(items: T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    rows.push(items.slice(i, i + size));
  }
  return rows;
}

interface TimeActivityView {
  title: string;
  entries: Array<[string, number]>;
  perLine: number;
}

/**
 * Pick the time series to show. In auto mode, daily when it spans at most
 * 30 days, weekly up to 26 weeks, otherwise the last 12 months.
 */
export function selectTimeActivity(metrics: ActivityMetrics, granularity: Granularity | 'auto' = 'auto'): TimeActivityView | null {
  const days = Object.entries(metrics.activityByDay);
  const weeks = Object.entries(metrics.activityByWeek);
  const months = Object.entries(metrics.activityByMonth);

  const daily = { title: '📅 Daily Activity (last 30 days)', entries: days.slice(-30), perLine: 5 };
  const weekly = { title: '📅 Weekly Activity (last 26 weeks)', entries: weeks.slice(-26), perLine: 3 };
  const monthly = { title: '📅 Monthly Activity (last 12 months)', entries: months.slice(-12), perLine: 4 };

  let view: TimeActivityView;
  switch (granularity) {
    case 'daily':
      view = daily;
      break;
    case 'weekly':
      view = weekly;
      break;
    case 'monthly':
      view = monthly;
      break;
    default:
      if (days.length > 0 && days.length <= 30) view = daily;
      else if (weeks.length > 0 && weeks.length <= 26) view = weekly;
      else view = monthly;
  }

  return view.entries.length > 0 ? view : null;
}

function formatMetrics(metrics: ActivityMetrics, granularity: Granularity | 'auto', c: Colors): string[] {
  const lines: string[] = ['', c.bold(c.cyan('📊 ACTIVITY METRICS')), ''];

  const dist = metrics.commentDistribution;
  lines.push(`💬 Comment Distribution: 0-5: ${dist['0-5']} | 6-10: ${dist['6-10']} | 11+: ${dist['11+']}`);

  if (metrics.topLabels.length > 0) {
    lines.push('', '🏷️  Top Labels:');
    for (const label of metrics.topLabels.slice(0, 5)) {
      lines.push(`   • ${label.name}: ${label.count} issues`);
    }
  }

  if (metrics.trendingLabels.length > 0) {
    lines.push('', '📈 Trending Labels:');
    for (const label of metrics.trendingLabels) {
      lines.push(`   • ${label.name}: ${label.count} issues`);
    }
  }

  const activity = selectTimeActivity(metrics, granularity);
  if (activity) {
    lines.push('', activity.title);
    for (const row of chunk(activity.entries, activity.perLine)) {
      lines.push('   ' + row.map(([key, count]) => `${key}: ${count}`.padEnd(16)).join('').trimEnd());
    }
  }

  if (metrics.mostActiveUsers.length > 0) {
    lines.push('', '👥 Most Active Users:');
    for (const user of metrics.mostActiveUsers) {
      const role = user.role !== 'none' ? c.dim(` [${user.role}]`) : '';
      const activityText = user.commentsMade > 0
        ? `${user.commentsMade} comments, ${user.issuesCreated} issues`
        : `${user.issuesCreated} issues`;
      lines.push(`   • ${user.username}${role}: ${activityText}`);
    }
  }

  if (metrics.averageResolutionDays !== null) {
    lines.push('', `⏱️  Average resolution time: ${metrics.averageResolutionDays.toFixed(1)} days`);
  }

  return lines;
}

function formatIssueTable(issues: readonly Issue[], c: Colors): string[] {
  const lines: string[] = ['', c.bold(`📋 ISSUES (${issues.length})`), ''];
  lines.push(`${'Number'.padEnd(8)} | ${'Title'.padEnd(MAX_TITLE_LENGTH)} | State  | Comments | Created    | Author`);
  lines.push('-'.repeat(110));

  for (const issue of issues.slice(0, MAX_TABLE_ROWS)) {
    const number = c.cyan(`#${issue.number}`.padEnd(8));
    const title = truncate(issue.title, MAX_TITLE_LENGTH).padEnd(MAX_TITLE_LENGTH);
    const state = (issue.state === 'open' ? c.green : c.red)(issue.state.toUpperCase().padEnd(6));
    const comments = issue.commentCount.toString().padStart(8);
    lines.push(`${number} | ${title} | ${state} | ${comments} | ${formatDate(issue.createdAt)} | ${issue.author.username}`);
  }

  if (issues.length > MAX_TABLE_ROWS) {
    lines.push(c.dim(`... and ${issues.length - MAX_TABLE_ROWS} more`));
  }
  return lines;
}

function formatComments(issues: readonly Issue[], c: Colors): string[] {
  const withComments = issues.filter(issue => issue.comments.length > 0).slice(0, COMMENT_PREVIEW_ISSUES);
  if (withComments.length === 0) return [];

  const lines: string[] = ['', c.bold(c.green('💬 COMMENTS'))];
  for (const issue of withComments) {
    lines.push('', c.cyan(`Issue #${issue.number}: ${issue.title}`));
    for (const comment of issue.comments) {
      const author = comment.author?.username ?? 'ghost';
      lines.push(`  ${author} (${formatDate(comment.createdAt)}): ${comment.body.replace(/\s+/g, ' ').trim()}`);
    }
  }
  return lines;
}

/**
 * Render the analysis as console tables
 */
export function formatTable(result: AnalysisResult, options: TableOptions = {}): string {
  const c = pc.createColors(options.color ?? false);
  const { repository, metrics } = result;

  const lines: string[] = [
    RULE,
    c.bold(`Issue Activity Analysis: ${repository.fullName}`),
    RULE,
    describeFilters(result.criteria),
    `Total issues analyzed: ${metrics.totalIssuesAnalyzed}`,
    `Issues matching filters: ${metrics.issuesMatchingFilters}`,
    `Average comment count: ${metrics.averageCommentCount.toFixed(1)}`,
    RULE,
    ...formatMetrics(metrics, options.granularity ?? 'auto', c),
  ];

  if (result.issues.length === 0) {
    lines.push('', c.red('No issues found matching the specified criteria.'));
  } else {
    lines.push(...formatIssueTable(result.issues, c), ...formatComments(result.issues, c));
  }

  for (const warning of result.warnings) {
    lines.push(c.yellow(`⚠️  ${warning}`));
  }

  lines.push('', RULE);
  return lines.join('\n');
}

function serializeIssue(issue: Issue) {
  return {
    number: issue.number,
    title: issue.title,
    state: issue.state,
    url: issue.url,
    author: issue.author.username,
    author_role: issue.authorRole,
    assignees: issue.assignees.map(user => user.username),
    labels: issue.labels.map(label => label.name),
    comment_count: issue.commentCount,
    created_at: issue.createdAt.toISOString(),
    updated_at: issue.updatedAt.toISOString(),
    closed_at: issue.closedAt ? issue.closedAt.toISOString() : null,
    body: issue.body,
    comments: issue.comments.map(comment => ({
      id: comment.id,
      author: comment.author?.username ?? null,
      author_role: comment.authorRole,
      created_at: comment.createdAt.toISOString(),
      body: comment.body,
    })),
  };
}

/**
 * Render the analysis as pretty-printed JSON
 */
export function formatJSON(result: AnalysisResult): string {
  const { criteria, metrics } = result;
  const document = {
    repository: {
      full_name: result.repository.fullName,
      url: result.repository.url,
      default_branch: result.repository.defaultBranch,
      description: result.repository.description,
      stars: result.repository.stars,
    },
    filters: {
      min_comments: criteria.minComments ?? null,
      max_comments: criteria.maxComments ?? null,
      state: criteria.state ?? null,
      labels: criteria.labels,
      any_labels: criteria.anyLabels,
      assignees: criteria.assignees,
      any_assignees: criteria.anyAssignees,
      created_since: criteria.createdSince?.toISOString() ?? null,
      created_until: criteria.createdUntil?.toISOString() ?? null,
      updated_since: criteria.updatedSince?.toISOString() ?? null,
      updated_until: criteria.updatedUntil?.toISOString() ?? null,
      limit: criteria.limit ?? null,
      include_comments: criteria.includeComments,
    },
    metrics: {
      total_issues_analyzed: metrics.totalIssuesAnalyzed,
      issues_matching_filters: metrics.issuesMatchingFilters,
      average_comment_count: metrics.averageCommentCount,
      comment_distribution: metrics.commentDistribution,
      top_labels: metrics.topLabels,
      trending_labels: metrics.trendingLabels,
      activity_by_day: metrics.activityByDay,
      activity_by_week: metrics.activityByWeek,
      activity_by_month: metrics.activityByMonth,
      most_active_users: metrics.mostActiveUsers.map(user => ({
        username: user.username,
        issues_created: user.issuesCreated,
        comments_made: user.commentsMade,
        role: user.role,
      })),
      average_resolution_days: metrics.averageResolutionDays,
    },
    issues: result.issues.map(serializeIssue),
    total_issues_available: result.totalIssuesAvailable,
    generated_at: result.generatedAt.toISOString(),
    analysis_time_seconds: result.elapsedSeconds,
    warnings: result.warnings,
  };

  return JSON.stringify(document, null, 2);
}

/**
 * Quote a CSV field when it contains a comma, quote or line break
 */
export function escapeCSVField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Generate CSV content from issues
 */
export function generateCSV(issues: readonly Issue[]): string {
  const headers = [
    'Number',
    'Title',
    'State',
    'Comments',
    'Created At',
    'Updated At',
    'Closed At',
    'Author',
    'Assignees',
    'Labels',
    'URL',
  ];

  const rows = issues.map(issue => [
    issue.number.toString(),
    issue.title,
    issue.state,
    issue.commentCount.toString(),
    issue.createdAt.toISOString(),
    issue.updatedAt.toISOString(),
    issue.closedAt ? issue.closedAt.toISOString() : '',
    issue.author.username,
    issue.assignees.map(user => user.username).join(';'),
    issue.labels.map(label => label.name).join(';'),
    issue.url,
  ]);

  return [headers, ...rows].map(row => row.map(escapeCSVField).join(',')).join('\n');
}

export function formatResult(result: AnalysisResult, format: OutputFormat, options: TableOptions = {}): string {
  switch (format) {
    case 'json':
      return formatJSON(result);
    case 'csv':
      return generateCSV(result.issues);
    case 'table':
      return formatTable(result, options);
  }
}

const EXTENSIONS: Record<OutputFormat, string> = { json: 'json', csv: 'csv', table: 'txt' };

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function timestamp(date: Date): string {
  // 2024-03-05T14:07:09.000Z -> 20240305-140709
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * File name for output written without --output, e.g. nodejs_node_20240305-140709.json.
 * Adds _1, _2, ... when the name is taken.
 */
export async function generateFilename(
  repository: Pick<Repository, 'owner' | 'name'>,
  format: OutputFormat,
  now: Date = new Date(),
  directory = '.'
): Promise<string> {
  const safe = (part: string) => part.replace(/[^A-Za-z0-9._-]/g, '-');
  const base = `${safe(repository.owner)}_${safe(repository.name)}_${timestamp(now)}`;
  const ext = EXTENSIONS[format];

  let candidate = join(directory, `${base}.${ext}`);
  for (let suffix = 1; await fileExists(candidate); suffix++) {
    candidate = join(directory, `${base}_${suffix}.${ext}`);
  }
  return candidate;
}

/**
 * Save output to file
 */
export async function saveOutput(content: string, filepath: string): Promise<string> {
  await writeFile(filepath, content.endsWith('\n') ? content : content + '\n', 'utf-8');
  return filepath;
}
