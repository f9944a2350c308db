import type {
  ActivityMetrics,
  CommentDistribution,
  Granularity,
  Issue,
  LabelCount,
  UserActivity,
  UserRole,
} from './types.ts';
import { addDays, daysBetween, formatDate, formatIsoWeek, formatMonth } from './utils.ts';

export const DEFAULT_TOP_LABEL_LIMIT = 10;
export const DEFAULT_ACTIVE_USER_LIMIT = 5;
export const DEFAULT_GROWTH_THRESHOLD = 0.25;
export const DEFAULT_MIN_OCCURRENCES = 5;

/**
 * Mean comment count, 0 for an empty list
 */
export function calculateAverageComments(issues: Issue[]): number {
  if (issues.length === 0) return 0;
  const total = issues.reduce((sum, issue) => sum + issue.commentCount, 0);
  return total / issues.length;
}

export function calculateCommentDistribution(issues: Issue[]): CommentDistribution {
  const distribution: CommentDistribution = { '0-5': 0, '6-10': 0, '11+': 0 };

  for (const issue of issues) {
    if (issue.commentCount >= 11) {
      distribution['11+']++;
    } else if (issue.commentCount >= 6) {
      distribution['6-10']++;
    } else {
      distribution['0-5']++;
    }
  }

  return distribution;
}

function countLabels(issues: Issue[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const issue of issues) {
    for (const label of issue.labels) {
      counts.set(label.name, (counts.get(label.name) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Most used labels. Map keeps insertion order and sort is stable,
 * so equal counts stay in the order they were first seen.
 */
export function calculateTopLabels(issues: Issue[], limit: number = DEFAULT_TOP_LABEL_LIMIT): LabelCount[] {
  return Array.from(countLabels(issues), ([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

const BUCKET_KEYS: Record<Granularity, (date: Date) => string> = {
  daily: formatDate,
  weekly: formatIsoWeek,
  monthly: formatMonth,
};

/**
 * Issue counts per day, ISO week or month of creation, keys ascending.
 * Anything other than daily or weekly is treated as monthly.
 */
export function calculateTimeBreakdown(issues: Issue[], granularity: string = 'monthly'): Record<string, number> {
  const keyOf = granularity === 'daily' || granularity === 'weekly'
    ? BUCKET_KEYS[granularity]
    : BUCKET_KEYS.monthly;

  const counts = new Map<string, number>();
  for (const issue of issues) {
    const key = keyOf(issue.createdAt);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const sorted: Record<string, number> = {};
  for (const key of Array.from(counts.keys()).sort()) {
    sorted[key] = counts.get(key) ?? 0;
  }
  return sorted;
}

const ROLE_RANK: Record<UserRole, number> = {
  owner: 4,
  member: 3,
  collaborator: 2,
  contributor: 1,
  none: 0,
};

function strongerRole(a: UserRole, b: UserRole): UserRole {
  return ROLE_RANK[b] > ROLE_RANK[a] ? b : a;
}

/**
 * Rank users by comments made, then by issues created. Issue authors with no
 * comments are kept with a count of 0; comments from deleted accounts are skipped.
 */
export function calculateMostActiveUsers(issues: Issue[], limit: number = DEFAULT_ACTIVE_USER_LIMIT): UserActivity[] {
  const activity = new Map<string, UserActivity>();

  const entryFor = (username: string): UserActivity => {
    let entry = activity.get(username);
    if (!entry) {
      entry = { username, issuesCreated: 0, commentsMade: 0, role: 'none' };
      activity.set(username, entry);
    }
    return entry;
  };

  for (const issue of issues) {
    const author = entryFor(issue.author.username);
    author.issuesCreated++;
    author.role = strongerRole(author.role, issue.authorRole);

    for (const comment of issue.comments) {
      if (!comment.author) continue;
      const commenter = entryFor(comment.author.username);
      commenter.commentsMade++;
      commenter.role = strongerRole(commenter.role, comment.authorRole);
    }
  }

  return Array.from(activity.values())
    .sort((a, b) => b.commentsMade - a.commentsMade || b.issuesCreated - a.issuesCreated)
    .slice(0, limit);
}

/**
 * Mean days from creation to close over closed issues, null when there are none
 */
export function calculateAverageResolutionTime(issues: Issue[]): number | null {
  const resolutionDays: number[] = [];
  for (const issue of issues) {
    if (issue.state === 'closed' && issue.closedAt) {
      resolutionDays.push(daysBetween(issue.createdAt, issue.closedAt));
    }
  }

  if (resolutionDays.length === 0) return null;
  return resolutionDays.reduce((sum, days) => sum + days, 0) / resolutionDays.length;
}

export interface TrendingOptions {
  growthThreshold?: number;
  minOccurrences?: number;
}

/**
 * Labels that grew between two periods. A label must appear at least
 * `minOccurrences` times in the current period, and either be new or have
 * grown by at least `growthThreshold` (0.25 = 25%).
 */
export function calculateTrendingLabels(
  currentIssues: Issue[],
  previousIssues: Issue[],
  options: TrendingOptions = {}
): LabelCount[] {
  const growthThreshold = options.growthThreshold ?? DEFAULT_GROWTH_THRESHOLD;
  const minOccurrences = options.minOccurrences ?? DEFAULT_MIN_OCCURRENCES;

  const current = countLabels(currentIssues);
  const previous = countLabels(previousIssues);
  const trending: LabelCount[] = [];

  for (const [name, count] of current) {
    if (count < minOccurrences) continue;

    const before = previous.get(name) ?? 0;
    if (before === 0 || (count - before) / before >= growthThreshold) {
      trending.push({ name, count });
    }
  }

  return trending.sort((a, b) => b.count - a.count);
}

/**
 * Split issues into two back-to-back windows ending at `referenceDate`:
 * current is (ref - window, ref], previous is (ref - 2*window, ref - window].
 * Issues outside both windows are dropped.
 */
export function splitByPeriod(
  issues: Issue[],
  windowDays: number,
  referenceDate: Date
): { current: Issue[]; previous: Issue[] } {
  const boundary = addDays(referenceDate, -windowDays).getTime();
  const start = addDays(referenceDate, -2 * windowDays).getTime();
  const end = referenceDate.getTime();

  const current: Issue[] = [];
  const previous: Issue[] = [];
  for (const issue of issues) {
    const created = issue.createdAt.getTime();
    if (created > boundary && created <= end) {
      current.push(issue);
    } else if (created > start && created <= boundary) {
      previous.push(issue);
    }
  }
  return { current, previous };
}

export interface MetricsOptions {
  activeUserLimit?: number;
  topLabelLimit?: number;
  trending?: TrendingOptions & { windowDays: number; referenceDate: Date };
}

/**
 * Full metrics snapshot for the filtered issues
 */
export function calculateMetrics(
  issues: Issue[],
  totalCount: number,
  options: MetricsOptions = {}
): ActivityMetrics {
  let trendingLabels: LabelCount[] = [];
  if (options.trending) {
    const { windowDays, referenceDate, ...thresholds } = options.trending;
    const { current, previous } = splitByPeriod(issues, windowDays, referenceDate);
    trendingLabels = calculateTrendingLabels(current, previous, thresholds);
  }

  return {
    totalIssuesAnalyzed: totalCount,
    issuesMatchingFilters: issues.length,
    averageCommentCount: calculateAverageComments(issues),
    commentDistribution: calculateCommentDistribution(issues),
    topLabels: calculateTopLabels(issues, options.topLabelLimit ?? DEFAULT_TOP_LABEL_LIMIT),
    activityByDay: calculateTimeBreakdown(issues, 'daily'),
    activityByWeek: calculateTimeBreakdown(issues, 'weekly'),
    activityByMonth: calculateTimeBreakdown(issues, 'monthly'),
    mostActiveUsers: calculateMostActiveUsers(issues, options.activeUserLimit ?? DEFAULT_ACTIVE_USER_LIMIT),
    averageResolutionDays: calculateAverageResolutionTime(issues),
    trendingLabels,
  };
}
