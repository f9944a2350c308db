import { Octokit, type RestEndpointMethodTypes } from '@octokit/rest';
import type { Comment, Issue, IssueState, Label, RateLimitInfo, Repository, User, UserRole } from './types.ts';
import type { ProgressReporter } from './progress.ts';
import { SilentReporter } from './progress.ts';
import {
  AnalyzerError,
  accessError,
  errorMessage,
  notFoundError,
  partialRetrievalError,
  rateLimitError,
} from './errors.ts';
import { calculateFetchBuffer, sleep } from './utils.ts';

type RawIssue = RestEndpointMethodTypes['issues']['listForRepo']['response']['data'][number];
type RawComment = RestEndpointMethodTypes['issues']['listComments']['response']['data'][number];
type RawUser = NonNullable<RawIssue['user']>;
type RawLabel = RawIssue['labels'][number];

/**
 * Everything the analyzer needs from the hosting provider
 */
export interface IssueSource {
  getRepository(owner: string, name: string): Promise<Repository>;
  /** Issues only; pull requests are dropped before returning. */
  getIssues(
    owner: string,
    name: string,
    state: IssueState | 'all',
    limit?: number,
    onProgress?: (fetched: number) => void
  ): Promise<Issue[]>;
  /**
   * Never throws; an issue whose comments cannot be read gets an empty list
   * and the failure goes to `onFailure`.
   */
  getCommentsForIssue(
    owner: string,
    name: string,
    issueNumber: number,
    onFailure?: (error: AnalyzerError) => void
  ): Promise<Comment[]>;
  getRateLimitInfo(): Promise<RateLimitInfo>;
}

export interface GitHubSourceOptions {
  token?: string;
  octokit?: Octokit;
  reporter?: ProgressReporter;
  /** Longest rate-limit reset the source is willing to sleep through */
  maxWaitSeconds?: number;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const PER_PAGE = 100;
const GHOST_USER: User = { id: 0, username: 'ghost', displayName: null, avatarUrl: null, isBot: false };

export function toUserRole(association: string | null | undefined): UserRole {
  switch (association) {
    case 'OWNER':
      return 'owner';
    case 'MEMBER':
      return 'member';
    case 'COLLABORATOR':
      return 'collaborator';
    case 'CONTRIBUTOR':
    case 'FIRST_TIME_CONTRIBUTOR':
      return 'contributor';
    default:
      return 'none';
  }
}

function convertUser(user: RawUser): User {
  return {
    id: user.id,
    username: user.login,
    displayName: user.name ?? null,
    avatarUrl: user.avatar_url || null,
    isBot: user.type === 'Bot',
  };
}

function convertLabels(labels: RawLabel[]): Label[] {
  const converted: Label[] = [];
  for (const label of labels) {
    const name = typeof label === 'string' ? label : label.name;
    if (!name || converted.some(existing => existing.name === name)) continue;

    converted.push(typeof label === 'string'
      ? { id: 0, name, color: '', description: null }
      : { id: label.id ?? 0, name, color: label.color ?? '', description: label.description ?? null });
  }
  return converted;
}

export function convertIssue(issue: RawIssue): Issue {
  return {
    id: issue.id,
    number: issue.number,
    title: issue.title,
    body: issue.body ?? null,
    state: issue.state === 'closed' ? 'closed' : 'open',
    createdAt: new Date(issue.created_at),
    updatedAt: new Date(issue.updated_at),
    closedAt: issue.closed_at ? new Date(issue.closed_at) : null,
    author: issue.user ? convertUser(issue.user) : GHOST_USER,
    authorRole: toUserRole(issue.author_association),
    assignees: (issue.assignees ?? []).map(convertUser),
    labels: convertLabels(issue.labels),
    commentCount: issue.comments,
    comments: [],
    isPullRequest: issue.pull_request !== undefined && issue.pull_request !== null,
    url: issue.html_url,
  };
}

export function convertComment(comment: RawComment, issueNumber: number): Comment {
  return {
    id: comment.id,
    body: comment.body ?? '',
    author: comment.user ? convertUser(comment.user) : null,
    authorRole: toUserRole(comment.author_association),
    createdAt: new Date(comment.created_at),
    updatedAt: new Date(comment.updated_at),
    issueNumber,
  };
}

function httpStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function responseHeader(error: unknown, name: string): string | undefined {
  if (!(error instanceof Error) || !('response' in error)) return undefined;
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('headers' in response)) return undefined;
  const headers = response.headers;
  if (typeof headers !== 'object' || headers === null || !(name in headers)) return undefined;
  const value: unknown = Reflect.get(headers, name);
  return value === undefined || value === null ? undefined : String(value);
}

export interface OctokitSettings {
  token?: string;
  reporter: ProgressReporter;
  fetch?: typeof fetch;
}

/**
 * Octokit whose request log goes to the reporter's debug output instead of
 * the console. Failures reach the user through the errors the source raises.
 */
export function createOctokit({ token, reporter, fetch }: OctokitSettings): Octokit {
  const debug = (message: string): void => reporter.debug(message);
  return new Octokit({
    auth: token,
    userAgent: 'issue-activity-analyzer',
    request: fetch ? { fetch } : undefined,
    log: { debug, info: debug, warn: debug, error: debug },
  });
}

/**
 * Read-only GitHub binding on top of Octokit
 */
export class GitHubIssueSource implements IssueSource {
  private octokit: Octokit;
  private reporter: ProgressReporter;
  private maxWaitSeconds: number;
  private maxRetries: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: GitHubSourceOptions = {}) {
    this.reporter = options.reporter ?? new SilentReporter();
    this.octokit = options.octokit ?? createOctokit({ token: options.token, reporter: this.reporter });
    this.maxWaitSeconds = options.maxWaitSeconds ?? 900;
    this.maxRetries = options.maxRetries ?? 1;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Rate-limit details when the error is a GitHub rate-limit response
   */
  private rateLimitHit(error: unknown): { remaining: number; reset: Date } | null {
    const status = httpStatus(error);
    if (status !== 403 && status !== 429) return null;

    const remainingHeader = responseHeader(error, 'x-ratelimit-remaining');
    if (remainingHeader !== '0' && !/rate limit/i.test(errorMessage(error))) return null;

    const resetHeader = responseHeader(error, 'x-ratelimit-reset');
    const reset = resetHeader !== undefined && /^\d+$/.test(resetHeader)
      ? new Date(Number(resetHeader) * 1000)
      : new Date(this.now() + 60_000);

    return { remaining: Number(remainingHeader ?? 0), reset };
  }

  /**
   * Run an API call, sleeping through a rate-limit reset when the wait is short enough
   */
  private async withRateLimit<T>(context: string, call: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await call();
      } catch (error) {
        const hit = this.rateLimitHit(error);
        if (!hit) throw error;

        const waitMs = Math.max(0, hit.reset.getTime() - this.now()) + 1000;
        if (attempt >= this.maxRetries || waitMs > this.maxWaitSeconds * 1000) {
          throw rateLimitError(hit.remaining, hit.reset, new Date(this.now()), error);
        }

        this.reporter.warn(
          `Rate limit hit while ${context}. Waiting ${Math.ceil(waitMs / 1000)}s until ${hit.reset.toLocaleTimeString()}...`
        );
        await this.sleep(waitMs);
      }
    }
  }

  async getRepository(owner: string, name: string): Promise<Repository> {
    const fullName = `${owner}/${name}`;
    this.reporter.debug(`Fetching repository info for ${fullName}`);

    let data: RestEndpointMethodTypes['repos']['get']['response']['data'];
    try {
      ({ data } = await this.withRateLimit(`fetching ${fullName}`, () =>
        this.octokit.repos.get({ owner, repo: name })
      ));
    } catch (error) {
      if (error instanceof AnalyzerError) throw error;
      const status = httpStatus(error);
      if (status === 404) throw notFoundError(fullName, error);
      if (status === 403) throw accessError(fullName, error);
      throw new Error(`Failed to fetch repository ${fullName}: ${errorMessage(error)}`, { cause: error });
    }

    if (data.private) {
      throw accessError(fullName);
    }

    return {
      owner: data.owner.login,
      name: data.name,
      fullName: data.full_name,
      url: data.html_url,
      apiUrl: data.url,
      isPublic: !data.private,
      defaultBranch: data.default_branch,
      description: data.description ?? null,
      openIssuesCount: data.open_issues_count,
      stars: data.stargazers_count,
    };
  }

  /**
   * Fetch issues newest first. With a limit, read only a buffer of raw items
   * (pull requests included), then drop pull requests and cut to the limit.
   */
  async getIssues(
    owner: string,
    name: string,
    state: IssueState | 'all',
    limit?: number,
    onProgress?: (fetched: number) => void
  ): Promise<Issue[]> {
    this.reporter.info(`📥 Fetching issues for ${owner}/${name}...`);
    if (limit === undefined) {
      this.reporter.debug('Fetching all issues without a limit; this may use a lot of API quota');
    }

    const bufferSize = limit !== undefined ? calculateFetchBuffer(limit) : undefined;

    const raw = await this.withRateLimit(`fetching issues for ${owner}/${name}`, async () => {
      const items: RawIssue[] = [];
      const pages = this.octokit.paginate.iterator(this.octokit.issues.listForRepo, {
        owner,
        repo: name,
        state,
        sort: 'created',
        direction: 'desc',
        per_page: bufferSize !== undefined ? Math.min(PER_PAGE, bufferSize) : PER_PAGE,
      });

      reading: for await (const { data } of pages) {
        for (const item of data) {
          items.push(item);
          if (bufferSize !== undefined && items.length >= bufferSize) {
            onProgress?.(items.length);
            break reading;
          }
        }
        onProgress?.(items.length);
      }
      return items;
    });

    const issues = raw.filter(item => !item.pull_request).map(convertIssue);
    const result = limit !== undefined ? issues.slice(0, limit) : issues;

    this.reporter.info(`✓ Fetched ${result.length} issues (${raw.length - issues.length} pull requests skipped)`);
    return result;
  }

  async getCommentsForIssue(
    owner: string,
    name: string,
    issueNumber: number,
    onFailure?: (error: AnalyzerError) => void
  ): Promise<Comment[]> {
    try {
      const comments = await this.withRateLimit(`fetching comments for #${issueNumber}`, () =>
        this.octokit.paginate(this.octokit.issues.listComments, {
          owner,
          repo: name,
          issue_number: issueNumber,
          per_page: PER_PAGE,
        })
      );
      return comments.map(comment => convertComment(comment, issueNumber));
    } catch (error) {
      const failure = partialRetrievalError(issueNumber, error);
      if (onFailure) {
        onFailure(failure);
      } else {
        this.reporter.warn(failure.message);
      }
      return [];
    }
  }

  async getRateLimitInfo(): Promise<RateLimitInfo> {
    const { data } = await this.octokit.rateLimit.get();
    const core = data.resources.core;
    return { limit: core.limit, remaining: core.remaining, reset: new Date(core.reset * 1000) };
  }

  /**
   * Check and display API rate limit status
   */
  async checkRateLimit(): Promise<RateLimitInfo | null> {
    try {
      const info = await this.getRateLimitInfo();
      const minutesUntilReset = Math.ceil((info.reset.getTime() - this.now()) / 60000);

      this.reporter.info(`⚡ GitHub API: ${info.remaining}/${info.limit} requests remaining`);
      if (info.remaining === 0) {
        this.reporter.warn(`DEPLETED! Resets in ${minutesUntilReset} minutes at ${info.reset.toLocaleTimeString()}`);
      } else if (info.remaining < info.limit * 0.1) {
        this.reporter.warn(`Low! Resets in ${minutesUntilReset} minutes at ${info.reset.toLocaleTimeString()}`);
      }
      return info;
    } catch (error) {
      this.reporter.warn(`Could not fetch rate limit: ${errorMessage(error)}`);
      return null;
    }
  }
}
