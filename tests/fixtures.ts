import type { Comment, Issue, Label, Repository, User, UserRole } from '../types.ts';
import { createFilterCriteria, type FilterCriteriaInput } from '../criteria.ts';
import type { ProgressReporter } from '../progress.ts';

let nextId = 1000;

export function makeUser(username: string, overrides: Partial<User> = {}): User {
  return {
    id: nextId++,
    username,
    displayName: null,
    avatarUrl: null,
    isBot: false,
    ...overrides,
  };
}

export function makeLabel(name: string): Label {
  return { id: nextId++, name, color: 'ededed', description: null };
}

export function makeComment(
  author: string | null,
  overrides: Partial<Comment> & { role?: UserRole } = {}
): Comment {
  const { role, ...rest } = overrides;
  return {
    id: nextId++,
    body: 'Looks good to me',
    author: author === null ? null : makeUser(author),
    authorRole: role ?? 'none',
    createdAt: new Date('2024-01-02T00:00:00Z'),
    updatedAt: new Date('2024-01-02T00:00:00Z'),
    issueNumber: 1,
    ...rest,
  };
}

export interface IssueFields {
  number: number;
  title?: string;
  state?: 'open' | 'closed';
  comments?: number;
  labels?: string[];
  assignees?: string[];
  author?: string;
  authorRole?: UserRole;
  createdAt?: string;
  updatedAt?: string;
  closedAt?: string | null;
  commentList?: Comment[];
  isPullRequest?: boolean;
}

export function makeIssue(fields: IssueFields): Issue {
  const createdAt = new Date(fields.createdAt ?? '2024-01-01T00:00:00Z');
  return {
    id: fields.number * 10,
    number: fields.number,
    title: fields.title ?? `Issue ${fields.number}`,
    body: null,
    state: fields.state ?? 'open',
    createdAt,
    updatedAt: new Date(fields.updatedAt ?? fields.createdAt ?? '2024-01-01T00:00:00Z'),
    closedAt: fields.closedAt ? new Date(fields.closedAt) : null,
    author: makeUser(fields.author ?? 'reporter'),
    authorRole: fields.authorRole ?? 'none',
    assignees: (fields.assignees ?? []).map(name => makeUser(name)),
    labels: (fields.labels ?? []).map(makeLabel),
    commentCount: fields.comments ?? 0,
    comments: fields.commentList ?? [],
    isPullRequest: fields.isPullRequest ?? false,
    url: `https://github.com/acme/widgets/issues/${fields.number}`,
  };
}

export function criteria(input: FilterCriteriaInput = {}) {
  return createFilterCriteria(input);
}

export function makeRepository(overrides: Partial<Repository> = {}): Repository {
  return {
    owner: 'acme',
    name: 'widgets',
    fullName: 'acme/widgets',
    url: 'https://github.com/acme/widgets',
    apiUrl: 'https://api.github.com/repos/acme/widgets',
    isPublic: true,
    defaultBranch: 'main',
    description: 'Widgets for everyone',
    openIssuesCount: 3,
    stars: 42,
    ...overrides,
  };
}

/**
 * Keeps everything it is told, by kind
 */
export class RecordingReporter implements ProgressReporter {
  readonly phases: string[] = [];
  readonly starts: Array<{ total: number; label: string }> = [];
  readonly infos: string[] = [];
  readonly warnings: string[] = [];
  readonly debugs: string[] = [];

  phase(description: string): void {
    this.phases.push(description);
  }

  start(total: number, label: string): void {
    this.starts.push({ total, label });
  }

  advance(): void {}
  finish(): void {}

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  debug(message: string): void {
    this.debugs.push(message);
  }
}
