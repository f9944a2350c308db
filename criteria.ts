import type { FilterCriteria, IssueState } from './types.ts';
import { AnalyzerError, validationError } from './errors.ts';

export interface RepositoryRef {
  owner: string;
  name: string;
}

const GITHUB_URL_PATTERN = /^https?:\/\/(?:www\.)?github\.com\/([^/\s]+)\/([^/\s]+?)(?:\.git)?(?:\/.*)?$/;

/**
 * Extract owner and repository name from a GitHub URL
 */
export function parseRepositoryUrl(url: string): RepositoryRef {
  const match = GITHUB_URL_PATTERN.exec(url.trim());
  if (!match) {
    throw validationError(
      'repository_url',
      url,
      'expected https://github.com/owner/repo, for example https://github.com/nodejs/node'
    );
  }
  return { owner: match[1], name: match[2] };
}

/**
 * Unvalidated criteria as they come from the command line or a caller.
 * Dates may be YYYY-MM-DD strings, full ISO timestamps, or Dates.
 */
export interface FilterCriteriaInput {
  minComments?: number;
  maxComments?: number;
  state?: IssueState;
  labels?: string[];
  anyLabels?: boolean;
  assignees?: string[];
  anyAssignees?: boolean;
  createdSince?: string | Date;
  createdUntil?: string | Date;
  updatedSince?: string | Date;
  updatedUntil?: string | Date;
  limit?: number;
  includeComments?: boolean;
}

export type FilterCriteriaResult =
  | { success: true; criteria: FilterCriteria }
  | { success: false; errors: [AnalyzerError, ...AnalyzerError[]] };

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Turn a date option into a Date. A bare date covers the whole day:
 * `since` starts at 00:00:00.000 UTC and `until` ends at 23:59:59.999 UTC.
 */
export function parseDateBound(field: string, value: string | Date, edge: 'since' | 'until'): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw validationError(field, value, 'invalid date');
    }
    return value;
  }

  const trimmed = value.trim();
  const parsed = DATE_ONLY_PATTERN.test(trimmed)
    ? new Date(`${trimmed}T${edge === 'since' ? '00:00:00.000' : '23:59:59.999'}Z`)
    : new Date(trimmed);

  // Date accepts 2024-02-31 and rolls it over, so compare the date part back
  if (Number.isNaN(parsed.getTime()) || (DATE_ONLY_PATTERN.test(trimmed) && parsed.toISOString().slice(0, 10) !== trimmed)) {
    throw validationError(field, value, `use YYYY-MM-DD format, for example 2024-01-15`);
  }
  return parsed;
}

function normalizeNames(field: string, names: string[] | undefined): string[] {
  const result: string[] = [];
  for (const name of names ?? []) {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw validationError(field, name, 'names cannot be empty');
    }
    if (!result.includes(trimmed)) result.push(trimmed);
  }
  return result;
}

function checkCommentBound(field: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0) {
    throw validationError(field, value, 'comment count must be a non-negative integer');
  }
}

function checkCommentOrder(min: number | undefined, max: number | undefined): void {
  if (min !== undefined && max !== undefined && min > max) {
    throw validationError('max_comments', max, 'min_comments cannot be greater than max_comments');
  }
}

function checkState(state: string | undefined): void {
  if (state !== undefined && state !== 'open' && state !== 'closed') {
    throw validationError('state', state, 'expected open or closed');
  }
}

function checkLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw validationError('limit', limit, 'limit must be a positive integer');
  }
}

interface DateRange {
  since?: Date;
  until?: Date;
}

function parseDateRange(prefix: 'created' | 'updated', since: string | Date | undefined, until: string | Date | undefined): DateRange {
  const sinceField = `${prefix}_since`;
  const untilField = `${prefix}_until`;
  const range: DateRange = {
    since: since !== undefined ? parseDateBound(sinceField, since, 'since') : undefined,
    until: until !== undefined ? parseDateBound(untilField, until, 'until') : undefined,
  };
  if (range.since && range.until && range.since.getTime() > range.until.getTime()) {
    throw validationError(untilField, range.until, `${sinceField} cannot be after ${untilField}`);
  }
  return range;
}

/**
 * Validate input and build FilterCriteria, collecting every violation
 * instead of stopping at the first.
 */
export function parseFilterCriteria(input: FilterCriteriaInput = {}): FilterCriteriaResult {
  const errors: AnalyzerError[] = [];
  const attempt = <T>(check: () => T): T | undefined => {
    try {
      return check();
    } catch (error) {
      if (!(error instanceof AnalyzerError)) throw error;
      errors.push(error);
      return undefined;
    }
  };

  attempt(() => checkCommentBound('min_comments', input.minComments));
  attempt(() => checkCommentBound('max_comments', input.maxComments));
  attempt(() => checkCommentOrder(input.minComments, input.maxComments));
  attempt(() => checkState(input.state));
  attempt(() => checkLimit(input.limit));
  const created = attempt(() => parseDateRange('created', input.createdSince, input.createdUntil));
  const updated = attempt(() => parseDateRange('updated', input.updatedSince, input.updatedUntil));
  const labels = attempt(() => normalizeNames('labels', input.labels));
  const assignees = attempt(() => normalizeNames('assignees', input.assignees));

  const [first, ...rest] = errors;
  if (first) {
    return { success: false, errors: [first, ...rest] };
  }

  return {
    success: true,
    criteria: {
      minComments: input.minComments,
      maxComments: input.maxComments,
      state: input.state,
      labels: labels ?? [],
      anyLabels: input.anyLabels ?? true,
      assignees: assignees ?? [],
      anyAssignees: input.anyAssignees ?? true,
      createdSince: created?.since,
      createdUntil: created?.until,
      updatedSince: updated?.since,
      updatedUntil: updated?.until,
      limit: input.limit,
      includeComments: input.includeComments ?? false,
    },
  };
}

/**
 * Validate input and build FilterCriteria. Throws the first violation.
 */
export function createFilterCriteria(input: FilterCriteriaInput = {}): FilterCriteria {
  const result = parseFilterCriteria(input);
  if (!result.success) {
    throw result.errors[0];
  }
  return result.criteria;
}
