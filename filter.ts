import type { FilterCriteria, Issue } from './types.ts';
import { validationError } from './errors.ts';
import { formatDate } from './utils.ts';

type IssueFilter = (issues: Issue[], criteria: FilterCriteria) => Issue[];

function matchesNames(issueNames: Set<string>, targets: string[], any: boolean): boolean {
  if (issueNames.size === 0) return false;
  return any
    ? targets.some(name => issueNames.has(name))
    : targets.every(name => issueNames.has(name));
}

const byCommentCount: IssueFilter = (issues, { minComments, maxComments }) => {
  if (minComments === undefined && maxComments === undefined) return issues;
  return issues.filter(issue =>
    (minComments === undefined || issue.commentCount >= minComments) &&
    (maxComments === undefined || issue.commentCount <= maxComments)
  );
};

const byState: IssueFilter = (issues, { state }) => {
  if (state === undefined) return issues;
  return issues.filter(issue => issue.state === state);
};

const byLabels: IssueFilter = (issues, { labels, anyLabels }) => {
  if (labels.length === 0) return issues;
  return issues.filter(issue =>
    matchesNames(new Set(issue.labels.map(label => label.name)), labels, anyLabels)
  );
};

const byAssignees: IssueFilter = (issues, { assignees, anyAssignees }) => {
  if (assignees.length === 0) return issues;
  return issues.filter(issue =>
    matchesNames(new Set(issue.assignees.map(user => user.username)), assignees, anyAssignees)
  );
};

const byDateRange: IssueFilter = (issues, criteria) => {
  const { createdSince, createdUntil, updatedSince, updatedUntil } = criteria;
  if (!createdSince && !createdUntil && !updatedSince && !updatedUntil) return issues;

  return issues.filter(issue => {
    const created = issue.createdAt.getTime();
    const updated = issue.updatedAt.getTime();
    if (createdSince && created < createdSince.getTime()) return false;
    if (createdUntil && created > createdUntil.getTime()) return false;
    if (updatedSince && updated < updatedSince.getTime()) return false;
    if (updatedUntil && updated > updatedUntil.getTime()) return false;
    return true;
  });
};

// Order matters: limit must stay last
const PIPELINE: IssueFilter[] = [byCommentCount, byState, byLabels, byAssignees, byDateRange];

/**
 * Apply every criterion in turn, then truncate to the limit.
 * Returns a new array; input issues are left untouched.
 */
export function filterIssues(
  issues: Issue[] | null | undefined,
  criteria: FilterCriteria | null | undefined
): Issue[] {
  if (issues === null || issues === undefined) {
    throw validationError('issues', issues, 'issues list cannot be absent');
  }
  if (criteria === null || criteria === undefined) {
    throw validationError('criteria', criteria, 'filter criteria cannot be absent');
  }

  let filtered = [...issues];
  for (const stage of PIPELINE) {
    filtered = stage(filtered, criteria);
  }

  if (criteria.limit !== undefined) {
    filtered = filtered.slice(0, criteria.limit);
  }

  return filtered;
}

/**
 * Human-readable summary of the active filters
 */
export function describeFilters(criteria: FilterCriteria): string {
  const parts: string[] = [];

  if (criteria.minComments !== undefined) parts.push(`min_comments=${criteria.minComments}`);
  if (criteria.maxComments !== undefined) parts.push(`max_comments=${criteria.maxComments}`);
  if (criteria.state !== undefined) parts.push(`state=${criteria.state}`);
  if (criteria.labels.length > 0) {
    parts.push(`labels=[${criteria.labels.join(criteria.anyLabels ? ' OR ' : ' AND ')}]`);
  }
  if (criteria.assignees.length > 0) {
    parts.push(`assignees=[${criteria.assignees.join(criteria.anyAssignees ? ' OR ' : ' AND ')}]`);
  }
  if (criteria.createdSince) parts.push(`created_since=${formatDate(criteria.createdSince)}`);
  if (criteria.createdUntil) parts.push(`created_until=${formatDate(criteria.createdUntil)}`);
  if (criteria.updatedSince) parts.push(`updated_since=${formatDate(criteria.updatedSince)}`);
  if (criteria.updatedUntil) parts.push(`updated_until=${formatDate(criteria.updatedUntil)}`);
  if (criteria.limit !== undefined) parts.push(`limit=${criteria.limit}`);

  return parts.length > 0 ? `Filters: ${parts.join(', ')}` : 'No filters applied';
}

/**
 * True when the limit is the only thing narrowing the list after fetching
 * (state is applied by the API as well)
 */
export function limitIsOnlyNarrowing(criteria: FilterCriteria): boolean {
  return (
    criteria.minComments === undefined &&
    criteria.maxComments === undefined &&
    criteria.labels.length === 0 &&
    criteria.assignees.length === 0 &&
    !criteria.createdSince &&
    !criteria.createdUntil &&
    !criteria.updatedSince &&
    !criteria.updatedUntil
  );
}
