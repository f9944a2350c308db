import { describe, it, expect } from 'vitest';
import {
  calculateAverageComments,
  calculateAverageResolutionTime,
  calculateCommentDistribution,
  calculateMetrics,
  calculateMostActiveUsers,
  calculateTimeBreakdown,
  calculateTopLabels,
  calculateTrendingLabels,
  splitByPeriod,
} from '../metrics.ts';
import type { Issue } from '../types.ts';
import { makeComment, makeIssue } from './fixtures.ts';

function labeled(label: string, count: number, start = 0): Issue[] {
  return Array.from({ length: count }, (_, i) => makeIssue({ number: start + i + 1, labels: [label] }));
}

describe('calculateMetrics', () => {
  it('handles an empty issue list', () => {
    const metrics = calculateMetrics([], 0);
    expect(metrics.averageCommentCount).toBe(0);
    expect(metrics.topLabels).toEqual([]);
    expect(metrics.totalIssuesAnalyzed).toBe(0);
    expect(metrics.issuesMatchingFilters).toBe(0);
    expect(metrics.commentDistribution).toEqual({ '0-5': 0, '6-10': 0, '11+': 0 });
    expect(metrics.activityByDay).toEqual({});
    expect(metrics.mostActiveUsers).toEqual([]);
    expect(metrics.averageResolutionDays).toBeNull();
    expect(metrics.trendingLabels).toEqual([]);
  });

  it('computes average and distribution', () => {
    const issues = [2, 5, 8, 1, 12].map((comments, i) => makeIssue({ number: i + 1, comments }));
    const metrics = calculateMetrics(issues, 20);
    expect(metrics.averageCommentCount).toBeCloseTo(5.6, 10);
    expect(metrics.commentDistribution).toEqual({ '0-5': 3, '6-10': 1, '11+': 1 });
    expect(metrics.totalIssuesAnalyzed).toBe(20);
    expect(metrics.issuesMatchingFilters).toBe(5);
  });

  it('fills all three time breakdowns', () => {
    const issues = [
      makeIssue({ number: 1, createdAt: '2024-01-01T08:00:00Z' }),
      makeIssue({ number: 2, createdAt: '2024-01-03T08:00:00Z' }),
      makeIssue({ number: 3, createdAt: '2024-02-20T08:00:00Z' }),
    ];
    const metrics = calculateMetrics(issues, 3);
    expect(metrics.activityByDay).toEqual({ '2024-01-01': 1, '2024-01-03': 1, '2024-02-20': 1 });
    expect(metrics.activityByWeek).toEqual({ '2024-W01': 2, '2024-W08': 1 });
    expect(metrics.activityByMonth).toEqual({ '2024-01': 2, '2024-02': 1 });
  });

  it('computes trending labels when given a window', () => {
    const reference = new Date('2024-06-30T00:00:00Z');
    const current = Array.from({ length: 6 }, (_, i) =>
      makeIssue({ number: i + 1, labels: ['perf'], createdAt: '2024-06-20T00:00:00Z' }));
    const previous = Array.from({ length: 2 }, (_, i) =>
      makeIssue({ number: i + 10, labels: ['perf'], createdAt: '2024-05-20T00:00:00Z' }));

    const metrics = calculateMetrics([...current, ...previous], 8, {
      trending: { windowDays: 30, referenceDate: reference },
    });
    expect(metrics.trendingLabels).toEqual([{ name: 'perf', count: 6 }]);
  });

  it('honors active user and top label limits', () => {
    const issues = ['a', 'b', 'c'].map((author, i) => makeIssue({ number: i + 1, author, labels: [`l${i}`] }));
    const metrics = calculateMetrics(issues, 3, { activeUserLimit: 2, topLabelLimit: 1 });
    expect(metrics.mostActiveUsers.map(user => user.username)).toEqual(['a', 'b']);
    expect(metrics.topLabels).toEqual([{ name: 'l0', count: 1 }]);
  });
});

describe('calculateAverageComments', () => {
  it('returns 0 for no issues', () => {
    expect(calculateAverageComments([])).toBe(0);
  });
});

describe('calculateCommentDistribution', () => {
  it('puts bucket edges in the right bucket', () => {
    const issues = [0, 5, 6, 10, 11].map((comments, i) => makeIssue({ number: i + 1, comments }));
    expect(calculateCommentDistribution(issues)).toEqual({ '0-5': 2, '6-10': 2, '11+': 1 });
  });
});

describe('calculateTopLabels', () => {
  it('sorts by count and keeps first-seen order on ties', () => {
    const issues = [
      makeIssue({ number: 1, labels: ['docs', 'bug'] }),
      makeIssue({ number: 2, labels: ['ui'] }),
      makeIssue({ number: 3, labels: ['bug', 'ui'] }),
      makeIssue({ number: 4, labels: ['docs'] }),
      makeIssue({ number: 5, labels: ['api'] }),
    ];
    expect(calculateTopLabels(issues)).toEqual([
      { name: 'docs', count: 2 },
      { name: 'bug', count: 2 },
      { name: 'ui', count: 2 },
      { name: 'api', count: 1 },
    ]);
  });

  it('keeps at most ten labels by default', () => {
    const issues = Array.from({ length: 12 }, (_, i) => makeIssue({ number: i + 1, labels: [`label-${i}`] }));
    expect(calculateTopLabels(issues)).toHaveLength(10);
    expect(calculateTopLabels(issues, 3).map(label => label.name)).toEqual(['label-0', 'label-1', 'label-2']);
  });
});

describe('calculateTimeBreakdown', () => {
  const issues = [
    makeIssue({ number: 1, createdAt: '2021-01-01T12:00:00Z' }),
    makeIssue({ number: 2, createdAt: '2020-12-28T12:00:00Z' }),
    makeIssue({ number: 3, createdAt: '2021-01-04T12:00:00Z' }),
    makeIssue({ number: 4, createdAt: '2020-12-15T12:00:00Z' }),
  ];

  it('groups by ISO week, using the week-numbering year', () => {
    expect(calculateTimeBreakdown(issues, 'weekly')).toEqual({
      '2020-W51': 1,
      '2020-W53': 2,
      '2021-W01': 1,
    });
  });

  it('groups by day and month with ascending keys', () => {
    const daily = calculateTimeBreakdown(issues, 'daily');
    expect(Object.keys(daily)).toEqual(['2020-12-15', '2020-12-28', '2021-01-01', '2021-01-04']);
    expect(calculateTimeBreakdown(issues, 'monthly')).toEqual({ '2020-12': 2, '2021-01': 2 });
  });

  it('falls back to monthly for unknown granularity', () => {
    expect(calculateTimeBreakdown(issues, 'hourly')).toEqual({ '2020-12': 2, '2021-01': 2 });
  });
});

describe('calculateMostActiveUsers', () => {
  it('ranks by comments, then issues created', () => {
    const issues = [
      makeIssue({
        number: 1,
        author: 'ana',
        commentList: [makeComment('ben'), makeComment('cai'), makeComment('ben')],
      }),
      makeIssue({ number: 2, author: 'cai', commentList: [makeComment('ana'), makeComment('ana')] }),
      makeIssue({ number: 3, author: 'cai' }),
      makeIssue({ number: 4, author: 'dee' }),
    ];

    expect(calculateMostActiveUsers(issues)).toEqual([
      { username: 'ana', issuesCreated: 1, commentsMade: 2, role: 'none' },
      { username: 'ben', issuesCreated: 0, commentsMade: 2, role: 'none' },
      { username: 'cai', issuesCreated: 2, commentsMade: 1, role: 'none' },
      { username: 'dee', issuesCreated: 1, commentsMade: 0, role: 'none' },
    ]);
  });

  it('breaks comment ties by issues created', () => {
    const issues = [
      makeIssue({ number: 1, author: 'low', commentList: [makeComment('low'), makeComment('high')] }),
      makeIssue({ number: 2, author: 'high' }),
      makeIssue({ number: 3, author: 'high' }),
    ];
    expect(calculateMostActiveUsers(issues).map(user => user.username)).toEqual(['high', 'low']);
  });

  it('skips comments from deleted accounts', () => {
    const issues = [makeIssue({ number: 1, author: 'ana', commentList: [makeComment(null), makeComment(null)] })];
    expect(calculateMostActiveUsers(issues)).toEqual([
      { username: 'ana', issuesCreated: 1, commentsMade: 0, role: 'none' },
    ]);
  });

  it('keeps the strongest role seen for each user', () => {
    const issues = [
      makeIssue({ number: 1, author: 'ana', authorRole: 'contributor', commentList: [makeComment('ana', { role: 'member' })] }),
      makeIssue({ number: 2, author: 'ana', authorRole: 'none' }),
    ];
    expect(calculateMostActiveUsers(issues)).toEqual([
      { username: 'ana', issuesCreated: 2, commentsMade: 1, role: 'member' },
    ]);
  });

  it('limits to five users by default', () => {
    const issues = Array.from({ length: 8 }, (_, i) => makeIssue({ number: i + 1, author: `user-${i}` }));
    expect(calculateMostActiveUsers(issues)).toHaveLength(5);
    expect(calculateMostActiveUsers(issues, 2)).toHaveLength(2);
  });
});

describe('calculateAverageResolutionTime', () => {
  it('averages days over closed issues only', () => {
    const issues = [
      makeIssue({ number: 1, state: 'closed', createdAt: '2024-01-01T00:00:00Z', closedAt: '2024-01-03T00:00:00Z' }),
      makeIssue({ number: 2, state: 'closed', createdAt: '2024-01-01T00:00:00Z', closedAt: '2024-01-02T12:00:00Z' }),
      makeIssue({ number: 3, state: 'open', createdAt: '2024-01-01T00:00:00Z' }),
      makeIssue({ number: 4, state: 'closed', createdAt: '2024-01-01T00:00:00Z', closedAt: null }),
    ];
    expect(calculateAverageResolutionTime(issues)).toBe(1.75);
  });

  it('is null without closed issues', () => {
    expect(calculateAverageResolutionTime([makeIssue({ number: 1 })])).toBeNull();
  });
});

describe('calculateTrendingLabels', () => {
  it('returns a label that grew past the threshold', () => {
    const current = labeled('bug', 3);
    const previous = labeled('bug', 2, 100);
    expect(calculateTrendingLabels(current, previous, { minOccurrences: 3 })).toEqual([{ name: 'bug', count: 3 }]);
  });

  it('applies the default floor of five occurrences', () => {
    expect(calculateTrendingLabels(labeled('bug', 4), [])).toEqual([]);
    expect(calculateTrendingLabels(labeled('bug', 5), [])).toEqual([{ name: 'bug', count: 5 }]);
  });

  it('uses the growth threshold inclusively', () => {
    // (5 - 4) / 4 = 0.25
    expect(calculateTrendingLabels(labeled('bug', 5), labeled('bug', 4, 100))).toEqual([{ name: 'bug', count: 5 }]);
    // (6 - 5) / 5 = 0.2
    expect(calculateTrendingLabels(labeled('bug', 6), labeled('bug', 5, 100))).toEqual([]);
    expect(calculateTrendingLabels(labeled('bug', 6), labeled('bug', 5, 100), { growthThreshold: 0.2 }))
      .toEqual([{ name: 'bug', count: 6 }]);
  });

  it('never reports labels only seen in the previous period', () => {
    expect(calculateTrendingLabels([], labeled('old', 10), { minOccurrences: 1 })).toEqual([]);
  });

  it('sorts by current count', () => {
    const current = [...labeled('small', 5), ...labeled('large', 8, 50)];
    expect(calculateTrendingLabels(current, []).map(label => label.name)).toEqual(['large', 'small']);
  });
});

describe('splitByPeriod', () => {
  it('splits into two back-to-back windows', () => {
    const issues = [
      makeIssue({ number: 1, createdAt: '2024-06-29T00:00:00Z' }),
      makeIssue({ number: 2, createdAt: '2024-06-24T00:00:00Z' }),
      makeIssue({ number: 3, createdAt: '2024-06-20T00:00:00Z' }),
      makeIssue({ number: 4, createdAt: '2024-06-10T00:00:00Z' }),
    ];
    const { current, previous } = splitByPeriod(issues, 7, new Date('2024-06-30T00:00:00Z'));
    expect(current.map(issue => issue.number)).toEqual([1, 2]);
    expect(previous.map(issue => issue.number)).toEqual([3]);
  });
});
