import type { AnalysisResult, AnalyzerSettings, FilterCriteria, Issue, TrendingSettings } from './types.ts';
import type { IssueSource } from './github.ts';
import type { ProgressReporter } from './progress.ts';
import { SilentReporter } from './progress.ts';
import { createFilterCriteria, parseRepositoryUrl, type FilterCriteriaInput } from './criteria.ts';
import { describeFilters, filterIssues, limitIsOnlyNarrowing } from './filter.ts';
import { calculateMetrics, DEFAULT_ACTIVE_USER_LIMIT, DEFAULT_GROWTH_THRESHOLD, DEFAULT_MIN_OCCURRENCES, DEFAULT_TOP_LABEL_LIMIT } from './metrics.ts';
import { AnalyzerError, internalError, partialRetrievalError } from './errors.ts';
import { calculateFetchBuffer } from './utils.ts';

export const ANALYSIS_PHASES = [
  'initializing',
  'validating_repository',
  'fetching_issues',
  'filtering_issues',
  'retrieving_comments',
  'calculating_metrics',
  'generating_output',
  'completed',
] as const;

export type AnalysisPhase = (typeof ANALYSIS_PHASES)[number];

const PHASE_DESCRIPTIONS: Record<AnalysisPhase, string> = {
  initializing: '🔧 Validating input...',
  validating_repository: '🔍 Checking repository...',
  fetching_issues: '📥 Fetching issues from repository...',
  filtering_issues: '🔍 Applying filters...',
  retrieving_comments: '💬 Retrieving comments...',
  calculating_metrics: '📊 Calculating activity metrics...',
  generating_output: '📝 Assembling results...',
  completed: '✅ Analysis complete',
};

// Used for the progress bar when nothing bounds the fetch
const UNLIMITED_FETCH_ESTIMATE = 100;

export const DEFAULT_SETTINGS: AnalyzerSettings = {
  activeUserLimit: DEFAULT_ACTIVE_USER_LIMIT,
  topLabelLimit: DEFAULT_TOP_LABEL_LIMIT,
  trending: {
    growthThreshold: DEFAULT_GROWTH_THRESHOLD,
    minOccurrences: DEFAULT_MIN_OCCURRENCES,
  },
};

/**
 * Expected number of raw items for the fetch progress bar. Display only.
 */
export function estimateFetchTotal(limit: number | undefined): number {
  return limit !== undefined ? calculateFetchBuffer(limit) : UNLIMITED_FETCH_ESTIMATE;
}

export interface AnalysisRequest {
  repositoryUrl: string;
  /** Validated again before use, so a FilterCriteria can be passed straight through */
  criteria: FilterCriteria | FilterCriteriaInput;
}

export type AnalyzerSettingsInput = Partial<Omit<AnalyzerSettings, 'trending'>> & {
  trending?: Partial<TrendingSettings>;
};

export interface IssueAnalyzerOptions {
  source: IssueSource;
  reporter?: ProgressReporter;
  settings?: AnalyzerSettingsInput;
  clock?: () => number;
}

/**
 * Runs one analysis: validate, fetch, filter, optionally load comments,
 * compute metrics. Phases run strictly in order. Use one instance per analysis.
 */
export class IssueAnalyzer {
  private source: IssueSource;
  private reporter: ProgressReporter;
  private settings: AnalyzerSettings;
  private clock: () => number;
  private phase: AnalysisPhase = 'initializing';
  private failed: AnalysisPhase | null = null;

  constructor(options: IssueAnalyzerOptions) {
    this.source = options.source;
    this.reporter = options.reporter ?? new SilentReporter();
    const trending = options.settings?.trending;
    this.settings = {
      activeUserLimit: options.settings?.activeUserLimit ?? DEFAULT_SETTINGS.activeUserLimit,
      topLabelLimit: options.settings?.topLabelLimit ?? DEFAULT_SETTINGS.topLabelLimit,
      trending: {
        windowDays: trending?.windowDays,
        growthThreshold: trending?.growthThreshold ?? DEFAULT_SETTINGS.trending.growthThreshold,
        minOccurrences: trending?.minOccurrences ?? DEFAULT_SETTINGS.trending.minOccurrences,
      },
    };
    this.clock = options.clock ?? Date.now;
  }

  get currentPhase(): AnalysisPhase {
    return this.phase;
  }

  /**
   * Phase the last run failed in, for diagnostics
   */
  get failedPhase(): AnalysisPhase | null {
    return this.failed;
  }

  private enter(next: AnalysisPhase): void {
    if (ANALYSIS_PHASES.indexOf(next) <= ANALYSIS_PHASES.indexOf(this.phase)) {
      throw internalError(this.phase, new Error(`cannot move from ${this.phase} to ${next}`));
    }
    this.phase = next;
    this.reporter.phase(PHASE_DESCRIPTIONS[next]);
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    if (this.phase !== 'initializing' || this.failed !== null) {
      throw internalError(this.phase, new Error('an IssueAnalyzer runs a single analysis'));
    }

    try {
      return await this.run(request);
    } catch (error) {
      this.failed = this.phase;
      if (error instanceof AnalyzerError) throw error;
      throw internalError(this.phase, error);
    }
  }

  private async run(request: AnalysisRequest): Promise<AnalysisResult> {
    const startedAt = this.clock();
    const warnings: string[] = [];

    // initializing: everything here fails before any network access
    this.reporter.phase(PHASE_DESCRIPTIONS.initializing);
    const { owner, name } = parseRepositoryUrl(request.repositoryUrl);
    const criteria = createFilterCriteria(request.criteria);
    this.reporter.debug(describeFilters(criteria));

    this.enter('validating_repository');
    const repository = await this.source.getRepository(owner, name);
    this.reporter.info(`✓ Repository ${repository.fullName}`);

    this.enter('fetching_issues');
    const fetchLimit = limitIsOnlyNarrowing(criteria) ? criteria.limit : undefined;
    this.reporter.start(estimateFetchTotal(criteria.limit), 'Fetching');
    let reported = 0;
    const allIssues = await this.source.getIssues(owner, name, criteria.state ?? 'all', fetchLimit, fetched => {
      this.reporter.advance(fetched - reported);
      reported = fetched;
    });
    this.reporter.finish();

    this.enter('filtering_issues');
    let issues = filterIssues(allIssues, criteria);
    this.reporter.info(`✓ ${issues.length} of ${allIssues.length} issues match`);

    if (criteria.includeComments) {
      this.enter('retrieving_comments');
      issues = await this.attachComments(owner, name, issues, warnings);
    }

    this.enter('calculating_metrics');
    const { windowDays, growthThreshold, minOccurrences } = this.settings.trending;
    const metrics = calculateMetrics(issues, allIssues.length, {
      activeUserLimit: this.settings.activeUserLimit,
      topLabelLimit: this.settings.topLabelLimit,
      trending: windowDays !== undefined
        ? { windowDays, growthThreshold, minOccurrences, referenceDate: new Date(this.clock()) }
        : undefined,
    });

    this.enter('generating_output');
    const finishedAt = this.clock();
    const result: AnalysisResult = Object.freeze({
      issues: Object.freeze(issues),
      repository,
      criteria,
      metrics,
      totalIssuesAvailable: allIssues.length,
      elapsedSeconds: (finishedAt - startedAt) / 1000,
      generatedAt: new Date(finishedAt),
      warnings: Object.freeze(warnings),
    });

    this.enter('completed');
    this.reporter.info(`✅ Analysis completed in ${result.elapsedSeconds.toFixed(2)}s`);
    return result;
  }

  /**
   * Load comments one issue at a time. A failure for one issue leaves its
   * comment list empty and is recorded as a warning on the result.
   */
  private async attachComments(owner: string, name: string, issues: Issue[], warnings: string[]): Promise<Issue[]> {
    const withComments: Issue[] = [];
    this.reporter.start(issues.length, 'Comments');

    const recordFailure = (failure: AnalyzerError): void => {
      warnings.push(failure.message);
      this.reporter.warn(failure.message);
    };

    for (const issue of issues) {
      try {
        const comments = await this.source.getCommentsForIssue(owner, name, issue.number, recordFailure);
        withComments.push({ ...issue, comments });
      } catch (error) {
        recordFailure(partialRetrievalError(issue.number, error));
        withComments.push({ ...issue, comments: [] });
      }
      this.reporter.advance();
    }

    this.reporter.finish();
    return withComments;
  }
}
