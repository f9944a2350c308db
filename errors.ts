import type { AnalysisPhase } from './analyzer.ts';

export type AnalyzerErrorDetail =
  | { kind: 'validation'; field: string; value: unknown }
  | { kind: 'not_found'; repository: string }
  | { kind: 'access'; repository: string }
  | { kind: 'rate_limit'; remaining: number; resetAt: Date; retryAfterSeconds: number }
  | { kind: 'partial_retrieval'; issueNumber: number }
  | { kind: 'internal'; phase: AnalysisPhase | null };

export type AnalyzerErrorKind = AnalyzerErrorDetail['kind'];

/**
 * The one error type the analyzer raises. Callers dispatch on `detail.kind`.
 */
export class AnalyzerError extends Error {
  readonly detail: AnalyzerErrorDetail;

  constructor(message: string, detail: AnalyzerErrorDetail, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalyzerError';
    this.detail = detail;
  }

  get kind(): AnalyzerErrorKind {
    return this.detail.kind;
  }
}

export function validationError(field: string, value: unknown, reason: string): AnalyzerError {
  return new AnalyzerError(`Invalid ${field}: ${reason}`, { kind: 'validation', field, value });
}

export function notFoundError(repository: string, cause?: unknown): AnalyzerError {
  return new AnalyzerError(
    `Repository ${repository} not found or inaccessible. Check the URL and make sure the repository is public.`,
    { kind: 'not_found', repository },
    { cause }
  );
}

export function accessError(repository: string, cause?: unknown): AnalyzerError {
  return new AnalyzerError(
    `Repository ${repository} is private. Only public repositories can be analyzed.`,
    { kind: 'access', repository },
    { cause }
  );
}

export function rateLimitError(remaining: number, resetAt: Date, now: Date = new Date(), cause?: unknown): AnalyzerError {
  const retryAfterSeconds = Math.max(0, Math.ceil((resetAt.getTime() - now.getTime()) / 1000));
  return new AnalyzerError(
    `GitHub API rate limit exceeded (${remaining} requests remaining, resets at ${resetAt.toISOString()})`,
    { kind: 'rate_limit', remaining, resetAt, retryAfterSeconds },
    { cause }
  );
}

export function partialRetrievalError(issueNumber: number, cause?: unknown): AnalyzerError {
  return new AnalyzerError(
    `Could not retrieve comments for issue #${issueNumber}: ${errorMessage(cause)}`,
    { kind: 'partial_retrieval', issueNumber },
    { cause }
  );
}

export function internalError(phase: AnalysisPhase | null, cause: unknown): AnalyzerError {
  const where = phase ? ` during ${phase}` : '';
  return new AnalyzerError(`Unexpected failure${where}: ${errorMessage(cause)}`, { kind: 'internal', phase }, { cause });
}

export function isAnalyzerError<K extends AnalyzerErrorKind>(
  error: unknown,
  kind?: K
): error is AnalyzerError & { detail: Extract<AnalyzerErrorDetail, { kind: K }> } {
  if (!(error instanceof AnalyzerError)) return false;
  return kind === undefined || error.detail.kind === kind;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Process exit code for a failed run
 */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof AnalyzerError)) return 1;

  switch (error.detail.kind) {
    case 'validation':
      return 2;
    case 'not_found':
    case 'access':
      return 3;
    case 'rate_limit':
      return 4;
    case 'partial_retrieval':
    case 'internal':
      return 1;
  }
}

/**
 * Extra lines printed under the error message, keyed on the error kind
 */
export function describeError(error: unknown): string[] {
  if (!(error instanceof AnalyzerError)) return [];

  const detail = error.detail;
  switch (detail.kind) {
    case 'validation':
      return ['Run with --help to see the accepted options.'];
    case 'not_found':
      return ['Check the spelling of the owner and repository name.'];
    case 'access':
      return ['Private repositories are not supported.'];
    case 'rate_limit': {
      const minutes = Math.ceil(detail.retryAfterSeconds / 60);
      return [
        `Hit API rate limit. Resets in ${minutes} minutes at ${detail.resetAt.toLocaleTimeString()}.`,
        'Set GH_TOKEN for a higher limit, or use --limit to reduce API calls.',
      ];
    }
    case 'internal':
      return detail.phase ? [`Failed while ${detail.phase.replace(/_/g, ' ')}.`] : [];
    case 'partial_retrieval':
      return [];
  }
}
