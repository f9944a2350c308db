import type { Granularity, IssueState, OutputFormat } from './types.ts';
import { validationError } from './errors.ts';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Format a date as YYYY-MM-DD (UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Format a date as YYYY-MM (UTC)
 */
export function formatMonth(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/**
 * ISO-8601 week key, e.g. 2025-W07. The year is the week-numbering year,
 * so 2021-01-01 (a Friday) belongs to 2020-W53.
 */
export function formatIsoWeek(date: Date): string {
  const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const dayOfWeek = d.getUTCDay() || 7; // Sunday is 7
  // Thursday of the same week decides the year
  d.setUTCDate(d.getUTCDate() + 4 - dayOfWeek);
  const weekYear = d.getUTCFullYear();
  const yearStart = Date.UTC(weekYear, 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / MS_PER_DAY + 1) / 7);
  return `${weekYear}-W${week.toString().padStart(2, '0')}`;
}

/**
 * Fractional days between two dates
 */
export function daysBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / MS_PER_DAY;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Number of raw items to read when a limit is set. Pull requests come back
 * from the issues endpoint and are dropped afterwards, so read a little more.
 */
export function calculateFetchBuffer(limit: number): number {
  return Math.floor(Math.max(limit, Math.min(limit * 1.5, limit + 20, 200)));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface CliOptions {
  repositoryUrl: string;
  minComments?: number;
  maxComments?: number;
  state?: IssueState;
  labels: string[];
  anyLabels: boolean;
  assignees: string[];
  anyAssignees: boolean;
  createdSince?: string;
  createdUntil?: string;
  updatedSince?: string;
  updatedUntil?: string;
  limit?: number;
  format: OutputFormat;
  granularity: Granularity | 'auto';
  includeComments: boolean;
  trendingDays?: number;
  output?: string;
  configPath?: string;
  token?: string;
  verbose: boolean;
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'csv'];
const GRANULARITIES: readonly (Granularity | 'auto')[] = ['auto', 'daily', 'weekly', 'monthly'];
const DEFAULT_LIMIT = 100;

const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  '--min-comments',
  '--max-comments',
  '--state',
  '--label',
  '--assignee',
  '--created-since',
  '--created-until',
  '--updated-since',
  '--updated-until',
  '--limit',
  '--format',
  '--granularity',
  '--trending-days',
  '--output',
  '-o',
  '--config',
  '--token',
]);

function parseInteger(option: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw validationError(option, raw, `expected an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseChoice<T extends string>(option: string, raw: string, choices: readonly T[]): T {
  const match = choices.find(choice => choice === raw.toLowerCase());
  if (match === undefined) {
    throw validationError(option, raw, `expected one of ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  const options: Omit<CliOptions, 'repositoryUrl'> & { repositoryUrl?: string } = {
    labels: [],
    anyLabels: true,
    assignees: [],
    anyAssignees: true,
    limit: DEFAULT_LIMIT,
    format: 'table',
    granularity: 'auto',
    includeComments: false,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Flags first, then options that take a value
    switch (arg) {
      case '--any-labels':
        options.anyLabels = true;
        continue;
      case '--all-labels':
        options.anyLabels = false;
        continue;
      case '--any-assignees':
        options.anyAssignees = true;
        continue;
      case '--all-assignees':
        options.anyAssignees = false;
        continue;
      case '--include-comments':
        options.includeComments = true;
        continue;
      case '--verbose':
      case '-v':
        options.verbose = true;
        continue;
    }

    if (!arg.startsWith('-')) {
      if (options.repositoryUrl !== undefined) {
        throw validationError('repository_url', arg, 'only one repository can be analyzed at a time');
      }
      options.repositoryUrl = arg;
      continue;
    }

    if (!VALUE_OPTIONS.has(arg)) {
      throw validationError('option', arg, `unknown option "${arg}"`);
    }
    const value = args[i + 1];
    if (value === undefined) {
      throw validationError(arg, undefined, 'missing value');
    }
    i++;

    switch (arg) {
      case '--min-comments':
        options.minComments = parseInteger('min_comments', value);
        break;
      case '--max-comments':
        options.maxComments = parseInteger('max_comments', value);
        break;
      case '--state': {
        const state = parseChoice('state', value, ['open', 'closed', 'all'] as const);
        options.state = state === 'all' ? undefined : state;
        break;
      }
      case '--label':
        options.labels.push(value);
        break;
      case '--assignee':
        options.assignees.push(value);
        break;
      case '--created-since':
        options.createdSince = value;
        break;
      case '--created-until':
        options.createdUntil = value;
        break;
      case '--updated-since':
        options.updatedSince = value;
        break;
      case '--updated-until':
        options.updatedUntil = value;
        break;
      case '--limit':
        options.limit = parseInteger('limit', value);
        break;
      case '--format':
        options.format = parseChoice('format', value, OUTPUT_FORMATS);
        break;
      case '--granularity':
        options.granularity = parseChoice('granularity', value, GRANULARITIES);
        break;
      case '--trending-days':
        options.trendingDays = parseInteger('trending_days', value);
        if (options.trendingDays < 1) {
          throw validationError('trending_days', value, 'must be a positive integer');
        }
        break;
      case '--output':
      case '-o':
        options.output = value;
        break;
      case '--config':
        options.configPath = value;
        break;
      case '--token':
        options.token = value;
        break;
    }
  }

  if (options.repositoryUrl === undefined) {
    throw validationError('repository_url', undefined, 'a repository URL is required');
  }

  return { ...options, repositoryUrl: options.repositoryUrl };
}
