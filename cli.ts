import pc from 'picocolors';
import { parseArgs, type CliOptions } from './utils.ts';
import { loadConfig, resolveToken, settingsFromConfig } from './config.ts';
import { parseFilterCriteria, parseRepositoryUrl } from './criteria.ts';
import { GitHubIssueSource, type GitHubSourceOptions, type IssueSource } from './github.ts';
import { IssueAnalyzer } from './analyzer.ts';
import { formatResult, generateFilename, saveOutput } from './output.ts';
import { ConsoleReporter, type ProgressReporter, type ReporterStream } from './progress.ts';
import { describeError, errorMessage, exitCodeFor, isAnalyzerError } from './errors.ts';
import type { FilterCriteria, RateLimitInfo } from './types.ts';

export const HELP = `
Issue Activity Analyzer

Usage:
  issue-analyzer <repository-url> [options]

Filters:
  --min-comments N           Minimum comment count (inclusive)
  --max-comments N           Maximum comment count (inclusive)
  --state STATE              open, closed or all (default: all)
  --label NAME               Filter by label (repeatable)
  --any-labels | --all-labels
                             Match any (default) or all of the labels
  --assignee NAME            Filter by assignee username (repeatable)
  --any-assignees | --all-assignees
                             Match any (default) or all of the assignees
  --created-since YYYY-MM-DD
  --created-until YYYY-MM-DD
  --updated-since YYYY-MM-DD
  --updated-until YYYY-MM-DD
  --limit N                  Maximum number of issues to return (default: 100)

Output:
  --format FORMAT            table, json or csv (default: table)
  --granularity G            auto, daily, weekly or monthly (table only)
  --output, -o PATH          Write output to PATH (json and csv default to a generated file name)
  --include-comments         Fetch comments for each matching issue (one API call per issue)
  --trending-days N          Report labels trending over the last N days vs the N days before

Other:
  --config PATH              Config file (default: ./analyzer.config.json)
  --token TOKEN              GitHub token (default: GH_TOKEN or GITHUB_TOKEN)
  --verbose, -v              Show debug output
  --help, -h                 Show this help message

Examples:
  issue-analyzer https://github.com/nodejs/node --min-comments 10 --state open
  issue-analyzer https://github.com/nodejs/node --label bug --label confirmed --all-labels
  issue-analyzer https://github.com/nodejs/node --format json --include-comments --limit 20
`;

/** What the CLI needs from a source beyond the analysis itself */
export interface CliSource extends IssueSource {
  checkRateLimit(): Promise<RateLimitInfo | null>;
}

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  stdout?: ReporterStream;
  stderr?: ReporterStream;
  reporter?: ProgressReporter;
  createSource?: (options: GitHubSourceOptions) => CliSource;
}

/**
 * Check the criteria options, reporting every violation. The first one is
 * thrown and the rest become warnings.
 */
function criteriaFromOptions(options: CliOptions, reporter: ProgressReporter): FilterCriteria {
  const result = parseFilterCriteria({
    minComments: options.minComments,
    maxComments: options.maxComments,
    state: options.state,
    labels: options.labels,
    anyLabels: options.anyLabels,
    assignees: options.assignees,
    anyAssignees: options.anyAssignees,
    createdSince: options.createdSince,
    createdUntil: options.createdUntil,
    updatedSince: options.updatedSince,
    updatedUntil: options.updatedUntil,
    limit: options.limit,
    includeComments: options.includeComments,
  });
  if (!result.success) {
    const [first, ...rest] = result.errors;
    for (const error of rest) {
      reporter.warn(error.message);
    }
    throw first;
  }
  return result.criteria;
}

async function writeResult(
  content: string,
  options: CliOptions,
  repository: { owner: string; name: string },
  stdout: ReporterStream
): Promise<string | null> {
  if (options.output) {
    return saveOutput(content, options.output);
  }
  if (options.format !== 'table') {
    return saveOutput(content, await generateFilename(repository, options.format));
  }
  stdout.write(content + '\n');
  return null;
}

/**
 * Run the analyzer for one command line and return the exit code.
 * Nothing reaches the network until the arguments have been validated.
 */
export async function run(args: string[], context: CliContext = {}): Promise<number> {
  const env = context.env ?? process.env;
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;

  if (args.includes('--help') || args.includes('-h')) {
    stdout.write(HELP + '\n');
    return 0;
  }

  let verbose = args.includes('--verbose') || args.includes('-v');
  try {
    const options = parseArgs(args);
    verbose = options.verbose || env.LOG_LEVEL?.toLowerCase() === 'debug';

    const reporter = context.reporter ?? new ConsoleReporter({ verbose, stream: stderr });
    reporter.info(pc.bold('🚀 Issue Activity Analyzer'));

    const repository = parseRepositoryUrl(options.repositoryUrl);
    const criteria = criteriaFromOptions(options, reporter);

    // Load configuration
    const config = await loadConfig(options.configPath);
    const token = resolveToken(options.token, config, env);
    if (!token) {
      reporter.warn('No GitHub token found. Unauthenticated requests are limited to 60 per hour; set GH_TOKEN for more.');
    }

    const sourceOptions: GitHubSourceOptions = {
      token,
      reporter,
      maxWaitSeconds: config.rateLimit?.maxWaitSeconds,
      maxRetries: config.rateLimit?.maxRetries,
    };
    const source = context.createSource
      ? context.createSource(sourceOptions)
      : new GitHubIssueSource(sourceOptions);

    // Check rate limit before starting
    await source.checkRateLimit();

    const analyzer = new IssueAnalyzer({
      source,
      reporter,
      settings: settingsFromConfig(config, options.trendingDays),
    });
    const result = await analyzer.analyze({ repositoryUrl: options.repositoryUrl, criteria });

    if (result.issues.length === 0) {
      reporter.warn('No issues found matching the specified criteria.');
    }

    const content = formatResult(result, options.format, {
      granularity: options.granularity,
      color: options.output === undefined && stdout.isTTY === true,
    });
    const savedTo = await writeResult(content, options, repository, stdout);
    if (savedTo) {
      reporter.info(`📄 Results written to ${savedTo}`);
    }

    // Check rate limit after completion
    await source.checkRateLimit();
    return 0;
  } catch (error) {
    stderr.write(pc.red(`\n❌ Error: ${errorMessage(error)}`) + '\n');
    for (const line of describeError(error)) {
      stderr.write(`   ${line}\n`);
    }

    if (verbose && error instanceof Error && error.stack && !isAnalyzerError(error, 'validation')) {
      stderr.write(pc.dim(error.stack) + '\n');
    }
    return exitCodeFor(error);
  }
}
