import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { AnalyzerSettingsInput } from './analyzer.ts';
import { validationError } from './errors.ts';

export const DEFAULT_CONFIG_PATH = './analyzer.config.json';

export const configSchema = z.object({
  githubToken: z.string().min(1).optional(),
  activeUserLimit: z.number().int().positive().optional(),
  topLabelLimit: z.number().int().positive().optional(),
  trending: z.object({
    windowDays: z.number().int().positive().optional(),
    growthThreshold: z.number().nonnegative().optional(),
    minOccurrences: z.number().int().positive().optional(),
  }).strict().optional(),
  rateLimit: z.object({
    maxWaitSeconds: z.number().int().nonnegative().optional(),
    maxRetries: z.number().int().nonnegative().optional(),
  }).strict().optional(),
}).strict();

export type Config = z.infer<typeof configSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load and validate the config file. A missing file is only an error when the
 * path was given explicitly.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error) && configPath === undefined) return {};
    if (isMissingFile(error)) {
      throw validationError('config', path, `configuration file not found at ${path}`);
    }
    throw error;
  }

  return parseConfig(text, path);
}

export function parseConfig(text: string, source = 'config'): Config {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw validationError('config', source, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const result = configSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw validationError('config', source, issues);
  }
  return result.data;
}

/**
 * Token precedence: --token, then GH_TOKEN, then GITHUB_TOKEN, then the config file
 */
export function resolveToken(
  cliToken: string | undefined,
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return cliToken || env.GH_TOKEN || env.GITHUB_TOKEN || config.githubToken || undefined;
}

export function settingsFromConfig(config: Config, trendingDays?: number): AnalyzerSettingsInput {
  return {
    activeUserLimit: config.activeUserLimit,
    topLabelLimit: config.topLabelLimit,
    trending: {
      ...config.trending,
      windowDays: trendingDays ?? config.trending?.windowDays,
    },
  };
}
