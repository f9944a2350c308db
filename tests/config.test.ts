import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, parseConfig, resolveToken, settingsFromConfig } from '../config.ts';
import { isAnalyzerError } from '../errors.ts';

describe('parseConfig', () => {
  it('accepts a full configuration', () => {
    expect(parseConfig('{"githubToken":"test-secret","topLabelLimit":3,"trending":{"windowDays":14}}')).toEqual({
      githubToken: 'test-secret',
      topLabelLimit: 3,
      trending: { windowDays: 14 },
    });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseConfig('{ nope', 'custom.json')).toThrow('Invalid config: not valid JSON');
  });

  it('reports schema violations with their path', () => {
    expect(() => parseConfig('{"topLabelLimit":0}')).toThrow('Invalid config: topLabelLimit: ');
    expect(() => parseConfig('{"trending":{"growthThreshold":-1}}')).toThrow('trending.growthThreshold: ');
  });

  it('rejects unknown keys', () => {
    let caught: unknown;
    try {
      parseConfig('{"labelLimit":3}');
    } catch (error) {
      caught = error;
    }
    expect(isAnalyzerError(caught, 'validation')).toBe(true);
    expect(caught instanceof Error && caught.message).toMatch(/^Invalid config: \(root\): /);
  });
});

describe('loadConfig', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'issue-analyzer-config-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('reads a file', async () => {
    const path = join(directory, 'analyzer.config.json');
    await writeFile(path, '{"activeUserLimit":8,"rateLimit":{"maxWaitSeconds":60}}');

    expect(await loadConfig(path)).toEqual({ activeUserLimit: 8, rateLimit: { maxWaitSeconds: 60 } });
  });

  it('fails for an explicit path that does not exist', async () => {
    const path = join(directory, 'missing.json');
    await expect(loadConfig(path)).rejects.toThrow(`Invalid config: configuration file not found at ${path}`);
  });

  it('accepts the bundled example', async () => {
    const config = await loadConfig('analyzer.config.example.json');
    expect(config.trending?.windowDays).toBe(30);
    expect(config.rateLimit?.maxRetries).toBe(1);
  });
});

describe('resolveToken', () => {
  const config = { githubToken: 'from-config' };

  it('prefers the command line, then GH_TOKEN, then GITHUB_TOKEN, then the file', () => {
    expect(resolveToken('from-cli', config, { GH_TOKEN: 'gh', GITHUB_TOKEN: 'github' })).toBe('from-cli');
    expect(resolveToken(undefined, config, { GH_TOKEN: 'gh', GITHUB_TOKEN: 'github' })).toBe('gh');
    expect(resolveToken(undefined, config, { GITHUB_TOKEN: 'github' })).toBe('github');
    expect(resolveToken(undefined, config, {})).toBe('from-config');
  });

  it('ignores empty values', () => {
    expect(resolveToken('', {}, { GH_TOKEN: '' })).toBeUndefined();
  });
});

describe('settingsFromConfig', () => {
  it('lets the command line override the trending window', () => {
    const config = { topLabelLimit: 3, trending: { windowDays: 30, minOccurrences: 2 } };

    expect(settingsFromConfig(config, 7)).toEqual({
      activeUserLimit: undefined,
      topLabelLimit: 3,
      trending: { windowDays: 7, minOccurrences: 2 },
    });
    expect(settingsFromConfig(config).trending?.windowDays).toBe(30);
    expect(settingsFromConfig({}).trending?.windowDays).toBeUndefined();
  });
});
