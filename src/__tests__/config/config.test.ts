import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, defaultConfigPath, expandAliases, loadConfig, splitArgs } from '../../config/config.js';
import { ConfigError } from '../../config/errors.js';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'linequeue-config-'));
    configPath = path.join(dir, 'linequeue.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults without a file or environment', () => {
    expect(loadConfig({ env: {}, configPath })).toEqual(DEFAULT_CONFIG);
  });

  it('layers the file over the defaults', async () => {
    await writeFile(configPath, JSON.stringify({
      baseRef: 'origin/develop',
      defaultScheme: 'scope',
      weights: { branch: 4 },
      coChange: { threshold: 3 },
      jira: { base: 'acme' },
      aliases: { rs: 'review --mode skim' },
    }));

    const config = loadConfig({ env: {}, configPath });
    expect(config.baseRef).toBe('origin/develop');
    expect(config.defaultScheme).toBe('scope');
    expect(config.weights).toEqual({ definition: 5, branch: 4, line: 1, boilerplateFactor: 0.05 });
    expect(config.coChange).toEqual({ threshold: 3, maxCommits: 500 });
    expect(config.jira.base).toBe('acme');
    expect(config.aliases).toEqual({ rs: 'review --mode skim' });
    expect(DEFAULT_CONFIG.weights.branch).toBe(3);
  });

  it('layers the environment over the file', async () => {
    await writeFile(configPath, JSON.stringify({ baseRef: 'origin/develop', port: 4000 }));

    const config = loadConfig({
      env: {
        LINEQUEUE_BASE_REF: 'upstream/main',
        PORT: '8080',
        LOG_LEVEL: 'debug',
        REDIS_URL: 'redis://localhost:6379',
        ANTHROPIC_API_KEY: 'test-secret',
        LINEQUEUE_CO_CHANGE_THRESHOLD: '0',
      },
      configPath,
    });
    expect(config).toMatchObject({
      baseRef: 'upstream/main',
      port: 8080,
      logLevel: 'debug',
      redisUrl: 'redis://localhost:6379',
      anthropicApiKey: 'test-secret',
      coChange: { threshold: 0, maxCommits: 500 },
    });
  });

  it('ignores a file that is not valid JSON', async () => {
    await writeFile(configPath, '{ "baseRef": ');
    expect(loadConfig({ env: {}, configPath }).baseRef).toBe('origin/main');
  });

  it('rejects invalid values', async () => {
    await writeFile(configPath, JSON.stringify({ defaultScheme: 'by-author' }));
    expect(() => loadConfig({ env: {}, configPath })).toThrow(ConfigError);

    await writeFile(configPath, JSON.stringify({ weights: { line: -1 } }));
    expect(() => loadConfig({ env: {}, configPath })).toThrow(
      'Invalid configuration for weights.line: expected a non-negative number, got -1'
    );

    await writeFile(configPath, JSON.stringify({ coChange: { threshold: 1.5 } }));
    expect(() => loadConfig({ env: {}, configPath })).toThrow('expected an integer, got 1.5');
  });

  it('reads the command run before a file is marked reviewed', async () => {
    await writeFile(configPath, JSON.stringify({ actions: { onReview: 'code --wait {file}' } }));
    expect(loadConfig({ env: {}, configPath }).actions).toEqual({ onReview: 'code --wait {file}' });
    expect(DEFAULT_CONFIG.actions).toEqual({});

    await writeFile(configPath, JSON.stringify({ actions: { onReview: '  ' } }));
    expect(() => loadConfig({ env: {}, configPath })).toThrow(
      'Invalid configuration for actions.onReview: expected a non-empty string'
    );

    await writeFile(configPath, JSON.stringify({ actions: 'vim' }));
    expect(() => loadConfig({ env: {}, configPath })).toThrow('Invalid configuration for actions: expected an object');
  });

  it('rejects invalid environment values', () => {
    expect(() => loadConfig({ env: { PORT: 'abc' }, configPath })).toThrow(ConfigError);
    expect(() => loadConfig({ env: { LOG_LEVEL: 'loud' }, configPath })).toThrow('unknown level loud');
  });

  it('finds the config file through LINEQUEUE_CONFIG', () => {
    expect(defaultConfigPath({ LINEQUEUE_CONFIG: '/etc/lq.json' })).toBe('/etc/lq.json');
    expect(defaultConfigPath({})).toBe(path.join(os.homedir(), '.config', 'linequeue.json'));
  });
});

describe('aliases', () => {
  it('splits an expansion on whitespace, honouring quotes', () => {
    expect(splitArgs(`review --mode "file-mode" 'a b'`)).toEqual(['review', '--mode', 'file-mode', 'a b']);
  });

  it('expands a leading alias and keeps the rest', () => {
    const aliases = { rs: 'review --mode skim' };
    expect(expandAliases(['rs', 'src/a.ts'], aliases)).toEqual(['review', '--mode', 'skim', 'src/a.ts']);
    expect(expandAliases(['status', 'rs'], aliases)).toEqual(['status', 'rs']);
    expect(expandAliases(['toString'], aliases)).toEqual(['toString']);
    expect(expandAliases([], aliases)).toEqual([]);
  });
});
