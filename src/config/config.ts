import { existsSync, readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import type { SchemeName } from '../types.js';
import { isSchemeName } from '../types.js';
import type { LogLevel } from '../observability/logger.js';
import { isLogLevel, logger } from '../observability/logger.js';
import type { ScoringWeights } from '../prioritizer/types.js';
import { DEFAULT_WEIGHTS } from '../prioritizer/types.js';
import { ConfigError } from './errors.js';

export interface CoChangeConfig {
  threshold: number;
  maxCommits: number;
}

export interface ActionsConfig {
  /**
   * Command run on a file before it is marked reviewed. `{file}` is replaced
   * by the path; without it the path is appended.
   */
  onReview?: string;
}

export interface AppConfig {
  baseRef: string;
  defaultScheme: SchemeName;
  weights: ScoringWeights;
  coChange: CoChangeConfig;
  stateDir?: string;
  redisUrl?: string;
  logLevel: LogLevel;
  port: number;
  githubToken?: string;
  anthropicApiKey?: string;
  jira: { base?: string };
  actions: ActionsConfig;
  aliases: Record<string, string>;
}

export const DEFAULT_CONFIG: AppConfig = {
  baseRef: 'origin/main',
  defaultScheme: 'file-type',
  weights: DEFAULT_WEIGHTS,
  coChange: {
    threshold: 2,
    maxCommits: 500,
  },
  logLevel: 'info',
  port: 3000,
  jira: {},
  actions: {},
  aliases: {},
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides `LINEQUEUE_CONFIG` and the default location. */
  configPath?: string;
  /** Load `.env` from the working directory first. */
  loadDotenv?: boolean;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.LINEQUEUE_CONFIG || path.join(os.homedir(), '.config', 'linequeue.json');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonNegativeNumber(key: string, value: unknown): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(key, `expected a non-negative number, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function nonNegativeInteger(key: string, value: unknown): number {
  const parsed = nonNegativeNumber(key, value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(key, `expected an integer, got ${parsed}`);
  }
  return parsed;
}

function text(key: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(key, 'expected a non-empty string');
  }
  return value;
}

/**
 * Read the JSON config file. A missing file yields `{}`; a file that is not
 * valid JSON is reported and ignored so a typo never blocks a review.
 */
function readConfigFile(file: string): Record<string, unknown> {
  if (!existsSync(file)) return {};

  try {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (!isObject(parsed)) {
      logger.warn('config_file_ignored', 'Config file is not a JSON object, using defaults', { file });
      return {};
    }
    return parsed;
  } catch (error) {
    logger.warn('config_file_ignored', 'Config file could not be read, using defaults', {
      file,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return {};
  }
}

function applyFile(config: AppConfig, file: Record<string, unknown>): AppConfig {
  const next: AppConfig = {
    ...config,
    weights: { ...config.weights },
    coChange: { ...config.coChange },
    jira: { ...config.jira },
    actions: { ...config.actions },
    aliases: { ...config.aliases },
  };

  if (file.baseRef !== undefined) next.baseRef = text('baseRef', file.baseRef);

  if (file.defaultScheme !== undefined) {
    if (!isSchemeName(file.defaultScheme)) {
      throw new ConfigError('defaultScheme', `unknown scheme ${JSON.stringify(file.defaultScheme)}`);
    }
    next.defaultScheme = file.defaultScheme;
  }

  if (file.weights !== undefined) {
    if (!isObject(file.weights)) throw new ConfigError('weights', 'expected an object');
    for (const key of ['definition', 'branch', 'line', 'boilerplateFactor'] as const) {
      const value = file.weights[key];
      if (value !== undefined) next.weights[key] = nonNegativeNumber(`weights.${key}`, value);
    }
  }

  if (file.coChange !== undefined) {
    if (!isObject(file.coChange)) throw new ConfigError('coChange', 'expected an object');
    if (file.coChange.threshold !== undefined) {
      next.coChange.threshold = nonNegativeInteger('coChange.threshold', file.coChange.threshold);
    }
    if (file.coChange.maxCommits !== undefined) {
      next.coChange.maxCommits = nonNegativeInteger('coChange.maxCommits', file.coChange.maxCommits);
    }
  }

  if (file.stateDir !== undefined) next.stateDir = text('stateDir', file.stateDir);
  if (file.port !== undefined) next.port = nonNegativeInteger('port', file.port);

  if (file.jira !== undefined) {
    if (!isObject(file.jira)) throw new ConfigError('jira', 'expected an object');
    if (file.jira.base !== undefined) next.jira.base = text('jira.base', file.jira.base);
  }

  if (file.actions !== undefined) {
    if (!isObject(file.actions)) throw new ConfigError('actions', 'expected an object');
    if (file.actions.onReview !== undefined) next.actions.onReview = text('actions.onReview', file.actions.onReview);
  }

  if (file.aliases !== undefined) {
    if (!isObject(file.aliases)) throw new ConfigError('aliases', 'expected an object');
    for (const [name, expansion] of Object.entries(file.aliases)) {
      next.aliases[name] = text(`aliases.${name}`, expansion);
    }
  }

  return next;
}

function applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const next: AppConfig = { ...config, coChange: { ...config.coChange } };

  if (env.LINEQUEUE_STATE_DIR) next.stateDir = env.LINEQUEUE_STATE_DIR;
  if (env.REDIS_URL) next.redisUrl = env.REDIS_URL;
  if (env.GITHUB_TOKEN) next.githubToken = env.GITHUB_TOKEN;
  if (env.ANTHROPIC_API_KEY) next.anthropicApiKey = env.ANTHROPIC_API_KEY;
  if (env.LINEQUEUE_BASE_REF) next.baseRef = env.LINEQUEUE_BASE_REF;
  if (env.PORT) next.port = nonNegativeInteger('PORT', env.PORT);
  if (env.LINEQUEUE_CO_CHANGE_THRESHOLD) {
    next.coChange.threshold = nonNegativeInteger('LINEQUEUE_CO_CHANGE_THRESHOLD', env.LINEQUEUE_CO_CHANGE_THRESHOLD);
  }
  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new ConfigError('LOG_LEVEL', `unknown level ${env.LOG_LEVEL}`);
    }
    next.logLevel = env.LOG_LEVEL;
  }

  return next;
}

/** Defaults, then the JSON config file, then the environment. */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (options.loadDotenv) {
    dotenv.config();
  }
  const env = options.env ?? process.env;
  const file = options.configPath ?? defaultConfigPath(env);

  return applyEnv(applyFile(DEFAULT_CONFIG, readConfigFile(file)), env);
}

/**
 * Split an alias expansion into arguments. Single and double quotes group
 * words; there is no escaping.
 */
export function splitArgs(expansion: string): string[] {
  const args: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(expansion)) !== null) {
    args.push(match[1] ?? match[2] ?? match[3]);
  }
  return args;
}

/** Replace a leading alias in `argv` (user arguments only) with its expansion. */
export function expandAliases(argv: readonly string[], aliases: Readonly<Record<string, string>>): string[] {
  const [first, ...rest] = argv;
  if (first === undefined || !Object.prototype.hasOwnProperty.call(aliases, first)) {
    return [...argv];
  }
  return [...splitArgs(aliases[first]), ...rest];
}
