import { config as dotenvConfig } from 'dotenv';
import {
  Config,
  ConfigSchema,
  ConfigError,
  LogLevel,
  LogLevelSchema,
  errorMessage,
} from '../types/index.js';

dotenvConfig();

type Env = NodeJS.ProcessEnv;

/**
 * Read a variable, treating empty strings as unset (CI systems pass unset
 * secrets through as "")
 */
function readEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return readEnv(env, key) ?? defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be an integer`, { value });
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvList(env: Env, key: string, defaultValue: string[]): string[] {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Parse a JSON array of strings, e.g. RSS_FEEDS='["https://a/feed.xml"]'
 */
function getEnvJsonArray(env: Env, key: string): string[] {
  const value = readEnv(env, key);
  if (value === undefined) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new ConfigError(`Invalid ${key} format: ${errorMessage(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigError(`${key} must be a JSON array`);
  }
  const items = parsed.filter((item): item is string => typeof item === 'string');
  if (items.length !== parsed.length) {
    throw new ConfigError(`${key} must be a JSON array of strings`);
  }
  return items;
}

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    github: {
      apiUrl: getEnvString(env, 'GITHUB_API_URL', 'https://api.github.com'),
      token: readEnv(env, 'GITHUB_TOKEN'),
      personalToken: readEnv(env, 'PERSONAL_ACCESS_TOKEN'),
      issueRepository: readEnv(env, 'GITHUB_REPOSITORY'),
      assignee: readEnv(env, 'ISSUE_ASSIGNEE'),
      assignDelayMs: getEnvNumber(env, 'ISSUE_ASSIGN_DELAY_MS', 120000),
      issueLabels: getEnvList(env, 'ISSUE_LABELS', ['content-monitor', 'automated']),
    },
    monitor: {
      repository: readEnv(env, 'MONITORED_REPO'),
      directory: readEnv(env, 'MONITORED_DIRECTORY'),
      ref: getEnvString(env, 'MONITORED_REF', 'main'),
    },
    feeds: getEnvJsonArray(env, 'RSS_FEEDS'),
    content: {
      rootDir: getEnvString(env, 'LOCAL_CONTENT_DIR', 'monitored-content'),
    },
    cleanup: {
      ageDays: getEnvNumber(env, 'CLEANUP_AGE_DAYS', 90),
      dryRun: getEnvBoolean(env, 'DRY_RUN', true),
    },
    http: {
      timeoutMs: getEnvNumber(env, 'HTTP_TIMEOUT_MS', 30000),
      retries: getEnvNumber(env, 'HTTP_RETRIES', 3),
      retryDelayMs: getEnvNumber(env, 'HTTP_RETRY_DELAY_MS', 1000),
    },
    actionsOutputFile: readEnv(env, 'GITHUB_OUTPUT'),
    logLevel: getEnvString(env, 'LOG_LEVEL', 'info'),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }
  return result.data;
}

export interface LogSettings {
  level: LogLevel;
  pretty: boolean;
}

/**
 * Logger settings are read on their own so that module-level loggers can be
 * created before the full configuration is loaded
 */
export function loadLogSettings(env: Env = process.env): LogSettings {
  const level = LogLevelSchema.safeParse(getEnvString(env, 'LOG_LEVEL', 'info'));
  return {
    level: level.success ? level.data : 'info',
    pretty: getEnvBoolean(env, 'LOG_PRETTY', true),
  };
}

// ============================================================
// Per-command requirements
// ============================================================

export interface RepositoryMonitorConfig {
  token: string;
  repository: string;
  directory: string;
  ref: string;
  apiUrl: string;
  contentRoot: string;
  http: Config['http'];
}

export interface FeedMonitorConfig {
  feeds: string[];
  contentRoot: string;
  http: Config['http'];
}

export interface IssueConfig {
  token: string;
  repository: string;
  apiUrl: string;
  labels: string[];
  assignee?: string;
  personalToken?: string;
  assignDelayMs: number;
  http: Config['http'];
}

function missing(names: Array<[string, unknown]>): string[] {
  return names.filter(([, value]) => value === undefined).map(([name]) => name);
}

export function requireRepositoryMonitorConfig(config: Config): RepositoryMonitorConfig {
  const { token } = config.github;
  const { repository, directory } = config.monitor;
  if (token === undefined || repository === undefined || directory === undefined) {
    const names = missing([
      ['GITHUB_TOKEN', token],
      ['MONITORED_REPO', repository],
      ['MONITORED_DIRECTORY', directory],
    ]);
    throw new ConfigError(`Missing required environment variables: ${names.join(', ')}`, names);
  }

  return {
    token,
    repository,
    directory,
    ref: config.monitor.ref,
    apiUrl: config.github.apiUrl,
    contentRoot: config.content.rootDir,
    http: config.http,
  };
}

export function requireFeedMonitorConfig(config: Config): FeedMonitorConfig {
  if (config.feeds.length === 0) {
    throw new ConfigError('Missing required environment variables: RSS_FEEDS', ['RSS_FEEDS']);
  }

  return {
    feeds: config.feeds,
    contentRoot: config.content.rootDir,
    http: config.http,
  };
}

export function requireIssueConfig(config: Config): IssueConfig {
  const { token, issueRepository } = config.github;
  if (token === undefined || issueRepository === undefined) {
    const names = missing([
      ['GITHUB_TOKEN', token],
      ['GITHUB_REPOSITORY', issueRepository],
    ]);
    throw new ConfigError(`Missing required environment variables: ${names.join(', ')}`, names);
  }

  return {
    token,
    repository: issueRepository,
    apiUrl: config.github.apiUrl,
    labels: config.github.issueLabels,
    assignee: config.github.assignee,
    personalToken: config.github.personalToken,
    assignDelayMs: config.github.assignDelayMs,
    http: config.http,
  };
}
