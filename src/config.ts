import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import yaml from 'js-yaml';
import { AppError } from './logger.js';

/** Largest page the paginated playlist endpoint serves. */
export const MAX_PAGE_SIZE = 100;
/** Largest id batch the write endpoint accepts per call. */
export const MAX_WRITE_BATCH_SIZE = 100;
/** Largest number of items a single remote collection may hold. */
export const MAX_COLLECTION_SIZE = 10_000;

export interface ApiConfig {
  baseUrl: string;
  accessToken?: string;
  timeoutMs: number;
}

export interface FetchConfig {
  pageSize: number;
  checkpointEveryPages: number;
}

export interface WriteConfig {
  batchSize: number;
  interBatchDelayMs: number;
  maxCollectionSize: number;
}

export interface RetryConfig {
  maxAttempts: number;
  defaultRetryAfterSeconds: number;
}

export interface LibraryConfig {
  dbPath: string;
  checkpointDir: string;
  api: ApiConfig;
  fetch: FetchConfig;
  write: WriteConfig;
  retry: RetryConfig;
}

export const DEFAULT_CONFIG: LibraryConfig = {
  dbPath: './data/library.db',
  checkpointDir: './data/checkpoints',
  api: {
    baseUrl: 'https://api.spotify.com/v1',
    timeoutMs: 30_000,
  },
  fetch: {
    pageSize: MAX_PAGE_SIZE,
    checkpointEveryPages: 5,
  },
  write: {
    batchSize: MAX_WRITE_BATCH_SIZE,
    interBatchDelayMs: 100,
    maxCollectionSize: MAX_COLLECTION_SIZE,
  },
  retry: {
    maxAttempts: 5,
    defaultRetryAfterSeconds: 5,
  },
};

export interface ConfigOptions {
  /** Explicit YAML file; falls back to LIBRARY_CONFIG, then ./library-merge.yaml when present. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(key: string, detail: string): AppError {
  return new AppError(`Invalid configuration value for ${key}: ${detail}`, 'INVALID_CONFIG', 400, { key });
}

function readString(section: RawSection, key: string, path: string, fallback: string): string {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalid(path, 'expected a non-empty string');
  }
  return value.trim();
}

function readInt(section: RawSection, key: string, path: string, fallback: number): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalid(path, 'expected an integer');
  }
  return value;
}

function readSection(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw invalid(key, 'expected a mapping');
  }
  return value;
}

function parseEnvInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name]?.trim();
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw invalid(name, 'expected an integer');
  }
  return parsed;
}

function requireRange(value: number, path: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  if (value < min || value > max) {
    throw invalid(path, max === Number.MAX_SAFE_INTEGER ? `must be >= ${min}` : `must be between ${min} and ${max}`);
  }
  return value;
}

function loadYamlFile(path: string): RawSection {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new AppError(
      `Failed to read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_CONFIG',
      400,
    );
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new AppError(`Config file ${path} must contain a mapping`, 'INVALID_CONFIG', 400);
  }
  return parsed;
}

function resolveConfigPath(options: ConfigOptions, env: NodeJS.ProcessEnv): string | undefined {
  const explicit = options.configPath ?? env.LIBRARY_CONFIG?.trim();
  if (explicit) {
    const path = resolve(explicit);
    if (!existsSync(path)) {
      throw new AppError(`Config file not found: ${path}`, 'INVALID_CONFIG', 400);
    }
    return path;
  }
  const conventional = resolve('library-merge.yaml');
  return existsSync(conventional) ? conventional : undefined;
}

function buildConfig(raw: RawSection, env: NodeJS.ProcessEnv): LibraryConfig {
  const api = readSection(raw, 'api');
  const fetchSection = readSection(raw, 'fetch');
  const write = readSection(raw, 'write');
  const retry = readSection(raw, 'retry');
  const defaults = DEFAULT_CONFIG;

  const accessToken = env.SPOTIFY_ACCESS_TOKEN?.trim() || readString(api, 'accessToken', 'api.accessToken', '') || undefined;

  const config: LibraryConfig = {
    dbPath: env.LIBRARY_DB_PATH?.trim() || readString(raw, 'dbPath', 'dbPath', defaults.dbPath),
    checkpointDir:
      env.LIBRARY_CHECKPOINT_DIR?.trim() || readString(raw, 'checkpointDir', 'checkpointDir', defaults.checkpointDir),
    api: {
      baseUrl: (env.SPOTIFY_API_BASE_URL?.trim() || readString(api, 'baseUrl', 'api.baseUrl', defaults.api.baseUrl))
        .replace(/\/+$/, ''),
      accessToken,
      timeoutMs: requireRange(readInt(api, 'timeoutMs', 'api.timeoutMs', defaults.api.timeoutMs), 'api.timeoutMs', 1),
    },
    fetch: {
      pageSize: requireRange(
        readInt(fetchSection, 'pageSize', 'fetch.pageSize', defaults.fetch.pageSize),
        'fetch.pageSize',
        1,
        MAX_PAGE_SIZE,
      ),
      checkpointEveryPages: requireRange(
        readInt(fetchSection, 'checkpointEveryPages', 'fetch.checkpointEveryPages', defaults.fetch.checkpointEveryPages),
        'fetch.checkpointEveryPages',
        1,
      ),
    },
    write: {
      batchSize: requireRange(
        readInt(write, 'batchSize', 'write.batchSize', defaults.write.batchSize),
        'write.batchSize',
        1,
        MAX_WRITE_BATCH_SIZE,
      ),
      interBatchDelayMs: requireRange(
        readInt(write, 'interBatchDelayMs', 'write.interBatchDelayMs', defaults.write.interBatchDelayMs),
        'write.interBatchDelayMs',
        0,
      ),
      maxCollectionSize: requireRange(
        readInt(write, 'maxCollectionSize', 'write.maxCollectionSize', defaults.write.maxCollectionSize),
        'write.maxCollectionSize',
        1,
        MAX_COLLECTION_SIZE,
      ),
    },
    retry: {
      maxAttempts: requireRange(
        parseEnvInt(env, 'LIBRARY_RETRY_MAX_ATTEMPTS') ??
          readInt(retry, 'maxAttempts', 'retry.maxAttempts', defaults.retry.maxAttempts),
        'retry.maxAttempts',
        1,
      ),
      defaultRetryAfterSeconds: requireRange(
        readInt(retry, 'defaultRetryAfterSeconds', 'retry.defaultRetryAfterSeconds', defaults.retry.defaultRetryAfterSeconds),
        'retry.defaultRetryAfterSeconds',
        0,
      ),
    },
  };

  return config;
}

export class ConfigManager {
  private readonly config: LibraryConfig;
  readonly sourcePath?: string;

  constructor(options: ConfigOptions = {}) {
    const env = options.env ?? process.env;
    this.sourcePath = resolveConfigPath(options, env);
    const raw = this.sourcePath ? loadYamlFile(this.sourcePath) : {};
    this.config = buildConfig(raw, env);
  }

  getAll(): LibraryConfig {
    return this.config;
  }

  get<K extends keyof LibraryConfig>(key: K): LibraryConfig[K] {
    return this.config[key];
  }
}

export function getConfig(options: ConfigOptions = {}): ConfigManager {
  return new ConfigManager(options);
}
