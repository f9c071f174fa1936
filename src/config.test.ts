import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { join } from 'path';
import { DEFAULT_CONFIG, getConfig } from './config.js';
import { AppError } from './logger.js';
import { cleanupTestTempDir, createTestTempDir, writeTestFile } from './test-utils/temp-paths.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('getConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestTempDir('config');
  });

  afterEach(() => {
    cleanupTestTempDir(dir);
  });

  it('falls back to defaults without a file or environment', () => {
    const manager = getConfig({ env: {} });

    expect(manager.sourcePath).toBeUndefined();
    expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
    expect(manager.get('write').maxCollectionSize).toBe(10_000);
  });

  it('merges YAML sections over the defaults', () => {
    const file = writeTestFile(
      dir,
      'library-merge.yaml',
      ['dbPath: ./data/test.db', 'fetch:', '  pageSize: 50', 'write:', '  interBatchDelayMs: 0', 'retry:', '  maxAttempts: 3', ''].join('\n')
    );

    const manager = getConfig({ configPath: file, env: {} });
    const config = manager.getAll();

    expect(manager.sourcePath).toBe(file);
    expect(config.dbPath).toBe('./data/test.db');
    expect(config.fetch).toEqual({ pageSize: 50, checkpointEveryPages: 5 });
    expect(config.write).toEqual({ batchSize: 100, interBatchDelayMs: 0, maxCollectionSize: 10_000 });
    expect(config.retry).toEqual({ maxAttempts: 3, defaultRetryAfterSeconds: 5 });
  });

  it('lets environment variables win over the file', () => {
    const file = writeTestFile(dir, 'config.yaml', 'retry:\n  maxAttempts: 3\n');

    const config = getConfig({
      configPath: file,
      env: {
        SPOTIFY_ACCESS_TOKEN: ' test-secret ',
        SPOTIFY_API_BASE_URL: 'http://localhost:9999/v1/',
        LIBRARY_RETRY_MAX_ATTEMPTS: '2',
        LIBRARY_DB_PATH: join(dir, 'library.db'),
        LIBRARY_CHECKPOINT_DIR: join(dir, 'checkpoints'),
      },
    }).getAll();

    expect(config.api.accessToken).toBe('test-secret');
    expect(config.api.baseUrl).toBe('http://localhost:9999/v1');
    expect(config.retry.maxAttempts).toBe(2);
    expect(config.dbPath).toBe(join(dir, 'library.db'));
    expect(config.checkpointDir).toBe(join(dir, 'checkpoints'));
  });

  it('reads the file named by LIBRARY_CONFIG', () => {
    const file = writeTestFile(dir, 'from-env.yaml', 'fetch:\n  checkpointEveryPages: 2\n');

    const config = getConfig({ env: { LIBRARY_CONFIG: file } }).getAll();

    expect(config.fetch.checkpointEveryPages).toBe(2);
  });

  it('rejects a page size above the remote maximum', () => {
    const file = writeTestFile(dir, 'config.yaml', 'fetch:\n  pageSize: 101\n');

    const error = thrownBy(() => getConfig({ configPath: file, env: {} }));

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: 'INVALID_CONFIG',
      message: 'Invalid configuration value for fetch.pageSize: must be between 1 and 100',
    });
  });

  it('rejects non-integer values', () => {
    const file = writeTestFile(dir, 'config.yaml', 'write:\n  batchSize: "ten"\n');

    expect(() => getConfig({ configPath: file, env: {} })).toThrow(
      'Invalid configuration value for write.batchSize: expected an integer'
    );
    expect(() => getConfig({ env: { LIBRARY_RETRY_MAX_ATTEMPTS: 'many' } })).toThrow(
      'Invalid configuration value for LIBRARY_RETRY_MAX_ATTEMPTS: expected an integer'
    );
  });

  it('rejects a section that is not a mapping', () => {
    const file = writeTestFile(dir, 'config.yaml', 'retry: 3\n');

    expect(() => getConfig({ configPath: file, env: {} })).toThrow(
      'Invalid configuration value for retry: expected a mapping'
    );
  });

  it('fails when an explicit config file is missing', () => {
    const error = thrownBy(() => getConfig({ configPath: join(dir, 'missing.yaml'), env: {} }));

    expect(error).toMatchObject({ code: 'INVALID_CONFIG', statusCode: 400 });
  });
});
