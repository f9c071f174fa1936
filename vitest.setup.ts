import { beforeAll, afterAll } from 'vitest';
import { existsSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';

const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';

// Credentials and paths from a developer's shell must not leak into tests.
delete process.env.SPOTIFY_ACCESS_TOKEN;
delete process.env.LIBRARY_CONFIG;
delete process.env.LIBRARY_DB_PATH;
delete process.env.LIBRARY_CHECKPOINT_DIR;

beforeAll(() => {
  if (!existsSync(TEST_DIR)) {
    mkdirSync(TEST_DIR, { recursive: true });
  }
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP) {
    return;
  }
  // Parallel workers share the directory; another worker may still be using it.
  rmSync(TEST_DIR, { recursive: true, force: true, maxRetries: 3 });
});
