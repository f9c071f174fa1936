import { randomUUID } from 'crypto';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';

const TEST_TMP_ROOT = resolve(process.cwd(), '.test-tmp');

/** Fresh directory under .test-tmp/<scope>/, unique per call. */
export function createTestTempDir(scope: string): string {
  const dir = join(TEST_TMP_ROOT, scope, randomUUID());
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function writeTestFile(dir: string, name: string, content: string): string {
  const file = join(dir, name);
  writeFileSync(file, content, 'utf8');
  return file;
}

export function cleanupTestTempDir(dir: string): void {
  const target = resolve(dir);
  if (!target.startsWith(TEST_TMP_ROOT)) {
    throw new Error(`Refusing to delete non-test path: ${target}`);
  }
  rmSync(target, { recursive: true, force: true });
}
