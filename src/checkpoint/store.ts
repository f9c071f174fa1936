import { randomUUID } from 'crypto';
import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from 'fs';
import { join, resolve } from 'path';
import fg from 'fast-glob';
import { AppError, errorMessage } from '../logger.js';

export type JobKind = 'fetch' | 'write' | 'merge';

/**
 * Persisted progress marker for one job. `cursor` counts units already done
 * (items requested for a fetch job, ids written for a write job).
 */
export interface Checkpoint<TPayload = never> {
  jobKey: string;
  cursor: number;
  complete: boolean;
  error?: string;
  timestamp: string;
  total?: number;
  payload?: TPayload;
}

export interface CheckpointProgress<TPayload = never> {
  cursor: number;
  complete: boolean;
  error?: string;
  total?: number;
  payload?: TPayload;
}

export type PayloadDecoder<T> = (value: unknown) => T | undefined;

export interface CheckpointListing {
  file: string;
  checkpoint?: Omit<Checkpoint, 'payload'>;
  problem?: string;
}

export function jobKey(kind: JobKind, targetId: string): string {
  return `${kind}:${targetId}`;
}

export function fetchJobKey(collectionId: string): string {
  return jobKey('fetch', collectionId);
}

export function writeJobKey(collectionId: string): string {
  return jobKey('write', collectionId);
}

export function mergeJobKey(planSlug: string): string {
  return jobKey('merge', planSlug);
}

function fileNameFor(key: string): string {
  return `${key.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function corrupt(file: string, detail: string): AppError {
  return new AppError(
    `Checkpoint file ${file} is unreadable (${detail}); delete it to restart the job from scratch`,
    'CHECKPOINT_CORRUPT',
    400,
    { file },
  );
}

function parseCheckpointFile(file: string, raw: string): Checkpoint<unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw corrupt(file, errorMessage(error));
  }

  if (!isRecord(parsed)) throw corrupt(file, 'not an object');

  const { jobKey: key, cursor, complete, error, timestamp, total, payload } = parsed;
  if (typeof key !== 'string') throw corrupt(file, 'missing jobKey');
  if (typeof cursor !== 'number' || !Number.isInteger(cursor) || cursor < 0) throw corrupt(file, 'invalid cursor');
  if (typeof complete !== 'boolean') throw corrupt(file, 'invalid complete flag');
  if (typeof timestamp !== 'string') throw corrupt(file, 'missing timestamp');
  if (error !== undefined && typeof error !== 'string') throw corrupt(file, 'invalid error');
  if (total !== undefined && (typeof total !== 'number' || !Number.isInteger(total) || total < 0)) {
    throw corrupt(file, 'invalid total');
  }

  return {
    jobKey: key,
    cursor,
    complete,
    timestamp,
    ...(error !== undefined ? { error } : {}),
    ...(total !== undefined ? { total } : {}),
    ...(payload !== undefined ? { payload } : {}),
  };
}

/**
 * One JSON file per job key. Saves go through a synced temp file and a rename,
 * so a reader only ever sees a complete previous or complete next state.
 * Single writer per key is assumed and not enforced.
 */
export class CheckpointStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
    mkdirSync(this.dir, { recursive: true });
  }

  pathFor(key: string): string {
    return join(this.dir, fileNameFor(key));
  }

  save<TPayload = never>(key: string, progress: CheckpointProgress<TPayload>): Checkpoint<TPayload> {
    const checkpoint: Checkpoint<TPayload> = {
      jobKey: key,
      cursor: progress.cursor,
      complete: progress.complete,
      timestamp: new Date().toISOString(),
      ...(progress.error !== undefined ? { error: progress.error } : {}),
      ...(progress.total !== undefined ? { total: progress.total } : {}),
      ...(progress.payload !== undefined ? { payload: progress.payload } : {}),
    };

    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    const body = `${JSON.stringify(checkpoint)}\n`;

    try {
      const fd = openSync(temp, 'w');
      try {
        writeSync(fd, body);
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(temp, target);
    } catch (error) {
      rmSync(temp, { force: true });
      throw error;
    }

    return checkpoint;
  }

  load<TPayload = never>(key: string, decodePayload?: PayloadDecoder<TPayload>): Checkpoint<TPayload> | undefined {
    const file = this.pathFor(key);
    if (!existsSync(file)) return undefined;

    const stored = parseCheckpointFile(file, readFileSync(file, 'utf8'));
    if (stored.jobKey !== key) {
      throw corrupt(file, `belongs to job ${stored.jobKey}`);
    }

    const { payload: rawPayload, ...rest } = stored;
    if (rawPayload === undefined || !decodePayload) {
      return rest;
    }

    const payload = decodePayload(rawPayload);
    if (payload === undefined) {
      throw corrupt(file, 'payload failed validation');
    }
    return { ...rest, payload };
  }

  remove(key: string): boolean {
    const file = this.pathFor(key);
    if (!existsSync(file)) return false;
    rmSync(file, { force: true });
    return true;
  }

  list(): CheckpointListing[] {
    const files = fg.sync('*.json', { cwd: this.dir, onlyFiles: true, dot: false }).sort();

    return files.map((file) => {
      const absolute = join(this.dir, file);
      try {
        const { payload: _payload, ...checkpoint } = parseCheckpointFile(absolute, readFileSync(absolute, 'utf8'));
        return { file, checkpoint };
      } catch (error) {
        return { file, problem: errorMessage(error) };
      }
    });
  }
}
