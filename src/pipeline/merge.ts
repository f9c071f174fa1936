import { CheckpointStore, mergeJobKey, writeJobKey } from '../checkpoint/store.js';
import type { LibraryConfig } from '../config.js';
import { BatchedWriter, WriteProgress } from '../ingest/batched-writer.js';
import { LibraryStore } from '../library/store.js';
import { AppError, logger } from '../logger.js';
import { isRecord } from '../remote/normalize.js';
import type { PlaylistWriter } from '../remote/playlist-api.js';
import { RetryOptions, Sleep, withRetry } from '../remote/retry.js';
import type { RemoteUser } from '../types.js';

export interface MergePart {
  part: number;
  name: string;
  offset: number;
  size: number;
}

/** A target collection created for one part; persisted in the merge checkpoint. */
export interface MergeTarget extends MergePart {
  playlistId: string;
  url: string | null;
}

export interface MergeTargetResult extends MergeTarget {
  written: number;
}

export interface MergeResult {
  name: string;
  total: number;
  createdTargets: number;
  reusedTargets: number;
  targets: MergeTargetResult[];
}

export interface MergePipelineOptions {
  retry?: RetryOptions;
  sleep?: Sleep;
  description?: string;
  now?: () => Date;
  onProgress?: (progress: WriteProgress) => void;
}

function localDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function defaultMergeName(now: Date = new Date()): string {
  return `Master Library ${localDate(now)}`;
}

export function planSlug(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'library';
}

/**
 * Splits `total` ids into consecutive parts no larger than the remote
 * collection maximum. Parts are only numbered when there is more than one.
 */
export function planMergeParts(total: number, name: string, maxCollectionSize: number): MergePart[] {
  const size = Math.max(1, maxCollectionSize);
  const count = Math.ceil(total / size);
  const parts: MergePart[] = [];

  for (let index = 0; index < count; index++) {
    const offset = index * size;
    parts.push({
      part: index + 1,
      name: count > 1 ? `${name} (Part ${index + 1})` : name,
      offset,
      size: Math.min(size, total - offset),
    });
  }
  return parts;
}

function decodeMergeTarget(value: unknown): MergeTarget | undefined {
  if (!isRecord(value)) return undefined;
  const { part, name, offset, size, playlistId, url } = value;
  if (
    typeof part !== 'number' ||
    typeof name !== 'string' ||
    typeof offset !== 'number' ||
    typeof size !== 'number' ||
    typeof playlistId !== 'string' ||
    !(url === null || typeof url === 'string')
  ) {
    return undefined;
  }
  return { part, name, offset, size, playlistId, url };
}

export function decodeMergeTargets(value: unknown): MergeTarget[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const targets: MergeTarget[] = [];
  for (const item of value) {
    const target = decodeMergeTarget(item);
    if (!target) return undefined;
    targets.push(target);
  }
  return targets;
}

function samePart(target: MergeTarget, part: MergePart): boolean {
  return target.part === part.part && target.offset === part.offset && target.size === part.size;
}

/**
 * Replays the deduplicated library into newly created target collections.
 * Created targets are checkpointed under `merge:<slug>` as soon as they exist,
 * so a rerun with the same name writes into them instead of creating more.
 */
export class MergePipeline {
  private readonly writer: BatchedWriter;
  private user: RemoteUser | undefined;

  constructor(
    private readonly remote: PlaylistWriter,
    private readonly store: LibraryStore,
    private readonly checkpoints: CheckpointStore,
    private readonly config: LibraryConfig,
    private readonly options: MergePipelineOptions = {}
  ) {
    this.writer = new BatchedWriter(checkpoints, {
      retry: options.retry,
      sleep: options.sleep,
      interBatchDelayMs: config.write.interBatchDelayMs,
    });
  }

  async run(name: string): Promise<MergeResult> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new AppError('Merged collection name must not be empty', 'INVALID_ARGUMENT', 400);
    }

    const ids = this.store.getDeduplicatedIds();
    if (ids.length === 0) {
      throw new AppError('Nothing to merge: the library has no tracks. Run ingest first.', 'EMPTY_LIBRARY', 400);
    }

    const key = mergeJobKey(planSlug(trimmed));
    const parts = planMergeParts(ids.length, trimmed, this.config.write.maxCollectionSize);
    const checkpoint = this.checkpoints.load(key, decodeMergeTargets);
    const targets = checkpoint?.payload ?? [];

    const stale = targets.length > parts.length || targets.some((target, index) => !samePart(target, parts[index]));
    if (stale) {
      throw new AppError(
        `Merge "${trimmed}" was started for a different library size; choose another name or remove checkpoint ${key}`,
        'MERGE_PLAN_CHANGED',
        409,
        { jobKey: key }
      );
    }

    const reusedTargets = targets.length;
    if (reusedTargets > 0) {
      logger.info(`Reusing ${reusedTargets} target collection(s) recorded for ${key}`);
    }

    for (const part of parts.slice(targets.length)) {
      targets.push(await this.createTarget(part));
      this.checkpoints.save(key, { cursor: targets.length, complete: false, total: parts.length, payload: targets });
    }

    const results: MergeTargetResult[] = [];
    for (const target of targets) {
      const written = await this.writer.write({
        jobKey: writeJobKey(target.playlistId),
        targetId: target.playlistId,
        ids: ids.slice(target.offset, target.offset + target.size),
        batchSize: this.config.write.batchSize,
        writeBatch: (targetId, batch) => this.remote.addItems(targetId, batch),
        onProgress: this.options.onProgress,
      });
      results.push({ ...target, written });
    }

    this.checkpoints.save(key, { cursor: targets.length, complete: true, total: parts.length, payload: targets });

    return {
      name: trimmed,
      total: ids.length,
      createdTargets: targets.length - reusedTargets,
      reusedTargets,
      targets: results,
    };
  }

  private async createTarget(part: MergePart): Promise<MergeTarget> {
    const user = await this.currentUser();
    const now = this.options.now?.() ?? new Date();
    const description = this.options.description ?? `Merged playlist created on ${localDate(now)}`;

    const created = await withRetry(
      () => this.remote.createPlaylist(user.id, { name: part.name, description, public: false }),
      { ...this.options.retry, sleep: this.options.retry?.sleep ?? this.options.sleep, label: `create "${part.name}"` }
    );

    logger.info(`Created target collection "${part.name}" (${created.id})`);
    return { ...part, playlistId: created.id, url: created.url };
  }

  private async currentUser(): Promise<RemoteUser> {
    if (!this.user) {
      this.user = await withRetry(() => this.remote.getCurrentUser(), {
        ...this.options.retry,
        sleep: this.options.retry?.sleep ?? this.options.sleep,
        label: 'current user',
      });
    }
    return this.user;
  }
}
