import { existsSync, readFileSync } from 'fs';
import { CheckpointStore, fetchJobKey } from '../checkpoint/store.js';
import { LibraryConfig } from '../config.js';
import { FetchProgress, FetchStart, PaginatedFetcher } from '../ingest/paginated-fetcher.js';
import { LibraryStore } from '../library/store.js';
import { AppError, errorMessage, logger } from '../logger.js';
import { decodePlaylistEntries, normalizeEntries } from '../remote/normalize.js';
import type { PlaylistReader } from '../remote/playlist-api.js';
import { RetryOptions, withRetry } from '../remote/retry.js';

export interface SourceIngestResult {
  source: string;
  status: 'ingested' | 'failed';
  name?: string;
  start?: FetchStart;
  fetched: number;
  stored: number;
  dropped: number;
  removed: number;
  remoteCalls: number;
  error?: string;
}

export interface IngestSummary {
  sources: SourceIngestResult[];
  succeeded: number;
  failed: number;
  stored: number;
  dropped: number;
}

export interface IngestPipelineOptions {
  retry?: RetryOptions;
  /** Look up and log each collection's display name before fetching it. */
  describeSources?: boolean;
  /** Discard saved fetch checkpoints so every source is read from the remote again. */
  refresh?: boolean;
  onProgress?: (progress: FetchProgress) => void;
}

/** One collection id per line; blank lines and `#` comments are skipped. */
export function parseSourcesList(content: string): string[] {
  const seen = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    seen.add(trimmed);
  }
  return [...seen];
}

export function readSourcesFile(path: string): string[] {
  if (!existsSync(path)) {
    throw new AppError(`Sources file not found: ${path}`, 'SOURCES_FILE_NOT_FOUND', 404, { path });
  }
  const sources = parseSourcesList(readFileSync(path, 'utf8'));
  if (sources.length === 0) {
    throw new AppError(`Sources file ${path} lists no collection ids`, 'NO_SOURCES', 400, { path });
  }
  return sources;
}

/**
 * Fetch → normalize → full refresh, one source at a time. The source tag of
 * every stored record is the collection id it was fetched from.
 */
export class IngestPipeline {
  private readonly fetcher: PaginatedFetcher;

  constructor(
    private readonly reader: PlaylistReader,
    private readonly store: LibraryStore,
    private readonly checkpoints: CheckpointStore,
    private readonly config: LibraryConfig,
    private readonly options: IngestPipelineOptions = {}
  ) {
    this.fetcher = new PaginatedFetcher(checkpoints, options.retry);
  }

  async ingestSource(source: string): Promise<SourceIngestResult> {
    const jobKey = fetchJobKey(source);
    if (this.options.refresh && this.checkpoints.remove(jobKey)) {
      logger.info(`${jobKey}: discarded saved checkpoint, fetching again`);
    }

    // A finished fetch replays from its checkpoint without touching the remote.
    const replay = this.checkpoints.load(jobKey)?.complete === true;
    const name = this.options.describeSources && !replay ? await this.describe(source) : undefined;

    const result = await this.fetcher.fetch({
      jobKey,
      pageSize: this.config.fetch.pageSize,
      checkpointEveryPages: this.config.fetch.checkpointEveryPages,
      loadPage: (offset, limit) => this.reader.getPlaylistPage(source, offset, limit),
      decodeItems: decodePlaylistEntries,
      onProgress: this.options.onProgress,
    });

    const { records, dropped } = normalizeEntries(result.items, source);
    if (dropped > 0) {
      logger.warn(`${source}: dropped ${dropped} entries without a track id`);
    }

    const { removed, inserted } = this.store.replaceSource(source, records);
    logger.info(`${source}: stored ${inserted} tracks (replaced ${removed})`);

    return {
      source,
      status: 'ingested',
      ...(name !== undefined ? { name } : {}),
      start: result.start,
      fetched: result.items.length,
      stored: inserted,
      dropped,
      removed,
      remoteCalls: result.remoteCalls,
    };
  }

  /** A failed source is reported and the run moves on to the next one. */
  async run(sources: string[]): Promise<IngestSummary> {
    const results: SourceIngestResult[] = [];

    for (const source of sources) {
      try {
        results.push(await this.ingestSource(source));
      } catch (error) {
        logger.error(`Ingest failed for ${source}`, { error: errorMessage(error) });
        results.push({
          source,
          status: 'failed',
          fetched: 0,
          stored: 0,
          dropped: 0,
          removed: 0,
          remoteCalls: 0,
          error: errorMessage(error),
        });
      }
    }

    const ingested = results.filter((result) => result.status === 'ingested');
    return {
      sources: results,
      succeeded: ingested.length,
      failed: results.length - ingested.length,
      stored: ingested.reduce((sum, result) => sum + result.stored, 0),
      dropped: ingested.reduce((sum, result) => sum + result.dropped, 0),
    };
  }

  private async describe(source: string): Promise<string> {
    const name = await withRetry(() => this.reader.getPlaylistName(source), {
      ...this.options.retry,
      label: `${source} name`,
    });
    logger.info(`Fetching "${name}" (${source})`);
    return name;
  }
}
