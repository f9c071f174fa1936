export { AppError, Logger, logger, errorMessage } from './logger.js';
export type { LogLevel } from './logger.js';
export {
  ConfigManager,
  DEFAULT_CONFIG,
  MAX_COLLECTION_SIZE,
  MAX_PAGE_SIZE,
  MAX_WRITE_BATCH_SIZE,
  getConfig,
} from './config.js';
export type { ApiConfig, ConfigOptions, FetchConfig, LibraryConfig, RetryConfig, WriteConfig } from './config.js';
export type {
  AudioFeatures,
  CanonicalTrack,
  Page,
  PlaylistEntry,
  PlaylistTrack,
  RemoteCollection,
  RemoteUser,
  TrackRecord,
} from './types.js';

export { CheckpointStore, fetchJobKey, jobKey, mergeJobKey, writeJobKey } from './checkpoint/store.js';
export type { Checkpoint, CheckpointListing, CheckpointProgress, JobKind, PayloadDecoder } from './checkpoint/store.js';

export {
  RemoteCallError,
  backoffSeconds,
  failed,
  retryDelaySeconds,
  succeeded,
  withRetry,
} from './remote/retry.js';
export type { FailureKind, RemoteFailure, RemoteResult, RetryOptions, Sleep } from './remote/retry.js';
export { parseRetryAfterSeconds } from './remote/retry-after.js';
export { PlaylistApiClient, classifyHttpFailure, toTrackUri } from './remote/playlist-api.js';
export type { CreatePlaylistInput, PlaylistApiOptions, PlaylistReader, PlaylistWriter } from './remote/playlist-api.js';
export { createPlaylistApiClient, requireAccessToken } from './remote/credentials.js';
export { normalizeEntries, toTrackRecord } from './remote/normalize.js';

export { PaginatedFetcher } from './ingest/paginated-fetcher.js';
export type { FetchJob, FetchProgress, FetchResult, FetchStart } from './ingest/paginated-fetcher.js';
export { BatchedWriter } from './ingest/batched-writer.js';
export type { BatchedWriterOptions, WriteJob, WriteProgress } from './ingest/batched-writer.js';

export { LibraryStore } from './library/store.js';
export type { ReplaceSourceResult, SourceCount } from './library/store.js';
export { LibraryAnalyzer } from './library/analyzer.js';
export type { DryRunReport, LibraryReport } from './library/analyzer.js';
export { ensureLibrarySchema, openLibraryDatabase } from './library/schema.js';

export { IngestPipeline, parseSourcesList, readSourcesFile } from './pipeline/ingest.js';
export type { IngestSummary, SourceIngestResult } from './pipeline/ingest.js';
export { MergePipeline, defaultMergeName, planMergeParts, planSlug } from './pipeline/merge.js';
export type { MergeResult, MergeTarget } from './pipeline/merge.js';

export { runCli } from './cli/commands.js';
