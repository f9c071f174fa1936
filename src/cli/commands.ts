import { createInterface } from 'readline/promises';
import Database from 'better-sqlite3';
import { CheckpointStore } from '../checkpoint/store.js';
import { getConfig, LibraryConfig } from '../config.js';
import { LibraryAnalyzer, LibraryReport } from '../library/analyzer.js';
import { openLibraryDatabase } from '../library/schema.js';
import { LibraryStore } from '../library/store.js';
import { AppError, errorMessage } from '../logger.js';
import { IngestPipeline, IngestSummary, readSourcesFile } from '../pipeline/ingest.js';
import { defaultMergeName, MergePipeline, MergeResult } from '../pipeline/merge.js';
import { createPlaylistApiClient } from '../remote/credentials.js';
import type { PlaylistReader, PlaylistWriter } from '../remote/playlist-api.js';
import { RetryOptions, Sleep } from '../remote/retry.js';

export const USAGE = [
  'Usage: library-merge <command> [options]',
  '',
  'Commands:',
  '  ingest <sources-file> [--yes] [--refresh]',
  '                                  Fetch every listed collection and refresh the local library;',
  '                                  --refresh ignores finished fetch checkpoints',
  '  report [--json]                 Summarize the local library and preview a merge',
  '  merge [name] [--yes]            Write the deduplicated library into new collection(s)',
  '  status                          List job checkpoints',
].join('\n');

export type RemoteClient = PlaylistReader & PlaylistWriter;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  confirm: (question: string) => Promise<boolean>;
}

export interface CliDependencies {
  config?: LibraryConfig;
  createClient?: (config: LibraryConfig) => RemoteClient;
  io?: Partial<CliIO>;
  sleep?: Sleep;
  now?: () => Date;
}

interface ParsedArgs {
  command?: string;
  positionals: string[];
  flags: Set<string>;
}

const KNOWN_FLAGS = new Set(['yes', 'json', 'help', 'refresh']);

export function parseCliArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();

  for (const arg of argv) {
    if (arg === '-y') {
      flags.add('yes');
      continue;
    }
    if (arg === '-h') {
      flags.add('help');
      continue;
    }
    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (!KNOWN_FLAGS.has(flag)) {
        throw new AppError(`Unknown option: ${arg}`, 'INVALID_ARGUMENT', 400);
      }
      flags.add(flag);
      continue;
    }
    positionals.push(arg);
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

async function promptConfirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    throw new AppError('Confirmation needs an interactive terminal; rerun with --yes', 'CONFIRMATION_REQUIRED', 400);
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

function resolveIO(io: Partial<CliIO> = {}): CliIO {
  return {
    out: io.out ?? ((line) => console.log(line)),
    err: io.err ?? ((line) => console.error(line)),
    confirm: io.confirm ?? promptConfirm,
  };
}

async function withDatabase<T>(config: LibraryConfig, fn: (db: Database.Database) => Promise<T>): Promise<T> {
  const db = openLibraryDatabase(config.dbPath);
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function formatIngestSummary(summary: IngestSummary): string[] {
  const lines = summary.sources.map((result) => {
    if (result.status === 'failed') {
      return `  ✗ ${result.source}: ${result.error ?? 'failed'}`;
    }
    const label = result.name ? `${result.name} (${result.source})` : result.source;
    const dropped = result.dropped > 0 ? `, ${result.dropped} dropped` : '';
    return `  ✓ ${label}: ${result.stored} tracks stored${dropped}`;
  });

  lines.push('');
  lines.push(
    `Ingested ${summary.succeeded} of ${summary.sources.length} source(s): ${summary.stored} tracks stored, ${summary.failed} failed`
  );
  return lines;
}

export function formatReport(report: LibraryReport): string[] {
  const { dryRun } = report;
  const lines: string[] = [`Library report (${dryRun.generatedAt})`, '', 'Sources:'];

  if (report.sources.length === 0) {
    lines.push('  (none ingested yet)');
  }
  for (const source of report.sources) {
    lines.push(`  ${source.source}: ${source.entries} entries, ${source.uniqueTracks} unique, ${source.duplicates} duplicates`);
  }

  lines.push('');
  lines.push(`Before merge: ${dryRun.before.totalEntries} entries`);
  lines.push(
    `After merge:  ${dryRun.after.mergedTracks} tracks in ${dryRun.after.targetsNeeded} collection(s) (${dryRun.after.uniqueIds} distinct ids)`
  );
  lines.push(`Duplicates removed: ${dryRun.impact.duplicatesRemoved}`);

  lines.push('');
  lines.push(`Overlap: ${dryRun.overlap.inMultipleSources} tracks appear in more than one source`);
  for (const exclusive of dryRun.overlap.exclusiveBySource) {
    lines.push(`  only in ${exclusive.source}: ${exclusive.tracks}`);
  }
  lines.push(
    `Weights: highest ${dryRun.weightStats.highestWeight}, average ${dryRun.weightStats.averageWeight}, ` +
      `${dryRun.weightStats.tracksWithDuplicates} tracks repeated within a source`
  );

  if (report.topArtists.length > 0) {
    lines.push('', 'Top artists:');
    for (const artist of report.topArtists) {
      lines.push(`  ${artist.artist ?? '(unknown)'}: ${artist.uniqueTracks} tracks (${artist.totalEntries} entries)`);
    }
  }

  if (report.releaseYears.length > 0) {
    lines.push('', 'Release years:');
    for (const year of report.releaseYears) {
      lines.push(`  ${year.year}: ${year.tracks}`);
    }
  }

  const features = report.audioFeatures;
  lines.push('');
  lines.push(
    features
      ? `Audio features: ${features.tracksWithFeatures} tracks, average tempo ${features.avgTempo?.toFixed(1) ?? 'n/a'} BPM`
      : 'Audio features: none stored'
  );

  return lines;
}

export function formatMergeResult(result: MergeResult): string[] {
  const lines = result.targets.map(
    (target) => `  ${target.name}: ${target.written} tracks${target.url ? ` ${target.url}` : ''}`
  );
  lines.unshift(`Merged ${result.total} tracks into ${result.targets.length} collection(s):`);
  if (result.reusedTargets > 0) {
    lines.push(`(${result.reusedTargets} collection(s) reused from an earlier run)`);
  }
  return lines;
}

class CliRunner {
  private readonly retry: RetryOptions;

  constructor(
    private readonly config: LibraryConfig,
    private readonly io: CliIO,
    private readonly deps: CliDependencies
  ) {
    this.retry = { maxAttempts: config.retry.maxAttempts, sleep: deps.sleep };
  }

  private client(): RemoteClient {
    return this.deps.createClient ? this.deps.createClient(this.config) : createPlaylistApiClient(this.config);
  }

  async ingest(args: ParsedArgs): Promise<number> {
    const [sourcesFile] = args.positionals;
    if (!sourcesFile) {
      throw new AppError('ingest needs a sources file: library-merge ingest <sources-file>', 'INVALID_ARGUMENT', 400);
    }

    const sources = readSourcesFile(sourcesFile);
    this.io.out(`Sources (${sources.length}): ${sources.join(', ')}`);
    const client = this.client();

    if (!args.flags.has('yes')) {
      const proceed = await this.io.confirm('Existing records for these sources will be replaced. Continue?');
      if (!proceed) {
        this.io.out('Aborted.');
        return 0;
      }
    }

    const checkpoints = new CheckpointStore(this.config.checkpointDir);

    const summary = await withDatabase(this.config, (db) => {
      const pipeline = new IngestPipeline(client, new LibraryStore(db), checkpoints, this.config, {
        retry: this.retry,
        describeSources: true,
        refresh: args.flags.has('refresh'),
      });
      return pipeline.run(sources);
    });

    formatIngestSummary(summary).forEach((line) => this.io.out(line));
    return summary.failed > 0 ? 1 : 0;
  }

  async report(args: ParsedArgs): Promise<number> {
    const report = await withDatabase(this.config, async (db) =>
      new LibraryAnalyzer(db).buildReport({ maxCollectionSize: this.config.write.maxCollectionSize })
    );

    if (args.flags.has('json')) {
      this.io.out(JSON.stringify(report, null, 2));
    } else {
      formatReport(report).forEach((line) => this.io.out(line));
    }
    return 0;
  }

  async merge(args: ParsedArgs): Promise<number> {
    const name = args.positionals.join(' ').trim() || defaultMergeName(this.deps.now?.() ?? new Date());

    return withDatabase(this.config, async (db) => {
      const preview = new LibraryAnalyzer(db).getDryRunReport(this.config.write.maxCollectionSize);
      if (preview.after.mergedTracks === 0) {
        throw new AppError('Nothing to merge: the library has no tracks. Run ingest first.', 'EMPTY_LIBRARY', 400);
      }

      this.io.out(
        `"${name}": ${preview.after.mergedTracks} tracks from ${preview.before.totalEntries} entries ` +
          `(${preview.impact.duplicatesRemoved} duplicates removed), ${preview.after.targetsNeeded} collection(s)`
      );
      const client = this.client();

      if (!args.flags.has('yes')) {
        const proceed = await this.io.confirm('Create the merged collection(s) now?');
        if (!proceed) {
          this.io.out('Aborted.');
          return 0;
        }
      }

      const pipeline = new MergePipeline(
        client,
        new LibraryStore(db),
        new CheckpointStore(this.config.checkpointDir),
        this.config,
        { retry: this.retry, sleep: this.deps.sleep, now: this.deps.now }
      );
      const result = await pipeline.run(name);
      formatMergeResult(result).forEach((line) => this.io.out(line));
      return 0;
    });
  }

  status(): number {
    const listings = new CheckpointStore(this.config.checkpointDir).list();
    if (listings.length === 0) {
      this.io.out('No checkpoints.');
      return 0;
    }

    for (const listing of listings) {
      const checkpoint = listing.checkpoint;
      if (!checkpoint) {
        this.io.out(`${listing.file}  unreadable: ${listing.problem ?? 'unknown problem'}`);
        continue;
      }
      const state = checkpoint.complete ? 'complete' : 'in progress';
      const progress = `${checkpoint.cursor}/${checkpoint.total ?? '?'}`;
      const error = checkpoint.error ? `  last error: ${checkpoint.error}` : '';
      this.io.out(`${checkpoint.jobKey}  ${state}  ${progress}  ${checkpoint.timestamp}${error}`);
    }
    return 0;
  }
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const io = resolveIO(deps.io);

  try {
    const args = parseCliArgs(argv);
    if (!args.command || args.command === 'help' || args.flags.has('help')) {
      io.out(USAGE);
      return args.command || args.flags.has('help') ? 0 : 1;
    }

    const config = deps.config ?? getConfig().getAll();
    const runner = new CliRunner(config, io, deps);

    switch (args.command) {
      case 'ingest':
        return await runner.ingest(args);
      case 'report':
        return await runner.report(args);
      case 'merge':
        return await runner.merge(args);
      case 'status':
        return runner.status();
      default:
        throw new AppError(`Unknown command: ${args.command}`, 'INVALID_ARGUMENT', 400);
    }
  } catch (error) {
    const code = error instanceof AppError ? ` [${error.code}]` : '';
    io.err(`Error${code}: ${errorMessage(error)}`);
    return 1;
  }
}
