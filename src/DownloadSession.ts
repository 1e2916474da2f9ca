import type { Logger } from 'winston';
import { resolveConfig } from './config/index.js';
import { DownloadStateMachine, STATE, type SessionState } from './DownloadState.js';
import { DownloaderError, ManifestError, MergeError, errorMessage } from './errors/index.js';
import type {
  DownloadConfig,
  ProgressSink,
  ProgressSnapshot,
  ResolvedDownloadConfig,
  SegmentDescriptor,
  StreamDescriptor,
} from './types/index.js';
import { CacheStore } from './utils/CacheStore.js';
import { FFmpegMerger, type MergeOutcome, type Merger } from './utils/FFmpegMerger.js';
import { FetchWorker } from './utils/FetchWorker.js';
import { AxiosTransport, defaultHeadersFor, type HttpTransport } from './utils/HttpTransport.js';
import { createLogger } from './utils/Logger.js';
import { ProgressAggregator } from './utils/ProgressAggregator.js';
import { SegmentPlanner, describeStream } from './utils/SegmentPlanner.js';
import { WorkQueue } from './utils/WorkQueue.js';

export interface DownloadSessionOptions {
  manifestUrl: string;
  outputPath: string;
  config?: DownloadConfig;
  transport?: HttpTransport;
  merger?: Merger;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface DownloadResult {
  success: boolean;
  snapshot: ProgressSnapshot;
  outputPath: string;
  error?: DownloaderError;
}

/**
 * One run of a resumable segment download: plan, resume from cache, fetch the missing
 * segments with a fixed worker pool, then merge and purge the cache.
 *
 * A failed or cancelled run keeps every completed segment on disk; running a new session
 * for the same manifest URL picks up where this one stopped.
 *
 * @example
 * ```typescript
 * const session = new DownloadSession({
 *   manifestUrl: 'https://cdn.example.com/show/index.m3u8',
 *   outputPath: 'downloads/show.mp4',
 *   config: { maxWorkers: 8 },
 *   onProgress: snapshot => console.log(snapshot.percent.toFixed(1)),
 * });
 * process.once('SIGINT', () => session.cancel());
 * const { success, snapshot } = await session.run();
 * ```
 */
export class DownloadSession {
  public readonly stream: StreamDescriptor;
  public readonly outputPath: string;
  public readonly config: ResolvedDownloadConfig;

  private logger: Logger;
  private transport: HttpTransport;
  private merger: Merger;
  private planner = new SegmentPlanner();
  private machine = new DownloadStateMachine();
  private onProgress?: ProgressSink;
  private signal?: AbortSignal;

  private cache: CacheStore;
  private progress?: ProgressAggregator;
  private segments: SegmentDescriptor[] = [];
  private cachedAtStart = new Set<number>();
  private cancelled = false;
  private fatal?: { error: unknown };
  private started = false;
  private purged = false;

  constructor(options: DownloadSessionOptions) {
    this.config = resolveConfig(options.config);
    this.stream = describeStream(options.manifestUrl);
    this.outputPath = options.outputPath;
    this.logger = options.logger ?? createLogger('DownloadSession', { level: this.config.logLevel });
    this.transport =
      options.transport ??
      new AxiosTransport({
        headers: defaultHeadersFor(options.manifestUrl, this.config.headers),
        timeout: this.config.timeout,
      });
    this.merger = options.merger ?? new FFmpegMerger(this.config.ffmpegPath, this.logger);
    this.onProgress = options.onProgress;
    this.signal = options.signal;
    this.cache = new CacheStore(this.config.cacheDir, options.manifestUrl, this.logger);
    this.machine.onTransition((from, to) => this.logger.debug(`State: ${from} -> ${to}`));
  }

  public get state(): SessionState {
    return this.machine.state;
  }

  public get cacheDirectory(): string {
    return this.cache.directory;
  }

  public get totalSegments(): number {
    return this.segments.length;
  }

  public get cachedSegmentsAtStart(): ReadonlySet<number> {
    return this.cachedAtStart;
  }

  public get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Ask workers to stop taking new segments. Requests already in flight finish and
   * their results are dropped.
   */
  public cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.logger.info('Cancellation requested');
  }

  public async run(): Promise<DownloadResult> {
    if (this.started) {
      throw new Error('A DownloadSession can only be run once; create a new session to resume');
    }
    this.started = true;

    const onAbort = (): void => this.cancel();
    if (this.signal?.aborted) {
      this.cancel();
    } else {
      this.signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      return await this.execute();
    } catch (error) {
      if (error instanceof DownloaderError) {
        return this.finishWithError(error);
      }
      throw error;
    } finally {
      this.signal?.removeEventListener('abort', onAbort);
      if (!this.purged) {
        await this.releaseTemporaries();
      }
    }
  }

  private async execute(): Promise<DownloadResult> {
    this.logger.info(`Fetching playlist: ${this.stream.manifestUrl}`);
    const manifestText = await this.fetchManifest();
    this.segments = this.planner.plan(manifestText, this.stream.manifestUrl);
    this.logger.info(`Total segments: ${this.segments.length}`);
    if (this.cancelled) return this.finishCancelled();

    this.machine.transition(STATE.RESUMING);
    await this.cache.open();
    const scan = await this.cache.scan(this.segments);
    this.cachedAtStart = scan.cached;
    this.progress = new ProgressAggregator({
      totalSegments: this.segments.length,
      cachedSegments: scan.cached.size,
      cachedBytes: scan.bytes,
      sink: this.onProgress,
      logger: this.logger,
    });

    if (scan.cached.size > 0) {
      this.logger.info(`Found ${scan.cached.size}/${this.segments.length} cached segments - resuming download`);
    }
    this.logger.info(`Cache: ${this.cache.directory}`);
    if (this.cancelled) return this.finishCancelled();

    if (scan.cached.size === this.segments.length) {
      this.logger.info('All segments already cached');
      this.progress.emit('downloading');
      return this.merge(this.progress);
    }

    this.machine.transition(STATE.DOWNLOADING);
    await this.download(this.progress);

    if (this.fatal) throw this.fatal.error;
    if (this.cancelled) return this.finishCancelled();

    const { downloaded, failed } = this.progress.counters;
    if (failed > 0) {
      return this.finishWithSegmentFailures(this.progress, `Failed to download ${failed} segments`);
    }
    if (!this.progress.settled) {
      const reason = `Download incomplete: ${downloaded}/${this.segments.length} segments`;
      this.progress.recordFatal(reason);
      return this.finishWithSegmentFailures(this.progress, reason);
    }

    return this.merge(this.progress);
  }

  private async fetchManifest(): Promise<string> {
    try {
      return await this.transport.fetchText(this.stream.manifestUrl);
    } catch (error) {
      if (error instanceof DownloaderError) throw error;
      throw new ManifestError(`Failed to fetch playlist ${this.stream.manifestUrl}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async download(progress: ProgressAggregator): Promise<void> {
    const pending = this.segments.filter(segment => !this.cachedAtStart.has(segment.index));
    const queue = new WorkQueue<SegmentDescriptor>(pending.length);
    for (const segment of pending) {
      queue.push(segment);
    }

    const workerCount = Math.min(this.config.maxWorkers, queue.size);
    this.logger.info(`Downloading ${pending.length} segments with ${workerCount} workers`);
    const startedAt = Date.now();

    const workers = Array.from(
      { length: workerCount },
      (_, i) =>
        new FetchWorker(i + 1, {
          queue,
          cache: this.cache,
          transport: this.transport,
          progress,
          isCancelled: () => this.cancelled || this.fatal !== undefined,
          retries: this.config.retries,
          retryDelay: this.config.retryDelay,
          timeout: this.config.timeout,
          logger: this.logger,
        })
    );

    await Promise.all(
      workers.map(worker =>
        worker.run().catch((error: unknown) => {
          this.fatal ??= { error };
          this.logger.error(`Worker ${worker.id} stopped: ${errorMessage(error)}`);
        })
      )
    );

    const { downloaded, failed } = progress.counters;
    const fetched = downloaded - this.cachedAtStart.size;
    const totalTime = (Date.now() - startedAt) / 1000;
    const avgSpeed = totalTime > 0 ? (fetched / totalTime).toFixed(1) : 'N/A';
    this.logger.info(
      `Fetch phase ended: ${fetched}/${pending.length} segments in ${totalTime.toFixed(1)}s (avg: ${avgSpeed} seg/s), ${failed} failed`
    );
  }

  private async merge(progress: ProgressAggregator): Promise<DownloadResult> {
    this.machine.transition(STATE.MERGING);
    progress.emit('merging');

    const { fileSize } = await this.runMerger();

    await this.cache.purge();
    this.purged = true;
    this.machine.transition(STATE.COMPLETED);

    const snapshot = progress.emit('completed', { fileSize });
    this.logger.info(`Download completed: ${this.outputPath} (${(fileSize / (1024 * 1024)).toFixed(2)} MB)`);
    this.logger.info('Cache cleaned');
    return { success: true, snapshot, outputPath: this.outputPath };
  }

  private async runMerger(): Promise<MergeOutcome> {
    try {
      return await this.merger.merge(this.cache.segmentPaths(this.segments.length), this.outputPath);
    } catch (error) {
      if (error instanceof DownloaderError) throw error;
      throw new MergeError(`Merge failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private ensureProgress(): ProgressAggregator {
    this.progress ??= new ProgressAggregator({
      totalSegments: this.segments.length,
      cachedSegments: 0,
      cachedBytes: 0,
      sink: this.onProgress,
      logger: this.logger,
    });
    return this.progress;
  }

  private finishCancelled(): DownloadResult {
    this.machine.transition(STATE.CANCELLED);
    const snapshot = this.ensureProgress().emit('cancelled');
    this.logger.warn(
      `Download cancelled after ${snapshot.downloadedSegments}/${snapshot.totalSegments} segments - cache kept, run again to resume`
    );
    return { success: false, snapshot, outputPath: this.outputPath };
  }

  private finishWithSegmentFailures(progress: ProgressAggregator, reason: string): DownloadResult {
    this.machine.transition(STATE.FAILED);
    const snapshot = progress.emit('failed');
    this.logger.error(reason);
    this.logger.warn(`Cache preserved at ${this.cache.directory} - run again to resume`);
    return { success: false, snapshot, outputPath: this.outputPath };
  }

  private finishWithError(error: DownloaderError): DownloadResult {
    this.machine.transition(STATE.FAILED);
    const progress = this.ensureProgress();
    progress.recordFatal(error.message);
    const snapshot = progress.emit('failed');
    this.logger.error(`Download failed: ${error.message}`);
    return { success: false, snapshot, outputPath: this.outputPath, error };
  }

  private async releaseTemporaries(): Promise<void> {
    try {
      await this.cache.releaseTemporaries();
    } catch (error) {
      this.logger.warn(`Failed to release cache temporaries: ${errorMessage(error)}`);
    }
  }
}
