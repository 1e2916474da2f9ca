import type { Logger } from 'winston';
import { errorMessage } from '../errors/index.js';
import type { DownloadStatus, ProgressSink, ProgressSnapshot } from '../types/index.js';

const BYTES_PER_MB = 1024 * 1024;

export interface ProgressAggregatorOptions {
  totalSegments: number;
  cachedSegments: number;
  cachedBytes: number;
  sink?: ProgressSink;
  logger?: Logger;
  now?: () => number;
}

export interface ProgressCounters {
  downloaded: number;
  failed: number;
  bytes: number;
}

/**
 * Run counters shared by all fetch workers.
 *
 * Every mutation and the snapshot it produces happen in one synchronous step, so a
 * snapshot always reflects the counters that triggered it and snapshots from one worker
 * arrive in that worker's completion order. The sink runs on the caller's turn of the
 * event loop and must not block.
 */
export class ProgressAggregator {
  private readonly totalSegments: number;
  private readonly cachedSegments: number;
  private readonly bytesAtRunStart: number;
  private readonly startTime: number;
  private readonly now: () => number;
  private readonly sink?: ProgressSink;
  private readonly logger?: Logger;

  private downloaded: number;
  private failed = 0;
  private bytes: number;
  private errors: string[] = [];

  constructor(options: ProgressAggregatorOptions) {
    this.totalSegments = options.totalSegments;
    this.cachedSegments = options.cachedSegments;
    this.bytesAtRunStart = options.cachedBytes;
    this.downloaded = options.cachedSegments;
    this.bytes = options.cachedBytes;
    this.sink = options.sink;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  public get counters(): ProgressCounters {
    return { downloaded: this.downloaded, failed: this.failed, bytes: this.bytes };
  }

  /**
   * All segments are either downloaded or given up on.
   */
  public get settled(): boolean {
    return this.downloaded + this.failed >= this.totalSegments;
  }

  public recordSuccess(byteCount: number): ProgressSnapshot {
    this.downloaded++;
    this.bytes += byteCount;
    return this.emit('downloading');
  }

  public recordFailure(message: string): void {
    this.failed++;
    this.errors.push(message);
  }

  /**
   * Fatal errors replace the segment error list: they are the sole failure reason.
   */
  public recordFatal(message: string): void {
    this.errors = [message];
  }

  public snapshot(status: DownloadStatus, extra: { fileSize?: number } = {}): ProgressSnapshot {
    const total = this.totalSegments;
    const elapsedSeconds = (this.now() - this.startTime) / 1000;
    const fetchedThisRun = this.downloaded - this.cachedSegments;

    const speedSegPerSec = elapsedSeconds > 0 ? fetchedThisRun / elapsedSeconds : 0;
    const speedMBps = elapsedSeconds > 0 ? (this.bytes - this.bytesAtRunStart) / elapsedSeconds / BYTES_PER_MB : 0;
    const etaSeconds = speedSegPerSec > 0 ? Math.floor((total - this.downloaded) / speedSegPerSec) : 0;

    const snapshot: ProgressSnapshot = {
      status,
      percent: total > 0 ? (this.downloaded * 100) / total : 0,
      downloadedSegments: this.downloaded,
      totalSegments: total,
      failedSegments: this.failed,
      bytesDownloaded: this.bytes,
      speedMBps,
      speedSegPerSec,
      etaSeconds,
      errors: Object.freeze([...this.errors]),
      ...(extra.fileSize !== undefined ? { fileSize: extra.fileSize } : {}),
    };
    return Object.freeze(snapshot);
  }

  public emit(status: DownloadStatus, extra: { fileSize?: number } = {}): ProgressSnapshot {
    const snapshot = this.snapshot(status, extra);
    if (this.sink) {
      try {
        this.sink(snapshot);
      } catch (error) {
        this.logger?.warn(`Progress sink error: ${errorMessage(error)}`);
      }
    }
    return snapshot;
  }
}
