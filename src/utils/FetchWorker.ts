import type { Logger } from 'winston';
import { CacheIOError, errorMessage } from '../errors/index.js';
import type { SegmentDescriptor } from '../types/index.js';
import type { CacheStore } from './CacheStore.js';
import type { HttpTransport } from './HttpTransport.js';
import type { ProgressAggregator } from './ProgressAggregator.js';
import type { WorkQueue } from './WorkQueue.js';

export type SegmentOutcome = 'downloaded' | 'failed' | 'skipped' | 'cancelled';

export interface FetchWorkerContext {
  queue: WorkQueue<SegmentDescriptor>;
  cache: Pick<CacheStore, 'isComplete' | 'write'>;
  transport: Pick<HttpTransport, 'fetchSegment'>;
  progress: Pick<ProgressAggregator, 'recordSuccess' | 'recordFailure'>;
  isCancelled: () => boolean;
  retries: number;
  retryDelay: number;
  timeout: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface WorkerStats {
  downloaded: number;
  failed: number;
  skipped: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Drains the shared queue one segment at a time until it is empty or the run is cancelled.
 * Cancellation is cooperative: a request already on the wire is left to finish and its
 * result is thrown away.
 */
export class FetchWorker {
  public readonly id: number;
  private context: FetchWorkerContext;
  private sleep: (ms: number) => Promise<void>;

  constructor(id: number, context: FetchWorkerContext) {
    this.id = id;
    this.context = context;
    this.sleep = context.sleep ?? defaultSleep;
  }

  public async run(): Promise<WorkerStats> {
    const { queue, isCancelled } = this.context;
    const stats: WorkerStats = { downloaded: 0, failed: 0, skipped: 0 };

    while (!isCancelled()) {
      const segment = queue.pop();
      if (!segment || isCancelled()) break;

      const outcome = await this.process(segment);
      if (outcome === 'cancelled') break;
      if (outcome === 'downloaded') stats.downloaded++;
      else if (outcome === 'failed') stats.failed++;
      else stats.skipped++;
    }

    this.context.logger?.debug(
      `Worker ${this.id} finished: ${stats.downloaded} downloaded, ${stats.failed} failed, ${stats.skipped} skipped`
    );
    return stats;
  }

  public async process(segment: SegmentDescriptor): Promise<SegmentOutcome> {
    if (await this.context.cache.isComplete(segment.index)) {
      return 'skipped';
    }
    return this.fetchWithRetry(segment);
  }

  private async fetchWithRetry(segment: SegmentDescriptor): Promise<SegmentOutcome> {
    const { transport, cache, progress, isCancelled, retries, retryDelay, timeout, logger } = this.context;
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= retries; attempt++) {
      if (isCancelled()) return 'cancelled';

      try {
        const body = await transport.fetchSegment(segment.resolvedUrl, timeout);
        if (isCancelled()) return 'cancelled';

        await cache.write(segment.index, body);
        progress.recordSuccess(body.length);
        return 'downloaded';
      } catch (error) {
        if (error instanceof CacheIOError) throw error;
        lastError = errorMessage(error);
        logger?.debug(`Attempt ${attempt}/${retries} failed for segment ${segment.index}: ${lastError}`);
      }

      if (attempt < retries) {
        if (isCancelled()) return 'cancelled';
        await this.sleep(retryDelay);
      }
    }

    const message = `Segment ${segment.index}: ${lastError}`;
    progress.recordFailure(message);
    logger?.warn(`Giving up on segment ${segment.index} after ${retries} attempts: ${lastError}`);
    return 'failed';
  }
}
