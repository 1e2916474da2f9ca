/**
 * hlsfetch - resumable, concurrent HLS segment downloader
 *
 * @example
 * ```typescript
 * import { DownloadSession, PlaylistResolver, AxiosTransport, selectVariant } from 'hlsfetch';
 *
 * const resolver = new PlaylistResolver(new AxiosTransport());
 * const [best] = await resolver.listVariants('https://cdn.example.com/master.m3u8');
 *
 * const session = new DownloadSession({ manifestUrl: best.url, outputPath: 'downloads/video.mp4' });
 * const { success, snapshot } = await session.run();
 * ```
 */

import { DownloadSession } from './DownloadSession.js';

// Orchestration
export { DownloadSession } from './DownloadSession.js';
export type { DownloadResult, DownloadSessionOptions } from './DownloadSession.js';
export { DownloadStateMachine, STATE, canTransition, isTerminalState } from './DownloadState.js';
export type { SessionState } from './DownloadState.js';

// Building blocks
export { CacheStore, segmentFileName } from './utils/CacheStore.js';
export type { CacheScan } from './utils/CacheStore.js';
export { SegmentPlanner, resolveReference, describeStream, manifestBaseUrl } from './utils/SegmentPlanner.js';
export { isMasterPlaylist, parseMasterPlaylist, parseMediaPlaylist } from './utils/M3U8Parser.js';
export { WorkQueue } from './utils/WorkQueue.js';
export { FetchWorker } from './utils/FetchWorker.js';
export type { FetchWorkerContext, SegmentOutcome, WorkerStats } from './utils/FetchWorker.js';
export { ProgressAggregator } from './utils/ProgressAggregator.js';
export { FFmpegMerger, buildConcatList, ffmpegConcatArgs } from './utils/FFmpegMerger.js';
export type { Merger, MergeOutcome } from './utils/FFmpegMerger.js';
export { AxiosTransport, defaultHeadersFor } from './utils/HttpTransport.js';
export type { HttpTransport, AxiosTransportOptions } from './utils/HttpTransport.js';
export { PlaylistResolver, listVariantsFromText, selectVariant, sanitizeFileName } from './utils/PlaylistResolver.js';
export { ProgressDisplay } from './utils/ProgressDisplay.js';
export { createLogger } from './utils/Logger.js';

// Configuration and errors
export { resolveConfig, defaultCacheDir } from './config/index.js';
export * from './errors/index.js';

// Type definitions for TypeScript users
export type * from './types/index.js';

export default DownloadSession;
