export interface DownloadConfig {
  maxWorkers?: number;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  cacheDir?: string;
  ffmpegPath?: string;
  headers?: Record<string, string>;
  logLevel?: LogLevel;
}

export type ResolvedDownloadConfig = Required<DownloadConfig>;

export interface StreamDescriptor {
  readonly manifestUrl: string;
  readonly baseUrl: string;
}

export interface SegmentDescriptor {
  readonly index: number;
  readonly uri: string;
  readonly resolvedUrl: string;
}

export interface MediaSegment {
  uri: string;
  duration?: number;
}

export interface Resolution {
  width: number;
  height: number;
}

export interface VariantStream {
  uri: string;
  bandwidth?: number;
  resolution?: Resolution;
  codecs?: string;
}

export interface Variant {
  quality: string;
  label: string;
  url: string;
  bandwidth: number;
  resolution?: Resolution;
}

export interface ResolvedStream {
  manifestUrl: string;
  title: string;
}

/**
 * Turns a page URL into a playable manifest. Site-specific resolvers live outside
 * this package; the download engine only consumes `manifestUrl`.
 */
export interface StreamResolver {
  resolve(pageUrl: string): Promise<ResolvedStream>;
  listVariants(manifestUrl: string): Promise<Variant[]>;
}

export type DownloadStatus = 'downloading' | 'merging' | 'completed' | 'failed' | 'cancelled';

export interface ProgressSnapshot {
  readonly status: DownloadStatus;
  readonly percent: number;
  readonly downloadedSegments: number;
  readonly totalSegments: number;
  readonly failedSegments: number;
  readonly bytesDownloaded: number;
  readonly speedMBps: number;
  readonly speedSegPerSec: number;
  readonly etaSeconds: number;
  readonly errors: readonly string[];
  readonly fileSize?: number;
}

/**
 * Receives progress snapshots. Called synchronously from whichever worker finished a
 * segment, so it must return quickly; throttle persistence on the caller's side.
 */
export type ProgressSink = (snapshot: ProgressSnapshot) => void;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  filename?: string;
  silent?: boolean;
}
