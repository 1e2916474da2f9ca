export type DownloaderErrorCode =
  | 'MANIFEST_ERROR'
  | 'SEGMENT_FETCH_ERROR'
  | 'CACHE_IO_ERROR'
  | 'MERGE_ERROR'
  | 'CONFIG_ERROR';

export class DownloaderError extends Error {
  public readonly code: DownloaderErrorCode;

  constructor(code: DownloaderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Empty, unparseable or unreachable playlist. Fatal: raised before any segment is fetched.
 */
export class ManifestError extends DownloaderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MANIFEST_ERROR', message, options);
  }
}

/**
 * One failed fetch attempt. Recoverable until the retry budget is spent.
 */
export class SegmentFetchError extends DownloaderError {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super('SEGMENT_FETCH_ERROR', message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export class CacheIOError extends DownloaderError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('CACHE_IO_ERROR', message, options);
    this.path = path;
  }
}

/**
 * Muxer exited non-zero or produced an empty file. The segment cache is kept so the
 * run can be resumed.
 */
export class MergeError extends DownloaderError {
  public readonly exitCode?: number | null;

  constructor(message: string, options?: { exitCode?: number | null; cause?: unknown }) {
    super('MERGE_ERROR', message, { cause: options?.cause });
    this.exitCode = options?.exitCode;
  }
}

export class ConfigError extends DownloaderError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
