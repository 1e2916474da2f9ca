import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { CacheIOError, errorMessage } from '../errors/index.js';
import type { SegmentDescriptor } from '../types/index.js';

export const CACHE_KEY_LENGTH = 16;
export const CONCAT_LIST_NAME = 'concat.txt';
const SEGMENT_PREFIX = 'segment_';
const SEGMENT_EXTENSION = '.ts';
const PARTIAL_SUFFIX = '.part';

export function segmentFileName(index: number): string {
  return `${SEGMENT_PREFIX}${index.toString().padStart(5, '0')}${SEGMENT_EXTENSION}`;
}

// fs errors come from Node's own realm, so no instanceof checks here
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export interface CacheScan {
  cached: Set<number>;
  bytes: number;
}

/**
 * Content-addressed segment cache for one stream.
 *
 * Layout: `<cacheDir>/<key>/segment_00000.ts`, where `key` is derived from the manifest
 * URL so that a later run on the same stream finds the same directory. A segment file
 * with a non-zero size is complete and is never fetched again.
 */
export class CacheStore {
  public readonly key: string;
  public readonly directory: string;
  private logger?: Logger;

  constructor(cacheDir: string, manifestUrl: string, logger?: Logger) {
    this.key = CacheStore.keyFor(manifestUrl);
    this.directory = path.join(cacheDir, this.key);
    this.logger = logger;
  }

  public static keyFor(manifestUrl: string): string {
    return createHash('md5').update(manifestUrl).digest('hex').slice(0, CACHE_KEY_LENGTH);
  }

  public segmentPath(index: number): string {
    return path.join(this.directory, segmentFileName(index));
  }

  /**
   * Paths of segments `0..count-1`, ascending.
   */
  public segmentPaths(count: number): string[] {
    return Array.from({ length: count }, (_, index) => this.segmentPath(index));
  }

  public get listPath(): string {
    return path.join(this.directory, CONCAT_LIST_NAME);
  }

  public async open(): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new CacheIOError(
        this.directory,
        `Cannot create cache directory ${this.directory}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Size of a complete segment, or 0 when it is missing or empty.
   */
  private async completeSize(index: number): Promise<number> {
    const target = this.segmentPath(index);
    try {
      const stats = await fs.stat(target);
      return stats.isFile() ? stats.size : 0;
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw new CacheIOError(target, `Cannot inspect segment ${index}: ${errorMessage(error)}`, { cause: error });
    }
  }

  public async isComplete(index: number): Promise<boolean> {
    return (await this.completeSize(index)) > 0;
  }

  public async scan(segments: readonly SegmentDescriptor[]): Promise<CacheScan> {
    const sizes = await Promise.all(segments.map(segment => this.completeSize(segment.index)));
    const cached = new Set<number>();
    let bytes = 0;

    sizes.forEach((size, i) => {
      if (size > 0) {
        cached.add(segments[i].index);
        bytes += size;
      }
    });

    return { cached, bytes };
  }

  /**
   * Write to a temporary name, then rename: the final name only ever holds a whole segment.
   */
  public async write(index: number, data: Uint8Array): Promise<void> {
    const target = this.segmentPath(index);
    const partial = `${target}${PARTIAL_SUFFIX}`;
    try {
      await fs.writeFile(partial, data);
      await fs.rename(partial, target);
    } catch (error) {
      await fs.rm(partial, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.warn(`Failed to remove ${partial}: ${errorMessage(cleanupError)}`);
      });
      throw new CacheIOError(target, `Cannot write segment ${index} to ${target}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Remove partial writes and the merge list; complete segments are left in place.
   */
  public async releaseTemporaries(): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return;
      throw new CacheIOError(this.directory, `Cannot list cache directory: ${errorMessage(error)}`, { cause: error });
    }

    const leftovers = entries.filter(name => name.endsWith(PARTIAL_SUFFIX) || name === CONCAT_LIST_NAME);
    for (const name of leftovers) {
      try {
        await fs.rm(path.join(this.directory, name), { force: true });
      } catch (error) {
        this.logger?.warn(`Failed to remove ${name} from cache: ${errorMessage(error)}`);
      }
    }
  }

  public async purge(): Promise<void> {
    try {
      await fs.rm(this.directory, { recursive: true, force: true });
    } catch (error) {
      throw new CacheIOError(this.directory, `Cannot remove cache directory ${this.directory}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
