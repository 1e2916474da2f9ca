import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { MergeError, errorMessage } from '../errors/index.js';
import { CONCAT_LIST_NAME } from './CacheStore.js';

export interface MergeOutcome {
  fileSize: number;
}

/**
 * Joins already-ordered segment files into one container.
 */
export interface Merger {
  merge(orderedPaths: readonly string[], destPath: string): Promise<MergeOutcome>;
}

function quoteConcatPath(file: string): string {
  return `'${file.replace(/'/g, "'\\''")}'`;
}

/**
 * ffmpeg concat-demuxer list: one `file '<path>'` line per segment, in the given order.
 */
export function buildConcatList(orderedPaths: readonly string[]): string {
  return orderedPaths.map(file => `file ${quoteConcatPath(path.resolve(file))}\n`).join('');
}

export function ffmpegConcatArgs(listPath: string, destPath: string): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'warning',
    '-stats',
    '-f', 'concat',
    '-safe', '0',
    '-i', listPath,
    '-c', 'copy',
    '-bsf:a', 'aac_adtstoasc',
    '-y',
    destPath,
  ];
}

export class FFmpegMerger implements Merger {
  private ffmpegPath: string;
  private logger?: Logger;

  constructor(ffmpegPath: string = 'ffmpeg', logger?: Logger) {
    this.ffmpegPath = ffmpegPath;
    this.logger = logger;
  }

  /**
   * Stream-copy concatenation. Succeeds only on exit code 0 with a non-empty output file.
   * The list file is written beside the first segment and removed afterwards.
   */
  public async merge(orderedPaths: readonly string[], destPath: string): Promise<MergeOutcome> {
    if (orderedPaths.length === 0) {
      throw new MergeError('No segments to merge');
    }

    const listPath = path.join(path.dirname(orderedPaths[0]), CONCAT_LIST_NAME);
    try {
      await fs.mkdir(path.dirname(path.resolve(destPath)), { recursive: true });
      await fs.writeFile(listPath, buildConcatList(orderedPaths));
    } catch (error) {
      throw new MergeError(`Cannot prepare merge: ${errorMessage(error)}`, { cause: error });
    }

    this.logger?.info(`Merging ${orderedPaths.length} segments into ${destPath}`);
    try {
      const exitCode = await this.runFFmpeg(ffmpegConcatArgs(listPath, destPath));
      if (exitCode !== 0) {
        throw new MergeError(`Merge failed (ffmpeg exit code: ${exitCode})`, { exitCode });
      }

      const fileSize = await this.outputSize(destPath);
      if (fileSize === 0) {
        throw new MergeError(`Merge failed: ${destPath} is empty or missing`, { exitCode });
      }
      return { fileSize };
    } finally {
      await fs.rm(listPath, { force: true });
    }
  }

  private async outputSize(destPath: string): Promise<number> {
    try {
      return (await fs.stat(destPath)).size;
    } catch (error) {
      this.logger?.debug(`Cannot stat merge output ${destPath}: ${errorMessage(error)}`);
      return 0;
    }
  }

  private runFFmpeg(args: string[]): Promise<number | null> {
    return new Promise((resolve, reject) => {
      const ffmpeg = spawn(this.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });

      ffmpeg.stderr.on('data', (data: Buffer) => {
        const output = data.toString().trim();
        if (output.length === 0) return;
        if (/error/i.test(output)) {
          this.logger?.error(`FFmpeg: ${output}`);
        } else {
          this.logger?.debug(`FFmpeg: ${output}`);
        }
      });

      ffmpeg.on('close', code => resolve(code));

      ffmpeg.on('error', error => {
        reject(new MergeError(`Cannot run ${this.ffmpegPath}: ${error.message}`, { cause: error }));
      });
    });
  }
}
