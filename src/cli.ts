/**
 * CLI interface for hlsfetch
 */

import { Command } from 'commander';
import * as path from 'path';
import { resolveConfig } from './config/index.js';
import { DownloadSession, type DownloadResult } from './DownloadSession.js';
import { MergeError, errorMessage } from './errors/index.js';
import type { DownloadConfig, Variant } from './types/index.js';
import { AxiosTransport, defaultHeadersFor } from './utils/HttpTransport.js';
import { createLogger } from './utils/Logger.js';
import { PlaylistResolver, sanitizeFileName, selectVariant } from './utils/PlaylistResolver.js';
import { ProgressDisplay } from './utils/ProgressDisplay.js';

const MAX_ERRORS_SHOWN = 10;

interface DownloadCommandOptions {
  output: string;
  name?: string;
  quality?: string;
  workers?: string;
  timeout?: string;
  retries?: string;
  retryDelay?: string;
  cacheDir?: string;
  ffmpeg?: string;
  header: string[];
  verbose?: boolean;
}

interface VariantsCommandOptions {
  json?: boolean;
  header: string[];
}

function collectHeader(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseHeaders(values: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf(':');
    if (separator <= 0) {
      throw new Error(`Invalid header "${value}", expected "Name: value"`);
    }
    headers[value.slice(0, separator).trim()] = value.slice(separator + 1).trim();
  }
  return headers;
}

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseInt(value, 10);
}

function printVariants(variants: readonly Variant[]): void {
  variants.forEach((variant, i) => console.log(`[${i + 1}] ${variant.label}`));
}

/**
 * Lines printed after an unsuccessful run. Every failure that leaves segments on disk
 * (cancellation, failed or missing segments, a failed merge) ends with the resume hint.
 */
export function failureReport(result: DownloadResult, cacheDirectory: string): string[] {
  const { errors, failedSegments } = result.snapshot;
  const lines: string[] = [];

  if (failedSegments > 0) {
    lines.push(`Failed to download ${failedSegments} segments`);
  }
  if (errors.length > 0) {
    lines.push(`Error details (showing first ${MAX_ERRORS_SHOWN}):`);
    for (const error of errors.slice(0, MAX_ERRORS_SHOWN)) {
      lines.push(`  • ${error}`);
    }
    if (errors.length > MAX_ERRORS_SHOWN) {
      lines.push(`  ... and ${errors.length - MAX_ERRORS_SHOWN} more errors`);
    }
  }
  if (result.error === undefined || result.error instanceof MergeError) {
    lines.push(`Cache preserved at ${cacheDirectory} - run again to resume`);
  }
  return lines;
}

export const program = new Command();

program
  .name('hlsfetch')
  .description('Download HLS/M3U8 streams with resumable, concurrent segment fetching')
  .version('1.0.0');

program
  .command('download <url>')
  .description('Download an HLS playlist (master or media) to a single MP4 file')
  .option('-o, --output <dir>', 'Output directory', './')
  .option('-n, --name <filename>', 'Output filename (defaults to the stream title)')
  .option('-q, --quality <quality>', 'Preferred quality, e.g. 1080p or 720p (defaults to the highest)')
  .option('-w, --workers <number>', 'Concurrent segment downloads (1-32)')
  .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds')
  .option('-r, --retries <number>', 'Attempts per segment')
  .option('--retry-delay <ms>', 'Delay between attempts in milliseconds')
  .option('--cache-dir <dir>', 'Segment cache root')
  .option('--ffmpeg <path>', 'Path to the ffmpeg binary')
  .option('-H, --header <header>', 'Extra request header "Name: value" (repeatable)', collectHeader, [])
  .option('-v, --verbose', 'Log debug output')
  .action(async (url: string, options: DownloadCommandOptions) => {
    const logger = createLogger('hlsfetch', { level: options.verbose ? 'debug' : 'info' });

    try {
      const overrides: DownloadConfig = {
        maxWorkers: optionalInt(options.workers),
        timeout: optionalInt(options.timeout),
        retries: optionalInt(options.retries),
        retryDelay: optionalInt(options.retryDelay),
        cacheDir: options.cacheDir,
        ffmpegPath: options.ffmpeg,
        headers: parseHeaders(options.header),
        logLevel: options.verbose ? 'debug' : undefined,
      };
      const config = resolveConfig(overrides);

      const transport = new AxiosTransport({
        headers: defaultHeadersFor(url, config.headers),
        timeout: config.timeout,
      });
      const resolver = new PlaylistResolver(transport);
      const { title } = await resolver.resolve(url);
      const variants = await resolver.listVariants(url);

      const selected = selectVariant(variants, options.quality);
      if (!selected) {
        console.error(`Quality '${options.quality}' not found. Available:`);
        printVariants(variants);
        process.exit(1);
      }

      console.log(`Selected: ${selected.label}`);
      console.log(`M3U8 URL: ${selected.url}`);

      const outputPath = path.join(options.output, sanitizeFileName(options.name ?? title));
      const display = new ProgressDisplay();
      const session = new DownloadSession({
        manifestUrl: selected.url,
        outputPath,
        config,
        transport,
        onProgress: display.sink,
        logger,
      });

      const onSigint = (): void => {
        display.stop();
        console.log('\nDownload cancelled, finishing in-flight requests...');
        session.cancel();
      };
      process.once('SIGINT', onSigint);

      const result = await session.run().finally(() => {
        process.removeListener('SIGINT', onSigint);
        display.stop();
      });

      if (result.success) {
        console.log(`Download completed: ${result.outputPath}`);
        process.exit(0);
      }

      console.error('');
      for (const line of failureReport(result, session.cacheDirectory)) {
        console.error(line);
      }
      process.exit(1);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('variants <url>')
  .description('List the quality variants of a playlist, best first')
  .option('--json', 'Print variants as JSON')
  .option('-H, --header <header>', 'Extra request header "Name: value" (repeatable)', collectHeader, [])
  .action(async (url: string, options: VariantsCommandOptions) => {
    try {
      const transport = new AxiosTransport({ headers: defaultHeadersFor(url, parseHeaders(options.header)) });
      const resolver = new PlaylistResolver(transport);
      const { title } = await resolver.resolve(url);
      const variants = await resolver.listVariants(url);

      if (options.json) {
        console.log(JSON.stringify({ title, manifestUrl: url, variants }, null, 2));
      } else {
        console.log(`Available variants for ${title}:`);
        printVariants(variants);
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
