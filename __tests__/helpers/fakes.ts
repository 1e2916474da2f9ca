/**
 * In-process stand-ins for the network and the muxer, shared by the session tests.
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Writable } from 'stream';
import winston, { type Logger } from 'winston';
import { ManifestError, SegmentFetchError } from '../../src/errors';
import type { HttpTransport } from '../../src/utils/HttpTransport';
import type { Merger, MergeOutcome } from '../../src/utils/FFmpegMerger';
import { createLogger } from '../../src/utils/Logger';

export const MANIFEST_URL = 'https://cdn.example.com/videos/show/index.m3u8';

export const silentLogger = createLogger('test', { level: 'error', silent: true });

/**
 * Logger that keeps `<level>: <message>` lines in memory.
 */
export function capturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString().trim());
      callback();
    },
  });
  const logger = winston.createLogger({
    level: 'debug',
    format: winston.format.printf(({ level, message }) => `${level}: ${message}`),
    transports: [new winston.transports.Stream({ stream })],
  });
  return { logger, lines };
}

export function mediaPlaylist(count: number): string {
  const lines = ['#EXTM3U', '#EXT-X-VERSION:3', '#EXT-X-TARGETDURATION:4', '#EXT-X-MEDIA-SEQUENCE:0'];
  for (let i = 0; i < count; i++) {
    lines.push('#EXTINF:4.000,', `seg${i}.ts`);
  }
  lines.push('#EXT-X-ENDLIST');
  return lines.join('\n');
}

export function segmentUrl(index: number): string {
  return `https://cdn.example.com/videos/show/seg${index}.ts`;
}

export function segmentBody(index: number): Buffer {
  return Buffer.from(`<segment ${index}>`);
}

export function indexFromUrl(url: string): number {
  const match = url.match(/seg(\d+)\.ts$/);
  if (!match) {
    throw new Error(`Not a segment URL: ${url}`);
  }
  return Number(match[1]);
}

/** Number = HTTP status to fail with, Error = transport failure. */
export type FakeResponse = Buffer | number | Error;

export interface FakeTransportOptions {
  respond?: (index: number, attempt: number) => FakeResponse;
  delayMs?: (index: number) => number;
}

export class FakeTransport implements HttpTransport {
  public readonly segmentRequests: string[] = [];
  public readonly playlistRequests: string[] = [];
  private playlists: Map<string, string>;
  private respond: (index: number, attempt: number) => FakeResponse;
  private delayMs: (index: number) => number;

  constructor(playlists: Record<string, string>, options: FakeTransportOptions = {}) {
    this.playlists = new Map(Object.entries(playlists));
    this.respond = options.respond ?? (index => segmentBody(index));
    this.delayMs = options.delayMs ?? (() => 0);
  }

  public async fetchText(url: string): Promise<string> {
    this.playlistRequests.push(url);
    const content = this.playlists.get(url);
    if (content === undefined) {
      throw new ManifestError(`Failed to fetch playlist ${url} (HTTP 404)`);
    }
    return content;
  }

  public async fetchSegment(url: string): Promise<Buffer> {
    this.segmentRequests.push(url);
    const index = indexFromUrl(url);
    const attempt = this.requestsFor(index);

    const delay = this.delayMs(index);
    await new Promise<void>(resolve => (delay > 0 ? setTimeout(resolve, delay) : setImmediate(resolve)));

    const outcome = this.respond(index, attempt);
    if (typeof outcome === 'number') {
      throw new SegmentFetchError(url, `HTTP ${outcome}`, { status: outcome });
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  public requestsFor(index: number): number {
    return this.segmentRequests.filter(url => indexFromUrl(url) === index).length;
  }

  public requestedIndices(): number[] {
    return [...new Set(this.segmentRequests.map(indexFromUrl))].sort((a, b) => a - b);
  }
}

/**
 * Concatenates the segment files itself, in the order it was given them.
 */
export class RecordingMerger implements Merger {
  public readonly calls: Array<{ orderedPaths: string[]; destPath: string }> = [];
  private failure?: Error;

  constructor(failure?: Error) {
    this.failure = failure;
  }

  public async merge(orderedPaths: readonly string[], destPath: string): Promise<MergeOutcome> {
    this.calls.push({ orderedPaths: [...orderedPaths], destPath });
    if (this.failure) {
      throw this.failure;
    }
    const data = Buffer.concat(await Promise.all(orderedPaths.map(file => fs.readFile(file))));
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.writeFile(destPath, data);
    return { fileSize: data.length };
  }
}

export async function makeTempDir(prefix = 'hlsfetch-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function listSegmentFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir);
  return entries.filter(name => /^segment_\d{5}\.ts$/.test(name)).sort();
}
