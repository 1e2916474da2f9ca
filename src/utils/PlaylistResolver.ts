import * as path from 'path';
import { ManifestError } from '../errors/index.js';
import type { ResolvedStream, StreamResolver, Variant, VariantStream } from '../types/index.js';
import type { HttpTransport } from './HttpTransport.js';
import { isMasterPlaylist, parseMasterPlaylist } from './M3U8Parser.js';
import { resolveReference } from './SegmentPlanner.js';

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) return value;
    throw error;
  }
}

function formatMbps(bandwidth: number): string {
  return (Math.round(bandwidth / 100_000) / 10).toFixed(1);
}

export function toVariant(stream: VariantStream, manifestUrl: string): Variant {
  const bandwidth = stream.bandwidth ?? 0;
  const url = resolveReference(stream.uri, manifestUrl);

  if (stream.resolution) {
    const { width, height } = stream.resolution;
    const quality = `${height}p`;
    return {
      quality,
      label: `${width}x${height} (${quality}) - ${formatMbps(bandwidth)} Mbps`,
      url,
      bandwidth,
      resolution: stream.resolution,
    };
  }

  const quality = `${formatMbps(bandwidth)}M`;
  return { quality, label: quality, url, bandwidth };
}

/**
 * Variants of a playlist, highest bandwidth first. Equal bandwidths keep playlist order.
 * A media playlist is its own single `default` variant.
 */
export function listVariantsFromText(content: string, manifestUrl: string): Variant[] {
  if (!isMasterPlaylist(content)) {
    return [{ quality: 'default', label: 'Default quality', url: manifestUrl, bandwidth: 0 }];
  }

  return parseMasterPlaylist(content)
    .map(stream => toVariant(stream, manifestUrl))
    .sort((a, b) => b.bandwidth - a.bandwidth);
}

/**
 * Pick the first variant whose quality contains `quality` (case-insensitive),
 * or the best one when no preference is given.
 */
export function selectVariant(variants: readonly Variant[], quality?: string): Variant | undefined {
  if (!quality) {
    return variants[0];
  }
  const wanted = quality.toLowerCase();
  return variants.find(variant => variant.quality.toLowerCase().includes(wanted));
}

/**
 * Strip characters that are invalid in file names and force an `.mp4` extension.
 */
export function sanitizeFileName(name: string): string {
  const safe = name.replace(/[<>:"/\\|?*]/g, '').trim();
  const base = safe.length > 0 ? safe : 'video';
  return base.toLowerCase().endsWith('.mp4') ? base : `${base}.mp4`;
}

/**
 * StreamResolver for URLs that already point at an HLS playlist. Site-specific resolvers
 * that scrape pages implement the same interface elsewhere.
 */
export class PlaylistResolver implements StreamResolver {
  private transport: Pick<HttpTransport, 'fetchText'>;

  constructor(transport: Pick<HttpTransport, 'fetchText'>) {
    this.transport = transport;
  }

  public async resolve(pageUrl: string): Promise<ResolvedStream> {
    if (!URL.canParse(pageUrl)) {
      throw new ManifestError(`Invalid playlist URL: ${pageUrl}`);
    }
    const { pathname } = new URL(pageUrl);
    const segments = pathname.split('/').filter(part => part.length > 0);
    const file = segments.pop() ?? '';
    const stem = path.posix.basename(file, path.posix.extname(file));
    // index.m3u8 / playlist.m3u8 say nothing; the parent directory usually names the stream
    const title = ['index', 'playlist', 'master', ''].includes(stem.toLowerCase()) ? (segments.pop() ?? 'video') : stem;
    return { manifestUrl: pageUrl, title: safeDecode(title) };
  }

  public async listVariants(manifestUrl: string): Promise<Variant[]> {
    const content = await this.transport.fetchText(manifestUrl);
    return listVariantsFromText(content, manifestUrl);
  }
}
