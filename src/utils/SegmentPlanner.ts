import { ManifestError } from '../errors/index.js';
import type { SegmentDescriptor, StreamDescriptor } from '../types/index.js';
import { isMasterPlaylist, parseMasterPlaylist, parseMediaPlaylist } from './M3U8Parser.js';

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function parseUrl(manifestUrl: string): URL {
  try {
    return new URL(manifestUrl);
  } catch (error) {
    throw new ManifestError(`Invalid manifest URL: ${manifestUrl}`, { cause: error });
  }
}

/**
 * Manifest URL with query, fragment and last path component removed, no trailing slash.
 */
export function manifestBaseUrl(manifestUrl: string): string {
  const url = parseUrl(manifestUrl);
  const dir = url.pathname.substring(0, url.pathname.lastIndexOf('/'));
  return `${url.origin}${dir}`;
}

export function describeStream(manifestUrl: string): StreamDescriptor {
  return Object.freeze({ manifestUrl, baseUrl: manifestBaseUrl(manifestUrl) });
}

/**
 * Resolve a playlist reference:
 * absolute URLs are kept, `/path` is resolved against the manifest host only and
 * anything else against the manifest's directory.
 */
export function resolveReference(uri: string, manifestUrl: string): string {
  if (ABSOLUTE_URL.test(uri)) {
    return uri;
  }

  const manifest = parseUrl(manifestUrl);
  if (uri.startsWith('//')) {
    return new URL(`${manifest.protocol}${uri}`).toString();
  }
  if (uri.startsWith('/')) {
    return new URL(uri, manifest.origin).toString();
  }
  return new URL(uri, `${manifestBaseUrl(manifestUrl)}/`).toString();
}

export class SegmentPlanner {
  /**
   * Ordered segment descriptors for a media playlist. Index order is merge order.
   */
  public plan(manifestText: string, manifestUrl: string): SegmentDescriptor[] {
    if (isMasterPlaylist(manifestText)) {
      const variantCount = parseMasterPlaylist(manifestText).length;
      throw new ManifestError(
        `Expected a media playlist but got a master playlist with ${variantCount} variants: ${manifestUrl}`
      );
    }

    const segments = parseMediaPlaylist(manifestText);
    if (segments.length === 0) {
      throw new ManifestError(`No segments found in playlist: ${manifestUrl}`);
    }

    return segments.map((segment, index) =>
      Object.freeze({
        index,
        uri: segment.uri,
        resolvedUrl: resolveReference(segment.uri, manifestUrl),
      })
    );
  }
}
