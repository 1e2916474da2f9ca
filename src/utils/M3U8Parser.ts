import type { MediaSegment, Resolution, VariantStream } from '../types/index.js';

const STREAM_INF_TAG = '#EXT-X-STREAM-INF:';
const EXTINF_TAG = '#EXTINF:';

function toLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Split an attribute list on commas that are not inside a quoted string
 * (CODECS="avc1.4d401f,mp4a.40.2" is one attribute).
 */
function parseAttributes(raw: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  let current = '';
  let inQuotes = false;
  const parts: string[] = [];

  for (const ch of raw) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === ',' && !inQuotes) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.length > 0) {
    parts.push(current);
  }

  for (const part of parts) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    let value = part.slice(eq + 1).trim();
    if (value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    attrs[part.slice(0, eq).trim()] = value;
  }
  return attrs;
}

function parseResolution(value: string | undefined): Resolution | undefined {
  const match = value?.match(/^(\d+)x(\d+)$/i);
  return match ? { width: Number(match[1]), height: Number(match[2]) } : undefined;
}

function extractDuration(line: string): number | undefined {
  const match = line.match(/^#EXTINF:([\d.]+)/);
  return match ? parseFloat(match[1]) : undefined;
}

export function isMasterPlaylist(content: string): boolean {
  return toLines(content).some(line => line.startsWith(STREAM_INF_TAG));
}

/**
 * Segment URIs of a media playlist in playlist order. A URI line without a preceding
 * `#EXTINF` is still a segment.
 */
export function parseMediaPlaylist(content: string): MediaSegment[] {
  const segments: MediaSegment[] = [];
  let pendingDuration: number | undefined;

  for (const line of toLines(content)) {
    if (line.startsWith(EXTINF_TAG)) {
      pendingDuration = extractDuration(line);
      continue;
    }
    if (line.startsWith('#')) continue;

    segments.push(pendingDuration === undefined ? { uri: line } : { uri: line, duration: pendingDuration });
    pendingDuration = undefined;
  }

  return segments;
}

/**
 * Variant streams of a master playlist in playlist order. URIs are returned as written.
 */
export function parseMasterPlaylist(content: string): VariantStream[] {
  const lines = toLines(content);
  const variants: VariantStream[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.startsWith(STREAM_INF_TAG)) continue;

    const nextLine = lines[i + 1];
    if (!nextLine || nextLine.startsWith('#')) continue;

    const attrs = parseAttributes(line.slice(STREAM_INF_TAG.length));
    const bandwidth = attrs.BANDWIDTH ? parseInt(attrs.BANDWIDTH, 10) : NaN;
    variants.push({
      uri: nextLine,
      bandwidth: Number.isNaN(bandwidth) ? undefined : bandwidth,
      resolution: parseResolution(attrs.RESOLUTION),
      codecs: attrs.CODECS,
    });
    i++;
  }

  return variants;
}
