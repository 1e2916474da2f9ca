import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { ManifestError, SegmentFetchError, errorMessage } from '../errors/index.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36';

/**
 * Network side of a download: playlist text and raw segment bytes.
 */
export interface HttpTransport {
  fetchText(url: string): Promise<string>;
  fetchSegment(url: string, timeout: number): Promise<Buffer>;
}

/**
 * Browser-like headers; `Referer` and `Origin` point at the playlist host unless the
 * caller overrides them.
 */
export function defaultHeadersFor(manifestUrl: string, overrides: Record<string, string> = {}): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': USER_AGENT,
    Accept: '*/*',
    'Accept-Language': 'en-US,en;q=0.9',
  };

  if (URL.canParse(manifestUrl)) {
    const { origin } = new URL(manifestUrl);
    headers['Referer'] = `${origin}/`;
    headers['Origin'] = origin;
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value) {
      headers[key] = value;
    }
  }
  return headers;
}

// axios' own timeout only covers idle sockets; the signal is the deadline for the whole request
function failureMessage(error: unknown, signal: AbortSignal, timeout: number): string {
  return signal.aborted ? `timeout of ${timeout}ms exceeded` : errorMessage(error);
}

export interface AxiosTransportOptions {
  headers?: Record<string, string>;
  timeout?: number;
  client?: AxiosInstance;
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;
  private headers: Record<string, string>;
  private timeout: number;

  constructor(options: AxiosTransportOptions = {}) {
    this.client = options.client ?? axios.create({ maxRedirects: 5 });
    this.headers = options.headers ?? {};
    this.timeout = options.timeout ?? 30000;
  }

  public async fetchText(url: string): Promise<string> {
    const signal = AbortSignal.timeout(this.timeout);
    let response: AxiosResponse<string>;
    try {
      response = await this.client.get<string>(url, {
        responseType: 'text',
        timeout: this.timeout,
        signal,
        headers: this.headers,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new ManifestError(`Failed to fetch playlist ${url}: ${failureMessage(error, signal, this.timeout)}`, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      throw new ManifestError(`Failed to fetch playlist ${url} (HTTP ${response.status})`);
    }
    return typeof response.data === 'string' ? response.data : String(response.data);
  }

  /**
   * One GET attempt. Anything but HTTP 200 with a body is a `SegmentFetchError`.
   * `timeout` bounds the whole attempt, body included.
   */
  public async fetchSegment(url: string, timeout: number): Promise<Buffer> {
    const signal = AbortSignal.timeout(timeout);
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout,
        signal,
        headers: this.headers,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new SegmentFetchError(url, failureMessage(error, signal, timeout), { cause: error });
    }

    if (response.status !== 200) {
      throw new SegmentFetchError(url, `HTTP ${response.status}`, { status: response.status });
    }

    const body = Buffer.from(response.data);
    if (body.length === 0) {
      throw new SegmentFetchError(url, 'Empty response body', { status: response.status });
    }
    return body;
  }
}
