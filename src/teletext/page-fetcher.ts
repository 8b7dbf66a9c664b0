// Page image retrieval from the Televideo image service

import { DecodeError, FetchError, ensureError } from '../errors.ts';
import { decodePngToGrid } from '../image/png.ts';
import type { PixelGrid } from '../image/pixel-grid.ts';
import { getLogger } from '../logging.ts';
import { formatPageAddress, type PageAddress } from './page-address.ts';

const logger = getLogger('PageFetcher');

export const DEFAULT_BASE_URL = 'http://www.televideo.rai.it/televideo/pub/tt4web/Nazionale';
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/**
 * The subset of the global fetch the fetcher needs; tests pass a fake.
 */
export type HttpTransport = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export type FetchResult =
  | { ok: true; image: PixelGrid }
  | { ok: false; error: FetchError };

export interface PageFetcherOptions {
  baseUrl?: string;
  timeoutMs?: number;
  transport?: HttpTransport;
}

/**
 * Image locator for a page: `<base>/16_9_page-101.png`, or
 * `<base>/16_9_page-101.2.png` for the second part.
 */
export function pageImageUrl(address: PageAddress, baseUrl: string = DEFAULT_BASE_URL): string {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  return `${base}/16_9_page-${formatPageAddress(address)}.png`;
}

function isTimeout(error: Error): boolean {
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

// Node's fetch rejects with TypeError('fetch failed'); the reason is in `cause`
function networkReason(error: Error): string {
  return error.cause instanceof Error ? error.cause.message : error.message;
}

export class PageFetcher {
  private readonly _baseUrl: string;
  private readonly _timeoutMs: number;
  private readonly _transport: HttpTransport;

  constructor(options: PageFetcherOptions = {}) {
    this._baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this._timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this._transport = options.transport ?? ((url, init) => fetch(url, init));
  }

  get baseUrl(): string {
    return this._baseUrl;
  }

  /**
   * Retrieve and decode one page image. Never throws: every failure comes
   * back as a FetchError value. No retry.
   */
  async fetch(address: PageAddress): Promise<FetchResult> {
    const url = pageImageUrl(address, this._baseUrl);
    const started = Date.now();
    logger.debug('Fetching page', { page: formatPageAddress(address), url });

    let bytes: Uint8Array;
    try {
      const response = await this._transport(url, { signal: AbortSignal.timeout(this._timeoutMs) });
      if (!response.ok) {
        const error = new FetchError(
          `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
          'http-status',
          url,
          response.status,
        );
        logger.warn('Page request rejected', { url, status: response.status });
        await response.body?.cancel();
        return { ok: false, error };
      }
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (thrown) {
      const cause = ensureError(thrown);
      const error = isTimeout(cause)
        ? new FetchError(`timed out after ${this._timeoutMs}ms`, 'timeout', url, undefined, { cause })
        : new FetchError(networkReason(cause), 'network', url, undefined, { cause });
      logger.error('Page request failed', cause, { url, kind: error.kind });
      return { ok: false, error };
    }

    try {
      const image = decodePngToGrid(bytes);
      logger.debug('Page decoded', {
        url,
        width: image.width,
        height: image.height,
        bytes: bytes.length,
        elapsedMs: Date.now() - started,
      });
      return { ok: true, image };
    } catch (thrown) {
      const cause = ensureError(thrown);
      logger.error('Page image could not be decoded', cause, { url, bytes: bytes.length });
      return { ok: false, error: new DecodeError(`invalid image: ${cause.message}`, url, { cause }) };
    }
  }
}
