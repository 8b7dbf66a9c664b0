// In-memory page image cache with lazy time-to-live expiry

import { getLogger } from '../logging.ts';
import type { PixelGrid } from '../image/pixel-grid.ts';
import { formatPageAddress, type PageAddress } from './page-address.ts';

const logger = getLogger('PageCache');

export const PAGE_CACHE_TTL_MS = 5 * 60 * 1000;

export interface CacheEntry {
  readonly address: PageAddress;
  readonly image: PixelGrid;
  readonly fetchedAt: number;
}

export interface PageCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Maps page addresses to decoded images. Entries are never swept in the
 * background: an entry older than the TTL reads as a miss and is dropped
 * at that point.
 */
export class PageCache {
  private readonly _entries = new Map<string, CacheEntry>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(options: PageCacheOptions = {}) {
    this._ttlMs = options.ttlMs ?? PAGE_CACHE_TTL_MS;
    this._now = options.now ?? Date.now;
  }

  /**
   * Cached image for `address`, or undefined on a miss (absent or expired).
   */
  get(address: PageAddress): PixelGrid | undefined {
    const key = formatPageAddress(address);
    const entry = this._entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this._now() - entry.fetchedAt >= this._ttlMs) {
      logger.debug('Cache entry expired', { page: key });
      this._entries.delete(key);
      return undefined;
    }
    return entry.image;
  }

  /**
   * Insert or replace the entry for `address`, stamped with the current time.
   */
  put(address: PageAddress, image: PixelGrid): void {
    const key = formatPageAddress(address);
    this._entries.set(key, Object.freeze({ address, image, fetchedAt: this._now() }));
  }

  clear(): void {
    logger.info('Cache cleared', { entries: this._entries.size });
    this._entries.clear();
  }

  get size(): number {
    return this._entries.size;
  }
}
