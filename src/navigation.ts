// Page navigation state machine: keyboard events in, address changes out

import { getLogger } from './logging.ts';
import {
  HOME_PAGE,
  MAX_PAGE,
  MIN_PAGE,
  createPageAddress,
  formatPageAddress,
  isValidPage,
  subPageIndex,
  type PageAddress,
} from './teletext/page-address.ts';

const logger = getLogger('Navigation');

export const MAX_PENDING_DIGITS = 3;
export const INVALID_PAGE_MESSAGE = 'Page must be between 100-899';

export type NavigationEvent =
  | { type: 'digit'; digit: string }
  | { type: 'backspace' }
  | { type: 'escape' }
  | { type: 'enter' }
  | { type: 'left' }
  | { type: 'right' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'clear-cache' }
  | { type: 'quit' };

/**
 * What the frame driver must do after an event:
 * - 'none': nothing beyond redrawing
 * - 'navigate': the current address changed (fetch happens on the next redraw)
 * - 'clear-cache': drop every cached page and refetch the current one
 * - 'quit': leave the loop
 */
export type NavigationEffect = 'none' | 'navigate' | 'clear-cache' | 'quit';

export interface NavigationState {
  readonly currentAddress: PageAddress;
  /** 0-3 digits typed so far */
  readonly pendingDigits: string;
  readonly lastError?: string;
}

export class NavigationController {
  private _current: PageAddress;
  private _pending = '';
  private _lastError: string | undefined;
  // Highest existing part per page, learned from 404s on sub-page fetches
  private readonly _subPageCounts = new Map<number, number>();

  constructor(start: PageAddress = createPageAddress(HOME_PAGE)) {
    this._current = start;
  }

  get state(): NavigationState {
    return {
      currentAddress: this._current,
      pendingDigits: this._pending,
      ...(this._lastError !== undefined ? { lastError: this._lastError } : {}),
    };
  }

  get currentAddress(): PageAddress {
    return this._current;
  }

  /**
   * Record that `address` does not exist, so its page has exactly
   * `subPage - 1` parts and Down stops at the last one.
   */
  noteMissingSubPage(address: PageAddress): void {
    const part = subPageIndex(address);
    if (part <= 1) {
      return;
    }
    const known = this._subPageCounts.get(address.page);
    if (known === undefined || part - 1 < known) {
      this._subPageCounts.set(address.page, part - 1);
      logger.debug('Sub-page count learned', { page: address.page, parts: part - 1 });
    }
  }

  subPageCount(page: number): number | undefined {
    return this._subPageCounts.get(page);
  }

  handle(event: NavigationEvent): NavigationEffect {
    switch (event.type) {
      case 'digit':
        if (!/^[0-9]$/.test(event.digit) || this._pending.length >= MAX_PENDING_DIGITS) {
          return 'none';
        }
        this._pending += event.digit;
        return 'none';

      case 'backspace':
        this._pending = this._pending.slice(0, -1);
        return 'none';

      case 'escape':
        this._pending = '';
        return 'none';

      case 'enter':
        return this._commitPending();

      case 'left':
        return this._goToPage(this._current.page - 1);

      case 'right':
        return this._goToPage(this._current.page + 1);

      case 'up': {
        const part = subPageIndex(this._current);
        if (part <= 1) {
          return 'none';
        }
        return this._setCurrent(createPageAddress(this._current.page, part - 1));
      }

      case 'down': {
        const part = subPageIndex(this._current);
        const count = this._subPageCounts.get(this._current.page);
        if (count !== undefined && part >= count) {
          return 'none';
        }
        return this._setCurrent(createPageAddress(this._current.page, part + 1));
      }

      case 'clear-cache':
        // Sub-pages may have been added since the counts were learned
        this._subPageCounts.clear();
        return 'clear-cache';

      case 'quit':
        return 'quit';
    }
  }

  private _commitPending(): NavigationEffect {
    if (this._pending === '') {
      return 'none';
    }
    const value = parseInt(this._pending, 10);
    this._pending = '';

    if (!isValidPage(value)) {
      this._lastError = INVALID_PAGE_MESSAGE;
      logger.debug('Rejected page number', { value });
      return 'none';
    }

    return this._setCurrent(createPageAddress(value));
  }

  // Left/Right stop at the ends of the page range
  private _goToPage(page: number): NavigationEffect {
    if (page < MIN_PAGE || page > MAX_PAGE) {
      return 'none';
    }
    return this._setCurrent(createPageAddress(page));
  }

  private _setCurrent(address: PageAddress): NavigationEffect {
    logger.debug('Navigate', { from: formatPageAddress(this._current), to: formatPageAddress(address) });
    this._current = address;
    this._lastError = undefined;
    return 'navigate';
  }
}
