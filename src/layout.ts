// Fixed screen layout: header row, image viewport, footer row

import { cursorTo, styledText, type Rgb } from './ansi-output.ts';
import type { Rect } from './geometry.ts';
import type { NavigationState } from './navigation.ts';
import { formatPageAddress, type PageAddress } from './teletext/page-address.ts';

export interface ScreenLayout {
  header: Rect;
  viewport: Rect;
  footer: Rect;
}

export const BAR_FOREGROUND: Rgb = { r: 255, g: 255, b: 255 };
export const BAR_BACKGROUND: Rgb = { r: 0, g: 0, b: 128 };

export const HELP_LINE = '  [←/→] Page  [↑/↓] Sub-page  [0-9] Jump to page  [c] Clear cache  [q] Quit';

/**
 * Split the terminal into its three regions. Terminals shorter than three
 * rows get an empty viewport; header and footer keep row 0 and the last row.
 */
export function computeLayout(columns: number, rows: number): ScreenLayout {
  const width = Math.max(0, columns);
  const height = Math.max(0, rows);
  return {
    header: { x: 0, y: 0, width, height: height >= 1 ? 1 : 0 },
    viewport: { x: 0, y: 1, width, height: Math.max(0, height - 2) },
    footer: { x: 0, y: Math.max(0, height - 1), width, height: height >= 2 ? 1 : 0 },
  };
}

/**
 * Pad or truncate to exactly `width` characters
 */
export function fitText(text: string, width: number): string {
  if (width <= 0) return '';
  return text.length >= width ? text.slice(0, width) : text + ' '.repeat(width - text.length);
}

export interface HeaderStatus {
  loading: boolean;
  error?: string;
}

/**
 * "  TELEVIDEO - Page 101.2" on the left; the error or loading indicator
 * right-aligned. The right part wins when the row is too narrow.
 */
export function formatHeader(address: PageAddress, status: HeaderStatus, width: number): string {
  const left = `  TELEVIDEO - Page ${formatPageAddress(address)}`;
  const right = status.error !== undefined
    ? `ERROR: ${status.error}  `
    : status.loading ? 'Loading...  ' : '';

  if (right.length >= width) {
    return fitText(right, width);
  }
  return fitText(left, width - right.length) + right;
}

export interface FooterStatus {
  /** Message of the last failed resolve, shown as "fetch failed: <cause>" */
  fetchError?: string;
  /** Transient notice such as "Cache cleared!" */
  info?: string;
}

/**
 * Footer text, first match wins: page entry, input error, fetch failure,
 * notice, key help.
 */
export function formatFooter(state: NavigationState, status: FooterStatus, width: number): string {
  let text: string;
  if (state.pendingDigits !== '') {
    text = `  Go to page: ${state.pendingDigits}_`;
  } else if (state.lastError !== undefined) {
    text = `  ${state.lastError}`;
  } else if (status.fetchError !== undefined) {
    text = `  fetch failed: ${status.fetchError}`;
  } else if (status.info !== undefined) {
    text = `  ${status.info}`;
  } else {
    text = HELP_LINE;
  }
  return fitText(text, width);
}

/**
 * Paint one bar row, white on navy, across the full rect width
 */
export function renderBar(rect: Rect, text: string): string {
  if (rect.width <= 0 || rect.height <= 0) {
    return '';
  }
  return cursorTo(rect.x, rect.y) + styledText(fitText(text, rect.width), BAR_FOREGROUND, BAR_BACKGROUND);
}
