// Teletext page addressing: a 3-digit page plus an optional sub-page

import { InvalidPageNumberError } from '../errors.ts';

export const MIN_PAGE = 100;
export const MAX_PAGE = 899;

// The page every session starts on (the service's index page)
export const HOME_PAGE = 100;

/**
 * One renderable unit of the service. Sub-page 1 is the service's default
 * part and is stored as absent, so both spellings map to one address.
 */
export interface PageAddress {
  readonly page: number;
  readonly subPage?: number;
}

export function isValidPage(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PAGE && value <= MAX_PAGE;
}

/**
 * Build a frozen address. Throws InvalidPageNumberError for pages outside
 * [100, 899] and for sub-pages that are not positive integers.
 */
export function createPageAddress(page: number, subPage?: number): PageAddress {
  if (!isValidPage(page)) {
    throw new InvalidPageNumberError(page);
  }
  if (subPage !== undefined && (!Number.isInteger(subPage) || subPage < 1)) {
    throw new InvalidPageNumberError(`${page}.${subPage}`);
  }
  return Object.freeze(subPage !== undefined && subPage > 1 ? { page, subPage } : { page });
}

/**
 * Sub-page index with the default part made explicit (1).
 */
export function subPageIndex(address: PageAddress): number {
  return address.subPage ?? 1;
}

/**
 * Stable key and display form: "101" or "101.2"
 */
export function formatPageAddress(address: PageAddress): string {
  return address.subPage !== undefined ? `${address.page}.${address.subPage}` : String(address.page);
}

export function sameAddress(a: PageAddress, b: PageAddress): boolean {
  return a.page === b.page && subPageIndex(a) === subPageIndex(b);
}
