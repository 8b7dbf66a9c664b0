// Error types shared across the viewer

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * A page number outside [100, 899] (or not a number at all).
 */
export class InvalidPageNumberError extends Error {
  constructor(public readonly value: number | string) {
    super(`Invalid page number: ${value} (pages run from 100 to 899)`);
    this.name = 'InvalidPageNumberError';
  }
}

export type FetchErrorKind = 'timeout' | 'network' | 'http-status' | 'decode';

/**
 * Failure to retrieve a page image. Returned as a value by the fetcher,
 * never thrown past the redraw boundary.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }

  get isNotFound(): boolean {
    return this.kind === 'http-status' && this.status === 404;
  }
}

/**
 * The service answered, but the payload is not a decodable PNG.
 */
export class DecodeError extends FetchError {
  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, 'decode', url, undefined, options);
    this.name = 'DecodeError';
  }
}

/**
 * The terminal cannot host the viewer at all (no TTY, no raw mode).
 * The only fatal error; reported on stderr with exit code 1.
 */
export class TerminalCapabilityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalCapabilityError';
  }
}

/**
 * Invalid command line flag or value, or a log file that cannot be created.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
