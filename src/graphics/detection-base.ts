// Shared infrastructure for graphics protocol detection modules.
// Provides caching, the terminal query port and capability defaults used by
// sixel, kitty, and iterm2 detection.

import { Env } from '../env.ts';
import { getLogger } from '../logging.ts';
import { stdin, stdout } from '../runtime/mod.ts';

const logger = getLogger('GraphicsDetect');

// tmux exports TMUX, GNU screen exports STY
const MULTIPLEXER_VARS = ['TMUX', 'STY'];
const SSH_VARS = ['SSH_CLIENT', 'SSH_CONNECTION', 'SSH_TTY'];

function firstSetVar(names: readonly string[]): string | undefined {
  return names.find((name) => Env.get(name));
}

/**
 * Inside tmux or screen graphics escapes need passthrough, which the
 * kitty and sixel paths do not do.
 */
export function isInMultiplexer(): boolean {
  const variable = firstSetVar(MULTIPLEXER_VARS) ?? (Env.get('TERM_PROGRAM') === 'tmux' ? 'TERM_PROGRAM' : undefined);
  if (variable !== undefined) {
    logger.debug('Running under a multiplexer', { variable });
  }
  return variable !== undefined;
}

export function isRemoteSession(): boolean {
  const variable = firstSetVar(SSH_VARS);
  if (variable !== undefined) {
    logger.debug('Running over SSH', { variable });
  }
  return variable !== undefined;
}

/**
 * Base interface for all graphics capabilities types.
 * Each protocol extends this with protocol-specific fields.
 */
export interface BaseCapabilities {
  supported: boolean;
  inMultiplexer: boolean;
  isRemote: boolean;
  detectionMethod: string;
}

/**
 * Write-then-read access to the terminal for capability queries.
 * Tests substitute a scripted implementation.
 */
export interface TerminalQuery {
  /** Whether queries can be answered at all (stdin and stdout are TTYs) */
  isTerminal(): boolean;
  /**
   * Write `request` and collect the reply until `isComplete` accepts the
   * accumulated text. Resolves null on timeout.
   */
  query(request: string, isComplete: (buffer: string) => boolean, timeoutMs: number): Promise<string | null>;
}

/**
 * Shared detection module providing the per-session capability cache.
 * Each protocol creates an instance and delegates boilerplate to it.
 */
export class DetectionModule<T extends BaseCapabilities> {
  private _cache: T | null = null;

  constructor(private _defaultCaps: T) {}

  getCached(): T | null {
    return this._cache;
  }

  clearCache(): void {
    this._cache = null;
  }

  isAvailable(): boolean {
    return this._cache?.supported ?? false;
  }

  /**
   * Create initial capabilities with multiplexer/remote detection.
   */
  createCapabilities(): T {
    const caps = { ...this._defaultCaps };
    caps.inMultiplexer = isInMultiplexer();
    caps.isRemote = isRemoteSession();
    return caps;
  }

  /**
   * Cache the result and hand it back.
   */
  complete(caps: T): T {
    this._cache = caps;
    return caps;
  }

  /**
   * Shared forceRedetect / cache-check pattern for detectCapabilities().
   */
  async detectCapabilities(forceRedetect: boolean, startFn: () => Promise<T>): Promise<T> {
    if (this._cache && !forceRedetect) {
      return this._cache;
    }
    if (forceRedetect) {
      this.clearCache();
    }
    return this.complete(await startFn());
  }
}

/**
 * Query port backed by the process's stdin/stdout. Expects raw mode to be
 * on already; bytes that arrive during a query are consumed by it.
 */
export function createStdioTerminalQuery(): TerminalQuery {
  const decoder = new TextDecoder();
  const encoder = new TextEncoder();

  return {
    isTerminal(): boolean {
      return stdin.isTerminal() && stdout.isTerminal();
    },

    query(request, isComplete, timeoutMs) {
      return new Promise(resolve => {
        let buffer = '';
        let unsubscribe: () => void = () => {};

        const finish = (result: string | null): void => {
          clearTimeout(timer);
          unsubscribe();
          resolve(result);
        };

        const timer = setTimeout(() => finish(null), timeoutMs);
        unsubscribe = stdin.onData(data => {
          buffer += decoder.decode(data, { stream: true });
          if (isComplete(buffer)) {
            finish(buffer);
          }
        });

        stdout.writeSync(encoder.encode(request));
      });
    },
  };
}

/**
 * Printable form of a terminal reply for log context
 */
export function escapeForLog(response: string): string {
  return response.replace(/\x1b/g, 'ESC');
}
