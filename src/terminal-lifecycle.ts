// Terminal lifecycle management - setup, cleanup, and signal handling

import { ANSI } from './ansi-output.ts';
import { TerminalCapabilityError, ensureError } from './errors.ts';
import { getLogger } from './logging.ts';
import {
  addSignalListener,
  exit,
  onUncaughtError,
  removeSignalListener,
  stdin,
  stdout,
  type Signal,
} from './runtime/mod.ts';

const logger = getLogger('TerminalLifecycle');

const encoder = new TextEncoder();

export interface TerminalLifecycleOptions {
  alternateScreen: boolean;
  hideCursor: boolean;
}

function write(codes: string): void {
  if (codes.length > 0) {
    stdout.writeSync(encoder.encode(codes));
  }
}

/**
 * Take over the terminal: raw input, alternate screen, hidden cursor.
 * Throws TerminalCapabilityError when stdin/stdout are not TTYs or raw
 * mode cannot be enabled.
 */
export function setupTerminal(options: TerminalLifecycleOptions): void {
  if (!stdin.isTerminal() || !stdout.isTerminal()) {
    throw new TerminalCapabilityError('stdin and stdout must both be terminals');
  }

  try {
    stdin.setRaw(true);
  } catch (error) {
    throw new TerminalCapabilityError('raw mode is not available on this terminal', { cause: ensureError(error) });
  }

  const codes: string[] = [];
  if (options.alternateScreen) {
    codes.push(ANSI.alternateScreen);
  }
  if (options.hideCursor) {
    codes.push(ANSI.hideCursor);
  }
  write(codes.join(''));
  logger.debug('Terminal set up', { ...options });
}

/**
 * Restore normal screen, cursor and cooked input
 */
export function cleanupTerminal(options: TerminalLifecycleOptions): void {
  const codes: string[] = [ANSI.reset];
  if (options.alternateScreen) {
    codes.push(ANSI.normalScreen);
  }
  if (options.hideCursor) {
    codes.push(ANSI.showCursor);
  }
  write(codes.join(''));

  if (stdin.isTerminal()) {
    stdin.setRaw(false);
  }
  logger.debug('Terminal restored');
}

/**
 * Minimal terminal restore for crash scenarios
 */
export function emergencyCleanupTerminal(): void {
  try {
    write(`${ANSI.reset}${ANSI.normalScreen}${ANSI.showCursor}`);
    if (stdin.isTerminal()) {
      stdin.setRaw(false);
    }
  } catch (error) {
    // The process is going down; stderr is all that is left
    console.error('Terminal restore failed:', ensureError(error).message);
  }
}

const SHUTDOWN_SIGNALS: Signal[] = ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'];

export interface CleanupHandlers {
  /** Termination signal received; the loop should quit normally */
  onShutdownSignal: (signal: Signal) => void;
  /** Terminal resized */
  onResize?: () => void;
  /** Restore the terminal before a crash exit */
  onFatal: () => void;
}

/**
 * Install signal and crash handlers. Returns a function that removes them.
 */
export function setupCleanupHandlers(handlers: CleanupHandlers): () => void {
  const signalListeners = SHUTDOWN_SIGNALS.map(signal => {
    const listener = () => {
      logger.info('Signal received', { signal });
      handlers.onShutdownSignal(signal);
    };
    addSignalListener(signal, listener);
    return { signal, listener };
  });

  const resizeListener = () => handlers.onResize?.();
  addSignalListener('SIGWINCH', resizeListener);

  const removeCrashListeners = onUncaughtError((kind, reason) => {
    const error = ensureError(reason);
    const label = kind === 'exception' ? 'Uncaught error' : 'Unhandled promise rejection';
    logger.fatal(label, error);
    handlers.onFatal();
    console.error(`${label}:`, error);
    exit(1);
  });

  return () => {
    for (const { signal, listener } of signalListeners) {
      removeSignalListener(signal, listener);
    }
    removeSignalListener('SIGWINCH', resizeListener);
    removeCrashListeners();
  };
}
