/**
 * Runtime-agnostic process utilities.
 * Wraps process.argv, process.exit and process.version.
 */

import process from 'node:process';

export function args(): string[] {
  return process.argv.slice(2);
}

export function exit(code?: number): never {
  process.exit(code);
}

export function runtimeVersion(): string {
  return process.versions.node;
}

export function runtimeName(): string {
  return 'node';
}

/**
 * Listen for uncaught exceptions and unhandled rejections.
 * Returns a function that removes the listeners.
 */
export function onUncaughtError(handler: (kind: 'exception' | 'rejection', reason: unknown) => void): () => void {
  const onException = (error: Error) => handler('exception', error);
  const onRejection = (reason: unknown) => handler('rejection', reason);
  process.on('uncaughtException', onException);
  process.on('unhandledRejection', onRejection);
  return () => {
    process.off('uncaughtException', onException);
    process.off('unhandledRejection', onRejection);
  };
}
