/**
 * Runtime-agnostic terminal I/O and signal handling.
 * Wraps process.stdin, process.stdout, terminal size and signal listeners.
 */

import { writeSync } from 'node:fs';
import process from 'node:process';

export type Signal = 'SIGINT' | 'SIGTERM' | 'SIGHUP' | 'SIGQUIT' | 'SIGWINCH';

export const stdin = {
  setRaw(mode: boolean): void {
    process.stdin.setRawMode(mode);
  },
  isTerminal(): boolean {
    return process.stdin.isTTY === true;
  },
  /**
   * Subscribe to raw input chunks. Returns an unsubscribe function that
   * also pauses the stream so the process can exit.
   */
  onData(handler: (data: Uint8Array) => void): () => void {
    process.stdin.on('data', handler);
    process.stdin.resume();
    return () => {
      process.stdin.off('data', handler);
      process.stdin.pause();
    };
  },
};

export const stdout = {
  writeSync(data: Uint8Array): number {
    const fd = process.stdout.fd;
    let written = 0;
    while (written < data.length) {
      written += writeSync(fd, data, written, data.length - written);
    }
    return written;
  },
  isTerminal(): boolean {
    return process.stdout.isTTY === true;
  },
};

export function consoleSize(): { columns: number; rows: number } | null {
  if (!process.stdout.isTTY) {
    return null;
  }
  const { columns, rows } = process.stdout;
  if (!columns || !rows) {
    return null;
  }
  return { columns, rows };
}

export function addSignalListener(signal: Signal, handler: () => void): void {
  process.on(signal, handler);
}

export function removeSignalListener(signal: Signal, handler: () => void): void {
  process.off(signal, handler);
}
