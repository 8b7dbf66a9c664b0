/**
 * Runtime-agnostic filesystem operations.
 * Wraps the synchronous node:fs calls used by the logger.
 */

import * as nodeFs from 'node:fs';

export interface WriteOptions {
  append?: boolean;
}

export interface MkdirOptions {
  recursive?: boolean;
}

export function writeTextFileSync(path: string, data: string, options?: WriteOptions): void {
  if (options?.append) {
    nodeFs.appendFileSync(path, data, 'utf8');
  } else {
    nodeFs.writeFileSync(path, data, 'utf8');
  }
}

export function mkdirSync(path: string, options?: MkdirOptions): void {
  nodeFs.mkdirSync(path, options);
}
