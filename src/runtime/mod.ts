/**
 * Runtime abstraction layer.
 *
 * Thin wrappers around Node.js process, terminal and filesystem APIs.
 * The rest of the viewer imports from here instead of touching `process`
 * or `node:fs` directly, which keeps terminal I/O replaceable in tests.
 */

export * from './process.ts';
export * from './fs.ts';
export * from './terminal.ts';
