// Shared fakes and fixture builders for the viewer tests

import { encode } from 'fast-png';
import type { PixelGrid } from '../src/image/pixel-grid.ts';
import type { HttpTransport } from '../src/teletext/page-fetcher.ts';
import type { OutputSink } from '../src/viewer.ts';

/**
 * Grid from packed 0xRRGGBB values, row-major.
 */
export function gridFrom(width: number, height: number, pixels: readonly number[]): PixelGrid {
  const data = new Uint8Array(width * height * 3);
  pixels.forEach((color, i) => {
    data[i * 3] = (color >> 16) & 0xff;
    data[i * 3 + 1] = (color >> 8) & 0xff;
    data[i * 3 + 2] = color & 0xff;
  });
  return { width, height, data };
}

/**
 * 8-bit RGB PNG filled with one colour.
 */
export function solidPng(width: number, height: number, color: number): Uint8Array {
  const grid = gridFrom(width, height, new Array<number>(width * height).fill(color));
  return encode({ width, height, data: grid.data, depth: 8, channels: 3 });
}

export class FakeClock {
  constructor(public time = 1_000_000) {}

  readonly now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}

export class MemoryOutput implements OutputSink {
  readonly frames: string[] = [];

  write(data: string): void {
    this.frames.push(data);
  }

  get last(): string {
    return this.frames[this.frames.length - 1] ?? '';
  }

  clear(): void {
    this.frames.length = 0;
  }
}

/**
 * Transport answering from a URL -> response table; unknown URLs get a 404.
 * Every requested URL is recorded in `requests`.
 */
export function fakeTransport(
  routes: Record<string, () => Response | Promise<Response>>,
  requests: string[] = [],
): HttpTransport {
  return (url) => {
    requests.push(url);
    const route = routes[url];
    return Promise.resolve(route ? route() : new Response(null, { status: 404, statusText: 'Not Found' }));
  };
}

export function pngResponse(bytes: Uint8Array): Response {
  return new Response(bytes, { status: 200, headers: { 'content-type': 'image/png' } });
}
