/**
 * Kitty Graphics Protocol Encoder
 *
 * All commands use the Application Programming Command (APC) structure:
 * ```
 * <ESC>_G<control data>;<payload><ESC>\
 * ```
 *
 * The payload is base64 RGB data split into chunks of at most 4096 bytes.
 * The first chunk carries the control data; every chunk but the last has
 * `m=1`, the last `m=0`.
 */

import { getLogger } from '../logging.ts';
import type { KittyEncodeOptions, KittyOutput } from './types.ts';

const logger = getLogger('KittyEncoder');

export const MAX_CHUNK_SIZE = 4096;

// Image ID counter (auto-incremented)
let nextImageId = 1;

export function generateImageId(): number {
  const id = nextImageId;
  nextImageId = (nextImageId % 0xFFFFFF) + 1; // Wrap at 24-bit
  return id;
}

/**
 * Reset image ID counter (for testing)
 */
export function resetImageIdCounter(): void {
  nextImageId = 1;
}

function splitIntoChunks(data: string, maxSize: number): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < data.length; i += maxSize) {
    chunks.push(data.slice(i, i + maxSize));
  }
  return chunks;
}

function buildControlData(params: Record<string, number | string>): string {
  return Object.entries(params)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

/**
 * Encode an RGB grid as a transmit-and-display command.
 */
export function encodeToKitty(options: KittyEncodeOptions): KittyOutput {
  const { image, imageId = generateImageId(), columns, rows } = options;

  const base64Data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength).toString('base64');
  const dataChunks = splitIntoChunks(base64Data, MAX_CHUNK_SIZE);
  const chunks: string[] = [];

  for (let i = 0; i < dataChunks.length; i++) {
    const isFirst = i === 0;
    const isLast = i === dataChunks.length - 1;

    let controlData: string;
    if (isFirst) {
      const params: Record<string, number | string> = {
        a: 'T',           // Transmit and display
        t: 'd',           // Direct transmission
        f: 24,            // RGB
        s: image.width,
        v: image.height,
        i: imageId,
      };
      if (columns !== undefined) {
        params.c = columns;
      }
      if (rows !== undefined) {
        params.r = rows;
      }
      params.C = 1;       // Do not move the cursor
      params.q = 2;       // Suppress all responses
      if (!isLast) {
        params.m = 1;
      }
      controlData = buildControlData(params);
    } else {
      controlData = isLast ? 'm=0' : 'm=1';
    }

    chunks.push(`\x1b_G${controlData};${dataChunks[i]}\x1b\\`);
  }

  logger.debug('Kitty encoding complete', {
    imageId,
    width: image.width,
    height: image.height,
    chunks: chunks.length,
    totalBytes: base64Data.length,
  });

  return { chunks, imageId };
}

/**
 * Delete command; 'a' removes every placement on screen.
 */
export function deleteKittyImage(imageId?: number, deleteType: 'i' | 'a' = 'i'): string {
  const params: Record<string, number | string> = {
    a: 'd',
    d: deleteType,
    q: 2,
  };
  if (imageId !== undefined && deleteType === 'i') {
    params.i = imageId;
  }
  return `\x1b_G${buildControlData(params)}\x1b\\`;
}

export function deleteAllKittyImages(): string {
  return deleteKittyImage(undefined, 'a');
}
