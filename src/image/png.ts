/**
 * PNG decoding to RGB pixel grids and PNG encoding for the inline protocol.
 *
 * fast-png hands back whatever the file stores: palette indices, grey,
 * grey+alpha, RGB or RGBA, at 1 to 16 bits per sample. Everything is
 * normalised to 8-bit RGB here; alpha is composited over black.
 */

import { decode, encode } from 'fast-png';
import { BYTES_PER_PIXEL, type PixelGrid } from './pixel-grid.ts';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((value, i) => bytes[i] === value);
}

/**
 * Unpack samples to one array entry per sample.
 * 16-bit samples keep their high byte; sub-byte samples stay unscaled
 * (palette indices need the raw value, grey is scaled by the caller).
 * Sub-byte data always arrives packed, rows padded to whole bytes.
 */
export function unpackSamples(
  data: Uint8Array | Uint8ClampedArray | Uint16Array,
  width: number,
  height: number,
  channels: number,
  depth: number,
): Uint8Array {
  const count = width * height * channels;

  if (data instanceof Uint16Array) {
    const samples = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      samples[i] = data[i] >> 8;
    }
    return samples;
  }

  if (depth >= 8) {
    return data instanceof Uint8Array ? data : new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }

  // Packed rows, each padded to a whole byte
  const samples = new Uint8Array(count);
  const rowSamples = width * channels;
  const stride = Math.ceil((rowSamples * depth) / 8);
  const mask = (1 << depth) - 1;
  let out = 0;
  for (let y = 0; y < height; y++) {
    const rowStart = y * stride;
    for (let s = 0; s < rowSamples; s++) {
      const bit = s * depth;
      const byte = data[rowStart + (bit >> 3)];
      const shift = 8 - depth - (bit & 7);
      samples[out++] = (byte >> shift) & mask;
    }
  }
  return samples;
}

function composite(value: number, alpha: number): number {
  return alpha === 255 ? value : Math.round((value * alpha) / 255);
}

/**
 * Decode PNG bytes to an RGB grid. Throws on anything that is not a
 * decodable PNG.
 */
export function decodePngToGrid(bytes: Uint8Array): PixelGrid {
  if (!isPng(bytes)) {
    throw new Error('Payload is not a PNG image');
  }

  const decoded = decode(bytes);
  const { width, height, channels, depth, palette } = decoded;
  if (width <= 0 || height <= 0) {
    throw new Error(`PNG has empty dimensions ${width}x${height}`);
  }

  const samples = unpackSamples(decoded.data, width, height, channels, depth);
  const rgb = new Uint8Array(width * height * BYTES_PER_PIXEL);
  const pixelCount = width * height;

  if (palette && channels === 1) {
    for (let i = 0; i < pixelCount; i++) {
      const color = palette[samples[i]] ?? [0, 0, 0];
      const alpha = color[3] ?? 255;
      rgb[i * 3] = composite(color[0], alpha);
      rgb[i * 3 + 1] = composite(color[1], alpha);
      rgb[i * 3 + 2] = composite(color[2], alpha);
    }
  } else if (channels === 1 || channels === 2) {
    // Grey (+ alpha); sub-byte grey is scaled up to the full 0-255 range
    const scale = depth < 8 ? 255 / ((1 << depth) - 1) : 1;
    for (let i = 0; i < pixelCount; i++) {
      const grey = Math.round(samples[i * channels] * scale);
      const alpha = channels === 2 ? samples[i * 2 + 1] : 255;
      const value = composite(grey, alpha);
      rgb[i * 3] = value;
      rgb[i * 3 + 1] = value;
      rgb[i * 3 + 2] = value;
    }
  } else if (channels === 3 || channels === 4) {
    for (let i = 0; i < pixelCount; i++) {
      const src = i * channels;
      const alpha = channels === 4 ? samples[src + 3] : 255;
      rgb[i * 3] = composite(samples[src], alpha);
      rgb[i * 3 + 1] = composite(samples[src + 1], alpha);
      rgb[i * 3 + 2] = composite(samples[src + 2], alpha);
    }
  } else {
    throw new Error(`Unsupported PNG channel count: ${channels}`);
  }

  return { width, height, data: rgb };
}

/**
 * Encode an RGB grid as PNG. Compression level 0: the terminal
 * decompresses, so encoding speed matters more than size.
 */
export function encodeGridToPng(grid: PixelGrid): Uint8Array {
  return encode({
    width: grid.width,
    height: grid.height,
    data: grid.data,
    depth: 8,
    channels: 3,
  }, {
    zlib: { level: 0 },
  });
}
