/**
 * Sixel palette quantization against the fixed 216-colour web-safe cube.
 *
 * Page images are flat teletext graphics with a handful of colours, so a
 * fixed palette is enough; no per-image palette is computed.
 */

import { BYTES_PER_PIXEL, type PixelGrid } from '../image/pixel-grid.ts';

export interface PaletteResult {
  /** Palette colours, packed 0xRRGGBB */
  colors: readonly number[];
  /** Pixel data as palette indices */
  indexed: Uint8Array;
}

// Color LUT size: 32x32x32 = 32768 entries (5 bits per RGB channel)
const COLOR_LUT_SIZE = 32768;
const COLOR_LUT_SHIFT = 3;  // 8-bit to 5-bit

export const WEB_SAFE_LEVELS = [0, 51, 102, 153, 204, 255] as const;

let standardPalette216: number[] | null = null;
let fixedLUT216: Uint8Array | null = null;

/**
 * The 6x6x6 RGB cube, red-major: index = r*36 + g*6 + b over the levels.
 */
export function getStandardPalette216(): readonly number[] {
  if (standardPalette216) return standardPalette216;

  standardPalette216 = [];
  for (const r of WEB_SAFE_LEVELS) {
    for (const g of WEB_SAFE_LEVELS) {
      for (const b of WEB_SAFE_LEVELS) {
        standardPalette216.push((r << 16) | (g << 8) | b);
      }
    }
  }
  return standardPalette216;
}

/**
 * Map each 5-bit-per-channel colour to its nearest palette entry
 * (weighted distance; the eye is most sensitive to green).
 */
function buildColorLUT(palette: readonly number[]): Uint8Array {
  const lut = new Uint8Array(COLOR_LUT_SIZE);

  for (let r5 = 0; r5 < 32; r5++) {
    const r = (r5 << 3) | (r5 >> 2);  // Expand 5-bit to 8-bit
    for (let g5 = 0; g5 < 32; g5++) {
      const g = (g5 << 3) | (g5 >> 2);
      for (let b5 = 0; b5 < 32; b5++) {
        const b = (b5 << 3) | (b5 >> 2);

        let minDist = Infinity;
        let nearest = 0;
        for (let i = 0; i < palette.length; i++) {
          const dr = r - ((palette[i] >>> 16) & 0xff);
          const dg = g - ((palette[i] >>> 8) & 0xff);
          const db = b - (palette[i] & 0xff);
          const dist = dr * dr * 2 + dg * dg * 4 + db * db * 3;
          if (dist < minDist) {
            minDist = dist;
            nearest = i;
            if (dist === 0) break;
          }
        }

        lut[(r5 << 10) | (g5 << 5) | b5] = nearest;
      }
    }
  }

  return lut;
}

/**
 * Palette index for an 8-bit RGB triple.
 */
export function nearestPaletteIndex(r: number, g: number, b: number): number {
  if (!fixedLUT216) {
    fixedLUT216 = buildColorLUT(getStandardPalette216());
  }
  return fixedLUT216[((r >> COLOR_LUT_SHIFT) << 10) | ((g >> COLOR_LUT_SHIFT) << 5) | (b >> COLOR_LUT_SHIFT)];
}

export function quantizeFixed216(image: PixelGrid): PaletteResult {
  const pixelCount = image.width * image.height;
  const indexed = new Uint8Array(pixelCount);
  for (let i = 0; i < pixelCount; i++) {
    const offset = i * BYTES_PER_PIXEL;
    indexed[i] = nearestPaletteIndex(image.data[offset], image.data[offset + 1], image.data[offset + 2]);
  }
  return { colors: getStandardPalette216(), indexed };
}
