// Half-block rendering: 1x2 pixels per terminal cell using ▀ and █.
// Fallback for terminals with no graphics protocol; needs only 24-bit colour.

import { ANSI, cursorTo, rgbColorCode } from '../ansi-output.ts';
import type { Rect } from '../geometry.ts';
import { pixelAt, type PixelGrid } from '../image/pixel-grid.ts';
import { scaleAreaAverage } from '../image/scale.ts';

// Half-block characters
export const UPPER_HALF = '▀'; // ▀
export const FULL_BLOCK = '█'; // █

export interface HalfBlockCell {
  char: string;
  fg: number;
  bg?: number;
}

/**
 * Resolve the glyph and colours for one cell from its upper and lower
 * samples (packed 0xRRGGBB).
 */
export function resolveHalfBlockCell(upperColor: number, lowerColor: number): HalfBlockCell {
  if (upperColor === lowerColor) {
    return { char: FULL_BLOCK, fg: upperColor };
  }
  return { char: UPPER_HALF, fg: upperColor, bg: lowerColor };
}

/**
 * Render `image` into `bounds` as rows of half blocks. The image is
 * area-averaged to bounds.width x 2*bounds.height samples; each row is
 * cursor-positioned and ends with an SGR reset.
 */
export function renderHalfBlocks(image: PixelGrid, bounds: Rect): string {
  if (bounds.width <= 0 || bounds.height <= 0) {
    return '';
  }

  const samples = scaleAreaAverage(image, bounds.width, bounds.height * 2);
  const rows: string[] = [];

  for (let ty = 0; ty < bounds.height; ty++) {
    let line = cursorTo(bounds.x, bounds.y + ty);
    let currentFg = -1;
    let currentBg = -1;

    for (let tx = 0; tx < bounds.width; tx++) {
      const cell = resolveHalfBlockCell(pixelAt(samples, tx, ty * 2), pixelAt(samples, tx, ty * 2 + 1));

      // Colour codes only when they change
      if (cell.fg !== currentFg) {
        line += rgbColorCode(cell.fg, false);
        currentFg = cell.fg;
      }
      if (cell.bg !== undefined && cell.bg !== currentBg) {
        line += rgbColorCode(cell.bg, true);
        currentBg = cell.bg;
      }
      line += cell.char;
    }

    rows.push(line + ANSI.reset);
  }

  return rows.join('');
}
