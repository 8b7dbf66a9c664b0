// Renders a page image into a viewport rectangle for the chosen render mode

import { ANSI, cursorTo } from './ansi-output.ts';
import type { RenderMode } from './capability-detector.ts';
import { renderHalfBlocks } from './components/halfblock.ts';
import { fitRect, isEmptyRect, type CellSize, type Rect } from './geometry.ts';
import type { PixelGrid } from './image/pixel-grid.ts';
import { scaleAreaAverage } from './image/scale.ts';
import { encodeToITerm2 } from './iterm2/encoder.ts';
import { deleteAllKittyImages, encodeToKitty } from './kitty/encoder.ts';
import { getLogger } from './logging.ts';
import { encodeToSixel, positionedSixel } from './sixel/encoder.ts';
import { quantizeFixed216 } from './sixel/palette.ts';

const logger = getLogger('Renderer');

export interface RenderOptions {
  cellSize: CellSize;
  /** iTerm2 multipart framing (tmux) */
  useMultipart?: boolean;
}

export interface RenderOutput {
  /** Escape sequences to write as-is */
  data: string;
  /** Letterboxed image rectangle, always inside the viewport */
  bounds: Rect;
}

/**
 * Positioned spaces over every viewport row. No erase-to-end-of-line: the
 * footer and anything right of the viewport stay untouched.
 */
export function blankViewport(viewport: Rect): string {
  const blank = ' '.repeat(viewport.width);
  let out = ANSI.reset;
  for (let row = 0; row < viewport.height; row++) {
    out += cursorTo(viewport.x, viewport.y + row) + blank;
  }
  return out;
}

/**
 * Pixel height of a sixel image covering `rows` cells: whole 6-pixel bands
 * only, so the last band never spills into the row below. 0 when not even
 * one band fits.
 */
export function sixelPixelHeight(rows: number, cellHeight: number): number {
  return Math.floor((rows * cellHeight) / 6) * 6;
}

function encodeImage(image: PixelGrid, mode: RenderMode, bounds: Rect, options: RenderOptions): string {
  switch (mode) {
    case 'block-fallback':
      return renderHalfBlocks(image, bounds);

    case 'inline-protocol': {
      const output = encodeToITerm2({
        image,
        displayWidth: bounds.width,
        displayHeight: bounds.height,
        preserveAspectRatio: false,
        useMultipart: options.useMultipart ?? false,
      });
      return cursorTo(bounds.x, bounds.y) + output.sequences.join('');
    }

    case 'cell-graphics-protocol': {
      const output = encodeToKitty({ image, columns: bounds.width, rows: bounds.height });
      return cursorTo(bounds.x, bounds.y) + output.chunks.join('');
    }

    case 'pixel-approximation': {
      const height = sixelPixelHeight(bounds.height, options.cellSize.height);
      if (height === 0) {
        return renderHalfBlocks(image, bounds);
      }
      const scaled = scaleAreaAverage(image, bounds.width * options.cellSize.width, height);
      const { colors, indexed } = quantizeFixed216(scaled);
      const sixel = encodeToSixel({ palette: colors, indexed, width: scaled.width, height: scaled.height });
      return positionedSixel(sixel.data, bounds.x, bounds.y);
    }
  }
}

/**
 * Render `image` letterboxed into `viewport`. The whole viewport is painted:
 * first blanked, then the image drawn inside `bounds`.
 */
export function render(image: PixelGrid, mode: RenderMode, viewport: Rect, options: RenderOptions): RenderOutput {
  const bounds = fitRect(image.width, image.height, viewport, options.cellSize);
  if (isEmptyRect(viewport) || isEmptyRect(bounds)) {
    return { data: '', bounds };
  }

  // Kitty placements are not covered by text; remove the previous frame's
  const prefix = mode === 'cell-graphics-protocol' ? deleteAllKittyImages() : '';
  const data = prefix + blankViewport(viewport) + encodeImage(image, mode, bounds, options);

  logger.trace('Rendered image', {
    mode,
    image: `${image.width}x${image.height}`,
    bounds: `${bounds.width}x${bounds.height}@${bounds.x},${bounds.y}`,
    bytes: data.length,
  });

  return { data, bounds };
}

/**
 * Blank the viewport and centre a one-line message in it (no image yet).
 */
export function renderPlaceholder(message: string, mode: RenderMode, viewport: Rect): string {
  if (isEmptyRect(viewport)) {
    return '';
  }
  const text = message.slice(0, viewport.width);
  const x = viewport.x + Math.floor((viewport.width - text.length) / 2);
  const y = viewport.y + Math.floor((viewport.height - 1) / 2);
  const prefix = mode === 'cell-graphics-protocol' ? deleteAllKittyImages() : '';
  return prefix + blankViewport(viewport) + cursorTo(x, y) + text;
}
