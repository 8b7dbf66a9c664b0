// Geometry utilities for terminal cell rectangles

/**
 * Rectangle in terminal cells, 0-based.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Size of one terminal cell in pixels.
 */
export interface CellSize {
  width: number;
  height: number;
}

// Used when the terminal does not answer the cell size query
export const DEFAULT_CELL_SIZE: CellSize = Object.freeze({ width: 10, height: 20 });

/**
 * Clamp a number to a range [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

export function isEmptyRect(rect: Rect): boolean {
  return rect.width <= 0 || rect.height <= 0;
}

/**
 * Check whether `inner` lies entirely within `outer`
 */
export function rectContains(outer: Rect, inner: Rect): boolean {
  return inner.x >= outer.x &&
         inner.y >= outer.y &&
         inner.x + inner.width <= outer.x + outer.width &&
         inner.y + inner.height <= outer.y + outer.height;
}

/**
 * Fit an image into a viewport preserving its aspect ratio (letterboxing).
 *
 * The fit is computed in pixels, using the cell size, then converted back to
 * whole cells and centred. A non-empty viewport always yields at least one
 * cell, and the result never exceeds the viewport.
 */
export function fitRect(imageWidth: number, imageHeight: number, viewport: Rect, cell: CellSize): Rect {
  if (isEmptyRect(viewport) || imageWidth <= 0 || imageHeight <= 0) {
    return { x: viewport.x, y: viewport.y, width: 0, height: 0 };
  }

  const availableWidth = viewport.width * cell.width;
  const availableHeight = viewport.height * cell.height;
  const scale = Math.min(availableWidth / imageWidth, availableHeight / imageHeight);

  const width = clamp(Math.round((imageWidth * scale) / cell.width), 1, viewport.width);
  const height = clamp(Math.round((imageHeight * scale) / cell.height), 1, viewport.height);

  return {
    x: viewport.x + Math.floor((viewport.width - width) / 2),
    y: viewport.y + Math.floor((viewport.height - height) / 2),
    width,
    height,
  };
}
