// RGB pixel grid shared by the decoder, the scalers and the encoders

export const BYTES_PER_PIXEL = 3;

/**
 * Decoded image: 3 bytes (R, G, B) per pixel, row-major, no padding.
 */
export interface PixelGrid {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/**
 * Allocate a grid, optionally filled with one colour.
 */
export function createPixelGrid(width: number, height: number, fill?: readonly [number, number, number]): PixelGrid {
  const data = new Uint8Array(width * height * BYTES_PER_PIXEL);
  if (fill && (fill[0] | fill[1] | fill[2]) !== 0) {
    for (let i = 0; i < data.length; i += BYTES_PER_PIXEL) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
    }
  }
  return { width, height, data };
}

/**
 * Pack the pixel at (x, y) as 0xRRGGBB.
 */
export function pixelAt(grid: PixelGrid, x: number, y: number): number {
  const offset = (y * grid.width + x) * BYTES_PER_PIXEL;
  return (grid.data[offset] << 16) | (grid.data[offset + 1] << 8) | grid.data[offset + 2];
}
