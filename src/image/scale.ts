// Resampling of RGB pixel grids

import { BYTES_PER_PIXEL, type PixelGrid } from './pixel-grid.ts';

/**
 * Scale using nearest neighbour sampling
 */
export function scaleNearest(image: PixelGrid, width: number, height: number): PixelGrid {
  const data = new Uint8Array(width * height * BYTES_PER_PIXEL);

  for (let y = 0; y < height; y++) {
    const srcY = Math.floor((y / height) * image.height);
    for (let x = 0; x < width; x++) {
      const srcX = Math.floor((x / width) * image.width);
      const srcIdx = (srcY * image.width + srcX) * BYTES_PER_PIXEL;
      const dstIdx = (y * width + x) * BYTES_PER_PIXEL;
      data[dstIdx] = image.data[srcIdx];
      data[dstIdx + 1] = image.data[srcIdx + 1];
      data[dstIdx + 2] = image.data[srcIdx + 2];
    }
  }

  return { width, height, data };
}

/**
 * Scale by averaging every source pixel that falls in each target pixel's box.
 * When enlarging, each box covers a single source pixel and this degrades to
 * nearest neighbour.
 */
export function scaleAreaAverage(image: PixelGrid, width: number, height: number): PixelGrid {
  if (width >= image.width && height >= image.height) {
    return scaleNearest(image, width, height);
  }

  const data = new Uint8Array(width * height * BYTES_PER_PIXEL);

  for (let y = 0; y < height; y++) {
    const y0 = Math.floor((y * image.height) / height);
    const y1 = Math.max(y0 + 1, Math.floor(((y + 1) * image.height) / height));
    for (let x = 0; x < width; x++) {
      const x0 = Math.floor((x * image.width) / width);
      const x1 = Math.max(x0 + 1, Math.floor(((x + 1) * image.width) / width));

      let r = 0, g = 0, b = 0;
      for (let sy = y0; sy < y1; sy++) {
        let srcIdx = (sy * image.width + x0) * BYTES_PER_PIXEL;
        for (let sx = x0; sx < x1; sx++) {
          r += image.data[srcIdx];
          g += image.data[srcIdx + 1];
          b += image.data[srcIdx + 2];
          srcIdx += BYTES_PER_PIXEL;
        }
      }

      const count = (x1 - x0) * (y1 - y0);
      const dstIdx = (y * width + x) * BYTES_PER_PIXEL;
      data[dstIdx] = Math.round(r / count);
      data[dstIdx + 1] = Math.round(g / count);
      data[dstIdx + 2] = Math.round(b / count);
    }
  }

  return { width, height, data };
}
