// Sixel encoder - converts indexed pixel data to a DCS sixel sequence

import { getLogger } from '../logging.ts';

const logger = getLogger('SixelEncoder');

export interface SixelEncodeOptions {
  /** Colour palette, packed 0xRRGGBB */
  palette: readonly number[];
  /** Indexed pixel data (indices into palette) */
  indexed: Uint8Array;
  width: number;
  height: number;
  /** Enable RLE compression (default: true) */
  useRLE?: boolean;
}

export interface SixelOutput {
  /** Complete sixel sequence (DCS q ... ST) */
  data: string;
  /** Number of colors defined */
  colors: number;
}

// Sixel character base ('?' = 63 represents the 6-bit value 0)
const SIXEL_BASE = 63;

const SIXEL_CHARS: string[] = [];
for (let i = 0; i < 64; i++) {
  SIXEL_CHARS.push(String.fromCharCode(SIXEL_BASE + i));
}

/**
 * Colour register definition: #reg;2;r%;g%;b%
 */
export function colorToSixelDef(colorIndex: number, rgb: number): string {
  const rPct = Math.round((((rgb >>> 16) & 0xff) / 255) * 100);
  const gPct = Math.round((((rgb >>> 8) & 0xff) / 255) * 100);
  const bPct = Math.round(((rgb & 0xff) / 255) * 100);
  return `#${colorIndex};2;${rPct};${gPct};${bPct}`;
}

/**
 * Run-length encode one colour's bit patterns across a band.
 * Runs of 4 or more become `!<count><char>`.
 */
export function encodeRun(bits: Uint8Array, width: number, useRLE: boolean): string {
  let out = '';
  let i = 0;
  while (i < width) {
    const value = bits[i];
    let count = 1;
    while (i + count < width && bits[i + count] === value) {
      count++;
    }
    const char = SIXEL_CHARS[value];
    out += useRLE && count >= 4 ? `!${count}${char}` : char.repeat(count);
    i += count;
  }
  return out;
}

/**
 * Encode one 6-pixel band. Colours are separated by `$` (graphics CR).
 */
function encodeBand(
  indexed: Uint8Array,
  width: number,
  height: number,
  rowStart: number,
  numColors: number,
  useRLE: boolean,
): string {
  const rowHeight = Math.min(6, height - rowStart);
  const sixelBits = new Map<number, Uint8Array>();

  for (let dy = 0; dy < rowHeight; dy++) {
    const rowOffset = (rowStart + dy) * width;
    const bitMask = 1 << dy;
    for (let x = 0; x < width; x++) {
      const color = indexed[rowOffset + x];
      if (color >= numColors) {
        continue;
      }
      let bits = sixelBits.get(color);
      if (!bits) {
        bits = new Uint8Array(width);
        sixelBits.set(color, bits);
      }
      bits[x] |= bitMask;
    }
  }

  const parts: string[] = [];
  for (const [color, bits] of [...sixelBits].sort((a, b) => a[0] - b[0])) {
    parts.push(`#${color}${encodeRun(bits, width, useRLE)}`);
  }
  return parts.join('$');
}

/**
 * Encode indexed pixels to a sixel sequence. Bands are separated by `-`.
 */
export function encodeToSixel(options: SixelEncodeOptions): SixelOutput {
  const { palette, indexed, width, height, useRLE = true } = options;
  const numColors = palette.length;

  const colorDefs = palette.map((rgb, i) => colorToSixelDef(i, rgb)).join('');

  const bands: string[] = [];
  for (let row = 0; row < height; row += 6) {
    bands.push(encodeBand(indexed, width, height, row, numColors, useRLE));
  }

  // DCS P1;P2;P3 q: default aspect, 0-bits painted in the background colour, default grid
  const dcs = '\x1bP0;2;0q';
  const st = '\x1b\\';
  // Raster attributes: 1:1 aspect, width and height in pixels
  const rasterAttr = `"1;1;${width};${height}`;

  const data = `${dcs}${rasterAttr}${colorDefs}${bands.join('-')}${st}`;

  logger.debug('Sixel encoding complete', { width, height, bands: bands.length, bytes: data.length });

  return { data, colors: numColors };
}

/**
 * Save cursor, move to the 0-based cell, emit the sixel, restore cursor.
 */
export function positionedSixel(sixelData: string, x: number, y: number): string {
  return `\x1b7\x1b[${y + 1};${x + 1}H${sixelData}\x1b8`;
}
