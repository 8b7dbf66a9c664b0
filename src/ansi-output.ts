// ANSI escape sequences used to paint frames

// ANSI escape codes for terminal control
export const ANSI = {
  clearScreen: '\x1b[2J',
  cursorHome: '\x1b[H',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  alternateScreen: '\x1b[?1049h',
  normalScreen: '\x1b[?1049l',
  // Synchronized output (DEC private mode 2026)
  beginSync: '\x1b[?2026h',
  endSync: '\x1b[?2026l',
  saveCursor: '\x1b7',
  restoreCursor: '\x1b8',
  reset: '\x1b[0m',
};

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Absolute cursor move to a 0-based cell.
 */
export function cursorTo(x: number, y: number): string {
  return `\x1b[${y + 1};${x + 1}H`;
}

/**
 * 24-bit colour code; `color` is packed 0xRRGGBB.
 */
export function rgbColorCode(color: number, isBackground: boolean): string {
  const r = (color >>> 16) & 0xFF;
  const g = (color >>> 8) & 0xFF;
  const b = color & 0xFF;
  return `\x1b[${isBackground ? 48 : 38};2;${r};${g};${b}m`;
}

export function packRgb({ r, g, b }: Rgb): number {
  return ((r & 0xFF) << 16) | ((g & 0xFF) << 8) | (b & 0xFF);
}

/**
 * Text in the given colours followed by a reset.
 */
export function styledText(text: string, foreground: Rgb, background: Rgb): string {
  return rgbColorCode(packRgb(foreground), false) + rgbColorCode(packRgb(background), true) + text + ANSI.reset;
}
