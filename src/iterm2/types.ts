/**
 * iTerm2 Inline Images Protocol Types
 *
 * The protocol uses OSC escape sequences to display images inline:
 * ESC ] 1337 ; File = [params] : <base64-data> BEL
 *
 * Unlike Kitty/Sixel which take raw pixels, iTerm2 expects an encoded
 * image file (PNG here) as the payload.
 */

import type { BaseCapabilities } from '../graphics/detection-base.ts';
import type { PixelGrid } from '../image/pixel-grid.ts';

export interface ITermCapabilities extends BaseCapabilities {
  detectionMethod: 'env' | 'none';
  /** Terminal program name if detected */
  terminalProgram?: string;
  /** Whether multipart mode should be used (for tmux compatibility) */
  useMultipart: boolean;
}

export interface ITermEncodeOptions {
  image: PixelGrid;
  /** Display width in cells */
  displayWidth?: number;
  /** Display height in cells */
  displayHeight?: number;
  /** Preserve aspect ratio (default: true) */
  preserveAspectRatio?: boolean;
  /** Use multipart mode for tmux compatibility */
  useMultipart?: boolean;
}

export interface ITermOutput {
  /** Escape sequence(s) to output */
  sequences: string[];
  pngBytes: Uint8Array;
  /** Base64 payload size */
  totalBytes: number;
}

/**
 * Multipart chunk size (safe for most terminals)
 */
export const ITERM_MULTIPART_CHUNK_SIZE = 65536;
