/**
 * Kitty Graphics Protocol Types
 */

import type { BaseCapabilities } from '../graphics/detection-base.ts';
import type { PixelGrid } from '../image/pixel-grid.ts';

/**
 * Kitty terminal capabilities
 */
export interface KittyCapabilities extends BaseCapabilities {
  /** Detection method used */
  detectionMethod: 'query' | 'env' | 'none';
  /** Terminal program name if detected */
  terminalProgram?: string;
}

export interface KittyEncodeOptions {
  /** RGB pixels, transmitted as f=24 */
  image: PixelGrid;
  /** Image ID for updates/deletion */
  imageId?: number;
  /** Number of terminal columns to display over (for scaling) */
  columns?: number;
  /** Number of terminal rows to display over (for scaling) */
  rows?: number;
}

/**
 * Kitty encoder output
 */
export interface KittyOutput {
  /** Pre-split escape sequence chunks */
  chunks: string[];
  imageId: number;
}
