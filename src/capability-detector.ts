// Picks the richest image protocol the terminal supports, once per session

import { DEFAULT_CELL_SIZE, type CellSize } from './geometry.ts';
import { createStdioTerminalQuery, isInMultiplexer, type TerminalQuery } from './graphics/detection-base.ts';
import { clearITermCapabilitiesCache, detectITermCapabilities } from './iterm2/detect.ts';
import type { ITermCapabilities } from './iterm2/types.ts';
import { clearKittyCapabilitiesCache, detectKittyCapabilities } from './kitty/detect.ts';
import type { KittyCapabilities } from './kitty/types.ts';
import { getLogger } from './logging.ts';
import {
  clearSixelCapabilitiesCache,
  detectSixelCapabilities,
  queryCellSize,
  type SixelCapabilities,
} from './sixel/detect.ts';

const logger = getLogger('CapabilityDetector');

/**
 * How page images reach the screen, in decreasing fidelity:
 * iTerm2 inline images, Kitty graphics, Sixel, half-block glyphs.
 */
export type RenderMode =
  | 'inline-protocol'
  | 'cell-graphics-protocol'
  | 'pixel-approximation'
  | 'block-fallback';

export type GraphicsPreference = 'auto' | 'iterm2' | 'kitty' | 'sixel' | 'block';

export const GRAPHICS_PREFERENCES: readonly GraphicsPreference[] = ['auto', 'iterm2', 'kitty', 'sixel', 'block'];

const FORCED_MODES: Record<Exclude<GraphicsPreference, 'auto'>, RenderMode> = {
  iterm2: 'inline-protocol',
  kitty: 'cell-graphics-protocol',
  sixel: 'pixel-approximation',
  block: 'block-fallback',
};

export interface DetectionDetails {
  /** Set when the mode came from --graphics rather than probing */
  forced: boolean;
  /** Whether the cell size came from the terminal (false: default used) */
  cellSizeFromTerminal: boolean;
  /** iTerm2 multipart framing (tmux) */
  useMultipart: boolean;
  iterm2?: ITermCapabilities;
  kitty?: KittyCapabilities;
  sixel?: SixelCapabilities;
}

export interface DetectionResult {
  mode: RenderMode;
  cellSize: CellSize;
  details: DetectionDetails;
}

export interface CapabilityDetectorOptions {
  query?: TerminalQuery;
  preference?: GraphicsPreference;
  /** Per-query reply timeout */
  timeoutMs?: number;
}

export class CapabilityDetector {
  private readonly _query: TerminalQuery;
  private readonly _preference: GraphicsPreference;
  private readonly _timeoutMs: number;

  constructor(options: CapabilityDetectorOptions = {}) {
    this._query = options.query ?? createStdioTerminalQuery();
    this._preference = options.preference ?? 'auto';
    this._timeoutMs = options.timeoutMs ?? 100;
  }

  /**
   * Probe the terminal. Never fails: anything unanswered degrades to the
   * block fallback and the default cell size.
   */
  async detect(): Promise<DetectionResult> {
    const result = this._preference === 'auto' ? await this._probe() : await this._forced(this._preference);
    logger.info('Render mode selected', {
      mode: result.mode,
      cellSize: `${result.cellSize.width}x${result.cellSize.height}`,
      forced: result.details.forced,
      cellSizeFromTerminal: result.details.cellSizeFromTerminal,
    });
    return result;
  }

  private async _probe(): Promise<DetectionResult> {
    const iterm2 = await detectITermCapabilities(this._query);
    if (iterm2.supported) {
      return this._withCellSize('inline-protocol', { forced: false, useMultipart: iterm2.useMultipart, iterm2 });
    }

    const kitty = await detectKittyCapabilities(this._query, { timeoutMs: this._timeoutMs });
    if (kitty.supported) {
      return this._withCellSize('cell-graphics-protocol', { forced: false, useMultipart: false, iterm2, kitty });
    }

    const sixel = await detectSixelCapabilities(this._query, { timeoutMs: this._timeoutMs });
    const details = { forced: false, useMultipart: false, iterm2, kitty, sixel };
    const sixelCell = sixel.cellWidth > 0 && sixel.cellHeight > 0
      ? { width: sixel.cellWidth, height: sixel.cellHeight }
      : null;

    if (sixel.supported && sixelCell) {
      return { mode: 'pixel-approximation', cellSize: sixelCell, details: { ...details, cellSizeFromTerminal: true } };
    }

    return {
      mode: 'block-fallback',
      cellSize: sixelCell ?? DEFAULT_CELL_SIZE,
      details: { ...details, cellSizeFromTerminal: sixelCell !== null },
    };
  }

  private _forced(preference: Exclude<GraphicsPreference, 'auto'>): Promise<DetectionResult> {
    logger.debug('Render mode forced', { preference });
    return this._withCellSize(FORCED_MODES[preference], { forced: true, useMultipart: isInMultiplexer() });
  }

  private async _withCellSize(
    mode: RenderMode,
    details: Omit<DetectionDetails, 'cellSizeFromTerminal'>,
  ): Promise<DetectionResult> {
    const measured = this._query.isTerminal() ? await queryCellSize(this._query, this._timeoutMs) : null;
    return {
      mode,
      cellSize: measured ?? DEFAULT_CELL_SIZE,
      details: { ...details, cellSizeFromTerminal: measured !== null },
    };
  }
}

/**
 * Forget every cached protocol probe (for testing)
 */
export function clearDetectionCaches(): void {
  clearITermCapabilitiesCache();
  clearKittyCapabilitiesCache();
  clearSixelCapabilitiesCache();
}
