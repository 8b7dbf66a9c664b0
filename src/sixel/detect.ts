/**
 * Sixel Capability Detection
 *
 * Two terminal queries, each answered on stdin:
 *
 * 1. DA1 (Primary Device Attributes): \x1b[c
 *    Response: \x1b[?...c - "4" in params indicates sixel support
 *
 * 2. WindowOps Cell Size: \x1b[16t
 *    Response: \x1b[6;height;width;t - cell size in pixels
 *
 * Sixel output is sized in pixels, so without a cell size it cannot be
 * placed in a cell rectangle: a missing cell size disables sixel. It is
 * also disabled inside multiplexers and over SSH.
 */

import { getLogger } from '../logging.ts';
import { Env } from '../env.ts';
import { DetectionModule, escapeForLog, type BaseCapabilities, type TerminalQuery } from '../graphics/detection-base.ts';
import type { CellSize } from '../geometry.ts';

const logger = getLogger('SixelDetect');

export interface SixelCapabilities extends BaseCapabilities {
  /** Pixels per character cell horizontally (0 when unknown) */
  cellWidth: number;
  /** Pixels per character cell vertically (0 when unknown) */
  cellHeight: number;
  /** Known terminal quirks */
  quirks: string[];
  detectionMethod: 'da1' | 'env' | 'none';
}

const DEFAULT_CAPABILITIES: SixelCapabilities = {
  supported: false,
  cellWidth: 0,
  cellHeight: 0,
  inMultiplexer: false,
  isRemote: false,
  quirks: [],
  detectionMethod: 'none',
};

const dm = new DetectionModule<SixelCapabilities>(DEFAULT_CAPABILITIES);

export const DA1_QUERY = '\x1b[c';
export const CELL_SIZE_QUERY = '\x1b[16t';

function checkTerminalQuirks(): string[] {
  const quirks: string[] = [];
  const termProgram = Env.get('TERM_PROGRAM') || '';

  if (Env.get('VTE_VERSION')) {
    quirks.push('vte-based');
  }
  // Konsole leaves artifacts at the right edge when scrolling
  if (termProgram.includes('Konsole')) {
    quirks.push('konsole-sixel-edge');
  }
  if (Env.get('WT_SESSION')) {
    quirks.push('windows-terminal');
  }
  return quirks;
}

/**
 * Parse DA1 response for sixel support
 * Response format: ESC [ ? params c
 */
export function parseDA1Response(response: string): boolean {
  const match = response.match(/\x1b\[\?([0-9;]+)c/);
  if (!match) {
    logger.debug('DA1 response parse failed', { response: escapeForLog(response) });
    return false;
  }
  const params = match[1].split(';');
  const hasSixel = params.includes('4');
  logger.debug('DA1 response parsed', { params, hasSixel });
  return hasSixel;
}

/**
 * Parse cell size response
 * Response format: ESC [ 6 ; height ; width t
 */
export function parseCellSizeResponse(response: string): CellSize | null {
  const match = response.match(/\x1b\[6;(\d+);(\d+)t/);
  if (!match) return null;
  const size = {
    height: parseInt(match[1], 10),
    width: parseInt(match[2], 10),
  };
  return size.width > 0 && size.height > 0 ? size : null;
}

/**
 * Ask the terminal for its cell size in pixels; null on timeout or an
 * unusable answer.
 */
export async function queryCellSize(query: TerminalQuery, timeoutMs: number = 100): Promise<CellSize | null> {
  const response = await query.query(CELL_SIZE_QUERY, buffer => /\x1b\[6;\d+;\d+t/.test(buffer), timeoutMs);
  if (response === null) {
    logger.debug('Cell size query timeout');
    return null;
  }
  return parseCellSizeResponse(response);
}

async function runDetection(query: TerminalQuery, timeoutMs: number): Promise<SixelCapabilities> {
  logger.debug('Starting sixel capability detection');
  const capabilities = dm.createCapabilities();
  capabilities.quirks = []; // Fresh array (don't share reference with defaults)

  if (capabilities.inMultiplexer) {
    logger.info('Sixel disabled - running in terminal multiplexer');
    capabilities.quirks.push('multiplexer-disabled');
    return capabilities;
  }

  // Sixel payloads are 10-100x larger than text
  if (capabilities.isRemote) {
    logger.info('Sixel disabled - running over SSH');
    capabilities.quirks.push('ssh-disabled');
    return capabilities;
  }

  capabilities.quirks.push(...checkTerminalQuirks());

  if (!query.isTerminal()) {
    logger.debug('Not a terminal - sixel disabled');
    return capabilities;
  }

  const da1 = await query.query(DA1_QUERY, buffer => /\x1b\[\?[0-9;]+c/.test(buffer), timeoutMs);
  if (da1 === null) {
    logger.warn('Sixel disabled - DA1 query timeout');
    capabilities.detectionMethod = 'env';
  } else {
    capabilities.detectionMethod = 'da1';
    capabilities.supported = parseDA1Response(da1);
  }

  // Cell size is still useful to callers when sixel is unsupported
  const cellSize = await queryCellSize(query, timeoutMs);
  if (cellSize) {
    capabilities.cellWidth = cellSize.width;
    capabilities.cellHeight = cellSize.height;
  } else if (capabilities.supported) {
    logger.warn('Sixel disabled - cell size query timeout');
    capabilities.supported = false;
  }

  logger.info('Sixel detection complete', {
    supported: capabilities.supported,
    cellSize: `${capabilities.cellWidth}x${capabilities.cellHeight}`,
    method: capabilities.detectionMethod,
    quirks: capabilities.quirks,
  });
  return capabilities;
}

/**
 * Detect sixel capabilities; cached for the session.
 */
export function detectSixelCapabilities(
  query: TerminalQuery,
  options: { forceRedetect?: boolean; timeoutMs?: number } = {},
): Promise<SixelCapabilities> {
  return dm.detectCapabilities(options.forceRedetect ?? false, () => runDetection(query, options.timeoutMs ?? 100));
}

/**
 * Clear cached capabilities (for testing)
 */
export function clearSixelCapabilitiesCache(): void {
  dm.clearCache();
}
