/**
 * Kitty Graphics Protocol Detection
 *
 * Send a query action with a minimal 1x1 RGB image:
 * ```
 * <ESC>_Gi=31,s=1,v=1,a=q,t=d,f=24;AAAA<ESC>\
 * ```
 *
 * - `i=31` - Image ID (arbitrary, used to match response)
 * - `a=q` - Query action (test if image can be loaded, don't store)
 * - `AAAA` - Base64 encoded RGB pixel (black)
 *
 * Response:
 * - Success: `<ESC>_Gi=31;OK<ESC>\`
 * - Error: `<ESC>_Gi=31;ENOENT:...<ESC>\`
 *
 * No response within the timeout means no support. The query is only sent
 * when the environment hints at a kitty-capable terminal, so other
 * terminals do not pay for the timeout.
 */

import { getLogger } from '../logging.ts';
import { Env } from '../env.ts';
import { DetectionModule, escapeForLog, type TerminalQuery } from '../graphics/detection-base.ts';
import type { KittyCapabilities } from './types.ts';

const logger = getLogger('KittyDetect');

const DEFAULT_CAPABILITIES: KittyCapabilities = {
  supported: false,
  inMultiplexer: false,
  isRemote: false,
  detectionMethod: 'none',
};

const dm = new DetectionModule<KittyCapabilities>(DEFAULT_CAPABILITIES);

// Query image ID - arbitrary value to match response
const QUERY_IMAGE_ID = 31;

export const KITTY_QUERY = `\x1b_Gi=${QUERY_IMAGE_ID},s=1,v=1,a=q,t=d,f=24;AAAA\x1b\\`;

/**
 * Check terminal type from environment for kitty hints
 */
function checkTerminalEnv(): { likelyKitty: boolean; terminalProgram?: string } {
  const termProgram = Env.get('TERM_PROGRAM') || '';

  if (Env.get('KITTY_WINDOW_ID')) {
    logger.debug('Kitty detected via KITTY_WINDOW_ID');
    return { likelyKitty: true, terminalProgram: 'kitty' };
  }
  if (Env.get('WEZTERM_PANE')) {
    logger.debug('WezTerm detected via WEZTERM_PANE');
    return { likelyKitty: true, terminalProgram: 'WezTerm' };
  }
  if (Env.get('GHOSTTY_RESOURCES_DIR')) {
    logger.debug('Ghostty detected via GHOSTTY_RESOURCES_DIR');
    return { likelyKitty: true, terminalProgram: 'Ghostty' };
  }

  const kittyTerminals = ['kitty', 'wezterm', 'ghostty', 'konsole'];
  if (kittyTerminals.some(t => termProgram.toLowerCase().includes(t))) {
    logger.debug('Kitty-capable terminal detected via TERM_PROGRAM', { termProgram });
    return { likelyKitty: true, terminalProgram: termProgram };
  }

  return { likelyKitty: false };
}

/**
 * Parse kitty graphics response
 * Response format: <ESC>_Gi=<id>;<status><ESC>\
 */
export function parseKittyResponse(response: string): { id: number; ok: boolean; error?: string } | null {
  const match = response.match(/\x1b_Gi=(\d+);([^\x1b]*)\x1b\\/);
  if (!match) {
    return null;
  }
  const status = match[2];
  return {
    id: parseInt(match[1], 10),
    ok: status === 'OK',
    error: status !== 'OK' ? status : undefined,
  };
}

function hasCompleteResponse(buffer: string): boolean {
  return /\x1b_Gi=\d+;[^\x1b]*\x1b\\/.test(buffer);
}

async function runDetection(query: TerminalQuery, timeoutMs: number): Promise<KittyCapabilities> {
  logger.debug('Starting kitty capability detection');
  const capabilities = dm.createCapabilities();

  // Placements do not survive tmux/screen
  if (capabilities.inMultiplexer) {
    logger.info('Kitty disabled - running in terminal multiplexer');
    return capabilities;
  }

  const envCheck = checkTerminalEnv();
  if (envCheck.terminalProgram) {
    capabilities.terminalProgram = envCheck.terminalProgram;
  }

  if (!query.isTerminal()) {
    logger.debug('Not a terminal - kitty disabled');
    return capabilities;
  }

  if (!envCheck.likelyKitty) {
    logger.debug('No kitty environment hints - skipping query');
    capabilities.detectionMethod = 'env';
    return capabilities;
  }

  const response = await query.query(KITTY_QUERY, hasCompleteResponse, timeoutMs);
  if (response === null) {
    logger.debug('Kitty detection timeout - protocol not supported');
    return capabilities;
  }

  const parsed = parseKittyResponse(response);
  capabilities.detectionMethod = 'query';
  if (parsed && parsed.id === QUERY_IMAGE_ID && parsed.ok) {
    capabilities.supported = true;
    logger.info('Kitty graphics protocol detected', { terminal: capabilities.terminalProgram });
  } else {
    logger.debug('Kitty query failed', { response: escapeForLog(response), error: parsed?.error });
  }
  return capabilities;
}

/**
 * Detect kitty capabilities; cached for the session.
 */
export function detectKittyCapabilities(
  query: TerminalQuery,
  options: { forceRedetect?: boolean; timeoutMs?: number } = {},
): Promise<KittyCapabilities> {
  return dm.detectCapabilities(options.forceRedetect ?? false, () => runDetection(query, options.timeoutMs ?? 100));
}

/**
 * Clear cached capabilities (for testing)
 */
export function clearKittyCapabilitiesCache(): void {
  dm.clearCache();
}
