/**
 * iTerm2 Inline Images Protocol Detection
 *
 * Detection is environment-based only (no terminal queries):
 * - TERM_PROGRAM=iTerm.app
 * - LC_TERMINAL=iTerm2
 * - ITERM_SESSION_ID (set by iTerm2)
 * - WEZTERM_PANE (WezTerm supports iTerm2 protocol)
 * - KONSOLE_VERSION (Konsole has support)
 * - TERM=rio
 *
 * Inside tmux the multipart form of the protocol is used.
 */

import { getLogger } from '../logging.ts';
import { Env } from '../env.ts';
import { DetectionModule, type TerminalQuery } from '../graphics/detection-base.ts';
import type { ITermCapabilities } from './types.ts';

const logger = getLogger('ITermDetect');

const DEFAULT_CAPABILITIES: ITermCapabilities = {
  supported: false,
  inMultiplexer: false,
  isRemote: false,
  detectionMethod: 'none',
  useMultipart: false,
};

const dm = new DetectionModule<ITermCapabilities>(DEFAULT_CAPABILITIES);

// TERM_PROGRAM values of terminals that speak the protocol
const ITERM_SUPPORTING_PROGRAMS = ['iterm.app', 'wezterm', 'konsole', 'hyper', 'rio'];

/**
 * Check terminal type from environment for iTerm2 hints
 */
function checkTerminalEnv(): { likelyITerm: boolean; terminalProgram?: string } {
  const termProgram = Env.get('TERM_PROGRAM') || '';
  const term = Env.get('TERM') || '';
  const lcTerminal = Env.get('LC_TERMINAL') || '';

  if (Env.get('ITERM_SESSION_ID')) {
    logger.debug('iTerm2 detected via ITERM_SESSION_ID');
    return { likelyITerm: true, terminalProgram: 'iTerm2' };
  }
  if (termProgram === 'iTerm.app' || lcTerminal === 'iTerm2') {
    logger.debug('iTerm2 detected via TERM_PROGRAM/LC_TERMINAL');
    return { likelyITerm: true, terminalProgram: 'iTerm2' };
  }
  if (Env.get('WEZTERM_PANE')) {
    logger.debug('WezTerm detected via WEZTERM_PANE (supports iTerm2 protocol)');
    return { likelyITerm: true, terminalProgram: 'WezTerm' };
  }
  if (Env.get('KONSOLE_VERSION')) {
    logger.debug('Konsole detected via KONSOLE_VERSION (supports iTerm2 protocol)');
    return { likelyITerm: true, terminalProgram: 'Konsole' };
  }
  if (term === 'rio' || term.startsWith('rio-')) {
    logger.debug('Rio detected via TERM (supports iTerm2 protocol)');
    return { likelyITerm: true, terminalProgram: 'Rio' };
  }

  const program = termProgram.toLowerCase();
  if (program && ITERM_SUPPORTING_PROGRAMS.some(t => program.includes(t))) {
    logger.debug('iTerm2-compatible terminal detected via TERM_PROGRAM', { termProgram });
    return { likelyITerm: true, terminalProgram: termProgram };
  }

  return { likelyITerm: false };
}

function runDetection(query: TerminalQuery): Promise<ITermCapabilities> {
  logger.debug('Starting iTerm2 capability detection');
  const capabilities = dm.createCapabilities();

  if (capabilities.inMultiplexer) {
    capabilities.useMultipart = true;
    logger.debug('Multiplexer detected - will use multipart mode');
  }

  if (!query.isTerminal()) {
    logger.debug('Not a terminal - iTerm2 disabled');
    return Promise.resolve(capabilities);
  }

  const envCheck = checkTerminalEnv();
  if (envCheck.likelyITerm) {
    capabilities.supported = true;
    capabilities.detectionMethod = 'env';
    capabilities.terminalProgram = envCheck.terminalProgram;
    logger.info('iTerm2 protocol detected', {
      terminal: capabilities.terminalProgram,
      multiplexer: capabilities.inMultiplexer,
      multipart: capabilities.useMultipart,
      remote: capabilities.isRemote,
    });
  } else {
    logger.debug('No iTerm2 environment hints found');
  }
  return Promise.resolve(capabilities);
}

/**
 * Detect iTerm2 capabilities; async for symmetry with the query-based
 * protocols.
 */
export function detectITermCapabilities(
  query: TerminalQuery,
  options: { forceRedetect?: boolean } = {},
): Promise<ITermCapabilities> {
  return dm.detectCapabilities(options.forceRedetect ?? false, () => runDetection(query));
}

/**
 * Clear cached capabilities (for testing)
 */
export function clearITermCapabilitiesCache(): void {
  dm.clearCache();
}
