// Teletext viewer CLI: parse options, take over the terminal, run the frame loop

import { CapabilityDetector } from './capability-detector.ts';
import { generateConfigHelp } from './config/cli.ts';
import { ViewerConfig } from './config/config.ts';
import { ConfigError, TerminalCapabilityError, ensureError } from './errors.ts';
import { InputQueue } from './input.ts';
import { createLogger, getGlobalLogger, getLogger, setGlobalLogger } from './logging.ts';
import { NavigationController } from './navigation.ts';
import { args, consoleSize, runtimeName, runtimeVersion, stdin, stdout } from './runtime/mod.ts';
import {
  cleanupTerminal,
  emergencyCleanupTerminal,
  setupCleanupHandlers,
  setupTerminal,
  type TerminalLifecycleOptions,
} from './terminal-lifecycle.ts';
import { createPageAddress } from './teletext/page-address.ts';
import { PageCache } from './teletext/page-cache.ts';
import { PageFetcher } from './teletext/page-fetcher.ts';
import { Viewer, type TerminalSize } from './viewer.ts';

const logger = getLogger('Main');

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

const LIFECYCLE: TerminalLifecycleOptions = { alternateScreen: true, hideCursor: true };

const encoder = new TextEncoder();

function loadConfig(argv: readonly string[]): { config: ViewerConfig; help: boolean } | null {
  try {
    return ViewerConfig.load(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`teletext-viewer: ${error.message}`);
      console.error('Run with --help for usage.');
      return null;
    }
    throw error;
  }
}

function startLogging(config: ViewerConfig): boolean {
  try {
    setGlobalLogger(createLogger({ level: config.logLevel, logFile: config.logFile, format: config.logFormat }));
    return true;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`teletext-viewer: ${error.message}`);
      console.error('Set --log-file or TELETEXT_LOG_FILE to another path, or to an empty string to disable logging.');
      return false;
    }
    throw error;
  }
}

/**
 * Run the viewer until the user quits. Returns the process exit code.
 */
export async function main(argv: readonly string[] = args()): Promise<number> {
  const loaded = loadConfig(argv);
  if (!loaded) {
    return 1;
  }
  if (loaded.help) {
    console.log(generateConfigHelp());
    return 0;
  }

  const { config } = loaded;
  if (!startLogging(config)) {
    return 1;
  }
  logger.info('Starting', { runtime: `${runtimeName()} ${runtimeVersion()}` });
  logger.debug('Configuration', { resolved: config.describe() });

  try {
    setupTerminal(LIFECYCLE);
  } catch (error) {
    if (error instanceof TerminalCapabilityError) {
      logger.error('Terminal setup failed', error);
      console.error(`teletext-viewer: ${error.message}`);
      getGlobalLogger().close();
      return 1;
    }
    throw error;
  }

  const input = new InputQueue(stdin.onData);
  let viewer: Viewer | undefined;
  let removeHandlers: () => void = () => {};

  try {
    removeHandlers = setupCleanupHandlers({
      onShutdownSignal: () => input.pushEvent({ type: 'quit' }),
      onResize: () => viewer?.requestFullRepaint(),
      onFatal: () => {
        emergencyCleanupTerminal();
        getGlobalLogger().close();
      },
    });

    const detection = await new CapabilityDetector({ preference: config.graphicsMode }).detect();

    // Detection reads stdin itself; keys are only consumed after it finishes
    input.start();

    viewer = new Viewer({
      navigation: new NavigationController(createPageAddress(config.startPage)),
      cache: new PageCache(),
      source: new PageFetcher({ baseUrl: config.baseUrl, timeoutMs: config.fetchTimeoutMs }),
      input,
      output: { write: (data) => stdout.writeSync(encoder.encode(data)) },
      size: () => consoleSize() ?? FALLBACK_SIZE,
      mode: detection.mode,
      cellSize: detection.cellSize,
      useMultipart: detection.details.useMultipart,
    });

    await viewer.run();
  } catch (error) {
    logger.fatal('Viewer failed', ensureError(error));
    throw error;
  } finally {
    input.stop();
    removeHandlers();
    cleanupTerminal(LIFECYCLE);
    getGlobalLogger().close();
  }

  return 0;
}
