// Frame driver: poll input, resolve the current page image, draw one frame

import { ANSI } from './ansi-output.ts';
import type { RenderMode } from './capability-detector.ts';
import type { CellSize, Rect } from './geometry.ts';
import type { PixelGrid } from './image/pixel-grid.ts';
import type { InputQueue } from './input.ts';
import { deleteAllKittyImages } from './kitty/encoder.ts';
import { computeLayout, formatFooter, formatHeader, renderBar, type ScreenLayout } from './layout.ts';
import { getLogger } from './logging.ts';
import type { NavigationController } from './navigation.ts';
import { render, renderPlaceholder } from './renderer.ts';
import { formatPageAddress, subPageIndex, type PageAddress } from './teletext/page-address.ts';
import type { PageCache } from './teletext/page-cache.ts';
import type { FetchResult } from './teletext/page-fetcher.ts';

const logger = getLogger('Viewer');

export const POLL_TIMEOUT_MS = 100;
export const RETRY_DELAY_MS = 5000;
export const CACHE_CLEARED_MESSAGE = 'Cache cleared!';
export const PLACEHOLDER_TEXT = 'Page unavailable';

export interface PageSource {
  fetch(address: PageAddress): Promise<FetchResult>;
}

export interface OutputSink {
  write(data: string): void;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface ViewerOptions {
  navigation: NavigationController;
  cache: PageCache;
  source: PageSource;
  input: InputQueue;
  output: OutputSink;
  /** Read on every draw */
  size: () => TerminalSize;
  mode: RenderMode;
  cellSize: CellSize;
  useMultipart?: boolean;
  now?: () => number;
  pollTimeoutMs?: number;
  retryDelayMs?: number;
}

interface FailedResolve {
  key: string;
  at: number;
  message: string;
}

export class Viewer {
  private readonly _options: ViewerOptions;
  private readonly _now: () => number;
  private _shown: { address: PageAddress; image: PixelGrid } | null = null;
  private _failure: FailedResolve | null = null;
  private _info: string | undefined;
  private _loading = false;
  private _needsFullRepaint = true;
  private _lastSize: TerminalSize | null = null;
  // What the viewport currently shows; repainted only when this changes
  private _paintedContent: PixelGrid | string | null = null;
  private _paintedViewport = '';
  private _frames = 0;

  constructor(options: ViewerOptions) {
    this._options = options;
    this._now = options.now ?? Date.now;
  }

  get frameCount(): number {
    return this._frames;
  }

  get displayedAddress(): PageAddress | undefined {
    return this._shown?.address;
  }

  /**
   * Force the next draw to clear and repaint everything (SIGWINCH)
   */
  requestFullRepaint(): void {
    this._needsFullRepaint = true;
  }

  /**
   * Run until quit
   */
  async run(): Promise<void> {
    logger.info('Viewer started', { page: formatPageAddress(this._options.navigation.currentAddress) });
    while (await this.step()) {
      // one frame per iteration
    }
    logger.info('Viewer stopped', { frames: this._frames });
  }

  /**
   * One loop iteration: at most one key, then resolve, then one frame.
   * Returns false once the user quits.
   */
  async step(): Promise<boolean> {
    const { navigation, input, cache } = this._options;

    const event = await input.poll(this._options.pollTimeoutMs ?? POLL_TIMEOUT_MS);
    if (event) {
      this._info = undefined;
      const effect = navigation.handle(event);
      if (effect === 'quit') {
        logger.info('Quit requested');
        return false;
      }
      if (effect === 'clear-cache') {
        cache.clear();
        this._failure = null;
        this._info = CACHE_CLEARED_MESSAGE;
      }
    }

    await this.resolve();
    this.draw();
    return true;
  }

  /**
   * Make sure the image for the current address is known: cache hit, or a
   * blocking fetch. Failures leave the previous image on screen.
   */
  async resolve(): Promise<void> {
    const { navigation, cache, source } = this._options;
    const address = navigation.currentAddress;
    const key = formatPageAddress(address);

    const cached = cache.get(address);
    if (cached) {
      this._shown = { address, image: cached };
      if (this._failure?.key === key) {
        this._failure = null;
      }
      return;
    }

    // A failed address waits for navigation, a cache clear or the retry delay
    if (this._failure && this._failure.key === key && this._now() - this._failure.at < (this._options.retryDelayMs ?? RETRY_DELAY_MS)) {
      return;
    }

    this._loading = true;
    this._drawHeaderOnly();
    const result = await source.fetch(address);
    this._loading = false;

    if (result.ok) {
      cache.put(address, result.image);
      this._shown = { address, image: result.image };
      this._failure = null;
      return;
    }

    const { error } = result;
    this._failure = { key, at: this._now(), message: error.message };
    if (error.isNotFound && subPageIndex(address) > 1) {
      navigation.noteMissingSubPage(address);
    }
    logger.warn('Page unavailable', { page: key, kind: error.kind, message: error.message });
  }

  /**
   * Write one complete frame in a synchronized-update block
   */
  draw(): void {
    const layout = this._layout();
    let frame = ANSI.beginSync;

    if (this._needsFullRepaint) {
      frame += (this._options.mode === 'cell-graphics-protocol' ? deleteAllKittyImages() : '') + ANSI.clearScreen;
      this._paintedContent = null;
      this._needsFullRepaint = false;
    }

    frame += this._headerData(layout);
    frame += this._viewportData(layout.viewport);
    frame += renderBar(layout.footer, formatFooter(this._options.navigation.state, this._footerStatus(), layout.footer.width));
    frame += ANSI.endSync;

    this._options.output.write(frame);
    this._frames++;
  }

  private _layout(): ScreenLayout {
    const size = this._options.size();
    if (this._lastSize && (this._lastSize.columns !== size.columns || this._lastSize.rows !== size.rows)) {
      logger.debug('Terminal resized', { columns: size.columns, rows: size.rows });
      this._needsFullRepaint = true;
    }
    this._lastSize = { columns: size.columns, rows: size.rows };
    return computeLayout(size.columns, size.rows);
  }

  private _currentFailure(): FailedResolve | null {
    const key = formatPageAddress(this._options.navigation.currentAddress);
    return this._failure?.key === key ? this._failure : null;
  }

  private _footerStatus(): { fetchError?: string; info?: string } {
    const failure = this._currentFailure();
    return {
      ...(failure ? { fetchError: failure.message } : {}),
      ...(this._info !== undefined ? { info: this._info } : {}),
    };
  }

  private _headerData(layout: ScreenLayout): string {
    const failure = this._currentFailure();
    const text = formatHeader(
      this._options.navigation.currentAddress,
      { loading: this._loading, ...(failure ? { error: failure.message } : {}) },
      layout.header.width,
    );
    return renderBar(layout.header, text);
  }

  // "Loading..." shown while the fetch blocks the loop
  private _drawHeaderOnly(): void {
    const layout = this._layout();
    this._options.output.write(ANSI.beginSync + this._headerData(layout) + ANSI.endSync);
  }

  private _viewportData(viewport: Rect): string {
    const viewportKey = `${viewport.x},${viewport.y},${viewport.width},${viewport.height}`;
    const content: PixelGrid | string = this._shown?.image ?? (this._currentFailure() ? PLACEHOLDER_TEXT : '');

    if (content === this._paintedContent && viewportKey === this._paintedViewport) {
      return '';
    }
    this._paintedContent = content;
    this._paintedViewport = viewportKey;

    const { mode, cellSize, useMultipart } = this._options;
    if (typeof content === 'string') {
      return renderPlaceholder(content, mode, viewport);
    }
    return render(content, mode, viewport, { cellSize, useMultipart }).data;
  }
}
