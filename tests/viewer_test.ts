// Tests for the frame driver: input, page resolution and frame composition

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ANSI } from '../src/ansi-output.ts';
import type { RenderMode } from '../src/capability-detector.ts';
import { FetchError } from '../src/errors.ts';
import { InputQueue } from '../src/input.ts';
import { deleteAllKittyImages } from '../src/kitty/encoder.ts';
import { HELP_LINE, computeLayout, formatFooter, formatHeader, renderBar } from '../src/layout.ts';
import { NavigationController } from '../src/navigation.ts';
import { render } from '../src/renderer.ts';
import { createPageAddress, formatPageAddress, type PageAddress } from '../src/teletext/page-address.ts';
import { PageCache } from '../src/teletext/page-cache.ts';
import type { FetchResult } from '../src/teletext/page-fetcher.ts';
import { CACHE_CLEARED_MESSAGE, PLACEHOLDER_TEXT, Viewer, type PageSource, type TerminalSize } from '../src/viewer.ts';
import { FakeClock, MemoryOutput, gridFrom } from './helpers.ts';

const CELL = { width: 10, height: 20 };
const IMAGE = gridFrom(2, 2, [0xff0000, 0xff0000, 0x0000ff, 0xff0000]);

/**
 * Serves IMAGE for the listed pages and a 404 for everything else.
 */
class FakeSource implements PageSource {
  readonly calls: string[] = [];

  constructor(private readonly _available: Set<string>) {}

  fetch(address: PageAddress): Promise<FetchResult> {
    const key = formatPageAddress(address);
    this.calls.push(key);
    if (this._available.has(key)) {
      return Promise.resolve({ ok: true, image: IMAGE });
    }
    const url = `http://teletext.test/16_9_page-${key}.png`;
    return Promise.resolve({ ok: false, error: new FetchError('HTTP 404 Not Found', 'http-status', url, 404) });
  }
}

interface Harness {
  viewer: Viewer;
  navigation: NavigationController;
  cache: PageCache;
  source: FakeSource;
  input: InputQueue;
  output: MemoryOutput;
  clock: FakeClock;
  resize(columns: number, rows: number): void;
}

function createHarness(options: {
  pages?: string[];
  start?: PageAddress;
  size?: TerminalSize;
  mode?: RenderMode;
} = {}): Harness {
  const clock = new FakeClock();
  const navigation = new NavigationController(options.start);
  const cache = new PageCache({ now: clock.now });
  const source = new FakeSource(new Set(options.pages ?? ['100']));
  const input = new InputQueue();
  const output = new MemoryOutput();
  let size = options.size ?? { columns: 80, rows: 24 };
  const viewer = new Viewer({
    navigation,
    cache,
    source,
    input,
    output,
    size: () => size,
    mode: options.mode ?? 'block-fallback',
    cellSize: CELL,
    now: clock.now,
    pollTimeoutMs: 1,
  });
  const resize = (columns: number, rows: number): void => {
    size = { columns, rows };
  };
  return { viewer, navigation, cache, source, input, output, clock, resize };
}

function press(input: InputQueue, text: string): void {
  input.push(new TextEncoder().encode(text));
}

test('Viewer Frames', async (t) => {
  await t.test('first frame: loading header, then a full repaint', async () => {
    const h = createHarness({ size: { columns: 4, rows: 4 } });
    assert.equal(await h.viewer.step(), true);

    const layout = computeLayout(4, 4);
    const address = createPageAddress(100);
    assert.equal(h.output.frames.length, 2);
    assert.equal(
      h.output.frames[0],
      ANSI.beginSync + renderBar(layout.header, formatHeader(address, { loading: true }, 4)) + ANSI.endSync,
    );
    assert.equal(
      h.output.frames[1],
      ANSI.beginSync +
        ANSI.clearScreen +
        renderBar(layout.header, formatHeader(address, { loading: false }, 4)) +
        render(IMAGE, 'block-fallback', layout.viewport, { cellSize: CELL }).data +
        renderBar(layout.footer, formatFooter(h.navigation.state, {}, 4)) +
        ANSI.endSync,
    );
    assert.deepEqual(h.viewer.displayedAddress, { page: 100 });
    assert.equal(h.viewer.frameCount, 1);
  });

  await t.test('an unchanged viewport is not repainted', async () => {
    const h = createHarness({ size: { columns: 4, rows: 4 } });
    await h.viewer.step();
    h.output.clear();

    await h.viewer.step();
    const layout = computeLayout(4, 4);
    assert.deepEqual(h.output.frames, [
      ANSI.beginSync +
        renderBar(layout.header, formatHeader(createPageAddress(100), { loading: false }, 4)) +
        renderBar(layout.footer, formatFooter(h.navigation.state, {}, 4)) +
        ANSI.endSync,
    ]);
    assert.deepEqual(h.source.calls, ['100']);
  });

  await t.test('a resize repaints everything', async () => {
    const h = createHarness();
    await h.viewer.step();
    h.resize(60, 20);
    h.output.clear();

    await h.viewer.step();
    const layout = computeLayout(60, 20);
    assert.ok(h.output.last.startsWith(ANSI.beginSync + ANSI.clearScreen));
    assert.ok(h.output.last.includes(render(IMAGE, 'block-fallback', layout.viewport, { cellSize: CELL }).data));
  });

  await t.test('requested full repaint', async () => {
    const h = createHarness();
    await h.viewer.step();
    h.viewer.requestFullRepaint();
    await h.viewer.step();
    assert.ok(h.output.last.startsWith(ANSI.beginSync + ANSI.clearScreen));
  });

  await t.test('kitty full repaint removes old placements first', async () => {
    const h = createHarness({ mode: 'cell-graphics-protocol' });
    await h.viewer.step();
    assert.ok(h.output.last.startsWith(ANSI.beginSync + deleteAllKittyImages() + ANSI.clearScreen));
  });
});

test('Viewer Page Resolution', async (t) => {
  await t.test('a failed fetch keeps the previous image', async () => {
    const h = createHarness();
    await h.viewer.step();
    press(h.input, '\x1b[C');
    await h.viewer.step();

    assert.deepEqual(h.source.calls, ['100', '101']);
    assert.deepEqual(h.navigation.currentAddress, { page: 101 });
    assert.deepEqual(h.viewer.displayedAddress, { page: 100 });

    const layout = computeLayout(80, 24);
    assert.ok(h.output.last.includes(
      renderBar(layout.header, formatHeader(createPageAddress(101), { loading: false, error: 'HTTP 404 Not Found' }, 80)),
    ));
    assert.ok(h.output.last.includes(renderBar(layout.footer, '  fetch failed: HTTP 404 Not Found')));
  });

  await t.test('a failed page is retried only after the retry delay', async () => {
    const h = createHarness({ pages: [] });
    await h.viewer.step();
    await h.viewer.step();
    assert.deepEqual(h.source.calls, ['100']);

    h.clock.advance(5000);
    await h.viewer.step();
    assert.deepEqual(h.source.calls, ['100', '100']);
  });

  await t.test('placeholder when nothing was ever shown', async () => {
    const h = createHarness({ pages: [] });
    await h.viewer.step();
    assert.equal(h.viewer.displayedAddress, undefined);
    assert.ok(h.output.last.includes(PLACEHOLDER_TEXT));
  });

  await t.test('cached pages are not fetched again', async () => {
    const h = createHarness({ pages: ['100', '101'] });
    await h.viewer.step();
    press(h.input, '\x1b[C');
    await h.viewer.step();
    press(h.input, '\x1b[D');
    await h.viewer.step();
    assert.deepEqual(h.source.calls, ['100', '101']);
    assert.deepEqual(h.viewer.displayedAddress, { page: 100 });
  });

  await t.test('cached pages expire', async () => {
    const h = createHarness();
    await h.viewer.step();
    h.clock.advance(5 * 60 * 1000);
    await h.viewer.step();
    assert.deepEqual(h.source.calls, ['100', '100']);
  });

  await t.test('a missing sub-page caps Down', async () => {
    const h = createHarness({ pages: ['101'], start: createPageAddress(101) });
    await h.viewer.step();
    press(h.input, '\x1b[B');
    await h.viewer.step();
    assert.deepEqual(h.source.calls, ['101', '101.2']);
    assert.equal(h.navigation.subPageCount(101), 1);
  });

  await t.test('clearing the cache refetches and shows a notice until the next key', async () => {
    const h = createHarness();
    await h.viewer.step();
    press(h.input, 'c');
    await h.viewer.step();
    assert.deepEqual(h.source.calls, ['100', '100']);
    assert.ok(h.output.last.includes(`  ${CACHE_CLEARED_MESSAGE}`));

    press(h.input, '\x1b[D');
    await h.viewer.step();
    assert.equal(h.output.last.includes(CACHE_CLEARED_MESSAGE), false);
    assert.ok(h.output.last.includes(HELP_LINE));
  });

  await t.test('invalid page entry is reported in the footer', async () => {
    const h = createHarness();
    await h.viewer.step();
    press(h.input, '9');
    await h.viewer.step();
    assert.ok(h.output.last.includes('  Go to page: 9_'));
    press(h.input, '\r');
    await h.viewer.step();
    assert.ok(h.output.last.includes('  Page must be between 100-899'));
    assert.deepEqual(h.navigation.currentAddress, { page: 100 });
  });
});

test('Viewer Loop', async (t) => {
  await t.test('quit ends the loop without drawing', async () => {
    const h = createHarness();
    h.input.pushEvent({ type: 'quit' });
    assert.equal(await h.viewer.step(), false);
    assert.equal(h.output.frames.length, 0);
  });

  await t.test('run draws until quit', async () => {
    const h = createHarness();
    press(h.input, '\x1b[C');
    h.input.pushEvent({ type: 'quit' });
    await h.viewer.run();
    assert.equal(h.viewer.frameCount, 1);
    assert.deepEqual(h.source.calls, ['101']);
  });
});
