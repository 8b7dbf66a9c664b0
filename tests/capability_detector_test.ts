// Tests for graphics protocol detection

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { CapabilityDetector, clearDetectionCaches } from '../src/capability-detector.ts';
import { Env } from '../src/env.ts';
import { isInMultiplexer, isRemoteSession, type TerminalQuery } from '../src/graphics/detection-base.ts';
import { detectKittyCapabilities, KITTY_QUERY, parseKittyResponse } from '../src/kitty/detect.ts';
import { CELL_SIZE_QUERY, DA1_QUERY, parseCellSizeResponse, parseDA1Response } from '../src/sixel/detect.ts';

/**
 * Terminal that answers each request from a fixed table; unknown requests
 * time out.
 */
class ScriptedQuery implements TerminalQuery {
  readonly requests: string[] = [];

  constructor(
    private readonly _replies: Record<string, string> = {},
    private readonly _terminal = true,
  ) {}

  isTerminal(): boolean {
    return this._terminal;
  }

  query(request: string, isComplete: (buffer: string) => boolean): Promise<string | null> {
    this.requests.push(request);
    const reply = this._replies[request];
    return Promise.resolve(reply !== undefined && isComplete(reply) ? reply : null);
  }
}

function detectWith(env: Record<string, string>, query: ScriptedQuery, detector = new CapabilityDetector({ query })) {
  return Env.withOverridesAsync(Env.isolatedValues(env), () => detector.detect());
}

test('Capability Detection', async (t) => {
  await t.test('iTerm2 from the environment, cell size from the terminal', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [CELL_SIZE_QUERY]: '\x1b[6;18;9t' });
    const result = await detectWith({ TERM_PROGRAM: 'iTerm.app' }, query);
    assert.equal(result.mode, 'inline-protocol');
    assert.deepEqual(result.cellSize, { width: 9, height: 18 });
    assert.equal(result.details.cellSizeFromTerminal, true);
    assert.equal(result.details.useMultipart, false);
    assert.deepEqual(query.requests, [CELL_SIZE_QUERY]);
  });

  await t.test('iTerm2 inside tmux uses multipart framing', async () => {
    clearDetectionCaches();
    const result = await detectWith({ LC_TERMINAL: 'iTerm2', TMUX: '/tmp/tmux-1000/default,1,0' }, new ScriptedQuery());
    assert.equal(result.mode, 'inline-protocol');
    assert.equal(result.details.useMultipart, true);
    assert.deepEqual(result.cellSize, { width: 10, height: 20 });
    assert.equal(result.details.cellSizeFromTerminal, false);
  });

  await t.test('kitty confirmed by its query reply', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [KITTY_QUERY]: '\x1b_Gi=31;OK\x1b\\' });
    const result = await detectWith({ KITTY_WINDOW_ID: '1' }, query);
    assert.equal(result.mode, 'cell-graphics-protocol');
    assert.equal(result.details.kitty?.detectionMethod, 'query');
    assert.deepEqual(query.requests, [KITTY_QUERY, CELL_SIZE_QUERY]);
  });

  await t.test('kitty error reply falls through to the next protocol', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [KITTY_QUERY]: '\x1b_Gi=31;ENOENT:unsupported\x1b\\' });
    const result = await detectWith({ KITTY_WINDOW_ID: '1' }, query);
    assert.equal(result.mode, 'block-fallback');
    assert.equal(result.details.kitty?.supported, false);
    assert.deepEqual(query.requests, [KITTY_QUERY, DA1_QUERY, CELL_SIZE_QUERY]);
  });

  await t.test('sixel from DA1 with a known cell size', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({
      [DA1_QUERY]: '\x1b[?62;4;22c',
      [CELL_SIZE_QUERY]: '\x1b[6;20;10t',
    });
    const result = await detectWith({ TERM: 'xterm-256color' }, query);
    assert.equal(result.mode, 'pixel-approximation');
    assert.deepEqual(result.cellSize, { width: 10, height: 20 });
    assert.deepEqual(query.requests, [DA1_QUERY, CELL_SIZE_QUERY]);
  });

  await t.test('sixel without a cell size is not usable', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [DA1_QUERY]: '\x1b[?62;4;22c' });
    const result = await detectWith({}, query);
    assert.equal(result.mode, 'block-fallback');
    assert.equal(result.details.sixel?.supported, false);
    assert.deepEqual(result.cellSize, { width: 10, height: 20 });
  });

  await t.test('no sixel attribute: block fallback keeps the measured cell size', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({
      [DA1_QUERY]: '\x1b[?62;22c',
      [CELL_SIZE_QUERY]: '\x1b[6;16;8t',
    });
    const result = await detectWith({}, query);
    assert.equal(result.mode, 'block-fallback');
    assert.deepEqual(result.cellSize, { width: 8, height: 16 });
    assert.equal(result.details.cellSizeFromTerminal, true);
  });

  await t.test('sixel is skipped over SSH', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [DA1_QUERY]: '\x1b[?62;4;22c', [CELL_SIZE_QUERY]: '\x1b[6;20;10t' });
    const result = await detectWith({ SSH_TTY: '/dev/pts/1' }, query);
    assert.equal(result.mode, 'block-fallback');
    assert.deepEqual(result.details.sixel?.quirks, ['ssh-disabled']);
    assert.deepEqual(query.requests, []);
  });

  await t.test('no terminal: nothing is queried', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({}, false);
    const result = await detectWith({ TERM_PROGRAM: 'iTerm.app' }, query);
    assert.equal(result.mode, 'block-fallback');
    assert.deepEqual(query.requests, []);
  });

  await t.test('results are cached for the session', async () => {
    clearDetectionCaches();
    const first = new ScriptedQuery({ [DA1_QUERY]: '\x1b[?4c', [CELL_SIZE_QUERY]: '\x1b[6;20;10t' });
    assert.equal((await detectWith({}, first)).mode, 'pixel-approximation');

    const second = new ScriptedQuery();
    assert.equal((await detectWith({}, second)).mode, 'pixel-approximation');
    assert.deepEqual(second.requests, []);
  });

  await t.test('forced mode skips probing but still measures cells', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [CELL_SIZE_QUERY]: '\x1b[6;24;12t' });
    const result = await detectWith({}, query, new CapabilityDetector({ query, preference: 'sixel' }));
    assert.equal(result.mode, 'pixel-approximation');
    assert.equal(result.details.forced, true);
    assert.deepEqual(result.cellSize, { width: 12, height: 24 });
    assert.deepEqual(query.requests, [CELL_SIZE_QUERY]);
  });

  await t.test('forced mode without a terminal uses the default cell size', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({}, false);
    const result = await detectWith({}, query, new CapabilityDetector({ query, preference: 'kitty' }));
    assert.equal(result.mode, 'cell-graphics-protocol');
    assert.deepEqual(result.cellSize, { width: 10, height: 20 });
    assert.equal(result.details.cellSizeFromTerminal, false);
  });

  await t.test('kitty is never queried inside a multiplexer', async () => {
    clearDetectionCaches();
    const query = new ScriptedQuery({ [KITTY_QUERY]: '\x1b_Gi=31;OK\x1b\\' });
    const caps = await Env.withOverridesAsync(
      Env.isolatedValues({ KITTY_WINDOW_ID: '1', STY: '1234.pts-0' }),
      () => detectKittyCapabilities(query, { forceRedetect: true }),
    );
    assert.equal(caps.supported, false);
    assert.equal(caps.inMultiplexer, true);
    assert.deepEqual(query.requests, []);
  });
});

test('Terminal Reply Parsing', async (t) => {
  await t.test('DA1', () => {
    assert.equal(parseDA1Response('\x1b[?62;4;22c'), true);
    assert.equal(parseDA1Response('\x1b[?64;1;2;6c'), false);
    assert.equal(parseDA1Response('garbage'), false);
  });

  await t.test('cell size', () => {
    assert.deepEqual(parseCellSizeResponse('\x1b[6;20;10t'), { width: 10, height: 20 });
    assert.equal(parseCellSizeResponse('\x1b[6;0;0t'), null);
    assert.equal(parseCellSizeResponse('\x1b[4;600;800t'), null);
  });

  await t.test('kitty', () => {
    assert.deepEqual(parseKittyResponse('\x1b_Gi=31;OK\x1b\\'), { id: 31, ok: true, error: undefined });
    assert.deepEqual(parseKittyResponse('\x1b_Gi=31;EINVAL:bad\x1b\\'), { id: 31, ok: false, error: 'EINVAL:bad' });
    assert.equal(parseKittyResponse('\x1b[?62c'), null);
  });
});

test('Session Environment', async (t) => {
  const withEnv = <T>(env: Record<string, string>, fn: () => T): T => Env.withOverrides(Env.isolatedValues(env), fn);

  await t.test('tmux and screen count as multiplexers', () => {
    assert.equal(withEnv({ TMUX: '/tmp/tmux-1000/default,1,0' }, isInMultiplexer), true);
    assert.equal(withEnv({ STY: '4242.pts-0.host' }, isInMultiplexer), true);
    assert.equal(withEnv({ TERM_PROGRAM: 'tmux' }, isInMultiplexer), true);
    assert.equal(withEnv({ TERM_PROGRAM: 'WezTerm' }, isInMultiplexer), false);
  });

  await t.test('any SSH variable marks a remote session', () => {
    assert.equal(withEnv({ SSH_CONNECTION: '10.0.0.1 5000 10.0.0.2 22' }, isRemoteSession), true);
    assert.equal(withEnv({}, isRemoteSession), false);
  });
});
