// Tests for schema-driven configuration

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { generateConfigHelp, parseCliFlags } from '../src/config/cli.ts';
import { ViewerConfig } from '../src/config/config.ts';
import { Env } from '../src/env.ts';
import { ConfigError } from '../src/errors.ts';

function load(args: string[], env: Record<string, string> = {}): ViewerConfig {
  return Env.withOverrides(Env.isolatedValues(env), () => ViewerConfig.load(args).config);
}

function loadError(args: string[], env: Record<string, string> = {}): string {
  try {
    load(args, env);
  } catch (error) {
    assert.ok(error instanceof ConfigError);
    return error.message;
  }
  assert.fail('expected a ConfigError');
}

test('CLI Flag Parsing', async (t) => {
  await t.test('both value forms', () => {
    assert.deepEqual(parseCliFlags(['--page', '101', '--graphics=sixel']), {
      flags: { 'page.start': 101, 'graphics.mode': 'sixel' },
      help: false,
    });
  });

  await t.test('help', () => {
    assert.equal(parseCliFlags(['--help']).help, true);
    assert.equal(parseCliFlags(['-h']).help, true);
  });

  await t.test('unknown options and stray arguments are rejected', () => {
    assert.equal(loadError(['--bogus']), 'Unknown option: --bogus');
    assert.equal(loadError(['extra']), 'Unexpected argument: extra');
  });

  await t.test('missing values', () => {
    assert.equal(loadError(['--page']), '--page requires a value');
    assert.equal(loadError(['--graphics', '--page', '200']), '--graphics requires a value [auto|iterm2|kitty|sixel|block]');
  });

  await t.test('malformed numbers', () => {
    assert.equal(loadError(['--page', 'abc']), 'Invalid integer value for --page: abc');
    assert.equal(loadError(['--timeout=1.5']), 'Invalid integer value for --timeout: 1.5');
  });
});

test('Viewer Config', async (t) => {
  await t.test('schema defaults', () => {
    const config = load([]);
    assert.equal(config.startPage, 100);
    assert.equal(config.graphicsMode, 'auto');
    assert.equal(config.fetchTimeoutMs, 10000);
    assert.equal(config.baseUrl, 'http://www.televideo.rai.it/televideo/pub/tt4web/Nazionale');
    assert.equal(config.logLevel, 'INFO');
    assert.equal(config.logFile, undefined);
    assert.equal(config.getSource('page.start'), 'default');
  });

  await t.test('flags', () => {
    const config = load(['--page', '888', '--graphics', 'block', '--timeout', '2500', '--base-url', 'http://teletext.test']);
    assert.equal(config.startPage, 888);
    assert.equal(config.graphicsMode, 'block');
    assert.equal(config.fetchTimeoutMs, 2500);
    assert.equal(config.baseUrl, 'http://teletext.test');
    assert.equal(config.getSource('fetch.baseUrl'), 'cli');
  });

  await t.test('environment overrides defaults, flags override environment', () => {
    const fromEnv = load([], { TELETEXT_LOG_LEVEL: 'DEBUG' });
    assert.equal(fromEnv.logLevel, 'DEBUG');
    assert.equal(fromEnv.getSource('log.level'), 'env');

    const fromFlag = load(['--log-level', 'WARN'], { TELETEXT_LOG_LEVEL: 'DEBUG' });
    assert.equal(fromFlag.logLevel, 'WARN');
    assert.equal(fromFlag.getSource('log.level'), 'cli');
  });

  await t.test('log format', () => {
    assert.equal(load([]).logFormat, 'structured');
    assert.equal(load([], { TELETEXT_LOG_FORMAT: 'json' }).logFormat, 'json');
    assert.equal(load(['--log-format', 'text'], { TELETEXT_LOG_FORMAT: 'json' }).logFormat, 'text');
    assert.equal(loadError(['--log-format=xml']), 'Invalid value for --log-format: xml [structured|text|json]');
  });

  await t.test('enum values ignore case', () => {
    const config = load(['--graphics', 'Kitty'], { TELETEXT_LOG_LEVEL: 'debug' });
    assert.equal(config.graphicsMode, 'kitty');
    assert.equal(config.logLevel, 'DEBUG');
    assert.equal(config.getSource('log.level'), 'env');
  });

  await t.test('an empty log file disables logging', () => {
    assert.equal(load([], { TELETEXT_LOG_FILE: '' }).logFile, '');
    assert.equal(load(['--log-file', '/tmp/viewer.log']).logFile, '/tmp/viewer.log');
  });

  await t.test('range and enum checks', () => {
    assert.equal(loadError(['--page', '950']), '--page must be at most 899, got 950');
    assert.equal(loadError(['--page=99']), '--page must be at least 100, got 99');
    assert.equal(loadError(['--graphics', 'ascii']), 'Invalid value for --graphics: ascii [auto|iterm2|kitty|sixel|block]');
    assert.equal(
      loadError([], { TELETEXT_LOG_LEVEL: 'LOUD' }),
      'Invalid value for TELETEXT_LOG_LEVEL: LOUD [TRACE|DEBUG|INFO|WARN|ERROR|FATAL]',
    );
  });

  await t.test('help comes from the schema', () => {
    const lines = generateConfigHelp().split('\n');
    assert.equal(lines[0], 'Usage: teletext-viewer [options]');
    const page = lines.indexOf('    --page <value>');
    assert.ok(page > 0);
    assert.equal(lines[page + 1], '      Page shown at startup (100-899) (default: 100)');
    assert.ok(lines.includes('    --graphics <value> | TELETEXT_GRAPHICS'));
    assert.ok(lines.includes('  --help, -h'));
  });
});
