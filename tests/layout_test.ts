// Tests for screen layout and the header/footer bars

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { HELP_LINE, computeLayout, fitText, formatFooter, formatHeader, renderBar } from '../src/layout.ts';
import type { NavigationState } from '../src/navigation.ts';
import { createPageAddress } from '../src/teletext/page-address.ts';

const idle: NavigationState = { currentAddress: createPageAddress(100), pendingDigits: '' };

test('Screen Layout', async (t) => {
  await t.test('header, viewport and footer rows', () => {
    assert.deepEqual(computeLayout(80, 24), {
      header: { x: 0, y: 0, width: 80, height: 1 },
      viewport: { x: 0, y: 1, width: 80, height: 22 },
      footer: { x: 0, y: 23, width: 80, height: 1 },
    });
  });

  await t.test('tiny terminals leave no viewport', () => {
    assert.deepEqual(computeLayout(80, 2), {
      header: { x: 0, y: 0, width: 80, height: 1 },
      viewport: { x: 0, y: 1, width: 80, height: 0 },
      footer: { x: 0, y: 1, width: 80, height: 1 },
    });
    assert.deepEqual(computeLayout(80, 1).footer, { x: 0, y: 0, width: 80, height: 0 });
    assert.deepEqual(computeLayout(0, 0).header, { x: 0, y: 0, width: 0, height: 0 });
  });

  await t.test('text fitting', () => {
    assert.equal(fitText('abc', 5), 'abc  ');
    assert.equal(fitText('abcdef', 3), 'abc');
    assert.equal(fitText('abc', 0), '');
  });
});

test('Header Bar', async (t) => {
  await t.test('page title', () => {
    assert.equal(formatHeader(createPageAddress(101, 2), { loading: false }, 30), '  TELEVIDEO - Page 101.2      ');
  });

  await t.test('loading indicator on the right', () => {
    assert.equal(
      formatHeader(createPageAddress(101), { loading: true }, 40),
      '  TELEVIDEO - Page 101      Loading...  ',
    );
  });

  await t.test('error wins when the row is narrow', () => {
    assert.equal(
      formatHeader(createPageAddress(101), { loading: false, error: 'HTTP 404 Not Found' }, 20),
      'ERROR: HTTP 404 Not ',
    );
  });
});

test('Footer Bar', async (t) => {
  await t.test('page entry comes first', () => {
    const state = { ...idle, pendingDigits: '12', lastError: 'Page must be between 100-899' };
    assert.equal(formatFooter(state, { fetchError: 'HTTP 500' }, 20), '  Go to page: 12_   ');
  });

  await t.test('input error before fetch failure', () => {
    const state = { ...idle, lastError: 'Page must be between 100-899' };
    assert.equal(formatFooter(state, { fetchError: 'HTTP 500' }, 30), '  Page must be between 100-899');
  });

  await t.test('fetch failure before notices', () => {
    assert.equal(formatFooter(idle, { fetchError: 'HTTP 500', info: 'Cache cleared!' }, 24), '  fetch failed: HTTP 500');
  });

  await t.test('notice', () => {
    assert.equal(formatFooter(idle, { info: 'Cache cleared!' }, 16), '  Cache cleared!');
  });

  await t.test('key help otherwise', () => {
    assert.equal(formatFooter(idle, {}, HELP_LINE.length), HELP_LINE);
  });
});

test('Bar Rendering', async (t) => {
  await t.test('white on navy across the row', () => {
    assert.equal(
      renderBar({ x: 0, y: 23, width: 5, height: 1 }, 'ab'),
      '\x1b[24;1H\x1b[38;2;255;255;255m\x1b[48;2;0;0;128mab   \x1b[0m',
    );
  });

  await t.test('zero-height bars are not drawn', () => {
    assert.equal(renderBar({ x: 0, y: 0, width: 5, height: 0 }, 'ab'), '');
  });
});
