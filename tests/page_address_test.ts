// Tests for page addressing

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidPageNumberError } from '../src/errors.ts';
import {
  createPageAddress,
  formatPageAddress,
  isValidPage,
  sameAddress,
  subPageIndex,
} from '../src/teletext/page-address.ts';

test('Page Addresses', async (t) => {
  await t.test('accepts the whole 100-899 range', () => {
    assert.equal(isValidPage(100), true);
    assert.equal(isValidPage(899), true);
    assert.equal(isValidPage(99), false);
    assert.equal(isValidPage(900), false);
    assert.equal(isValidPage(100.5), false);
  });

  await t.test('rejects pages out of range', () => {
    assert.throws(() => createPageAddress(99), InvalidPageNumberError);
    assert.throws(() => createPageAddress(900), InvalidPageNumberError);
    assert.throws(() => createPageAddress(101, 0), InvalidPageNumberError);
    assert.throws(() => createPageAddress(101, 1.5), InvalidPageNumberError);
  });

  await t.test('error carries the rejected value', () => {
    try {
      createPageAddress(950);
      assert.fail('expected a throw');
    } catch (error) {
      assert.ok(error instanceof InvalidPageNumberError);
      assert.equal(error.value, 950);
      assert.equal(error.message, 'Invalid page number: 950 (pages run from 100 to 899)');
    }
  });

  await t.test('sub-page 1 is the same address as no sub-page', () => {
    const plain = createPageAddress(101);
    const first = createPageAddress(101, 1);
    assert.deepEqual(first, { page: 101 });
    assert.equal(formatPageAddress(first), '101');
    assert.equal(sameAddress(plain, first), true);
    assert.equal(subPageIndex(plain), 1);
  });

  await t.test('formats sub-pages after a dot', () => {
    const address = createPageAddress(101, 2);
    assert.equal(formatPageAddress(address), '101.2');
    assert.equal(subPageIndex(address), 2);
    assert.equal(sameAddress(address, createPageAddress(101)), false);
  });

  await t.test('addresses are frozen', () => {
    assert.equal(Object.isFrozen(createPageAddress(300, 3)), true);
  });
});
