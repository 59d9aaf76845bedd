import { describe, test } from 'node:test';
import assert from 'node:assert';
import { sliceText } from '../../src/lib/text.js';

describe('sliceText', () => {
  test('cuts plain text at the given length', () => {
    assert.strictEqual(sliceText('hello world', 5), 'hello');
  });

  test('backs off one unit instead of splitting a surrogate pair', () => {
    assert.strictEqual(sliceText('ab\u{1F600}cd', 3), 'ab');
  });

  test('keeps a pair that ends exactly at the cut', () => {
    assert.strictEqual(sliceText('ab\u{1F600}cd', 4), 'ab\u{1F600}');
  });

  test('short text and non-positive lengths', () => {
    assert.strictEqual(sliceText('abc', 10), 'abc');
    assert.strictEqual(sliceText('abc', 0), '');
  });
});
