import test from 'node:test';
import assert from 'node:assert/strict';
import { fnv1a32, formatList, mulberry32, pickRandom, sample, shuffled } from './utils.js';

test('mulberry32: same seed gives the same sequence', () => {
  const a = mulberry32(42);
  const b = mulberry32(42);
  for (let i = 0; i < 10; i++) {
    const x = a();
    assert.equal(x, b());
    assert.ok(x >= 0 && x < 1);
  }
});

test('shuffled: permutes without touching the input', () => {
  const input = ['a', 'b', 'c', 'd', 'e'];
  const out = shuffled(input, mulberry32(7));
  assert.deepEqual(input, ['a', 'b', 'c', 'd', 'e']);
  assert.deepEqual([...out].sort(), input);
  assert.deepEqual(shuffled(input, mulberry32(7)), out);
});

test('pickRandom / sample: empty and oversized requests', () => {
  const rng = mulberry32(1);
  assert.equal(pickRandom([], rng), undefined);
  assert.equal(pickRandom(['only'], rng), 'only');
  assert.equal(sample(['a', 'b'], 5, rng).length, 2);
  assert.deepEqual(sample(['a', 'b'], -1, rng), []);
});

test('fnv1a32: stable hash', () => {
  assert.equal(fnv1a32(''), 0x811c9dc5);
  assert.equal(fnv1a32('abc'), fnv1a32('abc'));
  assert.notEqual(fnv1a32('abc'), fnv1a32('abd'));
});

test('formatList: placeholder for nothing', () => {
  assert.equal(formatList([]), '(none)');
  assert.equal(formatList(['A', 'B']), 'A, B');
});
