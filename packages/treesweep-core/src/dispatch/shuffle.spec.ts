/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { seededRandom, shuffle } from './shuffle.js';

describe('shuffle', () => {
  it('returns a permutation without touching the input', () => {
    const input = ['a', 'b', 'c', 'd', 'e', 'f'];
    const output = shuffle(input, seededRandom(7));

    assert.deepStrictEqual(input, ['a', 'b', 'c', 'd', 'e', 'f']);
    assert.deepStrictEqual([...output].sort(), input);
  });

  it('uses the random source for every swap', () => {
    assert.deepStrictEqual(shuffle(['a', 'b', 'c', 'd'], () => 0), ['b', 'c', 'd', 'a']);
  });

  it('handles empty and single-element lists', () => {
    assert.deepStrictEqual(shuffle([]), []);
    assert.deepStrictEqual(shuffle(['only']), ['only']);
  });
});

describe('seededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    for (let i = 0; i < 20; i++) {
      assert.strictEqual(a(), b());
    }
  });

  it('produces values in [0, 1)', () => {
    const random = seededRandom(123);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      assert.ok(value >= 0 && value < 1);
    }
  });

  it('gives different orders for different seeds', () => {
    const items = Array.from({ length: 20 }, (_, i) => i);
    assert.notDeepStrictEqual(shuffle(items, seededRandom(1)), shuffle(items, seededRandom(2)));
  });
});
