/**
 * RNG Tests
 * Verify seeded random number generator behavior
 */

import { describe, it, expect } from 'vitest';
import { SeededRNG, hashState } from '../../src/core/rng.js';

describe('SeededRNG', () => {
  it('should produce deterministic sequences', () => {
    const rng1 = new SeededRNG(12345);
    const rng2 = new SeededRNG(12345);

    const seq1 = Array.from({ length: 100 }, () => rng1.random());
    const seq2 = Array.from({ length: 100 }, () => rng2.random());

    expect(seq1).toEqual(seq2);
  });

  it('should produce different sequences for different seeds', () => {
    const rng1 = new SeededRNG(12345);
    const rng2 = new SeededRNG(67890);

    const seq1 = Array.from({ length: 10 }, () => rng1.random());
    const seq2 = Array.from({ length: 10 }, () => rng2.random());

    expect(seq1).not.toEqual(seq2);
  });

  it('should produce values in [0, 1) range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 1000; i++) {
      const value = rng.random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should produce uniform distribution', () => {
    const rng = new SeededRNG(12345);
    const buckets = Array.from({ length: 10 }, () => 0);

    for (let i = 0; i < 10000; i++) {
      buckets[Math.floor(rng.random() * 10)]++;
    }

    // Each bucket should have roughly 1000 values
    for (const count of buckets) {
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
  });

  it('should save and restore state correctly', () => {
    const rng = new SeededRNG(12345);
    for (let i = 0; i < 50; i++) {
      rng.random();
    }

    const savedState = rng.getState();
    const valuesAfterSave = Array.from({ length: 10 }, () => rng.random());

    const rng2 = new SeededRNG(99999);
    rng2.setState(savedState);
    const restoredValues = Array.from({ length: 10 }, () => rng2.random());

    expect(restoredValues).toEqual(valuesAfterSave);
  });

  it('should survive a JSON round trip of its state', () => {
    const rng = new SeededRNG(7);
    rng.random();
    const restored = new SeededRNG(0);
    restored.setState(JSON.parse(JSON.stringify(rng.getState())));

    expect(restored.random()).toBe(rng.random());
  });

  it('randomInt should produce integers in range, both ends included', () => {
    const rng = new SeededRNG(42);
    const seen = new Set<number>();

    for (let i = 0; i < 500; i++) {
      const value = rng.randomInt(60, 62);
      expect(Number.isInteger(value)).toBe(true);
      seen.add(value);
    }

    expect([...seen].sort()).toEqual([60, 61, 62]);
  });

  it('randomRange should produce values in range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 100; i++) {
      const value = rng.randomRange(-5, 5);
      expect(value).toBeGreaterThanOrEqual(-5);
      expect(value).toBeLessThan(5);
    }
  });

  it('weightedPick should respect weights', () => {
    const rng = new SeededRNG(42);
    let rareCount = 0;
    let commonCount = 0;

    for (let i = 0; i < 1000; i++) {
      if (rng.weightedPick(['rare', 'common'], [1, 99]) === 'rare') rareCount++;
      else commonCount++;
    }

    expect(commonCount).toBeGreaterThan(rareCount * 5);
  });

  it('weightedPick should never pick a zero weight', () => {
    const rng = new SeededRNG(3);
    for (let i = 0; i < 500; i++) {
      expect(rng.weightedPick(['a', 'b', 'c'], [0, 1, 0])).toBe('b');
    }
  });

  it('weightedPick should reject mismatched or empty input', () => {
    const rng = new SeededRNG(1);
    expect(() => rng.weightedPick(['a'], [1, 2])).toThrow('same length');
    expect(() => rng.weightedPick([], [])).toThrow('empty');
  });
});

describe('hashState', () => {
  it('should produce consistent hashes', () => {
    const obj = { a: 1, b: 'test', c: [1, 2, 3] };
    expect(hashState(obj)).toBe(hashState(obj));
  });

  it('should produce different hashes for different objects', () => {
    expect(hashState({ a: 1 })).not.toBe(hashState({ a: 2 }));
  });

  it('should handle Maps correctly', () => {
    const map1 = new Map([
      ['a', 1],
      ['b', 2],
    ]);
    const map2 = new Map([
      ['b', 2],
      ['a', 1],
    ]);

    expect(hashState(map1)).toBe(hashState(map2));
  });
});
