import { describe, it, expect } from 'vitest';
import { createSeededRandom, createSequenceRandom, pick } from '../../src/engine/random.js';

describe('pick', () => {
  it('returns undefined for an empty list', () => {
    expect(pick([], () => 0.5)).toBeUndefined();
  });

  it('maps the random value onto the list', () => {
    expect(pick(['a', 'b', 'c', 'd'], () => 0.6)).toBe('c');
  });

  it('clamps values outside [0, 1)', () => {
    expect(pick(['a', 'b'], () => 1)).toBe('b');
    expect(pick(['a', 'b'], () => -3)).toBe('a');
    expect(pick(['a', 'b'], () => Number.NaN)).toBe('a');
  });
});

describe('createSeededRandom', () => {
  it('repeats for the same seed', () => {
    const a = createSeededRandom(123);
    const b = createSeededRandom(123);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('differs between seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  it('stays in [0, 1)', () => {
    const random = createSeededRandom(99);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('createSequenceRandom', () => {
  it('replays values and wraps around', () => {
    const random = createSequenceRandom([0.1, 0.9]);
    expect([random(), random(), random()]).toEqual([0.1, 0.9, 0.1]);
  });

  it('returns 0 for an empty sequence', () => {
    expect(createSequenceRandom([])()).toBe(0);
  });
});
