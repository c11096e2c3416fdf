import { describe, it, expect } from '@jest/globals';
import { DeterministicClock, SeededRng, createRandomSource, mathRandomSource, systemClock } from '../index.js';

describe('SeededRng', () => {
  it('yields the same sequence for the same seed', () => {
    const a = new SeededRng(1234);
    const b = new SeededRng(1234);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('diverges for different seeds', () => {
    expect(new SeededRng(1).next()).not.toBe(new SeededRng(2).next());
  });

  it('stays within [0, 1) and the requested ranges', () => {
    const rng = new SeededRng(99);
    for (let i = 0; i < 1_000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
      const int = rng.nextInt(3, 7);
      expect(Number.isInteger(int)).toBe(true);
      expect(int).toBeGreaterThanOrEqual(3);
      expect(int).toBeLessThanOrEqual(7);
      const float = rng.nextFloat(-2, 2);
      expect(float).toBeGreaterThanOrEqual(-2);
      expect(float).toBeLessThan(2);
    }
  });
});

describe('DeterministicClock', () => {
  it('advances by tickMs on every now()', () => {
    const clock = new DeterministicClock(1_000, 250);
    expect(clock.now().getTime()).toBe(1_000);
    expect(clock.now().getTime()).toBe(1_250);
    expect(clock.peek().getTime()).toBe(1_500);
  });

  it('only moves through advance() with a zero tick', () => {
    const clock = new DeterministicClock(0, 0);
    expect(clock.now().getTime()).toBe(0);
    clock.advance(3_600_000);
    expect(clock.now().getTime()).toBe(3_600_000);
    expect(clock.now().getTime()).toBe(3_600_000);
  });
});

describe('live sources', () => {
  it('reads the wall clock', () => {
    const before = Date.now();
    const now = systemClock.now().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
  });

  it('picks a seeded generator only when a seed is given', () => {
    expect(createRandomSource()).toBe(mathRandomSource);
    const seeded = createRandomSource(5);
    expect(seeded).toBeInstanceOf(SeededRng);
    expect(seeded.next()).toBe(new SeededRng(5).next());
  });
});
