import { describe, it, expect } from '@jest/globals';
import { SeededRandom, createSeededRandom, randomInt } from '../../../services/ml/random';

describe('SeededRandom', () => {
  it('should repeat its sequence for the same seed', () => {
    const first = createSeededRandom(42);
    const second = createSeededRandom(42);

    const a = Array.from({ length: 10 }, () => first.next());
    const b = Array.from({ length: 10 }, () => second.next());

    expect(a).toEqual(b);
  });

  it('should differ between seeds', () => {
    expect(new SeededRandom(1).next()).not.toBe(new SeededRandom(2).next());
  });

  it('should stay within [0, 1)', () => {
    const random = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should remember its seed', () => {
    expect(new SeededRandom(99).seed).toBe(99);
  });
});

describe('randomInt', () => {
  it('should map the unit interval onto [0, bound)', () => {
    expect(randomInt({ next: () => 0 }, 5)).toBe(0);
    expect(randomInt({ next: () => 0.5 }, 5)).toBe(2);
    expect(randomInt({ next: () => 0.9999999 }, 5)).toBe(4);
  });

  it('should spread values across every bucket', () => {
    const random = new SeededRandom(2024);
    const buckets = [0, 0, 0, 0];

    for (let i = 0; i < 10000; i++) {
      buckets[randomInt(random, 4)]++;
    }

    for (const count of buckets) {
      expect(count).toBeGreaterThan(2200);
      expect(count).toBeLessThan(2800);
    }
  });
});
