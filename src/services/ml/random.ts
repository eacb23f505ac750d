import { RandomSource } from '../../types/models';

/**
 * Small seedable generator (mulberry32). Cross-validation runs with the
 * same seed assign the same folds.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function createSeededRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed);
}

/**
 * Uniform integer in [0, bound)
 */
export function randomInt(random: RandomSource, bound: number): number {
  return Math.min(bound - 1, Math.floor(random.next() * bound));
}
