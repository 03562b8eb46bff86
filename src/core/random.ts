/**
 * Random Sources
 * The engine never touches Math.random; a source is injected so runs can be replayed.
 */

import seedrandom from 'seedrandom';
import { randomBytes } from 'crypto';

export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform integer in [0, bound). */
  nextInt(bound: number): number;
}

export class SeededRandom implements RandomSource {
  readonly seed: string;
  private prng: seedrandom.PRNG;

  constructor(seed: string) {
    this.seed = seed;
    this.prng = seedrandom(seed);
  }

  next(): number {
    return this.prng.double();
  }

  nextInt(bound: number): number {
    return pickIndex(this.next(), bound);
  }
}

/** Map a roll in [0, 1) onto an index in [0, bound). */
export function pickIndex(roll: number, bound: number): number {
  if (!Number.isInteger(bound) || bound <= 0) {
    throw new RangeError(`bound must be a positive integer, got ${bound}`);
  }
  return Math.min(bound - 1, Math.floor(roll * bound));
}

export function generateSeed(): string {
  return randomBytes(6).toString('hex');
}

/** Build the run's source, generating a seed when none was configured. */
export function createRandom(seed?: string): SeededRandom {
  return new SeededRandom(seed ?? generateSeed());
}
