import type { RandomSource } from '../util/rng.js';

/**
 * Replays a fixed list of draws in [0, 1). Throws once the script runs out so
 * a test never silently loops on missing entropy.
 */
export class ScriptedRandomSource implements RandomSource {
  #position = 0;

  constructor(private readonly draws: readonly number[]) {}

  /** Number of draws consumed so far. */
  get consumed(): number {
    return this.#position;
  }

  nextFloat64(): number {
    if (this.#position >= this.draws.length) {
      throw new Error(
        `scripted random source exhausted after ${this.draws.length} draws`
      );
    }
    const value = this.draws[this.#position++];
    if (!(value >= 0 && value < 1)) {
      throw new RangeError(`scripted draw ${value} is outside [0, 1)`);
    }
    return value;
  }

  nextUint64(): bigint {
    return BigInt(Math.floor(this.nextFloat64() * 2 ** 53)) << 11n;
  }
}
