import { ErrorCode } from '../errors/codes.js';
import { ConfigurationError } from '../types/errors.js';
import { IntervalIndex } from '../util/interval-index.js';
import { defaultRandomSource, type RandomSource } from '../util/rng.js';

export interface WeightedEntry<T> {
  value: T;
  /** Finite and non-negative. Entries sharing a value add up. */
  weight: number;
}

/**
 * Samples values with probability proportional to their weight.
 *
 * Each entry owns the interval [before, before + weight) of an axis running
 * from 0 to the total weight, in insertion order. Drawing u from [0, 1) and
 * locating u * totalWeight picks an interval with probability
 * weight / totalWeight. Insertion order moves intervals around but never
 * changes their widths, so it has no effect on the distribution.
 *
 * Immutable after construction. `next()` only consumes entropy.
 */
export class WeightedRandomSet<T> {
  readonly #values: readonly T[];
  readonly #index: IntervalIndex;
  readonly #random: RandomSource;

  constructor(
    entries: Iterable<WeightedEntry<T>>,
    random: RandomSource = defaultRandomSource()
  ) {
    const values: T[] = [];
    const widths: number[] = [];
    for (const { value, weight } of entries) {
      if (!Number.isFinite(weight) || weight < 0) {
        throw new ConfigurationError({
          message: `entry ${values.length} weight must be finite and non-negative`,
          errorCode: ErrorCode.INVALID_WEIGHTS,
          context: { entry: values.length, value: weight },
        });
      }
      values.push(value);
      widths.push(weight);
    }

    const index = new IntervalIndex(widths);
    if (!(index.total > 0)) {
      throw new ConfigurationError({
        message: 'weighted random set needs a positive total weight',
        errorCode: ErrorCode.INVALID_WEIGHTS,
        context: { entries: values.length, value: index.total },
      });
    }

    this.#values = values;
    this.#index = index;
    this.#random = random;
  }

  get size(): number {
    return this.#values.length;
  }

  get totalWeight(): number {
    return this.#index.total;
  }

  /** Combined selection probability of every entry carrying `value`. */
  probabilityOf(value: T): number {
    let weight = 0;
    for (let i = 0; i < this.#values.length; i++) {
      if (Object.is(this.#values[i], value)) {
        const [start, end] = this.#index.limits(i);
        weight += end - start;
      }
    }
    return weight / this.totalWeight;
  }

  /** Returns the next value in the weighted random sequence. */
  next(): T {
    const x = this.#random.nextFloat64() * this.totalWeight;
    const i = this.#index.locate(x);
    if (i < 0) {
      // Unreachable: construction rejects a zero total weight.
      throw new RangeError('weighted random set has no selectable entry');
    }
    return this.#values[i];
  }
}
