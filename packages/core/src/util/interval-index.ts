/**
 * Containment index over contiguous half-open intervals.
 *
 * Intervals are laid end to end from 0: interval i covers
 * [bounds[i], bounds[i + 1]). They are disjoint and cover [0, total) with no
 * gaps, so a point query has exactly one answer and reduces to a binary
 * search over the sorted boundaries.
 */
export class IntervalIndex {
  // bounds[0] = 0, bounds[i + 1] = bounds[i] + widths[i]
  readonly #bounds: Float64Array;
  readonly #lastNonEmpty: number;

  constructor(widths: readonly number[]) {
    const bounds = new Float64Array(widths.length + 1);
    let lastNonEmpty = -1;
    let total = 0;
    for (let i = 0; i < widths.length; i++) {
      const width = widths[i] ?? 0;
      if (!Number.isFinite(width) || width < 0) {
        throw new RangeError(`interval ${i} has invalid width ${width}`);
      }
      total += width;
      bounds[i + 1] = total;
      if (width > 0) lastNonEmpty = i;
    }
    this.#bounds = bounds;
    this.#lastNonEmpty = lastNonEmpty;
  }

  /** Number of intervals, empty ones included. */
  get size(): number {
    return this.#bounds.length - 1;
  }

  /** Right edge of the last interval. */
  get total(): number {
    return this.#bounds[this.#bounds.length - 1] ?? 0;
  }

  /** [start, end) of interval i. */
  limits(i: number): [number, number] {
    if (!Number.isInteger(i) || i < 0 || i >= this.size) {
      throw new RangeError(`no interval at index ${i}`);
    }
    return [this.#bounds[i] ?? 0, this.#bounds[i + 1] ?? 0];
  }

  /**
   * Index of the interval containing x. Empty intervals never match.
   * Points at or past the right edge resolve to the last non-empty interval.
   * Returns -1 only when every interval is empty.
   */
  locate(x: number): number {
    if (Number.isNaN(x) || x < 0) {
      throw new RangeError(`cannot locate ${x}`);
    }
    if (this.#lastNonEmpty < 0) return -1;
    if (x >= this.total) return this.#lastNonEmpty;

    // First boundary strictly greater than x; the interval ends there.
    let lo = 1;
    let hi = this.#bounds.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((this.#bounds[mid] ?? 0) <= x) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo - 1;
  }
}
