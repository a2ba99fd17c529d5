/**
 * Represents a non-empty closed interval `[low, high]` of integers.
 *
 * Intervals are the building blocks of {@link LongRangeSet}; they never
 * represent the empty set themselves.
 */
export class Interval {
  private constructor(
    public readonly low: bigint,
    public readonly high: bigint,
  ) {}

  /**
   * Creates an interval `[a, b]`, or `undefined` when `a > b`.
   */
  static of(a: bigint | number, b: bigint | number): Interval | undefined {
    const low = BigInt(a);
    const high = BigInt(b);
    return low <= high ? new Interval(low, high) : undefined;
  }

  /**
   * Creates an interval `[a, a]`.
   */
  static point(a: bigint | number): Interval {
    const n = BigInt(a);
    return new Interval(n, n);
  }

  isPoint(): boolean {
    return this.low === this.high;
  }

  contains(value: bigint): boolean {
    return this.low <= value && value <= this.high;
  }

  /**
   * Checks if this interval includes every value of `other`.
   */
  includes(other: Interval): boolean {
    return this.low <= other.low && other.high <= this.high;
  }

  intersect(other: Interval): Interval | undefined {
    return Interval.of(
      this.low > other.low ? this.low : other.low,
      this.high < other.high ? this.high : other.high,
    );
  }

  /**
   * Checks whether both intervals can be merged into a single one: they
   * overlap or are adjacent.
   */
  touches(other: Interval): boolean {
    return this.low <= other.high + 1n && other.low <= this.high + 1n;
  }

  hull(other: Interval): Interval {
    return new Interval(
      this.low < other.low ? this.low : other.low,
      this.high > other.high ? this.high : other.high,
    );
  }

  eq(other: Interval): boolean {
    return this.low === other.low && this.high === other.high;
  }

  toString(): string {
    return this.isPoint()
      ? this.low.toString()
      : `${this.low.toString()}..${this.high.toString()}`;
  }
}
