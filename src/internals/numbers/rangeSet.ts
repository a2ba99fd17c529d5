import { Interval } from "./interval";
import { InternalException } from "../exceptions";

/**
 * Names of fixed-width integer types that have a range of their own.
 */
export type IntegralTypeName = "byte" | "short" | "char" | "int" | "long";

/**
 * An immutable set of integers represented as sorted, disjoint and
 * non-adjacent closed intervals.
 *
 * Values are `bigint`s; the set itself is unbounded, the machine-width
 * domains are available through {@link LongRangeSet.typeRange}.
 */
export class LongRangeSet {
  /**
   * Unions producing more intervals than this are widened to their hull.
   */
  static readonly MAX_INTERVALS = 16;

  static readonly LONG_MIN = -(1n << 63n);
  static readonly LONG_MAX = (1n << 63n) - 1n;
  static readonly INT_MIN = -(1n << 31n);
  static readonly INT_MAX = (1n << 31n) - 1n;

  static readonly EMPTY = new LongRangeSet([]);

  private constructor(private readonly items: readonly Interval[]) {}

  /**
   * The full 64-bit signed domain.
   */
  static all(): LongRangeSet {
    return LONG_DOMAIN;
  }

  static point(value: bigint | number): LongRangeSet {
    return new LongRangeSet([Interval.point(value)]);
  }

  /**
   * Creates a set `[from, to]`; empty when `from > to`.
   */
  static range(from: bigint | number, to: bigint | number): LongRangeSet {
    const interval = Interval.of(from, to);
    return interval === undefined
      ? LongRangeSet.EMPTY
      : new LongRangeSet([interval]);
  }

  /**
   * Builds a set from arbitrary, possibly overlapping intervals.
   */
  static fromIntervals(intervals: Iterable<Interval>): LongRangeSet {
    const sorted = [...intervals].sort((a, b) =>
      a.low < b.low ? -1 : a.low > b.low ? 1 : 0,
    );
    const merged: Interval[] = [];
    for (const interval of sorted) {
      const last = merged[merged.length - 1];
      if (last !== undefined && last.touches(interval)) {
        merged[merged.length - 1] = last.hull(interval);
      } else {
        merged.push(interval);
      }
    }
    return merged.length === 0 ? LongRangeSet.EMPTY : new LongRangeSet(merged);
  }

  /**
   * Returns the domain of the given fixed-width integer type.
   */
  static typeRange(name: IntegralTypeName): LongRangeSet {
    switch (name) {
      case "byte":
        return LongRangeSet.range(-128, 127);
      case "short":
        return LongRangeSet.range(-32768, 32767);
      case "char":
        return LongRangeSet.range(0, 65535);
      case "int":
        return INT_DOMAIN;
      case "long":
        return LONG_DOMAIN;
    }
  }

  get intervals(): readonly Interval[] {
    return this.items;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  min(): bigint | undefined {
    return this.items[0]?.low;
  }

  max(): bigint | undefined {
    return this.items[this.items.length - 1]?.high;
  }

  /**
   * Returns the only value of the set, if it contains exactly one.
   */
  constantValue(): bigint | undefined {
    return this.items.length === 1 && this.items[0].isPoint()
      ? this.items[0].low
      : undefined;
  }

  contains(value: bigint): boolean {
    return this.items.some((i) => i.contains(value));
  }

  /**
   * Checks if every value of `other` belongs to this set.
   */
  containsAll(other: LongRangeSet): boolean {
    return other.items.every((o) => this.items.some((i) => i.includes(o)));
  }

  intersects(other: LongRangeSet): boolean {
    return !this.intersect(other).isEmpty();
  }

  /**
   * Union of both sets. A result with more than {@link MAX_INTERVALS}
   * intervals, and more intervals than either operand, is replaced by its
   * hull.
   */
  union(other: LongRangeSet): LongRangeSet {
    if (this.containsAll(other)) return this;
    if (other.containsAll(this)) return other;
    const result = LongRangeSet.fromIntervals([...this.items, ...other.items]);
    const limit = Math.max(
      LongRangeSet.MAX_INTERVALS,
      this.items.length,
      other.items.length,
    );
    if (result.items.length <= limit) {
      return result;
    }
    return new LongRangeSet([
      result.items[0].hull(result.items[result.items.length - 1]),
    ]);
  }

  intersect(other: LongRangeSet): LongRangeSet {
    const result: Interval[] = [];
    for (const a of this.items) {
      for (const b of other.items) {
        const common = a.intersect(b);
        if (common !== undefined) result.push(common);
      }
    }
    return LongRangeSet.fromIntervals(result);
  }

  subtract(other: LongRangeSet): LongRangeSet {
    let pieces: Interval[] = [...this.items];
    for (const cut of other.items) {
      pieces = pieces.flatMap((piece) => {
        if (piece.intersect(cut) === undefined) return [piece];
        const rest: Interval[] = [];
        const before = Interval.of(piece.low, cut.low - 1n);
        const after = Interval.of(cut.high + 1n, piece.high);
        if (before !== undefined) rest.push(before);
        if (after !== undefined) rest.push(after);
        return rest;
      });
    }
    return LongRangeSet.fromIntervals(pieces);
  }

  without(value: bigint): LongRangeSet {
    return this.subtract(LongRangeSet.point(value));
  }

  /**
   * Requires the value to fit the 64-bit signed domain.
   * @throws {Error} when it does not
   */
  static checkLong(value: bigint): bigint {
    if (value < LongRangeSet.LONG_MIN || value > LongRangeSet.LONG_MAX) {
      throw InternalException.make(
        `Value ${value} is outside of the 64-bit signed domain`,
        { trace: false },
      );
    }
    return value;
  }

  equals(other: LongRangeSet): boolean {
    return (
      this.items.length === other.items.length &&
      this.items.every((interval, idx) => interval.eq(other.items[idx]))
    );
  }

  toString(): string {
    return `{${this.items.map((i) => i.toString()).join(", ")}}`;
  }
}

const LONG_DOMAIN = LongRangeSet.range(
  LongRangeSet.LONG_MIN,
  LongRangeSet.LONG_MAX,
);
const INT_DOMAIN = LongRangeSet.range(
  LongRangeSet.INT_MIN,
  LongRangeSet.INT_MAX,
);
