import { BOTTOM, DfIntegralType, DfType, TOP } from "./types";
import { DfTypes } from "./factory";
import { InternalException } from "../exceptions";
import { LongRangeSet } from "../numbers";

/**
 * The wide range if recorded, the range itself otherwise.
 */
export function effectiveWideRange(t: DfIntegralType): LongRangeSet {
  return t.wideRange ?? t.range;
}

/**
 * Compares value sets only: the wide range does not take part in ordering.
 */
export function integralIsSuperType(
  self: DfIntegralType,
  other: DfIntegralType,
): boolean {
  return self.width === other.width && self.range.containsAll(other.range);
}

export function integralJoin(a: DfIntegralType, b: DfIntegralType): DfType {
  if (a.width !== b.width) return TOP;
  const range = a.range.union(b.range);
  const wide =
    a.wideRange === undefined && b.wideRange === undefined
      ? undefined
      : effectiveWideRange(a).union(effectiveWideRange(b));
  return DfTypes.rangeWithWide(a.width, range, wide);
}

export function integralMeet(a: DfIntegralType, b: DfIntegralType): DfType {
  if (a.width !== b.width) return BOTTOM;
  const range = a.range.intersect(b.range);
  const wide =
    a.wideRange === undefined && b.wideRange === undefined
      ? undefined
      : effectiveWideRange(a).intersect(effectiveWideRange(b));
  return DfTypes.rangeWithWide(a.width, range, wide);
}

export function integralNegate(t: DfIntegralType): DfType {
  const complement = LongRangeSet.typeRange(t.width).subtract(t.range);
  return DfTypes.rangeWithWide(t.width, complement, undefined);
}

/**
 * Narrows the type by a condition, e.g. `x < 10`. The range the value had
 * before narrowing is kept as the wide range, so a later widening can return
 * to it instead of the whole domain.
 *
 * @throws {Error} if `t` is neither integral nor BOTTOM.
 */
export function meetRange(t: DfType, range: LongRangeSet): DfType {
  if (t.kind === "Bottom") return t;
  if (t.kind !== "Integral") {
    throw InternalException.make(`Cannot narrow ${t.kind} by ${range}`, {
      trace: false,
    });
  }
  return DfTypes.rangeWithWide(
    t.width,
    t.range.intersect(range),
    effectiveWideRange(t),
  );
}

/**
 * Replaces the range of an integral element by its recorded wide range.
 * Other elements are returned as is.
 */
export function widenToWideRange(t: DfType): DfType {
  return t.kind !== "Integral" || t.wideRange === undefined
    ? t
    : DfTypes.rangeWithWide(t.width, t.wideRange, undefined);
}
