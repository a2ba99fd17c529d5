import { BOTTOM, DfFloatingFamily, DfType, floatingKey } from "./types";
import { DfTypes } from "./factory";
import { isListSubsetOf, unreachable } from "../util";

const ZEROS: readonly number[] = [0, -0];

function isZero(value: number): boolean {
  return value === 0;
}

function sameValue(a: number, b: number): boolean {
  return floatingKey(a) === floatingKey(b);
}

/**
 * Checks if `value` belongs to `t`. Values are compared bitwise, so +0.0 and
 * -0.0 differ and NaN is equal to itself.
 */
export function floatingContains(t: DfFloatingFamily, value: number): boolean {
  switch (t.kind) {
    case "Floating":
      return true;
    case "FloatingZero":
      return isZero(value);
    case "FloatingConstant":
      return sameValue(t.value, value);
    case "FloatingNotValue":
      return !t.excluded.some((e) => sameValue(e, value));
    default:
      unreachable(t);
  }
}

/**
 * Both operands must have the same width.
 */
export function floatingIsSuperType(
  self: DfFloatingFamily,
  other: DfFloatingFamily,
): boolean {
  switch (other.kind) {
    case "FloatingConstant":
      return floatingContains(self, other.value);
    case "FloatingZero":
      return ZEROS.every((z) => floatingContains(self, z));
    case "FloatingNotValue":
      if (self.kind === "Floating") return true;
      return (
        self.kind === "FloatingNotValue" &&
        isListSubsetOf(self.excluded, other.excluded, sameValue)
      );
    case "Floating":
      return self.kind === "Floating";
    default:
      unreachable(other);
  }
}

export function floatingJoin(
  a: DfFloatingFamily,
  b: DfFloatingFamily,
): DfType {
  if (floatingIsSuperType(a, b)) return a;
  if (floatingIsSuperType(b, a)) return b;
  const width = a.width;
  const notValue =
    a.kind === "FloatingNotValue"
      ? a
      : b.kind === "FloatingNotValue"
        ? b
        : undefined;
  if (notValue !== undefined) {
    const other = notValue === a ? b : a;
    return DfTypes.floatingNotValue(
      width,
      notValue.excluded.filter((e) => !floatingContains(other, e)),
    );
  }
  if (
    a.kind === "FloatingConstant" &&
    b.kind === "FloatingConstant" &&
    isZero(a.value) &&
    isZero(b.value)
  ) {
    return DfTypes.floatingZero(width);
  }
  return DfTypes.floating(width);
}

export function floatingMeet(
  a: DfFloatingFamily,
  b: DfFloatingFamily,
): DfType {
  if (floatingIsSuperType(a, b)) return b;
  if (floatingIsSuperType(b, a)) return a;
  const width = a.width;
  if (a.kind === "FloatingNotValue" && b.kind === "FloatingNotValue") {
    return DfTypes.floatingNotValue(width, [...a.excluded, ...b.excluded]);
  }
  if (a.kind === "FloatingZero" || b.kind === "FloatingZero") {
    const other = a.kind === "FloatingZero" ? b : a;
    const zeros = ZEROS.filter((z) => floatingContains(other, z));
    if (zeros.length === 2) return DfTypes.floatingZero(width);
    const [zero] = zeros;
    return zero === undefined ? BOTTOM : DfTypes.floatingValue(width, zero);
  }
  return BOTTOM;
}

export function floatingNegate(t: DfFloatingFamily): DfType {
  switch (t.kind) {
    case "Floating":
      return BOTTOM;
    case "FloatingZero":
      return DfTypes.floatingNotValue(t.width, ZEROS);
    case "FloatingConstant":
      return DfTypes.floatingNotValue(t.width, [t.value]);
    case "FloatingNotValue": {
      const [first] = t.excluded;
      if (t.excluded.length === 1 && first !== undefined) {
        return DfTypes.floatingValue(t.width, first);
      }
      if (t.excluded.length === 2 && t.excluded.every(isZero)) {
        return DfTypes.floatingZero(t.width);
      }
      return BOTTOM;
    }
    default:
      unreachable(t);
  }
}
