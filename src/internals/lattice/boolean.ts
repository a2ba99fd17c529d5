import { BOTTOM, DfBooleanFamily, DfType } from "./types";
import { DfTypes } from "./factory";

export function booleanIsSuperType(
  self: DfBooleanFamily,
  other: DfBooleanFamily,
): boolean {
  if (self.kind === "Boolean") return true;
  return other.kind === "BooleanConstant" && other.value === self.value;
}

export function booleanJoin(a: DfBooleanFamily, b: DfBooleanFamily): DfType {
  if (booleanIsSuperType(a, b)) return a;
  if (booleanIsSuperType(b, a)) return b;
  return DfTypes.BOOLEAN;
}

export function booleanMeet(a: DfBooleanFamily, b: DfBooleanFamily): DfType {
  if (booleanIsSuperType(a, b)) return b;
  if (booleanIsSuperType(b, a)) return a;
  return BOTTOM;
}

/**
 * `true` and `false` are complements of each other; the complement of the
 * whole domain is empty.
 */
export function booleanNegate(t: DfBooleanFamily): DfType {
  return t.kind === "Boolean" ? BOTTOM : DfTypes.booleanValue(!t.value);
}
