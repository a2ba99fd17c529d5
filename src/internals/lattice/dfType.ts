/**
 * Operations shared by every lattice element.
 *
 * Operands are dispatched by family: boolean, integral, floating and
 * reference. Elements of different families (and integral or floating
 * elements of different widths) have no common values: they join to TOP
 * and meet to BOTTOM.
 *
 * @packageDocumentation
 */

import {
  BOTTOM,
  DfReferenceType,
  DfType,
  DfaNullability,
  ConstantPayload,
  TOP,
  floatingKey,
  isBooleanFamily,
  isFloatingFamily,
  isIntegral,
  isReferenceFamily,
} from "./types";
import {
  booleanIsSuperType,
  booleanJoin,
  booleanMeet,
  booleanNegate,
} from "./boolean";
import {
  floatingIsSuperType,
  floatingJoin,
  floatingMeet,
  floatingNegate,
} from "./floating";
import {
  integralIsSuperType,
  integralJoin,
  integralMeet,
  integralNegate,
} from "./integral";
import {
  referenceIsSuperType,
  referenceJoin,
  referenceMeet,
  referenceNegate,
} from "./reference";
import { literalText, payloadKey } from "./literals";
import { LongRangeSet } from "../numbers";
import { hashString, unreachable } from "../util";

/**
 * Checks whether every value of `other` is a value of `self`.
 */
export function isSuperType(self: DfType, other: DfType): boolean {
  if (self === other || self.kind === "Top" || other.kind === "Bottom") {
    return true;
  }
  if (isBooleanFamily(self) && isBooleanFamily(other)) {
    return booleanIsSuperType(self, other);
  }
  if (isIntegral(self) && isIntegral(other)) {
    return integralIsSuperType(self, other);
  }
  if (isFloatingFamily(self) && isFloatingFamily(other)) {
    return self.width === other.width && floatingIsSuperType(self, other);
  }
  if (isReferenceFamily(self) && isReferenceFamily(other)) {
    return referenceIsSuperType(self, other);
  }
  return false;
}

/**
 * Returns the least type that contains all the values of both operands.
 * The result may contain more values than the two operands together when the
 * exact union is not representable.
 */
export function join(a: DfType, b: DfType): DfType {
  if (a.kind === "Bottom" || b.kind === "Top") return b;
  if (b.kind === "Bottom" || a.kind === "Top") return a;
  if (isBooleanFamily(a) && isBooleanFamily(b)) return booleanJoin(a, b);
  if (isIntegral(a) && isIntegral(b)) return integralJoin(a, b);
  if (isFloatingFamily(a) && isFloatingFamily(b)) {
    return a.width === b.width ? floatingJoin(a, b) : TOP;
  }
  if (isReferenceFamily(a) && isReferenceFamily(b)) {
    return referenceJoin(a, b);
  }
  return TOP;
}

/**
 * Returns a type that contains the values present in both operands.
 * BOTTOM when the operands have no values in common.
 */
export function meet(a: DfType, b: DfType): DfType {
  if (a.kind === "Top" || b.kind === "Bottom") return b;
  if (b.kind === "Top" || a.kind === "Bottom") return a;
  if (isBooleanFamily(a) && isBooleanFamily(b)) return booleanMeet(a, b);
  if (isIntegral(a) && isIntegral(b)) return integralMeet(a, b);
  if (isFloatingFamily(a) && isFloatingFamily(b)) {
    return a.width === b.width ? floatingMeet(a, b) : BOTTOM;
  }
  if (isReferenceFamily(a) && isReferenceFamily(b)) {
    return referenceMeet(a, b);
  }
  return BOTTOM;
}

/**
 * Returns the complement of `t` within its family, or BOTTOM when the
 * complement cannot be represented.
 */
export function tryNegate(t: DfType): DfType {
  if (t.kind === "Top") return BOTTOM;
  if (t.kind === "Bottom") return TOP;
  if (isBooleanFamily(t)) return booleanNegate(t);
  if (isIntegral(t)) return integralNegate(t);
  if (isFloatingFamily(t)) return floatingNegate(t);
  return referenceNegate(t);
}

function referenceKey(t: DfReferenceType): string {
  const field =
    t.specialField === undefined
      ? ""
      : `${t.specialField.field}=${typeKey(t.specialField.value)}`;
  return [
    "ref",
    t.constraint.key(),
    t.nullability,
    t.mutability,
    t.local ? "local" : "",
    field,
  ].join("|");
}

/**
 * Canonical text of the element: two elements are equal if and only if
 * their keys are equal. Wide ranges of integral elements and the
 * `synthesized` flag of constants do not take part.
 */
export function typeKey(t: DfType): string {
  switch (t.kind) {
    case "Top":
      return "top";
    case "Bottom":
      return "bottom";
    case "Boolean":
      return "boolean";
    case "BooleanConstant":
      return `boolean|${t.value}`;
    case "Integral":
      return `${t.width}|${t.range}`;
    case "Floating":
      return t.width;
    case "FloatingZero":
      return `${t.width}|zero`;
    case "FloatingConstant":
      return `${t.width}|${floatingKey(t.value)}`;
    case "FloatingNotValue":
      return `${t.width}|not|${t.excluded.map(floatingKey).join(",")}`;
    case "Null":
      return "null";
    case "Reference":
      return referenceKey(t);
    case "ReferenceConstant":
      return `const|${payloadKey(t.constant)}|${t.constraint.key()}`;
    default:
      unreachable(t);
  }
}

export function equals(a: DfType, b: DfType): boolean {
  return a === b || typeKey(a) === typeKey(b);
}

export function hashCode(t: DfType): number {
  return hashString(typeKey(t));
}

function floatingText(value: number): string {
  if (Object.is(value, -0)) return "-0.0";
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function integralText(width: "int" | "long", value: bigint): string {
  return width === "long" ? `${value}L` : `${value}`;
}

function payloadText(payload: ConstantPayload): string {
  switch (payload.kind) {
    case "string":
      return JSON.stringify(payload.value);
    case "enum":
      return `${payload.enumType}.${payload.name}`;
    case "field":
      return `${payload.owner}.${payload.name}`;
    case "class":
      return `${payload.typeName}.class`;
    case "boxed":
      return literalText(payload.literal);
  }
}

/**
 * Human-readable representation used in logs and error reports.
 */
export function dfTypeToString(t: DfType): string {
  switch (t.kind) {
    case "Top":
      return "TOP";
    case "Bottom":
      return "BOTTOM";
    case "Boolean":
      return "boolean";
    case "BooleanConstant":
      return String(t.value);
    case "Integral": {
      const value = t.range.constantValue();
      if (value !== undefined) return integralText(t.width, value);
      if (t.range.equals(LongRangeSet.typeRange(t.width))) return t.width;
      return `${t.width} ${t.range}`;
    }
    case "Floating":
      return t.width;
    case "FloatingZero":
      return `${t.width} ±0.0`;
    case "FloatingConstant":
      return t.width === "float"
        ? `${floatingText(t.value)}f`
        : floatingText(t.value);
    case "FloatingNotValue":
      return `${t.width} != ${t.excluded.map(floatingText).join(", ")}`;
    case "Null":
      return "null";
    case "Reference": {
      const parts = [
        t.nullability === "unknown" ? "" : t.nullability,
        t.mutability === "unknown" ? "" : t.mutability,
        t.local ? "local" : "",
        t.constraint.toString(),
        t.specialField === undefined
          ? ""
          : `${t.specialField.field}=${dfTypeToString(t.specialField.value)}`,
      ].filter((p) => p.length > 0);
      return parts.length === 0 ? "object" : parts.join(" ");
    }
    case "ReferenceConstant":
      return payloadText(t.constant);
    default:
      unreachable(t);
  }
}

/**
 * Returns the single value the element holds: a boolean, a number for int
 * and floating-point constants, a bigint for longs, the payload of reference
 * constants and `null` for the null reference. `undefined` when the element
 * is not a constant.
 */
export function getConstantValue(
  t: DfType,
): boolean | number | bigint | ConstantPayload | null | undefined {
  switch (t.kind) {
    case "BooleanConstant":
      return t.value;
    case "Integral": {
      const value = t.range.constantValue();
      if (value === undefined) return undefined;
      return t.width === "int" ? Number(value) : value;
    }
    case "FloatingConstant":
      return t.value;
    case "Null":
      return null;
    case "ReferenceConstant":
      return t.constant;
    default:
      return undefined;
  }
}

/**
 * Nullability carried by the element. `undefined` for primitive elements
 * and BOTTOM.
 */
export function nullabilityOf(t: DfType): DfaNullability | undefined {
  switch (t.kind) {
    case "Top":
      return "unknown";
    case "Null":
      return "null";
    case "Reference":
      return t.nullability;
    case "ReferenceConstant":
      return "not-null";
    default:
      return undefined;
  }
}
