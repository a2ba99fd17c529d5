/**
 * Lattice elements describing the possible values of an expression.
 *
 * Every element is an immutable object tagged by `kind`. Elements are
 * compared structurally (see `equals` in `dfType.ts`); only the singletons
 * exported by `DfTypes` are shared.
 *
 * @packageDocumentation
 */

import { TypeConstraint } from "../constraints";
import { LongRangeSet } from "../numbers";

/** All possible values. */
export interface DfTop {
  readonly kind: "Top";
}

/** No possible value: an unreachable state. */
export interface DfBottom {
  readonly kind: "Bottom";
}

export interface DfBooleanType {
  readonly kind: "Boolean";
}

export interface DfBooleanConstant {
  readonly kind: "BooleanConstant";
  readonly value: boolean;
}

export type IntegralWidth = "int" | "long";

/**
 * A set of `int` or `long` values. A single-point range is the constant form.
 */
export interface DfIntegralType {
  readonly kind: "Integral";
  readonly width: IntegralWidth;
  readonly range: LongRangeSet;
  /**
   * The widest range observed before the value was narrowed by conditions.
   * Absent when it is equal to `range`.
   */
  readonly wideRange: LongRangeSet | undefined;
}

export type FloatingWidth = "float" | "double";

/** Any value of the floating-point type, NaN and both zeros included. */
export interface DfFloatingType {
  readonly kind: "Floating";
  readonly width: FloatingWidth;
}

/** Exactly +0.0 and -0.0. */
export interface DfFloatingZero {
  readonly kind: "FloatingZero";
  readonly width: FloatingWidth;
}

export interface DfFloatingConstant {
  readonly kind: "FloatingConstant";
  readonly width: FloatingWidth;
  readonly value: number;
}

/** Any value except the excluded ones. */
export interface DfFloatingNotValue {
  readonly kind: "FloatingNotValue";
  readonly width: FloatingWidth;
  /** Non-empty, without duplicates, ordered by {@link floatingKey}. */
  readonly excluded: readonly number[];
}

/** The null reference. */
export interface DfNullConstant {
  readonly kind: "Null";
}

/**
 * Nullability of a reference value. `"null"` is only used when describing
 * values; the lattice represents null with {@link DfNullConstant}.
 */
export type DfaNullability = "null" | "not-null" | "nullable" | "unknown";

export type Mutability = "mutable" | "unmodifiable" | "unknown";

/**
 * A derived scalar property of the referenced object (e.g. a length) that is
 * tracked as a lattice element of its own.
 */
export interface SpecialFieldBinding {
  readonly field: string;
  readonly value: DfType;
}

/** Object references, possibly including null. */
export interface DfReferenceType {
  readonly kind: "Reference";
  readonly constraint: TypeConstraint;
  readonly nullability: Exclude<DfaNullability, "null">;
  readonly mutability: Mutability;
  readonly specialField: SpecialFieldBinding | undefined;
  /** The reference denotes a freshly created object that hasn't escaped. */
  readonly local: boolean;
}

export type PrimitiveTypeName =
  | "boolean"
  | "byte"
  | "short"
  | "char"
  | "int"
  | "long"
  | "float"
  | "double";

export type PrimitiveLiteral =
  | { readonly type: "boolean"; readonly value: boolean }
  | {
      readonly type: "byte" | "short" | "char" | "int";
      readonly value: number;
    }
  | { readonly type: "long"; readonly value: bigint }
  | { readonly type: "float" | "double"; readonly value: number };

/**
 * Objects a reference constant may hold.
 */
export type ConstantPayload =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "enum"; readonly enumType: string; readonly name: string }
  | {
      readonly kind: "field";
      readonly owner: string;
      readonly name: string;
      readonly type: string;
    }
  | { readonly kind: "class"; readonly typeName: string }
  | { readonly kind: "boxed"; readonly literal: PrimitiveLiteral };

export interface DfReferenceConstant {
  readonly kind: "ReferenceConstant";
  readonly constant: ConstantPayload;
  readonly constraint: TypeConstraint;
  /**
   * Set for values computed by the analysis rather than taken from a
   * canonical literal, e.g. the result of a string concatenation.
   */
  readonly synthesized: boolean;
}

export type DfBooleanFamily = DfBooleanType | DfBooleanConstant;
export type DfFloatingFamily =
  | DfFloatingType
  | DfFloatingZero
  | DfFloatingConstant
  | DfFloatingNotValue;
export type DfReferenceFamily =
  | DfNullConstant
  | DfReferenceType
  | DfReferenceConstant;

export type DfType =
  | DfTop
  | DfBottom
  | DfBooleanFamily
  | DfIntegralType
  | DfFloatingFamily
  | DfReferenceFamily;

/**
 * Host types as reported by the front-end.
 */
export type HostType =
  | {
      readonly kind: "primitive";
      readonly name: PrimitiveTypeName | "void" | "null";
    }
  | { readonly kind: "reference"; readonly name: string };

export const TOP: DfTop = { kind: "Top" };
export const BOTTOM: DfBottom = { kind: "Bottom" };

export function isBooleanFamily(t: DfType): t is DfBooleanFamily {
  return t.kind === "Boolean" || t.kind === "BooleanConstant";
}

export function isIntegral(t: DfType): t is DfIntegralType {
  return t.kind === "Integral";
}

export function isFloatingFamily(t: DfType): t is DfFloatingFamily {
  return (
    t.kind === "Floating" ||
    t.kind === "FloatingZero" ||
    t.kind === "FloatingConstant" ||
    t.kind === "FloatingNotValue"
  );
}

export function isReferenceFamily(t: DfType): t is DfReferenceFamily {
  return (
    t.kind === "Null" ||
    t.kind === "Reference" ||
    t.kind === "ReferenceConstant"
  );
}

/**
 * Canonical key of a floating-point value: distinguishes -0.0 from +0.0 and
 * keeps NaN equal to itself.
 */
export function floatingKey(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}
