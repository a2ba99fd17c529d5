import {
  BOTTOM,
  DfReferenceConstant,
  DfReferenceFamily,
  DfReferenceType,
  DfType,
  DfaNullability,
  Mutability,
  SpecialFieldBinding,
} from "./types";
import { DfTypes } from "./factory";
import { isSuperType, join, meet, typeKey } from "./dfType";
import { payloadKey } from "./literals";

/**
 * Special field bound to the length of string constants.
 */
export const STRING_LENGTH_FIELD = "length";

function nullabilityContains(
  self: DfaNullability,
  other: DfaNullability,
): boolean {
  return (
    self === other ||
    self === "unknown" ||
    (self === "nullable" && (other === "not-null" || other === "null"))
  );
}

function nullabilityJoin(
  a: DfaNullability,
  b: DfaNullability,
): Exclude<DfaNullability, "null"> {
  if (a === b && a !== "null") return a;
  if (
    (a === "null" && (b === "not-null" || b === "nullable")) ||
    (b === "null" && (a === "not-null" || a === "nullable"))
  ) {
    return "nullable";
  }
  return "unknown";
}

function nullabilityMeet(
  a: Exclude<DfaNullability, "null">,
  b: Exclude<DfaNullability, "null">,
): Exclude<DfaNullability, "null"> {
  if (a === "unknown") return b;
  if (b === "unknown") return a;
  return a === b ? a : "not-null";
}

function mayBeNull(nullability: DfaNullability): boolean {
  return nullabilityContains(nullability, "null");
}

function mutabilityContains(self: Mutability, other: Mutability): boolean {
  return self === other || self === "unknown";
}

/**
 * @returns `undefined` when no object can have both mutabilities.
 */
function mutabilityMeet(a: Mutability, b: Mutability): Mutability | undefined {
  if (a === "unknown") return b;
  if (b === "unknown") return a;
  return a === b ? a : undefined;
}

function specialFieldContains(
  self: SpecialFieldBinding | undefined,
  other: SpecialFieldBinding | undefined,
): boolean {
  if (self === undefined) return true;
  if (other === undefined) return false;
  return self.field === other.field && isSuperType(self.value, other.value);
}

/**
 * Views a constant as the not-null reference it belongs to. String
 * constants also bind their length.
 */
export function asReference(t: DfReferenceConstant): DfReferenceType {
  const specialField =
    t.constant.kind === "string"
      ? {
          field: STRING_LENGTH_FIELD,
          value: DfTypes.intValue(t.constant.value.length),
        }
      : undefined;
  return DfTypes.customObject(
    t.constraint,
    "not-null",
    "unknown",
    specialField,
  );
}

function referenceTypeIsSuperType(
  self: DfReferenceType,
  other: DfReferenceType,
): boolean {
  return (
    nullabilityContains(self.nullability, other.nullability) &&
    mutabilityContains(self.mutability, other.mutability) &&
    (!self.local || other.local) &&
    self.constraint.isSuperConstraintOf(other.constraint) &&
    specialFieldContains(self.specialField, other.specialField)
  );
}

export function referenceIsSuperType(
  self: DfReferenceFamily,
  other: DfReferenceFamily,
): boolean {
  switch (self.kind) {
    case "Null":
      return other.kind === "Null";
    case "ReferenceConstant":
      return (
        other.kind === "ReferenceConstant" &&
        payloadKey(self.constant) === payloadKey(other.constant) &&
        self.constraint.isSuperConstraintOf(other.constraint)
      );
    case "Reference":
      if (other.kind === "Null") return mayBeNull(self.nullability);
      return referenceTypeIsSuperType(
        self,
        other.kind === "Reference" ? other : asReference(other),
      );
  }
}

/**
 * Adds null to the values of `t`. Locality is lost.
 */
function joinWithNull(t: DfReferenceType): DfType {
  return DfTypes.customObject(
    t.constraint,
    nullabilityJoin("null", t.nullability),
    t.mutability,
    t.specialField,
  );
}

function joinSpecialFields(
  a: SpecialFieldBinding | undefined,
  b: SpecialFieldBinding | undefined,
): SpecialFieldBinding | undefined {
  if (a === undefined || b === undefined || a.field !== b.field) {
    return undefined;
  }
  return { field: a.field, value: join(a.value, b.value) };
}

function joinReferenceTypes(a: DfReferenceType, b: DfReferenceType): DfType {
  return DfTypes.customObject(
    a.constraint.join(b.constraint),
    nullabilityJoin(a.nullability, b.nullability),
    a.mutability === b.mutability ? a.mutability : "unknown",
    joinSpecialFields(a.specialField, b.specialField),
    a.local && b.local,
  );
}

function familyNullability(t: DfReferenceFamily): DfaNullability {
  switch (t.kind) {
    case "Null":
      return "null";
    case "Reference":
      return t.nullability;
    case "ReferenceConstant":
      return "not-null";
  }
}

/**
 * Checks if `self` is the join of both operands. A nullable element contains
 * not-null ones, yet their join has unknown nullability.
 */
function absorbs(self: DfReferenceFamily, other: DfReferenceFamily): boolean {
  const nullability = familyNullability(self);
  const otherNullability = familyNullability(other);
  return (
    referenceIsSuperType(self, other) &&
    (nullability === otherNullability ||
      nullabilityJoin(nullability, otherNullability) === nullability)
  );
}

export function referenceJoin(
  a: DfReferenceFamily,
  b: DfReferenceFamily,
): DfType {
  if (absorbs(a, b)) return a;
  if (absorbs(b, a)) return b;
  const left = a.kind === "ReferenceConstant" ? asReference(a) : a;
  const right = b.kind === "ReferenceConstant" ? asReference(b) : b;
  if (left.kind === "Null") {
    return right.kind === "Null" ? left : joinWithNull(right);
  }
  if (right.kind === "Null") return joinWithNull(left);
  return joinReferenceTypes(left, right);
}

function meetReferenceTypes(a: DfReferenceType, b: DfReferenceType): DfType {
  const failure =
    mayBeNull(a.nullability) && mayBeNull(b.nullability)
      ? DfTypes.NULL
      : BOTTOM;
  const constraint = a.constraint.meet(b.constraint);
  if (constraint.isBottom()) return failure;
  const mutability = mutabilityMeet(a.mutability, b.mutability);
  if (mutability === undefined) return failure;
  let specialField = a.specialField ?? b.specialField;
  if (a.specialField !== undefined && b.specialField !== undefined) {
    if (a.specialField.field !== b.specialField.field) return failure;
    const value = meet(a.specialField.value, b.specialField.value);
    if (value.kind === "Bottom") return failure;
    specialField = { field: a.specialField.field, value };
  }
  const local = a.local || b.local;
  return DfTypes.customObject(
    constraint,
    local ? "not-null" : nullabilityMeet(a.nullability, b.nullability),
    mutability,
    specialField,
    local,
  );
}

/**
 * A constant meets another element to itself when the element contains it,
 * and to BOTTOM otherwise.
 */
export function referenceMeet(
  a: DfReferenceFamily,
  b: DfReferenceFamily,
): DfType {
  if (referenceIsSuperType(a, b)) return b;
  if (referenceIsSuperType(b, a)) return a;
  if (a.kind === "Reference" && b.kind === "Reference") {
    return meetReferenceTypes(a, b);
  }
  return BOTTOM;
}

export function referenceNegate(t: DfReferenceFamily): DfType {
  if (t.kind === "Null") return DfTypes.NOT_NULL_OBJECT;
  if (typeKey(t) === typeKey(DfTypes.NOT_NULL_OBJECT)) return DfTypes.NULL;
  return BOTTOM;
}
