import {
  BOTTOM,
  DfBooleanConstant,
  DfBooleanType,
  DfFloatingConstant,
  DfFloatingType,
  DfFloatingZero,
  DfIntegralType,
  DfNullConstant,
  DfReferenceConstant,
  DfReferenceType,
  DfType,
  DfaNullability,
  FloatingWidth,
  HostType,
  IntegralWidth,
  Mutability,
  SpecialFieldBinding,
  TOP,
  floatingKey,
} from "./types";
import { parseConstantPayload, parsePrimitiveLiteral } from "./literals";
import {
  ConstraintProvider,
  TypeConstraint,
  TypeConstraints,
} from "../constraints";
import { InternalException } from "../exceptions";
import { LongRangeSet } from "../numbers";

/**
 * Commonly used lattice elements and factory methods.
 *
 * Every method returns a normalized element: full ranges are the generic
 * singletons, single-point ranges are constants, empty ranges are
 * {@link DfTypes.BOTTOM}.
 */
export class DfTypes {
  private constructor() {}

  static readonly TOP = TOP;
  static readonly BOTTOM = BOTTOM;

  /**
   * A type that contains two values: true and false.
   */
  static readonly BOOLEAN: DfBooleanType = { kind: "Boolean" };
  static readonly TRUE: DfBooleanConstant = {
    kind: "BooleanConstant",
    value: true,
  };
  static readonly FALSE: DfBooleanConstant = {
    kind: "BooleanConstant",
    value: false,
  };

  static booleanValue(value: boolean): DfBooleanConstant {
    return value ? DfTypes.TRUE : DfTypes.FALSE;
  }

  static readonly INT: DfIntegralType = {
    kind: "Integral",
    width: "int",
    range: LongRangeSet.typeRange("int"),
    wideRange: undefined,
  };

  static readonly LONG: DfIntegralType = {
    kind: "Integral",
    width: "long",
    range: LongRangeSet.typeRange("long"),
    wideRange: undefined,
  };

  /**
   * Creates a type that represents a subset of int values.
   *
   * @returns {@link BOTTOM} if the range is empty.
   * @throws {Error} if the range contains values not representable as int.
   */
  static intRange(range: LongRangeSet): DfType {
    DfTypes.checkDomain("int", range);
    return DfTypes.rangeWithWide("int", range, undefined);
  }

  /**
   * Creates a type that represents a subset of int values, dropping the
   * values not representable as int.
   */
  static intRangeClamped(range: LongRangeSet): DfType {
    return DfTypes.intRange(range.intersect(LongRangeSet.typeRange("int")));
  }

  /**
   * @throws {Error} if the value is not a 32-bit signed integer.
   */
  static intValue(value: number): DfIntegralType {
    if (
      !Number.isInteger(value) ||
      value < Number(LongRangeSet.INT_MIN) ||
      value > Number(LongRangeSet.INT_MAX)
    ) {
      throw InternalException.make(`Not an int value: ${value}`, {
        trace: false,
      });
    }
    return DfTypes.integralConstant("int", BigInt(value));
  }

  /**
   * Creates a type that represents a subset of long values.
   *
   * @throws {Error} if the range leaves the 64-bit signed domain.
   */
  static longRange(range: LongRangeSet): DfType {
    DfTypes.checkDomain("long", range);
    return DfTypes.rangeWithWide("long", range, undefined);
  }

  static longRangeClamped(range: LongRangeSet): DfType {
    return DfTypes.longRange(range.intersect(LongRangeSet.all()));
  }

  static longValue(value: bigint): DfIntegralType {
    return DfTypes.integralConstant("long", LongRangeSet.checkLong(value));
  }

  /**
   * Selects between {@link longRangeClamped} and {@link intRangeClamped}.
   */
  static rangeClamped(range: LongRangeSet, isLong: boolean): DfType {
    return isLong
      ? DfTypes.longRangeClamped(range)
      : DfTypes.intRangeClamped(range);
  }

  /**
   * Low-level normalizer of integral types used by the lattice operations.
   * `range` must lie within the domain of `width`.
   *
   * The wide range is dropped when it is empty or equal to `range`, and
   * extended to cover `range` otherwise.
   */
  static rangeWithWide(
    width: IntegralWidth,
    range: LongRangeSet,
    wideRange: LongRangeSet | undefined,
  ): DfType {
    if (range.isEmpty()) return BOTTOM;
    const domain = LongRangeSet.typeRange(width);
    let wide =
      wideRange === undefined ? undefined : wideRange.intersect(domain);
    if (wide !== undefined && !wide.containsAll(range)) {
      wide = wide.union(range);
    }
    if (wide === undefined || wide.isEmpty() || wide.equals(range)) {
      if (range.equals(domain)) {
        return width === "int" ? DfTypes.INT : DfTypes.LONG;
      }
      return { kind: "Integral", width, range, wideRange: undefined };
    }
    return { kind: "Integral", width, range, wideRange: wide };
  }

  private static integralConstant(
    width: IntegralWidth,
    value: bigint,
  ): DfIntegralType {
    return {
      kind: "Integral",
      width,
      range: LongRangeSet.point(value),
      wideRange: undefined,
    };
  }

  private static checkDomain(width: IntegralWidth, range: LongRangeSet): void {
    if (!LongRangeSet.typeRange(width).containsAll(range)) {
      throw InternalException.make(
        `Range ${range} is not representable as ${width}`,
        { trace: false },
      );
    }
  }

  static readonly FLOAT: DfFloatingType = { kind: "Floating", width: "float" };
  static readonly DOUBLE: DfFloatingType = {
    kind: "Floating",
    width: "double",
  };

  /**
   * Represents +0.0f and -0.0f at the same time.
   */
  static readonly FLOAT_ZERO: DfFloatingZero = {
    kind: "FloatingZero",
    width: "float",
  };

  /**
   * Represents +0.0 and -0.0 at the same time.
   */
  static readonly DOUBLE_ZERO: DfFloatingZero = {
    kind: "FloatingZero",
    width: "double",
  };

  static floating(width: FloatingWidth): DfFloatingType {
    return width === "float" ? DfTypes.FLOAT : DfTypes.DOUBLE;
  }

  static floatingZero(width: FloatingWidth): DfFloatingZero {
    return width === "float" ? DfTypes.FLOAT_ZERO : DfTypes.DOUBLE_ZERO;
  }

  /**
   * A float constant. The value is rounded to single precision.
   */
  static floatValue(value: number): DfFloatingConstant {
    return DfTypes.floatingValue("float", value);
  }

  static doubleValue(value: number): DfFloatingConstant {
    return DfTypes.floatingValue("double", value);
  }

  static floatingValue(
    width: FloatingWidth,
    value: number,
  ): DfFloatingConstant {
    return {
      kind: "FloatingConstant",
      width,
      value: width === "float" ? Math.fround(value) : value,
    };
  }

  /**
   * All values of the floating-point type except `excluded`.
   *
   * @returns the generic type when nothing is excluded.
   */
  static floatingNotValue(
    width: FloatingWidth,
    excluded: Iterable<number>,
  ): DfType {
    const unique = new Map<string, number>();
    for (const value of excluded) {
      const rounded = width === "float" ? Math.fround(value) : value;
      unique.set(floatingKey(rounded), rounded);
    }
    if (unique.size === 0) return DfTypes.floating(width);
    const keys = [...unique.keys()].sort();
    return {
      kind: "FloatingNotValue",
      width,
      excluded: keys.map((k) => unique.get(k) ?? NaN),
    };
  }

  /**
   * A reference type that contains only the null reference.
   */
  static readonly NULL: DfNullConstant = { kind: "Null" };

  /**
   * A reference type that contains any reference except null.
   */
  static readonly NOT_NULL_OBJECT: DfReferenceType = DfTypes.customObject(
    TypeConstraints.TOP,
    "not-null",
    "unknown",
  );

  /**
   * A reference type that contains any reference or null.
   */
  static readonly OBJECT_OR_NULL: DfReferenceType = DfTypes.customObject(
    TypeConstraints.TOP,
    "unknown",
    "unknown",
  );

  /**
   * A reference type that contains any reference to a local object.
   */
  static readonly LOCAL_OBJECT: DfReferenceType = DfTypes.customObject(
    TypeConstraints.TOP,
    "not-null",
    "unknown",
    undefined,
    true,
  );

  /**
   * A low-level method to construct a custom reference type. Prefer building
   * the type with a series of `meet` calls.
   *
   * @param nullability Must not be `"null"`: use {@link NULL} instead.
   * @param local Local objects are never null.
   * @throws {Error} on the contract violations above.
   */
  static customObject(
    constraint: TypeConstraint,
    nullability: DfaNullability,
    mutability: Mutability,
    specialField: SpecialFieldBinding | undefined = undefined,
    local: boolean = false,
  ): DfReferenceType {
    if (nullability === "null") {
      throw InternalException.make(
        "Reference types cannot have null nullability, use DfTypes.NULL",
      );
    }
    if (local && nullability !== "not-null") {
      throw InternalException.make(
        `Local objects are not null, got nullability: ${nullability}`,
      );
    }
    return {
      kind: "Reference",
      constraint,
      nullability,
      mutability,
      specialField:
        specialField === undefined || specialField.value.kind === "Top"
          ? undefined
          : specialField,
      local,
    };
  }

  /**
   * Returns a primitive constant. Booleans and bigints (long values) are
   * accepted as is, numbers must be tagged with their type, e.g.
   * `{ type: "int", value: 5 }`.
   *
   * @throws {Error} if the supplied value is not a supported primitive constant.
   */
  static primitiveConstant(
    literal: unknown,
  ): DfBooleanConstant | DfIntegralType | DfFloatingConstant {
    const parsed = parsePrimitiveLiteral(literal);
    if (parsed === undefined) {
      throw InternalException.make("Invalid primitive constant supplied", {
        node: literal,
        trace: false,
      });
    }
    switch (parsed.type) {
      case "boolean":
        return DfTypes.booleanValue(parsed.value);
      case "byte":
      case "short":
      case "char":
      case "int":
        return DfTypes.intValue(parsed.value);
      case "long":
        return DfTypes.longValue(parsed.value);
      case "float":
      case "double":
        return DfTypes.floatingValue(parsed.type, parsed.value);
    }
  }

  /**
   * Returns a constant type that contains only the given value.
   *
   * Primitive literals are unboxed, `null` yields {@link NULL}, other values
   * must be a supported constant payload (string, enum member, declared
   * field, type literal, boxed literal) and are given the constraint
   * `instanceof typeName`.
   *
   * @throws {Error} for unsupported values.
   */
  static constant(
    value: unknown,
    typeName: string,
    constraints: ConstraintProvider,
  ): DfType {
    if (value === null) return DfTypes.NULL;
    if (parsePrimitiveLiteral(value) !== undefined) {
      return DfTypes.primitiveConstant(value);
    }
    return DfTypes.referenceConstant(value, typeName, constraints);
  }

  /**
   * Like {@link constant}, taking the constraint from a reference type the
   * constant must belong to.
   */
  static constantOf(value: unknown, pattern: DfType): DfType {
    if (value === null) return DfTypes.NULL;
    if (parsePrimitiveLiteral(value) !== undefined) {
      return DfTypes.primitiveConstant(value);
    }
    if (pattern.kind !== "Reference" && pattern.kind !== "ReferenceConstant") {
      throw InternalException.make(`Not a reference type: ${pattern.kind}`, {
        node: value,
      });
    }
    return DfTypes.makeReferenceConstant(value, pattern.constraint, false);
  }

  /**
   * Returns a non-primitive constant.
   */
  static referenceConstant(
    value: unknown,
    typeName: string,
    constraints: ConstraintProvider,
  ): DfReferenceConstant {
    return DfTypes.makeReferenceConstant(
      value,
      constraints.instanceOf(typeName),
      false,
    );
  }

  /**
   * The result of a string concatenation computed by the analysis.
   */
  static concatenationResult(
    text: string,
    stringTypeName: string,
    constraints: ConstraintProvider,
  ): DfReferenceConstant {
    return DfTypes.makeReferenceConstant(
      { kind: "string", value: text },
      constraints.exact(stringTypeName),
      true,
    );
  }

  private static makeReferenceConstant(
    value: unknown,
    constraint: TypeConstraint,
    synthesized: boolean,
  ): DfReferenceConstant {
    const constant = parseConstantPayload(value);
    if (constant === undefined) {
      throw InternalException.make("Unsupported constant object", {
        node: value,
        trace: false,
      });
    }
    return { kind: "ReferenceConstant", constant, constraint, synthesized };
  }

  /**
   * @returns the default value of the type: false, zero of the given width
   *   or null.
   */
  static defaultValue(type: HostType): DfType {
    if (type.kind === "primitive") {
      switch (type.name) {
        case "boolean":
          return DfTypes.FALSE;
        case "byte":
        case "char":
        case "short":
        case "int":
          return DfTypes.intValue(0);
        case "long":
          return DfTypes.longValue(0n);
        case "float":
          return DfTypes.floatValue(0);
        case "double":
          return DfTypes.doubleValue(0);
      }
    }
    return DfTypes.NULL;
  }

  /**
   * @param type Host type of the value; `undefined` when it is not known.
   * @returns a type containing the values of the given type (or its
   *   subtypes) with the given nullability.
   */
  static typedObject(
    type: HostType | undefined,
    nullability: Exclude<DfaNullability, "null">,
    constraints: ConstraintProvider,
  ): DfType {
    if (type === undefined) return TOP;
    if (type.kind === "primitive") {
      switch (type.name) {
        case "void":
          return BOTTOM;
        case "boolean":
          return DfTypes.BOOLEAN;
        case "int":
          return DfTypes.INT;
        case "byte":
        case "char":
        case "short":
          return DfTypes.intRange(LongRangeSet.typeRange(type.name));
        case "long":
          return DfTypes.LONG;
        case "float":
          return DfTypes.FLOAT;
        case "double":
          return DfTypes.DOUBLE;
        case "null":
          return DfTypes.NULL;
      }
    }
    const constraint = constraints.instanceOf(type.name);
    if (constraint.isBottom()) {
      return nullability === "not-null" ? BOTTOM : DfTypes.NULL;
    }
    return DfTypes.customObject(constraint, nullability, "unknown");
  }
}
