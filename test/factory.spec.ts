import {
  DfTypes,
  dfTypeToString,
  equals,
  getConstantValue,
  typeKey,
} from "../src/internals/lattice";
import { LongRangeSet } from "../src/internals/numbers";
import {
  NominalTypeSystem,
  TypeConstraints,
} from "../src/internals/constraints";

const types = new NominalTypeSystem()
  .declare("CharSequence", { isInterface: true })
  .declare("String", { supertypes: ["CharSequence"], final: true })
  .declare("Color")
  .declare("Number");

describe("DfTypes integral factories", () => {
  it("returns singletons for the full domain", () => {
    expect(DfTypes.intRange(LongRangeSet.typeRange("int"))).toBe(DfTypes.INT);
    expect(DfTypes.longRange(LongRangeSet.all())).toBe(DfTypes.LONG);
  });

  it("returns bottom for empty ranges", () => {
    expect(DfTypes.intRange(LongRangeSet.EMPTY)).toBe(DfTypes.BOTTOM);
  });

  it("represents constants as point ranges", () => {
    const five = DfTypes.intRange(LongRangeSet.point(5));
    expect(equals(five, DfTypes.intValue(5))).toBe(true);
    expect(getConstantValue(five)).toBe(5);
    expect(getConstantValue(DfTypes.longValue(5n))).toBe(5n);
    expect(dfTypeToString(DfTypes.longValue(5n))).toBe("5L");
  });

  it("rejects values outside of the domain", () => {
    expect(() => DfTypes.intValue(2 ** 31)).toThrow("Not an int value");
    expect(() => DfTypes.intValue(1.5)).toThrow("Not an int value");
    expect(() => DfTypes.longValue(1n << 63n)).toThrow(
      "outside of the 64-bit signed domain",
    );
    expect(() =>
      DfTypes.intRange(LongRangeSet.range(0, 1n << 32n)),
    ).toThrow("is not representable as int");
  });

  it("clamps ranges to the domain", () => {
    const clamped = DfTypes.intRangeClamped(LongRangeSet.range(0, 1n << 40n));
    expect(dfTypeToString(clamped)).toBe("int {0..2147483647}");
    expect(
      DfTypes.rangeClamped(LongRangeSet.range(-(1n << 70n), 1n << 70n), true),
    ).toBe(DfTypes.LONG);
    expect(
      DfTypes.longRangeClamped(LongRangeSet.range(1n << 64n, 1n << 65n)),
    ).toBe(DfTypes.BOTTOM);
  });

  it("normalizes wide ranges", () => {
    const range = LongRangeSet.range(0, 10);
    const same = DfTypes.rangeWithWide("int", range, range);
    expect(same.kind === "Integral" && same.wideRange).toBeUndefined();
    const empty = DfTypes.rangeWithWide("int", range, LongRangeSet.EMPTY);
    expect(empty.kind === "Integral" && empty.wideRange).toBeUndefined();
    const extended = DfTypes.rangeWithWide(
      "int",
      range,
      LongRangeSet.range(5, 20),
    );
    expect(
      extended.kind === "Integral" && extended.wideRange?.toString(),
    ).toBe("{0..20}");
    const clamped = DfTypes.rangeWithWide("int", range, LongRangeSet.all());
    expect(
      clamped.kind === "Integral" && clamped.wideRange?.toString(),
    ).toBe("{-2147483648..2147483647}");
  });
});

describe("DfTypes floating factories", () => {
  it("rounds float values to single precision", () => {
    expect(getConstantValue(DfTypes.floatValue(0.1))).toBe(Math.fround(0.1));
    expect(getConstantValue(DfTypes.doubleValue(0.1))).toBe(0.1);
  });

  it("distinguishes signed zeros", () => {
    expect(equals(DfTypes.doubleValue(0), DfTypes.doubleValue(-0))).toBe(false);
    expect(dfTypeToString(DfTypes.doubleValue(-0))).toBe("-0.0");
    expect(dfTypeToString(DfTypes.floatValue(1))).toBe("1.0f");
  });

  it("deduplicates and orders excluded values", () => {
    const notValue = DfTypes.floatingNotValue("double", [2, NaN, 2, -0]);
    expect(typeKey(notValue)).toBe("double|not|-0,2,NaN");
    expect(DfTypes.floatingNotValue("float", [])).toBe(DfTypes.FLOAT);
  });
});

describe("DfTypes constants", () => {
  it("accepts tagged primitive literals", () => {
    expect(DfTypes.primitiveConstant(true)).toBe(DfTypes.TRUE);
    expect(getConstantValue(DfTypes.primitiveConstant(7n))).toBe(7n);
    expect(
      getConstantValue(DfTypes.primitiveConstant({ type: "short", value: -3 })),
    ).toBe(-3);
    expect(
      getConstantValue(
        DfTypes.primitiveConstant({ type: "float", value: NaN }),
      ),
    ).toBeNaN();
  });

  it("rejects unsupported primitive literals", () => {
    expect(() => DfTypes.primitiveConstant(5)).toThrow(
      "Invalid primitive constant supplied",
    );
    expect(() =>
      DfTypes.primitiveConstant({ type: "byte", value: 200 }),
    ).toThrow("Invalid primitive constant supplied");
    expect(() => DfTypes.primitiveConstant("text")).toThrow(
      "Invalid primitive constant supplied",
    );
  });

  it("builds reference constants", () => {
    const red = DfTypes.constant(
      { kind: "enum", enumType: "Color", name: "RED" },
      "Color",
      types,
    );
    expect(dfTypeToString(red)).toBe("Color.RED");
    expect(DfTypes.constant(null, "Color", types)).toBe(DfTypes.NULL);
    expect(DfTypes.constant(false, "Boolean", types)).toBe(DfTypes.FALSE);
  });

  it("takes the constraint from a pattern", () => {
    const pattern = DfTypes.typedObject(
      { kind: "reference", name: "Color" },
      "nullable",
      types,
    );
    const green = DfTypes.constantOf(
      { kind: "enum", enumType: "Color", name: "GREEN" },
      pattern,
    );
    expect(green.kind === "ReferenceConstant" && green.constraint.key()).toBe(
      "instanceof Color",
    );
    expect(() =>
      DfTypes.constantOf({ kind: "string", value: "x" }, DfTypes.INT),
    ).toThrow("Not a reference type: Integral");
  });

  it("rejects unsupported constant objects", () => {
    expect(() =>
      DfTypes.referenceConstant({ kind: "date" }, "Date", types),
    ).toThrow("Unsupported constant object");
  });

  it("marks concatenation results as synthesized exact strings", () => {
    const text = DfTypes.concatenationResult("ab", "String", types);
    expect(text.synthesized).toBe(true);
    expect(text.constraint.key()).toBe("exact String");
    expect(dfTypeToString(text)).toBe('"ab"');
  });
});

describe("DfTypes host types", () => {
  it("returns default values", () => {
    expect(DfTypes.defaultValue({ kind: "primitive", name: "boolean" })).toBe(
      DfTypes.FALSE,
    );
    expect(
      getConstantValue(
        DfTypes.defaultValue({ kind: "primitive", name: "long" }),
      ),
    ).toBe(0n);
    expect(
      getConstantValue(
        DfTypes.defaultValue({ kind: "primitive", name: "double" }),
      ),
    ).toBe(0);
    expect(DfTypes.defaultValue({ kind: "reference", name: "String" })).toBe(
      DfTypes.NULL,
    );
  });

  it("maps host types to generic elements", () => {
    expect(DfTypes.typedObject(undefined, "unknown", types)).toBe(DfTypes.TOP);
    expect(
      DfTypes.typedObject(
        { kind: "primitive", name: "void" },
        "unknown",
        types,
      ),
    ).toBe(DfTypes.BOTTOM);
    expect(
      DfTypes.typedObject({ kind: "primitive", name: "int" }, "unknown", types),
    ).toBe(DfTypes.INT);
    expect(
      dfTypeToString(
        DfTypes.typedObject(
          { kind: "primitive", name: "byte" },
          "unknown",
          types,
        ),
      ),
    ).toBe("int {-128..127}");
    expect(
      DfTypes.typedObject(
        { kind: "primitive", name: "null" },
        "unknown",
        types,
      ),
    ).toBe(DfTypes.NULL);
  });

  it("builds reference types", () => {
    const str = DfTypes.typedObject(
      { kind: "reference", name: "String" },
      "not-null",
      types,
    );
    expect(dfTypeToString(str)).toBe("not-null exact String");
    const object = DfTypes.typedObject(
      { kind: "reference", name: "Object" },
      "unknown",
      types,
    );
    expect(equals(object, DfTypes.OBJECT_OR_NULL)).toBe(true);
    expect(dfTypeToString(object)).toBe("object");
  });
});

describe("DfTypes.customObject", () => {
  it("rejects null nullability", () => {
    expect(() =>
      DfTypes.customObject(TypeConstraints.TOP, "null", "unknown"),
    ).toThrow("Reference types cannot have null nullability");
  });

  it("requires local objects to be not null", () => {
    expect(() =>
      DfTypes.customObject(
        TypeConstraints.TOP,
        "nullable",
        "unknown",
        undefined,
        true,
      ),
    ).toThrow("Local objects are not null");
  });

  it("drops special fields bound to top", () => {
    const t = DfTypes.customObject(TypeConstraints.TOP, "not-null", "mutable", {
      field: "length",
      value: DfTypes.TOP,
    });
    expect(t.specialField).toBeUndefined();
    expect(dfTypeToString(t)).toBe("not-null mutable");
  });
});
