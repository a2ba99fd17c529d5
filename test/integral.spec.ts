import {
  DfType,
  DfTypes,
  dfTypeToString,
  equals,
  isSuperType,
  join,
  meet,
  meetRange,
  tryNegate,
  widenToWideRange,
} from "../src/internals/lattice";
import { Interval, LongRangeSet } from "../src/internals/numbers";

const intRange = (from: number, to: number) =>
  DfTypes.intRange(LongRangeSet.range(from, to));

function wideRangeOf(t: DfType): string | undefined {
  return t.kind === "Integral" ? t.wideRange?.toString() : undefined;
}

describe("Integral types", () => {
  it("joins ranges", () => {
    expect(dfTypeToString(join(intRange(0, 5), intRange(3, 10)))).toBe(
      "int {0..10}",
    );
    expect(
      dfTypeToString(join(DfTypes.intValue(1), DfTypes.intValue(3))),
    ).toBe("int {1, 3}");
  });

  it("meets ranges", () => {
    expect(dfTypeToString(meet(intRange(0, 5), intRange(3, 10)))).toBe(
      "int {3..5}",
    );
    expect(meet(intRange(0, 5), intRange(6, 10))).toBe(DfTypes.BOTTOM);
  });

  it("keeps int and long apart", () => {
    expect(join(DfTypes.intValue(1), DfTypes.longValue(1n))).toBe(DfTypes.TOP);
    expect(meet(DfTypes.INT, DfTypes.LONG)).toBe(DfTypes.BOTTOM);
    expect(isSuperType(DfTypes.LONG, DfTypes.intValue(1))).toBe(false);
  });

  it("orders by range containment", () => {
    expect(isSuperType(intRange(0, 10), DfTypes.intValue(4))).toBe(true);
    expect(isSuperType(DfTypes.intValue(4), intRange(0, 10))).toBe(false);
    expect(isSuperType(DfTypes.INT, intRange(0, 10))).toBe(true);
  });

  it("negates within the domain", () => {
    expect(dfTypeToString(tryNegate(DfTypes.intValue(0)))).toBe(
      "int {-2147483648..-1, 1..2147483647}",
    );
    expect(tryNegate(DfTypes.LONG)).toBe(DfTypes.BOTTOM);
    expect(
      equals(tryNegate(tryNegate(intRange(0, 10))), intRange(0, 10)),
    ).toBe(true);
  });

  it("joins ranges with many intervals to themselves", () => {
    const points = (count: number) =>
      LongRangeSet.fromIntervals(
        Array.from({ length: count }, (_, i) => Interval.point(10 * i)),
      );
    const twenty = DfTypes.intRange(points(20));
    expect(equals(join(twenty, twenty), twenty)).toBe(true);
    expect(equals(join(twenty, DfTypes.intValue(10)), twenty)).toBe(true);
    expect(equals(join(DfTypes.intValue(10), twenty), twenty)).toBe(true);

    const holes = tryNegate(DfTypes.intRange(points(17)));
    expect(holes.kind === "Integral" && holes.range.intervals.length).toBe(18);
    expect(equals(join(holes, holes), holes)).toBe(true);
    expect(equals(join(holes, DfTypes.intValue(5)), holes)).toBe(true);
    const withZero = join(holes, DfTypes.intValue(0));
    expect(withZero.kind === "Integral" && withZero.range.intervals.length).toBe(
      17,
    );
  });

  it("joins to the full domain singleton", () => {
    const negative = DfTypes.intRange(
      LongRangeSet.range(LongRangeSet.INT_MIN, -1),
    );
    const rest = DfTypes.intRange(LongRangeSet.range(0, LongRangeSet.INT_MAX));
    expect(join(negative, rest)).toBe(DfTypes.INT);
  });
});

describe("Wide ranges", () => {
  const narrowed = meetRange(
    DfTypes.intRange(LongRangeSet.range(0, 100)),
    LongRangeSet.range(0, 9),
  );

  it("records the range before narrowing", () => {
    expect(dfTypeToString(narrowed)).toBe("int {0..9}");
    expect(wideRangeOf(narrowed)).toBe("{0..100}");
  });

  it("records the domain when narrowing a generic element", () => {
    const t = meetRange(DfTypes.INT, LongRangeSet.range(0, 9));
    expect(wideRangeOf(t)).toBe("{-2147483648..2147483647}");
  });

  it("does not take part in equality and ordering", () => {
    const plain = intRange(0, 9);
    expect(equals(narrowed, plain)).toBe(true);
    expect(isSuperType(plain, narrowed)).toBe(true);
    expect(isSuperType(narrowed, plain)).toBe(true);
  });

  it("is kept by join and meet", () => {
    expect(wideRangeOf(join(narrowed, DfTypes.intValue(20)))).toBe(
      "{0..100}",
    );
    expect(wideRangeOf(meet(narrowed, intRange(5, 50)))).toBe("{5..50}");
    expect(wideRangeOf(join(intRange(0, 1), intRange(5, 6)))).toBeUndefined();
  });

  it("can be jumped to", () => {
    expect(equals(widenToWideRange(narrowed), intRange(0, 100))).toBe(true);
    expect(wideRangeOf(widenToWideRange(narrowed))).toBeUndefined();
    const plain = DfTypes.intValue(3);
    expect(widenToWideRange(plain)).toBe(plain);
    expect(widenToWideRange(DfTypes.TRUE)).toBe(DfTypes.TRUE);
  });

  it("only narrows integral elements", () => {
    expect(meetRange(DfTypes.BOTTOM, LongRangeSet.point(1))).toBe(
      DfTypes.BOTTOM,
    );
    expect(() => meetRange(DfTypes.FLOAT, LongRangeSet.point(1))).toThrow(
      "Cannot narrow Floating by {1}",
    );
  });
});
