import {
  NominalTypeSystem,
  TypeConstraints,
} from "../src/internals/constraints";

function makeSystem(): NominalTypeSystem {
  return new NominalTypeSystem()
    .declare("CharSequence", { isInterface: true })
    .declare("Comparable", { isInterface: true })
    .declare("String", {
      supertypes: ["CharSequence", "Comparable"],
      final: true,
    })
    .declare("Number")
    .declare("Integer", { supertypes: ["Number", "Comparable"], final: true })
    .declare("List", { isInterface: true })
    .declare("ArrayList", { supertypes: ["List"] });
}

describe("NominalTypeSystem", () => {
  const types = makeSystem();

  it("computes supertypes", () => {
    expect([...types.allSupertypes("Integer")].sort()).toEqual([
      "Comparable",
      "Integer",
      "Number",
      "Object",
    ]);
    expect(types.isSubtype("ArrayList", "List")).toBe(true);
    expect(types.isSubtype("List", "ArrayList")).toBe(false);
    expect(types.isSubtype("Undeclared", "Object")).toBe(true);
  });

  it("treats the root as the unconstrained type", () => {
    expect(types.instanceOf("Object").isTop()).toBe(true);
  });

  it("turns instanceof of a final class into an exact constraint", () => {
    expect(types.instanceOf("String").key()).toBe("exact String");
    expect(types.exact("Number").key()).toBe("exact Number");
  });

  it("forgets cached supertypes on redeclaration", () => {
    const system = new NominalTypeSystem().declare("A");
    expect(system.isSubtype("A", "B")).toBe(false);
    system.declare("A", { supertypes: ["B"] });
    expect(system.isSubtype("A", "B")).toBe(true);
  });
});

describe("NominalConstraint", () => {
  const types = makeSystem();
  const number = types.instanceOf("Number");
  const comparable = types.instanceOf("Comparable");
  const list = types.instanceOf("List");

  it("meets a class with an interface", () => {
    const both = number.meet(list);
    expect(both.key()).toBe("instanceof List&Number");
    expect(both.toString()).toBe("instanceof List, Number");
    expect(list.meet(number).key()).toBe(both.key());
  });

  it("meets unrelated classes to bottom", () => {
    expect(number.meet(types.instanceOf("ArrayList")).isBottom()).toBe(true);
  });

  it("meets an exact type with its bounds", () => {
    expect(comparable.meet(types.exact("String")).key()).toBe("exact String");
    expect(types.exact("String").meet(number).isBottom()).toBe(true);
    expect(list.meet(types.instanceOf("String")).isBottom()).toBe(true);
  });

  it("joins to the common supertypes", () => {
    const joined = types.exact("String").join(types.exact("Integer"));
    expect(joined.key()).toBe("instanceof Comparable");
    expect(types.instanceOf("ArrayList").join(number).isTop()).toBe(true);
  });

  it("orders constraints by subsumption", () => {
    expect(comparable.isSuperConstraintOf(types.exact("String"))).toBe(true);
    expect(types.exact("String").isSuperConstraintOf(comparable)).toBe(false);
    expect(
      types.instanceOf("CharSequence").isSuperConstraintOf(comparable),
    ).toBe(false);
    expect(list.isSuperConstraintOf(types.instanceOf("ArrayList"))).toBe(true);
    expect(number.isSuperConstraintOf(TypeConstraints.BOTTOM)).toBe(true);
    expect(TypeConstraints.TOP.isSuperConstraintOf(number)).toBe(true);
  });

  it("does not mix constraints of different systems", () => {
    const other = makeSystem().instanceOf("Number");
    expect(number.isSuperConstraintOf(other)).toBe(false);
    expect(number.join(other).isTop()).toBe(true);
    expect(number.meet(other).isBottom()).toBe(true);
  });

  it("treats universal constraints as identities", () => {
    expect(TypeConstraints.TOP.meet(number)).toBe(number);
    expect(TypeConstraints.BOTTOM.join(number)).toBe(number);
    expect(number.join(TypeConstraints.BOTTOM)).toBe(number);
    expect(number.meet(TypeConstraints.TOP)).toBe(number);
  });
});
