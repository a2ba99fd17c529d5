/**
 * Nominal type constraint of a reference value: "the runtime class of the
 * value satisfies these bounds".
 *
 * The lattice stores and forwards constraints without looking inside them;
 * it only relies on the operations below.
 */
export interface TypeConstraint {
  /**
   * True for the unconstrained constraint, satisfied by any object.
   */
  isTop(): boolean;

  /**
   * True for the unsatisfiable constraint.
   */
  isBottom(): boolean;

  /**
   * Checks if every object satisfying `other` also satisfies this constraint.
   */
  isSuperConstraintOf(other: TypeConstraint): boolean;

  /**
   * Returns a constraint satisfied by all objects satisfying either operand.
   */
  join(other: TypeConstraint): TypeConstraint;

  /**
   * Returns a constraint satisfied by the objects satisfying both operands;
   * the bottom constraint when there are none.
   */
  meet(other: TypeConstraint): TypeConstraint;

  /**
   * Canonical representation: equal constraints have equal keys.
   */
  key(): string;

  toString(): string;
}

/**
 * Produces constraints from host type names.
 */
export interface ConstraintProvider {
  /**
   * Constraint satisfied by instances of `typeName` and its subtypes.
   */
  instanceOf(typeName: string): TypeConstraint;

  /**
   * Constraint satisfied by instances of exactly `typeName`.
   */
  exact(typeName: string): TypeConstraint;
}

class TopConstraint implements TypeConstraint {
  isTop(): boolean {
    return true;
  }
  isBottom(): boolean {
    return false;
  }
  isSuperConstraintOf(_other: TypeConstraint): boolean {
    return true;
  }
  join(_other: TypeConstraint): TypeConstraint {
    return this;
  }
  meet(other: TypeConstraint): TypeConstraint {
    return other;
  }
  key(): string {
    return "top";
  }
  toString(): string {
    return "";
  }
}

class BottomConstraint implements TypeConstraint {
  isTop(): boolean {
    return false;
  }
  isBottom(): boolean {
    return true;
  }
  isSuperConstraintOf(other: TypeConstraint): boolean {
    return other.isBottom();
  }
  join(other: TypeConstraint): TypeConstraint {
    return other;
  }
  meet(_other: TypeConstraint): TypeConstraint {
    return this;
  }
  key(): string {
    return "bottom";
  }
  toString(): string {
    return "⊥";
  }
}

/**
 * Universal constraints shared by every provider.
 */
export const TypeConstraints: {
  readonly TOP: TypeConstraint;
  readonly BOTTOM: TypeConstraint;
} = {
  TOP: new TopConstraint(),
  BOTTOM: new BottomConstraint(),
};
