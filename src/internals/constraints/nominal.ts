import {
  ConstraintProvider,
  TypeConstraint,
  TypeConstraints,
} from "./typeConstraint";
import { upwardsAntichain } from "../antichain";

export interface TypeDeclaration {
  /** Direct supertypes; the root type is implied. */
  supertypes: readonly string[];
  /** A final class has no subclasses. */
  final: boolean;
  /** Interfaces may be combined freely; classes inherit singly. */
  isInterface: boolean;
}

/**
 * A nominal type hierarchy with single class inheritance, interfaces and
 * final classes. Names never declared are treated as non-final classes that
 * only extend the root.
 */
export class NominalTypeSystem implements ConstraintProvider {
  private readonly types = new Map<string, TypeDeclaration>();
  private readonly supertypeCache = new Map<string, ReadonlySet<string>>();

  /**
   * @param root Name of the type every other type extends.
   */
  constructor(public readonly root: string = "Object") {}

  /**
   * Declares a type. Supertypes must be declared before their subtypes are
   * used in constraints.
   */
  declare(
    name: string,
    {
      supertypes = [],
      final = false,
      isInterface = false,
    }: Partial<TypeDeclaration> = {},
  ): this {
    this.types.set(name, { supertypes, final, isInterface });
    this.supertypeCache.clear();
    return this;
  }

  isFinal(name: string): boolean {
    return this.types.get(name)?.final ?? false;
  }

  isInterface(name: string): boolean {
    return this.types.get(name)?.isInterface ?? false;
  }

  /**
   * Returns every supertype of `name`, including itself and the root.
   */
  allSupertypes(name: string): ReadonlySet<string> {
    const cached = this.supertypeCache.get(name);
    if (cached !== undefined) return cached;
    const result = new Set<string>([name, this.root]);
    const queue = [name];
    while (queue.length > 0) {
      const current = queue.pop();
      if (current === undefined) break;
      for (const sup of this.types.get(current)?.supertypes ?? []) {
        if (!result.has(sup)) {
          result.add(sup);
          queue.push(sup);
        }
      }
    }
    this.supertypeCache.set(name, result);
    return result;
  }

  isSubtype(sub: string, sup: string): boolean {
    return this.allSupertypes(sub).has(sup);
  }

  instanceOf(typeName: string): TypeConstraint {
    return NominalConstraint.make(this, undefined, [typeName]);
  }

  exact(typeName: string): TypeConstraint {
    return NominalConstraint.make(this, typeName, []);
  }
}

/**
 * A satisfiable, non-trivial constraint of a {@link NominalTypeSystem}:
 * either an exact class or a set of `instanceof` bounds with no redundant
 * supertypes.
 */
class NominalConstraint implements TypeConstraint {
  private constructor(
    private readonly system: NominalTypeSystem,
    private readonly exactType: string | undefined,
    private readonly bounds: readonly string[],
  ) {}

  /**
   * Normalizes the requested constraint, returning the universal top or
   * bottom constraints when it degenerates to one of them.
   */
  static make(
    system: NominalTypeSystem,
    exactType: string | undefined,
    bounds: Iterable<string>,
  ): TypeConstraint {
    if (exactType !== undefined) {
      for (const bound of bounds) {
        if (!system.isSubtype(exactType, bound)) return TypeConstraints.BOTTOM;
      }
      return new NominalConstraint(system, exactType, []);
    }
    const reduced = upwardsAntichain(
      [...new Set(bounds)].filter((b) => b !== system.root),
      (a, b) => system.isSubtype(b, a),
    );
    if (reduced.length === 0) return TypeConstraints.TOP;
    const classes = reduced.filter((b) => !system.isInterface(b));
    if (classes.length > 1) return TypeConstraints.BOTTOM;
    const finalClass = classes.find((c) => system.isFinal(c));
    if (finalClass !== undefined) {
      return reduced.length === 1
        ? new NominalConstraint(system, finalClass, [])
        : TypeConstraints.BOTTOM;
    }
    return new NominalConstraint(system, undefined, reduced.sort());
  }

  isTop(): boolean {
    return false;
  }

  isBottom(): boolean {
    return false;
  }

  /**
   * Every type an object satisfying this constraint is known to extend.
   */
  private implied(): Set<string> {
    if (this.exactType !== undefined) {
      return new Set(this.system.allSupertypes(this.exactType));
    }
    const result = new Set<string>();
    for (const bound of this.bounds) {
      this.system.allSupertypes(bound).forEach((t) => result.add(t));
    }
    return result;
  }

  private sameSystem(other: TypeConstraint): other is NominalConstraint {
    return other instanceof NominalConstraint && other.system === this.system;
  }

  isSuperConstraintOf(other: TypeConstraint): boolean {
    if (other.isBottom()) return true;
    if (!this.sameSystem(other)) return false;
    if (this.exactType !== undefined) {
      return other.exactType === this.exactType;
    }
    const implied = other.implied();
    return this.bounds.every((b) => implied.has(b));
  }

  join(other: TypeConstraint): TypeConstraint {
    if (other.isBottom()) return this;
    if (!this.sameSystem(other)) return TypeConstraints.TOP;
    if (this.exactType !== undefined && this.exactType === other.exactType) {
      return this;
    }
    const otherImplied = other.implied();
    const common = [...this.implied()].filter((t) => otherImplied.has(t));
    return NominalConstraint.make(this.system, undefined, common);
  }

  meet(other: TypeConstraint): TypeConstraint {
    if (other.isTop()) return this;
    if (!this.sameSystem(other)) return TypeConstraints.BOTTOM;
    if (this.exactType !== undefined && other.exactType !== undefined) {
      return this.exactType === other.exactType ? this : TypeConstraints.BOTTOM;
    }
    const exactType = this.exactType ?? other.exactType;
    return NominalConstraint.make(this.system, exactType, [
      ...this.bounds,
      ...other.bounds,
    ]);
  }

  key(): string {
    return this.exactType !== undefined
      ? `exact ${this.exactType}`
      : `instanceof ${this.bounds.join("&")}`;
  }

  toString(): string {
    return this.exactType !== undefined
      ? `exact ${this.exactType}`
      : `instanceof ${this.bounds.join(", ")}`;
  }
}
