/**
 * Interface for a join semilattice that introduces the join operation.
 *
 * @template T The type of elements in the semilattice.
 */
export interface JoinSemilattice<T> extends Semilattice<T> {
  /**
   * Represents the bottom element of the lattice.
   * @returns The bottom element.
   */
  bottom(): T;

  /**
   * Joins two elements of the semilattice, returning an upper bound of the two
   * elements. It is the least one whenever the lattice can represent it.
   * @param a First element to join.
   * @param b Second element to join.
   * @returns The joined value.
   */
  join(a: T, b: T): T;

  /**
   * Determines if one element in the semilattice is less than or equal to another element.
   * @param a The element to compare.
   * @param b The element to compare against.
   * @returns `true` if `a` is less than or equal to `b`, otherwise `false`.
   */
  leq(a: T, b: T): boolean;
}

/**
 * Interface for a meet semilattice that introduces the meet operation.
 * @template T The type of elements in the semilattice.
 */
export interface MeetSemilattice<T> extends Semilattice<T> {
  /**
   * Represents the top element of the lattice.
   * @returns The top element.
   */
  top(): T;

  /**
   * Meets two elements of the semilattice, returning the greatest lower bound
   * (glb) of the two elements.
   * @param a First element to meet.
   * @param b Second element to meet.
   * @returns The met value.
   */
  meet(a: T, b: T): T;

  /**
   * Determines if one element in the semilattice is less than or equal to another element.
   * @param a The element to compare.
   * @param b The element to compare against.
   * @returns `true` if `a` is less than or equal to `b`, otherwise `false`.
   */
  leq(a: T, b: T): boolean;
}

/**
 * Common base of the lattice interfaces: a partial order over `T`.
 */
export interface Semilattice<T> {
  /**
   * Determines if one element in the semilattice is less than or equal to another element.
   * @param a The element to compare.
   * @param b The element to compare against.
   * @returns `true` if `a` is less than or equal to `b`, otherwise `false`.
   */
  leq(a: T, b: T): boolean;
}
