import { Semilattice } from "./common";

/**
 * A lattice that bounds the number of ascending steps a fixpoint solver can
 * take over infinite-height domains, such as integral ranges.
 */
export interface WideningLattice<T> extends Semilattice<T> {
  /**
   * Applies the widening operation to accelerate convergence.
   * @param oldState The previous state.
   * @param newState The newly computed state.
   * @returns The widened state, greater than or equal to both arguments.
   */
  widen(oldState: T, newState: T): T;
}
