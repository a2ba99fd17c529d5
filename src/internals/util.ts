/**
 * Additional generic TypeScript functions used in the project.
 *
 * @packageDocumentation
 */

import { InternalException } from "./exceptions";

export const isListSubsetOf = <T>(
  lhs: readonly T[],
  rhs: readonly T[],
  eq: (a: T, b: T) => boolean = (a, b) => a === b,
): boolean => lhs.every((elem) => rhs.some((rElem) => eq(elem, rElem)));

/**
 * Unreachable case for exhaustive checking.
 */
export function unreachable(value: never): never {
  throw InternalException.make(`Reached impossible case`, { node: value });
}

/**
 * 32-bit string hash (djb2 variant).
 */
export function hashString(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) | 0;
  }
  return hash;
}
