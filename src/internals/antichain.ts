/**
 * Reduces a finite poset to its maximal (upwards) antichain.
 *
 * `predicate(a, b)` is a non-strict partial order meaning "`a` is subsumed by
 * `b`". Each item subsumed by some other item of the collection is removed,
 * so the result keeps only the items nothing else subsumes. Of two items
 * that subsume each other, the one seen first is dropped.
 *
 * The collection is reduced in place and returned. `signal` is checked before
 * every comparison; aborting throws the signal's reason and leaves the
 * collection partially reduced.
 *
 * @param poset Items to reduce. Arrays compare items by position, sets by identity.
 * @param predicate Non-strict partial order over the items.
 * @param signal Optional cancellation signal.
 */
export function upwardsAntichain<T>(
  poset: T[],
  predicate: (a: T, b: T) => boolean,
  signal?: AbortSignal,
): T[];
export function upwardsAntichain<T>(
  poset: Set<T>,
  predicate: (a: T, b: T) => boolean,
  signal?: AbortSignal,
): Set<T>;
export function upwardsAntichain<T>(
  poset: T[] | Set<T>,
  predicate: (a: T, b: T) => boolean,
  signal?: AbortSignal,
): T[] | Set<T> {
  if (poset instanceof Set) {
    reduceSet(poset, predicate, signal);
  } else {
    reduceArray(poset, predicate, signal);
  }
  return poset;
}

function reduceArray<T>(
  items: T[],
  predicate: (a: T, b: T) => boolean,
  signal: AbortSignal | undefined,
): void {
  let i = 0;
  while (i < items.length) {
    const left = items[i];
    let subsumed = false;
    for (let j = 0; j < items.length; j++) {
      signal?.throwIfAborted();
      if (j !== i && predicate(left, items[j])) {
        subsumed = true;
        break;
      }
    }
    if (subsumed) {
      items.splice(i, 1);
    } else {
      i++;
    }
  }
}

function reduceSet<T>(
  items: Set<T>,
  predicate: (a: T, b: T) => boolean,
  signal: AbortSignal | undefined,
): void {
  for (const left of [...items]) {
    for (const right of items) {
      signal?.throwIfAborted();
      if (right !== left && predicate(left, right)) {
        items.delete(left);
        break;
      }
    }
  }
}
