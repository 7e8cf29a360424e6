import type { Comparator, DisposalPolicy, Equality, RankingLogger, SameValueBehavior } from "./types.js";

export interface RankingOptions<T> {
  /** Defaults to `naturalOrder` (ascending numbers, bigints, strings and dates). */
  compare?: Comparator<T>;
  /** Defaults to `insertAfterEqual`, which keeps insertion order among equals. */
  sameValue?: SameValueBehavior;
  /** Runs on every element that leaves the ranking. Defaults to a no-op. */
  dispose?: DisposalPolicy<T>;
  /** Value equality for `removeFirst` / `removeAll`. Defaults to SameValueZero. */
  equals?: Equality<T>;
  logger?: RankingLogger;
}

/**
 * Bounded ordered collection keeping the best `capacity` elements.
 *
 * Contract notes:
 * - elements are kept sorted by the comparator, `top()` first and `bottom()` last
 * - `size() <= capacity` after every operation; an overflowing insert evicts the bottom
 * - every element that leaves (eviction, removal, clear) is detached first, then disposed once
 * - iterators are invalidated by any mutation
 */
export interface Ranking<T> extends Iterable<T> {
  readonly capacity: number;

  /** Returns false when the inserted element was itself evicted. */
  insert(element: T): boolean;

  removeFirst(value: T): boolean;
  /** Returns how many elements were removed. */
  removeAll(value: T): number;
  removeFirstByIdentity(handle: T): boolean;
  removeAllByIdentity(handle: T): number;

  clear(): void;
  /** Clears and retires the ranking; later mutations throw. */
  dispose(): void;

  empty(): boolean;
  size(): number;
  top(): T;
  bottom(): T;

  values(): IterableIterator<T>;
  toArray(): T[];
}
