/** Shared core types used by module contracts. */

/**
 * Ordering over elements with Array.sort semantics: <0 means a ranks before b,
 * 0 means the two rank equal.
 */
export type Comparator<T> = (a: T, b: T) => number;

/** Value equality used by the by-value removal operations. */
export type Equality<T> = (a: T, b: T) => boolean;

/** Where a new element goes relative to the run of elements that rank equal to it. */
export type SameValueBehavior = "insertBeforeEqual" | "insertAfterEqual";

export const SAME_VALUE_BEHAVIORS: readonly SameValueBehavior[] = ["insertBeforeEqual", "insertAfterEqual"];

/** Runs once on every element that leaves a ranking. */
export type DisposalPolicy<T> = (element: T) => void;

/** An element that owns something which must be released when it leaves a ranking. */
export interface OwnedResource {
  release(): void;
}

/** `console`-compatible debug sink. */
export interface RankingLogger {
  debug(message: string, ...args: unknown[]): void;
}
