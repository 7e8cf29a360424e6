import type { DisposalPolicy, OwnedResource } from "./types.js";

/** Leaves cleanup to the caller; the default for plain values. */
export function noopDisposal(_element: unknown): void {}

/** Releases elements that own a resource. */
export function releaseOwned(element: OwnedResource): void {
  element.release();
}

/**
 * Runs several policies in order, e.g. releasing a handle and then dropping it
 * from a side index.
 */
export function composeDisposal<T>(...policies: DisposalPolicy<T>[]): DisposalPolicy<T> {
  return (element) => {
    for (const policy of policies) policy(element);
  };
}
