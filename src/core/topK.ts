import type { Comparator } from "./types.js";

export interface TopKSelector<T> {
  /**
   * Returns top K items by comparator, best first.
   * Comparator should behave like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
