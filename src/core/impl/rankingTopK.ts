import type { TopKSelector } from "../topK.js";
import type { Comparator } from "../types.js";
import { LinkedRanking } from "./linkedRanking.js";

/**
 * Streams items through a bounded ranking of size K.
 *
 * Items that rank equal keep the order they were seen in, so the selection is stable.
 */
export class RankingTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (!(k >= 1)) return [];

    const ranking = new LinkedRanking<T>(Math.min(Math.floor(k), Number.MAX_SAFE_INTEGER), {
      compare: comparator,
      sameValue: "insertAfterEqual",
    });

    for (const item of items) {
      // full and not better than the current bottom: skip the O(k) scan
      if (ranking.size() === ranking.capacity && comparator(item, ranking.bottom()) >= 0) continue;
      ranking.insert(item);
    }
    return ranking.toArray();
  }
}
