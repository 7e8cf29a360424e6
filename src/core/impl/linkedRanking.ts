import type { Ranking, RankingOptions } from "../ranking.js";
import type { Comparator, DisposalPolicy, Equality, RankingLogger, SameValueBehavior } from "../types.js";
import { resolveRankingOptions } from "../options.js";
import { RankingError } from "../problem.js";

type Node<T> = {
  value: T;
  prev: Node<T> | undefined;
  next: Node<T> | undefined;
};

/**
 * Ranking backed by a doubly linked list.
 *
 * Insertion scans for the equal range of the new element (O(n)) and links it in at the
 * boundary picked by the same-value behavior; eviction always unlinks the tail (O(1)).
 */
export class LinkedRanking<T> implements Ranking<T> {
  readonly capacity: number;

  private readonly compare: Comparator<T>;
  private readonly sameValue: SameValueBehavior;
  private readonly disposal: DisposalPolicy<T>;
  private readonly equals: Equality<T>;
  private readonly logger?: RankingLogger;

  private head: Node<T> | undefined;
  private tail: Node<T> | undefined;
  private length = 0;
  /** bumped on every mutation; live iterators compare against it */
  private version = 0;
  private disposed = false;

  constructor(capacity: number, options?: RankingOptions<T>) {
    const resolved = resolveRankingOptions(capacity, options);
    this.capacity = resolved.capacity;
    this.compare = resolved.compare;
    this.sameValue = resolved.sameValue;
    this.disposal = resolved.dispose;
    this.equals = resolved.equals;
    this.logger = resolved.logger;
  }

  insert(element: T): boolean {
    this.assertLive();
    const wasFull = this.length >= this.capacity;
    const node: Node<T> = { value: element, prev: undefined, next: undefined };
    this.linkBefore(node, this.findBoundary(element));

    if (!wasFull) return true;

    // overflow by exactly one: the bottom goes, which may be the new node
    const evicted = this.tail;
    if (!evicted) return false;
    this.unlink(evicted);
    try {
      this.release(evicted.value);
    } finally {
      this.logger?.debug("ranking: evicted bottom element", evicted.value);
    }
    return evicted !== node;
  }

  removeFirst(value: T): boolean {
    return this.removeWhere((v) => this.equals(v, value), false) > 0;
  }

  removeAll(value: T): number {
    return this.removeWhere((v) => this.equals(v, value), true);
  }

  removeFirstByIdentity(handle: T): boolean {
    return this.removeWhere((v) => Object.is(v, handle), false) > 0;
  }

  removeAllByIdentity(handle: T): number {
    return this.removeWhere((v) => Object.is(v, handle), true);
  }

  clear(): void {
    this.assertLive();
    this.drain();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.drain();
  }

  empty(): boolean {
    return this.length === 0;
  }

  size(): number {
    return this.length;
  }

  top(): T {
    if (!this.head) throw new RankingError({ code: "EMPTY_RANKING", detail: "top() called on an empty ranking" });
    return this.head.value;
  }

  bottom(): T {
    if (!this.tail) throw new RankingError({ code: "EMPTY_RANKING", detail: "bottom() called on an empty ranking" });
    return this.tail.value;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  values(): IterableIterator<T> {
    return this.walk(this.head, this.version);
  }

  toArray(): T[] {
    const out: T[] = [];
    for (let cur = this.head; cur; cur = cur.next) out.push(cur.value);
    return out;
  }

  /**
   * First node past the insertion point: the lower bound of the equal range for
   * insertBeforeEqual, its upper bound for insertAfterEqual. undefined means the tail.
   */
  private findBoundary(element: T): Node<T> | undefined {
    let cur = this.head;
    if (this.sameValue === "insertBeforeEqual") {
      while (cur && this.compare(cur.value, element) < 0) cur = cur.next;
    } else {
      while (cur && this.compare(element, cur.value) >= 0) cur = cur.next;
    }
    return cur;
  }

  private linkBefore(node: Node<T>, at: Node<T> | undefined): void {
    if (!at) {
      node.prev = this.tail;
      if (this.tail) this.tail.next = node;
      else this.head = node;
      this.tail = node;
    } else {
      node.next = at;
      node.prev = at.prev;
      if (at.prev) at.prev.next = node;
      else this.head = node;
      at.prev = node;
    }
    this.length++;
    this.version++;
  }

  private unlink(node: Node<T>): void {
    if (node.prev) node.prev.next = node.next;
    else this.head = node.next;
    if (node.next) node.next.prev = node.prev;
    else this.tail = node.prev;
    node.prev = undefined;
    node.next = undefined;
    this.length--;
    this.version++;
  }

  private removeWhere(match: (value: T) => boolean, all: boolean): number {
    this.assertLive();
    // match everything before touching the list so a throwing predicate leaves it intact
    const matched: Node<T>[] = [];
    for (let cur = this.head; cur; cur = cur.next) {
      if (!match(cur.value)) continue;
      matched.push(cur);
      if (!all) break;
    }
    if (!matched.length) return 0;

    for (const node of matched) this.unlink(node);
    try {
      this.releaseAll(matched.map((node) => node.value));
    } finally {
      this.logger?.debug(`ranking: removed ${matched.length} element(s)`);
    }
    return matched.length;
  }

  private drain(): void {
    const values = this.toArray();
    if (!values.length) return;
    this.version++;
    this.head = undefined;
    this.tail = undefined;
    this.length = 0;
    try {
      this.releaseAll(values);
    } finally {
      this.logger?.debug(`ranking: cleared ${values.length} element(s)`);
    }
  }

  /** Yields from `start` while the ranking is still at `version`. */
  private *walk(start: Node<T> | undefined, version: number): Generator<T, void, undefined> {
    let cur = start;
    while (true) {
      if (this.version !== version) {
        throw new RankingError({ code: "CONCURRENT_MODIFICATION", detail: "ranking was modified during iteration" });
      }
      if (!cur) return;
      const value = cur.value;
      cur = cur.next;
      yield value;
    }
  }

  private release(value: T): void {
    try {
      this.disposal(value);
    } catch (err) {
      throw new RankingError({ code: "DISPOSAL_FAILED", detail: "disposal policy threw" }, { cause: err });
    }
  }

  /** Disposes every value even when some disposals throw, then reports them together. */
  private releaseAll(values: T[]): void {
    const failures: unknown[] = [];
    for (const value of values) {
      try {
        this.disposal(value);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length === 1) {
      throw new RankingError({ code: "DISPOSAL_FAILED", detail: "disposal policy threw" }, { cause: failures[0] });
    }
    if (failures.length > 1) {
      throw new RankingError(
        { code: "DISPOSAL_FAILED", detail: `disposal policy threw for ${failures.length} elements` },
        { cause: new AggregateError(failures, "disposal failures") },
      );
    }
  }

  private assertLive(): void {
    if (this.disposed) throw new RankingError({ code: "RANKING_DISPOSED", detail: "ranking has been disposed" });
  }
}
