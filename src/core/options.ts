import { RankingError, type FieldError } from "./problem.js";
import type { RankingOptions } from "./ranking.js";
import { SAME_VALUE_BEHAVIORS, type Comparator, type DisposalPolicy, type Equality, type RankingLogger, type SameValueBehavior } from "./types.js";
import { noopDisposal } from "./disposal.js";
import { asInt, asString, isFunction, isRecord, pushErr } from "./validation.js";

export interface ResolvedRankingOptions<T> {
  capacity: number;
  compare: Comparator<T>;
  sameValue: SameValueBehavior;
  dispose: DisposalPolicy<T>;
  equals: Equality<T>;
  logger?: RankingLogger;
}

/**
 * Ascending order for numbers, bigints, strings and dates.
 * Throws for operands that have no natural order between them.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof Date && b instanceof Date && !Number.isNaN(a.getTime()) && !Number.isNaN(b.getTime())) {
    return a.getTime() - b.getTime();
  }
  throw new RankingError({
    code: "INVALID_ARGUMENT",
    detail: `no natural order between ${describe(a)} and ${describe(b)}; pass options.compare`,
  });
}

export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

function describe(v: unknown): string {
  if (v === null) return "null";
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? "invalid Date" : "Date";
  return typeof v;
}

function isSameValueBehavior(v: string): v is SameValueBehavior {
  return SAME_VALUE_BEHAVIORS.some((b) => b === v);
}

export function resolveRankingOptions<T>(capacity: number, options: RankingOptions<T> = {}): ResolvedRankingOptions<T> {
  const errors: FieldError[] = [];

  const cap = asInt(capacity);
  if (cap === undefined) pushErr(errors, "$.capacity", "must be a safe integer");
  else if (cap < 0) pushErr(errors, "$.capacity", "must be >= 0");

  const raw: unknown = options;
  if (!isRecord(raw)) {
    pushErr(errors, "$.options", "must be an object");
    throw new RankingError({ code: "INVALID_ARGUMENT", detail: "invalid ranking options", errors });
  }

  let sameValue: SameValueBehavior = "insertAfterEqual";
  if (options.sameValue !== undefined) {
    const raw = asString(options.sameValue);
    if (raw !== undefined && isSameValueBehavior(raw)) sameValue = raw;
    else pushErr(errors, "$.options.sameValue", `must be one of: ${SAME_VALUE_BEHAVIORS.join(", ")}`);
  }

  if (options.compare !== undefined && !isFunction(options.compare)) pushErr(errors, "$.options.compare", "must be a function");
  if (options.dispose !== undefined && !isFunction(options.dispose)) pushErr(errors, "$.options.dispose", "must be a function");
  if (options.equals !== undefined && !isFunction(options.equals)) pushErr(errors, "$.options.equals", "must be a function");
  if (options.logger !== undefined && !(isRecord(options.logger) && isFunction(options.logger.debug))) {
    pushErr(errors, "$.options.logger", "must have a debug method");
  }

  if (errors.length || cap === undefined) {
    throw new RankingError({ code: "INVALID_ARGUMENT", detail: "invalid ranking options", errors });
  }

  return {
    capacity: cap,
    compare: options.compare ?? naturalOrder,
    sameValue,
    dispose: options.dispose ?? noopDisposal,
    equals: options.equals ?? sameValueZero,
    logger: options.logger,
  };
}
