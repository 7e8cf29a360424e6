export type { Comparator, DisposalPolicy, Equality, OwnedResource, RankingLogger, SameValueBehavior } from "./types.js";
export { SAME_VALUE_BEHAVIORS } from "./types.js";
export type { Ranking, RankingOptions } from "./ranking.js";
export type { TopKSelector } from "./topK.js";
export { RankingError, problem, type FieldError, type Problem, type RankingErrorCode } from "./problem.js";
export { composeDisposal, noopDisposal, releaseOwned } from "./disposal.js";
export { naturalOrder, resolveRankingOptions, sameValueZero, type ResolvedRankingOptions } from "./options.js";
export * from "./impl/index.js";
