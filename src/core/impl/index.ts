export { LinkedRanking } from "./linkedRanking.js";
export { RankingTopKSelector } from "./rankingTopK.js";
