export { cleanTeamName, normalizeTeamName, stripTrailingParenthetical } from "./team-name-utils.js";
export {
  FuzzyScorer,
  MATCH_STRATEGIES,
  SubstringScorer,
  createScorer,
  isMatchStrategy,
  lengthWeightedRelevance,
  toRelevance,
  type MatchStrategy,
  type SimilarityScorer,
} from "./similarity.js";
export { DEFAULT_THRESHOLD, aliasesFor, clampThreshold, resolveTeam, type Resolution } from "./name-resolver.js";
export {
  buildStandingsTable,
  canonicalNames,
  compareStandingsRows,
  pointsByTeam,
  type RawStandingsRow,
} from "./standings-table.js";
export {
  aggregate,
  compareAssignments,
  correctionNote,
  describeTeam,
  rankPositions,
  toParticipants,
  type ParticipantInput,
} from "./aggregator.js";
