export { KeywordClassifier, defaultClassifier, TECH_PATTERNS, PROJECT_TYPE_PATTERNS } from './classifier.js';
export type { CapabilityClassifier } from './classifier.js';
export { inferSignature } from './signature.js';
export {
  score,
  rankCapabilities,
  compareScored,
  techOverlap,
  CATEGORY_AFFINITY,
  DEFAULT_WEIGHTS,
  NEUTRAL_SUCCESS_RATE,
} from './scoring.js';
export type { ScoredCapability, CapabilityHistory, HistoryLookup } from './scoring.js';
export { formSquad } from './squad.js';
export type { SquadFormation, SquadMember, SquadOptions, SquadRole } from './squad.js';
export { findSimilar } from './similar.js';
export type { SimilarCapability } from './similar.js';
