export { createLevelTable, levelFor, tierFor, levelProgress, DEFAULT_LEVEL_TABLE } from './levels.js';
export type { LevelTable, LevelProgress, Tier } from './levels.js';
export { foldProgress, emptyProgress, summarize, summaryFor, byEventId } from './progress.js';
export { JsonLedgerStore } from './ledger.js';
export type { LedgerStore, LedgerVerification, RebuildReport, JsonLedgerOptions } from './ledger.js';
export { AchievementEngine, DEFAULT_ACHIEVEMENTS } from './achievements.js';
export type { Achievement, AchievementEvaluation } from './achievements.js';
export {
  calculateXP,
  qualityMultiplier,
  speedMultiplier,
  streakMultiplier,
  TaskComplexity,
  COMPLEXITY_MULTIPLIERS,
  EXPECTED_DURATIONS,
  XPCalculationInputSchema,
} from './xp-calculator.js';
export type { XPCalculation, XPCalculationInput, XPBreakdown } from './xp-calculator.js';
