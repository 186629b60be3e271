export * from './types.js';
export * from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export { JsonStore } from './storage.js';
export type { StoreFile } from './storage.js';
export { clamp, resolveRoot, round6, systemClock, toIso } from './utils.js';
export type { Clock } from './utils.js';
export {
  defaultConfig,
  loadConfig,
  writeConfig,
  SquadkitConfigSchema,
  DEFAULT_LEVEL_THRESHOLDS,
  DEFAULT_TIERS,
  DEFAULT_SYNERGY_PAIRS,
} from './config.js';
export type { ScoringWeights, SquadConfig, SquadkitConfig, SquadkitConfigInput } from './config.js';
export * from './registry/index.js';
export * from './recommend/index.js';
export * from './progression/index.js';
export { SquadKit } from './squadkit.js';
export type {
  AchievementRun,
  LeaderboardEntry,
  NotificationListener,
  Recommendation,
  RecommendOptions,
  RecordResult,
  SquadKitOptions,
  SquadKitReport,
} from './squadkit.js';
