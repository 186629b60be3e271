import type { PredicateFailure } from '../errors.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type { AgentProgress, XPEvent } from '../types.js';

export interface Achievement {
  key: string;
  title: string;
  description: string;
  xpReward: number;
  /** `history` holds this capability's events in eventId order. */
  predicate: (progress: AgentProgress, history: readonly XPEvent[]) => boolean;
}

export interface AchievementEvaluation {
  unlocked: Achievement[];
  failures: PredicateFailure[];
}

const BUG_FIX_LABEL = /\b(?:fix(?:e[sd])?|bugs?|debug(?:ged|ging)?)\b/i;

export const DEFAULT_ACHIEVEMENTS: readonly Achievement[] = [
  {
    key: 'first-success',
    title: 'First Steps',
    description: 'Complete a first task successfully',
    xpReward: 50,
    predicate: (p) => p.successCount >= 1,
  },
  {
    key: 'seasoned',
    title: 'Seasoned',
    description: 'Take part in 10 tasks',
    xpReward: 100,
    predicate: (p) => p.eventCount >= 10,
  },
  {
    key: 'hot-streak',
    title: 'Hot Streak',
    description: 'Succeed 5 times in a row',
    xpReward: 150,
    predicate: (p) => p.currentStreak >= 5,
  },
  {
    key: 'bug-hunter',
    title: 'Bug Hunter',
    description: 'Resolve 5 bug or fix tasks',
    xpReward: 200,
    predicate: (_p, history) =>
      history.filter((e) => e.kind === 'usage' && e.outcome === 'success' && BUG_FIX_LABEL.test(e.taskLabel))
        .length >= 5,
  },
  {
    key: 'veteran',
    title: 'Veteran',
    description: 'Reach level 5',
    xpReward: 300,
    predicate: (p) => p.level >= 5,
  },
  {
    key: 'flawless',
    title: 'Flawless',
    description: 'Complete 20 tasks without a single failure',
    xpReward: 500,
    predicate: (p) => p.eventCount >= 20 && p.failureCount === 0,
  },
];

/**
 * Decides which achievements a capability has newly earned. Pure: nothing is
 * recorded here, the caller turns each unlock into a ledger event.
 */
export class AchievementEngine {
  private readonly achievements: readonly Achievement[];
  private readonly log: Logger;

  constructor(achievements: readonly Achievement[] = DEFAULT_ACHIEVEMENTS, logger?: Logger) {
    const keys = new Set<string>();
    for (const a of achievements) {
      if (keys.has(a.key)) throw new Error(`Duplicate achievement key "${a.key}"`);
      if (!Number.isInteger(a.xpReward) || a.xpReward < 0) {
        throw new Error(`Achievement "${a.key}" needs a non-negative integer xpReward`);
      }
      keys.add(a.key);
    }
    this.achievements = [...achievements];
    this.log = logger ?? createLogger('achievements');
  }

  get definitions(): readonly Achievement[] {
    return this.achievements;
  }

  get(key: string): Achievement | undefined {
    return this.achievements.find((a) => a.key === key);
  }

  evaluate(progress: AgentProgress, history: readonly XPEvent[]): AchievementEvaluation {
    const already = new Set(progress.unlockedAchievements);
    const unlocked: Achievement[] = [];
    const failures: PredicateFailure[] = [];

    for (const achievement of this.achievements) {
      if (already.has(achievement.key)) continue;
      let earned: boolean;
      try {
        earned = achievement.predicate(progress, history);
      } catch (err) {
        const failure: PredicateFailure = {
          achievementKey: achievement.key,
          capabilityName: progress.capabilityName,
          message: errorMessage(err),
        };
        this.log.warn(`Predicate "${achievement.key}" failed for ${progress.capabilityName}: ${failure.message}`);
        failures.push(failure);
        continue;
      }
      if (earned) unlocked.push(achievement);
    }

    return { unlocked, failures };
  }
}
