import type { AgentProgress, ProgressSummary, XPEvent } from '../types.js';
import type { LevelTable } from './levels.js';
import { DEFAULT_LEVEL_TABLE, levelFor, tierFor } from './levels.js';

export function byEventId(a: XPEvent, b: XPEvent): number {
  return a.eventId - b.eventId;
}

export function emptyProgress(capabilityName: string, table: LevelTable = DEFAULT_LEVEL_TABLE): AgentProgress {
  return foldProgress(capabilityName, [], table);
}

/**
 * Fold one capability's events, in eventId order, into its progress.
 *
 * XP counts every event; the usage counters and streaks ignore achievement
 * bonus events. Pure: replaying the same events gives an equal result.
 */
export function foldProgress(
  capabilityName: string,
  events: readonly XPEvent[],
  table: LevelTable = DEFAULT_LEVEL_TABLE,
): AgentProgress {
  const own = events.filter((e) => e.capabilityName === capabilityName).sort(byEventId);

  let totalXP = 0;
  let eventCount = 0;
  let successCount = 0;
  let currentStreak = 0;
  let bestStreak = 0;
  const achievements = new Set<string>();

  for (const e of own) {
    totalXP += e.baseXP + e.bonusXP;
    if (e.kind === 'achievement') {
      if (e.achievementKey) achievements.add(e.achievementKey);
      continue;
    }
    eventCount++;
    if (e.outcome === 'success') {
      successCount++;
      currentStreak++;
      bestStreak = Math.max(bestStreak, currentStreak);
    } else {
      currentStreak = 0;
    }
  }

  const level = levelFor(totalXP, table);
  return {
    capabilityName,
    totalXP,
    level,
    tier: tierFor(level, table),
    eventCount,
    successCount,
    failureCount: eventCount - successCount,
    successRate: eventCount === 0 ? 0 : successCount / eventCount,
    currentStreak,
    bestStreak,
    unlockedAchievements: [...achievements].sort(),
    firstEventId: own[0]?.eventId ?? null,
    firstEventAt: own[0]?.timestamp ?? null,
    lastEventAt: own[own.length - 1]?.timestamp ?? null,
  };
}

/** Cached per-name fields persisted next to the events; always derivable from them. */
export function summarize(events: readonly XPEvent[], table: LevelTable = DEFAULT_LEVEL_TABLE): Record<string, ProgressSummary> {
  const summaries = new Map<string, ProgressSummary>();
  for (const e of [...events].sort(byEventId)) {
    const prev = summaries.get(e.capabilityName) ?? { totalXP: 0, level: 1, storedEvents: 0, lastEventId: e.eventId };
    const totalXP = prev.totalXP + e.baseXP + e.bonusXP;
    summaries.set(e.capabilityName, {
      totalXP,
      level: levelFor(totalXP, table),
      storedEvents: prev.storedEvents + 1,
      lastEventId: e.eventId,
    });
  }
  return Object.fromEntries(summaries);
}

/** Own entry only: names such as "constructor" must not resolve to Object.prototype members. */
export function summaryFor(summaries: Record<string, ProgressSummary>, name: string): ProgressSummary | undefined {
  return Object.hasOwn(summaries, name) ? summaries[name] : undefined;
}
