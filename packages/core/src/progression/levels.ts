/**
 * Leveling: a step function from cumulative XP to a level and a named tier.
 *
 * Level n is reached at thresholds[n - 1]; hitting a threshold exactly counts
 * as reaching it. Boundaries live in config, not here.
 */

import { DEFAULT_LEVEL_THRESHOLDS, DEFAULT_TIERS } from '../config.js';

export interface Tier {
  name: string;
  minLevel: number;
}

export interface LevelTable {
  readonly thresholds: readonly number[];
  readonly tiers: readonly Tier[];
}

export interface LevelProgress {
  level: number;
  tier: string;
  currentThreshold: number;
  nextThreshold: number | null;
  xpToNext: number;
  progressPercent: number;
}

export function createLevelTable(
  thresholds: readonly number[] = DEFAULT_LEVEL_THRESHOLDS,
  tiers: readonly Tier[] = DEFAULT_TIERS,
): LevelTable {
  if (thresholds.length === 0 || thresholds[0] !== 0) {
    throw new Error('Level thresholds must start at 0');
  }
  for (let i = 1; i < thresholds.length; i++) {
    if (thresholds[i] <= thresholds[i - 1]) {
      throw new Error(`Level thresholds must strictly increase (index ${i}: ${thresholds[i]} <= ${thresholds[i - 1]})`);
    }
  }
  if (tiers.length === 0 || tiers[0].minLevel !== 1) {
    throw new Error('Tiers must start at level 1');
  }
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i].minLevel <= tiers[i - 1].minLevel) {
      throw new Error(`Tier "${tiers[i].name}" must start above tier "${tiers[i - 1].name}"`);
    }
  }
  return { thresholds: [...thresholds], tiers: [...tiers] };
}

export const DEFAULT_LEVEL_TABLE = createLevelTable();

export function levelFor(totalXP: number, table: LevelTable = DEFAULT_LEVEL_TABLE): number {
  let level = 0;
  for (const threshold of table.thresholds) {
    if (totalXP < threshold) break;
    level++;
  }
  return Math.max(1, level);
}

export function tierFor(level: number, table: LevelTable = DEFAULT_LEVEL_TABLE): string {
  let name = table.tiers[0].name;
  for (const tier of table.tiers) {
    if (level < tier.minLevel) break;
    name = tier.name;
  }
  return name;
}

export function levelProgress(totalXP: number, table: LevelTable = DEFAULT_LEVEL_TABLE): LevelProgress {
  const level = levelFor(totalXP, table);
  const currentThreshold = table.thresholds[level - 1];
  const nextThreshold = level < table.thresholds.length ? table.thresholds[level] : null;

  if (nextThreshold === null) {
    return { level, tier: tierFor(level, table), currentThreshold, nextThreshold, xpToNext: 0, progressPercent: 100 };
  }

  const span = nextThreshold - currentThreshold;
  return {
    level,
    tier: tierFor(level, table),
    currentThreshold,
    nextThreshold,
    xpToNext: nextThreshold - totalXP,
    progressPercent: Math.round(((totalXP - currentThreshold) / span) * 1000) / 10,
  };
}
