import type { CapabilityCategory, ProjectSignature } from '../types.js';
import { clamp, round6 } from '../utils.js';
import type { ScoredCapability } from './scoring.js';

export type SquadRole =
  | 'lead'
  | 'builder'
  | 'operator'
  | 'reviewer'
  | 'sentinel'
  | 'analyst'
  | 'strategist'
  | 'advisor'
  | 'coordinator'
  | 'support';

const CATEGORY_ROLES: Record<CapabilityCategory, SquadRole> = {
  development: 'builder',
  infrastructure: 'operator',
  quality: 'reviewer',
  security: 'sentinel',
  data: 'analyst',
  product: 'strategist',
  business: 'advisor',
  coordination: 'coordinator',
  uncategorized: 'support',
};

export interface SquadMember extends ScoredCapability {
  role: SquadRole;
}

export interface SquadFormation {
  members: SquadMember[];
  targetSize: number;
  undersized: boolean;
  aggregateScore: number;
  /** Percentage; display only. */
  synergyBonus: number;
  adjustedScore: number;
  synergies: Array<[string, string]>;
}

export interface SquadOptions {
  minSize?: number;
  maxSize?: number;
  maxPerCategory?: number;
  synergyPairs?: Array<[string, string]>;
  synergyBonusPercent?: number;
  maxSynergyPercent?: number;
}

/**
 * Pick a bounded, category-diverse subset of an already ranked list.
 *
 * At most `maxPerCategory` members share a category, unless the candidates
 * span fewer than `minSize` categories. With the cap on there are at least
 * `minSize` categories to draw from, so it never leaves the squad short.
 */
export function formSquad(
  ranked: readonly ScoredCapability[],
  signature: ProjectSignature,
  opts: SquadOptions = {},
): SquadFormation {
  const minSize = opts.minSize ?? 3;
  const maxSize = Math.max(minSize, opts.maxSize ?? 6);
  const maxPerCategory = opts.maxPerCategory ?? 2;
  const targetSize = clamp(signature.complexity + 2, minSize, maxSize);

  const distinctCategories = new Set(ranked.map((r) => r.descriptor.category)).size;
  const capCategories = distinctCategories >= minSize;

  const picked: ScoredCapability[] = [];
  const perCategory = new Map<CapabilityCategory, number>();

  for (const candidate of ranked) {
    if (picked.length >= targetSize) break;
    const count = perCategory.get(candidate.descriptor.category) ?? 0;
    if (capCategories && count >= maxPerCategory) continue;
    picked.push(candidate);
    perCategory.set(candidate.descriptor.category, count + 1);
  }

  const members: SquadMember[] = picked.map((p, i) => ({
    ...p,
    role: i === 0 ? 'lead' : CATEGORY_ROLES[p.descriptor.category],
  }));

  const names = new Set(members.map((m) => m.descriptor.name));
  const synergies = (opts.synergyPairs ?? []).filter(([a, b]) => names.has(a) && names.has(b));
  const synergyBonus = Math.min(
    synergies.length * (opts.synergyBonusPercent ?? 10),
    opts.maxSynergyPercent ?? 30,
  );
  const aggregateScore = round6(members.reduce((sum, m) => sum + m.score, 0));

  return {
    members,
    targetSize,
    undersized: members.length < minSize,
    aggregateScore,
    synergyBonus,
    adjustedScore: round6(aggregateScore * (1 + synergyBonus / 100)),
    synergies,
  };
}
