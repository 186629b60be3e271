/**
 * Capability scoring against a project signature.
 *
 * score = techOverlap * W_TECH + categoryAffinity * W_CATEGORY + successRate * W_HISTORY
 *
 * Tech-stack overlap dominates; history only separates otherwise similar
 * candidates. Ties go to the higher level, then to the name.
 */

import type { ScoringWeights } from '../config.js';
import type { CapabilityCategory, CapabilityDescriptor, ProjectSignature, ProjectType } from '../types.js';
import { round6 } from '../utils.js';

export const DEFAULT_WEIGHTS: ScoringWeights = { tech: 0.6, category: 0.3, history: 0.1 };

/** Success rate used for capabilities that have never been recorded. */
export const NEUTRAL_SUCCESS_RATE = 0.5;

export const CATEGORY_AFFINITY: Record<ProjectType, Record<CapabilityCategory, number>> = {
  'web-app': {
    development: 1,
    quality: 0.6,
    product: 0.5,
    infrastructure: 0.4,
    security: 0.4,
    coordination: 0.3,
    data: 0.2,
    business: 0.2,
    uncategorized: 0,
  },
  'api-service': {
    development: 1,
    security: 0.7,
    quality: 0.6,
    infrastructure: 0.5,
    data: 0.3,
    product: 0.3,
    coordination: 0.3,
    business: 0.1,
    uncategorized: 0,
  },
  'data-pipeline': {
    data: 1,
    infrastructure: 0.7,
    development: 0.6,
    quality: 0.5,
    security: 0.3,
    coordination: 0.3,
    product: 0.2,
    business: 0.2,
    uncategorized: 0,
  },
  generic: {
    development: 0.5,
    coordination: 0.5,
    quality: 0.3,
    infrastructure: 0.3,
    security: 0.3,
    data: 0.3,
    product: 0.3,
    business: 0.3,
    uncategorized: 0,
  },
};

export interface CapabilityHistory {
  successRate: number;
  level: number;
}

export type HistoryLookup = (name: string) => CapabilityHistory | undefined;

export interface ScoredCapability {
  descriptor: CapabilityDescriptor;
  score: number;
  level: number;
  breakdown: {
    techOverlap: number;
    categoryAffinity: number;
    successRate: number;
  };
}

export function techOverlap(tags: readonly string[], inferred: readonly string[]): number {
  if (inferred.length === 0) return 0;
  const own = new Set(tags);
  return inferred.filter((t) => own.has(t)).length / inferred.length;
}

export function score(
  capability: CapabilityDescriptor,
  signature: ProjectSignature,
  history: HistoryLookup = () => undefined,
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): ScoredCapability {
  const past = history(capability.name);
  const overlap = techOverlap(capability.techStackTags, signature.inferredTechStack);
  const affinity = CATEGORY_AFFINITY[signature.projectType][capability.category];
  const successRate = past?.successRate ?? NEUTRAL_SUCCESS_RATE;

  return {
    descriptor: capability,
    score: round6(overlap * weights.tech + affinity * weights.category + successRate * weights.history),
    level: past?.level ?? 1,
    breakdown: { techOverlap: overlap, categoryAffinity: affinity, successRate },
  };
}

export function compareScored(a: ScoredCapability, b: ScoredCapability): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.level !== b.level) return b.level - a.level;
  return a.descriptor.name.localeCompare(b.descriptor.name);
}

export function rankCapabilities(
  capabilities: readonly CapabilityDescriptor[],
  signature: ProjectSignature,
  history?: HistoryLookup,
  weights?: ScoringWeights,
): ScoredCapability[] {
  return capabilities.map((c) => score(c, signature, history, weights)).sort(compareScored);
}
