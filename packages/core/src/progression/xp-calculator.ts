/**
 * Caller-side XP policy. The ledger only stores and sums integers; everything
 * multiplicative about a task lives here.
 */

import { z } from 'zod';

export const TaskComplexity = z.enum(['simple', 'medium', 'complex', 'expert']);
export type TaskComplexity = z.infer<typeof TaskComplexity>;

export const COMPLEXITY_MULTIPLIERS: Record<TaskComplexity, number> = {
  simple: 1,
  medium: 1.5,
  complex: 2,
  expert: 3,
};

/** Seconds a task of each complexity is expected to take. */
export const EXPECTED_DURATIONS: Record<TaskComplexity, number> = {
  simple: 30,
  medium: 120,
  complex: 300,
  expert: 600,
};

export const XPCalculationInputSchema = z.object({
  baseXP: z.number().int().nonnegative().default(10),
  complexity: TaskComplexity.default('simple'),
  /** 0..1 rating of the result. */
  quality: z.number().min(0).max(1).optional(),
  durationSeconds: z.number().positive().optional(),
  /** Consecutive successes before this task. */
  streak: z.number().int().nonnegative().default(0),
  success: z.boolean().default(true),
});

export type XPCalculationInput = z.input<typeof XPCalculationInputSchema>;

export interface XPBreakdown {
  base: number;
  complexity: number;
  quality: number;
  speed: number;
  streak: number;
  outcome: number;
}

export interface XPCalculation {
  baseXP: number;
  multiplier: number;
  breakdown: XPBreakdown;
}

export function qualityMultiplier(quality: number | undefined): number {
  if (quality === undefined) return 1;
  if (quality >= 0.9) return 2;
  if (quality >= 0.7) return 1.5;
  if (quality >= 0.5) return 1;
  return 0.7;
}

export function speedMultiplier(durationSeconds: number | undefined, complexity: TaskComplexity): number {
  if (durationSeconds === undefined) return 1;
  const expected = EXPECTED_DURATIONS[complexity];
  if (durationSeconds <= expected * 0.5) return 1.5;
  if (durationSeconds <= expected * 0.75) return 1.25;
  if (durationSeconds <= expected) return 1;
  return Math.max(0.8, 1 - ((durationSeconds - expected) / expected) * 0.2);
}

export function streakMultiplier(streak: number): number {
  if (streak >= 10) return 1.5;
  if (streak >= 5) return 1.3;
  if (streak >= 3) return 1.1;
  return 1;
}

export function calculateXP(input: XPCalculationInput = {}): XPCalculation {
  const opts = XPCalculationInputSchema.parse(input);
  const breakdown: XPBreakdown = {
    base: opts.baseXP,
    complexity: COMPLEXITY_MULTIPLIERS[opts.complexity],
    quality: qualityMultiplier(opts.quality),
    speed: speedMultiplier(opts.durationSeconds, opts.complexity),
    streak: streakMultiplier(opts.streak),
    outcome: opts.success ? 1 : 0.3,
  };
  const multiplier =
    breakdown.complexity * breakdown.quality * breakdown.speed * breakdown.streak * breakdown.outcome;

  // 1e-9 absorbs float noise such as 10 * 0.7 = 7.000000000000001 or 2.9999999999999996.
  return { baseXP: Math.floor(opts.baseXP * multiplier + 1e-9), multiplier, breakdown };
}
