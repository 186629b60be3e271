import { z } from 'zod';

// ── Constants ───────────────────────────────────────────────────

export const SQUADKIT_DIR = '.squadkit';
export const CONFIG_FILE = 'config.json';

// ── Capabilities ────────────────────────────────────────────────

export const CapabilityCategory = z.enum([
  'development',
  'infrastructure',
  'quality',
  'security',
  'data',
  'product',
  'business',
  'coordination',
  'uncategorized',
]);
export type CapabilityCategory = z.infer<typeof CapabilityCategory>;

export const CapabilityDescriptorSchema = z.object({
  name: z.string().min(1),
  summary: z.string(),
  category: CapabilityCategory,
  color: z.string().optional(),
  techStackTags: z.array(z.string()),
  complexity: z.number().int().min(1).max(5),
  sourceRoot: z.string(),
  filePath: z.string(),
  rawBody: z.string(),
  extensions: z.record(z.string(), z.unknown()),
});

export type CapabilityDescriptor = z.infer<typeof CapabilityDescriptorSchema>;

// ── Project Signature ───────────────────────────────────────────

export const ProjectType = z.enum(['web-app', 'api-service', 'data-pipeline', 'generic']);
export type ProjectType = z.infer<typeof ProjectType>;

export interface ProjectSignature {
  inferredTechStack: string[];
  projectType: ProjectType;
  complexity: number;
}

// ── XP Ledger ───────────────────────────────────────────────────

// Summaries are keyed by name in a JSON object, where "__proto__" cannot round-trip.
const RESERVED_NAMES = new Set(['__proto__']);
const notReserved = (name: string) => !RESERVED_NAMES.has(name);
const RESERVED_MESSAGE = 'capabilityName is reserved';

export const Outcome = z.enum(['success', 'failure']);
export type Outcome = z.infer<typeof Outcome>;

export const EventKind = z.enum(['usage', 'achievement']);
export type EventKind = z.infer<typeof EventKind>;

export const XPEventSchema = z.object({
  eventId: z.number().int().positive(),
  capabilityName: z.string().min(1).refine(notReserved, RESERVED_MESSAGE),
  timestamp: z.string().datetime(),
  taskLabel: z.string().min(1),
  outcome: Outcome,
  baseXP: z.number().int().nonnegative(),
  bonusXP: z.number().int().nonnegative().default(0),
  kind: EventKind.default('usage'),
  achievementKey: z.string().optional(),
});

export type XPEvent = z.infer<typeof XPEventSchema>;

/** What a caller hands the store; id and timestamp are assigned on append. */
export type XPEventDraft = Omit<XPEvent, 'eventId' | 'timestamp' | 'bonusXP' | 'kind'> & {
  bonusXP?: number;
  kind?: EventKind;
};

export const RecordEventInputSchema = z.object({
  capabilityName: z
    .string()
    .trim()
    .min(1, 'capabilityName must not be empty')
    .refine(notReserved, RESERVED_MESSAGE),
  taskLabel: z.string().trim().min(1, 'taskLabel must not be empty'),
  outcome: Outcome,
  baseXP: z.number().int('baseXP must be an integer').nonnegative('baseXP must not be negative'),
});

export type RecordEventInput = z.infer<typeof RecordEventInputSchema>;

export const ProgressSummarySchema = z.object({
  totalXP: z.number().int().nonnegative(),
  level: z.number().int().positive(),
  storedEvents: z.number().int().positive(),
  lastEventId: z.number().int().positive(),
});

export type ProgressSummary = z.infer<typeof ProgressSummarySchema>;

export const LedgerFileSchema = z.object({
  version: z.literal(1),
  nextEventId: z.number().int().positive(),
  events: z.array(XPEventSchema),
  summaries: z.record(z.string(), ProgressSummarySchema),
});

export type LedgerFile = z.infer<typeof LedgerFileSchema>;

// ── Progress ────────────────────────────────────────────────────

export interface AgentProgress {
  capabilityName: string;
  totalXP: number;
  level: number;
  tier: string;
  eventCount: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  currentStreak: number;
  bestStreak: number;
  unlockedAchievements: string[];
  firstEventId: number | null;
  firstEventAt: string | null;
  lastEventAt: string | null;
}

// ── Notifications ───────────────────────────────────────────────

export type NotificationType = 'xp_gained' | 'level_up' | 'achievement_unlocked';

export interface ProgressionNotification {
  type: NotificationType;
  capabilityName: string;
  payload: Record<string, unknown>;
  timestamp: string;
}
