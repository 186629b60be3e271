import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError, CorruptStoreError } from './errors.js';
import { JsonStore } from './storage.js';
import { CONFIG_FILE, SQUADKIT_DIR } from './types.js';

export const DEFAULT_LEVEL_THRESHOLDS = [0, 100, 300, 600, 1000, 1500, 2100, 2800, 3600, 4500];

export const DEFAULT_TIERS = [
  { name: 'Novice', minLevel: 1 },
  { name: 'Adept', minLevel: 3 },
  { name: 'Expert', minLevel: 5 },
  { name: 'Master', minLevel: 7 },
  { name: 'Grandmaster', minLevel: 9 },
  { name: 'Legend', minLevel: 10 },
];

export const DEFAULT_SYNERGY_PAIRS: Array<[string, string]> = [
  ['backend-architect', 'frontend-developer'],
  ['backend-architect', 'security-auditor'],
  ['python-elite', 'data-engineer'],
  ['data-engineer', 'ai-engineer'],
  ['devops-engineer', 'cloud-architect'],
  ['test-engineer', 'code-reviewer'],
  ['api-documenter', 'backend-architect'],
  ['incident-commander', 'devops-engineer'],
];

const WeightsSchema = z
  .object({
    tech: z.number().nonnegative().default(0.6),
    category: z.number().nonnegative().default(0.3),
    history: z.number().nonnegative().default(0.1),
  })
  .refine((w) => w.tech > w.category && w.category > w.history, {
    message: 'weights must satisfy tech > category > history',
  });

export type ScoringWeights = z.infer<typeof WeightsSchema>;

const SquadSchema = z
  .object({
    minSize: z.number().int().positive().default(3),
    maxSize: z.number().int().positive().default(6),
    maxPerCategory: z.number().int().positive().default(2),
    synergyBonusPercent: z.number().nonnegative().default(10),
    maxSynergyPercent: z.number().nonnegative().default(30),
    synergyPairs: z.array(z.tuple([z.string(), z.string()])).default(DEFAULT_SYNERGY_PAIRS),
  })
  .refine((s) => s.minSize <= s.maxSize, { message: 'squad.minSize must not exceed squad.maxSize' });

export type SquadConfig = z.infer<typeof SquadSchema>;

export const SquadkitConfigSchema = z.object({
  roots: z.array(z.string().min(1)).default(['~/.squadkit/agents', 'agents', 'custom_agents']),
  cacheTtlMs: z.number().int().nonnegative().default(300_000),
  levelThresholds: z.array(z.number().int().nonnegative()).min(1).default(DEFAULT_LEVEL_THRESHOLDS),
  tiers: z
    .array(z.object({ name: z.string().min(1), minLevel: z.number().int().positive() }))
    .min(1)
    .default(DEFAULT_TIERS),
  weights: WeightsSchema.default({}),
  squad: SquadSchema.default({}),
  ledgerFile: z.string().min(1).default('ledger.json'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
});

export type SquadkitConfig = z.infer<typeof SquadkitConfigSchema>;
export type SquadkitConfigInput = z.input<typeof SquadkitConfigSchema>;

export function defaultConfig(): SquadkitConfig {
  return SquadkitConfigSchema.parse({});
}

function configStore(root: string): JsonStore<SquadkitConfig> {
  return new JsonStore(join(root, SQUADKIT_DIR), CONFIG_FILE, SquadkitConfigSchema, defaultConfig);
}

/**
 * Reads `.squadkit/config.json`, falling back to defaults when absent.
 * `overrides` are applied on top of the file and re-validated.
 */
export function loadConfig(root: string, overrides: SquadkitConfigInput = {}): SquadkitConfig {
  const store = configStore(root);
  let fromFile: SquadkitConfig;
  try {
    fromFile = store.read();
  } catch (err) {
    if (err instanceof CorruptStoreError) throw new ConfigError(err.filePath, err.reason);
    throw err;
  }
  const merged = SquadkitConfigSchema.safeParse({ ...fromFile, ...overrides });
  if (!merged.success) {
    throw new ConfigError(store.filePath, merged.error.issues.map((i) => i.message).join('; '));
  }
  return merged.data;
}

export function writeConfig(root: string, config: SquadkitConfig): string {
  const store = configStore(root);
  store.write(config);
  return store.filePath;
}
