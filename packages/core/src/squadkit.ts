import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  defaultConfig,
  loadConfig,
  SquadkitConfigSchema,
  writeConfig,
  type SquadkitConfig,
  type SquadkitConfigInput,
} from './config.js';
import type { PredicateFailure } from './errors.js';
import { ConfigError, errorMessage, InvalidEventError, UnknownCapabilityError } from './errors.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import type { Achievement } from './progression/achievements.js';
import { AchievementEngine, DEFAULT_ACHIEVEMENTS } from './progression/achievements.js';
import type { LedgerStore, LedgerVerification, RebuildReport } from './progression/ledger.js';
import { JsonLedgerStore } from './progression/ledger.js';
import type { LevelTable } from './progression/levels.js';
import { createLevelTable } from './progression/levels.js';
import { foldProgress } from './progression/progress.js';
import type { CapabilityClassifier } from './recommend/classifier.js';
import { defaultClassifier } from './recommend/classifier.js';
import type { HistoryLookup, ScoredCapability } from './recommend/scoring.js';
import { rankCapabilities } from './recommend/scoring.js';
import { inferSignature } from './recommend/signature.js';
import type { SimilarCapability } from './recommend/similar.js';
import { findSimilar } from './recommend/similar.js';
import type { SquadFormation } from './recommend/squad.js';
import { formSquad } from './recommend/squad.js';
import type { DiscoveryResult, SearchFilters } from './registry/registry.js';
import { CapabilityRegistry } from './registry/registry.js';
import type { RegistryReport } from './registry/report.js';
import { registryReport } from './registry/report.js';
import {
  type AgentProgress,
  CONFIG_FILE,
  type CapabilityDescriptor,
  type NotificationType,
  type ProgressionNotification,
  type ProjectSignature,
  type RecordEventInput,
  RecordEventInputSchema,
  SQUADKIT_DIR,
  type XPEvent,
  type XPEventDraft,
} from './types.js';
import type { Clock } from './utils.js';
import { resolveRoot, systemClock, toIso } from './utils.js';

export type NotificationListener = (notification: ProgressionNotification) => void;

export interface SquadKitOptions {
  /** Applied over `.squadkit/config.json`. */
  config?: SquadkitConfigInput;
  clock?: Clock;
  logger?: Logger;
  onNotify?: NotificationListener;
  achievements?: readonly Achievement[];
  classifier?: CapabilityClassifier;
  store?: LedgerStore;
}

export interface RecommendOptions {
  minSize?: number;
  maxSize?: number;
}

export interface Recommendation {
  signature: ProjectSignature;
  ranked: ScoredCapability[];
  squad: SquadFormation;
}

export interface RecordResult {
  event: XPEvent;
  progress: AgentProgress;
  previousLevel: number;
  levelUp: boolean;
  unlocked: Achievement[];
  failures: PredicateFailure[];
}

export interface AchievementRun {
  progress: AgentProgress;
  unlocked: Achievement[];
  failures: PredicateFailure[];
}

export interface LeaderboardEntry {
  rank: number;
  progress: AgentProgress;
}

export interface SquadKitReport {
  registry: RegistryReport;
  scanWarnings: number;
  trackedCapabilities: number;
  ledgerEvents: number;
  totalXP: number;
}

function levelTableFrom(config: SquadkitConfig, configPath: string): LevelTable {
  try {
    return createLevelTable(config.levelThresholds, config.tiers);
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err));
  }
}

/**
 * One project's registry and progression state. Everything the CLI does goes
 * through here; the modules underneath stay usable on their own.
 */
export class SquadKit {
  readonly root: string;
  readonly stateDir: string;
  readonly config: SquadkitConfig;
  readonly registry: CapabilityRegistry;
  readonly ledger: LedgerStore;
  readonly levelTable: LevelTable;

  private readonly classifier: CapabilityClassifier;
  private readonly achievements: AchievementEngine;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly listeners: NotificationListener[] = [];

  private constructor(root: string, config: SquadkitConfig, opts: SquadKitOptions) {
    this.root = root;
    this.stateDir = join(root, SQUADKIT_DIR);
    this.config = config;
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('squadkit', { level: config.logLevel });
    this.classifier = opts.classifier ?? defaultClassifier;

    this.levelTable = levelTableFrom(config, join(this.stateDir, CONFIG_FILE));

    this.registry = new CapabilityRegistry({
      roots: config.roots.map((r) => resolveRoot(root, r)),
      ttlMs: config.cacheTtlMs,
      clock: this.clock,
      classifier: this.classifier,
      logger: this.log.child('registry'),
    });
    this.ledger =
      opts.store ??
      new JsonLedgerStore({
        dir: this.stateDir,
        fileName: config.ledgerFile,
        levelTable: this.levelTable,
        clock: this.clock,
        logger: this.log.child('ledger'),
      });
    this.achievements = new AchievementEngine(opts.achievements ?? DEFAULT_ACHIEVEMENTS, this.log.child('achievements'));
    if (opts.onNotify) this.listeners.push(opts.onNotify);
  }

  /** Creates `.squadkit/` with a config file. Refuses to overwrite an existing project. */
  static init(root: string, opts: SquadKitOptions = {}): SquadKit {
    const stateDir = join(root, SQUADKIT_DIR);
    if (existsSync(join(stateDir, CONFIG_FILE))) {
      throw new Error(`squadkit project already exists at ${root}`);
    }
    mkdirSync(stateDir, { recursive: true });
    const parsed = SquadkitConfigSchema.safeParse({ ...defaultConfig(), ...opts.config });
    if (!parsed.success) {
      throw new ConfigError(join(stateDir, CONFIG_FILE), parsed.error.issues.map((i) => i.message).join('; '));
    }
    writeConfig(root, parsed.data);
    return new SquadKit(root, parsed.data, opts);
  }

  /** Works without `init`: a missing config means defaults. */
  static open(root: string, opts: SquadKitOptions = {}): SquadKit {
    return new SquadKit(root, loadConfig(root, opts.config), opts);
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i >= 0) this.listeners.splice(i, 1);
    };
  }

  // ── Registry ──────────────────────────────────────────────────

  discover(opts: { force?: boolean } = {}): DiscoveryResult {
    return this.registry.discover(opts);
  }

  search(filters: SearchFilters = {}): CapabilityDescriptor[] {
    return this.registry.search(filters);
  }

  similar(name: string, limit = 5): SimilarCapability[] {
    this.assertKnown(name);
    return findSimilar(this.discover().index, name, limit);
  }

  report(): SquadKitReport {
    const discovery = this.discover();
    const events = this.ledger.readAll();
    return {
      registry: registryReport(discovery.index),
      scanWarnings: discovery.warnings.length,
      trackedCapabilities: new Set(events.map((e) => e.capabilityName)).size,
      ledgerEvents: events.length,
      totalXP: events.reduce((sum, e) => sum + e.baseXP + e.bonusXP, 0),
    };
  }

  // ── Recommendation ────────────────────────────────────────────

  recommend(request: string, opts: RecommendOptions = {}): Recommendation {
    const signature = inferSignature(request, this.classifier);
    const progress = this.progressByName();
    const history: HistoryLookup = (name) => {
      const p = progress.get(name);
      return p && p.eventCount > 0 ? { successRate: p.successRate, level: p.level } : undefined;
    };

    const ranked = rankCapabilities(this.discover().index.all(), signature, history, this.config.weights);
    const { squad } = this.config;
    return {
      signature,
      ranked,
      squad: formSquad(ranked, signature, {
        minSize: opts.minSize ?? squad.minSize,
        maxSize: opts.maxSize ?? squad.maxSize,
        maxPerCategory: squad.maxPerCategory,
        synergyPairs: squad.synergyPairs,
        synergyBonusPercent: squad.synergyBonusPercent,
        maxSynergyPercent: squad.maxSynergyPercent,
      }),
    };
  }

  // ── Progression ───────────────────────────────────────────────

  recordEvent(input: RecordEventInput): RecordResult {
    const parsed = RecordEventInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidEventError(parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`));
    }
    const { capabilityName } = parsed.data;
    this.assertKnown(capabilityName);

    const before = foldProgress(capabilityName, this.ledger.readAll(capabilityName), this.levelTable);
    const { event, progress } = this.append({ ...parsed.data, kind: 'usage' }, before);
    const run = this.runAchievements(progress);

    return {
      event,
      progress: run.progress,
      previousLevel: before.level,
      levelUp: run.progress.level > before.level,
      unlocked: run.unlocked,
      failures: run.failures,
    };
  }

  evaluateAchievements(name: string): AchievementRun {
    this.assertKnown(name);
    return this.runAchievements(foldProgress(name, this.ledger.readAll(name), this.levelTable));
  }

  getProgress(name: string): AgentProgress {
    this.assertKnown(name);
    return foldProgress(name, this.ledger.readAll(name), this.levelTable);
  }

  /** Every known capability, recorded or not; capabilities without events sort last. */
  leaderboard(topN = 10): LeaderboardEntry[] {
    const progress = this.progressByName();
    for (const name of this.discover().index.names()) {
      if (!progress.has(name)) progress.set(name, foldProgress(name, [], this.levelTable));
    }

    return [...progress.values()]
      .sort((a, b) => {
        if (a.totalXP !== b.totalXP) return b.totalXP - a.totalXP;
        if (a.firstEventId !== b.firstEventId) {
          if (a.firstEventId === null) return 1;
          if (b.firstEventId === null) return -1;
          return a.firstEventId - b.firstEventId;
        }
        return a.capabilityName.localeCompare(b.capabilityName);
      })
      .slice(0, topN)
      .map((p, i) => ({ rank: i + 1, progress: p }));
  }

  verify(): LedgerVerification {
    return this.ledger.verify();
  }

  rebuild(): RebuildReport {
    return this.ledger.rebuild();
  }

  // ── Internals ─────────────────────────────────────────────────

  private assertKnown(name: string): void {
    if (this.discover().index.has(name)) return;
    if (this.ledger.names().includes(name)) return;
    throw new UnknownCapabilityError(name);
  }

  private progressByName(): Map<string, AgentProgress> {
    const grouped = new Map<string, XPEvent[]>();
    for (const e of this.ledger.readAll()) {
      const list = grouped.get(e.capabilityName) ?? [];
      list.push(e);
      grouped.set(e.capabilityName, list);
    }
    const progress = new Map<string, AgentProgress>();
    for (const [name, events] of grouped) {
      progress.set(name, foldProgress(name, events, this.levelTable));
    }
    return progress;
  }

  private append(draft: XPEventDraft, before: AgentProgress): { event: XPEvent; progress: AgentProgress } {
    const event = this.ledger.append(draft);
    const progress = foldProgress(event.capabilityName, this.ledger.readAll(event.capabilityName), this.levelTable);

    this.emit('xp_gained', event.capabilityName, {
      eventId: event.eventId,
      taskLabel: event.taskLabel,
      xp: event.baseXP + event.bonusXP,
      totalXP: progress.totalXP,
    });
    if (progress.level > before.level) {
      this.emit('level_up', event.capabilityName, {
        from: before.level,
        to: progress.level,
        tier: progress.tier,
      });
    }
    return { event, progress };
  }

  // Unlocks are events, so a key already in `progress` is never granted twice.
  private runAchievements(progress: AgentProgress): AchievementRun {
    const name = progress.capabilityName;
    const { unlocked, failures } = this.achievements.evaluate(progress, this.ledger.readAll(name));

    let current = progress;
    for (const achievement of unlocked) {
      this.emit('achievement_unlocked', name, {
        key: achievement.key,
        title: achievement.title,
        xpReward: achievement.xpReward,
      });
      current = this.append(
        {
          capabilityName: name,
          taskLabel: `achievement:${achievement.key}`,
          outcome: 'success',
          baseXP: 0,
          bonusXP: achievement.xpReward,
          kind: 'achievement',
          achievementKey: achievement.key,
        },
        current,
      ).progress;
    }
    return { progress: current, unlocked, failures };
  }

  private emit(type: NotificationType, capabilityName: string, payload: Record<string, unknown>): void {
    const notification: ProgressionNotification = {
      type,
      capabilityName,
      payload,
      timestamp: toIso(this.clock()),
    };
    for (const listener of [...this.listeners]) {
      try {
        listener(notification);
      } catch (err) {
        this.log.error(`Listener failed on ${type} for ${capabilityName}: ${errorMessage(err)}`);
      }
    }
  }
}
