import { copyFileSync, existsSync } from 'node:fs';
import { CorruptLedgerError, CorruptStoreError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import { JsonStore, type StoreFile } from '../storage.js';
import {
  type LedgerFile,
  LedgerFileSchema,
  type ProgressSummary,
  type XPEvent,
  type XPEventDraft,
  XPEventSchema,
} from '../types.js';
import type { Clock } from '../utils.js';
import { isRecord, systemClock, toIso } from '../utils.js';
import type { LevelTable } from './levels.js';
import { DEFAULT_LEVEL_TABLE, levelFor } from './levels.js';
import { byEventId, summarize, summaryFor } from './progress.js';

export interface LedgerVerification {
  ok: boolean;
  issues: string[];
}

export interface RebuildReport {
  source: StoreFile;
  eventCount: number;
  /** Entries that did not validate as events and were left out. */
  invalidEvents: number;
  duplicateEventIds: number[];
  summaries: Record<string, ProgressSummary>;
  /** Copy of the damaged file kept for inspection, when one was made. */
  preservedAs?: string;
}

/**
 * Append-only event log. Implementations may add locking or a transactional
 * backend; callers only rely on this contract.
 */
export interface LedgerStore {
  /** Assigns the next eventId and a timestamp. Refuses while verification fails. */
  append(draft: XPEventDraft): XPEvent;
  /** Events in eventId order, optionally for one capability. */
  readAll(capabilityName?: string): XPEvent[];
  names(): string[];
  verify(): LedgerVerification;
  rebuild(): RebuildReport;
}

export interface JsonLedgerOptions {
  dir: string;
  fileName?: string;
  levelTable?: LevelTable;
  clock?: Clock;
  logger?: Logger;
}

function emptyLedger(): LedgerFile {
  return { version: 1, nextEventId: 1, events: [], summaries: {} };
}

export class JsonLedgerStore implements LedgerStore {
  private readonly store: JsonStore<LedgerFile>;
  private readonly table: LevelTable;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(opts: JsonLedgerOptions) {
    this.store = new JsonStore(opts.dir, opts.fileName ?? 'ledger.json', LedgerFileSchema, emptyLedger);
    this.table = opts.levelTable ?? DEFAULT_LEVEL_TABLE;
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('ledger');
  }

  get filePath(): string {
    return this.store.filePath;
  }

  append(draft: XPEventDraft): XPEvent {
    const check = this.verify();
    if (!check.ok) throw new CorruptLedgerError(this.store.filePath, check.issues);

    const data = this.store.read();
    const event = XPEventSchema.parse({
      ...draft,
      bonusXP: draft.bonusXP ?? 0,
      kind: draft.kind ?? 'usage',
      eventId: data.nextEventId,
      timestamp: toIso(this.clock()),
    });

    const prev = summaryFor(data.summaries, event.capabilityName);
    const totalXP = (prev?.totalXP ?? 0) + event.baseXP + event.bonusXP;
    this.store.write({
      version: 1,
      nextEventId: event.eventId + 1,
      events: [...data.events, event],
      summaries: {
        ...data.summaries,
        [event.capabilityName]: {
          totalXP,
          level: levelFor(totalXP, this.table),
          storedEvents: (prev?.storedEvents ?? 0) + 1,
          lastEventId: event.eventId,
        },
      },
    });
    return event;
  }

  readAll(capabilityName?: string): XPEvent[] {
    const events = [...this.readForQuery().events].sort(byEventId);
    return capabilityName === undefined ? events : events.filter((e) => e.capabilityName === capabilityName);
  }

  names(): string[] {
    return [...new Set(this.readAll().map((e) => e.capabilityName))].sort();
  }

  verify(): LedgerVerification {
    this.store.invalidate();
    let data: LedgerFile;
    try {
      data = this.store.read();
    } catch (err) {
      return { ok: false, issues: [errorMessage(err)] };
    }

    const issues: string[] = [];
    const { events } = data;
    for (let i = 1; i < events.length; i++) {
      if (events[i].eventId <= events[i - 1].eventId) {
        issues.push(`event ids out of order at position ${i} (${events[i].eventId} after ${events[i - 1].eventId})`);
      }
    }

    const maxId = events.reduce((max, e) => Math.max(max, e.eventId), 0);
    if (data.nextEventId <= maxId) {
      issues.push(`nextEventId ${data.nextEventId} is not above the highest event id ${maxId}`);
    }

    const unlocks = new Set<string>();
    for (const e of events) {
      if (e.kind !== 'achievement' || !e.achievementKey) continue;
      const key = `${e.capabilityName}/${e.achievementKey}`;
      if (unlocks.has(key)) issues.push(`achievement "${key}" unlocked more than once`);
      unlocks.add(key);
    }

    const expected = summarize(events, this.table);
    const names = new Set([...Object.keys(expected), ...Object.keys(data.summaries)]);
    for (const name of [...names].sort()) {
      const want = summaryFor(expected, name);
      const have = summaryFor(data.summaries, name);
      if (!want) {
        issues.push(`summary for "${name}" has no events behind it`);
      } else if (!have) {
        issues.push(`summary for "${name}" is missing`);
      } else {
        for (const field of ['totalXP', 'level', 'storedEvents', 'lastEventId'] as const) {
          if (want[field] !== have[field]) {
            issues.push(`summary for "${name}" has ${field} ${have[field]}, events give ${want[field]}`);
          }
        }
      }
    }

    return { ok: issues.length === 0, issues };
  }

  /**
   * Recompute the file from raw events. Events come from the primary file when
   * its JSON parses, otherwise from the backup (also when the primary file is
   * gone); everything left out is counted in the report.
   */
  rebuild(): RebuildReport {
    const salvaged = this.salvageEvents();
    const valid: XPEvent[] = [];
    let invalidEvents = 0;
    for (const raw of salvaged.events) {
      const parsed = XPEventSchema.safeParse(raw);
      if (parsed.success) valid.push(parsed.data);
      else invalidEvents++;
    }

    const seen = new Set<number>();
    const duplicateEventIds: number[] = [];
    const events = valid.sort(byEventId).filter((e) => {
      if (seen.has(e.eventId)) {
        duplicateEventIds.push(e.eventId);
        return false;
      }
      seen.add(e.eventId);
      return true;
    });

    let preservedAs: string | undefined;
    const damaged = salvaged.source === 'backup' || invalidEvents > 0 || duplicateEventIds.length > 0;
    if (damaged && existsSync(this.store.filePath)) {
      preservedAs = `${this.store.filePath}.corrupt`;
      copyFileSync(this.store.filePath, preservedAs);
    }

    const summaries = summarize(events, this.table);
    this.store.write({
      version: 1,
      nextEventId: events.reduce((max, e) => Math.max(max, e.eventId), 0) + 1,
      events,
      summaries,
    });

    if (invalidEvents > 0 || duplicateEventIds.length > 0) {
      this.log.warn(
        `Rebuilt ${this.store.filePath} from ${salvaged.source}: ${invalidEvents} invalid entries and ` +
          `${duplicateEventIds.length} duplicate ids left out (original kept at ${preservedAs})`,
      );
    } else {
      this.log.info(`Rebuilt ${this.store.filePath} from ${salvaged.source}: ${events.length} events`);
    }

    return {
      source: salvaged.source,
      eventCount: events.length,
      invalidEvents,
      duplicateEventIds,
      summaries,
      ...(preservedAs ? { preservedAs } : {}),
    };
  }

  // Primary file if it parses, else the last-known-good backup.
  private readForQuery(): LedgerFile {
    this.store.invalidate();
    try {
      return this.store.read();
    } catch (err) {
      if (!(err instanceof CorruptStoreError)) throw err;
      let backup: LedgerFile | null = null;
      try {
        backup = this.store.readBackup();
      } catch (backupErr) {
        this.log.error(`Backup unreadable as well: ${errorMessage(backupErr)}`);
      }
      if (!backup) throw new CorruptLedgerError(this.store.filePath, [err.reason, 'no readable backup']);
      this.log.warn(`${err.message}; serving last-known-good copy ${this.store.backupPath}`);
      return backup;
    }
  }

  private salvageEvents(): { source: StoreFile; events: unknown[] } {
    const problems: string[] = [];
    let anyFile = false;
    for (const source of ['primary', 'backup'] as const) {
      let raw: unknown;
      try {
        raw = this.store.readRaw(source);
      } catch (err) {
        anyFile = true;
        problems.push(errorMessage(err));
        continue;
      }
      if (raw === undefined) {
        problems.push(`${source} copy not found`);
        continue;
      }
      anyFile = true;
      if (isRecord(raw) && Array.isArray(raw.events)) return { source, events: raw.events };
      problems.push(`${source} copy has no events array`);
    }
    if (!anyFile) return { source: 'primary', events: [] };
    throw new CorruptLedgerError(this.store.filePath, problems);
  }
}
