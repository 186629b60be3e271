import { describe, expect, it } from 'vitest';
import type { XPEvent } from '../../types.js';
import { emptyProgress, foldProgress, summarize } from '../progress.js';

function ev(eventId: number, capabilityName: string, outcome: XPEvent['outcome'], baseXP: number, extra: Partial<XPEvent> = {}): XPEvent {
  return {
    eventId,
    capabilityName,
    timestamp: new Date(Date.UTC(2024, 0, 1, 0, eventId)).toISOString(),
    taskLabel: `task ${eventId}`,
    outcome,
    baseXP,
    bonusXP: 0,
    kind: 'usage',
    ...extra,
  };
}

const events: XPEvent[] = [
  ev(1, 'a', 'success', 10),
  ev(2, 'b', 'success', 5),
  ev(3, 'a', 'failure', 3),
  ev(4, 'a', 'success', 20),
  ev(5, 'a', 'success', 0, { kind: 'achievement', bonusXP: 50, achievementKey: 'first-success' }),
  ev(6, 'a', 'success', 7),
];

describe('foldProgress', () => {
  it('sums XP over every event and counts usage only', () => {
    expect(foldProgress('a', events)).toEqual({
      capabilityName: 'a',
      totalXP: 90,
      level: 1,
      tier: 'Novice',
      eventCount: 4,
      successCount: 3,
      failureCount: 1,
      successRate: 0.75,
      currentStreak: 2,
      bestStreak: 2,
      unlockedAchievements: ['first-success'],
      firstEventId: 1,
      firstEventAt: '2024-01-01T00:01:00.000Z',
      lastEventAt: '2024-01-01T00:06:00.000Z',
    });
  });

  it('folds in eventId order whatever the input order', () => {
    const shuffled = [events[5], events[2], events[0], events[4], events[1], events[3]];
    expect(foldProgress('a', shuffled)).toEqual(foldProgress('a', events));
  });

  it('gives equal results on replay', () => {
    expect(foldProgress('a', events)).toEqual(foldProgress('a', [...events]));
  });

  it('never changes the XP of earlier events when more are appended', () => {
    const prefix = foldProgress('a', events.slice(0, 3));
    expect(prefix.totalXP).toBe(13);
    const rest = events.slice(3).filter((e) => e.capabilityName === 'a');
    expect(foldProgress('a', events).totalXP).toBe(prefix.totalXP + rest.reduce((s, e) => s + e.baseXP + e.bonusXP, 0));
  });

  it('tracks the best streak separately from the current one', () => {
    const run = [
      ev(1, 'a', 'success', 1),
      ev(2, 'a', 'success', 1),
      ev(3, 'a', 'success', 1),
      ev(4, 'a', 'failure', 1),
      ev(5, 'a', 'success', 1),
    ];
    const p = foldProgress('a', run);
    expect(p.currentStreak).toBe(1);
    expect(p.bestStreak).toBe(3);
  });
});

describe('emptyProgress', () => {
  it('is all zeros', () => {
    expect(emptyProgress('ghost')).toEqual({
      capabilityName: 'ghost',
      totalXP: 0,
      level: 1,
      tier: 'Novice',
      eventCount: 0,
      successCount: 0,
      failureCount: 0,
      successRate: 0,
      currentStreak: 0,
      bestStreak: 0,
      unlockedAchievements: [],
      firstEventId: null,
      firstEventAt: null,
      lastEventAt: null,
    });
  });
});

describe('summarize', () => {
  it('caches per-name totals', () => {
    expect(summarize(events)).toEqual({
      a: { totalXP: 90, level: 1, storedEvents: 5, lastEventId: 6 },
      b: { totalXP: 5, level: 1, storedEvents: 1, lastEventId: 2 },
    });
  });
});
