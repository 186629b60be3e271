import { describe, expect, it } from 'vitest';
import { createLogger } from '../../logger.js';
import type { XPEvent } from '../../types.js';
import { type Achievement, AchievementEngine, DEFAULT_ACHIEVEMENTS } from '../achievements.js';
import { foldProgress } from '../progress.js';

function usage(eventId: number, taskLabel: string, outcome: XPEvent['outcome'] = 'success'): XPEvent {
  return {
    eventId,
    capabilityName: 'a',
    timestamp: '2024-01-01T00:00:00.000Z',
    taskLabel,
    outcome,
    baseXP: 10,
    bonusXP: 0,
    kind: 'usage',
  };
}

function keys(list: Achievement[]): string[] {
  return list.map((a) => a.key);
}

const quiet = createLogger('achievements', { sink: () => {} });

describe('AchievementEngine', () => {
  it('unlocks first-success after one success', () => {
    const history = [usage(1, 'write docs')];
    const { unlocked, failures } = new AchievementEngine(DEFAULT_ACHIEVEMENTS, quiet).evaluate(
      foldProgress('a', history),
      history,
    );
    expect(keys(unlocked)).toEqual(['first-success']);
    expect(failures).toEqual([]);
  });

  it('unlocks nothing after a failure', () => {
    const history = [usage(1, 'write docs', 'failure')];
    const { unlocked } = new AchievementEngine(DEFAULT_ACHIEVEMENTS, quiet).evaluate(foldProgress('a', history), history);
    expect(unlocked).toEqual([]);
  });

  it('skips achievements already unlocked', () => {
    const history: XPEvent[] = [
      usage(1, 'write docs'),
      { ...usage(2, 'achievement:first-success'), baseXP: 0, bonusXP: 50, kind: 'achievement', achievementKey: 'first-success' },
      usage(3, 'write more docs'),
    ];
    const { unlocked } = new AchievementEngine(DEFAULT_ACHIEVEMENTS, quiet).evaluate(foldProgress('a', history), history);
    expect(unlocked).toEqual([]);
  });

  it('counts bug-fix labels on successful tasks only', () => {
    const history = [
      usage(1, 'fix crash on start'),
      usage(2, 'debug timeout'),
      usage(3, 'bug in parser'),
      usage(4, 'fixed typo'),
      usage(5, 'fix login', 'failure'),
      usage(6, 'fixes flaky test'),
    ];
    const { unlocked } = new AchievementEngine(DEFAULT_ACHIEVEMENTS, quiet).evaluate(foldProgress('a', history), history);
    expect(keys(unlocked)).toEqual(['first-success', 'bug-hunter']);
  });

  it('unlocks hot-streak on five successes in a row', () => {
    const history = [1, 2, 3, 4, 5].map((id) => usage(id, `task ${id}`));
    const { unlocked } = new AchievementEngine(DEFAULT_ACHIEVEMENTS, quiet).evaluate(foldProgress('a', history), history);
    expect(keys(unlocked)).toEqual(['first-success', 'hot-streak']);
  });

  it('reports a throwing predicate and still runs the others', () => {
    const lines: string[] = [];
    const broken: Achievement = {
      key: 'broken',
      title: 'Broken',
      description: 'always throws',
      xpReward: 10,
      predicate: () => {
        throw new Error('boom');
      },
    };
    const engine = new AchievementEngine([broken, ...DEFAULT_ACHIEVEMENTS], createLogger('achievements', { sink: (l) => lines.push(l) }));
    const history = [usage(1, 'write docs')];

    const { unlocked, failures } = engine.evaluate(foldProgress('a', history), history);

    expect(keys(unlocked)).toEqual(['first-success']);
    expect(failures).toEqual([{ achievementKey: 'broken', capabilityName: 'a', message: 'boom' }]);
    expect(lines).toEqual(['[achievements] warn: Predicate "broken" failed for a: boom']);
  });

  it('rejects duplicate keys and bad rewards', () => {
    const base = DEFAULT_ACHIEVEMENTS[0];
    expect(() => new AchievementEngine([base, base], quiet)).toThrow('Duplicate achievement key');
    expect(() => new AchievementEngine([{ ...base, xpReward: -1 }], quiet)).toThrow('xpReward');
  });

  it('looks up definitions by key', () => {
    const engine = new AchievementEngine(DEFAULT_ACHIEVEMENTS, quiet);
    expect(engine.get('veteran')?.xpReward).toBe(300);
    expect(engine.get('nope')).toBeUndefined();
    expect(engine.definitions).toHaveLength(6);
  });
});
