import { describe, expect, it } from 'vitest';
import type { CapabilityCategory, ProjectSignature } from '../../types.js';
import type { ScoredCapability } from '../scoring.js';
import { formSquad } from '../squad.js';

function scored(name: string, category: CapabilityCategory, value: number): ScoredCapability {
  return {
    descriptor: {
      name,
      summary: '',
      category,
      techStackTags: [],
      complexity: 3,
      sourceRoot: '/agents',
      filePath: `/agents/${name}.md`,
      rawBody: '',
      extensions: {},
    },
    score: value,
    level: 1,
    breakdown: { techOverlap: 0, categoryAffinity: 0, successRate: 0.5 },
  };
}

function signature(complexity: number): ProjectSignature {
  return { inferredTechStack: [], projectType: 'generic', complexity };
}

const ranked = [
  scored('a', 'development', 0.9),
  scored('b', 'development', 0.8),
  scored('c', 'development', 0.7),
  scored('d', 'quality', 0.6),
  scored('e', 'security', 0.5),
];

describe('formSquad', () => {
  it('caps members per category and assigns roles', () => {
    const squad = formSquad(ranked, signature(2));

    expect(squad.targetSize).toBe(4);
    expect(squad.members.map((m) => [m.descriptor.name, m.role])).toEqual([
      ['a', 'lead'],
      ['b', 'builder'],
      ['d', 'reviewer'],
      ['e', 'sentinel'],
    ]);
    expect(squad.undersized).toBe(false);
  });

  it('lifts the cap when candidates span too few categories', () => {
    const sameCategory = ranked.slice(0, 3).concat(scored('f', 'development', 0.4));
    const squad = formSquad(sameCategory, signature(2));
    expect(squad.members.map((m) => m.descriptor.name)).toEqual(['a', 'b', 'c', 'f']);
  });

  it('sizes the squad from complexity within the bounds', () => {
    expect(formSquad(ranked, signature(1)).targetSize).toBe(3);
    expect(formSquad(ranked, signature(5)).targetSize).toBe(6);
    expect(formSquad(ranked, signature(5), { maxSize: 4 }).targetSize).toBe(4);
  });

  it('returns every candidate, flagged, when there are too few', () => {
    const squad = formSquad(ranked.slice(3), signature(1));
    expect(squad.members.map((m) => m.descriptor.name)).toEqual(['d', 'e']);
    expect(squad.undersized).toBe(true);
  });

  it('forms an empty squad from an empty ranking', () => {
    const squad = formSquad([], signature(3));
    expect(squad.members).toEqual([]);
    expect(squad.aggregateScore).toBe(0);
    expect(squad.undersized).toBe(true);
  });

  it('adds a synergy bonus per configured pair present', () => {
    const squad = formSquad(ranked, signature(2), {
      synergyPairs: [
        ['a', 'b'],
        ['a', 'd'],
        ['c', 'e'],
      ],
    });

    expect(squad.synergies).toEqual([
      ['a', 'b'],
      ['a', 'd'],
    ]);
    expect(squad.synergyBonus).toBe(20);
    expect(squad.aggregateScore).toBe(2.8);
    expect(squad.adjustedScore).toBe(3.36);
  });

  it('caps the synergy bonus', () => {
    const squad = formSquad(ranked, signature(2), {
      synergyPairs: [
        ['a', 'b'],
        ['a', 'd'],
        ['a', 'e'],
        ['b', 'd'],
      ],
    });
    expect(squad.synergies).toHaveLength(4);
    expect(squad.synergyBonus).toBe(30);
  });
});
