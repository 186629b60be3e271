import { describe, expect, it } from 'vitest';
import type { CapabilityDescriptor, ProjectSignature } from '../../types.js';
import { NEUTRAL_SUCCESS_RATE, rankCapabilities, score, techOverlap } from '../scoring.js';

function makeDescriptor(overrides: Partial<CapabilityDescriptor> & { name: string }): CapabilityDescriptor {
  return {
    summary: '',
    category: 'development',
    techStackTags: [],
    complexity: 3,
    sourceRoot: '/agents',
    filePath: `/agents/${overrides.name}.md`,
    rawBody: '',
    extensions: {},
    ...overrides,
  };
}

const backendRequest: ProjectSignature = {
  inferredTechStack: ['backend', 'python', 'sql'],
  projectType: 'api-service',
  complexity: 2,
};

describe('techOverlap', () => {
  it('is the share of inferred tags the capability covers', () => {
    expect(techOverlap(['python', 'backend', 'react'], ['backend', 'python', 'sql', 'cloud'])).toBe(0.5);
  });

  it('is zero when nothing was inferred', () => {
    expect(techOverlap(['python'], [])).toBe(0);
  });
});

describe('score', () => {
  const pythonDev = makeDescriptor({ name: 'python-elite', techStackTags: ['backend', 'python'] });
  const reactDev = makeDescriptor({ name: 'frontend-developer', techStackTags: ['frontend', 'react'] });

  it('weights tech overlap, category affinity and neutral history', () => {
    const scored = score(pythonDev, backendRequest);
    expect(scored.score).toBe(0.75);
    expect(scored.level).toBe(1);
    expect(scored.breakdown.successRate).toBe(NEUTRAL_SUCCESS_RATE);
    expect(score(reactDev, backendRequest).score).toBe(0.35);
  });

  it('uses recorded history when there is some', () => {
    const scored = score(pythonDev, backendRequest, () => ({ successRate: 1, level: 4 }));
    expect(scored.score).toBe(0.8);
    expect(scored.level).toBe(4);
  });

  it('scores an uncategorized capability with no overlap from history alone', () => {
    const stray = makeDescriptor({ name: 'stray', category: 'uncategorized' });
    expect(score(stray, backendRequest).score).toBe(0.05);
  });
});

describe('rankCapabilities', () => {
  it('orders by score, then level, then name', () => {
    const caps = [
      makeDescriptor({ name: 'zeta', techStackTags: ['python'] }),
      makeDescriptor({ name: 'alpha', techStackTags: ['python'] }),
      makeDescriptor({ name: 'veteran', techStackTags: ['python'] }),
      makeDescriptor({ name: 'best', techStackTags: ['backend', 'python', 'sql'] }),
    ];
    const history = (name: string) => (name === 'veteran' ? { successRate: 0.5, level: 3 } : undefined);

    expect(rankCapabilities(caps, backendRequest, history).map((r) => r.descriptor.name)).toEqual([
      'best',
      'veteran',
      'alpha',
      'zeta',
    ]);
  });

  it('returns an empty list for no capabilities', () => {
    expect(rankCapabilities([], backendRequest)).toEqual([]);
  });
});
