import { describe, expect, it } from 'vitest';
import { RegistryIndex } from '../../registry/registry.js';
import type { CapabilityDescriptor } from '../../types.js';
import { findSimilar } from '../similar.js';

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

const index = new RegistryIndex([
  makeDescriptor({ name: 'python-elite', techStackTags: ['backend', 'python'], complexity: 5 }),
  makeDescriptor({ name: 'data-engineer', category: 'data', techStackTags: ['data', 'python', 'sql'], complexity: 4 }),
  makeDescriptor({ name: 'backend-architect', techStackTags: ['backend'], complexity: 4 }),
  makeDescriptor({ name: 'frontend-developer', techStackTags: ['frontend'], complexity: 3 }),
  makeDescriptor({ name: 'security-auditor', category: 'security', techStackTags: ['security'], complexity: 5 }),
  makeDescriptor({ name: 'scribe', category: 'business', complexity: 1 }),
]);

describe('findSimilar', () => {
  it('ranks by shared category, tags and complexity', () => {
    expect(findSimilar(index, 'python-elite').map((s) => [s.descriptor.name, s.similarity])).toEqual([
      ['backend-architect', 5],
      ['frontend-developer', 3],
      ['data-engineer', 2],
      ['security-auditor', 1],
    ]);
  });

  it('respects the limit', () => {
    expect(findSimilar(index, 'python-elite', 2).map((s) => s.descriptor.name)).toEqual([
      'backend-architect',
      'frontend-developer',
    ]);
  });

  it('returns nothing for an unknown name', () => {
    expect(findSimilar(index, 'ghost')).toEqual([]);
  });
});
