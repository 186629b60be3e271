import type { RegistryIndex } from '../registry/registry.js';
import type { CapabilityDescriptor } from '../types.js';

export interface SimilarCapability {
  descriptor: CapabilityDescriptor;
  similarity: number;
}

/** Same category +3, each shared tag +2, same complexity +1. */
export function findSimilar(index: RegistryIndex, name: string, limit = 5): SimilarCapability[] {
  const target = index.get(name);
  if (!target) return [];
  const targetTags = new Set(target.techStackTags);

  return index
    .all()
    .filter((d) => d.name !== name)
    .map((d) => {
      let similarity = d.category === target.category ? 3 : 0;
      similarity += d.techStackTags.filter((t) => targetTags.has(t)).length * 2;
      if (d.complexity === target.complexity) similarity += 1;
      return { descriptor: d, similarity };
    })
    .filter((s) => s.similarity > 0)
    .sort((a, b) => b.similarity - a.similarity || a.descriptor.name.localeCompare(b.descriptor.name))
    .slice(0, limit);
}
