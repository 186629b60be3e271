import type { CapabilityCategory } from '../types.js';
import type { RegistryIndex } from './registry.js';

export interface RegistryReport {
  totalCapabilities: number;
  categories: Array<{ category: CapabilityCategory; count: number }>;
  topTags: Array<{ tag: string; count: number }>;
  distinctTags: number;
}

/** Counts per category and the most common tech tags, for the `report` command. */
export function registryReport(index: RegistryIndex, topTagCount = 8): RegistryReport {
  const categoryCounts = new Map<CapabilityCategory, number>();
  const tagCounts = new Map<string, number>();

  for (const d of index.all()) {
    categoryCounts.set(d.category, (categoryCounts.get(d.category) ?? 0) + 1);
    for (const tag of d.techStackTags) {
      tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
    }
  }

  const byCountThenName = <K extends string>(a: [K, number], b: [K, number]) =>
    b[1] - a[1] || a[0].localeCompare(b[0]);

  return {
    totalCapabilities: index.size,
    categories: [...categoryCounts.entries()]
      .sort(byCountThenName)
      .map(([category, count]) => ({ category, count })),
    topTags: [...tagCounts.entries()]
      .sort(byCountThenName)
      .slice(0, topTagCount)
      .map(([tag, count]) => ({ tag, count })),
    distinctTags: tagCounts.size,
  };
}
