import { type Dirent, existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { ParseFailure } from '../errors.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type { CapabilityClassifier } from '../recommend/classifier.js';
import { defaultClassifier } from '../recommend/classifier.js';
import type { CapabilityCategory, CapabilityDescriptor } from '../types.js';
import type { Clock } from '../utils.js';
import { systemClock } from '../utils.js';
import { type LoadResult, parseDescriptorFile } from './loader.js';

export type ScanWarning =
  | ParseFailure
  | { kind: 'unreadable-directory'; filePath: string; message: string }
  | { kind: 'duplicate-name'; filePath: string; message: string };

export interface SearchFilters {
  category?: CapabilityCategory | CapabilityCategory[];
  /** Every listed tag must be present on the capability. */
  techStack?: string[];
  complexity?: { min?: number; max?: number };
  /** Case-insensitive substring over name and summary. */
  text?: string;
}

export class RegistryIndex {
  private readonly byName: Map<string, CapabilityDescriptor>;
  private readonly byCategory = new Map<CapabilityCategory, CapabilityDescriptor[]>();
  private readonly byTag = new Map<string, Set<string>>();

  constructor(descriptors: Iterable<CapabilityDescriptor>) {
    const sorted = [...descriptors].sort((a, b) => a.name.localeCompare(b.name));
    this.byName = new Map(sorted.map((d) => [d.name, d]));
    for (const d of sorted) {
      const bucket = this.byCategory.get(d.category) ?? [];
      bucket.push(d);
      this.byCategory.set(d.category, bucket);
      for (const tag of d.techStackTags) {
        const names = this.byTag.get(tag) ?? new Set<string>();
        names.add(d.name);
        this.byTag.set(tag, names);
      }
    }
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): CapabilityDescriptor | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  all(): CapabilityDescriptor[] {
    return [...this.byName.values()];
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  categories(): CapabilityCategory[] {
    return [...this.byCategory.keys()].sort();
  }

  tags(): string[] {
    return [...this.byTag.keys()].sort();
  }

  search(filters: SearchFilters = {}): CapabilityDescriptor[] {
    let candidates: CapabilityDescriptor[];
    if (filters.category !== undefined) {
      const wanted = Array.isArray(filters.category) ? filters.category : [filters.category];
      candidates = wanted
        .flatMap((c) => this.byCategory.get(c) ?? [])
        .sort((a, b) => a.name.localeCompare(b.name));
    } else {
      candidates = this.all();
    }

    const tags = filters.techStack?.map((t) => t.toLowerCase()) ?? [];
    const min = filters.complexity?.min ?? 1;
    const max = filters.complexity?.max ?? 5;
    const text = filters.text?.toLowerCase();

    return candidates.filter((d) => {
      if (tags.some((t) => !this.byTag.get(t)?.has(d.name))) return false;
      if (d.complexity < min || d.complexity > max) return false;
      if (text && !d.name.toLowerCase().includes(text) && !d.summary.toLowerCase().includes(text)) {
        return false;
      }
      return true;
    });
  }
}

export interface DiscoveryResult {
  index: RegistryIndex;
  warnings: ScanWarning[];
  fromCache: boolean;
  scannedAt: number;
}

export interface RegistryOptions {
  /** Search roots, lowest priority first. */
  roots: string[];
  ttlMs?: number;
  clock?: Clock;
  classifier?: CapabilityClassifier;
  logger?: Logger;
}

/**
 * Aggregates descriptor files from several roots into one index.
 *
 * Later roots override earlier ones by name. The index is cached for `ttlMs`;
 * expiry always means a full re-scan.
 */
export class CapabilityRegistry {
  private readonly roots: string[];
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly classifier: CapabilityClassifier;
  private readonly log: Logger;
  private cached: DiscoveryResult | null = null;

  constructor(opts: RegistryOptions) {
    this.roots = [...opts.roots];
    this.ttlMs = opts.ttlMs ?? 300_000;
    this.clock = opts.clock ?? systemClock;
    this.classifier = opts.classifier ?? defaultClassifier;
    this.log = opts.logger ?? createLogger('registry');
  }

  get searchRoots(): readonly string[] {
    return this.roots;
  }

  addRoot(root: string): void {
    if (this.roots.includes(root)) return;
    this.roots.push(root);
    this.invalidate();
  }

  invalidate(): void {
    this.cached = null;
  }

  // A classifier supplied by the caller may throw; that costs one file, not the scan.
  private load(file: string, root: string): LoadResult {
    try {
      return parseDescriptorFile(file, root, this.classifier);
    } catch (err) {
      return { ok: false, failure: { kind: 'unreadable', filePath: file, message: `${file}: ${errorMessage(err)}` } };
    }
  }

  discover(opts: { force?: boolean } = {}): DiscoveryResult {
    const now = this.clock();
    if (!opts.force && this.cached && now - this.cached.scannedAt < this.ttlMs) {
      return this.cached;
    }

    const warnings: ScanWarning[] = [];
    const merged = new Map<string, CapabilityDescriptor>();

    for (const root of this.roots) {
      if (!existsSync(root)) {
        this.log.debug(`Search root does not exist, skipping: ${root}`);
        continue;
      }
      const seenInRoot = new Map<string, string>();
      for (const file of this.listDescriptorFiles(root, warnings)) {
        const result = this.load(file, root);
        if (!result.ok) {
          this.log.warn(`Skipping ${result.failure.kind} descriptor: ${result.failure.message}`);
          warnings.push(result.failure);
          continue;
        }
        const { descriptor } = result;
        const earlier = seenInRoot.get(descriptor.name);
        if (earlier) {
          const message = `${file}: capability "${descriptor.name}" already defined in ${earlier}`;
          this.log.warn(message);
          warnings.push({ kind: 'duplicate-name', filePath: file, message });
          continue;
        }
        seenInRoot.set(descriptor.name, file);
        const shadowed = merged.get(descriptor.name);
        if (shadowed) {
          this.log.debug(`"${descriptor.name}" from ${root} overrides ${shadowed.sourceRoot}`);
        }
        merged.set(descriptor.name, descriptor);
      }
    }

    const index = new RegistryIndex(merged.values());
    this.log.info(`Discovered ${index.size} capabilities from ${this.roots.length} roots`);
    const result: DiscoveryResult = { index, warnings, fromCache: false, scannedAt: now };
    this.cached = { ...result, fromCache: true };
    return result;
  }

  search(filters: SearchFilters = {}): CapabilityDescriptor[] {
    return this.discover().index.search(filters);
  }

  private listDescriptorFiles(dir: string, warnings: ScanWarning[]): string[] {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      const message = `${dir}: ${errorMessage(err)}`;
      this.log.warn(`Skipping unreadable directory ${message}`);
      warnings.push({ kind: 'unreadable-directory', filePath: dir, message });
      return [];
    }

    const files: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...this.listDescriptorFiles(full, warnings));
      } else if (entry.isFile() && entry.name.endsWith('.md')) {
        files.push(full);
      }
    }
    return files;
  }
}
