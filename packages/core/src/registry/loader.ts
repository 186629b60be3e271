import { readFileSync } from 'node:fs';
import { relative, sep } from 'node:path';
import { parseDocument } from 'yaml';
import { z } from 'zod';
import type { ParseFailure, ParseFailureKind } from '../errors.js';
import { errorMessage } from '../errors.js';
import type { CapabilityClassifier } from '../recommend/classifier.js';
import { CapabilityCategory, type CapabilityDescriptor } from '../types.js';
import { isRecord } from '../utils.js';

export type LoadResult =
  | { ok: true; descriptor: CapabilityDescriptor }
  | { ok: false; failure: ParseFailure };

// Directory names seen in descriptor collections, mapped onto categories.
const DIRECTORY_CATEGORIES: Record<string, CapabilityCategory> = {
  business: 'business',
  conductor: 'coordination',
  coordination: 'coordination',
  data: 'data',
  'data-ai': 'data',
  development: 'development',
  infrastructure: 'infrastructure',
  product: 'product',
  quality: 'quality',
  'quality-assurance': 'quality',
  security: 'security',
};

const DIFFICULTY_KEYWORDS: Array<[number, RegExp]> = [
  [5, /\b(?:elite|battle-tested|legendary|guru)\b/i],
  [4, /\b(?:expert|master|senior|architect)\b/i],
  [1, /\b(?:simple|basic|getting started|intro)\b/i],
];

const DEFAULT_COMPLEXITY = 3;

const HEADER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n([\s\S]*))?$/;

const KNOWN_KEYS = new Set(['name', 'summary', 'description', 'category', 'color', 'complexity']);

const HeaderSchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty'),
  summary: z.string(),
  category: z.string().nullish(),
  color: z.string().nullish(),
  complexity: z.number().int().min(1).max(5).nullish(),
});

function fail(kind: ParseFailureKind, filePath: string, message: string): LoadResult {
  return { ok: false, failure: { kind, filePath, message } };
}

function directoryCategory(name: string): CapabilityCategory | undefined {
  const key = name.toLowerCase();
  return Object.hasOwn(DIRECTORY_CATEGORIES, key) ? DIRECTORY_CATEGORIES[key] : undefined;
}

export function categoryFor(filePath: string, sourceRoot: string, headerCategory?: string): CapabilityCategory {
  const parts = relative(sourceRoot, filePath).split(sep);
  if (parts.length > 1) {
    const mapped = directoryCategory(parts[0]);
    if (mapped) return mapped;
  }
  if (headerCategory) {
    const key = headerCategory.trim().toLowerCase();
    const direct = CapabilityCategory.safeParse(key);
    if (direct.success) return direct.data;
    const mapped = directoryCategory(key);
    if (mapped) return mapped;
  }
  return 'uncategorized';
}

export function complexityFromText(text: string): number {
  for (const [level, pattern] of DIFFICULTY_KEYWORDS) {
    if (pattern.test(text)) return level;
  }
  return DEFAULT_COMPLEXITY;
}

/**
 * Parse descriptor text: a YAML header between `---` fences followed by an
 * opaque body. Never throws; every problem comes back as a ParseFailure.
 */
export function parseDescriptor(
  content: string,
  filePath: string,
  sourceRoot: string,
  classifier: CapabilityClassifier,
): LoadResult {
  const match = content.match(HEADER_PATTERN);
  if (!match) {
    return fail('missing-header', filePath, `${filePath}: no "---" delimited metadata header`);
  }

  const doc = parseDocument(match[1], { uniqueKeys: true });
  const duplicate = doc.errors.find((e) => e.code === 'DUPLICATE_KEY');
  if (duplicate) {
    return fail('duplicate-key', filePath, `${filePath}: ${duplicate.message.split('\n')[0]}`);
  }
  if (doc.errors.length > 0) {
    return fail('invalid-header', filePath, `${filePath}: ${doc.errors[0].message.split('\n')[0]}`);
  }

  let header: unknown;
  try {
    header = doc.toJS();
  } catch (err) {
    // yaml refuses to expand headers whose aliases multiply past its limit
    return fail('invalid-header', filePath, `${filePath}: ${errorMessage(err)}`);
  }
  if (!isRecord(header)) {
    return fail('invalid-header', filePath, `${filePath}: header is not a key/value mapping`);
  }

  const summary = header.summary ?? header.description;
  for (const [field, value] of [['name', header.name], ['summary', summary]] as const) {
    if (value === undefined || value === null) {
      return fail('missing-field', filePath, `${filePath}: required field "${field}" is missing`);
    }
  }

  const parsed = HeaderSchema.safeParse({ ...header, summary });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail('invalid-header', filePath, `${filePath}: field "${issue.path.join('.')}" ${issue.message}`);
  }

  const rawBody = (match[2] ?? '').trim();
  const extensions: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(header)) {
    if (!KNOWN_KEYS.has(key)) extensions[key] = value;
  }

  const { name, category, color, complexity } = parsed.data;
  const text = `${parsed.data.summary}\n${rawBody}`;

  return {
    ok: true,
    descriptor: {
      name,
      summary: parsed.data.summary,
      category: categoryFor(filePath, sourceRoot, category ?? undefined),
      ...(color ? { color } : {}),
      techStackTags: classifier.extractTags(text),
      complexity: complexity ?? complexityFromText(text),
      sourceRoot,
      filePath,
      rawBody,
      extensions,
    },
  };
}

export function parseDescriptorFile(
  filePath: string,
  sourceRoot: string,
  classifier: CapabilityClassifier,
): LoadResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return fail('unreadable', filePath, `${filePath}: ${errorMessage(err)}`);
  }
  return parseDescriptor(content, filePath, sourceRoot, classifier);
}
