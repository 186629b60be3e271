import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { defaultClassifier } from '../../recommend/classifier.js';
import { categoryFor, complexityFromText, parseDescriptor, parseDescriptorFile } from '../loader.js';

const ROOT = join('/', 'agents');

function parse(content: string, relPath = 'development/sample.md') {
  return parseDescriptor(content, join(ROOT, relPath), ROOT, defaultClassifier);
}

function header(lines: string[], body = ''): string {
  return ['---', ...lines, '---', body].join('\n');
}

// Each level is a list of nine aliases to the level before it.
function aliasChain(levels: number): string[] {
  const lines = ['l0: &l0 [x, x, x, x, x, x, x, x, x]'];
  for (let i = 1; i < levels; i++) {
    lines.push(`l${i}: &l${i} [${new Array<string>(9).fill(`*l${i - 1}`).join(', ')}]`);
  }
  return lines;
}

describe('parseDescriptor', () => {
  it('builds a descriptor from header and body', () => {
    const result = parse(
      header(
        ['name: python-elite', 'description: Battle-tested Python expert for FastAPI backends', 'color: blue', 'model: opus'],
        'You write Python services.\n',
      ),
      'development/python-elite.md',
    );

    expect(result).toEqual({
      ok: true,
      descriptor: {
        name: 'python-elite',
        summary: 'Battle-tested Python expert for FastAPI backends',
        category: 'development',
        color: 'blue',
        techStackTags: ['python'],
        complexity: 5,
        sourceRoot: ROOT,
        filePath: join(ROOT, 'development', 'python-elite.md'),
        rawBody: 'You write Python services.',
        extensions: { model: 'opus' },
      },
    });
  });

  it('prefers summary over description when both are present', () => {
    const result = parse(header(['name: a', 'summary: short', 'description: long']));
    expect(result.ok && result.descriptor.summary).toBe('short');
  });

  it('accepts CRLF line endings', () => {
    const result = parse('---\r\nname: a\r\nsummary: b\r\n---\r\nbody');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.descriptor.name).toBe('a');
    expect(result.descriptor.summary).toBe('b');
    expect(result.descriptor.rawBody).toBe('body');
  });

  it('accepts a file that is only a header', () => {
    const result = parse('---\nname: a\nsummary: b\n---');
    expect(result.ok && result.descriptor.rawBody).toBe('');
  });

  it('reports a missing header', () => {
    const result = parse('# Just a heading\n\nNo metadata here.');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('missing-header');
    expect(result.failure.filePath).toBe(join(ROOT, 'development', 'sample.md'));
  });

  it('reports duplicate keys', () => {
    const result = parse(header(['name: a', 'name: b', 'summary: x']));
    expect(!result.ok && result.failure.kind).toBe('duplicate-key');
  });

  it('reports a header that is not a mapping', () => {
    const result = parse(header(['- one', '- two']));
    expect(!result.ok && result.failure.kind).toBe('invalid-header');
  });

  it('reports a header whose aliases expand too far', () => {
    const result = parse(header(['name: bomb', 'summary: x', ...aliasChain(9)]));
    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'invalid-header',
        filePath: join(ROOT, 'development', 'sample.md'),
        message: `${join(ROOT, 'development', 'sample.md')}: Excessive alias count indicates a resource exhaustion attack`,
      },
    });
  });

  it('reports a missing name', () => {
    const result = parse(header(['summary: x']));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('missing-field');
    expect(result.failure.message).toContain('"name"');
  });

  it('reports a missing summary', () => {
    const result = parse(header(['name: x']));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('missing-field');
    expect(result.failure.message).toContain('"summary"');
  });

  it('rejects a non-string name', () => {
    const result = parse(header(['name: 42', 'summary: x']));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('invalid-header');
    expect(result.failure.message).toContain('"name"');
  });

  it('rejects an out-of-range complexity', () => {
    const result = parse(header(['name: a', 'summary: b', 'complexity: 9']));
    expect(!result.ok && result.failure.kind).toBe('invalid-header');
  });

  it('uses a header complexity over keywords', () => {
    const result = parse(header(['name: a', 'summary: Elite guru', 'complexity: 2']));
    expect(result.ok && result.descriptor.complexity).toBe(2);
  });

  it('leaves out a color that YAML reads as empty', () => {
    const result = parse(header(['name: a', 'summary: b', 'color: #fff']));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.descriptor).not.toHaveProperty('color');
  });
});

describe('parseDescriptorFile', () => {
  it('reports an unreadable file instead of throwing', () => {
    const missing = join(ROOT, 'does-not-exist.md');
    const result = parseDescriptorFile(missing, ROOT, defaultClassifier);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('unreadable');
    expect(result.failure.filePath).toBe(missing);
  });
});

describe('categoryFor', () => {
  it('maps the first directory under the root', () => {
    expect(categoryFor(join(ROOT, 'quality-assurance', 'x.md'), ROOT)).toBe('quality');
    expect(categoryFor(join(ROOT, 'conductor', 'nested', 'x.md'), ROOT)).toBe('coordination');
  });

  it('lets the directory win over the header', () => {
    expect(categoryFor(join(ROOT, 'security', 'x.md'), ROOT, 'data')).toBe('security');
  });

  it('falls back to the header for files at the root', () => {
    expect(categoryFor(join(ROOT, 'x.md'), ROOT, 'Security')).toBe('security');
    expect(categoryFor(join(ROOT, 'x.md'), ROOT, 'data-ai')).toBe('data');
  });

  it('falls back to uncategorized', () => {
    expect(categoryFor(join(ROOT, 'x.md'), ROOT, 'marketing')).toBe('uncategorized');
    expect(categoryFor(join(ROOT, 'misc', 'x.md'), ROOT)).toBe('uncategorized');
    expect(categoryFor(join(ROOT, 'x.md'), ROOT)).toBe('uncategorized');
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(categoryFor(join(ROOT, 'constructor', 'x.md'), ROOT)).toBe('uncategorized');
    expect(categoryFor(join(ROOT, 'x.md'), ROOT, 'toString')).toBe('uncategorized');
  });
});

describe('complexityFromText', () => {
  it('reads difficulty keywords, hardest first', () => {
    expect(complexityFromText('An elite senior reviewer')).toBe(5);
    expect(complexityFromText('Senior backend architect')).toBe(4);
    expect(complexityFromText('A simple formatter')).toBe(1);
  });

  it('defaults to the middle', () => {
    expect(complexityFromText('Writes release notes')).toBe(3);
  });
});
