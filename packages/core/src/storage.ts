import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import type { z } from 'zod';
import { CorruptStoreError, errorMessage } from './errors.js';
import { isRecord } from './utils.js';

export type StoreFile = 'primary' | 'backup';

const RENAME_ATTEMPTS = 5;
const RENAME_BACKOFF_MS = 50;
const LOCKED_FILE_CODES = new Set(['EPERM', 'EACCES', 'EBUSY']);

function sleepSync(ms: number): void {
  const until = Date.now() + ms;
  while (Date.now() < until) {
    // busy wait: the store is synchronous end to end
  }
}

/**
 * A zod-validated JSON file. Writes go to `<file>.tmp`, copy the current file
 * to `<file>.backup`, then rename the temp file over the target.
 *
 * Unlike a plain cache, a file that fails to parse is never replaced by the
 * default, and neither is a missing file whose backup is still on disk:
 * `read()` throws and the caller decides whether the backup is an acceptable
 * stand-in.
 */
export class JsonStore<T> {
  private data: T | null = null;
  readonly filePath: string;
  readonly backupPath: string;

  constructor(
    private readonly dir: string,
    fileName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly defaultData: () => T,
  ) {
    this.filePath = join(dir, fileName);
    this.backupPath = `${this.filePath}.backup`;
  }

  read(): T {
    if (this.data) return this.data;
    if (!existsSync(this.filePath)) {
      // Writes never remove the primary file, so a lone backup means it was lost.
      if (existsSync(this.backupPath)) {
        throw new CorruptStoreError(this.filePath, `file is missing but ${this.backupPath} exists`);
      }
      this.data = this.defaultData();
      return this.data;
    }
    this.data = this.parse(this.readRaw('primary'), this.filePath);
    return this.data;
  }

  /** Last-known-good copy, or null when no backup has been written yet. */
  readBackup(): T | null {
    if (!existsSync(this.backupPath)) return null;
    return this.parse(this.readRaw('backup'), this.backupPath);
  }

  /** Parsed JSON without schema validation; undefined when the file is absent. */
  readRaw(which: StoreFile): unknown {
    const path = which === 'primary' ? this.filePath : this.backupPath;
    if (!existsSync(path)) return undefined;
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new CorruptStoreError(path, errorMessage(err));
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new CorruptStoreError(path, `invalid JSON (${errorMessage(err)})`);
    }
  }

  write(data: T): void {
    this.data = data;
    if (!existsSync(this.dir)) mkdirSync(this.dir, { recursive: true });

    const tmpPath = `${this.filePath}.tmp`;
    const content = JSON.stringify(data, null, 2);
    writeFileSync(tmpPath, content, 'utf-8');

    // The copy taken here is what readBackup() serves as last-known-good.
    if (existsSync(this.filePath)) copyFileSync(this.filePath, this.backupPath);

    if (!this.atomicRename(tmpPath, this.filePath)) {
      writeFileSync(this.filePath, content, 'utf-8');
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    }
  }

  invalidate(): void {
    this.data = null;
  }

  private parse(raw: unknown, path: string): T {
    const result = this.schema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new CorruptStoreError(path, `schema mismatch (${detail})`);
    }
    return result.data;
  }

  // Windows may hold the target open (editors, indexers); those renames are retried with a growing wait.
  private atomicRename(src: string, dest: string): boolean {
    for (let attempt = 1; attempt <= RENAME_ATTEMPTS; attempt++) {
      try {
        renameSync(src, dest);
        return true;
      } catch (err: unknown) {
        const code = isRecord(err) ? err.code : undefined;
        if (typeof code !== 'string' || !LOCKED_FILE_CODES.has(code)) return false;
        if (attempt < RENAME_ATTEMPTS) sleepSync(RENAME_BACKOFF_MS * attempt);
      }
    }
    return false;
  }
}
