import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/** Resolve a configured root: `~` is the home directory, relative paths hang off the project. */
export function resolveRoot(projectRoot: string, root: string): string {
  if (root === '~') return homedir();
  if (root.startsWith('~/')) return join(homedir(), root.slice(2));
  return isAbsolute(root) ? root : resolve(projectRoot, root);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
