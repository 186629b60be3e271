import { resolve } from 'node:path';
import { type Logger, SquadKit, type SquadKitOptions, createLogger } from '@squadkit/core';
import { InvalidArgumentError } from 'commander';

export interface ProjectOption {
  project: string;
  verbose?: boolean;
}

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`"${value}" is not an integer.`);
  return n;
}

export function parsePositiveInteger(value: string): number {
  const n = parseInteger(value);
  if (n < 1) throw new InvalidArgumentError(`"${value}" must be at least 1.`);
  return n;
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || Number.isNaN(n)) throw new InvalidArgumentError(`"${value}" is not a number.`);
  return n;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

function cliLogger(opts: ProjectOption): Logger | undefined {
  return opts.verbose ? createLogger('squadkit', { level: 'debug' }) : undefined;
}

export function openProject(opts: ProjectOption, extra: SquadKitOptions = {}): SquadKit {
  const logger = cliLogger(opts);
  return SquadKit.open(resolve(opts.project), { ...(logger ? { logger } : {}), ...extra });
}
