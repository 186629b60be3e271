export type SquadkitErrorCode =
  | 'UNKNOWN_CAPABILITY'
  | 'CORRUPT_LEDGER'
  | 'INVALID_EVENT'
  | 'INVALID_CONFIG'
  | 'CORRUPT_STORE';

export class SquadkitError extends Error {
  constructor(
    readonly code: SquadkitErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownCapabilityError extends SquadkitError {
  constructor(readonly capabilityName: string) {
    super('UNKNOWN_CAPABILITY', `Unknown capability "${capabilityName}": not found in any search root and never recorded`);
  }
}

export class CorruptLedgerError extends SquadkitError {
  constructor(
    readonly filePath: string,
    readonly issues: string[],
  ) {
    super(
      'CORRUPT_LEDGER',
      `Ledger ${filePath} failed verification (${issues.join('; ')}). Run a rebuild before recording more events.`,
    );
  }
}

export class InvalidEventError extends SquadkitError {
  constructor(readonly issues: string[]) {
    super('INVALID_EVENT', `Invalid event: ${issues.join('; ')}`);
  }
}

export class ConfigError extends SquadkitError {
  constructor(
    readonly filePath: string,
    reason: string,
  ) {
    super('INVALID_CONFIG', `Invalid config ${filePath}: ${reason}`);
  }
}

export class CorruptStoreError extends SquadkitError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
  ) {
    super('CORRUPT_STORE', `Cannot read ${filePath}: ${reason}`);
  }
}

/** Parse failures are values: the registry collects them instead of aborting a scan. */
export type ParseFailureKind = 'unreadable' | 'missing-header' | 'invalid-header' | 'duplicate-key' | 'missing-field';

export interface ParseFailure {
  kind: ParseFailureKind;
  filePath: string;
  message: string;
}

export interface PredicateFailure {
  achievementKey: string;
  capabilityName: string;
  message: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
