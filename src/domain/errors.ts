export type LedgerErrorCode = 'INVALID_RATE' | 'INVALID_ENTRY' | 'PERSISTENCE';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Negative or non-numeric base rate / tip rate */
export class InvalidRateError extends LedgerError {
  constructor(message: string) {
    super('INVALID_RATE', message);
  }
}

/** Non-positive hours, or an entry aimed at a closed period */
export class InvalidEntryError extends LedgerError {
  constructor(message: string) {
    super('INVALID_ENTRY', message);
  }
}

/**
 * A durable write failed. The ledger is back at its pre-call state when this is
 * thrown, so the caller may simply retry.
 */
export class PersistenceError extends LedgerError {
  readonly operation: string;

  constructor(operation: string, cause: string) {
    super('PERSISTENCE', `Failed to ${operation}: ${cause}`);
    this.operation = operation;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
