import {
  getErrorCatalogEntry,
  getUnknownErrorCatalogEntry,
  type AssemblerErrorCode,
  type ErrorCatalogEntry,
  type NumericErrorCode
} from './error-catalog.js';

export type { AssemblerErrorCode, ErrorCatalogEntry, NumericErrorCode } from './error-catalog.js';

export interface Failure {
  error: AssemblerErrorCode;
  detail?: string;
}

// Per-line analysis never throws for bad input; it returns one of these.
export type Outcome<T> = { value: T } | Failure;

export function fail(error: AssemblerErrorCode, detail?: string): Failure {
  return detail === undefined ? { error } : { error, detail };
}

export function isFailure<T>(outcome: Outcome<T>): outcome is Failure {
  return 'error' in outcome;
}

export function formatErrorMessage(code: AssemblerErrorCode, detail?: string): string {
  const entry = getErrorCatalogEntry(code);
  return detail === undefined || detail.length === 0 ? entry.message : `${entry.message}: ${detail}`;
}

/**
 * A condition that stops the whole run. Thrown from the pass drivers and turned into a
 * single fatal diagnostic by the orchestrator.
 */
export class AssemblerError extends Error {
  readonly code: AssemblerErrorCode;

  readonly detail?: string;

  readonly line?: number;

  constructor(code: AssemblerErrorCode, detail?: string, line?: number) {
    super(formatErrorMessage(code, detail));
    this.name = 'AssemblerError';
    this.code = code;
    this.detail = detail;
    this.line = line;
  }

  getCatalogEntry(): ErrorCatalogEntry {
    return getErrorCatalogEntry(this.code);
  }

  getNumericCode(): NumericErrorCode {
    return this.getCatalogEntry().numericCode;
  }

  toDisplayString(): string {
    return `${this.message} (${this.getNumericCode()})`;
  }
}

// Internal inconsistency between the passes or misuse of the phase order.
export class AssemblyStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssemblyStateError';
  }
}

export function asDisplayError(error: unknown): string {
  if (error instanceof AssemblerError) {
    return error.toDisplayString();
  }
  const unknownEntry = getUnknownErrorCatalogEntry();
  if (error instanceof Error) {
    const message = error.message.length > 0 ? error.message : unknownEntry.message;
    return `${message} (${unknownEntry.numericCode})`;
  }
  return `${unknownEntry.message} (${unknownEntry.numericCode})`;
}
