// Typed failures raised by the engine, the strategies and the PE helpers.
// Each carries a stable string code so callers (and reports) can branch without parsing messages.

export type EvasionErrorCode =
  | 'INVALID_FORMAT'
  | 'ORACLE_FAILURE'
  | 'REBUILD_FAILED'
  | 'CORPUS_EXHAUSTED'
  | 'INVALID_OPTIONS'
  | 'INVALID_CONFIG';

export class EvasionError extends Error {
  readonly code: EvasionErrorCode;
  readonly cause?: unknown;

  constructor(code: EvasionErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'EvasionError';
    this.code = code;
    this.cause = cause;
  }
}

// Header pointer or section table inconsistent with the file bounds
export class InvalidFormatError extends EvasionError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_FORMAT', message, cause);
    this.name = 'InvalidFormatError';
  }
}

export class OracleError extends EvasionError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, cause?: unknown) {
    super('ORACLE_FAILURE', message, cause);
    this.name = 'OracleError';
    this.retryable = retryable;
  }
}

export class RebuildError extends EvasionError {
  constructor(message: string, cause?: unknown) {
    super('REBUILD_FAILED', message, cause);
    this.name = 'RebuildError';
  }
}

export class CorpusExhaustedError extends EvasionError {
  readonly available: number;
  readonly required: number;

  constructor(available: number, required: number) {
    super('CORPUS_EXHAUSTED', `Section corpus holds ${available} entries, ${required} required`);
    this.name = 'CorpusExhaustedError';
    this.available = available;
    this.required = required;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
