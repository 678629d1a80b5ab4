export class TrackingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TrackingError';
  }
}

/**
 * The history file exists but is not a readable history document. Fatal: running on an
 * assumed-empty history would flag every known posting as new again.
 */
export class CorruptHistoryError extends TrackingError {
  readonly path: string;

  constructor(path: string, detail: string, options?: ErrorOptions) {
    super(`History file ${path} is corrupt: ${detail}`, options);
    this.name = 'CorruptHistoryError';
    this.path = path;
  }
}

export type PostingField = 'title' | 'company';

export class InvalidPostingError extends TrackingError {
  readonly index: number;
  readonly field: PostingField;

  constructor(index: number, field: PostingField) {
    super(`Posting #${index} has no ${field}`);
    this.name = 'InvalidPostingError';
    this.index = index;
    this.field = field;
  }
}

export class PersistenceError extends TrackingError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
    this.path = path;
  }
}

export class ConcurrentRunError extends TrackingError {
  readonly lockPath: string;
  readonly holder?: string;

  constructor(lockPath: string, holder?: string) {
    super(`Another run holds ${lockPath}${holder ? ` (owner ${holder})` : ''}`);
    this.name = 'ConcurrentRunError';
    this.lockPath = lockPath;
    this.holder = holder;
  }
}

export type FatalTrackingError = CorruptHistoryError | PersistenceError | ConcurrentRunError;

/**
 * Store-level failures. The run stops before the history file is replaced.
 */
export function isFatalTrackingError(error: unknown): error is FatalTrackingError {
  return (
    error instanceof CorruptHistoryError || error instanceof PersistenceError || error instanceof ConcurrentRunError
  );
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
