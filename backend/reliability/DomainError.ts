export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'ILLEGAL_STATE'
  | 'DATABASE_UNAVAILABLE'
  | 'UNKNOWN_ERROR';

export type DomainErrorDetails = Record<string, unknown>;

const RETRYABLE_CODES: ReadonlySet<DomainErrorCode> = new Set([
  'DATABASE_UNAVAILABLE',
]);

/**
 * Failure carrying a stable code. The code decides the HTTP status and
 * whether the message may be shown to API clients.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: DomainErrorDetails;
  readonly cause?: unknown;
  readonly retryable: boolean;

  constructor(args: {
    code: DomainErrorCode;
    message: string;
    details?: DomainErrorDetails;
    retryable?: boolean;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = 'DomainError';
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
    this.retryable = args.retryable ?? RETRYABLE_CODES.has(args.code);
  }
}

export const isDomainError = (err: unknown): err is DomainError =>
  err instanceof DomainError;

/** Wraps anything thrown into an `UNKNOWN_ERROR` unless it already is a DomainError. */
export const asDomainError = (err: unknown): DomainError =>
  isDomainError(err)
    ? err
    : new DomainError({
        code: 'UNKNOWN_ERROR',
        message: err instanceof Error ? err.message : String(err),
        cause: err,
      });

const factory =
  (code: DomainErrorCode) =>
  (message: string, details?: DomainErrorDetails): DomainError =>
    new DomainError({ code, message, details });

export const validationError = factory('VALIDATION_ERROR');
export const notFound = factory('NOT_FOUND');
export const illegalState = factory('ILLEGAL_STATE');
