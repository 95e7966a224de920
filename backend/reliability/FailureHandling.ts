import crypto from 'crypto';

import { createLogger } from '../logging/Logger';
import { telemetry } from '../telemetry/Telemetry';
import { asDomainError, type DomainErrorCode } from './DomainError';

export type PublicApiError = {
  errorId: string;
  code: DomainErrorCode;
  message: string;
  retryable: boolean;
};

export type ApiErrorResponse = {
  success: false;
  errorMessage: string;
  error: PublicApiError;
};

export type MappedApiError = {
  status: number;
  body: ApiErrorResponse;
};

type ErrorPolicy = {
  status: number;
  /** Fixed client message; when absent the error's own message is shown. */
  publicMessage?: string;
  fallbackMessage: string;
};

// Driver and programming errors keep their text in the server log only.
const POLICIES = {
  VALIDATION_ERROR: { status: 400, fallbackMessage: 'Invalid request.' },
  NOT_FOUND: { status: 404, fallbackMessage: 'Requested resource not found.' },
  ILLEGAL_STATE: {
    status: 500,
    fallbackMessage: 'Server is in an inconsistent state.',
  },
  DATABASE_UNAVAILABLE: {
    status: 503,
    publicMessage: 'Database unavailable. Please retry later.',
    fallbackMessage: 'Database unavailable. Please retry later.',
  },
  UNKNOWN_ERROR: {
    status: 500,
    publicMessage: 'Unexpected error.',
    fallbackMessage: 'Unexpected error.',
  },
} satisfies Record<DomainErrorCode, ErrorPolicy>;

const log = createLogger('api');

/**
 * Turns any thrown value into the API error envelope. Each call gets an
 * error id that ties the client response to the server log line.
 */
export function mapErrorToApiResponse(
  err: unknown,
  context: { operation: string },
): MappedApiError {
  const errorId = crypto.randomUUID();
  const domain = asDomainError(err);
  const policy: ErrorPolicy = POLICIES[domain.code];

  telemetry.record({
    name: 'api.error',
    durationMs: 0,
    tags: { operation: context.operation, code: domain.code, errorId },
  });

  log.error(domain.message, {
    errorId,
    operation: context.operation,
    code: domain.code,
    retryable: domain.retryable,
    details: domain.details,
    stack: domain.stack,
  });

  const message =
    policy.publicMessage ?? (domain.message || policy.fallbackMessage);

  return {
    status: policy.status,
    body: {
      success: false,
      errorMessage: message,
      error: { errorId, code: domain.code, message, retryable: domain.retryable },
    },
  };
}
