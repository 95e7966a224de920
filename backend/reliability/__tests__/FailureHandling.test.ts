import { DomainError, illegalState, notFound, validationError } from '../DomainError';
import { mapErrorToApiResponse } from '../FailureHandling';

describe('mapErrorToApiResponse', () => {
  let errorLog: jest.SpyInstance;

  beforeEach(() => {
    errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test.each([
    [validationError('Bad input.'), 400, 'Bad input.'],
    [notFound('No such thing.'), 404, 'No such thing.'],
    [illegalState('No profile.'), 500, 'No profile.'],
    [
      new DomainError({
        code: 'DATABASE_UNAVAILABLE',
        message: 'Neo4j unavailable during run: connection refused',
        retryable: true,
      }),
      503,
      'Database unavailable. Please retry later.',
    ],
  ])('maps %p', (err, status, message) => {
    const mapped = mapErrorToApiResponse(err, { operation: 'test' });

    expect(mapped.status).toBe(status);
    expect(mapped.body.errorMessage).toBe(message);
    expect(mapped.body.error.message).toBe(message);
    expect(mapped.body.error.code).toBe(err.code);
  });

  test('hides the message of unexpected errors', () => {
    const mapped = mapErrorToApiResponse(new TypeError('x is undefined'), {
      operation: 'test',
    });

    expect(mapped.status).toBe(500);
    expect(mapped.body).toMatchObject({
      success: false,
      errorMessage: 'Unexpected error.',
      error: { code: 'UNKNOWN_ERROR', retryable: false },
    });
  });

  test('logs the original message under the public error id', () => {
    const mapped = mapErrorToApiResponse(new Error('disk on fire'), {
      operation: 'rules.index',
    });

    expect(errorLog).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(errorLog.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'error',
      logger: 'api',
      message: 'disk on fire',
      errorId: mapped.body.error.errorId,
      operation: 'rules.index',
      code: 'UNKNOWN_ERROR',
    });
  });
});
