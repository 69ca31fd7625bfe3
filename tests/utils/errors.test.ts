import {
  AuthError,
  errorForOutcome,
  errorForStatus,
  NotFoundError,
  PayloadTooLargeError,
  TransientServiceError,
  UnexpectedStatusError,
} from '../../src/utils/errors';

const STATUS_CASES: Array<[number, new (...args: never[]) => Error, string]> = [
  [401, AuthError, 'Upload: invalid credentials (401)'],
  [403, AuthError, 'Upload: permission denied (403)'],
  [404, NotFoundError, 'Upload: resource not found (404)'],
  [413, PayloadTooLargeError, 'Upload: payload too large (413)'],
  [429, TransientServiceError, 'Upload: service unavailable (429)'],
  [504, TransientServiceError, 'Upload: service unavailable (504)'],
  [400, UnexpectedStatusError, 'Upload: unexpected status 400'],
];

describe('errorForStatus', () => {
  test.each(STATUS_CASES)('maps %i', (status, type, message) => {
    const error = errorForStatus(status, 'body', 'Upload');

    expect(error).toBeInstanceOf(type);
    expect(error.message).toBe(message);
    expect(error.statusCode).toBe(status);
    expect(error.responseBody).toBe('body');
  });
});

describe('errorForOutcome', () => {
  test('success has no error', () => {
    expect(errorForOutcome({ kind: 'success', statusCode: 200, remoteId: null, attempts: 1 }, 'a.pdf')).toBeNull();
  });

  test('exhausted transport failures keep no status code', () => {
    const error = errorForOutcome(
      { kind: 'retryable', statusCode: null, message: 'Transport error: ECONNRESET', body: '', attempts: 7 },
      'a.pdf'
    );

    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error?.message).toBe('Upload of a.pdf failed after 7 attempts: Transport error: ECONNRESET');
    expect(error?.statusCode).toBeUndefined();
  });
});
