/**
 * Error names that mean the caller has no usable AWS credentials. The SDK raises
 * `CredentialsProviderError` before a request is signed; the rest come back from
 * the service when the presented credentials are rejected.
 */
const CREDENTIALS_ERROR_NAMES = new Set([
  'CredentialsProviderError',
  'UnrecognizedClientException',
  'InvalidClientTokenId',
  'ExpiredTokenException',
  'ExpiredToken',
  'MissingAuthenticationToken',
]);

/**
 * Raised inside a run for conditions that abort the whole batch rather than a
 * single item. Services catch it at their `run` boundary.
 */
export class FatalRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalRunError';
  }
}

interface ErrorLike {
  name: string;
  message: string;
}

/**
 * Matches errors by shape rather than prototype: errors raised by Node internals
 * or another VM context are not `instanceof` this realm's `Error`.
 */
function isErrorLike(error: unknown): error is ErrorLike {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    typeof error.name === 'string' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function isCredentialsError(error: unknown): boolean {
  return isErrorLike(error) && CREDENTIALS_ERROR_NAMES.has(error.name);
}

export function describeError(error: unknown): string {
  if (isErrorLike(error)) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}

/** Node's `ENOENT` and friends, without widening to `any`. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
