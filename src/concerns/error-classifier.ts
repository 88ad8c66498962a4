import { toAwsErrorLike, OperationNotFoundError, ClientUnavailableError, OperationTimeoutError } from '../errors.js';

export type CallErrorKind =
  | 'throttling'
  | 'connectivity'
  | 'timeout'
  | 'permission'
  | 'operation-absent'
  | 'unexpected';

export interface CallErrorClassification {
  kind: CallErrorKind;
  code: string;
  message: string;
  notAvailable: boolean;
  expected: boolean;
}

const THROTTLING_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'SlowDown',
  'ServiceUnavailable',
  'RequestThrottled',
  'RequestThrottledException',
  'ProvisionedThroughputExceededException'
]);

const PERMISSION_CODES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'UnauthorizedOperation',
  'Forbidden'
]);

const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'UnknownEndpoint',
  'EndpointConnectionError',
  'NetworkingError'
]);

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'TimeoutError',
  'RequestTimeout',
  'ConnectTimeout',
  'ReadTimeout'
]);

const EXPECTED_MESSAGES = [
  'unable to locate authorization token',
  'has no attribute',
  'operation not found',
  'not implemented',
  'service not available'
];

function isExpectedMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return EXPECTED_MESSAGES.some((pattern) => lower.includes(pattern));
}

/**
 * Maps an SDK or local failure to the inventory's error classes.
 *
 * Connectivity and timeout failures are reported under the
 * `EndpointNotAvailable` code so persisted envelopes read the same
 * whichever transport error caused them.
 */
export class CallErrorClassifier {
  static classify(error: unknown): CallErrorClassification {
    const awsErr = toAwsErrorLike(error);
    const code = awsErr.code ?? awsErr.Code ?? awsErr.name ?? 'UnknownError';
    const message = awsErr.message ?? String(error);

    if (error instanceof OperationNotFoundError || error instanceof ClientUnavailableError) {
      return { kind: 'operation-absent', code: error.code ?? code, message, notAvailable: true, expected: true };
    }

    if (error instanceof OperationTimeoutError || TIMEOUT_CODES.has(code)) {
      return { kind: 'timeout', code: 'EndpointNotAvailable', message, notAvailable: true, expected: true };
    }

    if (CONNECTIVITY_CODES.has(code)) {
      return { kind: 'connectivity', code: 'EndpointNotAvailable', message, notAvailable: true, expected: true };
    }

    if (THROTTLING_CODES.has(code) || awsErr.$metadata?.httpStatusCode === 429) {
      return { kind: 'throttling', code, message, notAvailable: false, expected: true };
    }

    if (PERMISSION_CODES.has(code) || awsErr.$metadata?.httpStatusCode === 403) {
      return { kind: 'permission', code, message, notAvailable: false, expected: true };
    }

    return { kind: 'unexpected', code, message, notAvailable: false, expected: isExpectedMessage(message) };
  }

  static isThrottling(error: unknown): boolean {
    return this.classify(error).kind === 'throttling';
  }
}
