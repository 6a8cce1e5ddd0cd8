/**
 * Resilient store error taxonomy
 *
 * - MalformedDescriptorError: bad connection string, raised at construction
 * - TransportConfigError: TLS material cannot be loaded
 * - TransientStoreError: connection-level failure, triggers reconnect + retry
 * - ReconnectionExhaustedError: a reconnection episode hit a fatal condition
 * - StoreClosedError / ValueEncodingError: application-level, never retried
 */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedDescriptorError extends StoreError {}

export class TransportConfigError extends StoreError {}

export class TransientStoreError extends StoreError {}

export class PrimaryNotFoundError extends TransientStoreError {
  constructor(
    readonly groupName: string,
    readonly failures: unknown[] = [],
  ) {
    super(`No primary found for group '${groupName}'`, {
      cause: failures.length > 0 ? failures[failures.length - 1] : undefined,
    });
  }
}

export class ReconnectionExhaustedError extends StoreError {}

export class StoreClosedError extends StoreError {
  constructor() {
    super('Store is closed');
  }
}

export class ValueEncodingError extends StoreError {}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

const CONNECTION_MESSAGES = [
  'Connection is closed',
  "Stream isn't writeable",
  'Command timed out',
];

// Replies a demoted or recovering primary sends during failover
const FAILOVER_REPLY = /^(READONLY|LOADING|MASTERDOWN)\b/;

const AUTH_REPLY = /^(WRONGPASS|NOAUTH)\b/;

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Connection-level failures (network, timeout, transport, failover) that a
 * reconnect can cure. Application-level errors return false.
 */
export function isTransientStoreError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error instanceof TransientStoreError) {
    return true;
  }
  if (error instanceof StoreError) {
    return false;
  }

  const code = errorCode(error);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }

  if (error.name === 'MaxRetriesPerRequestError') {
    return true;
  }

  return (
    FAILOVER_REPLY.test(error.message) ||
    CONNECTION_MESSAGES.some((message) => error.message.includes(message))
  );
}

/**
 * Configuration-class failures: retrying cannot fix them, so a reconnection
 * episode gives up instead of looping forever.
 */
export function isFatalStoreError(error: unknown): boolean {
  if (
    error instanceof TransportConfigError ||
    error instanceof MalformedDescriptorError ||
    error instanceof StoreClosedError
  ) {
    return true;
  }
  return error instanceof Error && AUTH_REPLY.test(error.message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
