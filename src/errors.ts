export class NamespaceNotFoundError extends Error {
  public readonly namespace: string;

  constructor(namespace: string) {
    super(`namespace not found: ${namespace}`);
    this.name = 'NamespaceNotFoundError';
    this.namespace = namespace;
  }
}

/** Malformed or unroutable event. The event is dropped; other events are unaffected. */
export class ProtocolError extends Error {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ProtocolError';
    this.details = details;
  }
}

export class TimeoutError extends Error {
  public readonly stage: string;
  public readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number) {
    super(`${stage} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

export class AbortedError extends Error {
  constructor(reason = 'aborted') {
    super(reason);
    this.name = 'AbortedError';
  }
}

const TRANSIENT_NODE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Connection-level failures and the PostgreSQL SQLSTATE classes that clear up on
 * their own (08 connection exception, 53 insufficient resources, 57P operator
 * intervention, 40001 serialization failure).
 */
export function isTransientStorageError(error: unknown): boolean {
  const code = errorCode(error);
  if (code) {
    if (TRANSIENT_NODE_CODES.has(code)) return true;
    if (code.startsWith('08') || code.startsWith('53') || code.startsWith('57P')) return true;
    if (code === '40001' || code === '40P01') return true;
    return false;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return (
    message.includes('connection terminated') ||
    message.includes('timeout exceeded when trying to connect') ||
    message.includes('connection refused')
  );
}

/** True when the error says the store cannot be reached at all, not just a single write. */
export function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code) {
    return TRANSIENT_NODE_CODES.has(code) || code.startsWith('08');
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return message.includes('connection terminated') || message.includes('connection refused');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
