/**
 * Error taxonomy for the relay and the helpers that render errors into log lines.
 *
 * Transient errors (timeouts, connection failures, 5xx, 408, 429) are retried by
 * the forwarder; everything else aborts the hop after a single attempt.
 */

export type ErrorKind = 'transient' | 'non_transient' | 'local';

export class RelayError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
    this.kind = kind;
  }
}

export class HttpError extends RelayError {
  readonly status: number;
  readonly url: string;
  readonly responseText?: string;

  constructor(args: { status: number; url: string; message: string; responseText?: string }) {
    super(args.message, isTransientStatus(args.status) ? 'transient' : 'non_transient');
    this.name = 'HttpError';
    this.status = args.status;
    this.url = args.url;
    this.responseText = args.responseText;
  }
}

export class TimeoutError extends RelayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, what = 'operation') {
    super(`${what} timed out after ${timeoutMs}ms`, 'transient');
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkError extends RelayError {
  readonly url: string;

  constructor(url: string, options: { cause: unknown }) {
    super(`request to ${url} failed: ${describeCause(options.cause)}`, 'transient', options);
    this.name = 'NetworkError';
    this.url = url;
  }
}

/** The remote answered, but not with something we can use. Retrying won't help. */
export class SchemaError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'non_transient', options);
    this.name = 'SchemaError';
  }
}

/** Filesystem or image decoding failure on this machine. */
export class LocalError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'local', options);
    this.name = 'LocalError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InvalidTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

// ==========================================
// CLASSIFICATION
// ==========================================

export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export function classifyError(error: unknown): 'transient' | 'non_transient' {
  if (error instanceof RelayError) {
    return error.kind === 'transient' ? 'transient' : 'non_transient';
  }
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'transient';
    const code = readString(error, 'code') ?? readString(error.cause, 'code');
    if (code && TRANSIENT_CODES.has(code)) return 'transient';
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('fetch failed') ||
      message.includes('other side closed') ||
      message.includes('socket')
    ) {
      return 'transient';
    }
  }
  return 'non_transient';
}

// ==========================================
// FORMATTING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : undefined;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = readString(cause, 'code') ?? readString(cause.cause, 'code');
    return code ? `${cause.message} (${code})` : cause.message;
  }
  return String(cause);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    const code = readString(error, 'code');
    if (code) parts.push(`code=${code}`);
    if (error instanceof HttpError) {
      parts.push(`status=${error.status}`);
      if (error.responseText) parts.push(`response=${error.responseText.slice(0, 200)}`);
    }
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}

/** Short message suitable for storing on a record or returning over HTTP. */
export function errorMessage(error: unknown): string {
  if (error instanceof HttpError) return `${error.message} from ${error.url}`;
  if (error instanceof Error) return error.message;
  return safeStringify(error);
}
