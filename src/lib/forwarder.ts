/**
 * Retrying Forwarder - bounded retries around a single network operation
 *
 * Features:
 * - Per-attempt timeout enforced here, independent of the operation honouring its signal
 * - Transient failures retried with a non-decreasing backoff, capped
 * - Non-transient failures abort after one attempt
 * - One structured log record per attempt
 */

import { classifyError, errorMessage, TimeoutError } from './errors';
import { createLogger, type Logger } from './log';

// ============================================
// Types
// ============================================

export type BackoffPolicy = {
  strategy: 'fixed' | 'exponential';
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
};

export type RetryPolicy = {
  perAttemptTimeoutMs: number;
  /** Total attempts, including the first (>= 1) */
  maxAttempts: number;
  backoff?: BackoffPolicy;
};

export type ForwardOutcome<T> =
  | { kind: 'success'; value: T; attempts: number; elapsedMs: number }
  | { kind: 'exhausted'; lastError: unknown; attempts: number; elapsedMs: number }
  | { kind: 'aborted'; reason: unknown; attempts: number; elapsedMs: number };

export type AttemptOutcome = 'success' | 'retry' | 'exhausted' | 'aborted';

export type AttemptRecord = {
  stage: string;
  attempt: number;
  maxAttempts: number;
  outcome: AttemptOutcome;
  elapsedMs: number;
  error?: string;
  nextDelayMs?: number;
};

/**
 * The one capability every remote hop shares: take a typed request, return a
 * typed response or throw a classifiable error.
 */
export interface RemoteService<Req, Res> {
  readonly name: string;
  call(request: Req, signal: AbortSignal): Promise<Res>;
}

export type ForwarderOptions = {
  defaultBackoff?: BackoffPolicy;
  onAttempt?: (record: AttemptRecord) => void;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  strategy: 'exponential',
  baseDelayMs: 500,
  maxDelayMs: 6000,
};

// ============================================
// Helpers
// ============================================

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay to wait after the given (1-based) failed attempt. */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const base = Math.max(0, policy.baseDelayMs);
  const cap = Math.max(base, policy.maxDelayMs);
  if (policy.strategy === 'fixed') return Math.min(base, cap);
  return Math.min(base * Math.pow(2, Math.max(0, attempt - 1)), cap);
}

async function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  stage: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs, stage);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================
// Forwarder
// ============================================

export class RetryingForwarder {
  private defaultBackoff: BackoffPolicy;
  private onAttempt?: (record: AttemptRecord) => void;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: ForwarderOptions = {}) {
    this.defaultBackoff = options.defaultBackoff ?? DEFAULT_BACKOFF;
    this.onAttempt = options.onAttempt;
    this.logger = options.logger ?? createLogger('forward');
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Run `operation` until it succeeds, fails non-transiently, or the attempt
   * budget is spent. Never throws.
   */
  async forward<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    policy: RetryPolicy,
    stage: string
  ): Promise<ForwardOutcome<T>> {
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
    const backoff = policy.backoff ?? this.defaultBackoff;
    const started = Date.now();
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const value = await runWithTimeout(operation, policy.perAttemptTimeoutMs, stage);
        const elapsedMs = Date.now() - started;
        this.report({ stage, attempt, maxAttempts, outcome: 'success', elapsedMs });
        return { kind: 'success', value, attempts: attempt, elapsedMs };
      } catch (error) {
        lastError = error;
        const elapsedMs = Date.now() - started;

        if (classifyError(error) === 'non_transient') {
          this.report({ stage, attempt, maxAttempts, outcome: 'aborted', elapsedMs, error: errorMessage(error) });
          return { kind: 'aborted', reason: error, attempts: attempt, elapsedMs };
        }

        if (attempt === maxAttempts) {
          this.report({ stage, attempt, maxAttempts, outcome: 'exhausted', elapsedMs, error: errorMessage(error) });
          break;
        }

        const delay = backoffDelay(backoff, attempt);
        this.report({
          stage,
          attempt,
          maxAttempts,
          outcome: 'retry',
          elapsedMs,
          error: errorMessage(error),
          nextDelayMs: delay,
        });
        if (delay > 0) await this.sleep(delay);
      }
    }

    return { kind: 'exhausted', lastError, attempts: maxAttempts, elapsedMs: Date.now() - started };
  }

  /** Forward one request to a remote service under the given policy. */
  forwardCall<Req, Res>(
    service: RemoteService<Req, Res>,
    request: Req,
    policy: RetryPolicy
  ): Promise<ForwardOutcome<Res>> {
    return this.forward((signal) => service.call(request, signal), policy, service.name);
  }

  private report(record: AttemptRecord) {
    const fields = {
      attempt: `${record.attempt}/${record.maxAttempts}`,
      outcome: record.outcome,
      elapsed_ms: record.elapsedMs,
      next_delay_ms: record.nextDelayMs,
      error: record.error,
    };
    const scoped = this.logger.child(record.stage);
    if (record.outcome === 'success') scoped.info('attempt', fields);
    else scoped.warn('attempt', fields);
    this.onAttempt?.(record);
  }
}
