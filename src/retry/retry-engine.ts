import type { RetryConfig } from '../config.js';
import type { LogFn } from '../logging/structured-logger.js';
import type { ErrorCategory, EventSink, LogEntry } from '../types.js';
import type { ErrorClassification, ErrorClassifier } from './error-classifier.js';

import { RetryConfigSchema } from '../config.js';
import { RunCancelledError } from '../errors.js';
import { addSpanEvent } from '../telemetry/index.js';
import { abortReason, isAbortError, sleepWithAbort, toErrorMessage } from '../utils.js';

import { DefaultErrorClassifier, ERROR_CATEGORY_MEANINGS } from './error-classifier.js';

/** Returns a delay in ms, or undefined to stop retrying. Overrides every other rule. */
export type CustomRetryStrategy = (error: unknown, attempt: number) => number | undefined;

export type RetryDecision =
  | { state: 'retrying'; delayMs: number; category: ErrorCategory; classification?: ErrorClassification }
  | { state: 'exhausted'; category: ErrorCategory; classification?: ErrorClassification }
  | { state: 'non_retryable'; category: ErrorCategory; classification?: ErrorClassification };

export interface RetryEngineOptions {
  config?: Partial<RetryConfig>;
  // null disables classification and falls back to generic backoff
  classifier?: ErrorClassifier | null;
  customStrategy?: CustomRetryStrategy;
  random?: () => number;
  log?: LogFn;
  onEvent?: EventSink;
}

export interface RetryExecuteOptions {
  operation: string;
  logType?: LogEntry['type'];
  turn?: number;
  subturn?: number;
  signal?: AbortSignal;
  refreshCredentials?: () => Promise<void>;
}

export class RetryError extends Error {
  readonly category: ErrorCategory;
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(message: string, options: { category: ErrorCategory; attempts: number; exhausted: boolean; cause: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'RetryError';
    this.category = options.category;
    this.attempts = options.attempts;
    this.exhausted = options.exhausted;
  }
}

export class RetryEngine {
  private readonly config: RetryConfig;
  private readonly classifier: ErrorClassifier | undefined;
  private readonly customStrategy?: CustomRetryStrategy;
  private readonly random: () => number;
  private readonly log?: LogFn;
  private readonly onEvent?: EventSink;

  constructor(options: RetryEngineOptions = {}) {
    this.config = RetryConfigSchema.parse(options.config ?? {});
    this.classifier = options.classifier === null ? undefined : (options.classifier ?? new DefaultErrorClassifier());
    this.customStrategy = options.customStrategy;
    this.random = options.random ?? Math.random;
    this.log = options.log;
    this.onEvent = options.onEvent;
  }

  /**
   * Delay before retry number `attempt` (0-based), or undefined when the error must
   * not be retried.
   */
  classifyAndDelay(error: unknown, attempt: number): number | undefined {
    const decision = this.decide(error, attempt);
    return decision.state === 'retrying' ? decision.delayMs : undefined;
  }

  decide(error: unknown, attempt: number): RetryDecision {
    if (this.customStrategy !== undefined) {
      const delayMs = this.customStrategy(error, attempt);
      const category = this.classifier?.classify(error).category ?? 'unknown';
      if (delayMs === undefined) return { state: 'non_retryable', category };
      return { state: 'retrying', delayMs: Math.max(0, delayMs), category };
    }

    if (this.classifier === undefined) {
      if (attempt >= this.config.maxRetries) return { state: 'exhausted', category: 'unknown' };
      return { state: 'retrying', delayMs: this.backoff(attempt), category: 'unknown' };
    }

    const classification = this.classifier.classify(error);
    const { category } = classification;
    if (!this.isRetryable(category)) return { state: 'non_retryable', category, classification };
    if (attempt >= this.maxRetriesFor(category)) return { state: 'exhausted', category, classification };
    if (classification.retryAfterMs !== undefined) {
      if (classification.retryAfterMs > this.config.maxRetryAfterMs) {
        return { state: 'non_retryable', category, classification };
      }
      return { state: 'retrying', delayMs: classification.retryAfterMs, category, classification };
    }
    return { state: 'retrying', delayMs: this.backoff(attempt), category, classification };
  }

  classify(error: unknown): ErrorClassification | undefined {
    return this.classifier?.classify(error);
  }

  maxRetriesFor(category: ErrorCategory): number {
    return this.config.maxRetriesByCategory[category] ?? this.config.maxRetries;
  }

  /**
   * Runs `fn` until it succeeds, the retry budget is spent, or the error is terminal.
   * An auth failure triggers a single credential refresh that does not count against
   * the budget.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, options: RetryExecuteOptions): Promise<T> {
    const { signal } = options;
    let retries = 0;
    let calls = 0;
    let refreshed = false;
    // eslint-disable-next-line functional/no-loop-statements
    for (;;) {
      if (signal?.aborted === true) throw new RunCancelledError(abortReason(signal));
      calls += 1;
      try {
        return await fn(calls);
      } catch (error: unknown) {
        if (isAbortError(error) || options.signal?.aborted === true) throw error;
        const category = this.classifier?.classify(error).category;
        if (category === 'auth_error' && options.refreshCredentials !== undefined && !refreshed) {
          refreshed = true;
          this.log?.({
            timestamp: Date.now(),
            severity: 'WRN',
            turn: options.turn ?? 0,
            subturn: options.subturn ?? 0,
            direction: 'response',
            type: options.logType ?? 'llm',
            remoteIdentifier: options.operation,
            fatal: false,
            message: `authentication failed, refreshing credentials: ${toErrorMessage(error)}`,
          });
          await options.refreshCredentials();
          continue;
        }

        const decision = this.decide(error, retries);
        if (decision.state !== 'retrying') {
          const exhausted = decision.state === 'exhausted';
          const reason = exhausted
            ? `retries exhausted after ${String(calls)} attempt(s)`
            : `${decision.category} is not retryable`;
          throw new RetryError(`${options.operation}: ${reason}: ${toErrorMessage(error)}`, {
            category: decision.category,
            attempts: calls,
            exhausted,
            cause: error,
          });
        }

        retries += 1;
        this.reportRetry(options, retries, decision.delayMs, decision.category, error);
        const slept = await sleepWithAbort(decision.delayMs, signal);
        if (slept === 'aborted') throw new RunCancelledError(abortReason(signal));
      }
    }
  }

  private isRetryable(category: ErrorCategory): boolean {
    if (ERROR_CATEGORY_MEANINGS[category].retryable) return true;
    const explicit = this.config.maxRetriesByCategory[category];
    return explicit !== undefined && explicit > 0;
  }

  private backoff(attempt: number): number {
    const { initialDelayMs, multiplier, maxDelayMs, jitter } = this.config;
    const base = Math.min(initialDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
    const spread = jitter * (2 * this.random() - 1);
    return Math.round(Math.min(Math.max(base * (1 + spread), 0), maxDelayMs));
  }

  private reportRetry(options: RetryExecuteOptions, attempt: number, delayMs: number, category: ErrorCategory, error: unknown): void {
    const { operation } = options;
    addSpanEvent('retry.scheduled', { operation, attempt, delay_ms: delayMs, category });
    this.onEvent?.({ type: 'retry_scheduled', operation, attempt, delayMs, category });
    this.log?.({
      timestamp: Date.now(),
      severity: 'WRN',
      turn: options.turn ?? 0,
      subturn: options.subturn ?? 0,
      direction: 'response',
      type: options.logType ?? 'llm',
      remoteIdentifier: operation,
      fatal: false,
      message: `retry ${String(attempt)} in ${String(delayMs)}ms (${category}): ${toErrorMessage(error)}`,
      details: { attempt, delay_ms: delayMs, category },
    });
  }
}
