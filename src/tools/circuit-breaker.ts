import type { ToolCallRequest, ToolCallResult } from '../types.js';

import { canonicalJson } from '../utils.js';

export interface CircuitBreakerOptions {
  maxConsecutiveIdenticalCalls: number;
  maxConsecutiveErrors: number;
}

export type BreakerVerdict =
  | { tripped: false }
  | { tripped: true; reason: 'identical_calls'; name: string; count: number }
  | { tripped: true; reason: 'consecutive_errors'; count: number };

const ERROR_TEXT_PATTERNS = [
  'exception occurred',
  'unhandled exception',
  'exception was thrown',
  'rate limit exceeded',
  'rate limited',
  'quota exceeded',
  'quota reached',
];

/**
 * Whether a tool result counts against the consecutive-error budget. Denials and
 * cancellations are decisions, not failures, so they do not count.
 */
export function isErrorResult(result: ToolCallResult): boolean {
  switch (result.status.type) {
    case 'error':
    case 'timeout':
    case 'unknown_function':
    case 'invalid_arguments':
    case 'container_misuse':
      return true;
    case 'denied':
    case 'cancelled':
      return false;
    case 'success': {
      if (typeof result.output !== 'string') return false;
      const text = result.output.trim().toLowerCase();
      return text.startsWith('error:') || text.startsWith('failed:') || ERROR_TEXT_PATTERNS.some((p) => text.includes(p));
    }
  }
}

export const callSignature = (request: ToolCallRequest): string => `${request.name}(${canonicalJson(request.arguments)})`;

interface CallStreak {
  signature: string;
  count: number;
}

/**
 * Per-run loop guard: stops a run that keeps repeating the same call, or whose tool
 * batches keep failing. Identical-call streaks are tracked per function name, so
 * alternating between functions does not hide a repeat.
 */
export class CircuitBreaker {
  private readonly streaks = new Map<string, CallStreak>();
  private consecutiveErrors = 0;

  constructor(private readonly options: CircuitBreakerOptions) {}

  get consecutiveErrorCount(): number {
    return this.consecutiveErrors;
  }

  /** Checks a batch before it runs, predicting the identical-call streaks it would produce. */
  inspectBatch(requests: readonly ToolCallRequest[]): BreakerVerdict {
    const next = new Map(this.streaks);
    // eslint-disable-next-line functional/no-loop-statements
    for (const request of requests) {
      const signature = callSignature(request);
      const previous = next.get(request.name);
      const count = previous?.signature === signature ? previous.count + 1 : 1;
      if (count >= this.options.maxConsecutiveIdenticalCalls) {
        return { tripped: true, reason: 'identical_calls', name: request.name, count };
      }
      next.set(request.name, { signature, count });
    }
    next.forEach((streak, name) => {
      this.streaks.set(name, streak);
    });
    return { tripped: false };
  }

  /** Records a finished batch; a batch with any error extends the streak, a clean one resets it. */
  recordResults(results: readonly ToolCallResult[]): BreakerVerdict {
    if (results.length === 0) return { tripped: false };
    if (results.some(isErrorResult)) {
      this.consecutiveErrors += 1;
      if (this.consecutiveErrors >= this.options.maxConsecutiveErrors) {
        return { tripped: true, reason: 'consecutive_errors', count: this.consecutiveErrors };
      }
    } else {
      this.consecutiveErrors = 0;
    }
    return { tripped: false };
  }
}
