import type { ErrorCategory } from './types.js';

export type AgentRunErrorCode =
  | 'model_error'
  | 'retries_exhausted'
  | 'unknown_function'
  | 'consecutive_tool_errors'
  | 'circuit_breaker'
  | 'context_too_large'
  | 'cancelled';

export interface AgentRunErrorOptions {
  category?: ErrorCategory;
  attempts?: number;
  cause?: unknown;
}

/** Terminal failure of a run. Reported inside the `failed` turn outcome, never thrown past the orchestrator. */
export class AgentRunError extends Error {
  readonly code: AgentRunErrorCode;
  readonly category?: ErrorCategory;
  readonly attempts?: number;

  constructor(code: AgentRunErrorCode, message: string, options: AgentRunErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AgentRunError';
    this.code = code;
    this.category = options.category;
    this.attempts = options.attempts;
  }
}

export class UnknownFunctionError extends Error {
  readonly functionNames: string[];

  constructor(functionNames: string[]) {
    super(`Unknown function(s) requested: ${functionNames.join(', ')}`);
    this.name = 'UnknownFunctionError';
    this.functionNames = functionNames;
  }
}

export class CoordinatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoordinatorError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ToolTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(name: string, timeoutMs: number) {
    super(`Function '${name}' timed out after ${String(timeoutMs)}ms`);
    this.name = 'ToolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when a run or one of its waits is cancelled through its AbortSignal. */
export class RunCancelledError extends Error {
  constructor(reason = 'aborted') {
    super(`Cancelled: ${reason}`);
    this.name = 'AbortError';
  }
}
