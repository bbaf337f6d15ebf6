import { Semaphore } from 'async-mutex';

import type { ToolsConfig } from '../config.js';
import type { LogFn } from '../logging/structured-logger.js';
import type { EventSink, LogDetailValue, LogEntry, ToolCallRequest, ToolCallResult, ToolResultStatus } from '../types.js';
import type { RunScope } from './run-scope.js';
import type { AdmissionCheck, FunctionDescriptor, FunctionLookup, InvocationOutcome } from './types.js';

import { ToolsConfigSchema } from '../config.js';
import { RunCancelledError, ToolTimeoutError, UnknownFunctionError } from '../errors.js';
import {
  invalidArgumentsMessage,
  toolCancelledMessage,
  toolFailureMessage,
  toolTimeoutMessage,
  unknownFunctionMessage,
} from '../llm-messages.js';
import { RetryEngine, RetryError } from '../retry/retry-engine.js';
import { runWithSpan } from '../telemetry/index.js';
import { abortReason, isAbortError, toErrorMessage } from '../utils.js';

export interface ToolSchedulerOptions {
  config?: Partial<ToolsConfig>;
  retry?: RetryEngine;
  admissionChecks?: AdmissionCheck[];
  log?: LogFn;
  onEvent?: EventSink;
}

export interface ExecuteBatchOptions {
  scope: RunScope;
  signal?: AbortSignal;
  turn?: number;
}

type CallOutcome = Pick<ToolCallResult, 'status' | 'output' | 'ephemeral'>;

/**
 * Runs one batch of model-requested calls. The result array always has one entry per
 * request, in request order, whatever order the calls finish in.
 */
export class ToolScheduler {
  private readonly config: ToolsConfig;
  private readonly retry: RetryEngine;
  private readonly admissionChecks: AdmissionCheck[];
  private readonly log?: LogFn;
  private readonly onEvent?: EventSink;

  constructor(options: ToolSchedulerOptions = {}) {
    this.config = ToolsConfigSchema.parse(options.config ?? {});
    this.retry = options.retry ?? new RetryEngine({ config: { maxRetries: this.config.maxRetries }, log: options.log, onEvent: options.onEvent });
    this.admissionChecks = options.admissionChecks ?? [];
    this.log = options.log;
    this.onEvent = options.onEvent;
  }

  /** @throws UnknownFunctionError before running anything, when configured to terminate on unknown calls */
  async executeBatch(requests: readonly ToolCallRequest[], lookup: FunctionLookup, options: ExecuteBatchOptions): Promise<ToolCallResult[]> {
    if (this.config.terminateOnUnknownCalls) {
      const unknown = requests.filter((request) => lookup.describe(request.name, options.scope) === undefined);
      if (unknown.length > 0) throw new UnknownFunctionError(unknown.map((request) => request.name));
    }

    if (requests.length <= 1 || this.config.mode === 'sequential') {
      const results: ToolCallResult[] = [];
      // eslint-disable-next-line functional/no-loop-statements
      for (const [index, request] of requests.entries()) {
        results.push(await this.executeOne(request, index, lookup, options));
      }
      return results;
    }

    const semaphore = new Semaphore(this.config.maxConcurrency);
    return await Promise.all(requests.map(async (request, index) =>
      await semaphore.runExclusive(async () => await this.executeOne(request, index, lookup, options))));
  }

  private async executeOne(request: ToolCallRequest, index: number, lookup: FunctionLookup, options: ExecuteBatchOptions): Promise<ToolCallResult> {
    const { scope, signal } = options;
    const turn = options.turn ?? 0;
    const subturn = index + 1;
    const startedAt = Date.now();
    let attempts = 0;

    this.onEvent?.({ type: 'tool_call_started', runId: scope.runId, callId: request.callId, name: request.name });
    this.emitLog('VRB', 'request', request.name, turn, subturn, scope.runId, `call ${request.callId}`);

    const outcome = await runWithSpan('tool.execute', { attributes: { 'tool.name': request.name, 'tool.call_id': request.callId } }, async (span): Promise<CallOutcome> => {
      const descriptor = lookup.describe(request.name, scope);
      if (descriptor === undefined) {
        const available = lookup.listAvailable(scope).map((entry) => entry.name);
        return { status: { type: 'unknown_function' }, output: unknownFunctionMessage(request.name, available), ephemeral: false };
      }
      if (signal?.aborted === true) {
        return { status: { type: 'cancelled' }, output: toolCancelledMessage(request.name), ephemeral: false };
      }

      const issues = lookup.validate(request.name, request.arguments);
      if (issues.length > 0) {
        return { status: { type: 'invalid_arguments', issues }, output: invalidArgumentsMessage(request.name, issues), ephemeral: false };
      }

      const denial = await this.admit(request, descriptor, options);
      if (denial !== undefined) return denial;

      try {
        const invocation = await this.retry.execute(async (attempt) => {
          attempts = attempt;
          return await this.invokeWithDeadline(request, lookup, options, attempt);
        }, { operation: request.name, logType: 'tool', turn, subturn, signal });
        span.setAttribute('tool.attempts', attempts);
        return this.fromInvocation(request, invocation);
      } catch (error: unknown) {
        span.setAttribute('tool.attempts', attempts);
        return this.fromFailure(request, error);
      }
    });

    const result: ToolCallResult = {
      callId: request.callId,
      name: request.name,
      status: outcome.status,
      output: outcome.output,
      ephemeral: outcome.ephemeral,
      attempts,
      durationMs: Date.now() - startedAt,
    };
    this.onEvent?.({
      type: 'tool_call_completed',
      runId: scope.runId,
      callId: request.callId,
      name: request.name,
      status: result.status.type,
      durationMs: result.durationMs,
    });
    const failed = result.status.type !== 'success';
    this.emitLog(failed ? 'WRN' : 'VRB', 'response', request.name, turn, subturn, scope.runId, `call ${request.callId} ${describeStatus(result.status)}`, {
      attempts,
      latency_ms: result.durationMs,
    });
    return result;
  }

  private async admit(request: ToolCallRequest, descriptor: FunctionDescriptor, options: ExecuteBatchOptions): Promise<CallOutcome | undefined> {
    // eslint-disable-next-line functional/no-loop-statements
    for (const check of this.admissionChecks) {
      const decision = await check.check({ request, descriptor, scope: options.scope, signal: options.signal });
      if (!decision.admitted) {
        return {
          status: { type: 'denied', reason: decision.reason, message: decision.message },
          output: decision.message,
          ephemeral: false,
        };
      }
    }
    return undefined;
  }

  private async invokeWithDeadline(request: ToolCallRequest, lookup: FunctionLookup, options: ExecuteBatchOptions, attempt: number): Promise<InvocationOutcome> {
    const parent = options.signal;
    const timeoutMs = this.config.timeoutMs;
    const controller = new AbortController();
    const guards: Promise<never>[] = [];
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onParentAbort: (() => void) | undefined;

    if (parent !== undefined) {
      guards.push(new Promise<never>((_resolve, reject) => {
        onParentAbort = () => {
          const reason = abortReason(parent);
          controller.abort(reason);
          reject(new RunCancelledError(reason));
        };
        parent.addEventListener('abort', onParentAbort, { once: true });
      }));
    }
    if (timeoutMs !== undefined) {
      guards.push(new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          const error = new ToolTimeoutError(request.name, timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }));
    }

    try {
      const invocation = lookup.invoke(request.name, request.arguments, {
        callId: request.callId,
        signal: controller.signal,
        scope: options.scope,
        attempt,
      });
      return await Promise.race([invocation, ...guards]);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      if (parent !== undefined && onParentAbort !== undefined) parent.removeEventListener('abort', onParentAbort);
    }
  }

  private fromInvocation(request: ToolCallRequest, invocation: InvocationOutcome): CallOutcome {
    switch (invocation.kind) {
      case 'result':
        return { status: { type: 'success' }, output: invocation.output, ephemeral: invocation.ephemeral };
      case 'container_expanded':
        return { status: { type: 'success' }, output: invocation.output, ephemeral: true };
      case 'container_misuse':
        return { status: { type: 'container_misuse' }, output: invocation.output, ephemeral: false };
      case 'unknown_function':
        return { status: { type: 'unknown_function' }, output: unknownFunctionMessage(request.name, []), ephemeral: false };
    }
  }

  private fromFailure(request: ToolCallRequest, error: unknown): CallOutcome {
    const cause = error instanceof RetryError ? error.cause : error;
    if (cause instanceof ToolTimeoutError) {
      return { status: { type: 'timeout', timeoutMs: cause.timeoutMs }, output: toolTimeoutMessage(request.name, cause.timeoutMs), ephemeral: false };
    }
    if (isAbortError(cause)) {
      return { status: { type: 'cancelled' }, output: toolCancelledMessage(request.name), ephemeral: false };
    }
    const message = toErrorMessage(cause);
    const category = error instanceof RetryError ? error.category : 'unknown';
    return { status: { type: 'error', message, category }, output: toolFailureMessage(request.name, message), ephemeral: false };
  }

  private emitLog(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    name: string,
    turn: number,
    subturn: number,
    runId: string,
    message: string,
    details?: Record<string, LogDetailValue>,
  ): void {
    this.log?.({
      timestamp: Date.now(),
      severity,
      turn,
      subturn,
      direction,
      type: 'tool',
      remoteIdentifier: name,
      fatal: false,
      message,
      runId,
      details,
    });
  }
}

const describeStatus = (status: ToolResultStatus): string => {
  switch (status.type) {
    case 'success': return 'ok';
    case 'denied': return `denied (${status.reason})`;
    case 'invalid_arguments': return `invalid arguments: ${status.issues.join('; ')}`;
    case 'timeout': return `timed out after ${String(status.timeoutMs)}ms`;
    case 'error': return `failed (${status.category}): ${status.message}`;
    default: return status.type.replace(/_/g, ' ');
  }
};
