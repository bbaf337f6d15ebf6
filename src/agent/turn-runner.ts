import type { AgentConfig, AgentConfigInput } from '../config.js';
import type { LogFn } from '../logging/structured-logger.js';
import type { AssembledReply } from '../llm/stream-assembler.js';
import type { ModelCapability, ModelSettings, ModelToolDefinition } from '../llm/model.js';
import type { FunctionLookup } from '../tools/types.js';
import type { EventSink, LogDetailValue, LogEntry, Message, TokenUsage, ToolCallResult, TurnStatus } from '../types.js';

import { resolveConfig } from '../config.js';
import { HistoryManager } from '../context/history-manager.js';
import { requestContinuation } from '../coordination/permissions.js';
import { AgentRunError, UnknownFunctionError } from '../errors.js';
import { assembleReply } from '../llm/stream-assembler.js';
import { circuitBreakerMessage, consecutiveErrorsMessage } from '../llm-messages.js';
import { createMessage, messageText, toolCallRequests } from '../messages.js';
import { RetryEngine, RetryError } from '../retry/retry-engine.js';
import { addSpanAttributes, recordSpanError, runWithSpan } from '../telemetry/index.js';
import { CircuitBreaker } from '../tools/circuit-breaker.js';
import { RunScope } from '../tools/run-scope.js';
import { ToolScheduler } from '../tools/tool-scheduler.js';
import { abortReason, isAbortError, toErrorMessage } from '../utils.js';

import { TurnContext } from './turn-context.js';

interface OutcomeBase {
  runId: string;
  // produced by this run, ephemeral parts removed
  newMessages: Message[];
  iterations: number;
  usage: TokenUsage;
  // full conversation to store when the history was reduced during the run
  reducedHistory?: Message[];
}

export type TurnOutcome =
  | (OutcomeBase & { status: 'completed'; finalResponse: string })
  | (OutcomeBase & { status: 'iteration_limit'; finalResponse?: string })
  | (OutcomeBase & { status: 'failed'; error: AgentRunError })
  | (OutcomeBase & { status: 'cancelled'; reason: string });

export interface TurnRunnerOptions {
  model: ModelCapability;
  functions: FunctionLookup;
  config?: AgentConfig | AgentConfigInput;
  history?: HistoryManager;
  scheduler?: ToolScheduler;
  retry?: RetryEngine;
  settings?: ModelSettings;
  systemPrompt?: string;
  log?: LogFn;
  onEvent?: EventSink;
}

export interface TurnRunInput {
  history: readonly Message[];
  newMessages: readonly Message[];
  maxIterations?: number;
  signal?: AbortSignal;
  runId?: string;
  conversationId?: string;
  injectedContext?: readonly string[];
}

type Terminal =
  | { status: 'completed'; finalResponse: string }
  | { status: 'iteration_limit'; finalResponse?: string }
  | { status: 'failed'; error: AgentRunError }
  | { status: 'cancelled'; reason: string };

/**
 * The model ⇄ tools loop of one run: ask the model, run the calls it makes, feed
 * the results back, until it answers without calls or a limit stops it. Every exit
 * is reported as a TurnOutcome; failures carry the history produced so far.
 */
export class TurnRunner {
  readonly config: AgentConfig;
  private readonly model: ModelCapability;
  private readonly functions: FunctionLookup;
  private readonly history: HistoryManager;
  private readonly scheduler: ToolScheduler;
  private readonly retry: RetryEngine;
  private readonly settings?: ModelSettings;
  private readonly log?: LogFn;
  private readonly onEvent?: EventSink;

  constructor(options: TurnRunnerOptions) {
    this.config = resolveConfig(options.config ?? {});
    this.model = options.model;
    this.functions = options.functions;
    this.log = options.log;
    this.onEvent = options.onEvent;
    this.settings = options.settings;
    this.history = options.history ?? new HistoryManager({ config: this.config.history, systemPrompt: options.systemPrompt, log: options.log });
    this.retry = options.retry ?? new RetryEngine({ config: this.config.retry, log: options.log, onEvent: options.onEvent });
    this.scheduler = options.scheduler ?? new ToolScheduler({
      config: this.config.tools,
      retry: new RetryEngine({ config: { ...this.config.retry, maxRetries: this.config.tools.maxRetries }, log: options.log, onEvent: options.onEvent }),
      log: options.log,
      onEvent: options.onEvent,
    });
  }

  async run(input: TurnRunInput): Promise<TurnOutcome> {
    const scope = new RunScope({ runId: input.runId, conversationId: input.conversationId });
    const effective = this.history.prepareEffectiveMessages(input.history, input.newMessages, { injectedContext: input.injectedContext });
    const stored = new Set([...input.history, ...input.newMessages].map((message) => message.id));
    const transientIds = effective.filter((message) => !stored.has(message.id)).map((message) => message.id);
    const ctx = new TurnContext(scope, effective, transientIds);
    const maxIterations = input.maxIterations ?? this.config.maxIterations;

    return await runWithSpan('agent.turn', { attributes: { 'agent.name': this.config.name, 'agent.run_id': scope.runId, 'agent.max_iterations': maxIterations } }, async () => {
      this.onEvent?.({ type: 'turn_started', runId: scope.runId, maxIterations });
      this.emitLog('VRB', 'request', 0, `run started (max ${String(maxIterations)} iterations)`, scope.runId);

      let terminal: Terminal;
      try {
        terminal = await this.loop(ctx, maxIterations, input.signal);
      } catch (error: unknown) {
        terminal = this.toTerminal(error, input.signal);
      }
      return this.finish(ctx, terminal);
    });
  }

  private async loop(ctx: TurnContext, maxIterations: number, signal?: AbortSignal): Promise<Terminal> {
    const breaker = new CircuitBreaker({
      maxConsecutiveIdenticalCalls: this.config.tools.maxConsecutiveIdenticalCalls,
      maxConsecutiveErrors: this.config.tools.maxConsecutiveErrors,
    });
    const { runId } = ctx.scope;
    let cap = maxIterations;
    let extensions = 0;

    // eslint-disable-next-line functional/no-loop-statements
    for (;;) {
      if (signal?.aborted === true) return { status: 'cancelled', reason: abortReason(signal) };

      if (ctx.iteration >= cap) {
        const extra = await this.askToContinue(ctx, cap, extensions, signal);
        if (extra === undefined) return { status: 'iteration_limit', finalResponse: ctx.lastAssistantText() };
        cap += extra;
        extensions += 1;
        continue;
      }

      const turn = ctx.iteration + 1;
      this.onEvent?.({ type: 'iteration_started', runId, iteration: turn });
      await this.reduceIfNeeded(ctx, turn, signal);

      const reply = await this.callModel(ctx, turn, signal);
      ctx.addUsage(reply.usage);
      const requests = toolCallRequests(reply.message);

      if (requests.length === 0) {
        ctx.appendFinal(reply.message);
        ctx.iteration += 1;
        this.onEvent?.({ type: 'iteration_completed', runId, iteration: turn, toolCalls: 0 });
        return { status: 'completed', finalResponse: messageText(reply.message) };
      }

      const identical = breaker.inspectBatch(requests);
      if (identical.tripped && identical.reason === 'identical_calls') {
        this.onEvent?.({ type: 'circuit_breaker_triggered', runId, name: identical.name, count: identical.count });
        return { status: 'failed', error: new AgentRunError('circuit_breaker', circuitBreakerMessage(identical.name, identical.count)) };
      }

      const results = await this.scheduler.executeBatch(requests, this.functions, { scope: ctx.scope, signal, turn });
      ctx.appendExchange(reply.message, toolResultMessage(results), results);
      ctx.iteration += 1;
      this.onEvent?.({ type: 'iteration_completed', runId, iteration: turn, toolCalls: requests.length });

      const errors = breaker.recordResults(results);
      if (errors.tripped && errors.reason === 'consecutive_errors') {
        const message = consecutiveErrorsMessage(errors.count, this.config.tools.maxConsecutiveErrors);
        return { status: 'failed', error: new AgentRunError('consecutive_tool_errors', message) };
      }
    }
  }

  private async callModel(ctx: TurnContext, turn: number, signal?: AbortSignal): Promise<AssembledReply> {
    const { runId } = ctx.scope;
    const tools: ModelToolDefinition[] = this.functions.listAvailable(ctx.scope).map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      parameters: descriptor.parameters,
    }));
    this.emitLog('VRB', 'request', turn, `model request: ${String(ctx.messages.length)} messages, ${String(tools.length)} tools`, runId);
    const startedAt = Date.now();
    const { model } = this;
    const refreshCredentials = model.refreshCredentials === undefined
      ? undefined
      : async (): Promise<void> => { await model.refreshCredentials?.(); };

    const reply = await runWithSpan('llm.request', { attributes: { 'llm.model': this.model.id, 'agent.iteration': turn } }, async () =>
      await this.retry.execute(async () => {
        const response = await this.model.send(ctx.messages, { tools, settings: this.settings, signal });
        return await assembleReply(response, {
          onText: (text) => this.onEvent?.({ type: 'text_delta', runId, text }),
          onReasoning: (text) => this.onEvent?.({ type: 'reasoning_delta', runId, text }),
        });
      }, { operation: this.model.id, logType: 'llm', turn, signal, refreshCredentials }));

    addSpanAttributes({ 'llm.input_tokens': reply.usage.inputTokens ?? 0, 'llm.output_tokens': reply.usage.outputTokens ?? 0 });
    this.emitLog('VRB', 'response', turn, `model response: ${reply.finishReason ?? 'unknown'}`, runId, {
      latency_ms: Date.now() - startedAt,
      input_tokens: reply.usage.inputTokens,
      output_tokens: reply.usage.outputTokens,
    });
    return reply;
  }

  private async reduceIfNeeded(ctx: TurnContext, turn: number, signal?: AbortSignal): Promise<void> {
    const check = this.history.shouldReduce(ctx.messages);
    if (!check.reduce) return;
    const result = await this.history.reduce(ctx.messages, this.history.config.strategy, signal);
    if (result.removed === 0) return;
    ctx.replaceMessages(result.messages);
    this.onEvent?.({
      type: 'history_reduced',
      runId: ctx.scope.runId,
      strategy: result.strategy,
      removed: result.removed,
      summarized: result.summary !== undefined,
    });
    this.emitLog('VRB', 'response', turn, `history reduced by ${check.trigger}: ${String(result.removed)} messages removed`, ctx.scope.runId);
  }

  /** Extra iterations granted by the user, or undefined to stop at the cap. */
  private async askToContinue(ctx: TurnContext, cap: number, extensions: number, signal?: AbortSignal): Promise<number | undefined> {
    const { continuation } = this.config;
    if (!continuation.enabled || extensions >= continuation.maxExtensions) return undefined;
    const result = await requestContinuation(
      { currentIteration: ctx.iteration, maxIterations: cap, completedFunctions: ctx.completedFunctions, plannedFunctions: [] },
      { timeoutMs: this.config.coordination.timeoutMs, signal },
    );
    if (!result.approved) {
      this.emitLog('VRB', 'response', ctx.iteration, `continuation not granted (${result.reason})`, ctx.scope.runId);
      return undefined;
    }
    return result.extraIterations ?? continuation.extensionAmount;
  }

  private toTerminal(error: unknown, signal?: AbortSignal): Terminal {
    if (isAbortError(error) || signal?.aborted === true) {
      return { status: 'cancelled', reason: signal?.aborted === true ? abortReason(signal) : toErrorMessage(error) };
    }
    if (error instanceof UnknownFunctionError) {
      return { status: 'failed', error: new AgentRunError('unknown_function', error.message, { cause: error }) };
    }
    if (error instanceof RetryError) {
      if (error.category === 'context_too_large') {
        return { status: 'failed', error: new AgentRunError('context_too_large', error.message, { category: error.category, attempts: error.attempts, cause: error.cause }) };
      }
      const code = error.exhausted ? 'retries_exhausted' : 'model_error';
      return { status: 'failed', error: new AgentRunError(code, error.message, { category: error.category, attempts: error.attempts, cause: error.cause }) };
    }
    if (error instanceof AgentRunError) return { status: 'failed', error };
    return { status: 'failed', error: new AgentRunError('model_error', toErrorMessage(error), { cause: error }) };
  }

  private finish(ctx: TurnContext, terminal: Terminal): TurnOutcome {
    const { runId } = ctx.scope;
    const base: OutcomeBase = {
      runId,
      newMessages: ctx.newMessages,
      iterations: ctx.iteration,
      usage: ctx.usage,
      ...(ctx.reduced ? { reducedHistory: ctx.persistedConversation() } : {}),
    };
    const status: TurnStatus = terminal.status;
    this.onEvent?.({ type: 'turn_completed', runId, status, iterations: ctx.iteration });
    addSpanAttributes({ 'agent.status': status, 'agent.iterations': ctx.iteration });

    if (terminal.status === 'failed') {
      recordSpanError(terminal.error);
      this.onEvent?.({ type: 'error', message: terminal.error.message, category: terminal.error.category, fatal: true });
      this.emitLog('ERR', 'response', ctx.iteration, `run failed (${terminal.error.code}): ${terminal.error.message}`, runId, undefined, true);
    } else if (terminal.status === 'iteration_limit') {
      this.emitLog('WRN', 'response', ctx.iteration, `iteration limit reached after ${String(ctx.iteration)} iterations`, runId);
    } else {
      this.emitLog('FIN', 'response', ctx.iteration, `run ${terminal.status} after ${String(ctx.iteration)} iterations`, runId);
    }
    return { ...base, ...terminal };
  }

  private emitLog(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    turn: number,
    message: string,
    runId: string,
    details?: Record<string, LogDetailValue>,
    fatal = false,
  ): void {
    this.log?.({
      timestamp: Date.now(),
      severity,
      turn,
      subturn: 0,
      direction,
      type: 'agent',
      remoteIdentifier: this.model.id,
      fatal,
      message,
      agentId: this.config.name,
      runId,
      details,
    });
  }
}

function toolResultMessage(results: readonly ToolCallResult[]): Message {
  return createMessage('tool', results.map((result) => ({
    type: 'tool-result' as const,
    callId: result.callId,
    name: result.name,
    output: result.output,
    isError: result.status.type !== 'success',
    ephemeral: result.ephemeral,
  })), {
    metadata: results.length > 0 && results.every((result) => result.ephemeral) ? { isContainerResult: true } : {},
  });
}
