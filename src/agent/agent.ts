import { Mutex } from 'async-mutex';

import type { AgentConfig, AgentConfigInput } from '../config.js';
import type { Summarizer } from '../context/history-manager.js';
import type { PermissionStore } from '../coordination/permissions.js';
import type { ConversationStore } from '../history/stores.js';
import type { LogFn } from '../logging/structured-logger.js';
import type { ModelCapability, ModelSettings } from '../llm/model.js';
import type { FunctionDescriptor, FunctionInvoker, FunctionLookup, JsonSchema } from '../tools/types.js';
import type { AgentEvent, ConversationThread, EventSink, Message } from '../types.js';
import type { TurnOutcome } from './turn-runner.js';

import { resolveConfig } from '../config.js';
import { HistoryManager } from '../context/history-manager.js';
import { getActiveCoordinator, getCoordinationScope, runWithCoordinator } from '../coordination/coordinator-context.js';
import { EventCoordinator } from '../coordination/event-coordinator.js';
import { PermissionAdmissionCheck } from '../coordination/permissions.js';
import { RunCancelledError } from '../errors.js';
import { ModelSummarizer } from '../llm/model-summarizer.js';
import { createStructuredLogger } from '../logging/structured-logger.js';
import { userMessage } from '../messages.js';
import { RetryEngine } from '../retry/retry-engine.js';
import { ToolScheduler } from '../tools/tool-scheduler.js';

import { TurnRunner } from './turn-runner.js';

export interface AgentOptions {
  model: ModelCapability;
  functions: FunctionLookup;
  config?: AgentConfigInput;
  systemPrompt?: string;
  settings?: ModelSettings;
  store?: ConversationStore;
  coordinator?: EventCoordinator;
  permissionStore?: PermissionStore;
  // defaults to asking the agent's own model
  summarizer?: Summarizer;
  // without a log callback, entries go to a StructuredLogger built from config.logging
  log?: LogFn;
  logWriter?: (line: string) => void;
  onEvent?: EventSink;
}

export interface AgentRunOptions {
  maxIterations?: number;
  signal?: AbortSignal;
  injectedContext?: readonly string[];
}

export type AgentRunResult = TurnOutcome & { threadId: string };

const DEFAULT_FUNCTION_PARAMETERS: JsonSchema = {
  type: 'object',
  properties: { prompt: { type: 'string', minLength: 1 } },
  required: ['prompt'],
  additionalProperties: false,
};

/**
 * Entry point for running conversations. Runs on the same thread are serialized;
 * different threads run independently. Every run happens inside the agent's
 * coordination scope, so functions and nested agents can raise permission,
 * clarification and continuation requests without being handed the coordinator.
 */
export class Agent {
  readonly config: AgentConfig;
  readonly coordinator: EventCoordinator;
  private readonly runner: TurnRunner;
  private readonly store?: ConversationStore;
  private readonly onEvent?: EventSink;
  private readonly threadLocks = new Map<string, Mutex>();

  constructor(options: AgentOptions) {
    this.config = resolveConfig(options.config ?? {});
    this.store = options.store;
    this.onEvent = options.onEvent;
    this.coordinator = options.coordinator ?? new EventCoordinator({
      name: this.config.name,
      defaultTimeoutMs: this.config.coordination.timeoutMs,
      maxTimeoutMs: this.config.coordination.maxTimeoutMs,
    });

    const sink: EventSink = (event) => {
      this.dispatch(event);
    };
    const log = options.log ?? createStructuredLogger({ ...this.config.logging, writer: options.logWriter }).log;
    const summarizer = options.summarizer ?? new ModelSummarizer(options.model, options.settings);
    this.runner = new TurnRunner({
      model: options.model,
      functions: options.functions,
      config: this.config,
      settings: options.settings,
      log,
      onEvent: sink,
      history: new HistoryManager({ config: this.config.history, systemPrompt: options.systemPrompt, summarizer, log }),
      retry: new RetryEngine({ config: this.config.retry, log, onEvent: sink }),
      scheduler: new ToolScheduler({
        config: this.config.tools,
        retry: new RetryEngine({ config: { ...this.config.retry, maxRetries: this.config.tools.maxRetries }, log, onEvent: sink }),
        admissionChecks: [new PermissionAdmissionCheck({ store: options.permissionStore, timeoutMs: this.config.coordination.timeoutMs, log })],
        log,
        onEvent: sink,
      }),
    });
  }

  get name(): string {
    return this.config.name;
  }

  /** Threads with a run in progress or waiting for one. */
  get activeThreads(): number {
    return this.threadLocks.size;
  }

  /**
   * Runs one user turn on a thread. A thread id loads the history from the store; a
   * thread object is used as given. New messages and everything the run produced are
   * stored afterwards, also when the run failed or was cancelled.
   */
  async run(thread: string | ConversationThread, input: string | readonly Message[], options: AgentRunOptions = {}): Promise<AgentRunResult> {
    const threadId = typeof thread === 'string' ? thread : thread.id;
    const newMessages = typeof input === 'string' ? [userMessage(input)] : [...input];

    return await this.exclusive(threadId, async () => {
      const history = typeof thread === 'string'
        ? (await this.store?.load(threadId))?.messages ?? []
        : thread.messages;

      const ambient = getCoordinationScope();
      const nested = ambient !== undefined && ambient.coordinator !== this.coordinator;
      // a nested run gets its own coordinator under the caller's, so its requests surface there
      const coordinator = nested
        ? new EventCoordinator({ name: this.config.name, defaultTimeoutMs: this.config.coordination.timeoutMs, maxTimeoutMs: this.config.coordination.maxTimeoutMs })
        : this.coordinator;
      if (nested) coordinator.setParent(ambient.coordinator);

      try {
        const outcome = await runWithCoordinator(
          { coordinator, conversationId: threadId, agentName: this.config.name, signal: options.signal },
          async () => await this.runner.run({
            history,
            newMessages,
            maxIterations: options.maxIterations,
            signal: options.signal,
            conversationId: threadId,
            injectedContext: options.injectedContext,
          }),
        );
        await this.persist(threadId, newMessages, outcome);
        return { ...outcome, threadId };
      } finally {
        if (nested) {
          coordinator.cancelAll('nested run finished');
          coordinator.detach();
        }
      }
    });
  }

  /**
   * Exposes this agent as a callable function, so another agent can delegate to it.
   * Each call runs on a fresh thread and returns the final response text.
   */
  asFunction(descriptor: Partial<FunctionDescriptor> & { name: string; description: string }): { descriptor: FunctionDescriptor; invoker: FunctionInvoker } {
    const invoker: FunctionInvoker = async (args, context) => {
      const prompt = typeof args.prompt === 'string' ? args.prompt : JSON.stringify(args);
      const result = await this.run(`${descriptor.name}:${context.callId}`, prompt, { signal: context.signal });
      switch (result.status) {
        case 'completed':
          return result.finalResponse;
        case 'iteration_limit':
          return result.finalResponse ?? `'${descriptor.name}' stopped after ${String(result.iterations)} iterations without a final answer.`;
        case 'failed':
          throw result.error;
        case 'cancelled':
          throw new RunCancelledError(result.reason);
      }
    };
    return {
      descriptor: { parameters: DEFAULT_FUNCTION_PARAMETERS, ...descriptor },
      invoker,
    };
  }

  private dispatch(event: AgentEvent): void {
    this.onEvent?.(event);
    (getActiveCoordinator() ?? this.coordinator).emit(event);
  }

  private async persist(threadId: string, newMessages: readonly Message[], outcome: TurnOutcome): Promise<void> {
    if (this.store === undefined) return;
    if (outcome.reducedHistory !== undefined) {
      await this.store.replace(threadId, outcome.reducedHistory);
      return;
    }
    await this.store.append(threadId, [...newMessages, ...outcome.newMessages]);
  }

  private async exclusive<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.threadLocks.get(threadId);
    if (mutex === undefined) {
      mutex = new Mutex();
      this.threadLocks.set(threadId, mutex);
    }
    try {
      return await mutex.runExclusive(fn);
    } finally {
      // a queued run keeps the mutex locked, so only idle threads are dropped
      if (!mutex.isLocked() && this.threadLocks.get(threadId) === mutex) this.threadLocks.delete(threadId);
    }
  }
}
