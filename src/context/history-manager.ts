import type { HistoryConfig } from '../config.js';
import type { LogFn } from '../logging/structured-logger.js';
import type { LogDetailValue, LogEntry, Message, ReductionStrategy } from '../types.js';
import type { Tokenizer } from './tokenizer.js';

import { HistoryConfigSchema } from '../config.js';
import { summaryMessageText } from '../llm-messages.js';
import { createMessage, lastSummaryIndex, systemMessage } from '../messages.js';
import { isAbortError, toErrorMessage } from '../utils.js';

import { estimateMessagesTokens, resolveTokenizer } from './tokenizer.js';

export interface Summarizer {
  summarize: (messages: readonly Message[], signal?: AbortSignal) => Promise<string>;
}

export interface HistoryStats {
  messageCount: number;
  estimatedTokens: number;
}

/** Caller-supplied trigger; when present it replaces every built-in trigger. */
export type ReductionPredicate = (messages: readonly Message[], stats: HistoryStats) => boolean;

export type ReductionTrigger = 'custom' | 'context_percentage' | 'max_tokens' | 'message_count';

export type ReductionCheck =
  | { reduce: false; stats: HistoryStats }
  | { reduce: true; trigger: ReductionTrigger; stats: HistoryStats };

export interface ReductionResult {
  messages: Message[];
  removed: number;
  strategy: ReductionStrategy;
  summary?: Message;
}

export interface HistoryManagerOptions {
  config?: Partial<HistoryConfig>;
  systemPrompt?: string;
  summarizer?: Summarizer;
  shouldReduce?: ReductionPredicate;
  tokenizer?: Tokenizer;
  log?: LogFn;
}

export interface PrepareOptions {
  injectedContext?: readonly string[];
}

/**
 * Decides when a conversation has grown too large and shrinks it. Everything at or
 * before the latest summary marker is left exactly as it is.
 */
export class HistoryManager {
  readonly config: HistoryConfig;
  private readonly systemPrompt?: string;
  private readonly summarizer?: Summarizer;
  private readonly predicate?: ReductionPredicate;
  private readonly tokenizer: Tokenizer;
  private readonly log?: LogFn;

  constructor(options: HistoryManagerOptions = {}) {
    this.config = HistoryConfigSchema.parse(options.config ?? {});
    this.systemPrompt = options.systemPrompt;
    this.summarizer = options.summarizer;
    this.predicate = options.shouldReduce;
    this.tokenizer = options.tokenizer ?? resolveTokenizer(this.config.tokenizer);
    this.log = options.log;
  }

  /** Message list sent to the model: preamble, history, injected context, then the new messages. */
  prepareEffectiveMessages(history: readonly Message[], newMessages: readonly Message[], options: PrepareOptions = {}): Message[] {
    const preamble = this.systemPrompt !== undefined && !startsWithPrompt(history, this.systemPrompt)
      ? [systemMessage(this.systemPrompt)]
      : [];
    const injected = (options.injectedContext ?? [])
      .filter((text) => text.trim().length > 0)
      .map((text) => systemMessage(text));
    return [...preamble, ...history, ...injected, ...newMessages];
  }

  /** Size of the part of the history that reduction may still touch. */
  stats(history: readonly Message[]): HistoryStats {
    const live = history.slice(lastSummaryIndex(history) + 1);
    return { messageCount: live.length, estimatedTokens: estimateMessagesTokens(this.tokenizer, live) };
  }

  shouldReduce(history: readonly Message[]): ReductionCheck {
    const stats = this.stats(history);
    if (!this.config.enabled) return { reduce: false, stats };

    if (this.predicate !== undefined) {
      return this.predicate(history, stats) ? { reduce: true, trigger: 'custom', stats } : { reduce: false, stats };
    }
    const { contextWindowTokens, triggerPercentage, maxTokens } = this.config;
    if (contextWindowTokens !== undefined && triggerPercentage !== undefined) {
      return stats.estimatedTokens >= contextWindowTokens * triggerPercentage
        ? { reduce: true, trigger: 'context_percentage', stats }
        : { reduce: false, stats };
    }
    if (maxTokens !== undefined) {
      return stats.estimatedTokens > maxTokens ? { reduce: true, trigger: 'max_tokens', stats } : { reduce: false, stats };
    }
    return stats.messageCount > this.config.targetMessageCount + this.config.summarizationThreshold
      ? { reduce: true, trigger: 'message_count', stats }
      : { reduce: false, stats };
  }

  /**
   * Shrinks the history to the last `targetMessageCount` messages after the latest
   * marker. System messages in the dropped span stay; a tool result is never
   * separated from the call that produced it.
   */
  async reduce(history: readonly Message[], strategy: ReductionStrategy = this.config.strategy, signal?: AbortSignal): Promise<ReductionResult> {
    const markerIndex = lastSummaryIndex(history);
    const frozen = history.slice(0, markerIndex + 1);
    const live = history.slice(markerIndex + 1);
    const cut = this.findCut(live);
    if (cut <= 0) return { messages: [...history], removed: 0, strategy };

    const span = live.slice(0, cut);
    const keptSystem = span.filter((message) => message.role === 'system');
    const dropped = span.filter((message) => message.role !== 'system');
    const tail = live.slice(cut);
    if (dropped.length === 0) return { messages: [...history], removed: 0, strategy };

    if (strategy === 'summarize') {
      const summary = await this.summarize(dropped, signal);
      if (summary !== undefined) {
        this.emitLog('VRB', `summarized ${String(dropped.length)} messages`, { removed: dropped.length, kept: tail.length });
        return {
          messages: [...frozen, ...keptSystem, summary, ...tail],
          removed: dropped.length,
          strategy: 'summarize',
          summary,
        };
      }
    }

    this.emitLog('VRB', `truncated ${String(dropped.length)} messages`, { removed: dropped.length, kept: tail.length });
    return { messages: [...frozen, ...keptSystem, ...tail], removed: dropped.length, strategy: 'truncate' };
  }

  private findCut(live: readonly Message[]): number {
    let cut = live.length - this.config.targetMessageCount;
    if (cut <= 0) return 0;
    // pull the cut back over tool results so they stay with their calls
    // eslint-disable-next-line functional/no-loop-statements
    while (cut > 0 && answersEarlierCall(live, cut)) {
      cut -= 1;
    }
    return cut;
  }

  private async summarize(dropped: readonly Message[], signal?: AbortSignal): Promise<Message | undefined> {
    if (this.summarizer === undefined) {
      this.emitLog('WRN', 'summarize requested without a summarizer, truncating instead');
      return undefined;
    }
    try {
      const text = await this.summarizer.summarize(dropped, signal);
      return createMessage('system', [{ type: 'text', text: summaryMessageText(text.trim(), dropped.length) }], {
        metadata: { isSummary: true, summarizedCount: dropped.length },
      });
    } catch (error: unknown) {
      if (isAbortError(error) || signal?.aborted === true) throw error;
      this.emitLog('WRN', `summarizer failed, truncating instead: ${toErrorMessage(error)}`);
      return undefined;
    }
  }

  private emitLog(severity: LogEntry['severity'], message: string, details?: Record<string, LogDetailValue>): void {
    this.log?.({
      timestamp: Date.now(),
      severity,
      turn: 0,
      subturn: 0,
      direction: 'response',
      type: 'history',
      remoteIdentifier: 'history',
      fatal: false,
      message,
      details,
    });
  }
}

const startsWithPrompt = (history: readonly Message[], prompt: string): boolean => {
  const first = history.at(0);
  return first?.role === 'system' && first.parts.some((part) => part.type === 'text' && part.text === prompt);
};

/** True when the message at `index` carries results for calls made before it. */
function answersEarlierCall(messages: readonly Message[], index: number): boolean {
  const message = messages[index];
  const resultIds = message.parts.flatMap((part) => (part.type === 'tool-result' ? [part.callId] : []));
  if (resultIds.length === 0) return false;
  return messages.slice(0, index).some((earlier) =>
    earlier.parts.some((part) => part.type === 'tool-call' && resultIds.includes(part.callId)));
}
