import type { RunScope } from '../tools/run-scope.js';
import type { Message, TokenUsage, ToolCallResult } from '../types.js';

import { mergeUsage } from '../llm/stream-assembler.js';
import { messageText, withoutParts } from '../messages.js';

/**
 * Mutable state of one run. The model-facing list grows with every exchange; the
 * turn history keeps only what outlives the run, so ephemeral results and the
 * calls that produced them never reach it.
 */
export class TurnContext {
  iteration = 0;
  usage: TokenUsage = {};
  reduced = false;
  private effective: Message[];
  private readonly produced: Message[] = [];
  // messages that exist only for the model call (preamble, injected context)
  private readonly transientIds: ReadonlySet<string>;
  // persisted form of model-facing messages that differ from it; undefined means dropped
  private readonly persistedForm = new Map<string, Message | undefined>();
  private readonly completed: string[] = [];

  constructor(readonly scope: RunScope, effective: readonly Message[], transientIds: readonly string[]) {
    this.effective = [...effective];
    this.transientIds = new Set(transientIds);
  }

  get messages(): readonly Message[] {
    return this.effective;
  }

  get newMessages(): Message[] {
    return [...this.produced];
  }

  get completedFunctions(): string[] {
    return [...this.completed];
  }

  replaceMessages(messages: readonly Message[]): void {
    this.effective = [...messages];
    this.reduced = true;
  }

  addUsage(usage: TokenUsage): void {
    this.usage = mergeUsage(this.usage, usage);
  }

  appendFinal(message: Message): void {
    this.effective.push(message);
    this.produced.push(message);
  }

  appendExchange(assistant: Message, toolMessage: Message, results: readonly ToolCallResult[]): void {
    this.effective.push(assistant, toolMessage);
    const ephemeralIds = new Set(results.filter((result) => result.ephemeral).map((result) => result.callId));
    const keptAssistant = withoutParts(assistant, (part) => part.type === 'tool-call' && ephemeralIds.has(part.callId));
    const keptTool = withoutParts(toolMessage, (part) => part.type === 'tool-result' && part.ephemeral);
    this.remember(assistant, keptAssistant);
    this.remember(toolMessage, keptTool);
    results.forEach((result) => {
      if (result.status.type === 'success') this.completed.push(result.name);
    });
  }

  /** Text of the most recent assistant message that has any. */
  lastAssistantText(): string | undefined {
    const text = [...this.effective]
      .reverse()
      .filter((message) => message.role === 'assistant')
      .map(messageText)
      .find((candidate) => candidate.length > 0);
    return text;
  }

  /** The conversation as it should be stored: no transient messages, no ephemeral parts. */
  persistedConversation(): Message[] {
    return this.effective.flatMap((message) => {
      if (this.transientIds.has(message.id)) return [];
      if (!this.persistedForm.has(message.id)) return [message];
      const persisted = this.persistedForm.get(message.id);
      return persisted === undefined ? [] : [persisted];
    });
  }

  private remember(original: Message, kept: Message | undefined): void {
    if (kept !== undefined) this.produced.push(kept);
    if (kept !== original) this.persistedForm.set(original.id, kept);
  }
}
