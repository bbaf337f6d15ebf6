import type { Message, MessagePart, TokenUsage } from '../types.js';
import type { ModelDelta, ModelResponse } from './model.js';

import { createMessage } from '../messages.js';
import { parseJsonRecord, warn } from '../utils.js';

import { isDeltaStream } from './model.js';

export interface AssembledReply {
  message: Message;
  usage: TokenUsage;
  finishReason?: string;
}

export interface StreamAssemblerCallbacks {
  onText?: (text: string) => void;
  onReasoning?: (text: string) => void;
}

/**
 * Buffers streamed deltas into one assistant message. Consecutive text (or
 * reasoning) deltas are merged into a single part; tool calls keep their order.
 */
export class StreamAssembler {
  private readonly parts: MessagePart[] = [];
  private usage: TokenUsage = {};
  private finishReason?: string;

  constructor(private readonly callbacks: StreamAssemblerCallbacks = {}) {}

  push(delta: ModelDelta): void {
    switch (delta.type) {
      case 'text-delta':
        if (delta.text.length === 0) return;
        this.appendText('text', delta.text);
        this.callbacks.onText?.(delta.text);
        return;
      case 'reasoning-delta':
        if (delta.text.length === 0) return;
        this.appendText('reasoning', delta.text);
        this.callbacks.onReasoning?.(delta.text);
        return;
      case 'tool-call':
        this.parts.push({ type: 'tool-call', callId: delta.callId, name: delta.name, arguments: toArguments(delta.name, delta.arguments) });
        return;
      case 'usage':
        this.usage = mergeUsage(this.usage, delta.usage);
        return;
      case 'finish':
        this.finishReason = delta.finishReason ?? this.finishReason;
        return;
    }
  }

  finish(): AssembledReply {
    const parts: MessagePart[] = [...this.parts];
    const hasUsage = Object.values(this.usage).some((value) => typeof value === 'number');
    if (hasUsage) parts.push({ type: 'usage', usage: { ...this.usage } });
    const message = createMessage('assistant', parts, {
      metadata: {
        ...(this.usage.inputTokens !== undefined ? { inputTokens: this.usage.inputTokens } : {}),
        ...(this.usage.outputTokens !== undefined ? { outputTokens: this.usage.outputTokens } : {}),
      },
    });
    return { message, usage: { ...this.usage }, finishReason: this.finishReason };
  }

  private appendText(type: 'text' | 'reasoning', text: string): void {
    const last = this.parts.at(-1);
    const merged = (last?.type === 'text' || last?.type === 'reasoning') && last.type === type ? last.text + text : undefined;
    const part: MessagePart = type === 'text' ? { type: 'text', text: merged ?? text } : { type: 'reasoning', text: merged ?? text };
    if (merged !== undefined) {
      this.parts[this.parts.length - 1] = part;
      return;
    }
    this.parts.push(part);
  }
}

const toArguments = (name: string, raw: Record<string, unknown> | string): Record<string, unknown> => {
  const parsed = parseJsonRecord(raw);
  if (parsed !== undefined) return parsed;
  warn(`tool call '${name}' has unparseable arguments; using an empty object`);
  return {};
};

const USAGE_KEYS = ['inputTokens', 'outputTokens', 'totalTokens', 'reasoningTokens', 'cachedInputTokens'] as const;

export function mergeUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  const merged: TokenUsage = {};
  USAGE_KEYS.forEach((key) => {
    const left = a[key];
    const right = b[key];
    if (left === undefined && right === undefined) return;
    merged[key] = (left ?? 0) + (right ?? 0);
  });
  return merged;
}

/** Turns either reply shape into one assistant message, forwarding deltas as they arrive. */
export async function assembleReply(
  reply: ModelResponse | AsyncIterable<ModelDelta>,
  callbacks: StreamAssemblerCallbacks = {},
): Promise<AssembledReply> {
  const assembler = new StreamAssembler(callbacks);
  if (isDeltaStream(reply)) {
    // eslint-disable-next-line functional/no-loop-statements
    for await (const delta of reply) {
      assembler.push(delta);
    }
    return assembler.finish();
  }
  reply.parts.forEach((part) => {
    switch (part.type) {
      case 'text':
        assembler.push({ type: 'text-delta', text: part.text });
        break;
      case 'reasoning':
        assembler.push({ type: 'reasoning-delta', text: part.text });
        break;
      case 'tool-call':
        assembler.push({ type: 'tool-call', callId: part.callId, name: part.name, arguments: part.arguments });
        break;
      case 'usage':
        assembler.push({ type: 'usage', usage: part.usage });
        break;
      case 'tool-result':
        warn(`model reply carried a tool result for '${part.name}'; ignored`);
        break;
    }
  });
  if (reply.usage !== undefined) assembler.push({ type: 'usage', usage: reply.usage });
  assembler.push({ type: 'finish', finishReason: reply.finishReason });
  return assembler.finish();
}
