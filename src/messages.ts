import crypto from 'node:crypto';

import type { Message, MessageMetadata, MessagePart, MessageRole, ToolCallPart, ToolCallRequest } from './types.js';

export interface CreateMessageOptions {
  id?: string;
  metadata?: MessageMetadata;
  createdAt?: string;
}

export function createMessage(role: MessageRole, parts: readonly MessagePart[], options: CreateMessageOptions = {}): Message {
  const message: Message = {
    id: options.id ?? crypto.randomUUID(),
    role,
    parts: Object.freeze(parts.map((part) => Object.freeze({ ...part }))),
    metadata: Object.freeze({ ...(options.metadata ?? {}) }),
    createdAt: options.createdAt ?? new Date().toISOString(),
  };
  return Object.freeze(message);
}

export const textMessage = (role: MessageRole, text: string, options?: CreateMessageOptions): Message =>
  createMessage(role, [{ type: 'text', text }], options);

export const systemMessage = (text: string): Message => textMessage('system', text);
export const userMessage = (text: string): Message => textMessage('user', text);
export const assistantMessage = (text: string): Message => textMessage('assistant', text);

export function messageText(message: Message): string {
  return message.parts
    .filter((part): part is Extract<MessagePart, { type: 'text' }> => part.type === 'text')
    .map((part) => part.text)
    .join('');
}

export function toolCallParts(message: Message): ToolCallPart[] {
  return message.parts.filter((part): part is ToolCallPart => part.type === 'tool-call');
}

export function toolCallRequests(message: Message): ToolCallRequest[] {
  return toolCallParts(message).map((part) => ({ callId: part.callId, name: part.name, arguments: part.arguments }));
}

export const isSummaryMessage = (message: Message): boolean => message.metadata.isSummary === true;

/** Index of the most recent summary marker, or -1 when the history has none. */
export function lastSummaryIndex(messages: readonly Message[]): number {
  // eslint-disable-next-line functional/no-loop-statements
  for (let idx = messages.length - 1; idx >= 0; idx -= 1) {
    if (isSummaryMessage(messages[idx])) return idx;
  }
  return -1;
}

/**
 * Returns a copy of the message with some parts removed, or undefined when nothing
 * would remain. The original message is never modified.
 */
export function withoutParts(message: Message, drop: (part: MessagePart) => boolean): Message | undefined {
  const kept = message.parts.filter((part) => !drop(part));
  if (kept.length === message.parts.length) return message;
  if (kept.every((part) => part.type === 'usage')) return undefined;
  return createMessage(message.role, kept, { id: message.id, metadata: { ...message.metadata }, createdAt: message.createdAt });
}
