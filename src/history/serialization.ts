import { z } from 'zod';

import type { ConversationThread, Message, MessagePart } from '../types.js';

import { ConfigurationError } from '../errors.js';
import { createMessage } from '../messages.js';

export const THREAD_FORMAT_VERSION = 1;

const UsageSchema = z.object({
  inputTokens: z.number().optional(),
  outputTokens: z.number().optional(),
  totalTokens: z.number().optional(),
  reasoningTokens: z.number().optional(),
  cachedInputTokens: z.number().optional(),
});

const PartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('reasoning'), text: z.string() }),
  z.object({
    type: z.literal('tool-call'),
    callId: z.string().min(1),
    name: z.string().min(1),
    arguments: z.record(z.unknown()),
  }),
  z.object({
    type: z.literal('tool-result'),
    callId: z.string().min(1),
    name: z.string().min(1),
    output: z.unknown(),
    isError: z.boolean(),
    ephemeral: z.boolean().default(false),
  }),
  z.object({ type: z.literal('usage'), usage: UsageSchema }),
]);

const MetadataSchema = z.object({
  isSummary: z.boolean().optional(),
  isContainerResult: z.boolean().optional(),
  inputTokens: z.number().optional(),
  outputTokens: z.number().optional(),
  summarizedCount: z.number().int().optional(),
}).passthrough();

const MessageSchema = z.object({
  id: z.string().min(1),
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  parts: z.array(PartSchema),
  metadata: MetadataSchema.default({}),
  createdAt: z.string(),
});

const ThreadSchema = z.object({
  version: z.literal(THREAD_FORMAT_VERSION),
  id: z.string().min(1),
  metadata: z.object({
    createdAt: z.string(),
    lastActivity: z.string(),
    tags: z.record(z.string()).default({}),
  }),
  messages: z.array(MessageSchema),
});

export type SerializedThread = z.input<typeof ThreadSchema>;

// Tool outputs are persisted as JSON; values JSON cannot carry (functions, undefined) are dropped.
const toJsonValue = (value: unknown): unknown => {
  if (value === undefined) return null;
  const text = JSON.stringify(value);
  if (text === undefined) return null;
  const parsed: unknown = JSON.parse(text);
  return parsed;
};

const serializePart = (part: MessagePart): MessagePart => {
  if (part.type === 'tool-result') return { ...part, output: toJsonValue(part.output) };
  if (part.type === 'tool-call') return { ...part, arguments: { ...part.arguments } };
  return { ...part };
};

export function serializeThread(thread: ConversationThread): string {
  const payload: SerializedThread = {
    version: THREAD_FORMAT_VERSION,
    id: thread.id,
    metadata: { ...thread.metadata, tags: { ...thread.metadata.tags } },
    messages: thread.messages.map((message) => ({
      id: message.id,
      role: message.role,
      parts: message.parts.map(serializePart),
      metadata: { ...message.metadata },
      createdAt: message.createdAt,
    })),
  };
  return JSON.stringify(payload);
}

// zod infers `unknown` members as optional keys; rebuild the part with the key present
const restorePart = (part: z.output<typeof PartSchema>): MessagePart => {
  if (part.type === 'tool-result') {
    return {
      type: 'tool-result',
      callId: part.callId,
      name: part.name,
      output: part.output,
      isError: part.isError,
      ephemeral: part.ephemeral,
    };
  }
  return part;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
    .join('\n');
}

/** @throws ConfigurationError when the text is not a valid serialized thread */
export function deserializeThread(text: string, source = 'thread'): ConversationThread {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigurationError(`Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = ThreadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Thread validation failed in ${source}:\n${formatIssues(parsed.error)}`);
  }
  const { data } = parsed;
  const messages: Message[] = data.messages.map((message) => createMessage(message.role, message.parts.map(restorePart), {
    id: message.id,
    metadata: message.metadata,
    createdAt: message.createdAt,
  }));
  return { id: data.id, metadata: data.metadata, messages };
}
