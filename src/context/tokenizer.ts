import { get_encoding } from '@dqbd/tiktoken';

import type { Message, MessagePart } from '../types.js';
import type { TiktokenEncoding } from '@dqbd/tiktoken';

import { toErrorMessage, warn } from '../utils.js';

export interface Tokenizer {
  readonly id: string;
  countText: (text: string) => number;
}

const APPROXIMATE_ID = 'approximate';
const MESSAGE_OVERHEAD_TOKENS = 4;
const TOOL_CALL_OVERHEAD_TOKENS = 2;

const TIKTOKEN_ENCODINGS: readonly TiktokenEncoding[] = ['gpt2', 'r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base'];

const isTiktokenEncoding = (value: string): value is TiktokenEncoding =>
  TIKTOKEN_ENCODINGS.some((encoding) => encoding === value);

const tokenizerCache = new Map<string, Tokenizer>();

export const approximateTokenizer: Tokenizer = {
  id: APPROXIMATE_ID,
  countText: (text: string): number => {
    if (text.length === 0) return 0;
    // Rough heuristic: 4 characters ≈ 1 token, clamp to at least 1.
    return Math.max(1, Math.ceil(text.length / 4));
  },
};

function createTiktokenTokenizer(id: string, encodingName: TiktokenEncoding): Tokenizer {
  try {
    const encoding = get_encoding(encodingName);
    return {
      id,
      countText: (text: string): number => (text.length === 0 ? 0 : encoding.encode(text).length),
    };
  } catch (error: unknown) {
    warn(`tiktoken encoding '${encodingName}' unavailable, using approximate token counts: ${toErrorMessage(error)}`);
    return approximateTokenizer;
  }
}

/**
 * `approximate` (default) or `tiktoken:<encoding>`, e.g. `tiktoken:cl100k_base`.
 * Unknown ids fall back to the approximation with a warning.
 */
export function resolveTokenizer(id?: string): Tokenizer {
  const normalized = id?.trim() ?? '';
  if (normalized.length === 0 || normalized.toLowerCase() === APPROXIMATE_ID) return approximateTokenizer;
  const cached = tokenizerCache.get(normalized);
  if (cached !== undefined) return cached;

  let tokenizer = approximateTokenizer;
  if (normalized.toLowerCase().startsWith('tiktoken:')) {
    const encodingName = normalized.slice('tiktoken:'.length).trim();
    if (isTiktokenEncoding(encodingName)) {
      tokenizer = createTiktokenTokenizer(normalized, encodingName);
    } else {
      warn(`unknown tiktoken encoding '${encodingName}', using approximate token counts`);
    }
  } else {
    warn(`unknown tokenizer '${normalized}', using approximate token counts`);
  }
  tokenizerCache.set(normalized, tokenizer);
  return tokenizer;
}

function serializePart(part: MessagePart): string {
  switch (part.type) {
    case 'text':
    case 'reasoning':
      return part.text;
    case 'tool-call':
      return `${part.name} ${JSON.stringify(part.arguments)}`;
    case 'tool-result':
      return typeof part.output === 'string' ? part.output : JSON.stringify(part.output) ?? '';
    case 'usage':
      return '';
  }
}

/**
 * Token cost of one message. A provider-reported output count on an assistant
 * message wins over the estimate.
 */
export function estimateMessageTokens(tokenizer: Tokenizer, message: Message): number {
  const reported = message.metadata.outputTokens;
  if (message.role === 'assistant' && typeof reported === 'number' && reported > 0) {
    return reported + MESSAGE_OVERHEAD_TOKENS;
  }
  const text = message.parts.map(serializePart).filter((chunk) => chunk.length > 0).join('\n');
  const toolCalls = message.parts.filter((part) => part.type === 'tool-call').length;
  return tokenizer.countText(text) + MESSAGE_OVERHEAD_TOKENS + TOOL_CALL_OVERHEAD_TOKENS * toolCalls;
}

export function estimateMessagesTokens(tokenizer: Tokenizer, messages: readonly Message[]): number {
  return messages.reduce((total, message) => total + estimateMessageTokens(tokenizer, message), 0);
}
