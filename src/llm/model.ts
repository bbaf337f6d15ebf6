import type { JsonSchema } from '../tools/types.js';
import type { Message, MessagePart, TokenUsage } from '../types.js';

export interface ModelToolDefinition {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export interface ModelSettings {
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
}

export interface ModelRequestOptions {
  tools: readonly ModelToolDefinition[];
  settings?: ModelSettings;
  signal?: AbortSignal;
}

/** Complete, non-streamed reply. */
export interface ModelResponse {
  parts: MessagePart[];
  usage?: TokenUsage;
  finishReason?: string;
}

export type ModelDelta =
  | { type: 'text-delta'; text: string }
  | { type: 'reasoning-delta'; text: string }
  // arguments may arrive as raw JSON text; it is parsed (and repaired) on assembly
  | { type: 'tool-call'; callId: string; name: string; arguments: Record<string, unknown> | string }
  | { type: 'usage'; usage: TokenUsage }
  | { type: 'finish'; finishReason?: string };

/**
 * What the turn loop needs from a model. Implementations either return the whole
 * reply or a stream of deltas; errors are thrown and classified by the retry engine.
 */
export interface ModelCapability {
  readonly id: string;
  send: (messages: readonly Message[], options: ModelRequestOptions) => Promise<ModelResponse | AsyncIterable<ModelDelta>>;
  refreshCredentials?: () => Promise<void>;
}

export const isDeltaStream = (value: ModelResponse | AsyncIterable<ModelDelta>): value is AsyncIterable<ModelDelta> =>
  Symbol.asyncIterator in value;
