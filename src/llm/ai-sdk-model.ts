import { jsonSchema } from '@ai-sdk/provider-utils';
import { streamText } from 'ai';

import type { Message } from '../types.js';
import type { ModelCapability, ModelDelta, ModelRequestOptions, ModelToolDefinition } from './model.js';
import type { AssistantModelMessage, LanguageModel, LanguageModelUsage, ModelMessage, ToolModelMessage, ToolSet } from 'ai';

import { isPlainObject } from '../utils.js';

type AssistantPart = Exclude<AssistantModelMessage['content'], string>[number];
type ToolResultContent = ToolModelMessage['content'][number];

export interface AiSdkModelOptions {
  model: LanguageModel;
  refreshCredentials?: () => Promise<void>;
}

const NO_TOOL_OUTPUT = '(no output)';

const toolOutputText = (output: unknown): string => {
  if (typeof output === 'string') return output.length > 0 ? output : NO_TOOL_OUTPUT;
  if (output === undefined || output === null) return NO_TOOL_OUTPUT;
  return JSON.stringify(output);
};

/** Conversation messages in the shape the AI SDK takes. Usage parts are local bookkeeping and are not sent. */
export function toModelMessages(messages: readonly Message[]): ModelMessage[] {
  const converted: ModelMessage[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for (const message of messages) {
    const text = message.parts.flatMap((part) => (part.type === 'text' ? [part.text] : [])).join('');
    if (message.role === 'system') {
      converted.push({ role: 'system', content: text });
      continue;
    }
    if (message.role === 'user') {
      converted.push({ role: 'user', content: text });
      continue;
    }
    if (message.role === 'assistant') {
      const parts: AssistantPart[] = message.parts.flatMap((part): AssistantPart[] => {
        if (part.type === 'text') return part.text.trim().length > 0 ? [{ type: 'text', text: part.text }] : [];
        if (part.type === 'reasoning') return [{ type: 'reasoning', text: part.text }];
        if (part.type === 'tool-call') return [{ type: 'tool-call', toolCallId: part.callId, toolName: part.name, input: part.arguments }];
        return [];
      });
      converted.push({ role: 'assistant', content: parts.length > 0 ? parts : '' });
      continue;
    }
    const results: ToolResultContent[] = message.parts.flatMap((part): ToolResultContent[] => (part.type === 'tool-result'
      ? [{
          type: 'tool-result',
          toolCallId: part.callId,
          toolName: part.name,
          output: part.isError ? { type: 'error-text', value: toolOutputText(part.output) } : { type: 'text', value: toolOutputText(part.output) },
        }]
      : []));
    if (results.length > 0) converted.push({ role: 'tool', content: results });
  }
  return converted;
}

// Tools are declared without `execute`: the SDK only reports the calls, the scheduler runs them.
function toToolSet(tools: readonly ModelToolDefinition[]): ToolSet | undefined {
  if (tools.length === 0) return undefined;
  return Object.fromEntries(
    tools.map((tool) => [
      tool.name,
      {
        description: tool.description,
        inputSchema: jsonSchema(tool.parameters),
      },
    ]),
  ) as unknown as ToolSet;
}

const toUsage = (usage: LanguageModelUsage): ModelDelta => ({
  type: 'usage',
  usage: {
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
    totalTokens: usage.totalTokens,
    reasoningTokens: usage.reasoningTokens,
    cachedInputTokens: usage.cachedInputTokens,
  },
});

/** Model capability backed by any AI SDK language model, streamed through `streamText`. */
export class AiSdkModel implements ModelCapability {
  readonly id: string;
  readonly refreshCredentials?: () => Promise<void>;
  private readonly model: LanguageModel;

  constructor(options: AiSdkModelOptions) {
    this.model = options.model;
    this.id = typeof options.model === 'string' ? options.model : `${options.model.provider}:${options.model.modelId}`;
    this.refreshCredentials = options.refreshCredentials;
  }

  send(messages: readonly Message[], options: ModelRequestOptions): Promise<AsyncIterable<ModelDelta>> {
    return Promise.resolve(this.stream(messages, options));
  }

  private async *stream(messages: readonly Message[], options: ModelRequestOptions): AsyncGenerator<ModelDelta> {
    const result = streamText({
      model: this.model,
      messages: toModelMessages(messages),
      tools: toToolSet(options.tools),
      temperature: options.settings?.temperature,
      topP: options.settings?.topP,
      maxOutputTokens: options.settings?.maxOutputTokens,
      abortSignal: options.signal,
      maxRetries: 0,
    });

    // eslint-disable-next-line functional/no-loop-statements
    for await (const part of result.fullStream) {
      switch (part.type) {
        case 'text-delta':
          yield { type: 'text-delta', text: part.text };
          break;
        case 'reasoning-delta':
          yield { type: 'reasoning-delta', text: part.text };
          break;
        case 'tool-call':
          yield {
            type: 'tool-call',
            callId: part.toolCallId,
            name: part.toolName,
            arguments: isPlainObject(part.input) || typeof part.input === 'string' ? part.input : {},
          };
          break;
        case 'finish':
          yield toUsage(part.totalUsage);
          yield { type: 'finish', finishReason: part.finishReason };
          break;
        case 'error':
          throw part.error;
        default:
          break;
      }
    }
  }
}
