import type { Message } from '../types.js';
import type { ModelCapability, ModelDelta, ModelRequestOptions, ModelResponse } from './model.js';

export type ScriptedStep =
  | { kind: 'response'; response: ModelResponse }
  | { kind: 'stream'; deltas: ModelDelta[] }
  | { kind: 'error'; error: unknown }
  | { kind: 'dynamic'; respond: (messages: readonly Message[], options: ModelRequestOptions) => ModelResponse | Promise<ModelResponse> };

export interface ScriptedCall {
  messages: readonly Message[];
  toolNames: string[];
}

/**
 * Deterministic model that replays a fixed list of steps, one per call. Used by the
 * test suite and for dry runs; running past the end of the script is an error.
 */
export class ScriptedModel implements ModelCapability {
  readonly id: string;
  readonly calls: ScriptedCall[] = [];
  refreshCredentials?: () => Promise<void>;
  private readonly steps: ScriptedStep[];

  constructor(steps: ScriptedStep[], id = 'scripted') {
    this.steps = [...steps];
    this.id = id;
  }

  get remaining(): number {
    return this.steps.length;
  }

  async send(messages: readonly Message[], options: ModelRequestOptions): Promise<ModelResponse | AsyncIterable<ModelDelta>> {
    this.calls.push({ messages: [...messages], toolNames: options.tools.map((tool) => tool.name) });
    const step = this.steps.shift();
    if (step === undefined) throw new Error(`scripted model '${this.id}' has no step for call ${String(this.calls.length)}`);
    switch (step.kind) {
      case 'response':
        return step.response;
      case 'stream':
        return replay(step.deltas, options.signal);
      case 'error':
        throw step.error;
      case 'dynamic':
        return await step.respond(messages, options);
    }
  }
}

async function* replay(deltas: readonly ModelDelta[], signal?: AbortSignal): AsyncGenerator<ModelDelta> {
  // eslint-disable-next-line functional/no-loop-statements
  for (const delta of deltas) {
    if (signal?.aborted === true) return;
    await Promise.resolve();
    yield delta;
  }
}

// Step builders

export const textReply = (text: string, usage?: ModelResponse['usage']): ScriptedStep => ({
  kind: 'response',
  response: { parts: [{ type: 'text', text }], usage, finishReason: 'stop' },
});

export const toolCallReply = (
  calls: { callId: string; name: string; arguments?: Record<string, unknown> }[],
  text?: string,
): ScriptedStep => ({
  kind: 'response',
  response: {
    parts: [
      ...(text !== undefined ? [{ type: 'text' as const, text }] : []),
      ...calls.map((call) => ({ type: 'tool-call' as const, callId: call.callId, name: call.name, arguments: call.arguments ?? {} })),
    ],
    finishReason: 'tool-calls',
  },
});

export const streamReply = (deltas: ModelDelta[]): ScriptedStep => ({ kind: 'stream', deltas });

export const failingReply = (error: unknown): ScriptedStep => ({ kind: 'error', error });
