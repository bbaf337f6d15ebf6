import type { Summarizer } from '../context/history-manager.js';
import type { Message } from '../types.js';
import type { ModelCapability, ModelSettings } from './model.js';

import { SUMMARIZER_SYSTEM_PROMPT } from '../llm-messages.js';
import { messageText, systemMessage, userMessage } from '../messages.js';

import { assembleReply } from './stream-assembler.js';

const transcriptLine = (message: Message): string => {
  const chunks = message.parts.flatMap((part) => {
    switch (part.type) {
      case 'text':
        return [part.text];
      case 'tool-call':
        return [`[call ${part.name} ${JSON.stringify(part.arguments)}]`];
      case 'tool-result':
        return [`[result ${part.name}${part.isError ? ' (error)' : ''}: ${typeof part.output === 'string' ? part.output : JSON.stringify(part.output)}]`];
      default:
        return [];
    }
  });
  return `${message.role}: ${chunks.join(' ')}`;
};

/** Summarizer that asks a model to compress the dropped span into one paragraph. */
export class ModelSummarizer implements Summarizer {
  constructor(private readonly model: ModelCapability, private readonly settings?: ModelSettings) {}

  async summarize(messages: readonly Message[], signal?: AbortSignal): Promise<string> {
    const transcript = messages.map(transcriptLine).join('\n');
    const reply = await this.model.send([systemMessage(SUMMARIZER_SYSTEM_PROMPT), userMessage(transcript)], {
      tools: [],
      settings: this.settings,
      signal,
    });
    const { message } = await assembleReply(reply);
    const summary = messageText(message).trim();
    if (summary.length === 0) throw new Error(`summarizer model '${this.model.id}' returned an empty summary`);
    return summary;
  }
}
