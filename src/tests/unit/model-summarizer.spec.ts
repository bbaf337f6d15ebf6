import { describe, expect, it } from 'vitest';

import { SUMMARIZER_SYSTEM_PROMPT } from '../../llm-messages.js';
import { ModelSummarizer } from '../../llm/model-summarizer.js';
import { ScriptedModel, textReply } from '../../llm/scripted-model.js';
import { createMessage, messageText, userMessage } from '../../messages.js';

describe('ModelSummarizer', () => {
  it('sends a transcript and returns the trimmed summary', async () => {
    const model = new ScriptedModel([textReply('  user asked; lookup failed  ')]);
    const summarizer = new ModelSummarizer(model);

    const summary = await summarizer.summarize([
      userMessage('hi'),
      createMessage('assistant', [{ type: 'tool-call', callId: 'c1', name: 'lookup', arguments: { q: 'x' } }]),
      createMessage('tool', [{ type: 'tool-result', callId: 'c1', name: 'lookup', output: 'boom', isError: true, ephemeral: false }]),
    ]);

    expect(summary).toBe('user asked; lookup failed');
    expect(model.calls[0].toolNames).toEqual([]);
    expect(model.calls[0].messages.map(messageText)).toEqual([
      SUMMARIZER_SYSTEM_PROMPT,
      'user: hi\nassistant: [call lookup {"q":"x"}]\ntool: [result lookup (error): boom]',
    ]);
  });

  it('rejects an empty summary', async () => {
    const summarizer = new ModelSummarizer(new ScriptedModel([textReply('   ')]));
    await expect(summarizer.summarize([userMessage('hi')])).rejects.toThrow("summarizer model 'scripted' returned an empty summary");
  });
});
