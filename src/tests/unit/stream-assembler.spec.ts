import { describe, expect, it } from 'vitest';

import type { ModelDelta } from '../../llm/model.js';

import { assembleReply, mergeUsage, StreamAssembler } from '../../llm/stream-assembler.js';

async function* deltas(items: ModelDelta[]): AsyncGenerator<ModelDelta> {
  // eslint-disable-next-line functional/no-loop-statements
  for (const item of items) {
    await Promise.resolve();
    yield item;
  }
}

describe('StreamAssembler', () => {
  it('merges consecutive deltas of the same kind and forwards them', () => {
    const texts: string[] = [];
    const thoughts: string[] = [];
    const assembler = new StreamAssembler({ onText: (t) => texts.push(t), onReasoning: (t) => thoughts.push(t) });
    assembler.push({ type: 'reasoning-delta', text: 'let me ' });
    assembler.push({ type: 'reasoning-delta', text: 'think' });
    assembler.push({ type: 'text-delta', text: 'Hel' });
    assembler.push({ type: 'text-delta', text: '' });
    assembler.push({ type: 'text-delta', text: 'lo' });
    assembler.push({ type: 'finish', finishReason: 'stop' });

    const reply = assembler.finish();
    expect(reply.message.role).toBe('assistant');
    expect(reply.message.parts).toEqual([
      { type: 'reasoning', text: 'let me think' },
      { type: 'text', text: 'Hello' },
    ]);
    expect(reply.finishReason).toBe('stop');
    expect(reply.usage).toEqual({});
    expect(texts).toEqual(['Hel', 'lo']);
    expect(thoughts).toEqual(['let me ', 'think']);
  });

  it('keeps text on either side of a tool call apart', () => {
    const assembler = new StreamAssembler();
    assembler.push({ type: 'text-delta', text: 'before' });
    assembler.push({ type: 'tool-call', callId: 'c1', name: 'lookup', arguments: { q: 'x' } });
    assembler.push({ type: 'text-delta', text: 'after' });

    expect(assembler.finish().message.parts).toEqual([
      { type: 'text', text: 'before' },
      { type: 'tool-call', callId: 'c1', name: 'lookup', arguments: { q: 'x' } },
      { type: 'text', text: 'after' },
    ]);
  });

  it('parses and repairs string arguments', () => {
    const assembler = new StreamAssembler();
    assembler.push({ type: 'tool-call', callId: 'c1', name: 'a', arguments: '{"city":"Oslo"}' });
    assembler.push({ type: 'tool-call', callId: 'c2', name: 'b', arguments: '{"city":"Oslo"' });
    assembler.push({ type: 'tool-call', callId: 'c3', name: 'c', arguments: '[1, 2]' });
    assembler.push({ type: 'tool-call', callId: 'c4', name: 'd', arguments: '' });

    const args = assembler.finish().message.parts.map((part) => (part.type === 'tool-call' ? part.arguments : undefined));
    expect(args).toEqual([{ city: 'Oslo' }, { city: 'Oslo' }, {}, {}]);
  });

  it('records usage as a part and in the metadata', () => {
    const assembler = new StreamAssembler();
    assembler.push({ type: 'text-delta', text: 'hi' });
    assembler.push({ type: 'usage', usage: { inputTokens: 10, outputTokens: 2 } });
    assembler.push({ type: 'usage', usage: { outputTokens: 3, totalTokens: 15 } });

    const reply = assembler.finish();
    expect(reply.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(reply.message.parts.at(-1)).toEqual({ type: 'usage', usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } });
    expect(reply.message.metadata).toEqual({ inputTokens: 10, outputTokens: 5 });
  });
});

describe('mergeUsage', () => {
  it('adds present counters and leaves absent ones out', () => {
    expect(mergeUsage({ inputTokens: 1 }, { inputTokens: 2, reasoningTokens: 4 })).toEqual({ inputTokens: 3, reasoningTokens: 4 });
    expect(mergeUsage({}, {})).toEqual({});
  });
});

describe('assembleReply', () => {
  it('consumes a delta stream', async () => {
    const seen: string[] = [];
    const reply = await assembleReply(deltas([
      { type: 'text-delta', text: 'a' },
      { type: 'text-delta', text: 'b' },
      { type: 'usage', usage: { inputTokens: 4, outputTokens: 1 } },
      { type: 'finish', finishReason: 'stop' },
    ]), { onText: (t) => seen.push(t) });

    expect(reply.message.parts).toEqual([
      { type: 'text', text: 'ab' },
      { type: 'usage', usage: { inputTokens: 4, outputTokens: 1 } },
    ]);
    expect(reply.finishReason).toBe('stop');
    expect(seen).toEqual(['a', 'b']);
  });

  it('treats a whole response like a stream', async () => {
    const seen: string[] = [];
    const reply = await assembleReply({
      parts: [
        { type: 'text', text: 'checking' },
        { type: 'tool-call', callId: 'c1', name: 'lookup', arguments: {} },
        { type: 'tool-result', callId: 'c0', name: 'stray', output: 'x', isError: false, ephemeral: false },
      ],
      usage: { inputTokens: 7, outputTokens: 2 },
      finishReason: 'tool-calls',
    }, { onText: (t) => seen.push(t) });

    expect(reply.message.parts).toEqual([
      { type: 'text', text: 'checking' },
      { type: 'tool-call', callId: 'c1', name: 'lookup', arguments: {} },
      { type: 'usage', usage: { inputTokens: 7, outputTokens: 2 } },
    ]);
    expect(reply.finishReason).toBe('tool-calls');
    expect(seen).toEqual(['checking']);
  });
});
