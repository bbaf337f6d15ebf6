import { describe, expect, it, vi } from 'vitest';

import type { CoordinationRequest, CoordinationResponse } from '../../types.js';

import { Agent } from '../../agent/agent.js';
import { EventCoordinator } from '../../coordination/event-coordinator.js';
import { InMemoryPermissionStore } from '../../coordination/permissions.js';
import { createThread, InMemoryConversationStore } from '../../history/stores.js';
import { ScriptedModel, textReply, toolCallReply } from '../../llm/scripted-model.js';
import { messageText, userMessage } from '../../messages.js';
import { FunctionRegistryBuilder } from '../../tools/function-registry.js';

const FAST_RETRY = { maxRetries: 3, initialDelayMs: 1, jitter: 0 };

const noFunctions = () => new FunctionRegistryBuilder().build();

const gatedRegistry = (invoker: () => string) => new FunctionRegistryBuilder()
  .add({ name: 'delete_file', description: 'Deletes a file', parameters: { type: 'object' }, requiresAdmission: true }, invoker)
  .build();

/** Answers coordination requests seen on `coordinator` with `respond`. */
const answer = (coordinator: EventCoordinator, respond: (request: CoordinationRequest) => CoordinationResponse): CoordinationRequest[] => {
  const seen: CoordinationRequest[] = [];
  coordinator.subscribe((event) => {
    if (event.type !== 'coordination_request') return;
    seen.push(event.request);
    coordinator.resolve(event.request.id, respond(event.request));
  });
  return seen;
};

describe('Agent', () => {
  it('stores each turn and replays the thread on the next run', async () => {
    const store = new InMemoryConversationStore();
    const model = new ScriptedModel([textReply('first reply'), textReply('second reply')]);
    const agent = new Agent({ model, functions: noFunctions(), store, systemPrompt: 'be brief', config: { retry: FAST_RETRY } });

    const first = await agent.run('t1', 'one');
    const second = await agent.run('t1', 'two');

    expect(first).toMatchObject({ status: 'completed', threadId: 't1', finalResponse: 'first reply' });
    expect(second).toMatchObject({ status: 'completed', finalResponse: 'second reply' });
    expect(model.calls[1].messages.map(messageText)).toEqual(['be brief', 'one', 'first reply', 'two']);
    expect((await store.load('t1'))?.messages.map(messageText)).toEqual(['one', 'first reply', 'two', 'second reply']);
  });

  it('runs a given thread object as is', async () => {
    const model = new ScriptedModel([textReply('sure')]);
    const agent = new Agent({ model, functions: noFunctions(), config: { retry: FAST_RETRY } });
    const thread = createThread('inline', [userMessage('earlier')]);

    const result = await agent.run(thread, 'now');

    expect(result.threadId).toBe('inline');
    expect(model.calls[0].messages.map(messageText)).toEqual(['earlier', 'now']);
  });

  it('serializes runs on the same thread', async () => {
    const store = new InMemoryConversationStore();
    const model = new ScriptedModel([textReply('reply one'), textReply('reply two')]);
    const agent = new Agent({ model, functions: noFunctions(), store, config: { retry: FAST_RETRY } });

    await Promise.all([agent.run('t1', 'one'), agent.run('t1', 'two')]);

    expect(model.calls[1].messages.map(messageText)).toEqual(['one', 'reply one', 'two']);
  });

  it('stores the partial history of a failed run', async () => {
    const store = new InMemoryConversationStore();
    const model = new ScriptedModel([1, 2, 3].map((n) => toolCallReply([{ callId: `c${String(n)}`, name: 'write', arguments: { n } }])));
    const functions = new FunctionRegistryBuilder()
      .add({ name: 'write', description: 'Writes', parameters: { type: 'object' } }, () => { throw new Error('disk full'); })
      .build();
    const agent = new Agent({ model, functions, store, config: { retry: FAST_RETRY } });

    const result = await agent.run('t1', 'save');

    expect(result.status).toBe('failed');
    expect((await store.load('t1'))?.messages.map((message) => message.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool', 'assistant', 'tool']);
  });

  it('replaces the stored thread after a reduction', async () => {
    const store = new InMemoryConversationStore();
    await store.append('t1', ['a', 'b', 'c', 'd'].map((text) => userMessage(text)));
    const model = new ScriptedModel([textReply('ok')]);
    const agent = new Agent({
      model,
      functions: noFunctions(),
      store,
      config: { retry: FAST_RETRY, history: { targetMessageCount: 2, summarizationThreshold: 0 } },
    });

    await agent.run('t1', 'e');

    expect((await store.load('t1'))?.messages.map(messageText)).toEqual(['d', 'e', 'ok']);
  });

  it('asks its coordinator before running a gated function and remembers the answer', async () => {
    const deleteFile = vi.fn().mockReturnValue('deleted');
    const model = new ScriptedModel([
      toolCallReply([{ callId: 'c1', name: 'delete_file', arguments: { path: 'a.txt' } }]),
      textReply('removed a.txt'),
      toolCallReply([{ callId: 'c2', name: 'delete_file', arguments: { path: 'b.txt' } }]),
      textReply('removed b.txt'),
    ]);
    const agent = new Agent({
      model,
      functions: gatedRegistry(deleteFile),
      permissionStore: new InMemoryPermissionStore(),
      config: { name: 'janitor', retry: FAST_RETRY },
    });
    const requests = answer(agent.coordinator, () => ({ kind: 'permission', approved: true, remember: { choice: 'always_allow', scope: 'conversation' } }));

    await agent.run('t1', 'remove a.txt');
    await agent.run('t1', 'remove b.txt');

    expect(deleteFile).toHaveBeenCalledTimes(2);
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      kind: 'permission',
      origin: 'janitor',
      payload: { functionName: 'delete_file', callId: 'c1', arguments: { path: 'a.txt' } },
    });
  });

  it('reports a denial to the model instead of running the function', async () => {
    const deleteFile = vi.fn().mockReturnValue('deleted');
    const model = new ScriptedModel([
      toolCallReply([{ callId: 'c1', name: 'delete_file', arguments: { path: 'a.txt' } }]),
      textReply('I was not allowed to.'),
    ]);
    const agent = new Agent({ model, functions: gatedRegistry(deleteFile), config: { retry: FAST_RETRY } });
    answer(agent.coordinator, () => ({ kind: 'permission', approved: false }));

    const result = await agent.run('t1', 'remove a.txt');

    expect(deleteFile).not.toHaveBeenCalled();
    expect(result.newMessages[1].parts).toEqual([
      { type: 'tool-result', callId: 'c1', name: 'delete_file', output: "Execution of 'delete_file' was denied by the user.", isError: true, ephemeral: false },
    ]);
  });

  it('surfaces permission requests of a nested agent at the outer coordinator', async () => {
    const deleteFile = vi.fn().mockReturnValue('deleted');
    const innerModel = new ScriptedModel([
      toolCallReply([{ callId: 'inner-1', name: 'delete_file', arguments: { path: 'tmp' } }]),
      textReply('cleaned up'),
    ], 'inner');
    const inner = new Agent({ model: innerModel, functions: gatedRegistry(deleteFile), config: { name: 'researcher-agent', retry: FAST_RETRY } });
    const delegate = inner.asFunction({ name: 'researcher', description: 'Delegates cleanup' });

    const outerModel = new ScriptedModel([
      toolCallReply([{ callId: 'outer-1', name: 'researcher', arguments: { prompt: 'clean up tmp' } }]),
      textReply('All done'),
    ], 'outer');
    const outer = new Agent({
      model: outerModel,
      functions: new FunctionRegistryBuilder().add(delegate.descriptor, delegate.invoker).build(),
      config: { name: 'lead', retry: FAST_RETRY },
    });
    const innerRequests = answer(inner.coordinator, () => ({ kind: 'permission', approved: false }));
    const outerRequests = answer(outer.coordinator, () => ({ kind: 'permission', approved: true }));

    const result = await outer.run('main', 'tidy up');

    expect(result).toMatchObject({ status: 'completed', finalResponse: 'All done' });
    expect(deleteFile).toHaveBeenCalledTimes(1);
    expect(innerRequests).toHaveLength(0);
    expect(outerRequests).toHaveLength(1);
    expect(outerRequests[0]).toMatchObject({ kind: 'permission', origin: 'researcher-agent', payload: { functionName: 'delete_file' } });
    expect(innerModel.calls[0].messages.map(messageText)).toEqual(['clean up tmp']);
    expect(result.newMessages[1].parts).toEqual([
      { type: 'tool-result', callId: 'outer-1', name: 'researcher', output: 'cleaned up', isError: false, ephemeral: false },
    ]);
  });

  it('turns a failed nested run into an error result', async () => {
    const inner = new Agent({ model: new ScriptedModel([], 'inner'), functions: noFunctions(), config: { retry: FAST_RETRY } });
    const delegate = inner.asFunction({ name: 'researcher', description: 'Delegates' });
    const outerModel = new ScriptedModel([
      toolCallReply([{ callId: 'outer-1', name: 'researcher', arguments: { prompt: 'look into it' } }]),
      textReply('It failed.'),
    ]);
    const outer = new Agent({
      model: outerModel,
      functions: new FunctionRegistryBuilder().add(delegate.descriptor, delegate.invoker).build(),
      config: { retry: FAST_RETRY },
    });

    const result = await outer.run('main', 'research');

    const part = result.newMessages[1].parts[0];
    expect(part.type === 'tool-result' ? part.isError : undefined).toBe(true);
    expect(part.type === 'tool-result' ? part.output : undefined).toBe(
      "Error: 'researcher' failed: inner: unknown is not retryable: scripted model 'inner' has no step for call 1",
    );
  });

  it('drops the lock of a thread once its run is over', async () => {
    const agent = new Agent({ model: new ScriptedModel([textReply('one'), textReply('two')]), functions: noFunctions() });

    const first = agent.run('a', 'hi');
    const second = agent.run('a', 'again');
    expect(agent.activeThreads).toBe(1);
    await Promise.all([first, second]);
    expect(agent.activeThreads).toBe(0);
  });

  it('keeps no locks for finished delegated calls', async () => {
    const inner = new Agent({ model: new ScriptedModel([textReply('a'), textReply('b'), textReply('c')], 'inner'), functions: noFunctions() });
    const delegate = inner.asFunction({ name: 'researcher', description: 'Delegates' });
    const outer = new Agent({
      model: new ScriptedModel([
        toolCallReply([1, 2, 3].map((n) => ({ callId: `outer-${String(n)}`, name: 'researcher', arguments: { prompt: `topic ${String(n)}` } }))),
        textReply('done'),
      ]),
      functions: new FunctionRegistryBuilder().add(delegate.descriptor, delegate.invoker).build(),
    });

    const result = await outer.run('main', 'research');

    expect(result).toMatchObject({ status: 'completed', finalResponse: 'done' });
    expect(inner.activeThreads).toBe(0);
    expect(outer.activeThreads).toBe(0);
  });

  it('logs through a structured logger built from its logging config', async () => {
    const lines: string[] = [];
    const agent = new Agent({
      model: new ScriptedModel([textReply('hello')]),
      functions: noFunctions(),
      config: { logging: { format: 'console' } },
      logWriter: (line) => { lines.push(line); },
    });

    await agent.run('t1', 'hi');

    expect(lines).toEqual(['[FIN] ← [1.0] agent scripted: run completed after 1 iterations\n']);
  });

  it('includes verbose entries when the logging config asks for them', async () => {
    const lines: string[] = [];
    const agent = new Agent({
      model: new ScriptedModel([textReply('hello')]),
      functions: noFunctions(),
      config: { logging: { format: 'console', verbose: true } },
      logWriter: (line) => { lines.push(line); },
    });

    await agent.run('t1', 'hi');

    expect(lines[0].startsWith('[VRB] → [0.0] agent scripted: run started (max 10 iterations)')).toBe(true);
    expect(lines.length).toBeGreaterThan(1);
  });

  it('validates delegation arguments against the default schema', () => {
    const inner = new Agent({ model: new ScriptedModel([]), functions: noFunctions() });
    const { descriptor } = inner.asFunction({ name: 'helper', description: 'Helps' });
    expect(descriptor.parameters).toEqual({
      type: 'object',
      properties: { prompt: { type: 'string', minLength: 1 } },
      required: ['prompt'],
      additionalProperties: false,
    });
  });
});
