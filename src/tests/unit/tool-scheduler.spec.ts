import { describe, expect, it, vi } from 'vitest';

import type { AgentEvent } from '../../types.js';
import type { AdmissionCheck, FunctionInvoker } from '../../tools/types.js';

import { UnknownFunctionError } from '../../errors.js';
import { RetryEngine } from '../../retry/retry-engine.js';
import { FunctionRegistryBuilder } from '../../tools/function-registry.js';
import { RunScope } from '../../tools/run-scope.js';
import { ToolScheduler } from '../../tools/tool-scheduler.js';

const objectSchema = { type: 'object' };

const delay = async (ms: number, signal?: AbortSignal): Promise<void> => await new Promise((resolve) => {
  const timer = setTimeout(resolve, ms);
  signal?.addEventListener('abort', () => {
    clearTimeout(timer);
    resolve();
  }, { once: true });
});

const registryWith = (functions: Record<string, FunctionInvoker>, parameters: Record<string, unknown> = objectSchema) => {
  const builder = new FunctionRegistryBuilder();
  Object.entries(functions).forEach(([name, invoker]) => {
    builder.add({ name, description: name, parameters }, invoker);
  });
  return builder.build();
};

const fastRetry = (maxRetries = 3) => new RetryEngine({ config: { maxRetries, initialDelayMs: 1, jitter: 0 } });

describe('ToolScheduler', () => {
  it('returns results in request order whatever order calls finish in', async () => {
    const registry = registryWith({
      slow: async (_args, ctx) => { await delay(30, ctx.signal); return 'slow done'; },
      fast: () => 'fast done',
    });
    const scheduler = new ToolScheduler({ retry: fastRetry() });
    const results = await scheduler.executeBatch([
      { callId: 'a', name: 'slow', arguments: {} },
      { callId: 'b', name: 'fast', arguments: {} },
    ], registry, { scope: new RunScope() });

    expect(results.map((r) => [r.callId, r.status.type, r.output])).toEqual([
      ['a', 'success', 'slow done'],
      ['b', 'success', 'fast done'],
    ]);
  });

  it('bounds concurrency', async () => {
    let active = 0;
    let peak = 0;
    const registry = registryWith({
      work: async (_args, ctx) => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(15, ctx.signal);
        active -= 1;
        return 'ok';
      },
    });
    const scheduler = new ToolScheduler({ config: { maxConcurrency: 2 }, retry: fastRetry() });
    const requests = ['1', '2', '3', '4', '5'].map((callId) => ({ callId, name: 'work', arguments: { n: callId } }));
    const results = await scheduler.executeBatch(requests, registry, { scope: new RunScope() });

    expect(results).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it('runs calls one after another in sequential mode', async () => {
    const order: string[] = [];
    const registry = registryWith({
      step: async (args, ctx) => {
        order.push(`start ${String(args.id)}`);
        await delay(5, ctx.signal);
        order.push(`end ${String(args.id)}`);
        return 'ok';
      },
    });
    const scheduler = new ToolScheduler({ config: { mode: 'sequential' }, retry: fastRetry() });
    await scheduler.executeBatch([
      { callId: 'a', name: 'step', arguments: { id: 1 } },
      { callId: 'b', name: 'step', arguments: { id: 2 } },
    ], registry, { scope: new RunScope() });
    expect(order).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('answers unknown functions with corrective text', async () => {
    const registry = registryWith({ alpha: () => 'a', beta: () => 'b' });
    const scheduler = new ToolScheduler({ retry: fastRetry() });
    const [result] = await scheduler.executeBatch([{ callId: 'x', name: 'gamma', arguments: {} }], registry, { scope: new RunScope() });

    expect(result.status).toEqual({ type: 'unknown_function' });
    expect(result.output).toBe("Error: function 'gamma' does not exist. Available functions: alpha, beta. Call one of the available functions instead.");
    expect(result.attempts).toBe(0);
  });

  it('throws before running anything when configured to terminate on unknown calls', async () => {
    const alpha = vi.fn().mockReturnValue('a');
    const registry = registryWith({ alpha });
    const scheduler = new ToolScheduler({ config: { terminateOnUnknownCalls: true }, retry: fastRetry() });

    await expect(scheduler.executeBatch([
      { callId: '1', name: 'alpha', arguments: {} },
      { callId: '2', name: 'gamma', arguments: {} },
    ], registry, { scope: new RunScope() })).rejects.toBeInstanceOf(UnknownFunctionError);
    expect(alpha).not.toHaveBeenCalled();
  });

  it('rejects arguments that do not match the schema', async () => {
    const invoker = vi.fn().mockReturnValue('never');
    const registry = registryWith({ weather: invoker }, { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] });
    const scheduler = new ToolScheduler({ retry: fastRetry() });
    const [result] = await scheduler.executeBatch([{ callId: '1', name: 'weather', arguments: {} }], registry, { scope: new RunScope() });

    expect(result.status).toEqual({ type: 'invalid_arguments', issues: ["/ must have required property 'city'"] });
    expect(result.output).toBe("Error: invalid arguments for 'weather': / must have required property 'city'. Fix the arguments and call it again.");
    expect(invoker).not.toHaveBeenCalled();
  });

  it('short-circuits on an admission denial', async () => {
    const invoker = vi.fn().mockReturnValue('never');
    const registry = registryWith({ drop_table: invoker });
    const denyAll: AdmissionCheck = {
      name: 'deny-all',
      check: () => Promise.resolve({ admitted: false, reason: 'denied', message: "Execution of 'drop_table' was denied by the user." }),
    };
    const scheduler = new ToolScheduler({ retry: fastRetry(), admissionChecks: [denyAll] });
    const [result] = await scheduler.executeBatch([{ callId: '1', name: 'drop_table', arguments: {} }], registry, { scope: new RunScope() });

    expect(result.status).toEqual({ type: 'denied', reason: 'denied', message: "Execution of 'drop_table' was denied by the user." });
    expect(result.output).toBe("Execution of 'drop_table' was denied by the user.");
    expect(invoker).not.toHaveBeenCalled();
  });

  it('enforces the per-call deadline', async () => {
    let aborted = false;
    const registry = registryWith({
      slow: async (_args, ctx) => {
        ctx.signal.addEventListener('abort', () => { aborted = true; });
        await delay(1000, ctx.signal);
        return 'late';
      },
    });
    const scheduler = new ToolScheduler({ config: { timeoutMs: 20 }, retry: fastRetry(0) });
    const [result] = await scheduler.executeBatch([{ callId: '1', name: 'slow', arguments: {} }], registry, { scope: new RunScope() });

    expect(result.status).toEqual({ type: 'timeout', timeoutMs: 20 });
    expect(result.output).toBe("Error: 'slow' did not finish within 20ms.");
    expect(aborted).toBe(true);
  });

  it('retries transient failures of a call', async () => {
    const flaky = vi.fn()
      .mockRejectedValueOnce(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))
      .mockResolvedValueOnce('recovered');
    const registry = registryWith({ flaky });
    const scheduler = new ToolScheduler({ retry: fastRetry() });
    const [result] = await scheduler.executeBatch([{ callId: '1', name: 'flaky', arguments: {} }], registry, { scope: new RunScope() });

    expect(result.status).toEqual({ type: 'success' });
    expect(result.output).toBe('recovered');
    expect(result.attempts).toBe(2);
  });

  it('turns a thrown error into an error result', async () => {
    const registry = registryWith({ write: () => { throw new Error('disk full'); } });
    const scheduler = new ToolScheduler({ retry: fastRetry() });
    const [result] = await scheduler.executeBatch([{ callId: '1', name: 'write', arguments: {} }], registry, { scope: new RunScope() });

    expect(result.status).toEqual({ type: 'error', message: 'disk full', category: 'unknown' });
    expect(result.output).toBe("Error: 'write' failed: disk full");
    expect(result.attempts).toBe(1);
  });

  it('reports calls as cancelled once the run is aborted', async () => {
    const invoker = vi.fn().mockReturnValue('never');
    const registry = registryWith({ work: invoker });
    const controller = new AbortController();
    controller.abort('stop');
    const scheduler = new ToolScheduler({ retry: fastRetry() });
    const [result] = await scheduler.executeBatch([{ callId: '1', name: 'work', arguments: {} }], registry, { scope: new RunScope(), signal: controller.signal });

    expect(result.status).toEqual({ type: 'cancelled' });
    expect(result.output).toBe("Error: 'work' was cancelled before it finished.");
    expect(invoker).not.toHaveBeenCalled();
  });

  it('emits start and completion events', async () => {
    const events: AgentEvent[] = [];
    const registry = registryWith({ ping: () => 'pong' });
    const scheduler = new ToolScheduler({ retry: fastRetry(), onEvent: (event) => { events.push(event); } });
    const scope = new RunScope({ runId: 'run-1' });
    await scheduler.executeBatch([{ callId: '1', name: 'ping', arguments: {} }], registry, { scope });

    expect(events.map((event) => event.type)).toEqual(['tool_call_started', 'tool_call_completed']);
    expect(events[0]).toEqual({ type: 'tool_call_started', runId: 'run-1', callId: '1', name: 'ping' });
    expect(events[1]).toMatchObject({ type: 'tool_call_completed', runId: 'run-1', callId: '1', name: 'ping', status: 'success' });
  });
});
