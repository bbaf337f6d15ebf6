import { performance } from 'node:perf_hooks';

import { afterEach, describe, expect, it } from 'vitest';

import type { AgentEvent, CoordinationRequest } from '../../types.js';

import { EventCoordinator } from '../../coordination/event-coordinator.js';
import { setWarningSink } from '../../utils.js';

const permissionRequest = {
  kind: 'permission' as const,
  payload: { functionName: 'delete_file', callId: 'call-1', arguments: { path: '/tmp/x' } },
};

const nextRequest = async (coordinator: EventCoordinator): Promise<CoordinationRequest> => await new Promise((resolve) => {
  const unsubscribe = coordinator.subscribe((event) => {
    if (event.type !== 'coordination_request') return;
    unsubscribe();
    resolve(event.request);
  });
});

describe('EventCoordinator', () => {
  afterEach(() => {
    setWarningSink(undefined);
  });

  it('delivers events after emit returns', async () => {
    const coordinator = new EventCoordinator();
    const received: AgentEvent[] = [];
    coordinator.subscribe((event) => { received.push(event); });

    const event: AgentEvent = { type: 'progress', message: 'working' };
    coordinator.emit(event);
    expect(received).toEqual([]);
    await coordinator.flush();
    expect(received).toEqual([event]);
  });

  it('resolves a pending request once', async () => {
    const coordinator = new EventCoordinator();
    const requested = nextRequest(coordinator);
    const pending = coordinator.emitAndAwait(permissionRequest, { timeoutMs: 5000 });

    const request = await requested;
    expect(request.kind).toBe('permission');
    expect(coordinator.pendingCount).toBe(1);
    expect(coordinator.resolve(request.id, { kind: 'permission', approved: true })).toBe(true);
    expect(coordinator.resolve(request.id, { kind: 'permission', approved: false })).toBe(false);

    await expect(pending).resolves.toEqual({ status: 'resolved', response: { kind: 'permission', approved: true } });
    expect(coordinator.pendingCount).toBe(0);
  });

  it('returns false for unknown ids and mismatched kinds', async () => {
    const warnings: string[] = [];
    setWarningSink((message) => { warnings.push(message); });
    const coordinator = new EventCoordinator();
    const requested = nextRequest(coordinator);
    const pending = coordinator.emitAndAwait(permissionRequest, { timeoutMs: 5000 });
    const request = await requested;

    expect(coordinator.resolve('no-such-id', { kind: 'permission', approved: true })).toBe(false);
    expect(coordinator.resolve(request.id, { kind: 'clarification', answer: 'yes' })).toBe(false);
    expect(warnings).toEqual([`coordination response kind 'clarification' does not match request 'permission' (${request.id})`]);

    coordinator.resolve(request.id, { kind: 'permission', approved: false });
    await expect(pending).resolves.toEqual({ status: 'resolved', response: { kind: 'permission', approved: false } });
  });

  it('times out with a distinct outcome', async () => {
    const coordinator = new EventCoordinator();
    const outcome = await coordinator.emitAndAwait(permissionRequest, { timeoutMs: 20 });
    expect(outcome).toEqual({ status: 'timeout', timeoutMs: 20 });
    expect(coordinator.pendingCount).toBe(0);
  });

  it('times out no earlier than asked and well before twice as long', async () => {
    const coordinator = new EventCoordinator();
    const startedAt = performance.now();
    const outcome = await coordinator.emitAndAwait(permissionRequest, { timeoutMs: 100 });
    const elapsed = performance.now() - startedAt;

    expect(outcome).toEqual({ status: 'timeout', timeoutMs: 100 });
    expect(elapsed).toBeGreaterThanOrEqual(100);
    expect(elapsed).toBeLessThan(200);
  });

  it('clamps the timeout to the configured maximum', async () => {
    const coordinator = new EventCoordinator({ maxTimeoutMs: 30 });
    const outcome = await coordinator.emitAndAwait(permissionRequest, { timeoutMs: 60_000 });
    expect(outcome).toEqual({ status: 'timeout', timeoutMs: 30 });
  });

  it('settles as cancelled promptly when the signal aborts', async () => {
    const coordinator = new EventCoordinator();
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => { controller.abort('user stop'); }, 10);

    const outcome = await coordinator.emitAndAwait(permissionRequest, { timeoutMs: 60_000, signal: controller.signal });
    expect(outcome).toEqual({ status: 'cancelled', reason: 'user stop' });
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(coordinator.pendingCount).toBe(0);
  });

  it('does not wait at all on an already aborted signal', async () => {
    const coordinator = new EventCoordinator();
    const controller = new AbortController();
    controller.abort('gone');
    await expect(coordinator.emitAndAwait(permissionRequest, { signal: controller.signal }))
      .resolves.toEqual({ status: 'cancelled', reason: 'gone' });
  });

  it('cancels every pending request, including in children', async () => {
    const parent = new EventCoordinator({ name: 'parent' });
    const child = new EventCoordinator({ name: 'child' });
    child.setParent(parent);

    const first = parent.emitAndAwait(permissionRequest, { timeoutMs: 60_000 });
    const second = child.emitAndAwait({ kind: 'clarification', payload: { question: 'Which file?' } }, { timeoutMs: 60_000 });
    parent.cancelAll('shutdown');

    await expect(first).resolves.toEqual({ status: 'cancelled', reason: 'shutdown' });
    await expect(second).resolves.toEqual({ status: 'cancelled', reason: 'shutdown' });
  });

  it('bubbles child events to the parent and routes resolutions back down', async () => {
    const parent = new EventCoordinator({ name: 'parent' });
    const child = new EventCoordinator({ name: 'child' });
    child.setParent(parent);
    const requested = nextRequest(parent);

    const pending = child.emitAndAwait({ kind: 'clarification', payload: { question: 'Which file?' } }, { timeoutMs: 5000 });
    const request = await requested;
    expect(parent.resolve(request.id, { kind: 'clarification', answer: 'notes.md' })).toBe(true);

    await expect(pending).resolves.toEqual({ status: 'resolved', response: { kind: 'clarification', answer: 'notes.md' } });
  });

  it('rejects itself as parent and parent cycles', () => {
    const a = new EventCoordinator({ name: 'a' });
    const b = new EventCoordinator({ name: 'b' });
    expect(() => { a.setParent(a); }).toThrow('Cannot set coordinator as its own parent (would create an infinite loop)');
    b.setParent(a);
    expect(() => { a.setParent(b); }).toThrow("Cycle detected in coordinator hierarchy: 'b' already descends from 'a'");
  });

  it('keeps delivering requests while a listener waits on an earlier one', async () => {
    const coordinator = new EventCoordinator();
    const gate = { open: (): void => undefined };
    const firstAnswered = new Promise<void>((resolve) => { gate.open = () => { resolve(); }; });
    const seen: string[] = [];
    coordinator.subscribe(async (event) => {
      if (event.type !== 'coordination_request') return;
      seen.push(event.request.id);
      if (seen.length === 1) await firstAnswered;
      coordinator.resolve(event.request.id, { kind: 'permission', approved: true });
    });

    const first = coordinator.emitAndAwait(permissionRequest, { timeoutMs: 5000 });
    const second = coordinator.emitAndAwait(permissionRequest, { timeoutMs: 5000 });

    await expect(second).resolves.toEqual({ status: 'resolved', response: { kind: 'permission', approved: true } });
    expect(seen).toHaveLength(2);
    expect(coordinator.pendingCount).toBe(1);

    gate.open();
    await expect(first).resolves.toEqual({ status: 'resolved', response: { kind: 'permission', approved: true } });
    expect(coordinator.pendingCount).toBe(0);
  });

  it('reports a rejected asynchronous listener without stopping delivery', async () => {
    const warnings: string[] = [];
    setWarningSink((message) => { warnings.push(message); });
    const coordinator = new EventCoordinator({ name: 'main' });
    const received: string[] = [];
    coordinator.subscribe(async () => { await Promise.resolve(); throw new Error('transport down'); });
    coordinator.subscribe((event) => { received.push(event.type); });

    coordinator.emit({ type: 'progress', message: 'one' });
    await coordinator.flush();
    await new Promise((resolve) => { setTimeout(resolve, 0); });

    expect(received).toEqual(['progress']);
    expect(warnings).toEqual(["coordinator 'main' listener failed on progress: transport down"]);
  });

  it('keeps delivering when a listener throws', async () => {
    const warnings: string[] = [];
    setWarningSink((message) => { warnings.push(message); });
    const coordinator = new EventCoordinator({ name: 'main' });
    const received: string[] = [];
    coordinator.subscribe(() => { throw new Error('listener broke'); });
    coordinator.subscribe((event) => { received.push(event.type); });

    coordinator.emit({ type: 'progress', message: 'one' });
    await coordinator.flush();
    expect(received).toEqual(['progress']);
    expect(warnings).toEqual(["coordinator 'main' listener failed on progress: listener broke"]);
  });
});
