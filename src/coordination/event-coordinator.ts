import crypto from 'node:crypto';
import { performance } from 'node:perf_hooks';

import type { AgentEvent, CoordinationOutcome, CoordinationRequest, CoordinationRequestInit, CoordinationResponse } from '../types.js';

import { CoordinatorError } from '../errors.js';
import { addSpanEvent } from '../telemetry/index.js';
import { abortReason, toErrorMessage, warn } from '../utils.js';

export type CoordinatorListener = (event: AgentEvent) => void | Promise<void>;

export interface EventCoordinatorOptions {
  name?: string;
  defaultTimeoutMs?: number;
  maxTimeoutMs?: number;
}

export interface EmitAndAwaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface PendingRequest {
  request: CoordinationRequest;
  settle: (outcome: CoordinationOutcome) => void;
}

const DEFAULT_TIMEOUT_MS = 300_000;
const MAX_TIMEOUT_MS = 1_800_000;

/**
 * Correlated request/response bus for permission, clarification and continuation
 * flows.
 *
 * Events are queued and delivered to listeners by a background drain loop, so
 * `emit` never blocks and siblings keep flowing while an `emitAndAwait` waits.
 * Asynchronous listeners are started, not awaited.
 * Every event is also forwarded to the parent coordinator, which lets a transport
 * attached to the outermost coordinator see requests raised by nested agents.
 * `resolve` on a parent is forwarded down to the child that owns the request id.
 */
export class EventCoordinator {
  readonly id = crypto.randomUUID();
  readonly name: string;
  private readonly defaultTimeoutMs: number;
  private readonly maxTimeoutMs: number;
  private readonly listeners = new Set<CoordinatorListener>();
  private readonly children = new Set<EventCoordinator>();
  private readonly pending = new Map<string, PendingRequest>();
  private readonly queue: AgentEvent[] = [];
  private draining: Promise<void> | undefined;
  private parentRef: EventCoordinator | undefined;

  constructor(options: EventCoordinatorOptions = {}) {
    this.name = options.name ?? 'coordinator';
    this.maxTimeoutMs = options.maxTimeoutMs ?? MAX_TIMEOUT_MS;
    this.defaultTimeoutMs = Math.min(options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS, this.maxTimeoutMs);
  }

  get parent(): EventCoordinator | undefined {
    return this.parentRef;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  subscribe(listener: CoordinatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setParent(parent: EventCoordinator): void {
    if (parent === this) {
      throw new CoordinatorError('Cannot set coordinator as its own parent (would create an infinite loop)');
    }
    // eslint-disable-next-line functional/no-loop-statements
    for (let cursor: EventCoordinator | undefined = parent; cursor !== undefined; cursor = cursor.parentRef) {
      if (cursor === this) {
        throw new CoordinatorError(`Cycle detected in coordinator hierarchy: '${parent.name}' already descends from '${this.name}'`);
      }
    }
    this.detach();
    this.parentRef = parent;
    parent.children.add(this);
  }

  detach(): void {
    this.parentRef?.children.delete(this);
    this.parentRef = undefined;
  }

  /** Fire-and-forget. Delivery happens on the drain loop, after this call returns. */
  emit(event: AgentEvent): void {
    this.queue.push(event);
    this.scheduleDrain();
    this.parentRef?.emit(event);
  }

  /**
   * Emits a coordination request and waits for its response. Always settles: with the
   * response, with `timeout` once the bounded timeout elapses, or with `cancelled` as
   * soon as the signal aborts or `cancelAll` runs.
   */
  async emitAndAwait(init: CoordinationRequestInit, options: EmitAndAwaitOptions = {}): Promise<CoordinationOutcome> {
    const request: CoordinationRequest = { ...init, id: crypto.randomUUID() };
    const timeoutMs = Math.min(Math.max(options.timeoutMs ?? this.defaultTimeoutMs, 1), this.maxTimeoutMs);
    const { signal } = options;
    if (signal?.aborted === true) {
      return { status: 'cancelled', reason: abortReason(signal) };
    }

    return await new Promise<CoordinationOutcome>((resolve) => {
      const deadline = performance.now() + timeoutMs;
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = (): void => {
        settle({ status: 'cancelled', reason: abortReason(signal) });
      };
      const settle = (outcome: CoordinationOutcome): void => {
        if (!this.pending.delete(request.id)) return;
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        addSpanEvent('coordination.settled', { request_id: request.id, kind: request.kind, status: outcome.status });
        this.emit({ type: 'coordination_settled', requestId: request.id, status: outcome.status });
        resolve(outcome);
      };
      // timers may fire a fraction of a millisecond early; re-arm until the deadline really passed
      const arm = (): void => {
        const remaining = deadline - performance.now();
        if (remaining <= 0) {
          settle({ status: 'timeout', timeoutMs });
          return;
        }
        timer = setTimeout(arm, Math.ceil(remaining));
      };

      this.pending.set(request.id, { request, settle });
      arm();
      signal?.addEventListener('abort', onAbort, { once: true });
      this.emit({ type: 'coordination_request', request });
    });
  }

  /**
   * Delivers a response. Returns false, and does nothing, when the id is unknown or was
   * already settled by a response, a timeout or a cancellation.
   */
  resolve(requestId: string, response: CoordinationResponse): boolean {
    const entry = this.pending.get(requestId);
    if (entry !== undefined) {
      if (entry.request.kind !== response.kind) {
        warn(`coordination response kind '${response.kind}' does not match request '${entry.request.kind}' (${requestId})`);
        return false;
      }
      entry.settle({ status: 'resolved', response });
      return true;
    }
    // eslint-disable-next-line functional/no-loop-statements
    for (const child of this.children) {
      if (child.resolve(requestId, response)) return true;
    }
    return false;
  }

  /** Settles every pending request here and in child coordinators as cancelled. */
  cancelAll(reason = 'cancelled'): void {
    [...this.pending.values()].forEach((entry) => {
      entry.settle({ status: 'cancelled', reason });
    });
    this.children.forEach((child) => {
      child.cancelAll(reason);
    });
  }

  pendingRequests(): CoordinationRequest[] {
    return [...this.pending.values()].map((entry) => entry.request);
  }

  /** Resolves once every queued event has been handed to the listeners. */
  async flush(): Promise<void> {
    // eslint-disable-next-line functional/no-loop-statements
    while (this.draining !== undefined) {
      await this.draining;
    }
  }

  private scheduleDrain(): void {
    if (this.draining !== undefined) return;
    this.draining = this.drain().finally(() => {
      this.draining = undefined;
      if (this.queue.length > 0) this.scheduleDrain();
    });
  }

  private async drain(): Promise<void> {
    // let the emitting frame continue before listeners run
    await Promise.resolve();
    // eslint-disable-next-line functional/no-loop-statements
    for (let event = this.queue.shift(); event !== undefined; event = this.queue.shift()) {
      const current = event;
      [...this.listeners].forEach((listener) => {
        this.deliver(listener, current);
      });
    }
  }

  // a listener that waits (for a human answer, say) must not hold back later events
  private deliver(listener: CoordinatorListener, event: AgentEvent): void {
    const report = (error: unknown): void => {
      warn(`coordinator '${this.name}' listener failed on ${event.type}: ${toErrorMessage(error)}`);
    };
    try {
      const result = listener(event);
      if (result instanceof Promise) result.catch(report);
    } catch (error: unknown) {
      report(error);
    }
  }
}
