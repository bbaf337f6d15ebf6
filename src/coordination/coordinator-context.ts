import { AsyncLocalStorage } from 'node:async_hooks';

import type { EventCoordinator } from './event-coordinator.js';

import { CoordinatorError } from '../errors.js';

/**
 * Per-run coordination scope. Carried implicitly down the async call stack so a
 * function invoked three agents deep can reach the coordinator of its logical run
 * without any intermediate frame passing it along.
 */
export interface CoordinationScope {
  readonly coordinator: EventCoordinator;
  readonly conversationId?: string;
  readonly agentName?: string;
  readonly signal?: AbortSignal;
}

const coordinationALS = new AsyncLocalStorage<CoordinationScope>();

export function runWithCoordinator<T>(scope: CoordinationScope, fn: () => T): T {
  return coordinationALS.run(scope, fn);
}

export function getCoordinationScope(): CoordinationScope | undefined {
  return coordinationALS.getStore();
}

export function getActiveCoordinator(): EventCoordinator | undefined {
  return coordinationALS.getStore()?.coordinator;
}

export function hasActiveCoordinator(): boolean {
  return coordinationALS.getStore() !== undefined;
}

/** @throws CoordinatorError outside runWithCoordinator */
export function requireActiveCoordinator(): EventCoordinator {
  const scope = coordinationALS.getStore();
  if (scope === undefined) {
    throw new CoordinatorError('No active coordinator: call runWithCoordinator() around the run');
  }
  return scope.coordinator;
}
