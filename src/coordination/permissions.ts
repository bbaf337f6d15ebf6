import type { LogFn } from '../logging/structured-logger.js';
import type { AdmissionCheck, AdmissionContext, AdmissionDecision, FunctionDescriptor, FunctionInvoker } from '../tools/types.js';
import type { AdmissionDenialReason, ContinuationRequestPayload, CoordinationOutcome, PermissionChoice, PermissionScope } from '../types.js';

import { permissionDeniedMessage } from '../llm-messages.js';

import { getCoordinationScope } from './coordinator-context.js';

export interface PermissionStore {
  get: (functionName: string, conversationId?: string) => Promise<PermissionChoice | undefined>;
  save: (functionName: string, choice: PermissionChoice, scope: PermissionScope, conversationId?: string) => Promise<void>;
}

/** Remembered choices; a conversation-scoped choice wins over a global one. */
export class InMemoryPermissionStore implements PermissionStore {
  private readonly global = new Map<string, PermissionChoice>();
  private readonly perConversation = new Map<string, PermissionChoice>();

  get(functionName: string, conversationId?: string): Promise<PermissionChoice | undefined> {
    const scoped = conversationId === undefined ? undefined : this.perConversation.get(conversationKey(conversationId, functionName));
    return Promise.resolve(scoped ?? this.global.get(functionName));
  }

  save(functionName: string, choice: PermissionChoice, scope: PermissionScope, conversationId?: string): Promise<void> {
    if (scope === 'conversation' && conversationId !== undefined) {
      this.perConversation.set(conversationKey(conversationId, functionName), choice);
    } else {
      this.global.set(functionName, choice);
    }
    return Promise.resolve();
  }
}

const conversationKey = (conversationId: string, functionName: string): string => `${conversationId}\u0000${functionName}`;

export interface PermissionAdmissionCheckOptions {
  store?: PermissionStore;
  timeoutMs?: number;
  log?: LogFn;
}

/**
 * Gates functions flagged `requiresAdmission` behind a human decision raised on the
 * ambient coordinator. A request that times out or is cancelled is reported as such
 * and never treated as approval.
 */
export class PermissionAdmissionCheck implements AdmissionCheck {
  readonly name = 'permission';
  private readonly store?: PermissionStore;
  private readonly timeoutMs?: number;
  private readonly log?: LogFn;

  constructor(options: PermissionAdmissionCheckOptions = {}) {
    this.store = options.store;
    this.timeoutMs = options.timeoutMs;
    this.log = options.log;
  }

  async check(context: AdmissionContext): Promise<AdmissionDecision> {
    const { descriptor, request } = context;
    if (descriptor.requiresAdmission !== true) return { admitted: true };

    const ambient = getCoordinationScope();
    const conversationId = context.scope.conversationId ?? ambient?.conversationId;
    const stored = await this.store?.get(descriptor.name, conversationId);
    if (stored === 'always_allow') return { admitted: true };
    if (stored === 'always_deny') return deny(descriptor.name, 'remembered_deny');

    if (ambient === undefined) return deny(descriptor.name, 'no_coordinator');

    const outcome = await ambient.coordinator.emitAndAwait(
      {
        kind: 'permission',
        payload: {
          functionName: descriptor.name,
          callId: request.callId,
          arguments: request.arguments,
          description: descriptor.description,
        },
        origin: ambient.agentName,
      },
      { timeoutMs: this.timeoutMs, signal: context.signal ?? ambient.signal },
    );
    this.log?.({
      timestamp: Date.now(),
      severity: outcome.status === 'resolved' ? 'VRB' : 'WRN',
      turn: 0,
      subturn: 0,
      direction: 'response',
      type: 'coordination',
      remoteIdentifier: descriptor.name,
      fatal: false,
      message: `permission request ${describeOutcome(outcome)}`,
      runId: context.scope.runId,
    });

    if (outcome.status === 'timeout') return deny(descriptor.name, 'timeout');
    if (outcome.status === 'cancelled') return deny(descriptor.name, 'cancelled');
    const { response } = outcome;
    if (response.kind !== 'permission') return deny(descriptor.name, 'denied');
    if (response.remember !== undefined && this.store !== undefined) {
      await this.store.save(descriptor.name, response.remember.choice, response.remember.scope, conversationId);
    }
    return response.approved ? { admitted: true } : deny(descriptor.name, 'denied');
  }
}

const deny = (name: string, reason: AdmissionDenialReason): AdmissionDecision => ({
  admitted: false,
  reason,
  message: permissionDeniedMessage(name, reason),
});

const describeOutcome = (outcome: CoordinationOutcome): string => {
  if (outcome.status === 'timeout') return `timed out after ${String(outcome.timeoutMs)}ms`;
  if (outcome.status === 'cancelled') return `cancelled: ${outcome.reason}`;
  if (outcome.response.kind === 'permission') return outcome.response.approved ? 'approved' : 'denied';
  return `answered with unexpected ${outcome.response.kind} response`;
};

// =============================================================================
// Clarification
// =============================================================================

export type ClarificationResult =
  | { status: 'answered'; answer: string }
  | { status: 'unanswered'; reason: 'timeout' | 'cancelled' | 'no_coordinator' };

export interface ClarificationOptions {
  choices?: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Asks the human a question through the ambient coordinator. */
export async function requestClarification(question: string, options: ClarificationOptions = {}): Promise<ClarificationResult> {
  const ambient = getCoordinationScope();
  if (ambient === undefined) return { status: 'unanswered', reason: 'no_coordinator' };
  const outcome = await ambient.coordinator.emitAndAwait(
    { kind: 'clarification', payload: { question, options: options.choices }, origin: ambient.agentName },
    { timeoutMs: options.timeoutMs, signal: options.signal ?? ambient.signal },
  );
  if (outcome.status === 'timeout') return { status: 'unanswered', reason: 'timeout' };
  if (outcome.status === 'cancelled') return { status: 'unanswered', reason: 'cancelled' };
  if (outcome.response.kind !== 'clarification') return { status: 'unanswered', reason: 'cancelled' };
  return { status: 'answered', answer: outcome.response.answer };
}

export const CLARIFICATION_FUNCTION_NAME = 'ask_user';

/** Registry entry that lets the model ask the user a question mid-turn. */
export function clarificationFunction(options: { timeoutMs?: number } = {}): { descriptor: FunctionDescriptor; invoker: FunctionInvoker } {
  return {
    descriptor: {
      name: CLARIFICATION_FUNCTION_NAME,
      description: 'Ask the user a clarifying question and wait for the answer.',
      parameters: {
        type: 'object',
        properties: {
          question: { type: 'string', minLength: 1 },
          options: { type: 'array', items: { type: 'string' } },
        },
        required: ['question'],
        additionalProperties: false,
      },
    },
    invoker: async (args, context) => {
      const question = typeof args.question === 'string' ? args.question : '';
      const choices = Array.isArray(args.options)
        ? args.options.filter((item): item is string => typeof item === 'string')
        : undefined;
      const result = await requestClarification(question, { choices, timeoutMs: options.timeoutMs, signal: context.signal });
      if (result.status === 'answered') return result.answer;
      return `No answer from the user (${result.reason}). Continue with your best judgement and state any assumption you make.`;
    },
  };
}

// =============================================================================
// Continuation
// =============================================================================

export type ContinuationResult =
  | { approved: true; extraIterations?: number }
  | { approved: false; reason: 'denied' | 'timeout' | 'cancelled' | 'no_coordinator' };

export async function requestContinuation(
  payload: ContinuationRequestPayload,
  options: { timeoutMs?: number; signal?: AbortSignal } = {},
): Promise<ContinuationResult> {
  const ambient = getCoordinationScope();
  if (ambient === undefined) return { approved: false, reason: 'no_coordinator' };
  const outcome = await ambient.coordinator.emitAndAwait(
    { kind: 'continuation', payload, origin: ambient.agentName },
    { timeoutMs: options.timeoutMs, signal: options.signal ?? ambient.signal },
  );
  if (outcome.status === 'timeout') return { approved: false, reason: 'timeout' };
  if (outcome.status === 'cancelled') return { approved: false, reason: 'cancelled' };
  const { response } = outcome;
  if (response.kind !== 'continuation' || !response.approved) return { approved: false, reason: 'denied' };
  return { approved: true, extraIterations: response.extraIterations };
}
