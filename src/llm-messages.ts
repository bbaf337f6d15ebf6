/**
 * Model-facing texts.
 *
 * Everything here ends up inside the conversation: tool results the model reads
 * after a failed or gated call, and the prompts used to produce summaries.
 * Log lines stay inline where they are emitted.
 */

import type { AdmissionDenialReason } from './types.js';

// =============================================================================
// CONTAINERS
// =============================================================================

/** Tool result of a container called with no arguments. */
export const containerExpandedMessage = (name: string): string =>
  `${name} expanded successfully. You can now see individual functions.`;

export const containerMisuseMessage = (name: string): string =>
  `'${name}' is a container and cannot be called with parameters. It only reveals the functions it groups.`;

/**
 * Retry guidance of the container invocation error. Lists at most the names it is
 * given; the "Available functions" line is left out when there are none.
 */
export const containerInvocationGuidance = (name: string, functionNames: string[]): string => {
  const lines = [
    'This requires TWO separate tool calls:',
    `1. First call '${name}' with NO arguments to expand it.`,
    '2. Then call the specific function you need with your parameters.',
  ];
  if (functionNames.length > 0) {
    lines.push(`Available functions: ${functionNames.join(', ')}`);
  }
  return lines.join('\n');
};

// =============================================================================
// TOOL RESULTS
// =============================================================================

export const unknownFunctionMessage = (name: string, available: string[]): string => {
  const choices = available.length > 0 ? ` Available functions: ${available.join(', ')}.` : '';
  return `Error: function '${name}' does not exist.${choices} Call one of the available functions instead.`;
};

export const invalidArgumentsMessage = (name: string, issues: string[]): string =>
  `Error: invalid arguments for '${name}': ${issues.join('; ')}. Fix the arguments and call it again.`;

const DENIAL_TEXT: Record<AdmissionDenialReason, string> = {
  denied: 'was denied by the user',
  remembered_deny: 'was denied by a stored user preference',
  timeout: 'was not approved: the permission request received no answer in time',
  cancelled: 'was not approved: the permission request was cancelled',
  no_coordinator: 'requires approval, but no one is available to approve it',
};

export const permissionDeniedMessage = (name: string, reason: AdmissionDenialReason): string =>
  `Execution of '${name}' ${DENIAL_TEXT[reason]}.`;

export const toolTimeoutMessage = (name: string, timeoutMs: number): string =>
  `Error: '${name}' did not finish within ${String(timeoutMs)}ms.`;

export const toolFailureMessage = (name: string, message: string): string =>
  `Error: '${name}' failed: ${message}`;

export const toolCancelledMessage = (name: string): string =>
  `Error: '${name}' was cancelled before it finished.`;

// =============================================================================
// TURN TERMINATION
// =============================================================================

export const consecutiveErrorsMessage = (count: number, max: number): string =>
  `Maximum consecutive errors (${String(count)}/${String(max)}) exceeded. Stopping execution to prevent an infinite error loop.`;

export const circuitBreakerMessage = (name: string, count: number): string =>
  `Circuit breaker triggered: Function '${name}' with same arguments would be called ${String(count)} times consecutively.`;

// =============================================================================
// HISTORY SUMMARIES
// =============================================================================

/** System prompt of the model-backed summarizer. */
export const SUMMARIZER_SYSTEM_PROMPT =
  'You compress conversation history. Write a concise summary of the conversation below that keeps every fact, decision, open question, user preference and tool outcome the assistant will need to continue. Write plain prose, no preamble.';

export const summaryMessageText = (summary: string, count: number): string =>
  `[Summary of ${String(count)} earlier messages]\n${summary}`;
