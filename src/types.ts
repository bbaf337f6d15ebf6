// Core data model shared by the turn loop, scheduler, coordinator and history manager.

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
  reasoningTokens?: number;
  cachedInputTokens?: number;
}

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ReasoningPart {
  type: 'reasoning';
  text: string;
}

export interface ToolCallPart {
  type: 'tool-call';
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultPart {
  type: 'tool-result';
  callId: string;
  name: string;
  output: unknown;
  isError: boolean;
  // Ephemeral results are visible to the model within the current run only
  ephemeral: boolean;
}

export interface UsagePart {
  type: 'usage';
  usage: TokenUsage;
}

export type MessagePart = TextPart | ReasoningPart | ToolCallPart | ToolResultPart | UsagePart;

export interface MessageMetadata {
  isSummary?: boolean;
  isContainerResult?: boolean;
  inputTokens?: number;
  outputTokens?: number;
  summarizedCount?: number;
  [key: string]: unknown;
}

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly parts: readonly MessagePart[];
  readonly metadata: Readonly<MessageMetadata>;
  readonly createdAt: string;
}

export interface ConversationThreadMetadata {
  createdAt: string;
  lastActivity: string;
  tags: Record<string, string>;
}

export interface ConversationThread {
  id: string;
  messages: Message[];
  metadata: ConversationThreadMetadata;
}

// Tool calls

export interface ToolCallRequest {
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ErrorCategory =
  | 'transient'
  | 'rate_limit_retryable'
  | 'rate_limit_terminal'
  | 'client_error'
  | 'auth_error'
  | 'context_too_large'
  | 'server_error'
  | 'unknown';

export type ToolResultStatus =
  | { type: 'success' }
  | { type: 'denied'; reason: AdmissionDenialReason; message: string }
  | { type: 'unknown_function' }
  | { type: 'invalid_arguments'; issues: string[] }
  | { type: 'container_misuse' }
  | { type: 'timeout'; timeoutMs: number }
  | { type: 'error'; message: string; category: ErrorCategory }
  | { type: 'cancelled' };

export interface ToolCallResult {
  callId: string;
  name: string;
  status: ToolResultStatus;
  output: unknown;
  ephemeral: boolean;
  attempts: number;
  durationMs: number;
}

// Coordination

export type CoordinationKind = 'permission' | 'clarification' | 'continuation';

export interface PermissionRequestPayload {
  functionName: string;
  callId: string;
  arguments: Record<string, unknown>;
  description?: string;
}

export interface ClarificationRequestPayload {
  question: string;
  options?: string[];
}

export interface ContinuationRequestPayload {
  currentIteration: number;
  maxIterations: number;
  completedFunctions: string[];
  plannedFunctions: string[];
}

export type CoordinationRequest =
  | { id: string; kind: 'permission'; payload: PermissionRequestPayload; origin?: string }
  | { id: string; kind: 'clarification'; payload: ClarificationRequestPayload; origin?: string }
  | { id: string; kind: 'continuation'; payload: ContinuationRequestPayload; origin?: string };

// Request body before the coordinator assigns an id
export type CoordinationRequestInit =
  | { kind: 'permission'; payload: PermissionRequestPayload; origin?: string }
  | { kind: 'clarification'; payload: ClarificationRequestPayload; origin?: string }
  | { kind: 'continuation'; payload: ContinuationRequestPayload; origin?: string };

export type PermissionChoice = 'always_allow' | 'always_deny';
export type PermissionScope = 'conversation' | 'global';

export type CoordinationResponse =
  | { kind: 'permission'; approved: boolean; remember?: { choice: PermissionChoice; scope: PermissionScope } }
  | { kind: 'clarification'; answer: string }
  | { kind: 'continuation'; approved: boolean; extraIterations?: number };

export type CoordinationOutcome =
  | { status: 'resolved'; response: CoordinationResponse }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'cancelled'; reason: string };

export type AdmissionDenialReason = 'denied' | 'timeout' | 'cancelled' | 'no_coordinator' | 'remembered_deny';

// Events

export type TurnStatus = 'completed' | 'iteration_limit' | 'failed' | 'cancelled';

export type AgentEvent =
  | { type: 'turn_started'; runId: string; maxIterations: number }
  | { type: 'iteration_started'; runId: string; iteration: number }
  | { type: 'iteration_completed'; runId: string; iteration: number; toolCalls: number }
  | { type: 'text_delta'; runId: string; text: string }
  | { type: 'reasoning_delta'; runId: string; text: string }
  | { type: 'tool_call_started'; runId: string; callId: string; name: string }
  | { type: 'tool_call_completed'; runId: string; callId: string; name: string; status: ToolResultStatus['type']; durationMs: number }
  | { type: 'history_reduced'; runId: string; strategy: ReductionStrategy; removed: number; summarized: boolean }
  | { type: 'retry_scheduled'; operation: string; attempt: number; delayMs: number; category: ErrorCategory }
  | { type: 'circuit_breaker_triggered'; runId: string; name: string; count: number }
  | { type: 'progress'; message: string; details?: Record<string, LogDetailValue> }
  | { type: 'error'; message: string; category?: ErrorCategory; fatal: boolean }
  | { type: 'coordination_request'; request: CoordinationRequest }
  | { type: 'coordination_settled'; requestId: string; status: CoordinationOutcome['status'] }
  | { type: 'turn_completed'; runId: string; status: TurnStatus; iterations: number };

export type EventSink = (event: AgentEvent) => void;

export type ReductionStrategy = 'truncate' | 'summarize';

// Logging

export type LogDetailValue = string | number | boolean | null | undefined;

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';
  turn: number;                         // Iteration within the run
  subturn: number;                      // Tool call index within the iteration
  direction: 'request' | 'response';
  type: 'llm' | 'tool' | 'coordination' | 'history' | 'agent';
  remoteIdentifier: string;             // model id, function name or coordinator origin
  fatal: boolean;                       // True if this stopped the run
  message: string;
  agentId?: string;
  runId?: string;
  details?: Record<string, LogDetailValue>;
}
