// Main library exports for programmatic use
export { Agent } from './agent/agent.js';
export { TurnRunner } from './agent/turn-runner.js';
export { TurnContext } from './agent/turn-context.js';

export { AgentConfigSchema, loadConfiguration, resolveConfig } from './config.js';
export { HistoryManager } from './context/history-manager.js';
export { approximateTokenizer, estimateMessageTokens, estimateMessagesTokens, resolveTokenizer } from './context/tokenizer.js';
export { getActiveCoordinator, getCoordinationScope, hasActiveCoordinator, requireActiveCoordinator, runWithCoordinator } from './coordination/coordinator-context.js';
export { EventCoordinator } from './coordination/event-coordinator.js';
export {
  CLARIFICATION_FUNCTION_NAME,
  InMemoryPermissionStore,
  PermissionAdmissionCheck,
  clarificationFunction,
  requestClarification,
  requestContinuation,
} from './coordination/permissions.js';
export { AgentRunError, ConfigurationError, CoordinatorError, RunCancelledError, ToolTimeoutError, UnknownFunctionError } from './errors.js';
export { deserializeThread, serializeThread } from './history/serialization.js';
export { FileConversationStore, InMemoryConversationStore, computeTokenStats, createThread } from './history/stores.js';
export { AiSdkModel, toModelMessages } from './llm/ai-sdk-model.js';
export { ModelSummarizer } from './llm/model-summarizer.js';
export { ScriptedModel, failingReply, streamReply, textReply, toolCallReply } from './llm/scripted-model.js';
export { StreamAssembler, assembleReply } from './llm/stream-assembler.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export { assistantMessage, createMessage, messageText, systemMessage, userMessage } from './messages.js';
export { DefaultErrorClassifier } from './retry/error-classifier.js';
export { RetryEngine, RetryError } from './retry/retry-engine.js';
export { CircuitBreaker } from './tools/circuit-breaker.js';
export { FunctionRegistry, FunctionRegistryBuilder } from './tools/function-registry.js';
export { RunScope } from './tools/run-scope.js';
export { ToolScheduler } from './tools/tool-scheduler.js';
export { setWarningSink } from './utils.js';

// Type exports
export type { AgentOptions, AgentRunOptions, AgentRunResult } from './agent/agent.js';
export type { TurnOutcome, TurnRunInput, TurnRunnerOptions } from './agent/turn-runner.js';
export type { AgentConfig, AgentConfigInput, HistoryConfig, RetryConfig, ToolsConfig } from './config.js';
export type { ReductionCheck, ReductionResult, Summarizer } from './context/history-manager.js';
export type { Tokenizer } from './context/tokenizer.js';
export type { CoordinationScope } from './coordination/coordinator-context.js';
export type { ClarificationResult, ContinuationResult, PermissionStore } from './coordination/permissions.js';
export type { ConversationStore, ThreadTokenStats } from './history/stores.js';
export type { ModelCapability, ModelDelta, ModelRequestOptions, ModelResponse, ModelSettings, ModelToolDefinition } from './llm/model.js';
export type { ScriptedStep } from './llm/scripted-model.js';
export type { LogFn, LogFormat } from './logging/structured-logger.js';
export type { ErrorClassification, ErrorClassifier } from './retry/error-classifier.js';
export type { CustomRetryStrategy } from './retry/retry-engine.js';
export type { AdmissionCheck, ContainerInvocationError, FunctionDescriptor, FunctionInvoker, FunctionLookup, JsonSchema } from './tools/types.js';
export type {
  AgentEvent,
  ConversationThread,
  CoordinationOutcome,
  CoordinationRequest,
  CoordinationResponse,
  ErrorCategory,
  EventSink,
  LogEntry,
  Message,
  MessagePart,
  TokenUsage,
  ToolCallRequest,
  ToolCallResult,
  ToolResultStatus,
} from './types.js';
