import type { AdmissionDenialReason, ToolCallRequest } from '../types.js';
import type { RunScope } from './run-scope.js';

export type JsonSchema = Record<string, unknown>;

export interface FunctionDescriptor {
  name: string;
  description: string;
  parameters: JsonSchema;
  // permission-gated through the coordinator before each call
  requiresAdmission?: boolean;
  isContainer?: boolean;
  // set on members of a container; hidden until the container is expanded
  container?: string;
  // results stay visible to the model for the current run only
  ephemeralResult?: boolean;
}

export interface InvocationContext {
  callId: string;
  signal: AbortSignal;
  scope: RunScope;
  attempt: number;
}

export type FunctionInvoker = (args: Record<string, unknown>, context: InvocationContext) => Promise<unknown> | unknown;

export interface ContainerInvocationError {
  error_type: 'container_invocation_error';
  container_name: string;
  error_message: string;
  retry_guidance: string;
  available_functions: string[];
  attempted_parameters: Record<string, unknown>;
}

export type InvocationOutcome =
  | { kind: 'result'; output: unknown; ephemeral: boolean }
  | { kind: 'container_expanded'; output: string; members: string[] }
  | { kind: 'container_misuse'; output: ContainerInvocationError }
  | { kind: 'unknown_function' };

/** What the scheduler needs from a function registry. */
export interface FunctionLookup {
  describe: (name: string, scope: RunScope) => FunctionDescriptor | undefined;
  listAvailable: (scope: RunScope) => FunctionDescriptor[];
  // schema violations, empty when valid
  validate: (name: string, args: Record<string, unknown>) => string[];
  invoke: (name: string, args: Record<string, unknown>, context: InvocationContext) => Promise<InvocationOutcome>;
}

export interface AdmissionContext {
  request: ToolCallRequest;
  descriptor: FunctionDescriptor;
  scope: RunScope;
  signal?: AbortSignal;
}

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; reason: AdmissionDenialReason; message: string };

export interface AdmissionCheck {
  readonly name: string;
  check: (context: AdmissionContext) => Promise<AdmissionDecision>;
}
