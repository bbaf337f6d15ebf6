import Ajv from 'ajv';

import type { ContainerInvocationError, FunctionDescriptor, FunctionInvoker, FunctionLookup, InvocationContext, InvocationOutcome, JsonSchema } from './types.js';
import type { RunScope } from './run-scope.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions, ValidateFunction } from 'ajv';

import { ConfigurationError } from '../errors.js';
import { containerExpandedMessage, containerInvocationGuidance, containerMisuseMessage } from '../llm-messages.js';
import { toErrorMessage } from '../utils.js';

type AjvInstance = AjvClass;
type AjvConstructor = new (options?: AjvOptions) => AjvInstance;
// ajv ships CommonJS; under NodeNext the default import is typed as the module namespace
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

const EMPTY_OBJECT_SCHEMA: JsonSchema = { type: 'object', properties: {}, additionalProperties: false };

const CONTAINER_GUIDANCE_LIMIT = 5;

interface RegisteredFunction {
  descriptor: FunctionDescriptor;
  invoker?: FunctionInvoker;
  validate?: ValidateFunction;
  members: string[];
}

export interface ContainerDefinition {
  name: string;
  description: string;
}

export interface ContainerMember {
  descriptor: Omit<FunctionDescriptor, 'container' | 'isContainer'>;
  invoker: FunctionInvoker;
}

/**
 * Explicit name → invoker table. Everything callable is registered up front, so
 * dispatch is a map lookup and the set of names is known before the first run.
 */
export class FunctionRegistryBuilder {
  private readonly entries = new Map<string, RegisteredFunction>();

  add(descriptor: FunctionDescriptor, invoker: FunctionInvoker): this {
    if (descriptor.isContainer === true) {
      throw new ConfigurationError(`'${descriptor.name}' is a container; register it with addContainer()`);
    }
    this.register({ descriptor, invoker, members: [] });
    return this;
  }

  addContainer(container: ContainerDefinition, members: ContainerMember[]): this {
    this.register({
      descriptor: {
        name: container.name,
        description: container.description,
        parameters: EMPTY_OBJECT_SCHEMA,
        isContainer: true,
        ephemeralResult: true,
      },
      members: members.map((member) => member.descriptor.name),
    });
    members.forEach((member) => {
      this.register({
        descriptor: { ...member.descriptor, container: container.name },
        invoker: member.invoker,
        members: [],
      });
    });
    return this;
  }

  build(): FunctionRegistry {
    const ajv = new AjvCtor({ allErrors: true, strict: false });
    const compiled = new Map<string, RegisteredFunction>();
    this.entries.forEach((entry, name) => {
      let validate: ValidateFunction | undefined;
      try {
        validate = ajv.compile(entry.descriptor.parameters);
      } catch (error: unknown) {
        throw new ConfigurationError(`Invalid parameter schema for '${name}': ${toErrorMessage(error)}`);
      }
      compiled.set(name, { ...entry, validate });
    });
    return new FunctionRegistry(compiled);
  }

  private register(entry: RegisteredFunction): void {
    const { name } = entry.descriptor;
    if (name.trim().length === 0) throw new ConfigurationError('Function name must not be empty');
    if (this.entries.has(name)) throw new ConfigurationError(`Duplicate function name '${name}'`);
    this.entries.set(name, entry);
  }
}

export class FunctionRegistry implements FunctionLookup {
  constructor(private readonly entries: ReadonlyMap<string, RegisteredFunction>) {}

  /** Descriptor of a function callable in this scope; container members count only after expansion. */
  describe(name: string, scope: RunScope): FunctionDescriptor | undefined {
    const entry = this.entries.get(name);
    if (entry === undefined) return undefined;
    return this.isVisible(entry.descriptor, scope) ? entry.descriptor : undefined;
  }

  listAvailable(scope: RunScope): FunctionDescriptor[] {
    return [...this.entries.values()]
      .map((entry) => entry.descriptor)
      .filter((descriptor) => this.isVisible(descriptor, scope));
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Schema violations as `path message` strings; empty when the arguments are valid. */
  validate(name: string, args: Record<string, unknown>): string[] {
    const entry = this.entries.get(name);
    if (entry?.validate === undefined || entry.descriptor.isContainer === true) return [];
    if (entry.validate(args)) return [];
    const errors: ErrorObject[] = Array.isArray(entry.validate.errors) ? entry.validate.errors : [];
    return errors.map((err) => `${err.instancePath.length > 0 ? err.instancePath : '/'} ${err.message ?? 'is invalid'}`);
  }

  async invoke(name: string, args: Record<string, unknown>, context: InvocationContext): Promise<InvocationOutcome> {
    const entry = this.entries.get(name);
    if (entry === undefined || !this.isVisible(entry.descriptor, context.scope)) {
      return { kind: 'unknown_function' };
    }
    if (entry.descriptor.isContainer === true) {
      return this.invokeContainer(entry, args, context.scope);
    }
    if (entry.invoker === undefined) return { kind: 'unknown_function' };
    const output = await entry.invoker(args, context);
    return { kind: 'result', output, ephemeral: entry.descriptor.ephemeralResult === true };
  }

  private invokeContainer(entry: RegisteredFunction, args: Record<string, unknown>, scope: RunScope): InvocationOutcome {
    const { name } = entry.descriptor;
    if (Object.keys(args).length > 0) {
      return { kind: 'container_misuse', output: buildContainerInvocationError(name, entry.members, args) };
    }
    scope.expand(name);
    return { kind: 'container_expanded', output: containerExpandedMessage(name), members: [...entry.members] };
  }

  private isVisible(descriptor: FunctionDescriptor, scope: RunScope): boolean {
    return descriptor.container === undefined || scope.isExpanded(descriptor.container);
  }
}

export function buildContainerInvocationError(
  containerName: string,
  memberNames: string[],
  attempted: Record<string, unknown>,
): ContainerInvocationError {
  const shown = memberNames.slice(0, CONTAINER_GUIDANCE_LIMIT);
  return {
    error_type: 'container_invocation_error',
    container_name: containerName,
    error_message: containerMisuseMessage(containerName),
    retry_guidance: containerInvocationGuidance(containerName, shown),
    available_functions: [...memberNames],
    attempted_parameters: { ...attempted },
  };
}
