import fs from 'node:fs';
import path from 'node:path';

import yaml from 'js-yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { toErrorMessage } from './utils.js';

const CategoryRetryLimitsSchema = z.object({
  transient: z.number().int().min(0).optional(),
  rate_limit_retryable: z.number().int().min(0).optional(),
  rate_limit_terminal: z.number().int().min(0).optional(),
  client_error: z.number().int().min(0).optional(),
  auth_error: z.number().int().min(0).optional(),
  context_too_large: z.number().int().min(0).optional(),
  server_error: z.number().int().min(0).optional(),
  unknown: z.number().int().min(0).optional(),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().positive().default(30_000),
  multiplier: z.number().min(1).default(2),
  // fraction of the computed delay added or removed at random
  jitter: z.number().min(0).max(1).default(0.1),
  // provider wait hints above this are treated as terminal
  maxRetryAfterMs: z.number().int().positive().default(60_000),
  maxRetriesByCategory: CategoryRetryLimitsSchema.default({}),
});

export const ToolsConfigSchema = z.object({
  mode: z.enum(['parallel', 'sequential']).default('parallel'),
  maxConcurrency: z.number().int().positive().default(4),
  timeoutMs: z.number().int().positive().optional(),
  terminateOnUnknownCalls: z.boolean().default(false),
  maxRetries: z.number().int().min(0).default(3),
  maxConsecutiveErrors: z.number().int().positive().default(3),
  maxConsecutiveIdenticalCalls: z.number().int().positive().default(3),
});

export const HistoryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  strategy: z.enum(['truncate', 'summarize']).default('truncate'),
  targetMessageCount: z.number().int().positive().default(20),
  summarizationThreshold: z.number().int().min(0).default(5),
  contextWindowTokens: z.number().int().positive().optional(),
  // fraction of contextWindowTokens, e.g. 0.8
  triggerPercentage: z.number().positive().max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  tokenizer: z.string().optional(),
});

export const CoordinationConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(300_000),
  maxTimeoutMs: z.number().int().positive().default(1_800_000),
});

export const ContinuationConfigSchema = z.object({
  enabled: z.boolean().default(false),
  extensionAmount: z.number().int().positive().default(3),
  maxExtensions: z.number().int().min(0).default(5),
});

export const LoggingConfigSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console', 'none']).default('logfmt'),
  verbose: z.boolean().default(false),
  trace: z.boolean().default(false),
  color: z.boolean().default(false),
});

export const AgentConfigSchema = z.object({
  name: z.string().min(1).default('agent'),
  maxIterations: z.number().int().min(0).default(10),
  retry: RetryConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  history: HistoryConfigSchema.default({}),
  coordination: CoordinationConfigSchema.default({}),
  continuation: ContinuationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AgentConfig = z.output<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
export type RetryConfig = z.output<typeof RetryConfigSchema>;
export type ToolsConfig = z.output<typeof ToolsConfigSchema>;
export type HistoryConfig = z.output<typeof HistoryConfigSchema>;
export type CoordinationConfig = z.output<typeof CoordinationConfigSchema>;
export type ContinuationConfig = z.output<typeof ContinuationConfigSchema>;
export type LoggingConfig = z.output<typeof LoggingConfigSchema>;

function expandEnv(str: string): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (process.env[name] ?? ''));
}

function expandDeep(obj: unknown): unknown {
  if (typeof obj === 'string') return expandEnv(obj);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v);
      return acc;
    }, {});
  }
  return obj;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
    .join('\n');
}

/** Validates an in-memory configuration and fills in defaults. */
export function resolveConfig(input: unknown = {}, source = 'options'): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Configuration validation failed in ${source}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Reads a JSON or YAML configuration file, expands `${VAR}` references from the
 * environment, and validates it.
 */
export function loadConfiguration(configPath: string): AgentConfig {
  const resolved = path.resolve(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new ConfigurationError(`Failed to read configuration file ${resolved}: ${toErrorMessage(e)}`);
  }
  const isYaml = /\.ya?ml$/i.test(resolved);
  let data: unknown;
  try {
    data = isYaml ? yaml.load(raw) : JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Invalid ${isYaml ? 'YAML' : 'JSON'} in configuration file ${resolved}: ${toErrorMessage(e)}`);
  }
  return resolveConfig(expandDeep(data ?? {}), resolved);
}
