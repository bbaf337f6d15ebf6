import fs from 'node:fs';

import { APICallError } from 'ai';
import { z } from 'zod';

import type { ErrorCategory } from '../types.js';

import { isPlainObject } from '../utils.js';

export interface ErrorClassification {
  category: ErrorCategory;
  message: string;
  statusCode?: number;
  errorCode?: string;
  // explicit wait requested by the provider
  retryAfterMs?: number;
}

export interface ErrorClassifier {
  classify: (error: unknown) => ErrorClassification;
}

export const ERROR_CATEGORY_MEANINGS: Record<ErrorCategory, { summary: string; retryable: boolean }> = {
  transient: { summary: 'Network or transport failure, request timeout.', retryable: true },
  rate_limit_retryable: { summary: 'Too many requests; wait and retry.', retryable: true },
  rate_limit_terminal: { summary: 'Credits or quota exhausted; retrying cannot help.', retryable: false },
  client_error: { summary: 'Request rejected as malformed or disallowed.', retryable: false },
  auth_error: { summary: 'Credentials rejected; may be refreshed once.', retryable: false },
  context_too_large: { summary: 'Prompt exceeds the model context window.', retryable: false },
  server_error: { summary: 'Provider-side failure.', retryable: true },
  unknown: { summary: 'Unrecognized failure.', retryable: false },
};

const CategorySchema = z.enum([
  'transient',
  'rate_limit_retryable',
  'rate_limit_terminal',
  'client_error',
  'auth_error',
  'context_too_large',
  'server_error',
  'unknown',
]);

const ErrorPatternsSchema = z.object({
  statusCategories: z.record(z.string(), CategorySchema),
  codeCategories: z.record(z.string(), CategorySchema),
  nameCategories: z.record(z.string(), CategorySchema),
  messagePatterns: z.array(z.object({ category: CategorySchema, patterns: z.array(z.string()) })),
});

export type ErrorPatterns = z.infer<typeof ErrorPatternsSchema>;

// data/ sits two levels above both src/retry and dist/retry
const PATTERNS_URL = new URL('../../data/error-patterns.json', import.meta.url);

let cachedPatterns: ErrorPatterns | undefined;

export function loadErrorPatterns(): ErrorPatterns {
  if (cachedPatterns !== undefined) return cachedPatterns;
  const raw: unknown = JSON.parse(fs.readFileSync(PATTERNS_URL, 'utf-8'));
  cachedPatterns = ErrorPatternsSchema.parse(raw);
  return cachedPatterns;
}

const RETRY_HINT_PATTERN = /(?:retry after|try again in)\s+(\d+(?:\.\d+)?)\s*(ms|s)\b/i;
const RESET_HINT_PATTERN = /x-ratelimit-reset[:\s]+(\d+)/i;
const MODERATION_PATTERN = /moderation|flagged/i;

const normalize = (value: string | undefined): string | undefined =>
  typeof value === 'string' ? value.trim().toLowerCase() : undefined;

const readNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

type HeaderReader = (name: string) => string | undefined;

const headerReader = (source: unknown): HeaderReader | undefined => {
  if (!isPlainObject(source)) return undefined;
  const getter = source.get;
  if (typeof getter === 'function') {
    return (name) => {
      const value: unknown = getter.call(source, name);
      return typeof value === 'string' ? value : undefined;
    };
  }
  const lowered = Object.entries(source).reduce<Record<string, string>>((acc, [key, value]) => {
    if (typeof value === 'string') acc[key.toLowerCase()] = value;
    return acc;
  }, {});
  return (name) => lowered[name];
};

interface ExtractedError {
  statusCode?: number;
  code?: string;
  name: string;
  message: string;
  headers?: HeaderReader;
  retryAfterProperty?: number;
}

// Provider bodies commonly look like {"error":{"code":...,"message":...}}
const parseProviderBody = (body: string | undefined): { code?: string; message?: string } => {
  if (body === undefined || body.length === 0) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return {};
  }
  if (!isPlainObject(parsed)) return {};
  const inner = isPlainObject(parsed.error) ? parsed.error : parsed;
  const code = typeof inner.code === 'string'
    ? inner.code
    : (typeof inner.type === 'string' ? inner.type : undefined);
  const message = typeof inner.message === 'string' ? inner.message : undefined;
  return { code, message };
};

const extract = (error: unknown): ExtractedError => {
  if (APICallError.isInstance(error)) {
    const body = parseProviderBody(error.responseBody);
    return {
      statusCode: error.statusCode,
      code: body.code,
      name: error.name,
      message: body.message === undefined ? error.message : `${error.message}: ${body.message}`,
      headers: headerReader(error.responseHeaders),
    };
  }
  if (!isPlainObject(error)) {
    return { name: 'Error', message: String(error) };
  }
  const response = isPlainObject(error.response) ? error.response : undefined;
  const statusCode = readNumber(error.statusCode) ?? readNumber(error.status) ?? readNumber(response?.status);
  const code = typeof error.code === 'string' ? error.code : undefined;
  const name = typeof error.name === 'string' ? error.name : 'Error';
  const message = typeof error.message === 'string' ? error.message : String(error);
  const retryAfterMs = readNumber(error.retryAfterMs);
  const retryAfterSeconds = readNumber(error.retryAfter);
  const retryAfterProperty = retryAfterMs ?? (retryAfterSeconds === undefined ? undefined : Math.round(retryAfterSeconds * 1000));
  return {
    statusCode,
    code,
    name,
    message,
    headers: headerReader(error.headers) ?? headerReader(response?.headers),
    retryAfterProperty,
  };
};

export interface DefaultErrorClassifierOptions {
  patterns?: ErrorPatterns;
  now?: () => number;
}

/**
 * Maps provider, network and SDK failures onto retry categories. Looks at error codes
 * first, then HTTP status, error name and finally message text. Context-overflow
 * wording wins over everything because providers report it under a plain 400.
 */
export class DefaultErrorClassifier implements ErrorClassifier {
  private readonly patterns: ErrorPatterns;
  private readonly now: () => number;

  constructor(options: DefaultErrorClassifierOptions = {}) {
    this.patterns = options.patterns ?? loadErrorPatterns();
    this.now = options.now ?? Date.now;
  }

  classify(error: unknown): ErrorClassification {
    const extracted = extract(error);
    const category = this.categorize(extracted);
    return {
      category,
      message: extracted.message,
      statusCode: extracted.statusCode,
      errorCode: extracted.code,
      retryAfterMs: this.retryAfter(extracted),
    };
  }

  private categorize(input: ExtractedError): ErrorCategory {
    const message = normalize(input.message) ?? '';
    const codeKey = normalize(input.code);
    const nameKey = normalize(input.name);
    const fromMessage = (category: ErrorCategory): boolean =>
      this.patterns.messagePatterns.some((entry) => entry.category === category && entry.patterns.some((p) => message.includes(p)));

    const codeCategory = codeKey !== undefined ? this.patterns.codeCategories[codeKey] : undefined;
    if (codeCategory === 'context_too_large' || fromMessage('context_too_large')) return 'context_too_large';
    if (codeCategory !== undefined) return codeCategory;

    const status = input.statusCode;
    if (status !== undefined) {
      if (status === 403 && MODERATION_PATTERN.test(input.message)) return 'client_error';
      const statusCategory = this.patterns.statusCategories[String(status)];
      if (statusCategory !== undefined) return statusCategory;
      if (status >= 500 && status < 600) return 'server_error';
    }

    const nameCategory = nameKey !== undefined ? this.patterns.nameCategories[nameKey] : undefined;
    if (nameCategory !== undefined) return nameCategory;

    const matched = this.patterns.messagePatterns.find((entry) => entry.patterns.some((p) => message.includes(p)));
    return matched?.category ?? 'unknown';
  }

  private retryAfter(input: ExtractedError): number | undefined {
    const headers = input.headers;
    if (headers !== undefined) {
      const ms = readNumber(headers('retry-after-ms'));
      if (ms !== undefined && ms >= 0) return Math.round(ms);
      const fromRetryAfter = this.parseRetryAfterHeader(headers('retry-after'));
      if (fromRetryAfter !== undefined) return fromRetryAfter;
      const reset = this.parseReset(readNumber(headers('x-ratelimit-reset')));
      if (reset !== undefined) return reset;
    }
    if (input.retryAfterProperty !== undefined && input.retryAfterProperty >= 0) return input.retryAfterProperty;

    const hint = RETRY_HINT_PATTERN.exec(input.message);
    if (hint !== null) {
      const amount = Number(hint[1]);
      return hint[2].toLowerCase() === 'ms' ? Math.round(amount) : Math.round(amount * 1000);
    }
    const resetHint = RESET_HINT_PATTERN.exec(input.message);
    if (resetHint !== null) return this.parseReset(Number(resetHint[1]));
    return undefined;
  }

  private parseRetryAfterHeader(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const seconds = readNumber(value);
    if (seconds !== undefined) return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
    const date = Date.parse(value);
    if (Number.isNaN(date)) return undefined;
    return Math.max(0, date - this.now());
  }

  // Reset values are either epoch seconds, epoch milliseconds or a delta in seconds
  private parseReset(value: number | undefined): number | undefined {
    if (value === undefined || value <= 0) return undefined;
    if (value > 1e12) return Math.max(0, Math.round(value - this.now()));
    if (value > 1e9) return Math.max(0, Math.round(value * 1000 - this.now()));
    return Math.round(value * 1000);
  }
}
