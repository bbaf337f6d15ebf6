import { SpanKind, SpanStatusCode, trace as otelTrace } from '@opentelemetry/api';

import type { Attributes, Link, Span } from '@opentelemetry/api';

// Only the OpenTelemetry API is used here. Without a registered SDK every call is a no-op;
// embedding applications register their own provider and exporters.
const TRACER_NAME = 'agent-loop-core';

export { SpanKind };

export interface RunWithSpanOptions {
  attributes?: Attributes;
  kind?: SpanKind;
  links?: Link[];
  startTime?: number;
}

export function runWithSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
export function runWithSpan<T>(name: string, options: RunWithSpanOptions, fn: (span: Span) => Promise<T> | T): Promise<T>;
export function runWithSpan<T>(
  name: string,
  optionsOrFn: RunWithSpanOptions | ((span: Span) => Promise<T> | T),
  maybeFn?: (span: Span) => Promise<T> | T,
): Promise<T> {
  const options: RunWithSpanOptions = typeof optionsOrFn === 'function' ? {} : optionsOrFn;
  const handler: (span: Span) => Promise<T> | T = typeof optionsOrFn === 'function'
    ? optionsOrFn
    : (() => {
        if (maybeFn === undefined) {
          throw new Error('runWithSpan requires a callback');
        }
        return maybeFn;
      })();
  const tracer = otelTrace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, {
    kind: options.kind,
    attributes: options.attributes,
    links: options.links,
    startTime: options.startTime,
  }, async (span) => {
    try {
      return await handler(span);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function addSpanAttributes(attributes: Attributes): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  span.setAttributes(attributes);
}

export function recordSpanError(error: unknown): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  const err = error instanceof Error ? error : new Error(String(error));
  span.recordException(err);
  span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
}

export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  span.addEvent(name, attributes);
}
