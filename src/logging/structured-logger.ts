import type { LogEntry } from '../types.js';

import { addSpanEvent } from '../telemetry/index.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  // VRB and TRC entries are dropped unless verbose/trace is set
  verbose?: boolean;
  trace?: boolean;
  writer?: (line: string) => void;
}

export type LogFn = (entry: LogEntry) => void;

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly verbose: boolean;
  private readonly trace: boolean;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.verbose = options.verbose ?? false;
    this.trace = options.trace ?? false;
    const color = options.color ?? false;
    const writer = options.writer ?? defaultWriter;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color })}\n`);
      });
    }
    if (format === 'json') {
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (entry.severity === 'VRB' && !this.verbose && !this.trace) return;
    if (entry.severity === 'TRC' && !this.trace) return;
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    if (event.severity === 'WRN' || event.severity === 'ERR') {
      addSpanEvent(`log.${event.severity.toLowerCase()}`, { message: event.message, type: event.type });
    }
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  /** Bound emitter for components that take a plain log callback. */
  get log(): LogFn {
    return (entry) => { this.emit(entry); };
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  process.stderr.write(line);
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('turn', event.turn);
  push('subturn', event.subturn);
  push('remote', event.remoteIdentifier);
  push('agent', event.agentId);
  push('run_id', event.runId);
  push('fatal', event.fatal);
  push('message', event.message);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  return Object.fromEntries(entries);
}
