import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_CYAN = '\u001B[36m';
const ANSI_GRAY = '\u001B[90m';

const COLOR_BY_SEVERITY: Record<StructuredLogEvent['severity'], string> = {
  ERR: ANSI_RED,
  WRN: ANSI_YELLOW,
  FIN: ANSI_CYAN,
  VRB: ANSI_GRAY,
  TRC: ANSI_GRAY,
};

export function encodeLogfmtValue(value: string): string {
  if (value === '') return '""';
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  const needsQuotes = /\s|=|"/.test(value);
  return needsQuotes ? `"${escaped}"` : escaped;
}

export function formatLogfmt(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const pairs: [string, string][] = [];
  const seen = new Set<string>();
  const push = (key: string, value: string | undefined): void => {
    if (value === undefined || value.length === 0) return;
    if (seen.has(key)) return;
    pairs.push([key, value]);
    seen.add(key);
  };

  push('ts', event.isoTimestamp);
  push('level', event.severity.toLowerCase());
  push('priority', String(event.priority));
  push('type', event.type);
  push('direction', event.direction);
  push('turn', String(event.turn));
  push('subturn', String(event.subturn));
  push('remote', event.remoteIdentifier);
  push('agent', event.agentId);
  push('run_id', event.runId);
  if (event.fatal) push('fatal', 'true');
  Object.entries(event.labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .forEach(([key, value]) => { push(key, value); });
  push('msg', event.message);

  const line = pairs.map(([key, value]) => `${key}=${encodeLogfmtValue(value)}`).join(' ');
  if (options.color !== true) return line;
  return `${COLOR_BY_SEVERITY[event.severity]}${line}${ANSI_RESET}`;
}
