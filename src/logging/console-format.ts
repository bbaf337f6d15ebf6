import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_BOLD = '\u001B[1m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GRAY = '\u001B[90m';

const DIRECTION_ARROW: Record<StructuredLogEvent['direction'], string> = {
  request: '→',
  response: '←',
};

// "[WRN] → [1.2] tool search: message" with labels appended in verbose mode
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const where = event.remoteIdentifier === undefined ? event.type : `${event.type} ${event.remoteIdentifier}`;
  const head = `[${event.severity}] ${DIRECTION_ARROW[event.direction]} [${String(event.turn)}.${String(event.subturn)}] ${where}:`;
  const labels = options.verbose === true
    ? Object.entries(event.labels).map(([key, value]) => ` ${key}=${value}`).join('')
    : '';
  const line = `${head} ${event.message}${labels}`;
  if (options.color !== true) return line;
  if (event.severity === 'ERR') return `${ANSI_RED}${event.fatal ? ANSI_BOLD : ''}${line}${ANSI_RESET}`;
  if (event.severity === 'WRN') return `${ANSI_YELLOW}${line}${ANSI_RESET}`;
  if (event.severity === 'VRB' || event.severity === 'TRC') return `${ANSI_GRAY}${line}${ANSI_RESET}`;
  return line;
}
