import { jsonrepair } from 'jsonrepair';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  typeof value === 'object' && value !== null && !Array.isArray(value)
);

export const toErrorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

export const isAbortError = (error: unknown): boolean => (
  error instanceof Error && error.name === 'AbortError'
);

const tryParseJson = (text: string): unknown => {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
};

/**
 * Parses tool arguments coming from a model. Objects pass through; strings are parsed
 * and, when plain JSON.parse fails, repaired with jsonrepair first.
 */
export const parseJsonRecord = (raw: unknown): Record<string, unknown> | undefined => {
  if (isPlainObject(raw)) return raw;
  if (typeof raw !== 'string') return undefined;
  const text = raw.trim();
  if (text.length === 0) return {};
  const parsed = tryParseJson(text);
  if (isPlainObject(parsed)) return parsed;
  let repaired: string;
  try {
    repaired = jsonrepair(text);
  } catch {
    return undefined;
  }
  const reparsed = tryParseJson(repaired);
  return isPlainObject(reparsed) ? reparsed : undefined;
};

/** JSON with object keys sorted, so equal values always produce equal strings. */
export const canonicalJson = (value: unknown): string => JSON.stringify(sortKeys(value));

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isPlainObject(value)) {
    return Object.keys(value)
      .sort((a, b) => a.localeCompare(b))
      .reduce<Record<string, unknown>>((acc, key) => {
        acc[key] = sortKeys(value[key]);
        return acc;
      }, {});
  }
  return value;
};

export type SleepResult = 'completed' | 'aborted';

export async function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<SleepResult> {
  if (signal?.aborted === true) return 'aborted';
  if (ms <= 0) return 'completed';
  return await new Promise<SleepResult>((resolve) => {
    let settled = false;
    const finish = (result: SleepResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };
    const onAbort = (): void => { finish('aborted'); };
    const timer = setTimeout(() => { finish('completed'); }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const abortReason = (signal: AbortSignal | undefined): string => {
  const reason: unknown = signal?.reason;
  if (reason === undefined) return 'aborted';
  return toErrorMessage(reason);
};

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Library warnings go through an injectable sink so the core stays silent by default
export function warn(message: string): void {
  warningSink?.(message);
}
