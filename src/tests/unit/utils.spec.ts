import { afterEach, describe, expect, it } from 'vitest';

import { abortReason, canonicalJson, parseJsonRecord, setWarningSink, sleepWithAbort, warn } from '../../utils.js';

describe('parseJsonRecord', () => {
  it('passes objects through and parses or repairs strings', () => {
    const args = { a: 1 };
    expect(parseJsonRecord(args)).toBe(args);
    expect(parseJsonRecord('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonRecord("{a: 1, b: 'two'}")).toEqual({ a: 1, b: 'two' });
    expect(parseJsonRecord('   ')).toEqual({});
  });

  it('rejects values that are not objects', () => {
    expect(parseJsonRecord('[1, 2]')).toBeUndefined();
    expect(parseJsonRecord(42)).toBeUndefined();
    expect(parseJsonRecord(null)).toBeUndefined();
  });
});

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [{ y: 1, x: 2 }], c: 3 } })).toBe('{"a":{"c":3,"d":[{"x":2,"y":1}]},"b":1}');
  });
});

describe('sleepWithAbort', () => {
  it('completes or reports the abort', async () => {
    expect(await sleepWithAbort(1)).toBe('completed');

    const controller = new AbortController();
    const pending = sleepWithAbort(10_000, controller.signal);
    controller.abort();
    expect(await pending).toBe('aborted');

    expect(await sleepWithAbort(10, controller.signal)).toBe('aborted');
  });
});

describe('abortReason', () => {
  it('describes why a signal aborted', () => {
    const withText = new AbortController();
    withText.abort('user stop');
    expect(abortReason(withText.signal)).toBe('user stop');

    const withError = new AbortController();
    withError.abort(new Error('shutdown'));
    expect(abortReason(withError.signal)).toBe('shutdown');

    expect(abortReason(undefined)).toBe('aborted');
  });
});

describe('warn', () => {
  afterEach(() => {
    setWarningSink(undefined);
  });

  it('goes to the installed sink', () => {
    const seen: string[] = [];
    setWarningSink((message) => { seen.push(message); });
    warn('careful');
    expect(seen).toEqual(['careful']);
  });
});
