import fs from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip as gunzipCallback, gzip as gzipCallback } from 'node:zlib';

import { Mutex } from 'async-mutex';

import type { Tokenizer } from '../context/tokenizer.js';
import type { ConversationThread, Message } from '../types.js';

import { approximateTokenizer, estimateMessagesTokens } from '../context/tokenizer.js';

import { deserializeThread, serializeThread } from './serialization.js';

const gzip = promisify(gzipCallback);
const gunzip = promisify(gunzipCallback);

export interface ThreadTokenStats {
  messageCount: number;
  estimatedTokens: number;
  // provider-reported totals from usage parts
  inputTokens: number;
  outputTokens: number;
}

export interface ConversationStore {
  load: (threadId: string) => Promise<ConversationThread | undefined>;
  append: (threadId: string, messages: readonly Message[]) => Promise<ConversationThread>;
  replace: (threadId: string, messages: readonly Message[]) => Promise<ConversationThread>;
  clear: (threadId: string) => Promise<void>;
  tokenStats: (threadId: string) => Promise<ThreadTokenStats>;
}

export function createThread(id: string, messages: readonly Message[] = [], now = new Date()): ConversationThread {
  const stamp = now.toISOString();
  return { id, messages: [...messages], metadata: { createdAt: stamp, lastActivity: stamp, tags: {} } };
}

const touch = (thread: ConversationThread, messages: Message[]): ConversationThread => ({
  id: thread.id,
  messages,
  metadata: { ...thread.metadata, lastActivity: new Date().toISOString() },
});

export function computeTokenStats(messages: readonly Message[], tokenizer: Tokenizer = approximateTokenizer): ThreadTokenStats {
  let inputTokens = 0;
  let outputTokens = 0;
  messages.forEach((message) => {
    message.parts.forEach((part) => {
      if (part.type !== 'usage') return;
      inputTokens += part.usage.inputTokens ?? 0;
      outputTokens += part.usage.outputTokens ?? 0;
    });
  });
  return {
    messageCount: messages.length,
    estimatedTokens: estimateMessagesTokens(tokenizer, messages),
    inputTokens,
    outputTokens,
  };
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly threads = new Map<string, ConversationThread>();

  constructor(private readonly tokenizer: Tokenizer = approximateTokenizer) {}

  load(threadId: string): Promise<ConversationThread | undefined> {
    const thread = this.threads.get(threadId);
    return Promise.resolve(thread === undefined ? undefined : { ...thread, messages: [...thread.messages] });
  }

  append(threadId: string, messages: readonly Message[]): Promise<ConversationThread> {
    const existing = this.threads.get(threadId) ?? createThread(threadId);
    const updated = touch(existing, [...existing.messages, ...messages]);
    this.threads.set(threadId, updated);
    return Promise.resolve({ ...updated, messages: [...updated.messages] });
  }

  replace(threadId: string, messages: readonly Message[]): Promise<ConversationThread> {
    const existing = this.threads.get(threadId) ?? createThread(threadId);
    const updated = touch(existing, [...messages]);
    this.threads.set(threadId, updated);
    return Promise.resolve({ ...updated, messages: [...updated.messages] });
  }

  clear(threadId: string): Promise<void> {
    this.threads.delete(threadId);
    return Promise.resolve();
  }

  tokenStats(threadId: string): Promise<ThreadTokenStats> {
    return Promise.resolve(computeTokenStats(this.threads.get(threadId)?.messages ?? [], this.tokenizer));
  }
}

/**
 * One gzip-compressed JSON file per thread. Writes go to a temporary file that is
 * renamed over the old one, so a reader never sees a half-written thread.
 */
export class FileConversationStore implements ConversationStore {
  private readonly dir: string;
  private readonly locks = new Map<string, Mutex>();

  constructor(dir: string, private readonly tokenizer: Tokenizer = approximateTokenizer) {
    this.dir = path.resolve(dir);
  }

  filePath(threadId: string): string {
    return path.join(this.dir, `${encodeURIComponent(threadId)}.json.gz`);
  }

  async load(threadId: string): Promise<ConversationThread | undefined> {
    return await this.exclusive(threadId, async () => await this.read(threadId));
  }

  async append(threadId: string, messages: readonly Message[]): Promise<ConversationThread> {
    return await this.exclusive(threadId, async () => {
      const existing = (await this.read(threadId)) ?? createThread(threadId);
      const updated = touch(existing, [...existing.messages, ...messages]);
      await this.write(updated);
      return updated;
    });
  }

  async replace(threadId: string, messages: readonly Message[]): Promise<ConversationThread> {
    return await this.exclusive(threadId, async () => {
      const existing = (await this.read(threadId)) ?? createThread(threadId);
      const updated = touch(existing, [...messages]);
      await this.write(updated);
      return updated;
    });
  }

  async clear(threadId: string): Promise<void> {
    await this.exclusive(threadId, async () => {
      await fs.promises.rm(this.filePath(threadId), { force: true });
    });
  }

  async tokenStats(threadId: string): Promise<ThreadTokenStats> {
    const thread = await this.load(threadId);
    return computeTokenStats(thread?.messages ?? [], this.tokenizer);
  }

  /** Threads with a file operation in progress or queued. */
  get activeThreads(): number {
    return this.locks.size;
  }

  private async exclusive<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(threadId);
    if (mutex === undefined) {
      mutex = new Mutex();
      this.locks.set(threadId, mutex);
    }
    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && this.locks.get(threadId) === mutex) this.locks.delete(threadId);
    }
  }

  private async read(threadId: string): Promise<ConversationThread | undefined> {
    const filePath = this.filePath(threadId);
    let compressed: Buffer;
    try {
      compressed = await fs.promises.readFile(filePath);
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
      throw error;
    }
    const json = (await gunzip(compressed)).toString('utf8');
    return deserializeThread(json, filePath);
  }

  private async write(thread: ConversationThread): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    const gz = await gzip(Buffer.from(serializeThread(thread), 'utf8'));
    const filePath = this.filePath(thread.id);
    const tmp = `${filePath}.tmp-${String(process.pid)}-${String(Date.now())}`;
    await fs.promises.writeFile(tmp, gz);
    await fs.promises.rename(tmp, filePath);
  }
}
