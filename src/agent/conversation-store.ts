/**
 * In-memory conversation store: chat history plus one SearchSession per
 * conversation, with idle expiry and a per-conversation turn lock.
 */
import type { ChatMessage } from '@/services/llm-client';
import { logger } from '@/services/logger';
import { SearchSession } from '@/search/search-session';

export interface Conversation {
  readonly id: string;
  history: ChatMessage[];
  readonly session: SearchSession;
  lastActiveAt: number;
}

export interface ConversationStoreOptions {
  ttlMinutes?: number;
  maxConversations?: number;
  sessionTtlMs?: number;
  cleanupIntervalMs?: number;
  now?: () => number;
}

export class ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttl: number;
  private readonly maxConversations: number;
  private readonly sessionTtlMs: number | undefined;
  private readonly now: () => number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: ConversationStoreOptions = {}) {
    this.ttl = (options.ttlMinutes ?? 60) * 60 * 1000;
    this.maxConversations = options.maxConversations ?? 1000;
    this.sessionTtlMs = options.sessionTtlMs;
    this.now = options.now ?? Date.now;

    const intervalMs = options.cleanupIntervalMs ?? 5 * 60 * 1000;
    if (intervalMs > 0) {
      this.cleanupInterval = setInterval(() => this.cleanupExpired(), intervalMs);
      // never keeps the process alive on its own
      this.cleanupInterval.unref();
    }
  }

  /** Returns the live conversation, creating it when missing or expired. */
  getOrCreate(id: string): Conversation {
    const now = this.now();
    const existing = this.conversations.get(id);
    if (existing && now - existing.lastActiveAt <= this.ttl) {
      existing.lastActiveAt = now;
      return existing;
    }

    this.cleanupExpired();
    const created: Conversation = {
      id,
      history: [],
      session: new SearchSession(this.sessionTtlMs),
      lastActiveAt: now,
    };
    this.conversations.set(id, created);
    return created;
  }

  get(id: string): Conversation | undefined {
    const entry = this.conversations.get(id);
    if (!entry) return undefined;
    if (this.now() - entry.lastActiveAt > this.ttl) {
      this.conversations.delete(id);
      return undefined;
    }
    return entry;
  }

  /** Clears history and search state but keeps the id usable. */
  reset(id: string): boolean {
    const entry = this.conversations.get(id);
    if (!entry) return false;
    entry.history = [];
    entry.session.clear();
    entry.lastActiveAt = this.now();
    logger.info('conversation:reset', { conversationId: id });
    return true;
  }

  delete(id: string): void {
    this.conversations.delete(id);
  }

  get size(): number {
    return this.conversations.size;
  }

  /**
   * Serializes work per conversation: each call waits for the previous turn
   * on the same id to settle, whatever its outcome.
   */
  async runExclusive<T>(id: string, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(id, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.locks.get(id) === tail) this.locks.delete(id);
    }
  }

  cleanupExpired(): void {
    const now = this.now();
    let cleaned = 0;

    for (const [id, entry] of this.conversations) {
      if (now - entry.lastActiveAt > this.ttl) {
        this.conversations.delete(id);
        cleaned++;
      }
    }

    // over capacity: drop the oldest fifth
    if (this.conversations.size >= this.maxConversations) {
      const oldest = [...this.conversations.values()]
        .sort((a, b) => a.lastActiveAt - b.lastActiveAt)
        .slice(0, Math.floor(this.conversations.size * 0.2));
      for (const entry of oldest) {
        this.conversations.delete(entry.id);
        cleaned++;
      }
    }

    if (cleaned > 0) logger.debug('conversation:cleanup', { cleaned, remaining: this.conversations.size });
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
