/**
 * Conversation Memory — the chat history of a session, kept in the
 * KeyValueStore under `conversation:{id}` and capped to the newest entries.
 */
import { z } from 'zod';
import type { Logger } from '@/observability/logger.js';
import type { KeyValueStore } from '@/storage/types.js';

// ─── Types ──────────────────────────────────────────────────────

const conversationEntrySchema = z.object({
  sender: z.enum(['user', 'assistant', 'agent']),
  /** `text`, `product_search`, `cart_update`, `price_comparison`, ... */
  messageType: z.string().min(1),
  content: z.string(),
  timestamp: z.coerce.date(),
  metadata: z.record(z.unknown()).default({}),
});

export type ConversationEntry = z.infer<typeof conversationEntrySchema>;
export type ConversationSender = ConversationEntry['sender'];

export interface ConversationMemory {
  record(
    sessionId: string,
    entry: { sender: ConversationSender; messageType: string; content: string; metadata?: Record<string, unknown> },
  ): Promise<void>;
  /** Oldest first. `limit` keeps only the newest entries. */
  getHistory(sessionId: string, limit?: number): Promise<ConversationEntry[]>;
  clear(sessionId: string): Promise<boolean>;
}

interface ConversationMemoryDeps {
  store: KeyValueStore;
  logger: Logger;
  /** Entries kept per session. Default: 50. */
  maxEntries?: number;
  /** Default: 86400 (24 hours). */
  ttlSeconds?: number;
}

export const conversationKey = (sessionId: string): string => `conversation:${sessionId}`;

const historySchema = z.array(conversationEntrySchema);

// ─── Factory Function ───────────────────────────────────────────

export function createConversationMemory(deps: ConversationMemoryDeps): ConversationMemory {
  const { store, logger } = deps;
  const maxEntries = deps.maxEntries ?? 50;
  const ttlSeconds = deps.ttlSeconds ?? 86_400;
  const log = { component: 'conversation-memory' };

  async function load(sessionId: string): Promise<ConversationEntry[]> {
    const raw = await store.get(conversationKey(sessionId));
    if (raw === null) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn('Discarding unreadable conversation history', { ...log, sessionId });
      return [];
    }

    const result = historySchema.safeParse(parsed);
    if (!result.success) {
      logger.warn('Discarding invalid conversation history', { ...log, sessionId });
      return [];
    }
    return result.data;
  }

  return {
    async record(sessionId, entry) {
      const history = await load(sessionId);
      history.push({
        sender: entry.sender,
        messageType: entry.messageType,
        content: entry.content,
        timestamp: new Date(),
        metadata: entry.metadata ?? {},
      });
      await store.set(conversationKey(sessionId), JSON.stringify(history.slice(-maxEntries)), ttlSeconds);
    },

    async getHistory(sessionId, limit) {
      const history = await load(sessionId);
      return limit === undefined ? history : history.slice(-limit);
    },

    async clear(sessionId) {
      const removed = await store.delete(conversationKey(sessionId));
      logger.debug('Conversation history cleared', { ...log, sessionId, removed });
      return removed > 0;
    },
  };
}
