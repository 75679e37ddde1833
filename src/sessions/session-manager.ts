/**
 * Session Manager — session records kept in the KeyValueStore under
 * `session:{id}` with a TTL lease.
 */
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { Logger } from '@/observability/logger.js';
import type { KeyValueStore } from '@/storage/types.js';

// ─── Types ──────────────────────────────────────────────────────

const sessionSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  createdAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
  context: z.record(z.unknown()).default({}),
});

export type Session = z.infer<typeof sessionSchema>;

export interface SessionManager {
  createSession(userId: string, sessionId?: string): Promise<Session>;
  getSession(sessionId: string): Promise<Session | null>;
  /** Shallow-merge `updates` into the session context. `false` when the session is gone. */
  updateContext(sessionId: string, updates: Record<string, unknown>): Promise<boolean>;
  resetContext(sessionId: string): Promise<boolean>;
  /** Renew the lease for another TTL period. */
  extendSession(sessionId: string): Promise<boolean>;
  deleteSession(sessionId: string): Promise<boolean>;
}

interface SessionManagerDeps {
  store: KeyValueStore;
  logger: Logger;
  /** Default: 3600 (1 hour). */
  ttlSeconds?: number;
}

export const sessionKey = (sessionId: string): string => `session:${sessionId}`;

// ─── Factory Function ───────────────────────────────────────────

export function createSessionManager(deps: SessionManagerDeps): SessionManager {
  const { store, logger } = deps;
  const ttlSeconds = deps.ttlSeconds ?? 3600;

  async function save(session: Session): Promise<void> {
    await store.set(sessionKey(session.id), JSON.stringify(session), ttlSeconds);
  }

  async function load(sessionId: string): Promise<Session | null> {
    const raw = await store.get(sessionKey(sessionId));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn('Discarding unreadable session record', { component: 'session-manager', sessionId });
      return null;
    }

    const result = sessionSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn('Discarding invalid session record', {
        component: 'session-manager',
        sessionId,
        issues: result.error.issues.map((issue) => issue.path.join('.')),
      });
      return null;
    }
    return result.data;
  }

  return {
    async createSession(userId, sessionId) {
      const now = new Date();
      const session: Session = {
        id: sessionId ?? nanoid(),
        userId,
        createdAt: now,
        expiresAt: new Date(now.getTime() + ttlSeconds * 1000),
        context: {},
      };
      await save(session);
      logger.info('Session created', { component: 'session-manager', sessionId: session.id, userId });
      return session;
    },

    getSession: load,

    async updateContext(sessionId, updates) {
      const session = await load(sessionId);
      if (!session) return false;
      await save({ ...session, context: { ...session.context, ...updates } });
      return true;
    },

    async resetContext(sessionId) {
      const session = await load(sessionId);
      if (!session) return false;
      await save({ ...session, context: {} });
      logger.info('Session context reset', { component: 'session-manager', sessionId });
      return true;
    },

    async extendSession(sessionId) {
      const session = await load(sessionId);
      if (!session) return false;
      await save({ ...session, expiresAt: new Date(Date.now() + ttlSeconds * 1000) });
      return true;
    },

    async deleteSession(sessionId) {
      const removed = await store.delete(sessionKey(sessionId));
      if (removed > 0) {
        logger.info('Session deleted', { component: 'session-manager', sessionId });
      }
      return removed > 0;
    },
  };
}
