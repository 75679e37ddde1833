/**
 * Personalization Store — shopper preferences per session, kept in the
 * KeyValueStore under `personalization:{id}`.
 */
import { z } from 'zod';
import type { Logger } from '@/observability/logger.js';
import type { KeyValueStore } from '@/storage/types.js';

// ─── Types ──────────────────────────────────────────────────────

export const budgetRangeSchema = z
  .object({
    /** Whole US dollars. */
    min: z.number().int().nonnegative(),
    max: z.number().int().nonnegative(),
  })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export const personalizationInputSchema = z.object({
  stylePreferences: z.string().trim().min(1).max(500).optional(),
  budgetRange: budgetRangeSchema.optional(),
});

const personalizationSchema = personalizationInputSchema.extend({
  sessionId: z.string().min(1),
  updatedAt: z.coerce.date(),
});

export type BudgetRange = z.infer<typeof budgetRangeSchema>;
export type PersonalizationInput = z.infer<typeof personalizationInputSchema>;
export type Personalization = z.infer<typeof personalizationSchema>;

export interface PersonalizationStore {
  get(sessionId: string): Promise<Personalization | null>;
  save(sessionId: string, input: PersonalizationInput): Promise<Personalization>;
  clear(sessionId: string): Promise<boolean>;
}

interface PersonalizationStoreDeps {
  store: KeyValueStore;
  logger: Logger;
  /** Default: 86400 (24 hours). */
  ttlSeconds?: number;
}

export const personalizationKey = (sessionId: string): string => `personalization:${sessionId}`;

// ─── Factory Function ───────────────────────────────────────────

export function createPersonalizationStore(deps: PersonalizationStoreDeps): PersonalizationStore {
  const { store, logger } = deps;
  const ttlSeconds = deps.ttlSeconds ?? 86_400;
  const log = { component: 'personalization' };

  return {
    async get(sessionId) {
      const raw = await store.get(personalizationKey(sessionId));
      if (raw === null) return null;

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        logger.warn('Discarding unreadable personalization record', { ...log, sessionId });
        return null;
      }
      const result = personalizationSchema.safeParse(parsed);
      return result.success ? result.data : null;
    },

    async save(sessionId, input) {
      const record: Personalization = { ...input, sessionId, updatedAt: new Date() };
      await store.set(personalizationKey(sessionId), JSON.stringify(record), ttlSeconds);
      logger.info('Personalization saved', {
        ...log,
        sessionId,
        hasStyle: input.stylePreferences !== undefined,
        hasBudget: input.budgetRange !== undefined,
      });
      return record;
    },

    async clear(sessionId) {
      return (await store.delete(personalizationKey(sessionId))) > 0;
    },
  };
}
