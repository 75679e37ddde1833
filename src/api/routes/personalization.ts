/**
 * Personalization routes — a session's style preferences and budget, which
 * narrow the orchestrator's product search results.
 */
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { budgetRangeSchema, type Personalization } from '@/sessions/personalization.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess, sendNotFound } from '../error-handler.js';

const sessionParamsSchema = z.object({
  sessionId: z.string().min(1),
});

const personalizationBodySchema = z.object({
  style_preferences: z.string().trim().min(1).max(500).optional(),
  budget_range: budgetRangeSchema.optional(),
});

function toWire(record: Personalization): Record<string, unknown> {
  return {
    session_id: record.sessionId,
    style_preferences: record.stylePreferences ?? null,
    budget_range: record.budgetRange ?? null,
    updated_at: record.updatedAt.toISOString(),
  };
}

// ─── Route Registration ─────────────────────────────────────────

export function personalizationRoutes(
  fastify: FastifyInstance,
  deps: Pick<RouteDependencies, 'personalization' | 'logger'>,
): void {
  const { personalization, logger } = deps;

  fastify.get('/personalization/:sessionId', async (request: FastifyRequest, reply: FastifyReply) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const record = await personalization.get(sessionId);
    if (!record) {
      return sendNotFound(reply, 'Personalization', sessionId);
    }
    return sendSuccess(reply, toWire(record));
  });

  fastify.put('/personalization/:sessionId', async (request: FastifyRequest, reply: FastifyReply) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const body = personalizationBodySchema.parse(request.body ?? {});

    const record = await personalization.save(sessionId, {
      stylePreferences: body.style_preferences,
      budgetRange: body.budget_range,
    });
    return sendSuccess(reply, toWire(record));
  });

  fastify.delete('/personalization/:sessionId', async (request: FastifyRequest, reply: FastifyReply) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const cleared = await personalization.clear(sessionId);
    logger.info('Personalization cleared', { component: 'personalization-routes', sessionId, cleared });
    return sendSuccess(reply, { session_id: sessionId, cleared });
  });
}
