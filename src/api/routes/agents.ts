/**
 * Agent routes — status of the running agents and their registrations.
 */
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { RouteDependencies } from '../types.js';
import { sendSuccess, sendNotFound } from '../error-handler.js';

const agentParamsSchema = z.object({
  agentId: z.string().min(1),
});

// ─── Route Registration ─────────────────────────────────────────

export function agentRoutes(
  fastify: FastifyInstance,
  deps: Pick<RouteDependencies, 'agentManager' | 'gateway' | 'recovery'>,
): void {
  const { agentManager, gateway, recovery } = deps;

  fastify.get('/agents', async (_request: FastifyRequest, reply: FastifyReply) => {
    return sendSuccess(reply, agentManager.getStatus());
  });

  fastify.get('/agents/:agentId', async (request: FastifyRequest, reply: FastifyReply) => {
    const { agentId } = agentParamsSchema.parse(request.params);
    const agent = agentManager.getById(agentId);
    if (!agent) {
      return sendNotFound(reply, 'Agent', agentId);
    }

    return sendSuccess(reply, {
      agent_id: agent.id,
      agent_type: agent.type,
      name: agent.name,
      capabilities: [...agent.capabilities],
      is_running: agent.isRunning(),
      pending_acks: agent.pendingAckCount(),
    });
  });

  // ─── Connections ────────────────────────────────────────────────

  fastify.get('/connections', async (_request: FastifyRequest, reply: FastifyReply) => {
    return sendSuccess(reply, {
      sessions: gateway.getActiveSessions().map((info) => ({
        session_id: info.sessionId,
        user_id: info.userId,
        connected_at: info.connectedAt.toISOString(),
        last_activity: info.lastActivity.toISOString(),
        is_backchannel: info.isBackchannel,
        state: recovery.getConnectionState(info.sessionId),
      })),
      errors: recovery.getErrorStats(),
    });
  });
}
