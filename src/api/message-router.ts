/**
 * Routes inbound client envelopes by type.
 *
 * `text` goes to the orchestrator; `new_chat` and `new_chat_silent` start
 * over with an empty session context and conversation history; `ping` is
 * answered with `pong`.
 * Anything else is reported back to the client as an error.
 */
import type { OrchestratorAgent } from '@/agents/orchestrator.js';
import type { ConnectionGateway } from '@/gateway/connection-gateway.js';
import type { Envelope } from '@/gateway/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ConversationMemory } from '@/sessions/conversation-memory.js';
import type { SessionManager } from '@/sessions/session-manager.js';

export type MessageRouter = (sessionId: string, envelope: Envelope) => Promise<void>;

interface MessageRouterDeps {
  gateway: ConnectionGateway;
  sessions: SessionManager;
  memory: ConversationMemory;
  orchestrator: OrchestratorAgent;
  logger: Logger;
}

export function createMessageRouter(deps: MessageRouterDeps): MessageRouter {
  const { gateway, sessions, memory, orchestrator, logger } = deps;
  const log = { component: 'message-router' };

  async function startNewChat(sessionId: string, silent: boolean): Promise<void> {
    const reset = await sessions.resetContext(sessionId);
    orchestrator.clearSessionContext(sessionId);
    await memory.clear(sessionId);

    if (silent) {
      if (reset) logger.info('Session context silently reset', { ...log, sessionId });
      else logger.error('Failed to silently reset session context', { ...log, sessionId });
      return;
    }

    if (reset) await gateway.sendMessage(sessionId, 'chat_reset', { message: 'New chat started.' });
    else await gateway.sendError(sessionId, 'Failed to start new chat.');
  }

  async function handleText(sessionId: string, content: unknown): Promise<void> {
    if (typeof content !== 'string') {
      logger.warn('Text message with non-string content', { ...log, sessionId });
      await gateway.sendError(sessionId, 'Invalid message content', "Expected a string for 'text' message type.");
      return;
    }

    if (!orchestrator.isRunning()) {
      logger.error('Orchestrator not available', { ...log, sessionId });
      await gateway.sendError(
        sessionId,
        'Service temporarily unavailable',
        'The AI assistant is not ready. Please try again in a moment.',
      );
      return;
    }

    const reply = await orchestrator.handleUserMessage(content, sessionId);
    // Empty means the answer arrives later, from the agent's response handler.
    if (reply) await gateway.sendText(sessionId, reply);
  }

  return async (sessionId, envelope) => {
    logger.debug('Routing message', { ...log, sessionId, type: envelope.type });

    switch (envelope.type) {
      case 'text':
        await handleText(sessionId, envelope.content);
        return;
      case 'new_chat':
        await startNewChat(sessionId, false);
        return;
      case 'new_chat_silent':
        await startNewChat(sessionId, true);
        return;
      case 'ping':
        await gateway.sendMessage(sessionId, 'pong', { timestamp: new Date().toISOString() });
        return;
      default:
        logger.warn('No handler for message type', { ...log, sessionId, type: envelope.type });
        await gateway.sendError(sessionId, 'Unknown message type', `No handler for '${envelope.type}'`);
    }
  };
}
