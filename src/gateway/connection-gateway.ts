/**
 * Connection Gateway — bridges WebSocket clients into the agent mesh.
 *
 * Tracks two kinds of sessions: chat sessions, and passive backchannel
 * sessions that mirror every frontend notification on the bus. Writes that
 * fail, or target a socket that is no longer open, disconnect the session.
 */
import { customAlphabet } from 'nanoid';
import type { MessageBus, FrontendSubscriber } from '@/a2a/message-bus.js';
import type { Logger } from '@/observability/logger.js';
import type { SessionManager } from '@/sessions/session-manager.js';
import { createEnvelope, parseEnvelope, serializeEnvelope, toWireNotification, toWireSteps } from './envelope.js';
import {
  SOCKET_OPEN,
  type AgentStep,
  type ConnectOptions,
  type ConnectionInfo,
  type Envelope,
  type GatewayConnection,
  type GatewaySocket,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ConnectionGateway {
  /** Resolve or mint the session, register the socket and greet the client. */
  connect(socket: GatewaySocket, options?: ConnectOptions): Promise<string>;
  /** Same as `connect`, plus mirroring of frontend notifications. */
  connectBackchannel(socket: GatewaySocket, options?: ConnectOptions): Promise<string>;
  /**
   * Idempotent. Returns whether the session was connected. With `socket`,
   * only disconnects when that socket is still the session's live one.
   */
  disconnect(sessionId: string, socket?: GatewaySocket): boolean;
  send(sessionId: string, envelope: Envelope): Promise<boolean>;
  sendMessage(sessionId: string, type: string, content: unknown): Promise<boolean>;
  sendToUser(userId: string, envelope: Envelope): Promise<number>;
  broadcast(envelope: Envelope, exclude?: ReadonlySet<string>): Promise<number>;
  broadcastToBackchannel(envelope: Envelope, exclude?: ReadonlySet<string>): Promise<number>;
  /** Parse an inbound frame and record it in the session context. */
  handleMessage(sessionId: string, raw: string): Promise<Envelope>;

  sendText(sessionId: string, content: unknown): Promise<boolean>;
  sendError(sessionId: string, error: string, details?: string): Promise<boolean>;
  sendTypingIndicator(sessionId: string, isTyping?: boolean): Promise<boolean>;
  sendAgentCommunication(sessionId: string, steps: AgentStep[]): Promise<boolean>;
  updateAgentCommunication(sessionId: string, steps: AgentStep[]): Promise<boolean>;
  /** `true` when at least one backchannel session received it. */
  sendA2AToBackchannel(content: unknown): Promise<boolean>;
  broadcastSystemMessage(message: string, exclude?: ReadonlySet<string>): Promise<number>;

  isSessionActive(sessionId: string): boolean;
  /** Whether `socket` is the live socket of the session. */
  isCurrentSocket(sessionId: string, socket: GatewaySocket): boolean;
  getUserSessions(userId: string): string[];
  getBackchannelSessions(): string[];
  getActiveSessions(): ConnectionInfo[];
}

interface ConnectionGatewayDeps {
  sessions: SessionManager;
  bus: MessageBus;
  logger: Logger;
}

const shortId = customAlphabet('0123456789abcdef', 8);

/** Close code sent to a socket whose session was taken over by a newer one. */
export const REPLACED_CLOSE_CODE = 4000;

// ─── Factory Function ───────────────────────────────────────────

export function createConnectionGateway(deps: ConnectionGatewayDeps): ConnectionGateway {
  const { sessions, bus, logger } = deps;
  const connections = new Map<string, GatewayConnection>();
  const userSessions = new Map<string, Set<string>>();
  const backchannels = new Map<string, FrontendSubscriber>();

  async function register(
    socket: GatewaySocket,
    options: ConnectOptions,
    isBackchannel: boolean,
  ): Promise<GatewayConnection> {
    const existing = options.sessionId ? await sessions.getSession(options.sessionId) : null;
    const session =
      existing ??
      (await sessions.createSession(
        options.userId ?? `${isBackchannel ? 'backchannel' : 'anonymous'}_${shortId()}`,
        options.sessionId,
      ));

    const previous = connections.get(session.id);
    if (previous) {
      gateway.disconnect(session.id);
      if (previous.socket !== socket) closeReplaced(previous);
    }

    const now = new Date();
    const connection: GatewayConnection = {
      sessionId: session.id,
      userId: session.userId,
      socket,
      connectedAt: now,
      lastActivity: now,
      isBackchannel,
    };
    connections.set(session.id, connection);

    let owned = userSessions.get(session.userId);
    if (!owned) {
      owned = new Set();
      userSessions.set(session.userId, owned);
    }
    owned.add(session.id);

    logger.info(isBackchannel ? 'Backchannel connected' : 'WebSocket connected', {
      component: 'connection-gateway',
      sessionId: session.id,
      userId: session.userId,
      resumed: existing !== null,
    });
    return connection;
  }

  function closeReplaced(connection: GatewayConnection): void {
    try {
      connection.socket.close(REPLACED_CLOSE_CODE, 'Replaced by a newer connection');
    } catch (error) {
      logger.warn('Failed to close replaced socket', {
        component: 'connection-gateway',
        sessionId: connection.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async function fanOut(
    sessionIds: string[],
    envelope: Envelope,
    exclude?: ReadonlySet<string>,
  ): Promise<number> {
    let delivered = 0;
    for (const sessionId of sessionIds) {
      if (exclude?.has(sessionId)) continue;
      if (await gateway.send(sessionId, envelope)) delivered++;
    }
    return delivered;
  }

  const gateway: ConnectionGateway = {
    async connect(socket, options = {}) {
      const connection = await register(socket, options, false);
      await gateway.sendMessage(connection.sessionId, 'connection_established', {
        session_id: connection.sessionId,
        user_id: connection.userId,
        message: 'Connected successfully',
      });
      return connection.sessionId;
    },

    async connectBackchannel(socket, options = {}) {
      const connection = await register(socket, options, true);
      const sessionId = connection.sessionId;

      const subscriber: FrontendSubscriber = async (notification) => {
        const sent = await gateway.send(
          sessionId,
          createEnvelope('a2a_message', toWireNotification(notification), sessionId),
        );
        if (!sent) throw new Error(`Backchannel session ${sessionId} is gone`);
      };
      backchannels.set(sessionId, subscriber);
      bus.addFrontendSubscriber(subscriber);

      await gateway.sendMessage(sessionId, 'backchannel_connected', {
        session_id: sessionId,
        user_id: connection.userId,
        message: 'Backchannel connected successfully',
      });
      return sessionId;
    },

    disconnect(sessionId, socket) {
      const connection = connections.get(sessionId);
      if (!connection) return false;
      if (socket && connection.socket !== socket) {
        logger.debug('Ignoring disconnect from a replaced socket', { component: 'connection-gateway', sessionId });
        return false;
      }

      connections.delete(sessionId);

      const subscriber = backchannels.get(sessionId);
      if (subscriber) {
        backchannels.delete(sessionId);
        bus.removeFrontendSubscriber(subscriber);
      }

      const owned = userSessions.get(connection.userId);
      owned?.delete(sessionId);
      if (owned?.size === 0) userSessions.delete(connection.userId);

      logger.info('WebSocket disconnected', {
        component: 'connection-gateway',
        sessionId,
        userId: connection.userId,
        isBackchannel: connection.isBackchannel,
      });
      return true;
    },

    send(sessionId, envelope) {
      const connection = connections.get(sessionId);
      if (!connection) {
        logger.warn('Send to inactive session', { component: 'connection-gateway', sessionId });
        return Promise.resolve(false);
      }

      try {
        if (connection.socket.readyState !== SOCKET_OPEN) {
          throw new Error(`socket not open (readyState ${connection.socket.readyState})`);
        }
        connection.socket.send(serializeEnvelope(envelope));
        connection.lastActivity = new Date();
        return Promise.resolve(true);
      } catch (error) {
        logger.error('Send failed, disconnecting session', {
          component: 'connection-gateway',
          sessionId,
          type: envelope.type,
          error: error instanceof Error ? error.message : String(error),
        });
        gateway.disconnect(sessionId);
        return Promise.resolve(false);
      }
    },

    sendMessage(sessionId, type, content) {
      return gateway.send(sessionId, createEnvelope(type, content, sessionId));
    },

    sendToUser(userId, envelope) {
      return fanOut([...(userSessions.get(userId) ?? [])], envelope);
    },

    broadcast(envelope, exclude) {
      return fanOut([...connections.keys()], envelope, exclude);
    },

    broadcastToBackchannel(envelope, exclude) {
      return fanOut([...backchannels.keys()], envelope, exclude);
    },

    async handleMessage(sessionId, raw) {
      const envelope = parseEnvelope(raw, sessionId);

      const connection = connections.get(sessionId);
      if (connection) connection.lastActivity = new Date();

      await sessions.updateContext(sessionId, {
        last_message: {
          type: envelope.type,
          content: envelope.content,
          timestamp: envelope.timestamp.toISOString(),
        },
        last_activity: new Date().toISOString(),
      });
      return envelope;
    },

    sendText(sessionId, content) {
      return gateway.sendMessage(sessionId, 'text', content);
    },

    sendError(sessionId, error, details) {
      return gateway.sendMessage(sessionId, 'error', details === undefined ? { error } : { error, details });
    },

    sendTypingIndicator(sessionId, isTyping = true) {
      return gateway.sendMessage(sessionId, 'typing_indicator', { is_typing: isTyping });
    },

    sendAgentCommunication(sessionId, steps) {
      return gateway.sendMessage(sessionId, 'agent_communication', { steps: toWireSteps(steps) });
    },

    updateAgentCommunication(sessionId, steps) {
      return gateway.sendMessage(sessionId, 'agent_communication_update', { steps: toWireSteps(steps) });
    },

    async sendA2AToBackchannel(content) {
      return (await gateway.broadcastToBackchannel(createEnvelope('a2a_message', content))) > 0;
    },

    broadcastSystemMessage(message, exclude) {
      return gateway.broadcast(createEnvelope('system', { message }), exclude);
    },

    isSessionActive: (sessionId) => connections.has(sessionId),

    isCurrentSocket: (sessionId, socket) => connections.get(sessionId)?.socket === socket,

    getUserSessions: (userId) => [...(userSessions.get(userId) ?? [])],

    getBackchannelSessions: () => [...backchannels.keys()],

    getActiveSessions: () =>
      [...connections.values()].map(({ socket: _socket, ...info }) => ({ ...info })),
  };

  return gateway;
}
