/**
 * WebSocket endpoints for chat clients and backchannel observers.
 *
 * Chat frames are handled strictly in arrival order: each one is rate
 * limited, parsed into an envelope, recorded in the session context and
 * routed. A socket error marks the session disconnected and goes through
 * the recovery manager as `CONNECTION_FAILED`, which schedules a resume.
 * Closing the socket disconnects the session and forgets its recovery
 * state, unless a resume is pending. Events from a socket that a newer
 * connection for the same session has replaced are ignored.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ConnectionGateway } from '@/gateway/connection-gateway.js';
import { GatewayError } from '@/gateway/errors.js';
import type { RecoveryManager } from '@/gateway/recovery.js';
import type { ConnectOptions, GatewaySocket } from '@/gateway/types.js';
import type { Logger } from '@/observability/logger.js';
import { createMessageRouter, type MessageRouter } from '../message-router.js';
import type { RouteDependencies } from '../types.js';

// ─── Socket Interface ───────────────────────────────────────────

/** Minimal WebSocket interface consumed by the route handlers. */
export interface ChatSocket extends GatewaySocket {
  on(event: 'message', listener: (data: Buffer) => void): void;
  on(event: 'close', listener: () => void): void;
  on(event: 'error', listener: (err: Error) => void): void;
}

export interface ChatSocketDeps {
  gateway: ConnectionGateway;
  recovery: RecoveryManager;
  router: MessageRouter;
  logger: Logger;
}

const connectQuerySchema = z.object({
  session_id: z.string().min(1).optional(),
  user_id: z.string().min(1).optional(),
});

/** Close code for a server-side failure. */
const INTERNAL_ERROR_CLOSE = 1011;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Serialize work on one socket behind its connect step. Tasks run only once
 * the session id is known; if connecting failed they are skipped.
 */
function createSocketQueue(
  connected: Promise<string | null>,
  logger: Logger,
  component: string,
): (task: (sessionId: string) => Promise<void>) => void {
  let queue = Promise.resolve();
  return (task) => {
    queue = queue
      .then(async () => {
        const sessionId = await connected;
        if (sessionId) await task(sessionId);
      })
      .catch((error: unknown) => {
        logger.error('Socket task failed', { component, error: describeError(error) });
      });
  };
}

async function connectOrClose(
  socket: ChatSocket,
  connect: () => Promise<string>,
  logger: Logger,
  component: string,
): Promise<string | null> {
  try {
    return await connect();
  } catch (error) {
    logger.error('Failed to open session', { component, error: describeError(error) });
    socket.close(INTERNAL_ERROR_CLOSE, 'Session could not be opened');
    return null;
  }
}

// ─── Connection Handlers ────────────────────────────────────────

/**
 * Wire a chat socket. Resolves with the session id, or `null` when the
 * session could not be opened (the socket is then closed).
 */
export function setupChatSocket(
  socket: ChatSocket,
  options: ConnectOptions,
  deps: ChatSocketDeps,
): Promise<string | null> {
  const { gateway, recovery, router, logger } = deps;
  const component = 'ws-chat';

  const connected = connectOrClose(
    socket,
    async () => {
      const sessionId = await gateway.connect(socket, options);
      await recovery.resetReconnectionAttempts(sessionId);
      return sessionId;
    },
    logger,
    component,
  );
  const enqueue = createSocketQueue(connected, logger, component);

  // Listeners are attached before the session exists so no early frame is lost.
  socket.on('message', (data: Buffer) => {
    const raw = data.toString('utf-8');
    enqueue(async (sessionId) => {
      if (!(await recovery.checkRateLimit(sessionId))) return;
      const envelope = await gateway.handleMessage(sessionId, raw);
      await router(sessionId, envelope);
    });
  });

  socket.on('close', () => {
    enqueue((sessionId) => {
      if (!gateway.disconnect(sessionId, socket)) {
        logger.debug('Replaced chat socket closed', { component, sessionId });
        return Promise.resolve();
      }
      const reconnecting = recovery.getConnectionState(sessionId) === 'reconnecting';
      if (!reconnecting) recovery.cleanupSession(sessionId);
      logger.info('Chat socket closed', { component, sessionId, reconnecting });
      return Promise.resolve();
    });
  });

  socket.on('error', (err: Error) => {
    enqueue(async (sessionId) => {
      if (!gateway.isCurrentSocket(sessionId, socket)) {
        logger.debug('Ignoring error from a replaced chat socket', { component, sessionId, error: err.message });
        return;
      }
      recovery.setConnectionState(sessionId, 'disconnected');
      await recovery.handleError(
        new GatewayError({
          errorCode: 'CONNECTION_FAILED',
          message: `WebSocket error: ${err.message}`,
          sessionId,
          cause: err,
        }),
      );
    });
  });

  return connected;
}

/**
 * Wire a backchannel socket. Observers only listen; the one frame they may
 * send is a `ping`.
 */
export function setupBackchannelSocket(
  socket: ChatSocket,
  options: ConnectOptions,
  deps: Pick<ChatSocketDeps, 'gateway' | 'logger'>,
): Promise<string | null> {
  const { gateway, logger } = deps;
  const component = 'ws-backchannel';

  const connected = connectOrClose(socket, () => gateway.connectBackchannel(socket, options), logger, component);
  const enqueue = createSocketQueue(connected, logger, component);

  socket.on('message', (data: Buffer) => {
    const raw = data.toString('utf-8');
    enqueue(async (sessionId) => {
      const envelope = await gateway.handleMessage(sessionId, raw);
      if (envelope.type === 'ping') {
        await gateway.sendMessage(sessionId, 'pong', { timestamp: new Date().toISOString() });
        return;
      }
      logger.debug('Ignoring backchannel frame', { component, sessionId, type: envelope.type });
    });
  });

  socket.on('close', () => {
    enqueue((sessionId) => {
      gateway.disconnect(sessionId, socket);
      logger.info('Backchannel socket closed', { component, sessionId });
      return Promise.resolve();
    });
  });

  socket.on('error', (err: Error) => {
    logger.warn('Backchannel socket error', { component, error: err.message });
  });

  return connected;
}

// ─── Route Plugin ───────────────────────────────────────────────

function connectOptions(query: unknown): ConnectOptions {
  const parsed = connectQuerySchema.safeParse(query);
  if (!parsed.success) return {};
  return { sessionId: parsed.data.session_id, userId: parsed.data.user_id };
}

/** Register the chat (`/ws/chat`) and backchannel (`/ws/backchannel`) endpoints. */
export function wsChatRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const router = createMessageRouter(deps);
  const socketDeps: ChatSocketDeps = { ...deps, router };

  fastify.get('/ws/chat', { websocket: true }, (socket, request) => {
    void setupChatSocket(socket, connectOptions(request.query), socketDeps);
  });

  fastify.get('/ws/backchannel', { websocket: true }, (socket, request) => {
    void setupBackchannelSocket(socket, connectOptions(request.query), socketDeps);
  });
}
