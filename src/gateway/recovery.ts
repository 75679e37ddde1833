/**
 * Recovery Manager — error handling, rate limiting and reconnection for
 * gateway sessions.
 *
 * Errors are recorded per session, pushed to the client while its session
 * is live, then passed to the handler registered for their code. Dropped
 * connections are resumed with capped exponential backoff.
 */
import type { GatewayConfig, ReconnectionConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import type { SessionManager } from '@/sessions/session-manager.js';
import type { ConnectionGateway } from './connection-gateway.js';
import { createEnvelope } from './envelope.js';
import { GatewayError, toErrorPayload, type GatewayErrorCode } from './errors.js';
import type { Envelope } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export type ConnectionState =
  | 'connecting'
  | 'connected'
  | 'disconnecting'
  | 'disconnected'
  | 'reconnecting'
  | 'failed';

export type GatewayErrorHandler = (error: GatewayError) => void | Promise<void>;

export interface ErrorStats {
  total_errors: number;
  error_counts: Partial<Record<GatewayErrorCode, number>>;
  active_sessions: number;
  reconnecting_sessions: number;
  failed_sessions: number;
  timestamp: string;
}

export interface RecoveryManager {
  /** `false` only when handling itself blew up. */
  handleError(error: GatewayError): Promise<boolean>;
  registerHandler(code: GatewayErrorCode, handler: GatewayErrorHandler): void;
  /** `false` when the session is over its message budget for the window. */
  checkRateLimit(sessionId: string): Promise<boolean>;

  getConnectionState(sessionId: string): ConnectionState;
  setConnectionState(sessionId: string, state: ConnectionState): void;
  /** `true` when a resume was scheduled. */
  initiateReconnection(sessionId: string): boolean;
  cancelReconnection(sessionId: string): boolean;
  /** Mark the session connected and flush its queued envelopes. Returns the flushed count. */
  resetReconnectionAttempts(sessionId: string): Promise<number>;
  reconnectionAttempts(sessionId: string): number;

  queueMessage(sessionId: string, envelope: Envelope): void;
  queuedMessageCount(sessionId: string): number;

  cleanupSession(sessionId: string): void;
  getErrorHistory(sessionId: string): GatewayError[];
  getErrorStats(): ErrorStats;
}

interface RecoveryManagerDeps {
  gateway: ConnectionGateway;
  sessions: SessionManager;
  logger: Logger;
  limits?: Partial<GatewayConfig>;
  reconnection?: Partial<ReconnectionConfig>;
  /** Jitter source in [0, 1). Default: Math.random. */
  random?: () => number;
  /** Clock in milliseconds. Default: Date.now. */
  now?: () => number;
}

// ─── Factory Function ───────────────────────────────────────────

export function createRecoveryManager(deps: RecoveryManagerDeps): RecoveryManager {
  const { gateway, sessions, logger } = deps;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? Date.now;

  const limits = {
    rateLimitWindowSeconds: deps.limits?.rateLimitWindowSeconds ?? 60,
    rateLimitMaxMessages: deps.limits?.rateLimitMaxMessages ?? 100,
    maxErrorHistory: deps.limits?.maxErrorHistory ?? 50,
    maxQueuedMessages: deps.limits?.maxQueuedMessages ?? 20,
  };
  const backoff = {
    maxAttempts: deps.reconnection?.maxAttempts ?? 5,
    initialDelaySeconds: deps.reconnection?.initialDelaySeconds ?? 1,
    maxDelaySeconds: deps.reconnection?.maxDelaySeconds ?? 30,
    backoffMultiplier: deps.reconnection?.backoffMultiplier ?? 2,
    jitter: deps.reconnection?.jitter ?? true,
  };

  const states = new Map<string, ConnectionState>();
  const history = new Map<string, GatewayError[]>();
  const attempts = new Map<string, number>();
  const rateWindows = new Map<string, number[]>();
  const queues = new Map<string, Envelope[]>();
  const resumeTimers = new Map<string, ReturnType<typeof setTimeout>>();
  const handlers = new Map<GatewayErrorCode, GatewayErrorHandler>();

  function record(sessionId: string, error: GatewayError): void {
    const entries = history.get(sessionId) ?? [];
    entries.push(error);
    history.set(sessionId, entries.slice(-limits.maxErrorHistory));
  }

  async function resume(sessionId: string): Promise<void> {
    resumeTimers.delete(sessionId);
    if (manager.getConnectionState(sessionId) !== 'reconnecting') return;

    try {
      const extended = await sessions.extendSession(sessionId);
      if (!extended) {
        logger.warn('Session vanished before reconnection', { component: 'recovery', sessionId });
        manager.setConnectionState(sessionId, 'failed');
        return;
      }
      if (!gateway.isSessionActive(sessionId)) {
        logger.info('Session left before reconnection was ready', { component: 'recovery', sessionId });
        manager.cleanupSession(sessionId);
        return;
      }

      await gateway.sendMessage(sessionId, 'reconnection_ready', {
        session_id: sessionId,
        message: 'Ready for reconnection',
        attempt: attempts.get(sessionId) ?? 0,
      });
      manager.setConnectionState(sessionId, 'disconnected');
      logger.info('Reconnection ready', { component: 'recovery', sessionId });
    } catch (error) {
      logger.error('Reconnection failed', {
        component: 'recovery',
        sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      manager.setConnectionState(sessionId, 'failed');
    }
  }

  // ─── Default Handlers ───────────────────────────────────────────

  handlers.set('CONNECTION_FAILED', (error) => {
    if (error.sessionId) manager.initiateReconnection(error.sessionId);
  });

  handlers.set('SESSION_EXPIRED', async (error) => {
    if (!error.sessionId) return;
    await sessions.deleteSession(error.sessionId);
    manager.cleanupSession(error.sessionId);
  });

  // Already answered by checkRateLimit.
  handlers.set('RATE_LIMIT_EXCEEDED', () => undefined);

  handlers.set('INTERNAL_ERROR', (error) => {
    logger.fatal('Internal gateway error', {
      component: 'recovery',
      sessionId: error.sessionId,
      error: error.message,
    });
  });

  handlers.set('SERVICE_UNAVAILABLE', (error) => {
    if (!error.sessionId) return;
    manager.queueMessage(
      error.sessionId,
      createEnvelope(
        'service_status',
        { status: 'unavailable', message: 'Service temporarily unavailable, will retry automatically' },
        error.sessionId,
      ),
    );
  });

  // ─── Manager ────────────────────────────────────────────────────

  const manager: RecoveryManager = {
    async handleError(error) {
      const { sessionId } = error;
      try {
        logger.error('Gateway error', {
          component: 'recovery',
          sessionId,
          code: error.errorCode,
          severity: error.severity,
          error: error.message,
        });

        if (sessionId) {
          record(sessionId, error);
          if (gateway.isSessionActive(sessionId)) {
            await gateway.sendMessage(sessionId, 'error', toErrorPayload(error));
          }
        }

        const handler = handlers.get(error.errorCode);
        if (handler) {
          await handler(error);
        } else {
          logger.debug('No handler for gateway error code', {
            component: 'recovery',
            sessionId,
            code: error.errorCode,
          });
        }
        return true;
      } catch (handlingError) {
        logger.fatal('Gateway error handling failed', {
          component: 'recovery',
          sessionId,
          code: error.errorCode,
          error: handlingError instanceof Error ? handlingError.message : String(handlingError),
        });
        return false;
      }
    },

    registerHandler(code, handler) {
      handlers.set(code, handler);
    },

    async checkRateLimit(sessionId) {
      const current = now();
      const windowStart = current - limits.rateLimitWindowSeconds * 1000;
      const recent = (rateWindows.get(sessionId) ?? []).filter((at) => at > windowStart);

      if (recent.length >= limits.rateLimitMaxMessages) {
        rateWindows.set(sessionId, recent);
        await manager.handleError(
          new GatewayError({
            errorCode: 'RATE_LIMIT_EXCEEDED',
            message: 'Rate limit exceeded',
            details: `Maximum ${limits.rateLimitMaxMessages} messages per ${limits.rateLimitWindowSeconds} seconds`,
            sessionId,
            retryAfter: limits.rateLimitWindowSeconds,
          }),
        );
        return false;
      }

      recent.push(current);
      rateWindows.set(sessionId, recent);
      return true;
    },

    getConnectionState: (sessionId) => states.get(sessionId) ?? 'disconnected',

    setConnectionState(sessionId, state) {
      states.set(sessionId, state);
      logger.debug('Connection state changed', { component: 'recovery', sessionId, state });
    },

    initiateReconnection(sessionId) {
      const state = manager.getConnectionState(sessionId);
      if (state === 'connected' || state === 'reconnecting') return false;

      const previous = attempts.get(sessionId) ?? 0;
      if (previous >= backoff.maxAttempts) {
        logger.warn('Reconnection attempts exhausted', {
          component: 'recovery',
          sessionId,
          attempts: previous,
        });
        manager.setConnectionState(sessionId, 'failed');
        return false;
      }

      manager.setConnectionState(sessionId, 'reconnecting');
      attempts.set(sessionId, previous + 1);

      let delaySeconds = Math.min(
        backoff.initialDelaySeconds * backoff.backoffMultiplier ** previous,
        backoff.maxDelaySeconds,
      );
      if (backoff.jitter) delaySeconds *= 0.5 + random() * 0.5;

      logger.info('Reconnection scheduled', {
        component: 'recovery',
        sessionId,
        attempt: previous + 1,
        delaySeconds,
      });

      const timer = setTimeout(() => {
        void resume(sessionId).catch((error: unknown) => {
          logger.error('Reconnection task crashed', {
            component: 'recovery',
            sessionId,
            error: error instanceof Error ? error.message : String(error),
          });
        });
      }, delaySeconds * 1000);
      resumeTimers.set(sessionId, timer);
      return true;
    },

    cancelReconnection(sessionId) {
      const timer = resumeTimers.get(sessionId);
      if (timer === undefined) return false;
      clearTimeout(timer);
      resumeTimers.delete(sessionId);
      return true;
    },

    async resetReconnectionAttempts(sessionId) {
      manager.cancelReconnection(sessionId);
      attempts.delete(sessionId);
      manager.setConnectionState(sessionId, 'connected');

      const queued = queues.get(sessionId) ?? [];
      queues.delete(sessionId);
      let flushed = 0;
      for (const envelope of queued) {
        if (await gateway.send(sessionId, envelope)) flushed++;
      }
      if (queued.length > 0) {
        logger.info('Flushed queued messages', {
          component: 'recovery',
          sessionId,
          queued: queued.length,
          flushed,
        });
      }
      return flushed;
    },

    reconnectionAttempts: (sessionId) => attempts.get(sessionId) ?? 0,

    queueMessage(sessionId, envelope) {
      const queue = queues.get(sessionId) ?? [];
      queue.push(envelope);
      queues.set(sessionId, queue.slice(-limits.maxQueuedMessages));
    },

    queuedMessageCount: (sessionId) => queues.get(sessionId)?.length ?? 0,

    cleanupSession(sessionId) {
      manager.cancelReconnection(sessionId);
      states.delete(sessionId);
      history.delete(sessionId);
      attempts.delete(sessionId);
      rateWindows.delete(sessionId);
      queues.delete(sessionId);
      logger.debug('Recovery state cleared', { component: 'recovery', sessionId });
    },

    getErrorHistory: (sessionId) => [...(history.get(sessionId) ?? [])],

    getErrorStats() {
      const counts: Partial<Record<GatewayErrorCode, number>> = {};
      let total = 0;
      for (const entries of history.values()) {
        for (const entry of entries) {
          counts[entry.errorCode] = (counts[entry.errorCode] ?? 0) + 1;
          total++;
        }
      }

      const values = [...states.values()];
      return {
        total_errors: total,
        error_counts: counts,
        active_sessions: states.size,
        reconnecting_sessions: values.filter((state) => state === 'reconnecting').length,
        failed_sessions: values.filter((state) => state === 'failed').length,
        timestamp: new Date(now()).toISOString(),
      };
    },
  };

  return manager;
}
