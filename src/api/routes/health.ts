/**
 * Health route — reports whether the key-value store answers a round trip.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';

const CHECK_KEY = 'health_check';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  storage: 'connected' | 'disconnected' | 'error';
  error?: string;
  timestamp: string;
}

export function healthRoutes(fastify: FastifyInstance, deps: Pick<RouteDependencies, 'store' | 'logger'>): void {
  const { store, logger } = deps;

  fastify.get('/health', async (): Promise<HealthReport> => {
    const timestamp = new Date().toISOString();
    try {
      await store.set(CHECK_KEY, 'ok', 10);
      const value = await store.get(CHECK_KEY);
      return value === 'ok'
        ? { status: 'healthy', storage: 'connected', timestamp }
        : { status: 'degraded', storage: 'disconnected', timestamp };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Health check failed', { component: 'health', error: message });
      return { status: 'degraded', storage: 'error', error: message, timestamp };
    }
  });
}
