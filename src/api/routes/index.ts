/**
 * Route registration. The WebSocket plugin must already be registered on
 * the instance.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { agentRoutes } from './agents.js';
import { healthRoutes } from './health.js';
import { personalizationRoutes } from './personalization.js';
import { wsChatRoutes } from './ws-chat.js';

export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  healthRoutes(fastify, deps);
  agentRoutes(fastify, deps);
  personalizationRoutes(fastify, deps);
  wsChatRoutes(fastify, deps);
}
