import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import websocketPlugin from '@fastify/websocket';
import { createCoordinator } from '@/a2a/coordinator.js';
import { createMessageBus } from '@/a2a/message-bus.js';
import type { AgentRuntimeDeps } from '@/a2a/agent-runtime.js';
import { createAgentManager } from '@/agents/agent-manager.js';
import { createCartManagementAgent } from '@/agents/cart-management.js';
import { createMemoryCartService } from '@/agents/cart-service.js';
import { createMemoryProductCatalog, loadProducts } from '@/agents/catalog.js';
import { createKeywordIntentClassifier } from '@/agents/intent.js';
import { createOrchestratorAgent } from '@/agents/orchestrator.js';
import { createPriceComparisonAgent } from '@/agents/price-comparison.js';
import { createProductDiscoveryAgent } from '@/agents/product-discovery.js';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import type { RouteDependencies } from '@/api/types.js';
import { resolveMeshConfig } from '@/config/loader.js';
import { createConnectionGateway } from '@/gateway/connection-gateway.js';
import { createRecoveryManager } from '@/gateway/recovery.js';
import { createLogger } from '@/observability/logger.js';
import { createConversationMemory } from '@/sessions/conversation-memory.js';
import { createPersonalizationStore } from '@/sessions/personalization.js';
import { createSessionManager } from '@/sessions/session-manager.js';
import { connectRedisStore } from '@/storage/redis-store.js';
import { createMemoryStore } from '@/storage/memory-store.js';
import type { KeyValueStore } from '@/storage/types.js';

async function start(): Promise<void> {
  const configResult = await resolveMeshConfig();
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration', {
      component: 'main',
      error: configResult.error.message,
      context: configResult.error.context,
    });
    process.exit(1);
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logging.level });

  try {
    // Storage
    const store: KeyValueStore =
      config.storage.driver === 'redis' && config.storage.redisUrl !== undefined
        ? connectRedisStore(config.storage.redisUrl, logger)
        : createMemoryStore({ logger });
    logger.info('Key-value store ready', { component: 'main', driver: config.storage.driver });

    // Agent substrate
    const coordinator = createCoordinator({ store, logger });
    const bus = createMessageBus({ store, logger, channelCapacity: config.delivery.channelCapacity });
    const runtime: AgentRuntimeDeps = {
      coordinator,
      bus,
      store,
      logger,
      maxRetries: config.delivery.maxRetries,
      retryBaseDelayMs: config.delivery.retryBaseDelayMs,
      ackTimeoutMs: config.delivery.ackTimeoutMs,
    };

    // Sessions and client gateway
    const sessions = createSessionManager({ store, logger, ttlSeconds: config.sessions.ttlSeconds });
    const memory = createConversationMemory({ store, logger, ttlSeconds: config.sessions.ttlSeconds });
    const personalization = createPersonalizationStore({ store, logger, ttlSeconds: config.sessions.ttlSeconds });
    const gateway = createConnectionGateway({ sessions, bus, logger });
    const recovery = createRecoveryManager({
      gateway,
      sessions,
      logger,
      limits: config.gateway,
      reconnection: config.reconnection,
    });

    // Commerce services
    const products = await loadProducts(process.env['CARTMESH_CATALOG'] || undefined);
    if (!products.ok) throw products.error;
    const catalog = createMemoryProductCatalog(products.value);
    const carts = createMemoryCartService({ catalog });

    // Agents
    const orchestrator = createOrchestratorAgent({
      gateway,
      sessions,
      memory,
      personalization,
      classifier: createKeywordIntentClassifier(),
      runtime,
    });
    const agentManager = createAgentManager({
      agents: [
        orchestrator,
        createProductDiscoveryAgent({ catalog, runtime }),
        createCartManagementAgent({ carts, runtime }),
        createPriceComparisonAgent({ catalog, runtime }),
      ],
      logger,
    });
    await agentManager.startAll();

    // HTTP + WebSocket server
    const server = Fastify({ logger: false });
    await server.register(cors, { origin: true });
    await server.register(websocketPlugin);
    registerErrorHandler(server);

    const deps: RouteDependencies = {
      store,
      sessions,
      memory,
      personalization,
      gateway,
      recovery,
      agentManager,
      orchestrator,
      logger,
    };
    registerRoutes(server, deps);

    // Graceful shutdown, in reverse order of startup
    let stopping = false;
    const shutdown = async (): Promise<void> => {
      if (stopping) return;
      stopping = true;
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      await agentManager.stopAll();
      await store.close();
      logger.info('Shutdown complete', { component: 'main' });
    };

    const onSignal = (): void => {
      shutdown().catch((error: unknown) => {
        logger.error('Shutdown failed', {
          component: 'main',
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
      });
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    const { host, port } = config.server;
    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
