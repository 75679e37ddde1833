/**
 * Product Discovery agent — answers product searches and detail lookups
 * from the catalog. Every request gets a response; failures carry `error`.
 * Progress is reported to the requester as frontend notifications.
 */
import { createAgent, type Agent, type AgentRuntimeDeps } from '@/a2a/agent-runtime.js';
import type { RequestMessage } from '@/a2a/types.js';
import type { ProductCatalog } from './types.js';

export const PRODUCT_DISCOVERY_ID = 'product_discovery_001';
export const PRODUCT_DISCOVERY_TYPE = 'product_discovery';

/** Results per search when the request sets no limit. */
const DEFAULT_SEARCH_LIMIT = 12;

interface ProductDiscoveryDeps {
  catalog: ProductCatalog;
  runtime: AgentRuntimeDeps;
}

export function createProductDiscoveryAgent(deps: ProductDiscoveryDeps): Agent {
  const { catalog, runtime } = deps;
  const logger = runtime.logger;
  const log = { component: 'product-discovery', agentId: PRODUCT_DISCOVERY_ID };

  async function respond(
    agent: Agent,
    request: RequestMessage,
    outcome: { success: true; content: unknown } | { success: false; error: string },
  ): Promise<boolean> {
    const spec = outcome.success
      ? { requestId: request.id, success: true as const, content: outcome.content }
      : { requestId: request.id, success: false as const, error: outcome.error, content: [] };
    return agent.sendResponse(request.sender, spec, { conversationId: request.conversationId });
  }

  async function search(
    request: Extract<RequestMessage, { requestType: 'search_products' }>,
    agent: Agent,
  ): Promise<boolean> {
    const { query, limit } = request.content;
    logger.info('Searching products', { ...log, query, requestId: request.id });

    await agent.notifyFrontend(
      request.sender,
      'agent_thinking',
      `Searching for products matching '${query}'`,
      request.conversationId,
    );

    const products = await catalog.search(query, limit ?? DEFAULT_SEARCH_LIMIT);

    await agent.notifyFrontend(
      request.sender,
      'agent_action',
      `Found ${products.length} products for '${query}'`,
      request.conversationId,
    );
    await respond(agent, request, { success: true, content: products });
    return true;
  }

  async function details(
    request: Extract<RequestMessage, { requestType: 'get_product_details' }>,
    agent: Agent,
  ): Promise<boolean> {
    const product = await catalog.getProduct(request.content.productId);
    if (!product) {
      await respond(agent, request, { success: false, error: `Product "${request.content.productId}" not found` });
      return false;
    }
    await respond(agent, request, { success: true, content: product });
    return true;
  }

  return createAgent(
    {
      id: PRODUCT_DISCOVERY_ID,
      type: PRODUCT_DISCOVERY_TYPE,
      name: 'Product Discovery Agent',
      capabilities: ['search_products', 'get_product_details'],

      async handleRequest(request, agent) {
        try {
          switch (request.requestType) {
            case 'search_products':
              return await search(request, agent);
            case 'get_product_details':
              return await details(request, agent);
            default:
              logger.warn('Unsupported request type', { ...log, requestType: request.requestType });
              await respond(agent, request, {
                success: false,
                error: `Unsupported request type: ${request.requestType}`,
              });
              return false;
          }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Product request failed', { ...log, requestId: request.id, error: message });
          await agent.notifyFrontend(
            request.sender,
            'agent_error',
            `Error searching for products: ${message}`,
            request.conversationId,
          );
          await respond(agent, request, { success: false, error: message });
          return false;
        }
      },
    },
    runtime,
  );
}
