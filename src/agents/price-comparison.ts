/**
 * Price Comparison agent — places a product against the catalog items that
 * share a category with it, cheapest first.
 */
import { createAgent, type Agent, type AgentRuntimeDeps } from '@/a2a/agent-runtime.js';
import type { RequestMessage } from '@/a2a/types.js';
import { formatMoney, toNanos } from './money.js';
import type { Product, ProductCatalog } from './types.js';

export const PRICE_COMPARISON_ID = 'price_comparison_001';
export const PRICE_COMPARISON_TYPE = 'price_comparison';

const DEFAULT_COMPARISON_LIMIT = 5;

export interface PriceComparison {
  product: Product;
  currentPrice: string;
  /** Products sharing a category, cheapest first. */
  similarProducts: Product[];
  /** How many of `similarProducts` cost less than `product`. */
  cheaperCount: number;
  analysis: string;
}

interface PriceComparisonDeps {
  catalog: ProductCatalog;
  runtime: AgentRuntimeDeps;
}

export function comparePrices(product: Product, candidates: readonly Product[], limit = DEFAULT_COMPARISON_LIMIT): PriceComparison {
  const categories = new Set(product.categories);
  const similarProducts = candidates
    .filter((candidate) => candidate.id !== product.id)
    .filter((candidate) => candidate.categories.some((category) => categories.has(category)))
    .sort((a, b) => toNanos(a.priceUsd) - toNanos(b.priceUsd))
    .slice(0, limit);

  const price = toNanos(product.priceUsd);
  const cheaper = similarProducts.filter((candidate) => toNanos(candidate.priceUsd) < price);
  const currentPrice = formatMoney(product.priceUsd);

  let analysis: string;
  if (similarProducts.length === 0) {
    analysis = `No comparable products found for ${product.name}; it is listed at ${currentPrice}.`;
  } else if (cheaper[0] === undefined) {
    analysis = `${product.name} at ${currentPrice} is the lowest-priced of ${similarProducts.length + 1} comparable products.`;
  } else {
    analysis =
      `${cheaper.length} of ${similarProducts.length} comparable products cost less than ${product.name} (${currentPrice}). ` +
      `The cheapest is ${cheaper[0].name} at ${formatMoney(cheaper[0].priceUsd)}.`;
  }

  return { product, currentPrice, similarProducts, cheaperCount: cheaper.length, analysis };
}

// ─── Factory Function ───────────────────────────────────────────

export function createPriceComparisonAgent(deps: PriceComparisonDeps): Agent {
  const { catalog, runtime } = deps;
  const logger = runtime.logger;
  const log = { component: 'price-comparison', agentId: PRICE_COMPARISON_ID };

  async function compare(
    request: Extract<RequestMessage, { requestType: 'compare_prices' }>,
    agent: Agent,
  ): Promise<boolean> {
    const reply = { conversationId: request.conversationId };
    const { productId, limit } = request.content;

    const product = await catalog.getProduct(productId);
    if (!product) {
      await agent.sendResponse(
        request.sender,
        { requestId: request.id, success: false, error: `Product "${productId}" not found` },
        reply,
      );
      return false;
    }

    await agent.notifyFrontend(
      request.sender,
      'agent_thinking',
      `Comparing prices for '${product.name}'`,
      request.conversationId,
    );
    const comparison = comparePrices(product, await catalog.listProducts(), limit);
    logger.info('Prices compared', {
      ...log,
      productId,
      similar: comparison.similarProducts.length,
      cheaper: comparison.cheaperCount,
    });
    await agent.notifyFrontend(
      request.sender,
      'agent_action',
      `Compared ${product.name} with ${comparison.similarProducts.length} products`,
      request.conversationId,
    );

    await agent.sendResponse(request.sender, { requestId: request.id, success: true, content: comparison }, reply);
    return true;
  }

  return createAgent(
    {
      id: PRICE_COMPARISON_ID,
      type: PRICE_COMPARISON_TYPE,
      name: 'Price Comparison Agent',
      capabilities: ['compare_prices'],

      async handleRequest(request, agent) {
        try {
          if (request.requestType === 'compare_prices') return await compare(request, agent);

          logger.warn('Unsupported request type', { ...log, requestType: request.requestType });
          await agent.sendResponse(
            request.sender,
            { requestId: request.id, success: false, error: `Unsupported request type: ${request.requestType}` },
            { conversationId: request.conversationId },
          );
          return false;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Price comparison failed', { ...log, requestId: request.id, error: message });
          await agent.notifyFrontend(
            request.sender,
            'agent_error',
            `Error comparing prices: ${message}`,
            request.conversationId,
          );
          await agent.sendResponse(
            request.sender,
            { requestId: request.id, success: false, error: message },
            { conversationId: request.conversationId },
          );
          return false;
        }
      },
    },
    runtime,
  );
}
