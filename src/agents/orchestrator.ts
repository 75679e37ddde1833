/**
 * Orchestrator agent — the conversational front of the mesh.
 *
 * User messages arrive through `handleUserMessage`. Product searches, cart
 * additions and price comparisons are delegated to whichever worker agent
 * the Coordinator knows for the job; each pending request is keyed by its
 * id so the eventual response can be routed back to the session that asked.
 * Everything else gets a short canned reply.
 *
 * Cart and price requests act on the products of the session's last search
 * (`recent_products` in the session context), picked by ordinal or name.
 */
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { createAgent, type Agent, type AgentRuntimeDeps } from '@/a2a/agent-runtime.js';
import type { AgentRegistration, RequestSpec, ResponseMessage } from '@/a2a/types.js';
import { AgentUnavailableError } from '@/core/errors.js';
import { err, ok, type Result } from '@/core/result.js';
import type { ConnectionGateway } from '@/gateway/connection-gateway.js';
import type { AgentStep } from '@/gateway/types.js';
import type { ConversationMemory } from '@/sessions/conversation-memory.js';
import type { PersonalizationStore } from '@/sessions/personalization.js';
import type { SessionManager } from '@/sessions/session-manager.js';
import { CART_MANAGEMENT_TYPE } from './cart-management.js';
import { formatMoney, NANOS_PER_UNIT, toNanos } from './money.js';
import { PRICE_COMPARISON_TYPE } from './price-comparison.js';
import { PRODUCT_DISCOVERY_TYPE } from './product-discovery.js';
import { moneySchema, productSchema, type IntentAnalysis, type IntentClassifier, type Product } from './types.js';

export const ORCHESTRATOR_ID = 'orchestrator_001';
export const ORCHESTRATOR_TYPE = 'orchestrator';

/** Receiver used for notifications meant only for observers. */
const FRONTEND = 'frontend';

export const REPLIES = {
  error: "I'm sorry, I encountered an error processing your request. Please try again.",
  searchUnavailable: 'Product search service is currently unavailable. Please try again later.',
  searchUnreachable: 'Having trouble connecting to the product search service. Please try again.',
  searchTimedOut: 'The product search service did not respond. Please try again.',
  cartUnavailable: 'Cart service is currently unavailable. Please try again later.',
  cartUnreachable: 'Failed to communicate with cart service. Please try again.',
  cartTimedOut: 'The cart service did not respond. Please try again.',
  comparisonUnavailable: 'Price comparison service is currently unavailable. Please try again later.',
  comparisonUnreachable: 'Having trouble connecting to the price comparison service. Please try again.',
  comparisonTimedOut: 'The price comparison service did not respond. Please try again.',
  noProducts:
    "I couldn't find any products matching your search. Try different keywords or let me know what specific type of item you're looking for!",
  nothingToAdd:
    "I don't see any products to add to your cart. Please search for products first, then I can help you add them to your cart.",
  nothingToCompare:
    "I don't see any products to compare prices for. Please search for products first, then ask me to compare prices.",
  greeting: "Hi! I'm your shopping assistant. Tell me what you're looking for and I'll search the catalog.",
  conversation: 'I\'m here to help with your shopping needs! Try something like "show me running shoes".',
} as const;

export interface OrchestratorAgent extends Agent {
  /**
   * Handle one user message. Returns an immediate reply for the caller to
   * send, or an empty string when the answer will arrive asynchronously.
   */
  handleUserMessage(text: string, sessionId: string): Promise<string>;
  /** Forget in-flight requests of a session; late responses are then ignored. */
  clearSessionContext(sessionId: string): void;
  pendingRequestCount(): number;
}

interface ProductRef {
  id: string;
  name: string;
}

type PendingRequest =
  | { kind: 'search'; sessionId: string; query: string }
  | { kind: 'create_cart'; sessionId: string; product: ProductRef }
  | { kind: 'add_to_cart'; sessionId: string; product: ProductRef }
  | { kind: 'compare_prices'; sessionId: string; product: ProductRef };

interface Delegate {
  agentType: string;
  agentName: string;
  unavailable: string;
  unreachable: string;
  timedOut: string;
}

const DISCOVERY: Delegate = {
  agentType: PRODUCT_DISCOVERY_TYPE,
  agentName: 'Product Discovery Agent',
  unavailable: REPLIES.searchUnavailable,
  unreachable: REPLIES.searchUnreachable,
  timedOut: REPLIES.searchTimedOut,
};
const CART: Delegate = {
  agentType: CART_MANAGEMENT_TYPE,
  agentName: 'Cart Management Agent',
  unavailable: REPLIES.cartUnavailable,
  unreachable: REPLIES.cartUnreachable,
  timedOut: REPLIES.cartTimedOut,
};
const COMPARISON: Delegate = {
  agentType: PRICE_COMPARISON_TYPE,
  agentName: 'Price Comparison Agent',
  unavailable: REPLIES.comparisonUnavailable,
  unreachable: REPLIES.comparisonUnreachable,
  timedOut: REPLIES.comparisonTimedOut,
};

const DELEGATES: Record<PendingRequest['kind'], Delegate> = {
  search: DISCOVERY,
  create_cart: CART,
  add_to_cart: CART,
  compare_prices: COMPARISON,
};

interface OrchestratorDeps {
  gateway: ConnectionGateway;
  sessions: SessionManager;
  memory: ConversationMemory;
  personalization: PersonalizationStore;
  classifier: IntentClassifier;
  runtime: AgentRuntimeDeps;
}

const productListSchema = z.array(productSchema);
const cartSummarySchema = z.object({
  id: z.string().min(1),
  items: z.array(z.object({ quantity: z.number().int() })),
  total: moneySchema,
});
const comparisonSchema = z.object({ analysis: z.string(), similarProducts: z.array(productSchema) });
const recentSchema = z.array(z.string());

const ORDINALS: Record<string, number> = { first: 0, second: 1, third: 2, fourth: 3, fifth: 4 };

// ─── Helpers ────────────────────────────────────────────────────

function step(agentName: string, id: string, type: AgentStep['type'], message: string): AgentStep {
  return { id, type, agentName, message };
}

export function formatSearchSummary(products: readonly Product[]): string {
  if (products.length === 0) return REPLIES.noProducts;
  const noun = products.length === 1 ? 'product' : 'products';
  return `I found ${products.length} ${noun} for you! Browse through them below and let me know if you'd like more details about any specific item, or if you'd like to search for something else.`;
}

/** Products of the last search, as stored in the session context. */
export function recentProducts(context: Record<string, unknown>): ProductRef[] {
  const ids = recentSchema.safeParse(context['recent_products']);
  const names = recentSchema.safeParse(context['recent_product_names']);
  if (!ids.success) return [];
  return ids.data.map((id, index) => ({ id, name: (names.success ? names.data[index] : undefined) ?? id }));
}

/**
 * Pick the product a message refers to: an ordinal ("the second one",
 * "the last one"), then a word of a product name, then the first product.
 */
export function selectProduct(message: string, recent: readonly ProductRef[]): ProductRef | undefined {
  const text = message.toLowerCase();
  const words = new Set(text.split(/[^a-z0-9]+/));

  if (words.has('last')) return recent.at(-1);
  for (const [word, index] of Object.entries(ORDINALS)) {
    const candidate = recent[index];
    if (words.has(word) && candidate) return candidate;
  }

  const named = recent.find((product) =>
    product.name
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .some((word) => word.length >= 4 && words.has(word)),
  );
  return named ?? recent[0];
}

// ─── Factory Function ───────────────────────────────────────────

export function createOrchestratorAgent(deps: OrchestratorDeps): OrchestratorAgent {
  const { gateway, sessions, memory, personalization, classifier, runtime } = deps;
  const { coordinator, logger } = runtime;
  const log = { component: 'orchestrator', agentId: ORCHESTRATOR_ID };
  const pending = new Map<string, PendingRequest>();

  function findAgent(agentType: string): Result<AgentRegistration, AgentUnavailableError> {
    const registration = coordinator.findByType(agentType);
    return registration ? ok(registration) : err(new AgentUnavailableError(agentType));
  }

  async function say(
    sessionId: string,
    message: string,
    messageType: string,
    extra?: Record<string, unknown>,
  ): Promise<void> {
    await gateway.sendText(sessionId, extra ? { message, ...extra } : message);
    await memory.record(sessionId, { sender: 'assistant', messageType, content: message });
  }

  // ─── Delegation ─────────────────────────────────────────────

  async function send(receiver: string, request: PendingRequest, spec: RequestSpec): Promise<void> {
    const { sessionId } = request;
    const delegate = DELEGATES[request.kind];
    const requestId = nanoid();
    pending.set(requestId, request);

    const sent = await agent.sendRequest(receiver, spec, {
      conversationId: sessionId,
      requestId,
      metadata: { sessionId },
    });
    if (!sent) {
      pending.delete(requestId);
      await gateway.updateAgentCommunication(sessionId, [step(delegate.agentName, 'calling', 'error', 'Unreachable')]);
      await gateway.sendText(sessionId, delegate.unreachable);
    }
  }

  async function delegate(request: PendingRequest, spec: RequestSpec, announcement: string, detail: string): Promise<string> {
    const { sessionId } = request;
    const { agentType, agentName, unavailable } = DELEGATES[request.kind];

    await gateway.sendText(sessionId, announcement);
    await agent.notifyFrontend(FRONTEND, 'agent_delegation', `Calling ${agentName} with ${detail}`, sessionId);

    const target = findAgent(agentType);
    if (!target.ok) {
      logger.warn('No agent registered for delegation', { ...log, sessionId, agentType, code: target.error.code });
      await gateway.sendText(sessionId, unavailable);
      return '';
    }

    await gateway.sendAgentCommunication(sessionId, [step(agentName, 'calling', 'calling', 'Connecting...')]);
    await send(target.value.agentId, request, spec);
    return '';
  }

  async function searchProducts(text: string, sessionId: string, intent: IntentAnalysis): Promise<string> {
    const query = intent.searchQuery.trim() || text;
    return delegate(
      { kind: 'search', sessionId, query },
      { requestType: 'search_products', content: { query } },
      `I'll help you find products! Let me search our catalog for: '${query}'`,
      `query: '${query}'`,
    );
  }

  async function addToCart(text: string, sessionId: string): Promise<string> {
    const context = (await sessions.getSession(sessionId))?.context ?? {};
    const product = selectProduct(text, recentProducts(context));
    if (!product) return REPLIES.nothingToAdd;

    const announcement = `I'll add '${product.name}' to your cart! Let me process your request.`;
    const detail = `product: '${product.id}'`;
    const cartId = context['cart_id'];
    if (typeof cartId === 'string') {
      return delegate(
        { kind: 'add_to_cart', sessionId, product },
        { requestType: 'add_to_cart', content: { cartId, productId: product.id, quantity: 1 } },
        announcement,
        detail,
      );
    }
    return delegate(
      { kind: 'create_cart', sessionId, product },
      { requestType: 'create_cart', content: { ownerId: sessionId } },
      announcement,
      detail,
    );
  }

  async function comparePrices(text: string, sessionId: string): Promise<string> {
    const context = (await sessions.getSession(sessionId))?.context ?? {};
    const product = selectProduct(text, recentProducts(context));
    if (!product) return REPLIES.nothingToCompare;

    return delegate(
      { kind: 'compare_prices', sessionId, product },
      { requestType: 'compare_prices', content: { productId: product.id } },
      `I'll help you compare prices for '${product.name}'! Let me look for comparable products.`,
      `product: '${product.id}'`,
    );
  }

  async function route(text: string, sessionId: string, intent: IntentAnalysis): Promise<string> {
    switch (intent.intentType) {
      case 'product_search':
        return intent.needsProductSearch ? searchProducts(text, sessionId, intent) : REPLIES.conversation;
      case 'cart_management':
        return addToCart(text, sessionId);
      case 'price_comparison':
        return comparePrices(text, sessionId);
      case 'greeting':
        return REPLIES.greeting;
      case 'conversation':
        return REPLIES.conversation;
    }
  }

  // ─── Results ────────────────────────────────────────────────

  async function withinBudget(sessionId: string, products: Product[]): Promise<Product[]> {
    const budget = (await personalization.get(sessionId))?.budgetRange;
    if (!budget) return products;

    const within = products.filter((product) => {
      const price = toNanos(product.priceUsd);
      return price >= budget.min * NANOS_PER_UNIT && price <= budget.max * NANOS_PER_UNIT;
    });
    logger.debug('Applied budget to search results', { ...log, sessionId, found: products.length, within: within.length });
    return within.length > 0 ? within : products;
  }

  async function deliverSearchResults(request: Extract<PendingRequest, { kind: 'search' }>, response: ResponseMessage): Promise<void> {
    const { sessionId } = request;
    const parsed = productListSchema.safeParse(response.content);
    if (!parsed.success) {
      logger.warn('Discarding malformed search results', { ...log, sessionId, requestId: response.requestId });
    }
    const products = await withinBudget(sessionId, parsed.success ? parsed.data : []);

    await say(sessionId, formatSearchSummary(products), 'product_search', { products });
    await sessions.updateContext(sessionId, {
      last_search: request.query,
      recent_products: products.map((product) => product.id),
      recent_product_names: products.map((product) => product.name),
    });
  }

  /** A new cart was made for the session; add the product to it. */
  async function continueWithCart(
    request: Extract<PendingRequest, { kind: 'create_cart' }>,
    response: ResponseMessage,
  ): Promise<boolean> {
    const { sessionId, product } = request;
    const cart = cartSummarySchema.safeParse(response.content);
    if (!cart.success) {
      logger.warn('Discarding malformed cart', { ...log, sessionId, requestId: response.requestId });
      await gateway.sendText(sessionId, REPLIES.error);
      return true;
    }

    await sessions.updateContext(sessionId, { cart_id: cart.data.id });
    await send(
      response.sender,
      { kind: 'add_to_cart', sessionId, product },
      { requestType: 'add_to_cart', content: { cartId: cart.data.id, productId: product.id, quantity: 1 } },
    );
    return false;
  }

  async function deliverCart(request: Extract<PendingRequest, { kind: 'add_to_cart' }>, response: ResponseMessage): Promise<void> {
    const { sessionId, product } = request;
    const cart = cartSummarySchema.safeParse(response.content);
    if (!cart.success) {
      logger.warn('Discarding malformed cart', { ...log, sessionId, requestId: response.requestId });
      await gateway.sendText(sessionId, REPLIES.error);
      return;
    }

    const count = cart.data.items.reduce((sum, item) => sum + item.quantity, 0);
    const noun = count === 1 ? 'item' : 'items';
    await say(
      sessionId,
      `Added ${product.name} to your cart. Your cart now has ${count} ${noun} totalling ${formatMoney(cart.data.total)}.`,
      'cart_update',
      { cart: response.content },
    );
  }

  async function deliverComparison(
    request: Extract<PendingRequest, { kind: 'compare_prices' }>,
    response: ResponseMessage,
  ): Promise<void> {
    const { sessionId } = request;
    const comparison = comparisonSchema.safeParse(response.content);
    if (!comparison.success) {
      logger.warn('Discarding malformed price comparison', { ...log, sessionId, requestId: response.requestId });
      await gateway.sendText(sessionId, REPLIES.error);
      return;
    }
    await say(sessionId, comparison.data.analysis, 'price_comparison', { products: comparison.data.similarProducts });
  }

  /** Returns `true` when the request is finished, `false` when a follow-up was sent. */
  async function deliver(request: PendingRequest, response: ResponseMessage): Promise<boolean> {
    switch (request.kind) {
      case 'search':
        await deliverSearchResults(request, response);
        return true;
      case 'create_cart':
        return continueWithCart(request, response);
      case 'add_to_cart':
        await deliverCart(request, response);
        return true;
      case 'compare_prices':
        await deliverComparison(request, response);
        return true;
    }
  }

  async function handleResult(request: PendingRequest, response: ResponseMessage): Promise<void> {
    const { sessionId } = request;
    const { agentName } = DELEGATES[request.kind];

    if (!response.success) {
      await gateway.updateAgentCommunication(sessionId, [
        step(agentName, 'calling', 'success', 'Connected'),
        step(agentName, 'processing', 'error', 'Failed'),
      ]);
      await gateway.sendText(
        sessionId,
        `${agentName} encountered an error: ${response.error ?? 'unknown error'}. Please try again.`,
      );
      return;
    }

    await gateway.updateAgentCommunication(sessionId, [
      step(agentName, 'calling', 'success', 'Connected'),
      step(agentName, 'processing', 'processing', 'Processing results...'),
    ]);
    if (!(await deliver(request, response))) return;
    await gateway.updateAgentCommunication(sessionId, [
      step(agentName, 'calling', 'success', 'Connected'),
      step(agentName, 'processing', 'success', 'Completed'),
    ]);
  }

  const agent = createAgent(
    {
      id: ORCHESTRATOR_ID,
      type: ORCHESTRATOR_TYPE,
      name: 'Orchestrator',
      capabilities: ['conversation', 'intent_analysis', 'agent_coordination', 'response_synthesis'],

      async handleResponse(response) {
        const request = pending.get(response.requestId);
        if (!request) {
          logger.warn('Response for unknown request', { ...log, requestId: response.requestId });
          return false;
        }
        pending.delete(response.requestId);

        logger.info('Delegated request answered', {
          ...log,
          requestId: response.requestId,
          sessionId: request.sessionId,
          kind: request.kind,
          success: response.success,
        });
        await handleResult(request, response);
        return true;
      },

      handleNotification(notification) {
        logger.debug('Notification received', {
          ...log,
          kind: notification.kind,
          sender: notification.sender,
        });
        return Promise.resolve(true);
      },

      async onDeliveryFailure(message, error) {
        const request = pending.get(message.id);
        if (!request) return;
        pending.delete(message.id);

        const { agentName, timedOut } = DELEGATES[request.kind];
        logger.warn('Delegated request undelivered', { ...log, sessionId: request.sessionId, code: error.code });
        await gateway.updateAgentCommunication(request.sessionId, [step(agentName, 'calling', 'error', 'No answer')]);
        await gateway.sendText(request.sessionId, timedOut);
      },
    },
    runtime,
  );

  return {
    ...agent,

    async handleUserMessage(text, sessionId) {
      logger.info('Handling user message', { ...log, sessionId, length: text.length });
      await gateway.sendTypingIndicator(sessionId, true);

      try {
        await memory.record(sessionId, { sender: 'user', messageType: 'text', content: text });
        const intent = classifier.classify(text);
        await agent.notifyFrontend(FRONTEND, 'agent_thinking', 'Analyzing your request...', sessionId);
        logger.debug('Intent classified', { ...log, sessionId, intent: intent.intentType });

        const reply = await route(text, sessionId, intent);
        if (reply) await memory.record(sessionId, { sender: 'assistant', messageType: 'text', content: reply });
        return reply;
      } catch (error) {
        logger.error('Failed to handle user message', {
          ...log,
          sessionId,
          error: error instanceof Error ? error.message : String(error),
        });
        return REPLIES.error;
      } finally {
        await gateway.sendTypingIndicator(sessionId, false);
      }
    },

    clearSessionContext(sessionId) {
      let dropped = 0;
      for (const [requestId, request] of [...pending]) {
        if (request.sessionId === sessionId) {
          pending.delete(requestId);
          dropped++;
        }
      }
      logger.debug('Session context cleared', { ...log, sessionId, dropped });
    },

    pendingRequestCount: () => pending.size,
  };
}
