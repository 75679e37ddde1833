/**
 * Cart Management agent — cart operations over a `CartService`. Responses
 * carry the cart as it stands after the operation.
 */
import { createAgent, type Agent, type AgentRuntimeDeps } from '@/a2a/agent-runtime.js';
import type { RequestMessage } from '@/a2a/types.js';
import type { MeshError } from '@/core/errors.js';
import { ok, type Result } from '@/core/result.js';
import type { Cart, CartService } from './types.js';

export const CART_MANAGEMENT_ID = 'cart_management_001';
export const CART_MANAGEMENT_TYPE = 'cart_management';

interface CartManagementDeps {
  carts: CartService;
  runtime: AgentRuntimeDeps;
}

export function createCartManagementAgent(deps: CartManagementDeps): Agent {
  const { carts, runtime } = deps;
  const logger = runtime.logger;
  const log = { component: 'cart-management', agentId: CART_MANAGEMENT_ID };

  async function perform(request: RequestMessage): Promise<Result<Cart, MeshError> | null> {
    switch (request.requestType) {
      case 'create_cart':
        return ok(await carts.createCart(request.content.ownerId));
      case 'add_to_cart':
        return carts.addItem(request.content.cartId, request.content.productId, request.content.quantity);
      case 'update_cart_item':
        return carts.updateItem(request.content.cartId, request.content.productId, request.content.quantity);
      case 'remove_from_cart':
        return carts.removeItem(request.content.cartId, request.content.productId);
      case 'get_cart':
        return carts.getCart(request.content.cartId);
      case 'clear_cart':
        return carts.clearCart(request.content.cartId);
      default:
        return null;
    }
  }

  return createAgent(
    {
      id: CART_MANAGEMENT_ID,
      type: CART_MANAGEMENT_TYPE,
      name: 'Cart Management Agent',
      capabilities: ['create_cart', 'add_to_cart', 'update_cart_item', 'remove_from_cart', 'get_cart', 'clear_cart'],

      async handleRequest(request, agent) {
        const reply = { conversationId: request.conversationId };
        try {
          const result = await perform(request);

          if (result === null) {
            logger.warn('Unsupported request type', { ...log, requestType: request.requestType });
            await agent.sendResponse(
              request.sender,
              { requestId: request.id, success: false, error: `Unsupported request type: ${request.requestType}` },
              reply,
            );
            return false;
          }

          if (!result.ok) {
            logger.info('Cart operation rejected', {
              ...log,
              requestType: request.requestType,
              code: result.error.code,
            });
            await agent.sendResponse(
              request.sender,
              { requestId: request.id, success: false, error: result.error.message },
              reply,
            );
            return false;
          }

          logger.info('Cart updated', {
            ...log,
            requestType: request.requestType,
            cartId: result.value.id,
            items: result.value.items.length,
          });
          await agent.sendResponse(request.sender, { requestId: request.id, success: true, content: result.value }, reply);
          return true;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Cart request failed', { ...log, requestId: request.id, error: message });
          await agent.sendResponse(request.sender, { requestId: request.id, success: false, error: message }, reply);
          return false;
        }
      },
    },
    runtime,
  );
}
