/**
 * In-memory cart service. Prices are copied from the catalog when an item
 * is added, so later catalog changes do not reprice existing carts.
 */
import { nanoid } from 'nanoid';
import { MeshError } from '@/core/errors.js';
import { err, ok, type Result } from '@/core/result.js';
import { fromNanos, toNanos } from './money.js';
import type { Cart, CartItem, CartService, Money, ProductCatalog } from './types.js';

export class CartNotFoundError extends MeshError {
  constructor(cartId: string) {
    super({ message: `Cart "${cartId}" not found`, code: 'CART_NOT_FOUND', statusCode: 404, context: { cartId } });
    this.name = 'CartNotFoundError';
  }
}

export class ProductNotFoundError extends MeshError {
  constructor(productId: string) {
    super({
      message: `Product "${productId}" not found`,
      code: 'PRODUCT_NOT_FOUND',
      statusCode: 404,
      context: { productId },
    });
    this.name = 'ProductNotFoundError';
  }
}

/** Sum of `unitPrice × quantity` over the items, in USD. */
export function cartTotal(items: readonly CartItem[]): Money {
  return fromNanos(items.reduce((sum, item) => sum + toNanos(item.unitPrice) * item.quantity, 0));
}

interface StoredCart {
  id: string;
  ownerId: string;
  items: CartItem[];
  updatedAt: Date;
}

function toCart(cart: StoredCart): Cart {
  const items = cart.items.map((item) => ({ ...item, unitPrice: { ...item.unitPrice } }));
  return { id: cart.id, ownerId: cart.ownerId, items, total: cartTotal(items), updatedAt: cart.updatedAt };
}

interface CartServiceDeps {
  catalog: ProductCatalog;
  now?: () => Date;
}

// ─── Factory Function ───────────────────────────────────────────

export function createMemoryCartService(deps: CartServiceDeps): CartService {
  const { catalog } = deps;
  const now = deps.now ?? (() => new Date());
  const carts = new Map<string, StoredCart>();

  function snapshot(cartId: string): Result<Cart, MeshError> {
    const cart = carts.get(cartId);
    return cart ? ok(toCart(cart)) : err(new CartNotFoundError(cartId));
  }

  function mutate(cartId: string, change: (items: CartItem[]) => CartItem[]): Result<Cart, MeshError> {
    const cart = carts.get(cartId);
    if (!cart) return err(new CartNotFoundError(cartId));
    cart.items = change(cart.items);
    cart.updatedAt = now();
    return snapshot(cartId);
  }

  return {
    createCart(ownerId) {
      const cart: StoredCart = { id: nanoid(), ownerId, items: [], updatedAt: now() };
      carts.set(cart.id, cart);
      return Promise.resolve(toCart(cart));
    },

    getCart(cartId) {
      return Promise.resolve(snapshot(cartId));
    },

    async addItem(cartId, productId, quantity) {
      if (!carts.has(cartId)) return err(new CartNotFoundError(cartId));
      const product = await catalog.getProduct(productId);
      if (!product) return err(new ProductNotFoundError(productId));

      return mutate(cartId, (items) => {
        const existing = items.find((item) => item.productId === productId);
        if (existing) {
          return items.map((item) =>
            item.productId === productId ? { ...item, quantity: item.quantity + quantity } : item,
          );
        }
        return [...items, { productId, name: product.name, quantity, unitPrice: { ...product.priceUsd } }];
      });
    },

    updateItem(cartId, productId, quantity) {
      const cart = carts.get(cartId);
      if (cart && !cart.items.some((item) => item.productId === productId)) {
        return Promise.resolve(err(new ProductNotFoundError(productId)));
      }
      return Promise.resolve(
        mutate(cartId, (items) =>
          quantity === 0
            ? items.filter((item) => item.productId !== productId)
            : items.map((item) => (item.productId === productId ? { ...item, quantity } : item)),
        ),
      );
    },

    removeItem(cartId, productId) {
      return Promise.resolve(mutate(cartId, (items) => items.filter((item) => item.productId !== productId)));
    },

    clearCart(cartId) {
      return Promise.resolve(mutate(cartId, () => []));
    },
  };
}
