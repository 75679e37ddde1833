import { z } from 'zod';
import type { Result } from '@/core/result.js';
import type { MeshError } from '@/core/errors.js';

// ─── Products ───────────────────────────────────────────────────

export const moneySchema = z.object({
  currencyCode: z.string().length(3),
  units: z.number().int().nonnegative(),
  /** Fractional part in billionths of a unit. */
  nanos: z.number().int().min(0).max(999_999_999),
});

export const productSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  picture: z.string(),
  priceUsd: moneySchema,
  categories: z.array(z.string()),
});

export type Money = z.infer<typeof moneySchema>;
export type Product = z.infer<typeof productSchema>;

export interface ProductCatalog {
  /** Best matches first. Falls back to the whole catalog when nothing matches. */
  search(query: string, limit?: number): Promise<Product[]>;
  getProduct(productId: string): Promise<Product | null>;
  listProducts(): Promise<Product[]>;
}

// ─── Carts ──────────────────────────────────────────────────────

export interface CartItem {
  productId: string;
  name: string;
  quantity: number;
  unitPrice: Money;
}

export interface Cart {
  id: string;
  ownerId: string;
  items: CartItem[];
  total: Money;
  updatedAt: Date;
}

export interface CartService {
  createCart(ownerId: string): Promise<Cart>;
  getCart(cartId: string): Promise<Result<Cart, MeshError>>;
  addItem(cartId: string, productId: string, quantity: number): Promise<Result<Cart, MeshError>>;
  /** A quantity of 0 removes the item. */
  updateItem(cartId: string, productId: string, quantity: number): Promise<Result<Cart, MeshError>>;
  removeItem(cartId: string, productId: string): Promise<Result<Cart, MeshError>>;
  clearCart(cartId: string): Promise<Result<Cart, MeshError>>;
}

// ─── Intents ────────────────────────────────────────────────────

export type IntentType = 'product_search' | 'cart_management' | 'price_comparison' | 'greeting' | 'conversation';

export interface IntentAnalysis {
  intentType: IntentType;
  needsProductSearch: boolean;
  /** Search terms, set when `needsProductSearch` is true. */
  searchQuery: string;
  confidence: number;
}

export interface IntentClassifier {
  classify(message: string): IntentAnalysis;
}
