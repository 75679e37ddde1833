/**
 * In-memory product catalog.
 *
 * Keyword search over name, description and categories. A query that
 * matches nothing returns the whole catalog, so the shopper always has
 * something to browse.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import { err, ok, type Result } from '@/core/result.js';
import { productSchema, type Product, type ProductCatalog } from './types.js';

/** Default location of the bundled catalog, relative to this module. */
export const DEFAULT_CATALOG_URL = new URL('../../data/products.json', import.meta.url);

const STOP_WORDS = new Set([
  'and', 'any', 'are', 'buy', 'can', 'for', 'get', 'have', 'looking', 'need', 'please',
  'search', 'show', 'some', 'something', 'the', 'want', 'what', 'with', 'you', 'find',
]);

function tokenize(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= 3 && !STOP_WORDS.has(token));
}

function haystack(product: Product): string {
  return [product.name, product.description, ...product.categories].join(' ').toLowerCase();
}

function matches(text: string, token: string): boolean {
  return text.includes(token) || (token.endsWith('s') && text.includes(token.slice(0, -1)));
}

// ─── Factory Function ───────────────────────────────────────────

export function createMemoryProductCatalog(products: readonly Product[]): ProductCatalog {
  const byId = new Map(products.map((product) => [product.id, product]));
  const indexed = products.map((product) => ({ product, text: haystack(product) }));

  return {
    search(query, limit) {
      const tokens = tokenize(query);
      const scored = indexed
        .map(({ product, text }) => ({
          product,
          score: tokens.filter((token) => matches(text, token)).length,
        }))
        .filter(({ score }) => score > 0)
        .sort((a, b) => b.score - a.score)
        .map(({ product }) => product);

      const results = scored.length > 0 ? scored : [...products];
      return Promise.resolve(limit === undefined ? results : results.slice(0, limit));
    },

    getProduct(productId) {
      return Promise.resolve(byId.get(productId) ?? null);
    },

    listProducts() {
      return Promise.resolve([...products]);
    },
  };
}

// ─── Loading ────────────────────────────────────────────────────

/** Read and validate a JSON array of products. */
export async function loadProducts(
  source: string | URL = DEFAULT_CATALOG_URL,
): Promise<Result<Product[], ValidationError>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(source, 'utf-8'));
  } catch (error) {
    return err(
      new ValidationError('Product catalog could not be read', {
        source: String(source),
        error: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const result = z.array(productSchema).safeParse(parsed);
  if (!result.success) {
    return err(
      new ValidationError('Product catalog is invalid', {
        source: String(source),
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }
  return ok(result.data);
}
