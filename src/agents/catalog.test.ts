import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { createMemoryProductCatalog, loadProducts } from './catalog.js';
import type { Product } from './types.js';

function product(id: string, name: string, description: string, categories: string[]): Product {
  return {
    id,
    name,
    description,
    picture: `/img/${id}.jpg`,
    priceUsd: { currencyCode: 'USD', units: 10, nanos: 0 },
    categories,
  };
}

const RUNNER = product('runner', 'Trail Runner Shoes', 'Running shoes for dirt paths', ['footwear', 'running']);
const LOAFER = product('loafer', 'Canvas Loafers', 'Slip-on shoes for warm days', ['footwear']);
const BEANIE = product('beanie', 'Wool Beanie', 'Warm knitted hat', ['accessories']);

describe('createMemoryProductCatalog', () => {
  const catalog = createMemoryProductCatalog([RUNNER, LOAFER, BEANIE]);

  it('ranks products by the number of matching terms', async () => {
    expect((await catalog.search('running shoes')).map((p) => p.id)).toEqual(['runner', 'loafer']);
  });

  it('ignores filler words and matches plurals', async () => {
    expect((await catalog.search('show me some hats')).map((p) => p.id)).toEqual(['beanie']);
  });

  it('returns the whole catalog when nothing matches', async () => {
    expect(await catalog.search('telescope')).toHaveLength(3);
  });

  it('applies the limit after ranking', async () => {
    expect((await catalog.search('shoes', 1)).map((p) => p.id)).toEqual(['runner']);
  });

  it('looks products up by id', async () => {
    expect(await catalog.getProduct('beanie')).toEqual(BEANIE);
    expect(await catalog.getProduct('nope')).toBeNull();
  });
});

describe('loadProducts', () => {
  it('loads the bundled catalog', async () => {
    const result = await loadProducts();

    expect(result.ok).toBe(true);
    expect(result.ok && result.value.length).toBe(12);
  });

  it('fails for a missing file', async () => {
    const result = await loadProducts('/nonexistent/products.json');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('Product catalog could not be read');
  });

  it('fails for records that do not match the product shape', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'catalog-'));
    const path = join(dir, 'products.json');
    await writeFile(path, JSON.stringify([{ id: 'x', name: 'No price' }]));

    const result = await loadProducts(path);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('Product catalog is invalid');
  });
});
