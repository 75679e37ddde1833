import { beforeEach, describe, expect, it } from 'vitest';
import {
  createPersonalizationStore,
  personalizationInputSchema,
  type PersonalizationStore,
} from './personalization.js';
import { createMemoryStore } from '@/storage/memory-store.js';
import type { KeyValueStore } from '@/storage/types.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

describe('createPersonalizationStore', () => {
  let store: KeyValueStore;
  let personalization: PersonalizationStore;

  beforeEach(() => {
    const logger = createMockLogger();
    store = createMemoryStore({ logger });
    personalization = createPersonalizationStore({ store, logger });
  });

  it('returns null when nothing was saved', async () => {
    expect(await personalization.get('sess-1')).toBeNull();
  });

  it('saves and loads preferences', async () => {
    await personalization.save('sess-1', { stylePreferences: 'minimal', budgetRange: { min: 20, max: 80 } });

    const loaded = await personalization.get('sess-1');
    expect(loaded).toMatchObject({
      sessionId: 'sess-1',
      stylePreferences: 'minimal',
      budgetRange: { min: 20, max: 80 },
    });
    expect(loaded?.updatedAt).toBeInstanceOf(Date);
    expect(await store.exists('personalization:sess-1')).toBe(true);
  });

  it('replaces earlier preferences', async () => {
    await personalization.save('sess-1', { stylePreferences: 'minimal' });
    await personalization.save('sess-1', { budgetRange: { min: 0, max: 50 } });

    const loaded = await personalization.get('sess-1');
    expect(loaded?.stylePreferences).toBeUndefined();
    expect(loaded?.budgetRange).toEqual({ min: 0, max: 50 });
  });

  it('clears preferences', async () => {
    await personalization.save('sess-1', { stylePreferences: 'minimal' });

    expect(await personalization.clear('sess-1')).toBe(true);
    expect(await personalization.get('sess-1')).toBeNull();
  });
});

describe('personalizationInputSchema', () => {
  it('rejects an inverted budget range', () => {
    expect(personalizationInputSchema.safeParse({ budgetRange: { min: 90, max: 10 } }).success).toBe(false);
  });

  it('accepts an empty input', () => {
    expect(personalizationInputSchema.parse({})).toEqual({});
  });
});
