import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createPersonalizationStore, type PersonalizationStore } from '@/sessions/personalization.js';
import { createMemoryStore } from '@/storage/memory-store.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { registerErrorHandler } from '../error-handler.js';
import { personalizationRoutes } from './personalization.js';

interface Body<T> {
  success: boolean;
  data: T;
  error?: { code: string; message: string; details?: Record<string, unknown> };
}

describe('personalizationRoutes', () => {
  let app: FastifyInstance;
  let personalization: PersonalizationStore;

  beforeAll(async () => {
    const logger = createMockLogger();
    personalization = createPersonalizationStore({ store: createMemoryStore({ logger }), logger });

    app = Fastify();
    registerErrorHandler(app);
    personalizationRoutes(app, { personalization, logger });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('returns 404 for a session without preferences', async () => {
    const response = await app.inject({ method: 'GET', url: '/personalization/sess-none' });

    expect(response.statusCode).toBe(404);
    expect(response.json<Body<null>>().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Personalization "sess-none" not found',
    });
  });

  it('saves preferences and reads them back', async () => {
    const saved = await app.inject({
      method: 'PUT',
      url: '/personalization/sess-1',
      payload: { style_preferences: 'minimal, earth tones', budget_range: { min: 20, max: 60 } },
    });

    expect(saved.statusCode).toBe(200);
    expect(saved.json<Body<unknown>>().data).toEqual({
      session_id: 'sess-1',
      style_preferences: 'minimal, earth tones',
      budget_range: { min: 20, max: 60 },
      updated_at: expect.any(String),
    });

    const read = await app.inject({ method: 'GET', url: '/personalization/sess-1' });
    expect(read.json<Body<{ budget_range: unknown }>>().data.budget_range).toEqual({ min: 20, max: 60 });
    expect((await personalization.get('sess-1'))?.stylePreferences).toBe('minimal, earth tones');
  });

  it('rejects a budget whose minimum exceeds its maximum', async () => {
    const response = await app.inject({
      method: 'PUT',
      url: '/personalization/sess-2',
      payload: { budget_range: { min: 80, max: 10 } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<Body<null>>().error?.details).toEqual({
      issues: [{ path: 'budget_range', message: 'min must not exceed max' }],
    });
    expect(await personalization.get('sess-2')).toBeNull();
  });

  it('clears preferences', async () => {
    await personalization.save('sess-3', { stylePreferences: 'bright' });

    const first = await app.inject({ method: 'DELETE', url: '/personalization/sess-3' });
    const second = await app.inject({ method: 'DELETE', url: '/personalization/sess-3' });

    expect(first.json<Body<unknown>>().data).toEqual({ session_id: 'sess-3', cleared: true });
    expect(second.json<Body<unknown>>().data).toEqual({ session_id: 'sess-3', cleared: false });
  });
});
