import { beforeEach, describe, expect, it } from 'vitest';
import { createConversationMemory, type ConversationMemory } from './conversation-memory.js';
import { createMemoryStore } from '@/storage/memory-store.js';
import type { KeyValueStore } from '@/storage/types.js';
import { createMockLogger, type MockLogger } from '@/testing/fixtures/logger.js';

describe('createConversationMemory', () => {
  let logger: MockLogger;
  let store: KeyValueStore;
  let memory: ConversationMemory;

  beforeEach(() => {
    logger = createMockLogger();
    store = createMemoryStore({ logger });
    memory = createConversationMemory({ store, logger, maxEntries: 3 });
  });

  it('records entries oldest first', async () => {
    await memory.record('sess-1', { sender: 'user', messageType: 'text', content: 'show me shoes' });
    await memory.record('sess-1', {
      sender: 'assistant',
      messageType: 'product_search',
      content: 'I found 2 products',
      metadata: { count: 2 },
    });

    const history = await memory.getHistory('sess-1');
    expect(history.map((entry) => [entry.sender, entry.content])).toEqual([
      ['user', 'show me shoes'],
      ['assistant', 'I found 2 products'],
    ]);
    expect(history[1]?.metadata).toEqual({ count: 2 });
    expect(history[0]?.timestamp).toBeInstanceOf(Date);
  });

  it('keeps only the newest entries', async () => {
    for (const content of ['one', 'two', 'three', 'four']) {
      await memory.record('sess-1', { sender: 'user', messageType: 'text', content });
    }

    expect((await memory.getHistory('sess-1')).map((entry) => entry.content)).toEqual(['two', 'three', 'four']);
    expect((await memory.getHistory('sess-1', 1)).map((entry) => entry.content)).toEqual(['four']);
  });

  it('keeps sessions apart', async () => {
    await memory.record('sess-1', { sender: 'user', messageType: 'text', content: 'hi' });

    expect(await memory.getHistory('sess-2')).toEqual([]);
  });

  it('clears a history', async () => {
    await memory.record('sess-1', { sender: 'user', messageType: 'text', content: 'hi' });

    expect(await memory.clear('sess-1')).toBe(true);
    expect(await memory.getHistory('sess-1')).toEqual([]);
    expect(await memory.clear('sess-1')).toBe(false);
  });

  it('discards an unreadable record', async () => {
    await store.set('conversation:sess-1', 'not json');

    expect(await memory.getHistory('sess-1')).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Discarding unreadable conversation history', {
      component: 'conversation-memory',
      sessionId: 'sess-1',
    });
  });
});
