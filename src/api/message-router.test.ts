import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createKeywordIntentClassifier } from '@/agents/intent.js';
import { createOrchestratorAgent, REPLIES, type OrchestratorAgent } from '@/agents/orchestrator.js';
import { createConnectionGateway, type ConnectionGateway } from '@/gateway/connection-gateway.js';
import { createEnvelope } from '@/gateway/envelope.js';
import { createConversationMemory, type ConversationMemory } from '@/sessions/conversation-memory.js';
import { createPersonalizationStore } from '@/sessions/personalization.js';
import { createSessionManager, type SessionManager } from '@/sessions/session-manager.js';
import { createTestMesh } from '@/testing/fixtures/mesh.js';
import { createFakeSocket, type FakeSocket } from '@/testing/fixtures/socket.js';
import { createMessageRouter, type MessageRouter } from './message-router.js';

describe('createMessageRouter', () => {
  let sessions: SessionManager;
  let memory: ConversationMemory;
  let gateway: ConnectionGateway;
  let orchestrator: OrchestratorAgent;
  let socket: FakeSocket;
  let route: MessageRouter;

  beforeEach(async () => {
    const mesh = createTestMesh();
    sessions = createSessionManager({ store: mesh.store, logger: mesh.logger });
    gateway = createConnectionGateway({ sessions, bus: mesh.bus, logger: mesh.logger });
    memory = createConversationMemory({ store: mesh.store, logger: mesh.logger });
    orchestrator = createOrchestratorAgent({
      gateway,
      sessions,
      memory,
      personalization: createPersonalizationStore({ store: mesh.store, logger: mesh.logger }),
      classifier: createKeywordIntentClassifier(),
      runtime: mesh.runtime,
    });
    route = createMessageRouter({ gateway, sessions, memory, orchestrator, logger: mesh.logger });

    socket = createFakeSocket();
    await gateway.connect(socket, { sessionId: 'sess-1', userId: 'user-1' });
  });

  afterEach(async () => {
    await orchestrator.stop();
  });

  describe('text', () => {
    it('sends the orchestrator reply back as text', async () => {
      await orchestrator.start();

      await route('sess-1', createEnvelope('text', 'hello'));

      expect(socket.framesOf('text').map((frame) => frame.content)).toEqual([REPLIES.greeting]);
      expect((await memory.getHistory('sess-1')).map((entry) => [entry.sender, entry.content])).toEqual([
        ['user', 'hello'],
        ['assistant', REPLIES.greeting],
      ]);
    });

    it('rejects non-string content', async () => {
      await orchestrator.start();

      await route('sess-1', createEnvelope('text', { words: ['hello'] }));

      expect(socket.framesOf('error').map((frame) => frame.content)).toEqual([
        { error: 'Invalid message content', details: "Expected a string for 'text' message type." },
      ]);
    });

    it('reports an orchestrator that is not running', async () => {
      await route('sess-1', createEnvelope('text', 'hello'));

      expect(socket.framesOf('error').map((frame) => frame.content)).toEqual([
        {
          error: 'Service temporarily unavailable',
          details: 'The AI assistant is not ready. Please try again in a moment.',
        },
      ]);
    });
  });

  describe('new chat', () => {
    it('clears the session context and history and confirms', async () => {
      await sessions.updateContext('sess-1', { last_search: 'shoes' });
      await memory.record('sess-1', { sender: 'user', messageType: 'text', content: 'shoes' });

      await route('sess-1', createEnvelope('new_chat', null));

      expect((await sessions.getSession('sess-1'))?.context).toEqual({});
      expect(await memory.getHistory('sess-1')).toEqual([]);
      expect(socket.framesOf('chat_reset').map((frame) => frame.content)).toEqual([
        { message: 'New chat started.' },
      ]);
    });

    it('reports a session that could not be reset', async () => {
      await sessions.deleteSession('sess-1');

      await route('sess-1', createEnvelope('new_chat', null));

      expect(socket.framesOf('error').map((frame) => frame.content)).toEqual([
        { error: 'Failed to start new chat.' },
      ]);
    });

    it('resets silently on request', async () => {
      await sessions.updateContext('sess-1', { last_search: 'shoes' });
      const before = socket.raw.length;

      await route('sess-1', createEnvelope('new_chat_silent', null));

      expect((await sessions.getSession('sess-1'))?.context).toEqual({});
      expect(socket.raw).toHaveLength(before);
    });
  });

  it('answers ping with pong', async () => {
    await route('sess-1', createEnvelope('ping', null));

    const [pong] = socket.framesOf('pong');
    expect(pong?.content).toEqual({ timestamp: expect.any(String) });
  });

  it('reports unknown message types', async () => {
    await route('sess-1', createEnvelope('dance', null));

    expect(socket.framesOf('error').map((frame) => frame.content)).toEqual([
      { error: 'Unknown message type', details: "No handler for 'dance'" },
    ]);
  });
});
