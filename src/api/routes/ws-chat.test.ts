import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createKeywordIntentClassifier } from '@/agents/intent.js';
import { createOrchestratorAgent, REPLIES, type OrchestratorAgent } from '@/agents/orchestrator.js';
import { createConnectionGateway, type ConnectionGateway } from '@/gateway/connection-gateway.js';
import { createRecoveryManager, type RecoveryManager } from '@/gateway/recovery.js';
import { createConversationMemory } from '@/sessions/conversation-memory.js';
import { createPersonalizationStore } from '@/sessions/personalization.js';
import { createSessionManager, type SessionManager } from '@/sessions/session-manager.js';
import { createTestMesh, type TestMesh } from '@/testing/fixtures/mesh.js';
import { createFakeSocket, type FakeSocket } from '@/testing/fixtures/socket.js';
import { createMessageRouter } from '../message-router.js';
import { setupBackchannelSocket, setupChatSocket, type ChatSocketDeps } from './ws-chat.js';

describe('ws-chat sockets', () => {
  let mesh: TestMesh;
  let sessions: SessionManager;
  let gateway: ConnectionGateway;
  let recovery: RecoveryManager;
  let orchestrator: OrchestratorAgent;
  let deps: ChatSocketDeps;
  let socket: FakeSocket;

  beforeEach(async () => {
    mesh = createTestMesh();
    sessions = createSessionManager({ store: mesh.store, logger: mesh.logger });
    gateway = createConnectionGateway({ sessions, bus: mesh.bus, logger: mesh.logger });
    recovery = createRecoveryManager({
      gateway,
      sessions,
      logger: mesh.logger,
      limits: { rateLimitMaxMessages: 2 },
      reconnection: { jitter: false },
    });
    const memory = createConversationMemory({ store: mesh.store, logger: mesh.logger });
    orchestrator = createOrchestratorAgent({
      gateway,
      sessions,
      memory,
      personalization: createPersonalizationStore({ store: mesh.store, logger: mesh.logger }),
      classifier: createKeywordIntentClassifier(),
      runtime: mesh.runtime,
    });
    await orchestrator.start();

    const router = createMessageRouter({ gateway, sessions, memory, orchestrator, logger: mesh.logger });
    deps = { gateway, recovery, router, logger: mesh.logger };
    socket = createFakeSocket();
  });

  afterEach(async () => {
    recovery.cleanupSession('sess-1');
    await orchestrator.stop();
  });

  describe('setupChatSocket', () => {
    it('greets the client and marks the session connected', async () => {
      const sessionId = await setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);

      expect(sessionId).toBe('sess-1');
      expect(socket.framesOf('connection_established').map((frame) => frame.content)).toEqual([
        { session_id: 'sess-1', user_id: 'user-1', message: 'Connected successfully' },
      ]);
      expect(recovery.getConnectionState('sess-1')).toBe('connected');
    });

    it('routes a plain text frame to the orchestrator', async () => {
      await setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);

      socket.receive('hello');

      await vi.waitFor(() => expect(socket.framesOf('text').map((frame) => frame.content)).toEqual([REPLIES.greeting]));
      const session = await sessions.getSession('sess-1');
      expect(session?.context['last_message']).toMatchObject({ type: 'text', content: 'hello' });
    });

    it('handles frames that arrive before the session is open', async () => {
      const connected = setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);
      socket.receive(JSON.stringify({ type: 'ping', content: null }));

      await connected;

      await vi.waitFor(() => expect(socket.framesOf('pong')).toHaveLength(1));
      expect(socket.frames()[0]?.type).toBe('connection_established');
    });

    it('rejects frames over the rate limit', async () => {
      await setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);
      const ping = JSON.stringify({ type: 'ping', content: null });

      socket.receive(ping);
      socket.receive(ping);
      socket.receive(ping);

      await vi.waitFor(() => expect(socket.framesOf('error')).toHaveLength(1));
      expect(socket.framesOf('pong')).toHaveLength(2);
      expect(socket.framesOf('error')[0]?.content).toMatchObject({
        code: 'RATE_LIMIT_EXCEEDED',
        retry_after: 60,
        details: 'Maximum 2 messages per 60 seconds',
      });
    });

    it('disconnects and forgets recovery state on close', async () => {
      await setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);
      recovery.queueMessage('sess-1', { type: 'system', content: null, timestamp: new Date() });

      socket.emitClose();

      await vi.waitFor(() => expect(gateway.isSessionActive('sess-1')).toBe(false));
      expect(recovery.queuedMessageCount('sess-1')).toBe(0);
    });

    it('schedules a resume on socket error and keeps it past the close', async () => {
      await setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);

      socket.emitError(new Error('connection reset'));
      socket.emitClose();

      await vi.waitFor(() => expect(gateway.isSessionActive('sess-1')).toBe(false));
      expect(recovery.getConnectionState('sess-1')).toBe('reconnecting');
      expect(recovery.reconnectionAttempts('sess-1')).toBe(1);
      expect(recovery.getErrorHistory('sess-1').map((error) => error.errorCode)).toEqual(['CONNECTION_FAILED']);
    });

    it('keeps the session when a replaced socket closes', async () => {
      const second = createFakeSocket();
      await setupChatSocket(socket, { sessionId: 'sess-1', userId: 'user-1' }, deps);
      await setupChatSocket(second, { sessionId: 'sess-1' }, deps);

      expect(socket.closed).toEqual({ code: 4000, reason: 'Replaced by a newer connection' });
      socket.emitClose();
      second.receive(JSON.stringify({ type: 'ping', content: null }));

      await vi.waitFor(() => expect(second.framesOf('pong')).toHaveLength(1));
      expect(gateway.isSessionActive('sess-1')).toBe(true);
      expect(recovery.getConnectionState('sess-1')).toBe('connected');
    });

    it('closes the socket when the session cannot be opened', async () => {
      const failing: ChatSocketDeps = {
        ...deps,
        gateway: { ...gateway, connect: () => Promise.reject(new Error('store offline')) },
      };

      const sessionId = await setupChatSocket(socket, { sessionId: 'sess-1' }, failing);

      expect(sessionId).toBeNull();
      expect(socket.closed).toEqual({ code: 1011, reason: 'Session could not be opened' });
    });
  });

  describe('setupBackchannelSocket', () => {
    it('registers an observer that answers ping', async () => {
      const sessionId = await setupBackchannelSocket(socket, { sessionId: 'obs-1' }, deps);

      expect(sessionId).toBe('obs-1');
      expect(gateway.getBackchannelSessions()).toEqual(['obs-1']);

      socket.receive(JSON.stringify({ type: 'ping', content: null }));
      await vi.waitFor(() => expect(socket.framesOf('pong')).toHaveLength(1));

      socket.emitClose();
      await vi.waitFor(() => expect(gateway.getBackchannelSessions()).toEqual([]));
    });
  });
});
