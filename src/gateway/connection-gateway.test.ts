import { beforeEach, describe, expect, it } from 'vitest';
import { createMessageBus, type MessageBus } from '@/a2a/message-bus.js';
import { createFrontendNotification } from '@/a2a/messages.js';
import { createSessionManager, type SessionManager } from '@/sessions/session-manager.js';
import { createMemoryStore } from '@/storage/memory-store.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createFakeSocket } from '@/testing/fixtures/socket.js';
import { createConnectionGateway, REPLACED_CLOSE_CODE, type ConnectionGateway } from './connection-gateway.js';
import { createEnvelope } from './envelope.js';
import type { Envelope } from './types.js';

function thinking() {
  return createFrontendNotification(
    { sender: 'product_discovery_001', receiver: 'frontend' },
    {
      notificationType: 'agent_thinking',
      agentName: 'Product Discovery',
      agentId: 'product_discovery_001',
      content: 'Searching the catalog',
    },
  );
}

describe('createConnectionGateway', () => {
  let sessions: SessionManager;
  let bus: MessageBus;
  let gateway: ConnectionGateway;

  beforeEach(() => {
    const logger = createMockLogger();
    const store = createMemoryStore({ logger });
    sessions = createSessionManager({ store, logger });
    bus = createMessageBus({ store, logger });
    gateway = createConnectionGateway({ sessions, bus, logger });
  });

  describe('connect', () => {
    it('mints an anonymous session and greets the client', async () => {
      const socket = createFakeSocket();

      const sessionId = await gateway.connect(socket);

      const [greeting] = socket.frames();
      expect(greeting?.type).toBe('connection_established');
      expect(greeting?.session_id).toBe(sessionId);
      expect(greeting?.content).toEqual({
        session_id: sessionId,
        user_id: expect.stringMatching(/^anonymous_[0-9a-f]{8}$/),
        message: 'Connected successfully',
      });
      expect(gateway.isSessionActive(sessionId)).toBe(true);
      expect(await sessions.getSession(sessionId)).not.toBeNull();
    });

    it('resumes a session the store already knows', async () => {
      await sessions.createSession('user-7', 'sess-7');
      const socket = createFakeSocket();

      const sessionId = await gateway.connect(socket, { sessionId: 'sess-7' });

      expect(sessionId).toBe('sess-7');
      expect(socket.frames()[0]?.content).toEqual({
        session_id: 'sess-7',
        user_id: 'user-7',
        message: 'Connected successfully',
      });
    });

    it('creates a session under a client-chosen id and user', async () => {
      const sessionId = await gateway.connect(createFakeSocket(), { sessionId: 'fresh', userId: 'user-1' });

      expect(sessionId).toBe('fresh');
      expect((await sessions.getSession('fresh'))?.userId).toBe('user-1');
      expect(gateway.getUserSessions('user-1')).toEqual(['fresh']);
    });

    it('replaces an earlier socket on the same session', async () => {
      const first = createFakeSocket();
      const second = createFakeSocket();
      await gateway.connect(first, { sessionId: 'sess-1', userId: 'user-1' });
      await gateway.connect(second, { sessionId: 'sess-1' });

      await gateway.sendMessage('sess-1', 'pong', {});

      expect(first.framesOf('pong')).toHaveLength(0);
      expect(second.framesOf('pong')).toHaveLength(1);
      expect(gateway.getUserSessions('user-1')).toEqual(['sess-1']);
      expect(first.closed).toEqual({ code: REPLACED_CLOSE_CODE, reason: 'Replaced by a newer connection' });
      expect(second.closed).toBeNull();
    });
  });

  describe('send', () => {
    it('disconnects a session whose socket is closed', async () => {
      const socket = createFakeSocket();
      const sessionId = await gateway.connect(socket);
      socket.close();

      expect(await gateway.sendMessage(sessionId, 'text', 'hello')).toBe(false);
      expect(gateway.isSessionActive(sessionId)).toBe(false);
    });

    it('disconnects a session whose write throws', async () => {
      const socket = createFakeSocket();
      const sessionId = await gateway.connect(socket);
      socket.failNextSend();

      expect(await gateway.sendMessage(sessionId, 'text', 'hello')).toBe(false);
      expect(gateway.isSessionActive(sessionId)).toBe(false);
    });

    it('returns false for an unknown session', async () => {
      expect(await gateway.send('ghost', createEnvelope('text', 'hi'))).toBe(false);
    });
  });

  describe('disconnect', () => {
    it('is idempotent and clears the user index', async () => {
      const sessionId = await gateway.connect(createFakeSocket(), { userId: 'user-1' });

      expect(gateway.disconnect(sessionId)).toBe(true);
      expect(gateway.disconnect(sessionId)).toBe(false);
      expect(gateway.getUserSessions('user-1')).toEqual([]);
      expect(gateway.getActiveSessions()).toEqual([]);
    });

    it('ignores a disconnect from a socket that was replaced', async () => {
      const first = createFakeSocket();
      const second = createFakeSocket();
      await gateway.connect(first, { sessionId: 'sess-1', userId: 'user-1' });
      await gateway.connect(second, { sessionId: 'sess-1' });

      expect(gateway.isCurrentSocket('sess-1', first)).toBe(false);
      expect(gateway.disconnect('sess-1', first)).toBe(false);
      expect(gateway.isSessionActive('sess-1')).toBe(true);

      expect(gateway.isCurrentSocket('sess-1', second)).toBe(true);
      expect(gateway.disconnect('sess-1', second)).toBe(true);
      expect(gateway.isSessionActive('sess-1')).toBe(false);
    });
  });

  describe('fan-out', () => {
    it('delivers to every session a user owns', async () => {
      const phone = createFakeSocket();
      const laptop = createFakeSocket();
      await gateway.connect(phone, { userId: 'user-1' });
      await gateway.connect(laptop, { userId: 'user-1' });
      await gateway.connect(createFakeSocket(), { userId: 'user-2' });

      expect(await gateway.sendToUser('user-1', createEnvelope('text', 'hi'))).toBe(2);
      expect(phone.framesOf('text')).toHaveLength(1);
      expect(laptop.framesOf('text')).toHaveLength(1);
    });

    it('skips excluded sessions when broadcasting', async () => {
      const a = createFakeSocket();
      const b = createFakeSocket();
      const sessionA = await gateway.connect(a);
      await gateway.connect(b);

      const delivered = await gateway.broadcastSystemMessage('maintenance at noon', new Set([sessionA]));

      expect(delivered).toBe(1);
      expect(a.framesOf('system')).toHaveLength(0);
      expect(b.framesOf('system')[0]?.content).toEqual({ message: 'maintenance at noon' });
    });
  });

  describe('backchannel', () => {
    it('mirrors frontend notifications to backchannel sessions only', async () => {
      const chat = createFakeSocket();
      const observer = createFakeSocket();
      await gateway.connect(chat);
      const observerId = await gateway.connectBackchannel(observer);
      const notification = thinking();

      await bus.sendDirect('frontend', notification);

      expect(chat.framesOf('a2a_message')).toHaveLength(0);
      const [mirrored] = observer.framesOf('a2a_message');
      expect(mirrored?.session_id).toBe(observerId);
      expect(mirrored?.content).toMatchObject({
        id: notification.id,
        notification_type: 'agent_thinking',
        content: 'Searching the catalog',
      });
    });

    it('greets with backchannel_connected and a backchannel user', async () => {
      const observer = createFakeSocket();
      await gateway.connectBackchannel(observer);

      const [greeting] = observer.frames();
      expect(greeting?.type).toBe('backchannel_connected');
      expect(greeting?.content).toMatchObject({
        user_id: expect.stringMatching(/^backchannel_[0-9a-f]{8}$/),
        message: 'Backchannel connected successfully',
      });
    });

    it('restricts backchannel broadcasts to backchannel sessions', async () => {
      const chat = createFakeSocket();
      const observer = createFakeSocket();
      await gateway.connect(chat);
      const observerId = await gateway.connectBackchannel(observer);

      expect(await gateway.sendA2AToBackchannel({ note: 'hello' })).toBe(true);

      expect(gateway.getBackchannelSessions()).toEqual([observerId]);
      expect(chat.framesOf('a2a_message')).toHaveLength(0);
      expect(observer.framesOf('a2a_message')[0]?.content).toEqual({ note: 'hello' });
    });

    it('drops the bus subscriber on disconnect', async () => {
      const observerId = await gateway.connectBackchannel(createFakeSocket());
      expect(bus.frontendSubscriberCount()).toBe(1);

      gateway.disconnect(observerId);

      expect(bus.frontendSubscriberCount()).toBe(0);
      expect(await gateway.sendA2AToBackchannel({ note: 'hello' })).toBe(false);
    });
  });

  describe('handleMessage', () => {
    it('frames three plain-text messages as text and records the last one', async () => {
      const sessionId = await gateway.connect(createFakeSocket());

      const envelopes: Envelope[] = [];
      for (const raw of ['hello', 'I need running shoes', '{not json']) {
        envelopes.push(await gateway.handleMessage(sessionId, raw));
      }

      expect(envelopes.map((e) => [e.type, e.content, e.sessionId])).toEqual([
        ['text', 'hello', sessionId],
        ['text', 'I need running shoes', sessionId],
        ['text', '{not json', sessionId],
      ]);
      const session = await sessions.getSession(sessionId);
      expect(session?.context['last_message']).toMatchObject({ type: 'text', content: '{not json' });
      expect(session?.context['last_activity']).toEqual(expect.any(String));
    });
  });

  describe('helpers', () => {
    it('sends errors with optional details', async () => {
      const socket = createFakeSocket();
      const sessionId = await gateway.connect(socket);

      await gateway.sendError(sessionId, 'Unknown message type');
      await gateway.sendError(sessionId, 'Bad input', 'quantity must be positive');

      expect(socket.framesOf('error').map((f) => f.content)).toEqual([
        { error: 'Unknown message type' },
        { error: 'Bad input', details: 'quantity must be positive' },
      ]);
    });

    it('sends typing indicators and agent steps', async () => {
      const socket = createFakeSocket();
      const sessionId = await gateway.connect(socket);

      await gateway.sendTypingIndicator(sessionId);
      await gateway.sendTypingIndicator(sessionId, false);
      await gateway.sendAgentCommunication(sessionId, [
        { id: 's1', type: 'calling', agentName: 'Orchestrator', message: 'Delegating' },
      ]);

      expect(socket.framesOf('typing_indicator').map((f) => f.content)).toEqual([
        { is_typing: true },
        { is_typing: false },
      ]);
      expect(socket.framesOf('agent_communication')[0]?.content).toEqual({
        steps: [{ id: 's1', type: 'calling', agent_name: 'Orchestrator', message: 'Delegating' }],
      });
    });

    it('lists active sessions without their sockets', async () => {
      const sessionId = await gateway.connect(createFakeSocket(), { userId: 'user-1' });

      const [info] = gateway.getActiveSessions();

      expect(info).toMatchObject({ sessionId, userId: 'user-1', isBackchannel: false });
      expect(info).not.toHaveProperty('socket');
    });
  });
});
