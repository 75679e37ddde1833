import { describe, expect, it } from 'vitest';
import { createFrontendNotification } from '@/a2a/messages.js';
import { parseEnvelope, serializeEnvelope, toWireNotification, toWireSteps } from './envelope.js';

describe('parseEnvelope', () => {
  it('wraps a plain string as a text envelope', () => {
    const envelope = parseEnvelope('hello', 'sess-1');

    expect(envelope.type).toBe('text');
    expect(envelope.content).toBe('hello');
    expect(envelope.sessionId).toBe('sess-1');
  });

  it('accepts a structured frame and stamps the session id', () => {
    const envelope = parseEnvelope('{"type":"ping","content":null}', 'sess-1');

    expect(envelope.type).toBe('ping');
    expect(envelope.content).toBeNull();
    expect(envelope.sessionId).toBe('sess-1');
  });

  it('keeps a session id supplied by the client', () => {
    const envelope = parseEnvelope('{"type":"text","content":"hi","session_id":"other"}', 'sess-1');
    expect(envelope.sessionId).toBe('other');
  });

  it('parses a client timestamp', () => {
    const envelope = parseEnvelope(
      '{"type":"text","content":"hi","timestamp":"2026-03-01T10:00:00.000Z"}',
      'sess-1',
    );
    expect(envelope.timestamp.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it.each([
    ['an array', '[1,2]'],
    ['a JSON string', '"quoted"'],
    ['an object without a type', '{"content":"x"}'],
    ['truncated JSON', '{"type":"te'],
  ])('treats %s as text', (_label, raw) => {
    const envelope = parseEnvelope(raw, 'sess-1');

    expect(envelope.type).toBe('text');
    expect(envelope.content).toBe(raw);
  });
});

describe('serializeEnvelope', () => {
  it('writes snake_case keys and an ISO timestamp', () => {
    const frame = serializeEnvelope({
      type: 'pong',
      content: {},
      sessionId: 'sess-1',
      timestamp: new Date('2026-01-02T03:04:05.000Z'),
    });

    expect(frame).toBe('{"type":"pong","content":{},"session_id":"sess-1","timestamp":"2026-01-02T03:04:05.000Z"}');
  });

  it('omits session_id when absent', () => {
    const frame = serializeEnvelope({
      type: 'system',
      content: { message: 'maintenance' },
      timestamp: new Date('2026-01-02T03:04:05.000Z'),
    });

    expect(frame).toBe('{"type":"system","content":{"message":"maintenance"},"timestamp":"2026-01-02T03:04:05.000Z"}');
  });
});

describe('toWireSteps', () => {
  it('renames agentName', () => {
    expect(
      toWireSteps([{ id: 'step-1', type: 'calling', agentName: 'Product Discovery', message: 'Searching' }]),
    ).toEqual([{ id: 'step-1', type: 'calling', agent_name: 'Product Discovery', message: 'Searching' }]);
  });
});

describe('toWireNotification', () => {
  it('flattens a frontend notification for the backchannel', () => {
    const notification = createFrontendNotification(
      { sender: 'product_discovery_001', receiver: 'frontend', conversationId: 'conv-1' },
      {
        notificationType: 'agent_action',
        agentName: 'Product Discovery',
        agentId: 'product_discovery_001',
        content: 'Found 3 products',
      },
    );

    expect(toWireNotification(notification)).toEqual({
      id: notification.id,
      type: 'frontend_notification',
      notification_type: 'agent_action',
      sender: 'product_discovery_001',
      receiver: 'frontend',
      agent_id: 'product_discovery_001',
      agent_name: 'Product Discovery',
      conversation_id: 'conv-1',
      content: 'Found 3 products',
      timestamp: notification.timestamp.toISOString(),
    });
  });
});
