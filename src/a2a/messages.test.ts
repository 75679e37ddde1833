import { describe, expect, it } from 'vitest';
import {
  createAck,
  createRequest,
  createResponse,
  createSystemMessage,
  decodeMessage,
  encodeMessage,
} from './messages.js';

const init = { sender: 'orchestrator_001', receiver: 'product_discovery_001' };

describe('message factories', () => {
  it('requests require an ack by default', () => {
    const request = createRequest(init, {
      requestType: 'search_products',
      content: { query: 'red dress', limit: 5 },
    });

    expect(request.kind).toBe('request');
    expect(request.requiresAck).toBe(true);
    expect(request.metadata).toEqual({});
    expect(request.id).not.toBe(request.conversationId);
  });

  it('keeps a given conversation id', () => {
    const request = createRequest(
      { ...init, conversationId: 'conv-1', requiresAck: false },
      { requestType: 'get_cart', content: { cartId: 'cart-1' } },
    );

    expect(request.conversationId).toBe('conv-1');
    expect(request.requiresAck).toBe(false);
  });

  it('responses carry an error only when they failed', () => {
    const ok = createResponse(init, { requestId: 'r1', success: true, content: { products: [] } });
    const failed = createResponse(init, { requestId: 'r1', success: false, error: 'catalog offline' });

    expect(ok.error).toBeUndefined();
    expect(ok.requiresAck).toBe(false);
    expect(failed.success).toBe(false);
    expect(failed.error).toBe('catalog offline');
  });

  it('acks never require an ack', () => {
    const ack = createAck({ sender: 'b', receiver: 'a' }, 'msg-1');

    expect(ack).toMatchObject({ kind: 'ack', ackForMessageId: 'msg-1', success: true, requiresAck: false });
  });
});

describe('decodeMessage', () => {
  it('restores a request including its timestamp', () => {
    const request = createRequest(init, {
      requestType: 'add_to_cart',
      content: { cartId: 'c1', productId: 'p1', quantity: 2 },
    });

    const decoded = decodeMessage(encodeMessage(request));

    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(decoded.value).toEqual(request);
      expect(decoded.value.timestamp).toBeInstanceOf(Date);
    }
  });

  it('rejects invalid JSON', () => {
    const decoded = decodeMessage('{oops');

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) expect(decoded.error.message).toBe('Message is not valid JSON');
  });

  it('rejects an unknown kind', () => {
    const raw = JSON.parse(encodeMessage(createSystemMessage('heartbeat', init, null))) as Record<string, unknown>;

    expect(decodeMessage(JSON.stringify({ ...raw, kind: 'gossip' })).ok).toBe(false);
  });

  it('rejects a payload that does not match its request type', () => {
    const request = createRequest(init, { requestType: 'get_cart', content: { cartId: 'c1' } });
    const raw = JSON.parse(encodeMessage(request)) as Record<string, unknown>;

    expect(decodeMessage(JSON.stringify({ ...raw, content: { query: 'shoes' } })).ok).toBe(false);
  });

  it('rejects a failed response without an error', () => {
    const response = createResponse(init, { requestId: 'r1', success: true });
    const raw = JSON.parse(encodeMessage(response)) as Record<string, unknown>;

    expect(decodeMessage(JSON.stringify({ ...raw, success: false })).ok).toBe(false);
  });

  it('fills a missing metadata field with an empty object', () => {
    const raw = JSON.parse(encodeMessage(createSystemMessage('notification', init, 'hi'))) as Record<
      string,
      unknown
    >;
    delete raw['metadata'];

    const decoded = decodeMessage(JSON.stringify(raw));

    expect(decoded.ok && decoded.value.metadata).toEqual({});
  });
});
