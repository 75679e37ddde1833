/**
 * Envelope parsing and serialisation.
 *
 * Internally envelopes are camelCase with a Date timestamp; on the wire
 * they are `{ type, content, session_id?, timestamp }` with an ISO-8601
 * timestamp.
 */
import { z } from 'zod';
import type { FrontendNotificationMessage } from '@/a2a/types.js';
import type { AgentStep, Envelope } from './types.js';

const inboundEnvelopeSchema = z.object({
  type: z.string().min(1),
  content: z.unknown(),
  session_id: z.string().min(1).optional(),
  timestamp: z.coerce.date().optional(),
});

export function createEnvelope(type: string, content: unknown, sessionId?: string): Envelope {
  return { type, content, sessionId, timestamp: new Date() };
}

/**
 * Turn a raw inbound frame into an envelope. Structured frames must be a
 * JSON object matching the inbound schema; anything else becomes a `text`
 * envelope carrying the raw string. The session id is stamped when absent.
 */
export function parseEnvelope(raw: string, sessionId: string): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return createEnvelope('text', raw, sessionId);
  }

  const result = inboundEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    return createEnvelope('text', raw, sessionId);
  }

  return {
    type: result.data.type,
    content: result.data.content,
    sessionId: result.data.session_id ?? sessionId,
    timestamp: result.data.timestamp ?? new Date(),
  };
}

export function serializeEnvelope(envelope: Envelope): string {
  return JSON.stringify({
    type: envelope.type,
    content: envelope.content,
    ...(envelope.sessionId !== undefined && { session_id: envelope.sessionId }),
    timestamp: envelope.timestamp.toISOString(),
  });
}

export function toWireSteps(steps: AgentStep[]): Array<Record<string, string>> {
  return steps.map((step) => ({
    id: step.id,
    type: step.type,
    agent_name: step.agentName,
    message: step.message,
  }));
}

/** Backchannel view of a frontend notification. */
export function toWireNotification(message: FrontendNotificationMessage): Record<string, unknown> {
  return {
    id: message.id,
    type: message.kind,
    notification_type: message.notificationType,
    sender: message.sender,
    receiver: message.receiver,
    agent_id: message.agentId,
    agent_name: message.agentName,
    conversation_id: message.conversationId,
    content: message.content,
    timestamp: message.timestamp.toISOString(),
  };
}
