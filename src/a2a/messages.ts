/**
 * Message factories and the JSON codec for the indirect delivery path.
 */
import { nanoid } from 'nanoid';
import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { a2aMessageSchema } from './schema.js';
import type {
  A2AMessage,
  AckMessage,
  FrontendNotificationMessage,
  NotificationType,
  RequestMessage,
  RequestSpec,
  ResponseMessage,
  SystemKind,
  SystemMessage,
} from './types.js';

// ─── Common Envelope ────────────────────────────────────────────

export interface MessageInit {
  sender: string;
  receiver: string;
  /** A fresh conversation id is generated when omitted. */
  conversationId?: string;
  metadata?: Record<string, unknown>;
  requiresAck?: boolean;
}

function envelope(init: MessageInit) {
  return {
    id: nanoid(),
    sender: init.sender,
    receiver: init.receiver,
    conversationId: init.conversationId ?? nanoid(),
    timestamp: new Date(),
    metadata: init.metadata ?? {},
  };
}

// ─── Factories ──────────────────────────────────────────────────

/** Requests require an acknowledgement unless `init.requiresAck` says otherwise. */
export function createRequest(init: MessageInit, spec: RequestSpec): RequestMessage {
  return { ...envelope(init), kind: 'request', requiresAck: init.requiresAck ?? true, ...spec };
}

export type ResponseSpec = { requestId: string; content?: unknown } & (
  | { success: true }
  | { success: false; error: string }
);

export function createResponse(init: MessageInit, spec: ResponseSpec): ResponseMessage {
  const base = {
    ...envelope(init),
    kind: 'response' as const,
    requiresAck: init.requiresAck ?? false,
    requestId: spec.requestId,
    content: spec.content,
  };
  return spec.success ? { ...base, success: true } : { ...base, success: false, error: spec.error };
}

export function createAck(
  init: Omit<MessageInit, 'requiresAck'>,
  ackForMessageId: string,
  outcome: { success: true } | { success: false; error: string } = { success: true },
): AckMessage {
  return { ...envelope(init), kind: 'ack', requiresAck: false, ackForMessageId, ...outcome };
}

export function createFrontendNotification(
  init: Omit<MessageInit, 'requiresAck'>,
  notification: {
    notificationType: NotificationType;
    agentName: string;
    agentId: string;
    content: string;
  },
): FrontendNotificationMessage {
  return { ...envelope(init), kind: 'frontend_notification', requiresAck: false, ...notification };
}

export function createSystemMessage(
  kind: SystemKind,
  init: MessageInit,
  content: unknown,
): SystemMessage {
  return { ...envelope(init), kind, requiresAck: init.requiresAck ?? false, content };
}

// ─── Codec ──────────────────────────────────────────────────────

/** Dates serialise as ISO-8601 strings. */
export function encodeMessage(message: A2AMessage): string {
  return JSON.stringify(message);
}

/** Parse and validate a wire message. Anything outside the union is rejected. */
export function decodeMessage(raw: string): Result<A2AMessage, ValidationError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return err(new ValidationError('Message is not valid JSON'));
  }

  const result = a2aMessageSchema.safeParse(parsed);
  if (!result.success) {
    return err(
      new ValidationError('Message does not match any A2A message shape', {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(result.data);
}
