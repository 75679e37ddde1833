import type { z } from 'zod';
import type {
  a2aMessageSchema,
  notificationTypeSchema,
  requestPayloadSchemas,
  requestTypeSchema,
  systemKindSchema,
} from './schema.js';

// ─── Messages ───────────────────────────────────────────────────

export type A2AMessage = z.infer<typeof a2aMessageSchema>;
export type MessageKind = A2AMessage['kind'];

export type RequestMessage = Extract<A2AMessage, { kind: 'request' }>;
export type ResponseMessage = Extract<A2AMessage, { kind: 'response' }>;
export type AckMessage = Extract<A2AMessage, { kind: 'ack' }>;
export type FrontendNotificationMessage = Extract<A2AMessage, { kind: 'frontend_notification' }>;
export type SystemKind = z.infer<typeof systemKindSchema>;
export type SystemMessage = Extract<A2AMessage, { kind: SystemKind }>;

export type RequestType = z.infer<typeof requestTypeSchema>;
export type NotificationType = z.infer<typeof notificationTypeSchema>;

/** Payload type for a given request type. */
export type RequestPayload<T extends RequestType> = z.infer<(typeof requestPayloadSchemas)[T]>;

/** A request type paired with its payload; narrows `content` on `requestType`. */
export type RequestSpec = {
  [T in RequestType]: { requestType: T; content: RequestPayload<T> };
}[RequestType];

// ─── Registry ───────────────────────────────────────────────────

export type AgentStatus = 'active' | 'inactive';

export interface AgentRegistration {
  agentId: string;
  agentType: string;
  capabilities: string[];
  status: AgentStatus;
  registeredAt: Date;
}
