// ─── Transport ──────────────────────────────────────────────────

/** WebSocket readyState for an open connection. */
export const SOCKET_OPEN = 1;

/** Minimal WebSocket surface the gateway writes to. */
export interface GatewaySocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

// ─── Envelopes ──────────────────────────────────────────────────

/**
 * Client-facing message. `type` is free-form here; the message router
 * decides what inbound types mean.
 */
export interface Envelope {
  type: string;
  content: unknown;
  sessionId?: string;
  timestamp: Date;
}

/** Step shown in the client's agent activity panel. */
export interface AgentStep {
  id: string;
  type: 'calling' | 'processing' | 'success' | 'error';
  agentName: string;
  message: string;
}

// ─── Connections ────────────────────────────────────────────────

export interface GatewayConnection {
  sessionId: string;
  userId: string;
  socket: GatewaySocket;
  connectedAt: Date;
  lastActivity: Date;
  isBackchannel: boolean;
}

/** Connection metadata without the socket, for status endpoints. */
export type ConnectionInfo = Omit<GatewayConnection, 'socket'>;

export interface ConnectOptions {
  sessionId?: string;
  userId?: string;
}
