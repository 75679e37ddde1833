// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  sessionId?: string;
  agentId?: string;
  messageId?: string;
  [key: string]: unknown;
}
