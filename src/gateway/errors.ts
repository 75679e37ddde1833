import { MeshError } from '@/core/errors.js';

// ─── Codes ──────────────────────────────────────────────────────

export const GATEWAY_ERROR_CODES = [
  'CONNECTION_FAILED',
  'AUTHENTICATION_FAILED',
  'SESSION_EXPIRED',
  'MESSAGE_INVALID',
  'RATE_LIMIT_EXCEEDED',
  'INTERNAL_ERROR',
  'SERVICE_UNAVAILABLE',
  'TIMEOUT',
] as const;

export type GatewayErrorCode = (typeof GATEWAY_ERROR_CODES)[number];

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

const DEFAULTS: Record<GatewayErrorCode, { severity: ErrorSeverity; recoverable: boolean }> = {
  CONNECTION_FAILED: { severity: 'high', recoverable: true },
  AUTHENTICATION_FAILED: { severity: 'high', recoverable: false },
  SESSION_EXPIRED: { severity: 'medium', recoverable: false },
  MESSAGE_INVALID: { severity: 'low', recoverable: true },
  RATE_LIMIT_EXCEEDED: { severity: 'low', recoverable: true },
  INTERNAL_ERROR: { severity: 'critical', recoverable: false },
  SERVICE_UNAVAILABLE: { severity: 'high', recoverable: true },
  TIMEOUT: { severity: 'medium', recoverable: true },
};

// ─── Error Class ────────────────────────────────────────────────

export interface GatewayErrorParams {
  errorCode: GatewayErrorCode;
  message: string;
  sessionId?: string;
  details?: string;
  severity?: ErrorSeverity;
  recoverable?: boolean;
  /** Seconds the client should wait before retrying. */
  retryAfter?: number;
  cause?: Error;
}

/** Client-facing failure on a WebSocket session. */
export class GatewayError extends MeshError {
  public readonly errorCode: GatewayErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoverable: boolean;
  public readonly retryAfter?: number;
  public readonly sessionId?: string;
  public readonly details?: string;
  public readonly timestamp: Date;

  constructor(params: GatewayErrorParams) {
    const defaults = DEFAULTS[params.errorCode];
    super({
      message: params.message,
      code: params.errorCode,
      statusCode: params.errorCode === 'RATE_LIMIT_EXCEEDED' ? 429 : 500,
      cause: params.cause,
      context: { sessionId: params.sessionId },
    });
    this.name = 'GatewayError';
    this.errorCode = params.errorCode;
    this.severity = params.severity ?? defaults.severity;
    this.recoverable = params.recoverable ?? defaults.recoverable;
    this.retryAfter = params.retryAfter;
    this.sessionId = params.sessionId;
    this.details = params.details;
    this.timestamp = new Date();
  }
}

// ─── Wire Form ──────────────────────────────────────────────────

export interface ErrorPayload {
  code: GatewayErrorCode;
  message: string;
  severity: ErrorSeverity;
  timestamp: string;
  recoverable: boolean;
  retry_after?: number;
  details?: string;
}

export function toErrorPayload(error: GatewayError): ErrorPayload {
  return {
    code: error.errorCode,
    message: error.message,
    severity: error.severity,
    timestamp: error.timestamp.toISOString(),
    recoverable: error.recoverable,
    ...(error.retryAfter !== undefined && { retry_after: error.retryAfter }),
    ...(error.details !== undefined && { details: error.details }),
  };
}
