/**
 * Base error class for all cartmesh errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class MeshError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'MeshError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends MeshError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Raised when a message could not be handed to its receiver. */
export class DeliveryError extends MeshError {
  constructor(messageId: string, receiver: string, message: string, cause?: Error) {
    super({
      message: `Delivery of ${messageId} to "${receiver}" failed: ${message}`,
      code: 'DELIVERY_FAILED',
      statusCode: 502,
      cause,
      context: { messageId, receiver },
    });
    this.name = 'DeliveryError';
  }
}

/** Thrown when a request names an agent type nobody has registered. */
export class AgentUnavailableError extends MeshError {
  constructor(agentType: string) {
    super({
      message: `No agent of type "${agentType}" is registered`,
      code: 'AGENT_UNAVAILABLE',
      statusCode: 503,
      context: { agentType },
    });
    this.name = 'AgentUnavailableError';
  }
}
