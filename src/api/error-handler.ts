/**
 * Global Fastify error handler and response helpers.
 *
 * Maps ZodError to 400, GatewayError to its client-facing payload
 * (severity, recoverability and retry hint), and every other MeshError,
 * the cart and configuration errors among them, to its own code and status.
 */
import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { MeshError } from '@/core/errors.js';
import { GatewayError, toErrorPayload } from '@/gateway/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

const logger = createLogger({ name: 'error-handler' });

// ─── Response Helpers ───────────────────────────────────────────

/** Send a success response wrapped in the ApiResponse envelope. */
export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

/** Send an error response wrapped in the ApiResponse envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** Send a 404 not-found response. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

/**
 * Send a GatewayError the way WebSocket clients see it: the payload's
 * severity, recoverability and retry hint become the error details, and a
 * retry hint also sets `Retry-After`.
 */
async function sendGatewayError(reply: FastifyReply, error: GatewayError): Promise<void> {
  const payload = toErrorPayload(error);
  if (payload.retry_after !== undefined) {
    reply.header('retry-after', String(payload.retry_after));
  }
  await sendError(reply, payload.code, payload.message, error.statusCode, {
    severity: payload.severity,
    recoverable: payload.recoverable,
    ...(payload.retry_after !== undefined && { retry_after: payload.retry_after }),
    ...(payload.details !== undefined && { details: payload.details }),
    ...(error.sessionId !== undefined && { session_id: error.sessionId }),
  });
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler<FastifyError>(async (error, _request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    if (error instanceof GatewayError) {
      logger.warn('Request failed with GatewayError', {
        component: 'error-handler',
        code: error.errorCode,
        severity: error.severity,
        sessionId: error.sessionId,
      });
      await sendGatewayError(reply, error);
      return;
    }

    // MeshError hierarchy: the error's own statusCode and code
    if (error instanceof MeshError) {
      const meta = {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      };
      if (error.statusCode >= 500 || !error.isOperational) {
        logger.error('Request failed with MeshError', meta);
      } else {
        logger.warn('Request failed with MeshError', meta);
      }
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // Fastify's own errors (bad JSON, unsupported media type, ...)
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      await sendError(reply, 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: error.message,
      stack: error.stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
