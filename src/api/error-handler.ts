/**
 * Global Fastify error handler and response helpers.
 * Maps PlatformError subclasses and ZodError to structured ApiResponse envelopes.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { PlatformError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

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

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(
  fastify: FastifyInstance,
  logger: Logger = createLogger({ name: 'error-handler' }),
): void {
  fastify.setErrorHandler(async (error, _request, reply) => {
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

    // PlatformError hierarchy: use the error's own statusCode and code
    if (error instanceof PlatformError) {
      logger.warn('Request failed with PlatformError', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // Fastify built-in errors (malformed JSON, unsupported media type, ...)
    if (error.statusCode !== undefined && error.statusCode < 500) {
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
