/**
 * Admin API error mapping. Every failure leaves as an `{ success: false, error }`
 * envelope; `mapError` decides its status, code, details and log level.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { CostwardenError, StoreTimeoutError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { ApiError, ApiResponse } from './types.js';

const logger = createLogger({ name: 'error-handler' });

// ─── Envelopes ──────────────────────────────────────────────────

export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

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

// ─── Mapping ────────────────────────────────────────────────────

export interface ErrorMapping {
  statusCode: number;
  error: ApiError;
  /** Rejections the caller caused are logged below `error`. */
  level: 'info' | 'warn' | 'error';
  /** Seconds for a Retry-After header. */
  retryAfterSeconds?: number;
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

export function mapError(error: unknown): ErrorMapping {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      level: 'info',
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: {
          issues: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
      },
    };
  }

  if (error instanceof StoreTimeoutError) {
    return {
      statusCode: error.statusCode,
      level: 'warn',
      retryAfterSeconds: 1,
      error: { code: error.code, message: error.message, details: error.context },
    };
  }

  if (error instanceof CostwardenError) {
    return {
      statusCode: error.statusCode,
      level: error.statusCode >= 500 ? 'error' : 'warn',
      error: { code: error.code, message: error.message, details: error.context },
    };
  }

  // Fastify's own errors: malformed JSON, unsupported media type
  if (hasStatusCode(error) && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      level: 'info',
      error: { code: 'REQUEST_ERROR', message: error.message },
    };
  }

  return {
    statusCode: 500,
    level: 'error',
    error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
  };
}

// ─── Handler ────────────────────────────────────────────────────

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler(async (error, request, reply) => {
    const mapping = mapError(error);
    const cause = error instanceof Error ? error : new Error(String(error));

    logger[mapping.level]('Request failed', {
      component: 'error-handler',
      method: request.method,
      url: request.url,
      statusCode: mapping.statusCode,
      code: mapping.error.code,
      error: cause.message,
      ...(mapping.level === 'error' && { stack: cause.stack }),
    });

    if (mapping.retryAfterSeconds !== undefined) {
      reply.header('Retry-After', String(mapping.retryAfterSeconds));
    }
    const { code, message, details } = mapping.error;
    await sendError(reply, code, message, mapping.statusCode, details);
  });
}
