/**
 * Health and cache statistics routes.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { sendError, sendSuccess } from '../error-handler.js';

/** Register the health check and stats routes. */
export function healthRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { resolver, ledger, healthCheck, logger } = deps;

  fastify.get('/health', async (_request, reply) => {
    if (healthCheck) {
      try {
        await healthCheck();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Health check failed', { component: 'health-routes', error: message });
        return sendError(reply, 'UNHEALTHY', 'A backing service is unreachable', 503);
      }
    }
    return sendSuccess(reply, {
      status: 'ok',
      catalogVersion: resolver.catalogVersion,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /stats: cache hit rates and store reads since startup
  fastify.get('/stats', async (_request, reply) => {
    return sendSuccess(reply, {
      pricing: resolver.stats(),
      budget: ledger.stats(),
    });
  });
}
