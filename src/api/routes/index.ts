/**
 * Route registration: registers all API route plugins with Fastify.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { budgetRoutes } from './budgets.js';
import { healthRoutes } from './health.js';
import { priceRoutes } from './prices.js';

/** Register all API routes on the Fastify instance. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(healthRoutes, deps);
  await fastify.register(budgetRoutes, deps);
  await fastify.register(priceRoutes, deps);
}
