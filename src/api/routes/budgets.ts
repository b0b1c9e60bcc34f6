/**
 * Budget routes: limit administration and per-scope status.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { BudgetLimit } from '@/budget/types.js';
import { parseMoney } from '@/core/money.js';
import type { BudgetScope, ScopeId } from '@/core/types.js';
import { alertThresholdSchema, decimalAmountSchema } from '@/core/validation.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';
import { serializeAlertEvent, serializeBudgetLimit, serializeBudgetStatus } from '../serializers.js';

// ─── Zod Schemas ────────────────────────────────────────────────

const scopeTypeSchema = z.enum(['user', 'project', 'organization']);
const periodTypeSchema = z.enum(['per_request', 'daily', 'monthly']);

const upsertLimitSchema = z.object({
  scopeType: scopeTypeSchema,
  scopeId: z.string().min(1).max(200),
  periodType: periodTypeSchema,
  limitAmount: decimalAmountSchema,
  currency: z.string().regex(/^[A-Z]{3}$/).default('USD'),
  alertThresholds: z.array(alertThresholdSchema).max(20).optional(),
  isActive: z.boolean().default(true),
});

const scopeParamsSchema = z.object({
  scopeType: scopeTypeSchema,
  scopeId: z.string().min(1),
});

const statusQuerySchema = z.object({
  at: z.string().datetime().optional(),
});

const alertsQuerySchema = z.object({
  periodType: z.enum(['daily', 'monthly']).optional(),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register budget limit and status routes. */
export function budgetRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { ledger, alertStore, defaultAlertThresholds } = deps;

  // PUT /budget-limits: insert or replace the limit for (scope, periodType)
  fastify.put('/budget-limits', async (request, reply) => {
    const input = upsertLimitSchema.parse(request.body);
    const limit: BudgetLimit = {
      scope: { scopeType: input.scopeType, scopeId: input.scopeId as ScopeId },
      periodType: input.periodType,
      limitAmount: parseMoney(input.limitAmount),
      currency: input.currency,
      alertThresholds: [...(input.alertThresholds ?? defaultAlertThresholds)].sort((a, b) => a - b),
      isActive: input.isActive,
    };
    await ledger.upsertLimit(limit);
    return sendSuccess(reply, serializeBudgetLimit(limit));
  });

  // GET /budgets/:scopeType/:scopeId: spend against every configured period
  fastify.get('/budgets/:scopeType/:scopeId', async (request, reply) => {
    const params = scopeParamsSchema.parse(request.params);
    const query = statusQuerySchema.parse(request.query);
    const scope: BudgetScope = { scopeType: params.scopeType, scopeId: params.scopeId as ScopeId };
    const status = await ledger.getStatus(scope, query.at ? new Date(query.at) : undefined);
    return sendSuccess(reply, serializeBudgetStatus(status));
  });

  // GET /budgets/:scopeType/:scopeId/alerts: threshold crossings, newest first
  fastify.get('/budgets/:scopeType/:scopeId/alerts', async (request, reply) => {
    const params = scopeParamsSchema.parse(request.params);
    const query = alertsQuerySchema.parse(request.query);
    const scope: BudgetScope = { scopeType: params.scopeType, scopeId: params.scopeId as ScopeId };
    const events = await alertStore.list(scope, query.periodType);
    return sendSuccess(reply, events.map(serializeAlertEvent));
  });
}
