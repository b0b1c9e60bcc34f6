/**
 * Invalidation bus: carries cache invalidations between every process that
 * caches limits, spend or prices, so a write made in one process drops the
 * matching keys everywhere.
 *
 * Publishers apply the invalidation to their own caches first; subscribers
 * (the publisher included) apply what they receive. Applying an invalidation
 * twice is harmless.
 */
import { EventEmitter } from 'node:events';
import { z } from 'zod';
import type {
  AccumulatingPeriod,
  BudgetScope,
  PeriodType,
  ScopeId,
} from '@/core/types.js';

// ─── Messages ───────────────────────────────────────────────────

export type Invalidation =
  | { kind: 'limit'; scope: BudgetScope; periodType: PeriodType }
  | { kind: 'spend'; scope: BudgetScope; periodType: AccumulatingPeriod; periodStart: Date }
  | { kind: 'price'; provider: string; model: string };

export type InvalidationHandler = (invalidation: Invalidation) => void;

export interface InvalidationBus {
  publish(invalidations: readonly Invalidation[]): Promise<void>;
  /** Returns a function that removes the handler. */
  subscribe(handler: InvalidationHandler): () => void;
  start(): Promise<void>;
  close(): Promise<void>;
}

// ─── Wire format ────────────────────────────────────────────────

const scopeSchema = z.object({
  scopeType: z.enum(['user', 'project', 'organization']),
  scopeId: z.string().min(1),
});

const invalidationSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('limit'),
    scope: scopeSchema,
    periodType: z.enum(['per_request', 'daily', 'monthly']),
  }),
  z.object({
    kind: z.literal('spend'),
    scope: scopeSchema,
    periodType: z.enum(['daily', 'monthly']),
    periodStart: z.string().datetime(),
  }),
  z.object({
    kind: z.literal('price'),
    provider: z.string().min(1),
    model: z.string().min(1),
  }),
]);

const invalidationBatchSchema = z.array(invalidationSchema);

/** JSON text for one published batch. */
export function encodeInvalidations(invalidations: readonly Invalidation[]): string {
  return JSON.stringify(invalidations);
}

/** Parse a published batch. Throws on malformed JSON or shape. */
export function decodeInvalidations(payload: string): Invalidation[] {
  const batch = invalidationBatchSchema.parse(JSON.parse(payload));
  return batch.map((item): Invalidation => {
    switch (item.kind) {
      case 'limit':
        return {
          kind: 'limit',
          scope: { scopeType: item.scope.scopeType, scopeId: item.scope.scopeId as ScopeId },
          periodType: item.periodType,
        };
      case 'spend':
        return {
          kind: 'spend',
          scope: { scopeType: item.scope.scopeType, scopeId: item.scope.scopeId as ScopeId },
          periodType: item.periodType,
          periodStart: new Date(item.periodStart),
        };
      case 'price':
        return { kind: 'price', provider: item.provider, model: item.model };
    }
  });
}

// ─── In-process ─────────────────────────────────────────────────

const EVENT = 'invalidation';

/** Bus for caches living in one process. */
export function createInProcessInvalidationBus(): InvalidationBus {
  const emitter = new EventEmitter();
  emitter.setMaxListeners(100);

  return {
    publish(invalidations: readonly Invalidation[]): Promise<void> {
      for (const invalidation of invalidations) {
        emitter.emit(EVENT, invalidation);
      }
      return Promise.resolve();
    },

    subscribe(handler: InvalidationHandler): () => void {
      emitter.on(EVENT, handler);
      return () => {
        emitter.off(EVENT, handler);
      };
    },

    start(): Promise<void> {
      return Promise.resolve();
    },

    close(): Promise<void> {
      emitter.removeAllListeners(EVENT);
      return Promise.resolve();
    },
  };
}
