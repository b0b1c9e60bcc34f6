import { z } from 'zod';
import type { RequestId, ScopeId } from '@/core/types.js';
import type { ResponseReceivedEvent } from './types.js';

/** Shape of a ResponseReceived event after it crossed a queue as JSON. */
export const responseReceivedEventSchema = z.object({
  requestId: z.string().min(1),
  scopes: z
    .array(
      z.object({
        scopeType: z.enum(['user', 'project', 'organization']),
        scopeId: z.string().min(1),
      }),
    )
    .min(1),
  usage: z.object({
    provider: z.string().min(1),
    model: z.string().min(1),
    inputUnits: z.number().nonnegative(),
    outputUnits: z.number().nonnegative(),
  }),
  receivedAt: z.string().datetime(),
  tags: z.array(z.string()).default([]),
});

/** Validate untrusted job data into an event. Throws ZodError. */
export function parseResponseReceivedEvent(data: unknown): ResponseReceivedEvent {
  const parsed = responseReceivedEventSchema.parse(data);
  return {
    ...parsed,
    requestId: parsed.requestId as RequestId,
    scopes: parsed.scopes.map((s) => ({ scopeType: s.scopeType, scopeId: s.scopeId as ScopeId })),
  };
}
