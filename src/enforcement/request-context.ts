/**
 * Request context construction. Callers pass a plain object; the context that
 * flows through the pipeline is validated, carries a request id, and only the
 * recognized options.
 */
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import { parseMoney } from '@/core/money.js';
import type { BudgetScope, RequestId, ScopeId, ScopeType } from '@/core/types.js';
import { decimalAmountSchema, formatZodIssue } from '@/core/validation.js';
import type { RequestContext } from './types.js';

export interface RequestContextInput<P> {
  /** Generated when omitted. Reuse the same id when retrying a call. */
  requestId?: string;
  provider: string;
  model: string;
  scopes: readonly { scopeType: ScopeType; scopeId: string }[];
  estimatedPromptLength: number;
  options?: {
    maxOutputTokens?: number;
    perRequestLimit?: string | number;
    tags?: readonly string[];
  };
  payload: P;
  signal?: AbortSignal;
}

const scopeSchema = z.object({
  scopeType: z.enum(['user', 'project', 'organization']),
  scopeId: z.string().min(1),
});

export const requestContextSchema = z.object({
  requestId: z.string().min(1).max(128).optional(),
  provider: z.string().min(1),
  model: z.string().min(1),
  scopes: z.array(scopeSchema).min(1),
  estimatedPromptLength: z.number().int().nonnegative(),
  options: z
    .object({
      maxOutputTokens: z.number().int().positive().optional(),
      perRequestLimit: decimalAmountSchema.optional(),
      tags: z.array(z.string().min(1)).default([]),
    })
    .strict()
    .default({}),
});

/** Validate input and build the context. Throws ValidationError listing every issue. */
export function createRequestContext<P>(input: RequestContextInput<P>): RequestContext<P> {
  const parsed = requestContextSchema.safeParse({
    requestId: input.requestId,
    provider: input.provider,
    model: input.model,
    scopes: input.scopes,
    estimatedPromptLength: input.estimatedPromptLength,
    options: input.options,
  });
  if (!parsed.success) {
    throw new ValidationError('Invalid request context', {
      issues: parsed.error.issues.map(formatZodIssue),
    });
  }

  const { data } = parsed;
  const scopes: BudgetScope[] = data.scopes.map((s) => ({
    scopeType: s.scopeType,
    scopeId: s.scopeId as ScopeId,
  }));

  return {
    requestId: (data.requestId ?? nanoid()) as RequestId,
    provider: data.provider,
    model: data.model,
    scopes,
    estimatedPromptLength: data.estimatedPromptLength,
    options: {
      maxOutputTokens: data.options.maxOutputTokens,
      perRequestLimit:
        data.options.perRequestLimit === undefined
          ? undefined
          : parseMoney(data.options.perRequestLimit),
      tags: data.options.tags,
    },
    payload: input.payload,
    signal: input.signal,
  };
}
