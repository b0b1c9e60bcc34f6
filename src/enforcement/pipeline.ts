/**
 * Ordered request pipeline. Each stage receives the context and the rest of
 * the chain; it may act before and after calling `next`, or return without
 * calling it. The chain is composed once and reused for every request.
 */

export type Next<C, R> = (context: C) => Promise<R>;

export type Stage<C, R> = (context: C, next: Next<C, R>) => Promise<R>;

/** Compose `stages` (outermost first) around `terminal`. */
export function composePipeline<C, R>(
  stages: readonly Stage<C, R>[],
  terminal: Next<C, R>,
): Next<C, R> {
  return stages.reduceRight<Next<C, R>>(
    (next, stage) => (context) => stage(context, next),
    terminal,
  );
}
