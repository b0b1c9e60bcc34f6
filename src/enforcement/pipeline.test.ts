import { describe, it, expect } from 'vitest';
import { composePipeline } from './pipeline.js';
import type { Stage } from './pipeline.js';

describe('composePipeline', () => {
  it('runs stages outermost first around the terminal', async () => {
    const trace: string[] = [];
    const stage =
      (name: string): Stage<string, string> =>
      async (context, next) => {
        trace.push(`${name}:before`);
        const result = await next(`${context}>${name}`);
        trace.push(`${name}:after`);
        return result;
      };

    const run = composePipeline([stage('a'), stage('b')], (context) => {
      trace.push('terminal');
      return Promise.resolve(`${context}!`);
    });

    expect(await run('ctx')).toBe('ctx>a>b!');
    expect(trace).toEqual(['a:before', 'b:before', 'terminal', 'b:after', 'a:after']);
  });

  it('lets a stage short-circuit the rest of the chain', async () => {
    let reached = false;
    const run = composePipeline<number, string>(
      [() => Promise.resolve('stopped')],
      () => {
        reached = true;
        return Promise.resolve('terminal');
      },
    );

    expect(await run(1)).toBe('stopped');
    expect(reached).toBe(false);
  });

  it('calls the terminal directly without stages', async () => {
    const run = composePipeline<number, number>([], (n) => Promise.resolve(n * 2));

    expect(await run(21)).toBe(42);
  });
});
