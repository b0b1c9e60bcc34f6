import type { AccumulatingPeriod } from '@/core/types.js';
import type { Period } from './types.js';

/** UTC calendar day or month containing `at`. */
export function periodFor(periodType: AccumulatingPeriod, at: Date): Period {
  const year = at.getUTCFullYear();
  const month = at.getUTCMonth();

  if (periodType === 'daily') {
    const day = at.getUTCDate();
    return {
      start: new Date(Date.UTC(year, month, day)),
      end: new Date(Date.UTC(year, month, day + 1)),
    };
  }

  return {
    start: new Date(Date.UTC(year, month, 1)),
    end: new Date(Date.UTC(year, month + 1, 1)),
  };
}
