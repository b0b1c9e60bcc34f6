// Core module: shared types, money arithmetic, errors
export type {
  AccumulatingPeriod,
  Brand,
  BudgetScope,
  Clock,
  PeriodType,
  RequestId,
  ScopeId,
  ScopeStack,
  ScopeType,
} from './types.js';
export {
  ACCUMULATING_PERIODS,
  PERIOD_TYPES,
  buildScopeStack,
  scopeKey,
  systemClock,
} from './types.js';

export type { Money } from './money.js';
export {
  MONEY_SCALE,
  ZERO,
  addMoney,
  applyRate,
  compareMoney,
  formatMoney,
  isDecimalString,
  maxMoney,
  parseMoney,
  percentOf,
  reachesPercentage,
  scaleMoney,
  subtractMoney,
} from './money.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap } from './result.js';

export type { BudgetDenial } from './errors.js';
export {
  CostwardenError,
  BudgetExceededError,
  InconsistentPriceEntryError,
  StoreTimeoutError,
  RecordingFailureError,
  ValidationError,
  toError,
} from './errors.js';

export { withTimeout, sleep } from './async.js';
export { decimalAmountSchema, formatZodIssue } from './validation.js';
