// Budget: limits, spend aggregates and threshold alerts
export type {
  AlertEvent,
  AlertSeverity,
  AlertStore,
  BudgetDecision,
  BudgetLimit,
  BudgetLimitStore,
  BudgetStatus,
  Period,
  PeriodStatus,
  SpendAggregate,
  SpendIncrement,
  SpendStore,
  SpendUpdate,
} from './types.js';

export { periodFor } from './periods.js';

export type {
  BudgetLedger,
  BudgetLedgerOptions,
  BudgetLedgerStats,
  EstimateCheckOptions,
} from './budget-ledger.js';
export { createBudgetLedger } from './budget-ledger.js';

export type { AlertDispatcher, AlertDispatcherOptions } from './alert-dispatcher.js';
export { createAlertDispatcher, severityFor } from './alert-dispatcher.js';

export type { InMemoryAlertStore, InMemorySpendStore } from './memory-stores.js';
export {
  createInMemoryAlertStore,
  createInMemoryBudgetLimitStore,
  createInMemorySpendStore,
} from './memory-stores.js';
export { createPgAlertStore, createPgBudgetLimitStore, createPgSpendStore } from './pg-stores.js';
