// costwarden: LLM spend enforcement with pricing, budgets, gating and cost recording
export * from './core/index.js';
export * from './pricing/index.js';
export * from './budget/index.js';
export * from './enforcement/index.js';
export * from './recording/index.js';
export * from './config/index.js';
export * from './infrastructure/index.js';
export * from './observability/index.js';
export * from './cache/index.js';
