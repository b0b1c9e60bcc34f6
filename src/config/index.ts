// ─── Types ──────────────────────────────────────────────────────
export type { CostwardenConfig, CostwardenConfigInput } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  budgetConfigSchema,
  costwardenConfigSchema,
  enforcementConfigSchema,
  pricingConfigSchema,
  recordingConfigSchema,
  serverConfigSchema,
  universalFallbackSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadConfig, resolveEnvVars } from './loader.js';
