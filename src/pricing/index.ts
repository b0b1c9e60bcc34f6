// Pricing: price tables, fallback resolution and cost arithmetic
export type {
  BillingModel,
  CostBreakdown,
  PriceEntry,
  PriceRates,
  PriceSource,
  PriceStore,
  PricingUnit,
  RawPriceEntry,
  UnitCategory,
  UsageRecord,
} from './types.js';
export { BILLING_MODELS, PRICING_UNITS } from './types.js';

export {
  baseUnitOf,
  convertRate,
  isCompatible,
  isTokenUnit,
  unitCategory,
  unitMultiplier,
} from './units.js';

export { rawPriceEntrySchema, validatePriceEntry } from './price-validator.js';

export type { PriceCatalog, RawPriceCatalog } from './catalog.js';
export {
  DEFAULT_CATALOG_PATH,
  createPriceCatalog,
  emptyPriceCatalog,
  loadPriceCatalog,
  rawPriceCatalogSchema,
} from './catalog.js';

export { createInMemoryPriceStore } from './price-store.js';
export { createPgPriceStore } from './pg-price-store.js';

export type {
  PricingResolver,
  PricingResolverOptions,
  PricingResolverStats,
  ProviderModel,
  UniversalFallbackRate,
} from './pricing-resolver.js';
export { createPricingResolver } from './pricing-resolver.js';

export type { EstimateOptions, PricedCandidate } from './cost-calculator.js';
export {
  DEFAULT_CHARS_PER_TOKEN,
  calculateCost,
  comparePricing,
  estimateCost,
  estimateUsage,
} from './cost-calculator.js';
