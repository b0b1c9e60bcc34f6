// Admin REST endpoints (Fastify)
export type {
  AlertEventResponse,
  ApiError,
  ApiResponse,
  BudgetLimitResponse,
  BudgetStatusResponse,
  PeriodStatusResponse,
  PriceEntryResponse,
  RouteDependencies,
} from './types.js';

export type { ErrorMapping } from './error-handler.js';
export { registerErrorHandler, sendSuccess, sendError, mapError } from './error-handler.js';
export {
  serializeAlertEvent,
  serializeBudgetLimit,
  serializeBudgetStatus,
  serializePriceEntry,
} from './serializers.js';
export { registerRoutes } from './routes/index.js';
