// Enforcement: pre-call budget gate and the guarded provider pipeline
export type {
  GateDecision,
  GateResult,
  GateState,
  GateTransition,
  ProviderCall,
  ProviderResponse,
  RequestContext,
  RequestOptions,
} from './types.js';

export type { Next, Stage } from './pipeline.js';
export { composePipeline } from './pipeline.js';

export type { RequestContextInput } from './request-context.js';
export { createRequestContext, requestContextSchema } from './request-context.js';

export type { EnforcementGate, EnforcementGateOptions } from './enforcement-gate.js';
export { createEnforcementGate } from './enforcement-gate.js';

export type { GuardedClient, GuardedClientOptions, GuardedStage } from './guarded-client.js';
export { createGuardedClient } from './guarded-client.js';

export type {
  EnforcementDependencies,
  EnforcementPipeline,
  EnforcementSettings,
} from './enforcement-pipeline.js';
export { createEnforcementPipeline } from './enforcement-pipeline.js';
