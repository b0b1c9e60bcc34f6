import type { BudgetScope, RequestId } from '@/core/types.js';
import type { AlertEvent, SpendUpdate } from '@/budget/types.js';
import type { CostBreakdown, UsageRecord } from '@/pricing/types.js';

// ─── Events ─────────────────────────────────────────────────────

/**
 * Emitted once a provider call returns usage. JSON-safe so it can cross a
 * queue unchanged; delivery is at-least-once.
 */
export interface ResponseReceivedEvent {
  requestId: RequestId;
  scopes: BudgetScope[];
  usage: UsageRecord;
  /** ISO-8601; decides which daily and monthly periods are charged. */
  receivedAt: string;
  tags: string[];
}

/** Actual cost of one request, written once per request id. */
export interface CostRecord {
  requestId: RequestId;
  provider: string;
  model: string;
  scopes: BudgetScope[];
  usage: UsageRecord;
  breakdown: CostBreakdown;
  recordedAt: Date;
}

export interface CostRecordedEvent {
  record: CostRecord;
  spendUpdates: SpendUpdate[];
}

/** Signals a CostRecorder emits to registered listeners. */
export interface CostRecorderSignals {
  costRecorded: CostRecordedEvent;
  alertThresholdCrossed: AlertEvent;
}

export type SignalListener<K extends keyof CostRecorderSignals> = (
  payload: CostRecorderSignals[K],
) => void | Promise<void>;

// ─── Contracts ──────────────────────────────────────────────────

/** Idempotent consumer of the recording events. */
export interface CostEventConsumer {
  onResponseReceived(event: ResponseReceivedEvent): Promise<void>;
  onCostRecorded(event: CostRecordedEvent): Promise<void>;
}

export interface CostRecordStore {
  /** Insert the record. Returns false when one already exists for the request id. */
  save(record: CostRecord): Promise<boolean>;
  findByRequestId(requestId: RequestId): Promise<CostRecord | null>;
}

/** Hands ResponseReceived events to a consumer off the caller's path. */
export interface CostEventQueue {
  enqueue(event: ResponseReceivedEvent): Promise<void>;
  start(): Promise<void>;
  /** Stop taking work and wait for in-flight events. */
  stop(): Promise<void>;
  /** Resolve once every queued event has been processed. */
  drain(): Promise<void>;
}
