// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  requestId?: string;
  provider?: string;
  model?: string;
  component: string;
  [key: string]: unknown;
}
