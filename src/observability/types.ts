// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  orgId?: string;
  agentId?: string;
  task?: string;
  component: string;
  [key: string]: unknown;
}
