// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a UserId where an OrgId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type OrgId = Brand<string, 'OrgId'>;
export type UserId = Brand<string, 'UserId'>;
export type AgentId = Brand<string, 'AgentId'>;
export type AppId = Brand<string, 'AppId'>;
export type TaskLogId = Brand<string, 'TaskLogId'>;
export type NotificationId = Brand<string, 'NotificationId'>;
export type ProspectId = Brand<string, 'ProspectId'>;
export type ReportId = Brand<string, 'ReportId'>;

// ─── Brand Constructors ─────────────────────────────────────────
// Ids come back from the database as plain strings; these mark the boundary.

export const orgId = (value: string): OrgId => value as OrgId;
export const userId = (value: string): UserId => value as UserId;
export const agentId = (value: string): AgentId => value as AgentId;
export const appId = (value: string): AppId => value as AppId;
export const taskLogId = (value: string): TaskLogId => value as TaskLogId;
export const notificationId = (value: string): NotificationId => value as NotificationId;
export const prospectId = (value: string): ProspectId => value as ProspectId;
export const reportId = (value: string): ReportId => value as ReportId;

// ─── Reporting Periods ──────────────────────────────────────────

export type PeriodType = 'daily' | 'weekly' | 'monthly';

export type ReportType = 'team' | 'agent';

/** A closed calendar range, both ends as `YYYY-MM-DD` (UTC). */
export interface ReportPeriod {
  periodType: PeriodType;
  periodStart: string;
  periodEnd: string;
}
