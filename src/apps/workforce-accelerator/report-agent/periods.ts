/**
 * Reporting calendar, all in UTC. Nothing is due before 06:00 so the
 * previous day's activity has settled.
 */
import type { PeriodType, ReportPeriod } from '@/core/types.js';

export const REPORTS_DUE_HOUR_UTC = 6;

const DAY_MS = 86_400_000;

/** `YYYY-MM-DD` of a UTC instant. */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function period(periodType: PeriodType, start: Date, end: Date): ReportPeriod {
  return { periodType, periodStart: toDateString(start), periodEnd: toDateString(end) };
}

/**
 * Periods whose reports are due at `now`:
 * yesterday every day, the previous seven days on Mondays,
 * and the previous calendar month on the 1st.
 */
export function dueReportPeriods(now: Date): ReportPeriod[] {
  if (now.getUTCHours() < REPORTS_DUE_HOUR_UTC) return [];

  const today = startOfUtcDay(now);
  const yesterday = addDays(today, -1);
  const due: ReportPeriod[] = [period('daily', yesterday, yesterday)];

  if (today.getUTCDay() === 1) {
    const weekStart = addDays(today, -7);
    due.push(period('weekly', weekStart, addDays(weekStart, 6)));
  }

  if (today.getUTCDate() === 1) {
    const monthStart = new Date(Date.UTC(yesterday.getUTCFullYear(), yesterday.getUTCMonth(), 1));
    due.push(period('monthly', monthStart, yesterday));
  }

  return due;
}

/** Inclusive instant range covering every day of the period. */
export function periodBounds(reportPeriod: ReportPeriod): { from: Date; to: Date } {
  return {
    from: new Date(`${reportPeriod.periodStart}T00:00:00.000Z`),
    to: new Date(`${reportPeriod.periodEnd}T23:59:59.999Z`),
  };
}

/** Human label, e.g. `Saturday, March 1, 2025`, `Week of Feb 24 - Mar 2, 2025`, `February 2025`. */
export function periodLabel(reportPeriod: ReportPeriod): string {
  const start = new Date(`${reportPeriod.periodStart}T00:00:00.000Z`);
  const format = (options: Intl.DateTimeFormatOptions, date: Date = start): string =>
    new Intl.DateTimeFormat('en-US', { timeZone: 'UTC', ...options }).format(date);

  switch (reportPeriod.periodType) {
    case 'daily':
      return format({ weekday: 'long', month: 'long', day: 'numeric', year: 'numeric' });
    case 'weekly': {
      const end = new Date(`${reportPeriod.periodEnd}T00:00:00.000Z`);
      return `Week of ${format({ month: 'short', day: 'numeric' })} - ${format(
        { month: 'short', day: 'numeric', year: 'numeric' },
        end,
      )}`;
    }
    case 'monthly':
      return format({ month: 'long', year: 'numeric' });
  }
}
