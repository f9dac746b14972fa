import { describe, it, expect } from 'vitest';
import { dueReportPeriods, periodBounds, periodLabel } from './periods.js';

const at = (iso: string): Date => new Date(iso);

describe('dueReportPeriods', () => {
  it('returns nothing before 06:00 UTC', () => {
    expect(dueReportPeriods(at('2025-03-04T05:59:59Z'))).toEqual([]);
  });

  it('returns only yesterday on an ordinary day', () => {
    expect(dueReportPeriods(at('2025-03-04T06:00:00Z'))).toEqual([
      { periodType: 'daily', periodStart: '2025-03-03', periodEnd: '2025-03-03' },
    ]);
  });

  it('adds the previous seven days on Mondays', () => {
    expect(dueReportPeriods(at('2025-03-03T07:00:00Z'))).toEqual([
      { periodType: 'daily', periodStart: '2025-03-02', periodEnd: '2025-03-02' },
      { periodType: 'weekly', periodStart: '2025-02-24', periodEnd: '2025-03-02' },
    ]);
  });

  it('adds the previous month on the 1st', () => {
    expect(dueReportPeriods(at('2024-03-01T10:00:00Z'))).toEqual([
      { periodType: 'daily', periodStart: '2024-02-29', periodEnd: '2024-02-29' },
      { periodType: 'monthly', periodStart: '2024-02-01', periodEnd: '2024-02-29' },
    ]);
  });

  it('returns all three when a Monday falls on the 1st, across a year boundary', () => {
    expect(dueReportPeriods(at('2024-01-01T06:30:00Z'))).toEqual([
      { periodType: 'daily', periodStart: '2023-12-31', periodEnd: '2023-12-31' },
      { periodType: 'weekly', periodStart: '2023-12-25', periodEnd: '2023-12-31' },
      { periodType: 'monthly', periodStart: '2023-12-01', periodEnd: '2023-12-31' },
    ]);
  });
});

describe('periodBounds', () => {
  it('covers the first through the last millisecond of the period', () => {
    expect(
      periodBounds({ periodType: 'weekly', periodStart: '2025-02-24', periodEnd: '2025-03-02' }),
    ).toEqual({
      from: new Date('2025-02-24T00:00:00.000Z'),
      to: new Date('2025-03-02T23:59:59.999Z'),
    });
  });
});

describe('periodLabel', () => {
  it('labels each period type', () => {
    expect(
      periodLabel({ periodType: 'daily', periodStart: '2025-03-01', periodEnd: '2025-03-01' }),
    ).toBe('Saturday, March 1, 2025');
    expect(
      periodLabel({ periodType: 'weekly', periodStart: '2025-02-24', periodEnd: '2025-03-02' }),
    ).toBe('Week of Feb 24 - Mar 2, 2025');
    expect(
      periodLabel({ periodType: 'monthly', periodStart: '2025-02-01', periodEnd: '2025-02-28' }),
    ).toBe('February 2025');
  });
});
