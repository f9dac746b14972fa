import { describe, it, expect, vi, beforeEach } from 'vitest';
import { agentId, orgId } from '@/core/types.js';
import type { ReportRepository } from '@/apps/workforce-accelerator/report-agent/types.js';
import { createReportRepository } from './report-repository.js';

function createMockDb(): { query: ReturnType<typeof vi.fn> } {
  return { query: vi.fn() };
}

const ORG = orgId('org-1');

describe('ReportRepository', () => {
  let db: ReturnType<typeof createMockDb>;
  let repo: ReportRepository;

  beforeEach(() => {
    db = createMockDb();
    repo = createReportRepository(db);
  });

  describe('reportExists', () => {
    it('matches team reports on rows without a user', async () => {
      db.query.mockResolvedValue([]);

      const exists = await repo.reportExists({
        orgId: ORG,
        reportType: 'team',
        periodType: 'daily',
        periodStart: '2025-03-01',
      });

      expect(exists).toBe(false);
      const [sql, params] = db.query.mock.calls[0] ?? [];
      expect(sql).toContain('AND user_id IS NULL');
      expect(params).toEqual(['org-1', 'team', 'daily', '2025-03-01']);
    });

    it('matches agent reports on the agent id', async () => {
      db.query.mockResolvedValue([{ '?column?': 1 }]);

      const exists = await repo.reportExists({
        orgId: ORG,
        reportType: 'agent',
        periodType: 'weekly',
        periodStart: '2025-02-24',
        agentId: agentId('lead-agent'),
      });

      expect(exists).toBe(true);
      const [sql, params] = db.query.mock.calls[0] ?? [];
      expect(sql).toContain('AND bot_id = $5');
      expect(params).toEqual(['org-1', 'agent', 'weekly', '2025-02-24', 'lead-agent']);
    });
  });

  describe('listMembers', () => {
    it('keeps members whose user row has no name', async () => {
      db.query.mockResolvedValue([
        { user_id: 'u-1', full_name: 'Dana Reyes' },
        { user_id: 'u-2', full_name: null },
      ]);

      expect(await repo.listMembers(ORG)).toEqual([
        { userId: 'u-1', fullName: 'Dana Reyes' },
        { userId: 'u-2', fullName: undefined },
      ]);
    });
  });

  describe('listMemberActivity', () => {
    it('maps the agent column when present', async () => {
      db.query.mockResolvedValue([
        { user_id: 'u-1', action_type: 'open_app', bot_id: 'lead-agent' },
        { user_id: 'u-1', action_type: 'login', bot_id: null },
      ]);
      const from = new Date('2025-03-01T00:00:00Z');
      const to = new Date('2025-03-01T23:59:59.999Z');

      const activity = await repo.listMemberActivity(ORG, from, to);

      expect(activity).toEqual([
        { userId: 'u-1', actionType: 'open_app', agentId: 'lead-agent' },
        { userId: 'u-1', actionType: 'login', agentId: undefined },
      ]);
      expect(db.query).toHaveBeenCalledWith(expect.any(String), ['org-1', from, to]);
    });
  });

  describe('insertReport', () => {
    it('serialises JSON columns and returns the id', async () => {
      db.query.mockResolvedValue([{ id: 'r-1' }]);

      const id = await repo.insertReport({
        orgId: ORG,
        reportType: 'team',
        periodType: 'daily',
        periodStart: '2025-03-01',
        periodEnd: '2025-03-01',
        rawMetrics: { total_activities: 3 },
        summaryText: 'A quiet day.',
        highlights: ['Three sessions'],
        recommendations: [],
        generatedBy: 'gpt-4o-mini',
        tokensUsed: 210,
        generationTimeMs: 900,
      });

      expect(id).toBe('r-1');
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO activity_reports'), [
        'org-1',
        'team',
        'daily',
        '2025-03-01',
        '2025-03-01',
        null,
        '{"total_activities":3}',
        'A quiet day.',
        '["Three sessions"]',
        '[]',
        'gpt-4o-mini',
        210,
        900,
      ]);
    });
  });

  describe('listReports', () => {
    const row = {
      id: 'r-1',
      org_id: 'org-1',
      report_type: 'agent',
      period_type: 'daily',
      period_start: '2025-03-01',
      period_end: '2025-03-01',
      bot_id: 'lead-agent',
      summary_text: 'Busy day for the lead agent.',
      highlights: ['12 insights'],
      recommendations: null,
      created_at: new Date('2025-03-02T06:05:00Z'),
    };

    it('maps rows and defaults malformed lists to empty', async () => {
      db.query.mockResolvedValue([row]);

      const reports = await repo.listReports(ORG, 'daily', 20);

      expect(reports).toEqual([
        {
          id: 'r-1',
          orgId: 'org-1',
          reportType: 'agent',
          periodType: 'daily',
          periodStart: '2025-03-01',
          periodEnd: '2025-03-01',
          agentId: 'lead-agent',
          summaryText: 'Busy day for the lead agent.',
          highlights: ['12 insights'],
          recommendations: [],
          createdAt: '2025-03-02T06:05:00.000Z',
        },
      ]);
      expect(db.query).toHaveBeenCalledWith(expect.any(String), ['org-1', 'daily', 20]);
    });

    it('passes null when no period type is given', async () => {
      db.query.mockResolvedValue([]);

      await repo.listReports(ORG, undefined, 5);

      expect(db.query).toHaveBeenCalledWith(expect.any(String), ['org-1', null, 5]);
    });
  });

  describe('listOrganizations / listActiveAgents', () => {
    it('brands the ids', async () => {
      db.query.mockResolvedValueOnce([{ id: 'org-1', name: 'Acme' }]);
      db.query.mockResolvedValueOnce([{ id: 'lead-agent', name: 'Lead Agent' }]);

      expect(await repo.listOrganizations()).toEqual([{ id: 'org-1', name: 'Acme' }]);
      expect(await repo.listActiveAgents()).toEqual([{ id: 'lead-agent', name: 'Lead Agent' }]);
    });
  });
});
