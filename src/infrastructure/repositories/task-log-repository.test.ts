import { describe, it, expect, vi, beforeEach } from 'vitest';
import { agentId, appId, orgId, userId } from '@/core/types.js';
import type { TaskLogRepository } from '@/task-logging/types.js';
import { createTaskLogRepository } from './task-log-repository.js';

// ─── Mock Database ──────────────────────────────────────────────

function createMockDb(): { query: ReturnType<typeof vi.fn> } {
  return { query: vi.fn() };
}

// ─── Fixtures ───────────────────────────────────────────────────

const rawEntry = {
  id: 'log-1',
  org_id: 'org-1',
  bot_id: 'lead-agent',
  app_id: 'workforce-accelerator',
  task_type: 'insights_generated',
  task_detail: { business_name: 'Acme' },
  triggered_by: null,
  execution_time_ms: 1200,
  tokens_used: null,
  created_at: new Date('2025-03-01T10:00:00Z'),
};

describe('TaskLogRepository', () => {
  let db: ReturnType<typeof createMockDb>;
  let repo: TaskLogRepository;

  beforeEach(() => {
    db = createMockDb();
    repo = createTaskLogRepository(db);
  });

  describe('insert', () => {
    it('writes one row and returns the generated id', async () => {
      db.query.mockResolvedValue([{ id: 'log-7' }]);

      const id = await repo.insert({
        orgId: orgId('org-1'),
        agentId: agentId('lead-agent'),
        appId: appId('workforce-accelerator'),
        taskType: 'prospect_scraped',
        detail: { business_name: 'Acme', source: 'url' },
        triggeredBy: userId('user-1'),
        executionTimeMs: 300,
      });

      expect(id).toBe('log-7');
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO bot_task_log'), [
        'org-1',
        'lead-agent',
        'workforce-accelerator',
        'prospect_scraped',
        '{"business_name":"Acme","source":"url"}',
        'user-1',
        300,
        null,
      ]);
    });

    it('stores an empty detail object and nulls when optional fields are absent', async () => {
      db.query.mockResolvedValue([{ id: 'log-8' }]);

      await repo.insert({ orgId: orgId('org-1'), agentId: agentId('report-agent'), taskType: 'x' });

      expect(db.query).toHaveBeenCalledWith(expect.any(String), [
        'org-1',
        'report-agent',
        null,
        'x',
        '{}',
        null,
        null,
        null,
      ]);
    });

    it('throws when no id comes back', async () => {
      db.query.mockResolvedValue([]);

      await expect(
        repo.insert({ orgId: orgId('org-1'), agentId: agentId('lead-agent'), taskType: 'x' }),
      ).rejects.toThrow('bot_task_log insert returned no id');
    });
  });

  describe('listForAgent', () => {
    it('maps rows to entries', async () => {
      db.query.mockResolvedValue([rawEntry]);
      const from = new Date('2025-03-01T00:00:00Z');
      const to = new Date('2025-03-01T23:59:59.999Z');

      const entries = await repo.listForAgent(orgId('org-1'), agentId('lead-agent'), from, to);

      expect(entries).toEqual([
        {
          id: 'log-1',
          orgId: 'org-1',
          agentId: 'lead-agent',
          appId: 'workforce-accelerator',
          taskType: 'insights_generated',
          detail: { business_name: 'Acme' },
          triggeredBy: undefined,
          executionTimeMs: 1200,
          tokensUsed: undefined,
          createdAt: new Date('2025-03-01T10:00:00Z'),
        },
      ]);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('FROM bot_task_log'), [
        'org-1',
        'lead-agent',
        from,
        to,
      ]);
    });

    it('falls back to an empty detail when the column is not an object', async () => {
      db.query.mockResolvedValue([{ ...rawEntry, task_detail: null }]);

      const [entry] = await repo.listForAgent(
        orgId('org-1'),
        agentId('lead-agent'),
        new Date(0),
        new Date(1),
      );

      expect(entry?.detail).toEqual({});
    });
  });
});
