import { describe, it, expect, vi, beforeEach } from 'vitest';
import { notificationId, userId } from '@/core/types.js';
import type { NotificationRepository } from '@/apps/workforce-accelerator/lead-agent/types.js';
import { createNotificationRepository } from './notification-repository.js';

function createMockDb(): { query: ReturnType<typeof vi.fn> } {
  return { query: vi.fn() };
}

describe('NotificationRepository', () => {
  let db: ReturnType<typeof createMockDb>;
  let repo: NotificationRepository;
  const now = new Date('2025-03-01T12:00:00Z');

  beforeEach(() => {
    db = createMockDb();
    repo = createNotificationRepository(db);
  });

  describe('hasDue', () => {
    it('returns the EXISTS flag', async () => {
      db.query.mockResolvedValue([{ due: true }]);

      expect(await repo.hasDue(now)).toBe(true);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining("status = 'pending'"), [now]);
    });

    it('returns false for an empty result', async () => {
      db.query.mockResolvedValue([]);

      expect(await repo.hasDue(now)).toBe(false);
    });
  });

  describe('listDue', () => {
    it('maps joined rows and keeps missing users and prospects absent', async () => {
      db.query.mockResolvedValue([
        {
          id: 'n-1',
          user_id: 'u-1',
          prospect_id: 'p-1',
          message: 'Call back about the quote',
          telegram_id: '5550001',
          business_name: 'Acme',
        },
        {
          id: 'n-2',
          user_id: 'u-2',
          prospect_id: 'p-2',
          message: 'Check in',
          telegram_id: null,
          business_name: null,
        },
      ]);

      const due = await repo.listDue(now, 50);

      expect(due).toEqual([
        {
          id: 'n-1',
          userId: 'u-1',
          prospectId: 'p-1',
          message: 'Call back about the quote',
          telegramId: '5550001',
          businessName: 'Acme',
        },
        {
          id: 'n-2',
          userId: 'u-2',
          prospectId: 'p-2',
          message: 'Check in',
          telegramId: undefined,
          businessName: undefined,
        },
      ]);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('LIMIT $2'), [now, 50]);
    });
  });

  describe('markSent', () => {
    it('updates status and sent_at for one id', async () => {
      db.query.mockResolvedValue([]);

      await repo.markSent(notificationId('n-1'), now);

      expect(db.query).toHaveBeenCalledWith(expect.stringContaining("SET status = 'sent'"), [
        'n-1',
        now,
      ]);
    });
  });

  describe('listPendingForUser', () => {
    it('returns schedule times as ISO strings', async () => {
      db.query.mockResolvedValue([
        {
          id: 'n-3',
          prospect_id: 'p-1',
          business_name: 'Acme',
          message: 'Send the proposal',
          scheduled_for: new Date('2025-03-02T09:00:00Z'),
        },
      ]);

      const pending = await repo.listPendingForUser(userId('u-1'));

      expect(pending).toEqual([
        {
          id: 'n-3',
          prospectId: 'p-1',
          businessName: 'Acme',
          message: 'Send the proposal',
          scheduledFor: '2025-03-02T09:00:00.000Z',
        },
      ]);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('n.user_id = $1'), ['u-1']);
    });
  });
});
