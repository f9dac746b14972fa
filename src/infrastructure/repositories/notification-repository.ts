/**
 * Notification repository — the lead agent's scheduled follow-ups in
 * `lead_agent_scheduled_notifications`.
 */
import { notificationId, prospectId, userId } from '@/core/types.js';
import type { NotificationId, UserId } from '@/core/types.js';
import type {
  DueNotification,
  NotificationRepository,
  PendingNotification,
} from '@/apps/workforce-accelerator/lead-agent/types.js';
import type { Queryable } from '../database.js';

// ─── Rows ───────────────────────────────────────────────────────

type DueRow = {
  id: string;
  user_id: string;
  prospect_id: string;
  message: string;
  telegram_id: string | null;
  business_name: string | null;
};

type PendingRow = {
  id: string;
  prospect_id: string;
  business_name: string | null;
  message: string;
  scheduled_for: Date;
};

// ─── Factory ────────────────────────────────────────────────────

/** Create a NotificationRepository backed by PostgreSQL. */
export function createNotificationRepository(db: Queryable): NotificationRepository {
  return {
    async hasDue(now: Date): Promise<boolean> {
      const rows = await db.query<{ due: boolean }>(
        `SELECT EXISTS (
           SELECT 1 FROM lead_agent_scheduled_notifications
            WHERE status = 'pending' AND scheduled_for <= $1
         ) AS due`,
        [now],
      );
      return rows[0]?.due === true;
    },

    async listDue(now: Date, limit: number): Promise<DueNotification[]> {
      // telegram_id is a bigint; cast so it arrives as an exact string.
      const rows = await db.query<DueRow>(
        `SELECT n.id, n.user_id, n.prospect_id, n.message,
                u.telegram_id::text AS telegram_id, p.business_name
           FROM lead_agent_scheduled_notifications n
           LEFT JOIN users u ON u.id = n.user_id
           LEFT JOIN lead_agent_prospects p ON p.id = n.prospect_id
          WHERE n.status = 'pending' AND n.scheduled_for <= $1
          ORDER BY n.scheduled_for ASC
          LIMIT $2`,
        [now, limit],
      );
      return rows.map((row) => ({
        id: notificationId(row.id),
        userId: userId(row.user_id),
        prospectId: prospectId(row.prospect_id),
        message: row.message,
        telegramId: row.telegram_id ?? undefined,
        businessName: row.business_name ?? undefined,
      }));
    },

    async markSent(id: NotificationId, sentAt: Date): Promise<void> {
      await db.query(
        `UPDATE lead_agent_scheduled_notifications
            SET status = 'sent', sent_at = $2
          WHERE id = $1`,
        [id, sentAt],
      );
    },

    async listPendingForUser(user: UserId): Promise<PendingNotification[]> {
      const rows = await db.query<PendingRow>(
        `SELECT n.id, n.prospect_id, p.business_name, n.message, n.scheduled_for
           FROM lead_agent_scheduled_notifications n
           LEFT JOIN lead_agent_prospects p ON p.id = n.prospect_id
          WHERE n.user_id = $1 AND n.status = 'pending'
          ORDER BY n.scheduled_for ASC`,
        [user],
      );
      return rows.map((row) => ({
        id: notificationId(row.id),
        prospectId: prospectId(row.prospect_id),
        businessName: row.business_name ?? undefined,
        message: row.message,
        scheduledFor: row.scheduled_for.toISOString(),
      }));
    },
  };
}
