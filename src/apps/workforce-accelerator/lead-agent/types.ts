import type { NotificationId, ProspectId, UserId } from '@/core/types.js';

// ─── Scheduled Notifications ────────────────────────────────────

/** A pending follow-up whose `scheduled_for` has passed, joined with what delivery needs. */
export interface DueNotification {
  id: NotificationId;
  userId: UserId;
  prospectId: ProspectId;
  message: string;
  /** Absent when the user row no longer exists. */
  telegramId?: string;
  /** Absent when the prospect row no longer exists. */
  businessName?: string;
}

/** A user's upcoming follow-up, as listed in the mini-app. */
export interface PendingNotification {
  id: NotificationId;
  prospectId: ProspectId;
  businessName?: string;
  message: string;
  scheduledFor: string;
}

export interface NotificationRepository {
  /** True when at least one pending notification is due at `now`. */
  hasDue(now: Date): Promise<boolean>;
  /** Up to `limit` due notifications, oldest schedule first. */
  listDue(now: Date, limit: number): Promise<DueNotification[]>;
  /** Mark one notification delivered. */
  markSent(id: NotificationId, sentAt: Date): Promise<void>;
  /** Every pending notification for a user, soonest first. */
  listPendingForUser(userId: UserId): Promise<PendingNotification[]>;
}

// ─── Delivery ───────────────────────────────────────────────────

/** Outbound chat transport. Resolves `false` when the message was not accepted. */
export interface ReminderSender {
  sendJournalReminder(params: {
    telegramId: string;
    businessName: string;
    message: string;
  }): Promise<boolean>;
}
