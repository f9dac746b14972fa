/**
 * Follow-up delivery. Each run sends up to `batchSize` due notifications;
 * whatever is left is picked up on the next interval.
 */
import type { CacheService } from '@/cache/cache-service.js';
import { cacheKey } from '@/cache/cache-keys.js';
import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';
import { toError } from '@/core/errors.js';
import type { UserId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskCondition } from '@/scheduling/types.js';
import type { DueNotification, NotificationRepository, ReminderSender } from './types.js';

export const LEAD_AGENT_POOL = 'lead-agent';
export const NOTIFICATION_BATCH_SIZE = 50;

/** Cache key for a user's pending follow-up list. */
export function pendingNotificationsKey(userId: UserId): string {
  return cacheKey('notifications', userId, 'pending');
}

export interface NotificationDeliveryOptions {
  notifications: NotificationRepository;
  sender: ReminderSender;
  cache: CacheService;
  logger: Logger;
  clock?: Clock;
  batchSize?: number;
}

export interface DeliverySummary {
  sent: number;
  failed: number;
  skipped: number;
}

export interface NotificationDelivery {
  hasDueNotifications: TaskCondition;
  deliverDueNotifications(): Promise<DeliverySummary>;
}

export function createNotificationDelivery(options: NotificationDeliveryOptions): NotificationDelivery {
  const {
    notifications,
    sender,
    cache,
    logger,
    clock = systemClock,
    batchSize = NOTIFICATION_BATCH_SIZE,
  } = options;

  type Outcome = keyof DeliverySummary;

  async function deliver(notification: DueNotification): Promise<Outcome> {
    if (notification.telegramId === undefined) {
      logger.warn('Notification user has no Telegram account, skipping', {
        component: 'lead-agent',
        notificationId: notification.id,
        userId: notification.userId,
      });
      return 'skipped';
    }

    const accepted = await sender.sendJournalReminder({
      telegramId: notification.telegramId,
      businessName: notification.businessName ?? 'Unknown',
      message: notification.message,
    });
    if (!accepted) return 'failed';

    await notifications.markSent(notification.id, new Date(clock.now()));
    cache.delete(LEAD_AGENT_POOL, pendingNotificationsKey(notification.userId));
    return 'sent';
  }

  return {
    async hasDueNotifications(): Promise<boolean> {
      return notifications.hasDue(new Date(clock.now()));
    },

    async deliverDueNotifications(): Promise<DeliverySummary> {
      const summary: DeliverySummary = { sent: 0, failed: 0, skipped: 0 };
      const due = await notifications.listDue(new Date(clock.now()), batchSize);
      if (due.length === 0) return summary;

      for (const notification of due) {
        try {
          summary[await deliver(notification)]++;
        } catch (error) {
          summary.failed++;
          logger.error('Notification delivery failed', {
            component: 'lead-agent',
            notificationId: notification.id,
            error: toError(error).message,
          });
        }
      }

      logger.info('Due notifications processed', { component: 'lead-agent', ...summary });
      return summary;
    },
  };
}
