/**
 * Telegram notifier — outbound messages via the Bot API `sendMessage` method.
 *
 * Only sending is supported; the mini-app receives no updates through here.
 * A rejected message resolves `false`; transport errors propagate.
 */
import { z } from 'zod';
import type { Logger } from '@/observability/logger.js';
import type { ReminderSender } from '@/apps/workforce-accelerator/lead-agent/types.js';

// ─── Config ─────────────────────────────────────────────────────

export interface TelegramNotifierOptions {
  /** Bot token; when absent every send is skipped and resolves `false`. */
  botToken?: string;
  logger: Logger;
  /** Defaults to the global fetch. */
  fetchFn?: typeof fetch;
  apiBaseUrl?: string;
}

export interface TelegramNotifier extends ReminderSender {
  /** Send HTML-formatted text to a chat. */
  sendMessage(chatId: string, html: string): Promise<boolean>;
}

// ─── Telegram API Types ─────────────────────────────────────────

const sendResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

// ─── Formatting ─────────────────────────────────────────────────

/** Escape text for Telegram's HTML parse mode. */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatJournalReminder(businessName: string, message: string): string {
  return [
    '<b>Follow-up Reminder</b>',
    '',
    escapeHtml(message),
    '',
    `<i>Lead: ${escapeHtml(businessName)}</i>`,
  ].join('\n');
}

// ─── Factory ────────────────────────────────────────────────────

export function createTelegramNotifier(options: TelegramNotifierOptions): TelegramNotifier {
  const {
    botToken,
    logger,
    fetchFn = fetch,
    apiBaseUrl = 'https://api.telegram.org',
  } = options;

  async function sendMessage(chatId: string, html: string): Promise<boolean> {
    if (!botToken) {
      logger.warn('Telegram bot token not configured, message skipped', {
        component: 'telegram',
        chatId,
      });
      return false;
    }

    const response = await fetchFn(`${apiBaseUrl}/bot${botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text: html, parse_mode: 'HTML' }),
    });

    const parsed = sendResponseSchema.safeParse(await response.json());
    if (response.ok && parsed.success && parsed.data.ok) {
      return true;
    }

    logger.warn('Telegram rejected message', {
      component: 'telegram',
      chatId,
      status: response.status,
      description: parsed.success ? parsed.data.description : undefined,
    });
    return false;
  }

  return {
    sendMessage,

    sendJournalReminder({ telegramId, businessName, message }): Promise<boolean> {
      return sendMessage(telegramId, formatJournalReminder(businessName, message));
    },
  };
}
