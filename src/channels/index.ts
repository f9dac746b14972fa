// Outbound channels
export { createTelegramNotifier, escapeHtml, formatJournalReminder } from './telegram.js';
export type { TelegramNotifier, TelegramNotifierOptions } from './telegram.js';
