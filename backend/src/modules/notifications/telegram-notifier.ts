/**
 * backend/src/modules/notifications/telegram-notifier.ts
 *
 * Sends a plain-text message to every configured chat through the Bot API.
 *
 * RULES:
 * - Chats are tried in order; the first failing one throws and the rest are skipped.
 * - No retries.
 */

import type { Notifier } from './notifier';

const DEFAULT_TELEGRAM_API_BASE = 'https://api.telegram.org';

export class TelegramNotifier implements Notifier {
  private readonly apiBase: string;

  constructor(
    private readonly opts: {
      botToken: string;
      chatIds: readonly string[];
      apiBase?: string;
    },
  ) {
    this.apiBase = opts.apiBase ?? DEFAULT_TELEGRAM_API_BASE;
  }

  async sendMessageToAll(text: string): Promise<void> {
    for (const chatId of this.opts.chatIds) {
      await this.sendMessage(chatId, text);
    }
  }

  private async sendMessage(chatId: string, text: string): Promise<void> {
    const response = await fetch(`${this.apiBase}/bot${this.opts.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Telegram sendMessage to ${chatId} failed: HTTP ${response.status} ${body}`);
    }
  }
}
