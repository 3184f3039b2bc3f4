/**
 * backend/src/modules/notifications/notifier.ts
 *
 * WHY:
 * - Subscribers talk to a Notifier, not to Telegram. Without a bot token
 *   di.ts binds LogNotifier so dev stays quiet.
 */

import type { Logger } from '../../shared/logger/logger';

export interface Notifier {
  sendMessageToAll(text: string): Promise<void>;
}

export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  sendMessageToAll(text: string): Promise<void> {
    this.logger.info('notifications.message', { flow: 'notifications.log', text });
    return Promise.resolve();
  }
}
