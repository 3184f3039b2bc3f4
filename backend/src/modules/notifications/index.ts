/**
 * backend/src/modules/notifications/index.ts
 */

export { LogNotifier, type Notifier } from './notifier';
export { TelegramNotifier } from './telegram-notifier';
export { formatUnsuspendedMessage, registerUnsuspensionSubscriber } from './unsuspension.subscriber';
