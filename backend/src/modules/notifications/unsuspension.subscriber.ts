/**
 * backend/src/modules/notifications/unsuspension.subscriber.ts
 *
 * Announces a lifted suspension to the hackerspace chats.
 * Best effort: a failure is logged at warn and otherwise ignored.
 */

import type { Logger } from '../../shared/logger/logger';
import type { EventBus, HandlerOutcome, MemberUnsuspendedEvent } from '../../shared/messaging/events';
import { NO_WARNINGS } from '../../shared/messaging/events';
import { telegramHandleSuffix } from '../members';

import type { Notifier } from './notifier';

export function formatUnsuspendedMessage(event: MemberUnsuspendedEvent): string {
  const { member } = event;
  const tg = telegramHandleSuffix(member.telegramUsername);

  return `Member #${member.id} (${member.fullName}${tg}) is back with us! Paid until ${event.paidUntil ?? 'never'}.`;
}

export function createUnsuspensionHandler(deps: { notifier: Notifier; logger: Logger }) {
  return async (event: MemberUnsuspendedEvent): Promise<HandlerOutcome> => {
    const text = formatUnsuspendedMessage(event);

    try {
      await deps.notifier.sendMessageToAll(text);
    } catch (err: unknown) {
      deps.logger.warn({
        msg: 'notifications.unsuspended_failed',
        flow: 'notifications.unsuspended',
        requestId: event.requestId,
        memberId: event.member.id,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    return NO_WARNINGS;
  };
}

export function registerUnsuspensionSubscriber(
  bus: EventBus,
  deps: Parameters<typeof createUnsuspensionHandler>[0],
) {
  bus.subscribe('member.unsuspended', createUnsuspensionHandler(deps));
}
