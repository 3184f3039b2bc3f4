import { describe, it, expect, vi } from 'vitest';
import {
  formatUnsuspendedMessage,
  registerUnsuspensionSubscriber,
} from '../../../src/modules/notifications/unsuspension.subscriber';
import type { MemberUnsuspendedEvent } from '../../../src/shared/messaging/events';
import { InMemEventBus } from '../../../src/shared/messaging/inmem-event-bus';
import { logger } from '../../../src/shared/logger/logger';
import { RecordingNotifier } from '../../helpers/recording-fakes';

function event(telegramUsername: string | null): MemberUnsuspendedEvent {
  return {
    type: 'member.unsuspended',
    requestId: 'req-2',
    member: { id: 3, fullName: 'Ada Lovelace', telegramUsername },
    paidUntil: '2024-07-01',
  };
}

describe('formatUnsuspendedMessage', () => {
  it('names the member, the handle and the new paid-until date', () => {
    expect(formatUnsuspendedMessage(event('ada'))).toBe(
      'Member #3 (Ada Lovelace @ada) is back with us! Paid until 2024-07-01.',
    );
  });

  it('omits the handle when the member has none', () => {
    expect(formatUnsuspendedMessage(event(null))).toBe(
      'Member #3 (Ada Lovelace) is back with us! Paid until 2024-07-01.',
    );
  });
});

describe('unsuspension subscriber', () => {
  it('sends the message to the chats', async () => {
    const bus = new InMemEventBus();
    const notifier = new RecordingNotifier();
    registerUnsuspensionSubscriber(bus, { notifier, logger });

    await bus.publish(event(null));

    expect(notifier.messages).toEqual(['Member #3 (Ada Lovelace) is back with us! Paid until 2024-07-01.']);
  });

  it('logs a warning and carries on when sending fails', async () => {
    const bus = new InMemEventBus();
    const notifier = new RecordingNotifier();
    notifier.failWith('chat not found');
    registerUnsuspensionSubscriber(bus, { notifier, logger });

    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => logger);

    await expect(bus.publish(event(null))).resolves.toEqual({ warnings: [] });
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ msg: 'notifications.unsuspended_failed', message: 'chat not found' }),
    );
  });
});
