import { afterEach, describe, it, expect, vi } from 'vitest';
import { TelegramNotifier } from '../../../src/modules/notifications/telegram-notifier';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('TelegramNotifier', () => {
  it('sends the text to every chat', async () => {
    const fetchMock = vi.fn(() => Promise.resolve(new Response('{"ok":true}', { status: 200 })));
    vi.stubGlobal('fetch', fetchMock);

    const notifier = new TelegramNotifier({
      botToken: 'test-token',
      chatIds: ['-100', '-200'],
      apiBase: 'https://telegram.example.test',
    });

    await notifier.sendMessageToAll('hello');

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock).toHaveBeenNthCalledWith(1, 'https://telegram.example.test/bottest-token/sendMessage', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"chat_id":"-100","text":"hello"}',
    });
    expect(fetchMock).toHaveBeenNthCalledWith(2, 'https://telegram.example.test/bottest-token/sendMessage', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"chat_id":"-200","text":"hello"}',
    });
  });

  it('throws when the Bot API refuses', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() => Promise.resolve(new Response('{"ok":false}', { status: 400 }))),
    );

    const notifier = new TelegramNotifier({ botToken: 'test-token', chatIds: ['-100'] });

    await expect(notifier.sendMessageToAll('hello')).rejects.toThrow(
      'Telegram sendMessage to -100 failed: HTTP 400 {"ok":false}',
    );
  });
});
