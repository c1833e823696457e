import { describe, expect, it } from 'vitest';
import type TelegramBot from 'node-telegram-bot-api';
import { normalizeTelegramMessage } from '../../src/interfaces/telegram_handler.js';

function message(extra: Partial<TelegramBot.Message>): TelegramBot.Message {
  return {
    message_id: 42,
    date: 1_700_000_000,
    chat: { id: -100123, type: 'group' },
    from: { id: 7, is_bot: false, first_name: 'Test' },
    ...extra,
  };
}

describe('normalizeTelegramMessage', () => {
  it('maps plain text with its reply target', () => {
    const event = normalizeTelegramMessage(
      message({ text: 'hello', reply_to_message: message({ message_id: 40, text: 'earlier' }) }),
    );

    expect(event).toEqual({
      conversationId: '-100123',
      senderId: '7',
      eventId: 42,
      arrivedAt: 1_700_000_000_000,
      replyToEventId: 40,
      forward: undefined,
      kind: 'text',
      payload: { text: 'hello' },
    });
  });

  it('marks text that starts with a bot command entity as a command', () => {
    const event = normalizeTelegramMessage(
      message({ text: '/collect start', entities: [{ type: 'bot_command', offset: 0, length: 8 }] }),
    );

    expect(event?.kind).toBe('command');
  });

  it('picks the largest photo size and keeps the caption', () => {
    const event = normalizeTelegramMessage(
      message({
        caption: 'look',
        photo: [
          { file_id: 'small', file_unique_id: 's', width: 90, height: 90 },
          { file_id: 'large', file_unique_id: 'l', width: 1280, height: 960, file_size: 2048 },
          { file_id: 'medium', file_unique_id: 'm', width: 320, height: 240 },
        ],
      }),
    );

    expect(event).toMatchObject({
      kind: 'photo',
      payload: { media: { fileId: 'large', declaredMime: 'image/jpeg', sizeBytes: 2048 }, caption: 'look' },
    });
  });

  it('maps voice notes and documents with their declared metadata', () => {
    const voice = normalizeTelegramMessage(
      message({ voice: { file_id: 'v1', file_unique_id: 'v', duration: 3, mime_type: 'audio/ogg' } }),
    );
    const document = normalizeTelegramMessage(
      message({ document: { file_id: 'd1', file_unique_id: 'd', file_name: 'notes.txt', mime_type: 'text/plain' } }),
    );

    expect(voice).toMatchObject({ kind: 'voice', payload: { media: { fileId: 'v1', declaredMime: 'audio/ogg' } } });
    expect(document).toMatchObject({
      kind: 'document',
      payload: { media: { fileId: 'd1', fileName: 'notes.txt', declaredMime: 'text/plain' } },
    });
  });

  it('records where a channel post was forwarded from', () => {
    const event = normalizeTelegramMessage(
      message({
        text: 'news',
        forward_from_chat: { id: -1001, type: 'channel', title: 'Daily', username: 'daily' },
        forward_from_message_id: 9,
      }),
    );

    expect(event?.forward).toEqual({ type: 'channel', name: 'Daily', username: 'daily', messageId: 9 });
  });

  it('ignores updates without a sender or supported content', () => {
    expect(normalizeTelegramMessage(message({ from: undefined, text: 'anonymous' }))).toBeNull();
    expect(normalizeTelegramMessage(message({}))).toBeNull();
  });
});
