import TelegramBot from 'node-telegram-bot-api';
import type { MediaStore, Notifier } from '../types/collaborators.js';
import type { ForwardOrigin, InboundEvent, MediaRef, NoticeOptions } from '../types/messaging.js';
import { createAbortError, errorMessage, isTransientNetworkError } from '../utils/errors.js';
import { getLogger, scrubSensitiveText, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

type EventBase = Pick<InboundEvent, 'conversationId' | 'senderId' | 'eventId' | 'arrivedAt' | 'replyToEventId' | 'forward'>;

function mediaRef(fileId: string, extra: { fileName?: string; mimeType?: string; fileSize?: number }): MediaRef {
  return {
    fileId,
    fileName: extra.fileName,
    declaredMime: extra.mimeType,
    sizeBytes: extra.fileSize,
  };
}

function forwardOrigin(msg: TelegramBot.Message): ForwardOrigin | undefined {
  if (msg.forward_from) {
    const name = [msg.forward_from.first_name, msg.forward_from.last_name].filter(Boolean).join(' ');
    return { type: 'user', name, username: msg.forward_from.username };
  }
  if (msg.forward_from_chat) {
    return {
      type: msg.forward_from_chat.type === 'channel' ? 'channel' : 'chat',
      name: msg.forward_from_chat.title,
      username: msg.forward_from_chat.username,
      messageId: msg.forward_from_message_id,
    };
  }
  if (msg.forward_sender_name) {
    return { type: 'hidden_user', name: msg.forward_sender_name };
  }
  return undefined;
}

function isCommand(msg: TelegramBot.Message): boolean {
  return (msg.entities ?? []).some((entity) => entity.type === 'bot_command' && entity.offset === 0);
}

/**
 * Normalize one Telegram update into an inbound event. Returns null for
 * updates the gateway does not handle (stickers, service messages, ...).
 */
export function normalizeTelegramMessage(msg: TelegramBot.Message, now = Date.now()): InboundEvent | null {
  if (!msg.from) return null;

  const base: EventBase = {
    conversationId: String(msg.chat.id),
    senderId: String(msg.from.id),
    eventId: msg.message_id,
    arrivedAt: msg.date ? msg.date * 1000 : now,
    replyToEventId: msg.reply_to_message?.message_id,
    forward: forwardOrigin(msg),
  };
  const caption = msg.caption;

  if (msg.photo && msg.photo.length > 0) {
    // Telegram lists the sizes smallest first.
    const largest = msg.photo.reduce((best, size) => (size.width * size.height > best.width * best.height ? size : best));
    return {
      ...base,
      kind: 'photo',
      payload: { media: mediaRef(largest.file_id, { fileSize: largest.file_size, mimeType: 'image/jpeg' }), caption },
    };
  }
  if (msg.voice) {
    return {
      ...base,
      kind: 'voice',
      payload: { media: mediaRef(msg.voice.file_id, { mimeType: msg.voice.mime_type, fileSize: msg.voice.file_size }), caption },
    };
  }
  if (msg.audio) {
    return {
      ...base,
      kind: 'voice',
      payload: { media: mediaRef(msg.audio.file_id, { mimeType: msg.audio.mime_type, fileSize: msg.audio.file_size }), caption },
    };
  }
  if (msg.video) {
    return {
      ...base,
      kind: 'video',
      payload: { media: mediaRef(msg.video.file_id, { mimeType: msg.video.mime_type, fileSize: msg.video.file_size }), caption },
    };
  }
  if (msg.video_note) {
    return {
      ...base,
      kind: 'video',
      payload: { media: mediaRef(msg.video_note.file_id, { mimeType: 'video/mp4', fileSize: msg.video_note.file_size }) },
    };
  }
  if (msg.document) {
    const doc = msg.document;
    return {
      ...base,
      kind: 'document',
      payload: {
        media: mediaRef(doc.file_id, { fileName: doc.file_name, mimeType: doc.mime_type, fileSize: doc.file_size }),
        caption,
      },
    };
  }
  if (msg.contact) {
    return {
      ...base,
      kind: 'contact',
      payload: {
        phoneNumber: msg.contact.phone_number,
        firstName: msg.contact.first_name,
        lastName: msg.contact.last_name,
        userId: msg.contact.user_id === undefined ? undefined : String(msg.contact.user_id),
      },
    };
  }
  if (msg.poll) {
    return {
      ...base,
      kind: 'poll',
      payload: {
        question: msg.poll.question,
        options: msg.poll.options.map((option) => option.text),
        allowsMultipleAnswers: msg.poll.allows_multiple_answers,
      },
    };
  }
  if (typeof msg.text === 'string') {
    return { ...base, kind: isCommand(msg) ? 'command' : 'text', payload: { text: msg.text } };
  }
  return null;
}

/**
 * Telegram transport adapter.
 *
 *   - Normalizes updates into InboundEvents for the dispatcher
 *   - Sends notices and replies (Notifier)
 *   - Downloads media on demand into a caller-owned directory (MediaStore)
 */
export class TelegramHandler implements Notifier, MediaStore {
  readonly #bot: TelegramBot;
  readonly #logger: Logger;

  /**
   * @param token - Telegram Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  constructor(token: string, options: { polling?: boolean; logger?: Logger } = {}) {
    this.#bot = new TelegramBot(token, { polling: options.polling ?? true });
    this.#logger = options.logger ?? getLogger('telegram');
    this.#registerListeners();
  }

  /** Callback invoked for every normalized inbound event. */
  onEvent?: (event: InboundEvent) => void;

  // ── Private Helpers ──────────────────────────────────────────────────────────

  #registerListeners(): void {
    this.#bot.on('message', (msg) => {
      const event = normalizeTelegramMessage(msg);
      if (!event) {
        this.#logger.debug({ chatId: msg.chat.id, messageId: msg.message_id }, 'Ignoring unsupported update');
        return;
      }
      this.onEvent?.(event);
    });

    this.#bot.on('polling_error', (err) => {
      this.#logger.error({ err: scrubSensitiveText(err.message) }, 'Polling error');
    });
  }

  // ── Notifier ─────────────────────────────────────────────────────────────────

  async sendText(conversationId: string, text: string, options: NoticeOptions = {}): Promise<number | undefined> {
    const sent = await withRetry(
      () =>
        this.#bot.sendMessage(Number(conversationId), text, {
          reply_to_message_id: options.replyToEventId,
        }),
      { label: 'telegram.sendMessage', shouldRetry: isTransientNetworkError },
    );
    return sent.message_id;
  }

  // ── MediaStore ───────────────────────────────────────────────────────────────

  /**
   * The bot API cannot cancel a running download. On abort the promise
   * rejects at once; a file that still lands afterwards is left to the
   * temp sweeper.
   */
  async download(media: MediaRef, destinationDir: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw createAbortError();

    const download = this.#bot.downloadFile(media.fileId, destinationDir);
    if (!signal) return download;

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(createAbortError('Media download aborted'));
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([download, aborted]);
    } catch (err) {
      void download.catch((lateErr: unknown) => {
        this.#logger.debug({ fileId: media.fileId, err: errorMessage(lateErr) }, 'Abandoned download settled with error');
      });
      throw err;
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }

  /** The bot's own username, used to tell `/cmd@this_bot` from commands for other bots. */
  async getUsername(): Promise<string | undefined> {
    const me = await this.#bot.getMe();
    return me.username;
  }

  /** Gracefully stop the polling loop. */
  async stop(): Promise<void> {
    await this.#bot.stopPolling();
  }
}
