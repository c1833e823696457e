import type { PersistenceSink } from '../types/collaborators.js';
import type { CombinedMessage, InboundEvent } from '../types/messaging.js';
import { textOf } from './combined-message.js';
import { saveInboundMessages, type GatewayDatabase, type InboundMessageInsert } from './db.js';
import { getLogger, type Logger } from '../utils/logger.js';

function toRow(event: InboundEvent, flushReason: string): InboundMessageInsert {
    let mediaFileId: string | null = null;
    let text = textOf(event) ?? null;

    switch (event.kind) {
        case 'photo':
        case 'voice':
        case 'video':
        case 'document':
            mediaFileId = event.payload.media.fileId;
            break;
        case 'contact':
            text = [event.payload.firstName, event.payload.lastName, event.payload.phoneNumber].filter(Boolean).join(' ');
            break;
        case 'poll':
            text = event.payload.question;
            break;
        default:
            break;
    }

    return {
        conversation_id: event.conversationId,
        event_id: event.eventId,
        sender_id: event.senderId,
        kind: event.kind,
        text,
        media_file_id: mediaFileId,
        reply_to_event_id: event.replyToEventId ?? null,
        arrived_at: event.arrivedAt,
        flush_reason: flushReason,
    };
}

/** Stores every event of a combined message in SQLite. Writes are idempotent per event id. */
export class MessagePersistenceService implements PersistenceSink {
    readonly #db: GatewayDatabase;
    readonly #logger: Logger;

    constructor(db: GatewayDatabase, logger?: Logger) {
        this.#db = db;
        this.#logger = logger ?? getLogger('persistence');
    }

    async persist(combined: CombinedMessage): Promise<void> {
        const rows = combined.events.map((event) => toRow(event, combined.flushReason));
        const inserted = saveInboundMessages(this.#db, rows);
        this.#logger.debug(
            { conversationId: combined.conversationId, events: rows.length, inserted },
            'Persisted combined message',
        );
    }
}
