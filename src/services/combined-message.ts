import type {
    CombinedMessage,
    ContentKind,
    EventOfKind,
    FlushReason,
    InboundEvent,
    ReplyContext,
} from '../types/messaging.js';

export interface CombineOptions {
    conversationId: string;
    events: readonly InboundEvent[];
    overflowCount: number;
    flushReason: FlushReason;
    flushedAt: number;
    textSeparator: string;
    resolveReplyContext?: (conversationId: string, replyToEventId: number) => ReplyContext | undefined;
}

function ofKind<K extends ContentKind>(events: readonly InboundEvent[], kind: K): EventOfKind<K>[] {
    return events.filter((event): event is EventOfKind<K> => event.kind === kind);
}

/** Text an event contributes to `combinedText`: message text, command text or a caption. */
export function textOf(event: InboundEvent): string | undefined {
    switch (event.kind) {
        case 'text':
        case 'command':
            return event.payload.text;
        case 'photo':
        case 'voice':
        case 'video':
        case 'document':
            return event.payload.caption;
        default:
            return undefined;
    }
}

/**
 * Freeze a flushed buffer into a CombinedMessage. Events keep arrival order;
 * the kind views filter the same event objects.
 */
export function buildCombinedMessage(options: CombineOptions): CombinedMessage {
    const events = Object.freeze([...options.events]);
    const first = events[0];
    if (!first) {
        throw new Error('[CombinedMessage] Cannot combine an empty buffer.');
    }

    const combinedText = events
        .map(textOf)
        .filter((text): text is string => typeof text === 'string' && text.trim().length > 0)
        .join(options.textSeparator);

    const replyToEventId = events.find((event) => event.replyToEventId !== undefined)?.replyToEventId;
    const replyContext =
        replyToEventId !== undefined
            ? options.resolveReplyContext?.(options.conversationId, replyToEventId)
            : undefined;

    const combined: CombinedMessage = {
        conversationId: options.conversationId,
        senderId: first.senderId,
        events,
        combinedText,
        images: Object.freeze(ofKind(events, 'photo')),
        voices: Object.freeze(ofKind(events, 'voice')),
        videos: Object.freeze(ofKind(events, 'video')),
        documents: Object.freeze(ofKind(events, 'document')),
        contacts: Object.freeze(ofKind(events, 'contact')),
        polls: Object.freeze(ofKind(events, 'poll')),
        commands: Object.freeze(ofKind(events, 'command')),
        overflowCount: options.overflowCount,
        replyToEventId,
        replyContext,
        flushedAt: options.flushedAt,
        flushReason: options.flushReason,
    };

    return Object.freeze(combined);
}

/** Human-readable note about the first forwarded event, if any. */
export function describeForward(combined: CombinedMessage): string | undefined {
    const forwarded = combined.events.find((event) => event.forward !== undefined);
    const origin = forwarded?.forward;
    if (!origin) return undefined;

    switch (origin.type) {
        case 'user':
            return `[Forwarded from ${origin.username ? `@${origin.username}` : origin.name ?? 'a user'}]`;
        case 'hidden_user':
            return `[Forwarded from ${origin.name ?? 'a hidden user'}]`;
        case 'channel': {
            const link =
                origin.username && origin.messageId !== undefined
                    ? ` (https://t.me/${origin.username}/${origin.messageId})`
                    : '';
            return `[Forwarded from channel ${origin.name ?? 'unknown'}${link}]`;
        }
        case 'chat':
            return `[Forwarded from chat ${origin.name ?? 'unknown'}]`;
    }
}
