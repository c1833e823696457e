import { vi } from 'vitest';
import { buildCombinedMessage } from '../../src/services/combined-message.js';
import type {
    CombinedMessage,
    EventOfKind,
    InboundEvent,
    MediaRef,
} from '../../src/types/messaging.js';

let nextEventId = 1;

export function resetEventIds(): void {
    nextEventId = 1;
}

interface EventOverrides {
    conversationId?: string;
    senderId?: string;
    eventId?: number;
    arrivedAt?: number;
    replyToEventId?: number;
}

function base(overrides: EventOverrides) {
    return {
        conversationId: overrides.conversationId ?? 'chat-1',
        senderId: overrides.senderId ?? 'user-1',
        eventId: overrides.eventId ?? nextEventId++,
        arrivedAt: overrides.arrivedAt ?? 0,
        replyToEventId: overrides.replyToEventId,
    };
}

export function textEvent(text: string, overrides: EventOverrides = {}): EventOfKind<'text'> {
    return { ...base(overrides), kind: 'text', payload: { text } };
}

export function commandEvent(text: string, overrides: EventOverrides = {}): EventOfKind<'command'> {
    return { ...base(overrides), kind: 'command', payload: { text } };
}

export function photoEvent(media: Partial<MediaRef> = {}, caption?: string, overrides: EventOverrides = {}): EventOfKind<'photo'> {
    return { ...base(overrides), kind: 'photo', payload: { media: { fileId: 'photo-file', ...media }, caption } };
}

export function voiceEvent(media: Partial<MediaRef> = {}, overrides: EventOverrides = {}): EventOfKind<'voice'> {
    return { ...base(overrides), kind: 'voice', payload: { media: { fileId: 'voice-file', ...media } } };
}

export function videoEvent(media: Partial<MediaRef> = {}, caption?: string, overrides: EventOverrides = {}): EventOfKind<'video'> {
    return { ...base(overrides), kind: 'video', payload: { media: { fileId: 'video-file', ...media }, caption } };
}

export function documentEvent(media: Partial<MediaRef> = {}, caption?: string, overrides: EventOverrides = {}): EventOfKind<'document'> {
    return { ...base(overrides), kind: 'document', payload: { media: { fileId: 'doc-file', ...media }, caption } };
}

export function contactEvent(overrides: EventOverrides = {}): EventOfKind<'contact'> {
    return {
        ...base(overrides),
        kind: 'contact',
        payload: { phoneNumber: '+10000000000', firstName: 'Ada', lastName: 'Lovelace' },
    };
}

export function pollEvent(overrides: EventOverrides = {}): EventOfKind<'poll'> {
    return {
        ...base(overrides),
        kind: 'poll',
        payload: { question: 'Lunch?', options: ['Pizza', 'Salad'], allowsMultipleAnswers: false },
    };
}

export function combine(events: InboundEvent[], overflowCount = 0): CombinedMessage {
    const first = events[0];
    return buildCombinedMessage({
        conversationId: first?.conversationId ?? 'chat-1',
        events,
        overflowCount,
        flushReason: 'debounce',
        flushedAt: 0,
        textSeparator: ' ',
    });
}

/** Notifier double that records every outbound text. */
export function createNotifier() {
    let nextMessageId = 1000;
    const sent: { conversationId: string; text: string }[] = [];
    const sendText = vi.fn(async (conversationId: string, text: string) => {
        sent.push({ conversationId, text });
        return nextMessageId++;
    });
    return { sent, sendText };
}

export function deferred<T = void>() {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
