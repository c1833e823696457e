import type { CombinedMessage, FlushReason, InboundEvent, ReplyContext } from '../types/messaging.js';
import { buildCombinedMessage } from './combined-message.js';
import type { GatewayMetrics } from './gateway-metrics.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface ChatBufferOptions {
    /** Quiet period after the latest event before the buffer flushes. */
    debounceMs: number;
    /** Absolute cap measured from buffer creation; bursts never extend past it. */
    maxWaitMs: number;
    /** Events retained per buffer; later arrivals are refused and counted. */
    maxCapacity: number;
    textSeparator?: string;
    now?: () => number;
    logger?: Logger;
    metrics?: GatewayMetrics;
    resolveReplyContext?: (conversationId: string, replyToEventId: number) => ReplyContext | undefined;
}

export interface FlushResult {
    combined: CombinedMessage;
}

export type FlushListener = (combined: CombinedMessage) => void;

export interface BufferStatus {
    eventCount: number;
    overflowCount: number;
    createdAt: number;
    deadline: number;
    kinds: InboundEvent['kind'][];
}

interface ConversationBuffer {
    events: InboundEvent[];
    eventIds: Set<number>;
    createdAt: number;
    overflowCount: number;
    timer: NodeJS.Timeout | null;
    deadline: number;
}

const DEFAULTS = {
    textSeparator: ' ',
};

/**
 * Per-conversation aggregation of inbound events.
 *
 * A buffer exists only after its first event and is flushed exactly once,
 * either when the debounce window closes or when the absolute cap measured
 * from creation is reached. Events past `maxCapacity` are refused, never the
 * already-buffered ones.
 */
export class ChatBufferManager {
    readonly #debounceMs: number;
    readonly #maxWaitMs: number;
    readonly #maxCapacity: number;
    readonly #textSeparator: string;
    readonly #now: () => number;
    readonly #logger: Logger;
    readonly #metrics?: GatewayMetrics;
    readonly #resolveReplyContext?: ChatBufferOptions['resolveReplyContext'];
    readonly #buffers: Map<string, ConversationBuffer> = new Map();
    #listener: FlushListener | null = null;

    constructor(options: ChatBufferOptions) {
        this.#debounceMs = Math.max(0, Math.floor(options.debounceMs));
        this.#maxWaitMs = Math.max(this.#debounceMs, Math.floor(options.maxWaitMs));
        this.#maxCapacity = Math.max(1, Math.floor(options.maxCapacity));
        this.#textSeparator = options.textSeparator ?? DEFAULTS.textSeparator;
        this.#now = options.now ?? (() => Date.now());
        this.#logger = options.logger ?? getLogger('chat-buffer');
        this.#metrics = options.metrics;
        this.#resolveReplyContext = options.resolveReplyContext;
    }

    /** Register the consumer of flushed messages. */
    onFlush(listener: FlushListener): void {
        this.#listener = listener;
    }

    /**
     * Add an event to its conversation's buffer.
     *
     * Returns a FlushResult only when this arrival itself forced a flush (the
     * absolute cap had already passed); the listener receives every flush.
     */
    onEvent(event: InboundEvent): FlushResult | undefined {
        const key = event.conversationId;
        const now = this.#now();
        let flushed: FlushResult | undefined;

        let buffer = this.#buffers.get(key);
        if (buffer && now >= buffer.createdAt + this.#maxWaitMs) {
            const combined = this.#flush(key, 'absolute_cap');
            if (combined) flushed = { combined };
            buffer = undefined;
        }

        if (!buffer) {
            buffer = {
                events: [],
                eventIds: new Set(),
                createdAt: now,
                overflowCount: 0,
                timer: null,
                deadline: now + this.#maxWaitMs,
            };
            this.#buffers.set(key, buffer);
        }

        if (buffer.eventIds.has(event.eventId)) {
            this.#logger.debug({ conversationId: key, eventId: event.eventId }, 'Duplicate event ignored');
            return flushed;
        }

        if (buffer.events.length >= this.#maxCapacity) {
            buffer.overflowCount += 1;
            this.#metrics?.increment('overflow.events');
            this.#logger.warn(
                { conversationId: key, eventId: event.eventId, maxCapacity: this.#maxCapacity, overflowCount: buffer.overflowCount },
                'Buffer at capacity, refusing event',
            );
            return flushed;
        }

        buffer.events.push(event);
        buffer.eventIds.add(event.eventId);
        this.#schedule(key, buffer, now);

        this.#logger.debug(
            { conversationId: key, eventId: event.eventId, kind: event.kind, size: buffer.events.length },
            'Event buffered',
        );
        return flushed;
    }

    /** Flush every pending buffer immediately (shutdown path). */
    flushAll(): CombinedMessage[] {
        const flushed: CombinedMessage[] = [];
        for (const key of [...this.#buffers.keys()]) {
            const combined = this.#flush(key, 'shutdown');
            if (combined) flushed.push(combined);
        }
        return flushed;
    }

    /** Drop every pending buffer without delivering it. */
    clear(): void {
        for (const buffer of this.#buffers.values()) {
            if (buffer.timer) clearTimeout(buffer.timer);
        }
        this.#buffers.clear();
    }

    getPendingCount(): number {
        return this.#buffers.size;
    }

    getBufferStatus(conversationId: string): BufferStatus | null {
        const buffer = this.#buffers.get(conversationId);
        if (!buffer) return null;
        return {
            eventCount: buffer.events.length,
            overflowCount: buffer.overflowCount,
            createdAt: buffer.createdAt,
            deadline: buffer.deadline,
            kinds: buffer.events.map((event) => event.kind),
        };
    }

    #schedule(key: string, buffer: ConversationBuffer, now: number): void {
        if (buffer.timer) clearTimeout(buffer.timer);

        const untilCap = buffer.deadline - now;
        const capped = untilCap <= this.#debounceMs;
        const delay = Math.max(0, capped ? untilCap : this.#debounceMs);

        buffer.timer = setTimeout(() => {
            buffer.timer = null;
            this.#flush(key, capped ? 'absolute_cap' : 'debounce');
        }, delay);
    }

    #flush(key: string, reason: FlushReason): CombinedMessage | undefined {
        const buffer = this.#buffers.get(key);
        if (!buffer) return undefined;

        this.#buffers.delete(key);
        if (buffer.timer) {
            clearTimeout(buffer.timer);
            buffer.timer = null;
        }

        const combined = buildCombinedMessage({
            conversationId: key,
            events: buffer.events,
            overflowCount: buffer.overflowCount,
            flushReason: reason,
            flushedAt: this.#now(),
            textSeparator: this.#textSeparator,
            resolveReplyContext: this.#resolveReplyContext,
        });

        this.#logger.info(
            {
                conversationId: key,
                reason,
                events: combined.events.length,
                overflow: combined.overflowCount,
                textLength: combined.combinedText.length,
                images: combined.images.length,
                voices: combined.voices.length,
                videos: combined.videos.length,
            },
            'Flushing conversation buffer',
        );

        if (this.#listener) {
            this.#listener(combined);
        } else {
            this.#logger.warn({ conversationId: key }, 'No flush listener registered, message dropped');
        }
        return combined;
    }
}
