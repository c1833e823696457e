import type { ReplyContext } from '../types/messaging.js';
import { getLogger, type Logger } from '../utils/logger.js';

export type TrackedMessageKind = 'agent_response' | 'user_text' | 'image';

export interface TrackMessageInput {
    conversationId: string;
    eventId: number;
    kind: TrackedMessageKind;
    originalText?: string;
    responseText?: string;
}

interface TrackedEntry extends TrackMessageInput {
    createdAt: number;
}

export interface ReplyContextStats {
    size: number;
    maxSize: number;
    ttlMs: number;
}

const DEFAULTS = {
    maxSize: 1000,
    ttlMs: 24 * 60 * 60 * 1000,
};

const SUMMARY_CHARS = 100;
const RESPONSE_CHARS = 500;

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

function summarize(entry: TrackMessageInput): string {
    switch (entry.kind) {
        case 'agent_response':
            return `[Previous response to: ${entry.originalText ? truncate(entry.originalText, SUMMARY_CHARS) : 'unknown'}]`;
        case 'image':
            return `[Image${entry.originalText ? `: ${truncate(entry.originalText, SUMMARY_CHARS)}` : ''}]`;
        case 'user_text':
            return `[User message: ${entry.originalText ? truncate(entry.originalText, SUMMARY_CHARS) : 'unknown'}]`;
    }
}

/** Prefix `message` with what the user is replying to. */
export function buildReplyPrompt(context: ReplyContext, message: string): string {
    const lines = ['[Replying to previous message]', context.summary];
    if (context.responseText) {
        lines.push(`Previous reply: ${truncate(context.responseText, RESPONSE_CHARS)}`);
    }
    lines.push('', message);
    return lines.join('\n');
}

/**
 * Remembers recent messages so a later reply can be resolved to what it
 * replies to. Bounded LRU with a TTL; evicts least recently used entries.
 */
export class ReplyContextService {
    readonly #entries: Map<string, TrackedEntry> = new Map();
    readonly #maxSize: number;
    readonly #ttlMs: number;
    readonly #now: () => number;
    readonly #logger: Logger;

    constructor(options: { maxSize?: number; ttlMs?: number; now?: () => number; logger?: Logger } = {}) {
        this.#maxSize = Math.max(1, options.maxSize ?? DEFAULTS.maxSize);
        this.#ttlMs = options.ttlMs ?? DEFAULTS.ttlMs;
        this.#now = options.now ?? (() => Date.now());
        this.#logger = options.logger ?? getLogger('reply-context');
    }

    track(input: TrackMessageInput): void {
        const key = this.#key(input.conversationId, input.eventId);
        this.#entries.delete(key);
        this.#entries.set(key, { ...input, createdAt: this.#now() });

        while (this.#entries.size > this.#maxSize) {
            const oldest = this.#entries.keys().next();
            if (oldest.done) break;
            this.#entries.delete(oldest.value);
        }
    }

    resolve(conversationId: string, eventId: number): ReplyContext | undefined {
        const key = this.#key(conversationId, eventId);
        const entry = this.#entries.get(key);
        if (!entry) return undefined;

        if (this.#now() - entry.createdAt > this.#ttlMs) {
            this.#entries.delete(key);
            return undefined;
        }

        // Refresh recency.
        this.#entries.delete(key);
        this.#entries.set(key, entry);

        return {
            eventId: entry.eventId,
            conversationId: entry.conversationId,
            summary: summarize(entry),
            originalText: entry.originalText,
            responseText: entry.responseText,
        };
    }

    cleanupExpired(): number {
        const now = this.#now();
        let removed = 0;
        for (const [key, entry] of this.#entries) {
            if (now - entry.createdAt > this.#ttlMs) {
                this.#entries.delete(key);
                removed += 1;
            }
        }
        if (removed > 0) {
            this.#logger.debug({ removed }, 'Expired reply contexts removed');
        }
        return removed;
    }

    stats(): ReplyContextStats {
        return { size: this.#entries.size, maxSize: this.#maxSize, ttlMs: this.#ttlMs };
    }

    #key(conversationId: string, eventId: number): string {
        return `${conversationId}:${eventId}`;
    }
}
