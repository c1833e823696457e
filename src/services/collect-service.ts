import type { CollectModeProvider } from '../types/collaborators.js';
import type { CombinedMessage } from '../types/messaging.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface CollectServiceOptions {
    triggerKeywords: string[];
    /** Messages kept per session; later ones are refused. */
    maxItems?: number;
    /** Sessions older than this are discarded on next access. */
    sessionTimeoutMs?: number;
    now?: () => number;
    logger?: Logger;
}

export interface CollectSessionStatus {
    active: boolean;
    startedBy: string;
    itemCount: number;
    startedAt: number;
    ageMs: number;
    /** Count of queued events per content kind. */
    summary: Record<string, number>;
}

interface CollectSession {
    senderId: string;
    startedAt: number;
    items: CombinedMessage[];
}

const DEFAULTS = {
    maxItems: 50,
    sessionTimeoutMs: 60 * 60 * 1000,
};

/**
 * In-process collect mode: while a session is open, combined messages are
 * queued instead of routed, until a trigger keyword releases them.
 */
export class CollectService implements CollectModeProvider {
    readonly #triggerKeywords: string[];
    readonly #maxItems: number;
    readonly #sessionTimeoutMs: number;
    readonly #now: () => number;
    readonly #logger: Logger;
    readonly #sessions: Map<string, CollectSession> = new Map();

    constructor(options: CollectServiceOptions) {
        this.#triggerKeywords = options.triggerKeywords
            .map((keyword) => keyword.trim().toLowerCase())
            .filter(Boolean);
        this.#maxItems = options.maxItems ?? DEFAULTS.maxItems;
        this.#sessionTimeoutMs = options.sessionTimeoutMs ?? DEFAULTS.sessionTimeoutMs;
        this.#now = options.now ?? (() => Date.now());
        this.#logger = options.logger ?? getLogger('collect');
    }

    async start(conversationId: string, senderId: string): Promise<CollectSessionStatus> {
        const session: CollectSession = { senderId, startedAt: this.#now(), items: [] };
        this.#sessions.set(conversationId, session);
        this.#logger.info({ conversationId }, 'Collect session started');
        return this.#describe(session);
    }

    /** Close the session and discard anything queued. Returns the discarded count. */
    async stop(conversationId: string): Promise<number> {
        const session = this.#active(conversationId);
        this.#sessions.delete(conversationId);
        const discarded = session?.items.length ?? 0;
        if (session) {
            this.#logger.info({ conversationId, discarded }, 'Collect session stopped');
        }
        return discarded;
    }

    async status(conversationId: string): Promise<CollectSessionStatus | null> {
        const session = this.#active(conversationId);
        return session ? this.#describe(session) : null;
    }

    async isCollecting(conversationId: string): Promise<boolean> {
        return this.#active(conversationId) !== undefined;
    }

    /** Case-insensitive substring match against the configured trigger keywords. */
    matchesTrigger(text: string): boolean {
        const lowered = text.toLowerCase().trim();
        if (!lowered) return false;
        return this.#triggerKeywords.some((keyword) => lowered.includes(keyword));
    }

    /** Remove the first occurrence of each trigger keyword, case-insensitively. */
    stripTriggers(text: string): string {
        let result = text;
        for (const keyword of this.#triggerKeywords) {
            const index = result.toLowerCase().indexOf(keyword);
            if (index !== -1) {
                result = result.slice(0, index) + result.slice(index + keyword.length);
            }
        }
        return result.replace(/[ \t]{2,}/g, ' ').trim();
    }

    async enqueue(conversationId: string, combined: CombinedMessage): Promise<void> {
        const session = this.#active(conversationId);
        if (!session) {
            throw new Error(`[Collect] No active collect session for conversation ${conversationId}.`);
        }
        if (session.items.length >= this.#maxItems) {
            this.#logger.warn({ conversationId, maxItems: this.#maxItems }, 'Collect session full, message not queued');
            return;
        }
        session.items.push(combined);
        this.#logger.debug({ conversationId, items: session.items.length }, 'Message queued for collect session');
    }

    /** Release the queue and end the session. */
    async drainAndTrigger(conversationId: string): Promise<CombinedMessage[]> {
        const session = this.#active(conversationId);
        this.#sessions.delete(conversationId);
        const drained = session?.items ?? [];
        this.#logger.info({ conversationId, drained: drained.length }, 'Collect session triggered');
        return drained;
    }

    #active(conversationId: string): CollectSession | undefined {
        const session = this.#sessions.get(conversationId);
        if (!session) return undefined;
        if (this.#now() - session.startedAt > this.#sessionTimeoutMs) {
            this.#sessions.delete(conversationId);
            this.#logger.info({ conversationId }, 'Collect session expired');
            return undefined;
        }
        return session;
    }

    #describe(session: CollectSession): CollectSessionStatus {
        const summary: Record<string, number> = {};
        for (const item of session.items) {
            for (const event of item.events) {
                summary[event.kind] = (summary[event.kind] ?? 0) + 1;
            }
        }
        return {
            active: true,
            startedBy: session.senderId,
            itemCount: session.items.length,
            startedAt: session.startedAt,
            ageMs: this.#now() - session.startedAt,
            summary,
        };
    }
}
