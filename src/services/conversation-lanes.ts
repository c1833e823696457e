import { getLogger, type Logger } from '../utils/logger.js';

interface Lane {
    tail: Promise<void>;
    depth: number;
}

/**
 * One serial lane per conversation. Work for the same conversation runs
 * strictly in submission order; different conversations run concurrently.
 * A lane is dropped as soon as its last queued job settles.
 */
export class ConversationLanes {
    readonly #lanes: Map<string, Lane> = new Map();
    readonly #logger: Logger;

    constructor(logger?: Logger) {
        this.#logger = logger ?? getLogger('conversation-lanes');
    }

    /**
     * Queue `job` behind everything already queued for `conversationId`.
     * The returned promise settles with the job's own result.
     */
    run<T>(conversationId: string, job: () => Promise<T>): Promise<T> {
        const lane = this.#lanes.get(conversationId) ?? { tail: Promise.resolve(), depth: 0 };
        lane.depth += 1;
        this.#lanes.set(conversationId, lane);

        if (lane.depth > 1) {
            this.#logger.debug({ conversationId, depth: lane.depth }, 'Waiting for conversation lane');
        }

        const result = lane.tail.then(job);
        lane.tail = result.then(
            () => this.#release(conversationId, lane),
            () => this.#release(conversationId, lane),
        );
        return result;
    }

    isBusy(conversationId: string): boolean {
        return this.#lanes.has(conversationId);
    }

    activeCount(): number {
        return this.#lanes.size;
    }

    /** Resolves once every lane queued so far has drained. */
    async idle(): Promise<void> {
        while (this.#lanes.size > 0) {
            await Promise.all([...this.#lanes.values()].map((lane) => lane.tail));
        }
    }

    #release(conversationId: string, lane: Lane): void {
        lane.depth -= 1;
        if (lane.depth === 0 && this.#lanes.get(conversationId) === lane) {
            this.#lanes.delete(conversationId);
        }
    }
}
