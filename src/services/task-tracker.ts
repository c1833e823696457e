import { randomUUID } from 'node:crypto';
import type { GatewayMetrics } from './gateway-metrics.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { errorMessage, isAbortError, throwIfAborted } from '../utils/errors.js';

export type TaskWork = (signal: AbortSignal) => Promise<unknown>;

/** Handle returned by {@link TaskTracker.spawn}. */
export interface TrackedTask {
    readonly taskId: string;
    readonly name: string;
    readonly startedAt: Date;
    /** Settles when the work finishes; never rejects. */
    readonly done: Promise<void>;
    cancel(): void;
}

export interface TrackedTaskSnapshot {
    taskId: string;
    name: string;
    startedAt: string;
    ageMs: number;
}

export interface CancelAllResult {
    total: number;
    settled: number;
    timedOut: boolean;
}

interface TaskEntry {
    task: TrackedTask;
    controller: AbortController;
}

/**
 * Registry of fire-and-forget work (persistence writes and the like) that the
 * request path does not wait on.
 *
 * Work failures are logged and counted, never rethrown to the spawner. All
 * mutation happens on the event loop, so concurrent pipelines can spawn and
 * complete tasks without extra locking.
 */
export class TaskTracker {
    readonly #tasks: Map<string, TaskEntry> = new Map();
    readonly #logger: Logger;
    readonly #metrics?: GatewayMetrics;

    constructor(options: { logger?: Logger; metrics?: GatewayMetrics } = {}) {
        this.#logger = options.logger ?? getLogger('task-tracker');
        this.#metrics = options.metrics;
    }

    spawn(name: string, work: TaskWork): TrackedTask {
        const taskId = randomUUID();
        const controller = new AbortController();
        const startedAt = new Date();

        // Work starts on a later microtask; a cancel in between means it never starts.
        const done = Promise.resolve()
            .then(() => {
                throwIfAborted(controller.signal);
                return work(controller.signal);
            })
            .then(
                () => {
                    this.#logger.debug({ taskId, name }, 'Task completed');
                },
                (err: unknown) => {
                    if (isAbortError(err) || controller.signal.aborted) {
                        this.#metrics?.increment('tasks.cancelled');
                        this.#logger.info({ taskId, name }, 'Task cancelled');
                        return;
                    }
                    this.#metrics?.increment('tasks.failed');
                    this.#logger.error({ taskId, name, err: errorMessage(err) }, 'Task failed');
                },
            )
            .finally(() => {
                this.#tasks.delete(taskId);
            });

        const task: TrackedTask = {
            taskId,
            name,
            startedAt,
            done,
            cancel: () => controller.abort(),
        };

        this.#tasks.set(taskId, { task, controller });
        this.#logger.debug({ taskId, name }, 'Tracked task created');
        return task;
    }

    activeCount(): number {
        return this.#tasks.size;
    }

    list(): TrackedTaskSnapshot[] {
        const now = Date.now();
        return [...this.#tasks.values()].map(({ task }) => ({
            taskId: task.taskId,
            name: task.name,
            startedAt: task.startedAt.toISOString(),
            ageMs: now - task.startedAt.getTime(),
        }));
    }

    /** Wait for in-flight tasks to finish on their own, up to `timeoutMs`. */
    async waitForAll(timeoutMs: number): Promise<boolean> {
        const pending = [...this.#tasks.values()].map(({ task }) => task.done);
        if (pending.length === 0) return true;
        return this.#settleWithin(pending, timeoutMs);
    }

    /**
     * Abort every tracked task and wait up to `timeoutMs` for them to settle.
     * Tasks that ignore their signal are left running once the timeout passes.
     */
    async cancelAll(timeoutMs = 5000): Promise<CancelAllResult> {
        const entries = [...this.#tasks.values()];
        if (entries.length === 0) {
            this.#logger.info('No active tasks to cancel');
            return { total: 0, settled: 0, timedOut: false };
        }

        this.#logger.info({ count: entries.length }, 'Cancelling active tasks');
        for (const { controller } of entries) {
            controller.abort();
        }

        let settled = 0;
        const tracked = entries.map(({ task }) => task.done.then(() => {
            settled += 1;
        }));
        const completed = await this.#settleWithin(tracked, timeoutMs);

        if (!completed) {
            this.#logger.warn(
                { remaining: entries.length - settled, timeoutMs },
                'Timeout waiting for tasks to cancel',
            );
        }
        return { total: entries.length, settled, timedOut: !completed };
    }

    async #settleWithin(promises: Promise<void>[], timeoutMs: number): Promise<boolean> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<false>((resolve) => {
            timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
        });
        try {
            return await Promise.race([Promise.all(promises).then(() => true as const), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}
