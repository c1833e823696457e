import cron, { type ScheduledTask } from 'node-cron';
import type { JobConfig, JobSnapshot, JobStatus } from '../types/scheduler.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

/** Internal bookkeeping for a registered job. */
interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}

/**
 * Named repeating background jobs on top of `node-cron`, with error isolation
 * and runtime inspection. A job never overlaps itself: a tick that arrives
 * while the previous run is still going is skipped.
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #logger: Logger;

    constructor(logger?: Logger) {
        this.#logger = logger ?? getLogger('scheduler');
    }

    /** Register a new repeating job. Throws if the ID is taken or the expression is invalid. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            lastRunAt: null,
            lastError: null,
        };
        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    startAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#startJob(entry);
        }
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            if (entry.task) {
                entry.task.stop();
                entry.task = null;
                entry.status = 'stopped';
            }
        }
    }

    /** Run a job's handler now, outside its schedule. */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#executeJob(entry);
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, () => {
            if (entry.status === 'running') {
                this.#logger.warn({ jobId: entry.config.id }, 'Previous run still in progress, skipping tick');
                return;
            }
            void this.#executeJob(entry);
        });
        entry.status = 'idle';
    }

    /** Never rejects; failures are recorded on the entry. */
    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        entry.status = 'running';
        entry.lastRunAt = new Date();
        this.#logger.debug({ jobId: config.id }, 'Executing job');

        try {
            await config.handler();
            entry.status = entry.task ? 'idle' : 'stopped';
            entry.lastError = null;
        } catch (err: unknown) {
            const message = errorMessage(err);
            entry.status = 'error';
            entry.lastError = message;
            this.#logger.error({ jobId: config.id, err: message }, 'Job failed');
        }
    }
}
