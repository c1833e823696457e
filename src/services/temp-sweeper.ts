import { readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import type { JobScheduler } from './job-scheduler.js';
import type { GatewayMetrics } from './gateway-metrics.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface TempSweeperOptions {
    tempDir: string;
    maxAgeMs: number;
    cronExpression: string;
    now?: () => number;
    logger?: Logger;
    metrics?: GatewayMetrics;
}

export interface SweepResult {
    scanned: number;
    removed: number;
    failed: number;
}

export const TEMP_SWEEP_JOB_ID = 'media-temp-sweep';

/**
 * Removes leftovers under the media temp directory that are older than
 * `maxAgeMs`. Normal operation leaves nothing behind; this catches files
 * orphaned by a crash or a hard kill mid-download.
 */
export class TempSweeper {
    readonly #tempDir: string;
    readonly #maxAgeMs: number;
    readonly #cronExpression: string;
    readonly #now: () => number;
    readonly #logger: Logger;
    readonly #metrics?: GatewayMetrics;

    constructor(options: TempSweeperOptions) {
        this.#tempDir = path.resolve(options.tempDir);
        this.#maxAgeMs = options.maxAgeMs;
        this.#cronExpression = options.cronExpression;
        this.#now = options.now ?? (() => Date.now());
        this.#logger = options.logger ?? getLogger('temp-sweeper');
        this.#metrics = options.metrics;
    }

    register(scheduler: JobScheduler): void {
        scheduler.register({
            id: TEMP_SWEEP_JOB_ID,
            cronExpression: this.#cronExpression,
            description: 'Remove orphaned media temp files',
            handler: async () => {
                await this.sweep();
            },
        });
    }

    async sweep(): Promise<SweepResult> {
        let entries: string[];
        try {
            entries = await readdir(this.#tempDir);
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
                return { scanned: 0, removed: 0, failed: 0 };
            }
            throw err;
        }

        const cutoff = this.#now() - this.#maxAgeMs;
        const result: SweepResult = { scanned: entries.length, removed: 0, failed: 0 };

        for (const name of entries) {
            const target = path.join(this.#tempDir, name);
            try {
                const info = await stat(target);
                if (info.mtimeMs > cutoff) continue;
                await rm(target, { recursive: true, force: true });
                result.removed += 1;
            } catch (err) {
                result.failed += 1;
                this.#metrics?.increment('assets.cleanupFailures');
                this.#logger.warn({ target, err: errorMessage(err) }, 'Failed to sweep temp entry');
            }
        }

        if (result.removed > 0 || result.failed > 0) {
            this.#logger.info({ ...result }, 'Temp directory swept');
        }
        return result;
    }
}
