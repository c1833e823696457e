import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import { TEMP_SWEEP_JOB_ID, TempSweeper } from '../../src/services/temp-sweeper.js';

describe('JobScheduler', () => {
    let scheduler: JobScheduler;

    beforeEach(() => {
        scheduler = new JobScheduler();
    });

    afterEach(() => {
        scheduler.stopAll();
    });

    it('registers jobs and lists their state', () => {
        scheduler.register({ id: 'a', cronExpression: '*/5 * * * *', description: 'A', handler: () => undefined, autoStart: false });

        expect(scheduler.listJobs()).toEqual([
            { id: 'a', cronExpression: '*/5 * * * *', description: 'A', status: 'idle', lastRunAt: null, lastError: null },
        ]);
    });

    it('rejects duplicate ids and invalid expressions', () => {
        scheduler.register({ id: 'a', cronExpression: '* * * * *', description: 'A', handler: () => undefined, autoStart: false });

        expect(() =>
            scheduler.register({ id: 'a', cronExpression: '* * * * *', description: 'A', handler: () => undefined }),
        ).toThrow("[JobScheduler] Job 'a' is already registered.");
        expect(() =>
            scheduler.register({ id: 'b', cronExpression: 'every minute', description: 'B', handler: () => undefined }),
        ).toThrow("[JobScheduler] Invalid cron expression for job 'b': every minute");
    });

    it('records failures without rejecting', async () => {
        scheduler.register({
            id: 'broken',
            cronExpression: '* * * * *',
            description: 'Broken',
            handler: async () => {
                throw new Error('disk full');
            },
            autoStart: false,
        });

        await scheduler.runNow('broken');

        expect(scheduler.getJob('broken')).toMatchObject({ status: 'error', lastError: 'disk full' });
    });

    it('marks a successful manual run of an unscheduled job as stopped', async () => {
        const handler = vi.fn();
        scheduler.register({ id: 'manual', cronExpression: '* * * * *', description: 'Manual', handler, autoStart: false });

        await scheduler.runNow('manual');

        expect(handler).toHaveBeenCalledTimes(1);
        expect(scheduler.getJob('manual')?.status).toBe('stopped');
        expect(scheduler.getJob('manual')?.lastRunAt).toBeInstanceOf(Date);
    });

    it('stops and unregisters scheduled jobs', () => {
        scheduler.register({ id: 'live', cronExpression: '0 0 1 1 *', description: 'Live', handler: () => undefined });

        scheduler.stopAll();
        expect(scheduler.getJob('live')?.status).toBe('stopped');
        expect(scheduler.unregister('live')).toBe(true);
        expect(scheduler.unregister('live')).toBe(false);
    });

    it('refuses to run an unknown job', async () => {
        await expect(scheduler.runNow('missing')).rejects.toThrow("[JobScheduler] Job 'missing' is not registered.");
    });
});

describe('TempSweeper', () => {
    let root: string;
    let tempDir: string;

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'temp-sweeper-test-'));
        tempDir = path.join(root, 'media');
        await mkdir(tempDir);
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('removes entries older than the maximum age and keeps fresh ones', async () => {
        const stale = path.join(tempDir, 'stale-asset');
        const fresh = path.join(tempDir, 'fresh-asset');
        await mkdir(stale);
        await writeFile(path.join(stale, 'photo.jpg'), 'old');
        await mkdir(fresh);
        const longAgo = new Date(Date.now() - 2 * 60 * 60 * 1000);
        await utimes(stale, longAgo, longAgo);

        const sweeper = new TempSweeper({ tempDir, maxAgeMs: 60 * 60 * 1000, cronExpression: '0 * * * *' });
        const result = await sweeper.sweep();

        expect(result).toEqual({ scanned: 2, removed: 1, failed: 0 });
        expect(existsSync(stale)).toBe(false);
        expect(existsSync(fresh)).toBe(true);
    });

    it('treats a missing temp directory as empty', async () => {
        const sweeper = new TempSweeper({ tempDir: path.join(root, 'absent'), maxAgeMs: 0, cronExpression: '0 * * * *' });

        expect(await sweeper.sweep()).toEqual({ scanned: 0, removed: 0, failed: 0 });
    });

    it('registers itself as a scheduled job', async () => {
        const scheduler = new JobScheduler();
        const sweeper = new TempSweeper({ tempDir, maxAgeMs: 0, cronExpression: '0 * * * *', now: () => Date.now() + 1000 });
        await writeFile(path.join(tempDir, 'orphan.bin'), 'x');

        sweeper.register(scheduler);
        await scheduler.runNow(TEMP_SWEEP_JOB_ID);
        scheduler.stopAll();

        expect(scheduler.getJob(TEMP_SWEEP_JOB_ID)).toMatchObject({
            description: 'Remove orphaned media temp files',
            status: 'stopped',
            lastError: null,
        });
        expect(existsSync(path.join(tempDir, 'orphan.bin'))).toBe(false);
    });
});
