import type { Request, Response } from 'express';
import type { HealthData, LivenessData, MetricsData } from '../../types/api.js';
import type { DispatcherStats } from '../../interfaces/dispatcher.js';
import type { GatewayMetrics } from '../../services/gateway-metrics.js';
import type { JobSnapshot } from '../../types/scheduler.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    inbound: { stats(): DispatcherStats };
    metrics: GatewayMetrics;
    scheduler?: { listJobs(): JobSnapshot[] };
}

function uptimeSec(): number {
    return Math.floor((Date.now() - startTime) / 1000);
}

/** GET /health: Inbound pipeline status and asset counters. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const inbound = deps.inbound.stats();
        const jobs = (deps.scheduler?.listJobs() ?? []).map((job) => ({
            id: job.id,
            status: job.status,
            lastError: job.lastError,
        }));
        const cleanupFailures = deps.metrics.get('assets.cleanupFailures');

        const data: HealthData = {
            status: !inbound.accepting || cleanupFailures > 0 || jobs.some((job) => job.status === 'error')
                ? 'degraded'
                : 'ok',
            uptimeSec: uptimeSec(),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            inbound,
            assets: {
                acquired: deps.metrics.get('assets.acquired'),
                released: deps.metrics.get('assets.released'),
                cleanupFailures,
            },
            jobs,
        };

        sendOk(res, data);
    };
}

/** GET /health/live: Process is up and serving requests. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        const data: LivenessData = { status: 'alive', uptimeSec: uptimeSec() };
        sendOk(res, data);
    };
}

/** GET /metrics: Counter snapshot. */
export function handleMetrics(deps: Pick<HealthDeps, 'metrics'>) {
    return (_req: Request, res: Response): void => {
        const data: MetricsData = deps.metrics.snapshot();
        sendOk(res, data);
    };
}
