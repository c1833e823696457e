import type { JobSnapshot } from './scheduler.js';

// ── Envelope ────────────────────────────────────────────────────────────────

/** Standard response wrapper for every control-plane endpoint. */
export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    inbound: {
        accepting: boolean;
        pendingBuffers: number;
        activeConversations: number;
        activeTasks: number;
    };
    assets: {
        acquired: number;
        released: number;
        cleanupFailures: number;
    };
    jobs: Pick<JobSnapshot, 'id' | 'status' | 'lastError'>[];
}

export interface LivenessData {
    status: 'alive';
    uptimeSec: number;
}

export interface MetricsData {
    startedAt: string;
    counters: Record<string, number>;
}
