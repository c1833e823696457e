import type { RoutingOutcomeType } from '../types/messaging.js';

export type MetricName =
    | `routed.${RoutingOutcomeType}`
    | 'overflow.events'
    | 'overflow.notices'
    | 'assets.acquired'
    | 'assets.released'
    | 'assets.cleanupFailures'
    | 'handler.failures'
    | 'validation.rejections'
    | 'tasks.failed'
    | 'tasks.cancelled';

export interface MetricsSnapshot {
    counters: Record<string, number>;
    startedAt: string;
}

/**
 * In-process counters for the inbound pipeline. Values are monotonic for the
 * lifetime of the process; the control plane exposes a snapshot.
 */
export class GatewayMetrics {
    readonly #counters: Map<MetricName, number> = new Map();
    readonly #startedAt = new Date().toISOString();

    increment(name: MetricName, by = 1): void {
        this.#counters.set(name, (this.#counters.get(name) ?? 0) + by);
    }

    get(name: MetricName): number {
        return this.#counters.get(name) ?? 0;
    }

    snapshot(): MetricsSnapshot {
        const counters: Record<string, number> = {};
        for (const [name, value] of [...this.#counters.entries()].sort(([a], [b]) => a.localeCompare(b))) {
            counters[name] = value;
        }
        return { counters, startedAt: this.#startedAt };
    }
}
