import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleLiveness, handleMetrics, type HealthDeps } from './handlers/health.js';
import { errorHandler, requestLogger, sendError } from './shared.js';
import { getLogger } from '../utils/logger.js';

export type ApiServerDeps = HealthDeps;

/**
 * Build the Control Plane express app.
 *
 * Endpoints:
 *   GET  /health      : Inbound pipeline health snapshot
 *   GET  /health/live : Liveness check
 *   GET  /metrics     : Gateway counters
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json());
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(deps));
    app.get('/health/live', handleLiveness());
    app.get('/metrics', handleMetrics(deps));

    app.use((req, res) => {
        sendError(res, `Route not found: ${req.method} ${req.path}`, 404);
    });
    app.use(errorHandler);

    return app;
}

/** Create and start the Control Plane HTTP API server. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
    const server = createServer(createApiApp(deps));
    const logger = getLogger('api');

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            logger.info({ port }, `Control plane listening on http://localhost:${port}`);
            resolve(server);
        });
    });
}
