import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { getLogger, scrubSensitiveText } from '../utils/logger.js';

// ── Response Helpers ────────────────────────────────────────────────────────

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof Error) {
        if (err.message.includes('not initialized') || err.message.includes('shutting down')) {
            return { status: 503, message: scrubSensitiveText(err.message) };
        }
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    getLogger('api').debug({ correlationId, method: req.method, path: req.path }, 'Request');
    next();
}

/** Final express error handler; never leaks stacks to the client. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
    const { status, message } = mapError(err);
    getLogger('api').error({ correlationId: correlationIdOf(res), status, err: message }, 'Request failed');
    sendError(res, status >= 500 ? 'Internal server error.' : message, status);
}
