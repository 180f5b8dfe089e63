import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { BackendRoutingError, type BackendErrorCode } from '../services/routing-errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

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
export function sendError(res: Response, message: string, status = 400, code?: string): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        code,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_CODE: Record<BackendErrorCode, number> = {
    AUTHENTICATION_FAILED: 502,
    DEPLOYMENT_NOT_FOUND: 502,
    QUOTA_EXCEEDED: 503,
    FEATURE_NOT_ENABLED: 502,
    CAPABILITY_ERROR: 503,
    TIMEOUT: 504,
    BACKEND_ERROR: 502,
    BACKENDS_EXHAUSTED: 502,
};

/**
 * Map a caught error to a status code and message. Upstream failures are gateway
 * errors from the caller's point of view, never a 401/404 of this API.
 */
export function mapError(err: unknown): { status: number; message: string; code?: string } {
    if (err instanceof BackendRoutingError) {
        return { status: STATUS_BY_CODE[err.code], message: scrubSensitiveText(err.message), code: err.code };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const headerId = req.headers['x-correlation-id'];
    const correlationId = typeof headerId === 'string' && /^[\w-]{8,64}$/.test(headerId) ? headerId : randomUUID();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);
    console.log(`[API] [${correlationId}] ${req.method} ${req.path}`);
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
