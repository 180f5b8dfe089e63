import type { Request, Response } from 'express';
import type {
    CacheInvalidateData,
    CapabilityRefreshData,
    RoutingEventsData,
    RoutingResetData,
} from '../../types/api.js';
import type { BackendRouter } from '../../services/backend-router.js';
import type { CapabilityCache } from '../../services/capability-cache.js';
import type { MetricsCollector } from '../../services/metrics-collector.js';
import type { RoutingEventStore } from '../../services/routing-event-store.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface RoutingDeps {
    router: Pick<BackendRouter, 'refreshCapabilities' | 'invalidateCapabilities' | 'resetStatistics' | 'getRoutingStats'>;
    cache: Pick<CapabilityCache, 'getCacheStatus'>;
    metrics: Pick<MetricsCollector, 'getMetricsSummary' | 'getErrorSummary'>;
    events?: Pick<RoutingEventStore, 'listRecent'>;
}

const DEFAULT_ERROR_WINDOW_HOURS = 24;
const MAX_ERROR_WINDOW_HOURS = 720;
const DEFAULT_EVENT_LIMIT = 50;
const MAX_EVENT_LIMIT = 120;

/** Parse an optional positive numeric query value; `null` means present but invalid. */
function readNumberQuery(value: unknown, fallback: number, max: number): number | null {
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value.trim() === '') return null;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) return null;
    return Math.min(max, Math.max(1, Math.floor(parsed)));
}

/** GET /routing/metrics */
export function handleRoutingMetrics(deps: RoutingDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.metrics.getMetricsSummary());
    };
}

/** GET /routing/errors?hours=N */
export function handleRoutingErrors(deps: RoutingDeps) {
    return (req: Request, res: Response): void => {
        const hours = readNumberQuery(req.query.hours, DEFAULT_ERROR_WINDOW_HOURS, MAX_ERROR_WINDOW_HOURS);
        if (hours === null) {
            sendError(res, 'Invalid "hours" query parameter. Expected a number.', 400);
            return;
        }
        sendOk(res, deps.metrics.getErrorSummary(hours));
    };
}

/** GET /routing/events?limit=N */
export function handleRoutingEvents(deps: RoutingDeps) {
    return (req: Request, res: Response): void => {
        if (!deps.events) {
            sendError(res, 'Routing event journal not initialized.', 503);
            return;
        }
        const limit = readNumberQuery(req.query.limit, DEFAULT_EVENT_LIMIT, MAX_EVENT_LIMIT);
        if (limit === null) {
            sendError(res, 'Invalid "limit" query parameter. Expected a number.', 400);
            return;
        }
        const data: RoutingEventsData = { events: deps.events.listRecent(limit) };
        sendOk(res, data);
    };
}

/** POST /routing/capabilities/refresh */
export function handleCapabilityRefresh(deps: RoutingDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const data: CapabilityRefreshData = { capabilities: await deps.router.refreshCapabilities() };
            void logThought(`[API] Capability refresh requested: ${JSON.stringify(data.capabilities)}`);
            sendOk(res, data);
        } catch (err) {
            const { status, message, code } = mapError(err);
            sendError(res, message, status, code);
        }
    };
}

/** POST /routing/cache/invalidate */
export function handleCacheInvalidate(deps: RoutingDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            await deps.router.invalidateCapabilities();
            const data: CacheInvalidateData = { invalidated: true, cache: await deps.cache.getCacheStatus() };
            sendOk(res, data);
        } catch (err) {
            const { status, message, code } = mapError(err);
            sendError(res, message, status, code);
        }
    };
}

/** POST /routing/reset */
export function handleRoutingReset(deps: RoutingDeps) {
    return (_req: Request, res: Response): void => {
        deps.router.resetStatistics();
        void logThought('[API] Routing statistics reset via control plane.');
        const data: RoutingResetData = { reset: true, stats: deps.router.getRoutingStats() };
        sendOk(res, data);
    };
}
