import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleLiveness, type HealthDeps } from './handlers/health.js';
import {
    handleCacheInvalidate,
    handleCapabilityRefresh,
    handleRoutingErrors,
    handleRoutingEvents,
    handleRoutingMetrics,
    handleRoutingReset,
    type RoutingDeps,
} from './handlers/routing.js';
import { requestLogger, sendError } from './shared.js';
import type { BackendRouter } from '../services/backend-router.js';
import type { CapabilityCache } from '../services/capability-cache.js';
import type { MetricsCollector } from '../services/metrics-collector.js';
import type { RoutingEventStore } from '../services/routing-event-store.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    router: BackendRouter;
    cache: CapabilityCache;
    metrics: MetricsCollector;
    events?: RoutingEventStore;
}

/**
 * Build the control-plane HTTP app.
 *
 * Endpoints:
 *   GET  /health                        Routing health, capabilities, cache and metrics
 *   GET  /health/live                   Liveness probe
 *   GET  /routing/metrics               Metrics summary
 *   GET  /routing/errors?hours=N        Error summary over the last N hours
 *   GET  /routing/events?limit=N        Recent routing journal entries
 *   POST /routing/capabilities/refresh  Forced capability detection
 *   POST /routing/cache/invalidate      Expire cached capabilities, clear the breaker
 *   POST /routing/reset                 Reset success rates and the breaker
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json());
    app.use(requestLogger);

    const healthDeps: HealthDeps = { router: deps.router, cache: deps.cache, metrics: deps.metrics };
    const routingDeps: RoutingDeps = {
        router: deps.router,
        cache: deps.cache,
        metrics: deps.metrics,
        events: deps.events,
    };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(healthDeps));
    app.get('/health/live', handleLiveness());

    app.get('/routing/metrics', handleRoutingMetrics(routingDeps));
    app.get('/routing/errors', handleRoutingErrors(routingDeps));
    app.get('/routing/events', handleRoutingEvents(routingDeps));
    app.post('/routing/capabilities/refresh', handleCapabilityRefresh(routingDeps));
    app.post('/routing/cache/invalidate', handleCacheInvalidate(routingDeps));
    app.post('/routing/reset', handleRoutingReset(routingDeps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Start the control-plane server; resolves once it is listening. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            console.log(`[API] Control plane listening on http://localhost:${port}`);
            void logThought(`[API] HTTP server started on port ${port}.`);
            resolve(server);
        });
    });
}
