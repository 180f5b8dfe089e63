import type { Server } from 'node:http';
import type { RouterConfig } from '../config/router-config.js';
import { startApiServer } from '../api/router.js';
import { HttpBackendClient, type BackendProbeClient, type BackendRequestClient } from '../services/backend-client.js';
import { BackendRouter } from '../services/backend-router.js';
import { CapabilityCache } from '../services/capability-cache.js';
import { CapabilityDetector, type BackgroundRefreshHandle } from '../services/capability-detector.js';
import { CircuitBreaker } from '../services/circuit-breaker.js';
import { MetricsCollector, type PeriodicPersistenceHandle } from '../services/metrics-collector.js';
import { RequestDispatcher } from '../services/request-dispatcher.js';
import { RoutingEventStore } from '../services/routing-event-store.js';
import { SuccessRateTracker } from '../services/success-rate-tracker.js';
import { logThought } from '../utils/logger.js';

export interface RuntimeOptions {
    client?: BackendProbeClient & BackendRequestClient;
    now?: () => number;
}

export interface RouterRuntime {
    config: RouterConfig;
    client: BackendProbeClient & BackendRequestClient;
    cache: CapabilityCache;
    detector: CapabilityDetector;
    breaker: CircuitBreaker;
    tracker: SuccessRateTracker;
    metrics: MetricsCollector;
    events: RoutingEventStore;
    router: BackendRouter;
    dispatcher: RequestDispatcher;
}

/** Wire one instance of each routing service from configuration. */
export function createRuntime(config: RouterConfig, options: RuntimeOptions = {}): RouterRuntime {
    const now = options.now ?? (() => Date.now());
    const client = options.client ?? new HttpBackendClient(config.backend);
    const cache = new CapabilityCache({
        cacheFile: config.storage.capabilityCacheFile,
        ttlSeconds: config.routing.capabilityCacheTtlSeconds,
        now,
    });
    const metrics = new MetricsCollector({
        metricsFile: config.storage.metricsFile,
        maxRecentErrors: config.storage.maxRecentErrors,
        now,
    });
    const detector = new CapabilityDetector(client, config, { metrics, now });
    const breaker = CircuitBreaker.fromConfig(config, { now });
    const tracker = new SuccessRateTracker();
    const events = new RoutingEventStore({ dbPath: config.storage.routingEventsDb, now });
    const router = new BackendRouter({ config, cache, detector, breaker, tracker, metrics, events, now });
    const dispatcher = new RequestDispatcher({ router, metrics });

    return { config, client, cache, detector, breaker, tracker, metrics, events, router, dispatcher };
}

export interface RunningRuntime {
    server: Server | null;
    stop(): Promise<void>;
}

/**
 * Validate capabilities (when enabled), then start background refresh, periodic
 * metrics persistence and, with `listen`, the control-plane server.
 */
export async function startRuntime(runtime: RouterRuntime, options: { listen?: boolean } = {}): Promise<RunningRuntime> {
    const { config, cache, detector, metrics, events } = runtime;

    if (config.routing.enableStartupValidation && !config.routing.forceLegacyBackend) {
        const capabilities = await detector.validateStartupCapabilities(config.backend.probeTimeoutMs * 3);
        await cache.setCapabilities(capabilities);
        events.record({
            type: 'capability_refresh',
            backend: null,
            detail: `Startup capabilities: ${JSON.stringify(capabilities)}`,
        });
    }

    const refresh: BackgroundRefreshHandle = detector.startBackgroundRefresh({
        intervalMs: config.routing.backgroundRefreshIntervalSeconds * 1_000,
        isStale: async () => (await cache.getCapabilities()) === null,
        onRefresh: async (capabilities) => {
            await cache.setCapabilities(capabilities);
            events.record({
                type: 'capability_refresh',
                backend: null,
                detail: `Background refresh: ${JSON.stringify(capabilities)}`,
            });
        },
    });
    const persistence: PeriodicPersistenceHandle = metrics.startPeriodicPersistence(
        config.storage.metricsPersistIntervalSeconds * 1_000,
    );

    const server = options.listen === false
        ? null
        : await startApiServer(
            { router: runtime.router, cache, metrics, events },
            config.runtime.apiPort,
        );

    return {
        server,
        stop: async () => {
            await refresh.stop();
            await persistence.stop();
            await metrics.persistMetrics();
            if (server) {
                await new Promise<void>((resolve, reject) => {
                    server.close((err) => (err ? reject(err) : resolve()));
                });
            }
            events.close();
            void logThought('[Runtime] Routing services stopped.');
        },
    };
}
