import type { Request, Response } from 'express';
import type { HealthData, LivenessData } from '../../types/api.js';
import type { BackendRouter } from '../../services/backend-router.js';
import type { CapabilityCache } from '../../services/capability-cache.js';
import type { MetricsCollector } from '../../services/metrics-collector.js';
import { mapError, sendError, sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    router: Pick<BackendRouter, 'healthCheck' | 'getCapabilityStatus'>;
    cache: Pick<CapabilityCache, 'getCacheStatus'>;
    metrics: Pick<MetricsCollector, 'getMetricsSummary'>;
}

/** GET /health: Routing decision preview, capability state and metrics. */
export function handleHealth(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const routing = await deps.router.healthCheck();
            const capabilities = await deps.router.getCapabilityStatus();
            const cache = await deps.cache.getCacheStatus();

            const data: HealthData = {
                status: routing.status,
                uptimeSec: Math.floor((Date.now() - startTime) / 1000),
                memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
                routing,
                capabilities,
                cache,
                metrics: deps.metrics.getMetricsSummary(),
            };

            sendOk(res, data);
        } catch (err) {
            const { status, message, code } = mapError(err);
            sendError(res, message, status, code);
        }
    };
}

/** GET /health/live: Process liveness only. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        const data: LivenessData = {
            status: 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        };
        sendOk(res, data);
    };
}
