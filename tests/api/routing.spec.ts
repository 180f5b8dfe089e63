import path from 'node:path';
import type { Express } from 'express';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApiApp } from '../../src/api/router.js';
import { BackendRouter } from '../../src/services/backend-router.js';
import { CapabilityCache } from '../../src/services/capability-cache.js';
import { CapabilityDetector } from '../../src/services/capability-detector.js';
import { MetricsCollector } from '../../src/services/metrics-collector.js';
import { RoutingEventStore } from '../../src/services/routing-event-store.js';
import { FakeProbeClient, ManualClock, httpAnswer, makeConfig, makeTempDir, removeTempDir } from '../harness/fake-backend.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../../src/utils/logger.js')>();
    return { ...actual, logThought: vi.fn().mockResolvedValue(undefined) };
});

describe('routing control endpoints', () => {
    let dir: string;
    let clock: ManualClock;
    let cache: CapabilityCache;
    let metrics: MetricsCollector;
    let events: RoutingEventStore;

    beforeEach(async () => {
        dir = await makeTempDir();
        clock = new ManualClock();
        cache = new CapabilityCache({ cacheFile: path.join(dir, 'api_capabilities.json'), ttlSeconds: 300, now: clock.now });
        metrics = new MetricsCollector({ metricsFile: null, now: clock.now });
        events = new RoutingEventStore({ dbPath: ':memory:', now: clock.now });
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        events.close();
        vi.restoreAllMocks();
        await removeTempDir(dir);
    });

    function createApp(options: { withDetector?: boolean; withEvents?: boolean } = {}): { app: Express; router: BackendRouter } {
        const config = makeConfig(dir);
        const detector = options.withDetector
            ? new CapabilityDetector(new FakeProbeClient({ primary: httpAnswer(404) }), config, { now: clock.now })
            : null;
        const router = new BackendRouter({ config, cache, detector, metrics, events, now: clock.now, timer: () => 0 });
        const app = createApiApp({ router, cache, metrics, events: options.withEvents === false ? undefined : events });
        return { app, router };
    }

    it('returns the metrics summary', async () => {
        const { app, router } = createApp();
        await cache.setCapabilities({ primary_api_available: true, legacy_api_available: true });
        await router.decideRoute();

        const response = await request(app).get('/routing/metrics');

        expect(response.status).toBe(200);
        expect(response.body.data.routingMetrics).toMatchObject({ totalRoutingDecisions: 1, primaryChosen: 1 });
    });

    it('summarises errors over a clamped window', async () => {
        const { app } = createApp();
        metrics.recordApiRequest({ backend: 'primary', success: false, responseTimeMs: 5, errorMessage: 'HTTP 429' });

        const response = await request(app).get('/routing/errors?hours=5000');

        expect(response.status).toBe(200);
        expect(response.body.data).toMatchObject({ timePeriodHours: 720, totalErrors: 1, errorTypes: { rate_limit: 1 } });
    });

    it('rejects a non-numeric error window', async () => {
        const { app } = createApp();

        const response = await request(app).get('/routing/errors?hours=abc');

        expect(response.status).toBe(400);
        expect(response.body.error).toBe('Invalid "hours" query parameter. Expected a number.');
    });

    it('lists recent routing events', async () => {
        const { app, router } = createApp();
        await router.decideRoute({ correlationId: 'req-events-1' });
        await router.decideRoute({ correlationId: 'req-events-2' });

        const response = await request(app).get('/routing/events?limit=1');

        expect(response.status).toBe(200);
        expect(response.body.data.events).toHaveLength(1);
        expect(response.body.data.events[0]).toMatchObject({ type: 'fallback', correlationId: 'req-events-2' });
    });

    it('reports a missing event journal', async () => {
        const { app } = createApp({ withEvents: false });

        const response = await request(app).get('/routing/events');

        expect(response.status).toBe(503);
    });

    it('refreshes capabilities on demand', async () => {
        const { app } = createApp({ withDetector: true });

        const response = await request(app).post('/routing/capabilities/refresh');

        expect(response.status).toBe(200);
        expect(response.body.data.capabilities).toEqual({
            primary_api_available: false,
            legacy_api_available: true,
            models_endpoint_available: true,
            deployment_accessible: true,
        });
        expect(await cache.getCapabilities()).toEqual(response.body.data.capabilities);
    });

    it('answers 503 when no detector can refresh', async () => {
        const { app } = createApp();

        const response = await request(app).post('/routing/capabilities/refresh');

        expect(response.status).toBe(503);
        expect(response.body).toMatchObject({
            ok: false,
            code: 'CAPABILITY_ERROR',
            error: 'Capability error: no capability detector configured',
        });
    });

    it('invalidates the capability cache', async () => {
        const { app } = createApp();
        await cache.setCapabilities({ primary_api_available: true });

        const response = await request(app).post('/routing/cache/invalidate');

        expect(response.status).toBe(200);
        expect(response.body.data.invalidated).toBe(true);
        expect(response.body.data.cache).toMatchObject({ fileExists: true, fileCacheValid: false });
        expect(events.listRecent(1)[0]?.type).toBe('cache_invalidated');
    });

    it('resets routing statistics', async () => {
        const { app, router } = createApp();
        await router.recordRequestResult('primary', false, new Error('upstream exploded'));

        const response = await request(app).post('/routing/reset');

        expect(response.status).toBe(200);
        expect(response.body.data.stats.successRates).toEqual({ primary: 0.95, legacy: 0.98 });
        expect(response.body.data.stats.circuit.state).toBe('unknown');
    });
});
