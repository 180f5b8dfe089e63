import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RouterConfig } from '../../src/config/router-config.js';
import { BackendRouter } from '../../src/services/backend-router.js';
import { CapabilityCache } from '../../src/services/capability-cache.js';
import { CapabilityDetector } from '../../src/services/capability-detector.js';
import { MetricsCollector } from '../../src/services/metrics-collector.js';
import { CapabilityError } from '../../src/services/routing-errors.js';
import { RoutingEventStore } from '../../src/services/routing-event-store.js';
import { FakeProbeClient, ManualClock, httpAnswer, makeConfig, makeTempDir, removeTempDir } from '../harness/fake-backend.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/utils/logger.js')>();
  return { ...actual, logThought: vi.fn().mockResolvedValue(undefined) };
});

const BOTH_AVAILABLE = { primary_api_available: true, legacy_api_available: true };

describe('BackendRouter', () => {
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
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    events.close();
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  function createRouter(
    routing: Partial<RouterConfig['routing']> = {},
    extra: { detector?: ConstructorParameters<typeof BackendRouter>[0]['detector']; timer?: () => number } = {},
  ): BackendRouter {
    return new BackendRouter({
      config: makeConfig(dir, routing),
      cache,
      metrics,
      events,
      now: clock.now,
      timer: extra.timer ?? (() => 0),
      detector: extra.detector,
    });
  }

  it('routes to legacy when forced by configuration', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter({ forceLegacyBackend: true });

    const decision = await router.decideRoute({ correlationId: 'req-forced' });

    expect(decision).toEqual({
      backendType: 'legacy',
      reason: 'Legacy backend forced by configuration',
      confidence: 1,
      fallbackAvailable: false,
      estimatedSuccessRate: 0.98,
      decisionTimeMs: 0,
      cacheHit: false,
      correlationId: 'req-forced',
    });
    expect(metrics.getMetricsSummary().routingMetrics.fallbackDecisions).toBe(0);
    expect(events.listRecent(1)[0]).toMatchObject({
      type: 'decision',
      backend: 'legacy',
      detail: 'Legacy backend forced by configuration (confidence 1)',
      correlationId: 'req-forced',
    });
  });

  it('prefers the primary backend when cached capabilities allow it', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter();

    const decision = await router.decideRoute();

    expect(decision).toMatchObject({
      backendType: 'primary',
      reason: 'Primary backend available and preferred (success rate: 95.0%)',
      confidence: 0.9,
      fallbackAvailable: true,
      estimatedSuccessRate: 0.95,
      cacheHit: true,
    });
    expect(await router.shouldUsePrimaryBackend()).toBe(true);
  });

  it('detects and caches capabilities on a miss', async () => {
    const client = new FakeProbeClient({ primary: httpAnswer(404, 'Resource not found') });
    const detector = new CapabilityDetector(client, makeConfig(dir), { now: clock.now });
    const router = createRouter({}, { detector });

    const decision = await router.decideRoute({ correlationId: 'req-miss' });

    expect(decision).toMatchObject({
      backendType: 'legacy',
      reason: 'Legacy backend available (primary unavailable)',
      confidence: 0.95,
      fallbackAvailable: false,
      cacheHit: false,
    });
    expect(await cache.getCapabilities()).toEqual({
      primary_api_available: false,
      legacy_api_available: true,
      models_endpoint_available: true,
      deployment_accessible: true,
    });
    expect(events.listRecent(2).map((event) => event.type)).toEqual(['fallback', 'capability_refresh']);

    await router.decideRoute();
    expect(client.calls.primary).toBe(1);
  });

  it('shares one detection between concurrent decisions on a miss', async () => {
    const client = new FakeProbeClient();
    const detector = new CapabilityDetector(client, makeConfig(dir), { now: clock.now });
    const router = createRouter({}, { detector });

    const decisions = await Promise.all(Array.from({ length: 8 }, () => router.decideRoute()));

    expect(client.calls).toEqual({ primary: 1, legacy: 1, models: 1 });
    expect(decisions.map((decision) => decision.backendType)).toEqual(Array.from({ length: 8 }, () => 'primary'));
    expect(events.listRecent(20).filter((event) => event.type === 'capability_refresh')).toHaveLength(1);

    await router.decideRoute({ forceRefresh: true });
    expect(client.calls.primary).toBe(2);
  });

  it('treats a missing legacy flag as available', async () => {
    await cache.setCapabilities({ primary_api_available: false });
    const router = createRouter();

    expect(await router.decideRoute()).toMatchObject({
      backendType: 'legacy',
      reason: 'Legacy backend available (primary unavailable)',
      confidence: 0.95,
    });
    expect((await router.healthCheck()).status).toBe('ok');
  });

  it('uses legacy when the primary backend is not preferred', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter({ preferPrimaryBackend: false });

    const decision = await router.decideRoute();

    expect(decision).toMatchObject({
      backendType: 'legacy',
      reason: 'Legacy backend available (primary not preferred)',
      confidence: 0.95,
      fallbackAvailable: true,
    });
    expect(events.listRecent(1)[0]?.type).toBe('decision');
  });

  it('falls back to legacy as an emergency when nothing is available', async () => {
    await cache.setCapabilities({ primary_api_available: false, legacy_api_available: false });
    const router = createRouter();

    const decision = await router.decideRoute();

    expect(decision).toMatchObject({
      backendType: 'legacy',
      reason: 'Emergency fallback to legacy backend (no backend reported available)',
      confidence: 0.3,
      fallbackAvailable: false,
    });
  });

  it('assumes legacy only without a cache entry or a detector', async () => {
    const router = createRouter();

    expect(await router.decideRoute()).toMatchObject({
      backendType: 'legacy',
      reason: 'Legacy backend available (primary unavailable)',
      cacheHit: false,
    });
  });

  it('routes to legacy with low confidence when detection throws', async () => {
    const router = createRouter(
      {},
      {
        detector: {
          detectCapabilities: () => Promise.reject(new Error('probe exploded')),
          getCapabilityStatus: () => ({}),
        },
      },
    );

    const decision = await router.decideRoute();

    expect(decision).toMatchObject({
      backendType: 'legacy',
      reason: 'Capability detection failed: probe exploded',
      confidence: 0.1,
    });
  });

  it('routes away from a primary backend whose success rate dropped below the threshold', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter({ maxFailuresBeforeFallback: 100 });

    await router.recordRequestResult('primary', false, new Error('upstream exploded'));
    const decision = await router.decideRoute();

    expect(decision).toMatchObject({
      backendType: 'legacy',
      reason: 'Primary backend success rate degraded (76.0% < 80.0%)',
      confidence: 0.8,
      fallbackAvailable: true,
      estimatedSuccessRate: 0.98,
    });
    expect(metrics.getMetricsSummary().routingMetrics.fallbackDecisions).toBe(1);
  });

  it('opens the circuit after repeated failures and re-arms after the cooldown', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter({ successRateThreshold: 0 });

    for (let i = 0; i < 3; i++) {
      await router.recordRequestResult('primary', false, new Error('upstream exploded'));
    }

    expect(await router.decideRoute()).toMatchObject({
      backendType: 'legacy',
      reason: 'Primary backend in cooldown after repeated failures',
      confidence: 0.95,
    });
    expect(events.listRecent(10).find((event) => event.type === 'circuit_change')?.detail).toBe(
      'unknown -> cooldown: 3 consecutive failures: upstream exploded',
    );

    clock.advanceSeconds(600);
    await cache.setCapabilities(BOTH_AVAILABLE);
    expect((await router.decideRoute()).backendType).toBe('primary');

    await router.recordRequestResult('primary', false, new Error('upstream exploded'));
    expect((await router.decideRoute()).reason).toBe('Primary backend in cooldown after repeated failures');
  });

  it('keeps the primary backend out after a permanent unavailability signal', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter({ successRateThreshold: 0.5 });

    await router.recordRequestResult(
      'primary',
      false,
      Object.assign(new Error('Resource not found'), { status: 404 }),
      'req-gone',
    );

    expect(await cache.getCapabilities()).toEqual({ primary_api_available: false, legacy_api_available: true });
    expect(router.getRoutingStats().circuit.state).toBe('permanently_unavailable');

    clock.advanceSeconds(3600);
    await cache.setCapabilities(BOTH_AVAILABLE);
    expect(await router.decideRoute()).toMatchObject({
      backendType: 'legacy',
      reason: 'Primary backend permanently unavailable',
    });
  });

  it('warns about slow decisions', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const timer = vi.fn().mockReturnValueOnce(0).mockReturnValueOnce(75);
    const router = createRouter({}, { timer });

    const decision = await router.decideRoute();

    expect(decision.decisionTimeMs).toBe(75);
    expect(console.warn).toHaveBeenCalledWith(
      '[BackendRouter] Slow routing decision: 75.0ms (threshold 50ms, cache hit: true)',
    );
  });

  it('returns identical decisions for concurrent callers', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter();

    const decisions = await Promise.all(Array.from({ length: 20 }, () => router.decideRoute()));

    expect(new Set(decisions.map((decision) => `${decision.backendType}|${decision.reason}`)).size).toBe(1);
    expect(decisions[0]?.backendType).toBe('primary');
    expect(metrics.getMetricsSummary().routingMetrics).toMatchObject({
      totalRoutingDecisions: 20,
      cacheHitRatePercent: 100,
    });
  });

  it('previews the decision in healthCheck without recording it', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter();

    const health = await router.healthCheck();

    expect(health.status).toBe('ok');
    expect(health.decision.backendType).toBe('primary');
    expect(health.cacheAgeSeconds).toBe(0);
    expect(metrics.getMetricsSummary().routingMetrics.totalRoutingDecisions).toBe(0);
    expect(events.listRecent()).toEqual([]);
  });

  it('reports degraded health while the circuit is open', async () => {
    const router = createRouter();
    await router.markPrimaryPermanentlyUnavailable('deployment removed');

    expect((await router.healthCheck()).status).toBe('degraded');
  });

  it('records success rates and journal entries for request results', async () => {
    const router = createRouter();

    await router.recordRequestResult('legacy', true, undefined, 'req-ok');

    expect(router.getRoutingStats().successRates.legacy).toBeCloseTo(0.984, 10);
    expect(events.listRecent(1)[0]).toMatchObject({
      type: 'success',
      backend: 'legacy',
      detail: 'Request succeeded (rate 98.4%)',
      correlationId: 'req-ok',
    });
  });

  it('resets statistics and clears the circuit', async () => {
    const router = createRouter({ maxFailuresBeforeFallback: 1 });
    await router.recordRequestResult('primary', false, new Error('boom'));
    expect(router.getRoutingStats().circuit.state).toBe('cooldown');

    router.resetStatistics();

    const stats = router.getRoutingStats();
    expect(stats.successRates).toEqual({ primary: 0.95, legacy: 0.98 });
    expect(stats.circuit.state).toBe('unknown');
  });

  it('invalidates cached capabilities and forces the next decision to detect', async () => {
    const client = new FakeProbeClient();
    const detector = new CapabilityDetector(client, makeConfig(dir), { now: clock.now });
    const router = createRouter({}, { detector });
    await router.decideRoute();

    await router.invalidateCapabilities();
    expect(events.listRecent(1)[0]?.type).toBe('cache_invalidated');
    const decision = await router.decideRoute();

    expect(decision.cacheHit).toBe(false);
    expect(client.calls.primary).toBe(2);
  });

  it('refreshes capabilities through the detector', async () => {
    const detector = new CapabilityDetector(new FakeProbeClient(), makeConfig(dir), { now: clock.now });
    const router = createRouter({}, { detector });

    const capabilities = await router.refreshCapabilities();

    expect(capabilities.primary_api_available).toBe(true);
    expect(await cache.getCapabilities()).toEqual(capabilities);
    expect((await router.getCapabilityStatus()).capabilities.primary_api_available?.available).toBe(true);
  });

  it('refuses to refresh without a detector', async () => {
    await expect(createRouter().refreshCapabilities()).rejects.toBeInstanceOf(CapabilityError);
  });

  it('includes routing metrics alongside stats', async () => {
    await cache.setCapabilities(BOTH_AVAILABLE);
    const router = createRouter();
    await router.decideRoute();

    const result = router.getRoutingMetrics();

    expect(result.routing?.primaryChosen).toBe(1);
    expect(result.configuration).toEqual({
      preferPrimaryBackend: true,
      forceLegacyBackend: false,
      capabilityCacheTtlSeconds: 300,
      successRateThreshold: 0.8,
    });
  });
});
