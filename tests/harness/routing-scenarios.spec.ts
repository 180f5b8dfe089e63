import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackendRouter } from '../../src/services/backend-router.js';
import { CapabilityCache } from '../../src/services/capability-cache.js';
import { CapabilityDetector } from '../../src/services/capability-detector.js';
import { MetricsCollector } from '../../src/services/metrics-collector.js';
import { RequestDispatcher } from '../../src/services/request-dispatcher.js';
import { FakeProbeClient, ManualClock, START_MS, makeConfig, makeTempDir, removeTempDir } from '../harness/fake-backend.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/utils/logger.js')>();
  return { ...actual, logThought: vi.fn().mockResolvedValue(undefined) };
});

describe('routing scenarios', () => {
  let dir: string;
  let clock: ManualClock;
  let cacheFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = new ManualClock();
    cacheFile = path.join(dir, 'api_capabilities.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  async function writeCacheFile(ageSeconds: number, capabilities: Record<string, unknown>): Promise<void> {
    await writeFile(
      cacheFile,
      JSON.stringify({
        last_updated: new Date(START_MS - ageSeconds * 1_000).toISOString(),
        ttl_seconds: 300,
        capabilities,
        detection_history: [],
      }),
    );
  }

  function createStack(client: FakeProbeClient | null) {
    const config = makeConfig(dir);
    const cache = new CapabilityCache({ cacheFile, ttlSeconds: 300, now: clock.now });
    const metrics = new MetricsCollector({ metricsFile: null, now: clock.now });
    const detector = client ? new CapabilityDetector(client, config, { metrics, now: clock.now }) : null;
    const router = new BackendRouter({ config, cache, detector, metrics, now: clock.now });
    const dispatcher = new RequestDispatcher({ router, metrics });
    return { cache, metrics, router, dispatcher };
  }

  it('routes a cold start with every surface answering to the primary backend', async () => {
    const client = new FakeProbeClient();
    const { cache, dispatcher } = createStack(client);

    const result = await dispatcher.send(client, { primary: { input: 'hello' }, legacy: { messages: [] } });

    expect(result.backend).toBe('primary');
    expect(result.decision.confidence).toBe(0.9);
    expect(result.decision.cacheHit).toBe(false);
    expect((await cache.getCapabilities())?.primary_api_available).toBe(true);
  });

  it('trusts a ten-second-old cache entry that marks the primary backend unavailable', async () => {
    await writeCacheFile(10, {
      primary_api_available: false,
      legacy_api_available: true,
      responses_api_error: 'NotFoundError',
    });
    const client = new FakeProbeClient();
    const { router } = createStack(client);

    const decision = await router.decideRoute();

    expect(decision).toMatchObject({
      backendType: 'legacy',
      reason: 'Legacy backend available (primary unavailable)',
      confidence: 0.95,
      cacheHit: true,
    });
    expect(client.calls.primary).toBe(0);
  });

  it('treats an expired entry without a detector as legacy only', async () => {
    await writeCacheFile(400, { primary_api_available: true, legacy_api_available: true });
    const { router } = createStack(null);

    const decision = await router.decideRoute();

    expect(decision).toMatchObject({ backendType: 'legacy', cacheHit: false, confidence: 0.95 });
  });

  it('falls back within a request and keeps the primary backend out afterwards', async () => {
    const client = new FakeProbeClient();
    client.sendFailures.primary = Object.assign(new Error('Resource not found'), { status: 404 });
    const { cache, metrics, router, dispatcher } = createStack(client);

    const result = await dispatcher.send(client, { primary: { input: 'hello' }, legacy: { messages: [] } });

    expect(result).toMatchObject({ backend: 'legacy', fellBack: true });
    expect((await cache.getCapabilities())?.primary_api_available).toBe(false);
    expect(await router.decideRoute()).toMatchObject({
      backendType: 'legacy',
      reason: 'Primary backend permanently unavailable',
    });
    expect(metrics.getMetricsSummary().apiMetrics.primary.failedRequests).toBe(1);
  });
});
