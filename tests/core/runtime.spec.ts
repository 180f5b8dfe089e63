import { existsSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createRuntime, startRuntime } from '../../src/core/runtime.js';
import { FakeProbeClient, ManualClock, httpAnswer, makeConfig, makeTempDir, removeTempDir } from '../harness/fake-backend.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../../src/utils/logger.js')>();
    return { ...actual, logThought: vi.fn().mockResolvedValue(undefined) };
});

describe('router runtime', () => {
    let dir: string;
    let clock: ManualClock;

    beforeEach(async () => {
        dir = await makeTempDir();
        clock = new ManualClock();
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await removeTempDir(dir);
    });

    it('validates capabilities at startup and caches them', async () => {
        const client = new FakeProbeClient({ primary: httpAnswer(404) });
        const config = makeConfig(dir, { backgroundRefreshIntervalSeconds: 3600 });
        const runtime = createRuntime(config, { client, now: clock.now });

        const running = await startRuntime(runtime, { listen: false });

        expect(running.server).toBeNull();
        expect(client.calls).toEqual({ primary: 1, legacy: 1, models: 1 });
        expect(await runtime.cache.getCapabilities()).toEqual({
            primary_api_available: false,
            legacy_api_available: true,
            models_endpoint_available: true,
            deployment_accessible: true,
        });
        expect(runtime.events.listRecent(1)[0]?.type).toBe('capability_refresh');
        expect((await runtime.router.decideRoute()).backendType).toBe('legacy');

        await running.stop();
        expect(existsSync(config.storage.metricsFile)).toBe(true);
    });

    it('skips startup probes when the legacy backend is forced', async () => {
        const client = new FakeProbeClient();
        const runtime = createRuntime(makeConfig(dir, { forceLegacyBackend: true, backgroundRefreshIntervalSeconds: 3600 }), {
            client,
            now: clock.now,
        });

        const running = await startRuntime(runtime, { listen: false });
        const result = await runtime.dispatcher.send(client, { primary: { input: 'hi' }, legacy: { messages: [] } });
        await running.stop();

        expect(client.calls.primary).toBe(0);
        expect(result.backend).toBe('legacy');
        expect(client.sent).toEqual([{ backend: 'legacy', payload: { messages: [] } }]);
    });
});
