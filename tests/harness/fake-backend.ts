import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, type RouterConfig } from '../../src/config/router-config.js';
import type { BackendProbeClient, BackendRequestClient, ProbeHttpResponse } from '../../src/services/backend-client.js';
import type { BackendType } from '../../src/types/routing.js';

export const START_MS = Date.parse('2026-01-01T00:00:00.000Z');

/** Settable clock for TTL and cooldown tests. */
export class ManualClock {
    public ms: number;

    constructor(startMs = START_MS) {
        this.ms = startMs;
    }

    public readonly now = (): number => this.ms;

    public advanceSeconds(seconds: number): void {
        this.ms += seconds * 1000;
    }
}

export type ProbeScript = ProbeHttpResponse | Error;

export function httpAnswer(status: number, bodyText = '{}'): ProbeHttpResponse {
    return { status, bodyText };
}

/** Probe and request client that answers from a script and counts calls. */
export class FakeProbeClient implements BackendProbeClient, BackendRequestClient {
    public readonly calls = { primary: 0, legacy: 0, models: 0 };
    public readonly sent: Array<{ backend: BackendType; payload: Record<string, unknown> }> = [];
    public sendFailures: Partial<Record<BackendType, Error>> = {};
    public script: { primary: ProbeScript; legacy: ProbeScript; models: ProbeScript };

    constructor(script: Partial<FakeProbeClient['script']> = {}) {
        this.script = {
            primary: script.primary ?? httpAnswer(200),
            legacy: script.legacy ?? httpAnswer(200),
            models: script.models ?? httpAnswer(200),
        };
    }

    public async probePrimary(): Promise<ProbeHttpResponse> {
        this.calls.primary += 1;
        return answer(this.script.primary);
    }

    public async probeLegacy(): Promise<ProbeHttpResponse> {
        this.calls.legacy += 1;
        return answer(this.script.legacy);
    }

    public async probeModels(): Promise<ProbeHttpResponse> {
        this.calls.models += 1;
        return answer(this.script.models);
    }

    public async send(backend: BackendType, payload: Record<string, unknown>): Promise<unknown> {
        this.sent.push({ backend, payload });
        const failure = this.sendFailures[backend];
        if (failure) throw failure;
        return { backend, echo: payload };
    }
}

async function answer(script: ProbeScript): Promise<ProbeHttpResponse> {
    if (script instanceof Error) throw script;
    return script;
}

export async function makeTempDir(): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), 'capability-router-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export function makeConfig(dir: string, routing: Partial<RouterConfig['routing']> = {}): RouterConfig {
    return {
        routing: { ...DEFAULT_CONFIG.routing, ...routing },
        backend: {
            ...DEFAULT_CONFIG.backend,
            endpoint: 'https://backend.test',
            apiKey: 'test-secret',
            deployment: 'test-deployment',
        },
        storage: {
            ...DEFAULT_CONFIG.storage,
            capabilityCacheFile: path.join(dir, 'api_capabilities.json'),
            metricsFile: path.join(dir, 'api_metrics.json'),
            routingEventsDb: ':memory:',
        },
        runtime: { ...DEFAULT_CONFIG.runtime },
    };
}
