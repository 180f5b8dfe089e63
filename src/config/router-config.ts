import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';

export interface RouterConfig {
    routing: {
        preferPrimaryBackend: boolean;
        forceLegacyBackend: boolean;
        capabilityCacheTtlSeconds: number;
        successRateThreshold: number;
        maxFailuresBeforeFallback: number;
        failureResetTimeSeconds: number;
        decisionWarnThresholdMs: number;
        enableStartupValidation: boolean;
        backgroundRefreshIntervalSeconds: number;
    };
    backend: {
        endpoint: string;
        apiKey: string;
        deployment: string;
        apiVersion: string;
        primaryApiVersion: string;
        probeTimeoutMs: number;
        requestTimeoutMs: number;
    };
    storage: {
        capabilityCacheFile: string;
        metricsFile: string;
        routingEventsDb: string;
        maxRecentErrors: number;
        metricsPersistIntervalSeconds: number;
    };
    runtime: {
        apiPort: number;
    };
}

export const DEFAULT_CONFIG: RouterConfig = {
    routing: {
        preferPrimaryBackend: true,
        forceLegacyBackend: false,
        capabilityCacheTtlSeconds: 300,
        successRateThreshold: 0.8,
        maxFailuresBeforeFallback: 3,
        failureResetTimeSeconds: 600,
        decisionWarnThresholdMs: 50,
        enableStartupValidation: true,
        backgroundRefreshIntervalSeconds: 300,
    },
    backend: {
        endpoint: '',
        apiKey: '',
        deployment: '',
        apiVersion: '2024-10-21',
        primaryApiVersion: 'preview',
        probeTimeoutMs: 10_000,
        requestTimeoutMs: 60_000,
    },
    storage: {
        capabilityCacheFile: 'data/api_capabilities.json',
        metricsFile: 'data/api_metrics.json',
        routingEventsDb: 'data/routing-events.db',
        maxRecentErrors: 50,
        metricsPersistIntervalSeconds: 60,
    },
    runtime: {
        apiPort: 3100,
    },
};

export const DEFAULT_CONFIG_FILE = 'router.json';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.ROUTER_CONFIG_PATH) {
        return path.resolve(process.env.ROUTER_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

export async function readConfig(overridePath?: string): Promise<RouterConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        return applyEnvOverrides(mergeWithDefaults(JSON.parse(rawData)));
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT') return applyEnvOverrides(mergeWithDefaults({}));
        throw new Error(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
    }
}

export async function writeConfig(config: RouterConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${fsError.message}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay `loaded` onto `defaults` key by key. Fields whose type differs from the
 * default (or non-finite numbers) keep the default value.
 */
function mergeSection<T extends object>(defaults: T, loaded: unknown): T {
    const merged: T = { ...defaults };
    if (!isRecord(loaded)) return merged;

    for (const key of Object.keys(defaults) as Array<keyof T & string>) {
        const candidate = loaded[key];
        const fallback = defaults[key];
        if (typeof candidate !== typeof fallback) continue;
        if (typeof candidate === 'number' && !Number.isFinite(candidate)) continue;
        merged[key] = candidate as T[typeof key];
    }
    return merged;
}

export function mergeWithDefaults(loaded: unknown): RouterConfig {
    const record = isRecord(loaded) ? loaded : {};
    return {
        routing: mergeSection(DEFAULT_CONFIG.routing, record.routing),
        backend: mergeSection(DEFAULT_CONFIG.backend, record.backend),
        storage: mergeSection(DEFAULT_CONFIG.storage, record.storage),
        runtime: mergeSection(DEFAULT_CONFIG.runtime, record.runtime),
    };
}

// ── Environment Overrides ───────────────────────────────────────────────────

function readEnv(key: string): string | undefined {
    const value = process.env[key];
    if (value === undefined || value.trim() === '') return undefined;
    return value.trim();
}

function parseBooleanEnv(key: string): boolean | undefined {
    const value = readEnv(key)?.toLowerCase();
    if (value === undefined) return undefined;
    if (['1', 'true', 'yes', 'on'].includes(value)) return true;
    if (['0', 'false', 'no', 'off'].includes(value)) return false;
    console.warn(`[Config] Ignoring ${key}=${value}; expected a boolean.`);
    return undefined;
}

function parseIntegerEnv(key: string): number | undefined {
    const value = readEnv(key);
    if (value === undefined) return undefined;
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        console.warn(`[Config] Ignoring ${key}=${value}; expected a positive integer.`);
        return undefined;
    }
    return parsed;
}

export function applyEnvOverrides(config: RouterConfig): RouterConfig {
    const next: RouterConfig = {
        routing: { ...config.routing },
        backend: { ...config.backend },
        storage: { ...config.storage },
        runtime: { ...config.runtime },
    };

    next.backend.endpoint = readEnv('BACKEND_ENDPOINT') ?? next.backend.endpoint;
    next.backend.apiKey = readEnv('BACKEND_API_KEY') ?? next.backend.apiKey;
    next.backend.deployment = readEnv('BACKEND_DEPLOYMENT') ?? next.backend.deployment;
    next.backend.apiVersion = readEnv('BACKEND_API_VERSION') ?? next.backend.apiVersion;
    next.routing.preferPrimaryBackend = parseBooleanEnv('PREFER_PRIMARY_BACKEND') ?? next.routing.preferPrimaryBackend;
    next.routing.forceLegacyBackend = parseBooleanEnv('FORCE_LEGACY_BACKEND') ?? next.routing.forceLegacyBackend;
    next.routing.capabilityCacheTtlSeconds =
        parseIntegerEnv('CAPABILITY_CACHE_TTL_SECONDS') ?? next.routing.capabilityCacheTtlSeconds;
    next.runtime.apiPort = parseIntegerEnv('API_PORT') ?? next.runtime.apiPort;

    return next;
}

// ── Cached Accessor ─────────────────────────────────────────────────────────

let cachedConfig: RouterConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): RouterConfig {
    const configPath = getConfigPath();
    let loaded: unknown = {};
    try {
        if (existsSync(configPath)) {
            loaded = JSON.parse(readFileSync(configPath, 'utf8'));
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Config] Failed to parse JSON config at ${configPath}: ${message}`);
    }
    cachedConfig = applyEnvOverrides(mergeWithDefaults(loaded));
    return cachedConfig;
}

export function getRouterConfig(): RouterConfig {
    return cachedConfig ?? reloadConfigSync();
}
