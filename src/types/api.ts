import type { RouterCapabilityStatus, RouterHealth } from '../services/backend-router.js';
import type { MetricsSummary } from './metrics.js';
import type { CapabilityCacheStatus, CapabilityMap, RoutingEventSnapshot, RoutingStats } from './routing.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    code?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    routing: RouterHealth;
    capabilities: RouterCapabilityStatus;
    cache: CapabilityCacheStatus;
    metrics: MetricsSummary;
}

export interface LivenessData {
    status: 'ok';
    uptimeSec: number;
}

// ── Routing control ─────────────────────────────────────────────────────────

export interface RoutingEventsData {
    events: RoutingEventSnapshot[];
}

export interface CapabilityRefreshData {
    capabilities: CapabilityMap;
}

export interface CacheInvalidateData {
    invalidated: true;
    cache: CapabilityCacheStatus;
}

export interface RoutingResetData {
    reset: true;
    stats: RoutingStats;
}
