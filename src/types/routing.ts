export type BackendType = 'primary' | 'legacy';

export const BACKEND_TYPES: readonly BackendType[] = ['primary', 'legacy'];

export type CapabilityName =
  | 'primary_api_available'
  | 'legacy_api_available'
  | 'models_endpoint_available'
  | 'deployment_accessible';

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'primary_api_available',
  'legacy_api_available',
  'models_endpoint_available',
  'deployment_accessible',
];

/** Capability verdicts keyed by name. Entries absent from the map are unknown. */
export type CapabilityMap = Partial<Record<string, boolean>>;

/** Only the legacy backend is assumed reachable. */
export const CONSERVATIVE_CAPABILITIES: Readonly<Record<CapabilityName, boolean>> = {
  primary_api_available: false,
  legacy_api_available: true,
  models_endpoint_available: false,
  deployment_accessible: true,
};

export interface CapabilityRecord {
  available: boolean;
  lastChecked: Date;
  errorMessage: string | null;
  responseTimeMs: number | null;
  errorKind: ProbeErrorKind | null;
}

export interface CapabilityStatusEntry {
  available: boolean;
  lastChecked: string;
  errorMessage: string | null;
  errorKind: ProbeErrorKind | null;
  responseTimeMs: number | null;
  cacheAgeSeconds: number;
}

export type ProbeErrorKind = 'authentication' | 'quota' | 'timeout' | 'capability';

export type ProbeOutcome =
  | { status: 'available'; httpStatus: number; responseTimeMs: number }
  | { status: 'unavailable'; httpStatus: number | null; responseTimeMs: number; reason: string }
  | { status: 'error'; kind: ProbeErrorKind; httpStatus: number | null; responseTimeMs: number; reason: string };

// ── Cache ───────────────────────────────────────────────────────────────────

export interface DetectionHistoryItem {
  timestamp: string;
  capabilities: Record<string, boolean>;
}

/** Persisted capability cache document. */
export interface CapabilityCacheEntry {
  last_updated: string;
  ttl_seconds: number;
  capabilities: Record<string, boolean>;
  detection_history: DetectionHistoryItem[];
}

export type CacheReadSource = 'file' | 'memory';

export interface CapabilityCacheStatus {
  cacheFile: string;
  fileExists: boolean;
  fileSizeBytes: number | null;
  fileModified: string | null;
  fileCacheValid: boolean | null;
  fileLastUpdated: string | null;
  fileTtlSeconds: number | null;
  fileError: string | null;
  memoryCacheActive: boolean;
  memoryCacheValid: boolean | null;
  memoryLastUpdated: string | null;
  memoryTtlSeconds: number | null;
  defaultTtlSeconds: number;
}

// ── Decisions ───────────────────────────────────────────────────────────────

export interface RoutingDecision {
  backendType: BackendType;
  reason: string;
  /** 0..1 */
  confidence: number;
  fallbackAvailable: boolean;
  /** 0..1 */
  estimatedSuccessRate: number;
  decisionTimeMs: number;
  cacheHit: boolean;
  correlationId: string;
}

export interface DecideRouteOptions {
  forceRefresh?: boolean;
  correlationId?: string;
}

export interface SuccessRateSnapshot {
  totalRequests: number;
  successfulRequests: number;
  successRate: number;
  observedRate: number;
}

export type CircuitState = 'unknown' | 'available' | 'cooldown' | 'permanently_unavailable';

export interface CircuitSnapshot {
  state: CircuitState;
  failureCount: number;
  lastCheckAt: string | null;
  cooldownUntil: string | null;
  cooldownRemainingMs: number;
  reason: string | null;
}

export interface RoutingStats {
  successRates: Record<BackendType, number>;
  requestHistory: Record<BackendType, SuccessRateSnapshot>;
  circuit: CircuitSnapshot;
  configuration: {
    preferPrimaryBackend: boolean;
    forceLegacyBackend: boolean;
    capabilityCacheTtlSeconds: number;
    successRateThreshold: number;
  };
}

// ── Event journal ───────────────────────────────────────────────────────────

export type RoutingEventType =
  | 'decision'
  | 'fallback'
  | 'failure'
  | 'success'
  | 'circuit_change'
  | 'capability_refresh'
  | 'cache_invalidated';

export interface RoutingEventSnapshot {
  id: string;
  type: RoutingEventType;
  backend: BackendType | null;
  detail: string;
  correlationId: string | null;
  createdAt: string;
}
