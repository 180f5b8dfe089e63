import type { RouterConfig } from '../config/router-config.js';
import type { RoutingMetrics } from '../types/metrics.js';
import {
  CONSERVATIVE_CAPABILITIES,
  type BackendType,
  type CacheReadSource,
  type CapabilityMap,
  type CapabilityStatusEntry,
  type CircuitSnapshot,
  type DecideRouteOptions,
  type RoutingDecision,
  type RoutingStats,
} from '../types/routing.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import type { CapabilityCache } from './capability-cache.js';
import type { CapabilityDetector } from './capability-detector.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { MetricsCollector } from './metrics-collector.js';
import type { RoutingEventStore } from './routing-event-store.js';
import {
  CapabilityError,
  classifyBackendError,
  createCorrelationId,
  isPermanentUnavailability,
} from './routing-errors.js';
import { SuccessRateTracker } from './success-rate-tracker.js';

type RouteVerdict = Pick<
  RoutingDecision,
  'backendType' | 'reason' | 'confidence' | 'fallbackAvailable' | 'estimatedSuccessRate'
>;

export interface BackendRouterDeps {
  config: RouterConfig;
  cache: CapabilityCache;
  detector?: Pick<CapabilityDetector, 'detectCapabilities' | 'getCapabilityStatus'> | null;
  breaker?: CircuitBreaker;
  tracker?: SuccessRateTracker;
  metrics?: Pick<MetricsCollector, 'recordRoutingDecision' | 'getMetricsSummary'> | null;
  events?: Pick<RoutingEventStore, 'record'> | null;
  now?: () => number;
  /** Monotonic clock used to time decisions. */
  timer?: () => number;
}

export interface RouterHealth {
  status: 'ok' | 'degraded';
  timestamp: string;
  decision: RoutingDecision;
  stats: RoutingStats;
  cacheAgeSeconds: number | null;
}

export interface RouterCapabilityStatus {
  capabilities: Record<string, CapabilityStatusEntry>;
  cacheAgeSeconds: number | null;
  cacheSource: CacheReadSource | null;
  circuit: CircuitSnapshot;
}

export const ROUTE_CONFIDENCE = {
  forcedLegacy: 1.0,
  primaryPreferred: 0.9,
  degradedPrimary: 0.8,
  legacyAvailable: 0.95,
  circuitOpen: 0.95,
  emergency: 0.3,
  detectionFailed: 0.1,
} as const;

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function messageOf(error: unknown): string {
  return scrubSensitiveText(error instanceof Error ? error.message : String(error));
}

/**
 * Chooses the backend for each request from configuration, the primary circuit
 * breaker, cached capabilities and smoothed success rates. `decideRoute` never
 * throws; every failure path degrades to the legacy backend.
 */
export class BackendRouter {
  private readonly config: RouterConfig['routing'];
  private readonly cache: CapabilityCache;
  private readonly detector: BackendRouterDeps['detector'];
  private readonly breaker: CircuitBreaker;
  private readonly tracker: SuccessRateTracker;
  private readonly metrics: BackendRouterDeps['metrics'];
  private readonly events: BackendRouterDeps['events'];
  private readonly nowFn: () => number;
  private readonly timer: () => number;
  private pendingDetection: Promise<CapabilityMap> | null = null;

  constructor(deps: BackendRouterDeps) {
    this.config = deps.config.routing;
    this.cache = deps.cache;
    this.detector = deps.detector ?? null;
    this.nowFn = deps.now ?? (() => Date.now());
    this.timer = deps.timer ?? (() => performance.now());
    this.breaker = deps.breaker ?? CircuitBreaker.fromConfig(deps.config, { now: this.nowFn });
    this.tracker = deps.tracker ?? new SuccessRateTracker();
    this.metrics = deps.metrics ?? null;
    this.events = deps.events ?? null;

    this.breaker.onTransition((from, to, reason) => {
      this.events?.record({ type: 'circuit_change', backend: 'primary', detail: `${from} -> ${to}: ${reason}` });
    });
  }

  public async decideRoute(options: DecideRouteOptions = {}): Promise<RoutingDecision> {
    const decision = await this.computeDecision(options);

    this.metrics?.recordRoutingDecision({
      chosenBackend: decision.backendType,
      routingTimeMs: decision.decisionTimeMs,
      cacheHit: decision.cacheHit,
      fallbackUsed: this.isFallback(decision),
      reason: decision.reason,
    });
    this.events?.record({
      type: this.isFallback(decision) ? 'fallback' : 'decision',
      backend: decision.backendType,
      detail: `${decision.reason} (confidence ${decision.confidence})`,
      correlationId: decision.correlationId,
    });

    return decision;
  }

  public async shouldUsePrimaryBackend(correlationId?: string): Promise<boolean> {
    const decision = await this.decideRoute({ correlationId });
    return decision.backendType === 'primary';
  }

  /**
   * Feed a request outcome back into routing. Primary outcomes drive the circuit
   * breaker; a not-found or feature-disabled failure marks primary permanently
   * unavailable and records that in the capability cache.
   */
  public async recordRequestResult(
    backend: BackendType,
    success: boolean,
    error?: unknown,
    correlationId?: string,
  ): Promise<void> {
    const rate = this.tracker.record(backend, success);
    const classified = error === undefined ? null : classifyBackendError(error, { backend, correlationId });

    if (backend === 'primary') {
      if (success) {
        this.breaker.recordSuccess();
      } else if (classified && isPermanentUnavailability(classified)) {
        await this.markPrimaryPermanentlyUnavailable(classified.message);
      } else {
        this.breaker.recordFailure(classified?.message ?? 'request failed');
      }
    }

    this.events?.record({
      type: success ? 'success' : 'failure',
      backend,
      detail: success
        ? `Request succeeded (rate ${percent(rate)})`
        : `Request failed: ${classified ? `${classified.code} ${classified.message}` : 'unknown error'}`,
      correlationId: correlationId ?? classified?.correlationId ?? null,
    });
  }

  public async markPrimaryPermanentlyUnavailable(reason: string): Promise<void> {
    this.breaker.markPermanentlyUnavailable(reason);
    const current = (await this.cache.getCapabilities()) ?? { ...CONSERVATIVE_CAPABILITIES };
    await this.cache.setCapabilities({ ...current, primary_api_available: false });
    void logThought(`[BackendRouter] Primary backend marked permanently unavailable: ${scrubSensitiveText(reason)}`);
  }

  public getRoutingStats(): RoutingStats {
    return {
      successRates: { primary: this.tracker.getRate('primary'), legacy: this.tracker.getRate('legacy') },
      requestHistory: this.tracker.snapshot(),
      circuit: this.breaker.snapshot(),
      configuration: {
        preferPrimaryBackend: this.config.preferPrimaryBackend,
        forceLegacyBackend: this.config.forceLegacyBackend,
        capabilityCacheTtlSeconds: this.config.capabilityCacheTtlSeconds,
        successRateThreshold: this.config.successRateThreshold,
      },
    };
  }

  public getRoutingMetrics(): RoutingStats & { routing: RoutingMetrics | null } {
    return { ...this.getRoutingStats(), routing: this.metrics?.getMetricsSummary().routingMetrics ?? null };
  }

  public resetStatistics(): void {
    this.tracker.reset();
    this.breaker.clear();
    console.log('[BackendRouter] Routing statistics reset.');
  }

  public async invalidateCapabilities(): Promise<void> {
    await this.cache.invalidateCache();
    this.breaker.clear();
    this.events?.record({ type: 'cache_invalidated', backend: null, detail: 'Capability cache invalidated' });
  }

  /** Forced detection and cache write; requires a detector. */
  public async refreshCapabilities(): Promise<CapabilityMap> {
    if (!this.detector) {
      throw new CapabilityError('no capability detector configured');
    }
    const capabilities = await this.detector.detectCapabilities(true);
    await this.cache.setCapabilities(capabilities);
    this.events?.record({
      type: 'capability_refresh',
      backend: null,
      detail: `Capabilities refreshed: ${JSON.stringify(capabilities)}`,
    });
    return capabilities;
  }

  /** Decision preview without recording metrics or journal entries. */
  public async healthCheck(): Promise<RouterHealth> {
    const decision = await this.computeDecision({});
    const stats = this.getRoutingStats();
    const blocked = stats.circuit.state === 'cooldown' || stats.circuit.state === 'permanently_unavailable';
    return {
      status: blocked || decision.confidence < 0.5 ? 'degraded' : 'ok',
      timestamp: new Date(this.nowFn()).toISOString(),
      decision,
      stats,
      cacheAgeSeconds: await this.cache.getCacheAgeSeconds(),
    };
  }

  public async getCapabilityStatus(): Promise<RouterCapabilityStatus> {
    return {
      capabilities: this.detector?.getCapabilityStatus() ?? {},
      cacheAgeSeconds: await this.cache.getCacheAgeSeconds(),
      cacheSource: this.cache.getLastReadSource(),
      circuit: this.breaker.snapshot(),
    };
  }

  private async computeDecision(options: DecideRouteOptions): Promise<RoutingDecision> {
    const started = this.timer();
    const correlationId = options.correlationId ?? createCorrelationId();
    const legacyRate = this.tracker.getRate('legacy');
    let cacheHit = false;
    let verdict: RouteVerdict;

    if (this.config.forceLegacyBackend) {
      verdict = {
        backendType: 'legacy',
        reason: 'Legacy backend forced by configuration',
        confidence: ROUTE_CONFIDENCE.forcedLegacy,
        fallbackAvailable: false,
        estimatedSuccessRate: legacyRate,
      };
    } else if (this.breaker.isBlocked()) {
      const state = this.breaker.getState();
      verdict = {
        backendType: 'legacy',
        reason:
          state === 'cooldown'
            ? 'Primary backend in cooldown after repeated failures'
            : 'Primary backend permanently unavailable',
        confidence: ROUTE_CONFIDENCE.circuitOpen,
        fallbackAvailable: false,
        estimatedSuccessRate: legacyRate,
      };
    } else {
      try {
        const fetched = await this.fetchCapabilities(options.forceRefresh ?? false, correlationId);
        cacheHit = fetched.cacheHit;
        verdict = this.verdictFor(fetched.capabilities);
      } catch (error) {
        const message = messageOf(error);
        console.warn(`[BackendRouter] Capability lookup failed (${correlationId}): ${message}`);
        void logThought(`[BackendRouter] Capability lookup failed, routing to legacy: ${message}`);
        verdict = {
          backendType: 'legacy',
          reason: `Capability detection failed: ${message}`,
          confidence: ROUTE_CONFIDENCE.detectionFailed,
          fallbackAvailable: false,
          estimatedSuccessRate: legacyRate,
        };
      }
    }

    const decisionTimeMs = Math.max(0, this.timer() - started);
    if (decisionTimeMs > this.config.decisionWarnThresholdMs) {
      console.warn(
        `[BackendRouter] Slow routing decision: ${decisionTimeMs.toFixed(1)}ms ` +
          `(threshold ${this.config.decisionWarnThresholdMs}ms, cache hit: ${String(cacheHit)})`,
      );
    }

    return { ...verdict, decisionTimeMs, cacheHit, correlationId };
  }

  private async fetchCapabilities(
    forceRefresh: boolean,
    correlationId: string,
  ): Promise<{ capabilities: CapabilityMap; cacheHit: boolean }> {
    if (!forceRefresh) {
      const cached = await this.cache.getCapabilities();
      if (cached) return { capabilities: cached, cacheHit: true };
    }

    if (!this.detector) {
      console.warn(`[BackendRouter] No cached capabilities and no detector (${correlationId}); assuming legacy only.`);
      return { capabilities: { ...CONSERVATIVE_CAPABILITIES }, cacheHit: false };
    }

    return { capabilities: await this.detectOnce(this.detector, correlationId), cacheHit: false };
  }

  /** Concurrent misses share one detection and one cache write. */
  private detectOnce(
    detector: NonNullable<BackendRouterDeps['detector']>,
    correlationId: string,
  ): Promise<CapabilityMap> {
    if (this.pendingDetection) return this.pendingDetection;

    const detection = (async () => {
      const detected = await detector.detectCapabilities(true);
      await this.cache.setCapabilities(detected);
      this.events?.record({
        type: 'capability_refresh',
        backend: null,
        detail: `Capabilities detected: ${JSON.stringify(detected)}`,
        correlationId,
      });
      return detected;
    })();

    this.pendingDetection = detection;
    return detection.finally(() => {
      if (this.pendingDetection === detection) this.pendingDetection = null;
    });
  }

  private verdictFor(capabilities: CapabilityMap): RouteVerdict {
    const primaryAvailable = capabilities.primary_api_available === true;
    const legacyAvailable = capabilities.legacy_api_available !== false;
    const primaryRate = this.tracker.getRate('primary');
    const legacyRate = this.tracker.getRate('legacy');
    const threshold = this.config.successRateThreshold;

    if (primaryAvailable && this.config.preferPrimaryBackend) {
      if (primaryRate >= threshold) {
        return {
          backendType: 'primary',
          reason: `Primary backend available and preferred (success rate: ${percent(primaryRate)})`,
          confidence: ROUTE_CONFIDENCE.primaryPreferred,
          fallbackAvailable: legacyAvailable,
          estimatedSuccessRate: primaryRate,
        };
      }
      return {
        backendType: 'legacy',
        reason: `Primary backend success rate degraded (${percent(primaryRate)} < ${percent(threshold)})`,
        confidence: ROUTE_CONFIDENCE.degradedPrimary,
        fallbackAvailable: true,
        estimatedSuccessRate: legacyRate,
      };
    }

    if (legacyAvailable) {
      return {
        backendType: 'legacy',
        reason: primaryAvailable
          ? 'Legacy backend available (primary not preferred)'
          : 'Legacy backend available (primary unavailable)',
        confidence: ROUTE_CONFIDENCE.legacyAvailable,
        fallbackAvailable: primaryAvailable,
        estimatedSuccessRate: legacyRate,
      };
    }

    console.warn('[BackendRouter] No backend reported available; using legacy as emergency fallback.');
    return {
      backendType: 'legacy',
      reason: 'Emergency fallback to legacy backend (no backend reported available)',
      confidence: ROUTE_CONFIDENCE.emergency,
      fallbackAvailable: false,
      estimatedSuccessRate: legacyRate,
    };
  }

  private isFallback(decision: RoutingDecision): boolean {
    return decision.backendType === 'legacy' && this.config.preferPrimaryBackend && !this.config.forceLegacyBackend;
  }
}
