import { readFileSync } from 'node:fs';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  ERROR_CATEGORIES,
  METRICS_BACKENDS,
  type ApiRequestRecord,
  type BackendMetrics,
  type ErrorCategory,
  type ErrorMetrics,
  type ErrorRecord,
  type ErrorSummary,
  type MetricsBackend,
  type MetricsSummary,
  type PersistedMetrics,
  type RoutingDecisionRecord,
  type RoutingMetrics,
} from '../types/metrics.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { RingBuffer, average } from '../utils/ring-buffer.js';

export interface MetricsCollectorOptions {
  /** JSON file for persistence; `null` keeps metrics in memory only. */
  metricsFile?: string | null;
  maxRecentErrors?: number;
  windowSize?: number;
  now?: () => number;
}

export interface PeriodicPersistenceHandle {
  stop(): Promise<void>;
}

const DEFAULT_WINDOW_SIZE = 100;
const DEFAULT_MAX_RECENT_ERRORS = 50;
const ERROR_SUMMARY_RECENT_LIMIT = 10;

const CODE_CATEGORIES: Partial<Record<string, ErrorCategory>> = {
  AUTHENTICATION_FAILED: 'authentication',
  QUOTA_EXCEEDED: 'rate_limit',
  TIMEOUT: 'timeout',
  DEPLOYMENT_NOT_FOUND: 'not_found',
  FEATURE_NOT_ENABLED: 'not_found',
};

/** Bucket an error by its routing code when known, otherwise by message text. */
export function categorizeError(errorMessage: string | null | undefined, errorCode?: string | null): ErrorCategory {
  const fromCode = errorCode ? CODE_CATEGORIES[errorCode] : undefined;
  if (fromCode) return fromCode;

  const text = (errorMessage ?? '').toLowerCase();
  if (text.includes('404') || text.includes('not found') || text.includes('notfound')) return 'not_found';
  if (text.includes('429') || text.includes('rate limit') || text.includes('ratelimit')) return 'rate_limit';
  if (text.includes('401') || text.includes('authentication') || text.includes('unauthorized')) return 'authentication';
  if (text.includes('timeout') || text.includes('timed out')) return 'timeout';
  return 'other';
}

function emptyBackendMetrics(): BackendMetrics {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    avgResponseTimeMs: 0,
    errorRatePercent: 0,
    lastRequestTime: null,
    lastErrorTime: null,
    lastErrorMessage: null,
  };
}

function emptyRoutingMetrics(): RoutingMetrics {
  return {
    totalRoutingDecisions: 0,
    primaryChosen: 0,
    legacyChosen: 0,
    fallbackDecisions: 0,
    avgRoutingTimeMs: 0,
    cacheHitRatePercent: 0,
  };
}

function emptyErrorCounts(): Record<ErrorCategory, number> {
  return { not_found: 0, rate_limit: 0, authentication: 0, timeout: 0, other: 0 };
}

function perBackend<T>(factory: (backend: MetricsBackend) => T): Record<MetricsBackend, T> {
  return { primary: factory('primary'), legacy: factory('legacy'), models: factory('models') };
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

// ── Persisted document validation ───────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isMetricsBackend(value: unknown): value is MetricsBackend {
  return METRICS_BACKENDS.some((backend) => backend === value);
}

function isErrorCategory(value: unknown): value is ErrorCategory {
  return ERROR_CATEGORIES.some((category) => category === value);
}

function parseBackendMetrics(value: unknown): BackendMetrics | null {
  if (!isRecord(value)) return null;
  const {
    totalRequests,
    successfulRequests,
    failedRequests,
    avgResponseTimeMs,
    errorRatePercent,
    lastRequestTime,
    lastErrorTime,
    lastErrorMessage,
  } = value;
  if (
    !isCount(totalRequests) ||
    !isCount(successfulRequests) ||
    !isCount(failedRequests) ||
    !isCount(avgResponseTimeMs) ||
    !isCount(errorRatePercent) ||
    !isNullableString(lastRequestTime) ||
    !isNullableString(lastErrorTime) ||
    !isNullableString(lastErrorMessage)
  ) {
    return null;
  }
  return {
    totalRequests,
    successfulRequests,
    failedRequests,
    avgResponseTimeMs,
    errorRatePercent,
    lastRequestTime,
    lastErrorTime,
    lastErrorMessage,
  };
}

function parseRoutingMetrics(value: unknown): RoutingMetrics | null {
  if (!isRecord(value)) return null;
  const { totalRoutingDecisions, primaryChosen, legacyChosen, fallbackDecisions, avgRoutingTimeMs, cacheHitRatePercent } =
    value;
  if (
    !isCount(totalRoutingDecisions) ||
    !isCount(primaryChosen) ||
    !isCount(legacyChosen) ||
    !isCount(fallbackDecisions) ||
    !isCount(avgRoutingTimeMs) ||
    !isCount(cacheHitRatePercent)
  ) {
    return null;
  }
  return { totalRoutingDecisions, primaryChosen, legacyChosen, fallbackDecisions, avgRoutingTimeMs, cacheHitRatePercent };
}

function parseErrorRecord(value: unknown): ErrorRecord | null {
  if (!isRecord(value)) return null;
  const { timestamp, backend, category, errorMessage, errorCode, correlationId } = value;
  if (
    typeof timestamp !== 'string' ||
    !isMetricsBackend(backend) ||
    !isErrorCategory(category) ||
    !isNullableString(errorMessage) ||
    !isNullableString(errorCode) ||
    !isNullableString(correlationId)
  ) {
    return null;
  }
  return { timestamp, backend, category, errorMessage, errorCode, correlationId };
}

function parseErrorMetrics(value: unknown): ErrorMetrics | null {
  if (!isRecord(value) || !isCount(value.totalErrors) || !isRecord(value.counts)) return null;
  const counts = emptyErrorCounts();
  for (const category of ERROR_CATEGORIES) {
    const count = value.counts[category];
    if (count === undefined) continue;
    if (!isCount(count)) return null;
    counts[category] = count;
  }
  const recentErrors = Array.isArray(value.recentErrors)
    ? value.recentErrors.map(parseErrorRecord).filter((record): record is ErrorRecord => record !== null)
    : [];
  return { totalErrors: value.totalErrors, counts, recentErrors };
}

function parseNumberWindow(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const numbers = value.filter((item): item is number => typeof item === 'number' && Number.isFinite(item));
  return numbers.length === value.length ? numbers : null;
}

function parseBooleanWindow(value: unknown): boolean[] | null {
  if (!Array.isArray(value)) return null;
  const flags = value.filter((item): item is boolean => typeof item === 'boolean');
  return flags.length === value.length ? flags : null;
}

/**
 * In-process counters for backend requests, routing decisions and errors, with
 * fixed-size rolling windows for averages. Persistence failures are logged and
 * never reach callers.
 */
export class MetricsCollector {
  private readonly metricsFile: string | null;
  private readonly windowSize: number;
  private readonly maxRecentErrors: number;
  private readonly nowFn: () => number;

  private apiMetrics: Record<MetricsBackend, BackendMetrics> = perBackend(emptyBackendMetrics);
  private routingMetrics: RoutingMetrics = emptyRoutingMetrics();
  private errorTotals = 0;
  private errorCounts: Record<ErrorCategory, number> = emptyErrorCounts();
  private recentErrors: RingBuffer<ErrorRecord>;
  private responseTimes: Record<MetricsBackend, RingBuffer<number>>;
  private routingTimes: RingBuffer<number>;
  private cacheHits: RingBuffer<boolean>;

  constructor(options: MetricsCollectorOptions = {}) {
    this.metricsFile = options.metricsFile ? path.resolve(options.metricsFile) : null;
    this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
    this.maxRecentErrors = options.maxRecentErrors ?? DEFAULT_MAX_RECENT_ERRORS;
    this.nowFn = options.now ?? (() => Date.now());
    this.recentErrors = new RingBuffer(this.maxRecentErrors);
    this.responseTimes = perBackend(() => new RingBuffer<number>(this.windowSize));
    this.routingTimes = new RingBuffer(this.windowSize);
    this.cacheHits = new RingBuffer(this.windowSize);

    if (this.metricsFile) {
      this.loadMetrics();
    }
  }

  public recordApiRequest(record: ApiRequestRecord): void {
    const timestamp = new Date(this.nowFn()).toISOString();
    const metrics = this.apiMetrics[record.backend];
    const window = this.responseTimes[record.backend];

    metrics.totalRequests += 1;
    metrics.lastRequestTime = timestamp;
    window.push(Math.max(0, record.responseTimeMs));
    metrics.avgResponseTimeMs = round(average(window.toArray()));

    if (record.success) {
      metrics.successfulRequests += 1;
    } else {
      const message = record.errorMessage ? scrubSensitiveText(record.errorMessage) : null;
      const category = categorizeError(message, record.errorCode);
      metrics.failedRequests += 1;
      metrics.lastErrorTime = timestamp;
      metrics.lastErrorMessage = message;

      this.errorTotals += 1;
      this.errorCounts[category] += 1;
      this.recentErrors.push({
        timestamp,
        backend: record.backend,
        category,
        errorMessage: message,
        errorCode: record.errorCode ?? null,
        correlationId: record.correlationId ?? null,
      });
    }

    metrics.errorRatePercent = round((metrics.failedRequests / metrics.totalRequests) * 100);
  }

  public recordRoutingDecision(record: RoutingDecisionRecord): void {
    const routing = this.routingMetrics;
    routing.totalRoutingDecisions += 1;
    if (record.chosenBackend === 'primary') routing.primaryChosen += 1;
    else routing.legacyChosen += 1;
    if (record.fallbackUsed) routing.fallbackDecisions += 1;

    this.routingTimes.push(Math.max(0, record.routingTimeMs));
    this.cacheHits.push(record.cacheHit);
    routing.avgRoutingTimeMs = round(average(this.routingTimes.toArray()), 3);
    const hits = this.cacheHits.toArray();
    routing.cacheHitRatePercent = round((hits.filter(Boolean).length / hits.length) * 100);
  }

  public getBackendUsageDistribution(): Record<MetricsBackend, number> {
    const total = METRICS_BACKENDS.reduce((sum, backend) => sum + this.apiMetrics[backend].totalRequests, 0);
    return perBackend((backend) => (total > 0 ? round((this.apiMetrics[backend].totalRequests / total) * 100) : 0));
  }

  public getMetricsSummary(): MetricsSummary {
    const totalRequests = METRICS_BACKENDS.reduce((sum, backend) => sum + this.apiMetrics[backend].totalRequests, 0);
    const totalErrors = METRICS_BACKENDS.reduce((sum, backend) => sum + this.apiMetrics[backend].failedRequests, 0);

    return {
      timestamp: new Date(this.nowFn()).toISOString(),
      apiMetrics: perBackend((backend) => ({ ...this.apiMetrics[backend] })),
      routingMetrics: { ...this.routingMetrics },
      errorMetrics: this.errorMetricsSnapshot(),
      performanceSummary: {
        totalRequests,
        totalErrors,
        overallErrorRatePercent: totalRequests > 0 ? round((totalErrors / totalRequests) * 100) : 0,
        backendDistribution: this.getBackendUsageDistribution(),
        mostCommonErrorType: this.mostCommonErrorType(),
      },
    };
  }

  public getErrorSummary(hours = 24): ErrorSummary {
    const cutoff = this.nowFn() - hours * 60 * 60 * 1_000;
    const recent = this.recentErrors.toArray().filter((record) => Date.parse(record.timestamp) >= cutoff);

    const errorTypes: Partial<Record<ErrorCategory, number>> = {};
    const errorsByBackend: Partial<Record<MetricsBackend, number>> = {};
    for (const record of recent) {
      errorTypes[record.category] = (errorTypes[record.category] ?? 0) + 1;
      errorsByBackend[record.backend] = (errorsByBackend[record.backend] ?? 0) + 1;
    }

    return {
      timePeriodHours: hours,
      totalErrors: recent.length,
      errorTypes,
      errorsByBackend,
      recentErrors: recent.slice(-ERROR_SUMMARY_RECENT_LIMIT),
    };
  }

  /** Atomic write of the current aggregates. Returns false when nothing was written. */
  public async persistMetrics(): Promise<boolean> {
    if (!this.metricsFile) return false;

    const document: PersistedMetrics = {
      version: 1,
      savedAt: new Date(this.nowFn()).toISOString(),
      apiMetrics: this.apiMetrics,
      routingMetrics: this.routingMetrics,
      errorMetrics: this.errorMetricsSnapshot(),
      windows: {
        responseTimes: perBackend((backend) => this.responseTimes[backend].toArray()),
        routingTimes: this.routingTimes.toArray(),
        cacheHits: this.cacheHits.toArray(),
      },
    };

    const tempPath = `${this.metricsFile}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(path.dirname(this.metricsFile), { recursive: true });
      await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
      await rename(tempPath, this.metricsFile);
      return true;
    } catch (error) {
      const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
      console.warn(`[MetricsCollector] Failed to persist metrics to ${this.metricsFile}: ${message}`);
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[MetricsCollector] Failed to remove temp file ${tempPath}: ${String(cleanupError)}`);
      });
      return false;
    }
  }

  /**
   * Restore aggregates from the metrics file. Each backend, the routing block, the
   * error block and each rolling window is validated on its own; an invalid section
   * starts fresh without discarding the others.
   */
  public loadMetrics(): boolean {
    if (!this.metricsFile) return false;

    let document: unknown;
    try {
      document = JSON.parse(readFileSync(this.metricsFile, 'utf8'));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
      const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
      console.warn(`[MetricsCollector] Ignoring unreadable metrics file ${this.metricsFile}: ${message}`);
      return false;
    }
    if (!isRecord(document)) {
      console.warn(`[MetricsCollector] Ignoring malformed metrics file ${this.metricsFile}.`);
      return false;
    }

    const rejected: string[] = [];
    const apiSection = isRecord(document.apiMetrics) ? document.apiMetrics : {};
    const windows = isRecord(document.windows) ? document.windows : {};
    const responseWindows = isRecord(windows.responseTimes) ? windows.responseTimes : {};

    for (const backend of METRICS_BACKENDS) {
      const parsed = parseBackendMetrics(apiSection[backend]);
      if (parsed) this.apiMetrics[backend] = parsed;
      else rejected.push(`apiMetrics.${backend}`);

      const samples = parseNumberWindow(responseWindows[backend]);
      if (samples) this.responseTimes[backend].pushAll(samples);
      else rejected.push(`windows.responseTimes.${backend}`);
    }

    const routing = parseRoutingMetrics(document.routingMetrics);
    if (routing) this.routingMetrics = routing;
    else rejected.push('routingMetrics');

    const errors = parseErrorMetrics(document.errorMetrics);
    if (errors) {
      this.errorTotals = errors.totalErrors;
      this.errorCounts = errors.counts;
      this.recentErrors.pushAll(errors.recentErrors);
    } else {
      rejected.push('errorMetrics');
    }

    const routingTimes = parseNumberWindow(windows.routingTimes);
    if (routingTimes) this.routingTimes.pushAll(routingTimes);
    else rejected.push('windows.routingTimes');

    const cacheHits = parseBooleanWindow(windows.cacheHits);
    if (cacheHits) this.cacheHits.pushAll(cacheHits);
    else rejected.push('windows.cacheHits');

    if (rejected.length > 0) {
      console.warn(`[MetricsCollector] Reset invalid metrics sections: ${rejected.join(', ')}`);
    }
    return true;
  }

  public startPeriodicPersistence(intervalMs: number): PeriodicPersistenceHandle {
    let inFlight: Promise<boolean> | null = null;
    const timer = setInterval(() => {
      if (inFlight) return;
      inFlight = this.persistMetrics().finally(() => {
        inFlight = null;
      });
    }, Math.max(1, intervalMs));
    timer.unref();

    return {
      stop: async () => {
        clearInterval(timer);
        if (inFlight) await inFlight;
      },
    };
  }

  public resetMetrics(): void {
    this.apiMetrics = perBackend(emptyBackendMetrics);
    this.routingMetrics = emptyRoutingMetrics();
    this.errorTotals = 0;
    this.errorCounts = emptyErrorCounts();
    this.recentErrors.clear();
    for (const backend of METRICS_BACKENDS) this.responseTimes[backend].clear();
    this.routingTimes.clear();
    this.cacheHits.clear();
    void logThought('[MetricsCollector] Metrics reset.');
  }

  private errorMetricsSnapshot(): ErrorMetrics {
    return {
      totalErrors: this.errorTotals,
      counts: { ...this.errorCounts },
      recentErrors: this.recentErrors.toArray(),
    };
  }

  private mostCommonErrorType(): ErrorCategory | 'none' {
    let best: ErrorCategory | 'none' = 'none';
    let bestCount = 0;
    for (const category of ERROR_CATEGORIES) {
      if (this.errorCounts[category] > bestCount) {
        best = category;
        bestCount = this.errorCounts[category];
      }
    }
    return best;
  }
}
