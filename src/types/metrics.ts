import type { BackendType } from './routing.js';

/** Backends tracked by the metrics collector; `models` is the listing endpoint used by probes. */
export type MetricsBackend = BackendType | 'models';

export const METRICS_BACKENDS: readonly MetricsBackend[] = ['primary', 'legacy', 'models'];

export type ErrorCategory = 'not_found' | 'rate_limit' | 'authentication' | 'timeout' | 'other';

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'not_found',
  'rate_limit',
  'authentication',
  'timeout',
  'other',
];

export interface BackendMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  avgResponseTimeMs: number;
  errorRatePercent: number;
  lastRequestTime: string | null;
  lastErrorTime: string | null;
  lastErrorMessage: string | null;
}

export interface RoutingMetrics {
  totalRoutingDecisions: number;
  primaryChosen: number;
  legacyChosen: number;
  fallbackDecisions: number;
  avgRoutingTimeMs: number;
  cacheHitRatePercent: number;
}

export interface ErrorRecord {
  timestamp: string;
  backend: MetricsBackend;
  category: ErrorCategory;
  errorMessage: string | null;
  errorCode: string | null;
  correlationId: string | null;
}

export interface ErrorMetrics {
  totalErrors: number;
  counts: Record<ErrorCategory, number>;
  recentErrors: ErrorRecord[];
}

export interface ApiRequestRecord {
  backend: MetricsBackend;
  success: boolean;
  responseTimeMs: number;
  errorMessage?: string | null;
  errorCode?: string | null;
  correlationId?: string | null;
}

export interface RoutingDecisionRecord {
  chosenBackend: BackendType;
  routingTimeMs: number;
  cacheHit: boolean;
  fallbackUsed?: boolean;
  reason?: string;
}

export interface MetricsSummary {
  timestamp: string;
  apiMetrics: Record<MetricsBackend, BackendMetrics>;
  routingMetrics: RoutingMetrics;
  errorMetrics: ErrorMetrics;
  performanceSummary: {
    totalRequests: number;
    totalErrors: number;
    overallErrorRatePercent: number;
    backendDistribution: Record<MetricsBackend, number>;
    mostCommonErrorType: ErrorCategory | 'none';
  };
}

export interface ErrorSummary {
  timePeriodHours: number;
  totalErrors: number;
  errorTypes: Partial<Record<ErrorCategory, number>>;
  errorsByBackend: Partial<Record<MetricsBackend, number>>;
  recentErrors: ErrorRecord[];
}

/** On-disk metrics document. Rolling windows are persisted so averages survive restarts. */
export interface PersistedMetrics {
  version: 1;
  savedAt: string;
  apiMetrics: Record<MetricsBackend, BackendMetrics>;
  routingMetrics: RoutingMetrics;
  errorMetrics: ErrorMetrics;
  windows: {
    responseTimes: Record<MetricsBackend, number[]>;
    routingTimes: number[];
    cacheHits: boolean[];
  };
}
