import type { RouterConfig } from '../config/router-config.js';
import {
  CAPABILITY_NAMES,
  CONSERVATIVE_CAPABILITIES,
  type BackendType,
  type CapabilityMap,
  type CapabilityName,
  type CapabilityRecord,
  type CapabilityStatusEntry,
  type ProbeErrorKind,
  type ProbeOutcome,
} from '../types/routing.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { sleep, withRetry } from '../utils/retry.js';
import { linkTimeoutSignal, type BackendProbeClient, type ProbeHttpResponse } from './backend-client.js';
import type { MetricsCollector } from './metrics-collector.js';
import { classifyBackendError, errorForProbeKind } from './routing-errors.js';

type ProbeTarget = BackendType | 'models';

export interface CapabilityDetectorOptions {
  metrics?: Pick<MetricsCollector, 'recordApiRequest'>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DetectCapabilitiesOptions {
  /** Rethrow authentication, quota and timeout probe errors once every probe has settled. */
  strict?: boolean;
  signal?: AbortSignal;
}

export interface BackgroundRefreshOptions {
  intervalMs: number;
  isStale: () => boolean | Promise<boolean>;
  onRefresh?: (capabilities: CapabilityMap) => void | Promise<void>;
}

export interface BackgroundRefreshHandle {
  stop(): Promise<void>;
}

export interface ProbeErrorSummary {
  kind: ProbeErrorKind;
  message: string;
}

const FEATURE_DISABLED_PATTERN = /feature not enabled|not enabled for this|not available for this/i;
const STRICT_ERROR_KINDS: ReadonlySet<ProbeErrorKind> = new Set(['authentication', 'quota', 'timeout']);

function truncate(text: string, max = 200): string {
  const clean = scrubSensitiveText(text.trim());
  return clean.length > max ? `${clean.slice(0, max)}…` : clean;
}

/**
 * Turn a probe's HTTP answer into a verdict. A 400 means the route exists and
 * rejected the payload; a 404 or a feature-disabled body means it does not exist.
 */
export function interpretProbeResponse(
  response: ProbeHttpResponse,
  responseTimeMs: number,
  options: { requireOk?: boolean } = {},
): ProbeOutcome {
  const { status, bodyText } = response;

  if (options.requireOk ? status === 200 : status >= 200 && status < 300) {
    return { status: 'available', httpStatus: status, responseTimeMs };
  }
  if (status === 404) {
    return { status: 'unavailable', httpStatus: status, responseTimeMs, reason: `HTTP 404: ${truncate(bodyText)}` };
  }
  if (status === 400) {
    if (FEATURE_DISABLED_PATTERN.test(bodyText)) {
      return { status: 'unavailable', httpStatus: status, responseTimeMs, reason: `Feature not enabled: ${truncate(bodyText)}` };
    }
    if (!options.requireOk) {
      return { status: 'available', httpStatus: status, responseTimeMs };
    }
  }

  const reason = `HTTP ${status}: ${truncate(bodyText)}`;
  let kind: ProbeErrorKind = 'capability';
  if (status === 401 || status === 403) kind = 'authentication';
  else if (status === 429) kind = 'quota';
  else if (status === 408 || status === 504) kind = 'timeout';
  return { status: 'error', kind, httpStatus: status, responseTimeMs, reason };
}

/** Verdict for a probe that threw before any HTTP answer arrived. */
export function interpretProbeFailure(error: unknown, responseTimeMs: number): ProbeOutcome {
  const classified = classifyBackendError(error);
  const reason = truncate(error instanceof Error ? error.message : String(error));

  switch (classified.code) {
    case 'AUTHENTICATION_FAILED':
      return { status: 'error', kind: 'authentication', httpStatus: classified.statusCode, responseTimeMs, reason };
    case 'QUOTA_EXCEEDED':
      return { status: 'error', kind: 'quota', httpStatus: classified.statusCode, responseTimeMs, reason };
    case 'TIMEOUT':
      return { status: 'error', kind: 'timeout', httpStatus: null, responseTimeMs, reason };
    case 'DEPLOYMENT_NOT_FOUND':
    case 'FEATURE_NOT_ENABLED':
      return { status: 'unavailable', httpStatus: classified.statusCode, responseTimeMs, reason };
    default:
      return { status: 'error', kind: 'capability', httpStatus: classified.statusCode, responseTimeMs, reason };
  }
}

/** Returns whether the backend is available; error outcomes become classified exceptions. */
export function assertProbe(outcome: ProbeOutcome, backend?: BackendType): boolean {
  if (outcome.status === 'error') {
    throw errorForProbeKind(outcome.kind, outcome.reason, { backend });
  }
  return outcome.status === 'available';
}

export class CapabilityDetector {
  private readonly client: BackendProbeClient;
  private readonly probeTimeoutMs: number;
  private readonly cacheTtlMs: number;
  private readonly endpoint: string;
  private readonly metrics: CapabilityDetectorOptions['metrics'];
  private readonly nowFn: () => number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly status: Map<CapabilityName, CapabilityRecord> = new Map();
  private lastFullCheckMs: number | null = null;

  constructor(client: BackendProbeClient, config: RouterConfig, options: CapabilityDetectorOptions = {}) {
    this.client = client;
    this.probeTimeoutMs = config.backend.probeTimeoutMs;
    this.cacheTtlMs = config.routing.capabilityCacheTtlSeconds * 1_000;
    this.endpoint = config.backend.endpoint;
    this.metrics = options.metrics;
    this.nowFn = options.now ?? (() => Date.now());
    this.sleepFn = options.sleep ?? sleep;
  }

  public async detectPrimaryAvailability(client?: BackendProbeClient, signal?: AbortSignal): Promise<ProbeOutcome> {
    const outcome = await this.runProbe('primary', client ?? this.client, signal);
    this.recordTarget('primary', outcome);
    return outcome;
  }

  public async detectLegacyAvailability(client?: BackendProbeClient, signal?: AbortSignal): Promise<ProbeOutcome> {
    const outcome = await this.runProbe('legacy', client ?? this.client, signal);
    this.recordTarget('legacy', outcome);
    return outcome;
  }

  public async detectModelsEndpointAvailability(
    client?: BackendProbeClient,
    signal?: AbortSignal,
  ): Promise<ProbeOutcome> {
    const outcome = await this.runProbe('models', client ?? this.client, signal);
    this.recordTarget('models', outcome);
    this.metrics?.recordApiRequest({
      backend: 'models',
      success: outcome.status === 'available',
      responseTimeMs: outcome.responseTimeMs,
      errorMessage: outcome.status === 'available' ? null : outcome.reason,
    });
    return outcome;
  }

  /** Run one probe and surface an error outcome as a classified exception. */
  public async probeOrThrow(target: BackendType): Promise<boolean> {
    const outcome =
      target === 'primary' ? await this.detectPrimaryAvailability() : await this.detectLegacyAvailability();
    return assertProbe(outcome, target);
  }

  public async detectCapabilities(
    forceRefresh = false,
    options: DetectCapabilitiesOptions = {},
  ): Promise<CapabilityMap> {
    if (!forceRefresh && this.isStatusFresh()) {
      return this.currentCapabilities();
    }

    const targets: ProbeTarget[] = ['primary', 'legacy', 'models'];
    const settled = await Promise.allSettled([
      this.detectPrimaryAvailability(undefined, options.signal),
      this.detectLegacyAvailability(undefined, options.signal),
      this.detectModelsEndpointAvailability(undefined, options.signal),
    ]);

    const outcomes = new Map<ProbeTarget, ProbeOutcome>();
    settled.forEach((result, index) => {
      const target = targets[index];
      if (target === undefined) return;
      if (result.status === 'fulfilled') {
        outcomes.set(target, result.value);
        return;
      }
      const outcome = interpretProbeFailure(result.reason, 0);
      this.recordTarget(target, outcome);
      outcomes.set(target, outcome);
    });

    this.lastFullCheckMs = this.nowFn();
    const capabilities = this.currentCapabilities();
    void logThought(
      `[CapabilityDetector] Detection finished: primary=${String(capabilities.primary_api_available)}, ` +
        `legacy=${String(capabilities.legacy_api_available)}, models=${String(capabilities.models_endpoint_available)}.`,
    );

    if (options.strict) {
      for (const target of ['primary', 'legacy'] as const) {
        const outcome = outcomes.get(target);
        if (outcome?.status === 'error' && STRICT_ERROR_KINDS.has(outcome.kind)) {
          throw errorForProbeKind(outcome.kind, outcome.reason, { backend: target, endpoint: this.endpoint || undefined });
        }
      }
    }

    return capabilities;
  }

  /**
   * Forced strict detection with an outer deadline per attempt. Retries back off
   * 1s, 2s, 4s… capped at 10s; after the last attempt the conservative legacy-only
   * map is returned.
   */
  public async validateStartupCapabilities(timeoutMs = 30_000, maxRetries = 3): Promise<CapabilityMap> {
    const result = await withRetry((signal) => this.detectCapabilities(true, { strict: true, signal }), {
      maxAttempts: maxRetries + 1,
      baseDelayMs: 1_000,
      backoffFactor: 2,
      maxDelayMs: 10_000,
      attemptTimeoutMs: timeoutMs,
      label: 'startup:capabilities',
      sleep: this.sleepFn,
    });

    if (result.ok && result.value) {
      console.log(`[CapabilityDetector] Startup validation succeeded after ${result.attempts} attempt(s).`);
      return result.value;
    }

    const reason = scrubSensitiveText(result.error ?? 'unknown error');
    console.warn(`[CapabilityDetector] Startup validation failed (${reason}); using legacy-only capabilities.`);
    void logThought(`[CapabilityDetector] Startup validation exhausted ${result.attempts} attempts: ${reason}`);
    return { ...CONSERVATIVE_CAPABILITIES };
  }

  /** Periodic re-probe that only runs when `isStale()` says the cached verdicts expired. */
  public startBackgroundRefresh(options: BackgroundRefreshOptions): BackgroundRefreshHandle {
    const controller = new AbortController();
    const loop = this.runRefreshLoop(options, controller.signal);

    return {
      stop: async () => {
        controller.abort();
        await loop;
      },
    };
  }

  public getCapabilityStatus(): Record<string, CapabilityStatusEntry> {
    const now = this.nowFn();
    const result: Record<string, CapabilityStatusEntry> = {};
    for (const [name, record] of this.status) {
      result[name] = {
        available: record.available,
        lastChecked: record.lastChecked.toISOString(),
        errorMessage: record.errorMessage,
        errorKind: record.errorKind,
        responseTimeMs: record.responseTimeMs,
        cacheAgeSeconds: Math.max(0, (now - record.lastChecked.getTime()) / 1_000),
      };
    }
    return result;
  }

  public getLastProbeErrors(): Partial<Record<CapabilityName, ProbeErrorSummary>> {
    const errors: Partial<Record<CapabilityName, ProbeErrorSummary>> = {};
    for (const [name, record] of this.status) {
      if (record.errorKind) {
        errors[name] = { kind: record.errorKind, message: record.errorMessage ?? '' };
      }
    }
    return errors;
  }

  public clearStatus(): void {
    this.status.clear();
    this.lastFullCheckMs = null;
  }

  private isStatusFresh(): boolean {
    return this.lastFullCheckMs !== null && this.nowFn() - this.lastFullCheckMs < this.cacheTtlMs;
  }

  private currentCapabilities(): CapabilityMap {
    const capabilities: CapabilityMap = {};
    for (const name of CAPABILITY_NAMES) {
      const record = this.status.get(name);
      if (record) capabilities[name] = record.available;
    }
    return capabilities;
  }

  private async runProbe(target: ProbeTarget, client: BackendProbeClient, parent?: AbortSignal): Promise<ProbeOutcome> {
    const startedAt = this.nowFn();
    const { signal, dispose } = linkTimeoutSignal(this.probeTimeoutMs, parent);
    try {
      const response =
        target === 'primary'
          ? await client.probePrimary(signal)
          : target === 'legacy'
            ? await client.probeLegacy(signal)
            : await client.probeModels(signal);
      return interpretProbeResponse(response, this.nowFn() - startedAt, { requireOk: target === 'models' });
    } catch (error) {
      return interpretProbeFailure(error, this.nowFn() - startedAt);
    } finally {
      dispose();
    }
  }

  private recordTarget(target: ProbeTarget, outcome: ProbeOutcome): void {
    if (target === 'primary') {
      this.record('primary_api_available', outcome);
    } else if (target === 'legacy') {
      this.record('legacy_api_available', outcome);
      this.record('deployment_accessible', outcome);
    } else {
      this.record('models_endpoint_available', outcome);
    }
  }

  private record(name: CapabilityName, outcome: ProbeOutcome): void {
    this.status.set(name, {
      available: outcome.status === 'available',
      lastChecked: new Date(this.nowFn()),
      errorMessage: outcome.status === 'available' ? null : outcome.reason,
      responseTimeMs: outcome.responseTimeMs,
      errorKind: outcome.status === 'error' ? outcome.kind : null,
    });

    if (outcome.status === 'error') {
      console.warn(`[CapabilityDetector] ${name} probe error (${outcome.kind}): ${outcome.reason}`);
    }
  }

  private async runRefreshLoop(options: BackgroundRefreshOptions, signal: AbortSignal): Promise<void> {
    const intervalMs = Math.max(1, options.intervalMs);
    while (!signal.aborted) {
      await abortableDelay(intervalMs, signal);
      if (signal.aborted) break;

      try {
        if (!(await options.isStale())) continue;
        const capabilities = await this.detectCapabilities(true, { signal });
        await options.onRefresh?.(capabilities);
      } catch (error) {
        const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
        console.warn(`[CapabilityDetector] Background refresh failed: ${message}`);
      }
    }
  }
}

function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
