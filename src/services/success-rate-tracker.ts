import { BACKEND_TYPES, type BackendType, type SuccessRateSnapshot } from '../types/routing.js';

/** How much weight the previous smoothed rate keeps after a new observation. */
export interface SmoothingPolicy {
  weightFor(totalRequests: number): number;
}

export const WARMUP_SAMPLE_COUNT = 10;

/** 0.8 while fewer than ten samples exist, 0.9 afterwards. */
export const defaultSmoothingPolicy: SmoothingPolicy = {
  weightFor: (totalRequests) => (totalRequests < WARMUP_SAMPLE_COUNT ? 0.8 : 0.9),
};

export const SEED_SUCCESS_RATES: Readonly<Record<BackendType, number>> = {
  primary: 0.95,
  legacy: 0.98,
};

interface BackendHistory {
  totalRequests: number;
  successfulRequests: number;
  successRate: number;
}

/**
 * Exponentially smoothed success rate per backend:
 * `rate = w * rate + (1 - w) * successes / total`.
 */
export class SuccessRateTracker {
  private readonly policy: SmoothingPolicy;
  private readonly history: Map<BackendType, BackendHistory> = new Map();

  constructor(policy: SmoothingPolicy = defaultSmoothingPolicy) {
    this.policy = policy;
    this.reset();
  }

  public record(backend: BackendType, success: boolean): number {
    const entry = this.entry(backend);
    entry.totalRequests += 1;
    if (success) entry.successfulRequests += 1;

    const observed = entry.successfulRequests / entry.totalRequests;
    const weight = this.policy.weightFor(entry.totalRequests);
    entry.successRate = weight * entry.successRate + (1 - weight) * observed;
    return entry.successRate;
  }

  public getRate(backend: BackendType): number {
    return this.entry(backend).successRate;
  }

  public snapshot(): Record<BackendType, SuccessRateSnapshot> {
    return { primary: this.snapshotOf('primary'), legacy: this.snapshotOf('legacy') };
  }

  public snapshotOf(backend: BackendType): SuccessRateSnapshot {
    const entry = this.entry(backend);
    return {
      totalRequests: entry.totalRequests,
      successfulRequests: entry.successfulRequests,
      successRate: entry.successRate,
      observedRate: entry.totalRequests > 0 ? entry.successfulRequests / entry.totalRequests : 0,
    };
  }

  public reset(): void {
    for (const backend of BACKEND_TYPES) {
      this.history.set(backend, { totalRequests: 0, successfulRequests: 0, successRate: SEED_SUCCESS_RATES[backend] });
    }
  }

  private entry(backend: BackendType): BackendHistory {
    let entry = this.history.get(backend);
    if (!entry) {
      entry = { totalRequests: 0, successfulRequests: 0, successRate: SEED_SUCCESS_RATES[backend] };
      this.history.set(backend, entry);
    }
    return entry;
  }
}
