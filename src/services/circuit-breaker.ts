import type { RouterConfig } from '../config/router-config.js';
import type { CircuitSnapshot, CircuitState } from '../types/routing.js';
import { scrubSensitiveText } from '../utils/logger.js';

export type CircuitTransitionListener = (from: CircuitState, to: CircuitState, reason: string) => void;

export interface CircuitBreakerOptions {
  maxFailures: number;
  resetTimeMs: number;
  /** How long an `available` verdict is trusted before the state decays to `unknown`. */
  availableTtlMs: number;
  now?: () => number;
  onTransition?: CircuitTransitionListener;
}

/**
 * Availability state machine for the primary backend.
 *
 *   unknown --success--> available --N failures--> cooldown --reset time--> unknown
 *   any --permanent signal--> permanently_unavailable (until success or clear)
 *
 * Leaving cooldown re-arms the breaker one failure short of the threshold, so a
 * single failed probe sends it straight back.
 */
export class CircuitBreaker {
  private readonly maxFailures: number;
  private readonly resetTimeMs: number;
  private readonly availableTtlMs: number;
  private readonly nowFn: () => number;
  private readonly listeners: CircuitTransitionListener[] = [];
  private state: CircuitState = 'unknown';
  private failureCount = 0;
  private lastCheckAtMs: number | null = null;
  private cooldownUntilMs: number | null = null;
  private reason: string | null = null;

  static fromConfig(config: RouterConfig, options: Pick<CircuitBreakerOptions, 'now' | 'onTransition'> = {}): CircuitBreaker {
    return new CircuitBreaker({
      maxFailures: config.routing.maxFailuresBeforeFallback,
      resetTimeMs: config.routing.failureResetTimeSeconds * 1_000,
      availableTtlMs: config.routing.capabilityCacheTtlSeconds * 1_000,
      ...options,
    });
  }

  constructor(options: CircuitBreakerOptions) {
    this.maxFailures = Math.max(1, Math.floor(options.maxFailures));
    this.resetTimeMs = Math.max(0, options.resetTimeMs);
    this.availableTtlMs = Math.max(0, options.availableTtlMs);
    this.nowFn = options.now ?? (() => Date.now());
    if (options.onTransition) this.listeners.push(options.onTransition);
  }

  public onTransition(listener: CircuitTransitionListener): void {
    this.listeners.push(listener);
  }

  public getState(): CircuitState {
    const now = this.nowFn();
    if (this.state === 'cooldown' && this.cooldownUntilMs !== null && now >= this.cooldownUntilMs) {
      this.failureCount = this.maxFailures - 1;
      this.cooldownUntilMs = null;
      this.transition('unknown', 'cooldown expired');
    } else if (
      this.state === 'available' &&
      this.lastCheckAtMs !== null &&
      now - this.lastCheckAtMs >= this.availableTtlMs
    ) {
      this.transition('unknown', 'availability verdict expired');
    }
    return this.state;
  }

  public isBlocked(): boolean {
    const state = this.getState();
    return state === 'cooldown' || state === 'permanently_unavailable';
  }

  public shouldAttemptPrimary(): boolean {
    return !this.isBlocked();
  }

  public recordSuccess(): void {
    this.failureCount = 0;
    this.lastCheckAtMs = this.nowFn();
    this.cooldownUntilMs = null;
    this.transition('available', 'request succeeded');
  }

  public recordFailure(reason: string): void {
    const state = this.getState();
    if (state === 'permanently_unavailable' || state === 'cooldown') return;

    this.failureCount += 1;
    this.lastCheckAtMs = this.nowFn();
    if (this.failureCount >= this.maxFailures) {
      this.cooldownUntilMs = this.lastCheckAtMs + this.resetTimeMs;
      this.transition('cooldown', `${this.failureCount} consecutive failures: ${reason}`);
    } else {
      this.reason = scrubSensitiveText(reason);
    }
  }

  public markPermanentlyUnavailable(reason: string): void {
    this.lastCheckAtMs = this.nowFn();
    this.cooldownUntilMs = null;
    this.transition('permanently_unavailable', reason);
  }

  public clear(): void {
    this.failureCount = 0;
    this.lastCheckAtMs = null;
    this.cooldownUntilMs = null;
    this.transition('unknown', 'cleared');
  }

  public snapshot(): CircuitSnapshot {
    const state = this.getState();
    const now = this.nowFn();
    return {
      state,
      failureCount: this.failureCount,
      lastCheckAt: this.lastCheckAtMs === null ? null : new Date(this.lastCheckAtMs).toISOString(),
      cooldownUntil: this.cooldownUntilMs === null ? null : new Date(this.cooldownUntilMs).toISOString(),
      cooldownRemainingMs: this.cooldownUntilMs === null ? 0 : Math.max(0, this.cooldownUntilMs - now),
      reason: this.reason,
    };
  }

  private transition(next: CircuitState, reason: string): void {
    const previous = this.state;
    this.state = next;
    this.reason = scrubSensitiveText(reason);
    if (previous === next) return;

    console.log(`[CircuitBreaker] primary ${previous} -> ${next} (${this.reason})`);
    for (const listener of this.listeners) {
      try {
        listener(previous, next, this.reason);
      } catch (error) {
        const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
        console.warn(`[CircuitBreaker] Transition listener failed: ${message}`);
      }
    }
  }
}
