import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 10000 */
    maxDelayMs?: number;
    /** Per-attempt deadline in ms. The attempt's signal aborts when it elapses. */
    attemptTimeoutMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    sleep?: (ms: number) => Promise<void>;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
}

export class AttemptTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'AttemptTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

const DEFAULTS: Required<Omit<RetryOptions, 'label' | 'attemptTimeoutMs' | 'sleep'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 10_000,
};

/** Delay before the retry that follows failed attempt number `attempt` (1-based). */
export function computeBackoffDelay(
    attempt: number,
    options: Pick<RetryOptions, 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs'> = {},
): number {
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    return Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
}

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay doubles after each attempt (capped at `maxDelayMs`).
 * - With `attemptTimeoutMs`, each attempt races a deadline and receives an
 *   `AbortSignal` that fires when the deadline passes.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   (signal) => detector.detectCapabilities(true, { strict: true, signal }),
 *   { maxAttempts: 4, attemptTimeoutMs: 30_000, label: 'startup:capabilities' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const label = options.label ?? 'unnamed';
    const sleepFn = options.sleep ?? sleep;

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await runAttempt(fn, label, options.attemptTimeoutMs);
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);

            if (attempt < maxAttempts) {
                const delay = computeBackoffDelay(attempt, options);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await sleepFn(delay);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

async function runAttempt<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    label: string,
    timeoutMs: number | undefined,
): Promise<T> {
    const controller = new AbortController();
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        return fn(controller.signal);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new AttemptTimeoutError(label, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}

export function sleep(ms: number): Promise<void> {
    if (!Number.isFinite(ms) || ms <= 0) {
        return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
}
