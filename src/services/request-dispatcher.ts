import type { BackendType, RoutingDecision } from '../types/routing.js';
import { logThought } from '../utils/logger.js';
import type { BackendRequestClient } from './backend-client.js';
import type { BackendRouter } from './backend-router.js';
import type { MetricsCollector } from './metrics-collector.js';
import {
  BackendsExhaustedError,
  classifyBackendError,
  createCorrelationId,
  type BackendAttemptFailure,
} from './routing-errors.js';

export type BackendExecutors<T> = Record<BackendType, () => Promise<T>>;

export interface DispatchOptions {
  correlationId?: string;
}

export interface DispatchResult<T> {
  value: T;
  backend: BackendType;
  decision: RoutingDecision;
  fellBack: boolean;
  correlationId: string;
}

export interface RequestDispatcherDeps {
  router: Pick<BackendRouter, 'decideRoute' | 'recordRequestResult'>;
  metrics?: Pick<MetricsCollector, 'recordApiRequest'> | null;
  timer?: () => number;
}

function otherBackend(backend: BackendType): BackendType {
  return backend === 'primary' ? 'legacy' : 'primary';
}

/**
 * Runs a request on the routed backend and, when that fails and the decision
 * allows a fallback, once on the other backend. Every outcome feeds the router
 * and the metrics collector.
 */
export class RequestDispatcher {
  private readonly router: RequestDispatcherDeps['router'];
  private readonly metrics: RequestDispatcherDeps['metrics'];
  private readonly timer: () => number;

  constructor(deps: RequestDispatcherDeps) {
    this.router = deps.router;
    this.metrics = deps.metrics ?? null;
    this.timer = deps.timer ?? (() => performance.now());
  }

  public async dispatch<T>(executors: BackendExecutors<T>, options: DispatchOptions = {}): Promise<DispatchResult<T>> {
    const correlationId = options.correlationId ?? createCorrelationId();
    const decision = await this.router.decideRoute({ correlationId });
    const order: BackendType[] = decision.fallbackAvailable
      ? [decision.backendType, otherBackend(decision.backendType)]
      : [decision.backendType];
    const failures: BackendAttemptFailure[] = [];

    for (const backend of order) {
      const started = this.timer();
      try {
        const value = await executors[backend]();
        this.metrics?.recordApiRequest({
          backend,
          success: true,
          responseTimeMs: this.timer() - started,
          correlationId,
        });
        await this.router.recordRequestResult(backend, true, undefined, correlationId);
        return { value, backend, decision, fellBack: backend !== decision.backendType, correlationId };
      } catch (error) {
        const classified = classifyBackendError(error, { backend, correlationId });
        this.metrics?.recordApiRequest({
          backend,
          success: false,
          responseTimeMs: this.timer() - started,
          errorMessage: classified.message,
          errorCode: classified.code,
          correlationId,
        });
        await this.router.recordRequestResult(backend, false, classified, correlationId);
        failures.push({ backend, code: classified.code, message: classified.message });
        console.warn(`[Dispatcher] ${backend} backend failed (${classified.code}, ${correlationId}): ${classified.message}`);
      }
    }

    const exhausted = new BackendsExhaustedError(failures, correlationId);
    void logThought(`[Dispatcher] ${exhausted.message}`);
    throw exhausted;
  }

  /** Dispatch one payload per backend shape through a request client. */
  public async send(
    client: BackendRequestClient,
    payloads: Record<BackendType, Record<string, unknown>>,
    options: DispatchOptions = {},
  ): Promise<DispatchResult<unknown>> {
    return this.dispatch(
      {
        primary: () => client.send('primary', payloads.primary),
        legacy: () => client.send('legacy', payloads.legacy),
      },
      options,
    );
  }
}
