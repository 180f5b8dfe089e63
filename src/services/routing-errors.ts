import { randomUUID } from 'node:crypto';
import type { BackendType, ProbeErrorKind } from '../types/routing.js';
import { scrubSensitiveText } from '../utils/logger.js';

export type BackendErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'DEPLOYMENT_NOT_FOUND'
  | 'QUOTA_EXCEEDED'
  | 'FEATURE_NOT_ENABLED'
  | 'CAPABILITY_ERROR'
  | 'TIMEOUT'
  | 'BACKEND_ERROR'
  | 'BACKENDS_EXHAUSTED';

export interface BackendErrorContext {
  correlationId?: string;
  endpoint?: string;
  deployment?: string;
  backend?: BackendType;
}

interface BackendRoutingErrorInit extends BackendErrorContext {
  code: BackendErrorCode;
  statusCode?: number;
  remediation: string;
  cause?: unknown;
}

export function createCorrelationId(): string {
  return randomUUID();
}

export class BackendRoutingError extends Error {
  readonly code: BackendErrorCode;
  readonly correlationId: string;
  readonly statusCode: number | null;
  readonly endpoint: string | null;
  readonly deployment: string | null;
  readonly backend: BackendType | null;
  readonly remediation: string;

  constructor(message: string, init: BackendRoutingErrorInit) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'BackendRoutingError';
    this.code = init.code;
    this.correlationId = init.correlationId ?? createCorrelationId();
    this.statusCode = init.statusCode ?? null;
    this.endpoint = init.endpoint ?? null;
    this.deployment = init.deployment ?? null;
    this.backend = init.backend ?? null;
    this.remediation = init.remediation;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: scrubSensitiveText(this.message),
      correlationId: this.correlationId,
      statusCode: this.statusCode,
      endpoint: this.endpoint,
      deployment: this.deployment,
      backend: this.backend,
      remediation: this.remediation,
    };
  }
}

export class AuthenticationFailedError extends BackendRoutingError {
  constructor(context: BackendErrorContext & { cause?: unknown } = {}) {
    const target = context.endpoint ? ` for endpoint ${context.endpoint}` : '';
    super(`Backend authentication failed${target}.`, {
      ...context,
      code: 'AUTHENTICATION_FAILED',
      statusCode: 401,
      remediation: 'Check the backend API key and its permissions for this deployment.',
    });
    this.name = 'AuthenticationFailedError';
  }
}

export class DeploymentNotFoundError extends BackendRoutingError {
  constructor(context: BackendErrorContext & { cause?: unknown } = {}) {
    const deployment = context.deployment ?? 'unknown';
    const target = context.endpoint ? ` at endpoint ${context.endpoint}` : '';
    super(`Deployment '${deployment}' not found${target}.`, {
      ...context,
      code: 'DEPLOYMENT_NOT_FOUND',
      statusCode: 404,
      remediation: 'Verify the deployment name and that it exists in this resource.',
    });
    this.name = 'DeploymentNotFoundError';
  }
}

export class QuotaExceededError extends BackendRoutingError {
  readonly quotaType: 'requests' | 'tokens';

  constructor(quotaType: 'requests' | 'tokens', context: BackendErrorContext & { cause?: unknown } = {}) {
    super(`Backend ${quotaType} quota exceeded.`, {
      ...context,
      code: 'QUOTA_EXCEEDED',
      statusCode: 429,
      remediation: 'Reduce request rate or raise the deployment quota; retry after the reset window.',
    });
    this.name = 'QuotaExceededError';
    this.quotaType = quotaType;
  }
}

export class FeatureNotEnabledError extends BackendRoutingError {
  readonly featureName: string;
  readonly suggestedAlternative: string | null;

  constructor(
    featureName: string,
    context: BackendErrorContext & { cause?: unknown; suggestedAlternative?: string; statusCode?: number } = {},
  ) {
    const deployment = context.deployment ? ` (deployment: ${context.deployment})` : '';
    const alternative = context.suggestedAlternative ? `. Consider using: ${context.suggestedAlternative}` : '';
    super(`Feature '${featureName}' is not enabled for this deployment${deployment}${alternative}`, {
      ...context,
      code: 'FEATURE_NOT_ENABLED',
      statusCode: context.statusCode,
      remediation: context.suggestedAlternative
        ? `Route requests to the ${context.suggestedAlternative} instead.`
        : 'Enable the feature for this deployment or use an alternative API.',
    });
    this.name = 'FeatureNotEnabledError';
    this.featureName = featureName;
    this.suggestedAlternative = context.suggestedAlternative ?? null;
  }
}

export class CapabilityError extends BackendRoutingError {
  readonly fallbackAvailable: boolean;

  constructor(
    issue: string,
    context: BackendErrorContext & { cause?: unknown; fallbackAvailable?: boolean; statusCode?: number } = {},
  ) {
    const suffix = context.fallbackAvailable ? ' (fallback method available)' : '';
    super(`Capability error: ${issue}${suffix}`, {
      ...context,
      code: 'CAPABILITY_ERROR',
      statusCode: context.statusCode,
      remediation: 'Re-run capability detection; the router falls back to the legacy backend meanwhile.',
    });
    this.name = 'CapabilityError';
    this.fallbackAvailable = context.fallbackAvailable ?? false;
  }
}

export class BackendTimeoutError extends BackendRoutingError {
  readonly timeoutMs: number | null;

  constructor(context: BackendErrorContext & { cause?: unknown; timeoutMs?: number } = {}) {
    const after = context.timeoutMs !== undefined ? ` after ${context.timeoutMs}ms` : '';
    super(`Backend request timed out${after}.`, {
      ...context,
      code: 'TIMEOUT',
      remediation: 'Check network reachability of the endpoint or raise the probe timeout.',
    });
    this.name = 'BackendTimeoutError';
    this.timeoutMs = context.timeoutMs ?? null;
  }
}

export interface BackendAttemptFailure {
  backend: BackendType;
  code: BackendErrorCode;
  message: string;
}

/** Both backends failed. The message is safe to show to end users. */
export class BackendsExhaustedError extends BackendRoutingError {
  readonly attempts: BackendAttemptFailure[];

  constructor(attempts: BackendAttemptFailure[], correlationId: string) {
    const summary = attempts.map((attempt) => `${attempt.backend}: ${describeCode(attempt.code)}`).join('; ');
    super(`All backends failed (${summary}). Reference: ${correlationId}`, {
      code: 'BACKENDS_EXHAUSTED',
      correlationId,
      statusCode: 502,
      remediation: 'Retry later; quote the reference id when contacting support.',
    });
    this.name = 'BackendsExhaustedError';
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts.map((attempt) => ({
        backend: attempt.backend,
        code: attempt.code,
        message: scrubSensitiveText(attempt.message),
      })),
    };
  }
}

const CODE_DESCRIPTIONS: Record<BackendErrorCode, string> = {
  AUTHENTICATION_FAILED: 'authentication failed',
  DEPLOYMENT_NOT_FOUND: 'deployment not found',
  QUOTA_EXCEEDED: 'quota or rate limit exceeded',
  FEATURE_NOT_ENABLED: 'feature not enabled',
  CAPABILITY_ERROR: 'capability error',
  TIMEOUT: 'request timed out',
  BACKEND_ERROR: 'upstream error',
  BACKENDS_EXHAUSTED: 'all backends failed',
};

export function describeCode(code: BackendErrorCode): string {
  return CODE_DESCRIPTIONS[code];
}

// ── Classification ──────────────────────────────────────────────────────────

function readStatusCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  for (const key of ['status', 'statusCode']) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number' && Number.isInteger(value)) {
      return value;
    }
  }
  return null;
}

function isAbortLike(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

const FEATURE_LABELS: Record<BackendType, { feature: string; alternative: string }> = {
  primary: { feature: 'Responses API', alternative: 'Chat Completions API' },
  legacy: { feature: 'Chat Completions API', alternative: 'Responses API' },
};

function featureFor(context: BackendErrorContext, text: string): { feature: string; alternative?: string } {
  if (context.backend) {
    return FEATURE_LABELS[context.backend];
  }
  if (text.includes('responses')) {
    return FEATURE_LABELS.primary;
  }
  return { feature: 'unknown' };
}

/**
 * Map a raw transport or upstream error into the routing error taxonomy.
 * HTTP status wins over message heuristics when both are present.
 */
export function classifyBackendError(error: unknown, context: BackendErrorContext = {}): BackendRoutingError {
  if (error instanceof BackendRoutingError) {
    return error;
  }

  const rawMessage = error instanceof Error ? error.message : String(error);
  const text = rawMessage.toLowerCase();
  const status = readStatusCode(error);
  const base = { ...context, cause: error };

  if (status === 401 || status === 403 || text.includes('authentication') || text.includes('unauthorized')) {
    return new AuthenticationFailedError(base);
  }
  if (status === 404 || text.includes('not found')) {
    if (text.includes('deployment')) {
      return new DeploymentNotFoundError(base);
    }
    const { feature, alternative } = featureFor(context, text);
    return new FeatureNotEnabledError(feature, { ...base, suggestedAlternative: alternative, statusCode: 404 });
  }
  if (text.includes('feature not enabled') || text.includes('not available')) {
    const { feature, alternative } = featureFor(context, text);
    return new FeatureNotEnabledError(feature, { ...base, suggestedAlternative: alternative });
  }
  if (status === 429 || text.includes('quota') || text.includes('rate limit') || text.includes('too many requests')) {
    return new QuotaExceededError(text.includes('token') ? 'tokens' : 'requests', base);
  }
  if (isAbortLike(error) || text.includes('timeout') || text.includes('timed out')) {
    return new BackendTimeoutError(base);
  }

  return new BackendRoutingError(scrubSensitiveText(rawMessage), {
    ...base,
    code: 'BACKEND_ERROR',
    statusCode: status ?? undefined,
    remediation: 'Inspect the upstream response; the request may be retried on the other backend.',
  });
}

/** Errors meaning the backend does not exist for this deployment, as opposed to a transient fault. */
export function isPermanentUnavailability(error: unknown): boolean {
  return error instanceof DeploymentNotFoundError || error instanceof FeatureNotEnabledError;
}

export function errorForProbeKind(
  kind: ProbeErrorKind,
  reason: string,
  context: BackendErrorContext,
): BackendRoutingError {
  switch (kind) {
    case 'authentication':
      return new AuthenticationFailedError({ ...context, cause: reason });
    case 'quota':
      return new QuotaExceededError(reason.toLowerCase().includes('token') ? 'tokens' : 'requests', {
        ...context,
        cause: reason,
      });
    case 'timeout':
      return new BackendTimeoutError({ ...context, cause: reason });
    case 'capability':
      return new CapabilityError(reason, { ...context, fallbackAvailable: context.backend === 'primary' });
  }
}
