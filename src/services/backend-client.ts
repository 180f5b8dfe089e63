import type { RouterConfig } from '../config/router-config.js';
import type { BackendType } from '../types/routing.js';
import { scrubSensitiveText } from '../utils/logger.js';

export interface ProbeHttpResponse {
  status: number;
  bodyText: string;
}

/** Minimal, low-cost requests used to decide whether an endpoint exists and answers. */
export interface BackendProbeClient {
  probePrimary(signal: AbortSignal): Promise<ProbeHttpResponse>;
  probeLegacy(signal: AbortSignal): Promise<ProbeHttpResponse>;
  probeModels(signal: AbortSignal): Promise<ProbeHttpResponse>;
}

export interface BackendRequestClient {
  send(backend: BackendType, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}

/** Non-2xx upstream answer. Carries `status` so error classification can read it. */
export class BackendHttpError extends Error {
  readonly status: number;
  readonly backend: BackendType;

  constructor(backend: BackendType, status: number, bodyText: string) {
    super(`HTTP ${status} from ${backend} backend: ${scrubSensitiveText(bodyText).slice(0, 500)}`);
    this.name = 'BackendHttpError';
    this.status = status;
    this.backend = backend;
  }
}

const PROBE_INPUT = 'ping';

/**
 * Abort signal that fires after `timeoutMs` or when `parent` aborts, whichever is first.
 * Callers must invoke `dispose` once the request settles.
 */
export function linkTimeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    const timeoutError = new Error(`Request timed out after ${timeoutMs}ms`);
    timeoutError.name = 'TimeoutError';
    controller.abort(timeoutError);
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * `fetch`-based client for the two backend surfaces of one upstream resource.
 *
 *   primary: POST {endpoint}/openai/v1/responses?api-version={primaryApiVersion}
 *   legacy:  POST {endpoint}/openai/deployments/{deployment}/chat/completions?api-version={apiVersion}
 *   models:  GET  {endpoint}/openai/v1/models?api-version={primaryApiVersion}
 */
export class HttpBackendClient implements BackendProbeClient, BackendRequestClient {
  private readonly backend: RouterConfig['backend'];

  constructor(backend: RouterConfig['backend']) {
    this.backend = backend;
  }

  public urlFor(target: BackendType | 'models'): string {
    const base = this.backend.endpoint.replace(/\/+$/, '');
    if (target === 'primary') {
      return `${base}/openai/v1/responses?api-version=${encodeURIComponent(this.backend.primaryApiVersion)}`;
    }
    if (target === 'models') {
      return `${base}/openai/v1/models?api-version=${encodeURIComponent(this.backend.primaryApiVersion)}`;
    }
    const deployment = encodeURIComponent(this.backend.deployment);
    return `${base}/openai/deployments/${deployment}/chat/completions?api-version=${encodeURIComponent(this.backend.apiVersion)}`;
  }

  public async probePrimary(signal: AbortSignal): Promise<ProbeHttpResponse> {
    return this.request('POST', this.urlFor('primary'), signal, {
      model: this.backend.deployment,
      input: PROBE_INPUT,
      max_output_tokens: 16,
    });
  }

  public async probeLegacy(signal: AbortSignal): Promise<ProbeHttpResponse> {
    return this.request('POST', this.urlFor('legacy'), signal, {
      messages: [{ role: 'user', content: PROBE_INPUT }],
      max_tokens: 1,
    });
  }

  public async probeModels(signal: AbortSignal): Promise<ProbeHttpResponse> {
    return this.request('GET', this.urlFor('models'), signal);
  }

  public async send(
    backend: BackendType,
    payload: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const body = backend === 'primary' ? { model: this.backend.deployment, ...payload } : payload;
    const { signal: requestSignal, dispose } = linkTimeoutSignal(this.backend.requestTimeoutMs, signal);
    try {
      const response = await this.request('POST', this.urlFor(backend), requestSignal, body);
      if (response.status < 200 || response.status >= 300) {
        throw new BackendHttpError(backend, response.status, response.bodyText);
      }
      return response.bodyText ? JSON.parse(response.bodyText) : {};
    } finally {
      dispose();
    }
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    signal: AbortSignal,
    body?: Record<string, unknown>,
  ): Promise<ProbeHttpResponse> {
    const response = await fetch(url, {
      method,
      headers: {
        'api-key': this.backend.apiKey,
        ...(body ? { 'Content-Type': 'application/json' } : {}),
      },
      body: body ? JSON.stringify(body) : undefined,
      signal,
    });
    return { status: response.status, bodyText: await response.text() };
  }
}
