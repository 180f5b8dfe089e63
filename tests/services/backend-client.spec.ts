import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackendHttpError, HttpBackendClient, linkTimeoutSignal } from '../../src/services/backend-client.js';
import { classifyBackendError, FeatureNotEnabledError } from '../../src/services/routing-errors.js';
import { makeConfig } from '../harness/fake-backend.js';

describe('HttpBackendClient', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function createClient(): HttpBackendClient {
    const { backend } = makeConfig('/unused');
    return new HttpBackendClient({ ...backend, endpoint: 'https://backend.test/' });
  }

  it('builds the URL of each surface', () => {
    const client = createClient();

    expect(client.urlFor('primary')).toBe('https://backend.test/openai/v1/responses?api-version=preview');
    expect(client.urlFor('models')).toBe('https://backend.test/openai/v1/models?api-version=preview');
    expect(client.urlFor('legacy')).toBe(
      'https://backend.test/openai/deployments/test-deployment/chat/completions?api-version=2024-10-21',
    );
  });

  it('sends a minimal primary probe with the api key header', async () => {
    fetchMock.mockResolvedValue(new Response('{"error":"bad request"}', { status: 400 }));
    const signal = new AbortController().signal;

    const response = await createClient().probePrimary(signal);

    expect(response).toEqual({ status: 400, bodyText: '{"error":"bad request"}' });
    expect(fetchMock).toHaveBeenCalledWith('https://backend.test/openai/v1/responses?api-version=preview', {
      method: 'POST',
      headers: { 'api-key': 'test-secret', 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: 'test-deployment', input: 'ping', max_output_tokens: 16 }),
      signal,
    });
  });

  it('lists models with a GET and no body', async () => {
    fetchMock.mockResolvedValue(new Response('{"data":[]}', { status: 200 }));

    await createClient().probeModels(new AbortController().signal);

    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ method: 'GET', headers: { 'api-key': 'test-secret' }, body: undefined });
  });

  it('parses successful request bodies', async () => {
    fetchMock.mockResolvedValue(new Response('{"id":"resp-1"}', { status: 200 }));

    expect(await createClient().send('legacy', { messages: [] })).toEqual({ id: 'resp-1' });
  });

  it('throws a status-bearing error for non-2xx answers', async () => {
    fetchMock.mockResolvedValue(new Response('Resource not found', { status: 404 }));

    const failure = await createClient()
      .send('primary', { input: 'hello' })
      .then(
        () => null,
        (error: unknown) => error,
      );

    expect(failure).toBeInstanceOf(BackendHttpError);
    expect(classifyBackendError(failure, { backend: 'primary' })).toBeInstanceOf(FeatureNotEnabledError);
  });
});

describe('linkTimeoutSignal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts with a TimeoutError when the deadline passes', () => {
    vi.useFakeTimers();
    const { signal, dispose } = linkTimeoutSignal(100);

    vi.advanceTimersByTime(100);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(Error);
    expect(signal.reason.name).toBe('TimeoutError');
    dispose();
  });

  it('follows the parent signal', () => {
    const parent = new AbortController();
    const { signal, dispose } = linkTimeoutSignal(10_000, parent.signal);

    parent.abort(new Error('shutdown'));

    expect(signal.aborted).toBe(true);
    dispose();
  });

  it('does not fire after dispose', () => {
    vi.useFakeTimers();
    const { signal, dispose } = linkTimeoutSignal(100);

    dispose();
    vi.advanceTimersByTime(200);

    expect(signal.aborted).toBe(false);
  });
});
