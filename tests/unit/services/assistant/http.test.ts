import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { ProviderRequestError, backoffDelay, requestJson } from '@/services/assistant/http';

const policy = { timeoutMs: 1000, maxRetries: 1, retryDelayMs: 0 };
const schema = z.object({ ok: z.boolean() });

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('requestJson', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends a JSON body and returns the validated response', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    const result = await requestJson({
      label: 'test',
      url: 'https://provider.test/v1/thing',
      headers: { 'x-api-key': 'test-key' },
      body: { hello: 'world' },
      schema,
      policy,
    });

    expect(result).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://provider.test/v1/thing');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'x-api-key': 'test-key' });
    expect(init?.body).toBe('{"hello":"world"}');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('sends no body or content type for a GET', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    await requestJson({ label: 'test', url: 'https://provider.test', method: 'GET', schema, policy });

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({});
    expect(init?.body).toBeUndefined();
  });

  it('retries a 5xx once and then succeeds', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: 'overloaded' }, 503))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    const result = await requestJson({ label: 'test', url: 'https://provider.test', schema, policy });

    expect(result).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries 429', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse({ ok: false }));

    await expect(
      requestJson({ label: 'test', url: 'https://provider.test', schema, policy })
    ).resolves.toEqual({ ok: false });
  });

  it('gives up after the configured retries', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ error: 'down' }, 500));

    const error = await requestJson({ label: 'test', url: 'https://provider.test', schema, policy }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({ status: 500, retryable: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry other 4xx responses', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'bad key' }, 403));

    const error = await requestJson({ label: 'test', url: 'https://provider.test', schema, policy }).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({ status: 403, retryable: false });
    expect(error).toHaveProperty('message', 'HTTP 403: {"error":"bad key"}');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports timeouts and retries them', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), {
      name: 'TimeoutError',
    });
    fetchMock.mockRejectedValue(timeout);

    const error = await requestJson({ label: 'test', url: 'https://provider.test', schema, policy }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toHaveProperty('message', 'timed out after 1000ms');
    expect(error).toHaveProperty('cause', timeout);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries network errors', async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    await expect(
      requestJson({ label: 'test', url: 'https://provider.test', schema, policy })
    ).resolves.toEqual({ ok: true });
  });

  it('does not retry when retries are disabled', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      requestJson({
        label: 'test',
        url: 'https://provider.test',
        schema,
        policy: { ...policy, maxRetries: 0 },
      })
    ).rejects.toThrow('network error: fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects a response of the wrong shape without retrying', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: 'yes' }));

    const error = await requestJson({ label: 'test', url: 'https://provider.test', schema, policy }).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({ retryable: false, status: 200 });
    expect(error).toHaveProperty('message', expect.stringMatching(/^unexpected response shape/));
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects a body that is not JSON', async () => {
    fetchMock.mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(
      requestJson({ label: 'test', url: 'https://provider.test', schema, policy })
    ).rejects.toThrow('response body is not JSON');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt with jitter in [0.5, 1)', () => {
    for (let i = 0; i < 20; i++) {
      const first = backoffDelay(0, 100);
      const second = backoffDelay(1, 100);
      expect(first).toBeGreaterThanOrEqual(50);
      expect(first).toBeLessThanOrEqual(100);
      expect(second).toBeGreaterThanOrEqual(100);
      expect(second).toBeLessThanOrEqual(200);
    }
  });

  it('is zero for a zero base', () => {
    expect(backoffDelay(3, 0)).toBe(0);
  });
});
