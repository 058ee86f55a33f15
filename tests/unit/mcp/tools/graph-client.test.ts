/**
 * Graph Client Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { DownstreamRequestError, GraphClient } from '../../../../src/mcp/tools/graph-client.js';
import type { DownstreamCredential } from '../../../../src/delegation/types.js';

const credential: DownstreamCredential = {
  accessToken: 'downstream-token',
  tokenType: 'Bearer',
  source: 'exchange',
};

const ProfileSchema = z.object({ displayName: z.string() });

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

async function captureError(promise: Promise<unknown>): Promise<DownstreamRequestError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason
  );
  if (!(error instanceof DownstreamRequestError)) {
    throw new Error('expected a DownstreamRequestError');
  }
  return error;
}

describe('GraphClient', () => {
  it('should send the downstream credential and parse the body', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ displayName: 'Ada' }));
    const graph = new GraphClient({
      baseUrl: 'https://graph.example.test/v1.0/',
      timeoutMs: 1000,
      fetch: fetchMock,
    });

    const profile = await graph.get('/me', credential, ProfileSchema);

    expect(profile).toEqual({ displayName: 'Ada' });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://graph.example.test/v1.0/me',
      expect.objectContaining({
        method: 'GET',
        headers: { Authorization: 'Bearer downstream-token', Accept: 'application/json' },
      })
    );
  });

  it('should report a non-2xx status without the response body', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ error: { message: 'secret detail' } }, 403));
    const graph = new GraphClient({ baseUrl: 'https://g.test', timeoutMs: 1000, fetch: fetchMock });

    const error = await captureError(graph.get('/me', credential, ProfileSchema));

    expect(error.message).toBe('Downstream request failed with HTTP 403');
    expect(error.status).toBe(403);
    expect(error.path).toBe('/me');
  });

  it('should report a body that is not JSON', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html/>'));
    const graph = new GraphClient({ baseUrl: 'https://g.test', timeoutMs: 1000, fetch: fetchMock });

    const error = await captureError(graph.get('/me', credential, ProfileSchema));

    expect(error.message).toBe('Downstream response is not JSON');
  });

  it('should report an unexpected body shape', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ name: 'Ada' }));
    const graph = new GraphClient({ baseUrl: 'https://g.test', timeoutMs: 1000, fetch: fetchMock });

    const error = await captureError(graph.get('/me', credential, ProfileSchema));

    expect(error.message).toBe('Downstream response has an unexpected shape');
  });

  it('should report transport failures', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const graph = new GraphClient({ baseUrl: 'https://g.test', timeoutMs: 1000, fetch: fetchMock });

    const error = await captureError(graph.get('/me', credential, ProfileSchema));

    expect(error.message).toBe('Downstream request failed: fetch failed');
    expect(error.status).toBeUndefined();
  });

  it('should time out a stalled request', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const graph = new GraphClient({ baseUrl: 'https://g.test', timeoutMs: 20, fetch: fetchMock });

    const error = await captureError(graph.get('/me', credential, ProfileSchema));

    expect(error.message).toBe('Downstream request timed out after 20ms');
  });
});
