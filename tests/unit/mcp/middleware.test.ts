/**
 * MCP Bearer Middleware Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { IncomingMessage } from 'http';
import { Socket } from 'net';
import {
  createBearerAuthenticator,
  extractBearerToken,
} from '../../../src/mcp/middleware.js';

function requestWith(headers: IncomingMessage['headers']): IncomingMessage {
  const request = new IncomingMessage(new Socket());
  request.headers = headers;
  return request;
}

describe('extractBearerToken', () => {
  it('should return the token from a Bearer header', () => {
    expect(extractBearerToken({ authorization: 'Bearer abc.def.ghi' })).toBe('abc.def.ghi');
  });

  it('should accept any casing of the scheme and trailing whitespace', () => {
    expect(extractBearerToken({ authorization: 'bearer   abc.def.ghi  ' })).toBe('abc.def.ghi');
  });

  it('should return null without a header', () => {
    expect(extractBearerToken({})).toBeNull();
  });

  it('should return null for other schemes', () => {
    expect(extractBearerToken({ authorization: 'Basic dXNlcjpwYXNz' })).toBeNull();
  });

  it('should return null for an empty or split token', () => {
    expect(extractBearerToken({ authorization: 'Bearer ' })).toBeNull();
    expect(extractBearerToken({ authorization: 'Bearer a b' })).toBeNull();
  });
});

describe('createBearerAuthenticator', () => {
  const authenticate = createBearerAuthenticator({
    realm: 'Test Tool Server',
    resourceMetadata: 'https://mcp.example.test/.well-known/oauth-protected-resource',
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should put the bearer credential on the session', async () => {
    const session = await authenticate(requestWith({ authorization: 'Bearer abc.def.ghi' }));

    expect(session).toEqual({ accessToken: 'abc.def.ghi' });
  });

  it('should not judge the credential itself', async () => {
    const session = await authenticate(requestWith({ authorization: 'Bearer garbage' }));

    expect(session.accessToken).toBe('garbage');
  });

  it('should answer a missing credential with a 401 challenge', async () => {
    const thrown = await authenticate(requestWith({})).then(
      () => undefined,
      (error: unknown) => error
    );

    expect(thrown).toBeInstanceOf(Response);
    if (thrown instanceof Response) {
      expect(thrown.status).toBe(401);
      expect(thrown.headers.get('WWW-Authenticate')).toBe(
        'Bearer realm="Test Tool Server", ' +
          'resource_metadata="https://mcp.example.test/.well-known/oauth-protected-resource"'
      );
    }
  });
});
