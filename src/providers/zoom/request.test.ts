import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { ZOOM_API_URL } from '../../config/index.js';
import { FakeTransport } from '../../test-support/fake-transport.js';
import { ApiError, TransportError, ZoomError } from './errors.js';
import { parseResponse, ZoomRequestExecutor } from './request.js';
import { signToken } from './token.js';

const NOW = 1700000000;

describe('ZoomRequestExecutor', () => {
  let transport: FakeTransport;
  let executor: ZoomRequestExecutor;

  beforeEach(() => {
    transport = new FakeTransport();
    executor = new ZoomRequestExecutor({
      credentials: { key: 'test-key', secret: 'test-secret' },
      baseUrl: ZOOM_API_URL,
      transport,
      clock: () => NOW
    });
  });

  it('sends GET data as query parameters with a bearer token', async () => {
    transport.on('GET', 'users', { json: { users: [] } });

    const result = await executor.call('users', { status: 'active' });

    expect(result).toEqual({ users: [] });
    expect(transport.requests).toHaveLength(1);
    const [request] = transport.requests;
    expect(request.url).toBe('https://api.zoom.us/v2/users');
    expect(request.method).toBe('GET');
    expect(request.params).toEqual({ status: 'active' });
    expect(request.body).toBeUndefined();
    expect(request.headers).toEqual({
      Authorization: `Bearer ${signToken('test-key', 'test-secret', NOW)}`
    });
  });

  it('serializes structured data as a JSON body for non-GET calls', async () => {
    transport.on('PATCH', 'users/u-1', { status: 204 });

    const result = await executor.call('users/u-1', { type: 1 }, 'PATCH');

    expect(result).toBeNull();
    const [request] = transport.requests;
    expect(request.headers['Content-Type']).toBe('application/json');
    expect(request.body).toBe('{"type":1}');
    expect(request.params).toBeUndefined();
  });

  it('sends string data unchanged and no body for empty data', async () => {
    transport.on('POST', 'users', { status: 201, json: { id: 'u-2' } });
    transport.on('DELETE', 'meetings/42', { status: 204 });

    await executor.call('users', '{"action":"create"}', 'POST');
    await executor.call('meetings/42', null, 'DELETE');

    expect(transport.requests[0].body).toBe('{"action":"create"}');
    expect(transport.requests[1].body).toBeUndefined();
    expect(transport.requests[1].headers['Content-Type']).toBe('application/json');
  });

  it('signs a fresh token for every call', async () => {
    let now = NOW;
    executor = new ZoomRequestExecutor({
      credentials: { key: 'test-key', secret: 'test-secret' },
      baseUrl: ZOOM_API_URL,
      transport,
      clock: () => now++
    });
    transport.on('GET', 'users/me', { json: { id: 'me' } });

    await executor.call('users/me');
    await executor.call('users/me');

    expect(transport.requests[0].headers.Authorization).toBe(`Bearer ${signToken('test-key', 'test-secret', NOW)}`);
    expect(transport.requests[1].headers.Authorization).toBe(`Bearer ${signToken('test-key', 'test-secret', NOW + 1)}`);
  });

  it('raises ApiError with the upstream message for error statuses', async () => {
    transport.on('GET', 'users/nobody@example.edu', { status: 404, json: { code: 1001, message: 'User not found' } });

    const error = await executor.call('users/nobody@example.edu').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: 'User not found', status: 404, code: 1001 });
  });

  it('falls back to the status code when the error body has no message', async () => {
    transport.on('GET', 'users', { status: 502, body: '<html>Bad gateway</html>' });
    transport.on('GET', 'users/me', { status: 500 });

    await expect(executor.call('users')).rejects.toThrow(new ApiError('HTTP Status 502', 502));
    const error = await executor.call('users/me').catch((err: unknown) => err);
    expect(error).toMatchObject({ message: 'HTTP Status 500', status: 500, code: undefined });
  });

  it('wraps transport failures in TransportError', async () => {
    transport.on('GET', 'users', new Error('connect ECONNREFUSED 127.0.0.1:443'));

    const error = await executor.call('users').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toBeInstanceOf(ZoomError);
    expect(error).toMatchObject({ message: 'connect ECONNREFUSED 127.0.0.1:443' });
  });

  it('returns null for a successful response that is not JSON', async () => {
    transport.on('GET', 'users', { body: 'OK' });

    await expect(executor.call('users')).resolves.toBeNull();
  });
});

describe('parseResponse', () => {
  const schema = z.object({ token: z.string() });

  it('returns the parsed value', () => {
    expect(parseResponse(schema, { token: 'zak-token' }, 'users/me/token')).toEqual({ token: 'zak-token' });
  });

  it('rejects a response of the wrong shape', () => {
    expect(() => parseResponse(schema, null, 'users/me/token')).toThrow(
      new ZoomError('Unexpected response from Zoom for users/me/token')
    );
  });
});
