import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { XrpcHandleResolver, resolveHandleOrThrow } from './handle-resolver';
import type { HandleResolver } from './handle-resolver';
import { InvalidHandleError } from '../errors';

describe('XrpcHandleResolver', () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  const resolver = new XrpcHandleResolver({
    service: 'https://pds.example',
    accessJwt: 'test-token',
  });

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('resolves a handle to its DID', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ did: 'did:plc:abc' })));

    await expect(resolver.resolve('alice.test')).resolves.toEqual({
      status: 'resolved',
      did: 'did:plc:abc',
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://pds.example/xrpc/com.atproto.identity.resolveHandle?handle=alice.test'
    );
  });

  it('reports a 400 as not found', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"InvalidRequest"}', { status: 400 }));

    await expect(resolver.resolve('ghost.test')).resolves.toEqual({
      status: 'not-found',
      handle: 'ghost.test',
    });
  });

  it('reports other failures as errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('upstream down', { status: 502 }));

    const result = await resolver.resolve('alice.test');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.message).toBe(
        'com.atproto.identity.resolveHandle failed: 502 upstream down'
      );
    }
  });

  it('reports network failures as errors', async () => {
    const failure = new TypeError('fetch failed');
    fetchMock.mockRejectedValueOnce(failure);

    await expect(resolver.resolve('alice.test')).resolves.toEqual({
      status: 'error',
      error: failure,
    });
  });
});

describe('resolveHandleOrThrow', () => {
  it('returns the DID', async () => {
    const resolver: HandleResolver = {
      resolve: async () => ({ status: 'resolved', did: 'did:plc:abc' }),
    };
    await expect(resolveHandleOrThrow(resolver, 'alice.test')).resolves.toBe('did:plc:abc');
  });

  it('throws InvalidHandleError for an unknown handle', async () => {
    const resolver: HandleResolver = {
      resolve: async (handle) => ({ status: 'not-found', handle }),
    };
    await expect(resolveHandleOrThrow(resolver, 'ghost.test')).rejects.toThrow(
      'Invalid user handle ghost.test'
    );
    await expect(resolveHandleOrThrow(resolver, 'ghost.test')).rejects.toBeInstanceOf(
      InvalidHandleError
    );
  });

  it('rethrows transport errors', async () => {
    const failure = new Error('timeout');
    const resolver: HandleResolver = {
      resolve: async () => ({ status: 'error', error: failure }),
    };
    await expect(resolveHandleOrThrow(resolver, 'alice.test')).rejects.toBe(failure);
  });
});
