// pattern: Imperative Shell
// Resolve human-readable handles (alice.bsky.social) to DIDs.

import type { Did } from '../types';
import { InvalidHandleError, XrpcError } from '../errors';
import { xrpc } from './xrpc';

const RESOLVE_HANDLE = 'com.atproto.identity.resolveHandle';

/**
 * Outcome of resolving one handle. `not-found` is an expected result
 * (the service rejected the handle); `error` is a transport or server failure.
 */
export type HandleResolution =
  | { readonly status: 'resolved'; readonly did: Did }
  | { readonly status: 'not-found'; readonly handle: string }
  | { readonly status: 'error'; readonly error: Error };

export interface HandleResolver {
  resolve(handle: string): Promise<HandleResolution>;
}

export type XrpcHandleResolverOptions = {
  readonly service: string;
  readonly accessJwt?: string;
  readonly timeoutMs?: number;
};

export class XrpcHandleResolver implements HandleResolver {
  constructor(private readonly options: XrpcHandleResolverOptions) {}

  async resolve(handle: string): Promise<HandleResolution> {
    try {
      const data = await xrpc<{ did: Did }>({
        service: this.options.service,
        nsid: RESOLVE_HANDLE,
        params: { handle },
        accessJwt: this.options.accessJwt,
        timeoutMs: this.options.timeoutMs,
      });
      return { status: 'resolved', did: data.did };
    } catch (error) {
      if (error instanceof XrpcError && error.status === 400) {
        return { status: 'not-found', handle };
      }
      return {
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }
}

/**
 * Resolve a handle where an unresolvable handle is a caller error.
 * @throws InvalidHandleError when the service rejects the handle
 */
export async function resolveHandleOrThrow(resolver: HandleResolver, handle: string): Promise<Did> {
  const result = await resolver.resolve(handle);
  switch (result.status) {
    case 'resolved':
      return result.did;
    case 'not-found':
      throw new InvalidHandleError(handle);
    case 'error':
      throw result.error;
  }
}
