// pattern: Imperative Shell
// Session creation and refresh via the createSession/refreshSession XRPC endpoints.

import type { Session } from '../types';
import { SessionNotAuthenticatedError } from '../errors';
import { xrpc } from './xrpc';

const CREATE_SESSION = 'com.atproto.server.createSession';
const REFRESH_SESSION = 'com.atproto.server.refreshSession';

export type AuthConfig = {
  readonly identifier: string;
  readonly password: string;
  readonly service: string;
  readonly timeoutMs?: number;
};

export type AuthResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

function toSession(data: Session): Session {
  return {
    did: data.did,
    handle: data.handle,
    accessJwt: data.accessJwt,
    refreshJwt: data.refreshJwt,
    ...(data.email !== undefined && { email: data.email }),
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create a new session (login).
 * POST com.atproto.server.createSession
 */
export async function createSession(config: AuthConfig): Promise<AuthResult<Session>> {
  try {
    const data = await xrpc<Session>({
      service: config.service,
      nsid: CREATE_SESSION,
      body: { identifier: config.identifier, password: config.password },
      timeoutMs: config.timeoutMs,
    });
    return { ok: true, value: toSession(data) };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

/**
 * Refresh an existing session using the refresh token.
 * POST com.atproto.server.refreshSession
 */
export async function refreshSession(
  refreshJwt: string,
  service: string,
  timeoutMs?: number
): Promise<AuthResult<Session>> {
  try {
    const data = await xrpc<Session>({
      service,
      nsid: REFRESH_SESSION,
      method: 'POST',
      accessJwt: refreshJwt,
      timeoutMs,
    });
    return { ok: true, value: toSession(data) };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

/**
 * Holds the current session. Read-only to post building: the access token is
 * handed to the uploader and resolver when a client operation starts.
 */
export class SessionManager {
  private session: Session | null = null;

  /** Get the current session, or null if not authenticated. */
  getSession(): Session | null {
    return this.session;
  }

  setSession(session: Session | null): void {
    this.session = session;
  }

  /**
   * The current session; a missing session or empty access token is a
   * precondition failure.
   * @throws SessionNotAuthenticatedError
   */
  requireSession(): Session {
    if (!this.session || !this.session.accessJwt) {
      throw new SessionNotAuthenticatedError();
    }
    return this.session;
  }
}
