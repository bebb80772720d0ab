// pattern: Imperative Shell
// Minimal XRPC transport over fetch. One request, no retries: callers own retry policy.

import { XrpcError } from '../errors';

export type XrpcParams = Readonly<Record<string, string | number | readonly string[] | undefined>>;

export type XrpcRequest = {
  readonly service: string;
  readonly nsid: string;
  readonly method?: 'GET' | 'POST';
  readonly params?: XrpcParams;
  /** JSON-serialised unless `contentType` is set, in which case it is sent as-is. */
  readonly body?: unknown;
  readonly contentType?: string;
  readonly accessJwt?: string;
  readonly timeoutMs?: number;
};

/** Build the full endpoint URL, repeating the key for array parameters. */
export function buildXrpcUrl(service: string, nsid: string, params: XrpcParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, item);
    } else {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return `${service}/xrpc/${nsid}${query ? `?${query}` : ''}`;
}

function encodeBody(request: XrpcRequest): { body?: BodyInit; contentType?: string } {
  if (request.body === undefined) return {};
  if (request.contentType) {
    const raw = request.body;
    if (typeof raw === 'string') {
      return { body: raw, contentType: request.contentType };
    }
    if (raw instanceof Uint8Array) {
      // fetch bodies must sit on a plain ArrayBuffer
      return { body: raw.slice(), contentType: request.contentType };
    }
    throw new TypeError(`${request.nsid}: raw body must be a string or Uint8Array`);
  }
  return { body: JSON.stringify(request.body), contentType: 'application/json' };
}

/**
 * Perform an XRPC call and return the parsed JSON response.
 * @throws XrpcError on a non-2xx response; network and timeout errors propagate unchanged
 */
export async function xrpc<T>(request: XrpcRequest): Promise<T> {
  const url = buildXrpcUrl(request.service, request.nsid, request.params);
  const { body, contentType } = encodeBody(request);

  const headers: Record<string, string> = {};
  if (contentType) headers['Content-Type'] = contentType;
  if (request.accessJwt) headers['Authorization'] = `Bearer ${request.accessJwt}`;

  const response = await fetch(url, {
    method: request.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
    signal: request.timeoutMs ? AbortSignal.timeout(request.timeoutMs) : undefined,
  });

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new XrpcError(request.nsid, response.status, text);
  }

  return (await response.json()) as T;
}
