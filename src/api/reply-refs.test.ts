import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getReplyRefs } from './reply-refs';
import type { GetRecordResponse } from '../types';

const ROOT_URI = 'at://did:plc:root/app.bsky.feed.post/root1';
const PARENT_URI = 'at://did:plc:parent/app.bsky.feed.post/parent1';

function record(uri: string, cid: string, reply?: GetRecordResponse['value']['reply']): Response {
  const body: GetRecordResponse = { uri, cid, value: { text: 'x', ...(reply && { reply }) } };
  return new Response(JSON.stringify(body));
}

describe('getReplyRefs', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('uses the parent as root for a top-level post', async () => {
    fetchMock.mockResolvedValueOnce(record(PARENT_URI, 'cid-parent'));

    const refs = await getReplyRefs(PARENT_URI, { service: 'https://pds.example' });

    expect(refs).toEqual({
      root: { uri: PARENT_URI, cid: 'cid-parent' },
      parent: { uri: PARENT_URI, cid: 'cid-parent' },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://pds.example/xrpc/com.atproto.repo.getRecord?repo=did%3Aplc%3Aparent&collection=app.bsky.feed.post&rkey=parent1'
    );
  });

  it('fetches the thread root when the parent is itself a reply', async () => {
    fetchMock
      .mockResolvedValueOnce(
        record(PARENT_URI, 'cid-parent', {
          root: { uri: ROOT_URI, cid: 'cid-root-stale' },
          parent: { uri: ROOT_URI, cid: 'cid-root-stale' },
        })
      )
      .mockResolvedValueOnce(record(ROOT_URI, 'cid-root'));

    const refs = await getReplyRefs(PARENT_URI, { service: 'https://pds.example' });

    expect(refs).toEqual({
      root: { uri: ROOT_URI, cid: 'cid-root' },
      parent: { uri: PARENT_URI, cid: 'cid-parent' },
    });
    expect(fetchMock.mock.calls[1]?.[0]).toContain('rkey=root1');
  });

  it('rejects a malformed parent URI before any request', async () => {
    await expect(getReplyRefs('not-a-uri', { service: 'https://pds.example' })).rejects.toThrow(
      'Invalid AT-URI: not-a-uri'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
