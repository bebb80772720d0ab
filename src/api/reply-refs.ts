// pattern: Imperative Shell
// Root and parent references for replying to an existing post.

import type { AtUri, GetRecordResponse, ReplyRefs } from '../types';
import { parseAtUri } from '../lib/at-uri';
import { xrpc } from './xrpc';

const GET_RECORD = 'com.atproto.repo.getRecord';

export type ReplyRefsOptions = {
  readonly service: string;
  readonly accessJwt?: string;
  readonly timeoutMs?: number;
};

async function getRecord(uri: AtUri, options: ReplyRefsOptions): Promise<GetRecordResponse> {
  return xrpc<GetRecordResponse>({
    service: options.service,
    nsid: GET_RECORD,
    params: parseAtUri(uri),
    accessJwt: options.accessJwt,
    timeoutMs: options.timeoutMs,
  });
}

/**
 * Fetch the parent record; if it is itself a reply, also fetch its thread
 * root, otherwise the parent is the root.
 */
export async function getReplyRefs(parentUri: AtUri, options: ReplyRefsOptions): Promise<ReplyRefs> {
  const parent = await getRecord(parentUri, options);
  const parentReply = parent.value.reply;
  const root = parentReply ? await getRecord(parentReply.root.uri, options) : parent;

  return {
    root: { uri: root.uri, cid: root.cid },
    parent: { uri: parent.uri, cid: parent.cid },
  };
}
