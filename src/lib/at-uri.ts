// pattern: Functional Core

import type { AtUri } from '../types';
import { InvalidAtUriError } from '../errors';

export type AtUriParts = {
  readonly repo: string;
  readonly collection: string;
  readonly rkey: string;
};

const AT_URI_PATTERN = /^at:\/\/([^/]+)\/([^/]+)\/([^/?#]+)/;

/**
 * Split an AT-URI into the getRecord parameters.
 * @throws InvalidAtUriError when the URI lacks a repo, collection or rkey
 */
export function parseAtUri(uri: AtUri): AtUriParts {
  const match = AT_URI_PATTERN.exec(uri);
  const [, repo, collection, rkey] = match ?? [];
  if (!repo || !collection || !rkey) {
    throw new InvalidAtUriError(uri);
  }
  return { repo, collection, rkey };
}
