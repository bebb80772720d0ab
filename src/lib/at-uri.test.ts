import { describe, it, expect } from 'vitest';
import { parseAtUri } from './at-uri';
import { InvalidAtUriError } from '../errors';

describe('parseAtUri', () => {
  it('splits a post URI', () => {
    expect(parseAtUri('at://did:plc:abc/app.bsky.feed.post/3kxyz')).toEqual({
      repo: 'did:plc:abc',
      collection: 'app.bsky.feed.post',
      rkey: '3kxyz',
    });
  });

  it('accepts a handle as the repo', () => {
    expect(parseAtUri('at://example.com:repo/collection/rkey')).toEqual({
      repo: 'example.com:repo',
      collection: 'collection',
      rkey: 'rkey',
    });
  });

  it('rejects a URI without an rkey', () => {
    expect(() => parseAtUri('at://example.com/collection')).toThrow(InvalidAtUriError);
  });

  it('rejects an empty string', () => {
    expect(() => parseAtUri('')).toThrow('Invalid AT-URI: ');
  });

  it('rejects other schemes', () => {
    expect(() => parseAtUri('https://example.com/a/b')).toThrow(InvalidAtUriError);
  });
});
