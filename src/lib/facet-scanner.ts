// pattern: Functional Core
// Mention, hashtag and bare URL scanners.
// Each pattern runs over the UTF-8 bytes of the text and needs one non-word
// byte before the token, so a token at the very start of the text never matches.

import type { LinkSpan, MentionSpan, TagSpan } from '../types';
import { byteToChar, fromByteString, toByteString } from './byte-index';

// Handle syntax: https://atproto.com/specs/handle#handle-identifier-syntax
const MENTION_PATTERN =
  /\W(@(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)/g;

const HASHTAG_PATTERN = /\W(#\w+)/g;

// The final character class leaves out trailing sentence punctuation.
const URL_PATTERN =
  /\W(https?:\/\/(?:www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b(?:[-a-zA-Z0-9()@:%_+.~#?&/=]*[-a-zA-Z0-9@%_+~#/=])?)/g;

type ByteMatch = {
  readonly byteStart: number;
  readonly byteEnd: number;
  readonly token: string;
};

/** Run a global byte pattern whose group 1 is the token after a one-byte prefix. */
function scanBytes(text: string, pattern: RegExp): ByteMatch[] {
  const matches: ByteMatch[] = [];
  for (const match of toByteString(text).matchAll(pattern)) {
    const token = match[1];
    if (token === undefined || match.index === undefined) continue;
    const byteEnd = match.index + match[0].length;
    matches.push({ byteStart: byteEnd - token.length, byteEnd, token });
  }
  return matches;
}

/** Find @handle mentions. The handle excludes the leading "@". */
export function scanMentions(text: string): MentionSpan[] {
  return scanBytes(text, MENTION_PATTERN).map((m) => ({
    kind: 'mention',
    start: byteToChar(text, m.byteStart),
    end: byteToChar(text, m.byteEnd),
    handle: m.token.slice(1),
  }));
}

/** Find #hashtags made of ASCII word characters. The tag excludes the leading "#". */
export function scanHashtags(text: string): TagSpan[] {
  return scanBytes(text, HASHTAG_PATTERN).map((m) => ({
    kind: 'tag',
    start: byteToChar(text, m.byteStart),
    end: byteToChar(text, m.byteEnd),
    tag: m.token.slice(1),
  }));
}

/** Find bare http(s) URLs. */
export function scanUrls(text: string): LinkSpan[] {
  return scanBytes(text, URL_PATTERN).map((m) => ({
    kind: 'link',
    start: byteToChar(text, m.byteStart),
    end: byteToChar(text, m.byteEnd),
    url: fromByteString(m.token),
  }));
}
