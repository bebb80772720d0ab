// pattern: Functional Core
// Markdown-style links: "[visible text](https://url)" becomes "visible text"
// plus a link span over the visible text.

import type { LinkSpan } from '../types';
import { byteToChar, fromByteString, toByteString } from './byte-index';

// Byte-level pattern. The visible text may hold any bytes but a newline;
// ASCII whitespace around the URL inside the parentheses is dropped.
const RICH_LINK_PATTERN =
  /\[([^\n]*?)\]\([ \t\n\r\f\v]*(https?:\/\/[^ \t\n\r\f\v)]+)[ \t\n\r\f\v]*\)/;

export type RichLinkRewrite = {
  readonly text: string;
  readonly span: LinkSpan;
};

/**
 * Remove the leftmost markdown link from `text`, keeping its visible text.
 * The returned span is in string indexes of the rewritten text.
 * Returns null when `text` holds no markdown link.
 */
export function rewriteFirstRichLink(text: string): RichLinkRewrite | null {
  const match = RICH_LINK_PATTERN.exec(toByteString(text));
  if (!match) return null;

  const [whole, visible = '', url = ''] = match;
  const byteStart = match.index;
  const visibleByteStart = byteStart + 1;
  const visibleByteEnd = visibleByteStart + visible.length;
  const byteEnd = byteStart + whole.length;

  const start = byteToChar(text, byteStart);
  const visibleStart = byteToChar(text, visibleByteStart);
  const visibleEnd = byteToChar(text, visibleByteEnd);
  const end = byteToChar(text, byteEnd);

  return {
    text: text.slice(0, start) + text.slice(visibleStart, visibleEnd) + text.slice(end),
    span: {
      kind: 'link',
      start,
      end: start + (visibleEnd - visibleStart),
      url: fromByteString(url),
    },
  };
}

/**
 * Rewrite every markdown link in `original`, leftmost first, until none remain.
 * For non-nested links a later rewrite only shortens text after the earlier
 * spans, so all collected spans index the final text.
 */
export function rewriteRichLinks(original: string): { text: string; spans: LinkSpan[] } {
  let text = original;
  const spans: LinkSpan[] = [];

  for (;;) {
    const rewrite = rewriteFirstRichLink(text);
    if (!rewrite) break;
    text = rewrite.text;
    spans.push(rewrite.span);
  }

  return { text, spans };
}
