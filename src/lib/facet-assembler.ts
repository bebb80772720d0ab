// pattern: Functional Core (mention resolution goes through the injected resolver)
// Merge scanner spans into byte-indexed facets, in the order the service expects.

import type { Facet, FacetFeature, LinkSpan, Span } from '../types';
import { LINK_FEATURE_TYPE, MENTION_FEATURE_TYPE, TAG_FEATURE_TYPE } from '../types';
import type { HandleResolver } from '../api/handle-resolver';
import { charToByte } from './byte-index';
import { scanHashtags, scanMentions, scanUrls } from './facet-scanner';
import { rewriteRichLinks } from './rich-links';

function toFacet(text: string, span: Span, feature: FacetFeature): Facet {
  return {
    index: {
      byteStart: charToByte(text, span.start),
      byteEnd: charToByte(text, span.end),
    },
    features: [feature],
  };
}

/**
 * Build the facet list for `text` (the final, rewritten text).
 *
 * Facets are appended rich links first, then mentions, bare URLs and hashtags,
 * and stably sorted by byteStart, so equal starts keep that order. Mentions are
 * resolved one at a time, left to right. A handle the service rejects is left
 * as plain text; any other resolver failure aborts.
 */
export async function assembleFacets(
  text: string,
  richLinks: readonly LinkSpan[],
  resolver: HandleResolver
): Promise<Facet[]> {
  const facets: Facet[] = [];

  for (const link of richLinks) {
    facets.push(toFacet(text, link, { $type: LINK_FEATURE_TYPE, uri: link.url }));
  }

  for (const mention of scanMentions(text)) {
    const resolution = await resolver.resolve(mention.handle);
    if (resolution.status === 'not-found') {
      console.log(`[Facets] Skipping unresolvable handle @${mention.handle}`);
      continue;
    }
    if (resolution.status === 'error') {
      throw resolution.error;
    }
    facets.push(toFacet(text, mention, { $type: MENTION_FEATURE_TYPE, did: resolution.did }));
  }

  for (const url of scanUrls(text)) {
    facets.push(toFacet(text, url, { $type: LINK_FEATURE_TYPE, uri: url.url }));
  }

  for (const hashtag of scanHashtags(text)) {
    facets.push(toFacet(text, hashtag, { $type: TAG_FEATURE_TYPE, tag: hashtag.tag }));
  }

  return facets.sort((a, b) => a.index.byteStart - b.index.byteStart);
}

/**
 * Rewrite markdown links in `original` and compute facets over the result.
 */
export async function detectFacets(
  original: string,
  resolver: HandleResolver
): Promise<{ text: string; facets: Facet[] }> {
  const { text, spans } = rewriteRichLinks(original);
  const facets = await assembleFacets(text, spans, resolver);
  return { text, facets };
}
