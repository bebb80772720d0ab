// pattern: Imperative Shell
// Link-preview card built from a page's Open Graph tags.

import { JSDOM } from 'jsdom';
import type { ExternalCard } from '../types';
import { EXTERNAL_EMBED_TYPE } from '../types';
import { EmbedCardFetchError } from '../errors';
import type { AttachContext, EmbedFragment } from './attachments';

const THUMB_MIME_TYPE = 'image/png';

export type OpenGraphTags = {
  readonly title: string;
  readonly description: string;
  readonly image?: string;
};

/** Read og:title, og:description and og:image from an HTML document. */
export function parseOpenGraph(html: string): OpenGraphTags {
  const dom = new JSDOM(html);
  try {
    const { document } = dom.window;
    const content = (property: string): string | null =>
      document.querySelector(`meta[property="${property}"]`)?.getAttribute('content') ?? null;

    const image = content('og:image');
    return {
      title: content('og:title') ?? '',
      description: content('og:description') ?? '',
      ...(image ? { image } : {}),
    };
  } finally {
    dom.window.close();
  }
}

/**
 * Turn an og:image value into a fetchable URL. A value without "://" is
 * appended to the page URL as-is, which only works for simple relative paths.
 */
export function resolveImageUrl(pageUrl: string, image: string): string {
  return image.includes('://') ? image : pageUrl + image;
}

export class WebCard {
  readonly kind = 'webcard' as const;

  constructor(readonly url: string) {}

  /**
   * Fetch the page, read its card metadata and upload the thumbnail.
   * @throws EmbedCardFetchError wrapping whatever failed along the way
   */
  async attach(context: AttachContext): Promise<EmbedFragment> {
    try {
      const external = await this.fetchCard(context);
      return { type: 'webcard', embed: { $type: EXTERNAL_EMBED_TYPE, external } };
    } catch (error) {
      throw new EmbedCardFetchError(this.url, error);
    }
  }

  private async fetchCard({ fetcher, uploader }: AttachContext): Promise<ExternalCard> {
    const tags = parseOpenGraph(await fetcher.fetchHtml(this.url));
    const card = { uri: this.url, title: tags.title, description: tags.description };
    if (!tags.image) return card;

    const imageUrl = resolveImageUrl(this.url, tags.image);
    const bytes = await fetcher.fetchBytes(imageUrl);
    const thumb = await uploader.upload(bytes, THUMB_MIME_TYPE);
    console.log(`[WebCard] Uploaded thumbnail for ${this.url}`);
    return { ...card, thumb };
  }
}
