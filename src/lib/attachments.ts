// pattern: Functional Core
// Attachment variants, cardinality rules, and how their embed fragments combine.

import type { Embed, ExternalEmbed, ImageEmbedItem, VideoEmbed } from '../types';
import { IMAGES_EMBED_TYPE } from '../types';
import {
  InvalidAttachmentsError,
  TooManyAttachmentsError,
  TooManyImagesError,
} from '../errors';
import type { BlobUploader } from '../api/blob-uploader';
import type { HtmlFetcher } from '../api/html-fetcher';
import type { ImageAttachment } from './image-attachment';
import type { VideoAttachment } from './video-attachment';
import type { WebCard } from './web-card';

export const DEFAULT_MAX_IMAGES = 4;

/** Services an attachment needs to turn itself into embed data. */
export type AttachContext = {
  readonly uploader: BlobUploader;
  readonly fetcher: HtmlFetcher;
};

/** What one attachment contributes to the post's embed. */
export type EmbedFragment =
  | { readonly type: 'image'; readonly image: ImageEmbedItem }
  | { readonly type: 'video'; readonly embed: VideoEmbed }
  | { readonly type: 'webcard'; readonly embed: ExternalEmbed };

export type Attachment = ImageAttachment | VideoAttachment | WebCard;

/**
 * Check that a post's attachments can share one embed: up to `maxImages`
 * images, or exactly one video or link card.
 */
export function validateAttachments(
  attachments: readonly Attachment[],
  maxImages = DEFAULT_MAX_IMAGES
): void {
  const images = attachments.filter((a) => a.kind === 'image').length;
  const others = attachments.length - images;

  if (others === 0) {
    if (images > maxImages) throw new TooManyImagesError(images, maxImages);
    return;
  }
  if (images > 0) {
    throw new InvalidAttachmentsError(
      `Cannot mix images with video or link-card attachments (${images} images, ${others} others)`
    );
  }
  if (others > 1) throw new TooManyAttachmentsError(others);
}

/**
 * Combine fragments into the post embed. Images collect into one images
 * embed in attachment order; a video or link card is the embed on its own.
 */
export function mergeEmbedFragments(fragments: readonly EmbedFragment[]): Embed | undefined {
  if (fragments.length === 0) return undefined;

  const images: ImageEmbedItem[] = [];
  const single: Array<VideoEmbed | ExternalEmbed> = [];
  for (const fragment of fragments) {
    if (fragment.type === 'image') images.push(fragment.image);
    else single.push(fragment.embed);
  }

  if (single.length === 0) {
    return { $type: IMAGES_EMBED_TYPE, images };
  }
  const [embed] = single;
  if (images.length > 0 || single.length > 1 || !embed) {
    throw new InvalidAttachmentsError('Attachments produced more than one embed');
  }
  return embed;
}
