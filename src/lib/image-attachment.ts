// pattern: Imperative Shell
// Image attachment: loaded eagerly, size-checked on creation, uploaded on every attach.

import { readFile } from 'node:fs/promises';
import type { AspectRatio } from '../types';
import { ImageTooLargeError } from '../errors';
import type { HtmlFetcher } from '../api/html-fetcher';
import { HttpFetcher } from '../api/html-fetcher';
import type { AttachContext, EmbedFragment } from './attachments';
import { resolveAspectRatio } from './aspect-ratio';
import { imageMimeType, readImageDimensions } from './media-dimensions';

export const MAX_IMAGE_BYTES = 1_000_000;

export type ImageAttachmentOptions = {
  readonly aspectRatio?: AspectRatio;
  readonly requireAspectRatio?: boolean;
};

export class ImageAttachment {
  readonly kind = 'image' as const;

  private constructor(
    private readonly data: Uint8Array,
    readonly alt: string,
    private readonly options: ImageAttachmentOptions
  ) {}

  /**
   * @throws ImageTooLargeError when the image exceeds MAX_IMAGE_BYTES
   */
  static fromBytes(
    bytes: Uint8Array,
    alt: string,
    options: ImageAttachmentOptions = {}
  ): ImageAttachment {
    if (bytes.byteLength > MAX_IMAGE_BYTES) {
      throw new ImageTooLargeError(bytes.byteLength, MAX_IMAGE_BYTES);
    }
    return new ImageAttachment(bytes, alt, options);
  }

  static async fromFile(
    path: string,
    alt: string,
    options: ImageAttachmentOptions = {}
  ): Promise<ImageAttachment> {
    return ImageAttachment.fromBytes(await readFile(path), alt, options);
  }

  static async fromUrl(
    url: string,
    alt: string,
    options: ImageAttachmentOptions = {},
    fetcher: HtmlFetcher = new HttpFetcher()
  ): Promise<ImageAttachment> {
    return ImageAttachment.fromBytes(await fetcher.fetchBytes(url), alt, options);
  }

  /** Load from raw bytes, an http(s) URL, or a local file path. */
  static async from(
    source: string | Uint8Array,
    alt: string,
    options: ImageAttachmentOptions = {}
  ): Promise<ImageAttachment> {
    if (typeof source !== 'string') return ImageAttachment.fromBytes(source, alt, options);
    if (source.startsWith('http')) return ImageAttachment.fromUrl(source, alt, options);
    return ImageAttachment.fromFile(source, alt, options);
  }

  get bytes(): Uint8Array {
    return this.data;
  }

  get mimeType(): string {
    return imageMimeType(this.data);
  }

  async attach(context: AttachContext): Promise<EmbedFragment> {
    const aspectRatio = resolveAspectRatio({
      label: `image "${this.alt}"`,
      explicit: this.options.aspectRatio,
      data: this.data,
      derive: readImageDimensions,
      required: this.options.requireAspectRatio ?? false,
    });
    const blob = await context.uploader.upload(this.data, this.mimeType);

    return {
      type: 'image',
      image: { alt: this.alt, image: blob, ...(aspectRatio && { aspectRatio }) },
    };
  }
}
