// pattern: Imperative Shell
// Video attachment: read and uploaded on first attach, then reused.

import { readFile } from 'node:fs/promises';
import type { AspectRatio, BlobRef } from '../types';
import { VIDEO_EMBED_TYPE } from '../types';
import { UnsupportedVideoFormatError } from '../errors';
import type { BlobUploader } from '../api/blob-uploader';
import type { AttachContext, EmbedFragment } from './attachments';
import { resolveAspectRatio } from './aspect-ratio';
import { readVideoDimensions } from './media-dimensions';

export const VIDEO_MIME_TYPES: Readonly<Record<string, string>> = {
  mp4: 'video/mp4',
  mpeg: 'video/mpeg',
  webm: 'video/webm',
  mov: 'video/quicktime',
};

export type VideoAttachmentOptions = {
  readonly aspectRatio?: AspectRatio;
  readonly requireAspectRatio?: boolean;
};

type UploadedVideo = {
  readonly blob: BlobRef;
  readonly dimensions: AspectRatio | null;
};

/** MIME type for a video path, by extension. */
export function videoMimeType(path: string): string {
  const extension = path.split('.').pop() ?? '';
  const mimeType = VIDEO_MIME_TYPES[extension];
  if (!mimeType) {
    throw new UnsupportedVideoFormatError(path, extension);
  }
  return mimeType;
}

export class VideoAttachment {
  readonly kind = 'video' as const;
  private uploaded: UploadedVideo | null = null;

  constructor(
    readonly path: string,
    readonly alt = '',
    private readonly options: VideoAttachmentOptions = {}
  ) {}

  /**
   * Upload the file once; later calls return the cached blob.
   * @throws UnsupportedVideoFormatError for an extension outside VIDEO_MIME_TYPES
   */
  async upload(uploader: BlobUploader): Promise<UploadedVideo> {
    if (this.uploaded) return this.uploaded;

    const mimeType = videoMimeType(this.path);
    const bytes = await readFile(this.path);
    const dimensions = readVideoDimensions(bytes);
    const blob = await uploader.upload(bytes, mimeType);

    this.uploaded = { blob, dimensions };
    return this.uploaded;
  }

  async attach(context: AttachContext): Promise<EmbedFragment> {
    const { blob, dimensions } = await this.upload(context.uploader);
    const aspectRatio = resolveAspectRatio({
      label: `video ${this.path}`,
      explicit: this.options.aspectRatio,
      data: dimensions,
      derive: (d) => d,
      required: this.options.requireAspectRatio ?? false,
    });

    return {
      type: 'video',
      embed: {
        $type: VIDEO_EMBED_TYPE,
        video: blob,
        alt: this.alt,
        ...(aspectRatio && { aspectRatio }),
      },
    };
  }
}
