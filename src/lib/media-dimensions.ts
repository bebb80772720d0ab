// pattern: Functional Core
// Read pixel dimensions out of raw media bytes.

import { imageSize } from 'image-size';
import type { AspectRatio } from '../types';

export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'webp' | 'unknown';

const IMAGE_MIME_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  unknown: 'image/png',
};

function probeImage(bytes: Uint8Array): { width?: number; height?: number; type?: string } | null {
  try {
    return imageSize(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  } catch {
    // unsupported or truncated image
    return null;
  }
}

/** Image dimensions, or null when the bytes are not a recognisable image. */
export function readImageDimensions(bytes: Uint8Array): AspectRatio | null {
  const size = probeImage(bytes);
  if (!size?.width || !size.height) return null;
  return { width: size.width, height: size.height };
}

export function detectImageFormat(bytes: Uint8Array): ImageFormat {
  switch (probeImage(bytes)?.type) {
    case 'png':
      return 'png';
    case 'jpg':
      return 'jpeg';
    case 'gif':
      return 'gif';
    case 'webp':
      return 'webp';
    default:
      return 'unknown';
  }
}

/** MIME type to upload an image with; unrecognised formats go up as PNG. */
export function imageMimeType(bytes: Uint8Array): string {
  return IMAGE_MIME_TYPES[detectImageFormat(bytes)];
}

// ISO base media (MP4 / QuickTime) boxes

const CONTAINER_BOXES = new Set(['moov', 'trak']);

function boxType(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}

/** Width and height (16.16 fixed point) from a tkhd box payload. */
function readTrackHeader(view: DataView, payload: number, end: number): AspectRatio | null {
  if (payload >= end) return null;
  const version = view.getUint8(payload);
  // version+flags, times/track id/duration, reserved+layer+group+volume, matrix
  const sizeOffset = payload + 4 + (version === 1 ? 32 : 20) + 16 + 36;
  if (sizeOffset + 8 > end) return null;
  const width = Math.round(view.getUint32(sizeOffset) / 0x10000);
  const height = Math.round(view.getUint32(sizeOffset + 4) / 0x10000);
  return width > 0 && height > 0 ? { width, height } : null;
}

function walkBoxes(view: DataView, start: number, end: number): AspectRatio | null {
  let offset = start;
  while (offset + 8 <= end) {
    let size = view.getUint32(offset);
    const type = boxType(view, offset + 4);
    let header = 8;

    if (size === 1) {
      if (offset + 16 > end) return null;
      size = Number(view.getBigUint64(offset + 8));
      header = 16;
    } else if (size === 0) {
      size = end - offset;
    }
    if (size < header || offset + size > end) return null;

    if (type === 'tkhd') {
      const dimensions = readTrackHeader(view, offset + header, offset + size);
      if (dimensions) return dimensions;
    } else if (CONTAINER_BOXES.has(type)) {
      const found = walkBoxes(view, offset + header, offset + size);
      if (found) return found;
    }
    offset += size;
  }
  return null;
}

/**
 * Display dimensions of the first visual track of an MP4/QuickTime file,
 * or null when no track header carries a size.
 */
export function readVideoDimensions(bytes: Uint8Array): AspectRatio | null {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return walkBoxes(view, 0, bytes.byteLength);
}
