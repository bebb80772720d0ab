// pattern: Imperative Shell
// Upload raw bytes as a blob and get back the reference used in embeds.

import type { BlobRef } from '../types';
import { DEFAULT_CONFIG } from '../config';
import { xrpc } from './xrpc';

const UPLOAD_BLOB = 'com.atproto.repo.uploadBlob';

export interface BlobUploader {
  upload(bytes: Uint8Array, mimeType: string): Promise<BlobRef>;
}

export type XrpcBlobUploaderOptions = {
  readonly service: string;
  readonly accessJwt: string;
  /** Defaults to the upload timeout, 60 s. */
  readonly timeoutMs?: number;
};

export class XrpcBlobUploader implements BlobUploader {
  constructor(private readonly options: XrpcBlobUploaderOptions) {}

  async upload(bytes: Uint8Array, mimeType: string): Promise<BlobRef> {
    const data = await xrpc<{ blob: BlobRef }>({
      service: this.options.service,
      nsid: UPLOAD_BLOB,
      method: 'POST',
      body: bytes,
      contentType: mimeType,
      accessJwt: this.options.accessJwt,
      timeoutMs: this.options.timeoutMs ?? DEFAULT_CONFIG.uploadTimeoutMs,
    });
    console.log(`[Upload] ${mimeType} blob, ${bytes.byteLength} bytes`);
    return data.blob;
  }
}
