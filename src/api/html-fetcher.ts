// pattern: Imperative Shell
// Plain HTTP GETs for link-card pages and the images they point at.

import { DEFAULT_CONFIG } from '../config';
import { HttpError } from '../errors';

export interface HtmlFetcher {
  fetchHtml(url: string): Promise<string>;
  fetchBytes(url: string): Promise<Uint8Array>;
}

export type HttpFetcherOptions = {
  /** Defaults to the upload timeout, 60 s. */
  readonly timeoutMs?: number;
  readonly userAgent?: string;
};

export class HttpFetcher implements HtmlFetcher {
  constructor(private readonly options: HttpFetcherOptions = {}) {}

  async fetchHtml(url: string): Promise<string> {
    const response = await this.get(url);
    return response.text();
  }

  async fetchBytes(url: string): Promise<Uint8Array> {
    const response = await this.get(url);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async get(url: string): Promise<Response> {
    const { timeoutMs = DEFAULT_CONFIG.uploadTimeoutMs, userAgent } = this.options;
    const response = await fetch(url, {
      headers: userAgent ? { 'User-Agent': userAgent } : {},
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new HttpError(url, response.status);
    }
    return response;
  }
}
