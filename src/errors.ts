// Error types raised by the client.
// Every error carries the values a caller needs to log a precise diagnostic.

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Non-2xx response from an XRPC endpoint. */
export class XrpcError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(`${endpoint} failed: ${status} ${body}`);
    this.name = 'XrpcError';
  }
}

/** Non-2xx response from a plain HTTP fetch (link-card pages, remote images). */
export class HttpError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`GET ${url} failed: HTTP ${status}`);
    this.name = 'HttpError';
  }
}

export class SessionNotAuthenticatedError extends Error {
  constructor(message = 'Client not authenticated') {
    super(message);
    this.name = 'SessionNotAuthenticatedError';
  }
}

export class PostTooLongError extends Error {
  constructor(
    public readonly text: string,
    public readonly length: number,
    public readonly maxLength: number
  ) {
    super(
      `Maximum of ${maxLength} characters allowed per post, got ${length}. Post text: ${text}`
    );
    this.name = 'PostTooLongError';
  }
}

export class TooManyImagesError extends Error {
  constructor(
    public readonly count: number,
    public readonly maxImages: number
  ) {
    super(`Maximum of ${maxImages} images allowed per post, got ${count}`);
    this.name = 'TooManyImagesError';
  }
}

export class TooManyAttachmentsError extends Error {
  constructor(public readonly count: number) {
    super(`Only one non-image attachment allowed per post, got ${count}`);
    this.name = 'TooManyAttachmentsError';
  }
}

export class InvalidAttachmentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidAttachmentsError';
  }
}

export class ImageTooLargeError extends Error {
  constructor(
    public readonly size: number,
    public readonly maxSize: number
  ) {
    super(`Image file size too large. ${maxSize} bytes maximum, got: ${size} bytes`);
    this.name = 'ImageTooLargeError';
  }
}

export class AspectRatioRequiredError extends Error {
  constructor(public readonly attachment: string) {
    super(`Aspect ratio is required but could not be determined for ${attachment}`);
    this.name = 'AspectRatioRequiredError';
  }
}

export class UnsupportedVideoFormatError extends Error {
  constructor(
    public readonly path: string,
    public readonly extension: string
  ) {
    super(`Unsupported video format "${extension}" for ${path}`);
    this.name = 'UnsupportedVideoFormatError';
  }
}

export class EmbedCardFetchError extends Error {
  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch embed card for ${url}: ${reason}`, { cause });
    this.name = 'EmbedCardFetchError';
  }
}

export class InvalidHandleError extends Error {
  constructor(public readonly handle: string) {
    super(`Invalid user handle ${handle}`);
    this.name = 'InvalidHandleError';
  }
}

export class InvalidReplyRefsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidReplyRefsError';
  }
}

export class InvalidThreadError extends Error {
  constructor(public readonly count: number) {
    super(`At least two posts are required to create a thread, got ${count}`);
    this.name = 'InvalidThreadError';
  }
}

export class InvalidAtUriError extends Error {
  constructor(public readonly uri: string) {
    super(`Invalid AT-URI: ${uri}`);
    this.name = 'InvalidAtUriError';
  }
}

export class TooManyMembersError extends Error {
  constructor(
    public readonly count: number,
    public readonly maxMembers: number
  ) {
    super(`A maximum of ${maxMembers} members can be in a conversation, got ${count}`);
    this.name = 'TooManyMembersError';
  }
}

export class InvalidFilterValueError extends Error {
  constructor(
    public readonly operand: string,
    public readonly value: unknown
  ) {
    super(`Invalid value for ${operand} filter: ${String(value)}`);
    this.name = 'InvalidFilterValueError';
  }
}
