// Barrel export for API module
export { BlueskyClient, MAX_CONVO_MEMBERS, validateReplyRefs } from './bluesky-client';
export { createSession, refreshSession, SessionManager } from './auth-service';
export type { AuthConfig, AuthResult } from './auth-service';
export { XrpcBlobUploader } from './blob-uploader';
export type { BlobUploader, XrpcBlobUploaderOptions } from './blob-uploader';
export { Convo } from './convo';
export type { ChatContext } from './convo';
export { XrpcHandleResolver, resolveHandleOrThrow } from './handle-resolver';
export type { HandleResolution, HandleResolver, XrpcHandleResolverOptions } from './handle-resolver';
export { HttpFetcher } from './html-fetcher';
export type { HtmlFetcher, HttpFetcherOptions } from './html-fetcher';
export { getReplyRefs } from './reply-refs';
export type { ReplyRefsOptions } from './reply-refs';
export { buildXrpcUrl, xrpc } from './xrpc';
export type { XrpcParams, XrpcRequest } from './xrpc';
