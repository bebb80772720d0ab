// Barrel export for lib module
export { charToByte, byteToChar, codePointLength } from './byte-index';
export { rewriteFirstRichLink, rewriteRichLinks } from './rich-links';
export type { RichLinkRewrite } from './rich-links';
export { scanMentions, scanHashtags, scanUrls } from './facet-scanner';
export { assembleFacets, detectFacets } from './facet-assembler';
export { parseAtUri } from './at-uri';
export type { AtUriParts } from './at-uri';
export {
  readImageDimensions,
  readVideoDimensions,
  detectImageFormat,
  imageMimeType,
} from './media-dimensions';
export type { ImageFormat } from './media-dimensions';
export { resolveAspectRatio } from './aspect-ratio';
export type { AspectRatioRequest } from './aspect-ratio';
export { DEFAULT_MAX_IMAGES, validateAttachments, mergeEmbedFragments } from './attachments';
export type { Attachment, AttachContext, EmbedFragment } from './attachments';
export { ImageAttachment, MAX_IMAGE_BYTES } from './image-attachment';
export type { ImageAttachmentOptions } from './image-attachment';
export { VideoAttachment, VIDEO_MIME_TYPES, videoMimeType } from './video-attachment';
export type { VideoAttachmentOptions } from './video-attachment';
export { WebCard, parseOpenGraph, resolveImageUrl } from './web-card';
export type { OpenGraphTags } from './web-card';
export { Post, DEFAULT_MAX_POST_LENGTH } from './post';
export type { PostOptions, BuildContext } from './post';
export { DirectMessage } from './direct-message';
export {
  UnreadCount,
  Participant,
  LastMessageTime,
  SentAt,
  gt,
  lt,
  eq,
  neq,
  and,
  or,
  not,
  evaluateFilter,
  describeFilter,
  parseFilterTime,
} from './convo-filters';
export type {
  Comparable,
  ComparisonOp,
  ConvoTarget,
  MessageTarget,
  Filter,
  Operand,
  TimeValue,
} from './convo-filters';
