// AT Protocol and Bluesky record type definitions used by the client

/**
 * AT-URI format: at://did:plc:xxxxx/app.bsky.feed.post/xxxxx
 */
export type AtUri = string;

/**
 * Content Identifier - cryptographic hash of content
 */
export type Cid = string;

/**
 * Decentralized Identifier
 */
export type Did = string;

/**
 * ISO 8601 datetime string, always UTC with a literal `Z` suffix
 */
export type IsoDateTime = string;

export const POST_TYPE = 'app.bsky.feed.post';
export const LINK_FEATURE_TYPE = 'app.bsky.richtext.facet#link';
export const MENTION_FEATURE_TYPE = 'app.bsky.richtext.facet#mention';
export const TAG_FEATURE_TYPE = 'app.bsky.richtext.facet#tag';
export const IMAGES_EMBED_TYPE = 'app.bsky.embed.images';
export const VIDEO_EMBED_TYPE = 'app.bsky.embed.video';
export const EXTERNAL_EMBED_TYPE = 'app.bsky.embed.external';

/**
 * Authenticated session returned by com.atproto.server.createSession
 */
export type Session = {
  readonly did: Did;
  readonly handle: string;
  readonly accessJwt: string;
  readonly refreshJwt: string;
  readonly email?: string;
};

/**
 * Reference to an uploaded blob, as returned by com.atproto.repo.uploadBlob
 */
export type BlobRef = {
  readonly $type: 'blob';
  readonly ref: { readonly $link: string };
  readonly mimeType: string;
  readonly size: number;
};

export type AspectRatio = {
  readonly width: number;
  readonly height: number;
};

// Rich text facets

export type LinkFeature = {
  readonly $type: typeof LINK_FEATURE_TYPE;
  readonly uri: string;
};

export type MentionFeature = {
  readonly $type: typeof MENTION_FEATURE_TYPE;
  readonly did: Did;
};

export type TagFeature = {
  readonly $type: typeof TAG_FEATURE_TYPE;
  readonly tag: string;
};

export type FacetFeature = LinkFeature | MentionFeature | TagFeature;

/**
 * Byte-indexed annotation over the UTF-8 encoding of the post text.
 * The range is half-open: [byteStart, byteEnd).
 */
export type Facet = {
  readonly index: { readonly byteStart: number; readonly byteEnd: number };
  readonly features: readonly FacetFeature[];
};

// Scanner output: character offsets into the current text buffer

export type LinkSpan = {
  readonly kind: 'link';
  readonly start: number;
  readonly end: number;
  readonly url: string;
};

export type MentionSpan = {
  readonly kind: 'mention';
  readonly start: number;
  readonly end: number;
  readonly handle: string;
};

export type TagSpan = {
  readonly kind: 'tag';
  readonly start: number;
  readonly end: number;
  readonly tag: string;
};

export type Span = LinkSpan | MentionSpan | TagSpan;

// Embeds

export type ImageEmbedItem = {
  readonly alt: string;
  readonly image: BlobRef;
  readonly aspectRatio?: AspectRatio;
};

export type ImagesEmbed = {
  readonly $type: typeof IMAGES_EMBED_TYPE;
  readonly images: readonly ImageEmbedItem[];
};

export type VideoEmbed = {
  readonly $type: typeof VIDEO_EMBED_TYPE;
  readonly video: BlobRef;
  readonly alt: string;
  readonly aspectRatio?: AspectRatio;
};

export type ExternalCard = {
  readonly uri: string;
  readonly title: string;
  readonly description: string;
  readonly thumb?: BlobRef;
};

export type ExternalEmbed = {
  readonly $type: typeof EXTERNAL_EMBED_TYPE;
  readonly external: ExternalCard;
};

export type Embed = ImagesEmbed | VideoEmbed | ExternalEmbed;

// Records

export type StrongRef = {
  readonly uri: AtUri;
  readonly cid: Cid;
};

export type ReplyRefs = {
  readonly root: StrongRef;
  readonly parent: StrongRef;
};

/**
 * Post record content, as sent to com.atproto.repo.createRecord
 */
export type PostRecord = {
  readonly $type: typeof POST_TYPE;
  readonly text: string;
  readonly createdAt: IsoDateTime;
  readonly langs?: readonly string[];
  readonly facets?: readonly Facet[];
  readonly embed?: Embed;
  readonly reply?: ReplyRefs;
};

/**
 * Response from com.atproto.repo.createRecord
 */
export type CreateRecordResponse = {
  readonly uri: AtUri;
  readonly cid: Cid;
};

/**
 * Response from com.atproto.repo.getRecord
 */
export type GetRecordResponse = {
  readonly uri: AtUri;
  readonly cid: Cid;
  readonly value: {
    readonly reply?: ReplyRefs;
    readonly [key: string]: unknown;
  };
};

// Direct messages (chat.bsky.convo.*)

export type ChatMember = {
  readonly did: Did;
  readonly handle: string;
  readonly displayName?: string;
};

export type MessageView = {
  readonly id: string;
  readonly rev?: string;
  readonly text: string;
  readonly sentAt: IsoDateTime;
  readonly sender?: { readonly did: Did };
};

export type ConvoView = {
  readonly id: string;
  readonly rev?: string;
  readonly members: readonly ChatMember[];
  readonly lastMessage?: MessageView;
  readonly unreadCount: number;
  readonly opened?: boolean;
  readonly muted?: boolean;
};

export type ListConvosResponse = {
  readonly cursor?: string;
  readonly convos: readonly ConvoView[];
};

export type GetMessagesResponse = {
  readonly cursor?: string;
  readonly messages: readonly MessageView[];
};
