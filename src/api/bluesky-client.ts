// pattern: Imperative Shell
// Authenticated client: posting, replies, threads, handle lookup and direct messages.

import type {
  AtUri,
  CreateRecordResponse,
  Did,
  ListConvosResponse,
  PostRecord,
  ReplyRefs,
  ConvoView,
  Session,
} from '../types';
import { POST_TYPE } from '../types';
import type { ClientConfig } from '../config';
import { loadConfig } from '../config';
import {
  InvalidReplyRefsError,
  InvalidThreadError,
  TooManyMembersError,
} from '../errors';
import type { ConvoTarget, Filter } from '../lib/convo-filters';
import { describeFilter, evaluateFilter } from '../lib/convo-filters';
import type { Attachment } from '../lib/attachments';
import type { BuildContext } from '../lib/post';
import { Post } from '../lib/post';
import { createSession, SessionManager } from './auth-service';
import { XrpcBlobUploader } from './blob-uploader';
import { Convo } from './convo';
import type { ChatContext } from './convo';
import { XrpcHandleResolver, resolveHandleOrThrow } from './handle-resolver';
import { HttpFetcher } from './html-fetcher';
import { getReplyRefs } from './reply-refs';
import { xrpc } from './xrpc';

const CREATE_RECORD = 'com.atproto.repo.createRecord';
const LIST_CONVOS = 'chat.bsky.convo.listConvos';
const GET_CONVO_FOR_MEMBERS = 'chat.bsky.convo.getConvoForMembers';

export const MAX_CONVO_MEMBERS = 10;

function hasStrongRef(ref: { uri?: unknown; cid?: unknown } | undefined): boolean {
  return typeof ref?.uri === 'string' && ref.uri !== '' && typeof ref.cid === 'string' && ref.cid !== '';
}

/** Check that both reply references carry a uri and cid. */
export function validateReplyRefs(refs: Partial<ReplyRefs>): ReplyRefs {
  const { root, parent } = refs;
  if (!root || !hasStrongRef(root)) {
    throw new InvalidReplyRefsError('Root reference with uri and cid is required');
  }
  if (!parent || !hasStrongRef(parent)) {
    throw new InvalidReplyRefsError('Parent reference with uri and cid is required');
  }
  return { root, parent };
}

export class BlueskyClient {
  readonly config: ClientConfig;
  private readonly sessions = new SessionManager();

  constructor(overrides: Partial<ClientConfig> = {}) {
    this.config = loadConfig(process.env, overrides);
  }

  /**
   * Log in with a handle (or email) and an app password.
   * @throws the XrpcError or network error from createSession
   */
  async authenticate(handle: string, password: string): Promise<Session> {
    const result = await createSession({
      identifier: handle,
      password,
      service: this.config.service,
      timeoutMs: this.config.requestTimeoutMs,
    });
    if (!result.ok) {
      console.error(`[Client] Login failed for ${handle}: ${result.error.message}`);
      throw result.error;
    }
    this.sessions.setSession(result.value);
    console.log(`[Client] Logged in as ${result.value.handle}`);
    return result.value;
  }

  /** Use a session obtained elsewhere, e.g. restored from storage. */
  useSession(session: Session | null): void {
    this.sessions.setSession(session);
  }

  get session(): Session | null {
    return this.sessions.getSession();
  }

  get handle(): string {
    return this.sessions.requireSession().handle;
  }

  get did(): Did {
    return this.sessions.requireSession().did;
  }

  get accessToken(): string {
    return this.sessions.requireSession().accessJwt;
  }

  /** Services a post build needs, bound to the current session's token. */
  buildContext(session: Session = this.sessions.requireSession()): BuildContext {
    return {
      resolver: new XrpcHandleResolver({
        service: this.config.service,
        accessJwt: session.accessJwt,
        timeoutMs: this.config.requestTimeoutMs,
      }),
      uploader: new XrpcBlobUploader({
        service: this.config.service,
        accessJwt: session.accessJwt,
        timeoutMs: this.config.uploadTimeoutMs,
      }),
      fetcher: new HttpFetcher({ timeoutMs: this.config.uploadTimeoutMs }),
    };
  }

  /** A draft post held to this client's configured image and length limits. */
  draft(text: string, attachments: Attachment | readonly Attachment[] = []): Post {
    return new Post(text, attachments, {
      maxImages: this.config.maxImages,
      maxLength: this.config.maxPostLength,
    });
  }

  async post(post: Post): Promise<CreateRecordResponse> {
    const session = this.sessions.requireSession();
    const record = await post.build(this.buildContext(session));
    return this.createRecord(session, record);
  }

  /**
   * Post as a reply. The references are checked before anything is uploaded.
   * @throws InvalidReplyRefsError when root or parent lacks a uri or cid
   */
  async postReply(post: Post, refs: Partial<ReplyRefs>): Promise<CreateRecordResponse> {
    const reply = validateReplyRefs(refs);
    const session = this.sessions.requireSession();
    const record = await post.build(this.buildContext(session));
    return this.createRecord(session, { ...record, reply });
  }

  /**
   * Post each entry as a reply to the one before it. Stops at the first
   * failure; earlier posts stay published.
   * @throws InvalidThreadError for fewer than two posts
   */
  async postThread(posts: readonly Post[]): Promise<CreateRecordResponse[]> {
    this.sessions.requireSession();
    const [first, ...rest] = posts;
    if (!first || rest.length === 0) {
      throw new InvalidThreadError(posts.length);
    }

    let previous = await this.post(first);
    const responses = [previous];
    for (const post of rest) {
      const refs = await this.getReplyRefs(previous.uri);
      previous = await this.postReply(post, refs);
      responses.push(previous);
    }
    console.log(`[Client] Posted thread of ${responses.length} posts`);
    return responses;
  }

  async getReplyRefs(parentUri: AtUri): Promise<ReplyRefs> {
    const session = this.sessions.requireSession();
    return getReplyRefs(parentUri, {
      service: this.config.service,
      accessJwt: session.accessJwt,
      timeoutMs: this.config.requestTimeoutMs,
    });
  }

  /**
   * @throws InvalidHandleError when the service does not know the handle
   */
  async resolveHandle(handle: string): Promise<Did> {
    const session = this.sessions.requireSession();
    return resolveHandleOrThrow(this.buildContext(session).resolver, handle);
  }

  async getConvos(filter?: Filter<ConvoTarget>): Promise<Convo[]> {
    const session = this.sessions.requireSession();
    const data = await xrpc<ListConvosResponse>({
      service: this.config.chatService,
      nsid: LIST_CONVOS,
      accessJwt: session.accessJwt,
      timeoutMs: this.config.requestTimeoutMs,
    });

    const context = this.chatContext(session);
    const convos = data.convos.map((view) => new Convo(view, context));
    if (!filter) return convos;

    const matched = convos.filter((convo) => evaluateFilter(filter, convo));
    console.log(
      `[Client] ${matched.length}/${convos.length} conversations match ${describeFilter(filter)}`
    );
    return matched;
  }

  /**
   * Get (or start) the conversation with the given handles.
   * @throws TooManyMembersError for more than MAX_CONVO_MEMBERS handles
   * @throws InvalidHandleError when a handle cannot be resolved
   */
  async getConvoForMembers(members: string | readonly string[]): Promise<Convo> {
    const session = this.sessions.requireSession();
    const handles = typeof members === 'string' ? [members] : members;
    if (handles.length > MAX_CONVO_MEMBERS) {
      throw new TooManyMembersError(handles.length, MAX_CONVO_MEMBERS);
    }

    const resolver = this.buildContext(session).resolver;
    const dids: Did[] = [];
    for (const handle of handles) {
      dids.push(await resolveHandleOrThrow(resolver, handle));
    }

    const data = await xrpc<{ convo: ConvoView }>({
      service: this.config.chatService,
      nsid: GET_CONVO_FOR_MEMBERS,
      params: { members: dids },
      accessJwt: session.accessJwt,
      timeoutMs: this.config.requestTimeoutMs,
    });
    return new Convo(data.convo, this.chatContext(session));
  }

  private chatContext(session: Session): ChatContext {
    return {
      chatService: this.config.chatService,
      session,
      timeoutMs: this.config.requestTimeoutMs,
    };
  }

  private async createRecord(session: Session, record: PostRecord): Promise<CreateRecordResponse> {
    const response = await xrpc<CreateRecordResponse>({
      service: this.config.service,
      nsid: CREATE_RECORD,
      body: { repo: session.did, collection: POST_TYPE, record },
      accessJwt: session.accessJwt,
      timeoutMs: this.config.requestTimeoutMs,
    });
    console.log(`[Client] Created ${response.uri}`);
    return response;
  }
}
