// pattern: Imperative Shell
// A direct-message conversation and the chat.bsky.convo calls scoped to it.

import type { ConvoView, GetMessagesResponse, MessageView, Session } from '../types';
import type { Filter, MessageTarget } from '../lib/convo-filters';
import { describeFilter, evaluateFilter } from '../lib/convo-filters';
import { DirectMessage } from '../lib/direct-message';
import { xrpc } from './xrpc';

const GET_MESSAGES = 'chat.bsky.convo.getMessages';
const SEND_MESSAGE = 'chat.bsky.convo.sendMessage';

export type ChatContext = {
  readonly chatService: string;
  readonly session: Session;
  readonly timeoutMs?: number;
};

export class Convo {
  constructor(
    private readonly raw: ConvoView,
    private readonly context: ChatContext
  ) {}

  get id(): string {
    return this.raw.id;
  }

  /** Handle of the first member who is not the signed-in account. */
  get participant(): string | undefined {
    return this.raw.members.find((member) => member.handle !== this.context.session.handle)?.handle;
  }

  get unreadCount(): number {
    return this.raw.unreadCount;
  }

  get opened(): boolean {
    return this.raw.opened ?? false;
  }

  get lastMessage(): string | undefined {
    return this.raw.lastMessage?.text;
  }

  get lastMessageTime(): Date | undefined {
    const sentAt = this.raw.lastMessage?.sentAt;
    return sentAt === undefined ? undefined : new Date(sentAt);
  }

  /** Messages in the order the service returns them, optionally filtered. */
  async getMessages(filter?: Filter<MessageTarget>): Promise<DirectMessage[]> {
    const data = await xrpc<GetMessagesResponse>({
      service: this.context.chatService,
      nsid: GET_MESSAGES,
      params: { convoId: this.id },
      accessJwt: this.context.session.accessJwt,
      timeoutMs: this.context.timeoutMs,
    });

    const messages = data.messages.map((message) => new DirectMessage(message, this));
    if (!filter) return messages;

    const matched = messages.filter((message) => evaluateFilter(filter, message));
    console.log(
      `[Convo] ${this.id}: ${matched.length}/${messages.length} messages match ${describeFilter(filter)}`
    );
    return matched;
  }

  async sendMessage(text: string): Promise<DirectMessage> {
    const data = await xrpc<MessageView>({
      service: this.context.chatService,
      nsid: SEND_MESSAGE,
      body: { convoId: this.id, message: { text } },
      accessJwt: this.context.session.accessJwt,
      timeoutMs: this.context.timeoutMs,
    });
    return new DirectMessage(data, this);
  }
}
