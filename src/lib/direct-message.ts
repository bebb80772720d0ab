// pattern: Functional Core

import type { IsoDateTime, MessageView } from '../types';
import type { Convo } from '../api/convo';

/** One message in a conversation, as returned by the chat service. */
export class DirectMessage {
  constructor(
    private readonly raw: MessageView,
    readonly convo: Convo
  ) {}

  get id(): string {
    return this.raw.id;
  }

  get text(): string {
    return this.raw.text;
  }

  get sentAt(): Date {
    return new Date(this.raw.sentAt);
  }

  get sentAtRaw(): IsoDateTime {
    return this.raw.sentAt;
  }

  get senderDid(): string | undefined {
    return this.raw.sender?.did;
  }
}
