// pattern: Functional Core (network access only through the BuildContext services)
// Draft post: text plus attachments, turned into a post record by build().

import type { Embed, PostRecord } from '../types';
import { POST_TYPE } from '../types';
import { PostTooLongError } from '../errors';
import type { HandleResolver } from '../api/handle-resolver';
import type { Attachment, AttachContext, EmbedFragment } from './attachments';
import { DEFAULT_MAX_IMAGES, mergeEmbedFragments, validateAttachments } from './attachments';
import { codePointLength } from './byte-index';
import { detectFacets } from './facet-assembler';

export const DEFAULT_MAX_POST_LENGTH = 300;

export type PostOptions = {
  readonly maxImages?: number;
  /** Maximum text length in Unicode code points, after markdown links are rewritten. */
  readonly maxLength?: number;
};

export type BuildContext = AttachContext & {
  readonly resolver: HandleResolver;
};

function isAttachmentList(value: Attachment | readonly Attachment[]): value is readonly Attachment[] {
  return Array.isArray(value);
}

export class Post {
  readonly attachments: readonly Attachment[];
  private readonly maxLength: number;
  private langs: readonly string[] | undefined;

  /**
   * @throws TooManyImagesError, TooManyAttachmentsError or InvalidAttachmentsError
   * when the attachments cannot share one embed
   */
  constructor(
    readonly text: string,
    attachments: Attachment | readonly Attachment[] = [],
    options: PostOptions = {}
  ) {
    this.attachments = isAttachmentList(attachments) ? [...attachments] : [attachments];
    this.maxLength = options.maxLength ?? DEFAULT_MAX_POST_LENGTH;
    validateAttachments(this.attachments, options.maxImages ?? DEFAULT_MAX_IMAGES);
  }

  addLanguages(langs: readonly string[]): this {
    this.langs = [...langs];
    return this;
  }

  get languages(): readonly string[] | undefined {
    return this.langs;
  }

  /**
   * Build the record. Each call starts again from the original text, resolves
   * mentions and attaches media anew, and stamps a fresh createdAt.
   * @throws PostTooLongError when the rewritten text is over the limit
   */
  async build(context: BuildContext): Promise<PostRecord> {
    const createdAt = new Date().toISOString();
    const { text, facets } = await detectFacets(this.text, context.resolver);

    const length = codePointLength(text);
    if (length > this.maxLength) {
      throw new PostTooLongError(text, length, this.maxLength);
    }

    const fragments: EmbedFragment[] = [];
    for (const attachment of this.attachments) {
      fragments.push(await attachment.attach(context));
    }
    const embed: Embed | undefined = mergeEmbedFragments(fragments);

    return {
      $type: POST_TYPE,
      text,
      createdAt,
      ...(this.langs && { langs: this.langs }),
      ...(facets.length > 0 && { facets }),
      ...(embed && { embed }),
    };
  }
}
