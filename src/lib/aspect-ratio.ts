// pattern: Functional Core

import type { AspectRatio } from '../types';
import { AspectRatioRequiredError } from '../errors';

export type AspectRatioRequest<T> = {
  /** Names the attachment in the error message. */
  readonly label: string;
  readonly explicit?: AspectRatio;
  readonly data: T;
  readonly derive: (data: T) => AspectRatio | null;
  readonly required: boolean;
};

/**
 * Pick the aspect ratio for an attachment: an explicit value wins, otherwise
 * it is derived from the media. Undefined when neither works and it is optional.
 * @throws AspectRatioRequiredError when required and not derivable
 */
export function resolveAspectRatio<T>(request: AspectRatioRequest<T>): AspectRatio | undefined {
  if (request.explicit) return request.explicit;

  const derived = request.derive(request.data);
  if (derived) return derived;

  if (request.required) {
    throw new AspectRatioRequiredError(request.label);
  }
  return undefined;
}
