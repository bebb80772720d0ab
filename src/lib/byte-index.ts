// pattern: Functional Core
// Conversion between string indexes and UTF-8 byte offsets.
// Facets are indexed by UTF-8 bytes; text manipulation works on JS string indexes.

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Convert a string index to the byte offset of the same position in the
 * UTF-8 encoding of `text`. Indexes past the end clamp to the byte length;
 * an index inside a surrogate pair rounds down to the start of the pair.
 */
export function charToByte(text: string, charIndex: number): number {
  if (charIndex <= 0) return 0;
  if (charIndex >= text.length) return encoder.encode(text).byteLength;

  let boundary = charIndex;
  if (isLowSurrogate(text.charCodeAt(boundary))) boundary--;
  return encoder.encode(text.slice(0, boundary)).byteLength;
}

/**
 * Convert a UTF-8 byte offset into `text` to a string index. Offsets past the
 * end clamp to the string length; an offset inside a multi-byte sequence
 * rounds down to the start of that character.
 */
export function byteToChar(text: string, byteIndex: number): number {
  if (byteIndex <= 0) return 0;
  const bytes = encoder.encode(text);
  if (byteIndex >= bytes.byteLength) return text.length;

  let boundary = byteIndex;
  while (boundary > 0 && isContinuationByte(bytes[boundary])) boundary--;
  return decoder.decode(bytes.subarray(0, boundary)).length;
}

/**
 * The UTF-8 bytes of `text` as a string with one char (code 0-255) per byte.
 * Regular expressions run against this string match bytes, so `\w`, `\W`
 * and `\b` see only ASCII word characters and every match index is a byte offset.
 */
export function toByteString(text: string): string {
  let out = '';
  for (const byte of encoder.encode(text)) {
    out += String.fromCharCode(byte);
  }
  return out;
}

/** Inverse of {@link toByteString} for a complete UTF-8 sequence. */
export function fromByteString(byteString: string): string {
  const bytes = new Uint8Array(byteString.length);
  for (let i = 0; i < byteString.length; i++) {
    bytes[i] = byteString.charCodeAt(i);
  }
  return decoder.decode(bytes);
}

/** Length of `text` in Unicode code points (the unit post length limits use). */
export function codePointLength(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}
