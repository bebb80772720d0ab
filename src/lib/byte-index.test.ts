import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  byteToChar,
  charToByte,
  codePointLength,
  fromByteString,
  toByteString,
} from './byte-index';

describe('charToByte', () => {
  it('counts multi-byte characters by their UTF-8 length', () => {
    expect(charToByte('héllo', 2)).toBe(3);
    expect(charToByte('a🎉b', 3)).toBe(5);
  });

  it('rounds an index inside a surrogate pair down to the pair start', () => {
    expect(charToByte('a🎉b', 2)).toBe(1);
  });

  it('clamps out-of-range indexes', () => {
    expect(charToByte('abc', -4)).toBe(0);
    expect(charToByte('abc', 10)).toBe(3);
    expect(charToByte('é', 10)).toBe(2);
  });
});

describe('byteToChar', () => {
  it('maps a byte offset back to a string index', () => {
    expect(byteToChar('a🎉b', 5)).toBe(3);
    expect(byteToChar('héllo', 3)).toBe(2);
  });

  it('rounds an offset inside a multi-byte sequence down', () => {
    expect(byteToChar('a🎉b', 3)).toBe(1);
  });

  it('clamps out-of-range offsets', () => {
    expect(byteToChar('abc', -1)).toBe(0);
    expect(byteToChar('a🎉b', 100)).toBe(4);
  });
});

describe('toByteString', () => {
  it('produces one char per UTF-8 byte', () => {
    expect(toByteString('é')).toBe('Ã©');
    expect(toByteString('🎉').length).toBe(4);
  });

  it('is inverted by fromByteString', () => {
    expect(fromByteString(toByteString('Hello 🎉 wörld'))).toBe('Hello 🎉 wörld');
  });
});

describe('codePointLength', () => {
  it('counts an astral character once', () => {
    expect(codePointLength('a🎉b')).toBe(3);
    expect('a🎉b'.length).toBe(4);
  });
});

describe('Property-based tests', () => {
  it('byte and string indexes agree for ASCII text', () => {
    fc.assert(
      fc.property(fc.string(), fc.nat(), (text, index) => {
        const i = Math.min(index, text.length);
        expect(charToByte(text, i)).toBe(i);
        expect(byteToChar(text, i)).toBe(i);
      })
    );
  });

  it('round-trips every code point boundary', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString(), (text) => {
        let index = 0;
        for (const char of text) {
          expect(byteToChar(text, charToByte(text, index))).toBe(index);
          index += char.length;
        }
        expect(charToByte(text, text.length)).toBe(new TextEncoder().encode(text).byteLength);
      })
    );
  });

  it('byte strings decode back to the original text', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString(), (text) => {
        expect(fromByteString(toByteString(text))).toBe(text);
      })
    );
  });
});
