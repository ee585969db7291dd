import { ErrorCode, UxidError } from './errors.js';
import { DELIMITER, assertValidPrefix } from './prefix.js';
import { TIME_LENGTH, unpackTime } from './time.js';
import { DECODE_NOT_SUPPORTED, type DecodeNotSupported, type DecodedUxid } from './types.js';

/**
 * Splits off the prefix. The body is always the last segment, so a prefix
 * may itself contain delimiters ("multi_word_prefix_01H...").
 */
export function separatePrefix<T extends { string: string }>(
  draft: T
): T & { prefix: string | null; encoded: string } {
  const segments = draft.string.split(DELIMITER);
  const encoded = segments.pop() ?? '';

  if (encoded.length === 0) {
    throw new UxidError(ErrorCode.EMPTY_BODY, 'uxid has no body', {
      field: 'string',
      value: draft.string
    });
  }

  if (segments.length === 0) {
    return { ...draft, prefix: null, encoded };
  }

  const prefix = segments.join(DELIMITER);
  assertValidPrefix(prefix);
  return { ...draft, prefix, encoded };
}

export function separateEncoded<T extends { encoded: string }>(
  draft: T
): T & { timeEncoded: string; randEncoded: string } {
  if (draft.encoded.length < TIME_LENGTH) {
    throw new UxidError(
      ErrorCode.BODY_TOO_SHORT,
      `uxid body must be at least ${TIME_LENGTH} characters, got ${draft.encoded.length}`,
      { field: 'encoded', value: draft.encoded }
    );
  }
  return {
    ...draft,
    timeEncoded: draft.encoded.slice(0, TIME_LENGTH),
    randEncoded: draft.encoded.slice(TIME_LENGTH)
  };
}

export function decodeTime<T extends { timeEncoded: string }>(draft: T): T & { time: number } {
  return { ...draft, time: unpackTime(draft.timeEncoded) };
}

// The random suffix carries no length, so none of these can be recovered.

export function decodeSize<T extends object>(draft: T): T & { size: DecodeNotSupported } {
  return { ...draft, size: DECODE_NOT_SUPPORTED };
}

export function decodeRand<T extends object>(draft: T): T & { rand: DecodeNotSupported } {
  return { ...draft, rand: DECODE_NOT_SUPPORTED };
}

export function decodeRandSize<T extends object>(draft: T): T & { randSize: DecodeNotSupported } {
  return { ...draft, randSize: DECODE_NOT_SUPPORTED };
}

export function decode(uxid: string): DecodedUxid {
  const draft = decodeRandSize(
    decodeRand(decodeSize(decodeTime(separateEncoded(separatePrefix({ string: uxid })))))
  );

  return Object.freeze({
    prefix: draft.prefix,
    time: draft.time,
    timeEncoded: draft.timeEncoded,
    rand: draft.rand,
    randSize: draft.randSize,
    randEncoded: draft.randEncoded,
    size: draft.size,
    encoded: draft.encoded,
    string: draft.string
  });
}
