import { BITS_PER_SYMBOL, decodeSymbol, encodeSymbol } from './alphabet.js';
import { ErrorCode, UxidError } from './errors.js';

// 48-bit timestamp = one 3-bit group + nine 5-bit groups
export const TIME_LENGTH = 10;
export const MAX_TIME = 2 ** 48 - 1;

const RADIX = 2 ** BITS_PER_SYMBOL;
const FIRST_SYMBOL_MASK = 0b111;

export function isValidTime(time: number): boolean {
  return Number.isInteger(time) && time >= 0 && time <= MAX_TIME;
}

/**
 * Packs a millisecond timestamp into exactly 10 symbols, most significant
 * group first. Every timestamp in [0, 2^48 - 1] packs to the same width.
 */
export function packTime(time: number): string {
  if (!isValidTime(time)) {
    throw new UxidError(
      ErrorCode.INVALID_TIME,
      `time must be an integer between 0 and ${MAX_TIME}`,
      { field: 'time', value: time }
    );
  }

  let str = '';
  let rest = time;
  for (let i = 0; i < TIME_LENGTH; i++) {
    str = encodeSymbol(rest % RADIX) + str;
    rest = Math.floor(rest / RADIX);
  }
  return str;
}

export function unpackTime(timeEncoded: string): number {
  if (timeEncoded.length !== TIME_LENGTH) {
    throw new UxidError(
      ErrorCode.INVALID_TIME,
      `encoded time must be ${TIME_LENGTH} characters, got ${timeEncoded.length}`,
      { field: 'timeEncoded', value: timeEncoded }
    );
  }

  let time = 0;
  for (let i = 0; i < TIME_LENGTH; i++) {
    const char = timeEncoded.charAt(i);
    const value = decodeSymbol(char);
    if (value === undefined) {
      throw new UxidError(ErrorCode.INVALID_SYMBOL, `invalid symbol '${char}' at position ${i}`, {
        field: 'timeEncoded',
        value: char,
        position: i
      });
    }
    // first group only carries 3 bits
    time = time * RADIX + (i === 0 ? value & FIRST_SYMBOL_MASK : value);
  }
  return time;
}
