import { BITS_PER_SYMBOL, encodeSymbol } from './alphabet.js';
import { ErrorCode, UxidError } from './errors.js';
import type { UxidServices } from './services.js';

export const SIZE_PRESETS = {
  xs: 2,
  xsmall: 2,
  s: 3,
  small: 3,
  m: 5,
  medium: 5,
  l: 7,
  large: 7,
  xl: 10,
  xlarge: 10
} as const;

export type UxidSize = keyof typeof SIZE_PRESETS;

// 80 bits of randomness, same as a ULID
export const DEFAULT_RAND_SIZE = 10;

// one length byte's worth; keeps the random draw bounded
export const MAX_RAND_SIZE = 255;

const BITS_PER_BYTE = 8;

export function isUxidSize(value: unknown): value is UxidSize {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SIZE_PRESETS, value);
}

export function isValidRandSize(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_RAND_SIZE;
}

export interface SizeSelector {
  randSize?: number | null;
  size?: string | null;
}

export interface ResolvedSize {
  randSize: number;
  size: UxidSize | null;
}

/**
 * Resolves the random byte count from an explicit randSize, a size preset,
 * or the default. Both may be given only when they agree.
 */
export function resolveRandSize(
  selector: SizeSelector,
  defaultRandSize = DEFAULT_RAND_SIZE
): ResolvedSize {
  const { randSize } = selector;

  let size: UxidSize | null = null;
  if (selector.size !== undefined && selector.size !== null) {
    if (!isUxidSize(selector.size)) {
      throw new UxidError(ErrorCode.INVALID_SIZE_OPTION, `unknown size preset '${selector.size}'`, {
        field: 'size',
        value: selector.size
      });
    }
    size = selector.size;
  }
  const presetSize = size === null ? undefined : SIZE_PRESETS[size];

  if (randSize !== undefined && randSize !== null) {
    if (!isValidRandSize(randSize)) {
      throw new UxidError(
        ErrorCode.INVALID_SIZE_OPTION,
        `randSize must be an integer from 1 to ${MAX_RAND_SIZE}`,
        { field: 'randSize', value: randSize }
      );
    }
    if (presetSize !== undefined && presetSize !== randSize) {
      throw new UxidError(
        ErrorCode.INVALID_SIZE_OPTION,
        `randSize ${randSize} conflicts with size '${size}' (${presetSize} bytes)`,
        { field: 'randSize', value: randSize, size }
      );
    }
    return { randSize, size };
  }

  return { randSize: presetSize ?? defaultRandSize, size };
}

export function randEncodedLength(randSize: number): number {
  return Math.ceil((randSize * BITS_PER_BYTE) / BITS_PER_SYMBOL);
}

/**
 * Base32 encodes bytes five bits at a time, most significant first.
 * The last partial group is zero-padded on the right, no '=' padding.
 */
export function encodeRand(bytes: Uint8Array): string {
  let str = '';
  let buffer = 0;
  let bits = 0;

  for (const byte of bytes) {
    buffer = (buffer << BITS_PER_BYTE) | byte;
    bits += BITS_PER_BYTE;
    while (bits >= BITS_PER_SYMBOL) {
      bits -= BITS_PER_SYMBOL;
      str += encodeSymbol(buffer >>> bits);
      buffer &= (1 << bits) - 1;
    }
  }

  if (bits > 0) {
    str += encodeSymbol(buffer << (BITS_PER_SYMBOL - bits));
  }
  return str;
}

export function generateRand(randSize: number, services: UxidServices): Uint8Array {
  const bytes = services.randomBytes(randSize);
  if (bytes.length !== randSize) {
    throw new Error(`random source returned ${bytes.length} bytes, expected ${randSize}`);
  }
  return bytes;
}
