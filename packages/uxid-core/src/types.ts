import type { UxidError } from './errors.js';
import type { UxidSize } from './rand.js';

export const DECODE_NOT_SUPPORTED = 'decode_not_supported' as const;

/** Marks a field that cannot be recovered from a UXID string */
export type DecodeNotSupported = typeof DECODE_NOT_SUPPORTED;

export interface UxidOptions {
  /** Milliseconds since the epoch, defaults to now */
  time?: number;
  prefix?: string | null;
  /** Random byte count; mutually exclusive with a conflicting size */
  randSize?: number | null;
  size?: UxidSize | null;
}

interface UxidFields {
  readonly prefix: string | null;
  readonly time: number;
  readonly timeEncoded: string;
  readonly randEncoded: string;
  readonly encoded: string;
  readonly string: string;
}

export interface GeneratedUxid extends UxidFields {
  readonly rand: Uint8Array;
  readonly randSize: number;
  readonly size: UxidSize | null;
}

export interface DecodedUxid extends UxidFields {
  readonly rand: DecodeNotSupported;
  readonly randSize: DecodeNotSupported;
  readonly size: DecodeNotSupported;
}

export type Uxid = GeneratedUxid | DecodedUxid;

export type UxidResult<T> = { success: true; data: T } | { success: false; error: UxidError };
