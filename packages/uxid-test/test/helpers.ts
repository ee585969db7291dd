import { UxidError, type UxidServices } from '@uxid/core';

export const SYMBOLS = /^[0-9A-HJKMNP-TV-Z]*$/;

export interface FakeServices extends UxidServices {
  /** Sizes passed to randomBytes, in call order */
  requested: number[];
}

// Fixed clock, and random bytes that are all `fill`
export function fakeServices(time: number, fill = 0): FakeServices {
  const requested: number[] = [];
  return {
    requested,
    now: () => time,
    randomBytes: (size) => {
      requested.push(size);
      return new Uint8Array(size).fill(fill);
    }
  };
}

export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof UxidError) return error.code;
    throw error;
  }
  return undefined;
}
