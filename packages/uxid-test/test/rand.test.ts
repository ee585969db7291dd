import { describe, it, expect } from 'vitest';
import { randomBytes } from 'crypto';
import {
  DEFAULT_RAND_SIZE,
  ErrorCode,
  MAX_RAND_SIZE,
  encodeRand,
  generateRand,
  randEncodedLength,
  resolveRandSize
} from '@uxid/core';
import { SYMBOLS, fakeServices, thrownCode } from './helpers.js';

describe('encodeRand', () => {
  it('encodes bytes five bits at a time, zero padding the tail', () => {
    expect(encodeRand(new Uint8Array([]))).toBe('');
    expect(encodeRand(new Uint8Array([0xff]))).toBe('ZW');
    expect(encodeRand(new Uint8Array([0x00, 0x01]))).toBe('000G');
    expect(encodeRand(new Uint8Array([0xab, 0xab, 0xab, 0xab, 0xab]))).toBe('NENTQAXB');
    expect(encodeRand(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]))).toBe('041061050R3GG28A');
  });

  it('produces ceil(n * 8 / 5) alphabet symbols', () => {
    for (let n = 1; n <= 20; n++) {
      const encoded = encodeRand(randomBytes(n));
      expect(encoded).toHaveLength(randEncodedLength(n));
      expect(encoded).toMatch(SYMBOLS);
    }
    expect(randEncodedLength(1)).toBe(2);
    expect(randEncodedLength(7)).toBe(12);
    expect(randEncodedLength(10)).toBe(16);
  });
});

describe('resolveRandSize', () => {
  it('falls back to the default', () => {
    expect(resolveRandSize({})).toEqual({ randSize: DEFAULT_RAND_SIZE, size: null });
    expect(resolveRandSize({ randSize: null, size: null }, 4)).toEqual({ randSize: 4, size: null });
  });

  it('resolves presets', () => {
    expect(resolveRandSize({ size: 'xs' })).toEqual({ randSize: 2, size: 'xs' });
    expect(resolveRandSize({ size: 'medium' })).toEqual({ randSize: 5, size: 'medium' });
    expect(resolveRandSize({ size: 'xl' })).toEqual({ randSize: 10, size: 'xl' });
  });

  it('takes an explicit randSize', () => {
    expect(resolveRandSize({ randSize: 7 })).toEqual({ randSize: 7, size: null });
  });

  it('accepts randSize and size when they agree', () => {
    expect(resolveRandSize({ randSize: 7, size: 'l' })).toEqual({ randSize: 7, size: 'l' });
  });

  it('rejects conflicting or invalid selectors', () => {
    expect(thrownCode(() => resolveRandSize({ randSize: 4, size: 'm' }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
    expect(thrownCode(() => resolveRandSize({ randSize: 0 }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
    expect(thrownCode(() => resolveRandSize({ randSize: -1 }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
    expect(thrownCode(() => resolveRandSize({ randSize: 1.5 }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
    expect(thrownCode(() => resolveRandSize({ size: 'huge' }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
  });

  it('caps randSize at MAX_RAND_SIZE', () => {
    expect(MAX_RAND_SIZE).toBe(255);
    expect(resolveRandSize({ randSize: MAX_RAND_SIZE })).toEqual({ randSize: 255, size: null });
    expect(thrownCode(() => resolveRandSize({ randSize: MAX_RAND_SIZE + 1 }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
    expect(thrownCode(() => resolveRandSize({ randSize: 2 ** 31 }))).toBe(ErrorCode.INVALID_SIZE_OPTION);
  });
});

describe('generateRand', () => {
  it('draws the requested number of bytes from the random source', () => {
    const services = fakeServices(0, 7);
    expect(Array.from(generateRand(3, services))).toEqual([7, 7, 7]);
    expect(services.requested).toEqual([3]);
  });

  it('fails when the random source returns the wrong length', () => {
    const services = { now: () => 0, randomBytes: () => new Uint8Array(1) };
    expect(() => generateRand(4, services)).toThrow('random source returned 1 bytes, expected 4');
  });
});
