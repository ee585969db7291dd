import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  encode,
  encodeRandom,
  encodeTime,
  joinEncoded,
  joinString,
  resolveSize,
  validatePrefix
} from '@uxid/core';
import { fakeServices, thrownCode } from './helpers.js';

describe('validatePrefix', () => {
  it('normalises a missing prefix to null', () => {
    expect(validatePrefix({})).toEqual({ prefix: null });
    expect(validatePrefix({ prefix: undefined })).toEqual({ prefix: null });
  });

  it('accepts prefixes, including ones with delimiters inside', () => {
    expect(validatePrefix({ prefix: 'pre' })).toEqual({ prefix: 'pre' });
    expect(validatePrefix({ prefix: 'multi_word_prefix' })).toEqual({ prefix: 'multi_word_prefix' });
  });

  it('rejects empty prefixes and prefixes ending with the delimiter', () => {
    expect(thrownCode(() => validatePrefix({ prefix: '' }))).toBe(ErrorCode.INVALID_PREFIX);
    expect(thrownCode(() => validatePrefix({ prefix: 'pre_' }))).toBe(ErrorCode.INVALID_PREFIX);
  });
});

describe('resolveSize', () => {
  it('keeps the rest of the draft', () => {
    expect(resolveSize({ time: 5, size: 'xs' })).toEqual({ time: 5, size: 'xs', randSize: 2 });
  });

  it('uses the given default', () => {
    expect(resolveSize({ time: 5 }, 3)).toEqual({ time: 5, size: null, randSize: 3 });
  });
});

describe('encodeTime', () => {
  it('adds the packed timestamp', () => {
    expect(encodeTime({ time: 3_000_000_000_000 })).toEqual({
      time: 3_000_000_000_000,
      timeEncoded: '02Q9YYYC00'
    });
  });
});

describe('encodeRandom', () => {
  it('draws and encodes randSize bytes', () => {
    const services = fakeServices(0, 0xff);
    const draft = encodeRandom({ randSize: 2 }, services);

    expect(Array.from(draft.rand)).toEqual([0xff, 0xff]);
    expect(draft.randEncoded).toBe('ZZZG');
    expect(services.requested).toEqual([2]);
  });
});

describe('joinEncoded / joinString', () => {
  it('concatenates time and random parts', () => {
    expect(joinEncoded({ timeEncoded: '02Q9YYYC00', randEncoded: 'ZZZG' }).encoded).toBe('02Q9YYYC00ZZZG');
  });

  it('joins the prefix with the delimiter', () => {
    expect(joinString({ prefix: null, encoded: '02Q9YYYC00ZZZG' }).string).toBe('02Q9YYYC00ZZZG');
    expect(joinString({ prefix: 'pre', encoded: '02Q9YYYC00ZZZG' }).string).toBe('pre_02Q9YYYC00ZZZG');
  });
});

describe('encode', () => {
  it('returns a fully populated, frozen record', () => {
    const uxid = encode({ time: 3_000_000_000_000, prefix: 'pre', size: 'xs' }, fakeServices(0, 0xff));

    expect(uxid).toEqual({
      prefix: 'pre',
      time: 3_000_000_000_000,
      timeEncoded: '02Q9YYYC00',
      rand: new Uint8Array([0xff, 0xff]),
      randSize: 2,
      randEncoded: 'ZZZG',
      size: 'xs',
      encoded: '02Q9YYYC00ZZZG',
      string: 'pre_02Q9YYYC00ZZZG'
    });
    expect(Object.isFrozen(uxid)).toBe(true);
  });

  it('does not draw randomness when the input is invalid', () => {
    const services = fakeServices(0);

    expect(thrownCode(() => encode({ time: 0, prefix: '' }, services))).toBe(ErrorCode.INVALID_PREFIX);
    expect(thrownCode(() => encode({ time: 0, randSize: 0 }, services))).toBe(ErrorCode.INVALID_SIZE_OPTION);
    expect(thrownCode(() => encode({ time: -1 }, services))).toBe(ErrorCode.INVALID_TIME);
    expect(services.requested).toEqual([]);
  });
});
