import { decode as decodeUxid } from './decoder.js';
import { encode } from './encoder.js';
import { ErrorCode, UxidError, isUxidError } from './errors.js';
import { DEFAULT_RAND_SIZE, MAX_RAND_SIZE, isValidRandSize } from './rand.js';
import { defaultServices, type UxidServices } from './services.js';
import type { DecodedUxid, GeneratedUxid, UxidOptions, UxidResult } from './types.js';

export interface UxidConfig {
  services?: UxidServices;
  /** Random byte count used when neither randSize nor size is given */
  defaultRandSize?: number;
}

export interface UxidFacade {
  /** Returns the encoded UXID string */
  generate(options?: UxidOptions): UxidResult<string>;
  /** Returns the encoded UXID string, throwing UxidError on bad options */
  generateOrThrow(options?: UxidOptions): string;
  /** Returns the full generated record */
  create(options?: UxidOptions): UxidResult<GeneratedUxid>;
  decode(uxid: string): UxidResult<DecodedUxid>;
}

function attempt<T>(fn: () => T): UxidResult<T> {
  try {
    return { success: true, data: fn() };
  } catch (error) {
    if (isUxidError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

export function createUxid(config: UxidConfig = {}): UxidFacade {
  const services = config.services ?? defaultServices;
  const defaultRandSize = config.defaultRandSize ?? DEFAULT_RAND_SIZE;

  if (!isValidRandSize(defaultRandSize)) {
    throw new UxidError(ErrorCode.INVALID_SIZE_OPTION, `defaultRandSize must be an integer from 1 to ${MAX_RAND_SIZE}`, {
      field: 'defaultRandSize',
      value: defaultRandSize
    });
  }

  function build(options: UxidOptions): GeneratedUxid {
    return encode(
      {
        time: options.time ?? services.now(),
        prefix: options.prefix,
        randSize: options.randSize,
        size: options.size
      },
      services,
      defaultRandSize
    );
  }

  function create(options: UxidOptions = {}): UxidResult<GeneratedUxid> {
    return attempt(() => build(options));
  }

  function generate(options: UxidOptions = {}): UxidResult<string> {
    return attempt(() => build(options).string);
  }

  function generateOrThrow(options: UxidOptions = {}): string {
    return build(options).string;
  }

  function decode(uxid: string): UxidResult<DecodedUxid> {
    return attempt(() => decodeUxid(uxid));
  }

  return { generate, generateOrThrow, create, decode };
}

const defaultUxid = createUxid();

export const generate = defaultUxid.generate;
export const generateOrThrow = defaultUxid.generateOrThrow;
export const create = defaultUxid.create;
export const decode = defaultUxid.decode;
