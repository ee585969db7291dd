import { DELIMITER, assertValidPrefix } from './prefix.js';
import { encodeRand, generateRand, resolveRandSize, type UxidSize } from './rand.js';
import type { UxidServices } from './services.js';
import { packTime } from './time.js';
import type { GeneratedUxid } from './types.js';

// Each stage takes the draft built so far and returns a wider one.

export function validatePrefix<T extends { prefix?: string | null }>(
  draft: T
): T & { prefix: string | null } {
  const prefix = draft.prefix ?? null;
  if (prefix !== null) {
    assertValidPrefix(prefix);
  }
  return { ...draft, prefix };
}

export function resolveSize<T extends { randSize?: number | null; size?: string | null }>(
  draft: T,
  defaultRandSize?: number
): T & { randSize: number; size: UxidSize | null } {
  const { randSize, size } = resolveRandSize(draft, defaultRandSize);
  return { ...draft, randSize, size };
}

export function encodeTime<T extends { time: number }>(draft: T): T & { timeEncoded: string } {
  return { ...draft, timeEncoded: packTime(draft.time) };
}

export function encodeRandom<T extends { randSize: number }>(
  draft: T,
  services: UxidServices
): T & { rand: Uint8Array; randEncoded: string } {
  const rand = generateRand(draft.randSize, services);
  return { ...draft, rand, randEncoded: encodeRand(rand) };
}

export function joinEncoded<T extends { timeEncoded: string; randEncoded: string }>(
  draft: T
): T & { encoded: string } {
  return { ...draft, encoded: draft.timeEncoded + draft.randEncoded };
}

export function joinString<T extends { prefix: string | null; encoded: string }>(
  draft: T
): T & { string: string } {
  const string = draft.prefix === null ? draft.encoded : draft.prefix + DELIMITER + draft.encoded;
  return { ...draft, string };
}

export interface EncodeInput {
  time: number;
  prefix?: string | null;
  randSize?: number | null;
  size?: string | null;
}

/**
 * Runs the full generation pipeline. Throws UxidError on bad input;
 * the only side effect is drawing randomness from services.
 */
export function encode(
  input: EncodeInput,
  services: UxidServices,
  defaultRandSize?: number
): GeneratedUxid {
  const prefixed = validatePrefix(input);
  const sized = resolveSize(prefixed, defaultRandSize);
  const timed = encodeTime(sized);
  const randomised = encodeRandom(timed, services);
  const draft = joinString(joinEncoded(randomised));

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
