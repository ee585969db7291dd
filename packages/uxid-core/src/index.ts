export { ALPHABET, encodeSymbol, decodeSymbol, isSymbol } from './alphabet.js';
export { ErrorCode, UxidError, isUxidError, type ErrorDetails } from './errors.js';
export { TIME_LENGTH, MAX_TIME, isValidTime, packTime, unpackTime } from './time.js';
export {
  SIZE_PRESETS,
  DEFAULT_RAND_SIZE,
  MAX_RAND_SIZE,
  isUxidSize,
  isValidRandSize,
  resolveRandSize,
  randEncodedLength,
  encodeRand,
  generateRand,
  type UxidSize,
  type SizeSelector,
  type ResolvedSize
} from './rand.js';
export { DELIMITER, assertValidPrefix } from './prefix.js';
export { defaultServices, type UxidServices } from './services.js';
export * from './types.js';
export {
  validatePrefix,
  resolveSize,
  encodeTime,
  encodeRandom,
  joinEncoded,
  joinString,
  encode,
  type EncodeInput
} from './encoder.js';
export {
  separatePrefix,
  separateEncoded,
  decodeTime,
  decodeSize,
  decodeRand,
  decodeRandSize,
  decode as decodeOrThrow
} from './decoder.js';
export {
  createUxid,
  generate,
  generateOrThrow,
  create,
  decode,
  type UxidConfig,
  type UxidFacade
} from './uxid.js';
