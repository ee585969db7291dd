import { randomBytes } from 'crypto';

/**
 * The two effects UXID generation depends on. Pass fakes to get
 * deterministic ids in tests.
 */
export interface UxidServices {
  /** Current time in milliseconds since the Unix epoch */
  now(): number;
  /** Cryptographically secure random bytes */
  randomBytes(size: number): Uint8Array;
}

export const defaultServices: UxidServices = {
  now: () => Date.now(),
  randomBytes: (size) => randomBytes(size)
};
