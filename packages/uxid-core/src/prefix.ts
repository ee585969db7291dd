import { ErrorCode, UxidError } from './errors.js';

export const DELIMITER = '_';

/**
 * A prefix is any non-empty string that does not end with the delimiter.
 * Delimiters inside the prefix are fine: the body never contains one.
 */
export function assertValidPrefix(prefix: string): void {
  if (prefix.length === 0) {
    throw new UxidError(ErrorCode.INVALID_PREFIX, 'prefix must not be empty', {
      field: 'prefix',
      value: prefix
    });
  }
  if (prefix.endsWith(DELIMITER)) {
    throw new UxidError(ErrorCode.INVALID_PREFIX, `prefix must not end with '${DELIMITER}'`, {
      field: 'prefix',
      value: prefix
    });
  }
}
