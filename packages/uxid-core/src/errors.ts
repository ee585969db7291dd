export const ErrorCode = {
  INVALID_PREFIX: 'INVALID_PREFIX',
  INVALID_SIZE_OPTION: 'INVALID_SIZE_OPTION',
  INVALID_TIME: 'INVALID_TIME',
  EMPTY_BODY: 'EMPTY_BODY',
  BODY_TOO_SHORT: 'BODY_TOO_SHORT',
  INVALID_SYMBOL: 'INVALID_SYMBOL',
  // raised by column adapters, never by the codec itself
  INVALID_CAST: 'INVALID_CAST'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ErrorDetails {
  /** Option or record field that was rejected */
  field?: string;
  /** The rejected value */
  value?: unknown;
  /** Offset of the offending character, for symbol errors */
  position?: number;
  [key: string]: unknown;
}

/**
 * Error raised by every stage of the UXID pipelines.
 * The facade turns these into failed results; anything else propagates.
 */
export class UxidError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = 'UxidError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UxidError);
    }
  }

  toJSON(): { name: string; code: ErrorCode; message: string; details: ErrorDetails } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

export function isUxidError(error: unknown): error is UxidError {
  return error instanceof UxidError;
}
