import { z } from 'zod';
import {
  ErrorCode,
  UxidError,
  MAX_RAND_SIZE,
  createUxid,
  isUxidSize,
  type UxidFacade,
  type UxidResult,
  type UxidSize
} from '@uxid/core';

export const UxidColumnOptionsSchema = z.object({
  prefix: z.string().min(1).optional(),
  size: z.custom<UxidSize>(isUxidSize, { message: 'unknown size preset' }).optional(),
  randSize: z.number().int().positive().max(MAX_RAND_SIZE).optional()
});

export type UxidColumnOptions = z.input<typeof UxidColumnOptionsSchema>;
export type UxidColumnParams = z.output<typeof UxidColumnOptionsSchema>;

/** Column type a UXID is stored as. The stored form is the string itself. */
export const UXID_COLUMN_TYPE = 'text';

export interface UxidColumn {
  readonly params: UxidColumnParams;
  type(): typeof UXID_COLUMN_TYPE;
  autogenerate(): string;
  cast(input: unknown): UxidResult<string | null>;
  load(value: string | null): string | null;
  dump(value: string | null): string | null;
}

/**
 * Validates the options a column is declared with. Throws a ZodError on
 * anything malformed so misconfigured columns fail at startup.
 */
export function initUxidColumn(options: UxidColumnOptions = {}): UxidColumnParams {
  return UxidColumnOptionsSchema.parse(options);
}

/** Accepts strings, raw bytes (read as UTF-8) and null. */
export function castUxid(input: unknown): UxidResult<string | null> {
  if (input === null || input === undefined) {
    return { success: true, data: null };
  }
  if (typeof input === 'string') {
    return { success: true, data: input };
  }
  if (input instanceof Uint8Array) {
    return { success: true, data: Buffer.from(input).toString('utf8') };
  }
  return {
    success: false,
    error: new UxidError(ErrorCode.INVALID_CAST, `cannot cast ${typeof input} to a uxid`, {
      value: input
    })
  };
}

export function loadUxid(value: string | null): string | null {
  return value;
}

export function dumpUxid(value: string | null): string | null {
  return value;
}

export function createUxidColumn(
  options: UxidColumnOptions = {},
  uxid: UxidFacade = createUxid()
): UxidColumn {
  const params = initUxidColumn(options);

  return {
    params,
    type: () => UXID_COLUMN_TYPE,
    autogenerate: () =>
      uxid.generateOrThrow({ prefix: params.prefix, size: params.size, randSize: params.randSize }),
    cast: castUxid,
    load: loadUxid,
    dump: dumpUxid
  };
}
