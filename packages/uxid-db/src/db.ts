import pgPromise from 'pg-promise';
import { z } from 'zod';

const pgp = pgPromise();

const DatabaseUrl = z.string().min(1, 'DATABASE_URL not set').url('DATABASE_URL is not a valid url');

/** Opens the database holding uxid-keyed tables, from the given url or DATABASE_URL. */
export function createDb(databaseUrl?: string) {
  const parsed = DatabaseUrl.safeParse(databaseUrl ?? process.env.DATABASE_URL ?? '');
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((i) => i.message).join('; '));
  }
  return pgp(parsed.data);
}

export type Db = ReturnType<typeof createDb>;

/**
 * The slice of a pg-promise database the UXID store needs. A Db or any
 * task/transaction context satisfies it.
 */
export interface Queryable {
  one(query: string, values?: unknown): Promise<unknown>;
  oneOrNone(query: string, values?: unknown): Promise<unknown>;
}
