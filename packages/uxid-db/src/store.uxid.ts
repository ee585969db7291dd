import { z } from 'zod';
import type { Queryable } from './db.js';
import { createUxidColumn, type UxidColumn } from './column-type.js';

const RowSchema = z.record(z.unknown());

export type StoredRow = z.infer<typeof RowSchema>;

export const INSERT_ROW_SQL = 'INSERT INTO $1:name($2:name) VALUES($3:csv) RETURNING *';
export const FIND_ROW_SQL = 'SELECT * FROM $1:name WHERE $2:name = $3';

export interface UxidStoreConfig {
  table: string;
  /** Primary key column, defaults to "id" */
  column?: string;
  type?: UxidColumn;
}

export interface UxidStore {
  insert(values: Record<string, unknown>): Promise<StoredRow>;
  find(id: unknown): Promise<StoredRow | null>;
}

/**
 * Table access keyed by a UXID column. Inserts without a key get one
 * generated by the column type.
 */
export function createUxidStore(db: Queryable, config: UxidStoreConfig): UxidStore {
  const { table } = config;
  const column = config.column ?? 'id';
  const type = config.type ?? createUxidColumn();

  function castKey(value: unknown): string | null {
    const cast = type.cast(value);
    if (!cast.success) {
      throw cast.error;
    }
    return cast.data;
  }

  function toRow(result: unknown): StoredRow {
    const row = RowSchema.parse(result);
    const key = row[column];
    return typeof key === 'string' ? { ...row, [column]: type.load(key) } : row;
  }

  async function insert(values: Record<string, unknown>): Promise<StoredRow> {
    const key = values[column] === undefined ? type.autogenerate() : castKey(values[column]);
    const row = { ...values, [column]: type.dump(key) };
    const columns = Object.keys(row);

    const result = await db.one(INSERT_ROW_SQL, [table, columns, columns.map((c) => row[c])]);
    return toRow(result);
  }

  async function find(id: unknown): Promise<StoredRow | null> {
    const key = castKey(id);
    if (key === null) {
      return null;
    }

    const result = await db.oneOrNone(FIND_ROW_SQL, [table, column, type.dump(key)]);
    return result === null ? null : toRow(result);
  }

  return { insert, find };
}
