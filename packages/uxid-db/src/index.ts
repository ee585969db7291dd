export { createDb, type Db, type Queryable } from './db.js';
export {
  UxidColumnOptionsSchema,
  UXID_COLUMN_TYPE,
  initUxidColumn,
  castUxid,
  loadUxid,
  dumpUxid,
  createUxidColumn,
  type UxidColumn,
  type UxidColumnOptions,
  type UxidColumnParams
} from './column-type.js';
export * from './store.uxid.js';
