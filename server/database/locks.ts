// =============================================================
// File: server/database/locks.ts
// Description: Row reads taken FOR UPDATE, held until the
//              caller's transaction ends. SQLite compiles the
//              clause away; its single pooled connection
//              serialises writers instead.
// =============================================================

import type { Db } from './connection';

export type LockedTable = 'sales' | 'items' | 'products' | 'debts';

export function rowLockQuery(db: Db, table: LockedTable, id: number) {
  return db(table).where({ id }).forUpdate().first();
}

export function rowsLockQuery(db: Db, table: LockedTable, ids: number[]) {
  return db(table).whereIn('id', ids).forUpdate();
}

export async function lockRow<TRow>(db: Db, table: LockedTable, id: number): Promise<TRow | undefined> {
  return rowLockQuery(db, table, id);
}

export async function lockRows<TRow>(db: Db, table: LockedTable, ids: number[]): Promise<TRow[]> {
  return rowsLockQuery(db, table, ids);
}
