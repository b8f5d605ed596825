import { TableDefinition } from './schema';

/**
 * Relational store abstraction used by every derivation stage
 *
 * Reads return rows parsed through the table's zod schema, sorted by the
 * table's declared order. Writes replace a whole table atomically.
 */
export interface RelationalStore {
  readTable<Row>(table: TableDefinition<Row>): Promise<Row[]>;
  /** Drop and rebuild a table with exactly these rows (all or nothing) */
  replaceTable<Row>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<void>;
  /** Append rows, creating the table when absent */
  appendRows<Row>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<void>;
  hasTable(name: string): Promise<boolean>;
  withExclusiveLock<T>(fn: () => Promise<T>): Promise<T>;
  withSharedLock<T>(fn: () => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

/**
 * Total order over column values: nulls last, numbers numerically, everything
 * else by string comparison
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === b) {
    return 0;
  }
  if (a === null || a === undefined) {
    return 1;
  }
  if (b === null || b === undefined) {
    return -1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a ? 1 : -1;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export function sortRows<Row>(table: TableDefinition<Row>, rows: Row[]): Row[] {
  return rows.sort((a, b) => {
    for (const column of table.orderBy) {
      const diff = compareValues(a[column], b[column]);
      if (diff !== 0) {
        return diff;
      }
    }
    return 0;
  });
}
