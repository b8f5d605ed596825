import { TableDefinition } from './schema';
import { RelationalStore, sortRows } from './store';
import { ReadWriteLock, withExclusive, withShared } from './rw-lock';
import { MissingDependencyError } from '../etl/errors';

/**
 * In-process relational store
 *
 * Rows are validated through the table schema on write and again on read, so
 * callers see exactly what a PostgreSQL round-trip would give them.
 */
export class MemoryStore implements RelationalStore {
  private tables = new Map<string, unknown[]>();
  private lock = new ReadWriteLock();
  private closed = false;

  async readTable<Row>(table: TableDefinition<Row>): Promise<Row[]> {
    this.assertOpen();
    const stored = this.tables.get(table.name);
    if (!stored) {
      throw new MissingDependencyError(table.name, 'missing');
    }
    return sortRows(table, stored.map(raw => table.schema.parse(raw)));
  }

  async replaceTable<Row>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<void> {
    this.assertOpen();
    // parse everything before touching the stored table
    const parsed = rows.map(row => table.schema.parse(row));
    this.tables.set(table.name, parsed);
  }

  async appendRows<Row>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<void> {
    this.assertOpen();
    const parsed = rows.map(row => table.schema.parse(row));
    const existing = this.tables.get(table.name) ?? [];
    this.tables.set(table.name, [...existing, ...parsed]);
  }

  async hasTable(name: string): Promise<boolean> {
    return this.tables.has(name);
  }

  async dropTable(name: string): Promise<void> {
    this.tables.delete(name);
  }

  withExclusiveLock<T>(fn: () => Promise<T>): Promise<T> {
    return withExclusive(this.lock, fn);
  }

  withSharedLock<T>(fn: () => Promise<T>): Promise<T> {
    return withShared(this.lock, fn);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  getLockStats(): { readers: number; writer: boolean; queued: number } {
    return this.lock.getStats();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('MemoryStore is closed');
    }
  }
}
