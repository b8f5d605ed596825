import { Pool, PoolClient } from 'pg';
import { ColumnType, TableDefinition, TableMeta } from './schema';
import { RelationalStore } from './store';
import { escapeIdentifier, validateTableSchema } from '../etl/utils';
import { DerivationError, MissingDependencyError } from '../etl/errors';

/** Keeps each INSERT under the 65535 bind-parameter limit */
const INSERT_BATCH_SIZE = 500;

const SQL_TYPES: Record<ColumnType, string> = {
  integer: 'INTEGER',
  numeric: 'NUMERIC',
  text: 'TEXT',
  boolean: 'BOOLEAN',
  date: 'DATE'
};

export interface SqlStatement {
  text: string;
  values: unknown[];
}

export function buildCreateTableSql(table: TableMeta, ifNotExists = false): string {
  const columns = table.columns.map(
    c => `  ${escapeIdentifier(c.name)} ${SQL_TYPES[c.type]}${c.nullable ? '' : ' NOT NULL'}`
  );
  const guard = ifNotExists ? 'IF NOT EXISTS ' : '';
  return `CREATE TABLE ${guard}${escapeIdentifier(table.name)} (\n${columns.join(',\n')}\n)`;
}

export function buildSelectSql(table: TableMeta): string {
  const columns = table.columns.map(c => escapeIdentifier(c.name)).join(', ');
  const order = table.orderBy.map(escapeIdentifier).join(', ');
  return `SELECT ${columns} FROM ${escapeIdentifier(table.name)} ORDER BY ${order}`;
}

/**
 * Multi-row INSERT statements with positional parameters
 */
export function buildInsertStatements<Row>(
  table: TableDefinition<Row>,
  rows: readonly Row[],
  batchSize: number = INSERT_BATCH_SIZE
): SqlStatement[] {
  const statements: SqlStatement[] = [];
  const columnList = table.columns.map(c => escapeIdentifier(c.name)).join(', ');
  const width = table.columns.length;

  for (let start = 0; start < rows.length; start += batchSize) {
    const batch = rows.slice(start, start + batchSize);
    const values: unknown[] = [];
    const tuples = batch.map((row, rowIndex) => {
      const placeholders = table.columns.map((column, colIndex) => {
        values.push(row[column.name]);
        return `$${rowIndex * width + colIndex + 1}`;
      });
      return `(${placeholders.join(', ')})`;
    });
    statements.push({
      text: `INSERT INTO ${escapeIdentifier(table.name)} (${columnList}) VALUES ${tuples.join(', ')}`,
      values
    });
  }

  return statements;
}

/**
 * PostgreSQL-backed relational store
 *
 * - Reads validate the table against information_schema first (FAIL_CLOSED)
 * - replaceTable runs DROP + CREATE + INSERT in one transaction
 * - Locks are session-level advisory locks held on a dedicated client
 */
export class PgStore implements RelationalStore {
  constructor(
    private readonly pool: Pool,
    private readonly lockKey: number
  ) {}

  async readTable<Row>(table: TableDefinition<Row>): Promise<Row[]> {
    const validation = await validateTableSchema(this.pool, table.name, table.columns);
    if (!validation.valid) {
      if (validation.missing) {
        throw new MissingDependencyError(table.name, 'missing');
      }
      throw new DerivationError(validation.error ?? `FAIL_CLOSED: Table "${table.name}" failed validation`, {
        table: table.name
      });
    }

    const result = await this.pool.query(buildSelectSql(table));
    return result.rows.map(row => table.schema.parse(row));
  }

  async replaceTable<Row>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<void> {
    await this.inTransaction(async client => {
      await client.query(`DROP TABLE IF EXISTS ${escapeIdentifier(table.name)}`);
      await client.query(buildCreateTableSql(table));
      for (const statement of buildInsertStatements(table, rows)) {
        await client.query(statement.text, statement.values);
      }
    });
  }

  async appendRows<Row>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<void> {
    await this.inTransaction(async client => {
      await client.query(buildCreateTableSql(table, true));
      for (const statement of buildInsertStatements(table, rows)) {
        await client.query(statement.text, statement.values);
      }
    });
  }

  async hasTable(name: string): Promise<boolean> {
    const result = await this.pool.query<{ present: boolean }>(
      `SELECT to_regclass($1) IS NOT NULL AS present`,
      [`public.${escapeIdentifier(name)}`]
    );
    return result.rows[0]?.present === true;
  }

  withExclusiveLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.withAdvisoryLock('pg_advisory_lock', 'pg_advisory_unlock', fn);
  }

  withSharedLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.withAdvisoryLock('pg_advisory_lock_shared', 'pg_advisory_unlock_shared', fn);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withAdvisoryLock<T>(
    acquire: 'pg_advisory_lock' | 'pg_advisory_lock_shared',
    release: 'pg_advisory_unlock' | 'pg_advisory_unlock_shared',
    fn: () => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query(`SELECT ${acquire}($1)`, [this.lockKey]);
      try {
        return await fn();
      } finally {
        await client.query(`SELECT ${release}($1)`, [this.lockKey]);
      }
    } finally {
      client.release();
    }
  }

  private async inTransaction(fn: (client: PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await fn(client);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }
}
