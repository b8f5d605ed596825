import { Pool } from 'pg';
import { createHash } from 'crypto';
import { ColumnType, TableMeta } from '../db/schema';
import { DerivationConfig } from '../config/derivation';

export interface SchemaValidationResult {
  valid: boolean;
  /** true when the table itself is absent (as opposed to a column mismatch) */
  missing?: boolean;
  error?: string;
}

/**
 * Validate required columns exist in a table with compatible types
 */
export async function validateTableSchema(
  pool: Pool,
  tableName: string,
  requiredColumns: ReadonlyArray<{ name: string; type: ColumnType }>
): Promise<SchemaValidationResult> {
  try {
    const result = await pool.query<{ column_name: string; data_type: string }>(
      `
      SELECT column_name, data_type
      FROM information_schema.columns
      WHERE table_schema = 'public'
        AND table_name = $1
      ORDER BY column_name ASC
      `,
      [tableName]
    );

    if (result.rows.length === 0) {
      return {
        valid: false,
        missing: true,
        error: `FAIL_CLOSED: Table "${tableName}" not found in schema`
      };
    }

    const actualColumns = new Map(result.rows.map(row => [row.column_name, row.data_type]));

    for (const required of requiredColumns) {
      const actualType = actualColumns.get(required.name);

      if (!actualType) {
        return {
          valid: false,
          error: `FAIL_CLOSED: Required column "${required.name}" missing from table "${tableName}"`
        };
      }

      if (!checkTypeCompatibility(actualType, required.type)) {
        return {
          valid: false,
          error: `FAIL_CLOSED: Column "${required.name}" in table "${tableName}" has type "${actualType}", expected "${required.type}"`
        };
      }
    }

    return { valid: true };
  } catch (err) {
    return {
      valid: false,
      error: `FAIL_CLOSED: Schema validation error for "${tableName}": ${err}`
    };
  }
}

const TYPE_FAMILIES: Record<ColumnType, readonly string[]> = {
  integer: ['integer', 'int', 'int4', 'bigint', 'int8', 'smallint', 'int2'],
  // integers are accepted where a numeric is expected, never the reverse
  numeric: ['numeric', 'decimal', 'double precision', 'real', 'integer', 'bigint', 'smallint'],
  text: ['text', 'character varying', 'varchar', 'char', 'character'],
  boolean: ['boolean', 'bool'],
  date: ['date', 'timestamp without time zone', 'timestamp with time zone', 'timestamp', 'timestamptz']
};

/**
 * Check type compatibility (allow for Postgres type aliases)
 */
export function checkTypeCompatibility(actual: string, expected: ColumnType): boolean {
  return TYPE_FAMILIES[expected].includes(actual.toLowerCase());
}

/**
 * Escape SQL identifier
 */
export function escapeIdentifier(identifier: string): string {
  if (!/^[a-z_][a-z0-9_]*$/i.test(identifier)) {
    throw new Error(`FAIL_CLOSED: Invalid identifier "${identifier}"`);
  }
  return `"${identifier}"`;
}

/**
 * Content hash of a table's rows in declared column order
 *
 * Rows must already be in their canonical order; two row sets hash equal iff
 * they are equal value-for-value.
 */
export function hashRows<Row>(table: TableMeta, rows: readonly Row[]): string {
  const hash = createHash('sha256');
  hash.update(table.name);
  hash.update(table.columns.map(c => `${c.name}:${c.type}`).join(','));
  for (const row of rows) {
    const values = table.columns.map(c => readColumn(row, c.name));
    hash.update('\n');
    hash.update(JSON.stringify(values));
  }
  return hash.digest('hex');
}

function readColumn(row: unknown, column: string): unknown {
  if (typeof row !== 'object' || row === null) {
    return null;
  }
  const value: unknown = Reflect.get(row, column);
  return value === undefined ? null : value;
}

/**
 * Compute execution hash from the stages run, their output hashes and the config
 */
export function computeExecutionHash(
  stages: readonly string[],
  outputHashes: Record<string, string>,
  config: DerivationConfig
): string {
  const executionData = {
    stages,
    config,
    outputs: Object.keys(outputHashes)
      .sort((a, b) => a.localeCompare(b))
      .map(table => ({ table, hash: outputHashes[table] }))
  };

  const hash = createHash('sha256');
  hash.update(JSON.stringify(executionData));
  return hash.digest('hex');
}
