import { TableDefinition, TableMeta } from '../../db/schema';
import { RelationalStore, sortRows } from '../../db/store';
import { DerivationConfig } from '../../config/derivation';
import { IssueCollector } from '../../observability/invariants';
import { DerivationLogger } from '../../observability/logger';
import { hashRows } from '../utils';

export interface StageContext {
  stage: string;
  config: DerivationConfig;
  /** Read a declared input table */
  read<Row>(table: TableDefinition<Row>): Promise<Row[]>;
  issues: IssueCollector;
  logger: DerivationLogger;
}

/**
 * A fully computed output table, not yet written
 */
export interface StageOutput {
  table: TableMeta;
  rowCount: number;
  contentHash: string;
  write(store: RelationalStore): Promise<void>;
}

/**
 * One node of the derivation graph
 *
 * A stage reads only its declared inputs and returns exactly its declared
 * outputs; the scheduler writes them.
 */
export interface DerivationStage {
  name: string;
  description: string;
  inputs: readonly TableMeta[];
  outputs: readonly TableMeta[];
  run(ctx: StageContext): Promise<StageOutput[]>;
}

/**
 * Package rows for a table in canonical order with their content hash
 */
export function emit<Row>(table: TableDefinition<Row>, rows: Row[]): StageOutput {
  const ordered = sortRows(table, [...rows]);
  return {
    table,
    rowCount: ordered.length,
    contentHash: hashRows(table, ordered),
    write: store => store.replaceTable(table, ordered)
  };
}

/**
 * Group rows by a key, preserving encounter order within each group
 */
export function groupBy<Row, Key>(rows: readonly Row[], keyOf: (row: Row) => Key): Map<Key, Row[]> {
  const groups = new Map<Key, Row[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/**
 * Composite map key for (a, b) integer pairs
 */
export function pairKey(a: number, b: number): string {
  return `${a}:${b}`;
}
