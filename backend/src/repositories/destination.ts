import type { Database } from '../db.js';
import type { CleanedRecord, ColumnType, DatasetDefinition } from '../pipeline/dataset.js';
import { buildInsert, chunk } from '../utils/sql.js';

const INSERT_BATCH_SIZE = 500;

const SQL_TYPES: Record<ColumnType, string> = {
  text: 'text',
  numeric: 'numeric',
  integer: 'bigint',
  date: 'date',
};

export type ReplaceResult = {
  deleted: number;
  inserted: number;
};

export interface DestinationRepository {
  ensureTable(): Promise<void>;
  /** Swaps the table contents for `rows`; readers see either the old or the new set. */
  replaceAll(rows: CleanedRecord[]): Promise<ReplaceResult>;
}

export class PgDestinationRepository implements DestinationRepository {
  private readonly db: Database;
  private readonly dataset: DatasetDefinition;

  constructor(db: Database, dataset: DatasetDefinition) {
    this.db = db;
    this.dataset = dataset;
  }

  async ensureTable(): Promise<void> {
    const { destinationTable } = this.dataset;
    const dot = destinationTable.indexOf('.');
    if (dot > 0) {
      await this.db.query(`create schema if not exists ${destinationTable.slice(0, dot)}`);
    }
    const columns = this.dataset.columns.map((column) => `${column.name} ${SQL_TYPES[column.type]}`).join(', ');
    await this.db.query(`create table if not exists ${destinationTable} (${columns})`);
  }

  async replaceAll(rows: CleanedRecord[]): Promise<ReplaceResult> {
    const { destinationTable } = this.dataset;
    const columnNames = this.dataset.columns.map((column) => column.name);
    return this.db.withTransaction(async (client) => {
      const removed = await this.db.query(`delete from ${destinationTable}`, [], client);
      let inserted = 0;
      for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
        const statement = buildInsert(destinationTable, columnNames, batch);
        const result = await this.db.query(statement.text, statement.values, client);
        inserted += result.rowCount ?? 0;
      }
      return { deleted: removed.rowCount ?? 0, inserted };
    });
  }
}
