import type { Database } from '../db.js';
import type { DatasetDefinition, StagingRecord } from '../pipeline/dataset.js';
import { buildInsert, chunk } from '../utils/sql.js';

const INSERT_BATCH_SIZE = 500;

export interface StagingRepository {
  ensureTable(): Promise<void>;
  /** Natural keys already staged by earlier runs. */
  existingKeys(): Promise<Set<string>>;
  /** Inserts every row in one transaction; returns how many were written. */
  insertRows(rows: StagingRecord[]): Promise<number>;
  /** Full contents in load order. */
  readAll(): Promise<StagingRecord[]>;
}

export class PgStagingRepository implements StagingRepository {
  private readonly db: Database;
  private readonly dataset: DatasetDefinition;

  constructor(db: Database, dataset: DatasetDefinition) {
    this.db = db;
    this.dataset = dataset;
  }

  private get columnNames(): string[] {
    return this.dataset.columns.map((column) => column.name);
  }

  async ensureTable(): Promise<void> {
    const { stagingTable, keyColumn } = this.dataset;
    const columns = this.dataset.columns
      .map((column) => (column.name === keyColumn ? `${column.name} text primary key` : `${column.name} text`))
      .join(', ');
    await this.db.query(
      `create table if not exists ${stagingTable} (
        staged_seq bigserial,
        ${columns},
        staged_at timestamptz not null default now()
      )`
    );
  }

  async existingKeys(): Promise<Set<string>> {
    const { stagingTable, keyColumn } = this.dataset;
    const { rows } = await this.db.query(`select ${keyColumn} as key from ${stagingTable}`);
    const keys = new Set<string>();
    for (const row of rows) {
      if (row.key != null) {
        keys.add(String(row.key));
      }
    }
    return keys;
  }

  async insertRows(rows: StagingRecord[]): Promise<number> {
    if (!rows.length) return 0;
    const { stagingTable, keyColumn } = this.dataset;
    return this.db.withTransaction(async (client) => {
      let inserted = 0;
      for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
        const statement = buildInsert(stagingTable, this.columnNames, batch, `on conflict (${keyColumn}) do nothing`);
        const result = await this.db.query(statement.text, statement.values, client);
        inserted += result.rowCount ?? 0;
      }
      return inserted;
    });
  }

  async readAll(): Promise<StagingRecord[]> {
    const { rows } = await this.db.query(
      `select ${this.columnNames.join(', ')} from ${this.dataset.stagingTable} order by staged_seq`
    );
    return rows.map((row) => {
      const record: StagingRecord = {};
      for (const name of this.columnNames) {
        const value: unknown = row[name];
        record[name] = value == null ? null : String(value);
      }
      return record;
    });
  }
}
