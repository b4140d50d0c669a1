import { LoadError, PipelineError } from '../errors.js';
import type { StagingRepository } from '../repositories/staging.js';
import { toStagingRecord, type DatasetDefinition, type RawRow, type StagingRecord } from './dataset.js';

export type StageSummary = {
  received: number;
  inserted: number;
  skipped: number;
};

function asLoadError(error: unknown, message: string): PipelineError {
  return error instanceof PipelineError ? error : new LoadError(message, { cause: error });
}

/**
 * Append-only load: a row is staged only if its key is neither already in
 * the table nor earlier in the same batch. Existing rows are never updated.
 */
export async function loadStaging(
  dataset: DatasetDefinition,
  rows: RawRow[],
  staging: StagingRepository
): Promise<StageSummary> {
  let known: Set<string>;
  try {
    await staging.ensureTable();
    known = await staging.existingKeys();
  } catch (error) {
    throw asLoadError(error, `staging table ${dataset.stagingTable} is not reachable`);
  }

  const fresh: StagingRecord[] = [];
  rows.forEach((row, index) => {
    const record = toStagingRecord(dataset, row);
    const key = record[dataset.keyColumn];
    if (!key) {
      throw new LoadError(`row ${index + 1} has no ${dataset.keyColumn} value`);
    }
    if (known.has(key)) return;
    known.add(key);
    fresh.push(record);
  });

  let inserted = 0;
  try {
    inserted = await staging.insertRows(fresh);
  } catch (error) {
    throw asLoadError(error, `insert into ${dataset.stagingTable} failed; no rows were staged`);
  }

  return { received: rows.length, inserted, skipped: rows.length - inserted };
}
