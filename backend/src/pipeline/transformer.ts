import type { StagingRepository } from '../repositories/staging.js';
import { TransformError } from '../errors.js';
import { coerceValue } from './coerce.js';
import type { CleanedRecord, DatasetDefinition, StagingRecord } from './dataset.js';

export type TransformSummary = {
  read: number;
  duplicates: number;
  dropped: number;
  cleaned: number;
};

export type TransformResult = {
  rows: CleanedRecord[];
  summary: TransformSummary;
};

function rowSignature(dataset: DatasetDefinition, row: StagingRecord | CleanedRecord): string {
  return JSON.stringify(dataset.columns.map((column) => row[column.name] ?? null));
}

/**
 * Cleaning rules, applied in order: exact duplicates are removed keeping the
 * first occurrence, each column is coerced to its type, then rows missing a
 * required value are dropped and optional gaps take the column default.
 * Cleaned rows that became identical through coercion are removed last.
 */
export function cleanRows(dataset: DatasetDefinition, rows: StagingRecord[]): TransformResult {
  const seen = new Set<string>();
  const unique: StagingRecord[] = [];
  for (const row of rows) {
    const signature = rowSignature(dataset, row);
    if (seen.has(signature)) continue;
    seen.add(signature);
    unique.push(row);
  }

  const complete: CleanedRecord[] = [];
  for (const row of unique) {
    const record: CleanedRecord = {};
    let filled = true;
    for (const column of dataset.columns) {
      const value = coerceValue(column.type, row[column.name] ?? null);
      if (value != null) {
        record[column.name] = value;
      } else if (column.required) {
        filled = false;
        break;
      } else {
        record[column.name] = column.default ?? null;
      }
    }
    if (filled) {
      complete.push(record);
    }
  }

  // Distinct raw spellings of one value ("1" and "1.0") meet again after coercion.
  const cleanedSeen = new Set<string>();
  const cleaned = complete.filter((record) => {
    const signature = rowSignature(dataset, record);
    if (cleanedSeen.has(signature)) return false;
    cleanedSeen.add(signature);
    return true;
  });

  return {
    rows: cleaned,
    summary: {
      read: rows.length,
      duplicates: rows.length - unique.length + (complete.length - cleaned.length),
      dropped: unique.length - complete.length,
      cleaned: cleaned.length,
    },
  };
}

export async function transformStaging(
  dataset: DatasetDefinition,
  staging: StagingRepository
): Promise<TransformResult> {
  let rows: StagingRecord[];
  try {
    rows = await staging.readAll();
  } catch (error) {
    throw new TransformError(`staging table ${dataset.stagingTable} could not be read`, { cause: error });
  }
  if (!rows.length) {
    throw new TransformError(`staging table ${dataset.stagingTable} is empty`);
  }
  return cleanRows(dataset, rows);
}
