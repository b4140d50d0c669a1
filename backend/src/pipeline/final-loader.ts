import { LoadError } from '../errors.js';
import type { DestinationRepository, ReplaceResult } from '../repositories/destination.js';
import type { CleanedRecord, DatasetDefinition } from './dataset.js';

/**
 * Full overwrite of the destination table. On failure the transaction rolls
 * back and the previous contents stay visible.
 */
export async function loadDestination(
  dataset: DatasetDefinition,
  rows: CleanedRecord[],
  destination: DestinationRepository
): Promise<ReplaceResult> {
  try {
    await destination.ensureTable();
    return await destination.replaceAll(rows);
  } catch (error) {
    throw new LoadError(`destination table ${dataset.destinationTable} could not be replaced`, { cause: error });
  }
}
