import { z } from 'zod';
import type { DestinationRepository } from '../repositories/destination.js';
import type { StagingRepository } from '../repositories/staging.js';
import { exchangeKey, type DagDefinition } from '../scheduler/dag.js';
import { cleanedRecordSchema, rawRowSchema, type DatasetDefinition } from './dataset.js';
import { extractRows } from './extractor.js';
import type { DatasetCredential, DatasetFetcher } from './fetcher.js';
import { loadDestination } from './final-loader.js';
import { loadStaging } from './stage-loader.js';
import { transformStaging } from './transformer.js';

export const DAG_ID = 'online_orders_etl';

export const TASK_IDS = {
  download: 'download_dataset',
  extract: 'extract_data',
  stage: 'load_staging',
  transform: 'transform_data',
  load: 'load_destination',
} as const;

const SOURCE_PATH = exchangeKey(TASK_IDS.download, 'file_path', z.string());
const EXTRACTED_ROWS = exchangeKey(TASK_IDS.extract, 'rows', z.array(rawRowSchema));
const CLEANED_ROWS = exchangeKey(TASK_IDS.transform, 'rows', z.array(cleanedRecordSchema));

export type EtlDependencies = {
  dataset: DatasetDefinition;
  datasetId: string;
  downloadDir: string;
  resolveCredential: () => Promise<DatasetCredential>;
  fetcher: DatasetFetcher;
  staging: StagingRepository;
  destination: DestinationRepository;
};

/**
 * The five task entry points, in dependency order:
 * download -> extract -> stage -> transform -> load.
 */
export function createEtlDag(deps: EtlDependencies): DagDefinition {
  const { dataset } = deps;

  return {
    id: DAG_ID,
    tasks: [
      {
        id: TASK_IDS.download,
        run: async (context) => {
          const credential = await deps.resolveCredential();
          const result = await deps.fetcher.fetch({
            datasetId: deps.datasetId,
            directory: deps.downloadDir,
            credential,
            sourceFile: dataset.sourceFile,
          });
          context.push(SOURCE_PATH, result.sourcePath);
          context.summarize({ sourcePath: result.sourcePath, files: result.files.length });
          await context.log('info', `Data downloaded to ${result.sourcePath}`);
        },
      },
      {
        id: TASK_IDS.extract,
        run: async (context) => {
          const filePath = context.pull(SOURCE_PATH);
          const rows = await extractRows(filePath, dataset, context.logger);
          context.push(EXTRACTED_ROWS, rows);
          context.summarize({ rows: rows.length });
          await context.log('info', `Extracted ${rows.length} rows from ${filePath}`);
        },
      },
      {
        id: TASK_IDS.stage,
        run: async (context) => {
          const rows = context.pull(EXTRACTED_ROWS);
          const summary = await loadStaging(dataset, rows, deps.staging);
          context.summarize(summary);
          await context.log(
            'info',
            summary.inserted
              ? `${summary.inserted} new rows added to ${dataset.stagingTable}; ${summary.skipped} already staged`
              : `No new rows for ${dataset.stagingTable}`
          );
        },
      },
      {
        id: TASK_IDS.transform,
        run: async (context) => {
          const result = await transformStaging(dataset, deps.staging);
          context.push(CLEANED_ROWS, result.rows);
          context.summarize(result.summary);
          await context.log(
            'info',
            `Cleaned ${result.summary.cleaned} of ${result.summary.read} staged rows ` +
              `(${result.summary.duplicates} duplicates, ${result.summary.dropped} incomplete)`
          );
        },
      },
      {
        id: TASK_IDS.load,
        run: async (context) => {
          const rows = context.pull(CLEANED_ROWS);
          const result = await loadDestination(dataset, rows, deps.destination);
          context.summarize(result);
          await context.log(
            'info',
            `Replaced ${dataset.destinationTable}: ${result.deleted} rows removed, ${result.inserted} rows loaded`
          );
        },
      },
    ],
  };
}
