import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FetchError } from '../src/errors.js';
import type { DatasetFetcher, FetchRequest, FetchResult } from '../src/pipeline/fetcher.js';
import { DAG_ID, TASK_IDS, createEtlDag } from '../src/pipeline/tasks.js';
import { DagRunner } from '../src/scheduler/dag-runner.js';
import { ORDERS, silentLogger } from './support/fixtures.js';
import {
  MemoryDestinationRepository,
  MemoryRunHistory,
  MemoryStagingRepository,
} from './support/memory-repositories.js';

/** Writes a fixed CSV where a real download would unpack the archive. */
class StaticFetcher implements DatasetFetcher {
  requests: FetchRequest[] = [];

  constructor(private readonly contents: string | Error) {}

  async fetch(request: FetchRequest): Promise<FetchResult> {
    this.requests.push(request);
    if (this.contents instanceof Error) throw this.contents;
    await fsp.mkdir(request.directory, { recursive: true });
    const sourcePath = path.join(request.directory, request.sourceFile);
    await fsp.writeFile(sourcePath, this.contents, 'utf8');
    return { sourcePath, files: [sourcePath] };
  }
}

describe('online orders pipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'etl-pipeline-'));
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  function setup(contents: string | Error) {
    const fetcher = new StaticFetcher(contents);
    const staging = new MemoryStagingRepository(ORDERS);
    const destination = new MemoryDestinationRepository();
    const history = new MemoryRunHistory();
    const dag = createEtlDag({
      dataset: ORDERS,
      datasetId: 'acme/orders',
      downloadDir: dir,
      resolveCredential: async () => ({ username: 'test-user', key: 'test-key' }),
      fetcher,
      staging,
      destination,
    });
    const runner = new DagRunner(dag, history, silentLogger, { retries: 0, retryDelayMs: 0 });
    return { fetcher, staging, destination, history, runner };
  }

  async function runOnce(runner: DagRunner) {
    const run = await runner.createRun('manual');
    return { run, outcome: await runner.execute(run.id) };
  }

  it('moves rows from the source file to the destination table', async () => {
    const { fetcher, staging, destination, history, runner } = setup('id,qty\n1,3\n1,3\n2,abc\n');

    const { run, outcome } = await runOnce(runner);

    expect(outcome.status).toBe('success');
    expect(fetcher.requests).toEqual([
      {
        datasetId: 'acme/orders',
        directory: dir,
        credential: { username: 'test-user', key: 'test-key' },
        sourceFile: 'orders.csv',
      },
    ]);
    expect(staging.rows).toEqual([
      { id: '1', qty: '3' },
      { id: '2', qty: 'abc' },
    ]);
    expect(destination.rows).toEqual([{ id: 1, qty: 3 }]);
    expect(outcome.summary).toEqual({
      [TASK_IDS.download]: { sourcePath: path.join(dir, 'orders.csv'), files: 1 },
      [TASK_IDS.extract]: { rows: 3 },
      [TASK_IDS.stage]: { received: 3, inserted: 2, skipped: 1 },
      [TASK_IDS.transform]: { read: 2, duplicates: 0, dropped: 1, cleaned: 1 },
      [TASK_IDS.load]: { deleted: 0, inserted: 1 },
    });

    const details = await history.getRun(run.id);
    expect(details?.dagId).toBe(DAG_ID);
    expect(details?.tasks.map((task) => task.status)).toEqual(['success', 'success', 'success', 'success', 'success']);
    expect(details?.logs).toContainEqual(
      expect.objectContaining({
        taskId: TASK_IDS.stage,
        message: '2 new rows added to orders_staging; 1 already staged',
      })
    );
  });

  it('gives the same destination contents when run twice', async () => {
    const { staging, destination, history, runner } = setup('id,qty\n1,3\n2,4\n');

    await runOnce(runner);
    const { run, outcome } = await runOnce(runner);

    expect(outcome.summary).toMatchObject({
      [TASK_IDS.stage]: { received: 2, inserted: 0, skipped: 2 },
      [TASK_IDS.load]: { deleted: 2, inserted: 2 },
    });
    expect(staging.rows).toHaveLength(2);
    expect(destination.rows).toEqual([
      { id: 1, qty: 3 },
      { id: 2, qty: 4 },
    ]);
    expect((await history.getRun(run.id))?.logs).toContainEqual(
      expect.objectContaining({ message: 'No new rows for orders_staging' })
    );
  });

  it('leaves both tables untouched when the download fails', async () => {
    const { staging, destination, history, runner } = setup(new FetchError('dataset acme/orders not found'));

    const { run, outcome } = await runOnce(runner);

    expect(outcome.error).toBe('download_dataset failed: dataset acme/orders not found');
    expect(staging.rows).toEqual([]);
    expect(destination.rows).toEqual([]);
    expect((await history.getRun(run.id))?.tasks.map((task) => task.status)).toEqual([
      'failed',
      'upstream_failed',
      'upstream_failed',
      'upstream_failed',
      'upstream_failed',
    ]);
  });

  it('stops before staging when the header does not match', async () => {
    const { staging, runner } = setup('id,amount\n1,3\n');

    const { outcome } = await runOnce(runner);

    expect(outcome.error).toBe('extract_data failed: header mismatch: missing qty');
    expect(staging.insertCalls).toBe(0);
  });

  it('keeps the previous destination rows when the final load fails', async () => {
    const { destination, runner } = setup('id,qty\n1,3\n');
    await runOnce(runner);
    destination.failOnReplace = new Error('disk full');

    const { outcome } = await runOnce(runner);

    expect(outcome.error).toBe('load_destination failed: destination table orders could not be replaced');
    expect(destination.rows).toEqual([{ id: 1, qty: 3 }]);
  });
});
