import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { RunHistoryRepository, RunRecord, RunTrigger } from '../repositories/run-history.js';
import type { DagRunner } from './dag-runner.js';

/**
 * Queues triggered runs and executes them one at a time, so two runs never
 * touch the staging and destination tables at once within this process.
 */
export class RunQueue {
  private readonly pending: string[] = [];
  private processing = false;
  private current: Promise<void> = Promise.resolve();
  private readonly runner: DagRunner;
  private readonly history: RunHistoryRepository;
  private readonly logger: Logger;

  constructor(runner: DagRunner, history: RunHistoryRepository, logger: Logger) {
    this.runner = runner;
    this.history = history;
    this.logger = logger;
  }

  async trigger(trigger: RunTrigger): Promise<RunRecord> {
    const run = await this.runner.createRun(trigger);
    this.logger.info({ runId: run.id, trigger }, 'run queued');
    this.enqueue(run.id);
    return run;
  }

  enqueue(runId: string): void {
    this.pending.push(runId);
    if (!this.processing) {
      this.current = this.process();
    }
  }

  /** Re-queues runs a previous process left queued or running. */
  async initialize(): Promise<number> {
    const runIds = await this.history.requeueInterrupted();
    for (const runId of runIds) {
      this.enqueue(runId);
    }
    if (runIds.length) {
      this.logger.info({ count: runIds.length }, 'resumed queued runs');
    }
    return runIds.length;
  }

  get size(): number {
    return this.pending.length;
  }

  whenIdle(): Promise<void> {
    return this.current;
  }

  private async process(): Promise<void> {
    this.processing = true;
    try {
      while (this.pending.length) {
        const runId = this.pending.shift();
        if (!runId) continue;
        try {
          await this.runner.execute(runId);
        } catch (error) {
          this.logger.error({ err: error, runId }, 'run aborted while recording history');
          await this.history
            .updateRun(runId, 'failed', { finishedAt: new Date(), error: errorMessage(error) })
            .catch((updateError: unknown) => {
              this.logger.error({ err: updateError, runId }, 'could not mark run as failed');
            });
        }
      }
    } finally {
      this.processing = false;
    }
  }
}
