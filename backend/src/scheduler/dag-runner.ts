import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type {
  LogLevel,
  RunHistoryRepository,
  RunRecord,
  RunTrigger,
} from '../repositories/run-history.js';
import { RunExchange, type DagDefinition, type TaskContext, type TaskDefinition } from './dag.js';

export type RunnerOptions = {
  /** Extra attempts after a task fails. */
  retries: number;
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

export type RunOutcome = {
  status: 'success' | 'failed';
  summary: Record<string, unknown>;
  error: string | null;
};

type TaskOutcome = { ok: true } | { ok: false; error: unknown };

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class DagRunner {
  readonly dag: DagDefinition;
  private readonly history: RunHistoryRepository;
  private readonly logger: Logger;
  private readonly options: RunnerOptions;

  constructor(dag: DagDefinition, history: RunHistoryRepository, logger: Logger, options: RunnerOptions) {
    const ids = new Set(dag.tasks.map((task) => task.id));
    if (!dag.tasks.length || ids.size !== dag.tasks.length) {
      throw new Error(`dag ${dag.id} needs at least one task and unique task ids`);
    }
    this.dag = dag;
    this.history = history;
    this.logger = logger;
    this.options = options;
  }

  get taskIds(): string[] {
    return this.dag.tasks.map((task) => task.id);
  }

  async createRun(trigger: RunTrigger): Promise<RunRecord> {
    return this.history.createRun(this.dag.id, trigger, this.taskIds);
  }

  async execute(runId: string): Promise<RunOutcome> {
    const runLogger = this.logger.child({ runId, dagId: this.dag.id });
    const exchange = new RunExchange();
    const summary: Record<string, unknown> = {};

    await this.history.updateRun(runId, 'running', { startedAt: new Date(), finishedAt: null, error: null });
    await this.log(runLogger, runId, 'info', `Run of ${this.dag.id} started`);

    for (const [index, task] of this.dag.tasks.entries()) {
      const outcome = await this.runTask(runLogger, runId, task, exchange, summary);
      if (!outcome.ok) {
        for (const skipped of this.dag.tasks.slice(index + 1)) {
          await this.history.updateTaskRun(runId, skipped.id, { status: 'upstream_failed' });
        }
        const message = `${task.id} failed: ${errorMessage(outcome.error)}`;
        await this.history.updateRun(runId, 'failed', { finishedAt: new Date(), summary, error: message });
        await this.log(runLogger, runId, 'error', `Run failed at ${task.id}`);
        return { status: 'failed', summary, error: message };
      }
    }

    await this.history.updateRun(runId, 'success', { finishedAt: new Date(), summary, error: null });
    await this.log(runLogger, runId, 'info', `Run of ${this.dag.id} completed successfully`);
    return { status: 'success', summary, error: null };
  }

  private async runTask(
    runLogger: Logger,
    runId: string,
    task: TaskDefinition,
    exchange: RunExchange,
    summary: Record<string, unknown>
  ): Promise<TaskOutcome> {
    const maxAttempts = this.options.retries + 1;
    const sleep = this.options.sleep ?? delay;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const taskLogger = runLogger.child({ taskId: task.id, attempt });
      const context: TaskContext = {
        runId,
        taskId: task.id,
        attempt,
        logger: taskLogger,
        log: (level, message) => this.log(taskLogger, runId, level, message, task.id),
        push: (key, value) => {
          if (key.taskId !== task.id) {
            throw new Error(`task ${task.id} cannot push values owned by ${key.taskId}`);
          }
          exchange.push(key, value);
        },
        pull: (key) => exchange.pull(key),
        summarize: (value) => {
          summary[task.id] = value;
        },
      };

      await this.history.updateTaskRun(runId, task.id, {
        status: 'running',
        attempts: attempt,
        startedAt: new Date(),
        finishedAt: null,
        errorKind: null,
        errorMessage: null,
      });
      await context.log('info', `Task ${task.id} started (attempt ${attempt} of ${maxAttempts})`);

      try {
        await task.run(context);
      } catch (error) {
        const message = errorMessage(error);
        const errorKind = error instanceof Error ? error.name : 'Error';
        taskLogger.error({ err: error }, 'task failed');
        await context.log('error', `${errorKind}: ${message}`);

        if (attempt < maxAttempts) {
          await this.history.updateTaskRun(runId, task.id, {
            status: 'up_for_retry',
            finishedAt: new Date(),
            errorKind,
            errorMessage: message,
          });
          await context.log('warn', `Retrying ${task.id} in ${this.options.retryDelayMs} ms`);
          await sleep(this.options.retryDelayMs);
          continue;
        }

        await this.history.updateTaskRun(runId, task.id, {
          status: 'failed',
          finishedAt: new Date(),
          errorKind,
          errorMessage: message,
        });
        return { ok: false, error };
      }

      await this.history.updateTaskRun(runId, task.id, { status: 'success', finishedAt: new Date() });
      await context.log('info', `Task ${task.id} succeeded`);
      return { ok: true };
    }

    return { ok: false, error: new Error(`task ${task.id} was not attempted`) };
  }

  private async log(target: Logger, runId: string, level: LogLevel, message: string, taskId?: string): Promise<void> {
    target[level](message);
    await this.history.appendLog(runId, level, message, taskId);
  }
}
