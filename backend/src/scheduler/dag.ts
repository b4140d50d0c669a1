import type { z } from 'zod';
import type { Logger } from '../logger.js';
import type { LogLevel } from '../repositories/run-history.js';

/** Typed handle on a value one task hands to the tasks after it. */
export type ExchangeKey<T> = {
  taskId: string;
  name: string;
  schema: z.ZodType<T>;
};

export function exchangeKey<T>(taskId: string, name: string, schema: z.ZodType<T>): ExchangeKey<T> {
  return { taskId, name, schema };
}

/**
 * Run-scoped key/value store between tasks. Values live only as long as the
 * run; the tables are the only hand-off that outlives it.
 */
export class RunExchange {
  private readonly values = new Map<string, unknown>();

  push<T>(key: ExchangeKey<T>, value: T): void {
    this.values.set(`${key.taskId}/${key.name}`, value);
  }

  pull<T>(key: ExchangeKey<T>): T {
    const id = `${key.taskId}/${key.name}`;
    if (!this.values.has(id)) {
      throw new Error(`no value "${key.name}" was pushed by task ${key.taskId}`);
    }
    return key.schema.parse(this.values.get(id));
  }
}

export type TaskContext = {
  runId: string;
  taskId: string;
  attempt: number;
  logger: Logger;
  /** Writes to the process log and to the run history. */
  log(level: LogLevel, message: string): Promise<void>;
  push<T>(key: ExchangeKey<T>, value: T): void;
  pull<T>(key: ExchangeKey<T>): T;
  /** Records the task's figures under its id in the run summary. */
  summarize(value: unknown): void;
};

export type TaskDefinition = {
  id: string;
  run(context: TaskContext): Promise<void>;
};

/** Tasks run in array order; each depends on the one before it. */
export type DagDefinition = {
  id: string;
  tasks: TaskDefinition[];
};
