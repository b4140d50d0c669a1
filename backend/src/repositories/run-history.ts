import type { Database } from '../db.js';

export type RunStatus = 'queued' | 'running' | 'success' | 'failed';
export type TaskStatus = 'pending' | 'running' | 'up_for_retry' | 'success' | 'failed' | 'upstream_failed';
export type RunTrigger = 'manual' | 'schedule' | 'cli';
export type LogLevel = 'info' | 'warn' | 'error';

export type RunRecord = {
  id: string;
  dagId: string;
  trigger: RunTrigger;
  status: RunStatus;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  summary: unknown;
  error: string | null;
};

export type TaskRunRecord = {
  taskId: string;
  status: TaskStatus;
  attempts: number;
  startedAt: Date | null;
  finishedAt: Date | null;
  errorKind: string | null;
  errorMessage: string | null;
};

export type RunLogRecord = {
  level: LogLevel;
  taskId: string | null;
  message: string;
  createdAt: Date;
};

export type RunDetails = RunRecord & {
  tasks: TaskRunRecord[];
  logs: RunLogRecord[];
};

export type RunUpdate = {
  startedAt?: Date | null;
  finishedAt?: Date | null;
  summary?: unknown;
  error?: string | null;
};

export type TaskRunUpdate = {
  status: TaskStatus;
  attempts?: number;
  startedAt?: Date | null;
  finishedAt?: Date | null;
  errorKind?: string | null;
  errorMessage?: string | null;
};

/**
 * Run history: one run per trigger, one task run per task, and the log
 * lines written while the run executes.
 */
export interface RunHistoryRepository {
  ensureSchema(): Promise<void>;
  createRun(dagId: string, trigger: RunTrigger, taskIds: string[]): Promise<RunRecord>;
  updateRun(runId: string, status: RunStatus, update?: RunUpdate): Promise<void>;
  updateTaskRun(runId: string, taskId: string, update: TaskRunUpdate): Promise<void>;
  appendLog(runId: string, level: LogLevel, message: string, taskId?: string): Promise<void>;
  getRun(runId: string): Promise<RunDetails | null>;
  listRuns(limit: number): Promise<RunRecord[]>;
  /** Puts runs interrupted while `running` back in the queue; returns every queued run id, oldest first. */
  requeueInterrupted(): Promise<string[]>;
}

type RunRow = {
  id: string;
  dag_id: string;
  trigger: RunTrigger;
  status: RunStatus;
  created_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
  summary: unknown;
  error_message: string | null;
};

type TaskRunRow = {
  task_id: string;
  status: TaskStatus;
  attempts: number;
  started_at: Date | null;
  finished_at: Date | null;
  error_kind: string | null;
  error_message: string | null;
};

type LogRow = {
  level: LogLevel;
  task_id: string | null;
  message: string;
  created_at: Date;
};

const RUN_COLUMNS = 'id, dag_id, trigger, status, created_at, started_at, finished_at, summary, error_message';

function mapRun(row: RunRow): RunRecord {
  return {
    id: row.id,
    dagId: row.dag_id,
    trigger: row.trigger,
    status: row.status,
    createdAt: row.created_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    summary: row.summary,
    error: row.error_message,
  };
}

function collectSets(fields: Record<string, unknown>, values: unknown[]): string[] {
  const sets: string[] = [];
  for (const [column, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${values.length}`);
  }
  return sets;
}

export class PgRunHistoryRepository implements RunHistoryRepository {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async ensureSchema(): Promise<void> {
    await this.db.query(`create extension if not exists pgcrypto`);
    await this.db.query(`
      create table if not exists etl_run (
        id uuid primary key default gen_random_uuid(),
        dag_id text not null,
        trigger text not null,
        status text not null default 'queued',
        created_at timestamptz not null default now(),
        started_at timestamptz,
        finished_at timestamptz,
        summary jsonb,
        error_message text
      )
    `);
    await this.db.query(`
      create table if not exists etl_task_run (
        run_id uuid not null references etl_run(id) on delete cascade,
        task_id text not null,
        position integer not null,
        status text not null default 'pending',
        attempts integer not null default 0,
        started_at timestamptz,
        finished_at timestamptz,
        error_kind text,
        error_message text,
        primary key (run_id, task_id)
      )
    `);
    await this.db.query(`
      create table if not exists etl_run_log (
        id bigserial primary key,
        run_id uuid not null references etl_run(id) on delete cascade,
        task_id text,
        level text not null default 'info',
        message text not null,
        created_at timestamptz not null default now()
      )
    `);
    await this.db.query(`create index if not exists idx_etl_run_status on etl_run(status, created_at)`);
    await this.db.query(`create index if not exists idx_etl_run_log_run on etl_run_log(run_id, id)`);
  }

  async createRun(dagId: string, trigger: RunTrigger, taskIds: string[]): Promise<RunRecord> {
    return this.db.withTransaction(async (client) => {
      const { rows } = await this.db.query<RunRow>(
        `insert into etl_run (dag_id, trigger, status) values ($1, $2, 'queued') returning ${RUN_COLUMNS}`,
        [dagId, trigger],
        client
      );
      const run = mapRun(rows[0]);
      for (const [position, taskId] of taskIds.entries()) {
        await this.db.query(
          `insert into etl_task_run (run_id, task_id, position) values ($1, $2, $3)`,
          [run.id, taskId, position],
          client
        );
      }
      return run;
    });
  }

  async updateRun(runId: string, status: RunStatus, update: RunUpdate = {}): Promise<void> {
    const values: unknown[] = [runId, status];
    const sets = [
      'status = $2',
      ...collectSets(
        {
          started_at: update.startedAt,
          finished_at: update.finishedAt,
          summary: update.summary === undefined ? undefined : JSON.stringify(update.summary),
          error_message: update.error,
        },
        values
      ),
    ];
    await this.db.query(`update etl_run set ${sets.join(', ')} where id = $1`, values);
  }

  async updateTaskRun(runId: string, taskId: string, update: TaskRunUpdate): Promise<void> {
    const values: unknown[] = [runId, taskId];
    const sets = collectSets(
      {
        status: update.status,
        attempts: update.attempts,
        started_at: update.startedAt,
        finished_at: update.finishedAt,
        error_kind: update.errorKind,
        error_message: update.errorMessage,
      },
      values
    );
    await this.db.query(`update etl_task_run set ${sets.join(', ')} where run_id = $1 and task_id = $2`, values);
  }

  async appendLog(runId: string, level: LogLevel, message: string, taskId?: string): Promise<void> {
    await this.db.query(`insert into etl_run_log (run_id, task_id, level, message) values ($1, $2, $3, $4)`, [
      runId,
      taskId ?? null,
      level,
      message,
    ]);
  }

  async getRun(runId: string): Promise<RunDetails | null> {
    const { rows } = await this.db.query<RunRow>(`select ${RUN_COLUMNS} from etl_run where id = $1`, [runId]);
    const record = rows[0];
    if (!record) return null;

    const tasks = await this.db.query<TaskRunRow>(
      `select task_id, status, attempts, started_at, finished_at, error_kind, error_message
       from etl_task_run where run_id = $1 order by position`,
      [runId]
    );
    const logs = await this.db.query<LogRow>(
      `select level, task_id, message, created_at from etl_run_log where run_id = $1 order by id`,
      [runId]
    );

    return {
      ...mapRun(record),
      tasks: tasks.rows.map((task) => ({
        taskId: task.task_id,
        status: task.status,
        attempts: task.attempts,
        startedAt: task.started_at,
        finishedAt: task.finished_at,
        errorKind: task.error_kind,
        errorMessage: task.error_message,
      })),
      logs: logs.rows.map((log) => ({
        level: log.level,
        taskId: log.task_id,
        message: log.message,
        createdAt: log.created_at,
      })),
    };
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const { rows } = await this.db.query<RunRow>(
      `select ${RUN_COLUMNS} from etl_run order by created_at desc limit $1`,
      [limit]
    );
    return rows.map(mapRun);
  }

  async requeueInterrupted(): Promise<string[]> {
    await this.db.query(`update etl_run set status = 'queued', started_at = null where status = 'running'`);
    await this.db.query(
      `update etl_task_run set status = 'pending', attempts = 0, started_at = null, finished_at = null,
         error_kind = null, error_message = null
       where run_id in (select id from etl_run where status = 'queued')`
    );
    const { rows } = await this.db.query<{ id: string }>(
      `select id from etl_run where status = 'queued' order by created_at`
    );
    return rows.map((row) => row.id);
  }
}
