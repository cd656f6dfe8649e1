import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { getConfig } from "../config.js";
import { canTransition, isTerminal, type TaskStatus } from "../graph/types.js";
import { TaskRecordSchema, type TaskRecord } from "../schemas.js";

/** Fields that may change after insert, besides status. */
export type TaskPatch = Partial<Pick<TaskRecord, "result" | "error" | "handle" | "startedAt" | "completedAt">>;

export type ListFilter = {
  status?: TaskStatus | TaskStatus[];
  taskId?: string;
  limit?: number;
};

const TaskRowSchema = z.object({
  run_id: z.string(),
  task_id: z.string().nullable(),
  description: z.string(),
  resource_class: z.string(),
  depends_on: z.string(),
  status: z.string(),
  params: z.string(),
  executor: z.string(),
  result: z.string().nullable(),
  error: z.string().nullable(),
  timeout_ms: z.number(),
  handle: z.string().nullable(),
  retry_of: z.string().nullable(),
  created_at: z.number(),
  started_at: z.number().nullable(),
  completed_at: z.number().nullable(),
});

/**
 * Durable run id → task record registry backed by SQLite.
 *
 * Every mutation is a read-modify-write inside one IMMEDIATE transaction,
 * which takes the database write lock up front: concurrent writers, in this
 * process or another one, are serialized and never lose an update.
 */
export class TaskStore {
  private db: Database.Database;

  constructor(dbPath: string = getConfig().paths.dbPath) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        run_id         TEXT PRIMARY KEY,
        task_id        TEXT,
        description    TEXT NOT NULL,
        resource_class TEXT NOT NULL,
        depends_on     TEXT NOT NULL DEFAULT '[]',
        status         TEXT NOT NULL,
        params         TEXT NOT NULL DEFAULT '{}',
        executor       TEXT NOT NULL,
        result         TEXT,
        error          TEXT,
        timeout_ms     INTEGER NOT NULL,
        handle         TEXT,
        retry_of       TEXT,
        created_at     INTEGER NOT NULL,
        started_at     INTEGER,
        completed_at   INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
      CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at DESC);
    `);
  }

  insert(record: TaskRecord): void {
    this.db.prepare(`
      INSERT INTO tasks (run_id, task_id, description, resource_class, depends_on, status, params, executor,
                         result, error, timeout_ms, handle, retry_of, created_at, started_at, completed_at)
      VALUES (@run_id, @task_id, @description, @resource_class, @depends_on, @status, @params, @executor,
              @result, @error, @timeout_ms, @handle, @retry_of, @created_at, @started_at, @completed_at)
    `).run(recordToRow(record));
  }

  get(runId: string): TaskRecord | undefined {
    const row: unknown = this.db.prepare("SELECT * FROM tasks WHERE run_id = ?").get(runId);
    return row === undefined ? undefined : rowToRecord(row);
  }

  list(filter: ListFilter = {}): TaskRecord[] {
    const clauses: string[] = [];
    const args: Array<string | number> = [];
    if (filter.status !== undefined) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      clauses.push(`status IN (${statuses.map(() => "?").join(", ")})`);
      args.push(...statuses);
    }
    if (filter.taskId !== undefined) {
      clauses.push("task_id = ?");
      args.push(filter.taskId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const limit = filter.limit !== undefined ? `LIMIT ${Math.max(0, Math.floor(filter.limit))}` : "";
    const rows: unknown[] = this.db
      .prepare(`SELECT * FROM tasks ${where} ORDER BY created_at DESC, rowid DESC ${limit}`)
      .all(...args);
    return rows.map(rowToRecord);
  }

  /**
   * Apply `mutate` to the current record inside the critical section.
   * Returning undefined leaves the record untouched.
   */
  update(runId: string, mutate: (current: TaskRecord) => TaskRecord | undefined): TaskRecord | undefined {
    const txn = this.db.transaction((id: string): TaskRecord | undefined => {
      const current = this.get(id);
      if (!current) return undefined;
      const next = mutate(current);
      if (!next) return undefined;
      this.db.prepare(`
        UPDATE tasks SET task_id = @task_id, description = @description, resource_class = @resource_class,
          depends_on = @depends_on, status = @status, params = @params, executor = @executor,
          result = @result, error = @error, timeout_ms = @timeout_ms, handle = @handle, retry_of = @retry_of,
          created_at = @created_at, started_at = @started_at, completed_at = @completed_at
        WHERE run_id = @run_id
      `).run(recordToRow({ ...next, runId: id }));
      return next;
    });
    return txn.immediate(runId);
  }

  /**
   * Move a record to `to` if the state machine allows it. Terminal states get
   * a completion timestamp. Returns undefined when the transition was refused.
   */
  transition(runId: string, to: TaskStatus, patch: TaskPatch = {}): TaskRecord | undefined {
    return this.update(runId, (current) => {
      if (!canTransition(current.status, to)) return undefined;
      const next: TaskRecord = { ...current, ...patch, status: to };
      if (isTerminal(to) && next.completedAt === undefined) next.completedAt = Date.now();
      return next;
    });
  }

  /** Update non-status fields. */
  patch(runId: string, fields: TaskPatch): TaskRecord | undefined {
    return this.update(runId, (current) => ({ ...current, ...fields }));
  }

  /** Delete every terminal record. Returns the deleted run ids. */
  deleteTerminal(): string[] {
    const txn = this.db.transaction((): string[] => {
      const rows: unknown[] = this.db
        .prepare("SELECT run_id FROM tasks WHERE status IN ('completed', 'failed', 'cancelled')")
        .all();
      const ids = rows.map((r) => RunIdRowSchema.parse(r).run_id);
      this.db.prepare("DELETE FROM tasks WHERE status IN ('completed', 'failed', 'cancelled')").run();
      return ids;
    });
    return txn.immediate();
  }

  /** Delete all records. Returns count of deleted records. */
  deleteAll(): number {
    return this.db.prepare("DELETE FROM tasks").run().changes;
  }

  close(): void {
    this.db.close();
  }
}

const RunIdRowSchema = z.object({ run_id: z.string() });

function recordToRow(record: TaskRecord): Record<string, string | number | null> {
  return {
    run_id: record.runId,
    task_id: record.taskId ?? null,
    description: record.description,
    resource_class: record.resourceClass,
    depends_on: JSON.stringify(record.dependsOn),
    status: record.status,
    params: JSON.stringify(record.params),
    executor: record.executor,
    result: record.result ?? null,
    error: record.error ?? null,
    timeout_ms: record.timeoutMs,
    handle: record.handle ?? null,
    retry_of: record.retryOf ?? null,
    created_at: record.createdAt,
    started_at: record.startedAt ?? null,
    completed_at: record.completedAt ?? null,
  };
}

function rowToRecord(raw: unknown): TaskRecord {
  const row = TaskRowSchema.parse(raw);
  return TaskRecordSchema.parse({
    runId: row.run_id,
    taskId: row.task_id ?? undefined,
    description: row.description,
    resourceClass: row.resource_class,
    dependsOn: JSON.parse(row.depends_on),
    status: row.status,
    params: JSON.parse(row.params),
    executor: row.executor,
    result: row.result ?? undefined,
    error: row.error ?? undefined,
    timeoutMs: row.timeout_ms,
    handle: row.handle ?? undefined,
    retryOf: row.retry_of ?? undefined,
    createdAt: row.created_at,
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
  });
}
