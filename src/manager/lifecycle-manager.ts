import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { AcquireTimeoutError, ValidationError, errorMessage } from "../errors.js";
import { OsProcessControl, type ProcessControl } from "../executors/process-control.js";
import type { ExecutionRequest, ExecutionUnit, TaskExecutor } from "../executors/types.js";
import type { DelegationEnforcer } from "../graph/enforcer.js";
import { isTerminal, type TerminalStatus } from "../graph/types.js";
import type { Permit, ResourceGovernor } from "../governor/resource-governor.js";
import { OutputLog } from "../persistence/output-log.js";
import type { ListFilter, TaskPatch, TaskStore } from "../persistence/store.js";
import {
  RetryOverridesSchema,
  SpawnRequestSchema,
  parseOrThrow,
  type RetryOverrides,
  type SpawnRequestInput,
  type TaskRecord,
} from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { settlesWithin, sleep } from "../utils/time.js";
import { formatOutput, formatProgress } from "./format.js";

const log = createLogger("manager");

export const ZOMBIE_ERROR = "Backing process terminated unexpectedly (zombie detected)";

export type LifecycleManagerOptions = {
  store: TaskStore;
  executor: TaskExecutor;
  governor?: ResourceGovernor;
  enforcer?: DelegationEnforcer;
  outputLog?: OutputLog;
  processControl?: ProcessControl;
  /** Interval between status polls while blocking (default from config). */
  pollIntervalMs?: number;
  /** Time a cancelled run gets to stop on its own before it is killed. */
  cancelGraceMs?: number;
  /** How long a spawn waits for a resource permit. */
  acquireTimeoutMs?: number;
  /** Execution timeout for spawns that set none. */
  defaultTimeoutMs?: number;
  /** Default wait for blocking output reads. */
  blockTimeoutMs?: number;
  progressLines?: number;
};

export type TaskSnapshot = Pick<TaskRecord, "runId" | "taskId" | "status" | "result" | "error" | "startedAt" | "completedAt">;

export type OutputOptions = {
  block?: boolean;
  timeoutMs?: number;
};

type RunSpec = {
  taskId?: string;
  description: string;
  resourceClass: string;
  dependsOn: string[];
  timeoutMs: number;
  params: Record<string, unknown>;
  retryOf?: string;
};

type GraphBinding = {
  enforcer: DelegationEnforcer;
  taskId: string;
  requestedAt: number;
};

type LiveRun = {
  unit: ExecutionUnit;
  permit?: Permit;
  timer?: NodeJS.Timeout;
  /** Set once cancellation or timeout has taken over the run's final state. */
  stopping: boolean;
};

type Outcome = { status: "completed"; result: string } | { status: "failed"; error: string };

function newRunId(): string {
  return `run_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

function toRequest(record: TaskRecord): ExecutionRequest {
  return {
    runId: record.runId,
    taskId: record.taskId,
    description: record.description,
    resourceClass: record.resourceClass,
    params: record.params,
  };
}

/**
 * Owns the persisted task registry and every run started through it.
 *
 * Runs are started through an injected executor; the manager only tracks
 * them. Whatever happens inside a run ends up in that run's record: nothing
 * an executor throws reaches the caller of `spawn`. The resource permit taken
 * at spawn time is released exactly once, when the run turns terminal.
 *
 * Zombie detection is lazy: a `running` record whose backing process is gone
 * is reclassified as `failed` whenever it is read.
 */
export class TaskLifecycleManager {
  readonly store: TaskStore;
  private executor: TaskExecutor;
  private governor?: ResourceGovernor;
  private enforcer?: DelegationEnforcer;
  private outputLog: OutputLog;
  private processControl: ProcessControl;
  private pollIntervalMs: number;
  private cancelGraceMs: number;
  private acquireTimeoutMs: number;
  private defaultTimeoutMs: number;
  private blockTimeoutMs: number;
  private progressLines: number;
  private live = new Map<string, LiveRun>();

  constructor(opts: LifecycleManagerOptions) {
    const config = getConfig();
    this.store = opts.store;
    this.executor = opts.executor;
    this.governor = opts.governor;
    this.enforcer = opts.enforcer;
    this.outputLog = opts.outputLog ?? new OutputLog();
    this.processControl = opts.processControl ?? new OsProcessControl();
    this.pollIntervalMs = opts.pollIntervalMs ?? config.manager.pollIntervalMs;
    this.cancelGraceMs = opts.cancelGraceMs ?? config.manager.cancelGraceMs;
    this.acquireTimeoutMs = opts.acquireTimeoutMs ?? config.governor.acquireTimeoutMs;
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? config.manager.defaultTimeoutMs;
    this.blockTimeoutMs = opts.blockTimeoutMs ?? config.manager.blockTimeoutMs;
    this.progressLines = opts.progressLines ?? config.manager.progressLines;
  }

  /** Bind a graph: spawns carrying a `taskId` are validated against it from now on. */
  setEnforcer(enforcer: DelegationEnforcer): void {
    this.enforcer = enforcer;
  }

  clearEnforcer(): void {
    this.enforcer = undefined;
  }

  getEnforcer(): DelegationEnforcer | undefined {
    return this.enforcer;
  }

  /**
   * Start a run. Rejections (graph validation, permit timeout) happen before
   * any record exists. Returns the new run id.
   */
  async spawn(input: SpawnRequestInput): Promise<string> {
    const request = parseOrThrow(SpawnRequestSchema, input, "spawn request");
    const enforcer = this.enforcer;
    const taskId = request.taskId;

    if (!enforcer || taskId === undefined) {
      return this.start({
        taskId,
        description: request.description,
        resourceClass: request.resourceClass ?? "_default",
        dependsOn: request.dependsOn,
        timeoutMs: request.timeoutMs ?? this.defaultTimeoutMs,
        params: request.params,
      });
    }

    const requestedAt = Date.now();
    enforcer.reserveSpawn(taskId, requestedAt);
    const node = enforcer.graph.get(taskId);

    try {
      return await this.start(
        {
          taskId,
          description: request.description,
          resourceClass: request.resourceClass ?? node?.resourceClass ?? "_default",
          dependsOn: node?.dependsOn ?? request.dependsOn,
          timeoutMs: request.timeoutMs ?? this.defaultTimeoutMs,
          params: request.params,
        },
        { enforcer, taskId, requestedAt },
      );
    } catch (err) {
      enforcer.releaseSpawn(taskId);
      throw err;
    }
  }

  private async start(spec: RunSpec, binding?: GraphBinding): Promise<string> {
    const permit = await this.acquire(spec.resourceClass);

    const runId = newRunId();
    const now = Date.now();
    const record: TaskRecord = {
      ...spec,
      runId,
      status: "running",
      executor: this.executor.name,
      // Provisional handle: this process. Replaced once the executor reports its own.
      handle: `local:${process.pid}:${runId}`,
      createdAt: now,
      startedAt: now,
    };

    try {
      this.store.insert(record);
    } catch (err) {
      permit?.release();
      throw err;
    }

    if (binding) {
      binding.enforcer.recordSpawn(binding.taskId, runId, binding.requestedAt);
      binding.enforcer.recordRunning(binding.taskId);
    }
    log.info(`Spawned ${runId}`, {
      taskId: spec.taskId,
      resourceClass: spec.resourceClass,
      retryOf: spec.retryOf,
    });

    this.launch(record, permit);
    return runId;
  }

  private async acquire(resourceClass: string): Promise<Permit | undefined> {
    if (!this.governor) return undefined;
    const permit = await this.governor.acquirePermit(resourceClass, this.acquireTimeoutMs);
    if (!permit) {
      throw new AcquireTimeoutError(resourceClass, this.governor.normalize(resourceClass), this.acquireTimeoutMs);
    }
    return permit;
  }

  private launch(record: TaskRecord, permit: Permit | undefined): void {
    const { runId } = record;
    let unit: ExecutionUnit;
    try {
      unit = this.executor.execute(toRequest(record), this.outputLog.sink(runId));
    } catch (err) {
      this.finish(runId, "failed", { error: errorMessage(err) }, permit);
      return;
    }

    const run: LiveRun = { unit, permit, stopping: false };
    this.live.set(runId, run);
    this.store.patch(runId, { handle: unit.handle });

    unit.done
      .then(
        (result) => this.settle(runId, { status: "completed", result }),
        (err: unknown) => this.settle(runId, { status: "failed", error: errorMessage(err) }),
      )
      .catch((err: unknown) => {
        log.error(`Could not settle ${runId}`, { error: errorMessage(err) });
      });

    run.timer = setTimeout(() => {
      this.expire(runId, record.timeoutMs).catch((err: unknown) => {
        log.error(`Timeout handling failed for ${runId}`, { error: errorMessage(err) });
      });
    }, record.timeoutMs);
  }

  private settle(runId: string, outcome: Outcome): void {
    const run = this.live.get(runId);
    if (!run || run.stopping) return;
    if (outcome.status === "completed") {
      this.finish(runId, "completed", { result: outcome.result });
    } else {
      this.finish(runId, "failed", { error: outcome.error });
    }
  }

  /** Record a terminal state, drop the live run and release its permit. */
  private finish(runId: string, status: TerminalStatus, patch: TaskPatch, permit?: Permit): TaskRecord | undefined {
    const run = this.live.get(runId);
    if (run) {
      clearTimeout(run.timer);
      this.live.delete(runId);
    }

    let updated: TaskRecord | undefined;
    try {
      updated = this.store.transition(runId, status, patch);
    } catch (err) {
      log.error(`Could not record ${status} for ${runId}`, { error: errorMessage(err) });
    } finally {
      (run?.permit ?? permit)?.release();
    }

    if (!updated) return this.adoptStoredOutcome(runId);
    if (status === "completed") {
      log.info(`Run ${runId} completed`);
    } else {
      log.warn(`Run ${runId} ${status}`, { error: updated.error });
    }
    this.notifyEnforcer(updated);
    return updated;
  }

  /**
   * The registry refused our transition, usually because another process
   * already recorded a terminal state (`taskwave cancel`). That state wins and
   * is what the graph hears about.
   */
  private adoptStoredOutcome(runId: string): TaskRecord | undefined {
    const stored = this.store.get(runId);
    if (!stored || !isTerminal(stored.status)) return undefined;
    log.info(`Run ${runId} was already ${stored.status} in the registry`);
    this.notifyEnforcer(stored);
    return stored;
  }

  private async expire(runId: string, timeoutMs: number): Promise<void> {
    const run = this.live.get(runId);
    if (!run || run.stopping) return;
    run.stopping = true;
    log.warn(`Run ${runId} exceeded its ${timeoutMs}ms timeout`);
    await this.stop(runId, run);
    this.finish(runId, "failed", { error: `Task timed out after ${timeoutMs}ms` });
  }

  /** Two phases: ask the unit to stop, then kill it once the grace period runs out. */
  private async stop(runId: string, run: LiveRun): Promise<void> {
    run.unit.terminate();
    if (await settlesWithin(run.unit.done, this.cancelGraceMs)) return;
    log.warn(`Run ${runId} ignored termination for ${this.cancelGraceMs}ms; killing`);
    run.unit.kill();
  }

  private notifyEnforcer(record: TaskRecord): void {
    const enforcer = this.enforcer;
    const status = record.status;
    if (!enforcer || record.taskId === undefined || record.retryOf !== undefined || !isTerminal(status)) return;
    if (enforcer.graph.get(record.taskId)?.runId !== record.runId) return;
    try {
      enforcer.markTaskTerminal(record.taskId, status);
    } catch (err) {
      log.error(`Wave bookkeeping failed after "${record.taskId}"`, { error: errorMessage(err) });
    }
  }

  /** Reclassify a `running` record whose backing process is gone. */
  private reconcile(record: TaskRecord): TaskRecord {
    if (record.status !== "running" || this.live.has(record.runId)) return record;
    if (record.handle !== undefined && this.processControl.isAlive(record.handle)) return record;

    const updated = this.store.transition(record.runId, "failed", { error: ZOMBIE_ERROR });
    if (!updated) return this.adoptStoredOutcome(record.runId) ?? this.store.get(record.runId) ?? record;
    log.warn(`Zombie run detected: ${record.runId}`, { handle: record.handle });
    this.notifyEnforcer(updated);
    return updated;
  }

  /** Current record, after the liveness check. */
  getTask(runId: string): TaskRecord | undefined {
    const record = this.store.get(runId);
    return record ? this.reconcile(record) : undefined;
  }

  getStatus(runId: string): TaskSnapshot | undefined {
    const record = this.getTask(runId);
    if (!record) return undefined;
    return {
      runId: record.runId,
      taskId: record.taskId,
      status: record.status,
      result: record.result,
      error: record.error,
      startedAt: record.startedAt,
      completedAt: record.completedAt,
    };
  }

  listTasks(filter: ListFilter = {}): TaskRecord[] {
    return this.store.list(filter).map((r) => this.reconcile(r));
  }

  /** Poll until the run is terminal or `timeoutMs` passes; returns the last record seen. */
  async waitFor(runId: string, timeoutMs: number = this.blockTimeoutMs): Promise<TaskRecord | undefined> {
    const deadline = Date.now() + timeoutMs;
    let record = this.getTask(runId);
    while (record && !isTerminal(record.status) && Date.now() < deadline) {
      await sleep(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())));
      record = this.getTask(runId);
    }
    return record;
  }

  /** Formatted status; with `block`, waits for a terminal state first. */
  async getOutput(runId: string, opts: OutputOptions = {}): Promise<string> {
    const record = opts.block ? await this.waitFor(runId, opts.timeoutMs ?? this.blockTimeoutMs) : this.getTask(runId);
    if (!record) return `Task ${runId} not found.`;
    return formatOutput(record);
  }

  /** Status plus the last `lines` lines the executor wrote. */
  getProgress(runId: string, lines: number = this.progressLines): string {
    const record = this.getTask(runId);
    if (!record) return `Task ${runId} not found.`;
    return formatProgress(record, this.outputLog.tail(runId, lines), lines);
  }

  /**
   * Cancel a running run: terminate, wait out the grace period, kill.
   * False when the run is unknown, not running, or already being stopped.
   */
  async cancel(runId: string): Promise<boolean> {
    const record = this.getTask(runId);
    if (!record || record.status !== "running") return false;

    const run = this.live.get(runId);
    if (!run) return this.cancelDetached(record);
    if (run.stopping) return false;

    run.stopping = true;
    log.info(`Cancelling ${runId}`);
    await this.stop(runId, run);
    return this.finish(runId, "cancelled", {})?.status === "cancelled";
  }

  /** Cancel a run started by another process, through its handle. */
  private async cancelDetached(record: TaskRecord): Promise<boolean> {
    const handle = record.handle;
    if (handle !== undefined && this.processControl.terminate(handle)) {
      const deadline = Date.now() + this.cancelGraceMs;
      while (this.processControl.isAlive(handle) && Date.now() < deadline) {
        await sleep(Math.min(100, this.pollIntervalMs));
      }
      if (this.processControl.isAlive(handle)) {
        log.warn(`Run ${record.runId} ignored termination; killing`, { handle });
        this.processControl.kill(handle);
      }
    } else {
      log.warn(`Run ${record.runId} is owned by another process and cannot be signalled`, { handle });
    }

    const updated = this.store.transition(record.runId, "cancelled");
    if (!updated) return false;
    this.notifyEnforcer(updated);
    return true;
  }

  /**
   * Start a new run from a failed or cancelled one. The source record stays
   * as it is. Retries are not bound to the graph's wave bookkeeping.
   */
  async retry(runId: string, overrides: RetryOverrides = {}): Promise<string> {
    const source = this.getTask(runId);
    if (!source) {
      throw new ValidationError("UNKNOWN_RUN", `Task ${runId} not found`);
    }
    if (source.status !== "failed" && source.status !== "cancelled") {
      throw new ValidationError(
        "INVALID_RETRY",
        `Only failed or cancelled tasks can be retried; ${runId} is ${source.status}`,
      );
    }
    const o = parseOrThrow(RetryOverridesSchema, overrides, "retry overrides");

    return this.start({
      taskId: source.taskId,
      description: o.description ?? source.description,
      resourceClass: o.resourceClass ?? source.resourceClass,
      dependsOn: source.dependsOn,
      timeoutMs: o.timeoutMs ?? source.timeoutMs,
      params: o.params ? { ...source.params, ...o.params } : source.params,
      retryOf: source.runId,
    });
  }

  /**
   * Cancel every running run. With `clearHistory`, purge terminal records and
   * their output and return how many were purged; otherwise how many stopped.
   */
  async stopAll(clearHistory = false): Promise<number> {
    const running = this.listTasks({ status: "running" });
    const results = await Promise.all(running.map((r) => this.cancel(r.runId)));
    const stopped = results.filter(Boolean).length;
    if (stopped > 0) log.info(`Stopped ${stopped} run(s)`);

    if (!clearHistory) return stopped;

    const cleared = this.store.deleteTerminal();
    for (const id of cleared) this.outputLog.remove(id);
    log.info(`Cleared ${cleared.length} task record(s)`);
    return cleared.length;
  }

  /** Reclassify every `running` record left behind by a crashed process. */
  recover(): TaskRecord[] {
    return this.store
      .list({ status: "running" })
      .map((r) => this.reconcile(r))
      .filter((r) => r.status === "failed" && r.error === ZOMBIE_ERROR);
  }

  /** Run ids this manager is currently executing. */
  liveRuns(): string[] {
    return [...this.live.keys()];
  }

  /** Cancel everything this process started. */
  async shutdown(): Promise<void> {
    await Promise.all(this.liveRuns().map((id) => this.cancel(id)));
  }
}
