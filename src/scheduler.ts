import { errorMessage } from "./errors.js";
import type { ProcessControl } from "./executors/process-control.js";
import type { TaskExecutor } from "./executors/types.js";
import { DelegationEnforcer, type EnforcementStatus } from "./graph/enforcer.js";
import { TaskGraph } from "./graph/task-graph.js";
import type { TaskDeclaration, TaskNode, TaskStatus } from "./graph/types.js";
import { ResourceGovernor, type BucketStatus } from "./governor/resource-governor.js";
import { TaskLifecycleManager, type LifecycleManagerOptions } from "./manager/lifecycle-manager.js";
import type { OutputLog } from "./persistence/output-log.js";
import { TaskStore } from "./persistence/store.js";
import type { TaskRecord } from "./schemas.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("scheduler");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A graph node plus what its executor needs to run it. */
export type ScheduledTask = TaskDeclaration & {
  id: string;
  params?: Record<string, unknown>;
  timeoutMs?: number;
};

export type RunCallbacks = {
  onWaveStart?: (wave: number, taskIds: string[]) => void;
  onTaskSpawned?: (taskId: string, runId: string) => void;
  onSpawnFailed?: (taskId: string, error: string) => void;
  onTaskEnd?: (taskId: string, record: TaskRecord) => void;
  onWaveEnd?: (wave: number) => void;
};

export type RunSummary = {
  /** Final graph status per task id. */
  tasks: Record<string, TaskStatus>;
  /** Run id per task id, for tasks that were spawned. */
  runs: Record<string, string>;
  waves: number;
  startedAt: number;
  finishedAt: number;
};

export type SchedulerStatus = {
  enforcement?: EnforcementStatus;
  buckets: Record<string, BucketStatus>;
  running: number;
};

export type SchedulerOptions = {
  executor: TaskExecutor;
  store?: TaskStore;
  governor?: ResourceGovernor;
  outputLog?: OutputLog;
  processControl?: ProcessControl;
  parallelWindowMs?: number;
  strict?: boolean;
  manager?: Omit<
    LifecycleManagerOptions,
    "store" | "executor" | "governor" | "enforcer" | "outputLog" | "processControl"
  >;
};

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

/**
 * Wires graph, enforcer, governor and lifecycle manager together and drives a
 * declared graph to completion one wave at a time.
 */
export class Scheduler {
  readonly store: TaskStore;
  readonly governor: ResourceGovernor;
  readonly manager: TaskLifecycleManager;
  private parallelWindowMs?: number;
  private strict?: boolean;
  private enforcer?: DelegationEnforcer;
  private tasks = new Map<string, ScheduledTask>();
  private stopping = false;

  constructor(opts: SchedulerOptions) {
    this.store = opts.store ?? new TaskStore();
    this.governor = opts.governor ?? new ResourceGovernor();
    this.parallelWindowMs = opts.parallelWindowMs;
    this.strict = opts.strict;
    this.manager = new TaskLifecycleManager({
      ...opts.manager,
      store: this.store,
      executor: opts.executor,
      governor: this.governor,
      outputLog: opts.outputLog,
      processControl: opts.processControl,
    });
  }

  /** Replace the active graph. Throws `GraphError` for a malformed declaration. */
  declare(tasks: ScheduledTask[]): DelegationEnforcer {
    const graph = TaskGraph.fromSpec(tasks);
    const enforcer = new DelegationEnforcer({
      graph,
      parallelWindowMs: this.parallelWindowMs,
      strict: this.strict,
    });
    this.tasks = new Map(tasks.map((t) => [t.id, t]));
    this.enforcer = enforcer;
    this.stopping = false;
    this.manager.setEnforcer(enforcer);
    log.info(`Declared ${graph.size} task(s) in ${enforcer.getWaves().length} wave(s)`);
    return enforcer;
  }

  getEnforcer(): DelegationEnforcer {
    if (!this.enforcer) {
      throw new Error("No task graph declared");
    }
    return this.enforcer;
  }

  /** Spawn one declared task through the manager. */
  spawnTask(taskId: string): Promise<string> {
    const enforcer = this.getEnforcer();
    const decl = this.tasks.get(taskId);
    return this.manager.spawn({
      taskId,
      description: decl?.description ?? enforcer.graph.get(taskId)?.description ?? taskId,
      resourceClass: decl?.resourceClass,
      params: decl?.params,
      timeoutMs: decl?.timeoutMs,
    });
  }

  /**
   * Spawn every spawnable member of the current wave at once. A member whose
   * spawn is rejected is marked failed, which cancels its dependents.
   * Returns task id → run id for the members that started.
   */
  async spawnWave(callbacks?: RunCallbacks): Promise<Map<string, string>> {
    const enforcer = this.getEnforcer();
    const members = enforcer.getCurrentWave().filter((n) => n.status === "pending" || n.status === "ready");

    const outcomes = await Promise.all(
      members.map(async (node): Promise<[string, string | undefined]> => {
        try {
          const runId = await this.spawnTask(node.id);
          callbacks?.onTaskSpawned?.(node.id, runId);
          return [node.id, runId];
        } catch (err) {
          const error = errorMessage(err);
          log.error(`Could not spawn "${node.id}"`, { error });
          callbacks?.onSpawnFailed?.(node.id, error);
          enforcer.markTaskTerminal(node.id, "failed");
          return [node.id, undefined];
        }
      }),
    );

    const runs = new Map<string, string>();
    for (const [id, runId] of outcomes) {
      if (runId !== undefined) runs.set(id, runId);
    }
    return runs;
  }

  /** Drive the declared graph until every wave is done. */
  async runAll(callbacks?: RunCallbacks): Promise<RunSummary> {
    const enforcer = this.getEnforcer();
    const startedAt = Date.now();
    const runs: Record<string, string> = {};

    while (!enforcer.isComplete() && !this.stopping) {
      const index = enforcer.getCurrentWaveIndex();
      const wave = index + 1;
      const members = enforcer.getCurrentWave();
      callbacks?.onWaveStart?.(wave, members.map((n) => n.id));
      log.info(`Wave ${wave}/${enforcer.getWaves().length}: ${members.map((n) => n.id).join(", ")}`);

      const spawned = await this.spawnWave(callbacks);
      for (const [id, runId] of spawned) runs[id] = runId;

      await Promise.all(
        spawnedRuns(members).map(async ([taskId, runId]) => {
          const record = await this.manager.waitFor(runId, Number.POSITIVE_INFINITY);
          if (record) callbacks?.onTaskEnd?.(taskId, record);
        }),
      );
      callbacks?.onWaveEnd?.(wave);

      // Terminal reports normally advance the wave; if bookkeeping failed, advancing here surfaces why.
      if (!this.stopping && !enforcer.isComplete() && enforcer.getCurrentWaveIndex() === index) {
        enforcer.advanceWave();
      }
    }

    const tasks: Record<string, TaskStatus> = {};
    for (const node of enforcer.graph.list()) tasks[node.id] = node.status;
    const summary: RunSummary = {
      tasks,
      runs,
      waves: enforcer.getWaves().length,
      startedAt,
      finishedAt: Date.now(),
    };
    log.info("Graph finished", { durationMs: summary.finishedAt - startedAt });
    return summary;
  }

  getStatus(): SchedulerStatus {
    return {
      enforcement: this.enforcer?.getEnforcementStatus(),
      buckets: this.governor.getStatus(),
      running: this.manager.liveRuns().length,
    };
  }

  /** Stop spawning further waves and cancel what is running. `runAll` then returns. */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.manager.shutdown();
  }

  /** Cancel in-flight runs and close the registry. */
  async shutdown(): Promise<void> {
    await this.manager.shutdown();
    this.store.close();
  }
}

function spawnedRuns(members: TaskNode[]): Array<[string, string]> {
  const spawned: Array<[string, string]> = [];
  for (const node of members) {
    if (node.runId !== undefined) spawned.push([node.id, node.runId]);
  }
  return spawned;
}
