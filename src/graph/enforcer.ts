import { getConfig } from "../config.js";
import { ParallelExecutionError, SpawnValidationError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { TaskGraph } from "./task-graph.js";
import { isTerminal, type TaskNode, type TaskStatus, type TerminalStatus } from "./types.js";

const log = createLogger("enforcer");

export type DelegationEnforcerOptions = {
  graph: TaskGraph;
  /** Max spread between the first and last spawn of one wave (default from config). */
  parallelWindowMs?: number;
  /** Strict mode throws on violations; report mode returns them. */
  strict?: boolean;
};

export type CheckResult = { ok: true } | { ok: false; reason: string };

export type EnforcementStatus = {
  /** 1-based index of the active wave; `totalWaves + 1` once exhausted. */
  currentWave: number;
  totalWaves: number;
  currentWaveTasks: string[];
  taskStatuses: Record<string, TaskStatus>;
  strict: boolean;
  parallelWindowMs: number;
  complete: boolean;
};

/**
 * Gatekeeper between a declared TaskGraph and whoever spawns its tasks.
 *
 * Only members of the active wave may be spawned, and only once all their
 * dependencies completed. Members of one wave are expected to be spawned
 * together: spawns spread wider than `parallelWindowMs` are a violation
 * (sequential delegation where parallel was possible).
 *
 * A wave advances once every member is terminal, whatever the terminal
 * state. Members that fail or get cancelled take their not-yet-spawned
 * dependents down with them, so later waves never hold tasks that can no
 * longer be spawned.
 */
export class DelegationEnforcer {
  readonly graph: TaskGraph;
  readonly parallelWindowMs: number;
  readonly strict: boolean;
  private waves: TaskNode[][];
  private waveIndex = 0;
  /** Request time of spawns accepted but not yet recorded (waiting on a permit). */
  private reservations = new Map<string, number>();

  constructor(opts: DelegationEnforcerOptions) {
    const defaults = getConfig().enforcer;
    this.graph = opts.graph;
    this.parallelWindowMs = opts.parallelWindowMs ?? defaults.parallelWindowMs;
    this.strict = opts.strict ?? defaults.strict;
    this.waves = this.graph.getIndependentGroups();
    this.activateWave();
  }

  getWaves(): TaskNode[][] {
    return this.waves.map((w) => [...w]);
  }

  getCurrentWaveIndex(): number {
    return this.waveIndex;
  }

  /** Members of the active wave; empty once every wave has been worked through. */
  getCurrentWave(): TaskNode[] {
    return this.waves[this.waveIndex] ?? [];
  }

  isComplete(): boolean {
    return this.waveIndex >= this.waves.length;
  }

  /**
   * Decide whether `id` may be spawned right now. Nothing is consumed.
   *
   * In strict mode a spawn that would stretch the wave past the parallel
   * window throws `ParallelExecutionError` instead of being recorded.
   */
  validateSpawn(id: string, now: number = Date.now()): CheckResult {
    const node = this.graph.get(id);
    if (!node) {
      return { ok: false, reason: `Task "${id}" is not part of the task graph` };
    }

    if (node.status !== "pending" && node.status !== "ready") {
      return { ok: false, reason: `Task "${id}" was already delegated (status: ${node.status})` };
    }
    if (this.reservations.has(id)) {
      return { ok: false, reason: `Task "${id}" is already being spawned` };
    }

    const unmet = node.dependsOn.filter((d) => this.graph.get(d)?.status !== "completed");
    if (unmet.length > 0) {
      return { ok: false, reason: `Task "${id}" has unmet dependencies: ${unmet.join(", ")}` };
    }

    const wave = this.getCurrentWave();
    if (!wave.some((n) => n.id === id)) {
      return {
        ok: false,
        reason: `Task "${id}" is not in the current wave (wave ${this.waveIndex + 1}: ${wave.map((n) => n.id).join(", ") || "none"})`,
      };
    }

    if (this.strict) {
      const first = this.spawnTimes()[0];
      if (first !== undefined && now - first > this.parallelWindowMs) {
        throw new ParallelExecutionError(
          `Task "${id}" would be spawned ${now - first}ms after the first task of wave ${this.waveIndex + 1}; ` +
            `independent tasks must be spawned within ${this.parallelWindowMs}ms of each other`,
          now - first,
          this.parallelWindowMs,
        );
      }
    }

    return { ok: true };
  }

  /** Like `validateSpawn`, but rejections become `SpawnValidationError`s. */
  assertSpawn(id: string, now: number = Date.now()): void {
    const result = this.validateSpawn(id, now);
    if (result.ok) return;

    const node = this.graph.get(id);
    if (!node) throw new SpawnValidationError("UNKNOWN_TASK", id, result.reason);
    if ((node.status !== "pending" && node.status !== "ready") || this.reservations.has(id)) {
      throw new SpawnValidationError("ALREADY_SPAWNED", id, result.reason);
    }
    if (node.dependsOn.some((d) => this.graph.get(d)?.status !== "completed")) {
      throw new SpawnValidationError("UNMET_DEPENDENCIES", id, result.reason);
    }
    throw new SpawnValidationError("WRONG_WAVE", id, result.reason);
  }

  /**
   * Validate and hold a spawn that still has to wait for resources. The
   * request time counts towards the parallel window from now on, and the task
   * cannot be spawned a second time meanwhile. Follow up with `recordSpawn` or
   * `releaseSpawn`.
   */
  reserveSpawn(id: string, now: number = Date.now()): void {
    this.assertSpawn(id, now);
    this.reservations.set(id, now);
  }

  /** Drop a reservation whose spawn never happened. */
  releaseSpawn(id: string): void {
    this.reservations.delete(id);
  }

  recordSpawn(id: string, runId: string, at: number = Date.now()): void {
    this.reservations.delete(id);
    if (!this.graph.setStatus(id, "spawned", at)) {
      log.warn(`Ignoring spawn record for "${id}"`, { status: this.graph.get(id)?.status, runId });
      return;
    }
    const node = this.graph.get(id);
    if (node) node.runId = runId;
    log.debug(`Recorded spawn of "${id}"`, { runId, wave: this.waveIndex + 1 });
  }

  recordRunning(id: string): void {
    this.graph.setStatus(id, "running");
  }

  /**
   * Compare the spread of spawn timestamps in the active wave against the
   * window. Strict mode throws on violation.
   */
  checkParallelCompliance(): CheckResult {
    const result = this.compliance();
    if (!result.ok && this.strict) {
      throw new ParallelExecutionError(result.reason, result.spreadMs, this.parallelWindowMs);
    }
    if (!result.ok) log.warn(result.reason);
    return result.ok ? { ok: true } : { ok: false, reason: result.reason };
  }

  private compliance(): { ok: true } | { ok: false; reason: string; spreadMs: number } {
    const times = this.spawnTimes();
    if (times.length < 2) return { ok: true };

    const spread = times[times.length - 1] - times[0];
    if (spread <= this.parallelWindowMs) return { ok: true };

    const reason =
      `Tasks in wave ${this.waveIndex + 1} were not spawned in parallel: ` +
      `${spread}ms between first and last spawn exceeds the ${this.parallelWindowMs}ms window`;
    return { ok: false, reason, spreadMs: spread };
  }

  markTaskCompleted(id: string): void {
    this.markTaskTerminal(id, "completed");
  }

  /**
   * Record a terminal state for a task; advances the wave when this was the
   * last live member.
   */
  markTaskTerminal(id: string, status: TerminalStatus): void {
    this.reservations.delete(id);
    if (!this.graph.setStatus(id, status)) return;

    if (status !== "completed") {
      const skipped = this.graph.skipDownstream(id);
      if (skipped.length > 0) {
        log.warn(`Task "${id}" ${status}; cancelled dependents`, { skipped });
      }
    }

    if (this.getCurrentWave().every((n) => isTerminal(n.status))) {
      this.advanceWave();
    }
  }

  /**
   * Move to the next wave that still has live members. A window violation in
   * the wave being left is logged; the wave advances regardless.
   */
  advanceWave(): void {
    if (this.isComplete()) return;
    const result = this.compliance();
    if (!result.ok) {
      if (this.strict) log.error(result.reason);
      else log.warn(result.reason);
    }
    this.waveIndex++;
    this.activateWave();
  }

  private activateWave(): void {
    while (this.waveIndex < this.waves.length && this.getCurrentWave().every((n) => isTerminal(n.status))) {
      this.waveIndex++;
    }
    const wave = this.getCurrentWave();
    for (const node of wave) {
      this.graph.setStatus(node.id, "ready");
    }
    if (wave.length > 0) {
      log.debug(`Wave ${this.waveIndex + 1}/${this.waves.length} active`, { tasks: wave.map((n) => n.id) });
    }
  }

  /** Recorded spawns plus reserved requests of the active wave, ascending. */
  private spawnTimes(): number[] {
    return this.getCurrentWave()
      .map((n) => n.spawnedAt ?? this.reservations.get(n.id))
      .filter((t): t is number => t !== undefined)
      .sort((a, b) => a - b);
  }

  getEnforcementStatus(): EnforcementStatus {
    const taskStatuses: Record<string, TaskStatus> = {};
    for (const node of this.graph.list()) taskStatuses[node.id] = node.status;
    return {
      currentWave: this.waveIndex + 1,
      totalWaves: this.waves.length,
      currentWaveTasks: this.getCurrentWave().map((n) => n.id),
      taskStatuses,
      strict: this.strict,
      parallelWindowMs: this.parallelWindowMs,
      complete: this.isComplete(),
    };
  }
}
