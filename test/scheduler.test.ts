import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { GraphError } from "../src/errors.js";
import { FunctionExecutor, type TaskFunction } from "../src/executors/function-executor.js";
import { ResourceGovernor } from "../src/governor/resource-governor.js";
import { OutputLog } from "../src/persistence/output-log.js";
import { TaskStore } from "../src/persistence/store.js";
import { Scheduler, type ScheduledTask, type SchedulerOptions } from "../src/scheduler.js";
import { sleep } from "../src/utils/time.js";

const work: TaskFunction = async (req, { signal }) => {
  if (req.params.fail) throw new Error(`${req.taskId ?? "task"} broke`);
  if (req.params.hang) {
    await new Promise<never>((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(signal.reason));
    });
  }
  await sleep(typeof req.params.delayMs === "number" ? req.params.delayMs : 5);
  return `${req.taskId ?? "task"} ok`;
};

const chain: ScheduledTask[] = [
  { id: "a", description: "A" },
  { id: "b", description: "B" },
  { id: "c", description: "C", dependsOn: ["a", "b"] },
  { id: "d", description: "D", dependsOn: ["c"] },
];

describe("Scheduler", () => {
  let dir: string;
  let scheduler: Scheduler;

  function createScheduler(opts: Partial<SchedulerOptions> = {}): Scheduler {
    scheduler = new Scheduler({
      executor: new FunctionExecutor({ fn: work }),
      store: new TaskStore(":memory:"),
      outputLog: new OutputLog(join(dir, "runs")),
      manager: { pollIntervalMs: 5, cancelGraceMs: 50 },
      ...opts,
    });
    return scheduler;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "taskwave-scheduler-"));
  });

  afterEach(async () => {
    await scheduler.shutdown();
    rmSync(dir, { recursive: true, force: true });
  });

  it("runs a graph wave by wave", async () => {
    const s = createScheduler();
    s.declare(chain);
    const waves: Array<[number, string[]]> = [];
    const ended: string[] = [];

    const summary = await s.runAll({
      onWaveStart: (wave, ids) => waves.push([wave, ids]),
      onTaskEnd: (taskId, record) => ended.push(`${taskId}:${record.status}:${record.result ?? ""}`),
    });

    expect(waves).toEqual([
      [1, ["a", "b"]],
      [2, ["c"]],
      [3, ["d"]],
    ]);
    expect(summary.tasks).toEqual({ a: "completed", b: "completed", c: "completed", d: "completed" });
    expect(Object.keys(summary.runs).sort()).toEqual(["a", "b", "c", "d"]);
    expect(summary.waves).toBe(3);
    expect(ended.sort()).toEqual(["a:completed:a ok", "b:completed:b ok", "c:completed:c ok", "d:completed:d ok"]);
    expect(s.store.list({ status: "completed" })).toHaveLength(4);
  });

  it("cancels the dependents of a failed task and finishes", async () => {
    const s = createScheduler();
    s.declare([
      { id: "a", description: "A" },
      { id: "b", description: "B", params: { fail: true } },
      { id: "c", description: "C", dependsOn: ["a", "b"] },
      { id: "d", description: "D", dependsOn: ["c"] },
    ]);
    const waves: number[] = [];

    const summary = await s.runAll({ onWaveStart: (wave) => waves.push(wave) });

    expect(summary.tasks).toEqual({ a: "completed", b: "failed", c: "cancelled", d: "cancelled" });
    expect(waves).toEqual([1]);
    expect(s.store.get(summary.runs.b)?.error).toBe("b broke");
  });

  it("fails a task whose permit never frees up", async () => {
    const s = createScheduler({
      governor: new ResourceGovernor({ limits: { opus: 1 } }),
      manager: { pollIntervalMs: 5, acquireTimeoutMs: 20 },
    });
    s.declare([
      { id: "p", description: "P", resourceClass: "opus", params: { delayMs: 100 } },
      { id: "q", description: "Q", resourceClass: "claude-opus-4" },
    ]);
    const failures: string[] = [];

    const summary = await s.runAll({ onSpawnFailed: (taskId, error) => failures.push(`${taskId}: ${error}`) });

    expect(summary.tasks).toEqual({ p: "completed", q: "failed" });
    expect(Object.keys(summary.runs)).toEqual(["p"]);
    expect(failures).toEqual(['q: Timed out after 20ms waiting for a "opus" permit (resource class "claude-opus-4")']);
  });

  it("stops before the next wave when asked", async () => {
    const s = createScheduler();
    s.declare([
      { id: "a", description: "A", params: { hang: true } },
      { id: "b", description: "B" },
      { id: "c", description: "C", dependsOn: ["b"] },
    ]);

    const running = s.runAll();
    await sleep(30);
    await s.stop();
    const summary = await running;

    expect(summary.tasks).toEqual({ a: "cancelled", b: "completed", c: "ready" });
    expect(summary.runs.c).toBeUndefined();
  });

  it("rejects a cyclic declaration", () => {
    const s = createScheduler();
    expect(() =>
      s.declare([
        { id: "a", description: "A", dependsOn: ["b"] },
        { id: "b", description: "B", dependsOn: ["a"] },
      ]),
    ).toThrow(GraphError);
  });

  it("needs a declared graph before spawning", () => {
    const s = createScheduler();
    expect(() => s.getEnforcer()).toThrow("No task graph declared");
    expect(s.getStatus()).toEqual({ enforcement: undefined, buckets: {}, running: 0 });
  });

  it("reports enforcement and bucket status", () => {
    const s = createScheduler();
    s.declare(chain);
    expect(s.getStatus().enforcement).toMatchObject({ currentWave: 1, totalWaves: 3, currentWaveTasks: ["a", "b"] });
  });
});
