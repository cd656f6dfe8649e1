import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TaskStore } from "../../src/persistence/store.js";
import type { TaskRecord } from "../../src/schemas.js";

function record(runId: string, overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    runId,
    taskId: "build",
    description: "Build the thing",
    resourceClass: "sonnet",
    dependsOn: ["fetch"],
    status: "running",
    params: { command: ["make", "all"] },
    executor: "process",
    timeoutMs: 60_000,
    handle: "pid:4242",
    createdAt: 1_000,
    startedAt: 1_000,
    ...overrides,
  };
}

describe("TaskStore", () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a record", () => {
    const r = record("run_1", { retryOf: "run_0" });
    store.insert(r);
    expect(store.get("run_1")).toEqual(r);
  });

  it("returns undefined for unknown runs", () => {
    expect(store.get("run_missing")).toBeUndefined();
    expect(store.transition("run_missing", "completed")).toBeUndefined();
  });

  it("reads absent optional fields back as undefined", () => {
    store.insert(record("run_1", { taskId: undefined, handle: undefined, startedAt: undefined }));
    const loaded = store.get("run_1");
    expect(loaded?.runId).toBe("run_1");
    expect(loaded?.taskId).toBeUndefined();
    expect(loaded?.handle).toBeUndefined();
    expect(loaded?.startedAt).toBeUndefined();
  });

  it("moves a record to a terminal state and stamps completion", () => {
    store.insert(record("run_1"));
    const updated = store.transition("run_1", "completed", { result: "done", completedAt: 5_000 });
    expect(updated).toMatchObject({ status: "completed", result: "done", completedAt: 5_000 });
    expect(store.get("run_1")?.status).toBe("completed");
  });

  it("stamps completion when the patch does not", () => {
    store.insert(record("run_1"));
    const before = Date.now();
    const updated = store.transition("run_1", "failed", { error: "boom" });
    expect(updated?.completedAt).toBeGreaterThanOrEqual(before);
  });

  it("refuses to leave a terminal state", () => {
    store.insert(record("run_1"));
    store.transition("run_1", "cancelled");
    expect(store.transition("run_1", "failed", { error: "late" })).toBeUndefined();
    expect(store.get("run_1")).toMatchObject({ status: "cancelled", error: undefined });
  });

  it("refuses backward transitions", () => {
    store.insert(record("run_1"));
    expect(store.transition("run_1", "spawned")).toBeUndefined();
    expect(store.get("run_1")?.status).toBe("running");
  });

  it("patches non-status fields", () => {
    store.insert(record("run_1"));
    store.patch("run_1", { handle: "pid:99" });
    expect(store.get("run_1")).toMatchObject({ handle: "pid:99", status: "running" });
  });

  it("lists newest first with filters", () => {
    store.insert(record("run_1", { createdAt: 1_000 }));
    store.insert(record("run_2", { createdAt: 3_000, taskId: "test" }));
    store.insert(record("run_3", { createdAt: 2_000 }));
    store.transition("run_3", "completed");

    expect(store.list().map((r) => r.runId)).toEqual(["run_2", "run_3", "run_1"]);
    expect(store.list({ status: "running" }).map((r) => r.runId)).toEqual(["run_2", "run_1"]);
    expect(store.list({ status: ["completed", "failed"] }).map((r) => r.runId)).toEqual(["run_3"]);
    expect(store.list({ taskId: "test" }).map((r) => r.runId)).toEqual(["run_2"]);
    expect(store.list({ limit: 1 }).map((r) => r.runId)).toEqual(["run_2"]);
  });

  it("deletes only terminal records", () => {
    store.insert(record("run_1"));
    store.insert(record("run_2"));
    store.insert(record("run_3"));
    store.transition("run_2", "failed");
    store.transition("run_3", "completed");

    expect(store.deleteTerminal().sort()).toEqual(["run_2", "run_3"]);
    expect(store.list().map((r) => r.runId)).toEqual(["run_1"]);
    expect(store.deleteAll()).toBe(1);
  });

  it("rejects duplicate run ids", () => {
    store.insert(record("run_1"));
    expect(() => store.insert(record("run_1"))).toThrow();
  });
});

describe("TaskStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "taskwave-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("shares records between connections", () => {
    const path = join(dir, "nested", "tasks.db");
    const writer = new TaskStore(path);
    const reader = new TaskStore(path);
    try {
      writer.insert(record("run_1"));
      writer.transition("run_1", "completed", { result: "ok" });
      expect(reader.get("run_1")).toMatchObject({ status: "completed", result: "ok" });
      expect(reader.transition("run_1", "failed")).toBeUndefined();
    } finally {
      writer.close();
      reader.close();
    }
  });
});
