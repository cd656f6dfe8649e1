import { describe, expect, it } from "vitest";
import { ProcessExecutor } from "../../src/executors/process-executor.js";
import { OsProcessControl, parseHandle } from "../../src/executors/process-control.js";
import type { ExecutionRequest } from "../../src/executors/types.js";
import type { OutputSink } from "../../src/persistence/output-log.js";

const NODE = process.execPath;

function request(params: Record<string, unknown>, runId = "run_1"): ExecutionRequest {
  return { runId, taskId: "job", description: "Job", resourceClass: "_default", params };
}

function memorySink(): OutputSink & { text: () => string } {
  const chunks: string[] = [];
  return { write: (chunk) => chunks.push(chunk), text: () => chunks.join("") };
}

describe("ProcessExecutor", () => {
  it("resolves with trimmed stdout and mirrors it to the sink", async () => {
    const sink = memorySink();
    const unit = new ProcessExecutor().execute(
      request({ command: [NODE, "-e", "process.stdout.write('hello\\n')"] }),
      sink,
    );
    expect(unit.handle).toMatch(/^pid:\d+$/);
    expect(await unit.done).toBe("hello");
    expect(sink.text()).toBe("hello\n");
  });

  it("runs string commands through the shell", async () => {
    const unit = new ProcessExecutor().execute(request({ command: "echo shell-ok" }), memorySink());
    expect(await unit.done).toBe("shell-ok");
  });

  it("exposes the run id to the child", async () => {
    const unit = new ProcessExecutor().execute(
      request({ command: [NODE, "-e", "process.stdout.write(process.env.TASKWAVE_RUN_ID ?? '')"] }, "run_env"),
      memorySink(),
    );
    expect(await unit.done).toBe("run_env");
  });

  it("rejects with the exit code and stderr tail", async () => {
    const unit = new ProcessExecutor().execute(
      request({ command: [NODE, "-e", "process.stderr.write('bad input'); process.exit(3)"] }),
      memorySink(),
    );
    await expect(unit.done).rejects.toThrow("Process exited with code 3\nbad input");
  });

  it("terminates the process group", async () => {
    const unit = new ProcessExecutor().execute(
      request({ command: [NODE, "-e", "setTimeout(() => {}, 10000)"] }),
      memorySink(),
    );
    unit.terminate();
    await expect(unit.done).rejects.toThrow("Process terminated by SIGTERM");
    expect(new OsProcessControl().isAlive(unit.handle)).toBe(false);
  });

  it("hands out an unsignalable handle when the process cannot start", async () => {
    const unit = new ProcessExecutor().execute(
      request({ command: ["/nonexistent/taskwave-missing-binary"] }, "run_missing"),
      memorySink(),
    );
    expect(unit.handle).toBe("unstarted:run_missing");
    unit.terminate();
    unit.kill();
    await expect(unit.done).rejects.toThrow("ENOENT");
    expect(new OsProcessControl().isAlive(unit.handle)).toBe(false);
  });

  it("rejects params without a command", () => {
    expect(() => new ProcessExecutor().execute(request({}), memorySink())).toThrow("Invalid process params");
  });
});

describe("process handles", () => {
  it("parses pid and local handles", () => {
    expect(parseHandle("pid:123")).toEqual({ kind: "pid", pid: 123 });
    expect(parseHandle("local:77:run_abc")).toEqual({ kind: "local", pid: 77, runId: "run_abc" });
    expect(parseHandle("garbage")).toBeUndefined();
  });

  it("rejects pids that would address a process group", () => {
    expect(parseHandle("pid:0")).toBeUndefined();
    expect(parseHandle("pid:-1")).toBeUndefined();
    expect(parseHandle("local:0:run_1")).toBeUndefined();
    const control = new OsProcessControl();
    expect(control.isAlive("pid:0")).toBe(false);
    expect(control.terminate("pid:0")).toBe(false);
  });

  it("treats this process's own local handles as not alive", () => {
    const control = new OsProcessControl();
    expect(control.isAlive(`local:${process.pid}:run_1`)).toBe(false);
    expect(control.isAlive(`pid:${process.pid}`)).toBe(true);
    expect(control.isAlive("garbage")).toBe(false);
  });

  it("refuses to signal local handles", () => {
    expect(new OsProcessControl().terminate(`local:${process.pid}:run_1`)).toBe(false);
  });
});
