#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { dirname, resolve } from "node:path";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});
process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err.message);
});
import { configure, getConfig, loadConfigFile } from "./config.js";
import { errorMessage } from "./errors.js";
import { ProcessExecutor } from "./executors/process-executor.js";
import { loadGraphFile } from "./graph/graph-file.js";
import { TaskGraph } from "./graph/task-graph.js";
import { TASK_STATUSES, type TaskStatus } from "./graph/types.js";
import { ResourceGovernor } from "./governor/resource-governor.js";
import { formatListLine } from "./manager/format.js";
import { TaskLifecycleManager } from "./manager/lifecycle-manager.js";
import { TaskStore } from "./persistence/store.js";
import { Scheduler } from "./scheduler.js";
import { setLogLevel } from "./utils/logger.js";
import { MAX_TIMER_MS } from "./utils/time.js";

type GlobalOptions = { db?: string; debug?: boolean };

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function parseDurationMs(value: string): number {
  const n = parsePositiveInt(value);
  if (n > MAX_TIMER_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMER_MS}ms.`);
  }
  return n;
}

function parseStatus(value: string): TaskStatus {
  const status = TASK_STATUSES.find((s) => s === value);
  if (!status) {
    throw new InvalidArgumentError(`Expected one of: ${TASK_STATUSES.join(", ")}.`);
  }
  return status;
}

function fail(err: unknown): void {
  console.error("Error:", errorMessage(err));
  process.exitCode = 1;
}

/** Open the registry, recover crashed runs, hand a manager to `fn`, close. */
async function withManager(fn: (manager: TaskLifecycleManager) => Promise<void> | void): Promise<void> {
  const store = new TaskStore();
  try {
    const manager = new TaskLifecycleManager({
      store,
      executor: new ProcessExecutor(),
      governor: new ResourceGovernor(),
    });
    manager.recover();
    await fn(manager);
  } catch (err) {
    fail(err);
  } finally {
    store.close();
  }
}

const program = new Command();

program
  .name("taskwave")
  .description("Wave-based background task scheduler with per-resource concurrency limits")
  .version("0.1.0")
  .option("--db <path>", "Task registry database")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<GlobalOptions>();
  if (opts.debug) setLogLevel("debug");
  const overrides = loadConfigFile();
  configure({
    ...overrides,
    paths: { ...overrides.paths, ...(opts.db ? { dbPath: resolve(opts.db) } : {}) },
  });
});

// --- waves ---
program
  .command("waves")
  .description("Show the waves a graph file would run in (dry run)")
  .argument("<graph>", "Graph file (JSON)")
  .action((file: string) => {
    try {
      const graph = TaskGraph.fromSpec(loadGraphFile(file));
      graph.getIndependentGroups().forEach((wave, i) => {
        console.log(`Wave ${i + 1}: ${wave.map((n) => n.id).join(", ")}`);
      });
    } catch (err) {
      fail(err);
    }
  });

// --- run ---
program
  .command("run")
  .description("Run a graph file wave by wave")
  .argument("<graph>", "Graph file (JSON)")
  .option("-w, --window <ms>", "Max spread between spawns of one wave", parsePositiveInt)
  .option("--report", "Report parallelism violations instead of failing")
  .option("-t, --timeout <ms>", "Timeout for tasks that set none", parseDurationMs)
  .option("--cwd <dir>", "Working directory for commands (default: the graph file's directory)")
  .action(async (file: string, opts: { window?: number; report?: boolean; timeout?: number; cwd?: string }) => {
    let scheduler: Scheduler | undefined;
    try {
      const tasks = loadGraphFile(file);
      scheduler = new Scheduler({
        executor: new ProcessExecutor({ cwd: opts.cwd ?? dirname(resolve(file)) }),
        parallelWindowMs: opts.window,
        strict: opts.report ? false : undefined,
        manager: { defaultTimeoutMs: opts.timeout },
      });
      scheduler.manager.recover();
      scheduler.declare(tasks);

      const active = scheduler;
      process.once("SIGINT", () => {
        console.error("Interrupted, cancelling running tasks...");
        active.stop().catch((err: unknown) => {
          console.error("Cancel failed:", errorMessage(err));
        });
      });

      const summary = await scheduler.runAll({
        onWaveStart: (wave, ids) => console.log(`\nWave ${wave}: ${ids.join(", ")}`),
        onTaskSpawned: (taskId, runId) => console.log(`  -> ${taskId} (${runId})`),
        onSpawnFailed: (taskId, error) => console.error(`  !! ${taskId}: ${error}`),
        onTaskEnd: (_taskId, record) => console.log(`  ${formatListLine(record)}`),
      });

      const statuses = Object.values(summary.tasks);
      const count = (s: TaskStatus) => statuses.filter((x) => x === s).length;
      console.log(
        `\nFinished in ${summary.finishedAt - summary.startedAt}ms: ` +
          `${count("completed")} completed, ${count("failed")} failed, ${count("cancelled")} cancelled`,
      );
      if (statuses.some((s) => s !== "completed")) process.exitCode = 1;
    } catch (err) {
      fail(err);
    } finally {
      await scheduler?.shutdown();
    }
  });

// --- list ---
program
  .command("list")
  .description("List task runs, newest first")
  .option("-s, --status <status>", "Only runs in this status", parseStatus)
  .option("-n, --limit <n>", "Max runs to show", parsePositiveInt)
  .action((opts: { status?: TaskStatus; limit?: number }) =>
    withManager((manager) => {
      const records = manager.listTasks({ status: opts.status, limit: opts.limit });
      if (records.length === 0) {
        console.log("No tasks.");
        return;
      }
      for (const record of records) console.log(formatListLine(record));
    }),
  );

// --- output ---
program
  .command("output")
  .description("Show a run's status and result")
  .argument("<runId>", "Run id")
  .option("-b, --block", "Wait until the run finishes")
  .option("-t, --timeout <ms>", "Max wait with --block", parseDurationMs)
  .action((runId: string, opts: { block?: boolean; timeout?: number }) =>
    withManager(async (manager) => {
      console.log(await manager.getOutput(runId, { block: opts.block, timeoutMs: opts.timeout }));
    }),
  );

// --- progress ---
program
  .command("progress")
  .description("Show a run's status and recent output")
  .argument("<runId>", "Run id")
  .option("-n, --lines <n>", "Output lines to show", parsePositiveInt)
  .action((runId: string, opts: { lines?: number }) =>
    withManager((manager) => {
      console.log(manager.getProgress(runId, opts.lines));
    }),
  );

// --- cancel ---
program
  .command("cancel")
  .description("Cancel a running task")
  .argument("<runId>", "Run id")
  .action((runId: string) =>
    withManager(async (manager) => {
      if (await manager.cancel(runId)) {
        console.log(`Cancelled ${runId}`);
      } else {
        console.error(`Task ${runId} is not running.`);
        process.exitCode = 1;
      }
    }),
  );

// --- retry ---
program
  .command("retry")
  .description("Re-run a failed or cancelled task and wait for it")
  .argument("<runId>", "Run id")
  .action((runId: string) =>
    withManager(async (manager) => {
      const next = await manager.retry(runId);
      console.error(`Retrying ${runId} as ${next}`);
      const record = await manager.waitFor(next, Number.POSITIVE_INFINITY);
      console.log(await manager.getOutput(next));
      if (record?.status !== "completed") process.exitCode = 1;
    }),
  );

// --- stop-all ---
program
  .command("stop-all")
  .description("Cancel every running task")
  .option("--clear", "Also delete finished task records and their output")
  .action((opts: { clear?: boolean }) =>
    withManager(async (manager) => {
      const n = await manager.stopAll(opts.clear === true);
      console.log(opts.clear ? `Cleared ${n} task record(s).` : `Stopped ${n} task(s).`);
    }),
  );

// --- limits ---
program
  .command("limits")
  .description("Show the effective concurrency limit per resource bucket")
  .action(() => {
    const limits = new ResourceGovernor().getLimits();
    for (const bucket of Object.keys(limits).sort()) {
      console.log(`${bucket.padEnd(14)} ${limits[bucket]}`);
    }
    console.log(`\nConfig file: ${getConfig().paths.configFile}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
