import { createLogger } from "../utils/logger.js";
import type { OutputSink } from "../persistence/output-log.js";
import type { ExecutionRequest, ExecutionUnit, TaskExecutor } from "./types.js";

const log = createLogger("function-executor");

export type TaskFunctionContext = {
  /** Aborted when the run is cancelled or times out. */
  signal: AbortSignal;
  /** Append to the run's output log. */
  emit: (chunk: string) => void;
};

export type TaskFunction = (request: ExecutionRequest, ctx: TaskFunctionContext) => Promise<string>;

export type FunctionExecutorOptions = {
  fn: TaskFunction;
  name?: string;
};

/**
 * Runs tasks as async functions inside this process. Termination is
 * cooperative only: the function sees its signal abort and is expected to
 * wind down; a function that ignores it is abandoned, its result discarded.
 */
export class FunctionExecutor implements TaskExecutor {
  readonly name: string;
  private fn: TaskFunction;

  constructor(opts: FunctionExecutorOptions) {
    this.name = opts.name ?? "function";
    this.fn = opts.fn;
  }

  execute(request: ExecutionRequest, sink: OutputSink): ExecutionUnit {
    const controller = new AbortController();
    const label = request.taskId ?? request.runId;
    const start = Date.now();

    log.info(`[${this.name}] Running function for task "${label}"`);

    const done = (async () => {
      try {
        const result = await this.fn(request, { signal: controller.signal, emit: (chunk) => sink.write(chunk) });
        log.debug(`[${this.name}] Task "${label}" finished`, { durationMs: Date.now() - start });
        return result;
      } catch (err) {
        log.error(`[${this.name}] Task "${label}" failed`, { error: String(err) });
        throw err;
      }
    })();

    return {
      handle: `local:${process.pid}:${request.runId}`,
      done,
      terminate: () => controller.abort(new Error("Task terminated")),
      kill: () => {
        if (!controller.signal.aborted) controller.abort(new Error("Task killed"));
        log.warn(`[${this.name}] Abandoning task "${label}"`);
      },
    };
  }
}
