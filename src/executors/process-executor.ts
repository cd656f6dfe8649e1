import { spawn, type ChildProcess } from "node:child_process";
import { z } from "zod";
import { parseOrThrow } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { OutputSink } from "../persistence/output-log.js";
import { OsProcessControl, type ProcessControl } from "./process-control.js";
import type { ExecutionRequest, ExecutionUnit, TaskExecutor } from "./types.js";

const log = createLogger("process-executor");

const STDERR_TAIL_CHARS = 2_000;

const ProcessParamsSchema = z.object({
  command: z.union([z.string().min(1), z.array(z.string()).nonempty()]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
});

export type ProcessParams = z.output<typeof ProcessParamsSchema>;

export type ProcessExecutorOptions = {
  name?: string;
  /** Default working directory when a task sets none. */
  cwd?: string;
  /** Extra environment for every task. */
  env?: Record<string, string>;
  control?: ProcessControl;
};

/**
 * Runs each task as a child process in its own process group.
 *
 * `params.command` is either a shell string or an argv array. Stdout and
 * stderr stream into the run's output log; the result is the trimmed stdout.
 * A non-zero exit fails the task with the exit code and the tail of stderr.
 */
export class ProcessExecutor implements TaskExecutor {
  readonly name: string;
  private cwd?: string;
  private env?: Record<string, string>;
  private control: ProcessControl;

  constructor(opts: ProcessExecutorOptions = {}) {
    this.name = opts.name ?? "process";
    this.cwd = opts.cwd;
    this.env = opts.env;
    this.control = opts.control ?? new OsProcessControl();
  }

  execute(request: ExecutionRequest, sink: OutputSink): ExecutionUnit {
    const params = parseOrThrow(ProcessParamsSchema, request.params, "process params");
    const [file, args, shell]: [string, string[], boolean] =
      typeof params.command === "string"
        ? [params.command, [], true]
        : [params.command[0], params.command.slice(1), false];

    const child = spawn(file, args, {
      shell,
      cwd: params.cwd ?? this.cwd,
      env: { ...process.env, ...this.env, ...params.env, TASKWAVE_RUN_ID: request.runId },
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
    });
    if (child.pid === undefined) {
      return this.unstarted(request, child);
    }
    const handle = `pid:${child.pid}`;
    log.info(`Started "${request.taskId ?? request.runId}"`, { handle });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
      sink.write(chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_CHARS);
      sink.write(chunk);
    });

    const done = new Promise<string>((resolve, reject) => {
      child.once("error", reject);
      child.once("close", (code, signal) => {
        if (code === 0) {
          resolve(stdout.trim());
          return;
        }
        const reason = signal ? `Process terminated by ${signal}` : `Process exited with code ${code}`;
        const tail = stderr.trim();
        reject(new Error(tail ? `${reason}\n${tail}` : reason));
      });
    });

    return {
      handle,
      done,
      terminate: () => {
        this.control.terminate(handle);
      },
      kill: () => {
        this.control.kill(handle);
      },
    };
  }

  /** The process never came up; `error` follows on the next tick. Nothing to signal. */
  private unstarted(request: ExecutionRequest, child: ChildProcess): ExecutionUnit {
    const handle = `unstarted:${request.runId}`;
    log.warn(`Could not start "${request.taskId ?? request.runId}"`, { handle });
    const done = new Promise<string>((_resolve, reject) => {
      child.once("error", reject);
    });
    return {
      handle,
      done,
      terminate: () => undefined,
      kill: () => undefined,
    };
  }
}
