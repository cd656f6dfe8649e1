import type { OutputSink } from "../persistence/output-log.js";

export type ExecutionRequest = {
  runId: string;
  taskId?: string;
  description: string;
  resourceClass: string;
  params: Record<string, unknown>;
};

/** One started piece of work. */
export interface ExecutionUnit {
  /** Opaque id of the backing process, persisted with the task for liveness checks. */
  readonly handle: string;
  /** Settles with the result text, or rejects with the failure. */
  readonly done: Promise<string>;
  /** Ask the work to stop (cooperative). */
  terminate(): void;
  /** Stop the work now (forced). */
  kill(): void;
}

/**
 * The capability the lifecycle manager delegates actual work to. What the
 * work computes is none of the scheduler's business.
 */
export interface TaskExecutor {
  readonly name: string;
  /** Start the work. Output written to `sink` shows up in progress reports. */
  execute(request: ExecutionRequest, sink: OutputSink): ExecutionUnit;
}
