import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { getConfig } from "../config.js";

/** Where a run's executor writes its output. */
export type OutputSink = {
  write(chunk: string): void;
};

/**
 * Append-only per-run output files (`<dir>/<runId>.out`). Kept on disk so
 * progress stays readable after the process that ran the task is gone.
 */
export class OutputLog {
  readonly dir: string;

  constructor(dir: string = getConfig().paths.outputDir) {
    this.dir = dir;
    mkdirSync(dir, { recursive: true });
  }

  pathFor(runId: string): string {
    return join(this.dir, `${runId}.out`);
  }

  append(runId: string, chunk: string): void {
    if (chunk.length === 0) return;
    appendFileSync(this.pathFor(runId), chunk, "utf-8");
  }

  sink(runId: string): OutputSink {
    return { write: (chunk) => this.append(runId, chunk) };
  }

  read(runId: string): string {
    const path = this.pathFor(runId);
    return existsSync(path) ? readFileSync(path, "utf-8") : "";
  }

  /** Last `lines` non-empty-trailing lines of a run's output. */
  tail(runId: string, lines: number): string[] {
    const content = this.read(runId).replace(/\s+$/, "");
    if (content.length === 0 || lines <= 0) return [];
    return content.split("\n").slice(-lines);
  }

  remove(runId: string): void {
    rmSync(this.pathFor(runId), { force: true });
  }
}
