import type { TaskRecord } from "../schemas.js";

const STATUS_ICON: Record<TaskRecord["status"], string> = {
  pending: "..",
  ready: "..",
  spawned: "->",
  running: "~~",
  completed: "ok",
  failed: "!!",
  cancelled: "--",
};

function label(record: TaskRecord): string {
  return record.taskId ? `${record.taskId} (${record.description})` : record.description;
}

function iso(ts: number | undefined): string {
  return ts === undefined ? "-" : new Date(ts).toISOString();
}

export function durationMs(record: TaskRecord, now: number = Date.now()): number | undefined {
  if (record.startedAt === undefined) return undefined;
  return (record.completedAt ?? now) - record.startedAt;
}

/** Multi-line report of a run's state and, once terminal, its result or error. */
export function formatOutput(record: TaskRecord): string {
  const header = [
    `Run ID: ${record.runId}`,
    `Task: ${label(record)}`,
    `Resource: ${record.resourceClass}`,
  ];
  if (record.retryOf) header.push(`Retry of: ${record.retryOf}`);

  switch (record.status) {
    case "completed":
      return [
        "Task completed",
        ...header,
        `Duration: ${durationMs(record) ?? 0}ms`,
        "Result:",
        record.result || "(no output)",
      ].join("\n");
    case "failed":
      return ["Task failed", ...header, "Error:", record.error ?? "(no error details)"].join("\n");
    case "cancelled":
      return ["Task cancelled", ...header].join("\n");
    default:
      return [
        "Task running",
        ...header,
        `Status: ${record.status}`,
        `Handle: ${record.handle ?? "-"}`,
        `Started: ${iso(record.startedAt)}`,
        "Block on this run to wait for completion.",
      ].join("\n");
  }
}

/** Status plus the tail of the run's output. */
export function formatProgress(record: TaskRecord, tail: string[], lines: number): string {
  const out = [
    `Progress: ${label(record)}`,
    `Run ID: ${record.runId}`,
    `Status: ${record.status}`,
  ];
  if (tail.length > 0) {
    out.push(`Recent output (last ${lines} lines):`, ...tail);
  } else if (record.status === "running") {
    out.push("No output yet.");
  }
  if (record.status === "failed" && record.error) {
    out.push("Error:", record.error);
  }
  return out.join("\n");
}

/** One line per run, for listings. */
export function formatListLine(record: TaskRecord): string {
  const id = record.taskId ? ` ${record.taskId}` : "";
  return `[${STATUS_ICON[record.status]}] ${record.runId}${id} ${record.status} ${record.resourceClass} - ${record.description}`;
}
