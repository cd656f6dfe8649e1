import { readFileSync } from "node:fs";
import { ValidationError, errorMessage } from "../errors.js";
import { GraphFileSchema, parseOrThrow } from "../schemas.js";
import type { ScheduledTask } from "../scheduler.js";

/**
 * Read a graph file and turn its entries into schedulable tasks whose
 * executor params carry the command to run.
 *
 * ```json
 * { "tasks": [{ "id": "lint", "description": "Lint", "command": "npm run lint" }] }
 * ```
 */
export function loadGraphFile(path: string): ScheduledTask[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ValidationError("VALIDATION_FAILED", `Could not read graph file ${path}: ${errorMessage(err)}`);
  }
  return parseGraphFile(raw, `graph file ${path}`);
}

export function parseGraphFile(raw: unknown, source = "graph file"): ScheduledTask[] {
  const file = parseOrThrow(GraphFileSchema, raw, source);
  return file.tasks.map((t) => ({
    id: t.id,
    description: t.description,
    resourceClass: t.resourceClass,
    dependsOn: t.dependsOn,
    timeoutMs: t.timeoutMs,
    params: t.cwd === undefined ? { command: t.command } : { command: t.command, cwd: t.cwd },
  }));
}
