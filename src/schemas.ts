import { z } from "zod";
import { ValidationError } from "./errors.js";
import { TASK_STATUSES } from "./graph/types.js";
import { MAX_TIMER_MS } from "./utils/time.js";

const nonEmpty = z.string().trim().min(1);
const positiveInt = z.number().int().positive();
/** Durations that end up as timer delays. */
const timerMs = positiveInt.max(MAX_TIMER_MS);

export const TaskStatusSchema = z.enum(TASK_STATUSES);

export const SpawnRequestSchema = z.object({
  taskId: nonEmpty.optional(),
  description: nonEmpty,
  /** Falls back to the graph node's class, then `_default`. */
  resourceClass: nonEmpty.optional(),
  dependsOn: z.array(nonEmpty).default([]),
  timeoutMs: timerMs.optional(),
  params: z.record(z.unknown()).default({}),
});

export const RetryOverridesSchema = z.object({
  description: nonEmpty.optional(),
  resourceClass: nonEmpty.optional(),
  timeoutMs: timerMs.optional(),
  params: z.record(z.unknown()).optional(),
});

export const TaskRecordSchema = z.object({
  runId: nonEmpty,
  taskId: z.string().optional(),
  description: z.string(),
  resourceClass: z.string(),
  dependsOn: z.array(z.string()),
  status: TaskStatusSchema,
  params: z.record(z.unknown()),
  executor: z.string(),
  result: z.string().optional(),
  error: z.string().optional(),
  timeoutMs: z.number(),
  handle: z.string().optional(),
  retryOf: z.string().optional(),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
});

/** A task in a graph file run by the CLI. */
export const GraphFileTaskSchema = z.object({
  id: nonEmpty,
  description: nonEmpty,
  resourceClass: nonEmpty.optional(),
  dependsOn: z.array(nonEmpty).default([]),
  command: z.union([nonEmpty, z.array(z.string()).nonempty()]),
  cwd: z.string().optional(),
  timeoutMs: timerMs.optional(),
});

export const GraphFileSchema = z.object({
  tasks: z.array(GraphFileTaskSchema).min(1),
});

export const ConfigFileSchema = z.object({
  rateLimits: z.record(positiveInt).optional(),
  acquireTimeoutMs: timerMs.optional(),
  parallelWindowMs: positiveInt.optional(),
  strict: z.boolean().optional(),
  manager: z
    .object({
      pollIntervalMs: timerMs,
      cancelGraceMs: timerMs,
      defaultTimeoutMs: timerMs,
      blockTimeoutMs: timerMs,
      progressLines: positiveInt,
    })
    .partial()
    .optional(),
});

export type SpawnRequestInput = z.input<typeof SpawnRequestSchema>;
export type SpawnRequest = z.output<typeof SpawnRequestSchema>;
export type RetryOverrides = z.input<typeof RetryOverridesSchema>;
export type GraphFile = z.output<typeof GraphFileSchema>;
export type GraphFileTask = z.output<typeof GraphFileTaskSchema>;

/** Parse `data` or throw a `ValidationError` listing every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what = "input"): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${what}: ${msg}`);
  }
  return result.data;
}

export type TaskRecord = z.output<typeof TaskRecordSchema>;
