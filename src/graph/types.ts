export const TASK_STATUSES = ["pending", "ready", "spawned", "running", "completed", "failed", "cancelled"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalStatus = "completed" | "failed" | "cancelled";

// Terminal states share the top rank so none can replace another.
const STATUS_RANK: Record<TaskStatus, number> = {
  pending: 0,
  ready: 1,
  spawned: 2,
  running: 3,
  completed: 4,
  failed: 4,
  cancelled: 4,
};

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return status === "completed" || status === "failed" || status === "cancelled";
}

/** Status only ever moves forward; terminal states are final. */
export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return STATUS_RANK[to] > STATUS_RANK[from];
}

export type TaskNode = {
  id: string;
  description: string;
  resourceClass: string;
  dependsOn: string[];
  status: TaskStatus;
  /** Run id of the spawned attempt, once delegated. */
  runId?: string;
  spawnedAt?: number;
  completedAt?: number;
};

export type TaskDeclaration = {
  description: string;
  resourceClass?: string;
  dependsOn?: string[];
};

/** Either a keyed map of declarations or a list of declarations carrying their own ids. */
export type GraphSpec =
  | Record<string, TaskDeclaration>
  | Array<TaskDeclaration & { id: string }>;
