// Config
export { getConfig, configure, resetConfig, loadConfigFile, defaults, DEFAULT_LIMITS } from "./config.js";
export type { SchedulerConfig, ConfigOverrides } from "./config.js";

// Errors
export {
  SchedulerError,
  GraphError,
  SpawnValidationError,
  ParallelExecutionError,
  AcquireTimeoutError,
  ValidationError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  SpawnRequestSchema,
  RetryOverridesSchema,
  TaskRecordSchema,
  GraphFileSchema,
  ConfigFileSchema,
} from "./schemas.js";
export type { SpawnRequest, SpawnRequestInput, RetryOverrides, TaskRecord, GraphFile } from "./schemas.js";

// Graph
export { TaskGraph, DEFAULT_RESOURCE_CLASS } from "./graph/task-graph.js";
export { DelegationEnforcer } from "./graph/enforcer.js";
export type { DelegationEnforcerOptions, CheckResult, EnforcementStatus } from "./graph/enforcer.js";
export { loadGraphFile, parseGraphFile } from "./graph/graph-file.js";
export { TASK_STATUSES, isTerminal, canTransition } from "./graph/types.js";
export type { TaskStatus, TerminalStatus, TaskNode, TaskDeclaration, GraphSpec } from "./graph/types.js";

// Governor
export { ResourceGovernor } from "./governor/resource-governor.js";
export type { ResourceGovernorOptions, BucketStatus, Permit } from "./governor/resource-governor.js";
export { Semaphore } from "./governor/semaphore.js";
export { DEFAULT_RULES, DEFAULT_BUCKET, canonicalBucket, normalizeResourceClass } from "./governor/rules.js";
export type { NormalizationRule } from "./governor/rules.js";

// Manager
export { TaskLifecycleManager, ZOMBIE_ERROR } from "./manager/lifecycle-manager.js";
export type { LifecycleManagerOptions, TaskSnapshot, OutputOptions } from "./manager/lifecycle-manager.js";
export { formatOutput, formatProgress, formatListLine } from "./manager/format.js";

// Persistence
export { TaskStore } from "./persistence/store.js";
export type { TaskPatch, ListFilter } from "./persistence/store.js";
export { OutputLog } from "./persistence/output-log.js";
export type { OutputSink } from "./persistence/output-log.js";

// Executors
export type { ExecutionRequest, ExecutionUnit, TaskExecutor } from "./executors/types.js";
export { FunctionExecutor } from "./executors/function-executor.js";
export type { TaskFunction, TaskFunctionContext, FunctionExecutorOptions } from "./executors/function-executor.js";
export { ProcessExecutor } from "./executors/process-executor.js";
export type { ProcessExecutorOptions, ProcessParams } from "./executors/process-executor.js";
export { OsProcessControl, parseHandle } from "./executors/process-control.js";
export type { ProcessControl, ParsedHandle } from "./executors/process-control.js";

// Core
export { Scheduler } from "./scheduler.js";
export type { SchedulerOptions, ScheduledTask, RunCallbacks, RunSummary, SchedulerStatus } from "./scheduler.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
