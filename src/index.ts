// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { DagrunConfig } from "./config.js";

// Errors
export {
  DagError,
  isDagError,
  CyclicDependencyError,
  DiscoveryError,
  TaskExecutionFailure,
  FailedDependency,
  CleanupFailure,
  SchedulerError,
  ConfigError,
  BundleError,
  TargetError,
  ResourceError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, ConfigOverridesSchema, BundleEnvelopeSchema, ResourceCountsSchema } from "./schemas.js";
export type { ConfigOverrides } from "./schemas.js";

// Tasks and targets
export type { Target, TaskLike, ForwardedOptions } from "./task/types.js";
export { Bundle, BundleRegistry, bundles } from "./task/bundle.js";
export type { BundleEnvelope, BundleFactory, BundleFields, FieldValue } from "./task/bundle.js";
export { NoTarget, NO_TARGET, MemoryTarget, LocalTarget, isTargetBundle } from "./task/target.js";
export type { LocalTargetFields, TargetBundle } from "./task/target.js";
export { Task, ExternalTask, MemoryTask } from "./task/task.js";

// Graph
export { mkDag, topologicalSort, describeDag } from "./planner/task-graph.js";
export { isTerminal } from "./planner/types.js";
export type { Dag, TaskNode, NodeStatus, CleanupState } from "./planner/types.js";

// Execution
export { Scheduler, runTasks } from "./executor/scheduler.js";
export { RunReport } from "./executor/report.js";
export type { NodeOutcome, RunSummary } from "./executor/report.js";
export type { ExecuteOptions, SchedulerOptions } from "./executor/types.js";

// Utils
export { log, setLogLevel, getLogLevel, setLogSink, resetLogSink } from "./utils/logger.js";
export type { Logger, LogLevel, LogSink } from "./utils/logger.js";
export { Resources, Allocation } from "./utils/resources.js";
export type { ResourceCounts } from "./utils/resources.js";
