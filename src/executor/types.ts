import type { TaskNode } from "../planner/types.js";

export type ExecuteOptions = {
  /** Aborting cancels in-flight runs and cleanups and stops anything new from starting. */
  signal?: AbortSignal;
  onNodeStart?: (node: TaskNode) => void;
  onNodeEnd?: (node: TaskNode) => void;
  onCleanupEnd?: (node: TaskNode) => void;
};

export type SchedulerOptions = {
  /** Log the end-of-run summary. Defaults to `scheduler.logSummary` from the config. */
  logSummary?: boolean;
};
