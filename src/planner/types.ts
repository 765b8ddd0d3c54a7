import type { CleanupFailure, FailedDependency, TaskExecutionFailure } from "../errors.js";
import type { TaskLike } from "../task/types.js";

export type NodeStatus = "pending" | "already-done" | "running" | "succeeded" | "failed" | "skipped";

/** `none` when the task has no cleanup capability. */
export type CleanupState = "none" | "waiting" | "running" | "done" | "failed";

export type TaskNode = {
  readonly key: string;
  readonly task: TaskLike;
  /** Unique, in `requires()` order. */
  readonly dependencies: TaskNode[];
  readonly dependents: Set<TaskNode>;
  status: NodeStatus;
  /** Dependents that have not reached a terminal status yet. */
  pendingDependents: number;
  error?: TaskExecutionFailure | FailedDependency;
  cleanup: CleanupState;
  cleanupError?: CleanupFailure;
};

export type Dag = {
  readonly nodes: ReadonlyMap<string, TaskNode>;
  /** Every dependency precedes its dependents. */
  readonly order: readonly TaskNode[];
  /** Nodes of the requested root tasks, deduplicated. */
  readonly roots: readonly TaskNode[];
};

export function isTerminal(status: NodeStatus): boolean {
  return status === "already-done" || status === "succeeded" || status === "failed" || status === "skipped";
}
