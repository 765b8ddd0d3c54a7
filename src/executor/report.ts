import { TaskExecutionFailure } from "../errors.js";
import type { CleanupFailure, FailedDependency } from "../errors.js";
import { isTerminal } from "../planner/types.js";
import type { CleanupState, NodeStatus, TaskNode } from "../planner/types.js";
import type { TaskLike } from "../task/types.js";
import type { Logger } from "../utils/logger.js";

export type NodeOutcome = {
  key: string;
  task: TaskLike;
  status: NodeStatus;
  /** Set for `failed` and `skipped` nodes. */
  error?: TaskExecutionFailure | FailedDependency;
  cleanup: CleanupState;
  cleanupError?: CleanupFailure;
};

export type RunSummary = {
  total: number;
  alreadyDone: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Pending or running when the run was cancelled. */
  notCompleted: number;
  cleanups: number;
  cleanupFailures: number;
};

/** Per-task result of one scheduler run. */
export class RunReport {
  readonly outcomes: readonly NodeOutcome[];
  readonly cancelled: boolean;
  readonly durationMs: number;
  private byKey: Map<string, NodeOutcome>;

  constructor(nodes: readonly TaskNode[], info: { cancelled: boolean; durationMs: number }) {
    this.outcomes = nodes.map((node) => ({
      key: node.key,
      task: node.task,
      status: node.status,
      error: node.error,
      cleanup: node.cleanup,
      cleanupError: node.cleanupError,
    }));
    this.byKey = new Map(this.outcomes.map((o) => [o.key, o]));
    this.cancelled = info.cancelled;
    this.durationMs = info.durationMs;
  }

  /** Look up by task value or key. */
  outcome(task: TaskLike | string): NodeOutcome | undefined {
    return this.byKey.get(typeof task === "string" ? task : task.key);
  }

  status(task: TaskLike | string): NodeStatus | undefined {
    return this.outcome(task)?.status;
  }

  byStatus(status: NodeStatus): NodeOutcome[] {
    return this.outcomes.filter((o) => o.status === status);
  }

  /** Run errors of the failed tasks, skipped ones excluded. */
  failures(): TaskExecutionFailure[] {
    const out: TaskExecutionFailure[] = [];
    for (const o of this.outcomes) {
      if (o.status === "failed" && o.error instanceof TaskExecutionFailure) out.push(o.error);
    }
    return out;
  }

  /** Every node reached a terminal status and every cleanup finished. */
  get completed(): boolean {
    return this.outcomes.every(
      (o) => isTerminal(o.status) && (o.cleanup === "none" || o.cleanup === "done" || o.cleanup === "failed"),
    );
  }

  /** Completed with no failed or skipped task. Cleanup failures do not count. */
  get success(): boolean {
    return this.completed && this.outcomes.every((o) => o.status === "succeeded" || o.status === "already-done");
  }

  summary(): RunSummary {
    const count = (status: NodeStatus) => this.outcomes.filter((o) => o.status === status).length;
    return {
      total: this.outcomes.length,
      alreadyDone: count("already-done"),
      succeeded: count("succeeded"),
      failed: count("failed"),
      skipped: count("skipped"),
      notCompleted: count("pending") + count("running"),
      cleanups: this.outcomes.filter((o) => o.cleanup === "done").length,
      cleanupFailures: this.outcomes.filter((o) => o.cleanup === "failed").length,
    };
  }
}

export function logReport(report: RunReport, logger: Logger): void {
  for (const failure of report.failures()) {
    logger.error(failure.message, { task: failure.taskKey });
  }
  for (const o of report.outcomes) {
    if (o.cleanupError) logger.error(o.cleanupError.message, { task: o.key });
  }

  const summary = report.summary();
  const data = { ...summary, durationMs: report.durationMs };
  if (report.cancelled) {
    logger.warn("Run cancelled", data);
  } else if (report.success) {
    logger.info("All tasks succeeded", data);
  } else {
    logger.warn("There were failed tasks", data);
  }
}
