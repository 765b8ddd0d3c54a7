export type ErrorCode =
  | "CYCLIC_DEPENDENCY"
  | "DISCOVERY_FAILED"
  | "TASK_FAILED"
  | "FAILED_DEPENDENCY"
  | "CLEANUP_FAILED"
  | "INVALID_CONFIG"
  | "INVALID_BUNDLE"
  | "UNKNOWN_BUNDLE_KIND"
  | "TARGET_ALREADY_SET"
  | "TARGET_NOT_SET"
  | "RESOURCE_UNSATISFIABLE"
  | "RESOURCE_NOT_IN_USE"
  | "INVALID_RESOURCES"
  | "SCHEDULER_INVARIANT";

type DagErrorOptions = {
  cause?: unknown;
  context?: Record<string, unknown>;
};

/** Base class for every error this package raises. */
export class DagError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, opts: DagErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "DagError";
    this.code = code;
    this.context = opts.context;
  }
}

export function isDagError(value: unknown): value is DagError {
  return value instanceof DagError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// ---------------------------------------------------------------------------
// Graph construction
// ---------------------------------------------------------------------------

/** The active discovery chain revisited a task. `chain` starts and ends at that task. */
export class CyclicDependencyError extends DagError {
  readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super("CYCLIC_DEPENDENCY", `Cyclic dependency: ${chain.join(" -> ")}`, {
      context: { chain },
    });
    this.name = "CyclicDependencyError";
    this.chain = chain;
  }
}

/** `done()` or `requires()` of a task threw while the graph was being discovered. */
export class DiscoveryError extends DagError {
  readonly taskKey: string;
  readonly phase: "done" | "requires";

  constructor(taskKey: string, phase: "done" | "requires", cause: unknown) {
    super("DISCOVERY_FAILED", `Discovery of ${taskKey} failed in ${phase}(): ${describeCause(cause)}`, {
      cause,
      context: { taskKey, phase },
    });
    this.name = "DiscoveryError";
    this.taskKey = taskKey;
    this.phase = phase;
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** Raised by a task's run entry point. Recorded on the node, never aborts the run. */
export class TaskExecutionFailure extends DagError {
  readonly taskKey: string;

  constructor(taskKey: string, cause: unknown) {
    super("TASK_FAILED", `Task ${taskKey} failed: ${describeCause(cause)}`, {
      cause,
      context: { taskKey },
    });
    this.name = "TaskExecutionFailure";
    this.taskKey = taskKey;
  }
}

/** Attached to every transitive dependent of a failed task. */
export class FailedDependency extends DagError {
  readonly taskKey: string;
  readonly origin: TaskExecutionFailure;

  constructor(taskKey: string, origin: TaskExecutionFailure) {
    super("FAILED_DEPENDENCY", `Task ${taskKey} skipped: upstream ${origin.taskKey} failed`, {
      cause: origin,
      context: { taskKey, origin: origin.taskKey },
    });
    this.name = "FailedDependency";
    this.taskKey = taskKey;
    this.origin = origin;
  }
}

export class CleanupFailure extends DagError {
  readonly taskKey: string;

  constructor(taskKey: string, cause: unknown) {
    super("CLEANUP_FAILED", `Cleanup of ${taskKey} failed: ${describeCause(cause)}`, {
      cause,
      context: { taskKey },
    });
    this.name = "CleanupFailure";
    this.taskKey = taskKey;
  }
}

export class SchedulerError extends DagError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("SCHEDULER_INVARIANT", message, { context });
    this.name = "SchedulerError";
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export class ConfigError extends DagError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, { context });
    this.name = "ConfigError";
  }
}

export class BundleError extends DagError {
  constructor(code: "INVALID_BUNDLE" | "UNKNOWN_BUNDLE_KIND", message: string, context?: Record<string, unknown>) {
    super(code, message, { context });
    this.name = "BundleError";
  }
}

export class TargetError extends DagError {
  constructor(code: "TARGET_ALREADY_SET" | "TARGET_NOT_SET", message: string) {
    super(code, message);
    this.name = "TargetError";
  }
}

export class ResourceError extends DagError {
  constructor(code: "RESOURCE_UNSATISFIABLE" | "RESOURCE_NOT_IN_USE" | "INVALID_RESOURCES", message: string, context?: Record<string, unknown>) {
    super(code, message, { context });
    this.name = "ResourceError";
  }
}
