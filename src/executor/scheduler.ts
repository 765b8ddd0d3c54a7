import { getConfig } from "../config.js";
import { CleanupFailure, FailedDependency, SchedulerError, TaskExecutionFailure } from "../errors.js";
import { mkDag } from "../planner/task-graph.js";
import { isTerminal } from "../planner/types.js";
import type { Dag, TaskNode } from "../planner/types.js";
import type { ForwardedOptions, TaskLike } from "../task/types.js";
import { log } from "../utils/logger.js";
import { logReport, RunReport } from "./report.js";
import type { ExecuteOptions, SchedulerOptions } from "./types.js";

const schedLog = log.child("scheduler");

type Completion =
  | { kind: "run"; node: TaskNode; ok: true }
  | { kind: "run"; node: TaskNode; ok: false; error: unknown }
  | { kind: "cleanup"; node: TaskNode; ok: true }
  | { kind: "cleanup"; node: TaskNode; ok: false; error: unknown };

/**
 * State of one `execute` call. Only `drive` and the handlers it calls between
 * awaits touch node status and counters; runs and cleanups report back by
 * queueing a completion and waking the loop.
 */
class Execution {
  private readonly completions: Completion[] = [];
  private readonly unresolved = new Map<TaskNode, number>();
  private readonly controller = new AbortController();
  private outstanding = 0;
  private wake?: () => void;

  constructor(
    private readonly dag: Dag,
    private readonly forwarded: ForwardedOptions,
    private readonly opts: ExecuteOptions,
  ) {}

  async drive(): Promise<boolean> {
    const external = this.opts.signal;
    const signal = this.controller.signal;
    const onAbort = () => this.controller.abort(external?.reason);
    const onCancel = () => this.wake?.();
    if (external?.aborted) this.controller.abort(external.reason);
    external?.addEventListener("abort", onAbort, { once: true });
    signal.addEventListener("abort", onCancel, { once: true });

    try {
      for (const node of this.dag.order) {
        this.unresolved.set(node, node.dependencies.length);
      }
      for (const node of this.dag.order) {
        if (node.status === "already-done") this.settle(node);
      }
      for (const node of this.dag.order) {
        if (node.status === "pending" && this.unresolved.get(node) === 0) this.launch(node);
      }

      while (this.outstanding > 0 && !signal.aborted) {
        const next = this.completions.shift() ?? (await this.nextCompletion());
        if (next === undefined || signal.aborted) break;
        this.outstanding -= 1;
        if (next.kind === "run") this.finishRun(next);
        else this.finishCleanup(next);
      }
    } finally {
      external?.removeEventListener("abort", onAbort);
      signal.removeEventListener("abort", onCancel);
    }

    const cancelled = signal.aborted;
    if (!cancelled) {
      const stuck = this.dag.order.filter((n) => !isTerminal(n.status));
      if (stuck.length > 0) {
        throw new SchedulerError("Run drained with non-terminal nodes", { nodes: stuck.map((n) => n.key) });
      }
    }
    return cancelled;
  }

  /** Resolves with the next queued completion, or undefined when woken by cancellation. */
  private nextCompletion(): Promise<Completion | undefined> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = undefined;
        resolve(this.completions.shift());
      };
    });
  }

  private dispatch(work: Promise<Completion>): void {
    this.outstanding += 1;
    void work.then((completion) => {
      this.completions.push(completion);
      this.wake?.();
    });
  }

  /** Observer hooks never affect the run; a throwing hook is logged and ignored. */
  private notify(hook: "onNodeStart" | "onNodeEnd" | "onCleanupEnd", node: TaskNode): void {
    try {
      this.opts[hook]?.(node);
    } catch (err) {
      schedLog.error(`${hook} hook threw for ${node.key}: ${err instanceof Error ? err.message : String(err)}`, {
        task: node.key,
      });
    }
  }

  private launch(node: TaskNode): void {
    if (this.controller.signal.aborted) return;
    node.status = "running";
    this.notify("onNodeStart", node);
    schedLog.info(`Run ${node.key} entered`);

    const signal = this.controller.signal;
    this.dispatch(
      (async (): Promise<Completion> => {
        try {
          const inputs = node.dependencies.map((dep) => dep.task.output());
          await node.task.run(inputs, this.forwarded, signal);
          return { kind: "run", node, ok: true };
        } catch (error) {
          return { kind: "run", node, ok: false, error };
        }
      })(),
    );
  }

  private launchCleanup(node: TaskNode): void {
    const task = node.task;
    if (this.controller.signal.aborted || !task.cleanup) return;
    if (node.dependents.size === 0 && getConfig().scheduler.warnOnRootCleanup) {
      schedLog.warn(`Cleaning up ${node.key}, which no task in the graph depends on`);
    }
    node.cleanup = "running";
    schedLog.debug(`Cleanup ${node.key} entered`);

    const signal = this.controller.signal;
    this.dispatch(
      (async (): Promise<Completion> => {
        try {
          await task.cleanup?.(this.forwarded, signal);
          return { kind: "cleanup", node, ok: true };
        } catch (error) {
          return { kind: "cleanup", node, ok: false, error };
        }
      })(),
    );
  }

  private finishRun(done: Extract<Completion, { kind: "run" }>): void {
    const { node } = done;
    if (done.ok) {
      node.status = "succeeded";
      schedLog.info(`Run ${node.key} done`);
    } else {
      node.status = "failed";
      node.error = new TaskExecutionFailure(node.key, done.error);
      schedLog.error(node.error.message, { task: node.key });
    }
    this.notify("onNodeEnd", node);
    this.settle(node);
  }

  private finishCleanup(done: Extract<Completion, { kind: "cleanup" }>): void {
    const { node } = done;
    if (done.ok) {
      node.cleanup = "done";
      schedLog.debug(`Cleanup ${node.key} done`);
    } else {
      node.cleanup = "failed";
      node.cleanupError = new CleanupFailure(node.key, done.error);
      schedLog.error(node.cleanupError.message, { task: node.key });
    }
    this.notify("onCleanupEnd", node);
  }

  /** `node` just became terminal: release or skip its dependents, then do cleanup accounting. */
  private settle(node: TaskNode): void {
    if (node.status === "succeeded" || node.status === "already-done") {
      for (const dependent of node.dependents) {
        const left = (this.unresolved.get(dependent) ?? 0) - 1;
        this.unresolved.set(dependent, left);
        if (left === 0 && dependent.status === "pending") this.launch(dependent);
      }
    } else {
      const origin = node.error instanceof FailedDependency ? node.error.origin : node.error;
      if (!origin) {
        throw new SchedulerError(`Node ${node.key} is ${node.status} without a cause`);
      }
      for (const dependent of node.dependents) {
        if (dependent.status !== "pending") continue;
        dependent.status = "skipped";
        dependent.error = new FailedDependency(dependent.key, origin);
        schedLog.warn(dependent.error.message, { task: dependent.key });
        this.notify("onNodeEnd", dependent);
        this.settle(dependent);
      }
    }

    for (const dep of node.dependencies) {
      dep.pendingDependents -= 1;
      this.maybeCleanup(dep);
    }
    this.maybeCleanup(node);
  }

  private maybeCleanup(node: TaskNode): void {
    if (node.cleanup !== "waiting" || node.pendingDependents > 0 || !isTerminal(node.status)) return;
    this.launchCleanup(node);
  }
}

/**
 * Drives a DAG to completion. Every node whose dependencies all succeeded (or
 * were already done) starts at once; there is no concurrency limit, throttle
 * through whatever is passed in the forwarded options.
 */
export class Scheduler {
  private readonly logSummary?: boolean;

  constructor(opts: SchedulerOptions = {}) {
    this.logSummary = opts.logSummary;
  }

  /**
   * Run every node of `dag`, handing `forwarded` to each run and cleanup.
   * Task failures end up in the report; this rejects only on an internal
   * invariant violation, including a DAG that was already executed.
   */
  async execute(dag: Dag, forwarded: ForwardedOptions = {}, opts: ExecuteOptions = {}): Promise<RunReport> {
    const used = dag.order.find((n) => (n.status !== "pending" && n.status !== "already-done") || (n.cleanup !== "none" && n.cleanup !== "waiting"));
    if (used) {
      throw new SchedulerError(`DAG was already executed (node ${used.key} is ${used.status})`);
    }

    const start = Date.now();
    schedLog.info("Scheduler started", { nodes: dag.order.length });
    const cancelled = await new Execution(dag, forwarded, opts).drive();
    const report = new RunReport(dag.order, { cancelled, durationMs: Date.now() - start });

    if (this.logSummary ?? getConfig().scheduler.logSummary) {
      logReport(report, schedLog);
    }
    return report;
  }
}

/** Build the DAG for `roots` and execute it with a default scheduler. */
export async function runTasks(
  roots: readonly TaskLike[],
  forwarded: ForwardedOptions = {},
  opts: ExecuteOptions = {},
): Promise<RunReport> {
  const dag = await mkDag(...roots);
  return new Scheduler().execute(dag, forwarded, opts);
}
