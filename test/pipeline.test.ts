import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Scheduler } from "../src/executor/scheduler.js";
import { mkDag } from "../src/planner/task-graph.js";
import { LocalTarget, MemoryTarget } from "../src/task/target.js";
import { ExternalTask, MemoryTask, Task } from "../src/task/task.js";
import type { ForwardedOptions, Target } from "../src/task/types.js";
import { resetLogSink, setLogSink } from "../src/utils/logger.js";
import { Resources } from "../src/utils/resources.js";

let dir = "";
const scheduler = new Scheduler({ logSummary: false });
let upperRuns = 0;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "dagrun-pipeline-"));
  upperRuns = 0;
  setLogSink(() => {});
});

afterEach(async () => {
  resetLogSink();
  await rm(dir, { recursive: true, force: true });
});

class Upper extends Task<{ root: string; name: string }> {
  readonly kind = "upper";

  requires(): ExternalTask[] {
    return [new ExternalTask(new LocalTarget(join(this.fields.root, "raw", this.fields.name)))];
  }

  output(): LocalTarget {
    return new LocalTarget(join(this.fields.root, "upper", this.fields.name));
  }

  async run([raw]: readonly Target[]): Promise<void> {
    upperRuns++;
    if (!(raw instanceof LocalTarget)) throw new Error("expected a local input");
    const text = await raw.read();
    await this.output().write(text.toUpperCase());
  }
}

class Numbers extends MemoryTask<number[]> {
  readonly kind = "numbers";
  static loads = 0;

  constructor() {
    super({});
  }

  run(): void {
    Numbers.loads++;
    this.set([10, 20, 30, 40]);
  }
}

class Pick extends Task<{ ix: number }> {
  readonly kind = "pick";
  static picked: number[] = [];

  requires(): Numbers[] {
    return [new Numbers()];
  }

  run([mem]: readonly Target[]): void {
    if (!(mem instanceof MemoryTarget)) throw new Error("expected a memory input");
    const values: unknown = mem.get();
    if (Array.isArray(values)) Pick.picked.push(Number(values[this.fields.ix]));
  }
}

describe("file pipeline", () => {
  it("writes outputs and skips them on the next run", async () => {
    const rawDir = join(dir, "raw");
    await new LocalTarget(join(rawDir, "a.txt")).write("hello");

    const first = await scheduler.execute(await mkDag(new Upper({ root: dir, name: "a.txt" })));

    expect(first.success).toBe(true);
    expect(first.byStatus("already-done").map((o) => o.task.key)).toEqual([
      new ExternalTask(new LocalTarget(join(rawDir, "a.txt"))).key,
    ]);
    expect(await new LocalTarget(join(dir, "upper", "a.txt")).read()).toBe("HELLO");
    expect(await readdir(join(dir, "upper"))).toEqual(["a.txt"]);

    const second = await mkDag(new Upper({ root: dir, name: "a.txt" }));

    expect(second.order).toHaveLength(1);
    expect(second.order[0].status).toBe("already-done");
    expect(upperRuns).toBe(1);
  });

  it("fails the task whose external input is missing", async () => {
    const report = await scheduler.execute(await mkDag(new Upper({ root: dir, name: "missing.txt" })));

    const external = report.byStatus("succeeded");
    expect(external).toHaveLength(1);
    expect(external[0].task).toBeInstanceOf(ExternalTask);
    expect(report.status(new Upper({ root: dir, name: "missing.txt" }))).toBe("failed");
  });
});

describe("memory pipeline", () => {
  it("shares one in-memory result and frees it after the last reader", async () => {
    Numbers.loads = 0;
    Pick.picked = [];

    const dag = await mkDag(new Pick({ ix: 1 }), new Pick({ ix: 3 }));
    const numbers = dag.nodes.get(new Numbers().key)?.task;
    const report = await scheduler.execute(dag);

    expect(report.success).toBe(true);
    expect(Numbers.loads).toBe(1);
    expect([...Pick.picked].sort((a, b) => a - b)).toEqual([20, 40]);
    expect(numbers).toBeInstanceOf(Numbers);
    if (numbers instanceof Numbers) expect(numbers.mem.isSet()).toBe(false);
    expect(report.outcome(new Numbers())?.cleanup).toBe("done");
  });
});

describe("throttling through forwarded resources", () => {
  class Heavy extends Task<{ id: number }> {
    readonly kind = "heavy";
    static active = 0;
    static peak = 0;

    async run(_inputs: readonly Target[], options: ForwardedOptions): Promise<void> {
      const resources = options.resources;
      if (!(resources instanceof Resources)) throw new Error("resources not forwarded");
      await resources.withAllocation({ slot: 1 }, async () => {
        Heavy.active++;
        Heavy.peak = Math.max(Heavy.peak, Heavy.active);
        await new Promise((r) => setTimeout(r, 10));
        Heavy.active--;
      });
    }
  }

  it("never runs more tasks than the pool allows", async () => {
    const resources = new Resources({ slot: 2 });
    const roots = [1, 2, 3, 4, 5].map((id) => new Heavy({ id }));

    const report = await scheduler.execute(await mkDag(...roots), { resources });

    expect(report.success).toBe(true);
    expect(Heavy.peak).toBe(2);
    expect(resources.available()).toEqual({ slot: 2 });
  });
});
