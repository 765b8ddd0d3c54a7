import { z } from "zod";
import { BundleError } from "../errors.js";
import { parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import { Bundle, bundles } from "./bundle.js";
import type { BundleFields } from "./bundle.js";
import { isTargetBundle, MemoryTarget, NO_TARGET } from "./target.js";
import type { TargetBundle } from "./target.js";
import type { ForwardedOptions, Target, TaskLike } from "./types.js";

/**
 * Base class for tasks. A task is a value record over its declared fields
 * (see {@link Bundle}); override `requires`, `output` and `run` as needed.
 *
 * @example
 * class Upper extends Task<{ branch: string }> {
 *   readonly kind = "upper";
 *   requires() { return [new Head({ branch: this.fields.branch })]; }
 *   output() { return new LocalTarget(`out/upper/${this.fields.branch}`); }
 *   async run([head]: readonly Target[]) { ... }
 * }
 */
export abstract class Task<F extends BundleFields = BundleFields> extends Bundle<F> implements TaskLike {
  requires(): readonly TaskLike[] | Promise<readonly TaskLike[]> {
    return [];
  }

  output(): Target {
    return NO_TARGET;
  }

  /** Whether the work is already done. Defaults to the output existing. */
  done(): boolean | Promise<boolean> {
    return this.output().exists();
  }

  run(_inputs: readonly Target[], _options: ForwardedOptions, _signal: AbortSignal): void | Promise<void> {}
}

/** Input produced outside the pipeline. Done whenever its target exists. */
export class ExternalTask extends Task<{ target: TargetBundle }> {
  readonly kind = "external";

  constructor(target: TargetBundle) {
    super({ target });
  }

  output(): TargetBundle {
    return this.fields.target;
  }

  run(): void {
    log.warn(`External input ${this.fields.target.toString()} is missing; nothing can produce it`);
  }
}

/**
 * Task whose result lives in memory for the length of a run. The slot is
 * not part of the task's identity, and cleanup frees it once every
 * dependent has finished.
 */
export abstract class MemoryTask<T, F extends BundleFields = BundleFields> extends Task<F> {
  readonly mem = new MemoryTarget<T>();

  output(): MemoryTarget<T> {
    return this.mem;
  }

  get(): T {
    return this.mem.get();
  }

  set(value: T): void {
    this.mem.set(value);
  }

  cleanup(_options: ForwardedOptions, _signal: AbortSignal): void | Promise<void> {
    if (this.mem.isSet()) this.mem.delete();
  }
}

const ExternalTaskFieldsSchema = z.object({
  target: z.custom<TargetBundle>(isTargetBundle, "expected a serialized target"),
});

bundles.register("external", (fields) => {
  const parsed = parseOrThrow(
    ExternalTaskFieldsSchema,
    fields,
    (message) => new BundleError("INVALID_BUNDLE", `Invalid external task: ${message}`),
  );
  return new ExternalTask(parsed.target);
});
