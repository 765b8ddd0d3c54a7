/** An addressable artifact. The scheduler only ever asks whether it exists. */
export interface Target {
  exists(): boolean | Promise<boolean>;
}

/**
 * Named options handed unchanged from `Scheduler.execute` to every `run` and
 * `cleanup` call: executor clients, resource pools, credentials.
 */
export type ForwardedOptions = Readonly<Record<string, unknown>>;

/** Capability set the graph builder and scheduler consume. */
export interface TaskLike {
  /** Stable identity; equal tasks must share it. */
  readonly key: string;
  requires(): readonly TaskLike[] | Promise<readonly TaskLike[]>;
  output(): Target;
  done(): boolean | Promise<boolean>;
  /**
   * Produce the output. `inputs` are the outputs of the required tasks, in
   * `requires()` order.
   */
  run(inputs: readonly Target[], options: ForwardedOptions, signal: AbortSignal): void | Promise<void>;
  /** Release the output once nothing in the graph needs it any more. */
  cleanup?(options: ForwardedOptions, signal: AbortSignal): void | Promise<void>;
}
