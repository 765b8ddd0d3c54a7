import { ResourceError } from "../errors.js";
import { parseOrThrow, ResourceCountsSchema } from "../schemas.js";
import { log } from "./logger.js";

export type ResourceCounts = Readonly<Record<string, number>>;

type Waiter = {
  counts: ResourceCounts;
  resolve: () => void;
};

function parseCounts(counts: unknown): ResourceCounts {
  return parseOrThrow(
    ResourceCountsSchema,
    counts,
    (message) => new ResourceError("INVALID_RESOURCES", `Invalid resource counts: ${message}`),
  );
}

function fits(wanted: ResourceCounts, pool: Map<string, number>): boolean {
  return Object.entries(wanted).every(([name, n]) => n <= (pool.get(name) ?? 0));
}

function adjust(pool: Map<string, number>, counts: ResourceCounts, sign: 1 | -1): void {
  for (const [name, n] of Object.entries(counts)) {
    const next = (pool.get(name) ?? 0) + sign * n;
    if (next === 0) pool.delete(name);
    else pool.set(name, next);
  }
}

function snapshot(pool: Map<string, number>): Record<string, number> {
  return Object.fromEntries(pool);
}

/**
 * Counted pool of named resources (`{ gpu: 8, upload: 2 }`). Tasks receive
 * it through the forwarded options and hold an allocation while doing heavy
 * work; it never talks to an executor, it only makes tasks wait.
 *
 * Waiters are granted in arrival order, but one that does not fit yet does
 * not hold back later, smaller requests.
 */
export class Resources {
  private free = new Map<string, number>();
  private inUse = new Map<string, number>();
  private waiters: Waiter[] = [];

  constructor(counts: ResourceCounts = {}) {
    adjust(this.free, parseCounts(counts), 1);
  }

  available(): Record<string, number> {
    return snapshot(this.free);
  }

  used(): Record<string, number> {
    return snapshot(this.inUse);
  }

  total(): Record<string, number> {
    const all = new Map(this.free);
    adjust(all, snapshot(this.inUse), 1);
    return snapshot(all);
  }

  /**
   * Wait until `counts` can be taken, then take them. Rejects at once when
   * the pool could never satisfy the request, or when `signal` aborts first.
   */
  async request(counts: ResourceCounts, signal?: AbortSignal): Promise<ResourceCounts> {
    const wanted = parseCounts(counts);
    const total = new Map(Object.entries(this.total()));
    if (!fits(wanted, total)) {
      throw new ResourceError(
        "RESOURCE_UNSATISFIABLE",
        `Requested ${JSON.stringify(wanted)} exceeds the total ${JSON.stringify(this.total())}`,
        { wanted, total: this.total() },
      );
    }
    signal?.throwIfAborted();

    if (fits(wanted, this.free)) {
      this.take(wanted);
      return wanted;
    }

    log.debug("Resource request queued", { wanted, available: this.available(), waiting: this.waiters.length + 1 });
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx === -1) return;
        this.waiters.splice(idx, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        counts: wanted,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
    return wanted;
  }

  /** Return resources taken with `request`. */
  giveBack(counts: ResourceCounts): void {
    const returned = parseCounts(counts);
    if (!fits(returned, this.inUse)) {
      throw new ResourceError(
        "RESOURCE_NOT_IN_USE",
        `Returning ${JSON.stringify(returned)} but only ${JSON.stringify(this.used())} is in use`,
        { returned, used: this.used() },
      );
    }
    adjust(this.inUse, returned, -1);
    adjust(this.free, returned, 1);
    this.grant();
  }

  /** Grow the pool. */
  add(counts: ResourceCounts): void {
    adjust(this.free, parseCounts(counts), 1);
    this.grant();
  }

  async allocate(counts: ResourceCounts, signal?: AbortSignal): Promise<Allocation> {
    const taken = await this.request(counts, signal);
    return new Allocation(this, taken);
  }

  /** Hold `counts` while `fn` runs; everything still held is returned when it settles. */
  async withAllocation<R>(
    counts: ResourceCounts,
    fn: (allocation: Allocation) => Promise<R>,
    signal?: AbortSignal,
  ): Promise<R> {
    const allocation = await this.allocate(counts, signal);
    try {
      return await fn(allocation);
    } finally {
      allocation.releaseAll();
    }
  }

  private take(counts: ResourceCounts): void {
    adjust(this.free, counts, -1);
    adjust(this.inUse, counts, 1);
  }

  private grant(): void {
    const still: Waiter[] = [];
    for (const waiter of this.waiters) {
      if (fits(waiter.counts, this.free)) {
        this.take(waiter.counts);
        waiter.resolve();
      } else {
        still.push(waiter);
      }
    }
    this.waiters = still;
  }
}

/** Resources held by one holder; parts may be released early or more requested. */
export class Allocation {
  private held = new Map<string, number>();

  constructor(
    private readonly supply: Resources,
    acquired: ResourceCounts,
  ) {
    adjust(this.held, acquired, 1);
  }

  acquired(): Record<string, number> {
    return snapshot(this.held);
  }

  /** Take more from the pool. Two holders doing this for the same resource can deadlock. */
  async request(counts: ResourceCounts, signal?: AbortSignal): Promise<void> {
    const taken = await this.supply.request(counts, signal);
    adjust(this.held, taken, 1);
  }

  release(counts: ResourceCounts): void {
    const part = parseCounts(counts);
    if (!fits(part, this.held)) {
      throw new ResourceError(
        "RESOURCE_NOT_IN_USE",
        `Releasing ${JSON.stringify(part)} but the allocation holds ${JSON.stringify(this.acquired())}`,
      );
    }
    adjust(this.held, part, -1);
    this.supply.giveBack(part);
  }

  releaseAll(): void {
    const all = this.acquired();
    this.held.clear();
    this.supply.giveBack(all);
  }
}
