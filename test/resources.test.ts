import { getEventListeners } from "node:events";
import { describe, expect, it } from "vitest";
import { ResourceError } from "../src/errors.js";
import { Resources } from "../src/utils/resources.js";
import { flush } from "./harness.js";

describe("Resources", () => {
  it("grants requests that fit right away", async () => {
    const pool = new Resources({ cpu: 4, gpu: 1 });

    await pool.request({ cpu: 3 });

    expect(pool.available()).toEqual({ cpu: 1, gpu: 1 });
    expect(pool.used()).toEqual({ cpu: 3 });
    expect(pool.total()).toEqual({ cpu: 4, gpu: 1 });
  });

  it("makes a request wait until enough is given back", async () => {
    const pool = new Resources({ cpu: 2 });
    await pool.request({ cpu: 2 });
    let granted = false;

    const waiting = pool.request({ cpu: 1 }).then(() => {
      granted = true;
    });
    await flush();
    expect(granted).toBe(false);

    pool.giveBack({ cpu: 1 });
    await waiting;

    expect(granted).toBe(true);
    expect(pool.available()).toEqual({});
  });

  it("lets a smaller later request past one that does not fit", async () => {
    const pool = new Resources({ cpu: 3 });
    await pool.request({ cpu: 2 });
    const order: string[] = [];

    const big = pool.request({ cpu: 3 }).then(() => order.push("big"));
    const small = pool.request({ cpu: 1 }).then(() => order.push("small"));
    await small;

    expect(order).toEqual(["small"]);

    pool.giveBack({ cpu: 3 });
    await big;
    expect(order).toEqual(["small", "big"]);
  });

  it("grants waiters in arrival order", async () => {
    const pool = new Resources({ slot: 1 });
    await pool.request({ slot: 1 });
    const order: number[] = [];

    const all = [1, 2, 3].map((n) =>
      pool.request({ slot: 1 }).then(() => {
        order.push(n);
        pool.giveBack({ slot: 1 });
      }),
    );
    pool.giveBack({ slot: 1 });
    await Promise.all(all);

    expect(order).toEqual([1, 2, 3]);
  });

  it("rejects a request larger than the whole pool", async () => {
    const pool = new Resources({ cpu: 2 });

    const err: unknown = await pool.request({ cpu: 3 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ResourceError);
    if (err instanceof ResourceError) {
      expect(err.code).toBe("RESOURCE_UNSATISFIABLE");
      expect(err.message).toBe('Requested {"cpu":3} exceeds the total {"cpu":2}');
    }
  });

  it("rejects a request for a resource the pool lacks", async () => {
    const pool = new Resources({ cpu: 2 });

    await expect(pool.request({ gpu: 1 })).rejects.toThrow(ResourceError);
  });

  it("rejects invalid counts", () => {
    expect(() => new Resources({ cpu: -1 })).toThrow("Invalid resource counts");
    expect(() => new Resources({ cpu: 1.5 })).toThrow(ResourceError);
  });

  it("drops a waiter whose signal aborts", async () => {
    const pool = new Resources({ cpu: 1 });
    await pool.request({ cpu: 1 });
    const controller = new AbortController();

    const waiting = pool.request({ cpu: 1 }, controller.signal);
    controller.abort(new Error("gave up"));

    await expect(waiting).rejects.toThrow("gave up");
    pool.giveBack({ cpu: 1 });
    expect(pool.available()).toEqual({ cpu: 1 });
  });

  it("detaches from the signal once a waiter is granted", async () => {
    const pool = new Resources({ slot: 1 });
    await pool.request({ slot: 1 });
    const controller = new AbortController();

    const waits = Array.from({ length: 20 }, () =>
      pool.request({ slot: 1 }, controller.signal).then(() => pool.giveBack({ slot: 1 })),
    );
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(20);

    pool.giveBack({ slot: 1 });
    await Promise.all(waits);

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
    expect(pool.available()).toEqual({ slot: 1 });
  });

  it("rejects at once on an aborted signal", async () => {
    const pool = new Resources({ cpu: 1 });

    await expect(pool.request({ cpu: 1 }, AbortSignal.abort(new Error("stop")))).rejects.toThrow("stop");
    expect(pool.available()).toEqual({ cpu: 1 });
  });

  it("refuses to take back more than is in use", () => {
    const pool = new Resources({ cpu: 2 });

    let err: unknown;
    try {
      pool.giveBack({ cpu: 1 });
    } catch (e) {
      err = e;
    }

    expect(err).toBeInstanceOf(ResourceError);
    if (err instanceof ResourceError) expect(err.code).toBe("RESOURCE_NOT_IN_USE");
  });

  it("serves waiters from resources added later", async () => {
    const pool = new Resources({ disk: 1 });
    await pool.request({ disk: 1 });

    const waiting = pool.allocate({ disk: 1 });
    pool.add({ disk: 1 });
    const allocation = await waiting;

    expect(allocation.acquired()).toEqual({ disk: 1 });
    expect(pool.used()).toEqual({ disk: 2 });
    expect(pool.total()).toEqual({ disk: 2 });
  });
});

describe("Allocation", () => {
  it("releases part of what it holds", async () => {
    const pool = new Resources({ cpu: 4 });
    const allocation = await pool.allocate({ cpu: 3 });

    allocation.release({ cpu: 1 });

    expect(allocation.acquired()).toEqual({ cpu: 2 });
    expect(pool.available()).toEqual({ cpu: 2 });
  });

  it("requests more on top of its holding", async () => {
    const pool = new Resources({ cpu: 4, gpu: 1 });
    const allocation = await pool.allocate({ cpu: 1 });

    await allocation.request({ cpu: 1, gpu: 1 });

    expect(allocation.acquired()).toEqual({ cpu: 2, gpu: 1 });
    allocation.releaseAll();
    expect(pool.available()).toEqual({ cpu: 4, gpu: 1 });
    expect(allocation.acquired()).toEqual({});
  });

  it("refuses to release more than it holds", async () => {
    const pool = new Resources({ cpu: 4 });
    const allocation = await pool.allocate({ cpu: 1 });

    expect(() => allocation.release({ cpu: 2 })).toThrow('Releasing {"cpu":2} but the allocation holds {"cpu":1}');
    expect(pool.used()).toEqual({ cpu: 1 });
  });

  it("returns everything when the scoped body throws", async () => {
    const pool = new Resources({ cpu: 2 });

    await expect(
      pool.withAllocation({ cpu: 2 }, async () => {
        throw new Error("body failed");
      }),
    ).rejects.toThrow("body failed");

    expect(pool.available()).toEqual({ cpu: 2 });
    expect(pool.used()).toEqual({});
  });

  it("hands the allocation to the scoped body", async () => {
    const pool = new Resources({ cpu: 2 });

    const held = await pool.withAllocation({ cpu: 1 }, async (allocation) => allocation.acquired());

    expect(held).toEqual({ cpu: 1 });
    expect(pool.available()).toEqual({ cpu: 2 });
  });
});
