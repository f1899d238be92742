import { describe, expect, it } from "vitest";
import { runPool } from "../../src/worker-pool.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function* generate(items: number[]): AsyncGenerator<number> {
  for (const item of items) {
    yield item;
  }
}

describe("runPool", () => {
  it("never runs more workers than the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runPool([1, 2, 3, 4, 5, 6], 2, async (item) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight -= 1;
      return item * 2;
    });

    expect(peak).toBe(2);
    expect([...results].sort((left, right) => left - right)).toEqual([2, 4, 6, 8, 10, 12]);
  });

  it("delivers results in completion order", async () => {
    const delivered: string[] = [];

    const results = await runPool(
      generate([1, 2]),
      2,
      async (item) => {
        await sleep(item === 1 ? 30 : 0);
        return `issue-${item}`;
      },
      (result) => delivered.push(result)
    );

    expect(results).toEqual(["issue-2", "issue-1"]);
    expect(delivered).toEqual(["issue-2", "issue-1"]);
  });

  it("stops taking items after the first failure", async () => {
    const started: number[] = [];

    await expect(
      runPool(generate([1, 2, 3, 4, 5]), 1, async (item) => {
        started.push(item);
        if (item === 3) {
          throw new Error("issue 3 failed");
        }
        return item;
      })
    ).rejects.toThrow("issue 3 failed");

    expect(started).toEqual([1, 2, 3]);
  });

  it("closes the source after a failure", async () => {
    let closed = false;

    async function* tracked(): AsyncGenerator<number> {
      try {
        yield* [1, 2, 3, 4];
      } finally {
        closed = true;
      }
    }

    await expect(
      runPool(tracked(), 1, async (item) => {
        if (item === 2) {
          throw new Error("issue 2 failed");
        }
        return item;
      })
    ).rejects.toThrow("issue 2 failed");

    expect(closed).toBe(true);
  });

  it("closes an iterable source after a failure", async () => {
    let closed = false;

    function* tracked(): Generator<number> {
      try {
        yield* [1, 2, 3];
      } finally {
        closed = true;
      }
    }

    await expect(
      runPool(tracked(), 1, async () => {
        throw new Error("issue 1 failed");
      })
    ).rejects.toThrow("issue 1 failed");

    expect(closed).toBe(true);
  });

  it("drops results that settle after a failure", async () => {
    const delivered: number[] = [];

    await expect(
      runPool(
        [1, 2],
        2,
        async (item) => {
          if (item === 1) {
            throw new Error("issue 1 failed");
          }
          await sleep(20);
          return item;
        },
        (result) => delivered.push(result)
      )
    ).rejects.toThrow("issue 1 failed");

    await sleep(40);
    expect(delivered).toEqual([]);
  });

  it("propagates a failing source", async () => {
    async function* broken(): AsyncGenerator<number> {
      yield 1;
      throw new Error("search failed");
    }

    await expect(runPool(broken(), 3, async (item) => item)).rejects.toThrow("search failed");
  });

  it("returns an empty list for an empty source", async () => {
    await expect(runPool([], 4, async (item: number) => item)).resolves.toEqual([]);
  });

  it("rejects a concurrency below one", async () => {
    await expect(runPool([1], 0, async (item) => item)).rejects.toThrow(
      "Concurrency must be a positive integer, got 0."
    );
  });
});
