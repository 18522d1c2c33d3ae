import { describe, expect, it } from "vitest";

import { mapWithConcurrency } from "./pool";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("mapWithConcurrency", () => {
  it("keeps input order and never exceeds the worker count", async () => {
    let inFlight = 0;
    let peak = 0;
    const delays = [30, 5, 20, 1, 10];

    const { results, completed } = await mapWithConcurrency(
      delays,
      async (delay, index) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, delay));
        inFlight -= 1;
        return `item-${index}`;
      },
      { concurrency: 2 }
    );

    expect(results).toEqual(["item-0", "item-1", "item-2", "item-3", "item-4"]);
    expect(completed).toBe(5);
    expect(peak).toBe(2);
  });

  it("handles an empty input", async () => {
    const { results, completed } = await mapWithConcurrency([], async () => 1, { concurrency: 4 });
    expect(results).toEqual([]);
    expect(completed).toBe(0);
  });

  it("stops starting new items after an abort", async () => {
    const controller = new AbortController();
    const gate = deferred();
    const started: number[] = [];

    const run = mapWithConcurrency(
      [0, 1, 2, 3],
      async (item) => {
        started.push(item);
        if (item === 0) {
          controller.abort();
        }
        await gate.promise;
        return item * 10;
      },
      { concurrency: 1, signal: controller.signal }
    );
    gate.resolve();
    const { results, completed } = await run;

    expect(started).toEqual([0]);
    expect(results).toEqual([0, undefined, undefined, undefined]);
    expect(completed).toBe(1);
  });

  it("reports progress after each item", async () => {
    const progress: string[] = [];
    await mapWithConcurrency([1, 2, 3], async (item) => item, {
      concurrency: 3,
      onProgress: (done, total) => progress.push(`${done}/${total}`),
    });
    expect(progress).toEqual(["1/3", "2/3", "3/3"]);
  });
});
