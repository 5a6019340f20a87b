import { describe, expect, it } from "vitest";
import { chunk, mapInBatches, mapLimit } from "../src/utils/pool.js";

function tracked() {
  let active = 0;
  const state = { maxActive: 0 };
  const fn = async (item: number): Promise<number> => {
    active += 1;
    state.maxActive = Math.max(state.maxActive, active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    active -= 1;
    return item * 2;
  };
  return { state, fn };
}

describe("mapLimit", () => {
  it("keeps input order and never exceeds the limit", async () => {
    const { state, fn } = tracked();
    expect(await mapLimit([1, 2, 3, 4, 5], 2, fn)).toEqual([2, 4, 6, 8, 10]);
    expect(state.maxActive).toBe(2);
  });

  it("handles an empty list", async () => {
    expect(await mapLimit([], 3, async (item: number) => item)).toEqual([]);
  });
});

describe("mapInBatches", () => {
  it("bounds concurrency by the batch size", async () => {
    const { state, fn } = tracked();
    expect(await mapInBatches([1, 2, 3, 4, 5], { concurrency: 10, batchSize: 2 }, fn)).toEqual([2, 4, 6, 8, 10]);
    expect(state.maxActive).toBe(2);
  });
});

describe("chunk", () => {
  it("splits into fixed-size batches", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});
