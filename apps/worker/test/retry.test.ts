import { describe, expect, it } from "vitest";
import { backoffDelay, HttpStatusError, withRetry } from "../src/utils/retry.js";

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe("withRetry", () => {
  it("retries transient failures with exponential backoff", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const value = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error("flaky");
        return 42;
      },
      { sleep, baseDelayMs: 500 }
    );

    expect(value).toBe(42);
    expect(calls).toBe(3);
    expect(delays).toEqual([500, 1000]);
  });

  it("does not retry client errors", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new HttpStatusError(404, "not found");
        },
        { sleep }
      )
    ).rejects.toThrow("not found");
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  it("retries rate limiting and gives up after the last attempt", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new HttpStatusError(429, "slow down");
        },
        { sleep, attempts: 3, baseDelayMs: 100 }
      )
    ).rejects.toBeInstanceOf(HttpStatusError);
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("times out an attempt that never settles, even when it ignores the signal", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    await expect(
      withRetry(
        () => {
          calls += 1;
          return new Promise<never>(() => {});
        },
        { sleep, attempts: 2, timeoutMs: 20, baseDelayMs: 100 }
      )
    ).rejects.toThrow("timed out after 20ms");
    expect(calls).toBe(2);
    expect(delays).toEqual([100]);
  });

  it("waits the server's retry-after instead of backing off, up to the cap", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const value = await withRetry(
      async () => {
        calls += 1;
        if (calls === 1) throw new HttpStatusError(429, "slow down", 3_000);
        if (calls === 2) throw new HttpStatusError(429, "slow down", 3_600_000);
        return "sent";
      },
      { sleep, attempts: 3, baseDelayMs: 100, maxDelayMs: 5_000 }
    );

    expect(value).toBe("sent");
    expect(delays).toEqual([3_000, 5_000]);
  });

  it("passes an abort signal to each attempt", async () => {
    let seen: AbortSignal | null = null;
    await withRetry(async (signal) => {
      seen = signal;
      return "done";
    });
    expect(seen).toBeInstanceOf(AbortSignal);
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(backoffDelay(1, 500, 10_000)).toBe(500);
    expect(backoffDelay(5, 500, 10_000)).toBe(8_000);
    expect(backoffDelay(6, 500, 10_000)).toBe(10_000);
  });
});
