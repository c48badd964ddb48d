import { describe, it, expect, vi } from "vitest";
import { RetryService } from "../services/retry.service.js";
import { CatalogUnavailableError, ValidationError, type AppError } from "../errors/index.js";
import { ok, err, type Result } from "../types/result.types.js";
import { pool } from "../utils/pool.js";

function sequence<T>(results: Array<Result<T, AppError>>) {
  let calls = 0;
  const operation = async (): Promise<Result<T, AppError>> => {
    const result = results[Math.min(calls, results.length - 1)];
    calls++;
    if (!result) throw new Error("empty sequence");
    return result;
  };
  return { operation, calls: () => calls };
}

describe("RetryService", () => {
  const retry = new RetryService({ maxAttempts: 3 });

  it("should return the first success", async () => {
    const { operation, calls } = sequence([ok("done")]);

    expect(await retry.execute(operation, "test")).toEqual({ ok: true, value: "done" });
    expect(calls()).toBe(1);
  });

  it("should retry retryable failures until one succeeds", async () => {
    const { operation, calls } = sequence<string>([
      err(new CatalogUnavailableError("catalog offline")),
      ok("done"),
    ]);

    expect(await retry.execute(operation, "test")).toEqual({ ok: true, value: "done" });
    expect(calls()).toBe(2);
  });

  it("should stop after the configured attempts", async () => {
    const { operation, calls } = sequence<string>([err(new CatalogUnavailableError("catalog offline"))]);

    const result = await retry.execute(operation, "test");

    expect(result.ok).toBe(false);
    expect(calls()).toBe(3);
  });

  it("should not retry client errors", async () => {
    const { operation, calls } = sequence<string>([err(new ValidationError("bad input"))]);

    await retry.execute(operation, "test");

    expect(calls()).toBe(1);
  });

  it("should retry once by default", async () => {
    const { operation, calls } = sequence<string>([err(new CatalogUnavailableError("catalog offline"))]);

    await new RetryService().execute(operation, "test");

    expect(calls()).toBe(2);
  });

  it("should wait between attempts", async () => {
    vi.useFakeTimers();
    try {
      const { operation, calls } = sequence<string>([
        err(new CatalogUnavailableError("catalog offline")),
        ok("done"),
      ]);

      const pending = new RetryService({ delayMs: 50 }).execute(operation, "test");

      await vi.advanceTimersByTimeAsync(49);
      expect(calls()).toBe(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(await pending).toEqual({ ok: true, value: "done" });
      expect(calls()).toBe(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("pool", () => {
  it("should keep results in task order", async () => {
    const delays = [30, 0, 10];
    const tasks = delays.map(
      (delay, index) => () => new Promise<number>((resolve) => setTimeout(() => resolve(index), delay))
    );

    expect(await pool(tasks, 2)).toEqual([0, 1, 2]);
  });

  it("should never run more tasks than the limit", async () => {
    let running = 0;
    let peak = 0;
    const tasks = Array.from({ length: 6 }, () => async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return peak;
    });

    await pool(tasks, 2);

    expect(peak).toBe(2);
  });

  it("should handle an empty task list", async () => {
    expect(await pool([], 4)).toEqual([]);
  });
});
