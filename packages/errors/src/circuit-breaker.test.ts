import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and resolves with the result", async () => {
    const breaker = createCircuitBreaker("sum", async (a: number, b: number) => a + b);

    await expect(breaker.fire(2, 3)).resolves.toBe(5);
    breaker.shutdown();
  });

  it("rejects calls that exceed the timeout", async () => {
    const breaker = createCircuitBreaker(
      "slow",
      () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200)),
      { timeout: 10 },
    );

    await expect(breaker.fire()).rejects.toThrow("Timed out after 10ms");
    breaker.shutdown();
  });

  it("opens after failures and reports the transition", async () => {
    const onStateChange = vi.fn();
    const breaker = createCircuitBreaker(
      "embed",
      async (): Promise<string> => {
        throw new Error("provider down");
      },
      { volumeThreshold: 0, onStateChange },
    );

    await expect(breaker.fire()).rejects.toThrow("provider down");
    expect(onStateChange).toHaveBeenCalledWith("embed", "open");
    await expect(breaker.fire()).rejects.toThrow("Breaker is open");
    breaker.shutdown();
  });
});
