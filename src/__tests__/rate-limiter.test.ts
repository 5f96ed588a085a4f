import { describe, it, expect, vi, beforeEach } from "vitest";
import { RemoteUnavailableError } from "../lib/errors.js";
import { RateLimiter } from "../lib/rate-limiter.js";

const NOW = Date.parse("2026-04-01T12:00:00Z");

function limiter(remaining: number, resetInMs: number) {
  const sleep = vi.fn(async (_ms: number) => {});
  const rl = new RateLimiter({ sleep, now: () => NOW });
  rl.update({
    limit: 5000,
    remaining,
    resetAt: new Date(NOW + resetInMs).toISOString(),
    cost: 1,
    nodeCount: 1,
  });
  return { rl, sleep };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("RateLimiter", () => {
  it("passes straight through with plenty of budget", async () => {
    const { rl, sleep } = limiter(4000, 60_000);
    await rl.checkBeforeRequest();
    expect(sleep).not.toHaveBeenCalled();
    expect(rl.getStatus().isLow).toBe(false);
  });

  it("warns without waiting when low", async () => {
    const { rl, sleep } = limiter(80, 60_000);
    await rl.checkBeforeRequest();
    expect(sleep).not.toHaveBeenCalled();
    expect(rl.getStatus()).toMatchObject({ remaining: 80, isLow: true, isCritical: false });
  });

  it("waits for the reset when critical", async () => {
    const { rl, sleep } = limiter(10, 30_000);
    await rl.checkBeforeRequest();
    expect(sleep).toHaveBeenCalledWith(30_000);
  });

  it("caps the wait", async () => {
    const { rl, sleep } = limiter(10, 10 * 60_000);
    await rl.checkBeforeRequest();
    expect(sleep).toHaveBeenCalledWith(60_000);
  });

  it("fails fast when exhausted past the longest wait", async () => {
    const { rl } = limiter(0, 10 * 60_000);
    await expect(rl.checkBeforeRequest()).rejects.toThrow(RemoteUnavailableError);
  });

  it("ignores a window that has already reset", async () => {
    const { rl, sleep } = limiter(0, -1000);
    await rl.checkBeforeRequest();
    expect(sleep).not.toHaveBeenCalled();
  });
});
