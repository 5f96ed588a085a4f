import { describe, it, expect, vi, afterEach } from "vitest";
import { ProjectFieldIndex, SessionCache } from "../lib/cache.js";
import type { ProjectField } from "../lib/provider.js";
import { STATUS_FIELD } from "./fake-provider.js";

const PRIORITY: ProjectField = {
  id: "F_priority",
  name: "Priority",
  dataType: "SINGLE_SELECT",
  options: [
    { id: "opt_high", name: "High" },
    { id: "opt_low", name: "Low" },
  ],
  iterations: [],
};

afterEach(() => {
  vi.useRealTimers();
});

describe("SessionCache", () => {
  it("returns stored values until they expire", () => {
    vi.useFakeTimers();
    const cache = new SessionCache(1000);
    cache.set("k", { a: 1 });

    expect(cache.get("k")).toEqual({ a: 1 });
    vi.advanceTimersByTime(1001);
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("honours a per-entry TTL", () => {
    vi.useFakeTimers();
    const cache = new SessionCache(1000);
    cache.set("k", "v", 5000);

    vi.advanceTimersByTime(2000);
    expect(cache.get("k")).toBe("v");
  });

  it("invalidates by prefix", () => {
    const cache = new SessionCache();
    cache.set("query:a", 1);
    cache.set("query:b", 2);
    cache.set("other", 3);

    cache.invalidatePrefix("query:");

    expect(cache.size).toBe(1);
    expect(cache.get("other")).toBe(3);
  });

  it("builds keys independent of whitespace and variable order", () => {
    expect(SessionCache.queryKey("query {\n  viewer { login }\n}", { b: 1, a: 2 })).toBe(
      SessionCache.queryKey("query { viewer { login } }", { a: 2, b: 1 }),
    );
  });
});

describe("ProjectFieldIndex", () => {
  it("keeps fields per project", () => {
    const index = new ProjectFieldIndex();
    expect(index.isPopulated("PVT_a")).toBe(false);

    index.populate("PVT_a", [STATUS_FIELD]);
    index.populate("PVT_b", [PRIORITY]);

    expect(index.isPopulated("PVT_a")).toBe(true);
    expect(index.getField("PVT_a", "status")).toBe(STATUS_FIELD);
    expect(index.getField("PVT_a", "Priority")).toBeUndefined();
    expect(index.getFields("PVT_b")).toEqual([PRIORITY]);
  });

  it("replaces a project's fields on repopulate", () => {
    const index = new ProjectFieldIndex();
    index.populate("PVT_a", [STATUS_FIELD]);
    index.populate("PVT_a", [PRIORITY]);

    expect(index.getFields("PVT_a")).toEqual([PRIORITY]);
  });

  it("returns nothing for unknown projects and after clear", () => {
    const index = new ProjectFieldIndex();
    expect(index.getFields("PVT_x")).toEqual([]);

    index.populate("PVT_a", [STATUS_FIELD]);
    index.clear();
    expect(index.isPopulated("PVT_a")).toBe(false);
  });
});
