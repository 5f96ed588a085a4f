import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  BulkOperationCoordinator,
  OperationTracker,
  validateBulkRequest,
  validateItemIds,
  type BulkOperation,
  type BulkOperationRequest,
} from "../lib/bulk-operations.js";
import { AuthenticationError, InvalidRequestError } from "../lib/errors.js";
import type { ResolvedFieldUpdate } from "../lib/provider.js";
import { FakeProvider } from "./fake-provider.js";

const FIXED_NOW = new Date("2026-04-01T12:00:00Z");

const DONE: ResolvedFieldUpdate = {
  fieldId: "F_status",
  fieldName: "Status",
  kind: "single_select",
  optionId: "opt_done",
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function request(overrides: Partial<BulkOperationRequest> = {}): BulkOperationRequest {
  return {
    projectId: "PVT_1",
    type: "ARCHIVE",
    itemIds: ["a", "b", "c"],
    ...overrides,
  };
}

let provider: FakeProvider;
let tracker: OperationTracker;
let ids: number;

function coordinator(options: { concurrency?: number; itemTimeoutMs?: number } = {}) {
  return new BulkOperationCoordinator(provider, {
    tracker,
    now: () => FIXED_NOW,
    generateId: () => `op-${++ids}`,
    ...options,
  });
}

beforeEach(() => {
  provider = new FakeProvider();
  tracker = new OperationTracker();
  ids = 0;
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("validateItemIds", () => {
  it("rejects an empty list", () => {
    expect(() => validateItemIds([])).toThrow("No item IDs given");
  });

  it("rejects more than the maximum", () => {
    const itemIds = Array.from({ length: 101 }, (_, i) => `item-${i}`);
    expect(() => validateItemIds(itemIds)).toThrow(
      "Too many items: 101 (max 100 per operation)",
    );
  });

  it("accepts exactly the maximum", () => {
    const itemIds = Array.from({ length: 100 }, (_, i) => `item-${i}`);
    expect(() => validateItemIds(itemIds)).not.toThrow();
  });

  it("rejects blank IDs", () => {
    expect(() => validateItemIds(["a", "  "])).toThrow("Item IDs must not be empty");
  });

  it("rejects duplicates", () => {
    expect(() => validateItemIds(["a", "b", "a"])).toThrow("Duplicate item ID: a");
  });
});

describe("validateBulkRequest", () => {
  it("requires updates for UPDATE", () => {
    expect(() => validateBulkRequest(request({ type: "UPDATE" }))).toThrow(
      "UPDATE operations require at least one field update",
    );
  });

  it("requires a projectId", () => {
    expect(() => validateBulkRequest(request({ projectId: "" }))).toThrow(
      "projectId is required",
    );
  });

  it("throws InvalidRequestError", () => {
    expect(() => validateBulkRequest(request({ itemIds: [] }))).toThrow(
      InvalidRequestError,
    );
  });
});

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

describe("BulkOperationCoordinator", () => {
  it("completes when every item succeeds", async () => {
    const op = await coordinator().submit(request());

    expect(op).toEqual({
      id: "op-1",
      projectId: "PVT_1",
      type: "ARCHIVE",
      status: "COMPLETED",
      totalItems: 3,
      processedItems: 3,
      failedItems: 0,
      progress: 1,
      createdAt: FIXED_NOW,
      completedAt: FIXED_NOW,
      failures: [],
    });
    expect(provider.mutations.map((m) => m.itemId).sort()).toEqual(["a", "b", "c"]);
    expect(provider.mutations[0].mutation).toEqual({ kind: "archive" });
  });

  it("passes resolved updates through as an update mutation", async () => {
    await coordinator().submit(
      request({ type: "UPDATE", itemIds: ["a"], updates: [DONE] }),
    );

    expect(provider.mutations).toHaveLength(1);
    expect(provider.mutations[0].projectId).toBe("PVT_1");
    expect(provider.mutations[0].mutation).toEqual({ kind: "update", updates: [DONE] });
    expect(provider.mutations[0].options?.signal).toBeInstanceOf(AbortSignal);
  });

  it("maps DELETE to a delete mutation", async () => {
    await coordinator().submit(request({ type: "DELETE", itemIds: ["a"] }));
    expect(provider.mutations[0].mutation).toEqual({ kind: "delete" });
  });

  it("reports partial failure with per-item errors", async () => {
    provider.mutateBehaviour.set("b", new Error("boom"));

    const op = await coordinator().submit(request());

    expect(op.status).toBe("PARTIALLY_FAILED");
    expect(op.processedItems).toBe(3);
    expect(op.failedItems).toBe(1);
    expect(op.errorMessage).toBe("1 of 3 items failed");
    expect(op.failures).toEqual([{ itemId: "b", error: "boom" }]);
  });

  it("fails when every item fails", async () => {
    provider.mutateBehaviour.set("a", new Error("nope"));
    provider.mutateBehaviour.set("b", new Error("nope"));

    const op = await coordinator().submit(request({ itemIds: ["a", "b"] }));

    expect(op.status).toBe("FAILED");
    expect(op.errorMessage).toBe("2 of 2 items failed");
  });

  it("rejects invalid requests before any mutation", () => {
    const c = coordinator();
    expect(() => c.start(request({ itemIds: ["a", "a"] }))).toThrow(
      "Duplicate item ID: a",
    );
    expect(provider.mutations).toHaveLength(0);
    expect(tracker.size).toBe(0);
  });

  it("rejects an empty batch before resolving or mutating anything", async () => {
    const c = coordinator();

    expect(() => c.start(request({ itemIds: [] }))).toThrow(
      new InvalidRequestError("No item IDs given"),
    );
    await expect(c.submit(request({ itemIds: [] }))).rejects.toThrow(InvalidRequestError);
    expect(provider.fetchProject).not.toHaveBeenCalled();
    expect(provider.mutations).toHaveLength(0);
    expect(tracker.size).toBe(0);
  });

  it("keeps snapshot counters consistent while items are in flight", async () => {
    const itemIds = ["a", "b", "c", "d", "e", "f"];
    const failing = new Set(["b", "e"]);
    const snapshots: BulkOperation[] = [];
    itemIds.forEach((id, i) => {
      provider.mutateBehaviour.set(id, async () => {
        snapshots.push(tracker.get("op-1"));
        await new Promise((r) => setTimeout(r, 2 + (i % 3) * 3));
        if (failing.has(id)) throw new Error(`item ${id} rejected`);
      });
    });

    const handle = coordinator({ concurrency: 2 }).start(request({ itemIds }));
    const poll = setInterval(() => snapshots.push(handle.snapshot()), 1);
    const op = await handle.result.finally(() => clearInterval(poll));
    snapshots.push(handle.snapshot());

    expect(snapshots.length).toBeGreaterThanOrEqual(itemIds.length + 1);
    let last = 0;
    for (const s of snapshots) {
      expect(s.totalItems).toBe(6);
      expect(s.failedItems).toBeLessThanOrEqual(s.processedItems);
      expect(s.processedItems).toBeLessThanOrEqual(s.totalItems);
      expect(s.progress).toBe(s.processedItems / s.totalItems);
      expect(s.progress).toBeGreaterThanOrEqual(last);
      last = s.progress;
    }
    expect(op.status).toBe("PARTIALLY_FAILED");
    expect(op.processedItems).toBe(6);
    expect(op.failedItems).toBe(2);
    expect(op.progress).toBe(1);
  });

  it("never runs more than `concurrency` mutations at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const itemIds = ["a", "b", "c", "d", "e"];
    for (const id of itemIds) {
      provider.mutateBehaviour.set(id, async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((r) => setTimeout(r, 5));
        inFlight--;
      });
    }

    const op = await coordinator({ concurrency: 2 }).submit(request({ itemIds }));

    expect(op.status).toBe("COMPLETED");
    expect(peak).toBe(2);
  });

  it("fails an item that exceeds the timeout", async () => {
    provider.mutateBehaviour.set("b", () => new Promise<void>(() => {}));

    const op = await coordinator({ itemTimeoutMs: 20 }).submit(request());

    expect(op.status).toBe("PARTIALLY_FAILED");
    expect(op.failures).toEqual([{ itemId: "b", error: "Item b timed out after 20ms" }]);
  });

  it("stops after an authentication failure and rethrows it", async () => {
    provider.mutateBehaviour.set("a", new AuthenticationError("Bad credentials"));

    const c = coordinator({ concurrency: 1 });
    const handle = c.start(request());

    await expect(handle.result).rejects.toThrow(AuthenticationError);
    const op = tracker.get(handle.id);
    expect(op.status).toBe("FAILED");
    expect(op.errorMessage).toBe("Authentication failed: Bad credentials");
    expect(op.processedItems).toBe(1);
    expect(provider.mutations.map((m) => m.itemId)).toEqual(["a"]);
  });

  it("lets in-flight items finish on cancel and starts no new ones", async () => {
    const gate = deferred();
    provider.mutateBehaviour.set("a", () => gate.promise);

    const handle = coordinator({ concurrency: 1 }).start(request());
    expect(handle.snapshot().status).toBe("RUNNING");

    handle.cancel("user request");
    gate.resolve();
    const op = await handle.result;

    expect(op.status).toBe("FAILED");
    expect(op.processedItems).toBe(1);
    expect(op.failedItems).toBe(0);
    expect(op.errorMessage).toBe(
      "Operation cancelled after 1 of 3 items were processed: user request",
    );
    expect(provider.mutations.map((m) => m.itemId)).toEqual(["a"]);
  });

  it("honours a signal that is already aborted", async () => {
    const controller = new AbortController();
    controller.abort("shutdown");

    const op = await coordinator().submit(
      request({ itemIds: ["a", "b"], signal: controller.signal }),
    );

    expect(op.status).toBe("FAILED");
    expect(op.errorMessage).toBe(
      "Operation cancelled after 0 of 2 items were processed: shutdown",
    );
    expect(provider.mutations).toHaveLength(0);
  });

  it("ignores cancel once the operation has finished", async () => {
    const handle = coordinator().start(request({ itemIds: ["a"] }));
    await handle.result;

    handle.cancel("too late");

    expect(handle.snapshot().status).toBe("COMPLETED");
    expect(handle.snapshot().errorMessage).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

describe("OperationTracker", () => {
  it("returns copies that callers cannot modify", async () => {
    const op = await coordinator().submit(request({ itemIds: ["a"] }));

    op.failures.push({ itemId: "x", error: "edited" });
    op.status = "FAILED";

    const stored = tracker.get(op.id);
    expect(stored.status).toBe("COMPLETED");
    expect(stored.failures).toEqual([]);
  });

  it("throws for an unknown operation", () => {
    expect(() => tracker.get("missing")).toThrow("Bulk operation missing not found");
  });

  it("lists operations newest first", async () => {
    let tick = 0;
    const c = new BulkOperationCoordinator(provider, {
      tracker,
      now: () => new Date(FIXED_NOW.getTime() + ++tick * 1000),
      generateId: () => `op-${++ids}`,
    });

    await c.submit(request({ itemIds: ["a"] }));
    await c.submit(request({ itemIds: ["b"] }));

    expect(tracker.list().map((op) => op.id)).toEqual(["op-2", "op-1"]);
  });
});
