import { describe, it, expect, beforeEach, vi } from "vitest";
import { AuthenticationError } from "../lib/errors.js";
import { WorkflowEngine, conditionHolds, type CreateWorkflowInput } from "../lib/workflow-engine.js";
import type { WorkflowEvent } from "../lib/workflow-types.js";
import { FakeProvider } from "./fake-provider.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let provider: FakeProvider;
let engine: WorkflowEngine;
let tick: number;
let ids: number;

function makeEngine(recentLimit?: number): WorkflowEngine {
  return new WorkflowEngine(provider, {
    recentLimit,
    now: () => new Date(Date.UTC(2026, 3, 1, 0, 0, tick++)),
    clock: () => 0,
    generateId: () => `wf-${++ids}`,
  });
}

function makeWorkflow(overrides: Partial<CreateWorkflowInput> = {}): CreateWorkflowInput {
  return {
    projectId: "PVT_1",
    name: "Close done items",
    trigger: "issue_closed",
    action: { kind: "move_to_status", status: "Done" },
    ...overrides,
  };
}

function makeEvent(overrides: Partial<WorkflowEvent> = {}): WorkflowEvent {
  return {
    projectId: "PVT_1",
    trigger: "issue_closed",
    itemId: "PVTI_1",
    payload: {},
    ...overrides,
  };
}

beforeEach(() => {
  provider = new FakeProvider();
  tick = 0;
  ids = 0;
  engine = makeEngine();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// conditionHolds
// ---------------------------------------------------------------------------

describe("conditionHolds", () => {
  it("holds when there is no condition", () => {
    expect(conditionHolds(undefined, {})).toBe(true);
  });

  it("compares field names and values case-insensitively", () => {
    const condition = { kind: "equals" as const, field: "Status", value: "todo" };
    expect(conditionHolds(condition, { status: " Todo " })).toBe(true);
    expect(conditionHolds(condition, { Status: "Done" })).toBe(false);
  });

  it("fails equals and passes not_equals when the field is absent", () => {
    expect(conditionHolds({ kind: "equals", field: "Status", value: "Todo" }, {})).toBe(false);
    expect(conditionHolds({ kind: "not_equals", field: "Status", value: "Todo" }, {})).toBe(true);
  });

  it("matches list values on any element", () => {
    const payload = { labels: ["docs", "Bug"] };
    expect(conditionHolds({ kind: "equals", field: "labels", value: "bug" }, payload)).toBe(true);
    expect(conditionHolds({ kind: "not_equals", field: "labels", value: "bug" }, payload)).toBe(
      false,
    );
    expect(
      conditionHolds({ kind: "in", field: "labels", values: ["urgent", "docs"] }, payload),
    ).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Management
// ---------------------------------------------------------------------------

describe("WorkflowEngine management", () => {
  it("creates enabled workflows by default", () => {
    const wf = engine.create(makeWorkflow({ name: "  Close done items  " }));

    expect(wf).toEqual({
      id: "wf-1",
      projectId: "PVT_1",
      name: "Close done items",
      trigger: "issue_closed",
      condition: undefined,
      action: { kind: "move_to_status", status: "Done" },
      status: "ENABLED",
      createdAt: new Date("2026-04-01T00:00:00Z"),
      updatedAt: new Date("2026-04-01T00:00:00Z"),
    });
  });

  it("creates disabled workflows when asked", () => {
    expect(engine.create(makeWorkflow({ enabled: false })).status).toBe("DISABLED");
  });

  it("rejects invalid names", () => {
    expect(() => engine.create(makeWorkflow({ name: "" }))).toThrow(
      "workflow name cannot be empty",
    );
    expect(() => engine.create(makeWorkflow({ name: "x".repeat(101) }))).toThrow(
      "workflow name cannot exceed 100 characters",
    );
  });

  it("lists a project's workflows in creation order", () => {
    engine.create(makeWorkflow({ name: "first" }));
    engine.create(makeWorkflow({ name: "other", projectId: "PVT_2" }));
    engine.create(makeWorkflow({ name: "second" }));

    expect(engine.list("PVT_1").map((wf) => wf.name)).toEqual(["first", "second"]);
  });

  it("keeps creation order for workflows created in the same millisecond", () => {
    const sameInstant = new WorkflowEngine(provider, {
      now: () => new Date("2026-04-01T00:00:00Z"),
    });
    for (const name of ["first", "second", "third", "fourth"]) {
      sameInstant.create(makeWorkflow({ name, trigger: "item_added" }));
    }

    const event = makeEvent({ trigger: "item_added" });
    for (let run = 0; run < 5; run++) {
      expect(sameInstant.match(event).map((m) => m.workflowName)).toEqual([
        "first",
        "second",
        "third",
        "fourth",
      ]);
    }
  });

  it("does not share condition or action objects with callers", () => {
    const condition = { kind: "in" as const, field: "Status", values: ["Todo"] };
    const action = { kind: "move_to_status" as const, status: "Done" };
    const wf = engine.create(makeWorkflow({ condition, action }));

    condition.values.push("Done");
    action.status = "Todo";
    const [matched] = engine.match(makeEvent({ payload: { Status: "Todo" } }));
    matched.action = { kind: "archive_item" };
    const listed = engine.list("PVT_1")[0];
    if (listed.condition?.kind !== "in") throw new Error("expected an in condition");
    listed.condition.values.push("Blocked");

    expect(engine.get(wf.id).condition).toEqual({
      kind: "in",
      field: "Status",
      values: ["Todo"],
    });
    expect(engine.get(wf.id).action).toEqual({ kind: "move_to_status", status: "Done" });
  });

  it("updates fields and bumps updatedAt", () => {
    const wf = engine.create(makeWorkflow({ condition: { kind: "equals", field: "Status", value: "Todo" } }));

    const updated = engine.update(wf.id, { name: "Renamed", condition: null });

    expect(updated.name).toBe("Renamed");
    expect(updated.condition).toBeUndefined();
    expect(updated.trigger).toBe("issue_closed");
    expect(updated.updatedAt).toEqual(new Date("2026-04-01T00:00:01Z"));
    expect(updated.createdAt).toEqual(wf.createdAt);
  });

  it("lets disable win when both flags are set", () => {
    const wf = engine.create(makeWorkflow());
    expect(engine.update(wf.id, { enabled: true, disabled: true }).status).toBe("DISABLED");
    expect(engine.update(wf.id, { enabled: true }).status).toBe("ENABLED");
    expect(engine.update(wf.id, { disabled: true }).status).toBe("DISABLED");
    expect(engine.update(wf.id, { disabled: false }).status).toBe("ENABLED");
  });

  it("keeps the status when no flag is given", () => {
    const wf = engine.create(makeWorkflow({ enabled: false }));
    expect(engine.update(wf.id, { name: "x" }).status).toBe("DISABLED");
  });

  it("rejects an empty update", () => {
    const wf = engine.create(makeWorkflow());
    expect(() => engine.update(wf.id, {})).toThrow("No workflow changes given");
  });

  it("throws NotFound for unknown IDs", () => {
    expect(() => engine.get("nope")).toThrow("Workflow nope not found");
    expect(() => engine.delete("nope")).toThrow("Workflow nope not found");
  });

  it("deletes workflows", () => {
    const wf = engine.create(makeWorkflow());
    engine.delete(wf.id);
    expect(engine.list("PVT_1")).toEqual([]);
  });

  it("returns copies", () => {
    const wf = engine.create(makeWorkflow());
    wf.name = "mutated";
    expect(engine.get(wf.id).name).toBe("Close done items");
  });
});

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

describe("WorkflowEngine evaluation", () => {
  it("runs matching workflows in order and records successes", async () => {
    engine.create(makeWorkflow({ name: "a" }));
    engine.create(makeWorkflow({ name: "b", action: { kind: "archive_item" } }));
    engine.create(makeWorkflow({ name: "wrong trigger", trigger: "item_added" }));
    engine.create(makeWorkflow({ name: "disabled", enabled: false }));

    const executions = await engine.evaluate(makeEvent({ contentId: "I_1" }));

    expect(executions.map((e) => [e.workflowName, e.status])).toEqual([
      ["a", "SUCCESS"],
      ["b", "SUCCESS"],
    ]);
    expect(provider.actions).toEqual([
      {
        projectId: "PVT_1",
        action: { kind: "move_to_status", status: "Done" },
        target: { itemId: "PVTI_1", contentId: "I_1" },
      },
      { projectId: "PVT_1", action: { kind: "archive_item" }, target: { itemId: "PVTI_1", contentId: "I_1" } },
    ]);
  });

  it("skips workflows whose condition does not hold", async () => {
    engine.create(makeWorkflow({ condition: { kind: "equals", field: "Status", value: "Todo" } }));

    expect(await engine.evaluate(makeEvent({ payload: { Status: "Done" } }))).toEqual([]);
    expect(provider.actions).toEqual([]);
  });

  it("records failures and keeps going", async () => {
    engine.create(makeWorkflow({ name: "a" }));
    engine.create(makeWorkflow({ name: "b" }));
    provider.actionError = new Error("Option \"Done\" not found");

    const executions = await engine.evaluate(makeEvent());

    expect(executions).toHaveLength(2);
    expect(executions[0]).toEqual({
      workflowId: "wf-1",
      workflowName: "a",
      trigger: "issue_closed",
      status: "FAILURE",
      durationMs: 0,
      executedAt: new Date("2026-04-01T00:00:02Z"),
      error: 'Option "Done" not found',
    });
  });

  it("records then rethrows an authentication failure", async () => {
    engine.create(makeWorkflow({ name: "a" }));
    engine.create(makeWorkflow({ name: "b" }));
    provider.actionError = new AuthenticationError("Bad credentials");

    await expect(engine.evaluate(makeEvent())).rejects.toThrow(AuthenticationError);

    const status = engine.getWorkflowStatus("PVT_1");
    expect(status.totalExecutions).toBe(1);
    expect(status.recentExecutions[0].error).toBe("Bad credentials");
    expect(provider.actions).toHaveLength(1);
  });

  it("match reports without invoking or recording", () => {
    engine.create(makeWorkflow({ name: "a" }));

    expect(engine.match(makeEvent())).toEqual([
      { workflowId: "wf-1", workflowName: "a", action: { kind: "move_to_status", status: "Done" } },
    ]);
    expect(provider.actions).toEqual([]);
    expect(engine.getWorkflowStatus("PVT_1").totalExecutions).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

describe("getWorkflowStatus", () => {
  it("reports zeros for a project with no history", () => {
    expect(engine.getWorkflowStatus("PVT_9")).toEqual({
      projectId: "PVT_9",
      totalWorkflows: 0,
      activeWorkflows: 0,
      totalExecutions: 0,
      successRate: 0,
      recentExecutions: [],
    });
  });

  it("computes the success rate as a percentage", async () => {
    engine.create(makeWorkflow({ name: "ok" }));
    await engine.evaluate(makeEvent());
    await engine.evaluate(makeEvent());
    await engine.evaluate(makeEvent());
    provider.actionError = new Error("boom");
    await engine.evaluate(makeEvent());

    const status = engine.getWorkflowStatus("PVT_1");
    expect(status.totalExecutions).toBe(4);
    expect(status.successRate).toBe(75);
  });

  it("counts active workflows and keeps history after deletion", async () => {
    const wf = engine.create(makeWorkflow());
    engine.create(makeWorkflow({ enabled: false }));
    await engine.evaluate(makeEvent());
    engine.delete(wf.id);

    const status = engine.getWorkflowStatus("PVT_1");
    expect(status.totalWorkflows).toBe(1);
    expect(status.activeWorkflows).toBe(0);
    expect(status.totalExecutions).toBe(1);
  });

  it("keeps only the most recent executions, newest first", async () => {
    engine = makeEngine(2);
    engine.create(makeWorkflow({ name: "a" }));
    engine.create(makeWorkflow({ name: "b" }));
    engine.create(makeWorkflow({ name: "c" }));

    await engine.evaluate(makeEvent());

    const status = engine.getWorkflowStatus("PVT_1");
    expect(status.totalExecutions).toBe(3);
    expect(status.recentExecutions.map((e) => e.workflowName)).toEqual(["c", "b"]);
  });
});
