import { describe, it, expect } from "vitest";
import {
  findField,
  resolveFieldUpdates,
  resolveFieldValue,
  resolveNamedId,
} from "../lib/field-updates.js";
import type { ProjectField } from "../lib/provider.js";
import { STATUS_FIELD } from "./fake-provider.js";

function field(overrides: Partial<ProjectField>): ProjectField {
  return { id: "F_x", name: "X", dataType: "TEXT", options: [], iterations: [], ...overrides };
}

const NOTES = field({ id: "F_notes", name: "Notes" });
const POINTS = field({ id: "F_points", name: "Points", dataType: "NUMBER" });
const DUE = field({ id: "F_due", name: "Due", dataType: "DATE" });
const SPRINT = field({
  id: "F_sprint",
  name: "Sprint",
  dataType: "ITERATION",
  iterations: [{ id: "it_1", title: "Sprint 1", startDate: "2026-03-02", duration: 14 }],
});
const ASSIGNEES = field({ id: "F_assignees", name: "Assignees", dataType: "ASSIGNEES" });

const FIELDS = [STATUS_FIELD, NOTES, POINTS, DUE, SPRINT];

describe("findField / resolveNamedId", () => {
  it("finds fields case-insensitively", () => {
    expect(findField(FIELDS, " status ")).toBe(STATUS_FIELD);
    expect(findField(FIELDS, "Estimate")).toBeUndefined();
  });

  it("prefers an exact name over a case-insensitive one", () => {
    const entries = [
      { id: "a", name: "done" },
      { id: "b", name: "Done" },
    ];
    expect(resolveNamedId(entries, "Done")).toBe("b");
    expect(resolveNamedId(entries, "DONE")).toBe("a");
  });
});

describe("resolveFieldValue", () => {
  it("resolves each supported type", () => {
    expect(resolveFieldValue(NOTES, 42)).toEqual({
      fieldId: "F_notes",
      fieldName: "Notes",
      kind: "text",
      text: "42",
    });
    expect(resolveFieldValue(POINTS, " 3.5 ")).toEqual({
      fieldId: "F_points",
      fieldName: "Points",
      kind: "number",
      number: 3.5,
    });
    expect(resolveFieldValue(DUE, "2026-05-01")).toEqual({
      fieldId: "F_due",
      fieldName: "Due",
      kind: "date",
      date: "2026-05-01",
    });
    expect(resolveFieldValue(STATUS_FIELD, "in progress")).toEqual({
      fieldId: "F_status",
      fieldName: "Status",
      kind: "single_select",
      optionId: "opt_progress",
    });
    expect(resolveFieldValue(SPRINT, "Sprint 1")).toEqual({
      fieldId: "F_sprint",
      fieldName: "Sprint",
      kind: "iteration",
      iterationId: "it_1",
    });
  });

  it("clears on null", () => {
    expect(resolveFieldValue(STATUS_FIELD, null)).toEqual({
      fieldId: "F_status",
      fieldName: "Status",
      kind: "clear",
    });
  });

  it("rejects blank and non-numeric numbers", () => {
    expect(() => resolveFieldValue(POINTS, "")).toThrow(
      'Field "Points" requires a number, got ""',
    );
    expect(() => resolveFieldValue(POINTS, "three")).toThrow(
      'Field "Points" requires a number, got "three"',
    );
  });

  it("rejects dates in other formats", () => {
    expect(() => resolveFieldValue(DUE, "05/01/2026")).toThrow(
      'Field "Due" requires a date in YYYY-MM-DD format, got "05/01/2026"',
    );
  });

  it("lists valid options for an unknown option", () => {
    expect(() => resolveFieldValue(STATUS_FIELD, "Blocked")).toThrow(
      'Invalid value "Blocked" for field "Status". Valid options: Todo, In Progress, Done',
    );
  });

  it("rejects unknown iterations", () => {
    expect(() => resolveFieldValue(SPRINT, "Sprint 9")).toThrow(
      'Unknown iteration "Sprint 9" for field "Sprint". Valid iterations: Sprint 1',
    );
  });

  it("rejects fields that are not project field values", () => {
    expect(() => resolveFieldValue(ASSIGNEES, "octocat")).toThrow(
      'Field "Assignees" (ASSIGNEES) cannot be set as a project field value',
    );
  });
});

describe("resolveFieldUpdates", () => {
  it("resolves in insertion order", () => {
    const updates = resolveFieldUpdates(FIELDS, { Points: 2, status: "Done" });
    expect(updates.map((u) => u.fieldName)).toEqual(["Points", "Status"]);
  });

  it("names the available fields for an unknown one", () => {
    expect(() => resolveFieldUpdates([STATUS_FIELD, NOTES], { Estimate: "M" })).toThrow(
      'Unknown field "Estimate". Available fields: Status, Notes',
    );
  });
});
