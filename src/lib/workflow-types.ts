/**
 * Workflow (automation rule) schema and TypeScript types.
 *
 * Triggers, conditions and actions are Zod schemas; the TypeScript types
 * are derived via z.infer<> so the YAML loader, the MCP tools and the
 * engine share one definition. Conditions and actions are tagged unions;
 * the legacy `field=value` / `set_field:Field=Value` string forms are
 * parsed into them at the edge and never travel further.
 */

import { z } from "zod";
import { InvalidRequestError } from "./errors.js";

// ---------------------------------------------------------------------------
// Triggers
// ---------------------------------------------------------------------------

export const WORKFLOW_TRIGGERS = [
  "item_added",
  "item_updated",
  "item_archived",
  "field_changed",
  "status_changed",
  "assignee_changed",
  "issue_opened",
  "issue_closed",
  "issue_reopened",
  "pr_opened",
  "pr_closed",
  "pr_merged",
  "scheduled",
] as const;

export type WorkflowTrigger = (typeof WORKFLOW_TRIGGERS)[number];

/**
 * Normalize a trigger tag: case-insensitive, `-` and `.` accepted in
 * place of `_` (so "Issue-Opened" and "issue.opened" both work).
 */
export function normalizeTrigger(input: string): WorkflowTrigger {
  const normalized = input.trim().toLowerCase().replace(/[-.]/g, "_");
  const trigger = WORKFLOW_TRIGGERS.find((t) => t === normalized);
  if (!trigger) {
    throw new InvalidRequestError(
      `Unknown trigger "${input}". Valid triggers: ${WORKFLOW_TRIGGERS.join(", ")}`,
    );
  }
  return trigger;
}

export const WorkflowTriggerSchema = z
  .string()
  .transform((value, ctx): WorkflowTrigger => {
    try {
      return normalizeTrigger(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  });

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

const fieldName = z.string().trim().min(1, "field must not be empty");

export const WorkflowConditionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("equals"), field: fieldName, value: z.string() }),
  z.object({ kind: z.literal("not_equals"), field: fieldName, value: z.string() }),
  z.object({
    kind: z.literal("in"),
    field: fieldName,
    values: z.array(z.string()).min(1, "values must not be empty"),
  }),
]);

export type WorkflowCondition = z.infer<typeof WorkflowConditionSchema>;

/**
 * Parse the `field=value` / `field!=value` shorthand.
 */
export function parseConditionString(input: string): WorkflowCondition {
  const notEq = input.indexOf("!=");
  if (notEq > 0) {
    return {
      kind: "not_equals",
      field: input.slice(0, notEq).trim(),
      value: input.slice(notEq + 2).trim(),
    };
  }
  const eq = input.indexOf("=");
  if (eq > 0) {
    return {
      kind: "equals",
      field: input.slice(0, eq).trim(),
      value: input.slice(eq + 1).trim(),
    };
  }
  throw new InvalidRequestError(
    `Invalid condition "${input}". Use field=value or field!=value`,
  );
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export const WorkflowActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("set_field"), field: fieldName, value: z.string() }),
  z.object({ kind: z.literal("clear_field"), field: fieldName }),
  z.object({ kind: z.literal("move_to_status"), status: z.string().trim().min(1) }),
  z.object({ kind: z.literal("assign"), assignee: z.string().trim().min(1) }),
  z.object({ kind: z.literal("archive_item") }),
  z.object({ kind: z.literal("add_comment"), body: z.string().min(1) }),
]);

export type WorkflowAction = z.infer<typeof WorkflowActionSchema>;

export type WorkflowActionKind = WorkflowAction["kind"];

/**
 * Parse the `kind:argument` shorthand, e.g. `set_field:Priority=High`,
 * `move_to_status:Done`, `assign:octocat`, `archive_item`.
 */
export function parseActionString(input: string): WorkflowAction {
  const trimmed = input.trim();
  const colon = trimmed.indexOf(":");
  const kind = (colon === -1 ? trimmed : trimmed.slice(0, colon)).toLowerCase();
  const arg = colon === -1 ? "" : trimmed.slice(colon + 1).trim();

  const invalid = (usage: string) =>
    new InvalidRequestError(`Invalid action "${input}". Use ${usage}`);

  switch (kind) {
    case "set_field": {
      const eq = arg.indexOf("=");
      if (eq <= 0) throw invalid("set_field:Field=Value");
      return {
        kind: "set_field",
        field: arg.slice(0, eq).trim(),
        value: arg.slice(eq + 1).trim(),
      };
    }
    case "clear_field":
      if (!arg) throw invalid("clear_field:Field");
      return { kind: "clear_field", field: arg };
    case "move_to_status":
      if (!arg) throw invalid("move_to_status:Status");
      return { kind: "move_to_status", status: arg };
    case "assign":
      if (!arg) throw invalid("assign:login");
      return { kind: "assign", assignee: arg.replace(/^@/, "") };
    case "archive_item":
      return { kind: "archive_item" };
    case "add_comment":
      if (!arg) throw invalid("add_comment:text");
      return { kind: "add_comment", body: arg };
    default:
      throw new InvalidRequestError(
        `Unknown action "${kind}". Valid actions: set_field, clear_field, move_to_status, assign, archive_item, add_comment`,
      );
  }
}

/** Short human-readable form used by table output. */
export function describeAction(action: WorkflowAction): string {
  switch (action.kind) {
    case "set_field":
      return `set_field:${action.field}=${action.value}`;
    case "clear_field":
      return `clear_field:${action.field}`;
    case "move_to_status":
      return `move_to_status:${action.status}`;
    case "assign":
      return `assign:${action.assignee}`;
    case "archive_item":
      return "archive_item";
    case "add_comment":
      return `add_comment:${action.body}`;
  }
}

export function describeCondition(condition: WorkflowCondition | undefined): string {
  if (!condition) return "-";
  switch (condition.kind) {
    case "equals":
      return `${condition.field}=${condition.value}`;
    case "not_equals":
      return `${condition.field}!=${condition.value}`;
    case "in":
      return `${condition.field} in [${condition.values.join(", ")}]`;
  }
}

// ---------------------------------------------------------------------------
// Input forms (tool arguments and YAML)
// ---------------------------------------------------------------------------

/** A condition given either as a tagged object or as the legacy string. */
export const ConditionInputSchema = z.union([
  WorkflowConditionSchema,
  z.string().transform((value, ctx): WorkflowCondition => {
    try {
      return parseConditionString(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  }),
]);

/** An action given either as a tagged object or as the legacy string. */
export const ActionInputSchema = z.union([
  WorkflowActionSchema,
  z.string().transform((value, ctx): WorkflowAction => {
    try {
      return parseActionString(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  }),
]);

export const WORKFLOW_NAME_MAX_LENGTH = 100;

export const WorkflowNameSchema = z
  .string()
  .trim()
  .min(1, "workflow name cannot be empty")
  .max(
    WORKFLOW_NAME_MAX_LENGTH,
    `workflow name cannot exceed ${WORKFLOW_NAME_MAX_LENGTH} characters`,
  );

// ---------------------------------------------------------------------------
// Workflow file
// ---------------------------------------------------------------------------

const ProjectRefSchema = z
  .string()
  .regex(/^[^/\s]+\/\d+$/, "project must be owner/project-number");

/**
 * A single seeded workflow.
 *
 * Example YAML:
 *   - name: "Close done issues"
 *     trigger: issue_closed
 *     condition: "Status!=Done"
 *     action: "move_to_status:Done"
 */
export const WorkflowEntrySchema = z.object({
  name: WorkflowNameSchema,
  project: ProjectRefSchema.optional().describe("Overrides the file-level project"),
  trigger: WorkflowTriggerSchema,
  condition: ConditionInputSchema.optional(),
  action: ActionInputSchema,
  enabled: z.boolean().optional().default(true),
});

/**
 * Top-level workflow seed file (`.ghx-workflows.yml`).
 *
 * Example YAML:
 *   version: 1
 *   project: octo-org/3
 *   workflows:
 *     - name: "Triage new items"
 *       trigger: item_added
 *       action:
 *         kind: set_field
 *         field: Priority
 *         value: Medium
 */
export const WorkflowConfigSchema = z
  .object({
    version: z.literal(1),
    project: ProjectRefSchema.optional(),
    workflows: z.array(WorkflowEntrySchema).default([]),
  })
  .superRefine((config, ctx) => {
    config.workflows.forEach((entry, i) => {
      if (!entry.project && !config.project) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["workflows", i, "project"],
          message: "project is required when the file has no top-level project",
        });
      }
    });
  });

export type WorkflowEntry = z.infer<typeof WorkflowEntrySchema>;
export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export type WorkflowState = "ENABLED" | "DISABLED";

export interface WorkflowDefinition {
  id: string;
  projectId: string;
  name: string;
  trigger: WorkflowTrigger;
  condition?: WorkflowCondition;
  action: WorkflowAction;
  status: WorkflowState;
  createdAt: Date;
  updatedAt: Date;
}

export interface WorkflowExecution {
  workflowId: string;
  workflowName: string;
  trigger: WorkflowTrigger;
  status: "SUCCESS" | "FAILURE";
  durationMs: number;
  executedAt: Date;
  error?: string;
}

export interface WorkflowStatus {
  projectId: string;
  totalWorkflows: number;
  activeWorkflows: number;
  totalExecutions: number;
  /** Percentage in [0, 100]; 0 when nothing has executed */
  successRate: number;
  recentExecutions: WorkflowExecution[];
}

/** Payload values are strings, or string lists for labels/assignees. */
export type EventPayload = Record<string, string | string[] | undefined>;

export interface WorkflowEvent {
  projectId: string;
  trigger: WorkflowTrigger;
  itemId: string;
  contentId?: string;
  payload: EventPayload;
}
