/**
 * MCP tools for automation workflows: CRUD, status and event evaluation.
 *
 * Conditions and actions accept either the tagged object form or the
 * shorthand strings (`Status=Done`, `move_to_status:Done`).
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { withLogging } from "../lib/debug-logger.js";
import { describeError } from "../lib/errors.js";
import {
  executionToJson,
  renderExecutions,
  renderWorkflow,
  renderWorkflowList,
  renderWorkflowStatus,
  workflowStatusToJson,
  workflowToJson,
} from "../lib/format.js";
import {
  formatArg,
  parseArg,
  projectArgs,
  render,
  resolveProject,
  type ToolContext,
} from "../lib/helpers.js";
import {
  ActionInputSchema,
  ConditionInputSchema,
  WORKFLOW_TRIGGERS,
  WorkflowActionSchema,
  WorkflowConditionSchema,
  WorkflowTriggerSchema,
  describeAction,
} from "../lib/workflow-types.js";
import { toolError, toolSuccess, toolText } from "../types.js";

const triggerArg = z
  .string()
  .describe(`Trigger: ${WORKFLOW_TRIGGERS.join(", ")}`);

const conditionArg = z
  .union([z.string(), WorkflowConditionSchema])
  .describe(
    'Condition, e.g. "Status=Todo", "Priority!=Low" or { kind: "in", field, values }',
  );

const actionArg = z
  .union([z.string(), WorkflowActionSchema])
  .describe(
    'Action, e.g. "move_to_status:Done", "set_field:Priority=High", "assign:octocat", "archive_item"',
  );

export function registerWorkflowTools(server: McpServer, ctx: ToolContext): void {
  // -------------------------------------------------------------------------
  // ghx__workflow_list
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__workflow_list",
    "List a project's automation workflows in creation order",
    { ...projectArgs, format: formatArg },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__workflow_list", args, async () => {
        try {
          const project = await resolveProject(ctx, args);
          const workflows = ctx.engine.list(project.id);
          return render(
            args.format,
            { projectId: project.id, workflows: workflows.map(workflowToJson) },
            () => renderWorkflowList(workflows),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__workflow_create
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__workflow_create",
    "Create an automation workflow (trigger, optional condition, action) on a project",
    {
      ...projectArgs,
      name: z.string().describe("Workflow name (1-100 characters)"),
      trigger: triggerArg,
      condition: conditionArg.optional(),
      action: actionArg,
      disabled: z
        .boolean()
        .optional()
        .default(false)
        .describe("Create the workflow disabled (default: false)"),
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__workflow_create", args, async () => {
        try {
          // Parse everything before the project lookup
          const trigger = parseArg(WorkflowTriggerSchema, args.trigger, "trigger");
          const condition =
            args.condition === undefined
              ? undefined
              : parseArg(ConditionInputSchema, args.condition, "condition");
          const action = parseArg(ActionInputSchema, args.action, "action");

          const project = await resolveProject(ctx, args);
          const workflow = ctx.engine.create({
            projectId: project.id,
            name: args.name,
            trigger,
            condition,
            action,
            enabled: !args.disabled,
          });
          return render(args.format, workflowToJson(workflow), () =>
            renderWorkflow(workflow),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__workflow_update
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__workflow_update",
    "Update a workflow. If both enable and disable are set, the workflow is disabled.",
    {
      workflowId: z.string().describe("Workflow ID"),
      name: z.string().optional().describe("New name"),
      trigger: triggerArg.optional(),
      condition: conditionArg.optional(),
      clearCondition: z
        .boolean()
        .optional()
        .describe("Remove the condition so the workflow always fires"),
      action: actionArg.optional(),
      enable: z.boolean().optional().describe("Enable the workflow"),
      disable: z.boolean().optional().describe("Disable the workflow"),
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__workflow_update", args, async () => {
        try {
          const workflow = ctx.engine.update(args.workflowId, {
            name: args.name,
            trigger:
              args.trigger === undefined
                ? undefined
                : parseArg(WorkflowTriggerSchema, args.trigger, "trigger"),
            condition: args.clearCondition
              ? null
              : args.condition === undefined
                ? undefined
                : parseArg(ConditionInputSchema, args.condition, "condition"),
            action:
              args.action === undefined
                ? undefined
                : parseArg(ActionInputSchema, args.action, "action"),
            enabled: args.enable,
            disabled: args.disable,
          });
          return render(args.format, workflowToJson(workflow), () =>
            renderWorkflow(workflow),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__workflow_delete
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__workflow_delete",
    "Delete a workflow. Its execution history stays in the project's status.",
    { workflowId: z.string().describe("Workflow ID") },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__workflow_delete", args, async () => {
        try {
          const workflow = ctx.engine.delete(args.workflowId);
          return toolSuccess({ deleted: true, id: workflow.id, name: workflow.name });
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__workflow_status
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__workflow_status",
    "Workflow counts, execution success rate and the most recent executions for a project",
    { ...projectArgs, format: formatArg },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__workflow_status", args, async () => {
        try {
          const project = await resolveProject(ctx, args);
          const status = ctx.engine.getWorkflowStatus(project.id);
          return render(args.format, workflowStatusToJson(status), () =>
            renderWorkflowStatus(status),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__workflow_evaluate
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__workflow_evaluate",
    "Evaluate a project event against enabled workflows and run the matching actions. With dryRun, only report which workflows would fire.",
    {
      ...projectArgs,
      trigger: triggerArg,
      itemId: z.string().describe("Project item node ID the event is about"),
      contentId: z
        .string()
        .optional()
        .describe("Issue or pull request node ID, if known"),
      payload: z
        .record(z.union([z.string(), z.array(z.string())]))
        .optional()
        .default({})
        .describe('Event data matched by conditions, e.g. { "Status": "Todo", "labels": ["bug"] }'),
      dryRun: z
        .boolean()
        .optional()
        .default(false)
        .describe("Report matches without running actions (default: false)"),
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__workflow_evaluate", args, async () => {
        try {
          const trigger = parseArg(WorkflowTriggerSchema, args.trigger, "trigger");
          const project = await resolveProject(ctx, args);
          const event = {
            projectId: project.id,
            trigger,
            itemId: args.itemId,
            contentId: args.contentId,
            payload: args.payload,
          };

          if (args.dryRun) {
            const matches = ctx.engine.match(event);
            if (args.format === "json") {
              return toolSuccess({ dryRun: true, matches });
            }
            return toolText(
              matches.length === 0
                ? "No workflows would fire"
                : matches
                    .map((m) => `${m.workflowName} (${m.workflowId}): ${describeAction(m.action)}`)
                    .join("\n"),
            );
          }

          const executions = await ctx.engine.evaluate(event);
          return render(
            args.format,
            { executions: executions.map(executionToJson) },
            () => renderExecutions(executions),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );
}
