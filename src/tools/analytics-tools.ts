/**
 * MCP tools for project analytics.
 *
 * Each call reads the whole item set of the project; nothing is cached
 * between calls.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  VELOCITY_PERIODS,
  aggregateAnalytics,
  buildAssigneeStats,
  buildStatusStats,
  buildTimeline,
  calculateVelocity,
  collectItems,
  DEFAULT_STATUS_FIELD,
} from "../lib/analytics.js";
import { parseDateMath } from "../lib/date-math.js";
import { withLogging } from "../lib/debug-logger.js";
import { describeError } from "../lib/errors.js";
import { exportProject } from "../lib/export.js";
import { findField } from "../lib/field-updates.js";
import {
  analyticsToJson,
  exportToJson,
  formatDays,
  formatPercent,
  renderAnalytics,
  renderDistribution,
  renderExport,
} from "../lib/format.js";
import {
  formatArg,
  projectArgs,
  render,
  resolveProject,
  type ToolContext,
} from "../lib/helpers.js";
import { toolError } from "../types.js";

const periodArg = z
  .enum(VELOCITY_PERIODS)
  .optional()
  .default("monthly")
  .describe("Velocity window: weekly, monthly or quarterly (default: monthly)");

const asOfArg = z
  .string()
  .optional()
  .describe("End of the velocity window: @now, @today-7d or YYYY-MM-DD (default: now)");

const statusFieldArg = z
  .string()
  .optional()
  .describe(`Single-select field to group by (default: ${DEFAULT_STATUS_FIELD})`);

export function registerAnalyticsTools(server: McpServer, ctx: ToolContext): void {
  // -------------------------------------------------------------------------
  // ghx__analytics_overview
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__analytics_overview",
    "Project overview: item counts, status and assignee distribution, velocity and timeline",
    {
      ...projectArgs,
      period: periodArg,
      asOf: asOfArg,
      statusField: statusFieldArg,
      includeTimeline: z
        .boolean()
        .optional()
        .default(true)
        .describe("Include timeline information (default: true)"),
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__analytics_overview", args, async () => {
        try {
          const now = args.asOf ? parseDateMath(args.asOf) : new Date();
          const project = await resolveProject(ctx, args);
          const info = await aggregateAnalytics(ctx.provider, project, {
            statusField: args.statusField,
            period: args.period,
            includeTimeline: args.includeTimeline,
            now,
          });
          return render(args.format, analyticsToJson(info), () => renderAnalytics(info));
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__analytics_distribution
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__analytics_distribution",
    "Item counts per status and per assignee",
    { ...projectArgs, statusField: statusFieldArg, format: formatArg },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__analytics_distribution", args, async () => {
        try {
          const project = await resolveProject(ctx, args);
          const items = await collectItems(ctx.provider, project.id);
          const fieldName = args.statusField ?? DEFAULT_STATUS_FIELD;
          const statusStats = buildStatusStats(
            items,
            findField(project.fields, fieldName),
            fieldName,
          );
          const assigneeStats = buildAssigneeStats(items);

          const json = analyticsToJson({
            projectId: project.id,
            title: project.title,
            itemCount: items.length,
            fieldCount: project.fields.length,
            viewCount: project.views.length,
            statusStats,
            assigneeStats,
          });
          return render(
            args.format,
            {
              projectId: project.id,
              itemCount: items.length,
              statusDistribution: json.statusDistribution,
              assigneeDistribution: json.assigneeDistribution,
            },
            () => {
              const lines = [`Distribution: ${project.title} (${items.length} items)`];
              const status = renderDistribution("By Status:", statusStats, items.length);
              const assignees = renderDistribution("By Assignee:", assigneeStats, items.length);
              if (status.length > 0) lines.push("", ...status);
              if (assignees.length > 0) lines.push("", ...assignees);
              return lines.join("\n");
            },
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__analytics_velocity
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__analytics_velocity",
    "Completed and added items, closure rate, lead time and cycle time over a rolling window",
    { ...projectArgs, period: periodArg, asOf: asOfArg, format: formatArg },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__analytics_velocity", args, async () => {
        try {
          const now = args.asOf ? parseDateMath(args.asOf) : new Date();
          const project = await resolveProject(ctx, args);
          const items = await collectItems(ctx.provider, project.id);
          const velocity = calculateVelocity(items, args.period, now);

          return render(
            args.format,
            {
              projectId: project.id,
              ...velocity,
              leadTime: velocity.leadTime === null ? null : Math.round(velocity.leadTime * 10) / 10,
              cycleTime:
                velocity.cycleTime === null ? null : Math.round(velocity.cycleTime * 10) / 10,
            },
            () =>
              [
                `Velocity: ${project.title} (${velocity.period}, ${velocity.startDate} to ${velocity.endDate})`,
                `  Completed Items:    ${velocity.completedItems}`,
                `  Added Items:        ${velocity.addedItems}`,
                `  Closure Rate:       ${formatPercent(velocity.closureRate * 100)}`,
                `  Average Lead Time:  ${formatDays(velocity.leadTime)}`,
                `  Average Cycle Time: ${formatDays(velocity.cycleTime)}`,
              ].join("\n"),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__analytics_timeline
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__analytics_timeline",
    "Date span of a project's items and iterations, milestone and activity counts",
    { ...projectArgs, format: formatArg },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__analytics_timeline", args, async () => {
        try {
          const project = await resolveProject(ctx, args);
          const items = await collectItems(ctx.provider, project.id);
          const timeline = buildTimeline(items);

          return render(args.format, { projectId: project.id, ...timeline }, () => {
            const lines = [`Timeline: ${project.title}`];
            if (timeline.startDate) lines.push(`  Start Date: ${timeline.startDate}`);
            if (timeline.endDate) lines.push(`  End Date:   ${timeline.endDate}`);
            lines.push(`  Duration:   ${timeline.duration} days`);
            lines.push(`  Milestones: ${timeline.milestoneCount}`);
            lines.push(`  Activities: ${timeline.activityCount}`);
            return lines.join("\n");
          });
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__analytics_export
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__analytics_export",
    "Export project data: items, fields, views and this session's workflows. Sections are opt-in; includeAll selects every section.",
    {
      ...projectArgs,
      includeItems: z.boolean().optional().default(false).describe("Include project items"),
      includeFields: z.boolean().optional().default(false).describe("Include field definitions"),
      includeViews: z.boolean().optional().default(false).describe("Include views"),
      includeWorkflows: z
        .boolean()
        .optional()
        .default(false)
        .describe("Include workflows registered for the project"),
      includeAll: z.boolean().optional().default(false).describe("Include every section"),
      filter: z
        .string()
        .optional()
        .describe(
          "Item filter of key:value terms, e.g. 'state:open assignee:octocat Status:Done'. Keys: state, type, assignee, or a field name. Requires items.",
        ),
      format: z
        .enum(["table", "json"])
        .optional()
        .default("json")
        .describe("Output format (default: json)"),
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__analytics_export", args, async () => {
        try {
          const project = await resolveProject(ctx, args);
          const data = await exportProject(ctx.provider, project, ctx.engine.list(project.id), {
            includeItems: args.includeAll || args.includeItems,
            includeFields: args.includeAll || args.includeFields,
            includeViews: args.includeAll || args.includeViews,
            includeWorkflows: args.includeAll || args.includeWorkflows,
            filter: args.filter,
          });
          return render(args.format, exportToJson(data), () => renderExport(data));
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );
}
