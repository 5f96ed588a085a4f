/**
 * Rendering of operation, workflow and analytics records.
 *
 * Every record has a JSON shape with stable field names and a plain-text
 * table. Timestamps in JSON use YYYY-MM-DDTHH:mm:ssZ; tables use
 * YYYY-MM-DD HH:mm:ss (UTC).
 */

import type { AnalyticsInfo, DistributionBucket } from "./analytics.js";
import { withPercentages } from "./analytics.js";
import type { BulkOperation } from "./bulk-operations.js";
import type { ProjectExport } from "./export.js";
import type { ProjectItem } from "./provider.js";
import {
  describeAction,
  describeCondition,
  type WorkflowDefinition,
  type WorkflowExecution,
  type WorkflowStatus,
} from "./workflow-types.js";

export type OutputFormat = "table" | "json";

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** ISO 8601 without milliseconds, e.g. 2026-03-01T09:30:00Z */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function formatTableTimestamp(date: Date): string {
  return formatTimestamp(date).replace("T", " ").replace("Z", "");
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatDays(value: number | null): string {
  return value === null ? "n/a" : `${value.toFixed(1)} days`;
}

function renderFields(rows: Array<[string, string]>, indent = "  "): string[] {
  const width = Math.max(...rows.map(([label]) => label.length)) + 1;
  return rows.map(([label, value]) => `${indent}${`${label}:`.padEnd(width + 1)}${value}`);
}

/**
 * Left-aligned columns separated by two spaces.
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
  );
  const line = (cells: string[]) =>
    cells
      .map((c, i) => (i === cells.length - 1 ? c : c.padEnd(widths[i])))
      .join("  ")
      .trimEnd();
  return [line(headers), line(widths.map((w) => "-".repeat(w))), ...rows.map(line)].join("\n");
}

// ---------------------------------------------------------------------------
// Bulk operations
// ---------------------------------------------------------------------------

export function operationToJson(op: BulkOperation): Record<string, unknown> {
  return {
    operationId: op.id,
    projectId: op.projectId,
    type: op.type,
    status: op.status,
    progress: op.progress,
    totalItems: op.totalItems,
    processedItems: op.processedItems,
    failedItems: op.failedItems,
    createdAt: formatTimestamp(op.createdAt),
    completedAt: op.completedAt ? formatTimestamp(op.completedAt) : null,
    errorMessage: op.errorMessage ?? null,
    failures: op.failures,
  };
}

export function renderOperation(op: BulkOperation): string {
  const rows: Array<[string, string]> = [
    ["Type", op.type],
    ["Status", op.status],
    ["Progress", `${formatPercent(op.progress * 100)} (${op.processedItems}/${op.totalItems})`],
    ["Failed Items", String(op.failedItems)],
    ["Created", formatTableTimestamp(op.createdAt)],
  ];
  if (op.completedAt) rows.push(["Completed", formatTableTimestamp(op.completedAt)]);
  if (op.errorMessage) rows.push(["Error", op.errorMessage]);

  const lines = [`Bulk Operation: ${op.id}`, ...renderFields(rows)];
  if (op.failures.length > 0) {
    lines.push("", "Failures:");
    for (const f of op.failures) {
      lines.push(`  ${f.itemId}: ${f.error}`);
    }
  }
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Workflows
// ---------------------------------------------------------------------------

export function workflowToJson(wf: WorkflowDefinition): Record<string, unknown> {
  return {
    id: wf.id,
    projectId: wf.projectId,
    name: wf.name,
    trigger: wf.trigger,
    condition: wf.condition ?? null,
    action: wf.action,
    status: wf.status,
    createdAt: formatTimestamp(wf.createdAt),
    updatedAt: formatTimestamp(wf.updatedAt),
  };
}

export function executionToJson(e: WorkflowExecution): Record<string, unknown> {
  return {
    workflowId: e.workflowId,
    workflowName: e.workflowName,
    trigger: e.trigger,
    status: e.status,
    durationMs: e.durationMs,
    executedAt: formatTimestamp(e.executedAt),
    ...(e.error ? { error: e.error } : {}),
  };
}

export function workflowStatusToJson(status: WorkflowStatus): Record<string, unknown> {
  return {
    projectId: status.projectId,
    totalWorkflows: status.totalWorkflows,
    activeWorkflows: status.activeWorkflows,
    totalExecutions: status.totalExecutions,
    successRate: Math.round(status.successRate * 10) / 10,
    recentExecutions: status.recentExecutions.map(executionToJson),
  };
}

export function renderWorkflowList(workflows: WorkflowDefinition[]): string {
  if (workflows.length === 0) return "No workflows found";
  return renderTable(
    ["ID", "NAME", "TRIGGER", "CONDITION", "ACTION", "STATUS"],
    workflows.map((wf) => [
      wf.id,
      wf.name,
      wf.trigger,
      describeCondition(wf.condition),
      describeAction(wf.action),
      wf.status,
    ]),
  );
}

export function renderWorkflow(wf: WorkflowDefinition): string {
  return [
    `Workflow: ${wf.name}`,
    ...renderFields([
      ["ID", wf.id],
      ["Trigger", wf.trigger],
      ["Condition", describeCondition(wf.condition)],
      ["Action", describeAction(wf.action)],
      ["Status", wf.status],
      ["Created", formatTableTimestamp(wf.createdAt)],
      ["Updated", formatTableTimestamp(wf.updatedAt)],
    ]),
  ].join("\n");
}

export function renderExecutions(executions: WorkflowExecution[]): string {
  if (executions.length === 0) return "No executions";
  return renderTable(
    ["WORKFLOW", "TRIGGER", "STATUS", "DURATION", "EXECUTED"],
    executions.map((e) => [
      e.workflowName,
      e.trigger,
      e.error ? `${e.status} (${e.error})` : e.status,
      `${e.durationMs}ms`,
      formatTableTimestamp(e.executedAt),
    ]),
  );
}

export function renderWorkflowStatus(status: WorkflowStatus): string {
  const lines = [
    `Workflow Status: ${status.projectId}`,
    ...renderFields([
      ["Total Workflows", String(status.totalWorkflows)],
      ["Active Workflows", String(status.activeWorkflows)],
      ["Total Executions", String(status.totalExecutions)],
      ["Success Rate", formatPercent(status.successRate)],
    ]),
  ];
  if (status.recentExecutions.length > 0) {
    lines.push("", "Recent Executions:", renderExecutions(status.recentExecutions));
  }
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Analytics
// ---------------------------------------------------------------------------

function distributionToJson(
  buckets: DistributionBucket[],
  itemCount: number,
  key: "status" | "assignee",
): Array<Record<string, unknown>> {
  return withPercentages(buckets, itemCount).map((b) => ({
    [key]: b.category,
    count: b.count,
    ...(b.percentage === null ? {} : { percentage: b.percentage }),
  }));
}

export function analyticsToJson(info: AnalyticsInfo): Record<string, unknown> {
  const velocity = info.velocityData;
  return {
    projectId: info.projectId,
    title: info.title,
    itemCount: info.itemCount,
    fieldCount: info.fieldCount,
    viewCount: info.viewCount,
    statusDistribution: distributionToJson(info.statusStats, info.itemCount, "status"),
    assigneeDistribution: distributionToJson(info.assigneeStats, info.itemCount, "assignee"),
    velocity: velocity
      ? {
          ...velocity,
          leadTime: velocity.leadTime === null ? null : Math.round(velocity.leadTime * 10) / 10,
          cycleTime: velocity.cycleTime === null ? null : Math.round(velocity.cycleTime * 10) / 10,
        }
      : null,
    timeline: info.timelineData ?? null,
  };
}

export function renderDistribution(
  heading: string,
  buckets: DistributionBucket[],
  itemCount: number,
): string[] {
  if (buckets.length === 0) return [];
  return [
    heading,
    ...withPercentages(buckets, itemCount).map((b) => {
      const pct = b.percentage === null ? "" : ` (${formatPercent(b.percentage)})`;
      return `  ${b.category.padEnd(20)} ${String(b.count).padStart(3)} items${pct}`;
    }),
  ];
}

export function renderAnalytics(info: AnalyticsInfo): string {
  const lines = [
    `Project Overview: ${info.title}`,
    "",
    "Basic Statistics:",
    ...renderFields([
      ["Project ID", info.projectId],
      ["Total Items", String(info.itemCount)],
      ["Total Fields", String(info.fieldCount)],
      ["Total Views", String(info.viewCount)],
    ]),
  ];

  const status = renderDistribution("Item Distribution by Status:", info.statusStats, info.itemCount);
  if (status.length > 0) lines.push("", ...status);

  const assignees = renderDistribution(
    "Item Distribution by Assignee:",
    info.assigneeStats,
    info.itemCount,
  );
  if (assignees.length > 0) lines.push("", ...assignees);

  const velocity = info.velocityData;
  if (velocity) {
    lines.push(
      "",
      `Velocity Metrics (${velocity.period}, ${velocity.startDate} to ${velocity.endDate}):`,
      ...renderFields([
        ["Completed Items", String(velocity.completedItems)],
        ["Added Items", String(velocity.addedItems)],
        ["Closure Rate", formatPercent(velocity.closureRate * 100)],
        ["Average Lead Time", formatDays(velocity.leadTime)],
        ["Average Cycle Time", formatDays(velocity.cycleTime)],
      ]),
    );
  }

  const timeline = info.timelineData;
  if (timeline) {
    const rows: Array<[string, string]> = [];
    if (timeline.startDate) rows.push(["Start Date", timeline.startDate]);
    if (timeline.endDate) rows.push(["End Date", timeline.endDate]);
    if (timeline.duration > 0) rows.push(["Duration", `${timeline.duration} days`]);
    rows.push(["Milestones", String(timeline.milestoneCount)]);
    rows.push(["Activities", String(timeline.activityCount)]);
    lines.push("", "Timeline Information:", ...renderFields(rows));
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

function itemState(item: ProjectItem): "OPEN" | "CLOSED" {
  return item.closedAt ? "CLOSED" : "OPEN";
}

function itemToJson(item: ProjectItem): Record<string, unknown> {
  return {
    id: item.id,
    type: item.type,
    state: itemState(item),
    number: item.number,
    title: item.title,
    contentId: item.contentId,
    createdAt: item.createdAt,
    addedAt: item.addedAt,
    closedAt: item.closedAt,
    assignees: item.assignees,
    milestone: item.milestone,
    fields: item.fields,
  };
}

/** Counts are always present; each section only when it was requested. */
export function exportToJson(data: ProjectExport): Record<string, unknown> {
  return {
    projectId: data.projectId,
    title: data.title,
    number: data.number,
    exportDate: formatTimestamp(data.exportDate),
    filter: data.filter,
    itemCount: data.items.length,
    fieldCount: data.fields.length,
    viewCount: data.views.length,
    workflowCount: data.workflows.length,
    ...(data.included.items ? { items: data.items.map(itemToJson) } : {}),
    ...(data.included.fields ? { fields: data.fields } : {}),
    ...(data.included.views ? { views: data.views } : {}),
    ...(data.included.workflows ? { workflows: data.workflows.map(workflowToJson) } : {}),
  };
}

const SAMPLE_ITEMS = 3;

export function renderExport(data: ProjectExport): string {
  const details: Array<[string, string]> = [
    ["Project ID", data.projectId],
    ["Export Date", formatTableTimestamp(data.exportDate)],
  ];
  if (data.filter) details.push(["Filter", data.filter]);

  const lines = [
    `Project Export: ${data.title}`,
    "",
    ...renderFields(details),
    "",
    "Exported Data:",
    ...renderFields([
      ["Items", String(data.items.length)],
      ["Fields", String(data.fields.length)],
      ["Views", String(data.views.length)],
      ["Workflows", String(data.workflows.length)],
    ]),
  ];

  if (data.items.length > 0) {
    lines.push("", "Sample Items:");
    for (const item of data.items.slice(0, SAMPLE_ITEMS)) {
      lines.push(`  - ${item.title || item.id} (${item.type}) - ${itemState(item)}`);
    }
    if (data.items.length > SAMPLE_ITEMS) {
      lines.push(`  ... and ${data.items.length - SAMPLE_ITEMS} more items`);
    }
  }
  return lines.join("\n");
}
