/**
 * Shared helpers for the MCP tool modules: the services every tool
 * receives, project argument resolution and output rendering.
 */

import { z } from "zod";
import type { BulkOperationCoordinator, OperationTracker } from "./bulk-operations.js";
import { resolveProjectRef, type GhxConfig } from "./config.js";
import type { DebugLogger } from "./debug-logger.js";
import { InvalidRequestError } from "./errors.js";
import type { OutputFormat } from "./format.js";
import type { ProjectDataProvider, ProjectSummary } from "./provider.js";
import type { WorkflowEngine } from "./workflow-engine.js";
import { toolSuccess, toolText, type ToolResult } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ToolContext {
  config: Pick<GhxConfig, "owner" | "projectNumber">;
  provider: ProjectDataProvider;
  coordinator: BulkOperationCoordinator;
  tracker: OperationTracker;
  engine: WorkflowEngine;
  debugLogger: DebugLogger | null;
}

// ---------------------------------------------------------------------------
// Shared argument shapes
// ---------------------------------------------------------------------------

export const projectArgs = {
  project: z
    .string()
    .optional()
    .describe("Project as owner/number (e.g. octo-org/3)"),
  owner: z
    .string()
    .optional()
    .describe("Project owner login. Defaults to GHX_OWNER"),
  number: z.coerce
    .number()
    .optional()
    .describe("Project number. Defaults to GHX_PROJECT_NUMBER"),
};

export const formatArg = z
  .enum(["table", "json"])
  .optional()
  .default("table")
  .describe("Output format (default: table)");

// ---------------------------------------------------------------------------
// Project resolution
// ---------------------------------------------------------------------------

export async function resolveProject(
  ctx: Pick<ToolContext, "config" | "provider">,
  args: { project?: string; owner?: string; number?: number },
): Promise<ProjectSummary> {
  const ref = resolveProjectRef(ctx.config, args);
  return ctx.provider.fetchProject(ref.owner, ref.number);
}

// ---------------------------------------------------------------------------
// Input parsing
// ---------------------------------------------------------------------------

/**
 * Parse a tool argument with a Zod schema, reporting failures as
 * InvalidRequestError.
 */
export function parseArg<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((i) => i.message).join("; ");
    throw new InvalidRequestError(`Invalid ${label}: ${detail}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function render(
  format: OutputFormat,
  json: unknown,
  table: () => string,
): ToolResult {
  return format === "json" ? toolSuccess(json) : toolText(table());
}
