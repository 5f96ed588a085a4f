/**
 * MCP tools for bulk item operations and operation status.
 *
 * Field updates are resolved against the project's fields before the
 * operation starts, so an unknown field or option rejects the whole batch
 * with no mutations sent. Partial failures come back as a normal result
 * with status PARTIALLY_FAILED.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  MAX_BULK_ITEMS,
  validateItemIds,
  type BulkOperationType,
} from "../lib/bulk-operations.js";
import { withLogging } from "../lib/debug-logger.js";
import { InvalidRequestError, describeError } from "../lib/errors.js";
import { resolveFieldUpdates } from "../lib/field-updates.js";
import { operationToJson, renderOperation } from "../lib/format.js";
import {
  formatArg,
  projectArgs,
  render,
  resolveProject,
  type ToolContext,
} from "../lib/helpers.js";
import type { ResolvedFieldUpdate } from "../lib/provider.js";
import { toolError, toolSuccess, toolText, type ToolResult } from "../types.js";

const itemIdsArg = z
  .array(z.string())
  .describe(`Project item node IDs (PVTI_...), at most ${MAX_BULK_ITEMS}`);

export function registerBulkTools(server: McpServer, ctx: ToolContext): void {
  async function runBulk(
    type: BulkOperationType,
    args: {
      project?: string;
      owner?: string;
      number?: number;
      itemIds: string[];
      updates?: Record<string, string | number | null>;
      format: "table" | "json";
    },
  ): Promise<ToolResult> {
    // Input checks first: nothing remote happens for a malformed batch
    validateItemIds(args.itemIds);
    if (type === "UPDATE" && Object.keys(args.updates ?? {}).length === 0) {
      throw new InvalidRequestError("updates must name at least one field");
    }

    const project = await resolveProject(ctx, args);
    const updates: ResolvedFieldUpdate[] | undefined =
      type === "UPDATE"
        ? resolveFieldUpdates(project.fields, args.updates ?? {})
        : undefined;

    const operation = await ctx.coordinator.submit({
      projectId: project.id,
      type,
      itemIds: args.itemIds,
      updates,
    });

    return render(args.format, operationToJson(operation), () =>
      renderOperation(operation),
    );
  }

  // -------------------------------------------------------------------------
  // ghx__bulk_update
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__bulk_update",
    "Update field values on many project items as one tracked operation. Each item is attempted once; failures are reported per item.",
    {
      ...projectArgs,
      itemIds: itemIdsArg,
      updates: z
        .record(z.union([z.string(), z.number(), z.null()]))
        .describe(
          'Field name to value, e.g. { "Status": "Done", "Points": 3 }. null clears the field.',
        ),
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__bulk_update", args, async () => {
        try {
          return await runBulk("UPDATE", args);
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__bulk_delete
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__bulk_delete",
    "Remove many items from a project as one tracked operation. Issues and pull requests themselves are not deleted.",
    {
      ...projectArgs,
      itemIds: itemIdsArg,
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__bulk_delete", args, async () => {
        try {
          return await runBulk("DELETE", args);
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__bulk_archive
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__bulk_archive",
    "Archive many project items as one tracked operation.",
    {
      ...projectArgs,
      itemIds: itemIdsArg,
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__bulk_archive", args, async () => {
        try {
          return await runBulk("ARCHIVE", args);
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );

  // -------------------------------------------------------------------------
  // ghx__operation_status
  // -------------------------------------------------------------------------

  server.tool(
    "ghx__operation_status",
    "Get the status of a bulk operation started in this session. Omit operationId to list all of them.",
    {
      operationId: z
        .string()
        .optional()
        .describe("Operation ID returned by a bulk tool"),
      format: formatArg,
    },
    async (args) =>
      withLogging(ctx.debugLogger, "ghx__operation_status", args, async () => {
        try {
          if (args.operationId) {
            const operation = ctx.tracker.get(args.operationId);
            return render(args.format, operationToJson(operation), () =>
              renderOperation(operation),
            );
          }

          const operations = ctx.tracker.list();
          if (args.format === "json") {
            return toolSuccess({ operations: operations.map(operationToJson) });
          }
          return toolText(
            operations.length === 0
              ? "No bulk operations in this session"
              : operations.map(renderOperation).join("\n\n"),
          );
        } catch (error) {
          return toolError(describeError(error));
        }
      }),
  );
}
