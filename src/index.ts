#!/usr/bin/env node
/**
 * ghx-automation MCP server - entry point
 *
 * Creates an MCP server exposing bulk item operations, workflow
 * automation and analytics for GitHub Projects V2. Connects via stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGitHubClient, type GitHubClient } from "./github-client.js";
import { BulkOperationCoordinator, OperationTracker } from "./lib/bulk-operations.js";
import { loadConfig, type GhxConfig } from "./lib/config.js";
import { createDebugLogger } from "./lib/debug-logger.js";
import { AuthenticationError, errorMessage } from "./lib/errors.js";
import { GitHubProjectProvider } from "./lib/github-provider.js";
import type { ToolContext } from "./lib/helpers.js";
import type { ProjectDataProvider } from "./lib/provider.js";
import { loadWorkflowConfig, seedWorkflows } from "./lib/workflow-config.js";
import { WorkflowEngine } from "./lib/workflow-engine.js";
import { registerAnalyticsTools } from "./tools/analytics-tools.js";
import { registerBulkTools } from "./tools/bulk-tools.js";
import { registerWorkflowTools } from "./tools/workflow-tools.js";
import { toolSuccess } from "./types.js";

function initConfig(): GhxConfig {
  try {
    const config = loadConfig();
    console.error(`[ghx] Token: ${config.tokenSource}`);
    if (config.projectToken) {
      console.error("[ghx] Project token: GHX_PROJECT_TOKEN (separate)");
    }
    if (!config.owner || !config.projectNumber) {
      console.error(
        "[ghx] Warning: GHX_OWNER and/or GHX_PROJECT_NUMBER not set.\n" +
          "Tools will need an explicit project argument (owner/number).",
      );
    }
    return config;
  } catch (error) {
    if (error instanceof AuthenticationError) {
      console.error(
        `[ghx] Error: ${error.message}\n` +
          "\n" +
          "  GHX_TOKEN          - Token with 'project' and 'repo' scopes\n" +
          "  GHX_PROJECT_TOKEN  - Optional separate token for project operations\n" +
          "\n" +
          "Generate tokens at: https://github.com/settings/tokens",
      );
    } else {
      console.error(`[ghx] Error: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}

/**
 * Create the workflows listed in the workflows file. Failures are logged;
 * the server starts either way.
 */
async function seedFromFile(
  config: GhxConfig,
  engine: WorkflowEngine,
  provider: ProjectDataProvider,
): Promise<void> {
  const loaded = await loadWorkflowConfig(config.workflowsFile);
  if (loaded.status === "missing") return;
  if (loaded.status === "error") {
    for (const e of loaded.errors) {
      console.error(
        `[ghx] ${config.workflowsFile}: ${e.phase} ${e.path.join(".")}: ${e.message}`,
      );
    }
    return;
  }

  const result = await seedWorkflows(engine, provider, loaded.config);
  console.error(
    `[ghx] Loaded ${result.created.length} workflow(s) from ${loaded.filePath}`,
  );
  for (const skipped of result.skipped) {
    console.error(`[ghx] Skipped workflows for ${skipped.project}: ${skipped.error}`);
  }
}

function registerCoreTools(
  server: McpServer,
  client: GitHubClient,
  ctx: ToolContext,
): void {
  server.tool(
    "ghx__health_check",
    "Validate GitHub API connectivity, token permissions and access to the default project",
    {},
    async () => {
      const checks: Record<string, { status: string; detail?: string }> = {};

      try {
        const login = await client.getAuthenticatedUser();
        checks.auth = { status: "ok", detail: `Authenticated as ${login}` };
      } catch (e) {
        checks.auth = { status: "fail", detail: `Auth failed: ${errorMessage(e)}` };
      }

      const { owner, projectNumber } = ctx.config;
      if (owner && projectNumber) {
        try {
          const project = await ctx.provider.fetchProject(owner, projectNumber);
          checks.projectAccess = {
            status: "ok",
            detail: `${project.title} (#${projectNumber}, ${project.fields.length} fields)`,
          };
        } catch (e) {
          checks.projectAccess = {
            status: "fail",
            detail: `Project access failed: ${errorMessage(e)}. Token may lack 'project' scope.`,
          };
        }
      } else {
        checks.projectAccess = {
          status: "skip",
          detail: "GHX_OWNER/GHX_PROJECT_NUMBER not set",
        };
      }

      const rateLimit = client.getRateLimitStatus();
      checks.rateLimit = {
        status: rateLimit.isCritical ? "fail" : "ok",
        detail: `${rateLimit.remaining} remaining, resets ${rateLimit.resetAt.toISOString()}`,
      };

      const allOk = Object.values(checks).every(
        (c) => c.status === "ok" || c.status === "skip",
      );
      return toolSuccess({
        status: allOk ? "ok" : "issues_found",
        checks,
        config: {
          owner: owner || "(not set)",
          projectNumber: projectNumber || "(not set)",
          tokenMode: client.config.projectToken ? "dual-token" : "single-token",
          trackedOperations: ctx.tracker.size,
        },
      });
    },
  );
}

async function main(): Promise<void> {
  console.error("[ghx] Starting MCP server...");

  const config = initConfig();
  const debugLogger = createDebugLogger(config.debug);

  const client = createGitHubClient(
    {
      token: config.token,
      projectToken: config.projectToken,
      owner: config.owner,
      projectNumber: config.projectNumber,
    },
    debugLogger,
  );
  const provider = new GitHubProjectProvider(client);

  const tracker = new OperationTracker();
  const coordinator = new BulkOperationCoordinator(provider, {
    concurrency: config.bulkConcurrency,
    itemTimeoutMs: config.requestTimeoutMs,
    tracker,
    debugLogger,
  });
  const engine = new WorkflowEngine(provider, {
    recentLimit: config.recentExecutionsLimit,
    debugLogger,
  });

  try {
    await seedFromFile(config, engine, provider);
  } catch (error) {
    console.error(`[ghx] Could not load ${config.workflowsFile}: ${errorMessage(error)}`);
  }

  const ctx: ToolContext = { config, provider, coordinator, tracker, engine, debugLogger };

  const server = new McpServer({
    name: "ghx-automation",
    version: "0.1.0",
  });

  registerCoreTools(server, client, ctx);
  registerBulkTools(server, ctx);
  registerWorkflowTools(server, ctx);
  registerAnalyticsTools(server, ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("[ghx] MCP server connected and ready.");
}

main().catch((error) => {
  console.error("[ghx] Fatal error:", error);
  process.exit(1);
});
