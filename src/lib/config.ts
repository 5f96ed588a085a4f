/**
 * Environment-driven configuration for the ghx server.
 *
 * Every value comes from the process environment; nothing is written
 * back. Numeric settings are validated with Zod so a typo in
 * GHX_BULK_CONCURRENCY fails at startup rather than mid-batch.
 */

import { z } from "zod";
import { AuthenticationError, InvalidRequestError } from "./errors.js";

export const DEFAULT_WORKFLOWS_FILE = ".ghx-workflows.yml";

export interface GhxConfig {
  token: string;
  tokenSource: "GHX_TOKEN" | "GITHUB_TOKEN";
  projectToken?: string;
  owner?: string;
  projectNumber?: number;
  workflowsFile: string;
  bulkConcurrency: number;
  requestTimeoutMs: number;
  recentExecutionsLimit: number;
  debug: boolean;
}

const NumericSettingsSchema = z.object({
  projectNumber: z.coerce.number().int().positive().optional(),
  bulkConcurrency: z.coerce.number().int().min(1).max(16).default(4),
  requestTimeoutMs: z.coerce.number().int().min(1000).default(30_000),
  recentExecutionsLimit: z.coerce.number().int().min(1).max(100).default(10),
});

/**
 * Read an environment variable, treating unexpanded `${VAR}` literals
 * (left behind by MCP launchers for unset variables) as absent.
 */
export function resolveEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const val = env[name];
  if (!val || val.startsWith("${")) return undefined;
  return val;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GhxConfig {
  const ghxToken = resolveEnv("GHX_TOKEN", env);
  const token = ghxToken || resolveEnv("GITHUB_TOKEN", env);
  if (!token) {
    throw new AuthenticationError(
      "No GitHub token found. Set GHX_TOKEN (or GITHUB_TOKEN) to a token with 'project' scope.",
    );
  }

  const parsed = NumericSettingsSchema.safeParse({
    projectNumber: resolveEnv("GHX_PROJECT_NUMBER", env),
    bulkConcurrency: resolveEnv("GHX_BULK_CONCURRENCY", env),
    requestTimeoutMs: resolveEnv("GHX_REQUEST_TIMEOUT_MS", env),
    recentExecutionsLimit: resolveEnv("GHX_RECENT_EXECUTIONS", env),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidRequestError(`Invalid configuration: ${detail}`);
  }

  const projectToken = resolveEnv("GHX_PROJECT_TOKEN", env);

  return {
    token,
    tokenSource: ghxToken ? "GHX_TOKEN" : "GITHUB_TOKEN",
    projectToken: projectToken && projectToken !== token ? projectToken : undefined,
    owner: resolveEnv("GHX_OWNER", env),
    projectNumber: parsed.data.projectNumber,
    workflowsFile: resolveEnv("GHX_WORKFLOWS_FILE", env) ?? DEFAULT_WORKFLOWS_FILE,
    bulkConcurrency: parsed.data.bulkConcurrency,
    requestTimeoutMs: parsed.data.requestTimeoutMs,
    recentExecutionsLimit: parsed.data.recentExecutionsLimit,
    debug: resolveEnv("GHX_DEBUG", env) === "true",
  };
}

// ---------------------------------------------------------------------------
// Project references
// ---------------------------------------------------------------------------

export interface ProjectRef {
  owner: string;
  number: number;
}

/**
 * Resolve a project from an `owner/number` reference, explicit
 * owner/number args, or the configured defaults (in that order).
 */
export function resolveProjectRef(
  config: Pick<GhxConfig, "owner" | "projectNumber">,
  args: { project?: string; owner?: string; number?: number },
): ProjectRef {
  if (args.project) {
    const parts = args.project.split("/");
    if (parts.length !== 2 || !parts[0]) {
      throw new InvalidRequestError(
        `Invalid project reference "${args.project}". Use: owner/project-number`,
      );
    }
    const number = Number(parts[1]);
    if (!Number.isInteger(number) || number <= 0) {
      throw new InvalidRequestError(`Invalid project number: ${parts[1]}`);
    }
    return { owner: parts[0], number };
  }

  const owner = args.owner || config.owner;
  const number = args.number ?? config.projectNumber;
  if (!owner) {
    throw new InvalidRequestError(
      "owner is required (pass project as owner/number or set GHX_OWNER)",
    );
  }
  if (!number) {
    throw new InvalidRequestError(
      "project number is required (pass project as owner/number or set GHX_PROJECT_NUMBER)",
    );
  }
  return { owner, number };
}
