/**
 * Workflow seed file loader.
 *
 * Reads `.ghx-workflows.yml`, validates it with Zod and returns a
 * discriminated result so the server can log a bad file and keep running.
 * Seeding the engine needs project node IDs, which `seedWorkflows`
 * resolves through the provider once per referenced project.
 */

import { readFile } from "node:fs/promises";
import { parse as yamlParse } from "yaml";
import { resolveProjectRef } from "./config.js";
import { errorMessage } from "./errors.js";
import type { ProjectDataProvider } from "./provider.js";
import type { WorkflowEngine } from "./workflow-engine.js";
import {
  WorkflowConfigSchema,
  type WorkflowConfig,
  type WorkflowDefinition,
} from "./workflow-types.js";

const EMPTY_CONFIG: WorkflowConfig = { version: 1, workflows: [] };

export interface WorkflowConfigError {
  phase: "yaml_parse" | "schema_validation";
  path: string[];
  message: string;
}

export type WorkflowLoadResult =
  | { status: "loaded"; config: WorkflowConfig; filePath: string }
  | { status: "missing"; config: WorkflowConfig }
  | { status: "error"; errors: WorkflowConfigError[] };

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error as NodeJS.ErrnoException).code === "ENOENT"
  );
}

/**
 * Parse and validate workflow YAML already read into memory.
 */
export function parseWorkflowConfig(
  contents: string,
  filePath: string,
): WorkflowLoadResult {
  let parsed: unknown;
  try {
    parsed = yamlParse(contents);
  } catch (error) {
    return {
      status: "error",
      errors: [{ phase: "yaml_parse", path: [], message: errorMessage(error) }],
    };
  }

  const result = WorkflowConfigSchema.safeParse(parsed);
  if (!result.success) {
    return {
      status: "error",
      errors: result.error.issues.map((issue) => ({
        phase: "schema_validation" as const,
        path: issue.path.map(String),
        message: issue.message,
      })),
    };
  }

  return { status: "loaded", config: result.data, filePath };
}

/**
 * Load a workflow seed file. A missing file is not an error.
 */
export async function loadWorkflowConfig(
  filePath: string,
): Promise<WorkflowLoadResult> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return { status: "missing", config: EMPTY_CONFIG };
    }
    throw error;
  }
  return parseWorkflowConfig(contents, filePath);
}

export interface SeedResult {
  created: WorkflowDefinition[];
  /** Projects that could not be resolved, with the reason */
  skipped: Array<{ project: string; error: string }>;
}

/**
 * Create the file's workflows in the engine. A project that cannot be
 * fetched skips its workflows; the others are still created.
 */
export async function seedWorkflows(
  engine: WorkflowEngine,
  provider: ProjectDataProvider,
  config: WorkflowConfig,
): Promise<SeedResult> {
  const projectIds = new Map<string, string | Error>();
  const result: SeedResult = { created: [], skipped: [] };

  for (const entry of config.workflows) {
    const project = entry.project ?? config.project;
    if (!project) continue;

    let projectId = projectIds.get(project);
    if (projectId === undefined) {
      try {
        const ref = resolveProjectRef({}, { project });
        projectId = (await provider.fetchProject(ref.owner, ref.number)).id;
      } catch (error) {
        projectId = error instanceof Error ? error : new Error(String(error));
        result.skipped.push({ project, error: projectId.message });
      }
      projectIds.set(project, projectId);
    }
    if (projectId instanceof Error) continue;

    result.created.push(
      engine.create({
        projectId,
        name: entry.name,
        trigger: entry.trigger,
        condition: entry.condition,
        action: entry.action,
        enabled: entry.enabled,
      }),
    );
  }

  return result;
}
