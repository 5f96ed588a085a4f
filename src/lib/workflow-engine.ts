/**
 * Automation rule engine.
 *
 * Holds workflow definitions for the lifetime of the server process,
 * evaluates them against project events and keeps per-project execution
 * statistics. Matching is a pure function of the stored definitions and
 * the event; only action invocation touches the ProjectDataProvider.
 */

import { randomUUID } from "node:crypto";
import type { DebugLogger } from "./debug-logger.js";
import {
  AuthenticationError,
  InvalidRequestError,
  NotFoundError,
  errorMessage,
} from "./errors.js";
import type { ProjectDataProvider } from "./provider.js";
import {
  WorkflowNameSchema,
  type EventPayload,
  type WorkflowAction,
  type WorkflowCondition,
  type WorkflowDefinition,
  type WorkflowEvent,
  type WorkflowExecution,
  type WorkflowStatus,
  type WorkflowTrigger,
} from "./workflow-types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreateWorkflowInput {
  projectId: string;
  name: string;
  trigger: WorkflowTrigger;
  condition?: WorkflowCondition;
  action: WorkflowAction;
  /** Defaults to true */
  enabled?: boolean;
}

export interface UpdateWorkflowInput {
  name?: string;
  trigger?: WorkflowTrigger;
  /** null removes the condition */
  condition?: WorkflowCondition | null;
  action?: WorkflowAction;
  enabled?: boolean;
  disabled?: boolean;
}

export interface WorkflowEngineOptions {
  /** Size of the recentExecutions window (default: 10) */
  recentLimit?: number;
  debugLogger?: DebugLogger | null;
  now?: () => Date;
  /** Monotonic milliseconds, for durations */
  clock?: () => number;
  generateId?: () => string;
}

/** A workflow that would fire for an event, as reported by a dry run. */
export interface WorkflowMatch {
  workflowId: string;
  workflowName: string;
  action: WorkflowAction;
}

interface ExecutionStats {
  total: number;
  successes: number;
  /** Newest first, at most recentLimit entries */
  recent: WorkflowExecution[];
}

export const DEFAULT_RECENT_EXECUTIONS = 10;

// ---------------------------------------------------------------------------
// Condition evaluation
// ---------------------------------------------------------------------------

function payloadValue(
  payload: EventPayload,
  field: string,
): string | string[] | undefined {
  const lowered = field.toLowerCase();
  for (const [key, value] of Object.entries(payload)) {
    if (key.toLowerCase() === lowered) return value;
  }
  return undefined;
}

function sameValue(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Evaluate a condition against an event payload. Field names and values
 * compare case-insensitively; list values (labels, assignees) match when
 * any element matches. An absent condition always holds.
 */
export function conditionHolds(
  condition: WorkflowCondition | undefined,
  payload: EventPayload,
): boolean {
  if (!condition) return true;

  const actual = payloadValue(payload, condition.field);
  const values = actual === undefined ? [] : Array.isArray(actual) ? actual : [actual];

  switch (condition.kind) {
    case "equals":
      return values.some((v) => sameValue(v, condition.value));
    case "not_equals":
      return !values.some((v) => sameValue(v, condition.value));
    case "in":
      return values.some((v) => condition.values.some((c) => sameValue(v, c)));
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

function copyCondition(condition: WorkflowCondition): WorkflowCondition {
  return condition.kind === "in"
    ? { ...condition, values: [...condition.values] }
    : { ...condition };
}

function copyWorkflow(wf: WorkflowDefinition): WorkflowDefinition {
  return {
    ...wf,
    condition: wf.condition ? copyCondition(wf.condition) : undefined,
    action: { ...wf.action },
    createdAt: new Date(wf.createdAt),
    updatedAt: new Date(wf.updatedAt),
  };
}

function validateName(name: string): string {
  const parsed = WorkflowNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues[0]?.message ?? "invalid workflow name");
  }
  return parsed.data;
}

export class WorkflowEngine {
  private readonly workflows = new Map<string, WorkflowDefinition>();
  private readonly stats = new Map<string, ExecutionStats>();
  private readonly recentLimit: number;
  private readonly debugLogger: DebugLogger | null;
  private readonly now: () => Date;
  private readonly clock: () => number;
  private readonly generateId: () => string;

  constructor(
    private readonly provider: ProjectDataProvider,
    options: WorkflowEngineOptions = {},
  ) {
    this.recentLimit = options.recentLimit ?? DEFAULT_RECENT_EXECUTIONS;
    this.debugLogger = options.debugLogger ?? null;
    this.now = options.now ?? (() => new Date());
    this.clock = options.clock ?? (() => performance.now());
    this.generateId = options.generateId ?? randomUUID;
  }

  // -------------------------------------------------------------------------
  // Management
  // -------------------------------------------------------------------------

  create(input: CreateWorkflowInput): WorkflowDefinition {
    if (!input.projectId) {
      throw new InvalidRequestError("projectId is required");
    }
    const name = validateName(input.name);
    const now = this.now();

    const workflow: WorkflowDefinition = {
      id: this.generateId(),
      projectId: input.projectId,
      name,
      trigger: input.trigger,
      condition: input.condition ? copyCondition(input.condition) : undefined,
      action: { ...input.action },
      status: input.enabled === false ? "DISABLED" : "ENABLED",
      createdAt: now,
      updatedAt: now,
    };
    this.workflows.set(workflow.id, workflow);
    console.error(
      `[workflow-engine] Created workflow "${name}" (${workflow.id}) on ${workflow.trigger}`,
    );
    return copyWorkflow(workflow);
  }

  /**
   * Apply a partial update. When both `enabled` and `disabled` are set the
   * workflow ends up disabled; when neither is set the status is kept.
   */
  update(id: string, changes: UpdateWorkflowInput): WorkflowDefinition {
    const workflow = this.require(id);

    const hasChange =
      changes.name !== undefined ||
      changes.trigger !== undefined ||
      changes.condition !== undefined ||
      changes.action !== undefined ||
      changes.enabled !== undefined ||
      changes.disabled !== undefined;
    if (!hasChange) {
      throw new InvalidRequestError("No workflow changes given");
    }

    const name = changes.name !== undefined ? validateName(changes.name) : workflow.name;

    workflow.name = name;
    if (changes.trigger !== undefined) workflow.trigger = changes.trigger;
    if (changes.condition !== undefined) {
      workflow.condition = changes.condition ? copyCondition(changes.condition) : undefined;
    }
    if (changes.action !== undefined) workflow.action = { ...changes.action };

    if (changes.disabled === true) {
      workflow.status = "DISABLED";
    } else if (changes.enabled !== undefined) {
      workflow.status = changes.enabled ? "ENABLED" : "DISABLED";
    } else if (changes.disabled === false) {
      workflow.status = "ENABLED";
    }
    workflow.updatedAt = this.now();

    return copyWorkflow(workflow);
  }

  delete(id: string): WorkflowDefinition {
    const workflow = this.require(id);
    this.workflows.delete(id);
    console.error(`[workflow-engine] Deleted workflow "${workflow.name}" (${id})`);
    return copyWorkflow(workflow);
  }

  get(id: string): WorkflowDefinition {
    return copyWorkflow(this.require(id));
  }

  /** A project's workflows in creation order. */
  list(projectId: string): WorkflowDefinition[] {
    return this.listLive(projectId).map(copyWorkflow);
  }

  // -------------------------------------------------------------------------
  // Evaluation
  // -------------------------------------------------------------------------

  /**
   * Enabled workflows whose trigger matches and whose condition holds,
   * in list order. Invokes nothing and records nothing.
   */
  match(event: WorkflowEvent): WorkflowMatch[] {
    return this.matching(event).map((wf) => ({
      workflowId: wf.id,
      workflowName: wf.name,
      action: { ...wf.action },
    }));
  }

  /**
   * Run every matching workflow's action, one at a time in list order,
   * and record an execution for each. A failed action does not stop the
   * remaining workflows; an AuthenticationError is recorded and rethrown.
   */
  async evaluate(event: WorkflowEvent): Promise<WorkflowExecution[]> {
    const executions: WorkflowExecution[] = [];

    for (const workflow of this.matching(event)) {
      const started = this.clock();
      let failure: unknown;
      try {
        await this.provider.invokeAction(event.projectId, workflow.action, {
          itemId: event.itemId,
          contentId: event.contentId,
        });
      } catch (error) {
        failure = error;
      }

      const execution: WorkflowExecution = {
        workflowId: workflow.id,
        workflowName: workflow.name,
        trigger: event.trigger,
        status: failure === undefined ? "SUCCESS" : "FAILURE",
        durationMs: Math.max(0, Math.round(this.clock() - started)),
        executedAt: this.now(),
        ...(failure !== undefined ? { error: errorMessage(failure) } : {}),
      };
      this.record(event.projectId, execution);
      executions.push(execution);

      if (failure instanceof AuthenticationError) {
        throw failure;
      }
    }

    return executions.map((e) => ({ ...e, executedAt: new Date(e.executedAt) }));
  }

  getWorkflowStatus(projectId: string): WorkflowStatus {
    const workflows = this.listLive(projectId);
    const stats = this.stats.get(projectId);
    const total = stats?.total ?? 0;

    return {
      projectId,
      totalWorkflows: workflows.length,
      activeWorkflows: workflows.filter((wf) => wf.status === "ENABLED").length,
      totalExecutions: total,
      successRate: total === 0 ? 0 : ((stats?.successes ?? 0) / total) * 100,
      recentExecutions: (stats?.recent ?? []).map((e) => ({
        ...e,
        executedAt: new Date(e.executedAt),
      })),
    };
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private require(id: string): WorkflowDefinition {
    const workflow = this.workflows.get(id);
    if (!workflow) {
      throw new NotFoundError(`Workflow ${id} not found`);
    }
    return workflow;
  }

  // Map iteration follows insertion, and the sort is stable, so workflows
  // created in the same millisecond keep their creation order.
  private listLive(projectId: string): WorkflowDefinition[] {
    return Array.from(this.workflows.values())
      .filter((wf) => wf.projectId === projectId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  private matching(event: WorkflowEvent): WorkflowDefinition[] {
    return this.listLive(event.projectId).filter(
      (wf) =>
        wf.status === "ENABLED" &&
        wf.trigger === event.trigger &&
        conditionHolds(wf.condition, event.payload),
    );
  }

  private record(projectId: string, execution: WorkflowExecution): void {
    const stats = this.stats.get(projectId) ?? { total: 0, successes: 0, recent: [] };
    stats.total++;
    if (execution.status === "SUCCESS") stats.successes++;
    stats.recent.unshift(execution);
    if (stats.recent.length > this.recentLimit) {
      stats.recent.length = this.recentLimit;
    }
    this.stats.set(projectId, stats);

    if (execution.status === "FAILURE") {
      console.error(
        `[workflow-engine] Workflow "${execution.workflowName}" failed on ${execution.trigger}: ${execution.error}`,
      );
    }
    this.debugLogger?.logWorkflow({
      workflowId: execution.workflowId,
      trigger: execution.trigger,
      status: execution.status,
      durationMs: execution.durationMs,
      ...(execution.error ? { error: execution.error } : {}),
    });
  }
}
