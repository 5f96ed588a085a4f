/**
 * The remote data boundary consumed by the bulk coordinator, the workflow
 * engine and the analytics aggregator.
 *
 * Everything above this interface works on normalized items and typed
 * mutations; only github-provider.ts knows about GraphQL. Tests substitute
 * an in-memory implementation.
 */

import type { ProjectV2FieldDataType, ProjectV2ItemType } from "../types.js";
import type { WorkflowAction } from "./workflow-types.js";

// ---------------------------------------------------------------------------
// Project metadata
// ---------------------------------------------------------------------------

export interface ProjectIteration {
  id: string;
  title: string;
  startDate: string; // YYYY-MM-DD
  duration: number; // days
}

export interface ProjectField {
  id: string;
  name: string;
  dataType: ProjectV2FieldDataType;
  options: Array<{ id: string; name: string }>;
  iterations: ProjectIteration[];
}

export interface ProjectView {
  id: string;
  name: string;
  number: number;
  layout: string;
}

export interface ProjectSummary {
  id: string;
  title: string;
  number: number;
  fields: ProjectField[];
  views: ProjectView[];
}

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

export type ItemFieldValue =
  | { kind: "text"; value: string }
  | { kind: "number"; value: number }
  | { kind: "date"; value: string }
  | { kind: "single_select"; value: string }
  | { kind: "iteration"; title: string; startDate: string; duration: number };

/** A project item flattened to what the core subsystems consume. */
export interface ProjectItem {
  id: string;
  type: ProjectV2ItemType;
  contentId: string | null;
  number: number | null;
  title: string;
  /** When the underlying issue/PR/draft was created */
  createdAt: string;
  /** When the item was added to the project */
  addedAt: string;
  closedAt: string | null;
  assignees: string[];
  milestone: { title: string; dueOn: string | null } | null;
  /** Field name -> value, for fields that are set on the item */
  fields: Record<string, ItemFieldValue>;
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

/** A field update with its value already resolved to GraphQL IDs. */
export type ResolvedFieldUpdate =
  | { fieldId: string; fieldName: string; kind: "text"; text: string }
  | { fieldId: string; fieldName: string; kind: "number"; number: number }
  | { fieldId: string; fieldName: string; kind: "date"; date: string }
  | { fieldId: string; fieldName: string; kind: "single_select"; optionId: string }
  | { fieldId: string; fieldName: string; kind: "iteration"; iterationId: string }
  | { fieldId: string; fieldName: string; kind: "clear" };

export type ItemMutation =
  | { kind: "update"; updates: ResolvedFieldUpdate[] }
  | { kind: "delete" }
  | { kind: "archive" };

export interface ActionTarget {
  itemId: string;
  /** Issue or pull request node ID, when the caller already knows it */
  contentId?: string;
}

export interface RemoteCallOptions {
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export interface ProjectDataProvider {
  /**
   * Look up a project by owner login and number.
   * Rejects with NotFoundError or AccessDeniedError.
   */
  fetchProject(owner: string, number: number): Promise<ProjectSummary>;

  /**
   * Lazily page through every item of a project. Each iteration restarts
   * from the first page.
   */
  fetchItems(projectId: string): AsyncIterable<ProjectItem>;

  /** Apply one mutation to one item. Single attempt, no retries. */
  mutateItem(
    projectId: string,
    itemId: string,
    mutation: ItemMutation,
    options?: RemoteCallOptions,
  ): Promise<void>;

  /** Perform a workflow action against one item. */
  invokeAction(
    projectId: string,
    action: WorkflowAction,
    target: ActionTarget,
  ): Promise<void>;
}
