/**
 * Project export: a snapshot of a project's items, fields, views and the
 * workflows registered for it in this session.
 *
 * Each section is opt-in. Items are fetched only when requested, and the
 * item filter is parsed before they are.
 */

import { collectItems } from "./analytics.js";
import { InvalidRequestError } from "./errors.js";
import type {
  ItemFieldValue,
  ProjectDataProvider,
  ProjectField,
  ProjectItem,
  ProjectSummary,
  ProjectView,
} from "./provider.js";
import type { WorkflowDefinition } from "./workflow-types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExportOptions {
  includeItems?: boolean;
  includeFields?: boolean;
  includeViews?: boolean;
  includeWorkflows?: boolean;
  /** Space-separated `key:value` terms, all of which must match */
  filter?: string;
  now?: Date;
}

export interface ProjectExport {
  projectId: string;
  title: string;
  number: number;
  exportDate: Date;
  filter: string | null;
  items: ProjectItem[];
  fields: ProjectField[];
  views: ProjectView[];
  workflows: WorkflowDefinition[];
  /** Which sections were requested, so empty and omitted can be told apart */
  included: { items: boolean; fields: boolean; views: boolean; workflows: boolean };
}

export type ExportFilterTerm =
  | { kind: "state"; closed: boolean }
  | { kind: "type"; type: string }
  | { kind: "assignee"; login: string | null }
  | { kind: "field"; field: string; value: string };

// ---------------------------------------------------------------------------
// Filter
// ---------------------------------------------------------------------------

/**
 * Parse a filter such as `state:open assignee:octocat Priority:High`.
 *
 * Keys: `state` (open or closed), `type` (issue, pull_request,
 * draft_issue), `assignee` (a login, or `none`); any other key names a
 * project field. Keys and values compare case-insensitively.
 */
export function parseExportFilter(filter: string): ExportFilterTerm[] {
  const terms: ExportFilterTerm[] = [];

  for (const token of filter.trim().split(/\s+/).filter(Boolean)) {
    const sep = token.indexOf(":");
    const key = sep > 0 ? token.slice(0, sep).toLowerCase() : "";
    const value = sep > 0 ? token.slice(sep + 1) : "";
    if (!key || !value) {
      throw new InvalidRequestError(`Invalid filter term "${token}": expected key:value`);
    }

    switch (key) {
      case "state": {
        const state = value.toLowerCase();
        if (state !== "open" && state !== "closed") {
          throw new InvalidRequestError(`Invalid state "${value}": expected open or closed`);
        }
        terms.push({ kind: "state", closed: state === "closed" });
        break;
      }
      case "type":
        terms.push({ kind: "type", type: value.toUpperCase().replace(/-/g, "_") });
        break;
      case "assignee":
        terms.push({
          kind: "assignee",
          login: value.toLowerCase() === "none" ? null : value.replace(/^@/, "").toLowerCase(),
        });
        break;
      default:
        terms.push({ kind: "field", field: token.slice(0, sep), value: value.toLowerCase() });
    }
  }

  if (terms.length === 0) {
    throw new InvalidRequestError("filter must contain at least one key:value term");
  }
  return terms;
}

function fieldText(value: ItemFieldValue): string {
  switch (value.kind) {
    case "number":
      return String(value.value);
    case "iteration":
      return value.title;
    default:
      return value.value;
  }
}

function itemField(item: ProjectItem, name: string): ItemFieldValue | undefined {
  const lowered = name.toLowerCase();
  for (const [key, value] of Object.entries(item.fields)) {
    if (key.toLowerCase() === lowered) return value;
  }
  return undefined;
}

export function matchesFilter(item: ProjectItem, terms: ExportFilterTerm[]): boolean {
  return terms.every((term) => {
    switch (term.kind) {
      case "state":
        return (item.closedAt !== null) === term.closed;
      case "type":
        return item.type === term.type;
      case "assignee":
        return term.login === null
          ? item.assignees.length === 0
          : item.assignees.some((a) => a.toLowerCase() === term.login);
      case "field": {
        const value = itemField(item, term.field);
        return value !== undefined && fieldText(value).toLowerCase() === term.value;
      }
    }
  });
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export async function exportProject(
  provider: ProjectDataProvider,
  project: ProjectSummary,
  workflows: WorkflowDefinition[],
  options: ExportOptions = {},
): Promise<ProjectExport> {
  const included = {
    items: options.includeItems ?? false,
    fields: options.includeFields ?? false,
    views: options.includeViews ?? false,
    workflows: options.includeWorkflows ?? false,
  };

  const filter = options.filter?.trim() || null;
  if (filter !== null && !included.items) {
    throw new InvalidRequestError("filter applies to items; set includeItems");
  }
  const terms = filter === null ? [] : parseExportFilter(filter);

  let items: ProjectItem[] = [];
  if (included.items) {
    const all = await collectItems(provider, project.id);
    items = terms.length === 0 ? all : all.filter((item) => matchesFilter(item, terms));
  }

  return {
    projectId: project.id,
    title: project.title,
    number: project.number,
    exportDate: options.now ?? new Date(),
    filter,
    items,
    fields: included.fields ? project.fields : [],
    views: included.views ? project.views : [],
    workflows: included.workflows
      ? workflows.filter((wf) => wf.projectId === project.id)
      : [],
    included,
  };
}
