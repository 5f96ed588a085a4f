/**
 * TypeScript types for GitHub Projects V2 GraphQL responses and the
 * MCP tool result helpers shared by every tool module.
 */

// ---------------------------------------------------------------------------
// Pagination
// ---------------------------------------------------------------------------

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface Connection<T> {
  nodes: T[];
  pageInfo: PageInfo;
  totalCount?: number;
}

// ---------------------------------------------------------------------------
// Rate Limiting
// ---------------------------------------------------------------------------

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetAt: string;
  cost: number;
  nodeCount?: number;
}

// ---------------------------------------------------------------------------
// Projects V2 - Fields
// ---------------------------------------------------------------------------

export type ProjectV2FieldDataType =
  | "ASSIGNEES"
  | "DATE"
  | "ITERATION"
  | "LABELS"
  | "LINKED_PULL_REQUESTS"
  | "MILESTONE"
  | "NUMBER"
  | "REPOSITORY"
  | "REVIEWERS"
  | "SINGLE_SELECT"
  | "TEXT"
  | "TITLE"
  | "TRACKED_BY"
  | "TRACKS";

export interface ProjectV2IterationRef {
  id: string;
  title: string;
  startDate: string;
  duration: number;
}

/** Raw field node as returned by the `fields` connection fragments. */
export interface RawProjectV2Field {
  id: string;
  name: string;
  dataType: ProjectV2FieldDataType;
  options?: Array<{ id: string; name: string }>;
  configuration?: {
    iterations: ProjectV2IterationRef[];
    completedIterations?: ProjectV2IterationRef[];
  };
}

export type ProjectV2ViewLayout =
  | "BOARD_LAYOUT"
  | "TABLE_LAYOUT"
  | "ROADMAP_LAYOUT";

export interface RawProjectV2View {
  id: string;
  name: string;
  number: number;
  layout: ProjectV2ViewLayout;
}

// ---------------------------------------------------------------------------
// Projects V2 - Item field values
// ---------------------------------------------------------------------------

interface FieldRef {
  field?: { name?: string };
}

export type RawItemFieldValue =
  | (FieldRef & { __typename: "ProjectV2ItemFieldSingleSelectValue"; name: string | null })
  | (FieldRef & { __typename: "ProjectV2ItemFieldTextValue"; text: string | null })
  | (FieldRef & { __typename: "ProjectV2ItemFieldNumberValue"; number: number | null })
  | (FieldRef & { __typename: "ProjectV2ItemFieldDateValue"; date: string | null })
  | (FieldRef & {
      __typename: "ProjectV2ItemFieldIterationValue";
      title: string;
      startDate: string;
      duration: number;
    })
  | (FieldRef & {
      __typename: "ProjectV2ItemFieldMilestoneValue";
      milestone: { title: string; dueOn: string | null } | null;
    })
  | { __typename?: undefined };

// ---------------------------------------------------------------------------
// Projects V2 - Items
// ---------------------------------------------------------------------------

export type ProjectV2ItemType = "ISSUE" | "PULL_REQUEST" | "DRAFT_ISSUE" | "REDACTED";

export interface RawProjectV2Item {
  id: string;
  type: ProjectV2ItemType;
  createdAt: string;
  updatedAt: string;
  isArchived: boolean;
  content: {
    __typename?: "Issue" | "PullRequest" | "DraftIssue";
    id?: string;
    number?: number;
    title?: string;
    state?: string;
    createdAt?: string;
    closedAt?: string | null;
    assignees?: { nodes: Array<{ login: string }> };
    milestone?: { title: string; dueOn: string | null } | null;
  } | null;
  fieldValues: {
    nodes: RawItemFieldValue[];
  };
}

// ---------------------------------------------------------------------------
// MCP Tool Helpers
// ---------------------------------------------------------------------------

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
}

export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

/** Plain-text result, used by the table renderers. */
export function toolText(text: string): ToolResult {
  return {
    content: [{ type: "text", text }],
  };
}

export function toolError(message: string): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

// ---------------------------------------------------------------------------
// GitHub Client Types
// ---------------------------------------------------------------------------

export interface GitHubClientConfig {
  token: string;
  projectToken?: string; // Separate token for project operations. Falls back to token.
  owner?: string;
  projectNumber?: number;
}

export interface GraphQLErrorEntry {
  message: string;
  type?: string;
  path?: Array<string | number>;
}
