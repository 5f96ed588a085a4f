/**
 * ProjectDataProvider backed by the GitHub GraphQL API.
 *
 * Projects are looked up under a user owner first, then an organization
 * (GitHub has no owner-agnostic projectV2 lookup). Field metadata is kept
 * in a ProjectFieldIndex so workflow actions can resolve field and option
 * names without refetching the project.
 */

import type { GitHubClient } from "../github-client.js";
import { ProjectFieldIndex } from "./cache.js";
import { InvalidRequestError, NotFoundError } from "./errors.js";
import { requireField, resolveFieldValue } from "./field-updates.js";
import { paginateNodes } from "./pagination.js";
import type {
  ActionTarget,
  ItemFieldValue,
  ItemMutation,
  ProjectDataProvider,
  ProjectField,
  ProjectItem,
  ProjectSummary,
  RemoteCallOptions,
  ResolvedFieldUpdate,
} from "./provider.js";
import type { WorkflowAction } from "./workflow-types.js";
import type {
  RawProjectV2Field,
  RawProjectV2Item,
  RawProjectV2View,
} from "../types.js";

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

const PROJECT_SELECTION = `
  id
  title
  number
  fields(first: 50) {
    nodes {
      ... on ProjectV2FieldCommon {
        id
        name
        dataType
      }
      ... on ProjectV2SingleSelectField {
        options { id name }
      }
      ... on ProjectV2IterationField {
        configuration {
          iterations { id title startDate duration }
          completedIterations { id title startDate duration }
        }
      }
    }
  }
  views(first: 20) {
    nodes { id name number layout }
  }
`;

const PROJECT_BY_OWNER_QUERY = `query ProjectByOwner($owner: String!, $number: Int!) {
  OWNER_TYPE(login: $owner) {
    projectV2(number: $number) {${PROJECT_SELECTION}}
  }
}`;

const PROJECT_BY_ID_QUERY = `query ProjectById($projectId: ID!) {
  node(id: $projectId) {
    ... on ProjectV2 {${PROJECT_SELECTION}}
  }
}`;

const CONTENT_FIELDS = `
  id
  number
  title
  state
  createdAt
  closedAt
  assignees(first: 10) { nodes { login } }
  milestone { title dueOn }
`;

const FIELD_NAME = `field { ... on ProjectV2FieldCommon { name } }`;

export const PROJECT_ITEMS_QUERY = `query ProjectItems($projectId: ID!, $cursor: String, $first: Int!) {
  node(id: $projectId) {
    ... on ProjectV2 {
      items(first: $first, after: $cursor) {
        totalCount
        pageInfo { hasNextPage endCursor }
        nodes {
          id
          type
          createdAt
          updatedAt
          isArchived
          content {
            __typename
            ... on Issue {${CONTENT_FIELDS}}
            ... on PullRequest {${CONTENT_FIELDS}}
            ... on DraftIssue {
              id
              title
              createdAt
              assignees(first: 10) { nodes { login } }
            }
          }
          fieldValues(first: 50) {
            nodes {
              __typename
              ... on ProjectV2ItemFieldSingleSelectValue { name ${FIELD_NAME} }
              ... on ProjectV2ItemFieldTextValue { text ${FIELD_NAME} }
              ... on ProjectV2ItemFieldNumberValue { number ${FIELD_NAME} }
              ... on ProjectV2ItemFieldDateValue { date ${FIELD_NAME} }
              ... on ProjectV2ItemFieldIterationValue { title startDate duration ${FIELD_NAME} }
              ... on ProjectV2ItemFieldMilestoneValue { milestone { title dueOn } ${FIELD_NAME} }
            }
          }
        }
      }
    }
  }
}`;

interface RawProjectV2 {
  id: string;
  title: string;
  number: number;
  fields: { nodes: RawProjectV2Field[] };
  views: { nodes: RawProjectV2View[] };
}

type OwnerProjectResponse = Record<
  string,
  { projectV2: RawProjectV2 | null } | null
>;

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export function normalizeField(raw: RawProjectV2Field): ProjectField {
  const config = raw.configuration;
  return {
    id: raw.id,
    name: raw.name,
    dataType: raw.dataType,
    options: raw.options ?? [],
    iterations: [
      ...(config?.iterations ?? []),
      ...(config?.completedIterations ?? []),
    ],
  };
}

function normalizeProject(raw: RawProjectV2): ProjectSummary {
  return {
    id: raw.id,
    title: raw.title,
    number: raw.number,
    fields: raw.fields.nodes.filter((f) => f?.id).map(normalizeField),
    views: raw.views.nodes.map((v) => ({
      id: v.id,
      name: v.name,
      number: v.number,
      layout: v.layout,
    })),
  };
}

/**
 * Flatten a raw project item into a ProjectItem. Field values without a
 * field name or with a null value are dropped.
 */
export function normalizeItem(raw: RawProjectV2Item): ProjectItem {
  const content = raw.content;
  const fields: Record<string, ItemFieldValue> = {};
  let milestone = content?.milestone ?? null;

  for (const node of raw.fieldValues.nodes) {
    if (node.__typename === undefined) continue;
    const name = node.field?.name;
    if (!name) continue;

    switch (node.__typename) {
      case "ProjectV2ItemFieldSingleSelectValue":
        if (node.name != null) fields[name] = { kind: "single_select", value: node.name };
        break;
      case "ProjectV2ItemFieldTextValue":
        if (node.text != null) fields[name] = { kind: "text", value: node.text };
        break;
      case "ProjectV2ItemFieldNumberValue":
        if (node.number != null) fields[name] = { kind: "number", value: node.number };
        break;
      case "ProjectV2ItemFieldDateValue":
        if (node.date != null) fields[name] = { kind: "date", value: node.date };
        break;
      case "ProjectV2ItemFieldIterationValue":
        fields[name] = {
          kind: "iteration",
          title: node.title,
          startDate: node.startDate,
          duration: node.duration,
        };
        break;
      case "ProjectV2ItemFieldMilestoneValue":
        milestone = milestone ?? node.milestone;
        break;
    }
  }

  return {
    id: raw.id,
    type: raw.type,
    contentId: content?.id ?? null,
    number: content?.number ?? null,
    title: content?.title ?? "",
    createdAt: content?.createdAt ?? raw.createdAt,
    addedAt: raw.createdAt,
    closedAt: content?.closedAt ?? null,
    assignees: content?.assignees?.nodes.map((a) => a.login) ?? [],
    milestone,
    fields,
  };
}

// ---------------------------------------------------------------------------
// Mutation builders
// ---------------------------------------------------------------------------

function fieldValueInput(
  update: Exclude<ResolvedFieldUpdate, { kind: "clear" }>,
): { valueKey: string; valueType: string; value: string | number } {
  switch (update.kind) {
    case "text":
      return { valueKey: "text", valueType: "String!", value: update.text };
    case "number":
      return { valueKey: "number", valueType: "Float!", value: update.number };
    case "date":
      return { valueKey: "date", valueType: "Date!", value: update.date };
    case "single_select":
      return { valueKey: "singleSelectOptionId", valueType: "String!", value: update.optionId };
    case "iteration":
      return { valueKey: "iterationId", valueType: "String!", value: update.iterationId };
  }
}

/**
 * Build one aliased mutation that applies every field update to a single
 * item, so an item's updates land (or fail) in one round trip.
 */
export function buildItemUpdateMutation(
  projectId: string,
  itemId: string,
  updates: ResolvedFieldUpdate[],
): { mutationString: string; variables: Record<string, unknown> } {
  const variables: Record<string, unknown> = { projectId, itemId };
  const varDecls = ["$projectId: ID!", "$itemId: ID!"];
  const aliases: string[] = [];

  updates.forEach((update, i) => {
    const fieldVar = `field_u${i}`;
    const valueVar = `value_u${i}`;
    varDecls.push(`$${fieldVar}: ID!`);
    variables[fieldVar] = update.fieldId;

    if (update.kind === "clear") {
      aliases.push(
        `u${i}: clearProjectV2ItemFieldValue(input: {
        projectId: $projectId,
        itemId: $itemId,
        fieldId: $${fieldVar}
      }) {
        projectV2Item { id }
      }`,
      );
      return;
    }

    const { valueKey, valueType, value } = fieldValueInput(update);
    variables[valueVar] = value;
    varDecls.push(`$${valueVar}: ${valueType}`);

    aliases.push(
      `u${i}: updateProjectV2ItemFieldValue(input: {
        projectId: $projectId,
        itemId: $itemId,
        fieldId: $${fieldVar},
        value: { ${valueKey}: $${valueVar} }
      }) {
        projectV2Item { id }
      }`,
    );
  });

  const mutationString = `mutation UpdateItemFields(${varDecls.join(", ")}) {\n  ${aliases.join("\n  ")}\n}`;
  return { mutationString, variables };
}

const DELETE_ITEM_MUTATION = `mutation DeleteProjectItem($projectId: ID!, $itemId: ID!) {
  deleteProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
    deletedItemId
  }
}`;

const ARCHIVE_ITEM_MUTATION = `mutation ArchiveProjectItem($projectId: ID!, $itemId: ID!) {
  archiveProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
    item { id }
  }
}`;

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export interface GitHubProjectProviderOptions {
  /** Items per page when paging through a project (default: 100) */
  pageSize?: number;
}

export class GitHubProjectProvider implements ProjectDataProvider {
  private readonly pageSize: number;

  constructor(
    private readonly client: GitHubClient,
    private readonly fieldIndex: ProjectFieldIndex = new ProjectFieldIndex(),
    options: GitHubProjectProviderOptions = {},
  ) {
    this.pageSize = options.pageSize ?? 100;
  }

  async fetchProject(owner: string, number: number): Promise<ProjectSummary> {
    for (const ownerType of ["user", "organization"]) {
      let result: OwnerProjectResponse;
      try {
        result = await this.client.projectQuery<OwnerProjectResponse>(
          PROJECT_BY_OWNER_QUERY.replace("OWNER_TYPE", ownerType),
          { owner, number },
          { cache: true, cacheTtlMs: 10 * 60 * 1000 },
        );
      } catch (error) {
        // "Could not resolve to a User" for org logins and vice versa
        if (error instanceof NotFoundError) continue;
        throw error;
      }

      const project = result[ownerType]?.projectV2;
      if (project) {
        const summary = normalizeProject(project);
        this.fieldIndex.populate(summary.id, summary.fields);
        return summary;
      }
    }

    throw new NotFoundError(`Project #${number} not found for owner "${owner}"`);
  }

  fetchItems(projectId: string): AsyncIterable<ProjectItem> {
    const pages = paginateNodes<RawProjectV2Item>(
      (query, variables) => this.client.projectQuery(query, variables),
      PROJECT_ITEMS_QUERY,
      { projectId },
      "node.items",
      { pageSize: this.pageSize },
    );

    return {
      async *[Symbol.asyncIterator]() {
        for await (const raw of pages) {
          yield normalizeItem(raw);
        }
      },
    };
  }

  async mutateItem(
    projectId: string,
    itemId: string,
    mutation: ItemMutation,
    options: RemoteCallOptions = {},
  ): Promise<void> {
    switch (mutation.kind) {
      case "update": {
        if (mutation.updates.length === 0) {
          throw new InvalidRequestError("No field updates given");
        }
        const { mutationString, variables } = buildItemUpdateMutation(
          projectId,
          itemId,
          mutation.updates,
        );
        await this.client.projectMutate(mutationString, variables, options);
        return;
      }
      case "delete":
        await this.client.projectMutate(
          DELETE_ITEM_MUTATION,
          { projectId, itemId },
          options,
        );
        return;
      case "archive":
        await this.client.projectMutate(
          ARCHIVE_ITEM_MUTATION,
          { projectId, itemId },
          options,
        );
        return;
    }
  }

  async invokeAction(
    projectId: string,
    action: WorkflowAction,
    target: ActionTarget,
  ): Promise<void> {
    switch (action.kind) {
      case "set_field":
      case "clear_field":
      case "move_to_status": {
        const fields = await this.ensureFields(projectId);
        const update =
          action.kind === "set_field"
            ? resolveFieldValue(requireField(fields, action.field), action.value)
            : action.kind === "clear_field"
              ? resolveFieldValue(requireField(fields, action.field), null)
              : resolveFieldValue(requireField(fields, "Status"), action.status);
        await this.mutateItem(projectId, target.itemId, {
          kind: "update",
          updates: [update],
        });
        return;
      }

      case "archive_item":
        await this.mutateItem(projectId, target.itemId, { kind: "archive" });
        return;

      case "assign": {
        const contentId = target.contentId ?? (await this.resolveContentId(target.itemId));
        const user = await this.client.query<{ user: { id: string } | null }>(
          `query AssigneeId($login: String!) { user(login: $login) { id } }`,
          { login: action.assignee },
          { cache: true, cacheTtlMs: 30 * 60 * 1000 },
        );
        if (!user.user) {
          throw new NotFoundError(`User "${action.assignee}" not found`);
        }
        await this.client.mutate(
          `mutation AddAssignee($assignableId: ID!, $assigneeIds: [ID!]!) {
            addAssigneesToAssignable(input: { assignableId: $assignableId, assigneeIds: $assigneeIds }) {
              clientMutationId
            }
          }`,
          { assignableId: contentId, assigneeIds: [user.user.id] },
        );
        return;
      }

      case "add_comment": {
        const contentId = target.contentId ?? (await this.resolveContentId(target.itemId));
        await this.client.mutate(
          `mutation AddComment($subjectId: ID!, $body: String!) {
            addComment(input: { subjectId: $subjectId, body: $body }) {
              commentEdge { node { id } }
            }
          }`,
          { subjectId: contentId, body: action.body },
        );
        return;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async ensureFields(projectId: string): Promise<ProjectField[]> {
    if (!this.fieldIndex.isPopulated(projectId)) {
      const result = await this.client.projectQuery<{ node: RawProjectV2 | null }>(
        PROJECT_BY_ID_QUERY,
        { projectId },
        { cache: true, cacheTtlMs: 10 * 60 * 1000 },
      );
      if (!result.node?.id) {
        throw new NotFoundError(`Project ${projectId} not found`);
      }
      this.fieldIndex.populate(projectId, normalizeProject(result.node).fields);
    }
    return this.fieldIndex.getFields(projectId);
  }

  /** Issue or pull request node ID behind a project item. */
  private async resolveContentId(itemId: string): Promise<string> {
    const result = await this.client.projectQuery<{
      node: { content: { __typename?: string; id?: string } | null } | null;
    }>(
      `query ItemContent($itemId: ID!) {
        node(id: $itemId) {
          ... on ProjectV2Item {
            content {
              __typename
              ... on Issue { id }
              ... on PullRequest { id }
            }
          }
        }
      }`,
      { itemId },
    );

    if (!result.node) {
      throw new NotFoundError(`Project item ${itemId} not found`);
    }
    const content = result.node.content;
    if (
      !content?.id ||
      (content.__typename !== "Issue" && content.__typename !== "PullRequest")
    ) {
      throw new InvalidRequestError(
        `Project item ${itemId} is not backed by an issue or pull request`,
      );
    }
    return content.id;
  }
}
