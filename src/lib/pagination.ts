/**
 * Cursor-based pagination for GitHub GraphQL connections.
 *
 * `paginateNodes` returns a lazy async iterable that fetches one page at
 * a time and starts over from the first page on every iteration.
 */

import type { Connection } from "../types.js";

export interface PaginateOptions {
  /** Maximum number of items per page (default: 100) */
  pageSize?: number;
  /** Maximum total items to fetch across all pages (default: unlimited) */
  maxItems?: number;
}

export type QueryExecutor = (
  query: string,
  variables: Record<string, unknown>,
) => Promise<unknown>;

/**
 * Extract a nested value from an object using a dot-separated path.
 * For example, getNestedValue(obj, "node.items") returns obj.node.items.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (current == null || typeof current !== "object") return undefined;
    current = (current as Record<string, unknown>)[part];
  }
  return current;
}

function isConnection<T>(value: unknown): value is Connection<T> {
  return (
    value != null &&
    typeof value === "object" &&
    Array.isArray((value as { nodes?: unknown }).nodes) &&
    typeof (value as { pageInfo?: unknown }).pageInfo === "object"
  );
}

/**
 * Lazily page through a GraphQL connection.
 *
 * The query must declare `$cursor: String` and `$first: Int!` and select
 * `pageInfo { hasNextPage endCursor }` on the connection found at
 * `connectionPath`. Errors from `executeQuery` propagate to the consumer
 * at the page where they happen.
 */
export function paginateNodes<T>(
  executeQuery: QueryExecutor,
  query: string,
  variables: Record<string, unknown>,
  connectionPath: string,
  options: PaginateOptions = {},
): AsyncIterable<T> {
  const pageSize = options.pageSize ?? 100;
  const maxItems = options.maxItems ?? Infinity;

  return {
    async *[Symbol.asyncIterator]() {
      let cursor: string | null = null;
      let yielded = 0;

      while (yielded < maxItems) {
        const response = await executeQuery(query, {
          ...variables,
          cursor,
          first: Math.min(pageSize, maxItems - yielded),
        });

        const connection = getNestedValue(response, connectionPath);
        if (!isConnection<T>(connection)) {
          throw new Error(
            `Connection not found at path "${connectionPath}" in GraphQL response`,
          );
        }

        for (const node of connection.nodes) {
          if (yielded >= maxItems) return;
          yielded++;
          yield node;
        }

        if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) {
          return;
        }
        cursor = connection.pageInfo.endCursor;
      }
    },
  };
}
