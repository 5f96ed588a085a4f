/**
 * GitHub GraphQL client with authentication, rate limiting, caching and
 * error classification.
 *
 * Wraps @octokit/graphql with proactive rate limit tracking and
 * session-scoped caching. All queries automatically include the
 * rateLimit fragment for continuous tracking. Failures are mapped onto
 * the ghx error taxonomy so callers can tell a missing project from a
 * dropped connection.
 */

import { graphql } from "@octokit/graphql";
import { RateLimiter } from "./lib/rate-limiter.js";
import { SessionCache } from "./lib/cache.js";
import type { DebugLogger } from "./lib/debug-logger.js";
import { extractOperationName, sanitize } from "./lib/debug-logger.js";
import {
  AccessDeniedError,
  AuthenticationError,
  GhxError,
  NotFoundError,
  RemoteUnavailableError,
  errorMessage,
} from "./lib/errors.js";
import type {
  GitHubClientConfig,
  GraphQLErrorEntry,
  RateLimitInfo,
} from "./types.js";

/**
 * The rateLimit fragment to include in every query for proactive tracking.
 */
const RATE_LIMIT_FRAGMENT = `
  rateLimit {
    limit
    remaining
    resetAt
    cost
    nodeCount
  }
`;

export interface QueryOptions {
  cache?: boolean;
  cacheTtlMs?: number;
  signal?: AbortSignal;
}

export interface MutateOptions {
  signal?: AbortSignal;
}

export interface GitHubClient {
  /** Execute a GraphQL query for REPO operations. */
  query: <T = unknown>(
    queryString: string,
    variables?: Record<string, unknown>,
    options?: QueryOptions,
  ) => Promise<T>;

  /** Execute a GraphQL query for PROJECT operations. Uses project token if configured. */
  projectQuery: <T = unknown>(
    queryString: string,
    variables?: Record<string, unknown>,
    options?: QueryOptions,
  ) => Promise<T>;

  /** Execute a GraphQL mutation for REPO operations (never cached, never retried). */
  mutate: <T = unknown>(
    mutation: string,
    variables?: Record<string, unknown>,
    options?: MutateOptions,
  ) => Promise<T>;

  /** Execute a GraphQL mutation for PROJECT operations (never cached, never retried). */
  projectMutate: <T = unknown>(
    mutation: string,
    variables?: Record<string, unknown>,
    options?: MutateOptions,
  ) => Promise<T>;

  getRateLimitStatus: () => {
    remaining: number;
    resetAt: Date;
    isLow: boolean;
    isCritical: boolean;
  };

  getCache: () => SessionCache;

  /** Get the authenticated user's login. */
  getAuthenticatedUser: () => Promise<string>;

  config: GitHubClientConfig;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error) {
    const status = (error as { status: unknown }).status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

function readGraphQLErrors(error: unknown): GraphQLErrorEntry[] {
  if (error && typeof error === "object" && "errors" in error) {
    const errors = (error as { errors: unknown }).errors;
    if (Array.isArray(errors)) {
      return errors.filter(
        (e): e is GraphQLErrorEntry =>
          e != null && typeof e === "object" && typeof e.message === "string",
      );
    }
  }
  return [];
}

/**
 * Map a transport or GraphQL failure onto the ghx error taxonomy.
 * Errors that already belong to the taxonomy pass through unchanged.
 */
export function classifyGitHubError(error: unknown): Error {
  if (error instanceof GhxError) return error;

  const status = readStatus(error);
  const message = errorMessage(error);

  if (status === 401) {
    return new AuthenticationError(`GitHub rejected the token: ${message}`);
  }

  const gqlErrors = readGraphQLErrors(error);
  if (gqlErrors.some((e) => e.type === "NOT_FOUND")) {
    return new NotFoundError(gqlErrors.map((e) => e.message).join("; "));
  }
  if (
    status === 403 ||
    gqlErrors.some((e) => e.type === "FORBIDDEN" || e.type === "INSUFFICIENT_SCOPES")
  ) {
    return new AccessDeniedError(message);
  }

  if (error instanceof Error && error.name === "AbortError") {
    return new RemoteUnavailableError("GitHub request aborted", error);
  }
  if (status === undefined && gqlErrors.length === 0) {
    // No HTTP response at all: DNS, socket or TLS failure
    return new RemoteUnavailableError(`GitHub unreachable: ${message}`, error);
  }
  if (status !== undefined && status >= 500) {
    return new RemoteUnavailableError(`GitHub returned ${status}: ${message}`, error);
  }

  return error instanceof Error ? error : new Error(message);
}

/**
 * Create an authenticated GitHub GraphQL client.
 */
export function createGitHubClient(
  clientConfig: GitHubClientConfig,
  debugLogger?: DebugLogger | null,
  rateLimiter: RateLimiter = new RateLimiter(),
): GitHubClient {
  const graphqlWithAuth = graphql.defaults({
    headers: {
      authorization: `token ${clientConfig.token}`,
    },
  });

  // Create a separate graphql instance for project operations if a different token is configured
  const hasProjectToken =
    clientConfig.projectToken &&
    clientConfig.projectToken !== clientConfig.token;
  const projectGraphqlWithAuth = hasProjectToken
    ? graphql.defaults({
        headers: {
          authorization: `token ${clientConfig.projectToken}`,
        },
      })
    : graphqlWithAuth;

  const cache = new SessionCache();

  /**
   * Execute a raw GraphQL request and handle rate limit tracking.
   */
  async function executeGraphQL<T>(
    queryString: string,
    variables: Record<string, unknown> | undefined,
    graphqlFn: typeof graphqlWithAuth,
    signal?: AbortSignal,
    canRetry: boolean = true,
  ): Promise<T> {
    await rateLimiter.checkBeforeRequest();

    // Inject rateLimit fragment if not already present (queries only, not mutations)
    let fullQuery = queryString;
    const isMutation = /^\s*mutation\b/i.test(queryString.trim());
    if (!isMutation && !queryString.includes("rateLimit")) {
      const match = fullQuery.match(/(query)\s*(\w+)?\s*(\([^)]*\))?\s*\{/);
      if (match) {
        const insertPos =
          fullQuery.indexOf("{", fullQuery.indexOf(match[0])) + 1;
        fullQuery =
          fullQuery.slice(0, insertPos) +
          "\n  " +
          RATE_LIMIT_FRAGMENT +
          fullQuery.slice(insertPos);
      }
    }

    const t0 = Date.now();
    try {
      const response = await graphqlFn<T & { rateLimit?: RateLimitInfo }>(
        fullQuery,
        {
          ...(variables ?? {}),
          ...(signal ? { request: { signal } } : {}),
        },
      );

      const rl = response?.rateLimit;
      if (rl) {
        rateLimiter.update(rl);
      }

      debugLogger?.logGraphQL({
        operation: extractOperationName(fullQuery),
        variables: sanitize(variables),
        durationMs: Date.now() - t0,
        status: 200,
        rateLimitRemaining: rl?.remaining,
        rateLimitCost: rl?.cost,
      });

      return response;
    } catch (error: unknown) {
      const status = readStatus(error);
      debugLogger?.logGraphQL({
        operation: extractOperationName(fullQuery),
        variables: sanitize(variables),
        durationMs: Date.now() - t0,
        status: status ?? 500,
        error: errorMessage(error),
      });

      // Secondary rate limit on a query: honour retry-after once
      if (status === 403 && canRetry && !isMutation) {
        const retryAfter =
          error && typeof error === "object" && "headers" in error
            ? (error as { headers?: Record<string, string> }).headers?.[
                "retry-after"
              ]
            : undefined;

        if (retryAfter) {
          const waitMs = parseInt(retryAfter, 10) * 1000;
          console.error(
            `[github-client] Rate limited. Waiting ${retryAfter}s before retry.`,
          );
          await new Promise((resolve) => setTimeout(resolve, waitMs));
          return executeGraphQL<T>(queryString, variables, graphqlFn, signal, false);
        }
      }

      throw classifyGitHubError(error);
    }
  }

  async function cachedQuery<T>(
    queryString: string,
    variables: Record<string, unknown> | undefined,
    options: QueryOptions | undefined,
    graphqlFn: typeof graphqlWithAuth,
  ): Promise<T> {
    if (!options?.cache) {
      return executeGraphQL<T>(queryString, variables, graphqlFn, options?.signal);
    }

    const cacheKey = SessionCache.queryKey(queryString, variables);
    const cached = cache.get<T>(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const result = await executeGraphQL<T>(
      queryString,
      variables,
      graphqlFn,
      options.signal,
    );
    cache.set(cacheKey, result, options.cacheTtlMs);
    return result;
  }

  return {
    config: clientConfig,

    query<T>(
      queryString: string,
      variables?: Record<string, unknown>,
      options?: QueryOptions,
    ): Promise<T> {
      return cachedQuery<T>(queryString, variables, options, graphqlWithAuth);
    },

    projectQuery<T>(
      queryString: string,
      variables?: Record<string, unknown>,
      options?: QueryOptions,
    ): Promise<T> {
      return cachedQuery<T>(
        queryString,
        variables,
        options,
        projectGraphqlWithAuth,
      );
    },

    mutate<T>(
      mutation: string,
      variables?: Record<string, unknown>,
      options?: MutateOptions,
    ): Promise<T> {
      // Only query results are dropped; the authenticated-user entry survives
      cache.invalidatePrefix("query:");
      return executeGraphQL<T>(mutation, variables, graphqlWithAuth, options?.signal);
    },

    projectMutate<T>(
      mutation: string,
      variables?: Record<string, unknown>,
      options?: MutateOptions,
    ): Promise<T> {
      cache.invalidatePrefix("query:");
      return executeGraphQL<T>(
        mutation,
        variables,
        projectGraphqlWithAuth,
        options?.signal,
      );
    },

    getRateLimitStatus() {
      return rateLimiter.getStatus();
    },

    getCache() {
      return cache;
    },

    async getAuthenticatedUser(): Promise<string> {
      const cacheKey = "authenticated-user";
      const cached = cache.get<string>(cacheKey);
      if (cached) return cached;

      const result = await executeGraphQL<{ viewer: { login: string } }>(
        `query { viewer { login } }`,
        undefined,
        graphqlWithAuth,
      );

      const login = result.viewer.login;
      cache.set(cacheKey, login, 60 * 60 * 1000);
      return login;
    },
  };
}
