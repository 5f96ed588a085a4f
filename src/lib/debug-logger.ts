/**
 * Debug logger for the ghx server.
 *
 * Captures tool calls, GraphQL operations, bulk operation lifecycles and
 * workflow executions as JSONL when GHX_DEBUG=true. The factory returns
 * null when disabled so call sites stay a single optional-chained call.
 */

import { writeFile, appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { randomBytes } from "node:crypto";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DebugLoggerOptions {
  logDir?: string; // defaults to ~/.ghx/logs/
}

export interface GraphQLLogFields {
  operation?: string;
  variables?: Record<string, unknown>;
  durationMs: number;
  status: number;
  rateLimitRemaining?: number;
  rateLimitCost?: number;
  error?: string;
}

export interface ToolLogFields {
  tool: string;
  params: Record<string, unknown>;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export interface OperationLogFields {
  operationId: string;
  event: "started" | "item_failed" | "finished";
  status: string;
  processedItems: number;
  failedItems: number;
  totalItems: number;
  itemId?: string;
  error?: string;
}

export interface WorkflowLogFields {
  workflowId: string;
  trigger: string;
  status: "SUCCESS" | "FAILURE";
  durationMs: number;
  error?: string;
}

interface LogEvent {
  ts: string;
  cat: "tool" | "graphql" | "operation" | "workflow";
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Sanitization
// ---------------------------------------------------------------------------

const SENSITIVE_PATTERNS = /token|auth|secret|key|password|credential/i;

/**
 * Replace values whose keys match sensitive patterns.
 */
export function sanitize(
  obj: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
  if (!obj) return obj;
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    result[k] = SENSITIVE_PATTERNS.test(k) ? "[REDACTED]" : v;
  }
  return result;
}

// ---------------------------------------------------------------------------
// DebugLogger
// ---------------------------------------------------------------------------

export class DebugLogger {
  private logPath: string | null = null;
  private logDir: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(options?: DebugLoggerOptions) {
    this.logDir = options?.logDir ?? join(homedir(), ".ghx", "logs");
  }

  private async getLogPath(): Promise<string> {
    if (this.logPath) return this.logPath;

    await mkdir(this.logDir, { recursive: true });

    const ts = new Date()
      .toISOString()
      .replace(/[:.]/g, "-")
      .replace("T", "-")
      .replace("Z", "");
    const rand = randomBytes(2).toString("hex");
    this.logPath = join(this.logDir, `session-${ts}-${rand}.jsonl`);

    await writeFile(this.logPath, "");
    return this.logPath;
  }

  private append(event: LogEvent): void {
    // Chained so lines land in call order; never awaited by callers
    this.pending = this.pending
      .then(() => this.getLogPath())
      .then((path) => appendFile(path, JSON.stringify(event) + "\n"))
      .catch((error: unknown) => {
        console.error("[ghx] Debug log write failed:", error);
      });
  }

  logGraphQL(fields: GraphQLLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "graphql",
      operation: fields.operation,
      variables: sanitize(fields.variables),
      durationMs: fields.durationMs,
      status: fields.status,
      rateLimitRemaining: fields.rateLimitRemaining,
      rateLimitCost: fields.rateLimitCost,
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  logTool(fields: ToolLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "tool",
      tool: fields.tool,
      params: sanitize(fields.params) ?? {},
      durationMs: fields.durationMs,
      ok: fields.ok,
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  logOperation(fields: OperationLogFields): void {
    this.append({ ts: new Date().toISOString(), cat: "operation", ...fields });
  }

  logWorkflow(fields: WorkflowLogFields): void {
    this.append({ ts: new Date().toISOString(), cat: "workflow", ...fields });
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.pending;
  }

  getSessionLogPath(): string | null {
    return this.logPath;
  }
}

// ---------------------------------------------------------------------------
// Factory & Wrapper
// ---------------------------------------------------------------------------

/**
 * Create a DebugLogger when enabled, otherwise null.
 */
export function createDebugLogger(
  enabled: boolean,
  options?: DebugLoggerOptions,
): DebugLogger | null {
  return enabled ? new DebugLogger(options) : null;
}

/**
 * Extract a GraphQL operation name from a query string.
 */
export function extractOperationName(queryString: string): string | undefined {
  const match = queryString.match(/(?:query|mutation)\s+(\w+)/);
  return match?.[1];
}

/**
 * Wrap a tool handler with debug logging.
 * When logger is null, calls handler directly.
 */
export async function withLogging<T>(
  logger: DebugLogger | null,
  toolName: string,
  params: Record<string, unknown>,
  handler: () => Promise<T>,
): Promise<T> {
  if (!logger) return handler();

  const t0 = Date.now();
  try {
    const result = await handler();
    logger.logTool({
      tool: toolName,
      params,
      durationMs: Date.now() - t0,
      ok: true,
    });
    return result;
  } catch (error) {
    logger.logTool({
      tool: toolName,
      params,
      durationMs: Date.now() - t0,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
