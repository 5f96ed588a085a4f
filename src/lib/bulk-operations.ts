/**
 * Bulk operation coordinator.
 *
 * Turns a batch of project item IDs into a tracked operation: each item is
 * mutated once through the ProjectDataProvider by a bounded worker pool,
 * failures are captured per item, and the terminal status is computed from
 * the final counts.
 *
 * `start()` returns a handle immediately so callers can poll progress or
 * cancel; `submit()` is the same thing awaited to completion. Records stay
 * in the OperationTracker for the lifetime of the process.
 */

import { randomUUID } from "node:crypto";
import type { DebugLogger } from "./debug-logger.js";
import {
  AuthenticationError,
  InvalidRequestError,
  NotFoundError,
  PartialFailureError,
  RemoteUnavailableError,
  errorMessage,
} from "./errors.js";
import type {
  ItemMutation,
  ProjectDataProvider,
  ResolvedFieldUpdate,
} from "./provider.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const BULK_OPERATION_TYPES = ["UPDATE", "DELETE", "ARCHIVE"] as const;

export type BulkOperationType = (typeof BULK_OPERATION_TYPES)[number];

export type BulkOperationStatus =
  | "PENDING"
  | "RUNNING"
  | "COMPLETED"
  | "FAILED"
  | "PARTIALLY_FAILED";

export interface BulkItemFailure {
  itemId: string;
  error: string;
}

export interface BulkOperation {
  id: string;
  projectId: string;
  type: BulkOperationType;
  status: BulkOperationStatus;
  totalItems: number;
  processedItems: number;
  failedItems: number;
  /** processedItems / totalItems */
  progress: number;
  createdAt: Date;
  completedAt?: Date;
  errorMessage?: string;
  failures: BulkItemFailure[];
}

export interface BulkOperationRequest {
  projectId: string;
  type: BulkOperationType;
  itemIds: string[];
  /** Required (non-empty) for UPDATE, ignored otherwise */
  updates?: ResolvedFieldUpdate[];
  /** Cancels the whole operation; in-flight items still finish */
  signal?: AbortSignal;
}

export interface BulkOperationHandle {
  readonly id: string;
  /** A copy of the live record */
  snapshot(): BulkOperation;
  cancel(reason?: string): void;
  /**
   * Settles with the terminal record. Rejects only with an
   * AuthenticationError, after the record has been marked FAILED.
   */
  readonly result: Promise<BulkOperation>;
}

export interface BulkCoordinatorOptions {
  /** Worker pool size (default: 4) */
  concurrency?: number;
  /** Per-item mutation timeout (default: 30s) */
  itemTimeoutMs?: number;
  /** Largest accepted batch (default: 100) */
  maxItems?: number;
  tracker?: OperationTracker;
  debugLogger?: DebugLogger | null;
  now?: () => Date;
  generateId?: () => string;
}

export const DEFAULT_BULK_CONCURRENCY = 4;
export const DEFAULT_ITEM_TIMEOUT_MS = 30_000;
export const MAX_BULK_ITEMS = 100;

const TERMINAL_STATUSES: ReadonlySet<BulkOperationStatus> = new Set([
  "COMPLETED",
  "FAILED",
  "PARTIALLY_FAILED",
]);

export function isTerminal(status: BulkOperationStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

function copyOperation(op: BulkOperation): BulkOperation {
  return {
    ...op,
    createdAt: new Date(op.createdAt),
    completedAt: op.completedAt ? new Date(op.completedAt) : undefined,
    failures: op.failures.map((f) => ({ ...f })),
  };
}

// ---------------------------------------------------------------------------
// Operation tracker
// ---------------------------------------------------------------------------

/**
 * Session-scoped registry of bulk operations, read by the
 * operation_status tool.
 */
export class OperationTracker {
  private readonly operations = new Map<string, () => BulkOperation>();

  track(id: string, snapshot: () => BulkOperation): void {
    this.operations.set(id, snapshot);
  }

  get(id: string): BulkOperation {
    const snapshot = this.operations.get(id);
    if (!snapshot) {
      throw new NotFoundError(`Bulk operation ${id} not found`);
    }
    return snapshot();
  }

  /** Every tracked operation, newest first. */
  list(): BulkOperation[] {
    return Array.from(this.operations.values(), (s) => s()).sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime(),
    );
  }

  get size(): number {
    return this.operations.size;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Non-empty, bounded, no blanks, no duplicates.
 */
export function validateItemIds(
  itemIds: string[],
  maxItems: number = MAX_BULK_ITEMS,
): void {
  if (itemIds.length === 0) {
    throw new InvalidRequestError("No item IDs given");
  }
  if (itemIds.length > maxItems) {
    throw new InvalidRequestError(
      `Too many items: ${itemIds.length} (max ${maxItems} per operation)`,
    );
  }

  const seen = new Set<string>();
  for (const itemId of itemIds) {
    if (!itemId.trim()) {
      throw new InvalidRequestError("Item IDs must not be empty");
    }
    if (seen.has(itemId)) {
      throw new InvalidRequestError(`Duplicate item ID: ${itemId}`);
    }
    seen.add(itemId);
  }
}

/**
 * Check a request before anything is sent. Throws InvalidRequestError.
 */
export function validateBulkRequest(
  request: BulkOperationRequest,
  maxItems: number = MAX_BULK_ITEMS,
): void {
  if (!BULK_OPERATION_TYPES.includes(request.type)) {
    throw new InvalidRequestError(
      `Unknown operation type "${request.type}". Valid types: ${BULK_OPERATION_TYPES.join(", ")}`,
    );
  }
  if (!request.projectId) {
    throw new InvalidRequestError("projectId is required");
  }
  validateItemIds(request.itemIds, maxItems);

  if (request.type === "UPDATE" && (request.updates?.length ?? 0) === 0) {
    throw new InvalidRequestError(
      "UPDATE operations require at least one field update",
    );
  }
}

function toMutation(request: BulkOperationRequest): ItemMutation {
  switch (request.type) {
    case "UPDATE":
      return { kind: "update", updates: request.updates ?? [] };
    case "DELETE":
      return { kind: "delete" };
    case "ARCHIVE":
      return { kind: "archive" };
  }
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

interface RunState {
  record: BulkOperation;
  controller: AbortController;
  cancelReason?: string;
  fatal?: AuthenticationError;
}

export class BulkOperationCoordinator {
  private readonly concurrency: number;
  private readonly itemTimeoutMs: number;
  private readonly maxItems: number;
  private readonly tracker: OperationTracker | undefined;
  private readonly debugLogger: DebugLogger | null;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly provider: ProjectDataProvider,
    options: BulkCoordinatorOptions = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_BULK_CONCURRENCY);
    this.itemTimeoutMs = options.itemTimeoutMs ?? DEFAULT_ITEM_TIMEOUT_MS;
    this.maxItems = options.maxItems ?? MAX_BULK_ITEMS;
    this.tracker = options.tracker;
    this.debugLogger = options.debugLogger ?? null;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Validate and begin executing a bulk operation. Throws
   * InvalidRequestError synchronously, before any remote call.
   */
  start(request: BulkOperationRequest): BulkOperationHandle {
    validateBulkRequest(request, this.maxItems);

    const state: RunState = {
      record: {
        id: this.generateId(),
        projectId: request.projectId,
        type: request.type,
        status: "PENDING",
        totalItems: request.itemIds.length,
        processedItems: 0,
        failedItems: 0,
        progress: 0,
        createdAt: this.now(),
        failures: [],
      },
      controller: new AbortController(),
    };
    const { record, controller } = state;

    const cancel = (reason?: string) => {
      if (isTerminal(record.status) || controller.signal.aborted) return;
      state.cancelReason = reason;
      controller.abort();
    };

    const onExternalAbort = () => cancel(abortReasonText(request.signal?.reason));
    if (request.signal?.aborted) {
      onExternalAbort();
    } else {
      request.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    this.tracker?.track(record.id, () => copyOperation(record));

    const result = this.execute(state, request).finally(() => {
      request.signal?.removeEventListener("abort", onExternalAbort);
    });

    return {
      id: record.id,
      snapshot: () => copyOperation(record),
      cancel,
      result,
    };
  }

  /** Run a bulk operation to completion. */
  async submit(request: BulkOperationRequest): Promise<BulkOperation> {
    return this.start(request).result;
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private async execute(
    state: RunState,
    request: BulkOperationRequest,
  ): Promise<BulkOperation> {
    const { record, controller } = state;
    const mutation = toMutation(request);

    record.status = "RUNNING";
    console.error(
      `[bulk-operations] ${record.type} ${record.id} started: ${record.totalItems} items, concurrency ${this.concurrency}`,
    );
    this.logLifecycle(record, "started");

    let next = 0;
    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted && !state.fatal) {
        const index = next++;
        if (index >= request.itemIds.length) return;
        const itemId = request.itemIds[index];

        try {
          await this.mutateWithTimeout(record.projectId, itemId, mutation);
          this.recordOutcome(state, itemId);
        } catch (error) {
          this.recordOutcome(state, itemId, error);
          if (error instanceof AuthenticationError) {
            state.fatal = error;
          }
        }
      }
    };

    const workers = Math.min(this.concurrency, request.itemIds.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    this.finish(state);
    if (state.fatal) {
      throw state.fatal;
    }
    return copyOperation(record);
  }

  private async mutateWithTimeout(
    projectId: string,
    itemId: string,
    mutation: ItemMutation,
  ): Promise<void> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new RemoteUnavailableError(
          `Item ${itemId} timed out after ${this.itemTimeoutMs}ms`,
        );
        controller.abort(error);
        reject(error);
      }, this.itemTimeoutMs);
    });

    try {
      await Promise.race([
        this.provider.mutateItem(projectId, itemId, mutation, {
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** The only place counters change. */
  private recordOutcome(state: RunState, itemId: string, error?: unknown): void {
    const { record } = state;
    record.processedItems++;
    if (error !== undefined) {
      const message = errorMessage(error);
      record.failedItems++;
      record.failures.push({ itemId, error: message });
      console.error(
        `[bulk-operations] ${record.id}: item ${itemId} failed: ${message}`,
      );
      this.logLifecycle(record, "item_failed", { itemId, error: message });
    }
    record.progress = record.processedItems / record.totalItems;
  }

  private finish(state: RunState): void {
    const { record, controller } = state;
    const { processedItems, failedItems, totalItems } = record;

    if (state.fatal) {
      record.status = "FAILED";
      record.errorMessage = `Authentication failed: ${state.fatal.message}`;
    } else if (controller.signal.aborted && processedItems < totalItems) {
      record.status = "FAILED";
      record.errorMessage =
        `Operation cancelled after ${processedItems} of ${totalItems} items were processed` +
        (state.cancelReason ? `: ${state.cancelReason}` : "");
    } else if (failedItems === 0) {
      record.status = "COMPLETED";
    } else {
      record.status = failedItems === totalItems ? "FAILED" : "PARTIALLY_FAILED";
      record.errorMessage = new PartialFailureError(failedItems, totalItems).message;
    }
    record.completedAt = this.now();

    console.error(
      `[bulk-operations] ${record.type} ${record.id} ${record.status}: ` +
        `${processedItems}/${totalItems} processed, ${failedItems} failed`,
    );
    this.logLifecycle(record, "finished", { error: record.errorMessage });
  }

  private logLifecycle(
    record: BulkOperation,
    event: "started" | "item_failed" | "finished",
    extra: { itemId?: string; error?: string } = {},
  ): void {
    this.debugLogger?.logOperation({
      operationId: record.id,
      event,
      status: record.status,
      processedItems: record.processedItems,
      failedItems: record.failedItems,
      totalItems: record.totalItems,
      ...extra,
    });
  }
}

function abortReasonText(reason: unknown): string | undefined {
  if (reason === undefined) return undefined;
  if (reason instanceof Error) {
    // Default reason from AbortController.abort() with no argument
    return reason.name === "AbortError" ? undefined : reason.message;
  }
  return String(reason);
}
