/**
 * Session-scoped caches for GitHub API responses.
 *
 * Both live as long as the server process.
 */

import type { ProjectField } from "./provider.js";

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class SessionCache {
  private store = new Map<string, CacheEntry<unknown>>();
  private defaultTtlMs: number;

  constructor(defaultTtlMs: number = 5 * 60 * 1000) {
    this.defaultTtlMs = defaultTtlMs;
  }

  /**
   * Get a cached value. Returns undefined if not found or expired.
   */
  get<T>(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;

    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }

    return entry.value as T;
  }

  set<T>(key: string, value: T, ttlMs?: number): void {
    this.store.set(key, {
      value,
      expiresAt: Date.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  invalidatePrefix(prefix: string): void {
    for (const key of this.store.keys()) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Generate a cache key from a query string and variables.
   */
  static queryKey(query: string, variables?: Record<string, unknown>): string {
    const normalized = query.replace(/\s+/g, " ").trim();
    const varsKey = variables
      ? JSON.stringify(variables, Object.keys(variables).sort())
      : "";
    return `query:${normalized}:${varsKey}`;
  }
}

// ---------------------------------------------------------------------------
// Project Field Index
// ---------------------------------------------------------------------------

/**
 * Field metadata keyed by project node ID, then by lowercased field name.
 * Filled from `fetchProject` so field names given by a user (or by a
 * workflow action) resolve to GraphQL IDs without another round trip.
 */
export class ProjectFieldIndex {
  private projects = new Map<string, Map<string, ProjectField>>();

  populate(projectId: string, fields: ProjectField[]): void {
    const byName = new Map<string, ProjectField>();
    for (const field of fields) {
      byName.set(field.name.toLowerCase(), field);
    }
    this.projects.set(projectId, byName);
  }

  isPopulated(projectId: string): boolean {
    return this.projects.has(projectId);
  }

  getField(projectId: string, fieldName: string): ProjectField | undefined {
    return this.projects.get(projectId)?.get(fieldName.toLowerCase());
  }

  getFields(projectId: string): ProjectField[] {
    const fields = this.projects.get(projectId);
    return fields ? Array.from(fields.values()) : [];
  }

  clear(): void {
    this.projects.clear();
  }
}
