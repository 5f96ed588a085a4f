/**
 * Project analytics: status and assignee distributions, velocity and
 * timeline summaries.
 *
 * The builders are pure functions over ProjectItem[] with `now` injected.
 * `aggregateAnalytics` drains the provider's item sequence completely
 * before computing anything; a failure part-way through fails the whole
 * call rather than returning statistics over a partial item set.
 */

import {
  addUtcDays,
  addUtcMonths,
  daysBetween,
  inclusiveDays,
  parseDay,
  toDateString,
} from "./date-math.js";
import { AuthenticationError, RemoteUnavailableError, errorMessage } from "./errors.js";
import { findField } from "./field-updates.js";
import type {
  ProjectDataProvider,
  ProjectField,
  ProjectItem,
  ProjectSummary,
} from "./provider.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const VELOCITY_PERIODS = ["weekly", "monthly", "quarterly"] as const;

export type VelocityPeriod = (typeof VELOCITY_PERIODS)[number];

export interface DistributionBucket {
  category: string;
  count: number;
}

export interface VelocityData {
  period: VelocityPeriod;
  /** Window bounds, YYYY-MM-DD */
  startDate: string;
  endDate: string;
  completedItems: number;
  addedItems: number;
  /** completed / (completed + added), 0 when both are 0 */
  closureRate: number;
  /** Average days from creation to close, null when nothing closed */
  leadTime: number | null;
  /** Average days from joining the project to close, null when nothing closed */
  cycleTime: number | null;
}

export interface TimelineData {
  startDate?: string;
  endDate?: string;
  /** Inclusive day count, 0 when no dated items exist */
  duration: number;
  milestoneCount: number;
  activityCount: number;
}

export interface AnalyticsInfo {
  projectId: string;
  title: string;
  itemCount: number;
  fieldCount: number;
  viewCount: number;
  statusStats: DistributionBucket[];
  assigneeStats: DistributionBucket[];
  velocityData?: VelocityData;
  timelineData?: TimelineData;
}

export interface AggregateOptions {
  /** Single-select field to group by (default: "Status") */
  statusField?: string;
  /** Include velocity for this period */
  period?: VelocityPeriod;
  includeTimeline?: boolean;
  now?: Date;
}

export const NONE_BUCKET = "None";
export const UNASSIGNED_BUCKET = "Unassigned";
export const DEFAULT_STATUS_FIELD = "Status";

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

// ---------------------------------------------------------------------------
// Distributions
// ---------------------------------------------------------------------------

function itemSelectValue(item: ProjectItem, fieldName: string): string | undefined {
  const lowered = fieldName.toLowerCase();
  for (const [name, value] of Object.entries(item.fields)) {
    if (name.toLowerCase() === lowered && value.kind === "single_select") {
      return value.value.trim() || undefined;
    }
  }
  return undefined;
}

/**
 * Count items per status. Buckets follow the field's option order, then
 * values the field no longer lists (alphabetically), then "None".
 * Empty buckets are omitted.
 */
export function buildStatusStats(
  items: ProjectItem[],
  statusField: ProjectField | undefined,
  fieldName: string = DEFAULT_STATUS_FIELD,
): DistributionBucket[] {
  const counts = new Map<string, number>();
  let none = 0;

  for (const item of items) {
    const value = itemSelectValue(item, statusField?.name ?? fieldName);
    if (value === undefined) {
      none++;
    } else {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  const buckets: DistributionBucket[] = [];
  for (const option of statusField?.options ?? []) {
    const count = counts.get(option.name);
    if (count) {
      buckets.push({ category: option.name, count });
      counts.delete(option.name);
    }
  }
  for (const category of Array.from(counts.keys()).sort(compareText)) {
    buckets.push({ category, count: counts.get(category) ?? 0 });
  }
  if (none > 0) {
    buckets.push({ category: NONE_BUCKET, count: none });
  }
  return buckets;
}

/**
 * Count items per assignee. An item with several assignees counts once,
 * under the first login in sorted order, so buckets always sum to the
 * item count.
 */
export function buildAssigneeStats(items: ProjectItem[]): DistributionBucket[] {
  const counts = new Map<string, number>();
  let unassigned = 0;

  for (const item of items) {
    const [first] = [...item.assignees].sort(compareText);
    if (first === undefined) {
      unassigned++;
    } else {
      counts.set(first, (counts.get(first) ?? 0) + 1);
    }
  }

  const buckets = Array.from(counts, ([category, count]) => ({ category, count })).sort(
    (a, b) => b.count - a.count || compareText(a.category, b.category),
  );
  if (unassigned > 0) {
    buckets.push({ category: UNASSIGNED_BUCKET, count: unassigned });
  }
  return buckets;
}

/**
 * Attach render-time percentages, rounded to one decimal with the
 * largest-remainder method so that the displayed values of a complete
 * distribution add up to exactly 100.0. Returns null percentages when
 * there are no items.
 */
export function withPercentages(
  buckets: DistributionBucket[],
  itemCount: number,
): Array<DistributionBucket & { percentage: number | null }> {
  if (itemCount === 0) {
    return buckets.map((b) => ({ ...b, percentage: null }));
  }

  // Work in tenths of a percent
  const exact = buckets.map((b) => (b.count * 1000) / itemCount);
  const tenths = exact.map(Math.floor);
  const total = buckets.reduce((sum, b) => sum + b.count, 0);
  let remaining = Math.round((total * 1000) / itemCount) - tenths.reduce((a, b) => a + b, 0);

  const byRemainder = exact
    .map((value, index) => ({ index, remainder: value - Math.floor(value) }))
    .sort((a, b) => b.remainder - a.remainder || a.index - b.index);
  for (const { index } of byRemainder) {
    if (remaining <= 0) break;
    tenths[index] += 1;
    remaining -= 1;
  }

  return buckets.map((b, i) => ({ ...b, percentage: tenths[i] / 10 }));
}

// ---------------------------------------------------------------------------
// Velocity
// ---------------------------------------------------------------------------

export function periodStart(period: VelocityPeriod, now: Date): Date {
  switch (period) {
    case "weekly":
      return addUtcDays(now, -7);
    case "monthly":
      return addUtcMonths(now, -1);
    case "quarterly":
      return addUtcMonths(now, -3);
  }
}

function parseInstant(value: string | null): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Completion and intake over the window ending at `now`.
 */
export function calculateVelocity(
  items: ProjectItem[],
  period: VelocityPeriod,
  now: Date = new Date(),
): VelocityData {
  const start = periodStart(period, now);
  const inWindow = (d: Date | undefined): d is Date =>
    d !== undefined && d.getTime() >= start.getTime() && d.getTime() <= now.getTime();

  const leadTimes: number[] = [];
  const cycleTimes: number[] = [];
  let completedItems = 0;
  let addedItems = 0;

  for (const item of items) {
    const addedAt = parseInstant(item.addedAt);
    if (inWindow(addedAt)) addedItems++;

    const closedAt = parseInstant(item.closedAt);
    if (!inWindow(closedAt)) continue;
    completedItems++;

    const createdAt = parseInstant(item.createdAt);
    if (createdAt) leadTimes.push(Math.max(0, daysBetween(createdAt, closedAt)));
    // Items added after they were closed count as zero cycle time
    if (addedAt) cycleTimes.push(Math.max(0, daysBetween(addedAt, closedAt)));
  }

  const denominator = completedItems + addedItems;
  return {
    period,
    startDate: toDateString(start),
    endDate: toDateString(now),
    completedItems,
    addedItems,
    closureRate: denominator === 0 ? 0 : completedItems / denominator,
    leadTime: average(leadTimes),
    cycleTime: average(cycleTimes),
  };
}

// ---------------------------------------------------------------------------
// Timeline
// ---------------------------------------------------------------------------

/**
 * Span of every dated value in the item set: DATE fields, iteration
 * start/end and milestone due dates.
 */
export function buildTimeline(items: ProjectItem[]): TimelineData {
  const range: { earliest?: Date; latest?: Date } = {};
  const include = (d: Date | undefined) => {
    if (!d) return;
    if (!range.earliest || d < range.earliest) range.earliest = d;
    if (!range.latest || d > range.latest) range.latest = d;
  };

  const milestones = new Set<string>();
  let activityCount = 0;

  for (const item of items) {
    activityCount++;
    if (item.closedAt) activityCount++;

    for (const value of Object.values(item.fields)) {
      if (value.kind === "date") {
        include(parseDay(value.value));
      } else if (value.kind === "iteration") {
        const start = parseDay(value.startDate);
        include(start);
        if (start) include(addUtcDays(start, Math.max(value.duration, 1) - 1));
      }
    }

    if (item.milestone) {
      milestones.add(item.milestone.title);
      if (item.milestone.dueOn) include(parseDay(item.milestone.dueOn));
    }
  }

  const { earliest, latest } = range;
  if (!earliest || !latest) {
    return { duration: 0, milestoneCount: milestones.size, activityCount };
  }
  return {
    startDate: toDateString(earliest),
    endDate: toDateString(latest),
    duration: inclusiveDays(earliest, latest),
    milestoneCount: milestones.size,
    activityCount,
  };
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Drain every item of a project. Anything other than an authentication
 * failure surfaces as RemoteUnavailableError.
 */
export async function collectItems(
  provider: ProjectDataProvider,
  projectId: string,
): Promise<ProjectItem[]> {
  const items: ProjectItem[] = [];
  try {
    for await (const item of provider.fetchItems(projectId)) {
      items.push(item);
    }
  } catch (error) {
    if (error instanceof AuthenticationError) throw error;
    throw new RemoteUnavailableError(
      `Failed to fetch items for project ${projectId} after ${items.length} items: ${errorMessage(error)}`,
      error,
    );
  }
  return items;
}

export async function aggregateAnalytics(
  provider: ProjectDataProvider,
  project: ProjectSummary,
  options: AggregateOptions = {},
): Promise<AnalyticsInfo> {
  const items = await collectItems(provider, project.id);
  const statusFieldName = options.statusField ?? DEFAULT_STATUS_FIELD;
  const now = options.now ?? new Date();

  return {
    projectId: project.id,
    title: project.title,
    itemCount: items.length,
    fieldCount: project.fields.length,
    viewCount: project.views.length,
    statusStats: buildStatusStats(
      items,
      findField(project.fields, statusFieldName),
      statusFieldName,
    ),
    assigneeStats: buildAssigneeStats(items),
    ...(options.period
      ? { velocityData: calculateVelocity(items, options.period, now) }
      : {}),
    ...(options.includeTimeline ? { timelineData: buildTimeline(items) } : {}),
  };
}
