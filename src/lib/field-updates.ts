/**
 * Resolve user-supplied `{ fieldName: value }` updates against a project's
 * field metadata, producing typed updates that carry GraphQL IDs.
 *
 * Everything here runs before a mutation is sent, so a bad field name or
 * option fails the whole request with InvalidRequestError.
 */

import { InvalidRequestError } from "./errors.js";
import type { ProjectField, ResolvedFieldUpdate } from "./provider.js";

export type FieldUpdateInput = Record<string, string | number | null>;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Look up a field by name, case-insensitively.
 */
export function findField(
  fields: ProjectField[],
  name: string,
): ProjectField | undefined {
  const lowered = name.trim().toLowerCase();
  return fields.find((f) => f.name.toLowerCase() === lowered);
}

/**
 * Resolve a name against `{ id, name }` entries: exact match first,
 * then case-insensitive.
 */
export function resolveNamedId(
  entries: Array<{ id: string; name: string }>,
  name: string,
): string | undefined {
  const exact = entries.find((e) => e.name === name);
  if (exact) return exact.id;
  const lowered = name.toLowerCase();
  return entries.find((e) => e.name.toLowerCase() === lowered)?.id;
}

export function requireField(fields: ProjectField[], name: string): ProjectField {
  const field = findField(fields, name);
  if (!field) {
    const available = fields.map((f) => f.name).join(", ");
    throw new InvalidRequestError(
      `Unknown field "${name}". Available fields: ${available || "(none)"}`,
    );
  }
  return field;
}

/**
 * Resolve one value for one field. `null` clears the field.
 */
export function resolveFieldValue(
  field: ProjectField,
  value: string | number | null,
): ResolvedFieldUpdate {
  const base = { fieldId: field.id, fieldName: field.name };

  if (value === null) {
    return { ...base, kind: "clear" };
  }

  switch (field.dataType) {
    case "TEXT":
      return { ...base, kind: "text", text: String(value) };

    case "NUMBER": {
      // Number("") is 0, so blank strings are rejected explicitly
      const n =
        typeof value === "number"
          ? value
          : value.trim() === ""
            ? Number.NaN
            : Number(value.trim());
      if (!Number.isFinite(n)) {
        throw new InvalidRequestError(
          `Field "${field.name}" requires a number, got "${value}"`,
        );
      }
      return { ...base, kind: "number", number: n };
    }

    case "DATE": {
      const date = String(value).trim();
      if (!ISO_DATE_RE.test(date) || Number.isNaN(Date.parse(`${date}T00:00:00Z`))) {
        throw new InvalidRequestError(
          `Field "${field.name}" requires a date in YYYY-MM-DD format, got "${value}"`,
        );
      }
      return { ...base, kind: "date", date };
    }

    case "SINGLE_SELECT": {
      const optionId = resolveNamedId(field.options, String(value));
      if (!optionId) {
        throw new InvalidRequestError(
          `Invalid value "${value}" for field "${field.name}". Valid options: ${field.options
            .map((o) => o.name)
            .join(", ")}`,
        );
      }
      return { ...base, kind: "single_select", optionId };
    }

    case "ITERATION": {
      const iterationId = resolveNamedId(
        field.iterations.map((i) => ({ id: i.id, name: i.title })),
        String(value),
      );
      if (!iterationId) {
        throw new InvalidRequestError(
          `Unknown iteration "${value}" for field "${field.name}". Valid iterations: ${field.iterations
            .map((i) => i.title)
            .join(", ")}`,
        );
      }
      return { ...base, kind: "iteration", iterationId };
    }

    default:
      throw new InvalidRequestError(
        `Field "${field.name}" (${field.dataType}) cannot be set as a project field value`,
      );
  }
}

/**
 * Resolve every entry of an update set, in insertion order.
 */
export function resolveFieldUpdates(
  fields: ProjectField[],
  updates: FieldUpdateInput,
): ResolvedFieldUpdate[] {
  return Object.entries(updates).map(([name, value]) =>
    resolveFieldValue(requireField(fields, name), value),
  );
}
