/**
 * comparators.ts - Field comparison and value normalization
 *
 * The plan builder only ever asks one question of a field: does the current
 * value differ from the desired one? The answer depends on the comparator
 * kind, and for set-valued fields on normalizing the provider's
 * representation first (taint effect enums, reserved labels).
 */

import { InvalidResizeError } from "../errors";
import type { ComparatorKind, FieldValue } from "./types";

/**
 * Label keys with this prefix are written by GKE itself. They are excluded
 * from comparison and must never be re-applied explicitly.
 */
export const RESERVED_LABEL_PREFIX = "goog-gke";

const TAINT_EFFECTS: Record<string, string> = {
  NO_SCHEDULE: "NoSchedule",
  NO_EXECUTE: "NoExecute",
  PREFER_NO_SCHEDULE: "PreferNoSchedule",
};

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Maps the GKE API's taint effect enum to the kubectl form.
 *
 * Values already in canonical form (or unknown) pass through unchanged, so
 * applying it twice gives the same result as applying it once.
 */
export function normalizeTaintEffect(effect: string): string {
  return TAINT_EFFECTS[effect] ?? effect;
}

/** Formats a taint as `key=value:Effect`, the --node-taints syntax. */
export function formatTaint(taint: {
  key: string;
  value?: string;
  effect: string;
}): string {
  return `${taint.key}=${taint.value ?? ""}:${normalizeTaintEffect(taint.effect)}`;
}

/**
 * Normalizes a `key=value:EFFECT` string so operator input in either enum
 * style compares equal to what the provider reports.
 */
export function normalizeTaintString(taint: string): string {
  const colon = taint.lastIndexOf(":");
  if (colon === -1) return taint;
  return `${taint.slice(0, colon)}:${normalizeTaintEffect(taint.slice(colon + 1))}`;
}

export function isReservedLabel(key: string): boolean {
  return key.startsWith(RESERVED_LABEL_PREFIX);
}

/**
 * Turns a label map into sorted `key=value` entries, dropping reserved keys.
 */
export function formatLabels(labels: Record<string, string>): string[] {
  return Object.entries(labels)
    .filter(([key]) => !isReservedLabel(key))
    .map(([key, value]) => `${key}=${value}`)
    .sort();
}

/**
 * Also drops reserved keys from `key=value` strings, for operator input.
 */
export function withoutReservedLabels(entries: readonly string[]): string[] {
  return entries.filter((entry) => !isReservedLabel(entry.split("=")[0]));
}

/** Sorted, de-duplicated copy; the canonical form for set comparison. */
export function normalizeSet(values: readonly string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))].sort();
}

/**
 * Splits a comma-separated CLI option into entries.
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

/**
 * Parses a whole, non-negative number from a number or a digits-only string.
 * Returns undefined for anything else ("50GB", "1.5", "", "abc").
 */
export function parseWholeNumber(value: FieldValue | undefined): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

function asList(value: FieldValue | undefined): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return normalizeSet(value);
  return normalizeSet(String(value).split(","));
}

/**
 * Decides whether a field needs reconciling.
 *
 * @param desired - undefined means "keep current": never differs, never validated
 * @throws InvalidResizeError for a grow field whose desired value is not a
 *   whole number strictly greater than the current one
 */
export function fieldDiffers(
  comparator: ComparatorKind,
  field: string,
  current: FieldValue | undefined,
  desired: FieldValue | undefined
): boolean {
  if (desired === undefined) return false;

  switch (comparator) {
    case "exact":
      return current === undefined || String(current) !== String(desired);

    case "set": {
      const a = asList(current);
      const b = asList(desired);
      return a.length !== b.length || a.some((value, i) => value !== b[i]);
    }

    case "grow": {
      const wanted = parseWholeNumber(desired);
      if (wanted === undefined || wanted === 0) {
        throw new InvalidResizeError(field, currentLabel(current), String(desired));
      }
      if (current === undefined) return true;
      const have = parseWholeNumber(current);
      if (have !== undefined && wanted <= have) {
        throw new InvalidResizeError(field, have, wanted);
      }
      return true;
    }

    case "presence":
      return desired === true && current !== true;
  }
}

function currentLabel(value: FieldValue | undefined): string | number | undefined {
  if (value === undefined || typeof value === "number") return value;
  return String(value);
}

/** Renders a field value for reports and descriptions. */
export function formatFieldValue(value: FieldValue | undefined): string {
  if (value === undefined) return "(none)";
  if (Array.isArray(value)) return value.length === 0 ? "(empty)" : value.join(",");
  return String(value);
}
