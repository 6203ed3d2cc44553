/**
 * Narrowing helpers for reading vendor JSON without unchecked casts.
 */

import type { JsonObject, JsonValue } from "../types/json.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Parse JSON text. Throws `SyntaxError` on malformed input. */
export function parseJson(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

/** Parse JSON text, returning `undefined` instead of throwing. */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    return parseJson(text);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Field accessors
// ---------------------------------------------------------------------------

export function getString(
  obj: JsonObject | undefined,
  key: string,
): string | undefined {
  const value = obj?.[key];
  return typeof value === "string" ? value : undefined;
}

export function getNumber(
  obj: JsonObject | undefined,
  key: string,
): number | undefined {
  const value = obj?.[key];
  return typeof value === "number" ? value : undefined;
}

export function getBoolean(
  obj: JsonObject | undefined,
  key: string,
): boolean | undefined {
  const value = obj?.[key];
  return typeof value === "boolean" ? value : undefined;
}

export function getObject(
  obj: JsonObject | undefined,
  key: string,
): JsonObject | undefined {
  const value = obj?.[key];
  return isJsonObject(value) ? value : undefined;
}

export function getArray(
  obj: JsonObject | undefined,
  key: string,
): JsonValue[] | undefined {
  const value = obj?.[key];
  return Array.isArray(value) ? value : undefined;
}

/** Elements of `obj[key]` that are objects; non-object entries are skipped. */
export function getObjectArray(
  obj: JsonObject | undefined,
  key: string,
): JsonObject[] {
  return (getArray(obj, key) ?? []).filter(isJsonObject);
}

/** Drop keys whose value is `undefined` so the result is a plain JSON object. */
export function compactObject(
  fields: Record<string, JsonValue | undefined>,
): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
