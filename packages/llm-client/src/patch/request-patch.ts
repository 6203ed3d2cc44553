/**
 * Request patch engine.
 *
 * Applies a configured override to an outgoing request in a fixed order:
 * url, body deep-merge, headers, field removals. Never mutates its inputs.
 */

import { InvalidConfigError } from "../types/errors.js";
import type { JsonObject, JsonValue } from "../types/json.js";
import { isJsonObject } from "../utils/json.js";

/** Nesting limit for patch body fragments. */
export const MAX_PATCH_DEPTH = 64;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RequestPatch {
  /** Replaces the request URL entirely. */
  url?: string;
  /** Deep-merged into the request body. */
  body?: JsonObject;
  /** A string sets the header; `null` removes it. */
  headers?: Record<string, string | null>;
  /** Dot-delimited paths to delete, e.g. "a.b.0". */
  remove_fields?: string[];
}

/** A patch whose removal paths have been validated and split. */
export interface CompiledRequestPatch {
  readonly url?: string;
  readonly body?: JsonObject;
  readonly headers: ReadonlyArray<readonly [string, string | null]>;
  readonly removals: ReadonlyArray<readonly string[]>;
}

export interface OutgoingRequest {
  url: string;
  body: JsonObject;
  headers: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

function depthOf(value: JsonValue): number {
  if (Array.isArray(value)) {
    return 1 + value.reduce<number>((max, item) => Math.max(max, depthOf(item)), 0);
  }
  if (isJsonObject(value)) {
    return 1 + Object.values(value).reduce<number>((max, item) => Math.max(max, depthOf(item)), 0);
  }
  return 0;
}

/** Split and validate a removal path. */
export function parseFieldPath(path: string): string[] {
  if (path.length === 0) {
    throw new InvalidConfigError("patch.remove_fields", "removal path must not be empty");
  }
  const segments = path.split(".");
  if (segments.some((segment) => segment.length === 0)) {
    throw new InvalidConfigError(
      "patch.remove_fields",
      `removal path "${path}" contains an empty segment`,
    );
  }
  return segments;
}

/**
 * Validate a patch once, at adapter construction, so that malformed patches
 * never surface mid-call.
 */
export function compileRequestPatch(patch: RequestPatch): CompiledRequestPatch {
  if (patch.body !== undefined && depthOf(patch.body) > MAX_PATCH_DEPTH) {
    throw new InvalidConfigError(
      "patch.body",
      `body fragment nests deeper than ${MAX_PATCH_DEPTH} levels`,
    );
  }

  return {
    url: patch.url,
    body: patch.body === undefined ? undefined : structuredClone(patch.body),
    headers: Object.entries(patch.headers ?? {}),
    removals: (patch.remove_fields ?? []).map(parseFieldPath),
  };
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

/**
 * Merge `patch` into `original`. Objects merge key by key; any other
 * combination takes the patch value wholesale (arrays are never merged
 * element-wise). Returns a new value.
 */
export function deepMerge(original: JsonValue, patch: JsonValue): JsonValue {
  if (!isJsonObject(original) || !isJsonObject(patch)) {
    return structuredClone(patch);
  }
  const merged: JsonObject = structuredClone(original);
  for (const [key, value] of Object.entries(patch)) {
    const existing = Object.prototype.hasOwnProperty.call(merged, key) ? merged[key] : undefined;
    setOwn(merged, key, existing === undefined ? structuredClone(value) : deepMerge(existing, value));
  }
  return merged;
}

/** Plain assignment to `__proto__` would replace the prototype instead. */
function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

// ---------------------------------------------------------------------------
// Field removal
// ---------------------------------------------------------------------------

function parseIndex(segment: string): number | undefined {
  return /^\d+$/.test(segment) ? Number(segment) : undefined;
}

/** Delete the value at `segments` in place. Missing paths are ignored. */
function removeInPlace(root: JsonValue, segments: readonly string[]): void {
  let current: JsonValue | undefined = root;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    if (segment === undefined || current === undefined) return;
    current = child(current, segment);
  }

  const last = segments[segments.length - 1];
  if (current === undefined || last === undefined) return;

  if (Array.isArray(current)) {
    const index = parseIndex(last);
    if (index !== undefined && index < current.length) {
      current.splice(index, 1);
    }
  } else if (isJsonObject(current)) {
    delete current[last];
  }
}

function child(value: JsonValue, segment: string): JsonValue | undefined {
  if (Array.isArray(value)) {
    const index = parseIndex(segment);
    return index === undefined ? undefined : value[index];
  }
  if (isJsonObject(value)) {
    return Object.prototype.hasOwnProperty.call(value, segment) ? value[segment] : undefined;
  }
  return undefined;
}

/**
 * Order removals so that index removals sharing a parent run in descending
 * index order. Each such group runs at the position of its first member.
 */
function orderRemovals(
  removals: ReadonlyArray<readonly string[]>,
): ReadonlyArray<readonly string[]> {
  const groups = new Map<string, Array<readonly string[]>>();
  const ordered: Array<readonly string[] | string> = [];

  for (const path of removals) {
    const last = path[path.length - 1];
    if (last === undefined || parseIndex(last) === undefined) {
      ordered.push(path);
      continue;
    }
    const parentKey = path.slice(0, -1).join(".");
    const group = groups.get(parentKey);
    if (group) {
      group.push(path);
    } else {
      groups.set(parentKey, [path]);
      ordered.push(parentKey);
    }
  }

  return ordered.flatMap((entry) => {
    if (typeof entry !== "string") return [entry];
    const group = groups.get(entry) ?? [];
    return [...group].sort((a, b) => indexOf(b) - indexOf(a));
  });
}

function indexOf(path: readonly string[]): number {
  return parseIndex(path[path.length - 1] ?? "") ?? 0;
}

/** Remove one dot-delimited path from a copy of `body`. */
export function removeField(body: JsonObject, path: string): JsonObject {
  const copy = structuredClone(body);
  removeInPlace(copy, parseFieldPath(path));
  return copy;
}

// ---------------------------------------------------------------------------
// Apply
// ---------------------------------------------------------------------------

/** Apply a compiled patch. Inputs and the patch are left untouched. */
export function applyRequestPatch(
  request: OutgoingRequest,
  patch: CompiledRequestPatch,
): OutgoingRequest {
  const url = patch.url ?? request.url;

  let body: JsonObject = structuredClone(request.body);
  if (patch.body !== undefined) {
    const merged = deepMerge(body, patch.body);
    body = isJsonObject(merged) ? merged : body;
  }

  const headers: Record<string, string> = { ...request.headers };
  for (const [name, value] of patch.headers) {
    const lower = name.toLowerCase();
    for (const existing of Object.keys(headers)) {
      if (existing.toLowerCase() === lower) delete headers[existing];
    }
    if (value !== null) headers[name] = value;
  }

  for (const path of orderRemovals(patch.removals)) {
    removeInPlace(body, path);
  }

  return { url, body, headers };
}
