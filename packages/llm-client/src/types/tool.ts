/**
 * Tool definitions, calls, results and the tool-choice policy.
 */

import type { ToolKind } from "./enums.js";
import type { JsonObject, JsonValue } from "./json.js";

/** A tool offered to the model. */
export interface ToolDefinition {
  readonly kind: ToolKind;
  readonly name: string;
  readonly description?: string;
  /** JSON Schema for the arguments object. */
  readonly parameters?: JsonObject;
  /** Vendor-specific settings for built-in tools. */
  readonly config?: JsonObject;
  readonly metadata?: JsonObject;
}

/** A tool invocation requested by the model. */
export interface ToolCall {
  /** Provider-assigned call id. Absent for vendors that do not assign one. */
  readonly id?: string;
  readonly name: string;
  /** Parsed arguments, or the raw argument string when it was not valid JSON. */
  readonly arguments: JsonValue;
  readonly kind: ToolKind;
}

/** The output of executing a tool call. */
export interface ToolResult {
  /** The ToolCall.id this result answers. */
  readonly call_id?: string;
  readonly output: JsonValue;
  readonly is_error: boolean;
  readonly metadata?: JsonObject;
}

/** Controls whether and how the model may call tools. */
export type ToolChoice =
  | { readonly mode: "auto" }
  /** The model must call at least one tool. */
  | { readonly mode: "any" }
  | { readonly mode: "none" }
  /** The model must call the named tool. */
  | { readonly mode: "tool"; readonly name: string }
  /** Passed to the vendor verbatim. */
  | { readonly mode: "custom"; readonly value: JsonValue };
