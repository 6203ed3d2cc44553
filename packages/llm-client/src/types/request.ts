/**
 * ChatRequest and its option types.
 */

import type { JsonObject, JsonValue } from "./json.js";
import type { Message } from "./message.js";
import type { ToolChoice, ToolDefinition } from "./tool.js";

/** Reasoning controls for models that expose them. */
export interface ReasoningOptions {
  /** e.g. "low", "medium", "high". */
  readonly effort?: string;
  /** Upper bound on reasoning tokens. */
  readonly budget_tokens?: number;
  /** Vendor-specific reasoning fields, merged into the vendor's reasoning object. */
  readonly extra?: JsonObject;
}

/** Sampling and generation options. */
export interface ChatOptions {
  /** Overrides the adapter's default model. */
  readonly model?: string;
  readonly temperature?: number;
  readonly top_p?: number;
  readonly max_output_tokens?: number;
  readonly presence_penalty?: number;
  readonly frequency_penalty?: number;
  readonly parallel_tool_calls?: boolean;
  readonly reasoning?: ReasoningOptions;
  /** Free-form fields copied onto the vendor body as-is. */
  readonly extra?: JsonObject;
}

/** Requested shape of the model's output. */
export type ResponseFormat =
  | { readonly type: "text" }
  | { readonly type: "json_object" }
  | {
      readonly type: "json_schema";
      readonly schema: JsonObject;
      readonly name?: string;
      readonly strict?: boolean;
    }
  | { readonly type: "custom"; readonly value: JsonValue };

/** A single canonical chat request. Never mutated after construction. */
export interface ChatRequest {
  readonly messages: readonly Message[];
  readonly options?: ChatOptions;
  readonly tools?: readonly ToolDefinition[];
  readonly tool_choice?: ToolChoice;
  readonly response_format?: ResponseFormat;
  readonly metadata?: JsonObject;
}
