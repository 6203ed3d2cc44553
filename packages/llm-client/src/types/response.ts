/**
 * ChatResponse and related output types.
 */

import { OutputKind } from "./enums.js";
import type { JsonObject, JsonValue } from "./json.js";
import type { Message } from "./message.js";
import { getMessageText } from "./message.js";
import type { ToolCall, ToolResult } from "./tool.js";

// ---------------------------------------------------------------------------
// FinishReason
// ---------------------------------------------------------------------------

/** Why generation stopped, with the vendor's own spelling in `raw`. */
export interface FinishReason {
  readonly reason:
    | "stop"
    | "length"
    | "tool_calls"
    | "content_filter"
    | "function_call"
    | "error"
    | "other";
  readonly raw?: string;
}

// ---------------------------------------------------------------------------
// TokenUsage
// ---------------------------------------------------------------------------

export interface TokenUsage {
  readonly prompt_tokens?: number;
  readonly completion_tokens?: number;
  readonly reasoning_tokens?: number;
  readonly total_tokens?: number;
  /** Vendor usage object, untouched. */
  readonly details?: JsonObject;
}

// ---------------------------------------------------------------------------
// ProviderMetadata
// ---------------------------------------------------------------------------

export interface ProviderMetadata {
  /** Adapter name, e.g. "openai_chat". */
  readonly provider: string;
  readonly request_id?: string;
  readonly endpoint?: string;
  readonly raw?: JsonValue;
}

// ---------------------------------------------------------------------------
// OutputItem -- discriminated union on `kind`
// ---------------------------------------------------------------------------

export type OutputItem =
  | { readonly kind: typeof OutputKind.MESSAGE; readonly index: number; readonly message: Message }
  | { readonly kind: typeof OutputKind.TOOL_CALL; readonly index: number; readonly tool_call: ToolCall }
  | { readonly kind: typeof OutputKind.TOOL_RESULT; readonly index: number; readonly tool_result: ToolResult }
  | { readonly kind: typeof OutputKind.REASONING; readonly index: number; readonly text: string }
  | { readonly kind: typeof OutputKind.CUSTOM; readonly index: number; readonly data: JsonValue };

// ---------------------------------------------------------------------------
// ChatResponse
// ---------------------------------------------------------------------------

export interface ChatResponse {
  readonly outputs: readonly OutputItem[];
  readonly usage?: TokenUsage;
  readonly finish_reason?: FinishReason;
  readonly model?: string;
  readonly provider: ProviderMetadata;
}

// ---------------------------------------------------------------------------
// Convenience accessors
// ---------------------------------------------------------------------------

/** Concatenated text of every message output. */
export function getResponseText(response: ChatResponse): string {
  return response.outputs
    .map((item) => (item.kind === OutputKind.MESSAGE ? getMessageText(item.message) : ""))
    .join("");
}

/** Every tool call in the response, in output order. */
export function getResponseToolCalls(response: ChatResponse): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const item of response.outputs) {
    if (item.kind === OutputKind.TOOL_CALL) calls.push(item.tool_call);
  }
  return calls;
}

/** Concatenated reasoning text, or `undefined` when there is none. */
export function getResponseReasoning(response: ChatResponse): string | undefined {
  const parts: string[] = [];
  for (const item of response.outputs) {
    if (item.kind === OutputKind.REASONING) parts.push(item.text);
  }
  return parts.length > 0 ? parts.join("") : undefined;
}
