import type { FinishReason } from "../types/index.js";

/**
 * Map a vendor finish reason onto the canonical set. `aliases` covers
 * vendor spellings that differ from the canonical names.
 */
export function mapFinishReason(
  raw: string,
  aliases: Readonly<Record<string, FinishReason["reason"]>> = {},
): FinishReason {
  const alias = aliases[raw];
  if (alias !== undefined) return { reason: alias, raw };

  switch (raw) {
    case "stop":
    case "length":
    case "tool_calls":
    case "content_filter":
    case "function_call":
      return { reason: raw, raw };
    default:
      return { reason: "other", raw };
  }
}
