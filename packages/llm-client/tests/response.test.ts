import { describe, it, expect } from "vitest";
import {
  getResponseReasoning,
  getResponseText,
  getResponseToolCalls,
  type ChatResponse,
} from "../src/types/response.js";
import { ContentKind, OutputKind, Role, ToolKind } from "../src/types/enums.js";

const response: ChatResponse = {
  outputs: [
    { kind: OutputKind.REASONING, index: 0, text: "thinking " },
    { kind: OutputKind.REASONING, index: 0, text: "hard" },
    {
      kind: OutputKind.MESSAGE,
      index: 0,
      message: { role: Role.ASSISTANT, content: [{ kind: ContentKind.TEXT, text: "Hello" }] },
    },
    {
      kind: OutputKind.TOOL_CALL,
      index: 1,
      tool_call: { id: "call_1", name: "lookup", arguments: { q: "x" }, kind: ToolKind.FUNCTION },
    },
    {
      kind: OutputKind.MESSAGE,
      index: 1,
      message: { role: Role.ASSISTANT, content: [{ kind: ContentKind.TEXT, text: ", world" }] },
    },
    { kind: OutputKind.CUSTOM, index: 2, data: { vendor: true } },
  ],
  provider: { provider: "openai_chat" },
};

describe("response accessors", () => {
  it("joins the text of every message output", () => {
    expect(getResponseText(response)).toBe("Hello, world");
  });

  it("lists tool calls in output order", () => {
    expect(getResponseToolCalls(response)).toEqual([
      { id: "call_1", name: "lookup", arguments: { q: "x" }, kind: ToolKind.FUNCTION },
    ]);
  });

  it("joins reasoning text", () => {
    expect(getResponseReasoning(response)).toBe("thinking hard");
  });

  it("reports no reasoning when there is none", () => {
    const empty: ChatResponse = { outputs: [], provider: { provider: "google_gemini" } };
    expect(getResponseReasoning(empty)).toBeUndefined();
    expect(getResponseText(empty)).toBe("");
    expect(getResponseToolCalls(empty)).toEqual([]);
  });
});
