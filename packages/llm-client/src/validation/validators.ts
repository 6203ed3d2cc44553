/**
 * Validation helpers shared by every adapter, so the same violation yields
 * the same error kind and wording regardless of vendor.
 */

import type { Credential } from "../config/schema.js";
import type { CapabilityDescriptor } from "../types/capabilities.js";
import { ContentKind, Role, ToolKind } from "../types/enums.js";
import { AuthError, UnsupportedFeatureError, ValidationError } from "../types/errors.js";
import type { ContentPart, Message } from "../types/message.js";
import type { ChatRequest } from "../types/request.js";
import type { ToolResult } from "../types/tool.js";

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

/** Require at least one user or assistant message. */
export function ensureConversationMessage(messages: readonly Message[]): void {
  const found = messages.some(
    (message) => message.role === Role.USER || message.role === Role.ASSISTANT,
  );
  if (!found) {
    throw new ValidationError("request requires at least one user/assistant message");
  }
}

/** The single ToolResult of a tool-role message. */
export function expectToolResult(message: Message): ToolResult & { call_id: string } {
  const [only, ...rest] = message.content;
  if (!only || rest.length > 0 || only.kind !== ContentKind.TOOL_RESULT) {
    throw new ValidationError("tool role expects a single ToolResult content");
  }
  const { call_id } = only.tool_result;
  if (call_id === undefined || call_id.length === 0) {
    throw new ValidationError("tool message missing call_id");
  }
  return { ...only.tool_result, call_id };
}

/** Every tool-role message must carry exactly one ToolResult with a call id. */
export function ensureToolMessages(messages: readonly Message[]): void {
  for (const message of messages) {
    if (message.role === Role.TOOL) expectToolResult(message);
  }
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

function featureForPart(part: ContentPart, caps: CapabilityDescriptor): string | undefined {
  switch (part.kind) {
    case ContentKind.IMAGE:
      return caps.supports_image_input ? undefined : "image_input";
    case ContentKind.AUDIO:
      return caps.supports_audio_input ? undefined : "audio_input";
    case ContentKind.VIDEO:
      return caps.supports_video_input ? undefined : "video_input";
    default:
      return undefined;
  }
}

/** Reject media parts the adapter has not declared support for. */
export function ensureContentSupported(
  messages: readonly Message[],
  caps: CapabilityDescriptor,
): void {
  for (const message of messages) {
    for (const part of message.content) {
      const feature = featureForPart(part, caps);
      if (feature !== undefined) throw new UnsupportedFeatureError(feature);
    }
  }
}

/** Reject request features the adapter has not declared support for. */
export function ensureCapabilities(request: ChatRequest, caps: CapabilityDescriptor): void {
  ensureContentSupported(request.messages, caps);

  if (request.tools && request.tools.length > 0 && !caps.supports_tools) {
    throw new UnsupportedFeatureError("tools");
  }

  const format = request.response_format;
  if (format && format.type !== "text" && !caps.supports_structured_output) {
    throw new UnsupportedFeatureError("structured_output");
  }

  if (request.options?.parallel_tool_calls === true && !caps.supports_parallel_tool_calls) {
    throw new UnsupportedFeatureError("parallel_tool_calls");
  }
}

/** Only function tools are portable across vendors. */
export function ensureFunctionTools(request: ChatRequest): void {
  for (const tool of request.tools ?? []) {
    if (tool.kind !== ToolKind.FUNCTION) {
      throw new UnsupportedFeatureError(`${tool.kind}_tool`);
    }
  }
}

// ---------------------------------------------------------------------------
// Model and credentials
// ---------------------------------------------------------------------------

/** The request's model, else the adapter default. */
export function resolveModel(
  request: ChatRequest,
  defaultModel: string | undefined,
  provider: string,
): string {
  const model = request.options?.model ?? defaultModel;
  if (model === undefined || model.length === 0) {
    throw new ValidationError(`model is required for ${provider}`);
  }
  return model;
}

export interface CredentialPolicy {
  /** Adapter accepts running without a credential (e.g. a local server). */
  allowNone?: boolean;
  allowServiceAccount?: boolean;
}

/** Reject credentials the adapter has not opted into. */
export function resolveCredential(
  credential: Credential,
  provider: string,
  policy: CredentialPolicy = {},
): Credential {
  if (credential.type === "service_account" && !policy.allowServiceAccount) {
    throw new AuthError(`provider ${provider} does not support service account credential`);
  }
  if (credential.type === "none" && !policy.allowNone) {
    throw new AuthError(`provider ${provider} requires credential`);
  }
  return credential;
}
