/**
 * Static feature flags an adapter instance declares once at construction.
 */
export interface CapabilityDescriptor {
  readonly supports_stream: boolean;
  readonly supports_image_input: boolean;
  readonly supports_audio_input: boolean;
  readonly supports_video_input: boolean;
  readonly supports_tools: boolean;
  readonly supports_structured_output: boolean;
  readonly supports_parallel_tool_calls: boolean;
}

/** A descriptor with every flag off; adapters spread their own flags over it. */
export const NO_CAPABILITIES: CapabilityDescriptor = Object.freeze({
  supports_stream: false,
  supports_image_input: false,
  supports_audio_input: false,
  supports_video_input: false,
  supports_tools: false,
  supports_structured_output: false,
  supports_parallel_tool_calls: false,
});
