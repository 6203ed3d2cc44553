import { z } from "zod";
import { InvalidConfigError } from "../types/errors.js";
import type { JsonValue } from "../types/json.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const CredentialSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("api_key"),
    /** Header to send the key in; adapters pick their own default. */
    header: z.string().min(1).optional(),
    key: z.string().min(1),
  }),
  z.object({
    type: z.literal("bearer"),
    token: z.string().min(1),
  }),
  z.object({
    type: z.literal("service_account"),
    json: JsonObjectSchema,
  }),
  z.object({
    type: z.literal("none"),
  }),
]);

export const ProviderKindSchema = z.enum([
  "openai_chat",
  "openai_responses",
  "anthropic_messages",
  "google_gemini",
]);

export const RequestPatchSchema = z.object({
  url: z.string().url().optional(),
  body: JsonObjectSchema.optional(),
  headers: z.record(z.string().nullable()).optional(),
  remove_fields: z.array(z.string()).optional(),
});

export const ModelConfigSchema = z.object({
  handle: z.string().min(1),
  provider: ProviderKindSchema,
  credential: CredentialSchema.default({ type: "none" }),
  default_model: z.string().min(1).optional(),
  base_url: z.string().url().optional(),
  extra: JsonObjectSchema.default({}),
  patch: RequestPatchSchema.optional(),
});

export const ModelConfigListSchema = z.array(ModelConfigSchema);

export type Credential = z.infer<typeof CredentialSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
/** Shape accepted before defaults are filled in. */
export type ModelConfigInput = z.input<typeof ModelConfigSchema>;

/**
 * Validate an ordered list of model entries. The first schema issue becomes
 * an InvalidConfigError naming its path, e.g. `[1].credential.key`.
 */
export function parseModelConfigs(input: unknown): ModelConfig[] {
  const result = ModelConfigListSchema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? formatPath(issue.path) : "models";
  throw new InvalidConfigError(field, issue?.message ?? "invalid model configuration", {
    cause: result.error,
  });
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path
    .map((segment, i) =>
      typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`,
    )
    .join("");
}
