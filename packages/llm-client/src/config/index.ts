export {
  JsonValueSchema,
  JsonObjectSchema,
  CredentialSchema,
  ProviderKindSchema,
  RequestPatchSchema,
  ModelConfigSchema,
  ModelConfigListSchema,
  parseModelConfigs,
} from "./schema.js";
export type { Credential, ModelConfig, ModelConfigInput } from "./schema.js";
export type { RequestPatch } from "../patch/request-patch.js";
export { LoggingEnvSchema, LogLevelSchema, loadLoggingConfig } from "./env.js";
export type { LoggingConfig } from "./env.js";
