import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const LoggingEnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? undefined : value === "true")),
});

export interface LoggingConfig {
  level: z.infer<typeof LogLevelSchema>;
  pretty: boolean;
  name?: string;
}

/**
 * Read logging settings from an environment map. `LOG_PRETTY` wins over the
 * development default.
 */
export function loadLoggingConfig(
  env: Record<string, string | undefined> = process.env,
  name?: string,
): LoggingConfig {
  const parsed = LoggingEnvSchema.parse(env);
  return {
    level: parsed.LOG_LEVEL,
    pretty: parsed.LOG_PRETTY ?? parsed.NODE_ENV === "development",
    name,
  };
}
