import { z } from "zod";

import { FatalConfigError } from "./errors";

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  DISCORD_BOT_TOKEN: z.string().trim().min(1, "DISCORD_BOT_TOKEN is required"),
  DISCORD_API_URL: z.string().url().default("https://discord.com/api/v10"),
  MARKET_DATA_URL: z.string().url().default("https://query1.finance.yahoo.com"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  SYMBOLS_FILE: z.string().min(1).default("config/symbols.json"),

  // Scheduler
  ALERT_SCHEDULE: z.string().min(1).default("*/5 * * * *"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(500).max(60000).default(10000),
});

export type Env = z.infer<typeof envSchema>;

// Logging must work before (and without) the credential check
export const logEnvSchema = envSchema.pick({ NODE_ENV: true, LOG_LEVEL: true });

export type LogEnv = z.infer<typeof logEnvSchema>;

export function validateEnv(env: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new FatalConfigError(`Invalid environment variables: ${issues}`);
  }

  return result.data;
}
