import { z } from "zod";

// ─── Config desde env (parseado una sola vez) ──────────────────────

const numberFromEnv = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (!value || value.trim().length === 0) {
        return defaultValue;
      }
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        throw new Error(`Expected numeric env var, got '${value}'`);
      }
      return parsed;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: numberFromEnv(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  API_TOKEN: optionalString,
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o"),
  AGENT_MAX_TOKENS: numberFromEnv(4000),
  AGENT_TIMEOUT_MS: numberFromEnv(120_000),
  JOB_MAX_ERRORS: numberFromEnv(5),
});

export type AppConfig = z.infer<typeof envSchema>;

/** Parsea un objeto tipo process.env. Tira si algun valor es invalido. */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  return envSchema.parse(env);
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}
