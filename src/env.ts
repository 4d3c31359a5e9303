import { config as loadEnvFile } from "dotenv";
import { z } from "zod";

const preLoadedKeys = new Set(Object.keys(process.env));

loadEnvFile({ path: ".env", quiet: true });
const localResult = loadEnvFile({ path: ".env.local", quiet: true });

if (localResult.parsed) {
  for (const [key, value] of Object.entries(localResult.parsed)) {
    if (preLoadedKeys.has(key)) {
      continue;
    }
    process.env[key] = value;
  }
}

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim() === "") {
    return undefined;
  }
  return value;
};

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());
const optionalUrl = () => z.preprocess(emptyToUndefined, z.string().url().optional());
const optionalBoolean = () =>
  z.preprocess((value) => {
    const normalized = emptyToUndefined(value);
    if (normalized === undefined) return undefined;
    if (typeof normalized === "boolean") return normalized;
    if (typeof normalized === "string") {
      if (normalized.toLowerCase() === "true") return true;
      if (normalized.toLowerCase() === "false") return false;
    }
    return normalized;
  }, z.boolean().optional());

const positiveInteger = (name: string) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return undefined;
      }

      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`${name} must be a positive integer`);
      }
      return parsed;
    });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: optionalString(),
  PORT: positiveInteger("PORT"),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),
  OPENAI_API_KEY: optionalString(),
  OPENAI_API_BASE: optionalUrl(),
  OPENAI_MODEL: optionalString(),
  OPENAI_TIMEOUT_MS: positiveInteger("OPENAI_TIMEOUT_MS"),
  OPENAI_WEB_SEARCH: optionalBoolean(),
  GITHUB_TOKEN: optionalString(),
  TURSO_DATABASE_URL: optionalString(),
  TURSO_AUTH_TOKEN: optionalString(),
  SESSION_STORE: z.preprocess(emptyToUndefined, z.enum(["database", "memory"]).default("database")),
  DEFAULT_SESSION_STAGE: z.preprocess(
    (value) => {
      const normalized = emptyToUndefined(value);
      return typeof normalized === "string" ? Number(normalized) : normalized;
    },
    z.union([z.literal(1), z.literal(2)]).default(2)
  )
});

type ParsedEnv = z.infer<typeof envSchema>;

export type AppEnv = Omit<ParsedEnv, "PORT" | "OPENAI_MODEL" | "OPENAI_TIMEOUT_MS" | "OPENAI_WEB_SEARCH" | "LOG_LEVEL"> & {
  PORT: number;
  LOG_LEVEL: NonNullable<ParsedEnv["LOG_LEVEL"]>;
  OPENAI_MODEL: string;
  OPENAI_TIMEOUT_MS: number;
  OPENAI_WEB_SEARCH: boolean;
};

export const env = loadEnv(process.env);

export function loadEnv(source: NodeJS.ProcessEnv): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }

  const production = parsed.data.NODE_ENV === "production";
  return {
    ...parsed.data,
    PORT: parsed.data.PORT ?? 8000,
    LOG_LEVEL: parsed.data.LOG_LEVEL ?? (production ? "warn" : "info"),
    OPENAI_MODEL: parsed.data.OPENAI_MODEL ?? "gpt-4o-mini",
    OPENAI_TIMEOUT_MS: parsed.data.OPENAI_TIMEOUT_MS ?? 120_000,
    OPENAI_WEB_SEARCH: parsed.data.OPENAI_WEB_SEARCH ?? false,
    HOST: parsed.data.HOST?.trim() || undefined
  };
}
