import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim().length === 0) return undefined;
  return value;
};

const schema = z.object({
  HYPERDOC_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default("https://api.example.com")),
  HYPERDOC_API_PREFIX: z.string().default("/v1"),
  HYPERDOC_TOKEN: z.preprocess(emptyToUndefined, z.string().optional()),
  HYPERDOC_CONFIG_DIR: z.preprocess(emptyToUndefined, z.string().optional()),

  HYPERDOC_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  HYPERDOC_RETRY_MAX: z.coerce.number().int().min(0).max(8).default(2),
  HYPERDOC_RETRY_BASE_MS: z.coerce.number().int().positive().default(250),

  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("warn"),
  LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional())
});

export type AppConfig = {
  baseUrl: string;
  apiPrefix: string;
  token: string | undefined;
  configDir: string;
  requestTimeoutMs: number;
  retryMax: number;
  retryBaseMs: number;
  logLevel: z.infer<typeof schema>["LOG_LEVEL"];
  logFile: string | undefined;
};

export const normalizeBaseUrl = (value: string) => value.trim().replace(/\/+$/, "");

export const parseConfig = (
  env: NodeJS.ProcessEnv
): { success: true; config: AppConfig } | { success: false; errors: Record<string, string[] | undefined> } => {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    return { success: false, errors: parsed.error.flatten().fieldErrors };
  }

  const values = parsed.data;
  return {
    success: true,
    config: {
      baseUrl: normalizeBaseUrl(values.HYPERDOC_BASE_URL),
      apiPrefix: values.HYPERDOC_API_PREFIX,
      token: values.HYPERDOC_TOKEN?.trim() || undefined,
      configDir: values.HYPERDOC_CONFIG_DIR ?? path.join(os.homedir(), ".config", "hyperdoc"),
      requestTimeoutMs: values.HYPERDOC_REQUEST_TIMEOUT_MS,
      retryMax: values.HYPERDOC_RETRY_MAX,
      retryBaseMs: values.HYPERDOC_RETRY_BASE_MS,
      logLevel: values.LOG_LEVEL,
      logFile: values.LOG_FILE?.trim() || undefined
    }
  };
};

const result = parseConfig(process.env);
if (!result.success) {
  // eslint-disable-next-line no-console
  console.error("Invalid configuration:", result.errors);
  process.exit(1);
}

export const config: AppConfig = result.config;
