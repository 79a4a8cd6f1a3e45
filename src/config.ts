import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_API_BASE = "https://api.neynar.com/v2/farcaster";
export const DEFAULT_TIMEOUT_MS = 30_000;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Empty strings count as unset, same as a missing variable.
const optionalString = z.preprocess((v) => (v === "" ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  NEYNAR_API_KEY: z.string({ required_error: "is required" }).min(1, "is required"),
  NEYNAR_SIGNER_UUID: z.string({ required_error: "is required" }).min(1, "is required"),
  NEYNAR_API_BASE: z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.string().url("must be a URL").default(DEFAULT_API_BASE),
  ),
  NEYNAR_TIMEOUT_MS: z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.coerce.number().int().positive("must be a positive integer").default(DEFAULT_TIMEOUT_MS),
  ),
  FC_RESET_DATA_DIR: optionalString,
  LOG_LEVEL: z.preprocess(
    (v) => (v === "" || v === undefined ? undefined : String(v).toLowerCase()),
    z.enum(LOG_LEVELS).default("info"),
  ),
});

export interface AppConfig {
  apiKey: string;
  signerUuid: string;
  apiBase: string;
  timeoutMs: number;
  dataDir: string;
  logLevel: LogLevel;
}

/**
 * Validate the process environment into an AppConfig.
 * Throws ConfigError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigError(
      `Invalid configuration: ${problems.join("; ")}. See .env.example for required variables.`,
    );
  }

  const vars = parsed.data;
  return {
    apiKey: vars.NEYNAR_API_KEY,
    signerUuid: vars.NEYNAR_SIGNER_UUID,
    apiBase: vars.NEYNAR_API_BASE,
    timeoutMs: vars.NEYNAR_TIMEOUT_MS,
    dataDir: vars.FC_RESET_DATA_DIR ?? "data",
    logLevel: vars.LOG_LEVEL,
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
