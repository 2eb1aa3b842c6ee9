import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "./domain/errors";
import { LOCATIONS, type Location } from "./domain/inventory";

// Load .env from the package root, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const ENV_PATH = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: ENV_PATH });

/** False when no .env was found; plain environment variables still apply. */
export const envFileLoaded = !envResult.error;

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional(),
);

const envSchema = z.object({
  SQLITE_DB: z.string().default("cards.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  SCRYFALL_BASE_URL: z.string().url().default("https://api.scryfall.com"),
  SCRYFALL_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SCRYFALL_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  SCRYFALL_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  SCRYFALL_USER_AGENT: z.string().default("binder-ledger/0.1.0"),
  DRIVE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  DRIVE_FOLDER_ID: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  DEFAULT_LOCATION: z.enum(LOCATIONS).default("bulk"),
});

export type EnvInput = Record<string, string | undefined>;

export interface RuntimeConfig {
  sqlitePath: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  scryfall: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    backoffMs: number;
    userAgent: string;
  };
  drive: {
    folderId?: string;
    credentialsPath?: string;
    timeoutMs: number;
  };
  defaultLocation: Location;
}

/** Validate an environment map; throws ConfigError naming every bad variable. */
export function buildRuntimeConfig(env: EnvInput): RuntimeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const parsed = result.data;
  return {
    sqlitePath: parsed.SQLITE_DB,
    logLevel: parsed.LOG_LEVEL,
    scryfall: {
      baseUrl: parsed.SCRYFALL_BASE_URL.replace(/\/+$/, ""),
      timeoutMs: parsed.SCRYFALL_TIMEOUT_MS,
      maxRetries: parsed.SCRYFALL_MAX_RETRIES,
      backoffMs: parsed.SCRYFALL_BACKOFF_MS,
      userAgent: parsed.SCRYFALL_USER_AGENT,
    },
    drive: {
      folderId: parsed.DRIVE_FOLDER_ID,
      credentialsPath: parsed.GOOGLE_APPLICATION_CREDENTIALS,
      timeoutMs: parsed.DRIVE_TIMEOUT_MS,
    },
    defaultLocation: parsed.DEFAULT_LOCATION,
  };
}

export const loadRuntimeConfig = (): RuntimeConfig => buildRuntimeConfig(process.env);
