import { config as loadDotenv } from "dotenv";
import { fileURLToPath } from "url";
import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

// Get the directory name of the current module
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Path to the package root (2 levels up from utils, in src/ and dist/ alike)
export const rootDir = path.resolve(__dirname, "../..");

// Path to the .env file
export const envPath = process.env.DASTORE_ENV_FILE || path.join(rootDir, ".env");

// Load environment variables from the root .env file immediately.
// Variables already set in the environment win.
loadDotenv({ path: envPath });

function defaultStateDir(env: NodeJS.ProcessEnv): string {
  const base = env.XDG_STATE_HOME || path.join(env.HOME || os.homedir(), ".local", "state");
  return path.join(base, "dastore");
}

const EnvSchema = z.object({
  DASTORE_INSTALL_DIR: z.string().min(1).default("/opt/dastore"),
  DASTORE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  DASTORE_AUR_HELPER: z.string().min(1).default("yay"),
  // Empty string disables the prefix
  DASTORE_SUDO: z.string().default("sudo"),
  DASTORE_ELEVATE: z.string().default("pkexec"),
  DASTORE_STATE_DIR: z.string().min(1).optional(),
  DASTORE_SEARCH_LIMIT: z.coerce.number().int().positive().default(50),
  DASTORE_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

// Every setting read from the environment, DASTORE_ENV_FILE included
export const ENV_KEYS = [...Object.keys(EnvSchema.shape), "DASTORE_ENV_FILE"];

export interface DastoreConfig {
  installDir: string;
  logLevel: "debug" | "info" | "warn" | "error";
  aurHelper: string;
  sudoCommand: string;
  elevateCommand: string;
  stateDir: string;
  searchLimit: number;
  queryTimeoutMs: number;
}

/**
 * Reads and validates Dastore settings from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DastoreConfig {
  // Treat blank values of optional settings as unset
  const input: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    const keepsEmpty = key === "DASTORE_SUDO" || key === "DASTORE_ELEVATE";
    input[key] = value === undefined || (!keepsEmpty && value.trim() === "") ? undefined : value.trim();
  }

  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(issues);
  }

  const values = parsed.data;
  return {
    installDir: values.DASTORE_INSTALL_DIR,
    logLevel: values.DASTORE_LOG_LEVEL,
    aurHelper: values.DASTORE_AUR_HELPER,
    sudoCommand: values.DASTORE_SUDO,
    elevateCommand: values.DASTORE_ELEVATE,
    stateDir: values.DASTORE_STATE_DIR ?? defaultStateDir(env),
    searchLimit: values.DASTORE_SEARCH_LIMIT,
    queryTimeoutMs: values.DASTORE_QUERY_TIMEOUT_MS,
  };
}
