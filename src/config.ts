import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors.js";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

// .env lives at the package root, one level above both src/ and dist/
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: envPath });

if (envResult.error && !("code" in envResult.error && envResult.error.code === "ENOENT")) {
  console.warn(`[config] Failed to load .env from ${envPath}:`, envResult.error.message);
}

export const envSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Default inputs for the CLI when no paths are given
  INVENTORY_CSV_PATH: optionalString,
  WANTLIST_PATH: optionalString,
  // Optional language filter for matching ("en", "de", "es", "fr", "it")
  PREFERRED_LANGUAGE: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() || undefined : value),
    z.enum(["en", "de", "es", "fr", "it"]).optional()
  ),
  PREFERRED_LANGUAGE_ONLY: boolFromEnv(false),
  // Bin analysis
  BIN_CAPACITY: z.coerce.number().int().positive().default(60),
  MIN_FREE_SLOTS: z.coerce.number().int().nonnegative().default(1),
});

export type RuntimeConfig = ReturnType<typeof buildRuntimeConfig>;

export function buildRuntimeConfig(env: NodeJS.ProcessEnv) {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.LOG_LEVEL,
    inventoryCsvPath: parsed.INVENTORY_CSV_PATH ?? null,
    wantlistPath: parsed.WANTLIST_PATH ?? null,
    preferredLanguage: parsed.PREFERRED_LANGUAGE ?? null,
    preferredLanguageOnly: parsed.PREFERRED_LANGUAGE_ONLY,
    binCapacity: parsed.BIN_CAPACITY,
    minFreeSlots: parsed.MIN_FREE_SLOTS,
  };
}

export const runtimeConfig = buildRuntimeConfig(process.env);
