import os from "node:os";
import path from "node:path";
import { z } from "zod";

/**
 * Boolean transform for env strings
 * - "false" and "0" become false
 * - anything else becomes true
 */
const booleanTransform = (s: string) => s !== "false" && s !== "0";

/**
 * Blank strings count as unset so that `FOO=` falls back to the default.
 */
const emptyToUndefined = (val: unknown) =>
  typeof val === "string" && val.trim() === "" ? undefined : val;

const envBoolean = (defaultValue: "true" | "false") =>
  z.preprocess(emptyToUndefined, z.string().default(defaultValue).transform(booleanTransform));

const urlTemplate = z
  .string()
  .refine((value) => value.includes("{ip}"), "URL template must contain an {ip} placeholder");

export const DEFAULT_CACHE_FILE = path.join(os.homedir(), ".set_time_by_ip", "ip_tz_cache.json");

/**
 * Environment schema
 */
export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  // Do not use z.coerce.boolean(): Boolean("false") === true.
  VERBOSE: envBoolean("false"),
  IP_ECHO_URL: z.preprocess(
    emptyToUndefined,
    z.string().url("IP_ECHO_URL must be a valid URL").default("https://api.ipify.org?format=text")
  ),
  PRIMARY_TZ_URL: z.preprocess(
    emptyToUndefined,
    urlTemplate.default("https://ipapi.co/{ip}/timezone/")
  ),
  SECONDARY_TZ_URL: z.preprocess(
    emptyToUndefined,
    urlTemplate.default("http://worldtimeapi.org/api/ip/{ip}")
  ),
  DRY_RUN: envBoolean("true"),
  FORCE_APPLY: envBoolean("false"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(6000),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  BACKOFF_BASE_MS: z.coerce.number().min(0).default(1000),
  BACKOFF_MAX_MS: z.coerce.number().min(0).default(30000),
  CACHE_FILE: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_CACHE_FILE)),
  BROWSER_FALLBACK_ENABLED: envBoolean("true"),
  BROWSER_FALLBACK_URL: z.preprocess(
    emptyToUndefined,
    z.string().url().default("https://proxy6.net/privacy")
  ),
  BROWSER_EXECUTABLE_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  WINDOWS_ZONES_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

let _envConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!_envConfig) {
    _envConfig = EnvSchema.parse(process.env);
  }
  return _envConfig;
}

