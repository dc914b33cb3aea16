import os from "node:os";
import path from "node:path";
import type { AppConfig } from "@/types/app-config";
import type { EnvConfig } from "./env.schema";
import { loadWindowsZones } from "./windows-zones";

export { ConfigError } from "./errors";
export { type EnvConfig, EnvSchema, getEnvConfig } from "./env.schema";
export { loadWindowsZones } from "./windows-zones";

function expandHome(file: string): string {
  if (file === "~") return os.homedir();
  if (file.startsWith("~/")) return path.join(os.homedir(), file.slice(2));
  return file;
}

/**
 * Turn validated env into the explicit config value handed to each component.
 */
export function buildAppConfig(env: EnvConfig): AppConfig {
  return {
    ipEchoUrl: env.IP_ECHO_URL,
    primaryTzUrl: env.PRIMARY_TZ_URL,
    secondaryTzUrl: env.SECONDARY_TZ_URL,
    http: {
      timeoutMs: env.REQUEST_TIMEOUT_MS,
      maxRetries: env.MAX_RETRIES,
      backoffBaseMs: env.BACKOFF_BASE_MS,
      backoffMaxMs: env.BACKOFF_MAX_MS,
    },
    cacheFile: expandHome(env.CACHE_FILE),
    dryRun: env.DRY_RUN,
    force: env.FORCE_APPLY,
    logLevel: env.VERBOSE ? "debug" : env.LOG_LEVEL,
    browserFallback: {
      enabled: env.BROWSER_FALLBACK_ENABLED,
      pageUrl: env.BROWSER_FALLBACK_URL,
      executablePath: env.BROWSER_EXECUTABLE_PATH,
    },
    windowsZones: loadWindowsZones(env.WINDOWS_ZONES_FILE),
  };
}
