import type { LogLevel } from "@/lib/logger";

export interface HttpRetryConfig {
  /** Per-request timeout */
  timeoutMs: number;
  /** Attempt budget, including the first request (>= 1) */
  maxRetries: number;
  backoffBaseMs: number;
  /** Ceiling applied to the doubled backoff */
  backoffMaxMs: number;
}

export interface BrowserFallbackConfig {
  enabled: boolean;
  pageUrl: string;
  executablePath?: string;
}

/**
 * IANA name -> Windows native timezone name (as accepted by `tzutil /s`)
 */
export type WindowsZoneTable = Readonly<Record<string, string>>;

export interface AppConfig {
  ipEchoUrl: string;
  /** Templates containing an `{ip}` placeholder */
  primaryTzUrl: string;
  secondaryTzUrl: string;
  http: HttpRetryConfig;
  cacheFile: string;
  dryRun: boolean;
  force: boolean;
  logLevel: LogLevel;
  browserFallback: BrowserFallbackConfig;
  windowsZones: WindowsZoneTable;
}
