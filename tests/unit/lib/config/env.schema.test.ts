import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { buildAppConfig, ConfigError, EnvSchema, loadWindowsZones } from "@/lib/config";
import { DEFAULT_CACHE_FILE } from "@/lib/config/env.schema";

describe("EnvSchema", () => {
  describe("boolean transform", () => {
    test('"false" and "0" are false', () => {
      expect(EnvSchema.parse({ DRY_RUN: "false" }).DRY_RUN).toBe(false);
      expect(EnvSchema.parse({ DRY_RUN: "0" }).DRY_RUN).toBe(false);
    });

    test("any other string is true", () => {
      expect(EnvSchema.parse({ FORCE_APPLY: "1" }).FORCE_APPLY).toBe(true);
      expect(EnvSchema.parse({ FORCE_APPLY: "yes" }).FORCE_APPLY).toBe(true);
    });
  });

  test("defaults", () => {
    const config = EnvSchema.parse({});
    expect(config.IP_ECHO_URL).toBe("https://api.ipify.org?format=text");
    expect(config.PRIMARY_TZ_URL).toBe("https://ipapi.co/{ip}/timezone/");
    expect(config.SECONDARY_TZ_URL).toBe("http://worldtimeapi.org/api/ip/{ip}");
    expect(config.DRY_RUN).toBe(true);
    expect(config.FORCE_APPLY).toBe(false);
    expect(config.VERBOSE).toBe(false);
    expect(config.REQUEST_TIMEOUT_MS).toBe(6000);
    expect(config.MAX_RETRIES).toBe(3);
    expect(config.BACKOFF_BASE_MS).toBe(1000);
    expect(config.BACKOFF_MAX_MS).toBe(30000);
    expect(config.CACHE_FILE).toBe(DEFAULT_CACHE_FILE);
    expect(config.BROWSER_FALLBACK_ENABLED).toBe(true);
    expect(config.BROWSER_FALLBACK_URL).toBe("https://proxy6.net/privacy");
    expect(config.BROWSER_EXECUTABLE_PATH).toBeUndefined();
  });

  test("numbers are coerced from strings", () => {
    const config = EnvSchema.parse({ MAX_RETRIES: "5", REQUEST_TIMEOUT_MS: "2500" });
    expect(config.MAX_RETRIES).toBe(5);
    expect(config.REQUEST_TIMEOUT_MS).toBe(2500);
  });

  test("blank values fall back to defaults", () => {
    expect(EnvSchema.parse({ CACHE_FILE: "  " }).CACHE_FILE).toBe(DEFAULT_CACHE_FILE);
  });

  test("blank booleans fall back to their defaults", () => {
    const config = EnvSchema.parse({
      FORCE_APPLY: "",
      DRY_RUN: "",
      VERBOSE: " ",
      BROWSER_FALLBACK_ENABLED: "",
    });
    expect(config.FORCE_APPLY).toBe(false);
    expect(config.DRY_RUN).toBe(true);
    expect(config.VERBOSE).toBe(false);
    expect(config.BROWSER_FALLBACK_ENABLED).toBe(true);
    expect(buildAppConfig(config).force).toBe(false);
  });

  test("MAX_RETRIES must be at least 1", () => {
    expect(EnvSchema.safeParse({ MAX_RETRIES: "0" }).success).toBe(false);
  });

  test("provider URLs must carry an {ip} placeholder", () => {
    const result = EnvSchema.safeParse({ PRIMARY_TZ_URL: "https://ipapi.co/timezone/" });
    expect(result.success).toBe(false);
  });
});

describe("buildAppConfig", () => {
  test("VERBOSE lowers the log level to debug", () => {
    const config = buildAppConfig(EnvSchema.parse({ VERBOSE: "true", LOG_LEVEL: "warn" }));
    expect(config.logLevel).toBe("debug");
  });

  test("maps env into the explicit config", () => {
    const config = buildAppConfig(
      EnvSchema.parse({
        CACHE_FILE: "~/tz/cache.json",
        BACKOFF_BASE_MS: "250",
        BROWSER_FALLBACK_ENABLED: "false",
      })
    );

    expect(config.cacheFile).toBe(path.join(os.homedir(), "tz", "cache.json"));
    expect(config.http).toEqual({
      timeoutMs: 6000,
      maxRetries: 3,
      backoffBaseMs: 250,
      backoffMaxMs: 30000,
    });
    expect(config.browserFallback.enabled).toBe(false);
    expect(config.windowsZones["Asia/Kolkata"]).toBe("India Standard Time");
  });
});

describe("loadWindowsZones", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ip-tz-zones-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("bundled table covers the common zones", () => {
    const zones = loadWindowsZones();
    expect(zones["America/New_York"]).toBe("Eastern Standard Time");
    expect(zones["Europe/London"]).toBe("GMT Standard Time");
    expect(zones["Asia/Tokyo"]).toBe("Tokyo Standard Time");
  });

  test("override file entries win over the bundled table", async () => {
    const file = path.join(dir, "zones.json");
    const overrides = {
      "Asia/Kolkata": "Custom India Time",
      "Pacific/Chatham": "Chatham Islands Standard Time",
    };
    await writeFile(file, JSON.stringify(overrides), "utf8");

    const zones = loadWindowsZones(file);

    expect(zones["Asia/Kolkata"]).toBe("Custom India Time");
    expect(zones["Pacific/Chatham"]).toBe("Chatham Islands Standard Time");
    expect(zones["Europe/London"]).toBe("GMT Standard Time");
  });

  test("malformed override file is a configuration error", async () => {
    const file = path.join(dir, "zones.json");
    await writeFile(file, JSON.stringify({ "Asia/Kolkata": 5 }), "utf8");

    expect(() => loadWindowsZones(file)).toThrow(ConfigError);
  });

  test("missing override file is a configuration error", () => {
    expect(() => loadWindowsZones(path.join(dir, "nope.json"))).toThrow(ConfigError);
  });
});
