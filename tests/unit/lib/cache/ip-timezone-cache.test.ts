import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { IpTimezoneCache } from "@/lib/cache/ip-timezone-cache";

vi.mock("@/lib/logger", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("IpTimezoneCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ip-tz-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("load returns an empty mapping when the file does not exist", async () => {
    const cache = new IpTimezoneCache(path.join(dir, "missing.json"));
    await expect(cache.load()).resolves.toEqual({});
  });

  test("load returns an empty mapping for corrupt JSON", async () => {
    const file = path.join(dir, "cache.json");
    await writeFile(file, "{not json", "utf8");

    await expect(new IpTimezoneCache(file).load()).resolves.toEqual({});
  });

  test("load returns an empty mapping when values are not strings", async () => {
    const file = path.join(dir, "cache.json");
    await writeFile(file, JSON.stringify({ "1.2.3.4": 42 }), "utf8");

    await expect(new IpTimezoneCache(file).load()).resolves.toEqual({});
  });

  test("load returns an empty mapping when the path is a directory", async () => {
    await expect(new IpTimezoneCache(dir).load()).resolves.toEqual({});
  });

  test("save creates parent directories and writes pretty JSON", async () => {
    const file = path.join(dir, "nested", "deeper", "cache.json");
    const cache = new IpTimezoneCache(file);

    await cache.save({ "1.2.3.4": "Asia/Kolkata" });

    expect(await readFile(file, "utf8")).toBe('{\n  "1.2.3.4": "Asia/Kolkata"\n}\n');
    await expect(cache.load()).resolves.toEqual({ "1.2.3.4": "Asia/Kolkata" });
  });

  test("save overwrites the whole file instead of merging", async () => {
    const file = path.join(dir, "cache.json");
    const cache = new IpTimezoneCache(file);

    await cache.save({ "1.1.1.1": "Europe/London", "2.2.2.2": "Asia/Tokyo" });
    await cache.save({ "3.3.3.3": "America/New_York" });

    await expect(cache.load()).resolves.toEqual({ "3.3.3.3": "America/New_York" });
  });

  test("save swallows write failures", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "a file, not a directory", "utf8");
    const cache = new IpTimezoneCache(path.join(blocker, "cache.json"));

    await expect(cache.save({ "1.2.3.4": "Asia/Kolkata" })).resolves.toBeUndefined();
  });
});
