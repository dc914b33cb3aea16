/**
 * IP -> IANA timezone cache, persisted as a flat JSON object.
 *
 * - Fail open: any read/parse problem yields an empty mapping
 * - Write-through: callers save the full mapping right after updating it
 * - No TTL, no eviction
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logger } from "@/lib/logger";

export type IpTimezoneMap = Record<string, string>;

const IpTimezoneMapSchema = z.record(z.string(), z.string());

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class IpTimezoneCache {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<IpTimezoneMap> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug("[IpTimezoneCache] No cache file yet", { file: this.filePath });
      } else {
        logger.warn("[IpTimezoneCache] Failed to read cache, starting empty", {
          file: this.filePath,
          error,
        });
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn("[IpTimezoneCache] Cache file is not valid JSON, starting empty", {
        file: this.filePath,
        error,
      });
      return {};
    }

    const result = IpTimezoneMapSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn("[IpTimezoneCache] Cache file has unexpected shape, starting empty", {
        file: this.filePath,
      });
      return {};
    }

    return result.data;
  }

  /**
   * Overwrites the file with the complete mapping.
   */
  async save(mapping: IpTimezoneMap): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, `${JSON.stringify(mapping, null, 2)}\n`, "utf8");
      logger.debug("[IpTimezoneCache] Cache saved", {
        file: this.filePath,
        entries: Object.keys(mapping).length,
      });
    } catch (error) {
      logger.warn("[IpTimezoneCache] Failed to write cache, continuing without it", {
        file: this.filePath,
        error,
      });
    }
  }
}
