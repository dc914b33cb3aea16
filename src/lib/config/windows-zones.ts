import fs from "node:fs";
import { z } from "zod";
import type { WindowsZoneTable } from "@/types/app-config";
import { ConfigError } from "./errors";

const WindowsZoneTableSchema = z.record(z.string().min(1), z.string().min(1));

function readZoneFile(file: string | URL): WindowsZoneTable {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read Windows zone table ${String(file)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Windows zone table ${String(file)} is not valid JSON`, {
      cause: error,
    });
  }

  const result = WindowsZoneTableSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Windows zone table ${String(file)} must map IANA names to Windows names: ${result.error.issues[0]?.message ?? "invalid"}`
    );
  }
  return result.data;
}

/**
 * Bundled IANA -> Windows table, optionally overlaid by a user-supplied JSON file.
 * Entries in the override win.
 */
export function loadWindowsZones(overrideFile?: string): WindowsZoneTable {
  const bundled = readZoneFile(new URL("./windows-zones.json", import.meta.url));
  if (!overrideFile) {
    return bundled;
  }
  return { ...bundled, ...readZoneFile(overrideFile) };
}
