export interface CliFlags {
  apply: boolean;
  force: boolean;
  verbose: boolean;
  help: boolean;
}

/**
 * Presence-only flags; anything unrecognised is ignored.
 */
export function parseCliFlags(argv: readonly string[]): CliFlags {
  const has = (...names: string[]) => names.some((name) => argv.includes(name));
  return {
    apply: has("--apply"),
    force: has("--force"),
    verbose: has("--verbose", "-v"),
    help: has("--help", "-h"),
  };
}

export const USAGE = [
  "Usage: ip-tz-sync [--apply] [--force] [--verbose]",
  "",
  "  (no flags)   dry run: detect and report, change nothing",
  "  --apply      set the system timezone (asks for confirmation)",
  "  --force      skip the confirmation prompt",
  "  --verbose    debug logging on stderr",
].join("\n");
