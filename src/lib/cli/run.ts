/**
 * Command orchestration: discover IP -> resolve timezone -> apply policy -> exit code.
 */

import { IpTimezoneCache } from "@/lib/cache/ip-timezone-cache";
import type { FetchImpl } from "@/lib/http/resilient-fetch";
import { logger, setLogLevel } from "@/lib/logger";
import { discoverPublicIp } from "@/lib/public-ip";
import { applyTimezone, detectOsFamily } from "@/lib/system-timezone/apply-policy";
import { createTimezoneProviders } from "@/lib/timezone/providers";
import { TimezoneResolver } from "@/lib/timezone/resolver";
import type { AppConfig } from "@/types/app-config";
import type { ApplyOutcome, SystemCommandRunner } from "@/types/system-timezone";
import type { BrowserTimezoneProbe } from "@/types/timezone";
import { EXIT_CODES, type ExitCode } from "./exit-codes";
import { parseCliFlags, USAGE } from "./flags";

export interface CliDeps {
  config: AppConfig;
  /** `process.platform` or an OS family name */
  platform: string;
  print: (line: string) => void;
  confirm: (question: string) => Promise<string>;
  runner: SystemCommandRunner;
  browserProbe?: BrowserTimezoneProbe;
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
}

function exitCodeForOutcome(outcome: ApplyOutcome, print: (line: string) => void): ExitCode {
  switch (outcome.status) {
    case "unsupported_platform":
      print(`Unsupported OS: ${outcome.osFamily}`);
      return EXIT_CODES.UNSUPPORTED_OS;
    case "aborted_by_user":
      print("Aborted by user.");
      return EXIT_CODES.OK;
    case "dry_run_reported":
      if (outcome.success) {
        print("Dry run complete: the command above would be run with --apply.");
        return EXIT_CODES.OK;
      }
      print("Dry run failed: this timezone cannot be applied on this platform.");
      return EXIT_CODES.APPLY_FAILED;
    case "succeeded":
      print(`Timezone applied: ${outcome.command}`);
      return EXIT_CODES.OK;
    case "failed":
      print(`Operation failed: ${outcome.message}`);
      return EXIT_CODES.APPLY_FAILED;
  }
}

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<ExitCode> {
  const { config, print } = deps;
  const flags = parseCliFlags(argv);

  if (flags.help) {
    print(USAGE);
    return EXIT_CODES.OK;
  }

  setLogLevel(flags.verbose ? "debug" : config.logLevel);

  const dryRun = config.dryRun && !flags.apply;
  const force = config.force || flags.force;

  const ip = await discoverPublicIp(
    { ipEchoUrl: config.ipEchoUrl, timeoutMs: config.http.timeoutMs },
    { fetchImpl: deps.fetchImpl }
  );
  if (!ip) {
    print("Could not detect public IP. Aborting.");
    return EXIT_CODES.NO_PUBLIC_IP;
  }
  print(`Public IP: ${ip}`);

  const resolver = new TimezoneResolver(
    new IpTimezoneCache(config.cacheFile),
    createTimezoneProviders(config, {
      fetch: { fetchImpl: deps.fetchImpl, sleep: deps.sleep },
      browserProbe: deps.browserProbe,
    })
  );

  const timezone = await resolver.resolve(ip);
  if (!timezone) {
    print("Could not determine IANA timezone for IP. Aborting.");
    return EXIT_CODES.NO_TIMEZONE;
  }
  print(`Detected IANA timezone: ${timezone}`);

  const osFamily = detectOsFamily(deps.platform);
  print(`Platform: ${osFamily}`);

  const outcome = await applyTimezone(
    { dryRun, force, timezone, osFamily },
    {
      runner: deps.runner,
      confirm: deps.confirm,
      windowsZones: config.windowsZones,
      report: print,
    }
  );

  logger.debug("[Cli] Apply outcome", { outcome });
  return exitCodeForOutcome(outcome, print);
}
