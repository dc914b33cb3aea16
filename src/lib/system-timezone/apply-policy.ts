/**
 * Apply policy
 *
 * Proposed -> DryRunReported | AwaitingConfirmation | Applying
 *          -> Succeeded | Failed | AbortedByUser
 * plus UnsupportedPlatform, decided before anything else.
 *
 * At most one command is issued per call.
 */

import { logger } from "@/lib/logger";
import { isKnownTimezone } from "@/lib/timezone/iana";
import type { WindowsZoneTable } from "@/types/app-config";
import type {
  ApplyDecision,
  ApplyOutcome,
  OsFamily,
  SupportedOsFamily,
  SystemCommandRunner,
} from "@/types/system-timezone";

export const CONFIRMATION_WORD = "YES";

export interface ApplyPolicyDeps {
  runner: SystemCommandRunner;
  /** Asks the operator a question and resolves with the raw answer */
  confirm: (question: string) => Promise<string>;
  windowsZones: WindowsZoneTable;
  /** Sink for user-facing lines */
  report: (line: string) => void;
}

interface PlannedCommand {
  command: string;
  args: string[];
}

export function detectOsFamily(platform: NodeJS.Platform | string): OsFamily {
  switch (platform) {
    case "linux":
      return "Linux";
    case "win32":
      return "Windows";
    case "darwin":
      return "Darwin";
    default:
      return platform;
  }
}

export function isSupportedOsFamily(osFamily: OsFamily): osFamily is SupportedOsFamily {
  return osFamily === "Linux" || osFamily === "Windows";
}

export function formatCommand({ command, args }: PlannedCommand): string {
  return [command, ...args.map((arg) => (/\s/.test(arg) ? `"${arg}"` : arg))].join(" ");
}

function linuxCommand(timezone: string): PlannedCommand {
  return { command: "timedatectl", args: ["set-timezone", timezone] };
}

function windowsCommand(windowsName: string): PlannedCommand {
  return { command: "tzutil", args: ["/s", windowsName] };
}

function lookupWindowsName(zones: WindowsZoneTable, timezone: string): string | null {
  return Object.hasOwn(zones, timezone) ? zones[timezone] : null;
}

function reportDryRun(
  osFamily: SupportedOsFamily,
  timezone: string,
  deps: ApplyPolicyDeps
): ApplyOutcome {
  if (osFamily === "Linux") {
    const command = formatCommand(linuxCommand(timezone));
    deps.report(`Would run: ${command}`);
    return { status: "dry_run_reported", success: true, command };
  }

  const windowsName = lookupWindowsName(deps.windowsZones, timezone);
  if (!windowsName) {
    deps.report(`Would run: tzutil /s <mapped-name-for-${timezone}>`);
    deps.report(`Mapped Windows name: none (no mapping for ${timezone})`);
    return { status: "dry_run_reported", success: false, command: null };
  }

  const command = formatCommand(windowsCommand(windowsName));
  deps.report(`Would run: ${command}`);
  deps.report(`Mapped Windows name: ${windowsName}`);
  return { status: "dry_run_reported", success: true, command };
}

function planApply(
  osFamily: SupportedOsFamily,
  timezone: string,
  zones: WindowsZoneTable
): PlannedCommand | Extract<ApplyOutcome, { status: "failed" }> {
  if (osFamily === "Linux") {
    if (!isKnownTimezone(timezone)) {
      return {
        status: "failed",
        reason: "unknown_timezone",
        message: `IANA timezone '${timezone}' not found locally. Install tzdata and retry.`,
      };
    }
    return linuxCommand(timezone);
  }

  const windowsName = lookupWindowsName(zones, timezone);
  if (!windowsName) {
    return {
      status: "failed",
      reason: "missing_mapping",
      message: `No Windows mapping for IANA timezone '${timezone}'.`,
    };
  }
  return windowsCommand(windowsName);
}

export async function applyTimezone(
  decision: ApplyDecision,
  deps: ApplyPolicyDeps
): Promise<ApplyOutcome> {
  const { osFamily, timezone } = decision;

  if (!isSupportedOsFamily(osFamily)) {
    logger.warn("[ApplyPolicy] Unsupported platform", { osFamily });
    return { status: "unsupported_platform", osFamily };
  }

  if (decision.dryRun) {
    deps.report("DRY RUN: nothing will be changed. Use --apply to actually change system timezone.");
    return reportDryRun(osFamily, timezone, deps);
  }

  if (!decision.force) {
    const answer = await deps.confirm(
      `Apply timezone '${timezone}' to this machine? Type ${CONFIRMATION_WORD} to proceed: `
    );
    if (answer.trim() !== CONFIRMATION_WORD) {
      logger.info("[ApplyPolicy] Operator declined", { timezone });
      return { status: "aborted_by_user" };
    }
  }

  const plan = planApply(osFamily, timezone, deps.windowsZones);
  if ("status" in plan) {
    logger.warn("[ApplyPolicy] Refusing to apply", { osFamily, timezone, reason: plan.reason });
    return plan;
  }

  const command = formatCommand(plan);
  logger.info("[ApplyPolicy] Applying timezone", { osFamily, timezone, command });

  const result = await deps.runner.run(plan.command, plan.args);
  if (!result.ok) {
    const exit = result.exitCode === null ? "" : ` with exit code ${result.exitCode}`;
    const detail = result.stderr ? `: ${result.stderr}` : "";
    return {
      status: "failed",
      reason: "command_failed",
      message: `${command} failed${exit}${detail}`,
    };
  }

  return { status: "succeeded", command };
}
