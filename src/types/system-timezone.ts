export type SupportedOsFamily = "Linux" | "Windows";

/** `Linux`, `Windows`, or whatever else the host reports (e.g. `Darwin`) */
export type OsFamily = SupportedOsFamily | (string & {});

export interface ApplyDecision {
  dryRun: boolean;
  force: boolean;
  timezone: string;
  osFamily: OsFamily;
}

export type ApplyFailureReason = "unknown_timezone" | "missing_mapping" | "command_failed";

export type ApplyOutcome =
  | {
      status: "dry_run_reported";
      /** false only when Windows has no mapping for the timezone */
      success: boolean;
      command: string | null;
    }
  | { status: "aborted_by_user" }
  | { status: "succeeded"; command: string }
  | { status: "failed"; reason: ApplyFailureReason; message: string }
  | { status: "unsupported_platform"; osFamily: string };

export interface CommandResult {
  ok: boolean;
  exitCode: number | null;
  stderr: string;
}

/**
 * Runs an OS command with an argument list (no shell).
 */
export interface SystemCommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}
