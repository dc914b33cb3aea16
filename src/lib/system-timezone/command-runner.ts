import { spawn } from "node:child_process";
import { logger } from "@/lib/logger";
import type { CommandResult, SystemCommandRunner } from "@/types/system-timezone";

const MAX_STDERR_CHARS = 2000;

/**
 * Spawns the command directly (no shell) and resolves once it exits.
 * Spawn failures such as ENOENT resolve as a failed result instead of rejecting.
 */
export class SpawnCommandRunner implements SystemCommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve) => {
      let settled = false;
      let stderr = "";

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = spawn(command, [...args]);
      child.stdout.on("data", (chunk: Buffer) => {
        logger.debug("[SpawnCommandRunner] stdout", { command, output: chunk.toString().trim() });
      });

      child.stderr.on("data", (chunk: Buffer) => {
        if (stderr.length < MAX_STDERR_CHARS) {
          stderr += chunk.toString();
        }
      });

      child.on("error", (error) => {
        logger.error("[SpawnCommandRunner] Failed to start command", { command, error });
        finish({ ok: false, exitCode: null, stderr: error.message });
      });

      child.on("close", (code: number | null) => {
        const trimmed = stderr.trim().slice(0, MAX_STDERR_CHARS);
        if (code !== 0) {
          logger.error("[SpawnCommandRunner] Command exited with an error", {
            command,
            exitCode: code,
            stderr: trimmed,
          });
        }
        finish({ ok: code === 0, exitCode: code, stderr: trimmed });
      });
    });
  }
}
