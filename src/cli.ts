/**
 * ip-tz-sync entry point
 *
 *   tsx src/cli.ts                   # dry run (default)
 *   tsx src/cli.ts --apply           # apply, asks for confirmation
 *   tsx src/cli.ts --apply --force   # apply without asking
 *
 * Linux needs root for timedatectl; Windows needs an elevated prompt for tzutil.
 */

import { ZodError } from "zod";
import { PrivacyPageProbe } from "@/lib/browser/privacy-page-probe";
import { EXIT_CODES } from "@/lib/cli/exit-codes";
import { askQuestion } from "@/lib/cli/prompt";
import { runCli } from "@/lib/cli/run";
import { buildAppConfig, ConfigError, getEnvConfig } from "@/lib/config";
import { logger } from "@/lib/logger";
import { SpawnCommandRunner } from "@/lib/system-timezone/command-runner";
import type { AppConfig } from "@/types/app-config";

function askOperator(question: string): Promise<string> {
  return askQuestion(question, { input: process.stdin, output: process.stdout });
}

function loadConfig(): AppConfig | null {
  try {
    return buildAppConfig(getEnvConfig());
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      console.error(`Invalid configuration: ${issue?.path.join(".")}: ${issue?.message}`);
      return null;
    }
    if (error instanceof ConfigError) {
      console.error(`Invalid configuration: ${error.message}`);
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  if (!config) {
    return EXIT_CODES.CONFIG_ERROR;
  }

  return runCli(process.argv.slice(2), {
    config,
    platform: process.platform,
    print: (line) => console.log(line),
    confirm: askOperator,
    runner: new SpawnCommandRunner(),
    browserProbe: new PrivacyPageProbe(config.browserFallback),
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal("[Cli] Unexpected error", { error });
    console.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
