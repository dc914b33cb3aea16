import { type FetchDeps, fetchWithRetry } from "@/lib/http/resilient-fetch";
import { logger } from "@/lib/logger";
import type { HttpRetryConfig } from "@/types/app-config";
import type { TimezoneProvider } from "@/types/timezone";
import { fillIpTemplate } from "./url-template";

/**
 * Plain-text provider: the response body is the timezone itself (ipapi.co style).
 */
export class PrimaryTimezoneProvider implements TimezoneProvider {
  readonly name = "primary";

  constructor(
    private readonly urlTemplate: string,
    private readonly http: HttpRetryConfig,
    private readonly deps: FetchDeps = {}
  ) {}

  async attempt(ip: string): Promise<string | null> {
    const outcome = await fetchWithRetry(fillIpTemplate(this.urlTemplate, ip), this.http, this.deps);

    if (outcome.kind !== "response") {
      logger.info("[PrimaryTimezoneProvider] No usable response", {
        outcome: outcome.kind,
        attempts: outcome.attempts,
      });
      return null;
    }

    const { response } = outcome;
    if (response.status !== 200) {
      logger.info("[PrimaryTimezoneProvider] Unexpected status", { status: response.status });
      return null;
    }

    const timezone = response.body.trim();
    return timezone || null;
  }
}
