import { z } from "zod";
import { type FetchDeps, fetchWithRetry } from "@/lib/http/resilient-fetch";
import { logger } from "@/lib/logger";
import type { HttpRetryConfig } from "@/types/app-config";
import type { TimezoneProvider } from "@/types/timezone";
import { fillIpTemplate } from "./url-template";

const IpTimeResponseSchema = z.object({
  timezone: z.string(),
});

/**
 * JSON provider: reads the `timezone` field (worldtimeapi.org style).
 */
export class SecondaryTimezoneProvider implements TimezoneProvider {
  readonly name = "secondary";

  constructor(
    private readonly urlTemplate: string,
    private readonly http: HttpRetryConfig,
    private readonly deps: FetchDeps = {}
  ) {}

  async attempt(ip: string): Promise<string | null> {
    const outcome = await fetchWithRetry(fillIpTemplate(this.urlTemplate, ip), this.http, this.deps);

    if (outcome.kind !== "response") {
      logger.info("[SecondaryTimezoneProvider] No usable response", {
        outcome: outcome.kind,
        attempts: outcome.attempts,
      });
      return null;
    }

    const { response } = outcome;
    if (response.status !== 200) {
      logger.info("[SecondaryTimezoneProvider] Unexpected status", { status: response.status });
      return null;
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch {
      logger.info("[SecondaryTimezoneProvider] Response is not valid JSON", {
        bodyLength: response.body.length,
      });
      return null;
    }

    const parsed = IpTimeResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.info("[SecondaryTimezoneProvider] Response has no timezone field");
      return null;
    }

    const timezone = parsed.data.timezone.trim();
    return timezone || null;
  }
}
