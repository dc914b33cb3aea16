/**
 * Timezone resolver
 *
 * cache hit -> providers in order -> null. First provider result that looks like an
 * IANA name wins and is written through to the cache. Provider errors stay here.
 */

import type { IpTimezoneMap } from "@/lib/cache/ip-timezone-cache";
import { logger } from "@/lib/logger";
import type { TimezoneProvider } from "@/types/timezone";
import { looksLikeIanaTimezone } from "./iana";

export interface TimezoneCacheStore {
  load(): Promise<IpTimezoneMap>;
  save(mapping: IpTimezoneMap): Promise<void>;
}

export class TimezoneResolver {
  constructor(
    private readonly cache: TimezoneCacheStore,
    private readonly providers: readonly TimezoneProvider[]
  ) {}

  async resolve(ip: string | null | undefined): Promise<string | null> {
    if (!ip) {
      return null;
    }

    const cached = await this.cache.load();
    const hit = Object.hasOwn(cached, ip) ? cached[ip] : undefined;
    if (hit) {
      logger.debug("[TimezoneResolver] Cache hit", { ip, timezone: hit });
      return hit;
    }

    for (const provider of this.providers) {
      const timezone = await this.tryProvider(provider, ip);
      if (!timezone) {
        continue;
      }

      cached[ip] = timezone;
      await this.cache.save(cached);
      logger.info("[TimezoneResolver] Resolved timezone", {
        ip,
        timezone,
        provider: provider.name,
      });
      return timezone;
    }

    logger.warn("[TimezoneResolver] All providers failed", {
      ip,
      providers: this.providers.map((p) => p.name),
    });
    return null;
  }

  private async tryProvider(provider: TimezoneProvider, ip: string): Promise<string | null> {
    let timezone: string | null;
    try {
      timezone = await provider.attempt(ip);
    } catch (error) {
      logger.warn("[TimezoneResolver] Provider threw, trying next", {
        provider: provider.name,
        error,
      });
      return null;
    }

    if (!timezone) {
      logger.debug("[TimezoneResolver] Provider yielded nothing", { provider: provider.name });
      return null;
    }

    // Keep garbage (HTML error pages, "Undefined", ...) out of the cache.
    if (!looksLikeIanaTimezone(timezone)) {
      logger.warn("[TimezoneResolver] Provider returned a non-IANA value, ignoring it", {
        provider: provider.name,
        value: timezone.slice(0, 80),
      });
      return null;
    }

    return timezone;
  }
}
