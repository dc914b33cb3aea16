import type { BrowserTimezoneProbe, TimezoneProvider } from "@/types/timezone";

/**
 * Last resort: ask a real browser. The page does not take the IP, so `ip` is unused.
 */
export class BrowserFallbackProvider implements TimezoneProvider {
  readonly name = "browser";

  constructor(private readonly probe: BrowserTimezoneProbe) {}

  async attempt(_ip: string): Promise<string | null> {
    const timezone = (await this.probe.readTimezone()).trim();
    return timezone || null;
  }
}
