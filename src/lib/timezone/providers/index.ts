import type { FetchDeps } from "@/lib/http/resilient-fetch";
import type { AppConfig } from "@/types/app-config";
import type { BrowserTimezoneProbe, TimezoneProvider } from "@/types/timezone";
import { BrowserFallbackProvider } from "./browser-fallback-provider";
import { PrimaryTimezoneProvider } from "./primary-provider";
import { SecondaryTimezoneProvider } from "./secondary-provider";

export { BrowserFallbackProvider } from "./browser-fallback-provider";
export { PrimaryTimezoneProvider } from "./primary-provider";
export { SecondaryTimezoneProvider } from "./secondary-provider";
export { fillIpTemplate } from "./url-template";

/**
 * Providers in priority order. The browser provider is only appended when enabled.
 */
export function createTimezoneProviders(
  config: Pick<AppConfig, "primaryTzUrl" | "secondaryTzUrl" | "http" | "browserFallback">,
  deps: { fetch?: FetchDeps; browserProbe?: BrowserTimezoneProbe } = {}
): TimezoneProvider[] {
  const providers: TimezoneProvider[] = [
    new PrimaryTimezoneProvider(config.primaryTzUrl, config.http, deps.fetch),
    new SecondaryTimezoneProvider(config.secondaryTzUrl, config.http, deps.fetch),
  ];

  if (config.browserFallback.enabled && deps.browserProbe) {
    providers.push(new BrowserFallbackProvider(deps.browserProbe));
  }

  return providers;
}
