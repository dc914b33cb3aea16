/**
 * A single timezone-by-IP source.
 *
 * `attempt` resolves to a timezone string, or null when the source yielded nothing.
 * Implementations may throw; the resolver contains it.
 */
export interface TimezoneProvider {
  readonly name: string;
  attempt(ip: string): Promise<string | null>;
}

/**
 * Capability backed by a real browser (loads a page, reads the timezone it shows).
 */
export interface BrowserTimezoneProbe {
  readTimezone(): Promise<string>;
}
