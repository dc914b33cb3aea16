/**
 * IANA timezone helpers
 *
 * Two levels of checking:
 * - `looksLikeIanaTimezone`: loose `Region/City` shape, applied to provider output before caching
 * - `isKnownTimezone`: lookup against the runtime's bundled tz database (Intl)
 */

const IANA_SHAPE = /^[A-Za-z_]+(?:\/[A-Za-z0-9_+-]+)+$/;

/**
 * @example
 * looksLikeIanaTimezone("Asia/Kolkata") // true
 * looksLikeIanaTimezone("America/Argentina/Buenos_Aires") // true
 * looksLikeIanaTimezone("UTC") // false (no region/city split)
 * looksLikeIanaTimezone("<html>") // false
 */
export function looksLikeIanaTimezone(timezone: string): boolean {
  if (!timezone || typeof timezone !== "string") {
    return false;
  }
  return IANA_SHAPE.test(timezone);
}

/**
 * Validates a timezone against the local timezone database.
 *
 * Intl.DateTimeFormat throws a RangeError for identifiers it does not know.
 */
export function isKnownTimezone(timezone: string): boolean {
  if (!timezone || typeof timezone !== "string") {
    return false;
  }

  try {
    Intl.DateTimeFormat(undefined, { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
