import {
  type FetchImpl,
  fetchTextWithTimeout,
  safeUrlForLog,
  toErrorInfo,
} from "@/lib/http/resilient-fetch";
import { logger } from "@/lib/logger";

/**
 * Ask the address-echo service for our public IP.
 * Single attempt, no retries.
 */
export async function discoverPublicIp(
  options: { ipEchoUrl: string; timeoutMs: number },
  deps: { fetchImpl?: FetchImpl } = {}
): Promise<string | null> {
  try {
    const response = await fetchTextWithTimeout(
      options.ipEchoUrl,
      options.timeoutMs,
      deps.fetchImpl
    );
    if (!response.ok) {
      logger.warn("[PublicIp] Echo service returned an error status", {
        url: safeUrlForLog(options.ipEchoUrl),
        status: response.status,
      });
      return null;
    }

    const ip = response.body.trim();
    if (!ip) {
      logger.warn("[PublicIp] Echo service returned an empty body", {
        url: safeUrlForLog(options.ipEchoUrl),
      });
      return null;
    }
    return ip;
  } catch (error) {
    const { type, message } = toErrorInfo(error);
    logger.warn("[PublicIp] Failed to get public IP", {
      url: safeUrlForLog(options.ipEchoUrl),
      type,
      errorMessage: message,
    });
    return null;
  }
}
