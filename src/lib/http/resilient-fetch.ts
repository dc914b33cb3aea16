/**
 * GET with bounded retries and exponential backoff.
 *
 * Retry policy:
 * - 200: returned at once
 * - 429: back off, double, retry
 * - any other status: returned at once (caller inspects it)
 * - transport failure / timeout: back off, double, retry
 *
 * Never throws. Exhaustion is a typed outcome for both causes: `rate_limited` when the
 * last attempt got a 429, `network_error` when it failed in transport.
 */

import { logger } from "@/lib/logger";
import type { HttpRetryConfig } from "@/types/app-config";

export interface FetchedResponse {
  status: number;
  ok: boolean;
  body: string;
}

export type FetchErrorType = "timeout" | "invalid_url" | "network_error" | "unknown_error";

export interface FetchErrorInfo {
  type: FetchErrorType;
  message: string;
}

export type FetchOutcome =
  | { kind: "response"; response: FetchedResponse; attempts: number }
  | { kind: "rate_limited"; attempts: number }
  | { kind: "network_error"; error: FetchErrorInfo; attempts: number };

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchDeps {
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
}

const HTTP_TOO_MANY_REQUESTS = 429;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function safeUrlForLog(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    return url.origin;
  } catch {
    return "<invalid-url>";
  }
}

export function toErrorInfo(error: unknown): FetchErrorInfo {
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return { type: "timeout", message: error.message || "timeout" };
    }
    if (error instanceof TypeError && error.message.toLowerCase().includes("url")) {
      return { type: "invalid_url", message: "invalid_url" };
    }
    return { type: "network_error", message: error.message };
  }
  return { type: "unknown_error", message: String(error) };
}

/**
 * One GET with a timeout covering both headers and body.
 */
export async function fetchTextWithTimeout(
  url: string,
  timeoutMs: number,
  fetchImpl: FetchImpl = fetch
): Promise<FetchedResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: { accept: "application/json, text/plain;q=0.9, */*;q=0.8" },
      signal: controller.signal,
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } finally {
    clearTimeout(timeout);
  }
}

export function nextBackoff(currentMs: number, maxMs: number): number {
  return Math.min(currentMs * 2, maxMs);
}

export async function fetchWithRetry(
  url: string,
  options: HttpRetryConfig,
  deps: FetchDeps = {}
): Promise<FetchOutcome> {
  const fetchImpl = deps.fetchImpl ?? fetch;
  const wait = deps.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(options.maxRetries));
  const logUrl = safeUrlForLog(url);

  let backoffMs = Math.min(options.backoffBaseMs, options.backoffMaxMs);
  let lastError: FetchErrorInfo | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const isLastAttempt = attempt === maxAttempts;

    try {
      const response = await fetchTextWithTimeout(url, options.timeoutMs, fetchImpl);

      if (response.status !== HTTP_TOO_MANY_REQUESTS) {
        logger.debug("[ResilientFetch] Response received", {
          url: logUrl,
          status: response.status,
          attempt,
        });
        return { kind: "response", response, attempts: attempt };
      }

      lastError = null;
      logger.debug("[ResilientFetch] Rate limited (429)", {
        url: logUrl,
        attempt,
        backoffMs: isLastAttempt ? null : backoffMs,
      });
    } catch (error) {
      lastError = toErrorInfo(error);
      logger.debug("[ResilientFetch] Request failed", {
        url: logUrl,
        attempt,
        type: lastError.type,
        errorMessage: lastError.message,
        backoffMs: isLastAttempt ? null : backoffMs,
      });
    }

    if (!isLastAttempt) {
      await wait(backoffMs);
      backoffMs = nextBackoff(backoffMs, options.backoffMaxMs);
    }
  }

  if (lastError) {
    logger.warn("[ResilientFetch] Retries exhausted by transport errors", {
      url: logUrl,
      attempts: maxAttempts,
      type: lastError.type,
    });
    return { kind: "network_error", error: lastError, attempts: maxAttempts };
  }

  logger.warn("[ResilientFetch] Retries exhausted by rate limiting", {
    url: logUrl,
    attempts: maxAttempts,
  });
  return { kind: "rate_limited", attempts: maxAttempts };
}
