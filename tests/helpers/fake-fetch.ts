import { vi } from "vitest";
import type { FetchImpl } from "@/lib/http/resilient-fetch";

export type ScriptedReply = { status: number; body?: string } | { error: Error };

/**
 * fetch stand-in that replays a fixed list of replies, one per call.
 * Calls beyond the script fail loudly.
 */
export function scriptedFetch(replies: ScriptedReply[]) {
  const queue = [...replies];
  return vi.fn<FetchImpl>(async (input) => {
    const next = queue.shift();
    if (!next) {
      throw new Error(`unexpected fetch: ${input}`);
    }
    if ("error" in next) {
      throw next.error;
    }
    return new Response(next.body ?? "", { status: next.status });
  });
}

/**
 * fetch stand-in keyed by URL prefix.
 */
export function routedFetch(routes: Record<string, ScriptedReply>) {
  return vi.fn<FetchImpl>(async (input) => {
    const key = Object.keys(routes).find((prefix) => input.startsWith(prefix));
    if (!key) {
      throw new Error(`unexpected fetch: ${input}`);
    }
    const reply = routes[key];
    if ("error" in reply) {
      throw reply.error;
    }
    return new Response(reply.body ?? "", { status: reply.status });
  });
}

export function networkError(message = "fetch failed"): { error: Error } {
  return { error: new TypeError(message) };
}
