/**
 * Network fetch utilities. Requests go out one at a time with an optional
 * politeness delay; nothing is retried.
 */

import { setTimeout as delay } from "node:timers/promises";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const BASE_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

let requestDelayMs = 0;
let requestHeaders: Record<string, string> = { ...BASE_REQUEST_HEADERS };

/**
 * Configure request settings
 */
export function configureRequests(options: {
  delayMs?: number;
  userAgent?: string;
}): void {
  if (options.delayMs !== undefined && options.delayMs >= 0) {
    requestDelayMs = options.delayMs;
  }
  if (options.userAgent) {
    requestHeaders = { ...requestHeaders, "User-Agent": options.userAgent };
  }
}

/**
 * Fetch once without retry, returns response even if not ok
 */
export async function fetchOnce(url: string): Promise<Response> {
  if (requestDelayMs > 0) {
    await delay(requestDelayMs);
  }
  return fetch(url, {
    redirect: "follow",
    headers: { ...requestHeaders },
  });
}

export interface FetchedResource {
  url: string;
  status: number;
  contentType: string;
  body: Buffer;
}

/**
 * Fetch a resource and buffer its body.
 * Returns null (after logging) for HTTP errors and network failures.
 */
export async function fetchResource(
  url: string,
  label = url,
): Promise<FetchedResource | null> {
  try {
    const res = await fetchOnce(url);
    if (!res.ok) {
      console.warn(`Skipping ${label}: HTTP ${res.status}`);
      return null;
    }
    return {
      url,
      status: res.status,
      contentType: res.headers.get("content-type") ?? "",
      body: Buffer.from(await res.arrayBuffer()),
    };
  } catch (err) {
    const message = err instanceof Error && err.message ? err.message : String(err);
    console.warn(`Skipping ${label}: ${message}`);
    return null;
  }
}
