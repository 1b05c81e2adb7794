/**
 * Access to archived captures on the Wayback Machine
 */

import { fetchResource, type FetchedResource } from "./fetch.js";

export const WAYBACK_ORIGIN = "https://web.archive.org";

/**
 * URL of a capture served raw: the `id_` modifier asks the archive for the
 * original bytes without its toolbar or rewritten links.
 */
export function rawSnapshotUrl(timestamp: string, originalUrl: string): string {
  return `${WAYBACK_ORIGIN}/web/${timestamp}id_/${originalUrl}`;
}

/**
 * Download the capture of `originalUrl` nearest to `timestamp`
 */
export async function fetchSnapshot(
  timestamp: string,
  originalUrl: string,
): Promise<FetchedResource | null> {
  return fetchResource(rawSnapshotUrl(timestamp, originalUrl), originalUrl);
}

export function isMarkup(resource: FetchedResource): boolean {
  return /text\/html|application\/xhtml\+xml/i.test(resource.contentType);
}

/** Charset named by the response's `Content-Type`, if any */
export function charsetOf(resource: FetchedResource): string | undefined {
  return /charset=["']?([\w.:-]+)/i.exec(resource.contentType)?.[1];
}
