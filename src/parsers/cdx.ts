/**
 * Page discovery through the Wayback CDX index
 */

import { z } from "zod";
import { fetchResource } from "../network/fetch.js";
import { WAYBACK_ORIGIN } from "../network/snapshot.js";

export interface Capture {
  url: string;
  timestamp: string;
}

const CdxRows = z.array(z.array(z.string()));

export function cdxQueryUrl(pattern: string, from: string, to: string): string {
  const params = new URLSearchParams({
    url: pattern,
    output: "json",
    filter: "statuscode:200",
    fl: "original,timestamp,mimetype",
    from,
    to,
  });
  return `${WAYBACK_ORIGIN}/cdx/search/cdx?${params.toString()}`;
}

function distance(a: string, b: string): number {
  return Math.abs(Number(a) - Number(b));
}

/**
 * Keep the HTML captures of a CDX answer, one per URL: the one closest to `target`
 */
export function closestCaptures(rows: string[][], target: string): Map<string, string> {
  const best = new Map<string, string>();
  // first row is the field header
  for (const row of rows.slice(1)) {
    const [original, timestamp, mimetype = ""] = row;
    if (!original || !timestamp) continue;
    if (mimetype && !mimetype.includes("text/html")) continue;
    const current = best.get(original);
    if (current === undefined || distance(timestamp, target) < distance(current, target)) {
      best.set(original, timestamp);
    }
  }
  return best;
}

async function queryCaptures(
  domain: string,
  from: string,
  to: string,
  target: string,
): Promise<Capture[]> {
  const captures: Capture[] = [];
  for (const pattern of [`www.${domain}/*`, `${domain}/*`]) {
    const res = await fetchResource(cdxQueryUrl(pattern, from, to), `CDX index for ${pattern}`);
    if (!res) continue;
    let rows: string[][];
    try {
      rows = CdxRows.parse(JSON.parse(res.body.toString("utf8")));
    } catch {
      console.warn(`Skipping CDX index for ${pattern}: unexpected response`);
      continue;
    }
    for (const [url, timestamp] of closestCaptures(rows, target)) {
      captures.push({ url, timestamp });
    }
  }
  return captures;
}

/**
 * List archived HTML pages of the site captured on the snapshot's day,
 * widening to the snapshot's year when the day has none
 */
export async function discoverFromCdx(domain: string, timestamp: string): Promise<Capture[]> {
  const day = timestamp.slice(0, 8);
  const captures = await queryCaptures(domain, day, day, timestamp);
  if (captures.length) return captures;

  console.log("No captures on the snapshot's day, searching its year...");
  const year = timestamp.slice(0, 4);
  return queryCaptures(domain, year, year, timestamp);
}
