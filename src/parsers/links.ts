/**
 * Link extraction utilities
 */

import type { CheerioAPI } from "cheerio";
import { CSS_URL_PATTERN } from "../processors/stylesheet.js";
import { extensionOf, isSiteUrl, resolveUrl, type SiteContext } from "../utils/url.js";

/** Extensions fetched as verbatim assets rather than crawled as pages */
export const ASSET_EXTENSIONS = new Set([
  ".css", ".js", ".png", ".jpg", ".jpeg", ".gif", ".svg", ".ico",
  ".woff", ".woff2", ".ttf", ".eot", ".otf", ".webp", ".mp4", ".webm",
  ".pdf", ".json", ".xml", ".map",
]);

/** Element/attribute pairs that carry a single URL */
export const URL_ATTRIBUTES: ReadonlyArray<readonly [string, string]> = [
  ["a", "href"], ["area", "href"], ["link", "href"], ["script", "src"], ["img", "src"],
  ["input", "src"], ["source", "src"], ["video", "src"], ["video", "poster"], ["audio", "src"],
  ["iframe", "src"], ["frame", "src"], ["object", "data"], ["embed", "src"], ["form", "action"],
  ["*", "background"],
];

export function isAssetUrl(url: URL): boolean {
  return ASSET_EXTENSIONS.has(extensionOf(url));
}

/**
 * Split a srcset attribute into its candidate URLs
 */
export function parseSrcset(srcset: string): string[] {
  return srcset
    .split(",")
    .map((part) => part.trim().split(/\s+/)[0] ?? "")
    .filter(Boolean);
}

/**
 * Every `url()` reference inside a block of CSS
 */
export function cssReferences(css: string): string[] {
  return Array.from(css.matchAll(CSS_URL_PATTERN), (m) => m[1].trim());
}

/**
 * URL that relative references in the page resolve against: `<base href>` when present
 */
export function documentBase($: CheerioAPI, pageUrl: URL, site: SiteContext): URL {
  const href = $("base[href]").first().attr("href");
  return (href && resolveUrl(href, pageUrl, site)) || pageUrl;
}

function attributeValues($: CheerioAPI): string[] {
  const raw: string[] = [];
  for (const [tag, attr] of URL_ATTRIBUTES) {
    $(`${tag}[${attr}]`).each((_, el) => {
      raw.push($(el).attr(attr) ?? "");
    });
  }
  return raw;
}

/** References embedded in srcset candidates and CSS `url()` values */
function embeddedValues($: CheerioAPI): string[] {
  const raw: string[] = [];
  $("[srcset]").each((_, el) => {
    raw.push(...parseSrcset($(el).attr("srcset") ?? ""));
  });
  $("style").each((_, el) => {
    raw.push(...cssReferences($(el).html() ?? ""));
  });
  $("[style]").each((_, el) => {
    raw.push(...cssReferences($(el).attr("style") ?? ""));
  });
  return raw;
}

/**
 * Distinct fetchable URLs, without fragments, in order of first appearance
 */
function resolveAll(values: string[], base: URL, site: SiteContext): URL[] {
  const urls = new Map<string, URL>();
  for (const value of values) {
    const url = resolveUrl(value, base, site);
    if (!url || !/^https?:$/.test(url.protocol)) continue;
    if (url.hostname.endsWith("archive.org")) continue;
    url.hash = "";
    if (!urls.has(url.href)) urls.set(url.href, url);
  }
  return Array.from(urls.values());
}

/**
 * Site pages referenced from any link-bearing attribute (links, frames, forms,
 * image maps), for crawling. Site URLs with an asset extension are left to
 * {@link extractAssetUrls}.
 */
export function extractPageLinks($: CheerioAPI, pageUrl: URL, site: SiteContext): URL[] {
  const base = documentBase($, pageUrl, site);
  return resolveAll(attributeValues($), base, site).filter(
    (url) => isSiteUrl(url, site.domain) && !isAssetUrl(url),
  );
}

/**
 * Asset URLs referenced anywhere in a page: link-bearing attributes, srcset
 * candidates and CSS `url()` values in style blocks and attributes. Embedded
 * references to the site count as assets whatever their extension.
 */
export function extractAssetUrls($: CheerioAPI, pageUrl: URL, site: SiteContext): URL[] {
  const base = documentBase($, pageUrl, site);
  const urls = new Map<string, URL>();
  for (const url of resolveAll(attributeValues($), base, site).filter(isAssetUrl)) {
    urls.set(url.href, url);
  }
  for (const url of resolveAll(embeddedValues($), base, site)) {
    if (!urls.has(url.href) && isEmbeddedAsset(url, site)) urls.set(url.href, url);
  }
  return Array.from(urls.values());
}

/**
 * Assets referenced by a stylesheet (fonts, background images, imports)
 */
export function extractCssUrls(css: string, cssUrl: URL, site: SiteContext): URL[] {
  return resolveAll(cssReferences(css), cssUrl, site).filter((url) => isEmbeddedAsset(url, site));
}

function isEmbeddedAsset(url: URL, site: SiteContext): boolean {
  return isAssetUrl(url) || isSiteUrl(url, site.domain);
}
