/**
 * Rewriting of a single reference to its static, relative form
 */

import {
  hrefBetween,
  isSiteUrl,
  localPathFor,
  resolveUrl,
  type SiteContext,
} from "../utils/url.js";

export interface RewriteContext {
  site: SiteContext;
  /** Absolute URLs (no fragment) of off-site assets saved into the tree */
  archivedExternal: ReadonlySet<string>;
}

/**
 * Rewrite one reference found in the document at `fromFile` (whose original URL is `base`).
 * Site links and archived off-site assets become relative paths into the tree;
 * other absolute links keep their cleaned form; non-links are left alone.
 */
export function rewriteReference(
  value: string,
  base: URL,
  fromFile: string,
  ctx: RewriteContext,
): string {
  const url = resolveUrl(value, base, ctx.site);
  if (!url || !/^https?:$/.test(url.protocol)) return value;
  const fragment = url.hash;
  url.hash = "";
  if (isSiteUrl(url, ctx.site.domain) || ctx.archivedExternal.has(url.href)) {
    return hrefBetween(fromFile, localPathFor(url, ctx.site.domain), fragment);
  }
  return url.href + fragment;
}
