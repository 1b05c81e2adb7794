/**
 * CSS stylesheet processing utilities
 */

import { unwrapArchiveUrls } from '../utils/url.js';
import { type RewriteContext, rewriteReference } from './references.js';

/** A `url(...)` value, quoted or not */
export const CSS_URL_PATTERN = /url\(\s*["']?([^)"']+)["']?\s*\)/g;

/**
 * Rewrite the `url()` values of a block of CSS relative to `fromFile`
 * (the stylesheet itself, or the page for inline styles)
 */
export function rewriteCssUrls(
  css: string,
  base: URL,
  fromFile: string,
  ctx: RewriteContext,
): string {
  return css.replace(CSS_URL_PATTERN, (match, p1: string) => {
    const raw = p1.trim();
    if (!raw || raw.startsWith('data:')) return match; // leave data URIs
    const rewritten = rewriteReference(raw, base, fromFile, ctx);
    return rewritten === raw ? match : `url("${rewritten}")`;
  });
}

/**
 * Clean an archived stylesheet: unwrap archive URLs, then point every `url()`
 * at the local copy relative to the stylesheet's own location
 */
export function rewriteCss(
  css: string,
  cssUrl: URL,
  cssFile: string,
  ctx: RewriteContext,
): string {
  return rewriteCssUrls(unwrapArchiveUrls(css), cssUrl, cssFile, ctx);
}
