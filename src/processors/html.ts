/**
 * HTML rewriting and processing utilities
 */

import * as cheerio from "cheerio";
import { documentBase, URL_ATTRIBUTES } from "../parsers/links.js";
import { removeArchiveElements } from "./artifacts.js";
import { type RewriteContext, rewriteReference } from "./references.js";
import { rewriteCssUrls } from "./stylesheet.js";

/**
 * Rewrite a srcset attribute, keeping each candidate's descriptor
 */
function rewriteSrcset(
  srcset: string,
  pageUrl: URL,
  pageFile: string,
  ctx: RewriteContext,
): string {
  return srcset
    .split(",")
    .map((part) => part.trim().split(/\s+/))
    .filter((parts) => parts[0])
    .map(([url, ...descriptors]) =>
      [rewriteReference(url, pageUrl, pageFile, ctx), ...descriptors].join(" "),
    )
    .join(", ");
}

/**
 * Pages are written as UTF-8 whatever the capture declared
 */
function declareUtf8($: cheerio.CheerioAPI): void {
  $("meta[charset]").attr("charset", "utf-8");
  $("meta[http-equiv]")
    .filter((_, el) => ($(el).attr("http-equiv") ?? "").toLowerCase() === "content-type")
    .attr("content", "text/html; charset=utf-8");
}

/**
 * Clean a captured page and rewrite every reference so it works offline:
 * archive elements and comments go, site links and archived assets become
 * relative paths from `pageFile`, `.php` and `?action=` links become `.html`.
 * A `<base>` element is dropped once references are resolved against it.
 */
export function rewriteHtml(
  html: string,
  pageUrl: URL,
  pageFile: string,
  ctx: RewriteContext,
): string {
  const $ = cheerio.load(html);
  removeArchiveElements($);
  const base = documentBase($, pageUrl, ctx.site);
  $("base").remove();
  declareUtf8($);

  for (const [tag, attr] of URL_ATTRIBUTES) {
    $(`${tag}[${attr}]`).each((_, el) => {
      const $el = $(el);
      const value = $el.attr(attr) ?? "";
      const rewritten = rewriteReference(value, base, pageFile, ctx);
      if (rewritten !== value) $el.attr(attr, rewritten);
    });
  }

  $("[srcset]").each((_, el) => {
    const $el = $(el);
    $el.attr("srcset", rewriteSrcset($el.attr("srcset") ?? "", base, pageFile, ctx));
  });

  $("[style]").each((_, el) => {
    const $el = $(el);
    const style = $el.attr("style") ?? "";
    const rewritten = rewriteCssUrls(style, base, pageFile, ctx);
    if (rewritten !== style) $el.attr("style", rewritten);
  });

  $("style").each((_, el) => {
    const $el = $(el);
    const css = $el.html() ?? "";
    const rewritten = rewriteCssUrls(css, base, pageFile, ctx);
    if (rewritten !== css) $el.text(rewritten);
  });

  return $.html();
}
