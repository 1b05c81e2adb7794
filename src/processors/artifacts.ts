/**
 * Removal of markup the archive injects into captured pages
 */

import type { CheerioAPI } from "cheerio";
import { isComment } from "domhandler";
import { unwrapArchiveUrls } from "../utils/url.js";

const TOOLBAR_BLOCK =
  /<!--\s*BEGIN WAYBACK TOOLBAR INSERT\s*-->.*?<!--\s*END WAYBACK TOOLBAR INSERT\s*-->/gis;
const ARCHIVE_SCRIPT_SRC =
  /<script[^>]*src=["'][^"']*(?:archive\.org|wombat)[^"']*["'][^>]*>.*?<\/script>/gis;
const ARCHIVE_INLINE_SCRIPT =
  /<script[^>]*>(?:(?!<\/script>).)*(?:__wm\.|wombat|archive\.org|WB_wombat)(?:(?!<\/script>).)*<\/script>/gis;
const ARCHIVE_STYLESHEET = /<link[^>]*href=["'][^"']*archive\.org[^"']*["'][^>]*>/gi;
const ARCHIVE_STYLE_BLOCK =
  /<style[^>]*>(?:(?!<\/style>).)*archive\.org(?:(?!<\/style>).)*<\/style>/gis;

const ARCHIVE_SCRIPT_CONTENT = /archive\.org|__wm|wombat/i;

/**
 * Text pass over a raw capture: drops the toolbar, archive scripts and styles,
 * and unwraps archive URLs back to the originals
 */
export function stripArchiveMarkup(html: string): string {
  return unwrapArchiveUrls(
    html
      .replace(TOOLBAR_BLOCK, "")
      .replace(ARCHIVE_SCRIPT_SRC, "")
      .replace(ARCHIVE_INLINE_SCRIPT, "")
      .replace(ARCHIVE_STYLESHEET, "")
      .replace(ARCHIVE_STYLE_BLOCK, ""),
  );
}

function hasClassPrefix(value: string | undefined, prefixes: RegExp): boolean {
  return (value ?? "").split(/\s+/).some((cls) => prefixes.test(cls));
}

/**
 * DOM pass: removes archive banners, scripts, stylesheet links and every comment.
 * Returns the number of nodes removed.
 */
export function removeArchiveElements($: CheerioAPI): number {
  let removed = 0;

  const injected = $("[id], [class]").filter((_, el) => {
    const $el = $(el);
    return (
      /^(?:wm-|playback|donato)/i.test($el.attr("id") ?? "") ||
      hasClassPrefix($el.attr("class"), /^(?:wm-|wb-)/i)
    );
  });
  removed += injected.length;
  injected.remove();

  const scripts = $("script").filter((_, el) => {
    const $el = $(el);
    return (
      ARCHIVE_SCRIPT_CONTENT.test($el.attr("src") ?? "") ||
      ARCHIVE_SCRIPT_CONTENT.test($el.html() ?? "")
    );
  });
  removed += scripts.length;
  scripts.remove();

  const links = $("link[href]").filter((_, el) => ($(el).attr("href") ?? "").includes("archive.org"));
  removed += links.length;
  links.remove();

  const comments = $.root()
    .find("*")
    .addBack()
    .contents()
    .filter((_, node) => isComment(node));
  removed += comments.length;
  comments.remove();

  return removed;
}

/**
 * Unwrap archive URLs left inside a JavaScript asset
 */
export function cleanScript(js: string): string {
  return unwrapArchiveUrls(js);
}
