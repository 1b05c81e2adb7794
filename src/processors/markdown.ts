/**
 * Markdown to HTML conversion for injected content
 */

import { marked } from "marked";

/**
 * Convert a Markdown block to HTML (GitHub-flavoured: tables, lists, links, images)
 */
export async function markdownToHtml(markdown: string): Promise<string> {
  return marked.parse(markdown, { gfm: true });
}
