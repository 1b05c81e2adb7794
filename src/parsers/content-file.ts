/**
 * Parsing of authored content files: YAML front matter naming the target page,
 * followed by Markdown blocks each aimed at one element of that page
 */

import matter from "gray-matter";
import { z } from "zod";
import { ContentFileError } from "../errors.js";

export interface ContentBlock {
  /** CSS selector of the element whose contents the block replaces */
  selector: string;
  markdown: string;
}

export interface ContentFile {
  file: string;
  /** Page path relative to the publish tree */
  targetHtml: string;
  blocks: ContentBlock[];
}

const FrontMatterSchema = z
  .object({ target_html: z.string().trim().min(1) })
  .passthrough();

export const BLOCK_MARKER = /<!--\s*block:\s*element:\s*([^\s]+)\s*-->/g;

/**
 * Split the body after the front matter into blocks.
 * Text before the first marker belongs to no block.
 */
export function splitBlocks(body: string): ContentBlock[] {
  const markers = [...body.matchAll(BLOCK_MARKER)];
  return markers.map((marker, i) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const next = markers[i + 1];
    const end = next ? (next.index ?? body.length) : body.length;
    return { selector: marker[1], markdown: body.slice(start, end).trim() };
  });
}

export function parseContentFile(file: string, source: string): ContentFile {
  if (!matter.test(source)) {
    throw new ContentFileError(file, "No YAML front matter");
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ContentFileError(file, `Unreadable front matter (${message})`);
  }

  const front = FrontMatterSchema.safeParse(parsed.data);
  if (!front.success) {
    throw new ContentFileError(file, "No 'target_html' in front matter");
  }

  const blocks = splitBlocks(parsed.content);
  if (blocks.length === 0) {
    throw new ContentFileError(file, "No content blocks");
  }

  return { file, targetHtml: front.data.target_html, blocks };
}
