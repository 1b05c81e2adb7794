/**
 * Content injector stage: splice authored Markdown into the published pages
 * and copy the media that goes with it
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { type Element, isTag } from 'domhandler';
import { ContentFileError, SetupError } from './errors.js';
import { type ContentBlock, type ContentFile, parseContentFile } from './parsers/content-file.js';
import { markdownToHtml } from './processors/markdown.js';
import { isDirectory, listFiles, pathExists, writeFileEnsured } from './utils/filesystem.js';

export interface InjectOptions {
  publishDir: string;
  newContentDir: string;
  /** Folder whose non-Markdown files are published under `images/` */
  mediaDir: string;
}

export interface InjectionSkip {
  file: string;
  selector?: string;
  reason: string;
}

export interface InjectReport {
  mediaCopied: number;
  contentFiles: number;
  blocksInjected: number;
  pagesUpdated: number;
  skips: InjectionSkip[];
}

export const MEDIA_SUBDIR = 'images';

/**
 * Copy every non-Markdown file under `mediaDir` to `<publishDir>/images/`,
 * keeping its relative path and overwriting what is there
 */
export async function copyMedia(mediaDir: string, publishDir: string): Promise<number> {
  if (!(await isDirectory(mediaDir))) {
    console.warn(`Warning: ${mediaDir} does not exist. Skipping media copy.`);
    return 0;
  }
  const media = (await listFiles(mediaDir)).filter((file) => !file.toLowerCase().endsWith('.md'));
  for (const file of media) {
    const dest = path.join(publishDir, MEDIA_SUBDIR, file);
    await writeFileEnsured(dest, await fs.readFile(path.join(mediaDir, file)));
    console.log(`Copied: ${file} -> ${path.posix.join(MEDIA_SUBDIR, file)}`);
  }
  return media.length;
}

function isInside(root: string, file: string): boolean {
  const rel = path.relative(path.resolve(root), file);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

/**
 * First element matched by `selector`, or the reason there is none
 */
function selectFirst(
  $: CheerioAPI,
  selector: string,
): { found: true; node: Cheerio<Element> } | { found: false; reason: string } {
  let first: Element | undefined;
  try {
    first = $(selector).toArray().find(isTag);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { found: false, reason: `Invalid selector (${message})` };
  }
  if (!first) return { found: false, reason: 'No element matches' };
  return { found: true, node: $(first) };
}

async function injectBlocks(
  $: CheerioAPI,
  file: string,
  blocks: readonly ContentBlock[],
  skips: InjectionSkip[],
): Promise<number> {
  let injected = 0;
  for (const block of blocks) {
    const target = selectFirst($, block.selector);
    if (!target.found) {
      skips.push({ file, selector: block.selector, reason: target.reason });
      console.warn(`  Warning: ${target.reason} for '${block.selector}'`);
      continue;
    }
    target.node.html(await markdownToHtml(block.markdown));
    console.log(`  Replaced content in '${block.selector}'`);
    injected++;
  }
  return injected;
}

/**
 * Run the injector. Every content file is attempted; problems with one file or
 * block are reported and the rest proceed.
 */
export async function injectContent(options: InjectOptions): Promise<InjectReport> {
  if (!(await isDirectory(options.publishDir))) {
    throw new SetupError(
      `Publish folder ${options.publishDir} does not exist. Run the edit stage first.`,
      options.publishDir,
    );
  }

  const report: InjectReport = {
    mediaCopied: await copyMedia(options.mediaDir, options.publishDir),
    contentFiles: 0,
    blocksInjected: 0,
    pagesUpdated: 0,
    skips: [],
  };

  if (!(await isDirectory(options.newContentDir))) {
    console.warn(`Warning: ${options.newContentDir} does not exist. Skipping content files.`);
    return report;
  }

  const contentFiles = (await listFiles(options.newContentDir)).filter((file) =>
    file.toLowerCase().endsWith('.md'),
  );
  console.log(`Found ${contentFiles.length} content file(s)`);

  for (const file of contentFiles) {
    console.log(`\nProcessing: ${file}`);
    report.contentFiles++;

    let content: ContentFile;
    try {
      const source = await fs.readFile(path.join(options.newContentDir, file), 'utf8');
      content = parseContentFile(file, source);
    } catch (err) {
      if (!(err instanceof ContentFileError)) throw err;
      report.skips.push({ file, reason: err.reason });
      console.warn(`  Skipping: ${err.message}`);
      continue;
    }

    const page = path.resolve(options.publishDir, content.targetHtml);
    if (!isInside(options.publishDir, page)) {
      const reason = `Target page ${content.targetHtml} is outside the publish folder`;
      report.skips.push({ file, reason });
      console.warn(`  Skipping: ${reason}`);
      continue;
    }
    if (!(await pathExists(page))) {
      report.skips.push({ file, reason: `Target page ${content.targetHtml} not found` });
      console.warn(`  Skipping: target page ${content.targetHtml} not found`);
      continue;
    }

    const $ = cheerio.load(await fs.readFile(page, 'utf8'));
    const injected = await injectBlocks($, file, content.blocks, report.skips);
    report.blocksInjected += injected;
    if (injected > 0) {
      await fs.writeFile(page, $.html(), 'utf8');
      report.pagesUpdated++;
      console.log(`  Updated: ${content.targetHtml}`);
    }
  }

  return report;
}
