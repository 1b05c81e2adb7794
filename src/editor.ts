/**
 * Editor stage: copy the archived tree to the publish tree and apply the site edits
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { applyEdits } from './edits/apply.js';
import { type EventMigration, type MigrationOutcome, migrateFinalEvent } from './edits/events.js';
import { buildSiteEdits, FINAL_EVENT } from './edits/site-edits.js';
import { type EditorTemplates, loadTemplates } from './edits/templates.js';
import type { PageEdit } from './edits/types.js';
import { SetupError } from './errors.js';
import { isDirectory, listFiles, replaceTree } from './utils/filesystem.js';

export interface EditOptions {
  sourceDir: string;
  publishDir: string;
  /** Defaults to the site's own edit list */
  edits?: readonly PageEdit[];
  /** Defaults to the site's final show */
  migration?: EventMigration;
  templates?: EditorTemplates;
}

export interface EditReport {
  pagesScanned: number;
  filesModified: number;
  /** Match count per edit label, summed over pages */
  totals: Record<string, number>;
  event: MigrationOutcome;
  injectionPoints: number;
}

interface OpenPage {
  $: CheerioAPI;
  changed: boolean;
}

const INJECTION_LABEL = 'Injection point';

function describeOutcome(outcome: MigrationOutcome): string {
  switch (outcome.status) {
    case 'moved':
      return `moved to past events as #${outcome.number}`;
    case 'already-past':
      return 'already on past events, removed from current';
    case 'not-found':
      return 'not found on the events page';
    case 'no-anchor':
      return 'no insertion point on the past events page';
  }
}

function migrate(
  publishDir: string,
  pages: Map<string, OpenPage>,
  migration: EventMigration,
): MigrationOutcome {
  const current = pages.get(migration.currentPage);
  const past = pages.get(migration.pastPage);
  if (!current || !past) {
    console.warn(
      `Event migration skipped: ${path.join(publishDir, current ? migration.pastPage : migration.currentPage)} not found`,
    );
    return { status: 'not-found' };
  }
  const outcome = migrateFinalEvent(current.$, past.$, migration);
  if (outcome.status === 'moved') {
    current.changed = true;
    past.changed = true;
  } else if (outcome.status === 'already-past') {
    current.changed = true;
  }
  return outcome;
}

/**
 * Run the editor.
 * The publish tree is rebuilt from the source tree on every run, so re-running
 * gives the same bytes.
 */
export async function editSite(options: EditOptions): Promise<EditReport> {
  if (!(await isDirectory(options.sourceDir))) {
    throw new SetupError(
      `Source folder ${options.sourceDir} does not exist. Run the archive stage first.`,
      options.sourceDir,
    );
  }

  console.log(`Copying ${options.sourceDir} -> ${options.publishDir}`);
  await replaceTree(options.sourceDir, options.publishDir);

  const edits = options.edits ?? buildSiteEdits(options.templates ?? (await loadTemplates()));
  const htmlFiles = (await listFiles(options.publishDir)).filter((file) => /\.html?$/i.test(file));

  const pages = new Map<string, OpenPage>();
  const totals: Record<string, number> = {};
  for (const file of htmlFiles) {
    const $ = cheerio.load(await fs.readFile(path.join(options.publishDir, file), 'utf8'));
    let changed = false;
    for (const { label, count } of applyEdits($, edits, file)) {
      totals[label] = (totals[label] ?? 0) + count;
      if (count > 0) changed = true;
    }
    pages.set(file, { $, changed });
  }

  const event = migrate(options.publishDir, pages, options.migration ?? FINAL_EVENT);
  console.log(`Last show: ${describeOutcome(event)}`);

  let filesModified = 0;
  for (const [file, page] of pages) {
    if (!page.changed) continue;
    await fs.writeFile(path.join(options.publishDir, file), page.$.html(), 'utf8');
    filesModified++;
  }

  return {
    pagesScanned: htmlFiles.length,
    filesModified,
    totals,
    event,
    injectionPoints: totals[INJECTION_LABEL] ?? 0,
  };
}
