#!/usr/bin/env node
/**
 * snapshot-archiver
 *
 * Turns one Wayback Machine snapshot of a closed venue's website into a static,
 * self-contained site, in three stages run one after another:
 * - archive: crawl the snapshot, strip the archive's own markup, rewrite every
 *   link to a relative local path and save `.php` pages as `.html`
 * - edit: copy the archive to the publish folder, drop donation and dining
 *   links, switch the wording to the past tense, add a responsive layout and
 *   move the final show to the past events page
 * - inject: splice Markdown content files into the published pages and copy
 *   their media to `images/`
 *
 * Usage:
 *   npm run archive | npm run edit | npm run inject
 *   snapshot-archiver <stage> [--config config.yaml] [--delayMs 250] [--no-cdx]
 */

import { runCLI } from './cli.js';
import { SetupError } from './errors.js';

runCLI().catch((err: unknown) => {
  if (err instanceof SetupError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
