/**
 * CLI argument parsing and stage dispatch
 */

import minimist from "minimist";
import { DEFAULT_CONFIG_FILE, loadConfig, type ArchiverConfig } from "./config.js";
import { crawl } from "./crawler.js";
import { editSite } from "./editor.js";
import { injectContent } from "./injector.js";
import { configureRequests } from "./network/fetch.js";

export const STAGES = ["archive", "edit", "inject"] as const;
export type Stage = (typeof STAGES)[number];

const USAGE =
  "Usage: snapshot-archiver <archive|edit|inject> [--config config.yaml] [--delayMs 250] [--userAgent <string>] [--no-cdx]";

function isStage(value: unknown): value is Stage {
  return STAGES.some((stage) => stage === value);
}

async function runArchive(config: ArchiverConfig): Promise<void> {
  console.log(`Archiving ${config.snapshotUrl} @ ${config.snapshotTimestamp} -> ${config.archiveDir}\n`);
  const result = await crawl({
    outDir: config.archiveDir,
    domain: config.domain,
    snapshotTimestamp: config.snapshotTimestamp,
    snapshotUrl: config.snapshotUrl,
    cdxDiscovery: config.cdxDiscovery,
  });
  console.log(`\nDone. Pages: ${result.pages}, assets: ${result.assets}, failed: ${result.failures}`);
  console.log(`.php pages saved as .html: ${result.phpMappings}`);
}

async function runEdit(config: ArchiverConfig): Promise<void> {
  const report = await editSite({ sourceDir: config.archiveDir, publishDir: config.publishDir });
  console.log(`\nSummary:`);
  console.log(`  Pages scanned: ${report.pagesScanned}`);
  console.log(`  Files modified: ${report.filesModified}`);
  for (const [label, count] of Object.entries(report.totals)) {
    console.log(`  ${label}: ${count}`);
  }
  console.log(`  Last show moved: ${report.event.status === "moved" ? "yes" : "no"}`);
  console.log(`  newContent divs added: ${report.injectionPoints}`);
}

async function runInject(config: ArchiverConfig): Promise<void> {
  const report = await injectContent({
    publishDir: config.publishDir,
    newContentDir: config.newContentDir,
    mediaDir: config.mediaDir,
  });
  console.log(`\nMedia copied: ${report.mediaCopied}`);
  console.log(`Blocks injected: ${report.blocksInjected} into ${report.pagesUpdated} page(s)`);
  if (report.skips.length > 0) {
    console.log(`Skipped (${report.skips.length}):`);
    for (const skip of report.skips) {
      const where = skip.selector ? ` '${skip.selector}'` : "";
      console.log(`  ${skip.file}${where}: ${skip.reason}`);
    }
  }
}

/**
 * Parse CLI arguments and run the requested stage
 */
export async function runCLI(args: string[] = process.argv.slice(2)): Promise<void> {
  const argv = minimist(args, {
    string: ["config", "userAgent"],
    default: { config: DEFAULT_CONFIG_FILE },
  });

  const [stage] = argv._;
  if (!isStage(stage)) {
    console.error(USAGE);
    process.exit(1);
  }

  const config = await loadConfig(String(argv.config));

  // Command-line flags override the config file
  const delayMs = argv.delayMs === undefined ? config.requestDelayMs : Number(argv.delayMs);
  configureRequests({
    delayMs: Number.isFinite(delayMs) && delayMs >= 0 ? delayMs : config.requestDelayMs,
    userAgent: typeof argv.userAgent === "string" ? argv.userAgent : undefined,
  });
  if (argv.cdx === false) config.cdxDiscovery = false;

  switch (stage) {
    case "archive":
      return runArchive(config);
    case "edit":
      return runEdit(config);
    case "inject":
      return runInject(config);
  }
}
