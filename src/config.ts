/**
 * Loading and validation of the flat `config.yaml` mapping
 */

import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SetupError } from "./errors.js";
import { pathExists } from "./utils/filesystem.js";

export const DEFAULT_CONFIG_FILE = "config.yaml";

const ConfigSchema = z
  .object({
    archive_dir: z.string().min(1).default("archive"),
    publish_dir: z.string().min(1).default("docs"),
    new_content_dir: z.string().min(1).default("newContent"),
    media_dir: z.string().min(1).optional(),
    domain: z.string().min(1).default("ccspace.org"),
    snapshot_timestamp: z
      .string()
      .regex(/^\d{14}$/, "expected a 14-digit timestamp")
      .default("20170509211847"),
    snapshot_url: z.string().url().default("http://www.ccspace.org/"),
    request_delay_ms: z.number().int().nonnegative().default(0),
    cdx_discovery: z.boolean().default(true),
  })
  .strict();

export interface ArchiverConfig {
  archiveDir: string;
  publishDir: string;
  newContentDir: string;
  mediaDir: string;
  domain: string;
  snapshotTimestamp: string;
  snapshotUrl: string;
  requestDelayMs: number;
  cdxDiscovery: boolean;
}

/**
 * Validate a parsed mapping and resolve its paths against `baseDir`
 */
export function resolveConfig(raw: unknown, baseDir: string): ArchiverConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SetupError(`Invalid configuration: ${issues}`);
  }
  const cfg = result.data;
  const newContentDir = path.resolve(baseDir, cfg.new_content_dir);
  return {
    archiveDir: path.resolve(baseDir, cfg.archive_dir),
    publishDir: path.resolve(baseDir, cfg.publish_dir),
    newContentDir,
    mediaDir: cfg.media_dir ? path.resolve(baseDir, cfg.media_dir) : newContentDir,
    domain: cfg.domain.toLowerCase(),
    snapshotTimestamp: cfg.snapshot_timestamp,
    snapshotUrl: cfg.snapshot_url,
    requestDelayMs: cfg.request_delay_ms,
    cdxDiscovery: cfg.cdx_discovery,
  };
}

/**
 * Read the config file. A missing file yields the defaults.
 */
export async function loadConfig(
  file: string = DEFAULT_CONFIG_FILE,
): Promise<ArchiverConfig> {
  const configPath = path.resolve(file);
  const baseDir = path.dirname(configPath);
  if (!(await pathExists(configPath))) return resolveConfig({}, baseDir);

  let raw: unknown;
  try {
    raw = parseYaml(await fs.readFile(configPath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SetupError(`Could not parse ${configPath}: ${message}`, configPath);
  }
  return resolveConfig(raw, baseDir);
}
