/**
 * Filesystem utility functions
 */

import fs from "node:fs/promises";
import path from "node:path";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Convert a string to a safe filename by replacing invalid characters
 */
export function safeFilename(s: string): string {
  return s
    .replace(/[^a-zA-Z0-9._-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List every regular file below a directory, as sorted POSIX paths relative to it
 */
export async function listFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  async function walk(rel: string): Promise<void> {
    const entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
    for (const entry of entries) {
      const child = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) await walk(child);
      else if (entry.isFile()) found.push(child);
    }
  }
  await walk("");
  return found.sort();
}

/**
 * Replace `dest` with a fresh recursive copy of `src`
 */
export async function replaceTree(src: string, dest: string): Promise<void> {
  await fs.rm(dest, { recursive: true, force: true });
  await fs.cp(src, dest, { recursive: true, dereference: true });
}

/**
 * Write a file, creating its parent directories first
 */
export async function writeFileEnsured(
  file: string,
  data: string | Uint8Array,
): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, data);
}
