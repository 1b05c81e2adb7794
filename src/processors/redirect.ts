/**
 * Root redirect page for hosts that serve `index.html` by default
 */

import fs from "node:fs/promises";
import path from "node:path";
import { pathExists } from "../utils/filesystem.js";

const FALLBACK_MAIN_PAGES = ["home.html", "main.html"];

export function redirectPage(target: string): string {
  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <meta http-equiv="refresh" content="0; url=${target}">
    <title>Redirecting to the archive</title>
</head>
<body>
    <p>Redirecting to <a href="${target}">${target}</a>...</p>
</body>
</html>
`;
}

/**
 * Write `index.html` redirecting to the main page when the main page lives elsewhere.
 * Without a known main page, falls back to a conventional one if `index.html` is missing.
 * Returns the redirect target, or null when no stub was written.
 */
export async function writeRedirectStub(
  outDir: string,
  mainFile: string | null,
): Promise<string | null> {
  const indexFile = path.join(outDir, "index.html");
  let target: string | null = null;

  if (mainFile && mainFile !== "index.html" && (await pathExists(path.join(outDir, mainFile)))) {
    target = mainFile;
  } else if (!(await pathExists(indexFile))) {
    for (const candidate of FALLBACK_MAIN_PAGES) {
      if (await pathExists(path.join(outDir, candidate))) {
        target = candidate;
        break;
      }
    }
  }
  if (!target) return null;

  await fs.writeFile(indexFile, redirectPage(encodeURI(target)), "utf8");
  return target;
}
