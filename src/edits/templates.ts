/**
 * Static markup assets the editor injects into pages
 */

import fs from "node:fs/promises";

export interface EditorTemplates {
  responsiveCss: string;
  hamburgerScript: string;
}

const TEMPLATES_DIR = new URL("../../templates/", import.meta.url);

export async function loadTemplates(): Promise<EditorTemplates> {
  const [responsiveCss, hamburgerScript] = await Promise.all([
    fs.readFile(new URL("responsive.css", TEMPLATES_DIR), "utf8"),
    fs.readFile(new URL("hamburger.js", TEMPLATES_DIR), "utf8"),
  ]);
  return { responsiveCss, hamburgerScript };
}
