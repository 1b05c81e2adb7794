/**
 * Fetcher stage: crawl one archived snapshot into a static mirror
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import * as cheerio from 'cheerio';
import { charsetOf, fetchSnapshot, isMarkup } from './network/snapshot.js';
import { discoverFromCdx } from './parsers/cdx.js';
import { extractAssetUrls, extractCssUrls, extractPageLinks, isAssetUrl } from './parsers/links.js';
import { cleanScript, stripArchiveMarkup } from './processors/artifacts.js';
import { rewriteHtml } from './processors/html.js';
import { writeRedirectStub } from './processors/redirect.js';
import type { RewriteContext } from './processors/references.js';
import { rewriteCss } from './processors/stylesheet.js';
import { ensureDir, writeFileEnsured } from './utils/filesystem.js';
import { extensionOf, isSiteUrl, localPathFor, siteContext } from './utils/url.js';

export interface CrawlOptions {
  outDir: string;
  domain: string;
  snapshotTimestamp: string;
  snapshotUrl: string;
  cdxDiscovery: boolean;
}

export interface CrawlResult {
  pages: number;
  assets: number;
  failures: number;
  /** Distinct `.php` URLs saved as `.html` files */
  phpMappings: number;
  /** Target of the synthesized `index.html`, if one was written */
  redirect: string | null;
}

interface CrawlItem {
  url: URL;
  timestamp: string;
}

interface HeldPage {
  url: URL;
  file: string;
  html: string;
}

interface SavedAsset {
  url: URL;
  file: string;
  body: Buffer;
}

/**
 * FIFO queue that hands out each output path once, however many URLs map to it
 */
export class Worklist {
  private readonly queue: CrawlItem[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly domain: string) {}

  add(item: CrawlItem): boolean {
    const key = localPathFor(item.url, this.domain);
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    this.queue.push(item);
    return true;
  }

  next(): CrawlItem | undefined {
    return this.queue.shift();
  }

  has(url: URL): boolean {
    return this.seen.has(localPathFor(url, this.domain));
  }
}

/**
 * Main crawl function.
 * Fetches every reachable page and asset of the snapshot one request at a time,
 * then writes the cleaned, relative-linked tree to `outDir`.
 */
export async function crawl(options: CrawlOptions): Promise<CrawlResult> {
  const site = siteContext(options.domain, options.snapshotUrl);
  const mainUrl = new URL(options.snapshotUrl);
  const mainFile = localPathFor(mainUrl, site.domain);

  await fs.rm(options.outDir, { recursive: true, force: true });
  await ensureDir(options.outDir);

  const pages = new Worklist(site.domain);
  const assets = new Worklist(site.domain);
  pages.add({ url: mainUrl, timestamp: options.snapshotTimestamp });

  if (options.cdxDiscovery) {
    const captures = await discoverFromCdx(site.domain, options.snapshotTimestamp);
    console.log(`CDX index lists ${captures.length} page(s)`);
    for (const capture of captures) {
      if (!URL.canParse(capture.url)) {
        console.warn(`Skipping CDX entry ${capture.url}: not a URL`);
        continue;
      }
      pages.add({ url: new URL(capture.url), timestamp: capture.timestamp });
    }
  }

  const held: HeldPage[] = [];
  const saved: SavedAsset[] = [];
  const phpPages = new Set<string>();
  let failures = 0;

  for (let item = pages.next(); item; item = pages.next()) {
    const res = await fetchSnapshot(item.timestamp, item.url.href);
    if (!res) {
      failures++;
      continue;
    }
    const file = localPathFor(item.url, site.domain);
    if (item.url.pathname.endsWith('.php')) phpPages.add(file);

    const markup = isMarkup(res) || (!res.contentType && !isAssetUrl(item.url));
    if (!markup) {
      saved.push({ url: item.url, file, body: res.body });
      continue;
    }

    // BOM, then the response charset, then <meta charset>; UTF-8 when none says
    const decoded = cheerio.loadBuffer(res.body, {
      encoding: { transportLayerEncodingLabel: charsetOf(res), defaultEncoding: 'utf-8' },
    });
    const html = stripArchiveMarkup(decoded.html());
    held.push({ url: item.url, file, html });

    const $ = cheerio.load(html);
    for (const link of extractPageLinks($, item.url, site)) {
      pages.add({ url: link, timestamp: options.snapshotTimestamp });
    }
    for (const asset of extractAssetUrls($, item.url, site)) {
      if (!pages.has(asset)) assets.add({ url: asset, timestamp: options.snapshotTimestamp });
    }
    console.log(`Fetched: ${item.url.href}`);
  }

  console.log(`\nDownloading assets...`);
  const archivedExternal = new Set<string>();
  for (let item = assets.next(); item; item = assets.next()) {
    const res = await fetchSnapshot(item.timestamp, item.url.href);
    if (!res) {
      failures++;
      continue;
    }
    const file = localPathFor(item.url, site.domain);
    saved.push({ url: item.url, file, body: res.body });
    if (!isSiteUrl(item.url, site.domain)) archivedExternal.add(item.url.href);

    if (extensionOf(item.url) === '.css') {
      for (const ref of extractCssUrls(res.body.toString('latin1'), item.url, site)) {
        assets.add({ url: ref, timestamp: options.snapshotTimestamp });
      }
    }
  }

  const ctx: RewriteContext = { site, archivedExternal };

  // Stylesheets and scripts pass through latin1 so their bytes survive in any charset
  for (const asset of saved) {
    const ext = extensionOf(asset.url);
    let body = asset.body;
    if (ext === '.css') {
      const css = rewriteCss(asset.body.toString('latin1'), asset.url, asset.file, ctx);
      body = Buffer.from(css, 'latin1');
    } else if (ext === '.js') {
      body = Buffer.from(cleanScript(asset.body.toString('latin1')), 'latin1');
    }
    await writeFileEnsured(path.join(options.outDir, asset.file), body);
    console.log(`Saved: ${asset.url.href} -> ${asset.file}`);
  }

  for (const page of held) {
    const rewritten = rewriteHtml(page.html, page.url, page.file, ctx);
    await writeFileEnsured(path.join(options.outDir, page.file), rewritten);
    console.log(`Saved: ${page.url.href} -> ${page.file}`);
  }

  const redirect = await writeRedirectStub(options.outDir, mainFile);
  if (redirect) console.log(`Created index.html -> ${redirect}`);

  return {
    pages: held.length,
    assets: saved.length,
    failures,
    phpMappings: phpPages.size,
    redirect,
  };
}
