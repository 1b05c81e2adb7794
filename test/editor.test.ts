/**
 * Tests for the editor stage over a small archived tree
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as cheerio from 'cheerio';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { editSite } from '../src/editor.js';
import { SetupError } from '../src/errors.js';
import { listFiles, writeFileEnsured } from '../src/utils/filesystem.js';

const SOURCE: Record<string, string> = {
  'index.html':
    '<html><head><title>Home</title></head><body>' +
    '<div id="header"><h1>CCAS</h1></div>' +
    '<ul id="menu"><li><a href="index.html">Home</a></li><li><a href="eats.html">Eats</a></li></ul>' +
    '<div class="blurb">Artists come from all over to showcase their work in our fine city.<br>\n</div>' +
    '<p>Charm City Art Space is a venue.</p>' +
    '<a href="https://www.paypal.com/donate">Give</a>' +
    '</body></html>',
  'events.html':
    '<html><head><title>Events</title></head><body>' +
    '<div class="blurb">CCAS is dedicated to promoting independent arts of all mediums in Baltimore City.  ' +
    'Click the link below to find out about  our  gallery schedule.</div>' +
    '<div class="text"><p><b>Wednesday, November 11th</b><br>LAST SHOW AT 1731 MARYAND AVE<br>Jumbled</p></div>' +
    '</body></html>',
  'past.html':
    '<html><head><title>Past</title></head><body><div class="text">' +
    '<p>7. <b>May 2nd</b><br>Band</p><p>NOTICE: DUE TO UNFORSEEN CIRCUMSTANCES</p>' +
    '</div></body></html>',
  'css/style.css': 'body { color: black; }\n',
};

async function readTree(root: string): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  for (const file of await listFiles(root)) {
    tree[file] = await fs.readFile(path.join(root, file), 'utf8');
  }
  return tree;
}

describe('editSite', () => {
  let tmp: string;
  let sourceDir: string;
  let publishDir: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'editor-test-'));
    sourceDir = path.join(tmp, 'archive');
    publishDir = path.join(tmp, 'docs');
    for (const [file, content] of Object.entries(SOURCE)) {
      await writeFileEnsured(path.join(sourceDir, file), content);
    }
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it('fails when the source folder is missing', async () => {
    await expect(
      editSite({ sourceDir: path.join(tmp, 'missing'), publishDir }),
    ).rejects.toBeInstanceOf(SetupError);
  });

  it('edits the published copy and reports what it did', async () => {
    await writeFileEnsured(path.join(publishDir, 'stale.html'), 'old');

    const report = await editSite({ sourceDir, publishDir });

    expect(report.pagesScanned).toBe(3);
    expect(report.filesModified).toBe(3);
    expect(report.event).toEqual({ status: 'moved', number: 8 });
    expect(report.injectionPoints).toBe(2);
    expect(report.totals['Eats link']).toBe(1);
    expect(report.totals['PayPal/donate link']).toBe(1);
    expect(report.totals['Viewport meta']).toBe(3);

    expect(await listFiles(publishDir)).toEqual(['css/style.css', 'events.html', 'index.html', 'past.html']);
    expect(await fs.readFile(path.join(publishDir, 'css/style.css'), 'utf8')).toBe(SOURCE['css/style.css']);

    const index = cheerio.load(await fs.readFile(path.join(publishDir, 'index.html'), 'utf8'));
    expect(index('#menu li')).toHaveLength(1);
    expect(index('body > p').first().text()).toBe('Charm City Art Space was a venue.');
    expect(index('a[href*="paypal"]')).toHaveLength(0);
    expect(index('.blurb').next().attr('id')).toBe('newContent');
    expect(index('#header #hamburger-btn')).toHaveLength(1);
    expect(index('#mobile-banner')).toHaveLength(1);

    const events = cheerio.load(await fs.readFile(path.join(publishDir, 'events.html'), 'utf8'));
    expect(events('#newContent')).toHaveLength(1);
    expect(events('.text').text()).not.toContain('LAST SHOW AT 1731 MARYAND AVE');

    const past = cheerio.load(await fs.readFile(path.join(publishDir, 'past.html'), 'utf8'));
    expect(past('.text p').eq(1).text()).toBe('8. Wednesday, November 11thLAST SHOW AT 1731 MARYAND AVEJumbled');
  });

  it('leaves the source tree untouched', async () => {
    await editSite({ sourceDir, publishDir });
    expect(await readTree(sourceDir)).toEqual(SOURCE);
  });

  it('produces the same bytes when run again', async () => {
    await editSite({ sourceDir, publishDir });
    const first = await readTree(publishDir);
    await editSite({ sourceDir, publishDir });
    expect(await readTree(publishDir)).toEqual(first);
  });
});
