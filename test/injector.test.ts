/**
 * Tests for the content injector stage
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as cheerio from 'cheerio';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SetupError } from '../src/errors.js';
import { copyMedia, injectContent } from '../src/injector.js';
import { listFiles, writeFileEnsured } from '../src/utils/filesystem.js';

const EVENTS_PAGE =
  '<html><head><title>Events</title></head><body>' +
  '<div id="newContent"></div>' +
  '<div class="sidebar">old</div><div class="sidebar">second</div>' +
  '</body></html>';

describe('injectContent', () => {
  let tmp: string;
  let publishDir: string;
  let newContentDir: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'injector-test-'));
    publishDir = path.join(tmp, 'docs');
    newContentDir = path.join(tmp, 'newContent');
    await writeFileEnsured(path.join(publishDir, 'events.html'), EVENTS_PAGE);
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  const write = (file: string, content: string) =>
    writeFileEnsured(path.join(newContentDir, file), content);

  it('fails when the publish folder is missing', async () => {
    await expect(
      injectContent({ publishDir: path.join(tmp, 'missing'), newContentDir, mediaDir: newContentDir }),
    ).rejects.toBeInstanceOf(SetupError);
  });

  it('does nothing without a content folder', async () => {
    const report = await injectContent({ publishDir, newContentDir, mediaDir: newContentDir });
    expect(report).toEqual({ mediaCopied: 0, contentFiles: 0, blocksInjected: 0, pagesUpdated: 0, skips: [] });
    expect(await fs.readFile(path.join(publishDir, 'events.html'), 'utf8')).toBe(EVENTS_PAGE);
  });

  it('splices blocks, copies media and reports skips', async () => {
    await write(
      'shows.md',
      '---\ntarget_html: events.html\n---\n' +
        '<!-- block: element: #newContent -->\n# Hello\n' +
        '<!-- block: element: .sidebar -->\nSide *note*\n' +
        '<!-- block: element: #absent -->\nLost\n',
    );
    await write('broken.md', '# No front matter\n<!-- block: element: #newContent -->\nx\n');
    await write('orphan.md', '---\ntarget_html: missing.html\n---\n<!-- block: element: #x -->\nx\n');
    await write('bad-selector.md', '---\ntarget_html: events.html\n---\n<!-- block: element: div:bogus -->\nx\n');
    await write('poster.png', 'PNG');
    await write('flyers/nov.jpg', 'JPG');

    const report = await injectContent({ publishDir, newContentDir, mediaDir: newContentDir });

    expect(report.mediaCopied).toBe(2);
    expect(report.contentFiles).toBe(4);
    expect(report.blocksInjected).toBe(2);
    expect(report.pagesUpdated).toBe(1);
    expect(report.skips).toHaveLength(4);
    expect(report.skips[0]).toMatchObject({ file: 'bad-selector.md', selector: 'div:bogus' });
    expect(report.skips[0]?.reason).toMatch(/^Invalid selector/);
    expect(report.skips.slice(1)).toEqual([
      { file: 'broken.md', reason: 'No YAML front matter' },
      { file: 'orphan.md', reason: 'Target page missing.html not found' },
      { file: 'shows.md', selector: '#absent', reason: 'No element matches' },
    ]);

    const $ = cheerio.load(await fs.readFile(path.join(publishDir, 'events.html'), 'utf8'));
    expect($('#newContent').html()).toBe('<h1>Hello</h1>\n');
    expect($('.sidebar').first().html()).toBe('<p>Side <em>note</em></p>\n');
    expect($('.sidebar').last().html()).toBe('second');

    expect(await listFiles(path.join(publishDir, 'images'))).toEqual(['flyers/nov.jpg', 'poster.png']);
    expect(await fs.readFile(path.join(publishDir, 'images/poster.png'), 'utf8')).toBe('PNG');
  });

  it('replaces earlier injections on a re-run', async () => {
    await write('shows.md', '---\ntarget_html: events.html\n---\n<!-- block: element: #newContent -->\nFirst\n');
    await injectContent({ publishDir, newContentDir, mediaDir: newContentDir });
    await write('shows.md', '---\ntarget_html: events.html\n---\n<!-- block: element: #newContent -->\nSecond\n');
    await injectContent({ publishDir, newContentDir, mediaDir: newContentDir });

    const $ = cheerio.load(await fs.readFile(path.join(publishDir, 'events.html'), 'utf8'));
    expect($('#newContent').html()).toBe('<p>Second</p>\n');
  });

  it('never writes a target page outside the publish folder', async () => {
    const outside = path.join(tmp, 'outside.html');
    await fs.writeFile(outside, '<div id="newContent"></div>');
    await write('escape.md', '---\ntarget_html: ../outside.html\n---\n<!-- block: element: #newContent -->\n# Hi\n');

    const report = await injectContent({ publishDir, newContentDir, mediaDir: newContentDir });

    expect(report.pagesUpdated).toBe(0);
    expect(report.skips).toEqual([
      { file: 'escape.md', reason: 'Target page ../outside.html is outside the publish folder' },
    ]);
    expect(await fs.readFile(outside, 'utf8')).toBe('<div id="newContent"></div>');
  });
});

describe('copyMedia', () => {
  it('copies from a separate media folder and overwrites', async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'media-test-'));
    try {
      const mediaDir = path.join(tmp, 'media');
      const publishDir = path.join(tmp, 'docs');
      await writeFileEnsured(path.join(mediaDir, 'logo.gif'), 'new');
      await writeFileEnsured(path.join(mediaDir, 'notes.md'), 'skip me');
      await writeFileEnsured(path.join(publishDir, 'images/logo.gif'), 'old');

      expect(await copyMedia(mediaDir, publishDir)).toBe(1);
      expect(await fs.readFile(path.join(publishDir, 'images/logo.gif'), 'utf8')).toBe('new');
      expect(await listFiles(path.join(publishDir, 'images'))).toEqual(['logo.gif']);
    } finally {
      await fs.rm(tmp, { recursive: true, force: true });
    }
  });
});
