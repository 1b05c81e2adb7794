/**
 * Tests for page and asset discovery
 */

import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import {
  extractAssetUrls,
  extractCssUrls,
  extractPageLinks,
  parseSrcset,
} from '../src/parsers/links.js';
import { siteContext } from '../src/utils/url.js';

const site = siteContext('example.org', 'http://www.example.org/');
const pageUrl = new URL('http://www.example.org/index.php');

describe('parseSrcset', () => {
  it('returns the candidate URLs without descriptors', () => {
    expect(parseSrcset('a.png 1x, b.png 2x,c.png')).toEqual(['a.png', 'b.png', 'c.png']);
    expect(parseSrcset('  ')).toEqual([]);
  });
});

describe('extractPageLinks', () => {
  it('collects distinct site pages', () => {
    const $ = cheerio.load(
      '<a href="about.php">About</a>' +
        '<a href="//events.html">Events</a>' +
        '<a href="http://www.example.org/gallery/#top">Gallery</a>' +
        '<a href="https://other.test/page">Other</a>' +
        '<a href="flyer.pdf">Flyer</a>' +
        '<a href="mailto:info@example.org">Mail</a>' +
        '<a href="about.php#team">Team</a>',
    );

    expect(extractPageLinks($, pageUrl, site).map((u) => u.href)).toEqual([
      'http://www.example.org/about.php',
      'http://www.example.org/events.html',
      'http://www.example.org/gallery/',
    ]);
  });
});

describe('extractPageLinks beyond anchors', () => {
  it('follows image maps, frames and forms against the base URL', () => {
    const $ = cheerio.load(
      '<html><head><base href="http://www.example.org/shows/"></head><body>' +
        '<iframe src="calendar.php"></iframe>' +
        '<form action="/search.php"></form>' +
        '<map><area href="map.php"></map>' +
        '</body></html>',
    );

    expect(extractPageLinks($, pageUrl, site).map((u) => u.href)).toEqual([
      'http://www.example.org/shows/map.php',
      'http://www.example.org/shows/calendar.php',
      'http://www.example.org/search.php',
    ]);
  });
});

describe('extractAssetUrls', () => {
  it('takes background attributes and extensionless site references in CSS', () => {
    const $ = cheerio.load(
      '<table><tr><td background="images/cell.gif" style="background: url(/counter.php)">x</td></tr></table>',
    );

    expect(extractAssetUrls($, pageUrl, site).map((u) => u.href)).toEqual([
      'http://www.example.org/images/cell.gif',
      'http://www.example.org/counter.php',
    ]);
  });

  it('collects assets from attributes, srcset and CSS', () => {
    const $ = cheerio.load(
      '<html><head>' +
        '<link rel="stylesheet" href="css/style.css">' +
        '<script src="https://web.archive.org/web/20170509211847js_/http://www.example.org/js/menu.js"></script>' +
        '<style>body { background: url(images/body.gif); }</style>' +
        '</head><body>' +
        '<img src="images/logo.png" srcset="images/logo-2x.png 2x, images/logo-3x.png 3x">' +
        '<div style="background: url(\'images/bg.jpg\')"></div>' +
        '<a href="flyer.pdf">Flyer</a>' +
        '<a href="about.php">About</a>' +
        '<img src="https://web.archive.org/static/images/toolbar.png">' +
        '<img src="http://cdn.other.net/pic.png">' +
        '</body></html>',
    );

    expect(extractAssetUrls($, pageUrl, site).map((u) => u.href)).toEqual([
      'http://www.example.org/flyer.pdf',
      'http://www.example.org/css/style.css',
      'http://www.example.org/js/menu.js',
      'http://www.example.org/images/logo.png',
      'http://cdn.other.net/pic.png',
      'http://www.example.org/images/logo-2x.png',
      'http://www.example.org/images/logo-3x.png',
      'http://www.example.org/images/body.gif',
      'http://www.example.org/images/bg.jpg',
    ]);
  });
});

describe('extractCssUrls', () => {
  it('resolves references against the stylesheet', () => {
    const css =
      '@import url("print.css");\n' +
      '.a { background: url(../img/a.png) }\n' +
      '.b { background: url(data:image/png;base64,AAA) }\n' +
      '@font-face { src: url(fonts/x.woff2#iefix) }';

    const urls = extractCssUrls(css, new URL('http://www.example.org/css/style.css'), site);
    expect(urls.map((u) => u.href)).toEqual([
      'http://www.example.org/css/print.css',
      'http://www.example.org/img/a.png',
      'http://www.example.org/css/fonts/x.woff2',
    ]);
  });
});
