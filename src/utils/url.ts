/**
 * URL manipulation utilities
 */

import { createHash } from 'node:crypto';
import path from 'node:path';
import { safeFilename } from './filesystem.js';

/**
 * The archived site, as seen from a rewriting pass
 */
export interface SiteContext {
  /** Registrable domain; subdomains count as the site */
  domain: string;
  /** Scheme of the original site, e.g. `http:` */
  scheme: string;
}

export function siteContext(domain: string, snapshotUrl: string): SiteContext {
  return { domain: domain.toLowerCase(), scheme: new URL(snapshotUrl).protocol };
}

/** Archive-wrapped URL anywhere in a text */
export const WAYBACK_PATTERN =
  /(?:https?:)?\/\/web\.archive\.org\/web\/(\d+)(?:[a-z]*_)?\/(https?:\/\/[^\s"'<>]+|[^\s"'<>]+)/g;

const WAYBACK_PREFIX = new RegExp(`^${WAYBACK_PATTERN.source}`);

const NON_LINK_PREFIXES = ['data:', 'javascript:', 'mailto:', 'tel:', '#', 'about:'];

function withScheme(original: string): string {
  return /^https?:/i.test(original) ? original : `https://${original}`;
}

/**
 * Replace every archive-wrapped URL in a text with the original URL
 */
export function unwrapArchiveUrls(text: string): string {
  return text.replace(WAYBACK_PATTERN, (_match, _ts: string, original: string) =>
    withScheme(original),
  );
}

/**
 * Extract the original URL from a possibly archive-wrapped or protocol-relative URL.
 * Returns null for values that are not links to a resource.
 */
export function cleanUrl(raw: string, scheme = 'https:'): string | null {
  const value = raw.trim();
  if (!value || NON_LINK_PREFIXES.some((prefix) => value.toLowerCase().startsWith(prefix))) {
    return null;
  }
  const wrapped = WAYBACK_PREFIX.exec(value);
  if (wrapped) return withScheme(wrapped[2]);
  if (value.startsWith('//')) return `${scheme}${value}`;
  return value;
}

/**
 * The archive turns some page-relative links into bogus hosts
 * (`//about.html`, `https://booking.html`, `//events`). Returns the page-relative
 * remainder for those, null for genuine absolute URLs.
 */
export function repairLocalReference(value: string): string | null {
  const match = /^(?:https?:)?\/\/([^/?#]*)(.*)$/i.exec(value);
  if (!match) return null;
  const [, host, rest] = match;
  if (/\.html$/i.test(host)) return host + rest;
  if (value.startsWith('//') && host && !host.includes('.')) return host + rest;
  return null;
}

export function isSiteUrl(target: URL | string, domain: string): boolean {
  let host: string;
  try {
    host = (typeof target === 'string' ? new URL(target) : target).hostname.toLowerCase();
  } catch {
    return false;
  }
  const d = domain.toLowerCase();
  return host === d || host.endsWith(`.${d}`);
}

function safeDecode(s: string): string {
  try {
    return decodeURIComponent(s);
  } catch {
    return s;
  }
}

/**
 * Map a URL to its file inside the output tree, as a POSIX path relative to the root.
 * Dynamic `.php` pages become static `.html` files; other hosts go under `_external/`.
 */
export function localPathFor(target: URL, domain: string): string {
  let p = safeDecode(target.pathname).replace(/^\/+|\/+$/g, '');
  const last = p.split('/').pop() ?? '';
  if (!p) p = 'index.html';
  else if (!last.includes('.')) p = `${p}/index.html`;

  const query = target.search.slice(1);
  if (query) {
    const action = target.searchParams.get('action');
    if (action && p.endsWith('.php')) {
      const dir = path.posix.dirname(p);
      const name = `${action.replace(/[^\w-]/g, '_')}.html`;
      p = dir === '.' ? name : `${dir}/${name}`;
    } else {
      const digest = createHash('md5').update(query).digest('hex').slice(0, 8);
      const ext = path.posix.extname(p);
      p = `${p.slice(0, p.length - ext.length)}_${digest}${ext}`;
    }
  }
  if (p.endsWith('.php')) p = `${p.slice(0, -4)}.html`;

  if (isSiteUrl(target, domain)) return p;
  return `_external/${safeFilename(target.host)}/${p}`;
}

export function extensionOf(target: URL): string {
  return path.posix.extname(target.pathname).toLowerCase();
}

/**
 * Create a relative path from one output file to another
 */
export function makeRelative(fromFile: string, toFile: string): string {
  const rel = path.posix.relative(path.posix.dirname(fromFile), toFile);
  return rel.replace(/\\/g, '/');
}

/**
 * Relative link from one output file to another, percent-encoded for an attribute
 */
export function hrefBetween(fromFile: string, toFile: string, fragment = ''): string {
  return encodeURI(makeRelative(fromFile, toFile)) + fragment;
}

/**
 * Resolve a reference found in a document to an absolute URL, undoing archive
 * wrapping and mangling on the way. Null for non-links and unparseable values.
 */
export function resolveUrl(raw: string, base: URL, site: SiteContext): URL | null {
  const clean = cleanUrl(raw, site.scheme);
  if (clean === null) return null;
  const target = repairLocalReference(raw.trim()) ?? repairLocalReference(clean) ?? clean;
  try {
    return new URL(target, base);
  } catch {
    return null;
  }
}
