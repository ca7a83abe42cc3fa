import type { AnyNode } from 'domhandler';
import { isTag } from 'domhandler';

import { textContent, traverse } from './document.js';

export const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const;

export type HeadingTag = (typeof HEADING_TAGS)[number];
export type HeadingCounts = Record<HeadingTag, number>;

export interface LinkInfo {
  readonly url: string;
  readonly internal: boolean;
}

export interface LinkCounts {
  readonly internal: number;
  readonly external: number;
}

export function emptyHeadingCounts(): HeadingCounts {
  return { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 };
}

function isHeadingTag(name: string): name is HeadingTag {
  return HEADING_TAGS.some((tag) => tag === name);
}

/* -------------------------------------------------------------------------------------------------
 * Markup version
 * ------------------------------------------------------------------------------------------------- */

// A doctype only counts before any content: whitespace, comments and an XML
// declaration may precede it.
const DOCTYPE_PATTERN =
  /^(?:[\s\uFEFF]|<!--[\s\S]*?-->|<\?[^>]*>)*<!doctype\s+([^>]*)>/i;

// Checked in order against the lower-cased doctype.
const VERSION_RULES: readonly { pattern: RegExp; version: string }[] = [
  { pattern: /xhtml 1\.1/, version: 'XHTML 1.1' },
  { pattern: /xhtml 1\.0 strict/, version: 'XHTML 1.0 Strict' },
  { pattern: /xhtml 1\.0 transitional/, version: 'XHTML 1.0 Transitional' },
  { pattern: /xhtml 1\.0 frameset/, version: 'XHTML 1.0 Frameset' },
  { pattern: /html 4\.01 transitional/, version: 'HTML 4.01 Transitional' },
  { pattern: /html 4\.01 frameset/, version: 'HTML 4.01 Frameset' },
  { pattern: /html 4\.01/, version: 'HTML 4.01 Strict' },
  {
    pattern: /^<!doctype html(?: system "about:legacy-compat")?>$|html 5/,
    version: 'HTML5',
  },
];

/**
 * Names the markup version declared by the doctype that opens `source`.
 * Unrecognised doctypes are returned as written; no doctype yields `''`.
 */
export function detectHtmlVersion(source: string): string {
  const match = DOCTYPE_PATTERN.exec(source);
  if (!match) return '';

  const doctype = `<!DOCTYPE ${(match[1] ?? '').trim()}>`;
  const normalized = doctype.toLowerCase().replace(/\s+/g, ' ');
  const rule = VERSION_RULES.find(({ pattern }) => pattern.test(normalized));
  return rule?.version ?? doctype;
}

/* -------------------------------------------------------------------------------------------------
 * Title, headings, login form
 * ------------------------------------------------------------------------------------------------- */

/** Text of the first `<title>` element, trimmed. */
export function extractTitle(root: AnyNode): string {
  const found = traverse(root, { title: '' }, (node, acc) => {
    if (!isTag(node) || node.name !== 'title') return 'descend';
    acc.title = textContent(node).trim();
    return 'stop';
  });
  return found.title;
}

export function countHeadings(root: AnyNode): HeadingCounts {
  return traverse(root, emptyHeadingCounts(), (node, counts) => {
    if (isTag(node) && isHeadingTag(node.name)) counts[node.name] += 1;
    return 'descend';
  });
}

function isPasswordInput(node: AnyNode): boolean {
  return (
    isTag(node) &&
    node.name === 'input' &&
    node.attribs['type']?.trim().toLowerCase() === 'password'
  );
}

/** True when some `<form>` contains a password input. */
export function hasLoginForm(root: AnyNode): boolean {
  const found = traverse(root, { login: false }, (node, acc) => {
    if (!isTag(node) || node.name !== 'form') return 'descend';

    const inForm = traverse(node, { password: false }, (child, state) => {
      if (!isPasswordInput(child)) return 'descend';
      state.password = true;
      return 'stop';
    });
    if (!inForm.password) return 'skip';

    acc.login = true;
    return 'stop';
  });
  return found.login;
}

/* -------------------------------------------------------------------------------------------------
 * Links
 * ------------------------------------------------------------------------------------------------- */

const DEFAULT_PORTS: Readonly<Record<string, string>> = {
  'http:': '80',
  'https:': '443',
};

/** Hostname plus port, unless the port is the scheme's default. */
export function canonicalHost(url: URL): string {
  const { hostname, port, protocol } = url;
  if (!port || DEFAULT_PORTS[protocol] === port) return hostname;
  return `${hostname}:${port}`;
}

function isWebUrl(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:';
}

function resolveHref(href: string, baseUrl: URL): URL | undefined {
  if (!URL.canParse(href, baseUrl.href)) return undefined;
  const url = new URL(href, baseUrl);
  return isWebUrl(url) ? url : undefined;
}

/**
 * Every `<a href>` resolved against `baseUrl`, in document order. Anchors whose
 * target is empty, unparseable or not http(s) are left out; duplicates are kept.
 */
export function collectLinks(root: AnyNode, baseUrl: URL): LinkInfo[] {
  const baseHost = canonicalHost(baseUrl);
  const links: LinkInfo[] = [];

  return traverse(root, links, (node, acc) => {
    if (!isTag(node) || node.name !== 'a') return 'descend';

    const href = node.attribs['href']?.trim();
    const url = href ? resolveHref(href, baseUrl) : undefined;
    if (url) {
      acc.push({ url: url.href, internal: canonicalHost(url) === baseHost });
    }
    return 'descend';
  });
}

export function classifyLinks(links: readonly LinkInfo[]): LinkCounts {
  const internal = links.filter((link) => link.internal).length;
  return { internal, external: links.length - internal };
}
