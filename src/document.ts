import * as cheerio from 'cheerio';
import type { AnyNode, Document } from 'domhandler';
import { hasChildren, isText } from 'domhandler';

import { getErrorMessage, ParseError } from './errors.js';
import { logDebug } from './observability.js';

const BOM_SIGNATURES: readonly {
  bytes: readonly number[];
  encoding: string;
}[] = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: 'utf-8' },
  { bytes: [0xff, 0xfe], encoding: 'utf-16le' },
  { bytes: [0xfe, 0xff], encoding: 'utf-16be' },
];

// File formats that are sometimes served as text/html by mistake.
const BINARY_SIGNATURES: readonly (readonly number[])[] = [
  [0x25, 0x50, 0x44, 0x46], // %PDF
  [0x89, 0x50, 0x4e, 0x47],
  [0x47, 0x49, 0x46, 0x38],
  [0xff, 0xd8, 0xff],
  [0x52, 0x49, 0x46, 0x46],
  [0x50, 0x4b, 0x03, 0x04],
  [0x1f, 0x8b],
  [0x37, 0x7a, 0xbc, 0xaf],
  [0x7f, 0x45, 0x4c, 0x46],
  [0x00, 0x61, 0x73, 0x6d],
  [0x4f, 0x67, 0x67, 0x53],
];

const NUL_SCAN_LIMIT = 1000;
const CHARSET_SCAN_LIMIT = 1024;

function startsWithBytes(
  buffer: Uint8Array,
  signature: readonly number[]
): boolean {
  if (buffer.length < signature.length) return false;
  return signature.every((byte, index) => buffer[index] === byte);
}

function detectBomEncoding(buffer: Uint8Array): string | undefined {
  return BOM_SIGNATURES.find(({ bytes }) => startsWithBytes(buffer, bytes))
    ?.encoding;
}

function detectDeclaredCharset(buffer: Uint8Array): string | undefined {
  const head = Buffer.from(
    buffer.buffer,
    buffer.byteOffset,
    Math.min(buffer.byteLength, CHARSET_SCAN_LIMIT)
  ).toString('latin1');
  const match = /<meta[^>]+charset\s*=\s*["']?([\w-]+)/i.exec(head);
  const charset = match?.[1]?.toLowerCase();
  // The tag itself was readable as single-byte text, so it cannot be UTF-16.
  return charset?.startsWith('utf-16') ? 'utf-8' : charset;
}

export function isBinaryContent(buffer: Uint8Array): boolean {
  if (BINARY_SIGNATURES.some((signature) => startsWithBytes(buffer, signature)))
    return true;

  const encoding = detectBomEncoding(buffer);
  if (encoding?.startsWith('utf-16')) return false;
  return buffer
    .subarray(0, Math.min(buffer.length, NUL_SCAN_LIMIT))
    .includes(0x00);
}

/** Decodes a response body, honouring a byte-order mark or a `<meta charset>`. */
export function decodeHtml(body: Uint8Array): string {
  const encoding =
    detectBomEncoding(body) ?? detectDeclaredCharset(body) ?? 'utf-8';
  try {
    return new TextDecoder(encoding).decode(body);
  } catch (error: unknown) {
    logDebug('Unsupported charset, decoding as utf-8', {
      encoding,
      error: getErrorMessage(error),
    });
    return new TextDecoder('utf-8').decode(body);
  }
}

/**
 * Parses fetched bytes into a `domhandler` document. Content that looks like a
 * binary file is rejected before it reaches the parser.
 */
export function parseDocument(body: Uint8Array, url: string): Document {
  if (isBinaryContent(body)) {
    throw new ParseError('Fetched content is not an HTML document', url, {
      bytes: body.byteLength,
    });
  }

  let root: Document | undefined;
  try {
    root = cheerio.load(decodeHtml(body)).root().get(0);
  } catch (error: unknown) {
    throw new ParseError(
      `Failed to parse HTML: ${getErrorMessage(error)}`,
      url,
      {},
      { cause: error }
    );
  }
  if (!root) throw new ParseError('Parsed document is empty', url);
  return root;
}

/** `skip` leaves the node's subtree unvisited; `stop` ends the walk. */
export type VisitAction = 'descend' | 'skip' | 'stop';

export type Visitor<A> = (node: AnyNode, acc: A) => VisitAction | undefined;

/**
 * Depth-first, document-order walk from `root`. Results are collected in
 * `acc`, which is returned.
 */
export function traverse<A>(root: AnyNode, acc: A, visit: Visitor<A>): A {
  const stack: AnyNode[] = [root];

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    const action = visit(node, acc) ?? 'descend';
    if (action === 'stop') break;
    if (action === 'skip' || !hasChildren(node)) continue;

    for (let index = node.children.length - 1; index >= 0; index -= 1) {
      const child = node.children[index];
      if (child) stack.push(child);
    }
  }

  return acc;
}

export function textContent(node: AnyNode): string {
  const parts: string[] = [];
  traverse(node, parts, (current, acc) => {
    if (isText(current)) acc.push(current.data);
    return 'descend';
  });
  return parts.join('');
}
