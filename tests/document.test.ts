import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { AnyNode } from 'domhandler';
import { isTag } from 'domhandler';

import {
  decodeHtml,
  isBinaryContent,
  parseDocument,
  textContent,
  traverse,
} from '../src/document.js';
import { ParseError } from '../src/errors.js';
import { detectHtmlVersion, extractTitle } from '../src/extractors.js';

function parse(html: string): AnyNode {
  return parseDocument(Buffer.from(html), 'http://doc.test/');
}

function tagNames(
  root: AnyNode,
  decide: (name: string) => 'descend' | 'skip' | 'stop' = () => 'descend'
): string[] {
  const names: string[] = [];
  return traverse(root, names, (node, acc) => {
    if (!isTag(node)) return 'descend';
    acc.push(node.name);
    return decide(node.name);
  });
}

function findFirst(root: AnyNode, name: string): AnyNode | undefined {
  return traverse<{ found?: AnyNode }>(root, {}, (node, acc) => {
    if (!isTag(node) || node.name !== name) return 'descend';
    acc.found = node;
    return 'stop';
  }).found;
}

describe('parseDocument', () => {
  it('rejects content with a binary file signature', () => {
    const png = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]);

    assert.throws(
      () => parseDocument(png, 'http://doc.test/image'),
      (error: unknown) =>
        error instanceof ParseError &&
        error.code === 'PARSE_ERROR' &&
        error.statusCode === 422 &&
        error.url === 'http://doc.test/image'
    );
  });

  it('rejects text that contains NUL bytes', () => {
    const body = Buffer.from('<p>hi\u0000there</p>');

    assert.throws(() => parseDocument(body, 'http://doc.test/'), ParseError);
  });

  it('adds the implied html, head and body elements', () => {
    assert.deepEqual(tagNames(parse('<p>x</p>')), [
      'html',
      'head',
      'body',
      'p',
    ]);
  });
});

describe('isBinaryContent / decodeHtml', () => {
  it('treats UTF-16 text with a byte-order mark as text', () => {
    const body = Buffer.concat([
      Uint8Array.from([0xff, 0xfe]),
      Buffer.from('<p>hi</p>', 'utf16le'),
    ]);

    assert.equal(isBinaryContent(body), false);
    assert.equal(decodeHtml(body), '<p>hi</p>');
  });

  it('honours a declared meta charset', () => {
    const body = Buffer.from(
      '<meta charset="iso-8859-1"><p>café</p>',
      'latin1'
    );

    assert.equal(decodeHtml(body), '<meta charset="iso-8859-1"><p>café</p>');
  });

  it('falls back to utf-8 for an unknown charset', () => {
    const body = Buffer.from('<meta charset="no-such-charset"><p>ok</p>');

    assert.equal(
      decodeHtml(body),
      '<meta charset="no-such-charset"><p>ok</p>'
    );
  });

  it('reads a meta-declared utf-16 page without a byte-order mark as utf-8', () => {
    const html =
      '<!DOCTYPE html><html><head><meta charset="utf-16"><title>Hello</title></head></html>';
    const body = Buffer.from(html);

    assert.equal(decodeHtml(body), html);
    assert.equal(detectHtmlVersion(decodeHtml(body)), 'HTML5');
    assert.equal(extractTitle(parseDocument(body, 'http://x.test/')), 'Hello');
  });
});

describe('traverse', () => {
  const root = parse('<ul><li>a</li><li><em>b</em></li></ul><p>c</p>');

  it('visits elements in document order', () => {
    assert.deepEqual(tagNames(root), [
      'html',
      'head',
      'body',
      'ul',
      'li',
      'li',
      'em',
      'p',
    ]);
  });

  it('does not descend into skipped subtrees', () => {
    assert.deepEqual(
      tagNames(root, (name) => (name === 'ul' ? 'skip' : 'descend')),
      ['html', 'head', 'body', 'ul', 'p']
    );
  });

  it('ends the walk on stop', () => {
    assert.deepEqual(
      tagNames(root, (name) => (name === 'li' ? 'stop' : 'descend')),
      ['html', 'head', 'body', 'ul', 'li']
    );
  });
});

describe('textContent', () => {
  it('joins nested text in order', () => {
    const paragraph = findFirst(
      parse('<p>Hello <b>big</b> world</p>'),
      'p'
    );

    assert.ok(paragraph);
    assert.equal(textContent(paragraph), 'Hello big world');
  });
});
