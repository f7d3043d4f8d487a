// Tests for the element record and its delegating methods

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { attr, indexBy } from '../src/attributes.ts';
import { Document } from '../src/document.ts';
import { AttributeNotSetError } from '../src/errors.ts';
import { em, px } from '../src/units.ts';

test('document root is a viewer element with handle 1', () => {
  const doc = new Document();
  assert.equal(doc.root.handle, 1);
  assert.equal(doc.root.type, 'viewer');
  assert.equal(doc.root.isRoot, true);
  assert.equal(doc.root.parent, null);
  assert.equal(doc.elementCount, 1);
});

test('toString uses the id when present', () => {
  const doc = new Document();
  const div = doc.createElement('div');
  assert.equal(div.toString(), 'div@2');
  div.setAttribute(indexBy('main'));
  assert.equal(div.id, 'main');
  assert.equal(div.toString(), 'div#main');
});

test('sibling links and child iteration', () => {
  const doc = new Document();
  const [a, b, c] = ['a', 'b', 'c'].map(id => doc.createElement('span', [indexBy(id)]));
  doc.root.appendChildren([a, b, c]);

  assert.deepEqual([...doc.root.children()], [a, b, c]);
  assert.deepEqual([...doc.root.childrenReversed()], [c, b, a]);
  assert.equal(doc.root.firstChild, a);
  assert.equal(doc.root.lastChild, c);
  assert.equal(a.nextSibling, b);
  assert.equal(b.previousSibling, a);
  assert.equal(c.nextSibling, null);
  assert.equal(a.previousSibling, null);
  assert.equal(b.parent, doc.root);
  assert.equal(b.isRoot, false);
  assert.equal(doc.root.childCount, 3);
});

test('children can be removed while iterating', () => {
  const doc = new Document();
  doc.root.appendChildren([doc.createElement('p'), doc.createElement('p'), doc.createElement('p')]);

  for (const child of doc.root.children()) {
    child.remove();
  }

  assert.equal(doc.root.childCount, 0);
  assert.equal(doc.root.firstChild, null);
  assert.equal(doc.elementCount, 1);
});

test('getAttribute throws when unset; findAttribute returns undefined', () => {
  const doc = new Document();
  const div = doc.createElement('div');
  assert.equal(div.findAttribute('textColor'), undefined);
  assert.throws(() => div.getAttribute('textColor'), AttributeNotSetError);
  assert.throws(
    () => div.getAttribute('zIndex'),
    { message: 'Attribute "zIndex" is not set on div@2' }
  );

  div.setAttribute(attr('zIndex', 4));
  assert.equal(div.getAttribute('zIndex'), 4);
  assert.equal(div.removeAttribute('zIndex'), true);
  assert.equal(div.hasAttribute('zIndex'), false);
});

test('move and resize keep existing units', () => {
  const doc = new Document();
  const div = doc.createElement('div');

  div.move(5, 6);
  assert.deepEqual(div.findAttribute('objectTop'), px(5));
  assert.deepEqual(div.findAttribute('objectLeft'), px(6));

  div.setAttribute(attr('objectTop', em(2)));
  div.move(3, 4);
  assert.deepEqual(div.findAttribute('objectTop'), em(3));
  assert.deepEqual(div.findAttribute('objectLeft'), px(4));

  assert.equal(div.size, undefined);
  div.resize(10, 20);
  assert.deepEqual(div.size, [px(10), px(20)]);
});

test('printf formats and appends text', () => {
  const doc = new Document();
  const p = doc.createElement('paragraph');
  p.printf('%s=%d', 'x', 5).write(' done');
  assert.deepEqual(p.content.text, ['x=5', ' done']);
});

test('write parses markup when ingestStream is set', () => {
  const doc = new Document();
  const div = doc.root.appendChild(doc.createElement('div'));
  div.ingestStream = true;
  div.write('<span>hi</span>');

  const span = div.firstChild;
  assert.equal(span?.type, 'span');
  assert.deepEqual(span?.content.text, ['hi']);
  assert.deepEqual(div.content.text, []);
});
