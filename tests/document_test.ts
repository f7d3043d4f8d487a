// Tests for tree mutation on the document

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { indexBy, textContent } from '../src/attributes.ts';
import { Document } from '../src/document.ts';
import type { Element } from '../src/element.ts';
import { NotAChildError, StructureError } from '../src/errors.ts';

function ids(elements: Iterable<{ id: string }>): string[] {
  return [...elements].map(e => e.id);
}

// Deterministic integers in [0, n)
function seededRandom(seed: number): (n: number) => number {
  let state = seed >>> 0;
  return n => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % n;
  };
}

function subtree(node: Element): Element[] {
  return [node, ...[...node.children()].flatMap(subtree)];
}

/** Check the links of every node below `node`; returns the number of nodes */
function checkLinks(node: Element): number {
  const forward = [...node.children()];
  const backward = [...node.childrenReversed()].reverse();

  assert.deepEqual(forward.map(c => c.handle), backward.map(c => c.handle));
  assert.equal(node.childCount, forward.length);
  assert.equal(node.firstChild, forward[0] ?? null);
  assert.equal(node.lastChild, forward[forward.length - 1] ?? null);

  let count = 1;
  for (const child of forward) {
    assert.equal(child.parent, node);
    count += checkLinks(child);
  }
  return count;
}

test('appendChild links the child last and returns it', () => {
  const doc = new Document();
  const a = doc.createElement('div', [indexBy('a')]);
  const b = doc.createElement('div', [indexBy('b')]);

  assert.equal(doc.appendChild(doc.root, a), a);
  assert.equal(doc.root.appendChild(b), b);
  assert.deepEqual(ids(doc.root.children()), ['a', 'b']);
  assert.deepEqual(ids(doc.root.childrenReversed()), ['b', 'a']);
});

test('appendChild rejects cycles, parented children and the root', () => {
  const doc = new Document();
  const a = doc.root.appendChild(doc.createElement('div'));
  const b = a.appendChild(doc.createElement('div'));

  assert.throws(() => doc.createElement('div').appendChild(b), StructureError);
  assert.throws(() => a.appendChild(doc.root), { message: 'The document root cannot be attached' });

  a.detach();
  assert.throws(() => b.appendChild(a), StructureError);
  assert.equal(a.parent, null);
  assert.equal(b.firstChild, null);
});

test('appendChildren validates every child before linking', () => {
  const doc = new Document();
  const parented = doc.root.appendChild(doc.createElement('div'));
  const fresh = doc.createElement('span');

  assert.throws(() => doc.createElement('ul').appendChildren([fresh, parented]), StructureError);
  assert.equal(fresh.parent, null);

  assert.throws(() => doc.root.appendChildren([fresh, fresh]), StructureError);
  assert.equal(fresh.parent, null);
  assert.equal(doc.root.childCount, 1);
});

test('insertBefore and insertAfter keep both link directions', () => {
  const doc = new Document();
  const [a, b, c, d, e] = ['a', 'b', 'c', 'd', 'e'].map(id => doc.createElement('li', [indexBy(id)]));
  doc.root.appendChildren([b, d]);

  doc.root.insertBefore(a, b);
  doc.root.insertAfter(c, b);
  doc.root.insertAfter(e, d);

  assert.deepEqual(ids(doc.root.children()), ['a', 'b', 'c', 'd', 'e']);
  assert.deepEqual(ids(doc.root.childrenReversed()), ['e', 'd', 'c', 'b', 'a']);
  assert.equal(doc.root.firstChild, a);
  assert.equal(doc.root.lastChild, e);
  assert.equal(doc.root.childCount, 5);
});

test('insertBefore requires the reference to be a child', () => {
  const doc = new Document();
  const x = doc.createElement('div');
  const orphan = doc.createElement('span');

  assert.throws(() => doc.root.insertBefore(x, orphan), NotAChildError);
  assert.throws(
    () => doc.root.insertAfter(x, orphan),
    { message: 'Referenced element span@3 is not a child of viewer@1' }
  );
  assert.equal(x.parent, null);
});

test('append inserts a sibling after the node', () => {
  const doc = new Document();
  const a = doc.root.appendChild(doc.createElement('p', [indexBy('a')]));
  doc.root.appendChild(doc.createElement('p', [indexBy('c')]));

  a.append(doc.createElement('p', [indexBy('b')]));
  assert.deepEqual(ids(doc.root.children()), ['a', 'b', 'c']);

  assert.throws(() => doc.createElement('p').append(doc.createElement('p')), StructureError);
});

test('replaceChild puts the new child in place and purges the old subtree', () => {
  const doc = new Document();
  const a = doc.root.appendChild(doc.createElement('div', [indexBy('a')]));
  const inner = a.appendChild(doc.createElement('span', [indexBy('inner')]));
  doc.root.appendChild(doc.createElement('div', [indexBy('b')]));
  const replacement = doc.createElement('div', [indexBy('n')]);

  assert.equal(doc.replaceChild(doc.root, replacement, a), doc.root);

  assert.deepEqual(ids(doc.root.children()), ['n', 'b']);
  assert.deepEqual(ids(doc.root.childrenReversed()), ['b', 'n']);
  assert.equal(a.alive, false);
  assert.equal(inner.alive, false);
  assert.equal(doc.getElement(a.handle), undefined);
  assert.equal(doc.getElement(inner.handle), undefined);
  assert.equal(doc.getElementById('inner'), undefined);
  assert.equal(doc.getElementById('a'), undefined);
  assert.equal(doc.elementCount, 3);
});

test('removeChild destroys the child and its descendants', () => {
  const doc = new Document();
  const list = doc.root.appendChild(doc.createElement('ul'));
  const item = list.appendChild(doc.createElement('li', [indexBy('item')]));

  doc.root.removeChild(list);
  assert.equal(doc.root.childCount, 0);
  assert.equal(item.alive, false);
  assert.equal(doc.hasElement('item'), false);
  assert.equal(doc.elementCount, 1);

  const stranger = doc.createElement('p');
  assert.throws(() => doc.root.removeChild(stranger), NotAChildError);
});

test('removeChildren is idempotent', () => {
  const doc = new Document();
  const div = doc.root.appendChild(doc.createElement('div'));
  div.appendChildren([doc.createElement('p'), doc.createElement('p')]);
  div.firstChild?.appendChild(doc.createElement('span'));
  assert.equal(doc.elementCount, 5);

  div.removeChildren();
  assert.equal(doc.elementCount, 2);
  assert.equal(div.childCount, 0);
  assert.equal(div.firstChild, null);
  assert.equal(div.lastChild, null);

  div.removeChildren();
  assert.equal(doc.elementCount, 2);
  assert.equal(div.alive, true);
});

test('remove detaches and destroys; the root cannot be removed', () => {
  const doc = new Document();
  const a = doc.root.appendChild(doc.createElement('p', [indexBy('a')]));
  const b = doc.root.appendChild(doc.createElement('p', [indexBy('b')]));

  a.remove();
  assert.equal(doc.root.firstChild, b);
  assert.equal(b.previousSibling, null);

  assert.throws(() => doc.root.remove(), { message: 'The document root cannot be removed' });
});

test('destroyed elements cannot be used', () => {
  const doc = new Document();
  const div = doc.root.appendChild(doc.createElement('div'));
  div.remove();
  assert.throws(() => doc.root.appendChild(div), StructureError);
  assert.throws(() => div.setAttribute('text'), { message: 'div@2 has been destroyed' });
});

test('elements from another document are rejected', () => {
  const one = new Document();
  const two = new Document();
  assert.throws(() => one.root.appendChild(two.createElement('div')), StructureError);
});

test('clear drops content and descendants but keeps attributes', () => {
  const doc = new Document();
  const div = doc.root.appendChild(doc.createElement('div', [indexBy('box'), textContent('hello')]));
  div.appendChild(doc.createElement('span'));

  div.clear();
  assert.deepEqual(div.content.text, []);
  assert.equal(div.childCount, 0);
  assert.equal(div.id, 'box');
  assert.equal(doc.getElementById('box'), div);
});

test('detach keeps the element alive', () => {
  const doc = new Document();
  const div = doc.root.appendChild(doc.createElement('div'));
  const span = div.appendChild(doc.createElement('span'));

  div.detach();
  assert.equal(div.parent, null);
  assert.equal(div.alive, true);
  assert.equal(span.parent, div);
  assert.equal(doc.root.childCount, 0);
  assert.equal(doc.getStats().detachedRoots, 1);

  doc.root.appendChild(div);
  assert.equal(div.parent, doc.root);
});

test('mixed mutations keep sibling links, counts and parents consistent', () => {
  const doc = new Document();
  const pick = seededRandom(7321);
  let live: Element[] = [doc.root];

  for (let step = 0; step < 1500; step++) {
    const parent = live[pick(live.length)];
    const children = [...parent.children()];
    const operation = children.length === 0 ? 0 : pick(3);

    if (operation === 0) {
      parent.appendChild(doc.createElement('div'));
    } else if (operation === 1) {
      parent.insertBefore(doc.createElement('span'), children[pick(children.length)]);
    } else {
      parent.removeChild(children[pick(children.length)]);
    }

    live = subtree(doc.root);
    if (step % 100 === 0) {
      assert.equal(checkLinks(doc.root), doc.elementCount);
    }
  }

  assert.equal(checkLinks(doc.root), doc.elementCount);
  assert.equal(live.length, doc.elementCount);
});
