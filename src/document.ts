// Document: element arena, id index, tree mutation and queries

import { format } from 'node:util';
import { defaultAttributeFactory, type AttributeFactory } from './attribute-factory.ts';
import type { AttributeKind, AttributeSetting, AttributeValueMap } from './attributes.ts';
import { colorToHex } from './color.ts';
import { defaultElementFactory, type ElementFactory } from './element-factory.ts';
import { Element, type ElementHandle } from './element.ts';
import {
  AttributeNotSetError,
  NotAChildError,
  StructureError,
  TargetNotFoundError,
} from './errors.ts';
import { getLogger } from './logging.ts';
import { ParserSession } from './markup/session.ts';
import type { MarkupDiagnostic } from './markup/types.ts';
import { formatNumeric, numeric } from './units.ts';

const logger = getLogger('Document');

/** An element, or the id of an indexed element */
export type ElementRef = Element | string;

export type ElementPredicate = (element: Element) => boolean;

export interface DocumentOptions {
  /** Type name of the root element (default `viewer`) */
  rootType?: string;
  elementFactory?: ElementFactory;
  attributeFactory?: AttributeFactory;
}

export interface DocumentStats {
  totalElements: number;
  elementsByType: Record<string, number>;
  indexedIds: number;
  detachedRoots: number;
  parserSessions: number;
  maxDepth: number;
}

export class Document {
  readonly root: Element;
  readonly elementFactory: ElementFactory;
  readonly attributeFactory: AttributeFactory;

  private _registry = new Map<ElementHandle, Element>();
  private _index = new Map<string, Element>();
  private _sessions = new Map<ElementHandle, ParserSession>();
  private _nextHandle = 1;

  constructor(options: DocumentOptions = {}) {
    this.elementFactory = options.elementFactory ?? defaultElementFactory;
    this.attributeFactory = options.attributeFactory ?? defaultAttributeFactory;
    this.root = this.createElement(options.rootType ?? 'viewer');
  }

  // Element registry and index

  get elementCount(): number {
    return this._registry.size;
  }

  /**
   * Create a detached element and register it.
   */
  createElement(type: string, settings?: Iterable<AttributeSetting>): Element {
    const element = new Element(this, this._nextHandle++, type);
    this._registry.set(element.handle, element);
    if (settings) {
      this.setAttributes(element, settings);
    }
    return element;
  }

  getElement(handle: ElementHandle): Element | undefined {
    return this._registry.get(handle);
  }

  getElementById(id: string): Element | undefined {
    return this._index.get(id);
  }

  /**
   * @throws TargetNotFoundError when no element carries the id
   */
  requireElementById(id: string): Element {
    const element = this._index.get(id);
    if (!element) {
      throw new TargetNotFoundError(id);
    }
    return element;
  }

  hasElement(id: string): boolean {
    return this._index.has(id);
  }

  /**
   * `'*'` returns every live element. Any other string is a case-insensitive
   * regular expression matched against whole ids; elements without an id
   * never match. A predicate is applied to every live element.
   * Results follow registry order.
   */
  query(selector: string | ElementPredicate): Element[] {
    const all = [...this._registry.values()];
    if (typeof selector === 'function') {
      return all.filter(selector);
    }
    if (selector === '*') {
      return all;
    }
    const pattern = new RegExp(`^(?:${selector})$`, 'i');
    return all.filter(element => {
      const id = element.id;
      return id !== '' && this._index.get(id) === element && pattern.test(id);
    });
  }

  // Attributes

  setAttribute(target: ElementRef, setting: AttributeSetting): Element {
    const element = this._resolve(target);

    if (typeof setting === 'string') {
      element.content.replace('text', [setting]);
    } else if (typeof setting === 'number') {
      element.content.replace('number', [setting]);
    } else if (setting.kind === 'content') {
      element.content.replace(setting.content, setting.value);
    } else if (setting.kind === 'indexBy') {
      this._updateIndex(element, setting.value);
      element.attributes.set('indexBy', setting.value);
    } else {
      element.attributes.set(setting.kind, setting.value);
    }

    return element;
  }

  setAttributes(target: ElementRef, settings: Iterable<AttributeSetting>): Element {
    const element = this._resolve(target);
    for (const setting of settings) {
      this.setAttribute(element, setting);
    }
    return element;
  }

  /**
   * @throws AttributeNotSetError when the element has no value of that kind
   */
  getAttribute<K extends AttributeKind>(target: ElementRef, kind: K): AttributeValueMap[K] {
    const element = this._resolve(target);
    const value = element.attributes.get(kind);
    if (value === undefined) {
      throw new AttributeNotSetError(kind, element.toString());
    }
    return value;
  }

  findAttribute<K extends AttributeKind>(target: ElementRef, kind: K): AttributeValueMap[K] | undefined {
    return this._resolve(target).attributes.get(kind);
  }

  hasAttribute(target: ElementRef, kind: AttributeKind): boolean {
    return this._resolve(target).attributes.has(kind);
  }

  removeAttribute(target: ElementRef, kind: AttributeKind): boolean {
    const element = this._resolve(target);
    if (kind === 'indexBy') {
      this._updateIndex(element, '');
    }
    return element.attributes.delete(kind);
  }

  /** Set objectTop/objectLeft magnitudes, keeping their units (px when unset) */
  move(target: ElementRef, top: number, left: number): Element {
    const element = this._resolve(target);
    const { attributes } = element;
    attributes.set('objectTop', numeric(top, attributes.get('objectTop')?.unit ?? 'px'));
    attributes.set('objectLeft', numeric(left, attributes.get('objectLeft')?.unit ?? 'px'));
    return element;
  }

  /** Set objectWidth/objectHeight magnitudes, keeping their units (px when unset) */
  resize(target: ElementRef, width: number, height: number): Element {
    const element = this._resolve(target);
    const { attributes } = element;
    attributes.set('objectWidth', numeric(width, attributes.get('objectWidth')?.unit ?? 'px'));
    attributes.set('objectHeight', numeric(height, attributes.get('objectHeight')?.unit ?? 'px'));
    return element;
  }

  // Tree mutation

  /**
   * @returns the appended child
   */
  appendChild(parentRef: ElementRef, childRef: ElementRef): Element {
    const parent = this._resolve(parentRef);
    const child = this._resolve(childRef);
    this._assertInsertable(parent, child);
    this._link(parent, child, parent.lastChild, null);
    return child;
  }

  appendChildren(parentRef: ElementRef, childRefs: Iterable<ElementRef>): Element {
    const parent = this._resolve(parentRef);
    const children = [...childRefs].map(ref => this._resolve(ref));

    // Validate everything before linking anything
    const seen = new Set<Element>();
    for (const child of children) {
      if (seen.has(child)) {
        throw new StructureError(`${child} appears twice in the list`);
      }
      seen.add(child);
      this._assertInsertable(parent, child);
    }

    for (const child of children) {
      this._link(parent, child, parent.lastChild, null);
    }
    return parent;
  }

  /**
   * Insert `sibling` immediately after `node` under the same parent.
   * @returns the inserted sibling
   */
  append(nodeRef: ElementRef, siblingRef: ElementRef): Element {
    const node = this._resolve(nodeRef);
    const parent = node.parent;
    if (!parent) {
      throw new StructureError(`${node} has no parent to append a sibling to`);
    }
    return this.insertAfter(parent, siblingRef, node);
  }

  insertBefore(parentRef: ElementRef, newChildRef: ElementRef, existingRef: ElementRef): Element {
    const parent = this._resolve(parentRef);
    const newChild = this._resolve(newChildRef);
    const existing = this._requireChild(parent, existingRef);
    this._assertInsertable(parent, newChild);
    this._link(parent, newChild, existing.previousSibling, existing);
    return newChild;
  }

  insertAfter(parentRef: ElementRef, newChildRef: ElementRef, existingRef: ElementRef): Element {
    const parent = this._resolve(parentRef);
    const newChild = this._resolve(newChildRef);
    const existing = this._requireChild(parent, existingRef);
    this._assertInsertable(parent, newChild);
    this._link(parent, newChild, existing, existing.nextSibling);
    return newChild;
  }

  /**
   * Put `newChild` where `oldChild` was, then destroy `oldChild` and its subtree.
   * @returns the parent
   */
  replaceChild(parentRef: ElementRef, newChildRef: ElementRef, oldChildRef: ElementRef): Element {
    const parent = this._resolve(parentRef);
    const newChild = this._resolve(newChildRef);
    const oldChild = this._requireChild(parent, oldChildRef);
    this._assertInsertable(parent, newChild);

    const previous = oldChild.previousSibling;
    const next = oldChild.nextSibling;
    this._unlink(oldChild);
    this._link(parent, newChild, previous, next);
    this._destroySubtree(oldChild);
    return parent;
  }

  /**
   * Destroy `child` and its descendants.
   * @throws NotAChildError when `child` is not a child of `parent`
   */
  removeChild(parentRef: ElementRef, childRef: ElementRef): Element {
    const parent = this._resolve(parentRef);
    const child = this._requireChild(parent, childRef);
    this._unlink(child);
    this._destroySubtree(child);
    return parent;
  }

  /** Destroy every descendant of `node`. Calling it again is a no-op. */
  removeChildren(nodeRef: ElementRef): Element {
    const node = this._resolve(nodeRef);
    this._destroyDescendants(node);
    return node;
  }

  /** Destroy `node` and its subtree, detaching it from its parent first */
  remove(nodeRef: ElementRef): void {
    const node = this._resolve(nodeRef);
    if (node === this.root) {
      throw new StructureError('The document root cannot be removed');
    }
    this._unlink(node);
    this._destroySubtree(node);
  }

  /** Drop content and descendants; attributes and listeners stay */
  clear(nodeRef: ElementRef): Element {
    const node = this._resolve(nodeRef);
    node.content.clear();
    this._destroyDescendants(node);
    return node;
  }

  /** Unlink `node` from its parent without destroying it */
  detach(nodeRef: ElementRef): Element {
    const node = this._resolve(nodeRef);
    this._unlink(node);
    return node;
  }

  children(nodeRef: ElementRef): IterableIterator<Element> {
    return this._resolve(nodeRef).children();
  }

  childrenReversed(nodeRef: ElementRef): IterableIterator<Element> {
    return this._resolve(nodeRef).childrenReversed();
  }

  // Markup and text

  /**
   * Parse markup into `target`. Parser state persists per target, so a
   * document may arrive in chunks. Returns the element the next chunk
   * continues in.
   */
  ingestMarkup(targetRef: ElementRef, markup: string): Element {
    const target = this._resolve(targetRef);
    let session = this._sessions.get(target.handle);
    if (!session) {
      session = new ParserSession(target, this.elementFactory, this.attributeFactory);
      this._sessions.set(target.handle, session);
    }
    return session.ingest(markup);
  }

  appendMarkup(nodeRef: ElementRef, markup: string): Element {
    return this.ingestMarkup(nodeRef, markup);
  }

  /** Parse markup into the parent of `node`, or into `node` when it is a root */
  appendSiblingMarkup(nodeRef: ElementRef, markup: string): Element {
    const node = this._resolve(nodeRef);
    return this.ingestMarkup(node.parent ?? node, markup);
  }

  getDiagnostics(targetRef: ElementRef): readonly MarkupDiagnostic[] {
    const target = this._resolve(targetRef);
    return this._sessions.get(target.handle)?.diagnostics ?? [];
  }

  /** Diagnostics of every live parser session, keyed by target */
  allDiagnostics(): Array<[Element, readonly MarkupDiagnostic[]]> {
    return [...this._sessions.values()]
      .filter(session => session.diagnostics.length > 0)
      .map((session): [Element, readonly MarkupDiagnostic[]] => [session.target, session.diagnostics]);
  }

  /**
   * Format like util.format, then write the result.
   */
  printf(targetRef: ElementRef, fmt: string, ...args: unknown[]): Element {
    return this.write(targetRef, format(fmt, ...args));
  }

  /**
   * With `ingestStream` set the text is parsed as markup; otherwise it is
   * appended to the element's text content.
   */
  write(targetRef: ElementRef, text: string): Element {
    const element = this._resolve(targetRef);
    if (element.ingestStream) {
      this.ingestMarkup(element, text);
    } else {
      element.content.appendText(text);
    }
    return element;
  }

  // Statistics and debugging

  getStats(): DocumentStats {
    const elementsByType: Record<string, number> = {};
    let detachedRoots = 0;
    let maxDepth = 0;

    for (const element of this._registry.values()) {
      elementsByType[element.type] = (elementsByType[element.type] || 0) + 1;
      if (element.parentHandle === null && element !== this.root) {
        detachedRoots++;
      }
      maxDepth = Math.max(maxDepth, this.depthOf(element));
    }

    return {
      totalElements: this.elementCount,
      elementsByType,
      indexedIds: this._index.size,
      detachedRoots,
      parserSessions: this._sessions.size,
      maxDepth,
    };
  }

  /** Number of ancestors of `element` */
  depthOf(elementRef: ElementRef): number {
    let depth = 0;
    for (let node = this._resolve(elementRef).parent; node; node = node.parent) {
      depth++;
    }
    return depth;
  }

  toDebugString(): string {
    const stats = this.getStats();
    return `Document {
  root: ${this.root}
  elements: ${stats.totalElements}
  indexed: ${stats.indexedIds}
  depth: ${stats.maxDepth}
  types: ${JSON.stringify(stats.elementsByType)}
}`;
  }

  asTree(rootRef: ElementRef = this.root): string {
    return this._buildTreeString(this._resolve(rootRef), '', true);
  }

  // Private methods

  private _resolve(ref: ElementRef): Element {
    if (typeof ref === 'string') {
      return this.requireElementById(ref);
    }
    if (ref.document !== this) {
      throw new StructureError(`${ref} belongs to another document`);
    }
    if (!ref.alive) {
      throw new StructureError(`${ref} has been destroyed`);
    }
    return ref;
  }

  private _requireChild(parent: Element, childRef: ElementRef): Element {
    const child = this._resolve(childRef);
    if (child.parentHandle !== parent.handle) {
      throw new NotAChildError(child.toString(), parent.toString());
    }
    return child;
  }

  private _assertInsertable(parent: Element, child: Element): void {
    if (child === this.root) {
      throw new StructureError('The document root cannot be attached');
    }
    if (child.parentHandle !== null) {
      throw new StructureError(`${child} already has a parent`);
    }
    for (let node: Element | null = parent; node; node = node.parent) {
      if (node === child) {
        throw new StructureError(`${child} is an ancestor of ${parent}`);
      }
    }
  }

  private _link(parent: Element, child: Element, previous: Element | null, next: Element | null): void {
    child.parentHandle = parent.handle;
    child.previousSiblingHandle = previous?.handle ?? null;
    child.nextSiblingHandle = next?.handle ?? null;

    if (previous) {
      previous.nextSiblingHandle = child.handle;
    } else {
      parent.firstChildHandle = child.handle;
    }
    if (next) {
      next.previousSiblingHandle = child.handle;
    } else {
      parent.lastChildHandle = child.handle;
    }
    parent.childCount++;
  }

  private _unlink(child: Element): void {
    const parent = child.parent;
    if (!parent) {
      return;
    }
    const previous = child.previousSibling;
    const next = child.nextSibling;

    if (previous) {
      previous.nextSiblingHandle = next?.handle ?? null;
    } else {
      parent.firstChildHandle = next?.handle ?? null;
    }
    if (next) {
      next.previousSiblingHandle = previous?.handle ?? null;
    } else {
      parent.lastChildHandle = previous?.handle ?? null;
    }
    parent.childCount--;

    child.parentHandle = null;
    child.previousSiblingHandle = null;
    child.nextSiblingHandle = null;
  }

  // Post-order: children are destroyed before their parent
  private _destroyDescendants(node: Element): number {
    let destroyed = 0;
    for (const child of [...node.children()]) {
      destroyed += this._destroySubtree(child);
    }
    node.firstChildHandle = null;
    node.lastChildHandle = null;
    node.childCount = 0;
    return destroyed;
  }

  private _destroySubtree(node: Element): number {
    const destroyed = this._destroyDescendants(node) + 1;
    this._destroy(node);
    if (destroyed > 1) {
      logger.trace('Destroyed subtree', { root: node.toString(), elements: destroyed });
    }
    return destroyed;
  }

  private _destroy(element: Element): void {
    const id = element.id;
    if (id !== '' && this._index.get(id) === element) {
      this._index.delete(id);
    }
    this._registry.delete(element.handle);
    this._sessions.delete(element.handle);
    element.listeners.clear();
    element.parentHandle = null;
    element.previousSiblingHandle = null;
    element.nextSiblingHandle = null;
    element.alive = false;
  }

  /**
   * Move the index entry of `element` from its current id to `newId`.
   * Empty ids are never indexed. Taking an id used by another element
   * leaves that element unindexed.
   */
  private _updateIndex(element: Element, newId: string): void {
    const oldId = element.id;
    if (oldId === newId) {
      return;
    }
    if (oldId !== '' && this._index.get(oldId) === element) {
      this._index.delete(oldId);
    }
    if (newId !== '') {
      const displaced = this._index.get(newId);
      this._index.set(newId, element);
      if (displaced && displaced !== element) {
        logger.debug('Id taken over by another element', {
          id: newId,
          previous: displaced.handle,
          current: element.handle,
        });
      }
    }
  }

  private _buildTreeString(element: Element, prefix: string, isLast: boolean): string {
    let result = prefix;

    if (prefix !== '') {
      result += isLast ? '└── ' : '├── ';
    }

    result += this._formatElementNode(element);
    result += '\n';

    const childPrefix = prefix + (isLast ? '    ' : '│   ');
    for (const child of element.children()) {
      result += this._buildTreeString(child, childPrefix, child.nextSiblingHandle === null);
    }

    return result;
  }

  private _formatElementNode(element: Element): string {
    let result = element.type;

    if (element.id) {
      result += `#${element.id}`;
    }

    const keyProps = this._getKeyProperties(element);
    if (keyProps.length > 0) {
      result += ` [${keyProps.join(', ')}]`;
    }

    return result;
  }

  private _getKeyProperties(element: Element): string[] {
    const props: string[] = [];
    const { attributes, content } = element;

    const text = content.text.join('');
    if (text) {
      const preview = text.length > 20 ? text.substring(0, 20) + '...' : text;
      props.push(`"${preview}"`);
    }

    const display = attributes.get('display');
    if (display && display !== 'block') {
      props.push(`display: ${display}`);
    }

    const color = attributes.get('textColor');
    if (color) {
      props.push(`color: ${colorToHex(color)}`);
    }

    const width = attributes.get('objectWidth');
    const height = attributes.get('objectHeight');
    if (width && height) {
      props.push(`size: ${formatNumeric(width)}x${formatNumeric(height)}`);
    }

    return props;
  }
}

export function createDocument(options?: DocumentOptions): Document {
  return new Document(options);
}
