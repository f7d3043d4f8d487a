// Element record: handle-based tree links plus attributes, content and listeners

import type { Document, ElementRef } from './document.ts';
import {
  type AttributeKind,
  type AttributeSetting,
  type AttributeValueMap,
  AttributeStore,
  ContentPayload,
} from './attributes.ts';
import { type EventHandler, type EventType, type ListenerId, ListenerTable, type QuireEvent } from './events.ts';
import type { NumericValue } from './units.ts';

/** Positive integer identity, allocated by the owning document and never reused */
export type ElementHandle = number;

export class Element {
  readonly handle: ElementHandle;
  readonly type: string;
  readonly document: Document;
  readonly attributes = new AttributeStore();
  readonly content = new ContentPayload();
  readonly listeners = new ListenerTable();

  /** When set, printf/write parse their text as markup */
  ingestStream = false;

  // Links are maintained by Document; do not assign them directly
  parentHandle: ElementHandle | null = null;
  firstChildHandle: ElementHandle | null = null;
  lastChildHandle: ElementHandle | null = null;
  nextSiblingHandle: ElementHandle | null = null;
  previousSiblingHandle: ElementHandle | null = null;
  childCount = 0;
  alive = true;

  constructor(document: Document, handle: ElementHandle, type: string) {
    this.document = document;
    this.handle = handle;
    this.type = type;
  }

  get id(): string {
    return this.attributes.get('indexBy') ?? '';
  }

  get parent(): Element | null {
    return this._resolve(this.parentHandle);
  }

  get firstChild(): Element | null {
    return this._resolve(this.firstChildHandle);
  }

  get lastChild(): Element | null {
    return this._resolve(this.lastChildHandle);
  }

  get nextSibling(): Element | null {
    return this._resolve(this.nextSiblingHandle);
  }

  get previousSibling(): Element | null {
    return this._resolve(this.previousSiblingHandle);
  }

  get isRoot(): boolean {
    return this.parentHandle === null;
  }

  /**
   * Iterate children first to last. The next link is read before each
   * yield, so removing the yielded child does not end the walk.
   */
  *children(): IterableIterator<Element> {
    let node = this.firstChild;
    while (node) {
      const next = node.nextSibling;
      yield node;
      node = next;
    }
  }

  *childrenReversed(): IterableIterator<Element> {
    let node = this.lastChild;
    while (node) {
      const previous = node.previousSibling;
      yield node;
      node = previous;
    }
  }

  /** Label used in error messages and logs */
  toString(): string {
    const id = this.id;
    return id ? `${this.type}#${id}` : `${this.type}@${this.handle}`;
  }

  // Tree operations, delegated to the document

  appendChild(child: ElementRef): Element {
    return this.document.appendChild(this, child);
  }

  appendChildren(children: Iterable<ElementRef>): this {
    this.document.appendChildren(this, children);
    return this;
  }

  append(sibling: ElementRef): Element {
    return this.document.append(this, sibling);
  }

  insertBefore(newChild: ElementRef, existing: ElementRef): Element {
    return this.document.insertBefore(this, newChild, existing);
  }

  insertAfter(newChild: ElementRef, existing: ElementRef): Element {
    return this.document.insertAfter(this, newChild, existing);
  }

  replaceChild(newChild: ElementRef, oldChild: ElementRef): this {
    this.document.replaceChild(this, newChild, oldChild);
    return this;
  }

  removeChild(child: ElementRef): this {
    this.document.removeChild(this, child);
    return this;
  }

  removeChildren(): this {
    this.document.removeChildren(this);
    return this;
  }

  remove(): void {
    this.document.remove(this);
  }

  clear(): this {
    this.document.clear(this);
    return this;
  }

  detach(): this {
    this.document.detach(this);
    return this;
  }

  // Attributes

  setAttribute(setting: AttributeSetting): this {
    this.document.setAttribute(this, setting);
    return this;
  }

  setAttributes(settings: Iterable<AttributeSetting>): this {
    this.document.setAttributes(this, settings);
    return this;
  }

  getAttribute<K extends AttributeKind>(kind: K): AttributeValueMap[K] {
    return this.document.getAttribute(this, kind);
  }

  findAttribute<K extends AttributeKind>(kind: K): AttributeValueMap[K] | undefined {
    return this.attributes.get(kind);
  }

  hasAttribute(kind: AttributeKind): boolean {
    return this.attributes.has(kind);
  }

  removeAttribute(kind: AttributeKind): boolean {
    return this.document.removeAttribute(this, kind);
  }

  move(top: number, left: number): this {
    this.document.move(this, top, left);
    return this;
  }

  resize(width: number, height: number): this {
    this.document.resize(this, width, height);
    return this;
  }

  /** Current size as [width, height], when both are set */
  get size(): [NumericValue, NumericValue] | undefined {
    const width = this.attributes.get('objectWidth');
    const height = this.attributes.get('objectHeight');
    return width && height ? [width, height] : undefined;
  }

  // Markup and text

  appendMarkup(markup: string): Element {
    return this.document.appendMarkup(this, markup);
  }

  appendSiblingMarkup(markup: string): Element {
    return this.document.appendSiblingMarkup(this, markup);
  }

  printf(format: string, ...args: unknown[]): this {
    this.document.printf(this, format, ...args);
    return this;
  }

  write(text: string): this {
    this.document.write(this, text);
    return this;
  }

  // Events

  addListener(type: EventType, handler: EventHandler): ListenerId {
    return this.listeners.add(type, handler);
  }

  removeListener(type: EventType, idOrHandler: ListenerId | EventHandler): number {
    return this.listeners.remove(type, idOrHandler);
  }

  dispatch(event: QuireEvent): number {
    return this.listeners.dispatch(this, event);
  }

  private _resolve(handle: ElementHandle | null): Element | null {
    return handle === null ? null : this.document.getElement(handle) ?? null;
  }
}
